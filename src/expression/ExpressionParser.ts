import peggy from 'peggy';
import { ProtocolError } from '../ProtocolError';
import { EXPRESSION_GRAMMAR } from './grammar';
import type { Expression } from './types';

let cachedParser: peggy.Parser | null = null;

function getParser(): peggy.Parser {
  if (!cachedParser) {
    cachedParser = peggy.generate(EXPRESSION_GRAMMAR);
  }
  return cachedParser;
}

/**
 * Parse a length or condition expression such as `name_len + 2` or
 * `flags & 0x08`.
 *
 * @throws ProtocolError with code `INVALID_EXPRESSION` on syntax errors
 */
export function parseExpression(source: string): Expression {
  const parser = getParser();
  try {
    return parser.parse(source) as Expression;
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new ProtocolError('INVALID_EXPRESSION', `Invalid expression "${source}": ${detail}`);
  }
}
