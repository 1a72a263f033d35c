import * as fs from 'fs';
import * as path from 'path';
import { Value } from '@sinclair/typebox/value';
import { ProtocolError } from '../ProtocolError';
import { ProtocolDocument, ProtocolDocumentSchema } from './definition';

/**
 * Parse and validate a protocol document from JSON text.
 *
 * @param source name used in error messages, usually the file path
 * @throws ProtocolError with code `INVALID_DEFINITION`
 */
export function parseProtocol(text: string, source = '<input>'): ProtocolDocument {
  if (text.trim() === '') {
    throw new ProtocolError('INVALID_DEFINITION', `Empty protocol file: ${source}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new ProtocolError('INVALID_DEFINITION', `Invalid JSON in ${source}: ${detail}`);
  }

  if (!Value.Check(ProtocolDocumentSchema, raw)) {
    const [first] = [...Value.Errors(ProtocolDocumentSchema, raw)];
    const detail = first ? `${first.path || '/'}: ${first.message}` : 'unknown error';
    throw new ProtocolError('INVALID_DEFINITION', `Schema validation failed for ${source}: ${detail}`);
  }
  return raw;
}

export function loadProtocolFile(filePath: string): ProtocolDocument {
  return parseProtocol(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/** Load every `*.json` protocol in `dir`, in file name order. */
export function loadProtocolsFromDir(dir: string): ProtocolDocument[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new ProtocolError('INVALID_DEFINITION', `Protocol directory not found: ${dir}`);
  }
  const files = fs.readdirSync(dir).filter(f => f.endsWith('.json')).sort();
  if (files.length === 0) {
    throw new ProtocolError('INVALID_DEFINITION', `No protocol files found in ${dir}`);
  }
  return files.map(f => loadProtocolFile(path.join(dir, f)));
}
