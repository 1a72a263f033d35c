import { readOk } from '../Status';
import { Expression, evaluate } from '../expression';
import { CodecContext, CodecResult, fail } from './FieldCodec';

/** A fixed element/byte count, or an expression over earlier fields. */
export type LengthSpec = number | Expression;

export function resolveLength(spec: LengthSpec, ctx: CodecContext): CodecResult<number> {
  const n = typeof spec === 'number' ? spec : evaluate(spec, ctx.scope);
  if (!Number.isSafeInteger(n) || n < 0) {
    return fail('INVALID_LENGTH', ctx.path, `Length of '${ctx.path}' evaluated to ${n}`);
  }
  return readOk(n);
}
