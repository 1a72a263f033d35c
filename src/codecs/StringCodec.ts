import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { readOk } from '../Status';
import { CodecContext, CodecResult, CodecStatus, FieldCodec, FieldValue, describeValue, fail, outOfRange } from './FieldCodec';
import { LengthSpec, resolveLength } from './length';

const decoder = new TextDecoder('utf-8');
const encoder = new TextEncoder();

/**
 * Fixed-size character field. UTF-8, NUL-padded on encode and cut at the
 * first NUL on decode.
 */
export class StringCodec implements FieldCodec {
  readonly typeName = 'string';
  private readonly length: LengthSpec;

  constructor(length: LengthSpec) {
    this.length = length;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    const n = resolveLength(this.length, ctx);
    if (!n.ok) return n;
    if (n.value > reader.remaining) return outOfRange(ctx, 'decode', this.typeName);
    const raw = new Uint8Array(n.value);
    const status = reader.readBytes(raw, n.value);
    if (!status.ok) return outOfRange(ctx, 'decode', this.typeName);
    const end = raw.indexOf(0);
    return readOk(decoder.decode(end === -1 ? raw : raw.subarray(0, end)));
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    const n = resolveLength(this.length, ctx);
    if (!n.ok) return n;
    if (typeof value !== 'string') {
      return fail('INVALID_VALUE', ctx.path, `Expected a string at '${ctx.path}', got ${describeValue(value)}`);
    }
    const text = encoder.encode(value);
    if (text.length > n.value) {
      return fail('INVALID_LENGTH', ctx.path, `String at '${ctx.path}' needs ${text.length} bytes, field holds ${n.value}`);
    }
    const padded = new Uint8Array(n.value);
    padded.set(text);
    const status = writer.writeBytes(padded);
    return status.ok ? status : outOfRange(ctx, 'encode', this.typeName);
  }

  sizeOf(_value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    return resolveLength(this.length, ctx);
  }
}
