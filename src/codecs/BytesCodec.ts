import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { readOk } from '../Status';
import { CodecContext, CodecResult, CodecStatus, FieldCodec, FieldValue, describeValue, fail, outOfRange } from './FieldCodec';
import { LengthSpec, resolveLength } from './length';

/** Raw byte span of a fixed or field-dependent length. */
export class BytesCodec implements FieldCodec {
  readonly typeName = 'bytes';
  private readonly length: LengthSpec;

  constructor(length: LengthSpec) {
    this.length = length;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    const n = resolveLength(this.length, ctx);
    if (!n.ok) return n;
    // Fail before allocating for lengths the input cannot hold
    if (n.value > reader.remaining) return outOfRange(ctx, 'decode', this.typeName);
    const out = new Uint8Array(n.value);
    const status = reader.readBytes(out, n.value);
    return status.ok ? readOk(out) : outOfRange(ctx, 'decode', this.typeName);
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    const n = resolveLength(this.length, ctx);
    if (!n.ok) return n;
    if (!(value instanceof Uint8Array)) {
      return fail('INVALID_VALUE', ctx.path, `Expected a Uint8Array at '${ctx.path}', got ${describeValue(value)}`);
    }
    if (value.length !== n.value) {
      return fail('INVALID_LENGTH', ctx.path, `Expected ${n.value} bytes at '${ctx.path}', got ${value.length}`);
    }
    const status = writer.writeBytes(value, n.value);
    return status.ok ? status : outOfRange(ctx, 'encode', this.typeName);
  }

  sizeOf(_value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    return resolveLength(this.length, ctx);
  }
}
