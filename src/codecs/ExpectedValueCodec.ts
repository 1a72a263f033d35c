import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { CodecContext, CodecResult, CodecStatus, FieldCodec, FieldValue, fail } from './FieldCodec';

/** Equality for expected values; bigint and number compare by numeric value. */
export function sameValue(a: FieldValue, b: FieldValue): boolean {
  if (typeof a === 'bigint' && typeof b === 'number') return Number.isSafeInteger(b) && a === BigInt(b);
  if (typeof a === 'number' && typeof b === 'bigint') return sameValue(b, a);
  return a === b;
}

function show(value: FieldValue): string {
  if (typeof value === 'number' || typeof value === 'bigint') return `0x${value.toString(16)}`;
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

/**
 * Wraps a field that must hold a known value (magic numbers, version
 * guards). Decoding fails with EXPECTED_MISMATCH on any other value;
 * encoding writes the expected value when none is given.
 */
export class ExpectedValueCodec implements FieldCodec {
  readonly typeName: string;
  readonly expected: FieldValue;
  private readonly inner: FieldCodec;

  get defaultValue(): FieldValue {
    return this.expected;
  }

  constructor(inner: FieldCodec, expected: FieldValue) {
    this.typeName = inner.typeName;
    this.inner = inner;
    this.expected = expected;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    const r = this.inner.decode(reader, ctx);
    if (!r.ok) return r;
    if (!sameValue(r.value, this.expected)) {
      return fail(
        'EXPECTED_MISMATCH',
        ctx.path,
        `Expected ${show(this.expected)} at '${ctx.path}', got ${show(r.value)}`,
      );
    }
    return r;
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    const v = value ?? this.expected;
    if (!sameValue(v, this.expected)) {
      return fail(
        'EXPECTED_MISMATCH',
        ctx.path,
        `Field '${ctx.path}' must be ${show(this.expected)}, got ${show(v)}`,
      );
    }
    return this.inner.encode(writer, v, ctx);
  }

  sizeOf(value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    return this.inner.sizeOf(value ?? this.expected, ctx);
  }

  exportScope(name: string, value: FieldValue, scope: Map<string, number>): void {
    this.inner.exportScope?.(name, value, scope);
  }
}
