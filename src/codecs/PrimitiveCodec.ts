import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { ReadResult, Status, readOk } from '../Status';
import type { IntegerTypeName } from '../protocol/definition';
import {
  CodecContext,
  CodecResult,
  CodecStatus,
  FieldCodec,
  FieldValue,
  describeValue,
  fail,
  outOfRange,
} from './FieldCodec';

export type PrimitiveName = IntegerTypeName | 'f32' | 'f64';

interface NumberPrimitive {
  kind: 'integer' | 'float';
  size: number;
  min: number;
  max: number;
  read(reader: ByteReader): ReadResult<number>;
  write(writer: ByteWriter, value: number): Status;
}

interface BigIntPrimitive {
  kind: 'bigint';
  size: number;
  min: bigint;
  max: bigint;
  read(reader: ByteReader): ReadResult<bigint>;
  write(writer: ByteWriter, value: bigint): Status;
}

export type PrimitiveSpec = NumberPrimitive | BigIntPrimitive;

/** Every primitive the reader and writer support, with its encoded size and value range. */
export const PRIMITIVES: Readonly<Record<PrimitiveName, PrimitiveSpec>> = {
  u8: { kind: 'integer', size: 1, min: 0, max: 0xff, read: r => r.readU8(), write: (w, v) => w.writeU8(v) },
  u16: { kind: 'integer', size: 2, min: 0, max: 0xffff, read: r => r.readU16(), write: (w, v) => w.writeU16(v) },
  u32: { kind: 'integer', size: 4, min: 0, max: 0xffffffff, read: r => r.readU32(), write: (w, v) => w.writeU32(v) },
  u64: { kind: 'bigint', size: 8, min: 0n, max: 0xffffffffffffffffn, read: r => r.readU64(), write: (w, v) => w.writeU64(v) },
  i8: { kind: 'integer', size: 1, min: -0x80, max: 0x7f, read: r => r.readI8(), write: (w, v) => w.writeI8(v) },
  i16: { kind: 'integer', size: 2, min: -0x8000, max: 0x7fff, read: r => r.readI16(), write: (w, v) => w.writeI16(v) },
  i32: { kind: 'integer', size: 4, min: -0x80000000, max: 0x7fffffff, read: r => r.readI32(), write: (w, v) => w.writeI32(v) },
  i64: { kind: 'bigint', size: 8, min: -0x8000000000000000n, max: 0x7fffffffffffffffn, read: r => r.readI64(), write: (w, v) => w.writeI64(v) },
  f32: { kind: 'float', size: 4, min: -Infinity, max: Infinity, read: r => r.readF32(), write: (w, v) => w.writeF32(v) },
  f64: { kind: 'float', size: 8, min: -Infinity, max: Infinity, read: r => r.readF64(), write: (w, v) => w.writeF64(v) },
};

export function isPrimitiveName(name: string): name is PrimitiveName {
  return Object.prototype.hasOwnProperty.call(PRIMITIVES, name);
}

/** The numeric view of a primitive value used in expression scopes. */
export function toScopeNumber(value: FieldValue): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  return undefined;
}

/**
 * Fixed-width integer or IEEE-754 field. 64-bit integers decode to bigint
 * and encode from bigint or a safe-integer number.
 */
export class PrimitiveCodec implements FieldCodec {
  readonly typeName: PrimitiveName;
  private readonly spec: PrimitiveSpec;

  constructor(name: PrimitiveName) {
    this.typeName = name;
    this.spec = PRIMITIVES[name];
  }

  get size(): number {
    return this.spec.size;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    const r = this.spec.read(reader);
    return r.ok ? readOk(r.value) : outOfRange(ctx, 'decode', this.typeName);
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    const spec = this.spec;
    let status: Status;
    if (spec.kind === 'bigint') {
      const v = this.checkBigInt(spec, value, ctx);
      if (!v.ok) return v;
      status = spec.write(writer, v.value);
    } else {
      const v = this.checkNumber(spec, value, ctx);
      if (!v.ok) return v;
      status = spec.write(writer, v.value);
    }
    return status.ok ? status : outOfRange(ctx, 'encode', this.typeName);
  }

  sizeOf(): CodecResult<number> {
    return readOk(this.spec.size);
  }

  exportScope(name: string, value: FieldValue, scope: Map<string, number>): void {
    const n = toScopeNumber(value);
    if (n !== undefined) scope.set(name, n);
  }

  private checkNumber(spec: NumberPrimitive, value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    if (typeof value !== 'number') {
      return fail('INVALID_VALUE', ctx.path, `Expected a number for ${this.typeName} at '${ctx.path}', got ${describeValue(value)}`);
    }
    if (spec.kind === 'integer' && (!Number.isInteger(value) || value < spec.min || value > spec.max)) {
      return fail('INVALID_VALUE', ctx.path, `Value ${value} at '${ctx.path}' is not a valid ${this.typeName}`);
    }
    return readOk(value);
  }

  private checkBigInt(spec: BigIntPrimitive, value: FieldValue | undefined, ctx: CodecContext): CodecResult<bigint> {
    let v: bigint;
    if (typeof value === 'bigint') {
      v = value;
    } else if (typeof value === 'number' && Number.isSafeInteger(value)) {
      v = BigInt(value);
    } else {
      return fail('INVALID_VALUE', ctx.path, `Expected a bigint for ${this.typeName} at '${ctx.path}', got ${describeValue(value)}`);
    }
    if (v < spec.min || v > spec.max) {
      return fail('INVALID_VALUE', ctx.path, `Value ${v} at '${ctx.path}' is not a valid ${this.typeName}`);
    }
    return readOk(v);
  }
}
