import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import { readOk } from '../Status';
import {
  CodecContext,
  CodecResult,
  CodecStatus,
  FieldCodec,
  FieldValue,
  StructValue,
  describeValue,
  fail,
  isStructValue,
} from './FieldCodec';
import type { EnumTable } from './EnumCodec';
import { PrimitiveCodec } from './PrimitiveCodec';

export type BitfieldContainer = 'u8' | 'u16' | 'u32';

export const BITFIELD_CONTAINERS: Readonly<Record<string, BitfieldContainer>> = {
  bitfield_u8: 'u8',
  bitfield_u16: 'u16',
  bitfield_u32: 'u32',
};

export function isBitfieldContainerName(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(BITFIELD_CONTAINERS, name);
}

export interface BitSlice {
  name: string;
  /** Bit offset from the least-significant bit. */
  offset: number;
  width: number;
  /** Present when the slice holds an enum value. */
  enumTable?: EnumTable;
}

/**
 * Bit slices packed into one unsigned container integer.
 *
 * One-bit slices decode to booleans, enum slices to names, the rest to
 * numbers. Slices missing from an encoded value are written as zero.
 */
export class BitfieldCodec implements FieldCodec {
  readonly typeName: string;
  private readonly container: PrimitiveCodec;
  private readonly slices: readonly BitSlice[];

  constructor(container: BitfieldContainer, slices: readonly BitSlice[]) {
    this.typeName = `bitfield_${container}`;
    this.container = new PrimitiveCodec(container);
    this.slices = slices;
  }

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue> {
    const r = this.container.decode(reader, ctx);
    if (!r.ok) return r;
    const raw = typeof r.value === 'number' ? r.value : 0;
    const result: StructValue = {};
    for (const slice of this.slices) {
      const bits = extract(raw, slice);
      if (slice.enumTable) {
        result[slice.name] = slice.enumTable.nameOf(bits);
      } else if (slice.width === 1) {
        result[slice.name] = bits === 1;
      } else {
        result[slice.name] = bits;
      }
    }
    return readOk(result);
  }

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus {
    const raw = this.pack(value, ctx);
    if (!raw.ok) return raw;
    return this.container.encode(writer, raw.value, ctx);
  }

  sizeOf(): CodecResult<number> {
    return readOk(this.container.size);
  }

  exportScope(name: string, value: FieldValue, scope: Map<string, number>): void {
    if (!isStructValue(value)) return;
    let raw = 0;
    for (const slice of this.slices) {
      const bits = this.sliceBits(slice, value[slice.name]);
      if (bits === undefined) return;
      scope.set(`${name}.${slice.name}`, bits);
      raw += bits * 2 ** slice.offset;
    }
    scope.set(name, raw);
  }

  /** Combine slice values into the container integer. */
  private pack(value: FieldValue | undefined, ctx: CodecContext): CodecResult<number> {
    if (!isStructValue(value)) {
      return fail('INVALID_VALUE', ctx.path, `Expected an object for ${this.typeName} at '${ctx.path}', got ${describeValue(value)}`);
    }
    let raw = 0;
    for (const slice of this.slices) {
      const bits = this.sliceBits(slice, value[slice.name]);
      if (bits === undefined) {
        return fail('INVALID_VALUE', `${ctx.path}.${slice.name}`, `Invalid value for bit slice '${ctx.path}.${slice.name}'`);
      }
      raw += bits * 2 ** slice.offset;
    }
    return readOk(raw);
  }

  private sliceBits(slice: BitSlice, value: FieldValue | undefined): number | undefined {
    let bits: number;
    if (value === undefined) {
      bits = 0;
    } else if (typeof value === 'boolean') {
      bits = value ? 1 : 0;
    } else if (typeof value === 'string' && slice.enumTable) {
      const raw = slice.enumTable.valueOf(value);
      if (raw === undefined) return undefined;
      bits = raw;
    } else if (typeof value === 'number') {
      bits = value;
    } else {
      return undefined;
    }
    if (!Number.isInteger(bits) || bits < 0 || bits >= 2 ** slice.width) return undefined;
    return bits;
  }
}

function extract(raw: number, slice: BitSlice): number {
  return Math.floor(raw / 2 ** slice.offset) % 2 ** slice.width;
}
