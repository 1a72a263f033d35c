/**
 * Bit-pattern reinterpretation between unsigned, signed and IEEE-754 views
 * of the same width. Floats go through one shared scratch buffer.
 */

const scratch = new ArrayBuffer(8);
const f32View = new Float32Array(scratch, 0, 1);
const u32View = new Uint32Array(scratch, 0, 1);
const f64View = new Float64Array(scratch, 0, 1);
const u64View = new BigUint64Array(scratch, 0, 1);

export function toUint8(value: number): number {
  return value & 0xff;
}

export function toUint16(value: number): number {
  return value & 0xffff;
}

export function toUint32(value: number): number {
  return value >>> 0;
}

export function toUint64(value: bigint): bigint {
  return BigInt.asUintN(64, value);
}

export function toInt8(bits: number): number {
  return (bits << 24) >> 24;
}

export function toInt16(bits: number): number {
  return (bits << 16) >> 16;
}

export function toInt32(bits: number): number {
  return bits | 0;
}

export function toInt64(bits: bigint): bigint {
  return BigInt.asIntN(64, bits);
}

/** binary32 bit pattern of `value` (rounded to single precision first). */
export function float32ToBits(value: number): number {
  f32View[0] = value;
  return u32View[0];
}

export function bitsToFloat32(bits: number): number {
  u32View[0] = bits;
  return f32View[0];
}

export function float64ToBits(value: number): bigint {
  f64View[0] = value;
  return u64View[0];
}

export function bitsToFloat64(bits: bigint): number {
  u64View[0] = bits;
  return f64View[0];
}
