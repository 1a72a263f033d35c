export type ByteOrder = 'little' | 'big';

/**
 * Stateless load/store table for one byte order.
 *
 * Offsets are not bounds-checked: the reader and writer only call these
 * after verifying that `width` bytes are available at `offset`.
 * 16/32-bit values are numbers in [0, 2^W); 64-bit values are bigints.
 * Stores take the value modulo 2^W.
 */
export interface EndianCodec {
  readonly order: ByteOrder;
  loadU16(bytes: Uint8Array, offset: number): number;
  loadU32(bytes: Uint8Array, offset: number): number;
  loadU64(bytes: Uint8Array, offset: number): bigint;
  storeU16(bytes: Uint8Array, offset: number, value: number): void;
  storeU32(bytes: Uint8Array, offset: number, value: number): void;
  storeU64(bytes: Uint8Array, offset: number, value: bigint): void;
}

const LOW_32 = 0xffffffffn;

/** Least-significant byte first. */
export const LittleEndian: EndianCodec = Object.freeze<EndianCodec>({
  order: 'little',

  loadU16(bytes: Uint8Array, offset: number): number {
    return bytes[offset] | (bytes[offset + 1] << 8);
  },

  loadU32(bytes: Uint8Array, offset: number): number {
    return (
      (bytes[offset] |
        (bytes[offset + 1] << 8) |
        (bytes[offset + 2] << 16) |
        (bytes[offset + 3] << 24)) >>> 0
    );
  },

  loadU64(bytes: Uint8Array, offset: number): bigint {
    const lo = LittleEndian.loadU32(bytes, offset);
    const hi = LittleEndian.loadU32(bytes, offset + 4);
    return (BigInt(hi) << 32n) | BigInt(lo);
  },

  storeU16(bytes: Uint8Array, offset: number, value: number): void {
    bytes[offset] = value & 0xff;
    bytes[offset + 1] = (value >>> 8) & 0xff;
  },

  storeU32(bytes: Uint8Array, offset: number, value: number): void {
    bytes[offset] = value & 0xff;
    bytes[offset + 1] = (value >>> 8) & 0xff;
    bytes[offset + 2] = (value >>> 16) & 0xff;
    bytes[offset + 3] = (value >>> 24) & 0xff;
  },

  storeU64(bytes: Uint8Array, offset: number, value: bigint): void {
    LittleEndian.storeU32(bytes, offset, Number(value & LOW_32));
    LittleEndian.storeU32(bytes, offset + 4, Number((value >> 32n) & LOW_32));
  },
});

/** Most-significant byte first (network order). */
export const BigEndian: EndianCodec = Object.freeze<EndianCodec>({
  order: 'big',

  loadU16(bytes: Uint8Array, offset: number): number {
    return (bytes[offset] << 8) | bytes[offset + 1];
  },

  loadU32(bytes: Uint8Array, offset: number): number {
    return (
      ((bytes[offset] << 24) |
        (bytes[offset + 1] << 16) |
        (bytes[offset + 2] << 8) |
        bytes[offset + 3]) >>> 0
    );
  },

  loadU64(bytes: Uint8Array, offset: number): bigint {
    const hi = BigEndian.loadU32(bytes, offset);
    const lo = BigEndian.loadU32(bytes, offset + 4);
    return (BigInt(hi) << 32n) | BigInt(lo);
  },

  storeU16(bytes: Uint8Array, offset: number, value: number): void {
    bytes[offset] = (value >>> 8) & 0xff;
    bytes[offset + 1] = value & 0xff;
  },

  storeU32(bytes: Uint8Array, offset: number, value: number): void {
    bytes[offset] = (value >>> 24) & 0xff;
    bytes[offset + 1] = (value >>> 16) & 0xff;
    bytes[offset + 2] = (value >>> 8) & 0xff;
    bytes[offset + 3] = value & 0xff;
  },

  storeU64(bytes: Uint8Array, offset: number, value: bigint): void {
    BigEndian.storeU32(bytes, offset, Number((value >> 32n) & LOW_32));
    BigEndian.storeU32(bytes, offset + 4, Number(value & LOW_32));
  },
});

export function endianCodecFor(order: ByteOrder): EndianCodec {
  return order === 'big' ? BigEndian : LittleEndian;
}
