import { ByteReader } from '../src/ByteReader';
import { BigEndian, LittleEndian } from '../src/EndianCodec';

function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}

describe('ByteReader', () => {
  it('defaults to little endian', () => {
    expect(new ByteReader(bytes()).codec).toBe(LittleEndian);
    expect(ByteReader.bigEndian(bytes()).codec).toBe(BigEndian);
  });

  describe('unsigned reads', () => {
    it('reads u8, u16, u32 and u64 in sequence (little endian)', () => {
      const reader = ByteReader.littleEndian(
        bytes(0xab, 0x34, 0x12, 0x78, 0x56, 0x34, 0x12, 0x08, 0x07, 0x06, 0x05, 0x04, 0x03, 0x02, 0x01),
      );
      expect(reader.readU8()).toEqual({ ok: true, value: 0xab });
      expect(reader.readU16()).toEqual({ ok: true, value: 0x1234 });
      expect(reader.readU32()).toEqual({ ok: true, value: 0x12345678 });
      expect(reader.readU64()).toEqual({ ok: true, value: 0x0102030405060708n });
      expect(reader.remaining).toBe(0);
      expect(reader.position).toBe(15);
    });

    it('reads u32 big endian', () => {
      const reader = ByteReader.bigEndian(bytes(0x12, 0x34, 0x56, 0x78));
      expect(reader.readU32()).toEqual({ ok: true, value: 0x12345678 });
    });

    it('reads all-ones as the unsigned maximum', () => {
      const reader = new ByteReader(new Uint8Array(8).fill(0xff));
      expect(reader.readU64()).toEqual({ ok: true, value: 0xffffffffffffffffn });
    });
  });

  describe('signed reads', () => {
    it('reads the minimum of each width', () => {
      const reader = ByteReader.littleEndian(
        bytes(0x80, 0x00, 0x80, 0x00, 0x00, 0x00, 0x80, 0, 0, 0, 0, 0, 0, 0, 0x80),
      );
      expect(reader.readI8()).toEqual({ ok: true, value: -128 });
      expect(reader.readI16()).toEqual({ ok: true, value: -32768 });
      expect(reader.readI32()).toEqual({ ok: true, value: -2147483648 });
      expect(reader.readI64()).toEqual({ ok: true, value: -0x8000000000000000n });
    });

    it('reads -1 from all-ones', () => {
      const reader = ByteReader.bigEndian(new Uint8Array(15).fill(0xff));
      expect(reader.readI8()).toEqual({ ok: true, value: -1 });
      expect(reader.readI16()).toEqual({ ok: true, value: -1 });
      expect(reader.readI32()).toEqual({ ok: true, value: -1 });
      expect(reader.readI64()).toEqual({ ok: true, value: -1n });
    });
  });

  describe('float reads', () => {
    it('reads f32 1.0 big endian', () => {
      const reader = ByteReader.bigEndian(bytes(0x3f, 0x80, 0x00, 0x00));
      expect(reader.readF32()).toEqual({ ok: true, value: 1 });
    });

    it('reads f64 -2.5 little endian', () => {
      const reader = ByteReader.littleEndian(bytes(0, 0, 0, 0, 0, 0, 0x04, 0xc0));
      expect(reader.readF64()).toEqual({ ok: true, value: -2.5 });
    });

    it('passes NaN and -0 through', () => {
      const reader = ByteReader.bigEndian(bytes(0x7f, 0xc0, 0x00, 0x00, 0x80, 0x00, 0x00, 0x00));
      const nan = reader.readF32();
      const negZero = reader.readF32();
      expect(nan.ok && Number.isNaN(nan.value)).toBe(true);
      expect(negZero.ok && Object.is(negZero.value, -0)).toBe(true);
    });
  });

  describe('out of range', () => {
    it('fails read_u16 on a 1-byte buffer without moving the cursor', () => {
      const reader = new ByteReader(bytes(0x34));
      expect(reader.readU16()).toEqual({ ok: false, code: 'OUT_OF_RANGE' });
      expect(reader.remaining).toBe(1);
      expect(reader.position).toBe(0);
    });

    it('recovers the bytes with smaller reads after a failed read_u32', () => {
      const reader = new ByteReader(bytes(0x01, 0x02, 0x03));
      expect(reader.readU32().ok).toBe(false);
      expect(reader.readU8()).toEqual({ ok: true, value: 0x01 });
      expect(reader.readU8()).toEqual({ ok: true, value: 0x02 });
      expect(reader.readU8()).toEqual({ ok: true, value: 0x03 });
      expect(reader.remaining).toBe(0);
    });

    it('fails every width on an empty buffer', () => {
      const reader = new ByteReader(bytes());
      for (const r of [
        reader.readU8(), reader.readI8(), reader.readU16(), reader.readI16(),
        reader.readU32(), reader.readI32(), reader.readF32(),
        reader.readU64(), reader.readI64(), reader.readF64(),
      ]) {
        expect(r.ok).toBe(false);
      }
      expect(reader.position).toBe(0);
    });

    it('fails 64-bit reads with 7 bytes left', () => {
      const reader = new ByteReader(new Uint8Array(7));
      expect(reader.readU64().ok).toBe(false);
      expect(reader.readF64().ok).toBe(false);
      expect(reader.remaining).toBe(7);
    });
  });

  describe('readBytes', () => {
    it('copies into the output buffer and advances', () => {
      const reader = new ByteReader(bytes(1, 2, 3, 4, 5));
      const out = new Uint8Array(3);
      expect(reader.readBytes(out).ok).toBe(true);
      expect(Array.from(out)).toEqual([1, 2, 3]);
      expect(reader.position).toBe(3);
    });

    it('copies a prefix of the output buffer when length is given', () => {
      const reader = new ByteReader(bytes(9, 8, 7));
      const out = new Uint8Array(4).fill(0xee);
      expect(reader.readBytes(out, 2).ok).toBe(true);
      expect(Array.from(out)).toEqual([9, 8, 0xee, 0xee]);
    });

    it('leaves the output untouched on failure', () => {
      const reader = new ByteReader(bytes(1, 2));
      const out = new Uint8Array(3).fill(0xaa);
      expect(reader.readBytes(out).ok).toBe(false);
      expect(Array.from(out)).toEqual([0xaa, 0xaa, 0xaa]);
      expect(reader.position).toBe(0);
    });

    it('succeeds for zero length on an exhausted reader', () => {
      const reader = new ByteReader(bytes());
      expect(reader.readBytes(new Uint8Array(0)).ok).toBe(true);
      expect(reader.readBytes(new Uint8Array(4), 0).ok).toBe(true);
    });

    it('does not alias the source buffer', () => {
      const data = bytes(1, 2);
      const out = new Uint8Array(2);
      new ByteReader(data).readBytes(out);
      data[0] = 99;
      expect(out[0]).toBe(1);
    });

    it('throws RangeError for lengths the output cannot hold', () => {
      const reader = new ByteReader(bytes(1, 2, 3, 4));
      expect(() => reader.readBytes(new Uint8Array(2), 3)).toThrow(RangeError);
      expect(() => reader.readBytes(new Uint8Array(2), -1)).toThrow(RangeError);
      expect(() => reader.readBytes(new Uint8Array(2), 1.5)).toThrow(RangeError);
      expect(reader.position).toBe(0);
    });
  });

  describe('skip', () => {
    it('advances without reading', () => {
      const reader = new ByteReader(bytes(1, 2, 3));
      expect(reader.skip(2).ok).toBe(true);
      expect(reader.readU8()).toEqual({ ok: true, value: 3 });
    });

    it('fails past the end without moving', () => {
      const reader = new ByteReader(bytes(1, 2, 3));
      expect(reader.skip(4).ok).toBe(false);
      expect(reader.position).toBe(0);
    });

    it('skips zero bytes on an exhausted reader', () => {
      expect(new ByteReader(bytes()).skip(0).ok).toBe(true);
    });
  });

  it('works over a subarray view', () => {
    const backing = bytes(0xff, 0x01, 0x00, 0xff);
    const reader = new ByteReader(backing.subarray(1, 3));
    expect(reader.length).toBe(2);
    expect(reader.readU16()).toEqual({ ok: true, value: 1 });
  });
});
