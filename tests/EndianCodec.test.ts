import { BigEndian, LittleEndian, endianCodecFor } from '../src/EndianCodec';

describe('EndianCodec', () => {
  describe('LittleEndian', () => {
    it('stores u32 least-significant byte first', () => {
      const bytes = new Uint8Array(4);
      LittleEndian.storeU32(bytes, 0, 0x12345678);
      expect(Array.from(bytes)).toEqual([0x78, 0x56, 0x34, 0x12]);
    });

    it('stores u16 and u64', () => {
      const bytes = new Uint8Array(10);
      LittleEndian.storeU16(bytes, 0, 0xbeef);
      LittleEndian.storeU64(bytes, 2, 0x0102030405060708n);
      expect(Array.from(bytes)).toEqual([0xef, 0xbe, 0x08, 0x07, 0x06, 0x05, 0x04, 0x03, 0x02, 0x01]);
    });

    it('loads what it stores at an offset', () => {
      const bytes = new Uint8Array(9);
      LittleEndian.storeU64(bytes, 1, 0xfedcba9876543210n);
      expect(LittleEndian.loadU64(bytes, 1)).toBe(0xfedcba9876543210n);
      expect(bytes[0]).toBe(0);
    });
  });

  describe('BigEndian', () => {
    it('stores u32 most-significant byte first', () => {
      const bytes = new Uint8Array(4);
      BigEndian.storeU32(bytes, 0, 0x12345678);
      expect(Array.from(bytes)).toEqual([0x12, 0x34, 0x56, 0x78]);
    });

    it('stores u16 and u64', () => {
      const bytes = new Uint8Array(10);
      BigEndian.storeU16(bytes, 0, 0xbeef);
      BigEndian.storeU64(bytes, 2, 0x0102030405060708n);
      expect(Array.from(bytes)).toEqual([0xbe, 0xef, 0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);
    });
  });

  describe('round trips', () => {
    const u16Values = [0, 1, 0x7fff, 0x8000, 0xffff];
    const u32Values = [0, 1, 0x7fffffff, 0x80000000, 0xffffffff];
    const u64Values = [0n, 1n, 0x7fffffffffffffffn, 0x8000000000000000n, 0xffffffffffffffffn];

    for (const codec of [LittleEndian, BigEndian]) {
      it(`${codec.order}: u16 values survive store/load`, () => {
        const bytes = new Uint8Array(2);
        for (const v of u16Values) {
          codec.storeU16(bytes, 0, v);
          expect(codec.loadU16(bytes, 0)).toBe(v);
        }
      });

      it(`${codec.order}: u32 values survive store/load`, () => {
        const bytes = new Uint8Array(4);
        for (const v of u32Values) {
          codec.storeU32(bytes, 0, v);
          expect(codec.loadU32(bytes, 0)).toBe(v);
        }
      });

      it(`${codec.order}: u64 values survive store/load`, () => {
        const bytes = new Uint8Array(8);
        for (const v of u64Values) {
          codec.storeU64(bytes, 0, v);
          expect(codec.loadU64(bytes, 0)).toBe(v);
        }
      });
    }
  });

  it('little and big endian layouts are byte-reversed', () => {
    const le = new Uint8Array(8);
    const be = new Uint8Array(8);
    LittleEndian.storeU64(le, 0, 0x1122334455667788n);
    BigEndian.storeU64(be, 0, 0x1122334455667788n);
    expect(Array.from(le).reverse()).toEqual(Array.from(be));
  });

  it('stores take the value modulo 2^W', () => {
    const bytes = new Uint8Array(2);
    LittleEndian.storeU16(bytes, 0, 0x12345);
    expect(LittleEndian.loadU16(bytes, 0)).toBe(0x2345);
  });

  it('endianCodecFor selects by byte order', () => {
    expect(endianCodecFor('little')).toBe(LittleEndian);
    expect(endianCodecFor('big')).toBe(BigEndian);
  });

  it('codec tables are frozen', () => {
    expect(Object.isFrozen(LittleEndian)).toBe(true);
    expect(Object.isFrozen(BigEndian)).toBe(true);
  });
});
