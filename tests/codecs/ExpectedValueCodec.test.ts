import { ByteReader } from '../../src/ByteReader';
import { ByteWriter } from '../../src/ByteWriter';
import { ExpectedValueCodec, sameValue } from '../../src/codecs/ExpectedValueCodec';
import { PrimitiveCodec } from '../../src/codecs/PrimitiveCodec';

const ctx = { path: 'magic', scope: new Map<string, number>() };

describe('ExpectedValueCodec', () => {
  const magic = new ExpectedValueCodec(new PrimitiveCodec('u32'), 0x04034b50);

  it('accepts the expected value', () => {
    const reader = ByteReader.littleEndian(new Uint8Array([0x50, 0x4b, 0x03, 0x04]));
    expect(magic.decode(reader, ctx)).toEqual({ ok: true, value: 0x04034b50 });
  });

  it('rejects any other value', () => {
    const reader = ByteReader.littleEndian(new Uint8Array([0x50, 0x4b, 0x01, 0x02]));
    expect(magic.decode(reader, ctx)).toEqual({
      ok: false,
      code: 'EXPECTED_MISMATCH',
      path: 'magic',
      message: "Expected 0x4034b50 at 'magic', got 0x2014b50",
    });
  });

  it('writes the expected value when none is given', () => {
    const buf = new Uint8Array(4);
    expect(magic.encode(ByteWriter.bigEndian(buf), undefined, ctx).ok).toBe(true);
    expect(Array.from(buf)).toEqual([0x04, 0x03, 0x4b, 0x50]);
    expect(magic.defaultValue).toBe(0x04034b50);
  });

  it('refuses to encode a different value', () => {
    expect(magic.encode(new ByteWriter(new Uint8Array(4)), 1, ctx)).toMatchObject({
      code: 'EXPECTED_MISMATCH',
      message: "Field 'magic' must be 0x4034b50, got 0x1",
    });
  });

  it('passes short input through as OUT_OF_RANGE', () => {
    expect(magic.decode(new ByteReader(new Uint8Array(2)), ctx)).toMatchObject({ code: 'OUT_OF_RANGE' });
  });
});

describe('sameValue', () => {
  it('compares bigint and number by value', () => {
    expect(sameValue(5n, 5)).toBe(true);
    expect(sameValue(5, 5n)).toBe(true);
    expect(sameValue(5n, 6)).toBe(false);
    expect(sameValue('a', 'a')).toBe(true);
  });
});
