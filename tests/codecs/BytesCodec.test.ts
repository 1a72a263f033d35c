import { ByteReader } from '../../src/ByteReader';
import { ByteWriter } from '../../src/ByteWriter';
import { BytesCodec } from '../../src/codecs/BytesCodec';
import { parseExpression } from '../../src/expression';

function ctx(scope: Record<string, number> = {}) {
  return { path: 'payload', scope: new Map(Object.entries(scope)) };
}

describe('BytesCodec', () => {
  it('reads a fixed number of bytes', () => {
    const reader = new ByteReader(new Uint8Array([1, 2, 3, 4]));
    const r = new BytesCodec(3).decode(reader, ctx());
    expect(r).toEqual({ ok: true, value: new Uint8Array([1, 2, 3]) });
    expect(reader.remaining).toBe(1);
  });

  it('takes its length from an expression over earlier fields', () => {
    const codec = new BytesCodec(parseExpression('len - 1'));
    const reader = new ByteReader(new Uint8Array([9, 8, 7]));
    expect(codec.decode(reader, ctx({ len: 3 }))).toEqual({ ok: true, value: new Uint8Array([9, 8]) });
    expect(codec.sizeOf(undefined, ctx({ len: 3 }))).toEqual({ ok: true, value: 2 });
  });

  it('reads zero bytes from an exhausted reader', () => {
    const codec = new BytesCodec(parseExpression('len'));
    expect(codec.decode(new ByteReader(new Uint8Array(0)), ctx({ len: 0 }))).toEqual({
      ok: true,
      value: new Uint8Array(0),
    });
  });

  it('fails with OUT_OF_RANGE when the input is short', () => {
    const reader = new ByteReader(new Uint8Array(2));
    expect(new BytesCodec(4).decode(reader, ctx())).toMatchObject({ code: 'OUT_OF_RANGE', path: 'payload' });
    expect(reader.position).toBe(0);
  });

  it('fails with INVALID_LENGTH for negative or unknown lengths', () => {
    const codec = new BytesCodec(parseExpression('len - 5'));
    expect(codec.decode(new ByteReader(new Uint8Array(8)), ctx({ len: 2 }))).toEqual({
      ok: false,
      code: 'INVALID_LENGTH',
      path: 'payload',
      message: "Length of 'payload' evaluated to -3",
    });
    expect(codec.decode(new ByteReader(new Uint8Array(8)), ctx())).toMatchObject({ code: 'INVALID_LENGTH' });
  });

  it('encodes exactly the declared length', () => {
    const buf = new Uint8Array(3);
    const codec = new BytesCodec(3);
    expect(codec.encode(new ByteWriter(buf), new Uint8Array([5, 6, 7]), ctx()).ok).toBe(true);
    expect(Array.from(buf)).toEqual([5, 6, 7]);
    expect(codec.encode(new ByteWriter(buf), new Uint8Array([1]), ctx())).toEqual({
      ok: false,
      code: 'INVALID_LENGTH',
      path: 'payload',
      message: "Expected 3 bytes at 'payload', got 1",
    });
    expect(codec.encode(new ByteWriter(buf), 'abc', ctx())).toMatchObject({ code: 'INVALID_VALUE' });
  });
});
