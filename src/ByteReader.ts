import { BigEndian, EndianCodec, LittleEndian } from './EndianCodec';
import { OUT_OF_RANGE, ReadResult, Status, SUCCESS, readOk } from './Status';
import { bitsToFloat32, bitsToFloat64, toInt16, toInt32, toInt64, toInt8 } from './bits';
import { assertLength } from './assertLength';

/**
 * Sequential, bounds-checked decoder over a caller-owned byte view.
 *
 * Every read is all-or-nothing: on `OUT_OF_RANGE` the cursor stays where it
 * was, so a caller may fall back to smaller reads. The view is wrapped,
 * never copied or written.
 */
export class ByteReader {
  private readonly _data: Uint8Array;
  private readonly _codec: EndianCodec;
  private _offset: number;

  constructor(data: Uint8Array, codec: EndianCodec = LittleEndian) {
    this._data = data;
    this._codec = codec;
    this._offset = 0;
  }

  static littleEndian(data: Uint8Array): ByteReader {
    return new ByteReader(data, LittleEndian);
  }

  static bigEndian(data: Uint8Array): ByteReader {
    return new ByteReader(data, BigEndian);
  }

  get codec(): EndianCodec {
    return this._codec;
  }

  /** Total size of the underlying view in bytes. */
  get length(): number {
    return this._data.length;
  }

  /** Bytes already consumed. */
  get position(): number {
    return this._offset;
  }

  /** Bytes not yet consumed. */
  get remaining(): number {
    return this._data.length - this._offset;
  }

  readU8(): ReadResult<number> {
    if (this.remaining < 1) return OUT_OF_RANGE;
    const value = this._data[this._offset];
    this._offset += 1;
    return readOk(value);
  }

  readU16(): ReadResult<number> {
    if (this.remaining < 2) return OUT_OF_RANGE;
    const value = this._codec.loadU16(this._data, this._offset);
    this._offset += 2;
    return readOk(value);
  }

  readU32(): ReadResult<number> {
    if (this.remaining < 4) return OUT_OF_RANGE;
    const value = this._codec.loadU32(this._data, this._offset);
    this._offset += 4;
    return readOk(value);
  }

  readU64(): ReadResult<bigint> {
    if (this.remaining < 8) return OUT_OF_RANGE;
    const value = this._codec.loadU64(this._data, this._offset);
    this._offset += 8;
    return readOk(value);
  }

  readI8(): ReadResult<number> {
    const r = this.readU8();
    return r.ok ? readOk(toInt8(r.value)) : r;
  }

  readI16(): ReadResult<number> {
    const r = this.readU16();
    return r.ok ? readOk(toInt16(r.value)) : r;
  }

  readI32(): ReadResult<number> {
    const r = this.readU32();
    return r.ok ? readOk(toInt32(r.value)) : r;
  }

  readI64(): ReadResult<bigint> {
    const r = this.readU64();
    return r.ok ? readOk(toInt64(r.value)) : r;
  }

  /** NaN, infinities, subnormals and -0 pass through unvalidated. */
  readF32(): ReadResult<number> {
    const r = this.readU32();
    return r.ok ? readOk(bitsToFloat32(r.value)) : r;
  }

  readF64(): ReadResult<number> {
    const r = this.readU64();
    return r.ok ? readOk(bitsToFloat64(r.value)) : r;
  }

  /**
   * Copy `length` bytes into `out[0..length)`. Nothing is copied on failure.
   * @throws RangeError if `length` is not a non-negative integer or exceeds `out.length`
   */
  readBytes(out: Uint8Array, length: number = out.length): Status {
    assertLength(length, out.length);
    if (length === 0) return SUCCESS;
    if (length > this.remaining) return OUT_OF_RANGE;
    out.set(this._data.subarray(this._offset, this._offset + length));
    this._offset += length;
    return SUCCESS;
  }

  /** Advance without producing output. */
  skip(length: number): Status {
    assertLength(length);
    if (length > this.remaining) return OUT_OF_RANGE;
    this._offset += length;
    return SUCCESS;
  }
}
