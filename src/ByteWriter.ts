import { BigEndian, EndianCodec, LittleEndian } from './EndianCodec';
import { OUT_OF_RANGE, Status, SUCCESS } from './Status';
import { float32ToBits, float64ToBits, toUint16, toUint32, toUint64, toUint8 } from './bits';
import { assertLength } from './assertLength';

/**
 * Sequential, bounds-checked encoder into a caller-owned, fixed-size byte view.
 *
 * A failing write leaves the cursor and every byte at or beyond it untouched.
 * Integer arguments are taken modulo 2^W, as `DataView` setters do.
 */
export class ByteWriter {
  private readonly _data: Uint8Array;
  private readonly _codec: EndianCodec;
  private _offset: number;

  constructor(data: Uint8Array, codec: EndianCodec = LittleEndian) {
    this._data = data;
    this._codec = codec;
    this._offset = 0;
  }

  static littleEndian(data: Uint8Array): ByteWriter {
    return new ByteWriter(data, LittleEndian);
  }

  static bigEndian(data: Uint8Array): ByteWriter {
    return new ByteWriter(data, BigEndian);
  }

  get codec(): EndianCodec {
    return this._codec;
  }

  get length(): number {
    return this._data.length;
  }

  /** Bytes already written or skipped. */
  get position(): number {
    return this._offset;
  }

  /** Capacity left. */
  get remaining(): number {
    return this._data.length - this._offset;
  }

  writeU8(value: number): Status {
    if (this.remaining < 1) return OUT_OF_RANGE;
    this._data[this._offset] = toUint8(value);
    this._offset += 1;
    return SUCCESS;
  }

  writeU16(value: number): Status {
    if (this.remaining < 2) return OUT_OF_RANGE;
    this._codec.storeU16(this._data, this._offset, toUint16(value));
    this._offset += 2;
    return SUCCESS;
  }

  writeU32(value: number): Status {
    if (this.remaining < 4) return OUT_OF_RANGE;
    this._codec.storeU32(this._data, this._offset, toUint32(value));
    this._offset += 4;
    return SUCCESS;
  }

  writeU64(value: bigint): Status {
    if (this.remaining < 8) return OUT_OF_RANGE;
    this._codec.storeU64(this._data, this._offset, toUint64(value));
    this._offset += 8;
    return SUCCESS;
  }

  writeI8(value: number): Status {
    return this.writeU8(toUint8(value));
  }

  writeI16(value: number): Status {
    return this.writeU16(toUint16(value));
  }

  writeI32(value: number): Status {
    return this.writeU32(toUint32(value));
  }

  writeI64(value: bigint): Status {
    return this.writeU64(toUint64(value));
  }

  writeF32(value: number): Status {
    return this.writeU32(float32ToBits(value));
  }

  writeF64(value: number): Status {
    return this.writeU64(float64ToBits(value));
  }

  /**
   * Copy `src[0..length)` to the cursor. Nothing is copied on failure.
   * @throws RangeError if `length` is not a non-negative integer or exceeds `src.length`
   */
  writeBytes(src: Uint8Array, length: number = src.length): Status {
    assertLength(length, src.length);
    if (length === 0) return SUCCESS;
    if (length > this.remaining) return OUT_OF_RANGE;
    this._data.set(src.subarray(0, length), this._offset);
    this._offset += length;
    return SUCCESS;
  }

  /** Advance over `length` bytes, leaving their contents as they are. */
  skip(length: number): Status {
    assertLength(length);
    if (length > this.remaining) return OUT_OF_RANGE;
    this._offset += length;
    return SUCCESS;
  }
}
