import { ByteReader } from '../ByteReader';
import { ByteWriter } from '../ByteWriter';
import { ByteOrder, EndianCodec, endianCodecFor } from '../EndianCodec';
import { ProtocolError } from '../ProtocolError';
import type { CodecFailure, CodecResult, CodecStatus, StructValue } from '../codecs/FieldCodec';
import type { StructCodec } from '../codecs/StructCodec';
import { fromHex, toHex } from '../hex';
import { ProtocolBuilder } from './ProtocolBuilder';
import { parseProtocol } from './ProtocolLoader';
import type { ProtocolDocument } from './definition';

const EMPTY_SCOPE: ReadonlyMap<string, number> = new Map();

function raise(failure: CodecFailure): never {
  throw new ProtocolError(failure.code, failure.message, failure.path);
}

/**
 * High-level codec for every struct of one protocol document.
 *
 * `decodeFrom` / `encodeTo` return failures and can be chained on a shared
 * reader or writer; the other methods throw `ProtocolError`.
 */
export class ProtocolCodec {
  readonly name: string;
  readonly description?: string;
  readonly byteOrder: ByteOrder;
  private readonly _endian: EndianCodec;
  private readonly _structs: Map<string, StructCodec>;

  constructor(document: ProtocolDocument) {
    this.name = document.protocol.name;
    this.description = document.protocol.description;
    this.byteOrder = document.protocol.byte_order === 'big_endian' ? 'big' : 'little';
    this._endian = endianCodecFor(this.byteOrder);
    this._structs = ProtocolBuilder.build(document);
  }

  /** Parse, validate and build a protocol from JSON text. */
  static fromJSON(text: string, source?: string): ProtocolCodec {
    return new ProtocolCodec(parseProtocol(text, source));
  }

  get structNames(): string[] {
    return [...this._structs.keys()];
  }

  /** @throws ProtocolError `UNKNOWN_STRUCT` */
  struct(name: string): StructCodec {
    const codec = this._structs.get(name);
    if (!codec) {
      throw new ProtocolError('UNKNOWN_STRUCT', `Unknown struct '${name}' in protocol ${this.name}`);
    }
    return codec;
  }

  /** A reader over `data` in this protocol's byte order. */
  reader(data: Uint8Array): ByteReader {
    return new ByteReader(data, this._endian);
  }

  writer(buffer: Uint8Array): ByteWriter {
    return new ByteWriter(buffer, this._endian);
  }

  decodeFrom(name: string, reader: ByteReader): CodecResult<StructValue> {
    return this.struct(name).decode(reader, { path: '', scope: EMPTY_SCOPE });
  }

  encodeTo(name: string, writer: ByteWriter, value: StructValue): CodecStatus {
    return this.struct(name).encode(writer, value, { path: '', scope: EMPTY_SCOPE });
  }

  sizeOf(name: string, value: StructValue): number {
    const r = this.struct(name).sizeOf(value, { path: '', scope: EMPTY_SCOPE });
    if (!r.ok) raise(r);
    return r.value;
  }

  /** Decode one struct from the start of `data`. Trailing bytes are ignored. */
  decode(name: string, data: Uint8Array): StructValue {
    const r = this.decodeFrom(name, this.reader(data));
    if (!r.ok) raise(r);
    return r.value;
  }

  decodeFromHex(name: string, hex: string): StructValue {
    return this.decode(name, fromHex(hex));
  }

  /**
   * Decode consecutive structs until the data runs out or one fails to
   * decode. A record that fails part-way is not included.
   */
  decodeAll(name: string, data: Uint8Array): StructValue[] {
    const reader = this.reader(data);
    const records: StructValue[] = [];
    while (reader.remaining > 0) {
      const start = reader.position;
      const r = this.decodeFrom(name, reader);
      if (!r.ok) break;
      // A record that consumed nothing would repeat forever
      if (reader.position === start) break;
      records.push(r.value);
    }
    return records;
  }

  /** Encode into a new buffer of exactly `sizeOf(name, value)` bytes. */
  encode(name: string, value: StructValue): Uint8Array {
    const buffer = new Uint8Array(this.sizeOf(name, value));
    this.encodeInto(name, value, buffer);
    return buffer;
  }

  /**
   * Encode into a caller-owned buffer.
   * @returns bytes written
   */
  encodeInto(name: string, value: StructValue, buffer: Uint8Array): number {
    const writer = this.writer(buffer);
    const status = this.encodeTo(name, writer, value);
    if (!status.ok) raise(status);
    return writer.position;
  }

  encodeToHex(name: string, value: StructValue): string {
    return toHex(this.encode(name, value));
  }
}
