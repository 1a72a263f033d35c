export { SUCCESS, OUT_OF_RANGE, readOk, isOk, allOk } from './Status';
export type { Success, OutOfRange, Status, ReadSuccess, ReadResult } from './Status';
export { LittleEndian, BigEndian, endianCodecFor } from './EndianCodec';
export type { ByteOrder, EndianCodec } from './EndianCodec';
export { ByteReader } from './ByteReader';
export { ByteWriter } from './ByteWriter';
export {
  toUint8,
  toUint16,
  toUint32,
  toUint64,
  toInt8,
  toInt16,
  toInt32,
  toInt64,
  float32ToBits,
  bitsToFloat32,
  float64ToBits,
  bitsToFloat64,
} from './bits';
export { toHex, fromHex } from './hex';
export { ProtocolError } from './ProtocolError';
export type { ProtocolErrorCode, CodecFailureCode } from './ProtocolError';
export { parseExpression, evaluate, isSatisfied, references } from './expression';
export type { Expression, ExpressionScope } from './expression';
export type { FieldCodec, FieldValue, StructValue, CodecFailure, CodecResult, CodecStatus, CodecContext } from './codecs/FieldCodec';
export { PrimitiveCodec, PRIMITIVES } from './codecs/PrimitiveCodec';
export type { PrimitiveName } from './codecs/PrimitiveCodec';
export { EnumCodec, EnumTable } from './codecs/EnumCodec';
export { BitfieldCodec } from './codecs/BitfieldCodec';
export type { BitSlice, BitfieldContainer } from './codecs/BitfieldCodec';
export { BytesCodec } from './codecs/BytesCodec';
export { StringCodec } from './codecs/StringCodec';
export { ArrayCodec } from './codecs/ArrayCodec';
export { ExpectedValueCodec } from './codecs/ExpectedValueCodec';
export { StructCodec } from './codecs/StructCodec';
export type { StructMember, StructField, StructPadding } from './codecs/StructCodec';
export { LazyCodec } from './codecs/LazyCodec';
export type { LengthSpec } from './codecs/length';
export * from './protocol';
