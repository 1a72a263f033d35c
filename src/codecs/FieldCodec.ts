import type { ByteReader } from '../ByteReader';
import type { ByteWriter } from '../ByteWriter';
import type { CodecFailureCode } from '../ProtocolError';
import type { ReadSuccess, Success } from '../Status';
import type { ExpressionScope } from '../expression';

/**
 * A decoded protocol value:
 * - integer and float fields: number (64-bit integers: bigint)
 * - enums: the value name; strings: string
 * - bytes: Uint8Array; arrays: FieldValue[]
 * - structs and bitfields: StructValue
 */
export type FieldValue =
  | number
  | bigint
  | boolean
  | string
  | Uint8Array
  | FieldValue[]
  | StructValue;

/** Field name to value. Fields whose condition did not hold are absent. */
export interface StructValue {
  [field: string]: FieldValue;
}

export interface CodecFailure {
  readonly ok: false;
  readonly code: CodecFailureCode;
  /** Dotted path of the failing field (`header.name`, `items[3].id`). */
  readonly path: string;
  readonly message: string;
}

export type CodecStatus = Success | CodecFailure;

export type CodecResult<T> = ReadSuccess<T> | CodecFailure;

export interface CodecContext {
  /** Path of the value being processed, for error reporting. */
  readonly path: string;
  /** Numeric values of earlier fields in the enclosing struct. */
  readonly scope: ExpressionScope;
}

/**
 * Decodes and encodes one field type on top of ByteReader / ByteWriter.
 * Failures are returned, never thrown; decoding stops at the first one.
 */
export interface FieldCodec {
  /** Type name as written in the protocol (`u32`, `Header`, `bytes`). */
  readonly typeName: string;

  /** Value encoded when the caller leaves the field out. */
  readonly defaultValue?: FieldValue;

  decode(reader: ByteReader, ctx: CodecContext): CodecResult<FieldValue>;

  encode(writer: ByteWriter, value: FieldValue | undefined, ctx: CodecContext): CodecStatus;

  /** Encoded size of `value` in bytes. */
  sizeOf(value: FieldValue | undefined, ctx: CodecContext): CodecResult<number>;

  /**
   * Publish the numeric view of a decoded or encoded value so later
   * length and condition expressions can refer to it by `name`.
   */
  exportScope?(name: string, value: FieldValue, scope: Map<string, number>): void;
}

export function fail(code: CodecFailureCode, path: string, message: string): CodecFailure {
  return { ok: false, code, path, message };
}

/** Lift a core OUT_OF_RANGE into a codec failure for `ctx.path`. */
export function outOfRange(ctx: CodecContext, action: 'decode' | 'encode', typeName: string): CodecFailure {
  const what = action === 'decode' ? 'Not enough data to decode' : 'Not enough room to encode';
  return fail('OUT_OF_RANGE', ctx.path, `${what} ${typeName} at '${ctx.path}'`);
}

export function isStructValue(value: FieldValue | undefined): value is StructValue {
  return (
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

/** Describe a value's runtime type for error messages. */
export function describeValue(value: FieldValue | undefined): string {
  if (value === undefined) return 'undefined';
  if (value instanceof Uint8Array) return 'Uint8Array';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
