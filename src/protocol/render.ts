import type { FieldValue } from '../codecs/FieldCodec';
import { toHex } from '../hex';

export type JSONValue = null | boolean | number | string | JSONValue[] | { [key: string]: JSONValue };

/**
 * Convert a decoded value to plain JSON: bigints become decimal strings,
 * byte arrays become hex strings, and non-finite floats become strings.
 */
export function toJSONValue(value: FieldValue): JSONValue {
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (value instanceof Uint8Array) return toHex(value);
  if (Array.isArray(value)) return value.map(toJSONValue);
  const out: { [key: string]: JSONValue } = {};
  for (const [key, item] of Object.entries(value)) out[key] = toJSONValue(item);
  return out;
}
