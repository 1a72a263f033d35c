/**
 * Validate a caller-supplied byte count. Violations are programming errors,
 * not data conditions, so they throw instead of returning `OUT_OF_RANGE`.
 */
export function assertLength(length: number, limit?: number): void {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new RangeError(`length must be a non-negative integer, got ${length}`);
  }
  if (limit !== undefined && length > limit) {
    throw new RangeError(`length ${length} exceeds the ${limit}-byte span`);
  }
}
