/** Outcome of a successful operation. */
export interface Success {
  readonly ok: true;
}

/**
 * The only failure the reader and writer report: not enough bytes left
 * (data for reads, capacity for writes).
 */
export interface OutOfRange {
  readonly ok: false;
  readonly code: 'OUT_OF_RANGE';
}

export type Status = Success | OutOfRange;

/** A successful read carries the decoded value. */
export interface ReadSuccess<T> {
  readonly ok: true;
  readonly value: T;
}

export type ReadResult<T> = ReadSuccess<T> | OutOfRange;

export const SUCCESS: Success = { ok: true };

export const OUT_OF_RANGE: OutOfRange = { ok: false, code: 'OUT_OF_RANGE' };

/** Wrap a decoded value in a successful read result. */
export function readOk<T>(value: T): ReadSuccess<T> {
  return { ok: true, value };
}

export function isOk(status: Status): status is Success {
  return status.ok;
}

/**
 * True when every status succeeded. Statuses are evaluated eagerly by the
 * caller; use `&&` chains on `.ok` when later operations must not run.
 */
export function allOk(...statuses: readonly Status[]): boolean {
  return statuses.every(s => s.ok);
}
