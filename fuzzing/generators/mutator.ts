/**
 * Mutation strategies for binary fuzzing.
 *
 * Takes a valid encoded record and applies random mutations to produce
 * inputs that exercise decoder error handling and edge cases.
 */

import { Rng } from './rng';

/** A mutation function that transforms an input buffer. */
export type Mutator = (input: Uint8Array, rng: Rng) => Uint8Array;

function splice(input: Uint8Array, pos: number, remove: number, insert: Uint8Array = new Uint8Array(0)): Uint8Array {
  const out = new Uint8Array(input.length - remove + insert.length);
  out.set(input.subarray(0, pos));
  out.set(insert, pos);
  out.set(input.subarray(pos + remove), pos + insert.length);
  return out;
}

// -- Byte-level mutations --

/** Flip a random bit in a random byte. */
export function bitFlip(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] ^= 1 << rng.int(0, 7);
  return out;
}

/** Insert a random byte at a random position. */
export function byteInsert(input: Uint8Array, rng: Rng): Uint8Array {
  return splice(input, rng.int(0, input.length), 0, rng.bytes(1));
}

/** Delete a random byte. */
export function byteDelete(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  return splice(input, rng.int(0, input.length - 1), 1);
}

/** Replace a random byte with another. */
export function byteReplace(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  out[rng.int(0, out.length - 1)] = rng.int(0, 255);
  return out;
}

/** Insert a block of repeated bytes. */
export function blockInsert(input: Uint8Array, rng: Rng): Uint8Array {
  const block = new Uint8Array(rng.int(1, 20)).fill(rng.int(0, 255));
  return splice(input, rng.int(0, input.length), 0, block);
}

// -- Value-level mutations --

const BOUNDARY_BYTES = [0x00, 0x01, 0x7f, 0x80, 0xfe, 0xff];

/** Overwrite a 1-8 byte run with one boundary byte, as for length and count fields. */
export function boundaryRun(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const out = input.slice();
  const pos = rng.int(0, out.length - 1);
  const len = Math.min(rng.int(1, 8), out.length - pos);
  out.fill(rng.pick(BOUNDARY_BYTES), pos, pos + len);
  return out;
}

// -- Structural mutations --

/** Duplicate a random slice in place. */
export function duplicateBlock(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length === 0) return input;
  const start = rng.int(0, input.length - 1);
  const end = rng.int(start + 1, input.length);
  return splice(input, end, 0, input.slice(start, end));
}

/** Truncate the input at a random position. */
export function truncate(input: Uint8Array, rng: Rng): Uint8Array {
  if (input.length <= 1) return input;
  return input.slice(0, rng.int(1, input.length - 1));
}

/** Append random trailing bytes. */
export function appendGarbage(input: Uint8Array, rng: Rng): Uint8Array {
  return splice(input, input.length, 0, rng.bytes(rng.int(1, 16)));
}

/** All available mutators. */
export const MUTATORS: readonly Mutator[] = [
  bitFlip,
  byteInsert,
  byteDelete,
  byteReplace,
  blockInsert,
  boundaryRun,
  duplicateBlock,
  truncate,
  appendGarbage,
];

/**
 * Apply one or more random mutations to an input.
 *
 * @param count Number of mutations to apply (default: 1).
 */
export function mutate(input: Uint8Array, rng: Rng, count = 1): Uint8Array {
  let result = input;
  for (let i = 0; i < count; i++) {
    result = rng.pick(MUTATORS)(result, rng);
  }
  return result;
}
