/**
 * Seed corpus of valid encoded records for mutation-based fuzzing.
 * Each seed names the protocol file and struct it decodes with.
 */

import * as path from 'path';
import { fromHex } from '../src/hex';

export interface Seed {
  name: string;
  protocolFile: string;
  struct: string;
  bytes: Uint8Array;
}

const PROTOCOLS_DIR = path.join(__dirname, '..', 'protocols');

/** Stored zip entry "a.txt" holding "hello". */
export const SEED_ZIP_STORED: Seed = {
  name: 'zip-stored',
  protocolFile: path.join(PROTOCOLS_DIR, 'zip.json'),
  struct: 'LocalFileHeader',
  bytes: fromHex(
    '504b0304 1400 0008 0000 0060 2155 86a61036 05000000 05000000 0500 0000 612e747874 68656c6c6f',
  ),
};

/** Zip entry with an extra field and no data. */
export const SEED_ZIP_EXTRA: Seed = {
  name: 'zip-extra',
  protocolFile: path.join(PROTOCOLS_DIR, 'zip.json'),
  struct: 'LocalFileHeader',
  bytes: fromHex(
    '504b0304 0a00 0000 0800 0000 0000 00000000 00000000 00000000 0300 0400 646972 75780b00',
  ),
};

/** Sensor frame with two readings and a location. */
export const SEED_SENSOR_LOCATED: Seed = {
  name: 'sensor-located',
  protocolFile: path.join(PROTOCOLS_DIR, 'sensor.json'),
  struct: 'Frame',
  bytes: fromHex(
    '5445 01 23 00003039 0000018bcfe56800 02 01 41ac0000 02 425d0000 ' +
    '4048400000000000 c05e900000000000 0000 6e6f64652d370000',
  ),
};

/** Sensor frame with no readings and no location. */
export const SEED_SENSOR_EMPTY: Seed = {
  name: 'sensor-empty',
  protocolFile: path.join(PROTOCOLS_DIR, 'sensor.json'),
  struct: 'Frame',
  bytes: fromHex('5445 01 00 00000001 0000000000000000 00 0000 0000000000000000'),
};

/** All seeds as an array for iteration. */
export const ALL_SEEDS: readonly Seed[] = [
  SEED_ZIP_STORED,
  SEED_ZIP_EXTRA,
  SEED_SENSOR_LOCATED,
  SEED_SENSOR_EMPTY,
];
