/**
 * Standalone continuous fuzzer for protocol decoding.
 *
 * Mutates the seed records in a loop and reports any input that makes a
 * decode or re-encode throw something other than a ProtocolError, or run
 * too long.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { ProtocolError } from '../src/ProtocolError';
import { toHex } from '../src/hex';
import { ProtocolCodec } from '../src/protocol/ProtocolCodec';
import { loadProtocolFile } from '../src/protocol/ProtocolLoader';
import { mutate } from './generators/mutator';
import { Rng } from './generators/rng';
import { ALL_SEEDS, Seed } from './seeds';

const TIMEOUT_MS = 2000;

interface FuzzResult {
  iteration: number;
  seed: string;
  input: Uint8Array;
  error?: string;
  timedOut: boolean;
  decodeOk: boolean;
  encodeOk: boolean;
}

const codecs = new Map<string, ProtocolCodec>();

function codecFor(seed: Seed): ProtocolCodec {
  let codec = codecs.get(seed.protocolFile);
  if (!codec) {
    codec = new ProtocolCodec(loadProtocolFile(seed.protocolFile));
    codecs.set(seed.protocolFile, codec);
  }
  return codec;
}

function describeError(e: unknown): string {
  return e instanceof Error ? `${e.name}: ${e.message}` : String(e);
}

function fuzzOne(seed: Seed, input: Uint8Array, iteration: number): FuzzResult {
  const result: FuzzResult = {
    iteration,
    seed: seed.name,
    input,
    timedOut: false,
    decodeOk: false,
    encodeOk: false,
  };
  const codec = codecFor(seed);
  const start = Date.now();

  try {
    const value = codec.decode(seed.struct, input);
    result.decodeOk = true;
    try {
      codec.encode(seed.struct, value);
      result.encodeOk = true;
    } catch (e) {
      // Values that cannot be re-encoded are rejected with a ProtocolError
      if (!(e instanceof ProtocolError)) result.error = describeError(e);
    }
  } catch (e) {
    if (!(e instanceof ProtocolError)) result.error = describeError(e);
  }

  if (Date.now() - start > TIMEOUT_MS) {
    result.timedOut = true;
  }

  return result;
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log(`Protocol Decoder Fuzzer`);
  console.log(`Seeds: ${ALL_SEEDS.map(s => s.name).join(', ')}`);
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  let iteration = 0;
  let decodeOk = 0;
  let encodeOk = 0;
  const issues: FuzzResult[] = [];
  const startTime = Date.now();

  while (iteration < maxIterations) {
    const seed = ALL_SEEDS[iteration % ALL_SEEDS.length];
    const rng = new Rng(iteration + 1);
    const result = fuzzOne(seed, mutate(seed.bytes, rng, rng.int(1, 5)), iteration);

    if (result.decodeOk) decodeOk++;
    if (result.encodeOk) encodeOk++;
    if (result.timedOut || result.error !== undefined) {
      issues.push(result);
      console.error(`\n[!] ${result.timedOut ? 'TIMEOUT' : 'CRASH'} at iteration ${iteration} (${seed.name}):`);
      if (result.error) console.error(`    ${result.error}`);
      console.error(`    Input: ${toHex(result.input).slice(0, 200)}`);
    }

    iteration++;

    // Progress report every 10000 iterations
    if (iteration % 10000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `decodeOk=${decodeOk} encodeOk=${encodeOk} issues=${issues.length}`
      );
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Decode successes: ${decodeOk}`);
  console.log(`Re-encode successes: ${encodeOk}`);

  if (issues.length > 0) {
    console.log('');
    console.log(`=== ${issues.length} issue(s) found ===`);
    for (const issue of issues) {
      console.log(`  Iteration: ${issue.iteration}, Seed: ${issue.seed}`);
      console.log(`  Input: ${toHex(issue.input).slice(0, 300)}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
