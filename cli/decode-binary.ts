#!/usr/bin/env npx tsx
/**
 * CLI tool to decode a binary file (or hex string) with a protocol definition.
 *
 * Usage:
 *   npx tsx cli/decode-binary.ts <protocol.json> <Struct> <input.bin>
 *   npx tsx cli/decode-binary.ts <protocol.json> <Struct> --hex <hex>
 *
 * Flags:
 *   --all   decode consecutive records until the input is exhausted
 */

import * as fs from 'fs';
import * as path from 'path';
import { ProtocolError } from '../src/ProtocolError';
import { fromHex } from '../src/hex';
import { ProtocolCodec } from '../src/protocol/ProtocolCodec';
import { loadProtocolFile } from '../src/protocol/ProtocolLoader';
import { toJSONValue } from '../src/protocol/render';

const USAGE = 'Usage: npx tsx cli/decode-binary.ts <protocol.json> <Struct> (<input.bin> | --hex <hex>) [--all]';

function readInput(args: string[]): Uint8Array {
  const hexIndex = args.indexOf('--hex');
  if (hexIndex !== -1) {
    const hex = args[hexIndex + 1];
    if (hex === undefined) {
      console.error(USAGE);
      process.exit(1);
    }
    return fromHex(hex);
  }
  const inputPath = path.resolve(args[0]);
  if (!fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }
  return new Uint8Array(fs.readFileSync(inputPath));
}

function main(): void {
  const args = process.argv.slice(2);
  const all = args.includes('--all');
  const positional = args.filter(a => a !== '--all');

  if (positional.length < 3) {
    console.error(USAGE);
    process.exit(1);
  }

  const [protocolPath, structName] = positional;
  try {
    const codec = new ProtocolCodec(loadProtocolFile(path.resolve(protocolPath)));
    const data = readInput(positional.slice(2));

    if (all) {
      const records = codec.decodeAll(structName, data);
      console.log(JSON.stringify(records.map(toJSONValue), null, 2));
      console.error(`Decoded ${records.length} ${structName} record(s) from ${data.length} bytes`);
    } else {
      console.log(JSON.stringify(toJSONValue(codec.decode(structName, data)), null, 2));
    }
  } catch (err) {
    if (err instanceof ProtocolError) {
      const where = err.path ? ` (at ${err.path})` : '';
      console.error(`Error [${err.code}]${where}: ${err.message}`);
    } else {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    process.exit(1);
  }
}

main();
