#!/usr/bin/env npx tsx
/**
 * CLI tool to validate protocol definition files and list their structs.
 *
 * Usage:
 *   npx tsx cli/validate-protocol.ts <protocol.json | directory>...
 *
 * Defaults to the protocols/ directory if no argument is given.
 * Exits with status 1 if any definition fails to load or build.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ProtocolCodec } from '../src/protocol/ProtocolCodec';
import { loadProtocolFile } from '../src/protocol/ProtocolLoader';

const DEFAULT_DIR = path.join(__dirname, '..', 'protocols');

function collectFiles(targets: string[]): string[] {
  const files: string[] = [];
  for (const target of targets) {
    const resolved = path.resolve(target);
    if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
      for (const f of fs.readdirSync(resolved).filter(f => f.endsWith('.json')).sort()) {
        files.push(path.join(resolved, f));
      }
    } else {
      files.push(resolved);
    }
  }
  return files;
}

function main(): void {
  const args = process.argv.slice(2);
  const files = collectFiles(args.length > 0 ? args : [DEFAULT_DIR]);

  if (files.length === 0) {
    console.error('Error: no protocol files found');
    process.exit(1);
  }

  let failures = 0;
  for (const file of files) {
    try {
      const codec = new ProtocolCodec(loadProtocolFile(file));
      console.log(`OK   ${path.basename(file)}: ${codec.name} (${codec.byteOrder} endian)`);
      for (const name of codec.structNames) {
        console.log(`       ${name}`);
      }
    } catch (err) {
      failures++;
      console.error(`FAIL ${path.basename(file)}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  console.log(`\n${files.length - failures}/${files.length} protocol(s) valid`);
  if (failures > 0) process.exit(1);
}

main();
