import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProtocolError } from '../../src/ProtocolError';
import { loadProtocolFile, loadProtocolsFromDir, parseProtocol } from '../../src/protocol/ProtocolLoader';

const MINIMAL = JSON.stringify({
  protocol: { name: 'mini', byte_order: 'big_endian' },
  structs: [{ name: 'Ping', fields: [{ name: 'id', type: 'u16' }] }],
});

describe('parseProtocol', () => {
  it('returns the validated document', () => {
    const document = parseProtocol(MINIMAL);
    expect(document.protocol).toEqual({ name: 'mini', byte_order: 'big_endian' });
    expect(document.structs?.[0].fields[0]).toEqual({ name: 'id', type: 'u16' });
  });

  it('rejects empty text', () => {
    expect(() => parseProtocol('  \n', 'empty.json')).toThrow('Empty protocol file: empty.json');
  });

  it('rejects malformed JSON', () => {
    expect(() => parseProtocol('{', 'bad.json')).toThrow(/^Invalid JSON in bad\.json: /);
  });

  it('rejects documents that do not match the schema', () => {
    let caught: unknown;
    try {
      parseProtocol(JSON.stringify({ protocol: { name: 'x' }, structs: [{ name: 'S', fields: [] }] }), 'p.json');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ProtocolError);
    expect(caught).toMatchObject({ code: 'INVALID_DEFINITION' });
    expect(caught instanceof Error && caught.message).toMatch(/^Schema validation failed for p\.json: \/structs\/0\/fields/);
  });

  it('rejects unknown properties', () => {
    const text = JSON.stringify({ protocol: { name: 'x', version: 2 } });
    expect(() => parseProtocol(text)).toThrow(/^Schema validation failed for <input>: /);
  });

  it('only accepts enums up to 32 bits wide', () => {
    const text = JSON.stringify({
      protocol: { name: 'x' },
      enums: [{ name: 'Big', type: 'u64', values: [{ name: 'all', value: '0xFFFFFFFFFFFFFFFF' }] }],
    });
    expect(() => parseProtocol(text)).toThrow(/^Schema validation failed for <input>: \/enums\/0\/type/);
  });

  it('rejects a bad byte order', () => {
    const text = JSON.stringify({ protocol: { name: 'x', byte_order: 'middle_endian' } });
    expect(() => parseProtocol(text)).toThrow(ProtocolError);
  });
});

describe('loading from disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'protocols-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads a single file', () => {
    const file = path.join(dir, 'mini.json');
    fs.writeFileSync(file, MINIMAL);
    expect(loadProtocolFile(file).protocol.name).toBe('mini');
  });

  it('loads every .json file in name order', () => {
    fs.writeFileSync(path.join(dir, 'b.json'), MINIMAL.replace('"mini"', '"second"'));
    fs.writeFileSync(path.join(dir, 'a.json'), MINIMAL);
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');
    expect(loadProtocolsFromDir(dir).map(d => d.protocol.name)).toEqual(['mini', 'second']);
  });

  it('fails for an empty or missing directory', () => {
    expect(() => loadProtocolsFromDir(dir)).toThrow(`No protocol files found in ${dir}`);
    expect(() => loadProtocolsFromDir(path.join(dir, 'missing'))).toThrow('Protocol directory not found');
  });
});
