import * as path from 'path';
import { ProtocolError } from '../../src/ProtocolError';
import { ProtocolCodec } from '../../src/protocol/ProtocolCodec';
import { loadProtocolsFromDir } from '../../src/protocol/ProtocolLoader';
import { toJSONValue } from '../../src/protocol/render';

const PROTOCOLS_DIR = path.join(__dirname, '..', '..', 'protocols');

const FRAME_HEX =
  '5445' + '01' + '23' + '00003039' + '0000018bcfe56800' +
  '02' + '01' + '41ac0000' + '02' + '425d0000' +
  '4048400000000000' + 'c05e900000000000' +
  '0000' + '6e6f64652d370000';

const FRAME = {
  magic: 0x5445,
  version: 1,
  status: { active: true, has_location: true, unit: 'kelvin' },
  device_id: 12345,
  timestamp: 1700000000000n,
  reading_count: 2,
  readings: [
    { kind: 'temperature', value: 21.5 },
    { kind: 'humidity', value: 55.25 },
  ],
  latitude: 48.5,
  longitude: -122.25,
  label: 'node-7',
};

function loadSensor(): ProtocolCodec {
  const document = loadProtocolsFromDir(PROTOCOLS_DIR).find(d => d.protocol.name === 'sensor_telemetry');
  if (!document) throw new Error('sensor_telemetry protocol missing');
  return new ProtocolCodec(document);
}

describe('sensor telemetry frame (e2e)', () => {
  it('decodes a big-endian frame with location', () => {
    const codec = loadSensor();
    expect(codec.byteOrder).toBe('big');
    expect(codec.decodeFromHex('Frame', FRAME_HEX)).toEqual(FRAME);
  });

  it('encodes the frame to the same bytes', () => {
    expect(loadSensor().encodeToHex('Frame', FRAME)).toBe(FRAME_HEX);
  });

  it('omits the location when the status bit is clear', () => {
    const codec = loadSensor();
    const { latitude, longitude, ...rest } = FRAME;
    const frame = { ...rest, status: { active: true, has_location: false, unit: 'kelvin' } };
    expect(latitude).toBe(48.5);
    expect(longitude).toBe(-122.25);
    expect(codec.sizeOf('Frame', frame)).toBe(37);
    const bytes = codec.encode('Frame', frame);
    expect(bytes[3]).toBe(0x21);
    expect(codec.decode('Frame', bytes)).toEqual(frame);
  });

  it('reports a bad magic number', () => {
    let caught: unknown;
    try {
      loadSensor().decodeFromHex('Frame', '55' + FRAME_HEX.slice(2));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ProtocolError);
    expect(caught).toMatchObject({
      code: 'EXPECTED_MISMATCH',
      path: 'magic',
      message: "Expected 0x5445 at 'magic', got 0x5545",
    });
  });

  it('reports the failing reading on truncated input', () => {
    let caught: unknown;
    try {
      loadSensor().decodeFromHex('Frame', FRAME_HEX.slice(0, 2 * 25));
    } catch (e) {
      caught = e;
    }
    expect(caught).toMatchObject({ code: 'OUT_OF_RANGE', path: 'readings[1].value' });
  });

  it('renders the decoded frame as JSON', () => {
    const json = toJSONValue(loadSensor().decodeFromHex('Frame', FRAME_HEX));
    expect(json).toMatchObject({ timestamp: '1700000000000', status: { unit: 'kelvin' } });
  });
});
