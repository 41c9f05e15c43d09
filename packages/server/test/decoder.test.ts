import { describe, it, expect } from 'vitest';
import {
  decodeFrame, describeMessage, getBitsSigned, getBitsUnsigned, isDecodeError, msmInfo, signalName,
} from '../src/ntrip/decoder.js';
import { extractFrames } from '../src/ntrip/frame-extractor.js';
import { ecefToGeodetic } from '../src/ntrip/geodesy.js';
import { arpPayload, buildFrame, messagePayload, msmPayload } from './helpers/rtcm.js';

function decode(payload: Uint8Array) {
  const { frames } = extractFrames(buildFrame(payload));
  expect(frames).toHaveLength(1);
  return decodeFrame(frames[0]);
}

describe('bit readers', () => {
  it('reads MSB-first fields', () => {
    const data = Uint8Array.from([0xd3, 0x0f]);
    expect(getBitsUnsigned(data, 0, 4)).toBe(13);
    expect(getBitsUnsigned(data, 4, 8)).toBe(0x30);
    expect(getBitsUnsigned(data, 12, 4)).toBe(15);
  });

  it('sign-extends two\'s complement fields', () => {
    expect(getBitsSigned(Uint8Array.from([0xff]), 0, 8)).toBe(-1);
    expect(getBitsSigned(Uint8Array.from([0x80]), 0, 8)).toBe(-128);
    expect(getBitsSigned(Uint8Array.from([0x7f]), 0, 8)).toBe(127);
  });
});

describe('message catalogue', () => {
  it('recognises MSM message numbers', () => {
    expect(msmInfo(1077)).toEqual({ constellation: 'GPS', level: 7 });
    expect(msmInfo(1124)).toEqual({ constellation: 'BeiDou', level: 4 });
    expect(msmInfo(1078)).toBeNull();
    expect(msmInfo(1005)).toBeNull();
  });

  it('describes messages', () => {
    expect(describeMessage(1005)).toBe('Station coordinates (stationary RTK reference station)');
    expect(describeMessage(1077)).toBe('GPS MSM7 - Full pseudoranges, phase ranges, phase range rate, and CNR (high resolution)');
    expect(describeMessage(9999)).toBe('RTCM correction data');
  });

  it('names signals', () => {
    expect(signalName('GPS', 2)).toBe('L1 C/A');
    expect(signalName('GLONASS', 8)).toBe('G2 C/A');
    expect(signalName('GPS', 5)).toBe('Signal 5');
  });
});

describe('decodeFrame', () => {
  it('reads message type and station id of any message', () => {
    expect(decode(messagePayload(1019, 2003))).toEqual({ messageType: 1019, stationId: 2003 });
  });

  it('reads satellites and signals from an MSM header', () => {
    const result = decode(msmPayload(1077, 12, [1, 5, 32], [2, 15]));
    expect(result).toEqual({
      messageType: 1077,
      stationId: 12,
      satellites: { GPS: [1, 5, 32] },
      signals: { GPS: ['L1 C/A', 'L2C (M)'] },
    });
  });

  it('maps MSM satellites to their constellation', () => {
    const result = decode(msmPayload(1087, 1, [3, 4, 24], [2, 8]));
    if (isDecodeError(result)) throw new Error(result.error);
    expect(result.satellites).toEqual({ GLONASS: [3, 4, 24] });
    expect(result.signals).toEqual({ GLONASS: ['G1 C/A', 'G2 C/A'] });
  });

  it('reads the antenna reference point of 1005', () => {
    const result = decode(arpPayload(5, 3785100.745, -901738.1926, 5036943.9202));
    if (isDecodeError(result)) throw new Error(result.error);
    expect(result.messageType).toBe(1005);
    expect(result.stationId).toBe(5);
    expect(result.antennaPosition?.x).toBeCloseTo(3785100.745, 4);
    expect(result.antennaPosition?.y).toBeCloseTo(-901738.1926, 4);
    expect(result.antennaPosition?.z).toBeCloseTo(5036943.9202, 4);
    expect(result.antennaHeight).toBeUndefined();
  });

  it('reads the antenna height of 1006', () => {
    const result = decode(arpPayload(5, 3785100.745, 901738.1926, 5036943.9202, 1.5));
    if (isDecodeError(result)) throw new Error(result.error);
    expect(result.messageType).toBe(1006);
    expect(result.antennaHeight).toBeCloseTo(1.5, 4);
  });

  it('reports a truncated MSM header', () => {
    const result = decode(messagePayload(1077, 1, 4));
    expect(isDecodeError(result)).toBe(true);
    expect(result).toMatchObject({ messageType: 1077 });
  });

  it('reports a payload too short for a header', () => {
    const result = decode(Uint8Array.from([0x3e, 0xd0]));
    expect(result).toEqual({ error: 'Payload too short for a message header (2 bytes)' });
  });
});

describe('ecefToGeodetic', () => {
  it('converts points on the equator', () => {
    const p = ecefToGeodetic({ x: 6378137, y: 0, z: 0 });
    expect(p.latitude).toBeCloseTo(0, 9);
    expect(p.longitude).toBeCloseTo(0, 9);
    expect(p.height).toBeCloseTo(0, 3);

    expect(ecefToGeodetic({ x: 0, y: 6378137, z: 0 }).longitude).toBeCloseTo(90, 9);
  });

  it('converts the pole', () => {
    const p = ecefToGeodetic({ x: 0, y: 0, z: 6378137 * (1 - 1 / 298.257223563) });
    expect(p.latitude).toBeCloseTo(90, 9);
    expect(p.height).toBeCloseTo(0, 3);
  });

  it('converts a mid-latitude station', () => {
    const p = ecefToGeodetic({ x: 3785100.745, y: 901738.1926, z: 5036943.9202 });
    expect(p.latitude).toBeCloseTo(52.5, 7);
    expect(p.longitude).toBeCloseTo(13.4, 7);
    expect(p.height).toBeCloseTo(100, 2);
  });
});
