import { readFileSync } from 'fs';
import type { Constellation, DecodedMessage, DecodeError, RawFrame } from '@castermon/shared';

/**
 * RTCM 3 message decoder: reads only what the monitor needs:
 * - message number and reference station id (every message)
 * - satellite and signal masks of MSM1..MSM7 messages
 * - antenna reference point of 1005 / 1006
 */

interface RtcmCatalog {
  messages: Record<string, string>;
  msmBase: Record<string, Constellation>;
  msmLevels: Record<string, string>;
  signals: Record<Constellation, Record<string, string>>;
}

const catalog: RtcmCatalog = JSON.parse(
  readFileSync(new URL('./rtcm-catalog.json', import.meta.url), 'utf-8'),
);

// Bit offsets inside the payload of an MSM header
const MSM_SATELLITE_MASK_OFFSET = 73;
const MSM_SIGNAL_MASK_OFFSET = 137;
const MSM_HEADER_MIN_BITS = MSM_SIGNAL_MASK_OFFSET + 32;

const ARP_MIN_BITS_1005 = 152;
const ARP_MIN_BITS_1006 = 168;

export function getBitsUnsigned(data: Uint8Array, pos: number, len: number): number {
  let value = 0;
  for (let i = pos; i < pos + len; i++) {
    value = value * 2 + ((data[i >> 3] >> (7 - (i & 7))) & 1);
  }
  return value;
}

export function getBitsSigned(data: Uint8Array, pos: number, len: number): number {
  const value = getBitsUnsigned(data, pos, len);
  const half = 2 ** (len - 1);
  return value >= half ? value - 2 * half : value;
}

export function isDecodeError(result: DecodedMessage | DecodeError): result is DecodeError {
  return 'error' in result;
}

/** Returns the constellation and MSM level (1-7) of an MSM message number */
export function msmInfo(messageType: number): { constellation: Constellation; level: number } | null {
  const level = messageType % 10;
  if (level < 1 || level > 7) return null;
  const constellation = catalog.msmBase[String(messageType - level)];
  return constellation ? { constellation, level } : null;
}

export function describeMessage(messageType: number): string {
  const msm = msmInfo(messageType);
  if (msm) return `${msm.constellation} MSM${msm.level} - ${catalog.msmLevels[String(msm.level)]}`;
  return catalog.messages[String(messageType)] ?? 'RTCM correction data';
}

export function signalName(constellation: Constellation, signalId: number): string {
  return catalog.signals[constellation][String(signalId)] ?? `Signal ${signalId}`;
}

export function decodeFrame(frame: RawFrame): DecodedMessage | DecodeError {
  const { payload } = frame;
  const bits = payload.length * 8;
  if (bits < 24) return { error: `Payload too short for a message header (${payload.length} bytes)` };

  const messageType = getBitsUnsigned(payload, 0, 12);
  const stationId = getBitsUnsigned(payload, 12, 12);
  const message: DecodedMessage = { messageType, stationId };

  const msm = msmInfo(messageType);
  if (msm) {
    if (bits < MSM_HEADER_MIN_BITS) return { error: `MSM header truncated (${payload.length} bytes)`, messageType };
    const satellites: number[] = [];
    for (let i = 0; i < 64; i++) {
      if (getBitsUnsigned(payload, MSM_SATELLITE_MASK_OFFSET + i, 1)) satellites.push(i + 1);
    }
    const signals: string[] = [];
    for (let i = 0; i < 32; i++) {
      if (getBitsUnsigned(payload, MSM_SIGNAL_MASK_OFFSET + i, 1)) signals.push(signalName(msm.constellation, i + 1));
    }
    message.satellites = {};
    message.satellites[msm.constellation] = satellites;
    message.signals = {};
    message.signals[msm.constellation] = signals;
    return message;
  }

  if (messageType === 1005 || messageType === 1006) {
    const minBits = messageType === 1006 ? ARP_MIN_BITS_1006 : ARP_MIN_BITS_1005;
    if (bits < minBits) return { error: `Message ${messageType} truncated (${payload.length} bytes)`, messageType };
    // ECEF coordinates in units of 0.1 mm
    message.antennaPosition = {
      x: getBitsSigned(payload, 34, 38) * 0.0001,
      y: getBitsSigned(payload, 74, 38) * 0.0001,
      z: getBitsSigned(payload, 114, 38) * 0.0001,
    };
    if (messageType === 1006) message.antennaHeight = getBitsUnsigned(payload, 152, 16) * 0.0001;
  }

  return message;
}
