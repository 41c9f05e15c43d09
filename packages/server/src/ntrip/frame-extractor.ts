import type { RawFrame } from '@castermon/shared';
import { crc24q } from './crc24q.js';

/**
 * RTCM 3 transport framing:
 *
 *   +------+----------+--------------+-----------------+--------+
 *   | 0xD3 | 6 bits 0 | 10 bit length | payload (0-1023) | CRC-24Q |
 *   +------+----------+--------------+-----------------+--------+
 *
 * The CRC covers the 3 header bytes and the payload.
 */
export const RTCM3_PREAMBLE = 0xd3;
const HEADER_LENGTH = 3;
const CRC_LENGTH = 3;

export interface ExtractResult {
  frames: RawFrame[];
  bytesConsumed: number;
  bytesDiscarded: number;
  crcFailures: number;
}

function frameLengthAt(buffer: Uint8Array, pos: number): number {
  const payloadLength = ((buffer[pos + 1] & 0x03) << 8) | buffer[pos + 2];
  return HEADER_LENGTH + payloadLength + CRC_LENGTH;
}

function isValidFrameAt(buffer: Uint8Array, pos: number): boolean {
  if (buffer[pos] !== RTCM3_PREAMBLE || buffer.length - pos < HEADER_LENGTH) return false;
  const frameLength = frameLengthAt(buffer, pos);
  if (buffer.length - pos < frameLength) return false;
  const crcOffset = pos + frameLength - CRC_LENGTH;
  const expected = (buffer[crcOffset] << 16) | (buffer[crcOffset + 1] << 8) | buffer[crcOffset + 2];
  return crc24q(buffer, pos, crcOffset) === expected;
}

function hasValidFrameAfter(buffer: Uint8Array, pos: number): boolean {
  for (let i = pos + 1; i < buffer.length; i++) {
    if (buffer[i] === RTCM3_PREAMBLE && isValidFrameAt(buffer, i)) return true;
  }
  return false;
}

/**
 * Scans `buffer` from the start and returns every complete, CRC-valid frame in order.
 * Bytes that cannot start a valid frame are consumed and counted as discarded. A partial
 * frame at the scan position stops the scan and stays unconsumed, unless a complete valid
 * frame follows it: then the preamble was noise and is discarded.
 */
export function extractFrames(buffer: Uint8Array): ExtractResult {
  const frames: RawFrame[] = [];
  let pos = 0;
  let bytesDiscarded = 0;
  let crcFailures = 0;

  while (pos < buffer.length) {
    if (buffer[pos] !== RTCM3_PREAMBLE) {
      pos++;
      bytesDiscarded++;
      continue;
    }

    const remaining = buffer.length - pos;
    const frameLength = remaining < HEADER_LENGTH ? Infinity : frameLengthAt(buffer, pos);
    if (remaining < frameLength) {
      if (!hasValidFrameAfter(buffer, pos)) break;
      pos++;
      bytesDiscarded++;
      continue;
    }

    const payloadLength = frameLength - HEADER_LENGTH - CRC_LENGTH;
    if (!isValidFrameAt(buffer, pos)) {
      // Resync on the next byte
      crcFailures++;
      pos++;
      bytesDiscarded++;
      continue;
    }

    const bytes = new Uint8Array(buffer.subarray(pos, pos + frameLength));
    frames.push({ bytes, payload: bytes.subarray(HEADER_LENGTH, HEADER_LENGTH + payloadLength) });
    pos += frameLength;
  }

  return { frames, bytesConsumed: pos, bytesDiscarded, crcFailures };
}

export class FrameBuffer {
  private pending: Buffer = Buffer.alloc(0);

  get length(): number {
    return this.pending.length;
  }

  append(chunk: Uint8Array): void {
    this.pending = this.pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.pending, chunk]);
  }

  drain(): ExtractResult {
    const result = extractFrames(this.pending);
    if (result.bytesConsumed > 0) {
      this.pending = this.pending.subarray(result.bytesConsumed);
    }
    return result;
  }

  clear(): void {
    this.pending = Buffer.alloc(0);
  }
}
