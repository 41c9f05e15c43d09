import { describe, it, expect } from 'vitest';
import { crc24q } from '../src/ntrip/crc24q.js';
import { extractFrames, FrameBuffer } from '../src/ntrip/frame-extractor.js';
import { buildFrame, concat, messagePayload, msmPayload } from './helpers/rtcm.js';

describe('crc24q', () => {
  it('matches the CRC of an empty RTCM frame', () => {
    expect(crc24q(Uint8Array.from([0xd3, 0x00, 0x00]))).toBe(0x47ea4b);
  });

  it('honours start and end offsets', () => {
    const data = Uint8Array.from([0xff, 0xd3, 0x00, 0x00, 0xff]);
    expect(crc24q(data, 1, 4)).toBe(0x47ea4b);
  });
});

describe('extractFrames', () => {
  it('accepts a hand-built empty frame', () => {
    const result = extractFrames(Uint8Array.from([0xd3, 0x00, 0x00, 0x47, 0xea, 0x4b]));
    expect(result.frames).toHaveLength(1);
    expect(result.frames[0].payload.length).toBe(0);
    expect(result.bytesConsumed).toBe(6);
  });

  it('returns consecutive frames in order', () => {
    const a = buildFrame(messagePayload(1005, 1, 15));
    const b = buildFrame(msmPayload(1077, 1, [1, 2], [2]));
    const result = extractFrames(concat(a, b));

    expect(result.frames.map((f) => f.bytes.length)).toEqual([a.length, b.length]);
    expect(Buffer.from(result.frames[1].bytes).equals(Buffer.from(b))).toBe(true);
    expect(result.bytesConsumed).toBe(a.length + b.length);
    expect(result.bytesDiscarded).toBe(0);
  });

  it('skips garbage before a frame', () => {
    const frame = buildFrame(messagePayload(1019, 7));
    const result = extractFrames(concat(Uint8Array.from([0x00, 0x11, 0x22]), frame));
    expect(result.frames).toHaveLength(1);
    expect(result.bytesDiscarded).toBe(3);
    expect(result.bytesConsumed).toBe(3 + frame.length);
  });

  it('rejects a frame with a corrupted CRC and resyncs on the next frame', () => {
    const bad = buildFrame(messagePayload(1019, 7));
    bad[bad.length - 1] ^= 0xff;
    const good = buildFrame(messagePayload(1020, 7));

    const result = extractFrames(concat(bad, good));
    expect(result.crcFailures).toBe(1);
    expect(result.frames).toHaveLength(1);
    expect(Buffer.from(result.frames[0].bytes).equals(Buffer.from(good))).toBe(true);
    expect(result.bytesDiscarded).toBe(bad.length);
  });

  it('leaves a partial frame unconsumed', () => {
    const frame = buildFrame(messagePayload(1005, 1, 15));
    const result = extractFrames(frame.subarray(0, frame.length - 2));
    expect(result.frames).toHaveLength(0);
    expect(result.bytesConsumed).toBe(0);
    expect(result.bytesDiscarded).toBe(0);
  });

  it('does not stall on a stray preamble that declares a long payload', () => {
    const frames = [
      buildFrame(messagePayload(1005, 1, 15)),
      buildFrame(msmPayload(1077, 1, [1, 2], [2])),
      buildFrame(messagePayload(1230, 1)),
    ];
    const stream = concat(Uint8Array.from([0xd3, 0x03, 0xff]), ...frames);

    const result = extractFrames(stream);
    expect(result.frames.map((f) => f.bytes.length)).toEqual(frames.map((f) => f.length));
    expect(result.bytesDiscarded).toBe(3);
    expect(result.bytesConsumed).toBe(stream.length);
  });

  it('waits on a lone preamble byte', () => {
    const result = extractFrames(Uint8Array.from([0x01, 0xd3]));
    expect(result.bytesConsumed).toBe(1);
    expect(result.bytesDiscarded).toBe(1);
  });
});

describe('FrameBuffer', () => {
  it('yields the same frames however the stream is split', () => {
    const stream = concat(
      buildFrame(messagePayload(1005, 1, 15)),
      Uint8Array.from([0x42]),
      buildFrame(msmPayload(1087, 1, [3, 4, 5], [2, 8])),
      buildFrame(messagePayload(1230, 1)),
    );
    const whole = extractFrames(stream).frames.map((f) => Buffer.from(f.bytes).toString('hex'));
    expect(whole).toHaveLength(3);

    for (const chunkSize of [1, 2, 5, 17, stream.length]) {
      const buffer = new FrameBuffer();
      const seen: string[] = [];
      for (let i = 0; i < stream.length; i += chunkSize) {
        buffer.append(stream.subarray(i, i + chunkSize));
        seen.push(...buffer.drain().frames.map((f) => Buffer.from(f.bytes).toString('hex')));
      }
      expect(seen).toEqual(whole);
      expect(buffer.length).toBe(0);
    }
  });

  it('yields every frame when the garbage between them contains preambles', () => {
    const frames = [
      buildFrame(messagePayload(1005, 1, 15)),
      buildFrame(msmPayload(1087, 1, [3, 4, 5], [2, 8])),
      buildFrame(messagePayload(1230, 1)),
    ];
    const stream = concat(
      Uint8Array.from([0xd3, 0x02, 0x10]),
      frames[0],
      Uint8Array.from([0x00, 0xd3, 0x03, 0xff, 0x7f]),
      frames[1],
      Uint8Array.from([0xd3]),
      frames[2],
    );
    const expected = frames.map((f) => Buffer.from(f).toString('hex'));

    for (const chunkSize of [1, 3, 7, stream.length]) {
      const buffer = new FrameBuffer();
      const seen: string[] = [];
      for (let i = 0; i < stream.length; i += chunkSize) {
        buffer.append(stream.subarray(i, i + chunkSize));
        seen.push(...buffer.drain().frames.map((f) => Buffer.from(f.bytes).toString('hex')));
      }
      expect(seen).toEqual(expected);
      expect(buffer.length).toBe(0);
    }
  });

  it('keeps a trailing partial frame until the rest arrives', () => {
    const frame = buildFrame(messagePayload(1033, 2, 20));
    const buffer = new FrameBuffer();
    buffer.append(frame.subarray(0, 10));
    expect(buffer.drain().frames).toHaveLength(0);
    expect(buffer.length).toBe(10);

    buffer.append(frame.subarray(10));
    expect(buffer.drain().frames).toHaveLength(1);
    expect(buffer.length).toBe(0);
  });

  it('clear drops pending bytes', () => {
    const buffer = new FrameBuffer();
    buffer.append(Uint8Array.from([0xd3, 0x00]));
    buffer.clear();
    expect(buffer.length).toBe(0);
  });
});
