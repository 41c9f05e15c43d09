import {
  CONSTELLATIONS,
  type Constellation, type ConstellationSummary, type CounterPolicy, type DecodedMessage, type DecodeError,
  type GeodeticPosition, type MessageTypeCount, type RawFrame, type StationStatistics, type ThroughputReading,
} from '@castermon/shared';
import { decodeFrame, describeMessage, isDecodeError } from '../ntrip/decoder.js';
import { ecefToGeodetic } from '../ntrip/geodesy.js';
import type { SessionDataEvent } from '../ntrip/session.js';
import { RateWindow, ThroughputTracker, type ByteCounter } from './rate.js';

export interface AggregatorOptions {
  rateWindowMs?: number;
  satelliteWindowMs?: number;
  counterPolicy?: CounterPolicy;
  /** Throughput baselines not read for this long are dropped */
  consumerIdleMs?: number;
  decode?: (frame: RawFrame) => DecodedMessage | DecodeError;
}

interface StationAccumulator {
  counter: ByteCounter;
  rate: RateWindow;
  collectedSince: number;
  messages: Map<number, { count: number; lastReceived: number }>;
  // satellite id → last time seen, per constellation
  satellites: Map<Constellation, Map<number, number>>;
  signals: Map<Constellation, Set<string>>;
  referencePosition?: GeodeticPosition;
  decodeErrors: number;
  hasSatelliteData: boolean;
}

/**
 * Statistics Aggregator: turns session byte counts and frames into per-station
 * throughput, message-type counts and constellation satellite sets.
 *
 * Rate and byte totals restart with every connection. Message counts, satellites,
 * signals and the reference position follow `counterPolicy`.
 */
export class StatisticsAggregator {
  private stations = new Map<string, StationAccumulator>();
  // consumer id → station id → tracker
  private consumers = new Map<string, Map<string, ThroughputTracker>>();
  private readonly rateWindowMs: number;
  private readonly satelliteWindowMs: number;
  private readonly counterPolicy: CounterPolicy;
  private readonly consumerIdleMs: number;
  private readonly decode: (frame: RawFrame) => DecodedMessage | DecodeError;

  constructor(options: AggregatorOptions = {}) {
    this.rateWindowMs = options.rateWindowMs ?? 10_000;
    this.satelliteWindowMs = options.satelliteWindowMs ?? 60_000;
    this.counterPolicy = options.counterPolicy ?? 'reset';
    this.consumerIdleMs = options.consumerIdleMs ?? 10 * 60_000;
    this.decode = options.decode ?? decodeFrame;
  }

  beginConnection(stationId: string, now: number): void {
    const existing = this.stations.get(stationId);
    if (!existing) {
      this.stations.set(stationId, this.createAccumulator(now, 0));
      return;
    }

    existing.counter = { totalBytes: 0, epoch: existing.counter.epoch + 1, since: now };
    existing.rate.reset(now);
    if (this.counterPolicy === 'reset') {
      existing.collectedSince = now;
      existing.messages.clear();
      existing.satellites.clear();
      existing.signals.clear();
      existing.referencePosition = undefined;
      existing.decodeErrors = 0;
      existing.hasSatelliteData = false;
    }
  }

  recordData(event: SessionDataEvent): void {
    const acc = this.ensure(event.stationId, event.timestamp);
    acc.counter.totalBytes += event.bytes;
    acc.rate.add(event.bytes, event.timestamp);
    if (event.frames.length > 0) this.ingestFrames(event.stationId, event.frames, event.timestamp);
  }

  ingestFrames(stationId: string, frames: RawFrame[], now: number): void {
    const acc = this.ensure(stationId, now);
    for (const frame of frames) {
      const result = this.decode(frame);
      if (isDecodeError(result)) {
        acc.decodeErrors++;
        continue;
      }

      const stat = acc.messages.get(result.messageType);
      if (stat) {
        stat.count++;
        stat.lastReceived = now;
      } else {
        acc.messages.set(result.messageType, { count: 1, lastReceived: now });
      }

      if (result.satellites) {
        acc.hasSatelliteData = true;
        for (const constellation of CONSTELLATIONS) {
          const ids = result.satellites[constellation];
          if (!ids) continue;
          let seen = acc.satellites.get(constellation);
          if (!seen) { seen = new Map(); acc.satellites.set(constellation, seen); }
          for (const id of ids) seen.set(id, now);
        }
      }

      if (result.signals) {
        for (const constellation of CONSTELLATIONS) {
          const names = result.signals[constellation];
          if (!names) continue;
          let set = acc.signals.get(constellation);
          if (!set) { set = new Set(); acc.signals.set(constellation, set); }
          for (const name of names) set.add(name);
        }
      }

      if (result.antennaPosition) acc.referencePosition = ecefToGeodetic(result.antennaPosition);
    }
  }

  getBytesPerSecond(stationId: string, now: number): number {
    return this.stations.get(stationId)?.rate.bytesPerSecond(now) ?? 0;
  }

  /** Per-consumer throughput: the delta since this consumer's previous read. */
  readThroughput(consumerId: string, stationId: string, now: number): ThroughputReading {
    const acc = this.stations.get(stationId);
    let trackers = this.consumers.get(consumerId);
    if (!trackers) { trackers = new Map(); this.consumers.set(consumerId, trackers); }
    let tracker = trackers.get(stationId);
    if (!tracker) { tracker = new ThroughputTracker(this.rateWindowMs); trackers.set(stationId, tracker); }

    const counter: ByteCounter = acc?.counter ?? { totalBytes: 0, epoch: 0, since: now };
    const { deltaBytes, bytesPerSecond } = tracker.read(counter, now);
    return { consumerId, stationId, deltaBytes, bytesPerSecond, totalBytes: counter.totalBytes, timestamp: now };
  }

  /** Drops throughput baselines idle for longer than `consumerIdleMs`. Returns the consumers forgotten entirely. */
  evictIdleConsumers(now: number): string[] {
    const forgotten: string[] = [];
    for (const [consumerId, trackers] of this.consumers) {
      for (const [stationId, tracker] of trackers) {
        if (now - tracker.lastReadAt > this.consumerIdleMs) trackers.delete(stationId);
      }
      if (trackers.size === 0) {
        this.consumers.delete(consumerId);
        forgotten.push(consumerId);
      }
    }
    return forgotten;
  }

  getConsumerIds(): string[] {
    return [...this.consumers.keys()];
  }

  /** Satellites seen within the satellite window; undefined before any satellite-bearing message. */
  getSatelliteCount(stationId: string, now: number): number | undefined {
    const acc = this.stations.get(stationId);
    if (!acc?.hasSatelliteData) return undefined;
    let count = 0;
    for (const seen of acc.satellites.values()) count += this.currentSatellites(seen, now).length;
    return count;
  }

  getStatistics(stationId: string, now: number): StationStatistics | undefined {
    const acc = this.stations.get(stationId);
    if (!acc) return undefined;

    const messages: MessageTypeCount[] = [...acc.messages.entries()]
      .map(([messageType, stat]) => ({ messageType, description: describeMessage(messageType), ...stat }))
      .sort((a, b) => a.messageType - b.messageType);

    const constellations: ConstellationSummary[] = [];
    let satelliteCount = 0;
    for (const constellation of CONSTELLATIONS) {
      const seen = acc.satellites.get(constellation);
      const satellites = seen ? this.currentSatellites(seen, now) : [];
      const signals = [...(acc.signals.get(constellation) ?? [])].sort();
      if (satellites.length === 0 && signals.length === 0) continue;
      satelliteCount += satellites.length;
      constellations.push({ constellation, satellites, signals });
    }

    return {
      stationId,
      collectedSince: acc.collectedSince,
      totalBytes: acc.counter.totalBytes,
      bytesPerSecond: acc.rate.bytesPerSecond(now),
      messages,
      constellations,
      satelliteCount,
      referencePosition: acc.referencePosition,
      decodeErrors: acc.decodeErrors,
    };
  }

  removeStation(stationId: string): void {
    this.stations.delete(stationId);
    for (const trackers of this.consumers.values()) trackers.delete(stationId);
  }

  private currentSatellites(seen: Map<number, number>, now: number): number[] {
    const ids: number[] = [];
    for (const [id, lastSeen] of seen) {
      if (now - lastSeen <= this.satelliteWindowMs) ids.push(id);
    }
    return ids.sort((a, b) => a - b);
  }

  private ensure(stationId: string, now: number): StationAccumulator {
    let acc = this.stations.get(stationId);
    if (!acc) {
      acc = this.createAccumulator(now, 0);
      this.stations.set(stationId, acc);
    }
    return acc;
  }

  private createAccumulator(now: number, epoch: number): StationAccumulator {
    return {
      counter: { totalBytes: 0, epoch, since: now },
      rate: new RateWindow(this.rateWindowMs, now),
      collectedSince: now,
      messages: new Map(),
      satellites: new Map(),
      signals: new Map(),
      decodeErrors: 0,
      hasSatelliteData: false,
    };
  }
}
