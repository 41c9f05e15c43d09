// ============================================================================
// CasterMon Statistics Types
// ============================================================================
import type { Constellation, GeodeticPosition } from './rtcm.js';

export type CounterPolicy = 'reset' | 'persist';

export interface MessageTypeCount {
  messageType: number;
  description: string;
  count: number;
  lastReceived: number;
}

export interface ConstellationSummary {
  constellation: Constellation;
  satellites: number[];
  signals: string[];
}

export interface StationStatistics {
  stationId: string;
  collectedSince: number;
  totalBytes: number;
  bytesPerSecond: number;
  messages: MessageTypeCount[];
  constellations: ConstellationSummary[];
  satelliteCount: number;
  referencePosition?: GeodeticPosition;
  decodeErrors: number;
}

export interface ThroughputReading {
  consumerId: string;
  stationId: string;
  deltaBytes: number;
  bytesPerSecond: number;
  totalBytes: number;
  timestamp: number;
}
