// ============================================================================
// CasterMon API / WebSocket payloads
// ============================================================================
import type { AlertEvent } from './alerts.js';
import type { SessionSnapshot } from './session.js';
import type { StationConfig } from './stations.js';
import type { StationStatistics } from './statistics.js';

// Credentials never leave the server
export type PublicStationConfig = Omit<StationConfig, 'password'>;

export interface StationView {
  station: PublicStationConfig;
  session?: SessionSnapshot;
  statistics?: StationStatistics;
}

export type MonitorServerMessage =
  | { type: 'stations'; stations: StationView[] }
  | { type: 'phase'; session: SessionSnapshot }
  | { type: 'alert'; alert: AlertEvent }
  | { type: 'error'; message: string };

export type MonitorClientCommand =
  | { type: 'start'; stationId: string }
  | { type: 'stop'; stationId: string }
  | { type: 'reconnect_all' };
