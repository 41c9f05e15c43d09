// ============================================================================
// CasterMon Alert Types
// ============================================================================

export type AlertKind = 'connection_lost' | 'connection_restored' | 'low_data_rate' | 'low_satellites';

export const ALERT_KINDS: readonly AlertKind[] = ['connection_lost', 'connection_restored', 'low_data_rate', 'low_satellites'];

export interface AlertEvent {
  id: string;
  stationId: string;
  kind: AlertKind;
  state: 'raised' | 'cleared';
  timestamp: number;
  message: string;
  value?: number;
}

export interface AlertThresholds {
  startupGraceMs: number;
  cooldownMs: number;
  lowRateWindowMs: number;
  minBytesPerSecond: number;
  minSatellites: number;
}
