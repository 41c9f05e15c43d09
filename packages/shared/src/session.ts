// ============================================================================
// CasterMon Session Types
// ============================================================================

export type SessionPhase = 'disconnected' | 'connecting' | 'connected' | 'idle_warning' | 'terminated';

export type FailureKind = 'network_error' | 'idle_timeout' | 'mountpoint_closed' | 'auth_failure';

export interface SessionDiagnostics {
  framesExtracted: number;
  bytesDiscarded: number;
  crcFailures: number;
}

export interface SessionSnapshot {
  stationId: string;
  phase: SessionPhase;
  totalBytesReceived: number;
  lastDataTimestamp?: number;
  connectedSince?: number;
  uptimeMs: number;
  reconnectAttempts: number;
  failureKind?: FailureKind;
  failureReason?: string;
  startedAt?: number;
  userStopped: boolean;
  retryAt?: number;
  diagnostics: SessionDiagnostics;
}
