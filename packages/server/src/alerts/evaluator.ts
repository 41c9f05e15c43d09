import { EventEmitter } from 'events';
import type { AlertEvent, AlertKind, AlertThresholds, SessionPhase } from '@castermon/shared';

export const DEFAULT_ALERT_THRESHOLDS: AlertThresholds = {
  startupGraceMs: 15_000,
  cooldownMs: 5 * 60_000,
  lowRateWindowMs: 30_000,
  minBytesPerSecond: 50,
  minSatellites: 8,
};

export interface AlertSample {
  timestamp: number;
  phase: SessionPhase;
  bytesPerSecond: number;
  satelliteCount?: number;
}

export interface AlertKindState {
  raised: boolean;
  lastRaisedAt?: number;
}

export interface StationAlertState {
  startedAt: number;
  lastOnline?: boolean;     // undefined until the first sample
  lowRateSince?: number;
  kinds: Record<AlertKind, AlertKindState>;
}

export function createAlertState(startedAt: number): StationAlertState {
  return {
    startedAt,
    kinds: {
      connection_lost: { raised: false },
      connection_restored: { raised: false },
      low_data_rate: { raised: false },
      low_satellites: { raised: false },
    },
  };
}

function uid(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

function clearedKinds(kinds: Record<AlertKind, AlertKindState>): Record<AlertKind, AlertKindState> {
  return {
    connection_lost: { raised: false, lastRaisedAt: kinds.connection_lost.lastRaisedAt },
    connection_restored: { raised: false, lastRaisedAt: kinds.connection_restored.lastRaisedAt },
    low_data_rate: { raised: false, lastRaisedAt: kinds.low_data_rate.lastRaisedAt },
    low_satellites: { raised: false, lastRaisedAt: kinds.low_satellites.lastRaisedAt },
  };
}

const isOnline = (phase: SessionPhase) => phase === 'connected' || phase === 'idle_warning';

/**
 * Pure alert step: (previous state, new sample) → (next state, events).
 * Callable on any schedule; the outcome depends on sample timestamps, not on call cadence.
 */
export function evaluateAlerts(
  stationId: string,
  state: StationAlertState,
  sample: AlertSample,
  thresholds: AlertThresholds = DEFAULT_ALERT_THRESHOLDS,
): { state: StationAlertState; events: AlertEvent[] } {
  const now = sample.timestamp;
  const online = isOnline(sample.phase);
  // A user-stopped station is not monitored: no baseline, nothing raised
  if (sample.phase === 'disconnected') {
    return { state: { ...createAlertState(state.startedAt), kinds: clearedKinds(state.kinds) }, events: [] };
  }
  const kinds: Record<AlertKind, AlertKindState> = {
    connection_lost: { ...state.kinds.connection_lost },
    connection_restored: { ...state.kinds.connection_restored },
    low_data_rate: { ...state.kinds.low_data_rate },
    low_satellites: { ...state.kinds.low_satellites },
  };
  const events: AlertEvent[] = [];
  let lowRateSince = state.lowRateSince;

  const canRaise = (kind: AlertKind) => {
    const k = kinds[kind];
    return !k.raised && (k.lastRaisedAt === undefined || now - k.lastRaisedAt >= thresholds.cooldownMs);
  };
  const raise = (kind: AlertKind, message: string, value?: number) => {
    if (!canRaise(kind)) return;
    kinds[kind] = { raised: true, lastRaisedAt: now };
    events.push({ id: `alert-${uid()}`, stationId, kind, state: 'raised', timestamp: now, message, value });
  };
  const clear = (kind: AlertKind, message?: string) => {
    if (!kinds[kind].raised) return;
    kinds[kind] = { ...kinds[kind], raised: false };
    if (message) events.push({ id: `alert-${uid()}`, stationId, kind, state: 'cleared', timestamp: now, message });
  };

  // ── Connectivity transitions ──
  const changed = state.lastOnline !== undefined && state.lastOnline !== online;
  const inGrace = now - state.startedAt < thresholds.startupGraceMs;
  if (online) {
    const wasLost = kinds.connection_lost.raised;
    clear('connection_lost');
    if (changed && !inGrace && wasLost) raise('connection_restored', 'Connection restored');
  } else {
    clear('connection_restored');
    if (changed && !inGrace) raise('connection_lost', `Connection lost (${sample.phase})`);
  }

  // ── Data rate ──
  if (!online) {
    lowRateSince = undefined;
    clear('low_data_rate');
  } else if (sample.bytesPerSecond < thresholds.minBytesPerSecond) {
    lowRateSince ??= now;
    if (now - lowRateSince >= thresholds.lowRateWindowMs) {
      raise('low_data_rate', `Data rate ${Math.round(sample.bytesPerSecond)} B/s below ${thresholds.minBytesPerSecond} B/s`, sample.bytesPerSecond);
    }
  } else {
    lowRateSince = undefined;
    clear('low_data_rate', `Data rate recovered (${Math.round(sample.bytesPerSecond)} B/s)`);
  }

  // ── Satellites ──
  if (!online || sample.satelliteCount === undefined) {
    clear('low_satellites');
  } else if (sample.satelliteCount < thresholds.minSatellites) {
    raise('low_satellites', `Only ${sample.satelliteCount} satellites in view`, sample.satelliteCount);
  } else {
    clear('low_satellites', `${sample.satelliteCount} satellites in view`);
  }

  return {
    state: { startedAt: state.startedAt, lastOnline: online, lowRateSince, kinds },
    events,
  };
}

/**
 * Keeps alert state per station and emits 'alert' (AlertEvent) for every raise/clear.
 */
export class AlertEvaluator extends EventEmitter {
  private states = new Map<string, StationAlertState>();
  private readonly thresholds: AlertThresholds;

  constructor(thresholds: Partial<AlertThresholds> = {}) {
    super();
    this.thresholds = { ...DEFAULT_ALERT_THRESHOLDS, ...thresholds };
  }

  /** Called on an explicit start; opens the startup grace period. Cooldowns carry over. */
  startStation(stationId: string, now: number): void {
    const existing = this.states.get(stationId);
    this.states.set(stationId, existing ? { ...createAlertState(now), kinds: clearedKinds(existing.kinds) } : createAlertState(now));
  }

  removeStation(stationId: string): void {
    this.states.delete(stationId);
  }

  getState(stationId: string): StationAlertState | undefined {
    return this.states.get(stationId);
  }

  evaluate(stationId: string, sample: AlertSample): AlertEvent[] {
    const previous = this.states.get(stationId) ?? createAlertState(sample.timestamp);
    const { state, events } = evaluateAlerts(stationId, previous, sample, this.thresholds);
    this.states.set(stationId, state);
    for (const event of events) {
      console.log(`🚨 [${stationId}] ${event.kind} ${event.state}: ${event.message}`);
      this.emit('alert', event);
    }
    return events;
  }
}
