import * as path from 'path';
import type { AlertThresholds, CounterPolicy } from '@castermon/shared';
import { DEFAULT_ALERT_THRESHOLDS } from './alerts/evaluator.js';
import { DEFAULT_RECONNECT_POLICY, type ReconnectPolicy } from './ntrip/reconnect.js';
import { DEFAULT_SESSION_TIMINGS, type SessionTimings } from './ntrip/session.js';

// ============================================================================
// CasterMon configuration (environment)
// ============================================================================

export interface MonitorConfig {
  port: number;
  dataDir: string;
  databaseFile: string;
  castersFile?: string;
  timings: SessionTimings;
  reconnect: ReconnectPolicy;
  rateWindowMs: number;
  satelliteWindowMs: number;
  counterPolicy: CounterPolicy;
  alerts: AlertThresholds;
  tickIntervalMs: number;
  shutdownTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readCounterPolicy(env: Env): CounterPolicy {
  const raw = env.COUNTER_POLICY?.trim().toLowerCase();
  if (!raw) return 'reset';
  if (raw === 'reset' || raw === 'persist') return raw;
  throw new Error(`COUNTER_POLICY must be "reset" or "persist" (got "${env.COUNTER_POLICY}")`);
}

export function loadConfig(env: Env = process.env): MonitorConfig {
  const dataDir = env.CASTERMON_DATA_DIR?.trim() || path.join(process.cwd(), 'data');
  const castersFile = env.NTRIP_CASTERS_PATH?.trim() || undefined;

  return {
    port: readInt(env, 'PORT', 3410, 1),
    dataDir,
    databaseFile: path.join(dataDir, 'castermon.db'),
    castersFile,
    timings: {
      connectTimeoutMs: readInt(env, 'CONNECT_TIMEOUT_MS', DEFAULT_SESSION_TIMINGS.connectTimeoutMs, 1),
      idleWarningMs: readInt(env, 'IDLE_WARNING_MS', DEFAULT_SESSION_TIMINGS.idleWarningMs, 1),
      idleTimeoutMs: readInt(env, 'IDLE_TIMEOUT_MS', DEFAULT_SESSION_TIMINGS.idleTimeoutMs, 1),
    },
    reconnect: {
      maxAttempts: readInt(env, 'RECONNECT_MAX_ATTEMPTS', DEFAULT_RECONNECT_POLICY.maxAttempts),
      retryDelayMs: readInt(env, 'RECONNECT_DELAY_MS', DEFAULT_RECONNECT_POLICY.retryDelayMs),
    },
    rateWindowMs: readInt(env, 'RATE_WINDOW_MS', 10_000, 1000),
    satelliteWindowMs: readInt(env, 'SATELLITE_WINDOW_MS', 60_000, 1000),
    counterPolicy: readCounterPolicy(env),
    alerts: {
      startupGraceMs: readInt(env, 'ALERT_STARTUP_GRACE_MS', DEFAULT_ALERT_THRESHOLDS.startupGraceMs),
      cooldownMs: readInt(env, 'ALERT_COOLDOWN_MS', DEFAULT_ALERT_THRESHOLDS.cooldownMs),
      lowRateWindowMs: readInt(env, 'LOW_RATE_WINDOW_MS', DEFAULT_ALERT_THRESHOLDS.lowRateWindowMs),
      minBytesPerSecond: readInt(env, 'LOW_RATE_BPS', DEFAULT_ALERT_THRESHOLDS.minBytesPerSecond),
      minSatellites: readInt(env, 'LOW_SATELLITES', DEFAULT_ALERT_THRESHOLDS.minSatellites),
    },
    tickIntervalMs: readInt(env, 'TICK_INTERVAL_MS', 1000, 100),
    shutdownTimeoutMs: readInt(env, 'SHUTDOWN_TIMEOUT_MS', 2000, 0),
  };
}
