import { EventEmitter } from 'events';
import type {
  AlertEvent, AlertThresholds, PublicStationConfig, SessionSnapshot, StationConfig, StationView, ThroughputReading,
} from '@castermon/shared';
import { AlertEvaluator } from './alerts/evaluator.js';
import type { SessionDataEvent } from './ntrip/session.js';
import { SessionSupervisor, type SupervisorOptions, type TerminationEvent } from './ntrip/supervisor.js';
import { StatisticsAggregator, type AggregatorOptions } from './stats/aggregator.js';
import type { StationStore } from './stations/store.js';

export interface MonitorOptions extends SupervisorOptions {
  aggregator?: AggregatorOptions;
  thresholds?: Partial<AlertThresholds>;
  tickIntervalMs?: number;
  shutdownTimeoutMs?: number;
}

export interface MonitorTick {
  timestamp: number;
  alerts: AlertEvent[];
}

export function toPublicStation(config: StationConfig): PublicStationConfig {
  const station: PublicStationConfig = {
    id: config.id,
    name: config.name,
    host: config.host,
    port: config.port,
    mountpoint: config.mountpoint,
    username: config.username,
  };
  if (config.latitude !== undefined) station.latitude = config.latitude;
  if (config.longitude !== undefined) station.longitude = config.longitude;
  if (config.altitude !== undefined) station.altitude = config.altitude;
  return station;
}

/**
 * CasterMonitor: supervisor → statistics → alerts.
 *
 * Events: 'phase' (SessionSnapshot), 'terminated' (TerminationEvent),
 * 'alert' (AlertEvent), 'tick' (MonitorTick).
 */
export class CasterMonitor extends EventEmitter {
  readonly supervisor: SessionSupervisor;
  readonly aggregator: StatisticsAggregator;
  readonly alerts: AlertEvaluator;
  private readonly now: () => number;
  private readonly tickIntervalMs: number;
  private readonly shutdownTimeoutMs: number;
  private tickTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: MonitorOptions = {}) {
    super();
    this.now = options.now ?? Date.now;
    this.tickIntervalMs = options.tickIntervalMs ?? 1000;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 2000;
    this.supervisor = new SessionSupervisor(options);
    this.aggregator = new StatisticsAggregator(options.aggregator);
    this.alerts = new AlertEvaluator(options.thresholds);

    this.supervisor.on('started', (stationId: string) => this.alerts.startStation(stationId, this.now()));
    this.supervisor.on('established', (snap: SessionSnapshot) => this.aggregator.beginConnection(snap.stationId, this.now()));
    this.supervisor.on('data', (event: SessionDataEvent) => this.aggregator.recordData(event));
    this.supervisor.on('phase', (snap: SessionSnapshot) => this.emit('phase', snap));
    this.supervisor.on('terminated', (event: TerminationEvent) => this.emit('terminated', event));
    this.alerts.on('alert', (event: AlertEvent) => this.emit('alert', event));
  }

  /** Adds every station not yet supervised and starts it. */
  loadStations(configs: StationConfig[]): void {
    for (const config of configs) {
      if (this.supervisor.has(config.id)) continue;
      this.supervisor.addStation(config);
      this.supervisor.start(config.id);
    }
  }

  /** Follows station changes made through the store. */
  attachStore(store: StationStore): void {
    store.on('added', (config: StationConfig) => this.loadStations([config]));
    store.on('updated', (config: StationConfig) => {
      this.updateStation(config).catch((err) => {
        console.error(`🗂️ Failed to apply update for ${config.id}:`, err);
      });
    });
    store.on('removed', (stationId: string) => {
      this.removeStation(stationId).catch((err) => {
        console.error(`🗂️ Failed to remove ${stationId}:`, err);
      });
    });
  }

  async updateStation(config: StationConfig): Promise<void> {
    if (!this.supervisor.has(config.id)) {
      this.loadStations([config]);
      return;
    }
    await this.supervisor.updateStation(config);
  }

  async removeStation(stationId: string): Promise<void> {
    await this.supervisor.removeStation(stationId);
    this.aggregator.removeStation(stationId);
    this.alerts.removeStation(stationId);
  }

  start(stationId: string): boolean {
    return this.supervisor.start(stationId);
  }

  stop(stationId: string): Promise<void> {
    return this.supervisor.stop(stationId);
  }

  reconnectAll(): string[] {
    return this.supervisor.reconnectAll();
  }

  /** Evaluates alerts for every station that has been started at least once and drops idle throughput readers. */
  tick(now = this.now()): MonitorTick {
    this.aggregator.evictIdleConsumers(now);
    const alerts: AlertEvent[] = [];
    for (const stationId of this.supervisor.getStationIds()) {
      const snapshot = this.supervisor.getSnapshot(stationId);
      if (!snapshot) continue;
      alerts.push(...this.alerts.evaluate(stationId, {
        timestamp: now,
        phase: snapshot.phase,
        bytesPerSecond: this.aggregator.getBytesPerSecond(stationId, now),
        satelliteCount: this.aggregator.getSatelliteCount(stationId, now),
      }));
    }
    const tick: MonitorTick = { timestamp: now, alerts };
    this.emit('tick', tick);
    return tick;
  }

  startTicking(): void {
    if (this.tickTimer) return;
    this.tickTimer = setInterval(() => this.tick(), this.tickIntervalMs);
  }

  stopTicking(): void {
    if (this.tickTimer) clearInterval(this.tickTimer);
    this.tickTimer = null;
  }

  getStationView(stationId: string, now = this.now()): StationView | undefined {
    const config = this.supervisor.getConfig(stationId);
    if (!config) return undefined;
    return {
      station: toPublicStation(config),
      session: this.supervisor.getSnapshot(stationId),
      statistics: this.aggregator.getStatistics(stationId, now),
    };
  }

  getStationViews(now = this.now()): StationView[] {
    const views: StationView[] = [];
    for (const id of this.supervisor.getStationIds()) {
      const view = this.getStationView(id, now);
      if (view) views.push(view);
    }
    return views;
  }

  readThroughput(consumerId: string, stationId: string, now = this.now()): ThroughputReading | undefined {
    if (!this.supervisor.has(stationId)) return undefined;
    return this.aggregator.readThroughput(consumerId, stationId, now);
  }

  async shutdown(): Promise<void> {
    this.stopTicking();
    await this.supervisor.shutdown(this.shutdownTimeoutMs);
  }
}
