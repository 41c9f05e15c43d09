import { EventEmitter } from 'events';
import type { SessionSnapshot, StationConfig } from '@castermon/shared';
import { DEFAULT_RECONNECT_POLICY, decideReconnect, type ReconnectDecision, type ReconnectPolicy } from './reconnect.js';
import { StreamSession, type SessionDataEvent, type SessionTermination, type SessionTimings } from './session.js';
import type { SocketFactory } from './transport.js';

export interface SupervisorOptions {
  policy?: Partial<ReconnectPolicy>;
  timings?: Partial<SessionTimings>;
  createSocket?: SocketFactory;
  now?: () => number;
}

export interface TerminationEvent {
  termination: SessionTermination;
  decision: ReconnectDecision;
}

interface SupervisedStation {
  config: StationConfig;
  session: StreamSession | null;
  autoRetry: boolean;
  retryTimer: ReturnType<typeof setTimeout> | null;
  retryAt?: number;
  removed: boolean;
}

/**
 * Owns one StreamSession per station and applies the reconnect policy.
 * Re-emits 'phase', 'established' and 'data' from its sessions, emits 'started'
 * (station id) for every explicit start and 'terminated' (TerminationEvent) with
 * the policy decision.
 */
export class SessionSupervisor extends EventEmitter {
  private stations = new Map<string, SupervisedStation>();
  private readonly policy: ReconnectPolicy;
  private readonly options: SupervisorOptions;
  private readonly now: () => number;
  private shuttingDown = false;

  constructor(options: SupervisorOptions = {}) {
    super();
    this.options = options;
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.policy };
    this.now = options.now ?? Date.now;
  }

  has(stationId: string): boolean { return this.stations.has(stationId); }
  getStationIds(): string[] { return [...this.stations.keys()]; }
  getConfig(stationId: string): StationConfig | undefined { return this.stations.get(stationId)?.config; }

  getSnapshot(stationId: string): SessionSnapshot | undefined {
    const entry = this.stations.get(stationId);
    if (!entry?.session) return undefined;
    return { ...entry.session.getSnapshot(), retryAt: entry.retryAt };
  }

  getSnapshots(): SessionSnapshot[] {
    const out: SessionSnapshot[] = [];
    for (const id of this.stations.keys()) {
      const snap = this.getSnapshot(id);
      if (snap) out.push(snap);
    }
    return out;
  }

  addStation(config: StationConfig): void {
    if (this.stations.has(config.id)) throw new Error(`Station already supervised: ${config.id}`);
    this.stations.set(config.id, { config, session: null, autoRetry: false, retryTimer: null, removed: false });
  }

  /** Replaces a station's configuration; a running session is restarted with it. */
  async updateStation(config: StationConfig): Promise<void> {
    const entry = this.require(config.id);
    const wasRunning = (entry.session?.isActive() ?? false) || entry.retryTimer !== null;
    entry.config = config;
    if (wasRunning) {
      await this.stopEntry(entry);
      if (!entry.removed) this.start(config.id);
    }
  }

  /** Forgets the station at once; a later start for it throws. */
  async removeStation(stationId: string): Promise<void> {
    const entry = this.stations.get(stationId);
    if (!entry) return;
    entry.removed = true;
    this.stations.delete(stationId);
    await this.stopEntry(entry);
    entry.session?.removeAllListeners();
  }

  /** Starts a fresh session. Returns false when one is already active or the supervisor is shutting down. */
  start(stationId: string): boolean {
    const entry = this.require(stationId);
    if (this.shuttingDown || entry.session?.isActive()) return false;

    this.cancelRetry(entry);
    entry.autoRetry = true;
    // The previous session is terminated or stopped: it holds no socket or timers
    entry.session?.removeAllListeners();

    const session = new StreamSession(entry.config, {
      timings: this.options.timings,
      createSocket: this.options.createSocket,
      now: this.now,
    });
    entry.session = session;

    session.on('phase', (snap: SessionSnapshot) => {
      // Sent from onTerminated once the retry time is known
      if (snap.phase === 'terminated') return;
      this.emit('phase', { ...snap, retryAt: entry.retryAt });
    });
    session.on('established', (snap: SessionSnapshot) => this.emit('established', snap));
    session.on('data', (event: SessionDataEvent) => this.emit('data', event));
    session.on('terminated', (termination: SessionTermination) => this.onTerminated(entry, session, termination));

    this.emit('started', stationId);
    session.connect();
    return true;
  }

  /** User stop: no automatic retry until the next explicit start. */
  async stop(stationId: string): Promise<void> {
    await this.stopEntry(this.require(stationId));
  }

  /** Starts every station whose session is not currently active. */
  reconnectAll(): string[] {
    const started: string[] = [];
    for (const [id, entry] of this.stations) {
      if (entry.session?.isActive()) continue;
      if (this.start(id)) started.push(id);
    }
    if (started.length > 0) console.log(`🔁 Reconnecting ${started.length} station(s)`);
    else console.log('🔁 All stations already connected');
    return started;
  }

  /** Stops every session and waits (bounded) for their sockets to close. */
  async shutdown(timeoutMs = 2000): Promise<void> {
    this.shuttingDown = true;
    const closing = [...this.stations.values()].map((entry) => this.stopEntry(entry));

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });
    const outcome = await Promise.race([Promise.all(closing).then(() => 'closed' as const), timeout]);
    clearTimeout(timer);

    if (outcome === 'timeout') console.warn(`🔁 Shutdown: sessions still closing after ${timeoutMs}ms`);
    for (const entry of this.stations.values()) entry.session?.removeAllListeners();
  }

  private onTerminated(entry: SupervisedStation, session: StreamSession, termination: SessionTermination) {
    if (entry.session !== session) return;

    const decision = decideReconnect(termination.failureKind, termination.reconnectAttempts, this.policy, !entry.autoRetry);
    if (decision.action === 'retry') {
      session.recordRetryAttempt();
      entry.retryAt = this.now() + decision.delayMs;
      console.log(`🔁 [${entry.config.id}] reconnecting (${decision.attempt}/${this.policy.maxAttempts}) in ${decision.delayMs / 1000}s`);
      entry.retryTimer = setTimeout(() => {
        entry.retryTimer = null;
        entry.retryAt = undefined;
        if (!entry.autoRetry || entry.session !== session) return;
        session.connect();
      }, decision.delayMs);
    } else {
      console.log(`🔁 [${entry.config.id}] not retrying: ${decision.reason}`);
    }

    this.emit('phase', { ...session.getSnapshot(), retryAt: entry.retryAt });
    const event: TerminationEvent = { termination, decision };
    this.emit('terminated', event);
  }

  private stopEntry(entry: SupervisedStation): Promise<void> {
    entry.autoRetry = false;
    this.cancelRetry(entry);
    return entry.session ? entry.session.stop() : Promise.resolve();
  }

  private cancelRetry(entry: SupervisedStation) {
    if (entry.retryTimer) clearTimeout(entry.retryTimer);
    entry.retryTimer = null;
    entry.retryAt = undefined;
  }

  private require(stationId: string): SupervisedStation {
    const entry = this.stations.get(stationId);
    if (!entry) throw new Error(`Unknown station: ${stationId}`);
    return entry;
  }
}
