import { EventEmitter } from 'events';
import type {
  FailureKind, RawFrame, SessionDiagnostics, SessionPhase, SessionSnapshot, StationConfig,
} from '@castermon/shared';
import { FrameBuffer } from './frame-extractor.js';
import { buildMountRequest, parseCasterResponse } from './protocol.js';
import { createTcpSocket, type CasterSocket, type SocketFactory } from './transport.js';

/**
 * Stream Session: one NTRIP connection to one caster mountpoint.
 *
 *   disconnected → connecting → connected ⇄ idle_warning
 *                       │            │            │
 *                       └────────────┴────────────┴──→ terminated(failureKind)
 *
 * Events:
 * - 'phase'       (SessionSnapshot)    every phase change
 * - 'established' (SessionSnapshot)    caster accepted the request
 * - 'data'        (SessionDataEvent)   every received chunk of stream data
 * - 'terminated'  (SessionTermination) after the snapshot already shows `terminated`
 *
 * A user stop moves the session to `disconnected` and emits no termination.
 */

export interface SessionTimings {
  connectTimeoutMs: number;
  idleWarningMs: number;
  idleTimeoutMs: number;
}

export const DEFAULT_SESSION_TIMINGS: SessionTimings = {
  connectTimeoutMs: 10_000,
  idleWarningMs: 5_000,
  idleTimeoutMs: 10_000,
};

export interface SessionDataEvent {
  stationId: string;
  bytes: number;
  totalBytes: number;
  frames: RawFrame[];
  timestamp: number;
}

export interface SessionTermination {
  stationId: string;
  failureKind: FailureKind;
  reason: string;
  reconnectAttempts: number;
  timestamp: number;
}

export interface StreamSessionOptions {
  timings?: Partial<SessionTimings>;
  createSocket?: SocketFactory;
  now?: () => number;
}

const CRLF = Buffer.from('\r\n');

const emptyDiagnostics = (): SessionDiagnostics => ({ framesExtracted: 0, bytesDiscarded: 0, crcFailures: 0 });

export class StreamSession extends EventEmitter {
  readonly station: StationConfig;
  private readonly timings: SessionTimings;
  private readonly createSocket: SocketFactory;
  private readonly now: () => number;

  private phase: SessionPhase = 'disconnected';
  private socket: CasterSocket | null = null;
  private frameBuffer = new FrameBuffer();
  private responseHead: Buffer = Buffer.alloc(0);
  private handshakeComplete = false;
  private streamStarted = false;
  // Rest of the optional blank line after `ICY 200 OK`, when it has not arrived yet
  private pendingBlankLine: Buffer | null = null;

  private totalBytesReceived = 0;
  private lastDataTimestamp?: number;
  private connectedSince?: number;
  private uptimeAccumulatedMs = 0;
  private reconnectAttempts = 0;
  private failureKind?: FailureKind;
  private failureReason?: string;
  private startedAt?: number;
  private userStopped = false;
  private diagnostics = emptyDiagnostics();

  private connectTimer: ReturnType<typeof setTimeout> | null = null;
  private warningTimer: ReturnType<typeof setTimeout> | null = null;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(station: StationConfig, options: StreamSessionOptions = {}) {
    super();
    this.station = station;
    this.timings = { ...DEFAULT_SESSION_TIMINGS, ...options.timings };
    this.createSocket = options.createSocket ?? createTcpSocket;
    this.now = options.now ?? Date.now;
  }

  get id(): string { return this.station.id; }
  getPhase(): SessionPhase { return this.phase; }
  getReconnectAttempts(): number { return this.reconnectAttempts; }

  /** True while a socket is open or being opened */
  isActive(): boolean {
    return this.phase === 'connecting' || this.phase === 'connected' || this.phase === 'idle_warning';
  }

  getUptimeMs(): number {
    const running = this.connectedSince !== undefined ? this.now() - this.connectedSince : 0;
    return this.uptimeAccumulatedMs + running;
  }

  getSnapshot(): SessionSnapshot {
    return {
      stationId: this.station.id,
      phase: this.phase,
      totalBytesReceived: this.totalBytesReceived,
      lastDataTimestamp: this.lastDataTimestamp,
      connectedSince: this.connectedSince,
      uptimeMs: this.getUptimeMs(),
      reconnectAttempts: this.reconnectAttempts,
      failureKind: this.failureKind,
      failureReason: this.failureReason,
      startedAt: this.startedAt,
      userStopped: this.userStopped,
      diagnostics: { ...this.diagnostics },
    };
  }

  /** Counts one automatic retry; the counter only drops back to zero once stream data flows */
  recordRetryAttempt(): number {
    this.reconnectAttempts++;
    return this.reconnectAttempts;
  }

  connect(): void {
    if (this.isActive()) return;
    const { host, port, mountpoint } = this.station;

    this.userStopped = false;
    this.totalBytesReceived = 0;
    this.lastDataTimestamp = undefined;
    this.connectedSince = undefined;
    this.uptimeAccumulatedMs = 0;
    this.failureKind = undefined;
    this.failureReason = undefined;
    this.handshakeComplete = false;
    this.streamStarted = false;
    this.pendingBlankLine = null;
    this.responseHead = Buffer.alloc(0);
    this.frameBuffer.clear();
    this.diagnostics = emptyDiagnostics();
    this.startedAt = this.now();

    console.log(`📡 [${this.id}] connecting to ${host}:${port}/${mountpoint}...`);
    const sock = this.createSocket();
    this.socket = sock;
    this.setPhase('connecting');

    this.connectTimer = setTimeout(() => {
      if (this.socket !== sock) return;
      this.fail('network_error', `Connection to ${host}:${port} timed out`);
    }, this.timings.connectTimeoutMs);

    sock.on('connect', () => {
      if (this.socket !== sock) return;
      sock.write(buildMountRequest(this.station));
    });

    sock.on('data', (chunk: Buffer) => {
      if (this.socket !== sock) return;
      if (!this.handshakeComplete) {
        this.onResponseData(chunk);
        return;
      }
      const data = this.trimBlankLine(chunk);
      if (data.length > 0) this.onStreamData(data);
    });

    sock.on('error', (err: Error) => {
      if (this.socket !== sock) return;
      this.fail('network_error', err.message);
    });

    sock.on('close', () => {
      if (this.socket !== sock) return;
      if (this.streamStarted) this.fail('mountpoint_closed', 'Caster closed the stream');
      else this.fail('network_error', 'Connection closed by caster');
    });

    sock.connect(port, host);
  }

  /** User stop. Idempotent; resolves once the socket has closed. */
  stop(): Promise<void> {
    this.userStopped = true;
    this.clearTimers();
    this.pauseUptime();

    const sock = this.socket;
    this.socket = null;
    if (this.phase !== 'disconnected') {
      console.log(`📡 [${this.id}] stopped`);
      this.setPhase('disconnected');
    }
    if (!sock) return Promise.resolve();

    return new Promise((resolve) => {
      sock.once('close', () => resolve());
      sock.destroy();
    });
  }

  // ── Handshake ──

  private onResponseData(chunk: Buffer) {
    this.responseHead = Buffer.concat([this.responseHead, chunk]);
    const response = parseCasterResponse(this.responseHead);

    if (response.status === 'incomplete') return;
    if (response.status === 'rejected') {
      this.fail('auth_failure', response.reason);
      return;
    }

    this.handshakeComplete = true;
    this.responseHead = Buffer.alloc(0);
    this.pendingBlankLine = response.protocol === 'icy' && response.body.length === 0 ? CRLF : null;
    if (this.connectTimer) { clearTimeout(this.connectTimer); this.connectTimer = null; }

    this.connectedSince = this.now();
    console.log(`📡 [${this.id}] stream accepted (${response.protocol === 'icy' ? 'ICY 200 OK' : 'HTTP 200'})`);
    this.setPhase('connected');
    this.armIdleTimers();
    this.emit('established', this.getSnapshot());

    if (response.body.length > 0) this.onStreamData(response.body);
  }

  // ── Stream data ──

  private trimBlankLine(chunk: Buffer): Buffer {
    const expected = this.pendingBlankLine;
    if (!expected) return chunk;
    let n = 0;
    while (n < expected.length && n < chunk.length && chunk[n] === expected[n]) n++;
    this.pendingBlankLine = n === chunk.length && n < expected.length ? expected.subarray(n) : null;
    return chunk.subarray(n);
  }

  private onStreamData(chunk: Buffer) {
    const now = this.now();
    this.totalBytesReceived += chunk.length;
    this.lastDataTimestamp = now;

    if (!this.streamStarted) {
      this.streamStarted = true;
      this.reconnectAttempts = 0;
    }

    if (this.phase === 'idle_warning') {
      this.connectedSince = now;
      console.log(`📡 [${this.id}] data resumed`);
      this.setPhase('connected');
    }
    this.armIdleTimers();

    this.frameBuffer.append(chunk);
    const result = this.frameBuffer.drain();
    this.diagnostics.framesExtracted += result.frames.length;
    this.diagnostics.bytesDiscarded += result.bytesDiscarded;
    this.diagnostics.crcFailures += result.crcFailures;

    const event: SessionDataEvent = {
      stationId: this.id,
      bytes: chunk.length,
      totalBytes: this.totalBytesReceived,
      frames: result.frames,
      timestamp: now,
    };
    this.emit('data', event);
  }

  // ── Idle watchdog ──

  private armIdleTimers() {
    if (this.warningTimer) clearTimeout(this.warningTimer);
    if (this.idleTimer) clearTimeout(this.idleTimer);

    this.warningTimer = setTimeout(() => {
      this.warningTimer = null;
      if (this.phase !== 'connected') return;
      this.pauseUptime();
      console.warn(`📡 [${this.id}] no data for ${this.timings.idleWarningMs / 1000}s`);
      this.setPhase('idle_warning');
    }, this.timings.idleWarningMs);

    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.fail('idle_timeout', `No data received for ${this.timings.idleTimeoutMs / 1000}s`);
    }, this.timings.idleTimeoutMs);
  }

  // ── Termination ──

  private fail(kind: FailureKind, reason: string) {
    const sock = this.socket;
    this.socket = null;
    this.clearTimers();
    this.pauseUptime();

    this.failureKind = kind;
    this.failureReason = reason;
    console.warn(`📡 [${this.id}] terminated (${kind}): ${reason}`);
    this.setPhase('terminated');

    sock?.destroy();

    const termination: SessionTermination = {
      stationId: this.id,
      failureKind: kind,
      reason,
      reconnectAttempts: this.reconnectAttempts,
      timestamp: this.now(),
    };
    this.emit('terminated', termination);
  }

  private pauseUptime() {
    if (this.connectedSince === undefined) return;
    this.uptimeAccumulatedMs += this.now() - this.connectedSince;
    this.connectedSince = undefined;
  }

  private clearTimers() {
    if (this.connectTimer) { clearTimeout(this.connectTimer); this.connectTimer = null; }
    if (this.warningTimer) { clearTimeout(this.warningTimer); this.warningTimer = null; }
    if (this.idleTimer) { clearTimeout(this.idleTimer); this.idleTimer = null; }
  }

  private setPhase(phase: SessionPhase) {
    this.phase = phase;
    this.emit('phase', this.getSnapshot());
  }
}
