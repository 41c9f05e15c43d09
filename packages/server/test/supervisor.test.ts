import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { SessionSnapshot, StationConfig } from '@castermon/shared';
import { SessionSupervisor, type TerminationEvent } from '../src/ntrip/supervisor.js';
import { FakeSocket, fakeSocketFactory } from './helpers/fake-socket.js';
import { buildFrame, messagePayload } from './helpers/rtcm.js';

function stationConfig(id: string, mountpoint = 'TEST00'): StationConfig {
  return { id, name: id, host: 'caster.example.test', port: 2101, mountpoint, username: 'test-user', password: 'test-secret' };
}

function setup() {
  const sockets = fakeSocketFactory();
  const supervisor = new SessionSupervisor({ createSocket: sockets.create, now: () => Date.now() });
  const terminations: TerminationEvent[] = [];
  supervisor.on('terminated', (event: TerminationEvent) => terminations.push(event));
  return { sockets, supervisor, terminations };
}

/** Closes on a later microtask, like a real socket */
class DeferredCloseSocket extends FakeSocket {
  destroy(): this {
    if (this.destroyed) return this;
    this.destroyed = true;
    queueMicrotask(() => this.emit('close', false));
    return this;
  }
}

function deferredSetup() {
  const sockets: DeferredCloseSocket[] = [];
  const supervisor = new SessionSupervisor({
    createSocket: () => {
      const sock = new DeferredCloseSocket();
      sockets.push(sock);
      return sock;
    },
  });
  return { sockets, supervisor };
}

function establish(sock: FakeSocket) {
  sock.accept();
  sock.receive('ICY 200 OK\r\n');
}

describe('SessionSupervisor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('rejects duplicate and unknown stations', () => {
    const { supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    expect(() => supervisor.addStation(stationConfig('a'))).toThrow('Station already supervised: a');
    expect(() => supervisor.start('missing')).toThrow('Unknown station: missing');
  });

  it('has no snapshot before the first start', () => {
    const { supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    expect(supervisor.getSnapshot('a')).toBeUndefined();
  });

  it('makes at most three reconnect attempts after network errors', () => {
    const { sockets, supervisor, terminations } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');

    for (let i = 0; i < 4; i++) {
      sockets.last().fail('connect ECONNREFUSED');
      vi.advanceTimersByTime(10_000);
    }
    vi.advanceTimersByTime(60_000);

    expect(sockets.sockets).toHaveLength(4);
    expect(terminations.map((t) => t.decision.action)).toEqual(['retry', 'retry', 'retry', 'give_up']);
    expect(terminations.map((t) => t.termination.reconnectAttempts)).toEqual([0, 1, 2, 3]);
    expect(supervisor.getSnapshot('a')).toMatchObject({ phase: 'terminated', failureKind: 'network_error', reconnectAttempts: 3 });
  });

  it('pushes the pending retry time with the terminated phase', () => {
    const { sockets, supervisor } = setup();
    const phases: SessionSnapshot[] = [];
    supervisor.on('phase', (snap: SessionSnapshot) => phases.push(snap));
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');
    const failedAt = Date.now();
    sockets.last().fail('connect ECONNREFUSED');

    const terminated = phases.filter((p) => p.phase === 'terminated');
    expect(terminated).toHaveLength(1);
    expect(terminated[0]).toMatchObject({ retryAt: failedAt + 10_000, reconnectAttempts: 1, failureKind: 'network_error' });
  });

  it('waits the retry delay and exposes when the retry is due', () => {
    const { sockets, supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');
    const failedAt = Date.now();
    sockets.last().fail('connect ECONNREFUSED');

    expect(supervisor.getSnapshot('a')?.retryAt).toBe(failedAt + 10_000);
    vi.advanceTimersByTime(9_999);
    expect(sockets.sockets).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(sockets.sockets).toHaveLength(2);
    expect(supervisor.getSnapshot('a')?.retryAt).toBeUndefined();
  });

  it('starts counting again once stream data has flowed', () => {
    const { sockets, supervisor, terminations } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');

    sockets.last().fail('connect ECONNREFUSED');
    vi.advanceTimersByTime(10_000);
    const sock = sockets.last();
    establish(sock);
    sock.receive(buildFrame(messagePayload(1019, 1)));
    expect(supervisor.getSnapshot('a')?.reconnectAttempts).toBe(0);

    sock.fail('read ECONNRESET');
    expect(terminations.map((t) => t.decision)).toEqual([
      { action: 'retry', delayMs: 10_000, attempt: 1 },
      { action: 'retry', delayMs: 10_000, attempt: 1 },
    ]);
  });

  it('does not retry idle timeouts or rejected requests', () => {
    const { sockets, supervisor, terminations } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.addStation(stationConfig('b'));

    supervisor.start('a');
    establish(sockets.last());
    supervisor.start('b');
    const b = sockets.last();
    b.accept();
    b.receive('HTTP/1.0 401 Unauthorized\r\n\r\n');

    vi.advanceTimersByTime(10_000);  // a: idle timeout
    vi.advanceTimersByTime(60_000);

    expect(sockets.sockets).toHaveLength(2);
    expect(terminations.map((t) => [t.termination.stationId, t.termination.failureKind, t.decision.action])).toEqual([
      ['b', 'auth_failure', 'give_up'],
      ['a', 'idle_timeout', 'give_up'],
    ]);
  });

  it('stop cancels a pending retry', async () => {
    const { sockets, supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');
    sockets.last().fail('connect ECONNREFUSED');

    await supervisor.stop('a');
    vi.advanceTimersByTime(60_000);

    expect(sockets.sockets).toHaveLength(1);
    expect(supervisor.getSnapshot('a')).toMatchObject({ phase: 'disconnected', userStopped: true });
    expect(supervisor.getSnapshot('a')?.retryAt).toBeUndefined();
  });

  it('start refuses a second session while one is active', () => {
    const { sockets, supervisor } = setup();
    const started = vi.fn();
    supervisor.on('started', started);
    supervisor.addStation(stationConfig('a'));

    expect(supervisor.start('a')).toBe(true);
    expect(supervisor.start('a')).toBe(false);
    expect(sockets.sockets).toHaveLength(1);
    expect(started).toHaveBeenCalledTimes(1);
    expect(started).toHaveBeenCalledWith('a');
  });

  it('reconnectAll starts only stations without an active session', () => {
    const { sockets, supervisor } = setup();
    for (const id of ['a', 'b', 'c']) supervisor.addStation(stationConfig(id));
    supervisor.start('a');
    establish(sockets.last());
    supervisor.start('b');
    const b = sockets.last();
    b.accept();
    b.receive('HTTP/1.0 403 Forbidden\r\n\r\n');

    expect(supervisor.reconnectAll()).toEqual(['b', 'c']);
    expect(sockets.sockets).toHaveLength(4);
    expect(supervisor.reconnectAll()).toEqual([]);
  });

  it('restarts a running station when its configuration changes', async () => {
    const { sockets, supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');
    const first = sockets.last();
    establish(first);

    await supervisor.updateStation(stationConfig('a', 'OTHER0'));
    expect(first.destroyed).toBe(true);
    const second = sockets.last();
    expect(second).not.toBe(first);
    second.accept();
    expect(second.written[0].startsWith('GET /OTHER0 HTTP/1.0\r\n')).toBe(true);
    expect(supervisor.getConfig('a')?.mountpoint).toBe('OTHER0');
  });

  it('does not start a stopped station when its configuration changes', async () => {
    const { sockets, supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    await supervisor.updateStation(stationConfig('a', 'OTHER0'));
    expect(sockets.sockets).toHaveLength(0);
  });

  it('removeStation closes the session and forgets the station', async () => {
    const { sockets, supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');
    establish(sockets.last());

    await supervisor.removeStation('a');
    expect(sockets.last().destroyed).toBe(true);
    expect(supervisor.has('a')).toBe(false);
    expect(supervisor.getStationIds()).toEqual([]);
  });

  it('shutdown closes every session', async () => {
    const { sockets, supervisor } = setup();
    supervisor.addStation(stationConfig('a'));
    supervisor.addStation(stationConfig('b'));
    supervisor.start('a');
    supervisor.start('b');
    establish(sockets.sockets[0]);

    await supervisor.shutdown();
    expect(sockets.sockets.map((s) => s.destroyed)).toEqual([true, true]);
    vi.advanceTimersByTime(60_000);
    expect(sockets.sockets).toHaveLength(2);
  });

  it('refuses to start a station that is being removed', async () => {
    const { sockets, supervisor } = deferredSetup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');

    const removing = supervisor.removeStation('a');
    expect(supervisor.has('a')).toBe(false);
    expect(() => supervisor.start('a')).toThrow('Unknown station: a');
    await removing;

    expect(sockets).toHaveLength(1);
    expect(sockets[0].destroyed).toBe(true);
  });

  it('refuses to start sessions once shutdown has begun', async () => {
    const { sockets, supervisor } = deferredSetup();
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');

    const closing = supervisor.shutdown();
    expect(supervisor.start('a')).toBe(false);
    expect(supervisor.reconnectAll()).toEqual([]);
    await closing;

    expect(sockets).toHaveLength(1);
    expect(sockets.every((s) => s.destroyed)).toBe(true);
  });

  it('shutdown gives up waiting on sockets that never close', async () => {
    class HangingSocket extends FakeSocket {
      destroy(): this {
        this.destroyed = true;
        return this;
      }
    }
    const supervisor = new SessionSupervisor({ createSocket: () => new HangingSocket() });
    supervisor.addStation(stationConfig('a'));
    supervisor.start('a');

    const done = vi.fn();
    const closing = supervisor.shutdown(500).then(done);
    await vi.advanceTimersByTimeAsync(499);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    await closing;
    expect(done).toHaveBeenCalledTimes(1);
  });
});
