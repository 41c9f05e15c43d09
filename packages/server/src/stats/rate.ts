/**
 * Byte rate over a trailing time window. Until a full window has elapsed since `reset`,
 * the rate is taken over the elapsed time (at least one second) so a fresh connection
 * does not read artificially low.
 */
export class RateWindow {
  private samples: { timestamp: number; bytes: number }[] = [];
  private origin: number;

  constructor(private readonly windowMs: number, origin = 0) {
    this.origin = origin;
  }

  reset(origin: number): void {
    this.samples = [];
    this.origin = origin;
  }

  add(bytes: number, timestamp: number): void {
    this.samples.push({ timestamp, bytes });
    this.prune(timestamp);
  }

  bytesPerSecond(now: number): number {
    this.prune(now);
    let total = 0;
    for (const s of this.samples) total += s.bytes;
    const spanMs = Math.max(1000, Math.min(this.windowMs, now - this.origin));
    return total / (spanMs / 1000);
  }

  private prune(now: number) {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.samples.length && this.samples[drop].timestamp <= cutoff) drop++;
    if (drop > 0) this.samples.splice(0, drop);
  }
}

export interface ByteCounter {
  totalBytes: number;
  epoch: number;   // changes whenever the counter restarts from zero
  since: number;   // when the current epoch began
}

/**
 * One consumer's view of a station byte counter. Each consumer keeps its own baseline:
 * reading never disturbs what another consumer sees.
 */
export class ThroughputTracker {
  private lastTotal = 0;
  private epoch = -1;
  lastReadAt = 0;
  private readonly window: RateWindow;

  constructor(windowMs: number) {
    this.window = new RateWindow(windowMs);
  }

  read(counter: ByteCounter, now: number): { deltaBytes: number; bytesPerSecond: number } {
    if (counter.epoch !== this.epoch) {
      this.epoch = counter.epoch;
      this.lastTotal = 0;
      this.window.reset(counter.since);
    }
    const deltaBytes = Math.max(0, counter.totalBytes - this.lastTotal);
    this.lastTotal = counter.totalBytes;
    this.lastReadAt = now;
    this.window.add(deltaBytes, now);
    return { deltaBytes, bytesPerSecond: this.window.bytesPerSecond(now) };
  }
}
