import type BetterSqlite3 from 'better-sqlite3';
import type { AlertEvent, AlertKind } from '@castermon/shared';

interface AlertRow {
  id: string;
  station_id: string;
  kind: AlertKind;
  state: 'raised' | 'cleared';
  message: string;
  value: number | null;
  timestamp: number;
}

export class AlertLog {
  constructor(private readonly db: BetterSqlite3.Database) {}

  record(event: AlertEvent): void {
    this.db.prepare(`INSERT INTO alert_events (id, station_id, kind, state, message, value, timestamp)
      VALUES (?, ?, ?, ?, ?, ?, ?)`)
      .run(event.id, event.stationId, event.kind, event.state, event.message, event.value ?? null, event.timestamp);
  }

  list(options: { stationId?: string; limit?: number } = {}): AlertEvent[] {
    const limit = options.limit ?? 100;
    const rows = options.stationId
      ? this.db.prepare<[string, number], AlertRow>('SELECT * FROM alert_events WHERE station_id = ? ORDER BY timestamp DESC LIMIT ?').all(options.stationId, limit)
      : this.db.prepare<[number], AlertRow>('SELECT * FROM alert_events ORDER BY timestamp DESC LIMIT ?').all(limit);

    return rows.map((r) => {
      const event: AlertEvent = {
        id: r.id,
        stationId: r.station_id,
        kind: r.kind,
        state: r.state,
        message: r.message,
        timestamp: r.timestamp,
      };
      if (r.value !== null) event.value = r.value;
      return event;
    });
  }

  prune(olderThan: number): number {
    return this.db.prepare('DELETE FROM alert_events WHERE timestamp < ?').run(olderThan).changes;
  }
}
