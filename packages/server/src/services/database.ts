import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Opens (and creates) the CasterMon database. Pass ':memory:' for a throwaway store.
 */
export function openDatabase(file: string): BetterSqlite3.Database {
  if (file !== ':memory:') {
    const dir = path.dirname(file);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db: BetterSqlite3.Database = new Database(file);

  if (file !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS stations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      host TEXT NOT NULL,
      port INTEGER NOT NULL,
      mountpoint TEXT NOT NULL,
      username TEXT NOT NULL DEFAULT '',
      password TEXT NOT NULL DEFAULT '',
      latitude REAL,
      longitude REAL,
      altitude REAL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS alert_events (
      id TEXT PRIMARY KEY,
      station_id TEXT NOT NULL,
      kind TEXT NOT NULL,
      state TEXT NOT NULL,
      message TEXT NOT NULL,
      value REAL,
      timestamp INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_alert_events_time ON alert_events(timestamp DESC);
    CREATE INDEX IF NOT EXISTS idx_alert_events_station ON alert_events(station_id);
  `);

  return db;
}
