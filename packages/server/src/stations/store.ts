import { EventEmitter } from 'events';
import * as fs from 'fs';
import type BetterSqlite3 from 'better-sqlite3';
import type { StationConfig, StationInput } from '@castermon/shared';
import { slugify, validateStationInput } from './validation.js';

interface StationRow {
  id: string;
  name: string;
  host: string;
  port: number;
  mountpoint: string;
  username: string;
  password: string;
  latitude: number | null;
  longitude: number | null;
  altitude: number | null;
}

function fromRow(row: StationRow): StationConfig {
  const station: StationConfig = {
    id: row.id,
    name: row.name,
    host: row.host,
    port: row.port,
    mountpoint: row.mountpoint,
    username: row.username,
    password: row.password,
  };
  if (row.latitude !== null) station.latitude = row.latitude;
  if (row.longitude !== null) station.longitude = row.longitude;
  if (row.altitude !== null) station.altitude = row.altitude;
  return station;
}

/**
 * Station definitions in SQLite. Emits 'added', 'updated' (StationConfig) and
 * 'removed' (station id) so the monitor can follow changes.
 */
export class StationStore extends EventEmitter {
  constructor(private readonly db: BetterSqlite3.Database) {
    super();
  }

  list(): StationConfig[] {
    return this.db.prepare<[], StationRow>('SELECT * FROM stations ORDER BY name').all().map(fromRow);
  }

  get(id: string): StationConfig | undefined {
    const row = this.db.prepare<[string], StationRow>('SELECT * FROM stations WHERE id = ?').get(id);
    return row ? fromRow(row) : undefined;
  }

  add(input: StationInput): StationConfig {
    const id = input.id ?? slugify(input.name);
    if (this.get(id)) throw new Error(`Station "${id}" already exists`);
    const station: StationConfig = { ...input, id };
    const now = Date.now();
    this.db.prepare(`INSERT INTO stations (id, name, host, port, mountpoint, username, password, latitude, longitude, altitude, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`)
      .run(station.id, station.name, station.host, station.port, station.mountpoint, station.username, station.password,
        station.latitude ?? null, station.longitude ?? null, station.altitude ?? null, now, now);
    console.log(`🗂️ Station added: ${station.name} (${station.host}:${station.port}/${station.mountpoint})`);
    this.emit('added', station);
    return station;
  }

  update(id: string, input: StationInput): StationConfig | null {
    if (!this.get(id)) return null;
    const station: StationConfig = { ...input, id };
    this.db.prepare(`UPDATE stations SET name=?, host=?, port=?, mountpoint=?, username=?, password=?, latitude=?, longitude=?, altitude=?, updated_at=? WHERE id=?`)
      .run(station.name, station.host, station.port, station.mountpoint, station.username, station.password,
        station.latitude ?? null, station.longitude ?? null, station.altitude ?? null, Date.now(), id);
    this.emit('updated', station);
    return station;
  }

  remove(id: string): boolean {
    const result = this.db.prepare('DELETE FROM stations WHERE id = ?').run(id);
    if (result.changes === 0) return false;
    console.log(`🗂️ Station removed: ${id}`);
    this.emit('removed', id);
    return true;
  }

  /**
   * Imports a legacy casters file: a JSON array of
   * `{ name, host, port, mount, user, password, lat, lon, alt }`.
   * Entries that already exist or fail validation are skipped. Returns the number added.
   */
  importCastersFile(file: string): number {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (!Array.isArray(parsed)) throw new Error(`${file}: expected a JSON array of casters`);

    let added = 0;
    for (const entry of parsed) {
      if (typeof entry !== 'object' || entry === null) continue;
      const legacy: Record<string, unknown> = { ...entry };
      try {
        const input = validateStationInput({
          name: legacy.name,
          host: legacy.host,
          port: legacy.port,
          mountpoint: legacy.mount,
          username: legacy.user,
          password: legacy.password,
          latitude: legacy.lat,
          longitude: legacy.lon,
          altitude: legacy.alt,
        });
        const id = slugify(input.name);
        if (this.get(id)) continue;
        this.add({ ...input, id });
        added++;
      } catch (err) {
        console.warn(`🗂️ Skipping caster entry in ${file}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    return added;
  }
}
