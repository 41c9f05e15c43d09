import type { CasterEndpoint, StationInput } from '@castermon/shared';

type Body = Record<string, unknown>;

function isBody(value: unknown): value is Body {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || !value.trim()) throw new Error(`${field} is required`);
  return value.trim();
}

function optionalString(body: Body, field: string): string {
  const value = body[field];
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string') throw new Error(`${field} must be a string`);
  return value;
}

function optionalNumber(body: Body, field: string, min: number, max: number): number | undefined {
  const value = body[field];
  if (value === undefined || value === null || value === '') return undefined;
  const num = typeof value === 'string' ? Number(value) : value;
  if (typeof num !== 'number' || !Number.isFinite(num)) throw new Error(`${field} must be a number`);
  if (num < min || num > max) throw new Error(`${field} must be between ${min} and ${max}`);
  return num;
}

function parsePort(body: Body): number {
  const port = optionalNumber(body, 'port', 1, 65535) ?? 2101;
  if (!Number.isInteger(port)) throw new Error('port must be an integer');
  return port;
}

export function slugify(name: string): string {
  const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug || 'station';
}

/** Validates an API / import payload into a station definition. Throws naming the bad field. */
export function validateStationInput(input: unknown): StationInput {
  if (!isBody(input)) throw new Error('station must be an object');
  const mountpoint = requireString(input, 'mountpoint').replace(/^\/+/, '');
  const name = optionalString(input, 'name').trim() || mountpoint;
  const id = optionalString(input, 'id').trim();

  return {
    ...(id ? { id } : {}),
    name,
    host: requireString(input, 'host'),
    port: parsePort(input),
    mountpoint,
    username: optionalString(input, 'username'),
    password: optionalString(input, 'password'),
    latitude: optionalNumber(input, 'latitude', -90, 90),
    longitude: optionalNumber(input, 'longitude', -180, 180),
    altitude: optionalNumber(input, 'altitude', -1000, 10000),
  };
}

/** Caster address and credentials for a sourcetable request. */
export function validateCasterEndpoint(input: unknown): CasterEndpoint {
  if (!isBody(input)) throw new Error('caster must be an object');
  return {
    host: requireString(input, 'host'),
    port: parsePort(input),
    username: optionalString(input, 'username'),
    password: optionalString(input, 'password'),
  };
}
