import type { CasterEndpoint, MountpointDescriptor, StationInput } from '@castermon/shared';
import { buildSourcetableRequest } from './protocol.js';
import { createTcpSocket, type SocketFactory } from './transport.js';

const MAX_SOURCETABLE_BYTES = 1024 * 1024;

export interface SourcetableOptions {
  timeoutMs?: number;
  createSocket?: SocketFactory;
}

function parseCoordinate(value: string): number | undefined {
  if (!value || value === '0' || value === '0.00') return undefined;
  const num = parseFloat(value);
  return Number.isFinite(num) && num !== 0 ? num : undefined;
}

/**
 * Parses `STR;` records of a sourcetable:
 * STR;mountpoint;identifier;format;format-details;carrier;nav-system;network;country;
 *     latitude;longitude;nmea;solution;generator;compr-encryp;authentication;fee;bitrate;misc
 */
export function parseSourcetable(text: string): MountpointDescriptor[] {
  const mountpoints: MountpointDescriptor[] = [];
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (!line.startsWith('STR;')) continue;
    const parts = line.split(';');
    if (parts.length < 11 || !parts[1]) continue;

    const bitrate = parts[17] ? parseInt(parts[17], 10) : NaN;
    mountpoints.push({
      mountpoint: parts[1],
      identifier: parts[2],
      format: parts[3],
      formatDetails: parts[4],
      carrier: parseInt(parts[5], 10) || 0,
      navSystems: parts[6] ? parts[6].split('+').map((s) => s.trim()).filter(Boolean) : [],
      network: parts[7],
      country: parts[8],
      latitude: parseCoordinate(parts[9]),
      longitude: parseCoordinate(parts[10]),
      nmea: parts[11] === '1',
      authentication: parts[15] ?? '',
      fee: parts[16] === 'Y',
      bitrate: Number.isFinite(bitrate) ? bitrate : undefined,
    });
  }
  return mountpoints;
}

/** Decodes an HTTP/1.1 chunked body; stops at the terminating zero-length chunk. */
export function decodeChunked(body: Buffer): Buffer {
  const parts: Buffer[] = [];
  let pos = 0;
  while (pos < body.length) {
    const lineEnd = body.indexOf('\r\n', pos);
    if (lineEnd === -1) break;
    const size = parseInt(body.toString('latin1', pos, lineEnd).split(';')[0], 16);
    if (!Number.isFinite(size) || size === 0) break;
    parts.push(body.subarray(lineEnd + 2, lineEnd + 2 + size));
    pos = lineEnd + 2 + size + 2;
  }
  return Buffer.concat(parts);
}

function extractBody(response: Buffer): string {
  const headEnd = response.indexOf('\r\n\r\n');
  const firstLineEnd = response.indexOf('\r\n');
  const statusLine = response.toString('latin1', 0, firstLineEnd === -1 ? Math.min(response.length, 80) : firstLineEnd);

  const status = /^HTTP\/1\.[01] (\d{3})/i.exec(statusLine);
  if (status && status[1] !== '200') {
    const code = status[1];
    if (code === '401' || code === '403') throw new Error(`Caster rejected the credentials (${code})`);
    throw new Error(`Caster answered with status ${code}`);
  }
  if (!status && !/^SOURCETABLE 200 OK/i.test(statusLine)) {
    throw new Error(`Unexpected sourcetable response: ${statusLine}`);
  }
  if (headEnd === -1) return '';

  const head = response.toString('latin1', 0, headEnd);
  const body = response.subarray(headEnd + 4);
  const chunked = /^transfer-encoding:\s*chunked/im.test(head);
  return (chunked ? decodeChunked(body) : body).toString('utf-8');
}

/**
 * One-shot sourcetable download from a caster root path.
 * Resolves once the caster closes the connection or sends ENDSOURCETABLE.
 */
export function fetchSourcetable(endpoint: CasterEndpoint, options: SourcetableOptions = {}): Promise<MountpointDescriptor[]> {
  const createSocket = options.createSocket ?? createTcpSocket;
  const timeoutMs = options.timeoutMs ?? 10_000;

  return new Promise((resolve, reject) => {
    const sock = createSocket();
    let response = Buffer.alloc(0);
    let settled = false;

    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      sock.destroy();
      if (err) { reject(err); return; }
      try {
        resolve(parseSourcetable(extractBody(response)));
      } catch (parseErr) {
        reject(parseErr instanceof Error ? parseErr : new Error(String(parseErr)));
      }
    };

    const timer = setTimeout(() => {
      finish(new Error(`Sourcetable request to ${endpoint.host}:${endpoint.port} timed out`));
    }, timeoutMs);

    sock.on('connect', () => {
      sock.write(buildSourcetableRequest(endpoint));
    });
    sock.on('data', (chunk: Buffer) => {
      response = Buffer.concat([response, chunk]);
      if (response.length > MAX_SOURCETABLE_BYTES || response.includes('ENDSOURCETABLE')) finish();
    });
    sock.on('error', (err: Error) => finish(err));
    sock.on('close', () => finish());

    console.log(`📡 Fetching sourcetable from ${endpoint.host}:${endpoint.port}...`);
    sock.connect(endpoint.port, endpoint.host);
  });
}

/** Candidate station definition for a mountpoint listed in a sourcetable. */
export function mountpointToStation(endpoint: CasterEndpoint, descriptor: MountpointDescriptor): StationInput {
  return {
    name: descriptor.identifier ? `${descriptor.mountpoint} (${descriptor.identifier})` : descriptor.mountpoint,
    host: endpoint.host,
    port: endpoint.port,
    mountpoint: descriptor.mountpoint,
    username: endpoint.username,
    password: endpoint.password,
    latitude: descriptor.latitude,
    longitude: descriptor.longitude,
  };
}
