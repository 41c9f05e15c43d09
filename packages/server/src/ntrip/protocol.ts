import type { CasterEndpoint, StationConfig } from '@castermon/shared';

export const USER_AGENT = 'NTRIP CasterMon/1.0';

// Longest response head accepted before giving up on the handshake
export const MAX_RESPONSE_HEAD = 4096;

export type CasterResponse =
  | { status: 'incomplete' }
  | { status: 'accepted'; protocol: 'icy' | 'http'; body: Buffer }
  | { status: 'rejected'; statusLine: string; code?: number; reason: string };

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')}`;
}

/** NTRIP 1.0 stream request for one mountpoint */
export function buildMountRequest(station: StationConfig): string {
  const lines = [
    `GET /${station.mountpoint} HTTP/1.0`,
    `Host: ${station.host}:${station.port}`,
    `User-Agent: ${USER_AGENT}`,
  ];
  if (station.username) lines.push(`Authorization: ${basicAuth(station.username, station.password)}`);
  return lines.join('\r\n') + '\r\n\r\n';
}

/** NTRIP 2.0 sourcetable request (caster root path) */
export function buildSourcetableRequest(endpoint: CasterEndpoint): string {
  const lines = [
    'GET / HTTP/1.1',
    `Host: ${endpoint.host}:${endpoint.port}`,
    'Ntrip-Version: Ntrip/2.0',
    `User-Agent: ${USER_AGENT}`,
    'Connection: close',
  ];
  if (endpoint.username) lines.push(`Authorization: ${basicAuth(endpoint.username, endpoint.password)}`);
  return lines.join('\r\n') + '\r\n\r\n';
}

function rejectionReason(code: number): string {
  switch (code) {
    case 401: return 'Unauthorized (401): caster rejected the credentials';
    case 403: return 'Forbidden (403): access to the mountpoint denied';
    case 404: return 'Not found (404): unknown mountpoint';
    default: return `Caster answered with status ${code}`;
  }
}

/**
 * Classifies the head of a caster's answer to a stream request.
 * `ICY 200 OK` (NTRIP 1.0) and `HTTP/1.x 200` are accepted; bytes after the head are stream data.
 */
export function parseCasterResponse(buffer: Buffer): CasterResponse {
  const lineEnd = buffer.indexOf('\r\n');
  if (lineEnd === -1) {
    if (buffer.length > MAX_RESPONSE_HEAD) {
      return { status: 'rejected', statusLine: '', reason: 'Unrecognised caster response' };
    }
    return { status: 'incomplete' };
  }

  const statusLine = buffer.toString('latin1', 0, lineEnd).trim();

  if (/^ICY 200 OK/i.test(statusLine)) {
    let bodyStart = lineEnd + 2;
    // Some casters follow the status line with an empty line
    if (buffer[bodyStart] === 0x0d && buffer[bodyStart + 1] === 0x0a) bodyStart += 2;
    return { status: 'accepted', protocol: 'icy', body: buffer.subarray(bodyStart) };
  }

  if (/^SOURCETABLE 200 OK/i.test(statusLine)) {
    return { status: 'rejected', statusLine, reason: 'Mountpoint not found: caster returned its sourcetable' };
  }

  const http = /^HTTP\/1\.[01] (\d{3})/i.exec(statusLine);
  if (http) {
    const code = parseInt(http[1], 10);
    if (code !== 200) return { status: 'rejected', statusLine, code, reason: rejectionReason(code) };
    const headEnd = buffer.indexOf('\r\n\r\n');
    if (headEnd === -1) {
      if (buffer.length > MAX_RESPONSE_HEAD) {
        return { status: 'rejected', statusLine, code, reason: 'Response headers too long' };
      }
      return { status: 'incomplete' };
    }
    return { status: 'accepted', protocol: 'http', body: buffer.subarray(headEnd + 4) };
  }

  return { status: 'rejected', statusLine, reason: `Unexpected caster response: ${statusLine.slice(0, 80)}` };
}
