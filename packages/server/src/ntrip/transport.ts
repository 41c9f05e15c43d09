import { Socket } from 'net';

/**
 * The slice of `net.Socket` the caster clients use. Sessions take a factory so the
 * transport can be swapped (TLS, tests).
 */
export interface CasterSocket {
  connect(port: number, host: string): unknown;
  write(data: string | Uint8Array): boolean;
  destroy(): unknown;
  on(event: 'connect', listener: () => void): unknown;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: (hadError: boolean) => void): unknown;
  once(event: 'close', listener: (hadError: boolean) => void): unknown;
}

export type SocketFactory = () => CasterSocket;

export const createTcpSocket: SocketFactory = () => new Socket();
