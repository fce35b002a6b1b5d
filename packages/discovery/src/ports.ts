import * as net from 'node:net';
import type { PortRange } from './config.js';

/**
 * Check that a port can be bound right now.
 * Another process may still take it before it is used; allocation is
 * best-effort.
 */
export function isPortFree(port: number, host?: string): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.unref();
    server.once('error', () => resolve(false));
    server.listen({ port, host, exclusive: true }, () => {
      server.close(() => resolve(true));
    });
  });
}

/**
 * Find a bindable port in [range.start, range.end).
 *
 * The scan begins at a random offset and wraps, so concurrent probes
 * are unlikely to pick the same port. Returns null if none is free.
 */
export async function findFreePort(
  range: PortRange,
  host?: string,
  random: () => number = Math.random,
): Promise<number | null> {
  const size = range.end - range.start;
  if (size <= 0) return null;

  const offset = Math.floor(random() * size);
  for (let i = 0; i < size; i++) {
    const port = range.start + ((offset + i) % size);
    if (await isPortFree(port, host)) return port;
  }
  return null;
}

/** Connect-probe a TCP port; resolves true if something accepts. */
export function canConnect(port: number, host = '127.0.0.1', timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ port, host });
    const finish = (result: boolean): void => {
      socket.destroy();
      resolve(result);
    };
    socket.setTimeout(timeoutMs, () => finish(false));
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
}
