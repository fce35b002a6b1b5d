import * as net from 'node:net';
import { afterEach, describe, expect, it } from 'vitest';
import { canConnect, findFreePort, isPortFree } from '../src/ports.js';

function listen(): Promise<net.Server> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function portOf(server: net.Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
  return address.port;
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('ports', () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.splice(0).map(close));
  });

  it('reports an occupied port as not free', async () => {
    const server = await listen();
    servers.push(server);
    const port = portOf(server);

    expect(await isPortFree(port, '127.0.0.1')).toBe(false);
    expect(await findFreePort({ start: port, end: port + 1 }, '127.0.0.1')).toBeNull();
  });

  it('finds a free port inside the range', async () => {
    const server = await listen();
    const port = portOf(server);
    await close(server);

    expect(await findFreePort({ start: port, end: port + 1 }, '127.0.0.1')).toBe(port);
  });

  it('returns null for an empty range', async () => {
    expect(await findFreePort({ start: 8000, end: 8000 })).toBeNull();
  });

  it('connect-probes a listening port', async () => {
    const server = await listen();
    servers.push(server);
    const port = portOf(server);

    expect(await canConnect(port)).toBe(true);

    const closed = await listen();
    const closedPort = portOf(closed);
    await close(closed);
    expect(await canConnect(closedPort)).toBe(false);
  });
});
