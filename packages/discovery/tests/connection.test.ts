import { describe, expect, it, vi } from 'vitest';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { ConnectionError } from '@toolscout/shared';
import { ProtocolConnection } from '../src/connection.js';
import type { ConnectionOptions } from '../src/connection.js';
import type { LaunchOptions } from '../src/process.js';
import { FakeServerProcess, echoTool, failure, mcpScript, result } from './helpers/fake-server.js';
import type { Script } from './helpers/fake-server.js';

function connectionFor(fake: FakeServerProcess, options: ConnectionOptions = {}): ProtocolConnection {
  return new ProtocolConnection({
    timeoutMs: 500,
    shutdownTimeoutMs: 50,
    launcher: async () => fake,
    ...options,
  });
}

/** Wraps a script so the first tools/list request gets no reply. */
function silentOnFirstList(base: Script): Script {
  let listCalls = 0;
  return (message, server) => {
    if (message.kind === 'request' && message.method === 'tools/list') {
      listCalls++;
      if (listCalls === 1) return undefined;
    }
    return base(message, server);
  };
}

describe('ProtocolConnection', () => {
  describe('handshake', () => {
    it('sends initialize, then the initialized notification', async () => {
      const fake = new FakeServerProcess(mcpScript({ tools: [echoTool] }));
      const conn = connectionFor(fake);

      expect(await conn.connect(['fake-server'])).toBe(true);
      expect(conn.getState()).toBe('ready');
      expect(fake.methods()).toEqual(['initialize', 'notifications/initialized']);

      const initialize = fake.received[0];
      expect(initialize?.kind).toBe('request');
      if (initialize?.kind === 'request') {
        expect(initialize.id).toBe(1);
        expect(initialize.params).toEqual({
          protocolVersion: LATEST_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: { name: 'toolscout', version: '0.1.0' },
        });
      }
      expect(fake.received[1]).toEqual({ kind: 'notification', method: 'notifications/initialized' });

      await conn.disconnect();
    });

    it('records server info from the initialize result', async () => {
      const fake = new FakeServerProcess(
        mcpScript({ serverInfo: { name: 'weather', version: '2.1.0' } }),
      );
      const conn = connectionFor(fake);

      await conn.connect(['fake-server']);
      expect(conn.getServerInfo()).toEqual({ name: 'weather', version: '2.1.0' });
      expect(conn.getSessionInfo()?.['protocolVersion']).toBe('2025-03-26');

      await conn.disconnect();
      expect(conn.getServerInfo()).toBeNull();
      expect(conn.getSessionInfo()).toBeNull();
    });

    it('passes the working directory and merged environment to the launcher', async () => {
      const fake = new FakeServerProcess(mcpScript());
      const launcher = vi.fn(async (_command: string[], _options: LaunchOptions) => fake);
      const conn = new ProtocolConnection({ launcher, shutdownTimeoutMs: 50 });

      await conn.connect(['node', 'server.js'], '/srv/app', { API_TOKEN: 'test-token' });

      expect(launcher).toHaveBeenCalledTimes(1);
      const [command, options] = launcher.mock.calls[0] ?? [];
      expect(command).toEqual(['node', 'server.js']);
      expect(options?.cwd).toBe('/srv/app');
      expect(options?.env['API_TOKEN']).toBe('test-token');
      expect(options?.env['PATH']).toBe(process.env['PATH']);

      await conn.disconnect();
    });

    it('returns false and stops the process when initialize fails', async () => {
      const fake = new FakeServerProcess((message) =>
        message.kind === 'request' ? failure(message.id, -32603, 'boom') : undefined,
      );
      const conn = connectionFor(fake);

      expect(await conn.connect(['fake-server'])).toBe(false);
      expect(conn.getState()).toBe('closed');
      expect(fake.isAlive()).toBe(false);
      expect(fake.methods()).toEqual(['initialize']);
    });

    it('returns false when the process cannot be started', async () => {
      const conn = new ProtocolConnection({
        launcher: async () => {
          throw new ConnectionError('spawn missing-binary ENOENT');
        },
      });

      expect(await conn.connect(['missing-binary'])).toBe(false);
      expect(conn.getState()).toBe('closed');
      expect(conn.isConnected()).toBe(false);
    });

    it('is single-use', async () => {
      const fake = new FakeServerProcess(mcpScript());
      const launcher = vi.fn(async () => fake);
      const conn = new ProtocolConnection({ launcher, shutdownTimeoutMs: 50 });

      expect(await conn.connect(['fake-server'])).toBe(true);
      await conn.disconnect();

      expect(await conn.connect(['fake-server'])).toBe(false);
      expect(launcher).toHaveBeenCalledTimes(1);
    });
  });

  describe('before the handshake completes', () => {
    it('refuses listTools and callTool without writing anything', async () => {
      const fake = new FakeServerProcess(() => undefined);
      const conn = connectionFor(fake, { timeoutMs: 200 });

      expect(await conn.listTools()).toBeNull();
      expect(await conn.callTool('echo', { text: 'hi' })).toBeNull();

      const pending = conn.connect(['fake-server']);
      await vi.waitFor(() => expect(fake.received).toHaveLength(1));

      expect(conn.getState()).toBe('handshaking');
      expect(await conn.listTools()).toBeNull();
      expect(fake.methods()).toEqual(['initialize']);

      expect(await pending).toBe(false);
      expect(fake.methods()).toEqual(['initialize']);
    });
  });

  describe('listTools', () => {
    it('returns tools in the order the server listed them', async () => {
      const fake = new FakeServerProcess(
        mcpScript({
          tools: [
            { name: 'zeta', description: 'last letter' },
            { name: 'alpha' },
            echoTool,
          ],
        }),
      );
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);

      const tools = await conn.listTools();

      expect(tools).toEqual([
        { name: 'zeta', description: 'last letter', inputSchema: { type: 'object', properties: {} } },
        { name: 'alpha', description: '', inputSchema: { type: 'object', properties: {} } },
        {
          name: 'echo',
          description: 'Echo the input back',
          inputSchema: {
            type: 'object',
            properties: { text: { type: 'string' } },
            required: ['text'],
          },
        },
      ]);

      await conn.disconnect();
    });

    it('follows nextCursor pagination', async () => {
      const fake = new FakeServerProcess((message) => {
        if (message.kind !== 'request') return undefined;
        if (message.method === 'initialize') {
          return result(message.id, { protocolVersion: '2025-03-26', capabilities: {}, serverInfo: { name: 'paged' } });
        }
        const cursor = message.params?.['cursor'];
        return cursor === 'page-2'
          ? result(message.id, { tools: [{ name: 'second', inputSchema: { type: 'object' } }] })
          : result(message.id, {
              tools: [{ name: 'first', inputSchema: { type: 'object' } }],
              nextCursor: 'page-2',
            });
      });
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);

      const tools = await conn.listTools();

      expect(tools?.map((tool) => tool.name)).toEqual(['first', 'second']);
      expect(fake.methods()).toEqual(['initialize', 'notifications/initialized', 'tools/list', 'tools/list']);

      await conn.disconnect();
    });

    it('returns null on an error response and stays connected', async () => {
      const base = mcpScript({ tools: [echoTool] });
      const fake = new FakeServerProcess((message, server) =>
        message.kind === 'request' && message.method === 'tools/list'
          ? failure(message.id, -32000, 'listing disabled')
          : base(message, server),
      );
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);

      expect(await conn.listTools()).toBeNull();
      expect(conn.isConnected()).toBe(true);

      await conn.disconnect();
    });

    it('returns null on a malformed response line', async () => {
      const base = mcpScript({ tools: [echoTool] });
      const fake = new FakeServerProcess((message, server) =>
        message.kind === 'request' && message.method === 'tools/list' ? 'not json at all' : base(message, server),
      );
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);

      expect(await conn.listTools()).toBeNull();

      await conn.disconnect();
    });

    it('returns null when the server exits mid-request', async () => {
      const base = mcpScript({ tools: [echoTool] });
      const fake = new FakeServerProcess((message, server) => {
        if (message.kind === 'request' && message.method === 'tools/list') {
          server.exit();
          return undefined;
        }
        return base(message, server);
      });
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);

      expect(await conn.listTools()).toBeNull();
      expect(conn.isConnected()).toBe(false);

      await conn.disconnect();
    });

    it('does not close the connection when a request times out', async () => {
      const fake = new FakeServerProcess(silentOnFirstList(mcpScript({ tools: [echoTool] })));
      const conn = connectionFor(fake, { timeoutMs: 50 });
      await conn.connect(['fake-server']);

      expect(await conn.listTools()).toBeNull();
      expect(conn.getState()).toBe('ready');
      expect(conn.isConnected()).toBe(true);
      expect(fake.signals).toEqual([]);

      const tools = await conn.listTools();
      expect(tools?.map((tool) => tool.name)).toEqual(['echo']);

      await conn.disconnect();
    });

    it('refuses a second request while one is outstanding', async () => {
      const base = mcpScript({ tools: [echoTool] });
      const fake = new FakeServerProcess((message, server) => {
        if (message.kind === 'request' && message.method === 'tools/list') {
          const reply = base(message, server);
          setTimeout(() => {
            if (reply !== undefined) server.send(reply);
          }, 20);
          return undefined;
        }
        return base(message, server);
      });
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);

      const [first, second] = await Promise.all([conn.listTools(), conn.listTools()]);

      expect(first?.map((tool) => tool.name)).toEqual(['echo']);
      expect(second).toBeNull();
      expect(fake.methods().filter((method) => method === 'tools/list')).toHaveLength(1);

      await conn.disconnect();
    });
  });

  describe('callTool', () => {
    it('returns the content of the tool result', async () => {
      const fake = new FakeServerProcess(mcpScript({ tools: [echoTool] }));
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);

      const called = await conn.callTool('echo', { text: 'hi' });

      expect(called).toEqual({
        content: [{ type: 'text', text: '{"text":"hi"}' }],
        isError: false,
      });
      const request = fake.received.at(-1);
      expect(request?.kind === 'request' ? request.params : undefined).toEqual({
        name: 'echo',
        arguments: { text: 'hi' },
      });

      await conn.disconnect();
    });
  });

  describe('disconnect', () => {
    it('is idempotent', async () => {
      const fake = new FakeServerProcess(mcpScript());
      const conn = connectionFor(fake);

      expect(conn.isConnected()).toBe(false);
      await conn.connect(['fake-server']);
      expect(conn.isConnected()).toBe(true);

      await conn.disconnect();
      await conn.disconnect();

      expect(conn.isConnected()).toBe(false);
      expect(conn.getState()).toBe('closed');
      expect(fake.signals).toEqual(['terminate']);
    });

    it('kills a process that ignores terminate', async () => {
      const fake = new FakeServerProcess(mcpScript());
      fake.ignoreTerminate = true;
      const conn = connectionFor(fake, { shutdownTimeoutMs: 20 });
      await conn.connect(['fake-server']);

      await conn.disconnect();

      expect(fake.signals).toEqual(['terminate', 'kill']);
      expect(fake.isAlive()).toBe(false);
    });

    it('refuses requests after disconnect without writing', async () => {
      const fake = new FakeServerProcess(mcpScript({ tools: [echoTool] }));
      const conn = connectionFor(fake);
      await conn.connect(['fake-server']);
      await conn.disconnect();
      const written = fake.received.length;

      expect(await conn.listTools()).toBeNull();
      expect(fake.received).toHaveLength(written);
    });
  });
});
