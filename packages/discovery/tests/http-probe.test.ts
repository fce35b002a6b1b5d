import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  connect: vi.fn(),
  listTools: vi.fn(),
  getServerVersion: vi.fn(),
  close: vi.fn(),
  transportUrls: [] as string[],
}));

vi.mock('@modelcontextprotocol/sdk/client/index.js', () => {
  class MockClient {
    connect = mocks.connect;
    listTools = mocks.listTools;
    getServerVersion = mocks.getServerVersion;
    close = mocks.close;
  }
  return { Client: MockClient };
});

vi.mock('@modelcontextprotocol/sdk/client/streamableHttp.js', () => {
  class MockTransport {
    constructor(url: URL) {
      mocks.transportUrls.push(url.toString());
    }
  }
  return { StreamableHTTPClientTransport: MockTransport };
});

import { HttpProbe } from '../src/http-probe.js';

describe('HttpProbe', () => {
  beforeEach(() => {
    mocks.connect.mockReset().mockResolvedValue(undefined);
    mocks.listTools.mockReset();
    mocks.getServerVersion.mockReset().mockReturnValue({ name: 'remote', version: '1.2.0' });
    mocks.close.mockReset().mockResolvedValue(undefined);
    mocks.transportUrls.length = 0;
  });

  it('lists tools across pages and closes the client', async () => {
    mocks.listTools
      .mockResolvedValueOnce({
        tools: [{ name: 'search', description: 'Search docs', inputSchema: { type: 'object' } }],
        nextCursor: 'next',
      })
      .mockResolvedValueOnce({
        tools: [{ name: 'fetch', inputSchema: { type: 'object' } }],
      });
    const probe = new HttpProbe();

    const discovered = await probe.discoverFromUrl('http://127.0.0.1:8123/mcp', 'docker-http');

    expect(mocks.transportUrls).toEqual(['http://127.0.0.1:8123/mcp']);
    expect(mocks.listTools).toHaveBeenNthCalledWith(1, undefined);
    expect(mocks.listTools).toHaveBeenNthCalledWith(2, { cursor: 'next' });
    expect(discovered?.discoveryMethod).toBe('docker-http');
    expect(discovered?.tools).toEqual([
      { name: 'search', description: 'Search docs', inputSchema: { type: 'object' } },
      { name: 'fetch', description: '', inputSchema: { type: 'object' } },
    ]);
    expect(discovered?.serverInfo).toEqual({ name: 'remote', version: '1.2.0' });
    expect(mocks.close).toHaveBeenCalledTimes(1);
  });

  it('returns null and still closes when the server fails', async () => {
    mocks.connect.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const probe = new HttpProbe();

    expect(await probe.discoverFromUrl('http://127.0.0.1:8123/mcp')).toBeNull();
    expect(mocks.close).toHaveBeenCalledTimes(1);
  });

  it('returns null when no tools are listed', async () => {
    mocks.listTools.mockResolvedValue({ tools: [] });
    const probe = new HttpProbe();

    expect(await probe.discoverFromUrl('http://127.0.0.1:8123/mcp')).toBeNull();
  });

  it('returns null when the deadline passes', async () => {
    mocks.listTools.mockReturnValue(new Promise(() => {}));
    const probe = new HttpProbe();

    expect(await probe.discoverFromUrl('http://127.0.0.1:8123/mcp', 'http', 30)).toBeNull();
    expect(mocks.close).toHaveBeenCalledTimes(1);
  });

  it('rejects an invalid URL without connecting', async () => {
    const probe = new HttpProbe();

    expect(await probe.discoverFromUrl('not a url')).toBeNull();
    expect(mocks.connect).not.toHaveBeenCalled();
    expect(mocks.transportUrls).toEqual([]);
  });
});
