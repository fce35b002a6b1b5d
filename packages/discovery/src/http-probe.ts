/**
 * HttpProbe — tool discovery against a server reachable over the network.
 *
 * Used once a container or Kubernetes Service exposes the server on a
 * port. Wraps the official @modelcontextprotocol/sdk Client over its
 * Streamable HTTP transport; the SDK does the handshake and id-based
 * correlation on this path.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { toError } from '@toolscout/shared';
import type { DiscoveryMethod, DiscoveryResult, ServerInfo, ToolDescriptor } from '@toolscout/shared';
import type { ClientInfo } from './connection.js';
import { withTimeout } from './timing.js';

const DEFAULT_TIMEOUT_MS = 15_000;
const MAX_TOOL_PAGES = 50;

export interface HttpProbeOptions {
  timeoutMs?: number;
  clientInfo?: ClientInfo;
}

export class HttpProbe {
  readonly timeoutMs: number;
  private clientInfo: ClientInfo;

  constructor(options: HttpProbeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.clientInfo = options.clientInfo ?? { name: 'toolscout', version: '0.1.0' };
  }

  /** Connect to `url`, list tools and always close the client. */
  async discoverFromUrl(
    url: string,
    method: DiscoveryMethod = 'http',
    timeoutMs: number = this.timeoutMs,
  ): Promise<DiscoveryResult | null> {
    let endpoint: URL;
    try {
      endpoint = new URL(url);
    } catch {
      console.warn(`[http-probe] Invalid endpoint URL: ${url}`);
      return null;
    }

    const client = new Client({ ...this.clientInfo }, { capabilities: {} });
    const transport = new StreamableHTTPClientTransport(endpoint);

    try {
      return await withTimeout(
        this.discover(client, transport, url, method),
        timeoutMs,
        `Discovery from ${url}`,
      );
    } catch (err) {
      console.warn(`[http-probe] ${toError(err).message}`);
      return null;
    } finally {
      try {
        await client.close();
      } catch (err) {
        console.warn(`[http-probe] Error closing client for ${url}: ${toError(err).message}`);
      }
    }
  }

  private async discover(
    client: Client,
    transport: StreamableHTTPClientTransport,
    url: string,
    method: DiscoveryMethod,
  ): Promise<DiscoveryResult | null> {
    await client.connect(transport);

    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;
    for (let page = 0; page < MAX_TOOL_PAGES; page++) {
      const result = await client.listTools(cursor ? { cursor } : undefined);
      for (const tool of result.tools) {
        tools.push({
          name: tool.name,
          description: tool.description ?? '',
          inputSchema: { ...tool.inputSchema },
        });
      }
      cursor = result.nextCursor;
      if (!cursor) break;
    }

    if (tools.length === 0) {
      console.warn(`[http-probe] No tools discovered from ${url}`);
      return null;
    }

    const version = client.getServerVersion();
    const serverInfo: ServerInfo | undefined = version ? { ...version } : undefined;
    console.log(`[http-probe] Discovered ${tools.length} tool(s) from ${url}`);
    return {
      tools,
      discoveryMethod: method,
      ...(serverInfo ? { serverInfo } : {}),
      timestamp: new Date().toISOString(),
    };
  }
}
