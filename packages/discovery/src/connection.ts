/**
 * ProtocolConnection — one MCP session over one process's stdio pipes.
 *
 * Lifecycle: new → connecting → handshaking → ready → closed.
 * closed is terminal and reachable from every state; a connection is
 * single-use and is never pooled.
 *
 * Correlation is line-based: a request is written as one JSON line and
 * the next line read from stdout is taken as its response. Only one
 * request may be outstanding at a time; a second concurrent request is
 * refused rather than pipelined.
 *
 * Nothing here throws past the public methods. Failures resolve to
 * false / null and a logged diagnostic.
 */

import type { Writable } from 'node:stream';
import { LATEST_PROTOCOL_VERSION, ListToolsResultSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  ConnectionError,
  HandshakeError,
  LineReader,
  ProtocolError,
  decodeMessage,
  encodeMessage,
  isJsonObject,
  toError,
} from '@toolscout/shared';
import type {
  JsonObject,
  ServerInfo,
  ToolCallResult,
  ToolContent,
  ToolDescriptor,
} from '@toolscout/shared';
import { spawnProcess, stopProcess } from './process.js';
import type { ProcessHandle, ProcessLauncher } from './process.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ConnectionState = 'new' | 'connecting' | 'handshaking' | 'ready' | 'closed';

export interface ClientInfo {
  name: string;
  version: string;
}

export interface ConnectionOptions {
  /** Per-request response timeout (default: 30s). */
  timeoutMs?: number;
  /** How long disconnect() waits after a graceful stop before killing (default: 5s). */
  shutdownTimeoutMs?: number;
  launcher?: ProcessLauncher;
  clientInfo?: ClientInfo;
}

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;
const DEFAULT_CLIENT_INFO: ClientInfo = { name: 'toolscout', version: '0.1.0' };

/** Upper bound on tools/list pages followed via nextCursor. */
const MAX_TOOL_PAGES = 50;

// ---------------------------------------------------------------------------
// ProtocolConnection
// ---------------------------------------------------------------------------

export class ProtocolConnection {
  readonly timeoutMs: number;
  private shutdownTimeoutMs: number;
  private launcher: ProcessLauncher;
  private clientInfo: ClientInfo;

  private state: ConnectionState = 'new';
  private process: ProcessHandle | null = null;
  private reader: LineReader | null = null;
  private sessionInfo: JsonObject | null = null;
  private serverInfo: ServerInfo | null = null;
  private nextId = 1;
  private inFlight = false;

  constructor(options: ConnectionOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;
    this.launcher = options.launcher ?? spawnProcess;
    this.clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Start a server process and perform the MCP handshake.
   *
   * @param env - Merged over the inherited environment
   */
  async connect(
    command: string[],
    workingDir?: string,
    env?: Record<string, string>,
  ): Promise<boolean> {
    if (this.state !== 'new') {
      console.warn(`[connection] connect() called in state "${this.state}"; connections are single-use`);
      return false;
    }

    let handle: ProcessHandle;
    try {
      handle = await this.launcher(command, {
        cwd: workingDir,
        env: { ...process.env, ...env },
      });
    } catch (err) {
      const error = err instanceof ConnectionError
        ? err
        : new ConnectionError(toError(err).message, { cause: err });
      console.warn(`[connection] Failed to start "${command.join(' ')}": ${error.message}`);
      await this.disconnect();
      return false;
    }

    return this.attach(handle);
  }

  /**
   * Perform the MCP handshake over an already running process.
   * Takes ownership of the handle: it is stopped on failure and on disconnect().
   */
  async attach(handle: ProcessHandle): Promise<boolean> {
    if (this.state !== 'new') {
      // Disconnected while the process was starting (e.g. an outer timeout fired)
      console.warn(`[connection] Discarding ${handle.label}: connection is ${this.state}`);
      await stopProcess(handle, this.shutdownTimeoutMs);
      return false;
    }

    this.process = handle;
    this.reader = new LineReader(handle.stdout);
    this.state = 'connecting';

    try {
      await this.handshake();
      return true;
    } catch (err) {
      console.warn(`[connection] Handshake with ${handle.label} failed: ${toError(err).message}`);
      await this.disconnect();
      return false;
    }
  }

  /**
   * Stop the process and clear all session state. Safe to call repeatedly
   * and from any state.
   */
  async disconnect(): Promise<void> {
    const handle = this.process;
    const reader = this.reader;

    this.process = null;
    this.reader = null;
    this.sessionInfo = null;
    this.serverInfo = null;
    this.state = 'closed';

    reader?.close();
    if (handle) {
      await stopProcess(handle, this.shutdownTimeoutMs);
    }
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'ready' && this.process !== null && this.process.isAlive();
  }

  getServerInfo(): ServerInfo | null {
    return this.serverInfo;
  }

  /** The raw initialize result. */
  getSessionInfo(): JsonObject | null {
    return this.sessionInfo;
  }

  // -------------------------------------------------------------------------
  // Tools
  // -------------------------------------------------------------------------

  /**
   * List the server's tools, following nextCursor pagination.
   * Returns null when not ready or on any failure.
   */
  async listTools(): Promise<ToolDescriptor[] | null> {
    if (!this.requireReady('listTools')) return null;

    const tools: ToolDescriptor[] = [];
    let cursor: string | undefined;

    try {
      for (let page = 0; page < MAX_TOOL_PAGES; page++) {
        const result = await this.request('tools/list', cursor ? { cursor } : undefined);
        const parsed = ListToolsResultSchema.safeParse(result);
        if (!parsed.success) {
          throw new ProtocolError(`Malformed tools/list result: ${parsed.error.message}`);
        }

        for (const tool of parsed.data.tools) {
          if (!tool.name) {
            console.warn('[connection] Skipping tool with an empty name');
            continue;
          }
          tools.push({
            name: tool.name,
            description: tool.description ?? '',
            inputSchema: { ...tool.inputSchema },
          });
        }

        cursor = parsed.data.nextCursor;
        if (!cursor) return tools;
      }

      console.warn(`[connection] tools/list still paginating after ${MAX_TOOL_PAGES} pages; truncating`);
      return tools;
    } catch (err) {
      console.warn(`[connection] tools/list failed: ${toError(err).message}`);
      return null;
    }
  }

  /** Call a tool. Returns null when not ready or on any failure. */
  async callTool(name: string, args: JsonObject = {}): Promise<ToolCallResult | null> {
    if (!this.requireReady('callTool')) return null;

    try {
      const result = await this.request('tools/call', { name, arguments: args });
      return toToolCallResult(result);
    } catch (err) {
      console.warn(`[connection] tools/call "${name}" failed: ${toError(err).message}`);
      return null;
    }
  }

  // -------------------------------------------------------------------------
  // Protocol
  // -------------------------------------------------------------------------

  private async handshake(): Promise<void> {
    this.state = 'handshaking';

    let result: unknown;
    try {
      result = await this.request('initialize', {
        protocolVersion: LATEST_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { ...this.clientInfo },
      });
    } catch (err) {
      throw new HandshakeError(`initialize failed: ${toError(err).message}`, { cause: err });
    }

    if (!isJsonObject(result)) {
      throw new HandshakeError('initialize returned a non-object result');
    }
    // A concurrent disconnect() wins
    if (this.state !== 'handshaking') {
      throw new HandshakeError(`connection became ${this.state} during initialize`);
    }

    this.sessionInfo = result;
    this.serverInfo = toServerInfo(result['serverInfo']);

    await this.notify('notifications/initialized');
    this.state = 'ready';

    console.log(
      `[connection] Connected to MCP server: ` +
      `${this.serverInfo?.name ?? 'unknown'} v${this.serverInfo?.version ?? '?'}`,
    );
  }

  /**
   * Send one request and read the next line as its response.
   * Throws on timeout, EOF, malformed JSON or an error response.
   */
  private async request(method: string, params?: JsonObject): Promise<unknown> {
    const handle = this.process;
    const reader = this.reader;
    if (!handle || !reader) {
      throw new ConnectionError(`Cannot send ${method}: not connected`);
    }
    if (this.inFlight) {
      throw new ProtocolError(`Cannot send ${method}: another request is outstanding`);
    }

    const id = this.nextId++;
    this.inFlight = true;
    try {
      await writeLine(
        handle.stdin,
        encodeMessage({ kind: 'request', id, method, ...(params ? { params } : {}) }),
      );

      const line = await reader.readLine(this.timeoutMs);
      if (line === null) {
        throw new ProtocolError(`Server closed its output while waiting for ${method} response`);
      }

      const message = decodeMessage(line);
      if (message.kind !== 'response') {
        throw new ProtocolError(`Expected a response to ${method}, got a ${message.kind}`);
      }
      if (message.id !== id) {
        // Diagnostic only: correlation is positional, see ProtocolConnection docs
        console.warn(
          `[connection] Response id ${JSON.stringify(message.id)} does not match ${method} request id ${id}`,
        );
      }
      if ('error' in message) {
        throw new ProtocolError(
          `${method} returned error ${message.error.code}: ${message.error.message}`,
        );
      }
      return message.result;
    } finally {
      this.inFlight = false;
    }
  }

  /** Fire-and-forget: no response is read. */
  private async notify(method: string, params?: JsonObject): Promise<void> {
    const handle = this.process;
    if (!handle) return;
    try {
      await writeLine(
        handle.stdin,
        encodeMessage({ kind: 'notification', method, ...(params ? { params } : {}) }),
      );
    } catch (err) {
      console.warn(`[connection] Failed to send ${method}: ${toError(err).message}`);
    }
  }

  private requireReady(operation: string): boolean {
    if (this.state === 'ready' && this.process) return true;
    console.warn(`[connection] ${operation}() requires a ready connection (state: ${this.state})`);
    return false;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function writeLine(stream: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(line, 'utf-8', (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

function toServerInfo(value: unknown): ServerInfo | null {
  if (!isJsonObject(value)) return null;
  const name = value['name'];
  const version = value['version'];
  if (typeof name !== 'string') return null;
  return {
    ...value,
    name,
    ...(typeof version === 'string' ? { version } : {}),
  };
}

function isToolContent(value: unknown): value is ToolContent {
  return isJsonObject(value) && typeof value['type'] === 'string';
}

/**
 * Normalize a tools/call result to { content, isError }.
 * Results without a content array are wrapped as a single text item.
 */
function toToolCallResult(result: unknown): ToolCallResult {
  const content = isJsonObject(result) ? result['content'] : undefined;
  if (isJsonObject(result) && Array.isArray(content)) {
    return {
      content: content.filter(isToolContent),
      isError: result['isError'] === true,
    };
  }

  return {
    content: [{ type: 'text', text: JSON.stringify(result) }],
    isError: false,
  };
}
