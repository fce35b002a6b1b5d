/**
 * CommandProbe — tool discovery against a local process.
 *
 * One attempt = one ProtocolConnection: start (or attach), handshake,
 * tools/list, and an unconditional disconnect on every exit path. The
 * whole attempt runs under an outer deadline; when it fires the process
 * is force-stopped before the probe returns.
 */

import { toError } from '@toolscout/shared';
import type { DiscoveryMethod, DiscoveryResult } from '@toolscout/shared';
import { ProtocolConnection } from './connection.js';
import type { ClientInfo } from './connection.js';
import type { ProcessHandle, ProcessLauncher } from './process.js';
import { withTimeout } from './timing.js';

export interface CommandProbeOptions {
  /** Outer deadline for one discovery attempt (default: 15s). */
  timeoutMs?: number;
  /** Per-request timeout inside the attempt (default: the outer deadline). */
  requestTimeoutMs?: number;
  shutdownTimeoutMs?: number;
  launcher?: ProcessLauncher;
  clientInfo?: ClientInfo;
}

export interface CommandDiscoveryOptions {
  /** Appended to the command. */
  args?: string[];
  /** Merged over the inherited environment. */
  env?: Record<string, string>;
  workingDir?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;

export class CommandProbe {
  readonly timeoutMs: number;
  private options: CommandProbeOptions;

  constructor(options: CommandProbeOptions = {}) {
    this.options = options;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Start `command args...` locally and list its tools. */
  async discoverFromCommand(
    command: string[],
    options: CommandDiscoveryOptions = {},
  ): Promise<DiscoveryResult | null> {
    const argv = [...command, ...(options.args ?? [])];
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const connection = this.createConnection(timeoutMs);

    console.log(`[command-probe] Discovering tools from: ${argv.join(' ')}`);
    return this.run(
      connection,
      'stdio',
      argv.join(' '),
      timeoutMs,
      () => connection.connect(argv, options.workingDir, options.env),
    );
  }

  /**
   * List tools over a process someone else started (e.g. an attached
   * container). The handle is stopped when discovery ends.
   */
  async discoverFromProcess(
    handle: ProcessHandle,
    method: DiscoveryMethod,
    timeoutMs: number = this.timeoutMs,
  ): Promise<DiscoveryResult | null> {
    const connection = this.createConnection(timeoutMs);
    return this.run(connection, method, handle.label, timeoutMs, () => connection.attach(handle));
  }

  private createConnection(timeoutMs: number): ProtocolConnection {
    return new ProtocolConnection({
      timeoutMs: this.options.requestTimeoutMs ?? timeoutMs,
      shutdownTimeoutMs: this.options.shutdownTimeoutMs,
      launcher: this.options.launcher,
      clientInfo: this.options.clientInfo,
    });
  }

  private async run(
    connection: ProtocolConnection,
    method: DiscoveryMethod,
    label: string,
    timeoutMs: number,
    open: () => Promise<boolean>,
  ): Promise<DiscoveryResult | null> {
    try {
      return await withTimeout(
        this.discover(connection, method, label, open),
        timeoutMs,
        `Discovery from ${label}`,
      );
    } catch (err) {
      console.warn(`[command-probe] ${toError(err).message}`);
      return null;
    } finally {
      await connection.disconnect();
    }
  }

  private async discover(
    connection: ProtocolConnection,
    method: DiscoveryMethod,
    label: string,
    open: () => Promise<boolean>,
  ): Promise<DiscoveryResult | null> {
    if (!(await open())) {
      console.warn(`[command-probe] Could not establish an MCP session with ${label}`);
      return null;
    }

    const tools = await connection.listTools();
    if (!tools || tools.length === 0) {
      console.warn(`[command-probe] No tools discovered from ${label}`);
      return null;
    }

    const serverInfo = connection.getServerInfo();
    console.log(`[command-probe] Discovered ${tools.length} tool(s) from ${label}`);
    return {
      tools,
      discoveryMethod: method,
      ...(serverInfo ? { serverInfo } : {}),
      timestamp: new Date().toISOString(),
    };
  }
}
