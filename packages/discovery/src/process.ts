/**
 * Process handles — the one seam between the protocol connection and
 * whatever started the server.
 *
 * A local child process and a Docker-attached container both expose the
 * same shape: a stdin to write JSON-RPC lines to, a stdout to read them
 * from, and a way to ask the process to stop.
 */

import { spawn } from 'node:child_process';
import type { ChildProcessWithoutNullStreams } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';
import { ConnectionError, toError } from '@toolscout/shared';

export interface ProcessHandle {
  readonly stdin: Writable;
  readonly stdout: Readable;
  /** Human-readable identity for log lines (pid, container id, ...). */
  readonly label: string;
  isAlive(): boolean;
  /** Ask the process to exit (SIGTERM or equivalent). */
  terminate(): Promise<void>;
  /** Force the process to exit (SIGKILL or equivalent). */
  kill(): Promise<void>;
  /** Resolve true once the process has exited, false if timeoutMs elapses first. */
  waitForExit(timeoutMs: number): Promise<boolean>;
}

export interface LaunchOptions {
  cwd?: string;
  env: NodeJS.ProcessEnv;
}

export type ProcessLauncher = (command: string[], options: LaunchOptions) => Promise<ProcessHandle>;

/**
 * Graceful stop, bounded wait, then force. Never throws.
 */
export async function stopProcess(handle: ProcessHandle, graceMs: number): Promise<void> {
  try {
    if (!handle.isAlive()) return;

    await handle.terminate();
    if (await handle.waitForExit(graceMs)) return;

    console.warn(`[process] ${handle.label} did not exit within ${graceMs}ms, killing`);
    await handle.kill();
    if (!(await handle.waitForExit(graceMs))) {
      console.error(`[process] ${handle.label} is still running after kill`);
    }
  } catch (err) {
    console.warn(`[process] Failed to stop ${handle.label}: ${toError(err).message}`);
  }
}

// ---------------------------------------------------------------------------
// Local child processes
// ---------------------------------------------------------------------------

class ChildProcessHandle implements ProcessHandle {
  readonly label: string;
  private child: ChildProcessWithoutNullStreams;

  constructor(child: ChildProcessWithoutNullStreams, executable: string) {
    this.child = child;
    this.label = `${executable} (pid ${child.pid ?? '?'})`;

    child.stdin.on('error', (err) => {
      console.warn(`[process] ${this.label} stdin error: ${err.message}`);
    });

    // Relay server diagnostics; MCP servers log to stderr by convention
    child.stderr.on('data', (chunk: Buffer) => {
      const text = chunk.toString('utf-8').trim();
      if (text) console.log(`[process] ${this.label} stderr: ${text}`);
    });
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  isAlive(): boolean {
    return this.child.exitCode === null && this.child.signalCode === null;
  }

  async terminate(): Promise<void> {
    if (this.isAlive()) this.child.kill('SIGTERM');
  }

  async kill(): Promise<void> {
    if (this.isAlive()) this.child.kill('SIGKILL');
  }

  waitForExit(timeoutMs: number): Promise<boolean> {
    if (!this.isAlive()) return Promise.resolve(true);

    return new Promise((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.child.off('exit', onExit);
        resolve(false);
      }, timeoutMs);
      this.child.once('exit', onExit);
    });
  }
}

/**
 * Spawn a local process with piped stdio.
 * Resolves once the OS reports the process started; rejects with
 * ConnectionError if it could not be spawned (e.g. ENOENT).
 */
export const spawnProcess: ProcessLauncher = (command, options) => {
  const [executable, ...args] = command;
  if (!executable) {
    return Promise.reject(new ConnectionError('Cannot spawn an empty command'));
  }

  return new Promise((resolve, reject) => {
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(executable, args, {
        cwd: options.cwd,
        env: options.env,
      });
    } catch (err) {
      reject(new ConnectionError(`Failed to spawn ${executable}: ${toError(err).message}`, { cause: err }));
      return;
    }

    const onError = (err: Error): void => {
      reject(new ConnectionError(`Failed to spawn ${executable}: ${err.message}`, { cause: err }));
    };
    child.once('error', onError);
    child.once('spawn', () => {
      child.off('error', onError);
      child.on('error', (err) => {
        console.warn(`[process] ${executable} error: ${err.message}`);
      });
      resolve(new ChildProcessHandle(child, executable));
    });
  });
};
