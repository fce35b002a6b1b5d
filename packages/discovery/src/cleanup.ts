/**
 * Resource teardown with detached, bounded retries.
 *
 * remove() makes one synchronous attempt bounded by removeTimeoutMs. If it
 * fails, the resource is handed to a background loop that owns it from then
 * on: up to maxRetries further attempts, waiting baseDelayMs, 2x, 4x, ...
 * before each. The caller is never blocked by, or told about, the background
 * loop; a resource that still cannot be removed is logged as leaked.
 */

import { CleanupError, toError } from '@toolscout/shared';
import { sleep as defaultSleep, withTimeout } from './timing.js';
import type { Sleep } from './timing.js';

export interface CleanerOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  removeTimeoutMs?: number;
  sleep?: Sleep;
}

export type RemoveFn = () => Promise<void>;

export class BackgroundCleaner {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly removeTimeoutMs: number;
  private sleep: Sleep;
  private tasks: Set<Promise<void>> = new Set();

  constructor(options: CleanerOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 1000;
    this.removeTimeoutMs = options.removeTimeoutMs ?? 10_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Remove a resource now, falling back to background retries.
   * Resolves true if the synchronous attempt succeeded. Never rejects.
   */
  async remove(label: string, remove: RemoveFn): Promise<boolean> {
    try {
      await withTimeout(remove(), this.removeTimeoutMs, `Removing ${label}`);
      console.log(`[cleanup] Removed ${label}`);
      return true;
    } catch (err) {
      console.warn(`[cleanup] Failed to remove ${label}: ${toError(err).message}; retrying in background`);
      this.schedule(label, remove);
      return false;
    }
  }

  /** Start a detached retry loop for a resource. */
  schedule(label: string, remove: RemoveFn): void {
    const task: Promise<void> = this.retry(label, remove).finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  /** Number of background loops still running. */
  get pending(): number {
    return this.tasks.size;
  }

  /** Wait for every background loop to finish (used at shutdown). */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  private async retry(label: string, remove: RemoveFn): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      await this.sleep(this.baseDelayMs * 2 ** (attempt - 1));
      try {
        await withTimeout(remove(), this.removeTimeoutMs, `Removing ${label}`);
        console.log(`[cleanup] Removed ${label} (background attempt ${attempt}/${this.maxRetries})`);
        return;
      } catch (err) {
        lastError = err;
        console.warn(
          `[cleanup] Background attempt ${attempt}/${this.maxRetries} to remove ${label} failed: ` +
          toError(err).message,
        );
      }
    }

    const leak = new CleanupError(label, this.maxRetries, { cause: lastError });
    console.error(`[cleanup] ${leak.message}`);
  }
}
