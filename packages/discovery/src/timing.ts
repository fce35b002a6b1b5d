import { TimeoutError, toError } from '@toolscout/shared';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Race a promise against a deadline.
 *
 * The underlying work is not cancelled; callers must tear down whatever
 * it was driving. Settlement after the deadline is ignored.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  sleep?: Sleep;
}

/**
 * Call check() until it returns 'ready', returns 'failed', or the timeout
 * elapses. Errors thrown by check() count as "not ready yet".
 */
export async function pollUntil(
  check: () => Promise<'ready' | 'pending' | 'failed'>,
  options: PollOptions,
): Promise<boolean> {
  const wait = options.sleep ?? sleep;
  const deadline = Date.now() + options.timeoutMs;

  while (true) {
    try {
      const state = await check();
      if (state === 'ready') return true;
      if (state === 'failed') return false;
    } catch (err) {
      console.warn(`[poll] Readiness check failed: ${toError(err).message}`);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await wait(Math.min(options.intervalMs, remaining));
  }
}
