import { afterEach, describe, expect, it, vi } from 'vitest';
import { BackgroundCleaner } from '../src/cleanup.js';

function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}

describe('BackgroundCleaner', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('removes synchronously when the first attempt succeeds', async () => {
    const { delays, sleep } = recordingSleep();
    const cleaner = new BackgroundCleaner({ sleep });
    const remove = vi.fn(async () => {});

    expect(await cleaner.remove('container abc', remove)).toBe(true);
    expect(remove).toHaveBeenCalledTimes(1);
    expect(cleaner.pending).toBe(0);
    expect(delays).toEqual([]);
  });

  it('retries in the background with exponential backoff', async () => {
    const { delays, sleep } = recordingSleep();
    const cleaner = new BackgroundCleaner({ sleep, maxRetries: 3, baseDelayMs: 1000 });
    let calls = 0;
    const remove = vi.fn(async () => {
      calls++;
      if (calls < 3) throw new Error('daemon busy');
    });

    expect(await cleaner.remove('container abc', remove)).toBe(false);
    await cleaner.drain();

    expect(remove).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
    expect(cleaner.pending).toBe(0);
  });

  it('gives up after maxRetries and reports the leak', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { delays, sleep } = recordingSleep();
    const cleaner = new BackgroundCleaner({ sleep, maxRetries: 3, baseDelayMs: 1000 });
    const remove = vi.fn(async () => {
      throw new Error('daemon gone');
    });

    await cleaner.remove('container abc', remove);
    await cleaner.drain();

    expect(remove).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(errors).toHaveBeenCalledWith(
      '[cleanup] Failed to remove container abc after 3 attempt(s); manual removal required',
    );
  });

  it('does not block the caller on background retries', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const cleaner = new BackgroundCleaner({ sleep: () => gate, maxRetries: 1 });
    const remove = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('still running'))
      .mockResolvedValueOnce(undefined);

    expect(await cleaner.remove('deployment ns/probe', remove)).toBe(false);
    expect(cleaner.pending).toBe(1);
    expect(remove).toHaveBeenCalledTimes(1);

    release();
    await cleaner.drain();

    expect(remove).toHaveBeenCalledTimes(2);
    expect(cleaner.pending).toBe(0);
  });

  it('bounds a hanging removal by removeTimeoutMs', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { sleep } = recordingSleep();
    const cleaner = new BackgroundCleaner({ sleep, maxRetries: 0, removeTimeoutMs: 20 });
    const remove = vi.fn(() => new Promise<void>(() => {}));

    expect(await cleaner.remove('service ns/probe', remove)).toBe(false);
    await cleaner.drain();
    expect(remove).toHaveBeenCalledTimes(1);
  });
});
