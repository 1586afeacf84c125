import { describe, expect, it } from 'vitest';
import { nextDelay, sleep } from './backoff.js';

describe('nextDelay', () => {
  const policy = { baseDelayMs: 100, maxDelayMs: 1000 };

  it('doubles per attempt', () => {
    expect([1, 2, 3, 4].map((attempt) => nextDelay(attempt, policy))).toEqual([100, 200, 400, 800]);
  });

  it('caps at the maximum', () => {
    expect(nextDelay(5, policy)).toBe(1000);
    expect(nextDelay(30, policy)).toBe(1000);
  });

  it('treats attempt 0 like the first attempt', () => {
    expect(nextDelay(0, policy)).toBe(100);
  });
});

describe('sleep', () => {
  it('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('resolves immediately for an already-aborted signal', async () => {
    await expect(sleep(10_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
