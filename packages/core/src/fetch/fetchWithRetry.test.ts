import type { QuestionProvider } from '@quizcast/types';
import { describe, expect, it, vi } from 'vitest';
import { silentLogger } from '../telemetry/Log.js';
import { backoffDelay, fetchWithRetry } from './fetchWithRetry.js';

function failingProvider(): QuestionProvider & { calls: number } {
  const provider = {
    calls: 0,
    async fetch(): Promise<unknown> {
      provider.calls += 1;
      throw new Error('connect ECONNREFUSED');
    },
  };
  return provider;
}

describe('fetchWithRetry', () => {
  it('returns the first successful payload without sleeping', async () => {
    const sleep = vi.fn(async () => {});
    const fetch = vi.fn(async () => ({ result: [] }));
    const payload = await fetchWithRetry({ fetch }, { count: 1, topic: 'Penal' }, {
      sleep,
      logger: silentLogger,
    });
    expect(payload).toEqual({ result: [] });
    expect(fetch).toHaveBeenCalledWith({ count: 1, topic: 'Penal' });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up with no data after exactly maxAttempts, sleeping between attempts only', async () => {
    const provider = failingProvider();
    const delays: number[] = [];
    const payload = await fetchWithRetry(provider, { count: 1 }, {
      maxAttempts: 4,
      backoffMs: 100,
      sleep: async (ms) => {
        delays.push(ms);
      },
      logger: silentLogger,
    });

    expect(payload).toBeUndefined();
    expect(provider.calls).toBe(4);
    expect(delays).toEqual([100, 200, 400]);
    expect(delays.reduce((a, b) => a + b, 0)).toBeGreaterThanOrEqual(100 * (1 + 2 + 4));
  });

  it('recovers when a later attempt succeeds', async () => {
    let calls = 0;
    const provider: QuestionProvider = {
      async fetch() {
        calls += 1;
        if (calls < 3) throw new Error('timeout of 10000ms exceeded');
        return { text: 'ok' };
      },
    };
    const warn = vi.fn();
    const payload = await fetchWithRetry(provider, { count: 1 }, {
      sleep: async () => {},
      logger: { ...silentLogger, warn },
    });
    expect(payload).toEqual({ text: 'ok' });
    expect(warn.mock.calls.map((c) => c[0])).toEqual([
      'Question fetch failed (1/3): timeout of 10000ms exceeded',
      'Question fetch failed (2/3): timeout of 10000ms exceeded',
    ]);
  });

  it('adds bounded jitter on top of the backoff', async () => {
    const delays: number[] = [];
    await fetchWithRetry(failingProvider(), { count: 1 }, {
      maxAttempts: 2,
      backoffMs: 700,
      jitterMs: 100,
      random: () => 0.5,
      sleep: async (ms) => {
        delays.push(ms);
      },
      logger: silentLogger,
    });
    expect(delays).toEqual([750]);
  });

  it('waits for real when no sleep is injected', async () => {
    vi.useFakeTimers();
    try {
      const provider = failingProvider();
      const pending = fetchWithRetry(provider, { count: 1 }, {
        maxAttempts: 2,
        backoffMs: 800,
        logger: silentLogger,
      });
      await vi.advanceTimersByTimeAsync(799);
      expect(provider.calls).toBe(1);
      await vi.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toBeUndefined();
      expect(provider.calls).toBe(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('backoffDelay', () => {
  it('doubles per attempt', () => {
    expect([1, 2, 3].map((a) => backoffDelay(700, a))).toEqual([700, 1400, 2800]);
  });
});
