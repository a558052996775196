import type { Logger, Milliseconds, QuestionProvider, QuestionQuery } from '@quizcast/types';
import { consoleLogger, describeError } from '../telemetry/Log.js';

/** Retry policy for a single logical fetch. */
export type RetryOptions = {
  /** Attempts before giving up (default 3) */
  maxAttempts?: number;
  /** Base delay; attempt n waits backoffMs * 2^(n-1) before the next (default 700) */
  backoffMs?: Milliseconds;
  /** Upper bound of uniform random delay added to each backoff (default 0) */
  jitterMs?: Milliseconds;
  sleep?: (ms: Milliseconds) => Promise<void>;
  random?: () => number;
  logger?: Logger;
};

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_MS = 700;

const defaultSleep = (ms: Milliseconds) => new Promise<void>((r) => setTimeout(r, ms));

/** Delay to wait after failed attempt `attempt` (1-based), before jitter. */
export function backoffDelay(backoffMs: Milliseconds, attempt: number): Milliseconds {
  return backoffMs * 2 ** (attempt - 1);
}

/**
 * Call the provider up to `maxAttempts` times with exponential backoff.
 * Resolves `undefined` once every attempt has failed; never rejects.
 */
export async function fetchWithRetry(
  provider: QuestionProvider,
  query: QuestionQuery,
  {
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    backoffMs = DEFAULT_BACKOFF_MS,
    jitterMs = 0,
    sleep = defaultSleep,
    random = Math.random,
    logger = consoleLogger,
  }: RetryOptions = {}
): Promise<unknown> {
  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await provider.fetch(query);
    } catch (err: unknown) {
      logger.warn(`Question fetch failed (${attempt}/${maxAttempts}): ${describeError(err)}`);
      if (attempt < maxAttempts) {
        const jitter = jitterMs > 0 ? random() * jitterMs : 0;
        await sleep(backoffDelay(backoffMs, attempt) + jitter);
      }
    }
  }
  return undefined;
}
