import type { Logger, Milliseconds, Question, QuestionProvider } from '@quizcast/types';
import type { RecencyCache } from '../cache/RecencyCache.js';
import { type RetryOptions, fetchWithRetry } from '../fetch/fetchWithRetry.js';
import { normalizeResponse } from '../normalize/normalizeResponse.js';
import { fingerprintOf } from '../question/Question.js';
import { consoleLogger } from '../telemetry/Log.js';

/** Where a batch's questions came from. */
export type BatchSource = 'provider' | 'fallback' | 'none';

/** Outcome of one assembly run. */
export type BatchResult = {
  questions: Question[];
  source: BatchSource;
  /** Logical fetches issued against the provider */
  fetches: number;
};

/** Options that configure batch assembly. */
export type BatchAssemblerOptions = {
  provider: QuestionProvider;
  cache: RecencyCache;
  /** Local bank, filtered by topic, used when the provider yields nothing */
  bank: readonly Question[];
  /** Retry policy for each logical fetch */
  retry?: Omit<RetryOptions, 'logger'>;
  /** Loop budget multiplier: up to count * generosity fetches (default 4) */
  generosity?: number;
  /** Quantity requested per fetch (default 1) */
  perCallCount?: number;
  /** Skip questions already in the recency cache (default true) */
  avoidRecent?: boolean;
  /** Shuffle provider batches before returning (default true) */
  shuffle?: boolean;
  /** Deadline for the provider loop of a single call */
  deadlineMs?: Milliseconds;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
};

export const DEFAULT_GENEROSITY = 4;

/** Questions per batch when a caller does not say. */
export const DEFAULT_BATCH_SIZE = 10;

/**
 * Builds batches of distinct questions for a topic from the remote provider,
 * skipping anything delivered recently, and falls back to the local bank when
 * the provider yields nothing.
 */
export class BatchAssembler {
  private readonly options: BatchAssemblerOptions;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly logger: Logger;

  public constructor(options: BatchAssemblerOptions) {
    this.options = options;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? consoleLogger;
  }

  /** Up to `count` questions with pairwise-distinct fingerprints; empty when nothing could be sourced. */
  public async assembleBatch(topic: string, count: number): Promise<Question[]> {
    const { questions } = await this.assemble(topic, count);
    return questions;
  }

  /** Same as {@link assembleBatch}, also reporting the source. Never rejects. */
  public async assemble(topic: string, count: number): Promise<BatchResult> {
    if (count <= 0) return { questions: [], source: 'none', fetches: 0 };

    const { provider, cache } = this.options;
    const generosity = this.options.generosity ?? DEFAULT_GENEROSITY;
    const perCallCount = this.options.perCallCount ?? 1;
    const avoidRecent = this.options.avoidRecent ?? true;
    const deadline =
      this.options.deadlineMs !== undefined ? this.now() + this.options.deadlineMs : undefined;

    const batch: Question[] = [];
    const seen = new Set<string>();
    const budget = count * generosity;
    let fetches = 0;

    while (batch.length < count && fetches < budget) {
      if (deadline !== undefined && this.now() >= deadline) {
        this.logger.warn(`Batch deadline reached for "${topic}" after ${fetches} fetches`);
        break;
      }
      fetches += 1;
      const raw = await fetchWithRetry(
        provider,
        { count: perCallCount, topic },
        { ...this.options.retry, logger: this.logger }
      );
      if (raw === undefined) {
        this.logger.warn(`Question provider unavailable for "${topic}"; stopping fetch loop`);
        break;
      }

      for (const question of normalizeResponse(raw, topic)) {
        const key = fingerprintOf(question);
        if (seen.has(key)) continue;
        if (avoidRecent && cache.has(key)) continue;
        seen.add(key);
        batch.push(question);
        cache.register(key);
        if (batch.length >= count) break;
      }
    }

    if (batch.length > 0) {
      if (this.options.shuffle ?? true) this.shuffleInPlace(batch);
      return { questions: batch.slice(0, count), source: 'provider', fetches };
    }

    this.logger.warn(`No usable questions from provider for "${topic}"; using local bank`);
    const fallback = this.fromBank(topic, count);
    return { questions: fallback, source: fallback.length > 0 ? 'fallback' : 'none', fetches };
  }

  /**
   * Sample `count` bank questions for the topic (whole bank when none match).
   * Draws without repeats until the distinct pool runs out, then starts a new
   * round, so repeats appear only when the pool is smaller than `count`.
   */
  private fromBank(topic: string, count: number): Question[] {
    const { bank, cache } = this.options;
    const matching = bank.filter((q) => q.topic === topic);
    const source = matching.length > 0 ? matching : bank;

    const distinct = new Map<string, Question>();
    for (const q of source) {
      const key = fingerprintOf(q);
      if (!distinct.has(key)) distinct.set(key, q);
    }
    const pool = [...distinct.entries()];
    if (pool.length === 0) return [];

    const batch: Question[] = [];
    let remaining = [...pool];
    while (batch.length < count) {
      if (remaining.length === 0) remaining = [...pool];
      const index = Math.floor(this.random() * remaining.length);
      const [entry] = remaining.splice(Math.min(index, remaining.length - 1), 1);
      if (!entry) break;
      const [key, question] = entry;
      batch.push(question);
      cache.register(key);
    }
    return batch;
  }

  /** Fisher-Yates shuffle driven by the injected random source. */
  private shuffleInPlace(items: Question[]): void {
    for (let i = items.length - 1; i > 0; i -= 1) {
      const j = Math.floor(this.random() * (i + 1));
      [items[i], items[j]] = [items[j], items[i]];
    }
  }
}
