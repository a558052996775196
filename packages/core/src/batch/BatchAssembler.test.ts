import type { Question, QuestionProvider } from '@quizcast/types';
import { describe, expect, it } from 'vitest';
import { RecencyCache } from '../cache/RecencyCache.js';
import { createQuestion, fingerprintOf } from '../question/Question.js';
import { silentLogger } from '../telemetry/Log.js';
import { type BatchAssemblerOptions, BatchAssembler } from './BatchAssembler.js';

const noWait = { sleep: async () => {} };

function raw(n: number, topic = 'Penal') {
  return { pergunta: `Questão ${n}`, opcoes: ['a', 'b', 'c'], correta: n % 3, topico: topic };
}

/** Provider that answers call i with script[i]; Error entries reject, calls past the end reject too. */
function scripted(script: Array<unknown | Error>): QuestionProvider & { calls: number } {
  const provider = {
    calls: 0,
    async fetch(): Promise<unknown> {
      const step = script[provider.calls];
      provider.calls += 1;
      if (step === undefined || step instanceof Error) throw step ?? new Error('script exhausted');
      return step;
    },
  };
  return provider;
}

function bankOf(topic: string, n: number): Question[] {
  return Array.from({ length: n }, (_, i) =>
    createQuestion({ text: `Banco ${topic} ${i}`, options: ['x', 'y'], correctIndex: i % 2, topic })
  );
}

function assembler(overrides: Partial<BatchAssemblerOptions> & Pick<BatchAssemblerOptions, 'provider'>) {
  return new BatchAssembler({
    cache: new RecencyCache(),
    bank: [],
    retry: noWait,
    shuffle: false,
    logger: silentLogger,
    ...overrides,
  });
}

const texts = (qs: readonly Question[]) => qs.map((q) => q.text);

describe('BatchAssembler', () => {
  it('fills a batch of unique questions, skipping in-batch duplicates', async () => {
    const provider = scripted([raw(1), raw(2), raw(1), raw(3), raw(4), raw(1), raw(5), raw(6), raw(7), raw(8), raw(9), raw(10)]);
    const cache = new RecencyCache();
    const result = await assembler({ provider, cache }).assemble('Penal', 10);

    expect(result.source).toBe('provider');
    expect(result.questions).toHaveLength(10);
    expect(new Set(result.questions.map(fingerprintOf)).size).toBe(10);
    expect(texts(result.questions)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10].map((n) => `Questão ${n}`));
    expect(provider.calls).toBe(12);
    expect(result.fetches).toBe(12);
    expect(cache.size).toBe(10);
  });

  it('returns the unique items it got when the provider goes down mid-batch', async () => {
    const provider = scripted([raw(1), raw(2), raw(1), raw(3), raw(4), raw(1), raw(5), raw(6), raw(7), raw(8)]);
    const result = await assembler({ provider, bank: bankOf('Penal', 5) }).assemble('Penal', 10);

    // 10 scripted answers, then one logical fetch of three failing attempts ends the loop
    expect(provider.calls).toBe(13);
    expect(result.source).toBe('provider');
    expect(texts(result.questions)).toEqual([1, 2, 3, 4, 5, 6, 7, 8].map((n) => `Questão ${n}`));
  });

  it('skips questions already in the recency cache', async () => {
    const cache = new RecencyCache();
    const seenBefore = createQuestion({ text: 'Questão 1', options: ['a', 'b'], correctIndex: 1 });
    cache.register(fingerprintOf(seenBefore));

    const provider = scripted([raw(1), raw(2)]);
    const questions = await assembler({ provider, cache }).assembleBatch('Penal', 1);
    expect(texts(questions)).toEqual(['Questão 2']);
  });

  it('can ignore the recency cache', async () => {
    const cache = new RecencyCache();
    cache.register(fingerprintOf({ text: 'Questão 1', correctIndex: 1 }));
    const provider = scripted([raw(1)]);
    const questions = await assembler({ provider, cache, avoidRecent: false }).assembleBatch('Penal', 1);
    expect(texts(questions)).toEqual(['Questão 1']);
  });

  it('stops after count * generosity fetches when the provider keeps repeating', async () => {
    const provider = scripted(Array.from({ length: 50 }, () => raw(1)));
    const result = await assembler({ provider, generosity: 3 }).assemble('Penal', 4);
    expect(provider.calls).toBe(12);
    expect(texts(result.questions)).toEqual(['Questão 1']);
  });

  it('treats an empty normalized response as a miss, not an outage', async () => {
    const provider = scripted([{ status: 'empty' }, [], raw(2)]);
    const questions = await assembler({ provider }).assembleBatch('Penal', 1);
    expect(texts(questions)).toEqual(['Questão 2']);
    expect(provider.calls).toBe(3);
  });

  it('takes several items from one response and truncates to count', async () => {
    const provider = scripted([[raw(1), raw(2), raw(3)]]);
    const questions = await assembler({ provider }).assembleBatch('Penal', 2);
    expect(texts(questions)).toEqual(['Questão 1', 'Questão 2']);
  });

  it('shuffles provider batches with the injected random source', async () => {
    const provider = scripted([[raw(1), raw(2), raw(3)]]);
    const questions = await assembler({ provider, shuffle: true, random: () => 0 }).assembleBatch('Penal', 3);
    // i=2 swaps with 0, then i=1 swaps with 0
    expect(texts(questions)).toEqual(['Questão 2', 'Questão 3', 'Questão 1']);
  });

  describe('fallback', () => {
    it('aborts after one exhausted fetch and returns exactly N distinct bank items', async () => {
      const provider = scripted([]);
      const cache = new RecencyCache();
      const bank = [...bankOf('Penal', 12), ...bankOf('Constitucional', 3)];
      const result = await assembler({ provider, cache, bank }).assemble('Penal', 10);

      expect(provider.calls).toBe(3);
      expect(result.source).toBe('fallback');
      expect(result.questions).toHaveLength(10);
      expect(result.questions.every((q) => q.topic === 'Penal')).toBe(true);
      expect(new Set(result.questions.map(fingerprintOf)).size).toBe(10);
      expect(cache.size).toBe(10);
    });

    it('repeats only when the topic has fewer entries than requested', async () => {
      const provider = scripted([]);
      const bank = bankOf('Penal', 2);
      const questions = await assembler({ provider, bank, random: () => 0 }).assembleBatch('Penal', 5);
      expect(texts(questions)).toEqual([
        'Banco Penal 0',
        'Banco Penal 1',
        'Banco Penal 0',
        'Banco Penal 1',
        'Banco Penal 0',
      ]);
    });

    it('uses the whole bank when no entry matches the topic', async () => {
      const provider = scripted([]);
      const bank = bankOf('Constitucional', 3);
      const questions = await assembler({ provider, bank }).assembleBatch('Penal', 3);
      expect([...texts(questions)].sort()).toEqual([
        'Banco Constitucional 0',
        'Banco Constitucional 1',
        'Banco Constitucional 2',
      ]);
    });

    it('also falls back when the provider only returns malformed data', async () => {
      const provider = scripted(Array.from({ length: 8 }, () => ({ text: 'no options' })));
      const result = await assembler({ provider, bank: bankOf('Penal', 2) }).assemble('Penal', 2);
      expect(provider.calls).toBe(8);
      expect(result.source).toBe('fallback');
      expect(result.questions).toHaveLength(2);
    });

    it('yields an empty batch when the provider is down and the bank is empty', async () => {
      const result = await assembler({ provider: scripted([]) }).assemble('Penal', 3);
      expect(result).toEqual({ questions: [], source: 'none', fetches: 1 });
    });
  });

  it('returns nothing without fetching for a non-positive count', async () => {
    const provider = scripted([raw(1)]);
    expect(await assembler({ provider }).assembleBatch('Penal', 0)).toEqual([]);
    expect(provider.calls).toBe(0);
  });

  it('stops the provider loop once the deadline passes', async () => {
    let clock = 0;
    const provider = scripted(Array.from({ length: 10 }, () => raw(1)));
    const result = await assembler({
      provider,
      deadlineMs: 30,
      now: () => {
        clock += 10;
        return clock;
      },
    }).assemble('Penal', 5);
    // deadline = 10 + 30; checks read 20, 30, then 40
    expect(provider.calls).toBe(2);
    expect(texts(result.questions)).toEqual(['Questão 1']);
  });
});
