import { readFileSync } from 'node:fs';
import type { Question } from '@quizcast/types';
import { z } from 'zod';

const bankSchema = z.array(
  z
    .object({
      text: z.string().trim().min(1),
      options: z.array(z.string().min(1)).min(2),
      correctIndex: z.number().int().min(0),
      explanation: z.string().default(''),
      topic: z.string().min(1),
    })
    .refine((entry) => entry.correctIndex < entry.options.length, {
      message: 'correctIndex out of range',
    })
);

let cached: readonly Question[] | undefined;

function load(): readonly Question[] {
  const raw = readFileSync(new URL('../data/questions.json', import.meta.url), 'utf8');
  const entries = bankSchema.parse(JSON.parse(raw));
  return Object.freeze(
    entries.map((entry) =>
      Object.freeze({ ...entry, options: Object.freeze([...entry.options]) })
    )
  );
}

/** The whole embedded fallback bank. */
export function fallbackQuestions(): readonly Question[] {
  cached ??= load();
  return cached;
}

/** Bank entries whose topic equals `topic` exactly; may be empty. */
export function questionsForTopic(topic: string): Question[] {
  return fallbackQuestions().filter((q) => q.topic === topic);
}
