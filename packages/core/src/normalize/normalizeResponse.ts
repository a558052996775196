import type { JsonObject, Question } from '@quizcast/types';
import { z } from 'zod';
import { GENERAL_TOPIC, createQuestion } from '../question/Question.js';

/** Accepted spellings for each field, in lookup order. */
export const fieldAliases = {
  text: ['text', 'question', 'pergunta', 'prompt'],
  options: ['options', 'opcoes', 'choices'],
  correct: ['correctIndex', 'correct', 'correta', 'answerIndex', 'answer'],
  explanation: ['explanation', 'comentario', 'explicacao'],
  topic: ['topic', 'topico', 'materia'],
} as const;

/** Wrapper keys checked before falling back to the first array-valued key. */
const preferredListKeys = ['result', 'questions', 'questoes', 'items', 'data'] as const;

const optionsSchema = z.array(z.union([z.string(), z.number()])).min(2);
const correctSchema = z.union([z.number(), z.string()]);
const INTEGER_TEXT = /^\s*-?\d+\s*$/;

type Alias = (typeof fieldAliases)[keyof typeof fieldAliases];

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First alias present on the item, or undefined when none is. */
function pick(item: JsonObject, aliases: Alias): unknown {
  for (const key of aliases) {
    if (key in item) return item[key];
  }
  return undefined;
}

function hasRequiredFields(item: JsonObject): boolean {
  return (
    fieldAliases.text.some((k) => k in item) &&
    fieldAliases.options.some((k) => k in item) &&
    fieldAliases.correct.some((k) => k in item)
  );
}

/** A list with at least one question-shaped object in it. */
function holdsQuestions(value: unknown): value is unknown[] {
  return Array.isArray(value) && value.some((entry) => isObject(entry) && hasRequiredFields(entry));
}

/**
 * Reduce any accepted payload shape to a list of candidate items. A wrapper's
 * list is only taken when it holds something question-shaped, so unrelated
 * arrays (tags, ids) next to the real list are skipped.
 */
function unwrap(raw: unknown): unknown[] {
  if (Array.isArray(raw)) return raw;
  if (!isObject(raw)) return [];
  if (hasRequiredFields(raw)) return [raw];
  for (const key of preferredListKeys) {
    const value = raw[key];
    if (holdsQuestions(value)) return value;
  }
  for (const value of Object.values(raw)) {
    if (holdsQuestions(value)) return value;
  }
  return [];
}

/**
 * Resolve the correct-answer field to an index. Integers (or integer strings)
 * in range are indexes; anything else is matched against option text.
 */
export function resolveCorrectIndex(value: unknown, options: readonly string[]): number | undefined {
  const parsed = correctSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const correct = parsed.data;

  const asIndex =
    typeof correct === 'number'
      ? correct
      : INTEGER_TEXT.test(correct)
        ? Number.parseInt(correct, 10)
        : Number.NaN;
  if (Number.isInteger(asIndex) && asIndex >= 0 && asIndex < options.length) {
    return asIndex;
  }

  const literal = String(correct).trim();
  if (literal.length === 0) return undefined;
  const exact = options.findIndex((option) => option.trim() === literal);
  if (exact >= 0) return exact;
  const folded = literal.toLowerCase();
  const loose = options.findIndex((option) => option.trim().toLowerCase() === folded);
  return loose >= 0 ? loose : undefined;
}

function normalizeItem(item: unknown, defaultTopic: string | undefined): Question | undefined {
  if (!isObject(item) || !hasRequiredFields(item)) return undefined;

  const text = pick(item, fieldAliases.text);
  if (typeof text !== 'string' || text.trim().length === 0) return undefined;

  const rawOptions = optionsSchema.safeParse(pick(item, fieldAliases.options));
  if (!rawOptions.success) return undefined;
  const options = rawOptions.data.map(String);
  if (options.some((option) => option.trim().length === 0)) return undefined;

  const correctIndex = resolveCorrectIndex(pick(item, fieldAliases.correct), options);
  if (correctIndex === undefined) return undefined;

  const rawExplanation = pick(item, fieldAliases.explanation);
  const explanation =
    typeof rawExplanation === 'string' || typeof rawExplanation === 'number'
      ? String(rawExplanation)
      : '';

  const rawTopic = pick(item, fieldAliases.topic);
  const topic =
    typeof rawTopic === 'string' && rawTopic.trim().length > 0
      ? rawTopic
      : defaultTopic || GENERAL_TOPIC;

  return createQuestion({ text, options, correctIndex, explanation, topic });
}

/**
 * Map a provider payload to canonical questions. Accepts a bare question
 * object, an object wrapping a list, or a list. Invalid items are dropped
 * individually; never throws.
 */
export function normalizeResponse(raw: unknown, defaultTopic?: string): Question[] {
  const questions: Question[] = [];
  for (const item of unwrap(raw)) {
    const question = normalizeItem(item, defaultTopic);
    if (question) questions.push(question);
  }
  return questions;
}
