import type { Question } from '@quizcast/types';

/** Topic used when neither the source nor the request names one. */
export const GENERAL_TOPIC = 'General';

/** Raised when a question would break its own invariants. */
export class InvalidQuestionError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'InvalidQuestionError';
  }
}

/** Fields accepted by {@link createQuestion}; explanation and topic are optional. */
export type QuestionInput = {
  text: string;
  options: readonly string[];
  correctIndex: number;
  explanation?: string;
  topic?: string;
};

/** Validate and freeze a question. */
export function createQuestion(input: QuestionInput): Question {
  if (input.text.trim().length === 0) {
    throw new InvalidQuestionError('Question text is empty');
  }
  if (input.options.length < 2) {
    throw new InvalidQuestionError(`Expected at least 2 options, got ${input.options.length}`);
  }
  if (
    !Number.isInteger(input.correctIndex) ||
    input.correctIndex < 0 ||
    input.correctIndex >= input.options.length
  ) {
    throw new InvalidQuestionError(`correctIndex ${input.correctIndex} is out of range`);
  }
  return Object.freeze({
    text: input.text,
    options: Object.freeze([...input.options]),
    correctIndex: input.correctIndex,
    explanation: input.explanation ?? '',
    topic: input.topic || GENERAL_TOPIC,
  });
}

/**
 * Dedup key: trimmed text plus answer index. Two questions sharing both are
 * the same question no matter how their options are worded.
 */
export function fingerprintOf(question: Pick<Question, 'text' | 'correctIndex'>): string {
  return `${question.text.trim()}\u0000${question.correctIndex}`;
}
