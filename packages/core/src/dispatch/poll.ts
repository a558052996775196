import type { Question, QuizPoll } from '@quizcast/types';

/** Platform limits for quiz polls (Telegram Bot API). */
export const POLL_LIMITS = {
  question: 300,
  option: 100,
  explanation: 200,
} as const;

/**
 * Truncate to `maxLen` UTF-16 code units (the unit Telegram counts), marking
 * the cut with an ellipsis. Never splits a surrogate pair.
 */
export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  let kept = '';
  for (const char of text) {
    if (kept.length + char.length > maxLen - 1) break;
    kept += char;
  }
  return `${kept}…`;
}

/** Shape a question for delivery: topic-tagged prompt, everything cut to platform limits. */
export function toQuizPoll(question: Question): QuizPoll {
  const explanation = question.explanation.trim();
  return {
    question: truncate(`[${question.topic}] ${question.text.trim()}`, POLL_LIMITS.question),
    options: question.options.map((option) => truncate(option, POLL_LIMITS.option)),
    correctIndex: question.correctIndex,
    explanation: explanation ? truncate(explanation, POLL_LIMITS.explanation) : undefined,
    topic: question.topic,
  };
}
