export { fallbackQuestions, questionsForTopic } from './bank.js';
export { DEFAULT_TIMEZONE, defaultRotation, defaultTopics } from './builtin.js';
export type { BuiltinTopic } from './builtin.js';
