import { fallbackQuestions } from '@quizcast/catalog';
import type { Question, QuestionProvider, QuestionQuery } from '@quizcast/types';

/**
 * Offline provider for dry runs and demos. Serves bank questions one per
 * call, cycling through the raw shapes a real API may answer with.
 */
export class MockQuestionProvider implements QuestionProvider {
  private calls = 0;
  private readonly questions: readonly Question[];

  public constructor(questions: readonly Question[] = fallbackQuestions()) {
    this.questions = questions;
  }

  public async fetch(query: QuestionQuery): Promise<unknown> {
    const pool = this.questions.filter((q) => !query.topic || q.topic === query.topic);
    if (pool.length === 0) return [];
    const picked: Question[] = [];
    for (let i = 0; i < Math.max(1, query.count); i += 1) {
      const question = pool[(this.calls + i) % pool.length];
      if (question) picked.push(question);
    }
    const shape = this.calls % 3;
    this.calls += 1;
    const raw = picked.map((q) => ({
      pergunta: q.text,
      opcoes: [...q.options],
      correta: shape === 1 ? q.options[q.correctIndex] : q.correctIndex,
      comentario: q.explanation,
      topico: q.topic,
    }));
    if (shape === 0 && raw.length === 1) return raw[0];
    if (shape === 1) return { result: raw };
    return raw;
  }
}
