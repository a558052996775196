import type { QuestionProvider } from '@quizcast/types';
import { type HttpQuestionProviderOptions, HttpQuestionProvider } from './HttpQuestionProvider.js';
import { MockQuestionProvider } from './MockQuestionProvider.js';

/** Supported provider names. */
export type ProviderName = 'http' | 'mock';

/** Create a question provider from a provider name. `http` needs a URL. */
export function createProvider(
  name: ProviderName,
  options?: Partial<HttpQuestionProviderOptions>
): QuestionProvider {
  switch (name) {
    case 'http':
      return new HttpQuestionProvider({ ...options, url: options?.url ?? '' });
    case 'mock':
      return new MockQuestionProvider();
    default:
      return new MockQuestionProvider();
  }
}
