import type { Milliseconds, QuestionProvider, QuestionQuery } from '@quizcast/types';
import axios, { type AxiosInstance } from 'axios';

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

/** Options for the HTTP question source. */
export type HttpQuestionProviderOptions = {
  /** Endpoint queried with GET */
  url: string;
  /** Hard per-request timeout (default 10000) */
  timeoutMs?: Milliseconds;
  /** Query parameter carrying the requested quantity (default "count") */
  countParam?: string;
  /** Query parameter carrying the topic (default "topic") */
  topicParam?: string;
  /** Pre-configured axios instance; one is created when omitted */
  http?: AxiosInstance;
};

/**
 * Single-attempt GET against a remote question API. Timeouts, connection
 * errors, non-2xx statuses and non-JSON bodies all reject.
 */
export class HttpQuestionProvider implements QuestionProvider {
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly timeoutMs: Milliseconds;
  private readonly countParam: string;
  private readonly topicParam: string;

  public constructor(options: HttpQuestionProviderOptions) {
    if (!options.url) {
      throw new Error('Question API URL is not set');
    }
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.countParam = options.countParam ?? 'count';
    this.topicParam = options.topicParam ?? 'topic';
    this.http =
      options.http ??
      axios.create({
        headers: { Accept: 'application/json' },
      });
  }

  public async fetch(query: QuestionQuery): Promise<unknown> {
    const params: Record<string, string | number> = { [this.countParam]: query.count };
    if (query.topic) params[this.topicParam] = query.topic;
    const response = await this.http.get<unknown>(this.url, {
      params,
      timeout: this.timeoutMs,
      responseType: 'json',
      transitional: { silentJSONParsing: false, forcedJSONParsing: true, clarifyTimeoutError: false },
    });
    return response.data;
  }
}
