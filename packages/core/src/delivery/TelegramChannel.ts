import type { DeliveryChannel, Milliseconds, QuizPoll } from '@quizcast/types';
import axios, { type AxiosInstance } from 'axios';

/** Options to configure the Telegram Bot API channel. */
export type TelegramChannelOptions = {
  /** Bot token issued by BotFather */
  token: string;
  /** Destination chat: numeric id or @channelusername */
  chatId: string;
  timeoutMs?: Milliseconds;
  /** Pre-configured axios instance; one is created when omitted */
  http?: AxiosInstance;
};

type BotApiResponse = { ok: boolean; description?: string };

/** Publishes quiz polls and notices to a Telegram chat through the Bot API. */
export class TelegramChannel implements DeliveryChannel {
  private readonly http: AxiosInstance;
  private readonly chatId: string;

  public constructor(options: TelegramChannelOptions) {
    if (!options.token) throw new Error('Telegram bot token is not set');
    if (!options.chatId) throw new Error('Telegram chat id is not set');
    this.chatId = options.chatId;
    this.http =
      options.http ??
      axios.create({
        baseURL: `https://api.telegram.org/bot${options.token}/`,
        timeout: options.timeoutMs ?? 15_000,
      });
  }

  public async sendQuiz(poll: QuizPoll): Promise<void> {
    await this.call('sendPoll', {
      chat_id: this.chatId,
      question: poll.question,
      options: poll.options.map((text) => ({ text })),
      type: 'quiz',
      correct_option_id: poll.correctIndex,
      is_anonymous: false,
      ...(poll.explanation ? { explanation: poll.explanation } : {}),
    });
  }

  public async sendNotice(text: string): Promise<void> {
    await this.call('sendMessage', { chat_id: this.chatId, text, parse_mode: 'Markdown' });
  }

  private async call(method: string, body: Record<string, unknown>): Promise<void> {
    const { data } = await this.http.post<BotApiResponse>(method, body);
    if (!data.ok) {
      throw new Error(`Telegram ${method} failed: ${data.description ?? 'unknown error'}`);
    }
  }
}
