import type { DeliveryChannel, Logger } from '@quizcast/types';
import { type BatchAssembler, type BatchSource, DEFAULT_BATCH_SIZE } from '../batch/BatchAssembler.js';
import { consoleLogger, describeError } from '../telemetry/Log.js';
import type { Transcript } from '../telemetry/Transcript.js';
import { toQuizPoll } from './poll.js';

/** What triggered a dispatch. */
export type DispatchOrigin = 'manual' | 'scheduled';

/** Summary of one dispatch. */
export type DispatchReport = {
  topic: string;
  origin: DispatchOrigin;
  source: BatchSource;
  /** Questions in the assembled batch */
  assembled: number;
  sent: number;
  failed: number;
};

/** Options that configure the dispatcher. */
export type DispatcherOptions = {
  assembler: BatchAssembler;
  channel: DeliveryChannel;
  transcript?: Transcript;
  logger?: Logger;
  /** Batch size when a call does not give one (default 10) */
  defaultCount?: number;
  /** Called after every dispatch, e.g. to persist the recency cache */
  afterDispatch?: (report: DispatchReport) => Promise<void>;
};

const MARKDOWN_SPECIAL = /[_*`[]/;

/**
 * Bold `text` for Telegram's legacy Markdown. Entities cannot contain escaped
 * markup, so text holding `_`, `*`, a backtick or `[` is escaped and left plain.
 */
export function markdownBold(text: string): string {
  if (!MARKDOWN_SPECIAL.test(text)) return `*${text}*`;
  return text.replace(/[_*`[]/g, (ch) => `\\${ch}`);
}

/** User-visible notice sent when no question could be sourced. */
export function unavailableNotice(topic: string): string {
  return `⚠️ Could not load questions for ${markdownBold(topic)} right now. Please try again later.`;
}

/**
 * Single entry point shared by scheduled and manual triggers: assemble a
 * batch for a topic and hand each question to the delivery channel.
 * Publish failures are logged per poll and never abort the batch.
 */
export class Dispatcher {
  private readonly options: DispatcherOptions;
  private readonly logger: Logger;

  public constructor(options: DispatcherOptions) {
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  public async dispatch(
    topic: string,
    { count, origin = 'manual' }: { count?: number; origin?: DispatchOrigin } = {}
  ): Promise<DispatchReport> {
    const { assembler, channel, transcript } = this.options;
    const size = count ?? this.options.defaultCount ?? DEFAULT_BATCH_SIZE;
    this.logger.info(`Dispatching ${size} questions (${origin}) for "${topic}"`);
    transcript?.write({ ts: Date.now(), type: 'dispatch-start', topic, origin, count: size });

    const { questions, source } = await assembler.assemble(topic, size);
    transcript?.write({ ts: Date.now(), type: 'batch', topic, source, count: questions.length });

    const report: DispatchReport = {
      topic,
      origin,
      source,
      assembled: questions.length,
      sent: 0,
      failed: 0,
    };

    if (questions.length === 0) {
      this.logger.error(`No questions available for "${topic}"`);
      const notice = unavailableNotice(topic);
      try {
        await channel.sendNotice(notice);
        transcript?.write({ ts: Date.now(), type: 'notice', topic });
      } catch (err: unknown) {
        this.logger.error(`Failed to send notice for "${topic}": ${describeError(err)}`);
        transcript?.write({ ts: Date.now(), type: 'notice-failed', topic, error: describeError(err) });
      }
      return this.finish(report);
    }

    for (const question of questions) {
      const poll = toQuizPoll(question);
      try {
        await channel.sendQuiz(poll);
        report.sent += 1;
        transcript?.write({ ts: Date.now(), type: 'poll-sent', topic, question: poll.question });
      } catch (err: unknown) {
        report.failed += 1;
        this.logger.error(`Failed to send poll "${poll.question}": ${describeError(err)}`);
        transcript?.write({
          ts: Date.now(),
          type: 'poll-failed',
          topic,
          question: poll.question,
          error: describeError(err),
        });
      }
    }

    this.logger.info(
      `Dispatch done (${origin}) for "${topic}": ${report.sent} sent, ${report.failed} failed, source ${source}`
    );
    return this.finish(report);
  }

  private async finish(report: DispatchReport): Promise<DispatchReport> {
    this.options.transcript?.write({
      ts: Date.now(),
      type: 'dispatch-done',
      topic: report.topic,
      origin: report.origin,
      count: report.sent,
    });
    if (this.options.afterDispatch) {
      try {
        await this.options.afterDispatch(report);
      } catch (err: unknown) {
        this.logger.error(`Post-dispatch hook failed: ${describeError(err)}`);
      }
    }
    return report;
  }
}
