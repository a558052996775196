import { defaultRotation, defaultTopics, fallbackQuestions } from '@quizcast/catalog';
import {
  BatchAssembler,
  ConsoleChannel,
  Dispatcher,
  FileRecencyStore,
  RecencyCache,
  RotationScheduler,
  ScheduleValidationError,
  TelegramChannel,
  Transcript,
  consoleLogger,
  createProvider,
  describeError,
  loadSchedule,
  planForDay,
} from '@quizcast/core';
import type { DeliveryChannel, Logger, QuestionProvider, RotationSchedule } from '@quizcast/types';
import { Command } from 'commander';
import {
  type CommonOptions,
  ConfigError,
  type QuizCastConfig,
  parseCount,
  redactConfig,
  resolveConfig,
} from './config.js';

type Printer = (line: string) => void;

/** Seams the commands are built on; every field has a production default. */
export type ProgramDeps = {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Command output (default stdout) */
  print?: Printer;
  /** Error output (default stderr) */
  printError?: Printer;
  /** Delivery channel factory (default Telegram, or the console on dry runs) */
  createChannel?: (config: QuizCastConfig, print: Printer) => DeliveryChannel;
  /** Question provider factory (default by provider name) */
  createProvider?: (config: QuizCastConfig) => QuestionProvider;
  /** Registers a handler for process shutdown; used by `run` */
  onShutdown?: (handler: () => Promise<void>) => void;
};

/** Everything one command needs, built from the effective config. */
type Runtime = {
  config: QuizCastConfig;
  schedule: RotationSchedule;
  dispatcher: Dispatcher;
  close: () => Promise<void>;
};

// eslint-disable-next-line no-console
const stdout: Printer = (line) => console.log(line);
// eslint-disable-next-line no-console
const stderr: Printer = (line) => console.error(line);

function defaultChannel(config: QuizCastConfig, print: Printer): DeliveryChannel {
  if (config.dryRun || !config.telegram) return new ConsoleChannel(print);
  return new TelegramChannel({ token: config.telegram.token, chatId: config.telegram.chatId });
}

function defaultProvider(config: QuizCastConfig): QuestionProvider {
  return createProvider(config.provider, {
    url: config.questionsApiUrl,
    timeoutMs: config.timeoutMs,
    countParam: config.countParam,
    topicParam: config.topicParam,
  });
}

/** Process signals that stop a long-running `run`. */
function onProcessShutdown(handler: () => Promise<void>): void {
  let stopping = false;
  const stop = () => {
    if (stopping) return;
    stopping = true;
    handler().then(
      () => process.exit(),
      (err: unknown) => {
        stderr(`[QuizCast] Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

async function resolveSchedule(config: QuizCastConfig): Promise<RotationSchedule> {
  const base = config.schedulePath ? await loadSchedule(config.schedulePath) : defaultRotation;
  return config.timezone ? { ...base, timezone: config.timezone } : base;
}

/** Create the `quizcast` command tree. */
export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? consoleLogger;
  const print = deps.print ?? stdout;
  const printError = deps.printError ?? stderr;

  async function buildRuntime(opts: CommonOptions): Promise<Runtime> {
    const config = resolveConfig(env, opts);
    if (opts.printConfig) {
      print(`[QuizCast] Effective config: ${JSON.stringify(redactConfig(config), null, 2)}`);
    }
    const schedule = await resolveSchedule(config);

    const store = config.historyFile
      ? new FileRecencyStore({ filePath: config.historyFile, logger })
      : undefined;
    const cache = store
      ? await store.load(config.historyLimit)
      : new RecencyCache({ capacity: config.historyLimit });
    const transcript = config.logDir ? new Transcript({ logDir: config.logDir }) : undefined;

    const assembler = new BatchAssembler({
      provider: (deps.createProvider ?? defaultProvider)(config),
      cache,
      bank: fallbackQuestions(),
      retry: { maxAttempts: config.maxRetries, backoffMs: config.backoffMs },
      logger,
    });
    const dispatcher = new Dispatcher({
      assembler,
      channel: (deps.createChannel ?? defaultChannel)(config, print),
      transcript,
      logger,
      defaultCount: config.batchSize,
      afterDispatch: store ? () => store.save(cache) : undefined,
    });

    return {
      config,
      schedule,
      dispatcher,
      close: async () => {
        await store?.save(cache);
        await transcript?.close();
      },
    };
  }

  /** Report configuration problems as a failed exit; anything else propagates. */
  function guard<A extends unknown[]>(action: (...args: A) => Promise<void>) {
    return async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (err: unknown) {
        if (err instanceof ConfigError || err instanceof ScheduleValidationError) {
          printError(`[QuizCast] ${err.message}`);
          process.exitCode = 1;
          return;
        }
        throw err;
      }
    };
  }

  const program = new Command();
  program
    .name('quizcast')
    .description('Publish scheduled quiz polls to a Telegram channel')
    .version('0.1.0');

  const withCommonOptions = (command: Command): Command =>
    command
      .option('--dry-run', 'Print polls instead of publishing them', false)
      .option('--provider <name>', 'Question provider (http|mock)')
      .option('--schedule <path>', 'Path to a rotation schedule YAML file')
      .option('--log <dir>', 'Directory to write the JSONL transcript')
      .option('--print-config', 'Print effective config before running', false);

  withCommonOptions(
    program.command('run').description('Start the daily rotation and keep publishing')
  ).action(
    guard(async (opts: CommonOptions) => {
      const runtime = await buildRuntime(opts);
      const scheduler = new RotationScheduler({
        schedule: runtime.schedule,
        dispatch: (topic, count) =>
          runtime.dispatcher.dispatch(topic, { count, origin: 'scheduled' }),
        count: runtime.config.batchSize,
        logger,
      });
      scheduler.start();
      for (const run of scheduler.nextRuns()) {
        logger.info(`Next ${run.time} (slot ${run.slot}) at ${run.at.toISOString()}`);
      }
      (deps.onShutdown ?? onProcessShutdown)(async () => {
        logger.info('Stopping scheduler');
        scheduler.stop();
        await scheduler.idle();
        await runtime.close();
      });
    })
  );

  withCommonOptions(
    program
      .command('send')
      .description('Publish a batch for a topic right now')
      .argument('<topic>', 'Topic to publish')
      .option('--count <n>', 'Questions in the batch')
  ).action(
    guard(async (topic: string, opts: CommonOptions & { count?: string }) => {
      const count = opts.count === undefined ? undefined : parseCount(opts.count);
      const runtime = await buildRuntime(opts);
      try {
        const report = await runtime.dispatcher.dispatch(topic, { count, origin: 'manual' });
        print(
          `[QuizCast] Sent ${report.sent} of ${report.assembled} polls for "${report.topic}" (source: ${report.source})`
        );
        if (report.failed > 0 || report.assembled === 0) process.exitCode = 1;
      } finally {
        await runtime.close();
      }
    })
  );

  program
    .command('today')
    .description("Show the day's resolved rotation")
    .option('--date <iso>', 'Instant to resolve the day for (default now)')
    .option('--schedule <path>', 'Path to a rotation schedule YAML file')
    .action(
      guard(async (opts: { date?: string; schedule?: string }) => {
        const date = opts.date === undefined ? new Date() : new Date(opts.date);
        if (Number.isNaN(date.getTime())) {
          throw new ConfigError(`Invalid date "${opts.date}"`);
        }
        const schedule = await resolveSchedule(
          resolveConfig(env, { dryRun: true, provider: 'mock', schedule: opts.schedule })
        );
        const plan = planForDay(schedule, date);
        print(`[QuizCast] ${plan.dateKey} (${schedule.timezone}), bucket ${plan.bucket}`);
        for (const run of plan.runs) {
          print(`  ${run.time}  ${run.topic}`);
        }
      })
    );

  program
    .command('topics')
    .description('List the built-in topics')
    .action(() => {
      for (const topic of defaultTopics) print(topic);
    });

  return program;
}
