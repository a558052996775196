import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_BATCH_SIZE,
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_MAX_ATTEMPTS,
  type ProviderName,
  isValidTimeZone,
} from '@quizcast/core';
import { z } from 'zod';

/** Raised when the environment or flags do not describe a runnable setup. */
export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Flags shared by every command. */
export type CommonOptions = {
  dryRun?: boolean;
  provider?: string;
  schedule?: string;
  log?: string;
  printConfig?: boolean;
};

/** Effective configuration after merging flags over the environment. */
export type QuizCastConfig = {
  dryRun: boolean;
  provider: ProviderName;
  telegram?: { token: string; chatId: string };
  questionsApiUrl?: string;
  /** Overrides the schedule's timezone when set */
  timezone?: string;
  batchSize: number;
  maxRetries: number;
  backoffMs: number;
  timeoutMs: number;
  historyLimit: number;
  historyFile?: string;
  schedulePath?: string;
  logDir?: string;
  topicParam: string;
  countParam: string;
};

const positiveInt = z.coerce.number().int().min(1);

const envSchema = z.object({
  TELEGRAM_TOKEN: z.string().optional(),
  CHANNEL_ID: z.string().optional(),
  QUESTIONS_API_URL: z.string().url().optional(),
  QUIZCAST_PROVIDER: z.enum(['http', 'mock']).optional(),
  QUIZCAST_TIMEZONE: z
    .string()
    .refine(isValidTimeZone, { message: 'unknown IANA timezone' })
    .optional(),
  QUIZCAST_BATCH_SIZE: positiveInt.default(DEFAULT_BATCH_SIZE),
  QUIZCAST_MAX_RETRIES: positiveInt.default(DEFAULT_MAX_ATTEMPTS),
  QUIZCAST_BACKOFF_MS: z.coerce.number().int().min(0).default(DEFAULT_BACKOFF_MS),
  QUIZCAST_TIMEOUT_MS: positiveInt.default(DEFAULT_FETCH_TIMEOUT_MS),
  QUIZCAST_HISTORY_LIMIT: positiveInt.default(DEFAULT_HISTORY_LIMIT),
  QUIZCAST_HISTORY_FILE: z.string().optional(),
  QUIZCAST_SCHEDULE: z.string().optional(),
  QUIZCAST_LOG_DIR: z.string().optional(),
  QUIZCAST_TOPIC_PARAM: z.string().default('topic'),
  QUIZCAST_COUNT_PARAM: z.string().default('count'),
});

const providerSchema = z.enum(['http', 'mock']);

/** Blank values count as unset, as they do in a `.env` left half filled. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) out[key] = trimmed;
  }
  return out;
}

/** Merge command-line flags over environment variables and validate the result. */
export function resolveConfig(env: NodeJS.ProcessEnv, opts: CommonOptions = {}): QuizCastConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;

  const requested = opts.provider ?? vars.QUIZCAST_PROVIDER ?? (vars.QUESTIONS_API_URL ? 'http' : 'mock');
  const provider = providerSchema.safeParse(requested);
  if (!provider.success) {
    throw new ConfigError(`Unknown provider "${requested}" (expected http or mock)`);
  }
  if (provider.data === 'http' && !vars.QUESTIONS_API_URL) {
    throw new ConfigError('QUESTIONS_API_URL is required for the http provider');
  }

  const dryRun = opts.dryRun ?? false;
  let telegram: QuizCastConfig['telegram'];
  if (vars.TELEGRAM_TOKEN && vars.CHANNEL_ID) {
    telegram = { token: vars.TELEGRAM_TOKEN, chatId: vars.CHANNEL_ID };
  } else if (!dryRun) {
    throw new ConfigError('TELEGRAM_TOKEN and CHANNEL_ID are required unless --dry-run is set');
  }

  return {
    dryRun,
    provider: provider.data,
    telegram,
    questionsApiUrl: vars.QUESTIONS_API_URL,
    timezone: vars.QUIZCAST_TIMEZONE,
    batchSize: vars.QUIZCAST_BATCH_SIZE,
    maxRetries: vars.QUIZCAST_MAX_RETRIES,
    backoffMs: vars.QUIZCAST_BACKOFF_MS,
    timeoutMs: vars.QUIZCAST_TIMEOUT_MS,
    historyLimit: vars.QUIZCAST_HISTORY_LIMIT,
    historyFile: vars.QUIZCAST_HISTORY_FILE,
    schedulePath: opts.schedule ?? vars.QUIZCAST_SCHEDULE,
    logDir: opts.log ?? vars.QUIZCAST_LOG_DIR,
    topicParam: vars.QUIZCAST_TOPIC_PARAM,
    countParam: vars.QUIZCAST_COUNT_PARAM,
  };
}

/** Copy of the config that is safe to print. */
export function redactConfig(config: QuizCastConfig): QuizCastConfig {
  if (!config.telegram) return { ...config };
  return { ...config, telegram: { ...config.telegram, token: '***' } };
}

/** Parse a positive batch size given on the command line. */
export function parseCount(value: string): number {
  const parsed = positiveInt.safeParse(value);
  if (!parsed.success) throw new ConfigError(`Invalid count "${value}" (expected a positive integer)`);
  return parsed.data;
}
