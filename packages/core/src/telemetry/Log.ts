import type { Logger } from '@quizcast/types';

const PREFIX = '[QuizCast]';

/** Console-backed logger that tags every line with the product prefix. */
export const consoleLogger: Logger = {
  info(message, ...details) {
    // eslint-disable-next-line no-console
    console.log(`${PREFIX} ${message}`, ...details);
  },
  warn(message, ...details) {
    // eslint-disable-next-line no-console
    console.warn(`${PREFIX} ${message}`, ...details);
  },
  error(message, ...details) {
    // eslint-disable-next-line no-console
    console.error(`${PREFIX} ${message}`, ...details);
  },
};

/** Logger that drops everything. */
export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};

/** Best-effort message text for an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
