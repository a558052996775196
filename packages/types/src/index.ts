/** A single multiple-choice quiz question. Instances are frozen once built. */
export interface Question {
  readonly text: string;
  readonly options: readonly string[];
  /** Index into `options` of the right answer. */
  readonly correctIndex: number;
  /** May be empty; trimmed to platform limits only when delivered. */
  readonly explanation: string;
  readonly topic: string;
}

/** Parameters sent to a remote question source. */
export type QuestionQuery = {
  count: number;
  topic?: string;
};

/** Minimal interface for a remote question source. One call is one attempt; failures reject. */
export interface QuestionProvider {
  fetch(query: QuestionQuery): Promise<unknown>;
}

/** Quiz poll as handed to a delivery channel, already cut to platform limits. */
export type QuizPoll = {
  question: string;
  options: string[];
  correctIndex: number;
  explanation?: string;
  topic: string;
};

/** Publishes polls and plain notices to a destination channel. */
export interface DeliveryChannel {
  sendQuiz(poll: QuizPoll): Promise<void>;
  sendNotice(text: string): Promise<void>;
}

/** Leveled sink for operational messages. */
export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** Milliseconds represented as a number. */
export type Milliseconds = number;

/** JSON object with string keys and unknown values. */
export type JsonObject = Record<string, unknown>;

/** One of the three days of the rotation cycle. */
export type DayBucket = 1 | 2 | 3;

/** Position within a day's topic triplet. */
export type SlotIndex = 0 | 1 | 2;

/** Wall-clock trigger ("HH:MM") bound to a slot of the day's triplet. */
export type RotationSlot = {
  time: string;
  slot: SlotIndex;
};

/** 3-day topic rotation evaluated in a fixed civil timezone. */
export type RotationSchedule = {
  /** IANA timezone name, e.g. America/Sao_Paulo */
  timezone: string;
  buckets: Record<DayBucket, readonly [string, string, string]>;
  slots: readonly RotationSlot[];
};
