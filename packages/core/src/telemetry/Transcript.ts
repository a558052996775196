import { createWriteStream, existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

/** Options for configuring transcript logging. */
export type TranscriptOptions = {
  /** Directory to write transcript artifacts into */
  logDir: string;
  /** File name for the JSONL transcript (default: transcript.jsonl) */
  fileName?: string;
};

/** Event labels written by the dispatcher. */
export type TranscriptEventType =
  | 'dispatch-start'
  | 'batch'
  | 'poll-sent'
  | 'poll-failed'
  | 'notice'
  | 'notice-failed'
  | 'dispatch-done';

/** Single JSONL record written to the transcript. */
export type TranscriptRecord = {
  /** Milliseconds since epoch */
  ts: number;
  type: TranscriptEventType;
  topic?: string;
  /** What triggered the dispatch ('manual' or 'scheduled') */
  origin?: string;
  /** Where the batch came from ('provider', 'fallback' or 'none') */
  source?: string;
  count?: number;
  /** Prompt text of the poll involved, if any */
  question?: string;
  error?: string;
};

/** Append-only JSONL log of dispatch activity. */
export class Transcript {
  private readonly filePath: string;
  private readonly stream: ReturnType<typeof createWriteStream>;
  private closed = false;

  /** Create or append to a JSONL transcript in the provided directory. */
  public constructor({ logDir, fileName }: TranscriptOptions) {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    this.filePath = join(logDir, fileName ?? 'transcript.jsonl');
    this.stream = createWriteStream(this.filePath, { flags: 'a' });
  }

  public get path(): string {
    return this.filePath;
  }

  /** Append a record as a single JSON line; ignored after close. */
  public write(record: TranscriptRecord): void {
    if (this.closed) return;
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  /** Flush and close the underlying stream. */
  public close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end(() => resolve());
    });
  }
}
