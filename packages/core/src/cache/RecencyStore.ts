import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from '@quizcast/types';
import { z } from 'zod';
import { consoleLogger, describeError } from '../telemetry/Log.js';
import { RecencyCache } from './RecencyCache.js';

/** Persists a recency cache across restarts. */
export interface RecencyStore {
  load(capacity?: number): Promise<RecencyCache>;
  save(cache: RecencyCache): Promise<void>;
}

const historyFileSchema = z.object({
  version: z.literal(1),
  fingerprints: z.array(z.string()),
});

/** On-disk form: `{ "version": 1, "fingerprints": [...] }`, oldest first. */
export type HistoryFile = z.infer<typeof historyFileSchema>;

let saveSequence = 0;

/** JSON-file store. A missing or unreadable file loads as an empty cache. */
export class FileRecencyStore implements RecencyStore {
  private readonly filePath: string;
  private readonly logger: Logger;

  public constructor({ filePath, logger = consoleLogger }: { filePath: string; logger?: Logger }) {
    this.filePath = filePath;
    this.logger = logger;
  }

  public async load(capacity?: number): Promise<RecencyCache> {
    return RecencyCache.from(await this.readFingerprints(), capacity);
  }

  /**
   * Merge the file into `cache`, then write the result. Fingerprints another
   * process saved since this cache was loaded (a manual `send` next to a
   * running `run`) are taken into `cache` as older than its own entries, so
   * both the file and the live cache keep them until capacity pushes them out.
   * Writes go to a unique sibling temp file that is renamed over the target.
   */
  public async save(cache: RecencyCache): Promise<void> {
    cache.registerOlder(await this.readFingerprints());
    const body: HistoryFile = { version: 1, fingerprints: cache.entries() };
    await mkdir(dirname(this.filePath), { recursive: true });
    saveSequence += 1;
    const tmp = `${this.filePath}.${process.pid}.${saveSequence}.tmp`;
    await writeFile(tmp, `${JSON.stringify(body)}\n`, 'utf8');
    await rename(tmp, this.filePath);
  }

  /** Persisted fingerprints, oldest first; empty when missing or invalid. */
  private async readFingerprints(): Promise<string[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err: unknown) {
      if (!isMissingFile(err)) {
        this.logger.warn(`Could not read history file ${this.filePath}: ${describeError(err)}`);
      }
      return [];
    }
    try {
      return historyFileSchema.parse(JSON.parse(raw)).fingerprints;
    } catch (err: unknown) {
      this.logger.warn(`Ignoring invalid history file ${this.filePath}: ${describeError(err)}`);
      return [];
    }
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
