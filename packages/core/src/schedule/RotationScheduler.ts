import type { Logger, RotationSchedule, RotationSlot } from '@quizcast/types';
import { DEFAULT_BATCH_SIZE } from '../batch/BatchAssembler.js';
import { consoleLogger, describeError } from '../telemetry/Log.js';
import { nextOccurrence } from './clock.js';
import { topicForSlot } from './rotation.js';

/** Callback fired for each due slot; typically wraps the dispatcher. */
export type ScheduledDispatch = (topic: string, count: number) => Promise<unknown>;

/** Options that configure the rotation scheduler. */
export type RotationSchedulerOptions = {
  schedule: RotationSchedule;
  dispatch: ScheduledDispatch;
  /** Questions per scheduled batch (default 10) */
  count?: number;
  logger?: Logger;
};

/** A slot that is armed to fire. */
export type ArmedRun = RotationSlot & { at: Date };

/**
 * Fires each slot of the rotation once a day at its wall-clock time in the
 * schedule's timezone. The day bucket is resolved for the instant each trigger
 * fires. Missed occurrences are skipped, not replayed.
 */
export class RotationScheduler {
  private readonly options: RotationSchedulerOptions;
  private readonly logger: Logger;
  private readonly timers = new Map<RotationSlot, { timer: NodeJS.Timeout; at: Date }>();
  private readonly inflight = new Set<Promise<void>>();
  private running = false;

  public constructor(options: RotationSchedulerOptions) {
    this.options = options;
    this.logger = options.logger ?? consoleLogger;
  }

  /** Arm every slot at its next occurrence. Calling twice is a no-op. */
  public start(): void {
    if (this.running) return;
    this.running = true;
    for (const slot of this.options.schedule.slots) this.arm(slot);
  }

  /** Disarm all triggers. Dispatches already running are left to finish. */
  public stop(): void {
    this.running = false;
    for (const { timer } of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  public isRunning(): boolean {
    return this.running;
  }

  /** Armed triggers, soonest first. */
  public nextRuns(): ArmedRun[] {
    return [...this.timers.entries()]
      .map(([slot, { at }]) => ({ ...slot, at }))
      .sort((a, b) => a.at.getTime() - b.at.getTime());
  }

  /** Resolves once every dispatch started by a trigger has settled. */
  public async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
  }

  /** Arm `slot` at its first occurrence strictly after both now and `after`. */
  private arm(slot: RotationSlot, after?: Date): void {
    const now = new Date();
    const from = after && after.getTime() > now.getTime() ? after : now;
    const at = nextOccurrence(this.options.schedule.timezone, slot.time, from);
    const timer = setTimeout(() => this.fire(slot, at), at.getTime() - now.getTime());
    this.timers.set(slot, { timer, at });
    this.logger.info(`Armed ${slot.time} (slot ${slot.slot}) for ${at.toISOString()}`);
  }

  private fire(slot: RotationSlot, at: Date): void {
    this.timers.delete(slot);
    if (!this.running) return;

    const topic = topicForSlot(this.options.schedule, at, slot.slot);
    const count = this.options.count ?? DEFAULT_BATCH_SIZE;
    this.logger.info(`Trigger ${slot.time} fired: dispatching "${topic}" (${count})`);

    const run = Promise.resolve()
      .then(() => this.options.dispatch(topic, count))
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error(`Scheduled dispatch for "${topic}" failed: ${describeError(err)}`);
        }
      )
      .finally(() => {
        this.inflight.delete(run);
      });
    this.inflight.add(run);

    // a timer can run slightly early; never re-arm for the instant that just fired
    this.arm(slot, at);
  }
}
