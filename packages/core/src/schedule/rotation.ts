import type { DayBucket, RotationSchedule, SlotIndex } from '@quizcast/types';
import { getDateKeyForTimezone, getDatePartsForTimezone, parseTimeOfDay, zonedTimeToInstant } from './clock.js';

/** Rotation bucket for a day of the month: 1, 2, 3, 1, ... with multiples of 3 in bucket 3. */
export function dayBucket(dayOfMonth: number): DayBucket {
  if (!Number.isInteger(dayOfMonth) || dayOfMonth < 1 || dayOfMonth > 31) {
    throw new RangeError(`Day of month must be 1-31, got ${dayOfMonth}`);
  }
  const remainder = dayOfMonth % 3;
  return remainder === 1 ? 1 : remainder === 2 ? 2 : 3;
}

/** Ordered topic triplet active on the given day of the month. */
export function resolveTopics(
  schedule: RotationSchedule,
  dayOfMonth: number
): readonly [string, string, string] {
  return schedule.buckets[dayBucket(dayOfMonth)];
}

/** Topic due for `slot` on the calendar day `date` falls on in the schedule's timezone. */
export function topicForSlot(schedule: RotationSchedule, date: Date, slot: SlotIndex): string {
  const { day } = getDatePartsForTimezone(schedule.timezone, date);
  return resolveTopics(schedule, day)[slot];
}

/** One resolved trigger of a day's plan. */
export type PlannedRun = {
  time: string;
  slot: SlotIndex;
  topic: string;
  /** Instant the trigger fires */
  at: Date;
};

/** Resolved rotation for a single calendar day. */
export type DayPlan = {
  dateKey: string;
  bucket: DayBucket;
  runs: PlannedRun[];
};

/** Resolve every slot of the day containing `date`. */
export function planForDay(schedule: RotationSchedule, date = new Date()): DayPlan {
  const civil = getDatePartsForTimezone(schedule.timezone, date);
  const bucket = dayBucket(civil.day);
  const topics = schedule.buckets[bucket];
  const runs = schedule.slots
    .map((entry) => ({
      time: entry.time,
      slot: entry.slot,
      topic: topics[entry.slot],
      at: zonedTimeToInstant(schedule.timezone, civil, parseTimeOfDay(entry.time)),
    }))
    .sort((a, b) => a.at.getTime() - b.at.getTime());
  return { dateKey: getDateKeyForTimezone(schedule.timezone, date), bucket, runs };
}
