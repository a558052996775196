import { readFile } from 'node:fs/promises';
import { defaultRotation } from '@quizcast/catalog';
import type { RotationSchedule } from '@quizcast/types';
import YAML from 'yaml';
import { z } from 'zod';
import { isValidTimeZone } from './clock.js';

/** Raised when a schedule file is unreadable or does not describe a valid rotation. */
export class ScheduleValidationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ScheduleValidationError';
  }
}

const topic = z.string().trim().min(1);
const triplet = z.tuple([topic, topic, topic]);

const scheduleSchema = z.object({
  timezone: z
    .string()
    .refine(isValidTimeZone, { message: 'unknown IANA timezone' })
    .default(defaultRotation.timezone),
  buckets: z.object({ 1: triplet, 2: triplet, 3: triplet }),
  slots: z
    .array(
      z.object({
        time: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM'),
        slot: z.union([z.literal(0), z.literal(1), z.literal(2)]),
      })
    )
    .min(1)
    .default(defaultRotation.slots.map((s) => ({ ...s }))),
});

/** Validate an already-parsed schedule document. */
export function parseSchedule(data: unknown): RotationSchedule {
  const result = scheduleSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ScheduleValidationError(`Invalid schedule: ${issues.join('; ')}`);
  }
  const { timezone, buckets, slots } = result.data;
  const times = new Set(slots.map((s) => s.time));
  if (times.size !== slots.length) {
    throw new ScheduleValidationError('Invalid schedule: slots: duplicate time of day');
  }
  return { timezone, buckets: { 1: buckets[1], 2: buckets[2], 3: buckets[3] }, slots };
}

/** Load a rotation schedule from a YAML file. */
export async function loadSchedule(path: string): Promise<RotationSchedule> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (err: unknown) {
    throw new ScheduleValidationError(
      `Cannot read schedule ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseSchedule(YAML.parse(content));
}
