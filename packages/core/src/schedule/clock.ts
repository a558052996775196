/** Calendar date in some timezone; month is 1-based. */
export type CivilDate = { year: number; month: number; day: number };

/** Wall-clock time of day. */
export type TimeOfDay = { hour: number; minute: number };

const TIME_OF_DAY = /^([01]\d|2[0-3]):([0-5]\d)$/;

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/** Parse "HH:MM" (24h). */
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = TIME_OF_DAY.exec(value);
  if (!match) {
    throw new Error(`Invalid time of day "${value}", expected HH:MM`);
  }
  return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function getDatePartsForTimezone(timezone: string, date = new Date()): CivilDate {
  const formatter = new Intl.DateTimeFormat('en-CA', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
  const parts = formatter.formatToParts(date);
  const year = Number(parts.find((part) => part.type === 'year')?.value);
  const month = Number(parts.find((part) => part.type === 'month')?.value);
  const day = Number(parts.find((part) => part.type === 'day')?.value);

  if (!year || !month || !day) {
    throw new Error('Unable to compute date parts.');
  }

  return { year, month, day };
}

/** "YYYY-MM-DD" for the calendar day `date` falls on in `timezone`. */
export function getDateKeyForTimezone(timezone: string, date = new Date()): string {
  const { year, month, day } = getDatePartsForTimezone(timezone, date);
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/** Offset of `timezone` from UTC at `date`, in ms (negative west of Greenwich). */
export function timeZoneOffsetMs(timezone: string, date: Date): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  });
  const values: Record<string, number> = {};
  for (const part of formatter.formatToParts(date)) {
    if (part.type !== 'literal') values[part.type] = Number(part.value);
  }
  const asUtc = Date.UTC(
    values.year ?? 0,
    (values.month ?? 1) - 1,
    values.day ?? 1,
    values.hour ?? 0,
    values.minute ?? 0,
    values.second ?? 0
  );
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  return asUtc - wholeSeconds;
}

/** The instant at which the wall clock in `timezone` reads `date` `time`. */
export function zonedTimeToInstant(timezone: string, date: CivilDate, time: TimeOfDay): Date {
  const guess = Date.UTC(date.year, date.month - 1, date.day, time.hour, time.minute);
  const firstOffset = timeZoneOffsetMs(timezone, new Date(guess));
  const candidate = guess - firstOffset;
  const secondOffset = timeZoneOffsetMs(timezone, new Date(candidate));
  return new Date(secondOffset === firstOffset ? candidate : guess - secondOffset);
}

/** Calendar day `days` after `date`. */
export function addCivilDays(date: CivilDate, days: number): CivilDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days, 12));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
  };
}

/** Next instant strictly after `after` at which `timezone` shows `time` ("HH:MM"). */
export function nextOccurrence(timezone: string, time: string, after: Date): Date {
  const clock = parseTimeOfDay(time);
  const today = getDatePartsForTimezone(timezone, after);
  const candidate = zonedTimeToInstant(timezone, today, clock);
  if (candidate.getTime() > after.getTime()) return candidate;
  return zonedTimeToInstant(timezone, addCivilDays(today, 1), clock);
}
