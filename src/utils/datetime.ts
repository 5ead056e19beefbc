/**
 * Date/Time utilities using Luxon
 */

import { DateTime, IANAZone } from 'luxon';

/**
 * Wall-clock time of day, independent of any date or zone
 */
export interface TimeOfDay {
  hour: number;
  minute: number;
  second: number;
}

const TIME_OF_DAY_PATTERN = /^(\d{1,2})(?::(\d{2})(?::(\d{2}))?)?\s*(am|pm)?$/i;

/**
 * Parse "9am", "9:30pm", "17:00" or "08:15:30" into a TimeOfDay.
 * Returns null for anything else.
 */
export function parseTimeOfDay(value: string): TimeOfDay | null {
  const match = TIME_OF_DAY_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, hourText, minuteText, secondText, meridiem] = match;
  let hour = Number(hourText);
  const minute = minuteText ? Number(minuteText) : 0;
  const second = secondText ? Number(secondText) : 0;

  if (minute > 59 || second > 59) return null;

  if (meridiem) {
    if (hour < 1 || hour > 12) return null;
    const pm = meridiem.toLowerCase() === 'pm';
    hour = (hour % 12) + (pm ? 12 : 0);
  } else if (hour > 23) {
    return null;
  }

  return { hour, minute, second };
}

/**
 * Seconds since midnight, for comparing times of day
 */
export function secondsOfDay(time: TimeOfDay): number {
  return time.hour * 3600 + time.minute * 60 + time.second;
}

/**
 * Check that a zone name is known to the runtime's timezone data
 */
export function isValidTimezone(zone: string): boolean {
  return IANAZone.isValidZone(zone);
}

/**
 * Parse an ISO datetime string to Luxon DateTime
 *
 * If timezone is provided, naive datetime strings (without offset or Z suffix)
 * are interpreted as being in that timezone. Strings with explicit offsets
 * are parsed with that offset, then converted to the requested timezone.
 */
export function parseDateTime(isoString: string, timezone?: string): DateTime {
  const dt = timezone
    ? DateTime.fromISO(isoString, { zone: timezone })
    : DateTime.fromISO(isoString, { setZone: true });
  if (!dt.isValid) {
    throw new Error(`Invalid datetime: ${isoString}`);
  }
  return dt;
}

/**
 * Convert a Luxon DateTime to ISO string
 */
export function toISOString(dt: DateTime): string {
  const iso = dt.toISO();
  if (iso === null) {
    throw new Error(`Cannot serialize invalid datetime: ${dt.invalidReason ?? 'unknown reason'}`);
  }
  return iso;
}

/**
 * Get current time in the given timezone
 */
export function now(timezone: string): DateTime {
  return DateTime.now().setZone(timezone);
}

/**
 * Set the wall-clock time of day on a date, keeping its zone
 */
export function atTimeOfDay(date: DateTime, time: TimeOfDay): DateTime {
  return date.set({
    hour: time.hour,
    minute: time.minute,
    second: time.second,
    millisecond: 0,
  });
}

/**
 * Round `dt` up to the next point that lies a whole number of `gridMinutes`
 * after `anchor`. A grid of zero or less leaves `dt` as is.
 */
export function ceilToGrid(dt: DateTime, anchor: DateTime, gridMinutes: number): DateTime {
  if (gridMinutes <= 0) return dt;
  const step = gridMinutes * 60_000;
  const offset = (((anchor.toMillis() - dt.toMillis()) % step) + step) % step;
  return offset === 0 ? dt : dt.plus({ milliseconds: offset });
}

/**
 * Whole minutes elapsed from start to end, rounded down
 */
export function wholeMinutesBetween(start: DateTime, end: DateTime): number {
  return Math.floor((end.toMillis() - start.toMillis()) / 60_000);
}

/**
 * The later of two datetimes
 */
export function later(a: DateTime, b: DateTime): DateTime {
  return a >= b ? a : b;
}
