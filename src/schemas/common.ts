/**
 * Common Zod schemas shared by the configuration schema
 */

import { z } from 'zod';
import { isValidTimezone, parseTimeOfDay } from '../utils/datetime.js';

/**
 * Weekday tokens, Monday first (index + 1 is the ISO weekday)
 */
export const WEEKDAY_TOKENS = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] as const;

export const WeekdayTokenSchema = z.enum(WEEKDAY_TOKENS);

/**
 * Time of day such as "9am", "5:30pm" or "17:00"
 */
export const TimeOfDaySchema = z.string().refine(
  (val) => parseTimeOfDay(val) !== null,
  { message: 'Must be a time of day such as "9am", "5:30pm" or "17:00"' }
);

/**
 * IANA timezone name
 */
export const TimezoneSchema = z.string().refine(isValidTimezone, {
  message: 'Must be a valid IANA timezone, e.g. "America/Los_Angeles"',
});

/**
 * One working window: [start, end] times of day. An end earlier than the
 * start means the window runs past midnight.
 */
export const WorkWindowSchema = z.tuple([TimeOfDaySchema, TimeOfDaySchema]);

const dayWindows = z.array(WorkWindowSchema).optional();

/**
 * Weekly template; unknown weekday keys are rejected
 */
export const WeeklyTemplateSchema = z
  .object({
    Mon: dayWindows,
    Tue: dayWindows,
    Wed: dayWindows,
    Thu: dayWindows,
    Fri: dayWindows,
    Sat: dayWindows,
    Sun: dayWindows,
  })
  .strict();
