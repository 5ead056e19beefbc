/**
 * Work Window Builder
 * Expands the weekly template into concrete free ranges over the horizon
 */

import type { DateTime } from 'luxon';
import type { AvailabilityConfig, TimeRange, WeekdayToken } from '../types/index.js';
import { WEEKDAY_TOKENS } from '../schemas/common.js';
import { DegenerateIntervalError, ConfigurationError } from '../utils/error.js';
import {
  atTimeOfDay,
  later,
  parseTimeOfDay,
  secondsOfDay,
  toISOString,
  type TimeOfDay,
} from '../utils/datetime.js';

/**
 * Weekday token for a date (luxon weekdays run 1 = Monday .. 7 = Sunday)
 */
export function weekdayToken(date: DateTime): WeekdayToken {
  const token = WEEKDAY_TOKENS[date.weekday - 1];
  if (token === undefined) {
    throw new Error(`Invalid weekday ${date.weekday} for ${date.toISODate() ?? 'invalid date'}`);
  }
  return token;
}

/**
 * Earliest bookable instant: now plus the lead time, truncated to the hour
 */
export function firstMeetingFloor(now: DateTime, hoursTillFirstMeeting: number): DateTime {
  return now.plus({ hours: hoursTillFirstMeeting }).startOf('hour');
}

function requireTimeOfDay(value: string): TimeOfDay {
  const time = parseTimeOfDay(value);
  if (time === null) {
    throw new ConfigurationError(`Invalid time of day in weekly template: "${value}"`);
  }
  return time;
}

/**
 * Build the initial free ranges, sorted by start.
 *
 * `now` may be in any zone; dates are taken in `config.timezone`. Windows whose
 * end time of day precedes the start run into the next day. Windows ending at
 * or before the floor are dropped, the rest are clipped up to it.
 */
export function buildWorkWindows(config: AvailabilityConfig, now: DateTime): TimeRange[] {
  const localNow = now.setZone(config.timezone);
  const today = localNow.startOf('day');
  const floor = firstMeetingFloor(localNow, config.hoursTillFirstMeeting);

  const ranges: TimeRange[] = [];

  for (let offset = 0; offset < config.daysForward; offset++) {
    const day = today.plus({ days: offset });
    const windows = config.days[weekdayToken(day)];
    if (!windows || windows.length === 0) continue;

    for (const [startText, endText] of windows) {
      const startTime = requireTimeOfDay(startText);
      const endTime = requireTimeOfDay(endText);

      let start = atTimeOfDay(day, startTime);
      let end = atTimeOfDay(day, endTime);
      if (secondsOfDay(endTime) < secondsOfDay(startTime)) {
        end = end.plus({ days: 1 });
      }

      if (end <= floor) continue;
      start = later(start, floor);

      if (!(start < end)) {
        throw new DegenerateIntervalError(
          `Work window ${startText}-${endText} on ${day.toISODate() ?? ''} has no length`,
          { start: toISOString(start), end: toISOString(end) }
        );
      }

      ranges.push({ start, end });
    }
  }

  return ranges;
}
