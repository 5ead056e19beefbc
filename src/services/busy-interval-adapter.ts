/**
 * Busy Interval Adapter
 * Turns busy times reported for one calendar into padded, sorted,
 * non-overlapping ranges
 */

import type { DateTime } from 'luxon';
import type {
  AvailabilityConfig,
  BusyIntervalSource,
  TimeRange,
  TimeSlot,
} from '../types/index.js';
import { ErrorCodes, ExternalServiceError, toExternalServiceError } from '../utils/error.js';
import { parseDateTime, toISOString } from '../utils/datetime.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Sort by start and fold overlapping or touching ranges together
 */
export function coalesceRanges(ranges: readonly TimeRange[]): TimeRange[] {
  if (ranges.length === 0) return [];

  const sorted = [...ranges].sort((a, b) => a.start.toMillis() - b.start.toMillis());

  const merged: TimeRange[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start <= last.end) {
      if (range.end > last.end) {
        merged[merged.length - 1] = { start: last.start, end: range.end };
      }
    } else {
      merged.push(range);
    }
  }

  return merged;
}

/**
 * Parse reported slots and widen them by the configured padding
 */
export function toPaddedRanges(
  slots: readonly TimeSlot[],
  config: Pick<AvailabilityConfig, 'timezone' | 'spareBeforeMinutes' | 'spareAfterMinutes'>,
  calendarId: string
): TimeRange[] {
  return slots.map(slot => {
    let start: DateTime;
    let end: DateTime;
    try {
      start = parseDateTime(slot.start, config.timezone);
      end = parseDateTime(slot.end, config.timezone);
    } catch (error) {
      throw new ExternalServiceError(
        `Calendar ${calendarId} returned an unreadable busy interval`,
        ErrorCodes.INVALID_RESPONSE,
        {
          calendarId,
          details: { start: slot.start, end: slot.end },
          cause: error instanceof Error ? error : undefined,
        }
      );
    }

    return {
      start: start.minus({ minutes: config.spareBeforeMinutes }),
      end: end.plus({ minutes: config.spareAfterMinutes }),
    };
  });
}

/**
 * Query busy time for one calendar over [now, now + daysForward days]
 */
export async function fetchBusyRanges(
  calendarId: string,
  config: AvailabilityConfig,
  source: BusyIntervalSource,
  now: DateTime,
  logger: Logger = silentLogger
): Promise<TimeRange[]> {
  const localNow = now.setZone(config.timezone);
  const query = {
    calendarId,
    timeMin: toISOString(localNow),
    timeMax: toISOString(localNow.plus({ days: config.daysForward })),
    timezone: config.timezone,
  };

  logger.debug(`Querying busy time for ${calendarId} from ${query.timeMin} to ${query.timeMax}`);

  let slots: TimeSlot[];
  try {
    slots = await source.listBusy(query);
  } catch (error) {
    throw toExternalServiceError(error, calendarId, 'Busy time query');
  }

  const ranges = coalesceRanges(toPaddedRanges(slots, config, calendarId));
  logger.debug(`${calendarId}: ${slots.length} busy interval(s), ${ranges.length} after padding and merging`);
  return ranges;
}
