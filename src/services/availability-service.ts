/**
 * Availability Service
 * Working hours minus every chosen calendar's busy time
 */

import type { DateTime } from 'luxon';
import type {
  AvailabilityConfig,
  BusyIntervalSource,
  CalendarSummary,
  DaySchedule,
  TimeRange,
} from '../types/index.js';
import { now as currentTime } from '../utils/datetime.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildWorkWindows } from './work-window-builder.js';
import { fetchBusyRanges } from './busy-interval-adapter.js';
import { reduceAcrossCalendars, type MergeOptions } from './interval-merger.js';
import { groupByDay } from './schedule-formatter.js';

export interface AvailabilityResult {
  /** Free ranges, sorted, in the construction timezone */
  free: TimeRange[];
  /** The same ranges grouped by display day */
  schedule: DaySchedule[];
}

export interface CalendarSelection {
  chosen: CalendarSummary[];
  notFound: string[];
}

/**
 * Match requested ids against the account's calendars, keeping request order
 */
export function selectCalendars(
  requestedIds: readonly string[],
  calendars: readonly CalendarSummary[]
): CalendarSelection {
  const byId = new Map(calendars.map(c => [c.id, c]));
  const chosen: CalendarSummary[] = [];
  const notFound: string[] = [];

  for (const id of requestedIds) {
    const calendar = byId.get(id);
    if (calendar) {
      chosen.push(calendar);
    } else {
      notFound.push(id);
    }
  }

  return { chosen, notFound };
}

export function mergeOptionsFor(config: AvailabilityConfig): MergeOptions {
  return {
    minLengthMinutes: config.meetingLengthMinutes,
    roundGridMinutes: config.meetingLengthMinutes,
  };
}

export class AvailabilityService {
  constructor(
    private source: BusyIntervalSource,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Compute free ranges for the given calendars.
   *
   * Busy queries run concurrently; the reductions are applied in the order
   * the calendar ids are given.
   */
  async getAvailability(
    calendarIds: readonly string[],
    config: AvailabilityConfig,
    at: DateTime = currentTime(config.timezone)
  ): Promise<AvailabilityResult> {
    const windows = buildWorkWindows(config, at);
    this.logger.info(`${windows.length} work window(s) over the next ${config.daysForward} day(s)`);

    const busyLists = await Promise.all(
      calendarIds.map(id => fetchBusyRanges(id, config, this.source, at, this.logger))
    );

    const free = reduceAcrossCalendars(windows, busyLists, mergeOptionsFor(config));
    this.logger.info(`${free.length} free range(s) after ${calendarIds.length} calendar(s)`);

    return { free, schedule: groupByDay(free, config) };
  }
}
