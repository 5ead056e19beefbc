/**
 * Schedule Formatter
 * Groups free ranges by display day and renders them as text lines
 */

import type { DateTime } from 'luxon';
import type { AvailabilityConfig, DaySchedule, TimeRange } from '../types/index.js';

const DISPLAY_LOCALE = 'en-US';
const DAY_LABEL_WIDTH = 14;

type DisplayOptions = Pick<
  AvailabilityConfig,
  'displayTimezone' | 'displayTimezoneName' | 'show24Hour' | 'weekStartsOnSunday'
>;

/**
 * Position of a day within the configured week, 0 = first day of the week
 */
export function weekIndex(dt: DateTime, weekStartsOnSunday: boolean): number {
  return (dt.weekday - 1 + (weekStartsOnSunday ? 1 : 0)) % 7;
}

/**
 * Midnight of the first day of the week containing `dt`
 */
export function weekStart(dt: DateTime, weekStartsOnSunday: boolean): DateTime {
  return dt.startOf('day').minus({ days: weekIndex(dt, weekStartsOnSunday) });
}

/**
 * Group ranges by the display-timezone date of their start, keeping input
 * order, and flag each group that begins a later week than the one before
 */
export function groupByDay(ranges: readonly TimeRange[], options: DisplayOptions): DaySchedule[] {
  const days: DaySchedule[] = [];

  for (const range of ranges) {
    const start = range.start.setZone(options.displayTimezone);
    const end = range.end.setZone(options.displayTimezone);
    const last = days[days.length - 1];

    if (last && last.day.hasSame(start, 'day')) {
      last.ranges.push({ start, end });
      continue;
    }

    let startsNextWeek = false;
    if (last) {
      const sunday = options.weekStartsOnSunday;
      startsNextWeek =
        weekIndex(start, sunday) < weekIndex(last.day, sunday) ||
        weekStart(start, sunday) > weekStart(last.day, sunday);
    }

    days.push({ day: start, ranges: [{ start, end }], startsNextWeek });
  }

  return days;
}

/**
 * "9am", "12:30pm" or, in 24-hour mode, "9:00", "17:30"
 */
export function formatTime(dt: DateTime, show24Hour: boolean): string {
  const local = dt.setLocale(DISPLAY_LOCALE);
  if (show24Hour) {
    return local.toFormat('H:mm');
  }
  return local.toFormat(dt.minute !== 0 ? 'h:mma' : 'ha').toLowerCase();
}

/**
 * English ordinal suffix for a day of the month
 */
export function ordinalSuffix(day: number): string {
  if (day >= 11 && day <= 13) return 'th';
  switch (day % 10) {
    case 1:
      return 'st';
    case 2:
      return 'nd';
    case 3:
      return 'rd';
    default:
      return 'th';
  }
}

/**
 * "Mon (Jan 5th):"
 */
export function formatDayLabel(dt: DateTime): string {
  const local = dt.setLocale(DISPLAY_LOCALE);
  return `${local.toFormat('ccc')} (${local.toFormat('LLL')} ${dt.day}${ordinalSuffix(dt.day)}):`;
}

export function formatRange(range: TimeRange, show24Hour: boolean): string {
  return `${formatTime(range.start, show24Hour)} - ${formatTime(range.end, show24Hour)}`;
}

export function formatHeader(options: Pick<AvailabilityConfig, 'displayTimezoneName'>): string {
  const zone = options.displayTimezoneName === null ? '' : ` (all ${options.displayTimezoneName})`;
  return `Availability for next few days${zone}:`;
}

/**
 * Render grouped days as output lines, with a "Next week:" line at each week boundary
 */
export function renderDays(days: readonly DaySchedule[], options: DisplayOptions): string[] {
  const lines: string[] = [formatHeader(options)];

  if (days.length === 0) {
    lines.push('No availability found.');
    return lines;
  }

  for (const day of days) {
    if (day.startsNextWeek) {
      lines.push('Next week:');
    }
    const ranges = day.ranges.map(r => formatRange(r, options.show24Hour)).join(', ');
    lines.push(` * ${formatDayLabel(day.day).padEnd(DAY_LABEL_WIDTH)} ${ranges}`);
  }

  return lines;
}

export function renderSchedule(ranges: readonly TimeRange[], options: DisplayOptions): string[] {
  return renderDays(groupByDay(ranges, options), options);
}
