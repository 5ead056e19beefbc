/**
 * Time range types
 */

import type { DateTime } from 'luxon';

/**
 * Half-open interval [start, end) of zone-aware instants
 */
export interface TimeRange {
  readonly start: DateTime;
  readonly end: DateTime;
}

/**
 * A time slot as exchanged with the calendar service
 */
export interface TimeSlot {
  /** Start time (ISO 8601) */
  start: string;
  /** End time (ISO 8601) */
  end: string;
}

/**
 * Free ranges falling on one display-timezone calendar day
 */
export interface DaySchedule {
  /** Start of the first range, in the display timezone */
  day: DateTime;
  ranges: TimeRange[];
  /** True when this day opens a later week than the previous group */
  startsNextWeek: boolean;
}
