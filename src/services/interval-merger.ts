/**
 * Interval Merger
 * Subtracts busy ranges from free ranges in a single forward sweep
 */

import type { DateTime } from 'luxon';
import type { TimeRange } from '../types/index.js';
import { ceilToGrid, wholeMinutesBetween } from '../utils/datetime.js';

export interface MergeOptions {
  /** Fragments shorter than this many whole minutes are dropped */
  minLengthMinutes: number;
  /** Starts pushed back by a busy range are rounded up to this grid, measured from the free range's start */
  roundGridMinutes: number;
}

/**
 * Return the parts of `free` not covered by `busy`.
 *
 * Both lists must be sorted by start, and busy ranges must not overlap one
 * another: a busy range is never revisited once the sweep has moved past it.
 * Neither input is modified.
 */
export function mergeFreeWithBusy(
  free: readonly TimeRange[],
  busy: readonly TimeRange[],
  options: MergeOptions
): TimeRange[] {
  const result: TimeRange[] = [];

  const emit = (start: DateTime, end: DateTime): void => {
    if (wholeMinutesBetween(start, end) >= options.minLengthMinutes) {
      result.push({ start, end });
    }
  };

  let freeIdx = 0;
  let busyIdx = 0;
  // Working copy of free[freeIdx]; its start moves forward as busy ranges eat into it
  let current: TimeRange | undefined = free[0];
  let anchor: DateTime | undefined = current?.start;

  const nextFree = (): void => {
    freeIdx++;
    current = free[freeIdx];
    anchor = current?.start;
  };

  // Continue with the tail after a busy range, or give up on a sliver that would start past the end
  const resumeAfter = (range: TimeRange, busyEnd: DateTime, origin: DateTime): void => {
    const newStart = ceilToGrid(busyEnd, origin, options.roundGridMinutes);
    if (newStart < range.end) {
      current = { start: newStart, end: range.end };
    } else {
      nextFree();
    }
    busyIdx++;
  };

  while (current !== undefined && anchor !== undefined) {
    const range: TimeRange = current;
    const origin: DateTime = anchor;

    let blocker = busy[busyIdx];
    while (blocker !== undefined && blocker.end <= range.start) {
      busyIdx++;
      blocker = busy[busyIdx];
    }

    if (blocker === undefined || blocker.start >= range.end) {
      // Nothing left overlaps this range
      emit(range.start, range.end);
      nextFree();
    } else if (blocker.start <= range.start) {
      if (blocker.end >= range.end) {
        // Busy covers all of it
        nextFree();
      } else {
        // Busy covers the head
        resumeAfter(range, blocker.end, origin);
      }
    } else if (blocker.end >= range.end) {
      // Busy covers the tail
      emit(range.start, blocker.start);
      nextFree();
    } else {
      // Busy sits inside
      emit(range.start, blocker.start);
      resumeAfter(range, blocker.end, origin);
    }
  }

  return result;
}

/**
 * Reduce free ranges against each calendar's busy ranges in turn. With no
 * calendars the ranges still go through the minimum length filter.
 */
export function reduceAcrossCalendars(
  free: readonly TimeRange[],
  busyLists: readonly (readonly TimeRange[])[],
  options: MergeOptions
): TimeRange[] {
  if (busyLists.length === 0) {
    return mergeFreeWithBusy(free, [], options);
  }

  let remaining: TimeRange[] = [...free];
  for (const busy of busyLists) {
    remaining = mergeFreeWithBusy(remaining, busy, options);
  }
  return remaining;
}
