import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';
import {
  buildWorkWindows,
  firstMeetingFloor,
  weekdayToken,
} from '../src/services/work-window-builder.js';
import { validateAvailabilityConfig } from '../src/utils/config.js';
import { DegenerateIntervalError, ErrorCodes } from '../src/utils/error.js';
import type { TimeRange } from '../src/types/index.js';
import { at, captureError, MONDAY } from './helpers.js';

function isoPairs(ranges: readonly TimeRange[]): Array<[string | null, string | null]> {
  return ranges.map(r => [r.start.toISO(), r.end.toISO()]);
}

describe('weekdayToken', () => {
  it('maps luxon weekdays to tokens', () => {
    expect(weekdayToken(at(MONDAY, '12:00'))).toBe('Mon');
    expect(weekdayToken(at('2026-03-08', '12:00'))).toBe('Sun');
  });
});

describe('firstMeetingFloor', () => {
  it('adds the lead time and truncates to the hour', () => {
    expect(firstMeetingFloor(at(MONDAY, '10:15'), 3).toFormat('HH:mm')).toBe('13:00');
    expect(firstMeetingFloor(at(MONDAY, '10:15'), 0).toFormat('HH:mm')).toBe('10:00');
  });
});

describe('buildWorkWindows', () => {
  it('expands the default week from the current day', () => {
    const config = validateAvailabilityConfig({ daysForward: 7 });
    const windows = buildWorkWindows(config, at(MONDAY, '06:30'));

    expect(isoPairs(windows)).toEqual([
      ['2026-03-02T09:00:00.000-08:00', '2026-03-02T17:00:00.000-08:00'],
      ['2026-03-03T09:00:00.000-08:00', '2026-03-03T17:00:00.000-08:00'],
      ['2026-03-04T09:00:00.000-08:00', '2026-03-04T17:00:00.000-08:00'],
      ['2026-03-05T09:00:00.000-08:00', '2026-03-05T17:00:00.000-08:00'],
      ['2026-03-06T09:00:00.000-08:00', '2026-03-06T14:00:00.000-08:00'],
    ]);
  });

  it('takes dates in the configured zone whatever the zone of now', () => {
    const config = validateAvailabilityConfig({ daysForward: 1 });
    // 06:30 in Los Angeles
    const windows = buildWorkWindows(config, DateTime.fromISO('2026-03-02T14:30:00Z', { zone: 'UTC' }));

    expect(isoPairs(windows)).toEqual([
      ['2026-03-02T09:00:00.000-08:00', '2026-03-02T17:00:00.000-08:00'],
    ]);
  });

  it('clips the first window up to the lead-time floor', () => {
    const config = validateAvailabilityConfig({ daysForward: 1 });
    const windows = buildWorkWindows(config, at(MONDAY, '10:15'));

    expect(isoPairs(windows)).toEqual([
      ['2026-03-02T13:00:00.000-08:00', '2026-03-02T17:00:00.000-08:00'],
    ]);
  });

  it('drops windows that end at or before the floor', () => {
    const config = validateAvailabilityConfig({ daysForward: 2 });
    const windows = buildWorkWindows(config, at(MONDAY, '14:10'));

    expect(isoPairs(windows)).toEqual([
      ['2026-03-03T09:00:00.000-08:00', '2026-03-03T17:00:00.000-08:00'],
    ]);
  });

  it('runs a window whose end precedes its start into the next day', () => {
    const config = validateAvailabilityConfig({
      daysForward: 1,
      hoursTillFirstMeeting: 0,
      days: { Mon: [['10pm', '2am']] },
    });
    const windows = buildWorkWindows(config, at(MONDAY, '06:30'));

    expect(isoPairs(windows)).toEqual([
      ['2026-03-02T22:00:00.000-08:00', '2026-03-03T02:00:00.000-08:00'],
    ]);
  });

  it('skips weekdays with no windows and keeps template order within a day', () => {
    const config = validateAvailabilityConfig({
      daysForward: 7,
      days: { Wed: [['9am', '12pm'], ['1pm', '5:30pm']], Thu: [] },
    });
    const windows = buildWorkWindows(config, at(MONDAY, '06:30'));

    expect(isoPairs(windows)).toEqual([
      ['2026-03-04T09:00:00.000-08:00', '2026-03-04T12:00:00.000-08:00'],
      ['2026-03-04T13:00:00.000-08:00', '2026-03-04T17:30:00.000-08:00'],
    ]);
  });

  it('keeps wall-clock hours across a daylight saving change', () => {
    const config = validateAvailabilityConfig({ daysForward: 8 });
    const windows = buildWorkWindows(config, at(MONDAY, '06:30'));
    const last = windows[windows.length - 1];

    expect(windows).toHaveLength(6);
    expect(last?.start.toISO()).toBe('2026-03-09T09:00:00.000-07:00');
    expect(last?.end.toISO()).toBe('2026-03-09T17:00:00.000-07:00');
  });

  it('rejects a window with no length', () => {
    const config = validateAvailabilityConfig({
      daysForward: 1,
      days: { Mon: [['9am', '9am']] },
    });

    const error = captureError(() => buildWorkWindows(config, at(MONDAY, '05:00')));

    expect(error).toBeInstanceOf(DegenerateIntervalError);
    expect(error).toMatchObject({
      code: ErrorCodes.DEGENERATE_INTERVAL,
      message: 'Work window 9am-9am on 2026-03-02 has no length',
    });
  });

  it('returns nothing for an empty template', () => {
    const config = validateAvailabilityConfig({ days: {} });
    expect(buildWorkWindows(config, at(MONDAY, '06:30'))).toEqual([]);
  });
});
