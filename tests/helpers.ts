import { DateTime } from 'luxon';
import type {
  BusyQuery,
  CalendarSummary,
  ICalendarProvider,
  TimeRange,
  TimeSlot,
} from '../src/types/index.js';

export const ZONE = 'America/Los_Angeles';

/** Monday 2 March 2026 */
export const MONDAY = '2026-03-02';

export function at(date: string, time: string, zone: string = ZONE): DateTime {
  return DateTime.fromISO(`${date}T${time}`, { zone });
}

/** A range on MONDAY given as "HH:mm" strings */
export function range(start: string, end: string, date: string = MONDAY): TimeRange {
  return { start: at(date, start), end: at(date, end) };
}

/** Ranges as [start, end] "HH:mm" pairs */
export function hhmm(ranges: readonly TimeRange[]): Array<[string, string]> {
  return ranges.map(r => [r.start.toFormat('HH:mm'), r.end.toFormat('HH:mm')]);
}

export function calendar(id: string, overrides: Partial<CalendarSummary> = {}): CalendarSummary {
  return {
    id,
    name: id,
    isPrimary: false,
    accessRole: 'reader',
    defaultReminderCount: 0,
    ...overrides,
  };
}

/**
 * In-memory calendar capability
 */
export class FakeCalendarProvider implements ICalendarProvider {
  readonly providerId = 'fake';
  readonly displayName = 'Fake Calendar';
  readonly queries: BusyQuery[] = [];
  connected = false;
  disconnects = 0;

  constructor(
    private calendars: CalendarSummary[],
    private busy: Record<string, TimeSlot[] | Error> = {}
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
    this.disconnects++;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async listCalendars(): Promise<CalendarSummary[]> {
    return this.calendars;
  }

  async listBusy(query: BusyQuery): Promise<TimeSlot[]> {
    this.queries.push(query);
    const slots = this.busy[query.calendarId];
    if (slots instanceof Error) throw slots;
    return slots ?? [];
  }
}

/**
 * Run `fn` and return what it throws
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
