/**
 * Calendar listing
 */

import type { CalendarSummary, ICalendarProvider } from '../types/index.js';
import { compareCalendarsForListing } from '../providers/google/mapper.js';
import { formatTable } from './table.js';

/**
 * Fetch the account's calendars in listing order
 */
export async function executeListCalendars(provider: ICalendarProvider): Promise<CalendarSummary[]> {
  const calendars = await provider.listCalendars();
  return [...calendars].sort(compareCalendarsForListing);
}

/**
 * Id / Name table
 */
export function formatCalendarTable(calendars: readonly CalendarSummary[]): string {
  return formatTable(
    ['Id', 'Name'],
    calendars.map(cal => [cal.id, cal.name])
  );
}
