/**
 * Availability command
 * Resolves calendar ids, computes free time and renders the schedule
 */

import type { DateTime } from 'luxon';
import type { AvailabilityConfig, CalendarSummary, ICalendarProvider } from '../types/index.js';
import { AvailabilityService, selectCalendars } from '../services/availability-service.js';
import { renderDays } from '../services/schedule-formatter.js';
import type { Logger } from '../utils/logger.js';
import { executeListCalendars, formatCalendarTable } from './list-calendars.js';

export interface GetAvailabilityInput {
  calendarIds: string[];
  config: AvailabilityConfig;
  /** Override of the current time, for reproducible runs */
  now?: DateTime;
}

export type GetAvailabilityResult =
  | { status: 'ok'; lines: string[] }
  | { status: 'calendarsNotFound'; notFound: string[]; calendars: CalendarSummary[] };

/**
 * Execute the availability command
 */
export async function executeGetAvailability(
  input: GetAvailabilityInput,
  provider: ICalendarProvider,
  logger: Logger
): Promise<GetAvailabilityResult> {
  const calendars = await executeListCalendars(provider);
  const { chosen, notFound } = selectCalendars(input.calendarIds, calendars);

  if (notFound.length > 0) {
    return { status: 'calendarsNotFound', notFound, calendars };
  }

  const service = new AvailabilityService(provider, logger);
  const { schedule } = await service.getAvailability(
    chosen.map(c => c.id),
    input.config,
    input.now
  );

  return { status: 'ok', lines: renderDays(schedule, input.config) };
}

/**
 * Format result for the terminal
 */
export function formatGetAvailabilityResult(result: GetAvailabilityResult): string {
  if (result.status === 'ok') {
    return result.lines.join('\n');
  }

  const ids = result.notFound.map(id => `'${id}'`).join(', ');
  return [
    `Calendars [${ids}] not found! Possible calendars are:`,
    formatCalendarTable(result.calendars),
  ].join('\n');
}
