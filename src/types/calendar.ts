/**
 * Calendar service types
 */

import type { TimeSlot } from './time-range.js';

/**
 * A calendar the signed-in account can see
 */
export interface CalendarSummary {
  /** Provider-specific calendar ID */
  id: string;
  /** Display name of the calendar */
  name: string;
  /** Whether this is the primary calendar */
  isPrimary: boolean;
  /** Account access role (owner, writer, reader, freeBusyReader) */
  accessRole?: string;
  /** Number of default reminders configured on the calendar */
  defaultReminderCount: number;
  /** Timezone for this calendar */
  timezone?: string;
}

/**
 * Parameters for one busy-time query
 */
export interface BusyQuery {
  calendarId: string;
  /** Start of time range (ISO 8601) */
  timeMin: string;
  /** End of time range (ISO 8601) */
  timeMax: string;
  /** IANA zone the service should answer in */
  timezone: string;
}

/**
 * Anything that can report busy time for a calendar
 */
export interface BusyIntervalSource {
  listBusy(query: BusyQuery): Promise<TimeSlot[]>;
}

/**
 * Calendar capability used by the CLI
 */
export interface ICalendarProvider extends BusyIntervalSource {
  /** Unique identifier for this provider instance */
  readonly providerId: string;
  /** Display name */
  readonly displayName: string;

  /** Initialize and connect to the provider */
  connect(): Promise<void>;
  /** Disconnect from the provider */
  disconnect(): Promise<void>;
  /** Check if currently connected */
  isConnected(): boolean;
  /** List all calendars for this account */
  listCalendars(): Promise<CalendarSummary[]>;
}
