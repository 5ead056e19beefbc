/**
 * Google Calendar data mapping
 * Converts Google Calendar API payloads into our calendar types
 */

import type { calendar_v3 } from 'googleapis';
import type { CalendarSummary, TimeSlot } from '../../types/index.js';
import { ErrorCodes, ExternalServiceError, calendarNotFoundError } from '../../utils/error.js';

type GoogleCalendar = calendar_v3.Schema$CalendarListEntry;
type GoogleFreeBusy = calendar_v3.Schema$FreeBusyResponse;

/**
 * Map a calendar list entry to a CalendarSummary
 */
export function mapGoogleCalendar(googleCal: GoogleCalendar): CalendarSummary {
  return {
    id: googleCal.id ?? '',
    name: googleCal.summaryOverride ?? googleCal.summary ?? googleCal.id ?? 'Unnamed Calendar',
    isPrimary: googleCal.primary === true,
    accessRole: googleCal.accessRole ?? undefined,
    defaultReminderCount: googleCal.defaultReminders?.length ?? 0,
    timezone: googleCal.timeZone ?? undefined,
  };
}

/**
 * Listing order: owned calendars first, then those with more default
 * reminders, then by id
 */
export function compareCalendarsForListing(a: CalendarSummary, b: CalendarSummary): number {
  const aOwner = a.accessRole === 'owner' ? 0 : 1;
  const bOwner = b.accessRole === 'owner' ? 0 : 1;
  if (aOwner !== bOwner) return aOwner - bOwner;
  if (a.defaultReminderCount !== b.defaultReminderCount) {
    return b.defaultReminderCount - a.defaultReminderCount;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Extract one calendar's busy slots from a free/busy response
 */
export function mapFreeBusyResponse(response: GoogleFreeBusy, calendarId: string): TimeSlot[] {
  const calendar = response.calendars?.[calendarId];
  if (!calendar) {
    throw new ExternalServiceError(
      `Free/busy response has no entry for ${calendarId}`,
      ErrorCodes.INVALID_RESPONSE,
      { calendarId }
    );
  }

  const errors = calendar.errors ?? [];
  if (errors.length > 0) {
    if (errors.some(e => e.reason === 'notFound')) {
      throw calendarNotFoundError(calendarId);
    }
    const reasons = errors.map(e => e.reason ?? 'unknown').join(', ');
    throw new ExternalServiceError(
      `Free/busy query for ${calendarId} failed: ${reasons}`,
      ErrorCodes.PROVIDER_UNAVAILABLE,
      { calendarId, details: { reasons } }
    );
  }

  const slots: TimeSlot[] = [];
  for (const period of calendar.busy ?? []) {
    if (period.start && period.end) {
      slots.push({ start: period.start, end: period.end });
    }
  }
  return slots;
}
