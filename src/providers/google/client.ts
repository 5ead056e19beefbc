/**
 * Google Calendar API client wrapper
 */

import { google, calendar_v3 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { ErrorCodes, ExternalServiceError } from '../../utils/error.js';

type Calendar = calendar_v3.Calendar;
type CalendarListEntry = calendar_v3.Schema$CalendarListEntry;
type FreeBusyResponse = calendar_v3.Schema$FreeBusyResponse;

/**
 * The parts of a gaxios error the mapping below looks at
 */
interface ApiErrorShape {
  code?: number | string;
  status?: number;
  message?: string;
  errors?: Array<{ reason?: string; message?: string }>;
}

function isApiErrorShape(error: unknown): error is ApiErrorShape {
  return typeof error === 'object' && error !== null;
}

/**
 * HTTP status of a gaxios error; `code` holds it on API errors and a
 * string such as "ECONNRESET" on network failures
 */
function statusOf(error: ApiErrorShape): number | undefined {
  if (typeof error.code === 'number') return error.code;
  if (typeof error.status === 'number') return error.status;
  return undefined;
}

/**
 * Google Calendar API client wrapper
 */
export class GoogleCalendarClient {
  private calendar: Calendar;

  constructor(auth: OAuth2Client, timeout?: number) {
    this.calendar = google.calendar({ version: 'v3', auth, timeout });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Calendar Operations
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * List all calendars accessible to the user
   */
  async listCalendars(): Promise<CalendarListEntry[]> {
    try {
      const calendars: CalendarListEntry[] = [];
      let pageToken: string | undefined;

      do {
        const response = await this.calendar.calendarList.list({
          pageToken,
          maxResults: 250,
        });

        if (response.data.items) {
          calendars.push(...response.data.items);
        }
        pageToken = response.data.nextPageToken ?? undefined;
      } while (pageToken);

      return calendars;
    } catch (error) {
      throw this.handleApiError(error, 'listCalendars');
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Free/Busy Operations
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Query free/busy information
   */
  async getFreeBusy(params: {
    timeMin: string;
    timeMax: string;
    timeZone: string;
    items: Array<{ id: string }>;
  }): Promise<FreeBusyResponse> {
    try {
      const response = await this.calendar.freebusy.query({
        requestBody: {
          timeMin: params.timeMin,
          timeMax: params.timeMax,
          timeZone: params.timeZone,
          items: params.items,
        },
      });
      return response.data;
    } catch (error) {
      throw this.handleApiError(error, 'getFreeBusy', params.items[0]?.id);
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Error Handling
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Convert Google API errors to our error format
   */
  handleApiError(error: unknown, operation: string, calendarId?: string): ExternalServiceError {
    const apiError: ApiErrorShape = isApiErrorShape(error) ? error : {};
    const statusCode = statusOf(apiError);
    const reason = apiError.errors?.[0]?.reason;
    const message = apiError.message ?? (typeof error === 'string' ? error : 'Unknown error');
    const cause = error instanceof Error ? error : undefined;

    switch (statusCode) {
      case 401:
        return new ExternalServiceError(
          `Authentication failed: ${message}`,
          ErrorCodes.AUTH_FAILED,
          { calendarId, cause }
        );

      case 403:
        if (reason === 'rateLimitExceeded' || reason === 'userRateLimitExceeded') {
          return new ExternalServiceError('Rate limit exceeded', ErrorCodes.RATE_LIMITED, {
            calendarId,
            retryable: true,
            cause,
          });
        }
        return new ExternalServiceError(
          `Permission denied: ${message}`,
          ErrorCodes.PERMISSION_DENIED,
          { calendarId, cause }
        );

      case 404:
        return new ExternalServiceError(
          calendarId ? `Calendar not found: ${calendarId}` : 'Resource not found',
          ErrorCodes.CALENDAR_NOT_FOUND,
          { calendarId, cause }
        );

      case 429:
        return new ExternalServiceError('Too many requests', ErrorCodes.RATE_LIMITED, {
          calendarId,
          retryable: true,
          cause,
        });

      default:
        return new ExternalServiceError(
          `${operation} failed: ${message}`,
          ErrorCodes.PROVIDER_UNAVAILABLE,
          {
            calendarId,
            retryable: statusCode === undefined || statusCode >= 500,
            details: { statusCode, reason },
            cause,
          }
        );
    }
  }
}
