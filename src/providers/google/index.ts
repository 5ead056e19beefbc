/**
 * Google Calendar Provider Implementation
 */

import type { OAuth2Client } from 'google-auth-library';
import type {
  BusyQuery,
  CalendarSummary,
  GoogleProviderConfig,
  TimeSlot,
} from '../../types/index.js';
import { BaseCalendarProvider } from '../base.js';
import { AvailabilityError, ErrorCodes } from '../../utils/error.js';
import type { Logger } from '../../utils/logger.js';
import { createOAuth2Client, ensureValidCredentials } from './auth.js';
import { GoogleCalendarClient } from './client.js';
import { mapFreeBusyResponse, mapGoogleCalendar } from './mapper.js';

/**
 * Google Calendar provider implementation
 */
export class GoogleCalendarProvider extends BaseCalendarProvider {
  private oauth2Client: OAuth2Client;
  private client: GoogleCalendarClient | null = null;
  private calendarsCache: CalendarSummary[] | null = null;

  constructor(
    private readonly googleConfig: GoogleProviderConfig,
    logger?: Logger
  ) {
    super(googleConfig, logger);
    this.oauth2Client = createOAuth2Client(googleConfig);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  async connect(): Promise<void> {
    this.logger.info(`Connecting to Google Calendar (${this.displayName})...`);

    try {
      await ensureValidCredentials(this.oauth2Client);
      this.client = new GoogleCalendarClient(this.oauth2Client, this.googleConfig.timeout);
      this._connected = true;
      this.logger.info(`Connected to Google Calendar (${this.displayName})`);
    } catch (error) {
      this._connected = false;
      throw this.wrapError(error, 'connect');
    }
  }

  async disconnect(): Promise<void> {
    this.client = null;
    this.calendarsCache = null;
    await super.disconnect();
  }

  private getClient(): GoogleCalendarClient {
    if (!this.client) {
      throw new AvailabilityError(
        'Google Calendar client not initialized. Call connect() first.',
        ErrorCodes.PROVIDER_NOT_CONFIGURED,
        { details: { providerId: this.providerId } }
      );
    }
    return this.client;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Calendar Operations
  // ─────────────────────────────────────────────────────────────────────────────

  async listCalendars(): Promise<CalendarSummary[]> {
    return this.executeWithErrorHandling('listCalendars', async () => {
      if (this.calendarsCache) {
        return this.calendarsCache;
      }

      const googleCalendars = await this.getClient().listCalendars();
      const calendars = googleCalendars.map(mapGoogleCalendar);
      this.logger.debug(`Found ${calendars.length} calendar(s)`);

      this.calendarsCache = calendars;
      return calendars;
    });
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Availability
  // ─────────────────────────────────────────────────────────────────────────────

  async listBusy(query: BusyQuery): Promise<TimeSlot[]> {
    return this.executeWithErrorHandling(
      'listBusy',
      async () => {
        const response = await this.getClient().getFreeBusy({
          timeMin: query.timeMin,
          timeMax: query.timeMax,
          timeZone: query.timezone,
          items: [{ id: query.calendarId }],
        });
        return mapFreeBusyResponse(response, query.calendarId);
      },
      query.calendarId
    );
  }
}
