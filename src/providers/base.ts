/**
 * Abstract base class for calendar providers
 */

import type {
  BusyQuery,
  CalendarSummary,
  ICalendarProvider,
  TimeSlot,
} from '../types/index.js';
import { AvailabilityError, ErrorCodes, wrapError } from '../utils/error.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Identity shared by every provider configuration
 */
export interface ProviderIdentity {
  id: string;
  name: string;
}

/**
 * Abstract base class for all calendar providers
 */
export abstract class BaseCalendarProvider implements ICalendarProvider {
  protected _connected: boolean = false;
  protected logger: Logger;

  constructor(
    protected readonly identity: ProviderIdentity,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger();
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Identity
  // ─────────────────────────────────────────────────────────────────────────────

  get providerId(): string {
    return this.identity.id;
  }

  get displayName(): string {
    return this.identity.name;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Connection Lifecycle
  // ─────────────────────────────────────────────────────────────────────────────

  abstract connect(): Promise<void>;

  async disconnect(): Promise<void> {
    this._connected = false;
    this.logger.info(`Disconnected from ${this.displayName}`);
  }

  isConnected(): boolean {
    return this._connected;
  }

  /**
   * Ensure connected before making API calls
   */
  protected ensureConnected(): void {
    if (!this._connected) {
      throw new AvailabilityError(
        `Provider ${this.displayName} is not connected`,
        ErrorCodes.PROVIDER_NOT_CONFIGURED,
        { details: { providerId: this.providerId } }
      );
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Calendar Operations - must be implemented by subclasses
  // ─────────────────────────────────────────────────────────────────────────────

  abstract listCalendars(): Promise<CalendarSummary[]>;

  abstract listBusy(query: BusyQuery): Promise<TimeSlot[]>;

  // ─────────────────────────────────────────────────────────────────────────────
  // Helper Methods
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Wrap errors with provider context
   */
  protected wrapError(error: unknown, operation: string, calendarId?: string): AvailabilityError {
    return wrapError(error, { calendarId, operation });
  }

  /**
   * Execute with error handling
   */
  protected async executeWithErrorHandling<T>(
    operation: string,
    fn: () => Promise<T>,
    calendarId?: string
  ): Promise<T> {
    this.ensureConnected();
    try {
      return await fn();
    } catch (error) {
      throw this.wrapError(error, operation, calendarId);
    }
  }
}
