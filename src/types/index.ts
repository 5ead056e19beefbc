/**
 * Type exports for calendar availability
 */

export type { TimeRange, TimeSlot, DaySchedule } from './time-range.js';

export type {
  CalendarSummary,
  BusyQuery,
  BusyIntervalSource,
  ICalendarProvider,
} from './calendar.js';

export type { StoredCredentials, GoogleProviderConfig } from './provider.js';

export type {
  AvailabilityConfig,
  AvailabilityConfigInput,
  WeekdayToken,
  WeeklyTemplate,
} from '../schemas/availability-config.js';
