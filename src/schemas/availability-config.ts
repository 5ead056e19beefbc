/**
 * Availability options: names, types and defaults
 */

import { z } from 'zod';
import {
  TimezoneSchema,
  WeekdayTokenSchema,
  WeeklyTemplateSchema,
  WorkWindowSchema,
} from './common.js';

export type WeekdayToken = z.infer<typeof WeekdayTokenSchema>;
export type WorkWindow = z.infer<typeof WorkWindowSchema>;
export type WeeklyTemplate = z.infer<typeof WeeklyTemplateSchema>;

/**
 * 9am-5pm Monday to Thursday, 9am-2pm Friday, weekends off
 */
export function defaultWeeklyTemplate(): WeeklyTemplate {
  return {
    Mon: [['9am', '5pm']],
    Tue: [['9am', '5pm']],
    Wed: [['9am', '5pm']],
    Thu: [['9am', '5pm']],
    Fri: [['9am', '2pm']],
    Sat: [],
    Sun: [],
  };
}

export const AvailabilityConfigSchema = z
  .object({
    /** Number of calendar days to look ahead, starting today */
    daysForward: z.number().int().positive().default(14),
    /** Minimum notice before the first bookable slot */
    hoursTillFirstMeeting: z.number().nonnegative().default(3),
    /** Minimum meeting length, also the slot rounding grid */
    meetingLengthMinutes: z.number().int().positive().default(30),
    /** Padding subtracted from the start of every busy interval */
    spareBeforeMinutes: z.number().int().nonnegative().default(0),
    /** Padding added to the end of every busy interval */
    spareAfterMinutes: z.number().int().nonnegative().default(0),
    /** Zone the weekly template is expressed in */
    timezone: TimezoneSchema.default('America/Los_Angeles'),
    /** Zone the schedule is printed in */
    displayTimezone: TimezoneSchema.default('America/Los_Angeles'),
    /** Label shown in the header, null to omit it */
    displayTimezoneName: z.string().nullable().default('PT'),
    show24Hour: z.boolean().default(false),
    weekStartsOnSunday: z.boolean().default(false),
    days: WeeklyTemplateSchema.default(defaultWeeklyTemplate),
  })
  .strict();

export type AvailabilityConfig = z.output<typeof AvailabilityConfigSchema>;
export type AvailabilityConfigInput = z.input<typeof AvailabilityConfigSchema>;
export type AvailabilityOptionName = keyof AvailabilityConfig;

/**
 * How a command-line override string is turned into a value
 */
export type OptionKind = 'integer' | 'number' | 'boolean' | 'string' | 'nullableString' | 'json';

export const OPTION_KINDS: Readonly<Record<AvailabilityOptionName, OptionKind>> = Object.freeze({
  daysForward: 'integer',
  hoursTillFirstMeeting: 'number',
  meetingLengthMinutes: 'integer',
  spareBeforeMinutes: 'integer',
  spareAfterMinutes: 'integer',
  timezone: 'string',
  displayTimezone: 'string',
  displayTimezoneName: 'nullableString',
  show24Hour: 'boolean',
  weekStartsOnSunday: 'boolean',
  days: 'json',
});

export function isOptionName(name: string): name is AvailabilityOptionName {
  return Object.prototype.hasOwnProperty.call(OPTION_KINDS, name);
}

/**
 * Fully defaulted configuration
 */
export const AVAILABILITY_DEFAULTS: Readonly<AvailabilityConfig> = Object.freeze(
  AvailabilityConfigSchema.parse({})
);
