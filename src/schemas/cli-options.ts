/**
 * Zod schemas for command-line input
 */

import { z } from 'zod';

/**
 * Root command options, after commander has parsed them
 */
export const CliOptionsSchema = z
  .object({
    list: z.boolean().default(false),
    calendar: z.array(z.string().min(1)).default([]),
    timeConfig: z.string().optional(),
    opt: z.array(z.string()).default([]),
    listConfigOptions: z.boolean().default(false),
  })
  .superRefine((opts, ctx) => {
    if (opts.listConfigOptions) return;
    if (opts.list && opts.calendar.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'options -l and -c are mutually exclusive',
      });
    } else if (!opts.list && opts.calendar.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must set either -c or -l',
      });
    }
  });

export type CliOptions = z.output<typeof CliOptionsSchema>;

export const AuthOptionsSchema = z.object({
  code: z.string().min(1).optional(),
});

export type AuthOptions = z.output<typeof AuthOptionsSchema>;
