/**
 * Command-line program definition
 */

import { Command } from 'commander';
import type { DateTime } from 'luxon';
import type { ICalendarProvider } from './types/index.js';
import { AuthOptionsSchema, CliOptionsSchema, type CliOptions } from './schemas/cli-options.js';
import { GoogleCalendarProvider } from './providers/google/index.js';
import { executeAuthorize } from './commands/authorize.js';
import { executeGetAvailability, formatGetAvailabilityResult } from './commands/get-availability.js';
import { executeListCalendars, formatCalendarTable } from './commands/list-calendars.js';
import { formatOptionsTable } from './commands/list-options.js';
import { getConfig, loadAvailabilityConfig, type AppConfig } from './utils/config.js';
import { createLogger, type Logger } from './utils/logger.js';

export const CLI_NAME = 'availability';
export const CLI_VERSION = '1.0.0';

export interface CliDependencies {
  /** Environment configuration */
  appConfig: AppConfig;
  logger: Logger;
  /** Writes one block of output to stdout */
  write: (text: string) => void;
  createProvider: (appConfig: AppConfig, logger: Logger) => ICalendarProvider;
  /** Current time override */
  now?: DateTime;
}

export function defaultDependencies(): CliDependencies {
  const appConfig = getConfig();
  return {
    appConfig,
    logger: createLogger(appConfig.logLevel),
    write: text => console.log(text),
    createProvider: (config, logger) => new GoogleCalendarProvider(config.google, logger),
  };
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Connect, run, and always disconnect
 */
async function withProvider<T>(
  deps: CliDependencies,
  fn: (provider: ICalendarProvider) => Promise<T>
): Promise<T> {
  const provider = deps.createProvider(deps.appConfig, deps.logger);
  await provider.connect();
  try {
    return await fn(provider);
  } finally {
    await provider.disconnect();
  }
}

async function runRoot(opts: CliOptions, deps: CliDependencies, program: Command): Promise<void> {
  if (opts.listConfigOptions) {
    deps.write(formatOptionsTable());
    return;
  }

  if (opts.list) {
    const calendars = await withProvider(deps, executeListCalendars);
    deps.write(formatCalendarTable(calendars));
    return;
  }

  // Validate options before touching the network
  const config = loadAvailabilityConfig({ file: opts.timeConfig, overrides: opts.opt });

  const result = await withProvider(deps, provider =>
    executeGetAvailability({ calendarIds: opts.calendar, config, now: deps.now }, provider, deps.logger)
  );
  deps.write(formatGetAvailabilityResult(result));

  if (result.status === 'calendarsNotFound') {
    program.error('error: unknown calendar id(s)', { exitCode: 1, code: 'availability.calendarsNotFound' });
  }
}

/**
 * Build the commander program
 */
export function createProgram(deps: CliDependencies = defaultDependencies()): Command {
  const program: Command = new Command();

  program
    .name(CLI_NAME)
    .description('Show free meeting slots: working hours minus Google Calendar busy time')
    .version(CLI_VERSION)
    .option('-l, --list', 'list calendars')
    .option('-c, --calendar <id>', 'choose a calendar for busy times (multiple allowed)', collect, [])
    .option('-t, --time-config <file>', 'choose a configuration JSON file')
    .option(
      '-o, --opt <name=value>',
      'override a configuration option (multiple allowed), see -O for possible options',
      collect,
      []
    )
    .option('-O, --list-config-options', 'list possible configuration options')
    .action(async (rawOptions: unknown) => {
      const parsed = CliOptionsSchema.safeParse(rawOptions);
      if (!parsed.success) {
        program.error(`error: ${parsed.error.issues.map(i => i.message).join('; ')}`);
      }
      await runRoot(parsed.data, deps, program);
    });

  program
    .command('auth')
    .description('authorize read access to Google Calendar')
    .option('--code <code>', 'authorization code from the consent redirect')
    .action(async (rawOptions: unknown) => {
      const { code } = AuthOptionsSchema.parse(rawOptions);
      const lines = await executeAuthorize(deps.appConfig.google, code);
      deps.write(lines.join('\n'));
    });

  return program;
}
