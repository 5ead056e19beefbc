import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { AVAILABILITY_DEFAULTS, isOptionName } from '../src/schemas/availability-config.js';
import {
  coerceOptionValue,
  loadAvailabilityConfig,
  getConfig,
  loadConfig,
  parseOptionOverride,
  readAvailabilityFile,
  resetConfig,
  validateAvailabilityConfig,
} from '../src/utils/config.js';
import { ConfigurationError, ErrorCodes } from '../src/utils/error.js';
import { captureError } from './helpers.js';

describe('validateAvailabilityConfig', () => {
  it('fills in every default', () => {
    expect(validateAvailabilityConfig({})).toEqual({
      daysForward: 14,
      hoursTillFirstMeeting: 3,
      meetingLengthMinutes: 30,
      spareBeforeMinutes: 0,
      spareAfterMinutes: 0,
      timezone: 'America/Los_Angeles',
      displayTimezone: 'America/Los_Angeles',
      displayTimezoneName: 'PT',
      show24Hour: false,
      weekStartsOnSunday: false,
      days: {
        Mon: [['9am', '5pm']],
        Tue: [['9am', '5pm']],
        Wed: [['9am', '5pm']],
        Thu: [['9am', '5pm']],
        Fri: [['9am', '2pm']],
        Sat: [],
        Sun: [],
      },
    });
  });

  it('replaces the whole weekly template when days is given', () => {
    const config = validateAvailabilityConfig({ days: { Sat: [['10am', '1pm']] } });
    expect(config.days).toEqual({ Sat: [['10am', '1pm']] });
  });

  it('rejects unknown option names', () => {
    const error = captureError(() => validateAvailabilityConfig({ lunchBreak: true }));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      code: ErrorCodes.CONFIGURATION_ERROR,
      message: "Invalid configuration: Unrecognized key(s) in object: 'lunchBreak'",
    });
  });

  it('rejects unknown weekday keys', () => {
    expect(() => validateAvailabilityConfig({ days: { Funday: [['9am', '5pm']] } })).toThrow(
      "Invalid configuration: days: Unrecognized key(s) in object: 'Funday'"
    );
  });

  it('rejects unreadable times of day with their path', () => {
    expect(() => validateAvailabilityConfig({ days: { Mon: [['25pm', '5pm']] } })).toThrow(
      'Invalid configuration: days.Mon.0.0: Must be a time of day such as "9am", "5:30pm" or "17:00"'
    );
  });

  it('rejects unknown timezones', () => {
    expect(() => validateAvailabilityConfig({ timezone: 'Nowhere/Special' })).toThrow(
      'Invalid configuration: timezone: Must be a valid IANA timezone, e.g. "America/Los_Angeles"'
    );
  });

  it('names the source in the message', () => {
    expect(() => validateAvailabilityConfig({ daysForward: 0 }, 'team.json')).toThrow(/^Invalid team\.json: daysForward: /);
  });

  it('accepts a null display zone label', () => {
    expect(validateAvailabilityConfig({ displayTimezoneName: null }).displayTimezoneName).toBeNull();
  });
});

describe('AVAILABILITY_DEFAULTS', () => {
  it('cannot be modified', () => {
    expect(Object.isFrozen(AVAILABILITY_DEFAULTS)).toBe(true);
  });

  it('lists every option name', () => {
    expect(Object.keys(AVAILABILITY_DEFAULTS).every(isOptionName)).toBe(true);
    expect(isOptionName('toString')).toBe(false);
  });
});

describe('coerceOptionValue', () => {
  it('reads integers and numbers', () => {
    expect(coerceOptionValue('daysForward', '7')).toBe(7);
    expect(coerceOptionValue('hoursTillFirstMeeting', '1.5')).toBe(1.5);
  });

  it('reads booleans as words or integers', () => {
    expect(coerceOptionValue('show24Hour', 'true')).toBe(true);
    expect(coerceOptionValue('show24Hour', 'False')).toBe(false);
    expect(coerceOptionValue('show24Hour', '1')).toBe(true);
    expect(coerceOptionValue('show24Hour', '0')).toBe(false);
  });

  it('reads "null" as null for the display zone label', () => {
    expect(coerceOptionValue('displayTimezoneName', 'null')).toBeNull();
    expect(coerceOptionValue('displayTimezoneName', 'ET')).toBe('ET');
  });

  it('reads the weekly template as JSON', () => {
    expect(coerceOptionValue('days', '{"Mon":[["9am","5pm"]]}')).toEqual({ Mon: [['9am', '5pm']] });
  });

  it('rejects values of the wrong kind', () => {
    expect(() => coerceOptionValue('daysForward', 'abc')).toThrow(
      "Bad type for option daysForward, should be an integer but is 'abc'"
    );
    expect(() => coerceOptionValue('daysForward', '2.5')).toThrow(
      "Bad type for option daysForward, should be an integer but is '2.5'"
    );
    expect(() => coerceOptionValue('show24Hour', 'yes')).toThrow(
      "Bad type for option show24Hour, should be like a boolean but is 'yes'"
    );
    expect(() => coerceOptionValue('days', '[oops')).toThrow(
      "Bad type for option days, should be JSON but is '[oops'. Error is: "
    );
  });
});

describe('parseOptionOverride', () => {
  it('splits on the first equals sign', () => {
    expect(parseOptionOverride('displayTimezoneName=UTC=0')).toEqual(['displayTimezoneName', 'UTC=0']);
    expect(parseOptionOverride('meetingLengthMinutes=45')).toEqual(['meetingLengthMinutes', 45]);
  });

  it('requires NAME=VALUE', () => {
    expect(() => parseOptionOverride('show24Hour')).toThrow('Any configuration option should be provided as OPTNAME=VALUE');
    expect(() => parseOptionOverride('=1')).toThrow('Any configuration option should be provided as OPTNAME=VALUE');
  });

  it('rejects unknown names', () => {
    const error = captureError(() => parseOptionOverride('lunchBreak=1'));

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      code: ErrorCodes.UNKNOWN_OPTION,
      message: 'Unknown option lunchBreak, use -O to see possible options',
    });
  });
});

describe('configuration files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'availability-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, contents: string): string {
    const path = join(dir, name);
    writeFileSync(path, contents, 'utf8');
    return path;
  }

  it('applies overrides on top of the file', () => {
    const file = writeConfig('team.json', JSON.stringify({ daysForward: 3, show24Hour: true }));

    const config = loadAvailabilityConfig({ file, overrides: ['daysForward=5', 'spareAfterMinutes=10'] });

    expect(config).toMatchObject({
      daysForward: 5,
      show24Hour: true,
      spareAfterMinutes: 10,
      meetingLengthMinutes: 30,
    });
  });

  it('loads the bundled example', () => {
    const file = fileURLToPath(new URL('../config/availability.example.json', import.meta.url));

    const config = loadAvailabilityConfig({ file });

    expect(config).toMatchObject({ daysForward: 10, timezone: 'Europe/Berlin', show24Hour: true });
    expect(config.days.Wed).toEqual([['9:00', '12:30']]);
    expect(config.days.Sat).toBeUndefined();
  });

  it('uses the defaults with no file and no overrides', () => {
    expect(loadAvailabilityConfig()).toEqual(AVAILABILITY_DEFAULTS);
  });

  it('validates file contents', () => {
    const file = writeConfig('bad.json', JSON.stringify({ daysForward: 'soon' }));
    expect(() => loadAvailabilityConfig({ file })).toThrow(`Invalid ${file}: daysForward: `);
  });

  it('rejects files that are not a JSON object', () => {
    const notJson = writeConfig('broken.json', '{ daysForward: 3');
    const list = writeConfig('list.json', '[1, 2]');

    expect(() => readAvailabilityFile(notJson)).toThrow(`Configuration file ${notJson} is not valid JSON`);
    expect(() => readAvailabilityFile(list)).toThrow(`Configuration file ${list} must contain a JSON object`);
  });

  it('reports a missing file', () => {
    const missing = join(dir, 'missing.json');
    expect(() => readAvailabilityFile(missing)).toThrow(`Cannot read configuration file ${missing}`);
  });
});

describe('loadConfig', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('reads Google settings and falls back for bad values', () => {
    process.env.LOG_LEVEL = 'chatty';
    process.env.REQUEST_TIMEOUT = '5000';
    process.env.GOOGLE_CLIENT_ID = 'test-client';
    process.env.GOOGLE_CLIENT_SECRET = 'test-secret';
    process.env.GOOGLE_ACCESS_TOKEN = 'test-access';
    process.env.GOOGLE_REFRESH_TOKEN = 'test-refresh';
    process.env.GOOGLE_REDIRECT_URI = '';
    delete process.env.GOOGLE_TOKEN_EXPIRY;

    const config = loadConfig();

    expect(config.logLevel).toBe('warn');
    expect(config.request.timeout).toBe(5000);
    expect(config.google).toMatchObject({
      clientId: 'test-client',
      clientSecret: 'test-secret',
      redirectUri: 'http://localhost',
      timeout: 5000,
      credentials: { accessToken: 'test-access', refreshToken: 'test-refresh', tokenExpiry: undefined },
    });
  });

  it('leaves credentials unset without both tokens', () => {
    process.env.GOOGLE_ACCESS_TOKEN = 'test-access';
    delete process.env.GOOGLE_REFRESH_TOKEN;

    expect(loadConfig().google.credentials).toBeUndefined();
  });
});

describe('getConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('loads once until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig()).not.toBe(first);
  });
});
