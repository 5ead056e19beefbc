/**
 * Configuration loading and validation
 */

import { readFileSync } from 'node:fs';
import { config as loadEnv } from 'dotenv';
import type { ZodError } from 'zod';
import type { GoogleProviderConfig } from '../types/index.js';
import {
  AvailabilityConfigSchema,
  OPTION_KINDS,
  isOptionName,
  type AvailabilityConfig,
  type AvailabilityOptionName,
} from '../schemas/availability-config.js';
import { ConfigurationError, ErrorCodes, unknownOptionError } from './error.js';
import { isLogLevel, type LogLevel } from './logger.js';

// Load environment variables
loadEnv();

/**
 * Application settings that come from the environment
 */
export interface AppConfig {
  logLevel: LogLevel;
  request: {
    timeout: number;
  };
  google: GoogleProviderConfig;
}

/**
 * Get environment variable with optional default
 */
function getEnv(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Get number environment variable
 */
function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Load Google provider configuration from environment
 */
function loadGoogleConfig(timeout: number): GoogleProviderConfig {
  const accessToken = getEnv('GOOGLE_ACCESS_TOKEN');
  const refreshToken = getEnv('GOOGLE_REFRESH_TOKEN');

  return {
    id: getEnv('GOOGLE_PROVIDER_ID') ?? 'google-primary',
    name: getEnv('GOOGLE_PROVIDER_NAME') ?? 'Google Calendar',
    clientId: getEnv('GOOGLE_CLIENT_ID'),
    clientSecret: getEnv('GOOGLE_CLIENT_SECRET'),
    redirectUri: getEnv('GOOGLE_REDIRECT_URI', 'http://localhost'),
    credentials:
      accessToken && refreshToken
        ? {
            accessToken,
            refreshToken,
            tokenExpiry: getEnv('GOOGLE_TOKEN_EXPIRY'),
          }
        : undefined,
    timeout,
  };
}

/**
 * Load full application configuration
 */
export function loadConfig(): AppConfig {
  const level = getEnv('LOG_LEVEL', 'warn') ?? 'warn';
  const timeout = getNumberEnv('REQUEST_TIMEOUT', 30000);

  return {
    logLevel: isLogLevel(level) ? level : 'warn',
    request: { timeout },
    google: loadGoogleConfig(timeout),
  };
}

/**
 * Singleton configuration instance
 */
let configInstance: AppConfig | null = null;

/**
 * Get configuration (loads once)
 */
export function getConfig(): AppConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Availability options
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Render zod issues as "path: message; path: message"
 */
function describeIssues(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate raw options and fill in defaults
 */
export function validateAvailabilityConfig(raw: unknown, source = 'configuration'): AvailabilityConfig {
  const result = AvailabilityConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid ${source}: ${describeIssues(result.error)}`,
      ErrorCodes.CONFIGURATION_ERROR,
      { details: { source }, cause: result.error }
    );
  }
  return result.data;
}

/**
 * Read a JSON options file. Returns the raw, unvalidated object.
 */
export function readAvailabilityFile(path: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${path}`, ErrorCodes.CONFIGURATION_ERROR, {
      details: { path },
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Configuration file ${path} is not valid JSON`, ErrorCodes.CONFIGURATION_ERROR, {
      details: { path },
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Configuration file ${path} must contain a JSON object`, ErrorCodes.CONFIGURATION_ERROR, {
      details: { path },
    });
  }
  return Object.fromEntries(Object.entries(parsed));
}

function badValue(name: string, expected: string, raw: string, reason?: string): ConfigurationError {
  const suffix = reason ? `. Error is: ${reason}` : '';
  return new ConfigurationError(
    `Bad type for option ${name}, should be ${expected} but is '${raw}'${suffix}`,
    ErrorCodes.CONFIGURATION_ERROR,
    { details: { option: name, value: raw } }
  );
}

/**
 * Coerce one override string by the option's kind
 */
export function coerceOptionValue(name: AvailabilityOptionName, raw: string): unknown {
  switch (OPTION_KINDS[name]) {
    case 'integer': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isInteger(value)) throw badValue(name, 'an integer', raw);
      return value;
    }
    case 'number': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) throw badValue(name, 'a number', raw);
      return value;
    }
    case 'boolean': {
      const lowered = raw.trim().toLowerCase();
      if (lowered === 'true') return true;
      if (lowered === 'false') return false;
      if (/^-?\d+$/.test(lowered)) return Number(lowered) !== 0;
      throw badValue(name, 'like a boolean', raw);
    }
    case 'nullableString':
      return raw === 'null' ? null : raw;
    case 'string':
      return raw;
    case 'json':
      try {
        return JSON.parse(raw);
      } catch (error) {
        throw badValue(name, 'JSON', raw, error instanceof Error ? error.message : undefined);
      }
  }
}

/**
 * Parse "name=value" into a typed override
 */
export function parseOptionOverride(entry: string): [AvailabilityOptionName, unknown] {
  const separator = entry.indexOf('=');
  if (separator <= 0) {
    throw new ConfigurationError(
      'Any configuration option should be provided as OPTNAME=VALUE',
      ErrorCodes.CONFIGURATION_ERROR,
      { details: { value: entry } }
    );
  }

  const name = entry.slice(0, separator).trim();
  const raw = entry.slice(separator + 1);
  if (!isOptionName(name)) {
    throw unknownOptionError(name);
  }
  return [name, coerceOptionValue(name, raw)];
}

export interface LoadAvailabilityOptions {
  /** Path to a JSON options file */
  file?: string;
  /** "name=value" overrides, applied after the file */
  overrides?: string[];
}

/**
 * Build the availability configuration from defaults, an optional file and overrides
 */
export function loadAvailabilityConfig(options: LoadAvailabilityOptions = {}): AvailabilityConfig {
  const raw: Record<string, unknown> = options.file ? readAvailabilityFile(options.file) : {};

  for (const entry of options.overrides ?? []) {
    const [name, value] = parseOptionOverride(entry);
    raw[name] = value;
  }

  return validateAvailabilityConfig(raw, options.file ?? 'configuration');
}
