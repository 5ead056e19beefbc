/**
 * Google Calendar OAuth authentication handling
 */

import { google } from 'googleapis';
import type { OAuth2Client, Credentials } from 'google-auth-library';
import type { GoogleProviderConfig, StoredCredentials } from '../../types/index.js';
import { AvailabilityError, ErrorCodes } from '../../utils/error.js';

/**
 * Read-only access is all that free/busy and the calendar list need
 */
export const GOOGLE_CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar.readonly'];

/**
 * Stored credentials in the shape google-auth-library expects
 */
export function toGoogleCredentials(stored: StoredCredentials): Credentials {
  return {
    access_token: stored.accessToken,
    refresh_token: stored.refreshToken,
    expiry_date: stored.tokenExpiry ? Date.parse(stored.tokenExpiry) : undefined,
  };
}

/**
 * OAuth2 client for the configured app, primed with stored tokens when there are any
 */
export function createOAuth2Client(config: GoogleProviderConfig): OAuth2Client {
  const oauth2Client = new google.auth.OAuth2(config.clientId, config.clientSecret, config.redirectUri);
  if (config.credentials) {
    oauth2Client.setCredentials(toGoogleCredentials(config.credentials));
  }
  return oauth2Client;
}

/**
 * Get authorization URL for OAuth flow
 */
export function getAuthUrl(oauth2Client: OAuth2Client): string {
  return oauth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: GOOGLE_CALENDAR_SCOPES,
    prompt: 'consent', // Force consent to get refresh token
  });
}

/**
 * Exchange authorization code for tokens
 */
export async function exchangeCodeForTokens(
  oauth2Client: OAuth2Client,
  code: string
): Promise<Credentials> {
  try {
    const { tokens } = await oauth2Client.getToken(code);
    oauth2Client.setCredentials(tokens);
    return tokens;
  } catch (error) {
    throw new AvailabilityError(
      'Failed to exchange authorization code for tokens',
      ErrorCodes.AUTH_FAILED,
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Check if tokens are expired or will expire soon
 */
export function isTokenExpired(oauth2Client: OAuth2Client, bufferMs: number = 60000): boolean {
  const credentials = oauth2Client.credentials;
  if (!credentials.expiry_date) {
    // No expiry info, refresh to be sure the token works
    return true;
  }
  return credentials.expiry_date <= Date.now() + bufferMs;
}

/**
 * Refresh the access token
 */
export async function refreshAccessToken(oauth2Client: OAuth2Client): Promise<Credentials> {
  try {
    const { credentials } = await oauth2Client.refreshAccessToken();
    oauth2Client.setCredentials(credentials);
    return credentials;
  } catch (error) {
    throw new AvailabilityError(
      'Failed to refresh access token. Please re-authenticate with `availability auth`.',
      ErrorCodes.AUTH_EXPIRED,
      { cause: error instanceof Error ? error : undefined }
    );
  }
}

/**
 * Ensure we have valid credentials, refreshing if necessary
 */
export async function ensureValidCredentials(oauth2Client: OAuth2Client): Promise<void> {
  const credentials = oauth2Client.credentials;

  if (!credentials.access_token) {
    throw new AvailabilityError(
      'No access token available. Run `availability auth` to authenticate.',
      ErrorCodes.AUTH_MISSING
    );
  }

  if (isTokenExpired(oauth2Client)) {
    if (!credentials.refresh_token) {
      throw new AvailabilityError(
        'Access token expired and no refresh token available. Please re-authenticate.',
        ErrorCodes.AUTH_EXPIRED
      );
    }
    await refreshAccessToken(oauth2Client);
  }
}

/**
 * Tokens worth saving, or null when Google sent no refresh token
 */
export function getCredentials(credentials: Credentials): StoredCredentials | null {
  if (!credentials.access_token || !credentials.refresh_token) {
    return null;
  }
  return {
    accessToken: credentials.access_token,
    refreshToken: credentials.refresh_token,
    tokenExpiry: credentials.expiry_date
      ? new Date(credentials.expiry_date).toISOString()
      : undefined,
  };
}

/**
 * Environment lines that store the credentials for later runs
 */
export function credentialsToEnvLines(credentials: StoredCredentials): string[] {
  const lines = [
    `GOOGLE_ACCESS_TOKEN=${credentials.accessToken}`,
    `GOOGLE_REFRESH_TOKEN=${credentials.refreshToken}`,
  ];
  if (credentials.tokenExpiry) {
    lines.push(`GOOGLE_TOKEN_EXPIRY=${credentials.tokenExpiry}`);
  }
  return lines;
}
