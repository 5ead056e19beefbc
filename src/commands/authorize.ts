/**
 * OAuth authorization command
 */

import type { GoogleProviderConfig } from '../types/index.js';
import {
  createOAuth2Client,
  credentialsToEnvLines,
  exchangeCodeForTokens,
  getAuthUrl,
  getCredentials,
} from '../providers/google/auth.js';
import { AvailabilityError, ErrorCodes } from '../utils/error.js';

/**
 * Without a code, return instructions and the consent URL. With one,
 * exchange it and return the .env lines that store the tokens.
 */
export async function executeAuthorize(
  config: GoogleProviderConfig,
  code?: string
): Promise<string[]> {
  if (!config.clientId || !config.clientSecret) {
    throw new AvailabilityError(
      'GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set to authorize',
      ErrorCodes.AUTH_MISSING
    );
  }

  const oauth2Client = createOAuth2Client({ ...config, credentials: undefined });

  if (!code) {
    return [
      'Open this URL in a browser and grant read access to your calendars:',
      getAuthUrl(oauth2Client),
      '',
      'Then run `availability auth --code <code>` with the code from the redirect.',
    ];
  }

  const stored = getCredentials(await exchangeCodeForTokens(oauth2Client, code));
  if (!stored) {
    throw new AvailabilityError(
      'Google did not return a refresh token; revoke the app grant and authorize again',
      ErrorCodes.AUTH_FAILED
    );
  }

  return ['Add these lines to your .env file:', ...credentialsToEnvLines(stored)];
}
