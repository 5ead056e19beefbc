/**
 * Provider configuration types
 */

/**
 * Stored OAuth tokens
 */
export interface StoredCredentials {
  accessToken: string;
  refreshToken: string;
  tokenExpiry?: string;
}

/**
 * Google Calendar provider configuration
 */
export interface GoogleProviderConfig {
  id: string;
  name: string;
  /** OAuth client ID */
  clientId?: string;
  /** OAuth client secret */
  clientSecret?: string;
  /** OAuth redirect URI */
  redirectUri?: string;
  /** Pre-authorized credentials */
  credentials?: StoredCredentials;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}
