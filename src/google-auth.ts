/**
 * Google OAuth2 client shared by the Drive archive and the Gmail source.
 *
 * Supports two credential shapes:
 * 1. GOOGLE_ACCESS_TOKEN: an already-valid access token obtained elsewhere
 * 2. GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN:
 *    google-auth-library exchanges the refresh token on demand
 *
 * The access token wins when both are set. Acquiring either credential
 * (consent screen, device code) happens outside this program.
 */

import { OAuth2Client } from 'google-auth-library';
import type { GoogleCredentials } from './config.js';
import { ConfigError } from './errors.js';

export function createGoogleAuth(credentials: GoogleCredentials): OAuth2Client {
  if (credentials.accessToken) {
    const client = new OAuth2Client();
    client.setCredentials({ access_token: credentials.accessToken });
    return client;
  }

  const { clientId, clientSecret, refreshToken } = credentials;
  if (!clientId || !clientSecret || !refreshToken) {
    throw new ConfigError(
      'MISSING_CREDENTIALS',
      'Google credentials incomplete. Set GOOGLE_ACCESS_TOKEN, or GOOGLE_CLIENT_ID, ' +
        'GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN.',
    );
  }

  const client = new OAuth2Client(clientId, clientSecret);
  client.setCredentials({ refresh_token: refreshToken });
  return client;
}
