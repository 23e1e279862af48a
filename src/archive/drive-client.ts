/**
 * Google Drive API Client
 *
 * Thin factory over googleapis Drive v3. The caller supplies the OAuth2
 * client (see google-auth.ts), so nothing here reads the environment.
 */

import { google } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';

export type DriveClient = ReturnType<typeof google.drive>;

export function createDriveClient(auth: OAuth2Client): DriveClient {
  return google.drive({ version: 'v3', auth });
}
