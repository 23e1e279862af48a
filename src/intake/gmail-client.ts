/**
 * Gmail API Client
 *
 * Thin factory over googleapis Gmail v1. Auth comes from google-auth.ts;
 * the token needs the gmail.readonly scope.
 */

import { google, type gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';

export type GmailClient = gmail_v1.Gmail;

export function createGmailClient(auth: OAuth2Client): GmailClient {
  return google.gmail({ version: 'v1', auth });
}
