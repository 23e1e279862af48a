/**
 * Gmail Bundle Source
 *
 * Lists inbox messages matching the configured search, walks each message's
 * MIME tree for PDF attachments, downloads them and yields one
 * AttachmentBundle per message.
 *
 * - Listing follows nextPageToken until GMAIL_MAX_MESSAGES ids are collected
 * - Nested multipart structures are fully traversed
 * - Small attachments Gmail inlines in the part body are used as-is
 * - Messages without PDF attachments are not yielded
 * - A message that fails to load is logged and skipped; the run continues
 *
 * Helpers take the Gmail client explicitly; the source owns one.
 */

import type { gmail_v1 } from 'googleapis';
import type { IntakeConfig } from '../config.js';
import type { GmailClient } from './gmail-client.js';
import { isPdfAttachment } from './types.js';
import type { Attachment, AttachmentBundle, BundleSource, MessageMeta } from './types.js';

type MessagePart = gmail_v1.Schema$MessagePart;

/** PDF attachment metadata found in a message part */
export interface PdfPart {
  filename: string;
  mimeType: string;
  /** Present when the content must be downloaded separately */
  attachmentId: string | null;
  /** Present when Gmail inlined the content (base64url) */
  inlineData: string | null;
}

// ---------------------------------------------------------------------------
// Listing
// ---------------------------------------------------------------------------

/**
 * Lists message IDs matching `query` in the inbox, following pagination
 * up to `maxMessages`.
 */
export async function listMessageIds(gmail: GmailClient, query: string, maxMessages: number): Promise<string[]> {
  const ids: string[] = [];
  let pageToken: string | undefined;

  do {
    const response = await gmail.users.messages.list({
      userId: 'me',
      q: query,
      labelIds: ['INBOX'],
      maxResults: Math.min(100, maxMessages - ids.length),
      pageToken,
    });

    for (const message of response.data.messages ?? []) {
      if (message.id && ids.length < maxMessages) {
        ids.push(message.id);
      }
    }

    pageToken = response.data.nextPageToken ?? undefined;
  } while (pageToken && ids.length < maxMessages);

  return ids;
}

// ---------------------------------------------------------------------------
// MIME walking
// ---------------------------------------------------------------------------

/**
 * Recursively walks the MIME part tree and collects PDF attachments.
 */
export function extractPdfParts(payload: MessagePart | undefined): PdfPart[] {
  if (!payload) return [];

  const result: PdfPart[] = [];
  const walk = (part: MessagePart): void => {
    const filename = part.filename ?? '';
    const mimeType = part.mimeType ?? 'application/octet-stream';
    const attachmentId = part.body?.attachmentId ?? null;
    const inlineData = part.body?.data ?? null;

    if (filename && (attachmentId || inlineData) && isPdfAttachment(mimeType, filename)) {
      result.push({ filename, mimeType, attachmentId, inlineData: attachmentId ? null : inlineData });
    }

    for (const child of part.parts ?? []) {
      walk(child);
    }
  };

  walk(payload);
  return result;
}

/**
 * Extracts the email address from a From header value.
 * "Jane Doe <jane@example.com>" -> "jane@example.com"
 */
export function parseEmailFromHeader(fromHeader: string): string {
  const match = fromHeader.match(/<([^>]+)>/);
  if (match) return match[1];
  return fromHeader.trim();
}

// ---------------------------------------------------------------------------
// Download
// ---------------------------------------------------------------------------

/**
 * Downloads and decodes a single attachment (Gmail returns base64url).
 */
export async function downloadAttachment(gmail: GmailClient, messageId: string, attachmentId: string): Promise<Buffer> {
  const response = await gmail.users.messages.attachments.get({
    userId: 'me',
    messageId,
    id: attachmentId,
  });

  const data = response.data.data;
  if (!data) {
    throw new Error(`[intake] Attachment ${attachmentId} on message ${messageId} returned no data`);
  }

  return Buffer.from(data, 'base64url');
}

/**
 * Fetches one message and turns it into a bundle of its PDF attachments.
 *
 * @returns The bundle, or null when the message carries no PDFs
 */
export async function fetchMessageBundle(gmail: GmailClient, messageId: string): Promise<AttachmentBundle | null> {
  const response = await gmail.users.messages.get({
    userId: 'me',
    id: messageId,
    format: 'full',
  });

  const payload = response.data.payload ?? undefined;
  const pdfParts = extractPdfParts(payload);
  if (pdfParts.length === 0) return null;

  const headers = payload?.headers ?? [];
  const getHeader = (name: string): string =>
    headers.find((h) => h.name?.toLowerCase() === name.toLowerCase())?.value ?? '';

  const internalDate = Number(response.data.internalDate);
  const message: MessageMeta = {
    messageId: response.data.id ?? messageId,
    subject: getHeader('Subject'),
    from: parseEmailFromHeader(getHeader('From')),
    receivedAt: Number.isFinite(internalDate) && internalDate > 0 ? new Date(internalDate).toISOString() : getHeader('Date'),
  };

  const attachments: Attachment[] = [];
  for (const part of pdfParts) {
    const content = part.attachmentId
      ? await downloadAttachment(gmail, messageId, part.attachmentId)
      : Buffer.from(part.inlineData ?? '', 'base64url');
    attachments.push({ filename: part.filename, contentType: part.mimeType, content });
  }

  return { id: `gmail-${message.messageId}`, attachments, message };
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

export class GmailBundleSource implements BundleSource {
  readonly name = 'gmail';

  constructor(
    private readonly gmail: GmailClient,
    private readonly config: Pick<IntakeConfig, 'gmailQuery' | 'gmailMaxMessages'>,
  ) {}

  async *bundles(): AsyncGenerator<AttachmentBundle> {
    const messageIds = await listMessageIds(this.gmail, this.config.gmailQuery, this.config.gmailMaxMessages);
    console.log('[intake] Gmail messages matched:', { count: messageIds.length });

    for (const messageId of messageIds) {
      let bundle: AttachmentBundle | null;
      try {
        bundle = await fetchMessageBundle(this.gmail, messageId);
      } catch (err) {
        console.error('[intake] Failed to load message, skipping:', {
          messageId,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      if (bundle) {
        yield bundle;
      }
    }
  }
}
