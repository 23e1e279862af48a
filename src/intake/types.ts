/**
 * Intake Type Definitions
 *
 * - Attachment / AttachmentBundle: what a bundle source hands the pipeline
 * - MessageMeta: diagnostics about the carrying email (never used for paths)
 * - BundleSource: anything that can yield bundles for one run
 */

export interface Attachment {
  filename: string;
  /** Declared MIME type, as sent */
  contentType: string;
  content: Buffer;
}

/** Metadata about the message a bundle came from */
export interface MessageMeta {
  messageId: string;
  subject: string;
  /** Sender address (or "local" for directory bundles) */
  from: string;
  /** ISO timestamp */
  receivedAt: string;
}

/** The PDF attachments of one email: the unit of validation */
export interface AttachmentBundle {
  /** Unique per run, e.g. gmail-{messageId} or dir-{name} */
  id: string;
  attachments: Attachment[];
  message: MessageMeta;
}

export interface BundleSource {
  readonly name: string;
  bundles(): AsyncIterable<AttachmentBundle>;
}

const PDF_MIME_TYPES = new Set(['application/pdf', 'application/x-pdf']);

/**
 * True for attachments that should be treated as PDFs. Some mail clients
 * send PDFs as application/octet-stream, so the extension also counts.
 */
export function isPdfAttachment(contentType: string, filename: string): boolean {
  return PDF_MIME_TYPES.has(contentType.toLowerCase()) || /\.pdf$/i.test(filename.trim());
}
