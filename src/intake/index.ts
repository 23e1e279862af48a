// ============================================================================
// Intake Module — Barrel Export
// ============================================================================
//
// Where bundles come from:
// - Gmail: inbox search, MIME walking, attachment download
// - Directory: one bundle per subdirectory or loose PDF

export type { Attachment, AttachmentBundle, BundleSource, MessageMeta } from './types.js';
export { isPdfAttachment } from './types.js';

export { createGmailClient } from './gmail-client.js';
export type { GmailClient } from './gmail-client.js';

export {
  GmailBundleSource,
  listMessageIds,
  extractPdfParts,
  fetchMessageBundle,
  downloadAttachment,
  parseEmailFromHeader,
} from './gmail-source.js';
export type { PdfPart } from './gmail-source.js';

export { DirectoryBundleSource } from './directory-source.js';
