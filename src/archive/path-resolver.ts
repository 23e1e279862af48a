/**
 * Path Resolver
 *
 * Maps a valid BEO's fields to its archive folder:
 *   "2026/1/1/12345 - Acme Corp"
 *
 * Year, month and day are unpadded. Pure functions, no I/O.
 */

import type { StructuredFields } from '../validation/types.js';
import type { ArchivePath } from './types.js';

// ---------------------------------------------------------------------------
// Sanitization
// ---------------------------------------------------------------------------

const FALLBACK_SEGMENT = 'Unknown';
const FALLBACK_FILENAME = 'document.pdf';

/**
 * Makes a string safe as one folder or file name on disk and in Drive.
 *
 * Replaces: / \ : * ? " < > | and control characters (with "_")
 * Collapses whitespace runs, trims whitespace and trailing dots.
 * Idempotent: sanitizeSegment(sanitizeSegment(x)) === sanitizeSegment(x).
 */
export function sanitizeSegment(value: string): string {
  const cleaned = value
    .replace(/\s+/g, ' ')
    .replace(/[<>:"/\\|?*\u0000-\u001f\u007f]/g, '_')
    .trim()
    .replace(/[.\s]+$/, '');

  return cleaned || FALLBACK_SEGMENT;
}

/**
 * Sanitizes an attachment filename and guarantees a .pdf extension.
 * "Acme/Hospitality" -> "Acme_Hospitality.pdf"
 */
export function sanitizeFilename(filename: string): string {
  const trimmed = filename.trim();
  if (!trimmed) return FALLBACK_FILENAME;

  const safe = sanitizeSegment(trimmed);
  return /\.pdf$/i.test(safe) ? safe : `${safe}.pdf`;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/** Name of the per-event folder: "<BEO number> - <client>" */
export function eventFolderName(documentNumber: string, clientName: string): string {
  return sanitizeSegment(`${sanitizeSegment(documentNumber)} - ${sanitizeSegment(clientName)}`);
}

/**
 * Resolves the archive path for a BEO.
 * Same fields always yield byte-identical segments.
 */
export function resolveArchivePath(fields: StructuredFields): ArchivePath {
  const { year, month, day } = fields.eventDate;
  return [
    String(year),
    String(month),
    String(day),
    eventFolderName(fields.documentNumber, fields.clientName),
  ];
}

/** Joins segments for display and logs: "2026/1/1/12345 - Acme Corp" */
export function formatArchivePath(segments: readonly string[]): string {
  return segments.join('/');
}
