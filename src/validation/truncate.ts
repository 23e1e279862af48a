/**
 * Prompt assembly and truncation.
 *
 * Policy: the character budget is split evenly across the bundle's
 * documents. A document whose text exceeds its share keeps its head
 * (ceil(share / 2) chars) and tail (floor(share / 2) chars) around an
 * omission marker. Same input, same output.
 */

import type { ExtractedText } from '../extraction/types.js';

export const PAGE_SEPARATOR = '\n\n';

export function omissionMarker(omitted: number): string {
  return `\n[... ${omitted} characters omitted ...]\n`;
}

export function documentHeader(index: number, total: number, filename: string): string {
  return `===== DOCUMENT ${index + 1} of ${total}: ${filename} =====`;
}

/** Keeps head and tail of `text` so that at most `budget` original characters survive */
export function truncateHeadTail(text: string, budget: number): string {
  if (text.length <= budget) return text;

  const headLength = Math.ceil(budget / 2);
  const tailLength = Math.floor(budget / 2);
  const omitted = text.length - headLength - tailLength;
  const tail = tailLength > 0 ? text.slice(text.length - tailLength) : '';

  return text.slice(0, headLength) + omissionMarker(omitted) + tail;
}

/**
 * Concatenates the documents of a bundle in attachment order, each under a
 * boundary header, truncating per document to fit `maxChars`.
 */
export function buildDocumentText(documents: ExtractedText[], maxChars: number): string {
  if (documents.length === 0) return '';

  const share = Math.floor(maxChars / documents.length);

  return documents
    .map((doc, index) => {
      const body = truncateHeadTail(doc.pages.join(PAGE_SEPARATOR).trim(), share);
      return `${documentHeader(index, documents.length, doc.filename)}\n${body}`;
    })
    .join('\n\n');
}
