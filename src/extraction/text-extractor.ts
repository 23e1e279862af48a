/**
 * Text Extractor
 *
 * Turns raw PDF bytes into ordered per-page text.
 *
 * - pdf-lib opens the document first: it rejects bytes without a PDF
 *   structure and tells us whether the file is encrypted.
 * - pdf.js (legacy Node build) then reads the text layer page by page.
 *
 * Scanned pages without a text layer come back as '' rather than an error;
 * the pipeline decides what an all-empty document means.
 *
 * Consumers: pipeline/orchestrator.ts
 * Errors: ExtractionError (EMPTY | UNPARSEABLE | ENCRYPTED)
 */

import { PDFDocument } from 'pdf-lib';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { ExtractionError } from '../errors.js';
import type { ExtractedText, PdfPage } from './types.js';

// ---------------------------------------------------------------------------
// Page rendering
// ---------------------------------------------------------------------------

/**
 * Renders one page's text items. Items sharing a baseline are concatenated;
 * a baseline change starts a new line. Marked-content markers and empty
 * end-of-line items are skipped.
 */
export async function renderPageText(page: PdfPage): Promise<string> {
  const content = await page.getTextContent();

  let text = '';
  let lastY: number | undefined;

  for (const item of content.items) {
    if (!('str' in item) || item.str === '') continue;

    const y = item.transform[5];
    if (lastY === undefined || y === lastY) {
      text += item.str;
    } else {
      text += '\n' + item.str;
    }
    lastY = y;
  }

  return text
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

async function inspectStructure(content: Buffer, filename: string): Promise<number> {
  let doc: PDFDocument;
  try {
    doc = await PDFDocument.load(new Uint8Array(content), {
      ignoreEncryption: true,
      updateMetadata: false,
    });
  } catch (err) {
    throw new ExtractionError(
      'UNPARSEABLE',
      filename,
      `Attachment is not a parseable PDF: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  if (doc.isEncrypted) {
    throw new ExtractionError('ENCRYPTED', filename, 'Attachment is an encrypted PDF');
  }

  return doc.getPageCount();
}

/**
 * Reads every page's text with pdf.js. A page whose text layer fails to
 * load is logged and kept as ''.
 */
async function readPages(content: Buffer, filename: string): Promise<string[]> {
  // pdf.js transfers the array it receives; content must stay usable for upload
  const loadingTask = getDocument({
    data: new Uint8Array(content),
    isEvalSupported: false,
    disableFontFace: true,
    verbosity: 0,
  });

  try {
    const doc = await loadingTask.promise;
    const pages: string[] = [];

    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      try {
        pages.push(await renderPageText(page));
      } catch (err) {
        console.warn('[extraction] Page text unavailable, treating as empty:', {
          filename,
          page: pageNumber,
          error: err instanceof Error ? err.message : String(err),
        });
        pages.push('');
      } finally {
        page.cleanup();
      }
    }

    return pages;
  } finally {
    await loadingTask.destroy();
  }
}

/**
 * Extracts ordered page text from a PDF.
 *
 * @param content - Raw attachment bytes
 * @param filename - Attachment filename (carried through for diagnostics and prompts)
 * @throws ExtractionError for empty, corrupt or encrypted input
 */
export async function extractText(content: Buffer, filename: string): Promise<ExtractedText> {
  if (content.length === 0) {
    throw new ExtractionError('EMPTY', filename, 'Attachment is empty (0 bytes)');
  }

  const structuralPageCount = await inspectStructure(content, filename);

  let rendered: string[];
  try {
    rendered = await readPages(content, filename);
  } catch (err) {
    throw new ExtractionError(
      'UNPARSEABLE',
      filename,
      `Failed to read PDF text: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const pageCount = Math.max(structuralPageCount, rendered.length);
  const pages = Array.from({ length: pageCount }, (_, i) => rendered[i] ?? '');

  console.log('[extraction] Extracted text:', {
    filename,
    pages: pages.length,
    emptyPages: pages.filter((page) => page === '').length,
  });

  return { filename, pages };
}

/** True when no page of any document carries text */
export function isBlank(documents: ExtractedText[]): boolean {
  return documents.every((doc) => doc.pages.every((page) => page.trim() === ''));
}
