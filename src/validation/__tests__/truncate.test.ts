/**
 * Tests for prompt assembly and head/tail truncation
 */

import { describe, it, expect } from 'vitest';
import { buildDocumentText, documentHeader, omissionMarker, truncateHeadTail } from '../truncate.js';

describe('truncateHeadTail', () => {
  it('returns text within budget unchanged', () => {
    expect(truncateHeadTail('abcdef', 6)).toBe('abcdef');
  });

  it('keeps ceil(budget/2) head and floor(budget/2) tail characters', () => {
    expect(truncateHeadTail('abcdefghij', 4)).toBe('ab\n[... 6 characters omitted ...]\nij');
    expect(truncateHeadTail('abcdefghij', 5)).toBe('abc\n[... 5 characters omitted ...]\nij');
  });

  it('keeps only the head when the budget is one character', () => {
    expect(truncateHeadTail('abcdefghij', 1)).toBe('a' + omissionMarker(9));
  });

  it('is deterministic', () => {
    const text = 'x'.repeat(500) + 'y'.repeat(500);
    expect(truncateHeadTail(text, 100)).toBe(truncateHeadTail(text, 100));
  });
});

describe('buildDocumentText', () => {
  const documents = [
    { filename: 'hospitality.pdf', pages: ['Page one', 'Page two'] },
    { filename: 'beo.pdf', pages: ['BEO 12345'] },
  ];

  it('puts each document under a boundary header in attachment order', () => {
    expect(buildDocumentText(documents, 10_000)).toBe(
      '===== DOCUMENT 1 of 2: hospitality.pdf =====\n' +
        'Page one\n\nPage two\n\n' +
        '===== DOCUMENT 2 of 2: beo.pdf =====\n' +
        'BEO 12345',
    );
  });

  it('splits the budget evenly across documents', () => {
    const text = buildDocumentText(documents, 10);
    // share = 5: 'Page one\n\nPage two' (18 chars) -> 'Pag' + marker + 'wo'
    expect(text).toBe(
      documentHeader(0, 2, 'hospitality.pdf') +
        '\nPag' +
        omissionMarker(13) +
        'wo\n\n' +
        documentHeader(1, 2, 'beo.pdf') +
        '\nBEO' +
        omissionMarker(4) +
        '45',
    );
  });

  it('returns an empty string for no documents', () => {
    expect(buildDocumentText([], 1000)).toBe('');
  });
});
