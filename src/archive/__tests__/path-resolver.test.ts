/**
 * Tests for Path Resolver
 *
 * Tests cover:
 * - resolveArchivePath: unpadded date segments, event folder composition
 * - sanitizeSegment: forbidden characters, whitespace, trailing dots, idempotence
 * - sanitizeFilename: extension handling, empty names
 * - Determinism: same fields -> same segments
 */

import { describe, it, expect } from 'vitest';
import {
  eventFolderName,
  formatArchivePath,
  resolveArchivePath,
  sanitizeFilename,
  sanitizeSegment,
} from '../path-resolver.js';
import type { StructuredFields } from '../../validation/types.js';

function fields(overrides: Partial<StructuredFields> = {}): StructuredFields {
  return {
    eventDate: { year: 2026, month: 1, day: 1 },
    documentNumber: '12345',
    clientName: 'Acme Corp',
    ...overrides,
  };
}

describe('resolveArchivePath', () => {
  it('builds [year, month, day, "<number> - <client>"] without zero-padding', () => {
    expect(resolveArchivePath(fields())).toEqual(['2026', '1', '1', '12345 - Acme Corp']);
  });

  it('keeps two-digit months and days as-is', () => {
    const path = resolveArchivePath(fields({ eventDate: { year: 2025, month: 12, day: 31 } }));
    expect(path).toEqual(['2025', '12', '31', '12345 - Acme Corp']);
  });

  it('sanitizes the client name inside the event folder', () => {
    const path = resolveArchivePath(fields({ clientName: 'Acme/Corp' }));
    expect(path[3]).toBe('12345 - Acme_Corp');
  });

  it('turns a line break inside the client name into a space', () => {
    const path = resolveArchivePath(fields({ clientName: 'Acme\nCorp\r\n' }));
    expect(path[3]).toBe('12345 - Acme Corp');
  });

  it('returns identical segments for identical fields', () => {
    const a = resolveArchivePath(fields({ clientName: '  Smith & Sons: Annual Gala  ' }));
    const b = resolveArchivePath(fields({ clientName: '  Smith & Sons: Annual Gala  ' }));
    expect(a).toEqual(b);
    expect(a[3]).toBe('12345 - Smith & Sons_ Annual Gala');
  });

  it('formats segments for display', () => {
    expect(formatArchivePath(resolveArchivePath(fields()))).toBe('2026/1/1/12345 - Acme Corp');
  });
});

describe('sanitizeSegment', () => {
  it('replaces every forbidden character with "_"', () => {
    expect(sanitizeSegment('a<b>c:d"e/f\\g|h?i*j')).toBe('a_b_c_d_e_f_g_h_i_j');
  });

  it('replaces control characters', () => {
    expect(sanitizeSegment('Acme\u0001Corp')).toBe('Acme_Corp');
  });

  it('collapses whitespace runs and trims', () => {
    expect(sanitizeSegment('  Acme \t\n  Corp  ')).toBe('Acme Corp');
  });

  it('strips trailing dots', () => {
    expect(sanitizeSegment('Acme Corp...')).toBe('Acme Corp');
    expect(sanitizeSegment('Acme Inc. . .')).toBe('Acme Inc');
  });

  it('falls back to "Unknown" for an empty result', () => {
    expect(sanitizeSegment('')).toBe('Unknown');
    expect(sanitizeSegment('   ')).toBe('Unknown');
    expect(sanitizeSegment('...')).toBe('Unknown');
  });

  it('is idempotent', () => {
    const inputs = ['Acme/Corp', '  a  b  ', 'x?.', 'Hotel "Grand" <Ballroom>', '...', 'Zoë Café'];
    for (const input of inputs) {
      const once = sanitizeSegment(input);
      expect(sanitizeSegment(once)).toBe(once);
    }
  });
});

describe('eventFolderName', () => {
  it('sanitizes each part before joining', () => {
    expect(eventFolderName('12/345', 'Acme')).toBe('12_345 - Acme');
  });

  it('uses "Unknown" for a blank part', () => {
    expect(eventFolderName('00042', '  ')).toBe('00042 - Unknown');
  });
});

describe('sanitizeFilename', () => {
  it('keeps a clean .pdf name unchanged', () => {
    expect(sanitizeFilename('BEO 12345.pdf')).toBe('BEO 12345.pdf');
  });

  it('adds a .pdf extension when missing', () => {
    expect(sanitizeFilename('Acme/Hospitality')).toBe('Acme_Hospitality.pdf');
  });

  it('accepts an upper-case extension', () => {
    expect(sanitizeFilename('SCAN.PDF')).toBe('SCAN.PDF');
  });

  it('falls back to document.pdf for an empty name', () => {
    expect(sanitizeFilename('   ')).toBe('document.pdf');
  });
});
