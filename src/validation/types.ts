/**
 * Validation Type Definitions
 *
 * - BeoResponseSchema: Zod schema for Gemini's structured output
 * - StructuredFields / CalendarDate: the identifying fields of a valid BEO
 * - ValidationVerdict: the agent's answer for one bundle
 * - ParseResult: tagged result of checking one raw response
 */

import { z } from 'zod';
import type { ClassificationError } from '../errors.js';

// ---------------------------------------------------------------------------
// Gemini response (Zod schema for structured output)
// ---------------------------------------------------------------------------

/** Zod schema defining the structured output from Gemini */
export const BeoResponseSchema = z.object({
  valid: z.boolean().describe('Signed hospitality form and matching BEO both present'),
  confidence: z.number().min(0).max(1).describe('Decision confidence 0.0-1.0'),
  documentNumber: z.string().nullable().describe('BEO number, digits only'),
  eventDate: z.string().nullable().describe('Event date, YYYY-MM-DD'),
  clientName: z.string().nullable().describe('Organization from the Client/Organization field'),
  reason: z.string().nullable().optional().describe('One-sentence explanation'),
});

/** Raw structured response from Gemini, before field checks */
export type BeoResponse = z.infer<typeof BeoResponseSchema>;

// ---------------------------------------------------------------------------
// Verdict
// ---------------------------------------------------------------------------

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
}

/** Identifying fields of a valid BEO. All three are non-empty. */
export interface StructuredFields {
  eventDate: CalendarDate;
  documentNumber: string;
  clientName: string;
}

export interface ValidationVerdict {
  valid: boolean;
  confidence: number;
  /** Present only when valid is true */
  fields?: StructuredFields;
  reason?: string;
}

/** Outcome of checking one raw response against the schema */
export type ParseResult =
  | { ok: true; verdict: ValidationVerdict }
  | { ok: false; error: ClassificationError };
