/**
 * Validation Agent — Google Gemini with Structured Output
 *
 * Sends the text of one bundle's attachments to Gemini and returns a
 * ValidationVerdict: is this a signed hospitality form plus its BEO, and if
 * so, which event is it (BEO number, event date, client organization).
 *
 * Features:
 * - JSON schema-constrained output, re-checked with Zod into a tagged result
 * - Schema failures are ClassificationErrors (retried), never "invalid"
 * - Bounded exponential backoff across attempts
 * - Deterministic head/tail truncation for oversized bundles
 * - No document text in logs
 *
 * Consumers: pipeline/orchestrator.ts
 */

import {
  GoogleGenerativeAI,
  SchemaType,
  type GenerativeModel,
  type ResponseSchema,
} from '@google/generative-ai';
import type { ValidationConfig } from '../config.js';
import { ClassificationError, ConfigError } from '../errors.js';
import type { ExtractedText } from '../extraction/types.js';
import { withRetry } from '../utils/retry.js';
import { parseEventDate } from './event-date.js';
import { buildDocumentText } from './truncate.js';
import { BeoResponseSchema } from './types.js';
import type { ParseResult, StructuredFields, ValidationVerdict } from './types.js';

// ---------------------------------------------------------------------------
// Gemini Response Schema (matches BeoResponseSchema)
// ---------------------------------------------------------------------------

const beoResponseSchema: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    valid: {
      type: SchemaType.BOOLEAN,
      description: 'True only if a signed Hospitality form and a matching BEO are both present',
    },
    confidence: {
      type: SchemaType.NUMBER,
      description: 'Confidence score between 0.0 and 1.0',
    },
    documentNumber: {
      type: SchemaType.STRING,
      description: 'BEO number, digits only',
      nullable: true,
    },
    eventDate: {
      type: SchemaType.STRING,
      description: 'Event date in YYYY-MM-DD format',
      nullable: true,
    },
    clientName: {
      type: SchemaType.STRING,
      description: 'Organization name from the Client/Organization field',
      nullable: true,
    },
    reason: {
      type: SchemaType.STRING,
      description: 'One short sentence explaining the decision',
      nullable: true,
    },
  },
  required: ['valid', 'confidence', 'documentNumber', 'eventDate', 'clientName'],
};

// ---------------------------------------------------------------------------
// Prompt
// ---------------------------------------------------------------------------

export function validationPrompt(documentText: string): string {
  return (
    'Below is the text extracted from the PDF attachments of one email.\n\n' +
    '---\n\n' +
    `${documentText}\n\n` +
    '---\n\n' +
    'Based on these documents only, decide whether they form a valid BEO bundle ' +
    '(signed Hospitality form plus matching BEO) and, if so, extract the BEO number, ' +
    'event date and client organization. Return the structured response.'
  );
}

// ---------------------------------------------------------------------------
// Response parsing
// ---------------------------------------------------------------------------

/** All-digit BEO numbers are zero-padded to five digits ("123" -> "00123") */
export function normalizeDocumentNumber(raw: string): string {
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? trimmed.padStart(5, '0') : trimmed;
}

function mismatch(message: string): ParseResult {
  return { ok: false, error: new ClassificationError('SCHEMA_MISMATCH', message) };
}

/**
 * Checks one raw response text against the verdict schema.
 * Never throws: failures come back as `{ ok: false, error }`.
 */
export function parseVerdictResponse(responseText: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(responseText);
  } catch (err) {
    return {
      ok: false,
      error: new ClassificationError('MALFORMED_RESPONSE', 'Gemini response is not valid JSON', {
        cause: err,
      }),
    };
  }

  const checked = BeoResponseSchema.safeParse(raw);
  if (!checked.success) {
    const paths = checked.error.issues.map((issue) => issue.path.join('.') || '(root)');
    return mismatch(`Gemini response failed schema validation at: ${paths.join(', ')}`);
  }

  const response = checked.data;
  const reason = response.reason?.trim() || undefined;

  if (!response.valid) {
    return { ok: true, verdict: { valid: false, confidence: response.confidence, reason } };
  }

  const documentNumber = normalizeDocumentNumber(response.documentNumber ?? '');
  const clientName = (response.clientName ?? '').trim();
  const rawDate = (response.eventDate ?? '').trim();

  const missing = [
    documentNumber ? null : 'documentNumber',
    rawDate ? null : 'eventDate',
    clientName ? null : 'clientName',
  ].filter((field): field is string => field !== null);

  if (missing.length > 0) {
    return mismatch(`Gemini marked the bundle valid without: ${missing.join(', ')}`);
  }

  const eventDate = parseEventDate(rawDate);
  if (!eventDate) {
    return mismatch('Gemini returned an event date that is not a calendar date');
  }

  const fields: StructuredFields = { eventDate, documentNumber, clientName };
  return { ok: true, verdict: { valid: true, confidence: response.confidence, fields, reason } };
}

// ---------------------------------------------------------------------------
// Transport error mapping
// ---------------------------------------------------------------------------

function statusOf(err: unknown): number | null {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return null;
}

/** Wraps anything the SDK throws into a ClassificationError */
export function toClassificationError(err: unknown): ClassificationError {
  if (err instanceof ClassificationError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = statusOf(err);

  if (status === 429) {
    return new ClassificationError('RATE_LIMITED', `Gemini rate limit (429): ${message}`, { cause: err });
  }
  if (
    (err instanceof Error && err.name === 'AbortError') ||
    /abort|timed? ?out/i.test(message)
  ) {
    return new ClassificationError('TIMEOUT', `Gemini request timed out: ${message}`, { cause: err });
  }
  return new ClassificationError(
    'REQUEST_FAILED',
    `Gemini request failed${status ? ` (${status})` : ''}: ${message}`,
    { cause: err },
  );
}

// ---------------------------------------------------------------------------
// Agent
// ---------------------------------------------------------------------------

export interface ValidateOptions {
  /** Bundle id for log correlation */
  bundleId?: string;
}

export class ValidationAgent {
  private readonly model: GenerativeModel;

  constructor(private readonly config: ValidationConfig) {
    const genAI = new GoogleGenerativeAI(config.geminiApiKey);
    this.model = genAI.getGenerativeModel(
      {
        model: config.model,
        systemInstruction: config.instructions,
        generationConfig: {
          responseMimeType: 'application/json',
          responseSchema: beoResponseSchema,
          temperature: 0,
        },
      },
      { timeout: config.requestTimeoutMs },
    );
  }

  /**
   * Confirms the model is reachable with the configured key.
   *
   * @throws ConfigError when the service rejects or cannot be reached
   */
  async preflight(): Promise<void> {
    try {
      await this.model.countTokens('preflight');
    } catch (err) {
      throw new ConfigError(
        'AI_UNREACHABLE',
        `Gemini model "${this.config.model}" is not reachable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }

  /** One request/response round trip, no retries */
  async classifyOnce(documentText: string): Promise<ValidationVerdict> {
    let responseText: string;
    try {
      const result = await this.model.generateContent(validationPrompt(documentText));
      responseText = result.response.text();
    } catch (err) {
      throw toClassificationError(err);
    }

    const parsed = parseVerdictResponse(responseText);
    if (!parsed.ok) {
      throw parsed.error;
    }
    return parsed.verdict;
  }

  /**
   * Classifies a bundle's documents (in attachment order).
   *
   * @throws ClassificationError after the configured number of attempts
   */
  async validate(documents: ExtractedText[], options: ValidateOptions = {}): Promise<ValidationVerdict> {
    const documentText = buildDocumentText(documents, this.config.maxInputChars);

    const verdict = await withRetry(() => this.classifyOnce(documentText), {
      maxAttempts: this.config.retry.maxAttempts,
      baseDelayMs: this.config.retry.baseDelayMs,
      isRetryable: (err) => err instanceof ClassificationError,
      logPrefix: '[validation]',
    });

    console.log('[validation] Verdict:', {
      bundleId: options.bundleId,
      valid: verdict.valid,
      confidence: verdict.confidence,
    });

    return verdict;
  }
}
