// ============================================================================
// Validation Module — Barrel Export
// ============================================================================
//
// Gemini-backed bundle classification with structured output.

export type {
  BeoResponse,
  CalendarDate,
  StructuredFields,
  ValidationVerdict,
  ParseResult,
} from './types.js';
export { BeoResponseSchema } from './types.js';

export { ValidationAgent, parseVerdictResponse, normalizeDocumentNumber } from './validation-agent.js';
export type { ValidateOptions } from './validation-agent.js';
export { buildDocumentText, truncateHeadTail } from './truncate.js';
export { parseEventDate } from './event-date.js';
export { DEFAULT_INSTRUCTIONS } from './instructions.js';
