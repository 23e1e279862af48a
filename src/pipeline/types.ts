/**
 * Pipeline Type Definitions
 *
 * - BundleState: states a bundle passes through, recorded in order
 * - BundleStatus / BundleOutcome: the one terminal record per bundle
 * - Ports the orchestrator depends on (extractor, validator)
 */

import type { ExtractedText } from '../extraction/types.js';
import type { MessageMeta } from '../intake/types.js';
import type { ValidateOptions } from '../validation/validation-agent.js';
import type { ValidationVerdict } from '../validation/types.js';

export type BundleState =
  | 'received'
  | 'text_extracted'
  | 'classified'
  | 'valid'
  | 'invalid'
  | 'skipped'
  | 'path_resolved'
  | 'stored'
  | 'done';

export type BundleStatus = 'saved' | 'rejected' | 'skipped';

export interface BundleOutcome {
  bundleId: string;
  status: BundleStatus;
  /** Human-readable reason or result summary */
  detail: string;
  /** Archive path the bundle resolved to, when it got that far */
  archivePath: string | null;
  /** Stored file locations (saved bundles only) */
  locations: string[];
  /** Visited states, in order, ending with 'done' */
  states: BundleState[];
  message: MessageMeta;
}

export type TextExtractor = (content: Buffer, filename: string) => Promise<ExtractedText>;

/** The part of ValidationAgent the orchestrator calls */
export interface BundleValidator {
  preflight(): Promise<void>;
  validate(documents: ExtractedText[], options?: ValidateOptions): Promise<ValidationVerdict>;
}

export interface PipelineSettings {
  /** Verdicts below this confidence go to manual review (skipped) */
  confidenceThreshold: number;
  /** Bundles processed in parallel */
  concurrency: number;
}

export interface RunSummary {
  total: number;
  saved: number;
  rejected: number;
  skipped: number;
}
