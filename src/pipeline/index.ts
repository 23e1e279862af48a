// ============================================================================
// Pipeline Module — Barrel Export
// ============================================================================

export type {
  BundleOutcome,
  BundleState,
  BundleStatus,
  BundleValidator,
  PipelineSettings,
  RunSummary,
  TextExtractor,
} from './types.js';

export { PipelineOrchestrator, archiveFilenames } from './orchestrator.js';
export type { PipelineDependencies } from './orchestrator.js';
export { runPool } from './pool.js';
export { summarizeOutcomes, exitCodeFor, formatSummary, EXIT_OK, EXIT_FATAL, EXIT_NEEDS_REVIEW } from './report.js';
