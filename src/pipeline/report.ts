/**
 * Run reporting: counts per status and the process exit code.
 */

import type { BundleOutcome, RunSummary } from './types.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_NEEDS_REVIEW = 2;

export function summarizeOutcomes(outcomes: BundleOutcome[]): RunSummary {
  return {
    total: outcomes.length,
    saved: outcomes.filter((o) => o.status === 'saved').length,
    rejected: outcomes.filter((o) => o.status === 'rejected').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
  };
}

/** 0 when every bundle reached saved or rejected, 2 when any was skipped */
export function exitCodeFor(summary: RunSummary): number {
  return summary.skipped > 0 ? EXIT_NEEDS_REVIEW : EXIT_OK;
}

export function formatSummary(summary: RunSummary): string {
  return (
    `${summary.total} bundle(s): ${summary.saved} saved, ` +
    `${summary.rejected} rejected, ${summary.skipped} skipped`
  );
}
