/**
 * Application Entry Point
 *
 * One archiving run:
 * 1. Load and validate configuration (ConfigError -> exit 1)
 * 2. Build the validation agent, archive store and bundle source
 * 3. Run the pipeline (preflight first, then bounded-concurrency bundles)
 * 4. Log one line per bundle outcome and a summary
 *
 * Exit codes: 0 all bundles saved or rejected, 2 some bundles skipped
 * (need manual review), 1 configuration or fatal error.
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { createArchiveStore } from './archive/index.js';
import { loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { ConfigError, errorMessage } from './errors.js';
import { extractText } from './extraction/text-extractor.js';
import { createGoogleAuth } from './google-auth.js';
import { DirectoryBundleSource, GmailBundleSource, createGmailClient } from './intake/index.js';
import type { BundleSource } from './intake/index.js';
import {
  EXIT_FATAL,
  PipelineOrchestrator,
  exitCodeFor,
  formatSummary,
  summarizeOutcomes,
} from './pipeline/index.js';
import { ValidationAgent } from './validation/index.js';

function createBundleSource(config: AppConfig): BundleSource {
  if (config.intake.source === 'gmail') {
    const gmail = createGmailClient(createGoogleAuth(config.google));
    return new GmailBundleSource(gmail, config.intake);
  }
  return new DirectoryBundleSource(config.intake.directory);
}

async function main(): Promise<number> {
  const config = loadConfig();

  console.log('[startup] BEO archiver starting...');
  console.log('[startup] Environment:', config.isDev ? 'development' : 'production');
  console.log('[startup] Settings:', {
    intake: config.intake.source,
    archive: config.archive.backend,
    model: config.validation.model,
    concurrency: config.pipeline.concurrency,
  });

  const source = createBundleSource(config);
  const orchestrator = new PipelineOrchestrator({
    config: {
      confidenceThreshold: config.validation.confidenceThreshold,
      concurrency: config.pipeline.concurrency,
    },
    extractor: extractText,
    agent: new ValidationAgent(config.validation),
    store: createArchiveStore(config),
  });

  const outcomes = await orchestrator.run(source.bundles());
  const summary = summarizeOutcomes(outcomes);

  for (const outcome of outcomes) {
    const where = outcome.status === 'saved' ? ` -> ${outcome.archivePath}` : '';
    console.log(`[summary] ${outcome.bundleId}: ${outcome.status}${where} (${outcome.detail})`);
  }
  console.log(`[summary] ${formatSummary(summary)}`);

  return exitCodeFor(summary);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof ConfigError) {
      console.error(`[startup] Configuration error (${err.code}):`, err.message);
    } else {
      console.error('[startup] Fatal error:', errorMessage(err));
    }
    process.exitCode = EXIT_FATAL;
  });
