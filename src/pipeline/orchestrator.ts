/**
 * Pipeline Orchestrator — one run over a stream of bundles
 *
 * Per bundle:
 * 1. Keep the PDF attachments (none -> skipped)
 * 2. Extract text from each (any failure -> skipped)
 * 3. No text in any attachment -> skipped, no AI call
 * 4. Validate with the AI agent (retries exhausted -> skipped)
 * 5. Below the confidence threshold -> skipped (manual review)
 * 6. valid = false -> rejected
 * 7. Resolve the archive path, ensure the folder, write each PDF if absent
 *    (storage failure -> skipped)
 *
 * Errors are caught per bundle, so one bundle never aborts its siblings.
 * Only the preflight checks, run before any bundle work, can fail the run
 * (ConfigError).
 */

import { formatArchivePath, resolveArchivePath, sanitizeFilename } from '../archive/path-resolver.js';
import type { ArchiveStore, WriteResult } from '../archive/types.js';
import { ClassificationError, ExtractionError, StorageError, errorMessage } from '../errors.js';
import { isBlank } from '../extraction/text-extractor.js';
import type { ExtractedText } from '../extraction/types.js';
import { isPdfAttachment } from '../intake/types.js';
import type { Attachment, AttachmentBundle } from '../intake/types.js';
import type { ValidationVerdict } from '../validation/types.js';
import { runPool } from './pool.js';
import type {
  BundleOutcome,
  BundleState,
  BundleStatus,
  BundleValidator,
  PipelineSettings,
  TextExtractor,
} from './types.js';

export interface PipelineDependencies {
  config: PipelineSettings;
  extractor: TextExtractor;
  agent: BundleValidator;
  store: ArchiveStore;
}

/**
 * Archive filenames for a bundle's attachments, in order. Repeated names
 * get a " (n)" suffix so two attachments never collapse into one record.
 */
export function archiveFilenames(attachments: Attachment[]): string[] {
  const seen = new Map<string, number>();

  return attachments.map((attachment) => {
    const name = sanitizeFilename(attachment.filename);
    const key = name.toLowerCase();
    const count = (seen.get(key) ?? 0) + 1;
    seen.set(key, count);

    return count === 1 ? name : name.replace(/\.pdf$/i, ` (${count}).pdf`);
  });
}

function describeStorageFailure(err: unknown): string {
  if (err instanceof StorageError) {
    return `storage failed${err.transient ? ' after retries' : ''}: ${err.message}`;
  }
  return `storage failed: ${errorMessage(err)}`;
}

export class PipelineOrchestrator {
  private readonly config: PipelineSettings;
  private readonly extractor: TextExtractor;
  private readonly agent: BundleValidator;
  private readonly store: ArchiveStore;

  constructor(deps: PipelineDependencies) {
    this.config = deps.config;
    this.extractor = deps.extractor;
    this.agent = deps.agent;
    this.store = deps.store;
  }

  /**
   * Processes every bundle and resolves with one outcome per bundle, in
   * completion order.
   *
   * @param onOutcome - Called as each bundle finishes
   * @throws ConfigError from preflight, before any bundle is read
   */
  async run(
    bundles: Iterable<AttachmentBundle> | AsyncIterable<AttachmentBundle>,
    onOutcome?: (outcome: BundleOutcome) => void,
  ): Promise<BundleOutcome[]> {
    await this.agent.preflight();
    await this.store.preflight();
    console.log('[pipeline] Preflight passed', {
      archive: this.store.kind,
      concurrency: this.config.concurrency,
    });

    return runPool(bundles, this.config.concurrency, async (bundle) => {
      const outcome = await this.processBundle(bundle);

      const log = outcome.status === 'skipped' ? console.warn : console.log;
      log('[pipeline] Bundle finished:', {
        bundleId: outcome.bundleId,
        status: outcome.status,
        detail: outcome.detail,
        archivePath: outcome.archivePath,
      });

      if (onOutcome) {
        try {
          onOutcome(outcome);
        } catch (err) {
          console.error('[pipeline] Outcome callback failed:', {
            bundleId: outcome.bundleId,
            error: errorMessage(err),
          });
        }
      }
      return outcome;
    });
  }

  /**
   * Drives one bundle to a terminal outcome. Never throws.
   */
  async processBundle(bundle: AttachmentBundle): Promise<BundleOutcome> {
    const states: BundleState[] = ['received'];
    let archivePath: string | null = null;

    const finish = (status: BundleStatus, detail: string, locations: string[] = []): BundleOutcome => {
      if (status === 'skipped') states.push('skipped');
      states.push('done');
      return { bundleId: bundle.id, status, detail, archivePath, locations, states, message: bundle.message };
    };

    const pdfs = bundle.attachments.filter((a) => isPdfAttachment(a.contentType, a.filename));
    if (pdfs.length === 0) {
      return finish('skipped', 'no PDF attachments');
    }

    // 1. Extraction
    let documents: ExtractedText[];
    try {
      documents = [];
      for (const attachment of pdfs) {
        documents.push(await this.extractor(attachment.content, attachment.filename));
      }
    } catch (err) {
      if (err instanceof ExtractionError) {
        return finish('skipped', `extraction failed (${err.code}) for ${err.filename}: ${err.message}`);
      }
      return finish('skipped', `extraction failed: ${errorMessage(err)}`);
    }
    states.push('text_extracted');

    if (isBlank(documents)) {
      return finish('skipped', 'no extractable text');
    }

    // 2. Classification
    let verdict: ValidationVerdict;
    try {
      verdict = await this.agent.validate(documents, { bundleId: bundle.id });
    } catch (err) {
      const code = err instanceof ClassificationError ? ` (${err.code})` : '';
      return finish('skipped', `classification failed${code}: ${errorMessage(err)}`);
    }
    states.push('classified');

    if (verdict.confidence < this.config.confidenceThreshold) {
      return finish(
        'skipped',
        `low confidence (${verdict.confidence} < ${this.config.confidenceThreshold}), manual review`,
      );
    }

    if (!verdict.valid) {
      states.push('invalid');
      return finish('rejected', verdict.reason ?? 'not a valid BEO bundle');
    }

    if (!verdict.fields) {
      return finish('skipped', 'valid verdict carried no fields');
    }
    states.push('valid');

    // 3. Archive
    const segments = resolveArchivePath(verdict.fields);
    archivePath = formatArchivePath(segments);
    states.push('path_resolved');

    const results: WriteResult[] = [];
    try {
      const folder = await this.store.ensureFolder(segments);
      const names = archiveFilenames(pdfs);
      for (const [index, attachment] of pdfs.entries()) {
        results.push(await this.store.writeFileIfAbsent(folder, names[index], attachment.content));
      }
    } catch (err) {
      return finish('skipped', describeStorageFailure(err));
    }
    states.push('stored');

    const created = results.filter((r) => r.created).length;
    return finish(
      'saved',
      `${created} file(s) written, ${results.length - created} already present`,
      results.map((r) => r.location),
    );
  }
}
