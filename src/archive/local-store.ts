/**
 * Local Filesystem Archive
 *
 * Layout: {basePath}/{year}/{month}/{day}/{BEO number} - {client}/{file}.pdf
 *
 * - ensureFolder: recursive mkdir, so existing chains (or chains a concurrent
 *   worker just created) are not errors
 * - writeFileIfAbsent: exclusive-create open ('wx'); EEXIST means the file is
 *   already archived and the call is a no-op. A write that fails after the
 *   open removes the file it created; a failed open removes nothing.
 *
 * The filesystem provides the atomicity; there is no client-side locking.
 */

import { constants } from 'node:fs';
import { access, mkdir, open, rm } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { join } from 'node:path';
import type { ArchiveConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import { formatArchivePath, sanitizeFilename } from './path-resolver.js';
import { errnoOf, isTransientStorageError, toStorageError } from './storage-errors.js';
import type { ArchivePath, ArchiveStore, FolderHandle, WriteResult } from './types.js';

function logCleanupFailure(err: unknown): void {
  console.warn('[archive:local] Failed to clean up partial file', {
    error: err instanceof Error ? err.message : String(err),
  });
}

export class LocalArchiveStore implements ArchiveStore {
  readonly kind = 'local' as const;

  constructor(private readonly config: Pick<ArchiveConfig, 'basePath' | 'retry'>) {}

  get basePath(): string {
    return this.config.basePath;
  }

  async preflight(): Promise<void> {
    try {
      await mkdir(this.basePath, { recursive: true });
      await access(this.basePath, constants.W_OK);
    } catch (err) {
      throw new ConfigError(
        'ARCHIVE_UNREACHABLE',
        `Archive base path is not writable: ${this.basePath} (${errnoOf(err) ?? 'unknown error'})`,
        { cause: err },
      );
    }
  }

  async ensureFolder(segments: ArchivePath): Promise<FolderHandle> {
    const dir = join(this.basePath, ...segments);

    await withRetry(
      async () => {
        try {
          await mkdir(dir, { recursive: true });
        } catch (err) {
          throw toStorageError(err, `create folder ${formatArchivePath(segments)}`);
        }
      },
      {
        maxAttempts: this.config.retry.maxAttempts,
        baseDelayMs: this.config.retry.baseDelayMs,
        isRetryable: isTransientStorageError,
        logPrefix: '[archive:local]',
      },
    );

    return { segments, ref: dir, location: dir };
  }

  async writeFileIfAbsent(folder: FolderHandle, filename: string, content: Buffer): Promise<WriteResult> {
    const target = join(folder.ref, sanitizeFilename(filename));

    return withRetry(
      async () => {
        let handle: FileHandle;
        try {
          handle = await open(target, 'wx');
        } catch (err) {
          if (errnoOf(err) === 'EEXIST') {
            console.log('[archive:local] File already archived, skipping write', {
              folder: formatArchivePath(folder.segments),
            });
            return { created: false, location: target };
          }
          throw toStorageError(err, `open file in ${formatArchivePath(folder.segments)}`);
        }

        try {
          await handle.writeFile(content);
        } catch (err) {
          await handle.close().catch(logCleanupFailure);
          // A partially written file would read as "already archived" next run
          await rm(target, { force: true }).catch(logCleanupFailure);
          throw toStorageError(err, `write file into ${formatArchivePath(folder.segments)}`);
        }

        try {
          await handle.close();
        } catch (err) {
          throw toStorageError(err, `close file in ${formatArchivePath(folder.segments)}`);
        }

        console.log('[archive:local] Wrote file', {
          folder: formatArchivePath(folder.segments),
          bytes: content.length,
        });
        return { created: true, location: target };
      },
      {
        maxAttempts: this.config.retry.maxAttempts,
        baseDelayMs: this.config.retry.baseDelayMs,
        isRetryable: isTransientStorageError,
        logPrefix: '[archive:local]',
      },
    );
  }
}
