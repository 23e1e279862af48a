/**
 * Archive Type Definitions
 *
 * - ArchivePath: [year, month, day, "<BEO number> - <client>"], sanitized
 * - FolderHandle: backend reference to an ensured folder chain
 * - WriteResult: outcome of a write-if-absent call
 * - ArchiveStore: the contract both backends implement
 */

import type { ArchiveBackend } from '../config.js';

/** Ordered, sanitized path segments of one event folder */
export type ArchivePath = readonly [year: string, month: string, day: string, eventFolder: string];

export interface FolderHandle {
  /** Segments the folder was ensured for */
  segments: ArchivePath;
  /** Backend reference: absolute directory path (local) or folder ID (drive) */
  ref: string;
  /** Human-readable location of the folder */
  location: string;
}

export interface WriteResult {
  /** false when a file with that name already existed (no-op) */
  created: boolean;
  /** Absolute path (local) or web link (drive) of the stored file */
  location: string;
}

export interface ArchiveStore {
  readonly kind: ArchiveBackend;

  /**
   * Confirms the archive root is usable before any bundle work starts.
   * @throws ConfigError
   */
  preflight(): Promise<void>;

  /**
   * Creates any missing part of the segment chain. Succeeds when the chain
   * already exists in full or in part, including when a concurrent caller
   * created it first.
   * @throws StorageError
   */
  ensureFolder(segments: ArchivePath): Promise<FolderHandle>;

  /**
   * Writes the file unless one with the same name already exists under the
   * folder, in which case nothing is written and `created` is false.
   * @throws StorageError
   */
  writeFileIfAbsent(folder: FolderHandle, filename: string, content: Buffer): Promise<WriteResult>;
}
