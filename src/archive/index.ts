// ============================================================================
// Archive Module — Barrel Export
// ============================================================================
//
// - Path resolution: structured fields -> [year, month, day, event folder]
// - Stores: local filesystem and Google Drive, same idempotent contract
// - Storage error classification (transient vs fatal)

export type { ArchivePath, ArchiveStore, FolderHandle, WriteResult } from './types.js';

export {
  resolveArchivePath,
  formatArchivePath,
  eventFolderName,
  sanitizeSegment,
  sanitizeFilename,
} from './path-resolver.js';

export { toStorageError, isTransientStorageError } from './storage-errors.js';

export { LocalArchiveStore } from './local-store.js';
export { DriveArchiveStore, findOrCreateFolder, findFile, uploadFile } from './drive-store.js';
export { createDriveClient } from './drive-client.js';
export type { DriveClient } from './drive-client.js';
export { createArchiveStore } from './store-factory.js';
