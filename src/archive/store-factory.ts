import type { AppConfig } from '../config.js';
import { createGoogleAuth } from '../google-auth.js';
import { createDriveClient } from './drive-client.js';
import { DriveArchiveStore } from './drive-store.js';
import { LocalArchiveStore } from './local-store.js';
import type { ArchiveStore } from './types.js';

/** Builds the archive backend selected by ARCHIVE_BACKEND */
export function createArchiveStore(config: Pick<AppConfig, 'archive' | 'google'>): ArchiveStore {
  if (config.archive.backend === 'drive') {
    const drive = createDriveClient(createGoogleAuth(config.google));
    return new DriveArchiveStore(drive, config.archive);
  }
  return new LocalArchiveStore(config.archive);
}
