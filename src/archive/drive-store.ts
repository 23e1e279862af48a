/**
 * Google Drive Archive
 *
 * Provides the Drive side of the archive contract:
 * - findFolder / createFolder / findOrCreateFolder: one level of the chain
 * - findFile: exact-name lookup of a non-folder item within a folder
 * - uploadFile: upload a PDF into a folder
 * - DriveArchiveStore: ensureFolder / writeFileIfAbsent on top of the above
 *
 * Drive allows duplicate names and has no "create if absent" primitive, so
 * each level is find-then-create. Within one process, concurrent calls for
 * the same folder path or file share one in-flight request.
 *
 * Helpers take the DriveClient explicitly; the store owns one.
 */

import { Readable } from 'node:stream';
import type { ArchiveConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { withRetry } from '../utils/retry.js';
import type { DriveClient } from './drive-client.js';
import { formatArchivePath, sanitizeFilename } from './path-resolver.js';
import { isTransientStorageError, toStorageError } from './storage-errors.js';
import type { ArchivePath, ArchiveStore, FolderHandle, WriteResult } from './types.js';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

// ---------------------------------------------------------------------------
// Query Helpers
// ---------------------------------------------------------------------------

/** Quotes a value for use inside a '...' literal in a Drive `q` expression */
export function escapeDriveQuery(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

type ChildKind = 'folder' | 'file';

/** Untrashed children of `parentId` named exactly `name`, folders or non-folders only */
function childQuery(name: string, parentId: string, kind: ChildKind): string {
  const mimeTest = kind === 'folder' ? '=' : '!=';
  return (
    `name = '${escapeDriveQuery(name)}' and '${escapeDriveQuery(parentId)}' in parents ` +
    `and mimeType ${mimeTest} '${FOLDER_MIME_TYPE}' and trashed = false`
  );
}

// ---------------------------------------------------------------------------
// Folder Operations
// ---------------------------------------------------------------------------

/**
 * ID of the folder `name` under `parentId`. When Drive holds duplicates the
 * oldest wins, so every caller settles on the same one.
 */
export async function findFolder(drive: DriveClient, name: string, parentId: string): Promise<string | null> {
  const response = await drive.files.list({
    q: childQuery(name, parentId, 'folder'),
    fields: 'files(id, name)',
    orderBy: 'createdTime',
    pageSize: 1,
  });

  return response.data.files?.[0]?.id ?? null;
}

export async function createFolder(drive: DriveClient, name: string, parentId: string): Promise<string> {
  const response = await drive.files.create({
    requestBody: {
      name,
      mimeType: FOLDER_MIME_TYPE,
      parents: [parentId],
    },
    fields: 'id',
  });

  const folderId = response.data.id;
  if (!folderId) {
    throw new Error(`Drive API returned no ID after creating folder "${name}"`);
  }

  return folderId;
}

/** One level of the archive chain: reuse the folder if present, create it otherwise */
export async function findOrCreateFolder(drive: DriveClient, name: string, parentId: string): Promise<string> {
  const existingId = await findFolder(drive, name, parentId);
  if (existingId) return existingId;

  const newId = await createFolder(drive, name, parentId);
  console.log(`[archive:drive] Created folder "${name}" (${newId})`);
  return newId;
}

// ---------------------------------------------------------------------------
// File Operations
// ---------------------------------------------------------------------------

export interface DriveFile {
  id: string;
  webViewLink: string | null;
}

/** Archived copy of `filename` in the folder, if one exists */
export async function findFile(drive: DriveClient, filename: string, parentFolderId: string): Promise<DriveFile | null> {
  const response = await drive.files.list({
    q: childQuery(filename, parentFolderId, 'file'),
    fields: 'files(id, name, webViewLink)',
    pageSize: 1,
  });

  const file = response.data.files?.[0];
  return file?.id ? { id: file.id, webViewLink: file.webViewLink ?? null } : null;
}

/** Always creates a new item; callers check findFile first */
export async function uploadFile(
  drive: DriveClient,
  content: Buffer,
  filename: string,
  parentFolderId: string,
): Promise<DriveFile> {
  const response = await drive.files.create({
    requestBody: {
      name: filename,
      parents: [parentFolderId],
    },
    media: {
      mimeType: 'application/pdf',
      body: Readable.from(content),
    },
    fields: 'id, name, webViewLink',
  });

  const fileId = response.data.id;
  if (!fileId) {
    throw new Error(`Drive API returned no ID after uploading "${filename}"`);
  }

  return { id: fileId, webViewLink: response.data.webViewLink ?? null };
}

function fileLocation(file: DriveFile): string {
  return file.webViewLink ?? `drive://${file.id}`;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class DriveArchiveStore implements ArchiveStore {
  readonly kind = 'drive' as const;

  /** Folder IDs resolved during this run, keyed by joined path prefix */
  private readonly folderIds = new Map<string, string>();
  private readonly pendingFolders = new Map<string, Promise<string>>();
  private readonly pendingWrites = new Map<string, Promise<WriteResult>>();

  constructor(
    private readonly drive: DriveClient,
    private readonly config: Pick<ArchiveConfig, 'driveRootFolderId' | 'retry'>,
  ) {}

  async preflight(): Promise<void> {
    const rootId = this.config.driveRootFolderId;
    try {
      const response = await this.drive.files.get({ fileId: rootId, fields: 'id, mimeType, trashed' });
      if (response.data.mimeType !== FOLDER_MIME_TYPE || response.data.trashed) {
        throw new Error('item is not an active folder');
      }
    } catch (err) {
      throw new ConfigError(
        'ARCHIVE_UNREACHABLE',
        `Drive root folder ${rootId} is not usable: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }

  private call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(
      async () => {
        try {
          return await fn();
        } catch (err) {
          throw toStorageError(err, action);
        }
      },
      {
        maxAttempts: this.config.retry.maxAttempts,
        baseDelayMs: this.config.retry.baseDelayMs,
        isRetryable: isTransientStorageError,
        logPrefix: '[archive:drive]',
      },
    );
  }

  private resolveLevel(name: string, parentId: string, key: string): Promise<string> {
    const known = this.folderIds.get(key);
    if (known) return Promise.resolve(known);

    const pending = this.pendingFolders.get(key);
    if (pending) return pending;

    const request = this.call(`ensure folder ${key}`, () => findOrCreateFolder(this.drive, name, parentId))
      .then((id) => {
        this.folderIds.set(key, id);
        return id;
      })
      .finally(() => {
        this.pendingFolders.delete(key);
      });

    this.pendingFolders.set(key, request);
    return request;
  }

  async ensureFolder(segments: ArchivePath): Promise<FolderHandle> {
    let parentId = this.config.driveRootFolderId;

    for (let depth = 1; depth <= segments.length; depth++) {
      const key = formatArchivePath(segments.slice(0, depth));
      parentId = await this.resolveLevel(segments[depth - 1], parentId, key);
    }

    return { segments, ref: parentId, location: `drive:/${formatArchivePath(segments)}` };
  }

  writeFileIfAbsent(folder: FolderHandle, filename: string, content: Buffer): Promise<WriteResult> {
    const name = sanitizeFilename(filename);
    const key = `${folder.ref}/${name}`;

    const pending = this.pendingWrites.get(key);
    if (pending) {
      return pending.then((result) => ({ created: false, location: result.location }));
    }

    const request = this.writeOnce(folder, name, content).finally(() => {
      this.pendingWrites.delete(key);
    });
    this.pendingWrites.set(key, request);
    return request;
  }

  private async writeOnce(folder: FolderHandle, name: string, content: Buffer): Promise<WriteResult> {
    const where = formatArchivePath(folder.segments);

    // The lookup runs inside every attempt: an upload that succeeded
    // server-side but timed out client-side is found, not duplicated
    const result = await this.call(`write file into ${where}`, async (): Promise<WriteResult> => {
      const existing = await findFile(this.drive, name, folder.ref);
      if (existing) {
        return { created: false, location: fileLocation(existing) };
      }
      const uploaded = await uploadFile(this.drive, content, name, folder.ref);
      return { created: true, location: fileLocation(uploaded) };
    });

    if (result.created) {
      console.log('[archive:drive] Uploaded file', { folder: where, bytes: content.length });
    } else {
      console.log('[archive:drive] File already archived, skipping upload', { folder: where });
    }
    return result;
  }
}
