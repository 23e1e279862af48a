/**
 * Directory Bundle Source
 *
 * Reads bundles from a local folder, for replaying saved emails or running
 * without a mailbox:
 * - each subdirectory is one bundle holding the PDFs directly inside it
 * - each top-level PDF is a bundle of its own
 *
 * Entries are visited in name order so runs are repeatable. Subdirectories
 * without PDFs are not yielded. An entry that cannot be read is logged and
 * skipped; only an unreadable root fails the run.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Attachment, AttachmentBundle, BundleSource } from './types.js';

const PDF_EXTENSION = /\.pdf$/i;

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

async function readAttachment(path: string): Promise<Attachment> {
  return {
    filename: basename(path),
    contentType: 'application/pdf',
    content: await readFile(path),
  };
}

async function toBundle(name: string, path: string, filePaths: string[]): Promise<AttachmentBundle> {
  const attachments = await Promise.all(filePaths.map(readAttachment));
  const info = await stat(path);

  return {
    id: `dir-${name}`,
    attachments,
    message: {
      messageId: name,
      subject: name,
      from: 'local',
      receivedAt: info.mtime.toISOString(),
    },
  };
}

export class DirectoryBundleSource implements BundleSource {
  readonly name = 'directory';

  constructor(private readonly root: string) {}

  async *bundles(): AsyncGenerator<AttachmentBundle> {
    const entries = (await readdir(this.root, { withFileTypes: true })).sort(byName);
    console.log('[intake] Reading bundles from directory:', { root: this.root, entries: entries.length });

    for (const entry of entries) {
      let bundle: AttachmentBundle | null;
      try {
        bundle = await this.readEntry(entry);
      } catch (err) {
        console.error('[intake] Failed to read bundle, skipping:', {
          entry: entry.name,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      if (bundle) {
        yield bundle;
      }
    }
  }

  private async readEntry(entry: Dirent): Promise<AttachmentBundle | null> {
    const path = join(this.root, entry.name);

    if (entry.isFile() && PDF_EXTENSION.test(entry.name)) {
      return toBundle(entry.name, path, [path]);
    }

    if (!entry.isDirectory()) return null;

    const files = (await readdir(path, { withFileTypes: true }))
      .filter((child) => child.isFile() && PDF_EXTENSION.test(child.name))
      .sort(byName)
      .map((child) => join(path, child.name));

    return files.length > 0 ? toBundle(entry.name, path, files) : null;
  }
}
