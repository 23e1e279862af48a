/**
 * Tests for Local Filesystem Archive
 *
 * Tests cover:
 * - preflight: creates the base path, rejects an unusable one
 * - ensureFolder: creates the chain, tolerates existing and concurrent chains
 * - writeFileIfAbsent: writes once, no-op on rerun, single winner under concurrency,
 *   partial-file cleanup on write failure only
 *
 * Runs against a temporary directory. fs `open` is wrapped so a test can fail
 * the next open or the next write through the returned handle.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../errors.js';
import { LocalArchiveStore } from '../local-store.js';
import type { ArchivePath } from '../types.js';

const faults = vi.hoisted(() => ({
  openErrno: null as string | null,
  writeErrno: null as string | null,
}));

function errnoError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: simulated failure`), { code });
}

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      if (faults.openErrno) {
        const code = faults.openErrno;
        faults.openErrno = null;
        throw errnoError(code);
      }
      const handle = await actual.open(...args);
      if (faults.writeErrno) {
        const code = faults.writeErrno;
        faults.writeErrno = null;
        handle.writeFile = async () => {
          await handle.write(Buffer.from('%PDF-1.7 trunc'));
          throw errnoError(code);
        };
      }
      return handle;
    },
  };
});

const segments: ArchivePath = ['2026', '1', '1', '12345 - Acme Corp'];

describe('LocalArchiveStore', () => {
  let root: string;
  let store: LocalArchiveStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'beo-archive-'));
    store = new LocalArchiveStore({ basePath: join(root, 'archive'), retry: { maxAttempts: 3, baseDelayMs: 0 } });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    faults.openErrno = null;
    faults.writeErrno = null;
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  describe('preflight', () => {
    it('creates the base path', async () => {
      await store.preflight();
      expect(await readdir(root)).toEqual(['archive']);
    });

    it('throws ConfigError when the base path is a file', async () => {
      const blocked = join(root, 'blocked');
      await writeFile(blocked, 'not a directory');
      const fileStore = new LocalArchiveStore({ basePath: blocked, retry: { maxAttempts: 1, baseDelayMs: 0 } });

      await expect(fileStore.preflight()).rejects.toMatchObject({
        name: 'ConfigError',
        code: 'ARCHIVE_UNREACHABLE',
      });
      await expect(fileStore.preflight()).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('ensureFolder', () => {
    it('creates the whole segment chain', async () => {
      const folder = await store.ensureFolder(segments);

      expect(folder.ref).toBe(join(root, 'archive', '2026', '1', '1', '12345 - Acme Corp'));
      expect(await readdir(join(root, 'archive', '2026', '1', '1'))).toEqual(['12345 - Acme Corp']);
    });

    it('succeeds when the chain already exists', async () => {
      await store.ensureFolder(segments);
      await expect(store.ensureFolder(segments)).resolves.toMatchObject({ segments });
    });

    it('succeeds for concurrent calls on the same chain', async () => {
      const results = await Promise.all(Array.from({ length: 8 }, () => store.ensureFolder(segments)));

      expect(new Set(results.map((r) => r.ref)).size).toBe(1);
      expect(await readdir(join(root, 'archive', '2026', '1'))).toEqual(['1']);
    });

    it('fails with a fatal StorageError when a segment is blocked by a file', async () => {
      await store.ensureFolder(['2026', '1', '1', 'x']);
      await writeFile(join(root, 'archive', '2026', '2'), 'file in the way');

      await expect(store.ensureFolder(['2026', '2', '3', 'y'])).rejects.toMatchObject({
        name: 'StorageError',
        transient: false,
      });
    });
  });

  describe('writeFileIfAbsent', () => {
    it('writes a new file and reports created', async () => {
      const folder = await store.ensureFolder(segments);

      const result = await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 first'));

      expect(result).toEqual({ created: true, location: join(folder.ref, 'beo.pdf') });
      expect(await readFile(join(folder.ref, 'beo.pdf'), 'utf-8')).toBe('%PDF-1.7 first');
    });

    it('leaves an existing file untouched', async () => {
      const folder = await store.ensureFolder(segments);
      await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 first'));

      const second = await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 second'));

      expect(second).toEqual({ created: false, location: join(folder.ref, 'beo.pdf') });
      expect(await readFile(join(folder.ref, 'beo.pdf'), 'utf-8')).toBe('%PDF-1.7 first');
    });

    it('sanitizes the filename', async () => {
      const folder = await store.ensureFolder(segments);

      const result = await store.writeFileIfAbsent(folder, 'Acme/Hospitality', Buffer.from('%PDF'));

      expect(result.location).toBe(join(folder.ref, 'Acme_Hospitality.pdf'));
    });

    it('produces exactly one created write under concurrency', async () => {
      const folder = await store.ensureFolder(segments);

      const results = await Promise.all(
        Array.from({ length: 6 }, (_, i) => store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from(`copy ${i}`))),
      );

      expect(results.filter((r) => r.created)).toHaveLength(1);
      expect(await readdir(folder.ref)).toEqual(['beo.pdf']);
    });

    it('removes the partial file when the write fails', async () => {
      const folder = await store.ensureFolder(segments);
      faults.writeErrno = 'ENOSPC';

      await expect(store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 full'))).rejects.toMatchObject({
        name: 'StorageError',
        transient: false,
      });
      expect(await readdir(folder.ref)).toEqual([]);

      const retry = await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 full'));
      expect(retry.created).toBe(true);
      expect(await readFile(join(folder.ref, 'beo.pdf'), 'utf-8')).toBe('%PDF-1.7 full');
    });

    it('retries a transient write failure into a complete file', async () => {
      const folder = await store.ensureFolder(segments);
      faults.writeErrno = 'EAGAIN';

      const result = await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 full'));

      expect(result).toEqual({ created: true, location: join(folder.ref, 'beo.pdf') });
      expect(await readFile(join(folder.ref, 'beo.pdf'), 'utf-8')).toBe('%PDF-1.7 full');
    });

    it('keeps an existing file when the open fails', async () => {
      const folder = await store.ensureFolder(segments);
      await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 first'));
      faults.openErrno = 'EMFILE';

      const result = await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 second'));

      expect(result).toEqual({ created: false, location: join(folder.ref, 'beo.pdf') });
      expect(await readFile(join(folder.ref, 'beo.pdf'), 'utf-8')).toBe('%PDF-1.7 first');
    });

    it('does not touch an existing file on a fatal open failure', async () => {
      const folder = await store.ensureFolder(segments);
      await store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 first'));
      faults.openErrno = 'EACCES';

      await expect(store.writeFileIfAbsent(folder, 'beo.pdf', Buffer.from('%PDF-1.7 second'))).rejects.toMatchObject({
        name: 'StorageError',
        transient: false,
      });
      expect(await readFile(join(folder.ref, 'beo.pdf'), 'utf-8')).toBe('%PDF-1.7 first');
    });
  });
});
