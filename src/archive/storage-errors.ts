/**
 * Maps backend failures onto StorageError.
 *
 * Transient (retried): HTTP 408/429/5xx, connection resets and timeouts,
 * busy or exhausted file handles. Everything else, notably 401/403 and
 * EACCES/EPERM/EROFS, fails the item on the first attempt.
 */

import { StorageError } from '../errors.js';

const TRANSIENT_ERRNO = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNREFUSED',
  'EAI_AGAIN',
  'EPIPE',
  'EBUSY',
  'EMFILE',
  'ENFILE',
  'EAGAIN',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status of a googleapis (gaxios) error, if any.
 * Gaxios puts it on `response.status`; older errors carry a numeric `code`.
 */
export function httpStatusOf(err: unknown): number | null {
  if (!isRecord(err)) return null;

  const response = err.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  if (typeof err.status === 'number') return err.status;
  if (typeof err.code === 'number') return err.code;
  if (typeof err.code === 'string' && /^\d{3}$/.test(err.code)) return Number(err.code);

  return null;
}

/** Node/system error code such as "EACCES", if any */
export function errnoOf(err: unknown): string | null {
  if (isRecord(err) && typeof err.code === 'string' && /^E[A-Z_]+$/.test(err.code)) {
    return err.code;
  }
  return null;
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Wraps any backend error into a StorageError with the transient flag set.
 *
 * @param action - What was being attempted, e.g. 'create folder "2026"'
 */
export function toStorageError(err: unknown, action: string): StorageError {
  if (err instanceof StorageError) return err;

  const message = err instanceof Error ? err.message : String(err);
  const status = httpStatusOf(err);
  const errno = errnoOf(err);

  const transient =
    (status !== null && isTransientStatus(status)) || (errno !== null && TRANSIENT_ERRNO.has(errno));

  const detail = status !== null ? ` (${status})` : errno !== null ? ` (${errno})` : '';
  return new StorageError(`Failed to ${action}${detail}: ${message}`, transient, status, { cause: err });
}

/** Retry predicate shared by both stores */
export function isTransientStorageError(err: unknown): boolean {
  return err instanceof StorageError && err.transient;
}
