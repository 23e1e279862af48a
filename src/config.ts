/**
 * Application Configuration
 *
 * Builds the single AppConfig value for a run. Nothing reads process.env
 * outside this module: the orchestrator, agent, stores and sources receive
 * their slice of the config at construction time.
 *
 * Environment variables:
 * - GEMINI_API_KEY: Required Gemini API key
 * - CLASSIFICATION_MODEL: Gemini model ID (default: gemini-2.0-flash)
 * - CLASSIFICATION_CONFIDENCE_THRESHOLD: Min confidence to act on a verdict (default: 0.7)
 * - CLASSIFICATION_MAX_ATTEMPTS / CLASSIFICATION_RETRY_BASE_MS: AI retry policy (default: 3 / 1000)
 * - CLASSIFICATION_MAX_INPUT_CHARS: Text budget per request (default: 60000)
 * - CLASSIFICATION_TIMEOUT_MS: Per-request timeout (default: 60000)
 * - BEO_INSTRUCTIONS_FILE: Optional file replacing the built-in instructions
 * - ARCHIVE_BACKEND: local | drive (default: local)
 * - BEO_BASE_PATH: Local archive root (default: ./beo_output)
 * - DRIVE_ROOT_FOLDER_ID: Drive archive root folder (required for drive)
 * - STORAGE_MAX_ATTEMPTS / STORAGE_RETRY_BASE_MS: Storage retry policy (default: 3 / 500)
 * - INTAKE_SOURCE: gmail | directory (default: directory)
 * - INTAKE_DIRECTORY: Directory source root (default: ./inbox)
 * - GMAIL_QUERY / GMAIL_MAX_MESSAGES: Gmail search and cap (default: has:attachment filename:pdf / 100)
 * - GOOGLE_ACCESS_TOKEN, or GOOGLE_CLIENT_ID + GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN
 * - PIPELINE_CONCURRENCY: Max bundles (and AI calls) in flight (default: 3)
 */

import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError } from './errors.js';
import { DEFAULT_INSTRUCTIONS } from './validation/instructions.js';

export type ArchiveBackend = 'local' | 'drive';
export type IntakeSource = 'gmail' | 'directory';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export interface ValidationConfig {
  geminiApiKey: string;
  model: string;
  confidenceThreshold: number;
  retry: RetryPolicy;
  maxInputChars: number;
  requestTimeoutMs: number;
  /** Instruction set sent with every classification request */
  instructions: string;
}

export interface GoogleCredentials {
  accessToken: string | undefined;
  clientId: string | undefined;
  clientSecret: string | undefined;
  refreshToken: string | undefined;
}

export interface ArchiveConfig {
  backend: ArchiveBackend;
  basePath: string;
  driveRootFolderId: string;
  retry: RetryPolicy;
}

export interface IntakeConfig {
  source: IntakeSource;
  directory: string;
  gmailQuery: string;
  gmailMaxMessages: number;
}

export interface AppConfig {
  isDev: boolean;
  validation: ValidationConfig;
  archive: ArchiveConfig;
  intake: IntakeConfig;
  google: GoogleCredentials;
  pipeline: {
    concurrency: number;
  };
}

type Env = Record<string, string | undefined>;

function requiredEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new ConfigError(
      'MISSING_ENV',
      `Missing required environment variable: ${key}. ` +
        `Copy .env.example to .env and fill in the required values.`,
    );
  }
  return value;
}

function optionalEnv(env: Env, key: string, fallback = ''): string {
  const value = env[key];
  return value === undefined || value === '' ? fallback : value;
}

function intEnv(env: Env, key: string, fallback: number, min = 1): number {
  const raw = optionalEnv(env, key, String(fallback));
  const value = parseInt(raw, 10);
  if (Number.isNaN(value) || value < min) {
    throw new ConfigError('INVALID_ENV', `${key} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
  const raw = optionalEnv(env, key, fallback);
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    throw new ConfigError('INVALID_ENV', `${key} must be one of ${allowed.join(', ')} (got "${raw}")`);
  }
  return match;
}

function loadInstructions(env: Env): string {
  const file = env.BEO_INSTRUCTIONS_FILE;
  if (!file) return DEFAULT_INSTRUCTIONS;

  try {
    const text = readFileSync(resolve(file), 'utf-8').trim();
    if (!text) {
      throw new Error('file is empty');
    }
    return text;
  } catch (err) {
    throw new ConfigError(
      'INVALID_ENV',
      `BEO_INSTRUCTIONS_FILE could not be read: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
}

/**
 * Reads and validates the run configuration.
 *
 * @throws ConfigError when a required value is missing or malformed
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const confidenceRaw = optionalEnv(env, 'CLASSIFICATION_CONFIDENCE_THRESHOLD', '0.7');
  const confidenceThreshold = parseFloat(confidenceRaw);
  if (Number.isNaN(confidenceThreshold) || confidenceThreshold < 0 || confidenceThreshold > 1) {
    throw new ConfigError(
      'INVALID_ENV',
      `CLASSIFICATION_CONFIDENCE_THRESHOLD must be between 0 and 1 (got "${confidenceRaw}")`,
    );
  }

  const google: GoogleCredentials = {
    accessToken: env.GOOGLE_ACCESS_TOKEN || undefined,
    clientId: env.GOOGLE_CLIENT_ID || undefined,
    clientSecret: env.GOOGLE_CLIENT_SECRET || undefined,
    refreshToken: env.GOOGLE_REFRESH_TOKEN || undefined,
  };

  const archive: ArchiveConfig = {
    backend: oneOf(env, 'ARCHIVE_BACKEND', ['local', 'drive'] as const, 'local'),
    basePath: resolve(optionalEnv(env, 'BEO_BASE_PATH', 'beo_output').trim()),
    driveRootFolderId: optionalEnv(env, 'DRIVE_ROOT_FOLDER_ID'),
    retry: {
      maxAttempts: intEnv(env, 'STORAGE_MAX_ATTEMPTS', 3),
      baseDelayMs: intEnv(env, 'STORAGE_RETRY_BASE_MS', 500, 0),
    },
  };

  if (archive.backend === 'drive' && !archive.driveRootFolderId) {
    throw new ConfigError('MISSING_ENV', 'ARCHIVE_BACKEND=drive requires DRIVE_ROOT_FOLDER_ID');
  }

  const intake: IntakeConfig = {
    source: oneOf(env, 'INTAKE_SOURCE', ['gmail', 'directory'] as const, 'directory'),
    directory: resolve(optionalEnv(env, 'INTAKE_DIRECTORY', 'inbox')),
    gmailQuery: optionalEnv(env, 'GMAIL_QUERY', 'has:attachment filename:pdf'),
    gmailMaxMessages: intEnv(env, 'GMAIL_MAX_MESSAGES', 100),
  };

  const needsGoogle = archive.backend === 'drive' || intake.source === 'gmail';
  const hasRefreshFlow = Boolean(google.clientId && google.clientSecret && google.refreshToken);
  if (needsGoogle && !google.accessToken && !hasRefreshFlow) {
    throw new ConfigError(
      'MISSING_CREDENTIALS',
      'Google credentials missing. Set GOOGLE_ACCESS_TOKEN, or GOOGLE_CLIENT_ID + ' +
        'GOOGLE_CLIENT_SECRET + GOOGLE_REFRESH_TOKEN.',
    );
  }

  return {
    isDev: optionalEnv(env, 'APP_ENV', 'development') !== 'production',
    validation: {
      geminiApiKey: requiredEnv(env, 'GEMINI_API_KEY'),
      model: optionalEnv(env, 'CLASSIFICATION_MODEL', 'gemini-2.0-flash'),
      confidenceThreshold,
      retry: {
        maxAttempts: intEnv(env, 'CLASSIFICATION_MAX_ATTEMPTS', 3),
        baseDelayMs: intEnv(env, 'CLASSIFICATION_RETRY_BASE_MS', 1000, 0),
      },
      maxInputChars: intEnv(env, 'CLASSIFICATION_MAX_INPUT_CHARS', 60_000, 1000),
      requestTimeoutMs: intEnv(env, 'CLASSIFICATION_TIMEOUT_MS', 60_000),
      instructions: loadInstructions(env),
    },
    archive,
    intake,
    google,
    pipeline: {
      concurrency: intEnv(env, 'PIPELINE_CONCURRENCY', 3),
    },
  };
}
