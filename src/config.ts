/**
 * Fixed constants of the corpus model and the environment-driven settings.
 */

import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';

// Resolve paths relative to this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Default location of the per-chapter documents, beside the package. */
export const DEFAULT_DATA_PATH = join(__dirname, '..', 'data', 'surah');

/** Number of chapters in the corpus; chapter indices run 1..TOTAL_CHAPTERS. */
export const TOTAL_CHAPTERS = 114;

/** Chapter files are named `${CHAPTER_FILE_PREFIX}${index}.json`. */
export const CHAPTER_FILE_PREFIX = 'surah_';

export const WORD_DELIMITER = ' ';

export const RELATION_WEIGHTS = {
  sharedRoot: 1.0,
  sharedLemma: 0.5,
  identicalNormalized: 0.8,
} as const;

export const EXPORT_FORMAT_VERSION = '1.0.0';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

/**
 * Chapter file name for an index.
 */
export function chapterFileName(index: number): string {
  return `${CHAPTER_FILE_PREFIX}${index}.json`;
}

/**
 * Data directory from CORPUS_DATA_PATH, falling back to the bundled one.
 */
export function resolveDataPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.CORPUS_DATA_PATH?.trim();
  return fromEnv ? resolve(fromEnv) : DEFAULT_DATA_PATH;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Minimum log level from CORPUS_LOG_LEVEL. Unknown values fall back to the default.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env.CORPUS_LOG_LEVEL?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : DEFAULT_LOG_LEVEL;
}
