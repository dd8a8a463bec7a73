/**
 * Environment-driven defaults.
 *
 * Read once at import. Unset variables fall back to library defaults;
 * malformed values throw at startup rather than changing behaviour later.
 */

import { availableParallelism } from 'node:os';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(raw: string): LogLevel {
  const value = raw.trim().toLowerCase();
  if (!isLogLevel(value)) {
    throw new Error(
      `Invalid ARBOR_LOG_LEVEL: ${raw}. Expected one of ${LOG_LEVELS.join(', ')}.`,
    );
  }
  return value;
}

export function parsePoolSize(raw: string | undefined): number | undefined {
  if (raw === undefined || raw === '') return undefined;
  const size = Number(raw);
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Invalid ARBOR_POOL_SIZE: ${raw}. Expected a positive integer.`);
  }
  return size;
}

/** One slot is left for the calling thread. */
export function defaultPoolSize(): number {
  return Math.max(1, availableParallelism() - 1);
}

export const env = {
  LOG_LEVEL: parseLogLevel(optional('ARBOR_LOG_LEVEL', 'warn')),
  POOL_SIZE: parsePoolSize(process.env['ARBOR_POOL_SIZE']) ?? defaultPoolSize(),
} as const;
