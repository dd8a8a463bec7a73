/**
 * Structured logging.
 *
 * Emits one JSON line per event: `ts`, `level`, `scope`, `msg`, plus any
 * extra fields. Zero external dependencies; anything that reads JSON lines
 * from stderr can ingest it.
 */

import type { LogLevel } from './env.js';
import { env } from './env.js';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

/** Anything with a `write` method, e.g. `process.stderr`. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type EmitLevel = Exclude<LogLevel, 'silent'>;

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = RANK[options.level ?? env.LOG_LEVEL];
  const sink = options.sink ?? process.stderr;

  const emit = (level: EmitLevel, msg: string, fields?: LogFields): void => {
    if (RANK[level] < threshold) return;
    const entry = {
      ts: new Date().toISOString(),
      level,
      scope,
      msg,
      ...fields,
    };
    sink.write(JSON.stringify(entry) + '\n');
  };

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  };
}
