import { describe, it, expect } from 'vitest';
import { gini } from '@arbor/data-utils';
import {
  DEFAULT_ITERATION_CAP,
  forestOptionsSchema,
  parseForestOptions,
  parseTreeOptions,
  treeOptionsSchema,
} from '../config.js';
import { defaultPoolSize, parseLogLevel, parsePoolSize } from '../env.js';
import { ErrorMessages, ModelError, isFatal, isModelError } from '../errors.js';
import { createLogger } from '../logger.js';

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected a throw');
}

// ---------------------------------------------------------------------------
// Option schemas
// ---------------------------------------------------------------------------

describe('tree options', () => {
  it('fills in defaults', () => {
    expect(parseTreeOptions({ mode: 'classification', purityFn: gini })).toEqual({
      mode: 'classification',
      purityFn: gini,
      maxDepth: 15,
      minRowsPerNode: 3,
      randomFeatures: 0,
      bootstrap: false,
      recordOutOfBag: false,
      maxRecursions: DEFAULT_ITERATION_CAP,
      maxSplits: DEFAULT_ITERATION_CAP,
      seed: 42,
    });
  });

  it('rejects minRowsPerNode below 1', () => {
    const err = thrown(() => parseTreeOptions({ mode: 'regression', purityFn: gini, minRowsPerNode: 0 }));
    expect(err).toBeInstanceOf(ModelError);
    expect(err).toMatchObject({
      kind: 'invalid-configuration',
      message: 'minRowsPerNode: minRowsPerNode must be at least 1',
      details: { fields: { minRowsPerNode: ['minRowsPerNode must be at least 1'] } },
    });
  });

  it('reports an unknown mode', () => {
    const result = treeOptionsSchema.safeParse({ mode: 'clustering', purityFn: gini });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe(ErrorMessages.invalidMode);
  });

  it('requires a purity function', () => {
    const result = treeOptionsSchema.safeParse({ mode: 'regression', purityFn: 3 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues[0]?.message).toBe('purityFn must be a function');
  });
});

describe('forest options', () => {
  it('fills in defaults', () => {
    const config = parseForestOptions({ mode: 'regression', purityFn: gini });
    expect(config).toMatchObject({
      treeCount: 100,
      maxDepth: 1000,
      minRowsPerNode: 3,
      randomFeatures: 0,
      bootstrap: true,
      recordOutOfBag: false,
      seed: 42,
    });
    expect(config.concurrency).toBeUndefined();
  });

  it('rejects a negative feature count', () => {
    expect(
      thrown(() => parseForestOptions({ mode: 'classification', purityFn: gini, randomFeatures: -1 })),
    ).toMatchObject({
      kind: 'invalid-configuration',
      message: 'randomFeatures: randomFeatures cannot be negative',
    });
  });

  it('rejects a logger without the logging methods', () => {
    const result = forestOptionsSchema.safeParse({ mode: 'classification', purityFn: gini, logger: {} });
    expect(result.success).toBe(false);
  });

  it('requires every logging method, not just warn', () => {
    const partial = forestOptionsSchema.safeParse({
      mode: 'classification',
      purityFn: gini,
      logger: { warn() {} },
    });
    expect(partial.success).toBe(false);
    if (partial.success) return;
    expect(partial.error.issues[0]?.message).toBe('logger must implement debug/info/warn/error');

    const logger = createLogger('test', { level: 'silent' });
    const full = forestOptionsSchema.safeParse({ mode: 'classification', purityFn: gini, logger });
    expect(full.success).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe('ModelError', () => {
  it('carries its kind and details', () => {
    const err = new ModelError('shape-mismatch', ErrorMessages.lengthMismatch, { rows: 2 });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ModelError');
    expect(err.kind).toBe('shape-mismatch');
    expect(err.details).toEqual({ rows: 2 });
    expect(isModelError(err)).toBe(true);
    expect(isModelError(new Error('plain'))).toBe(false);
  });

  it('treats only iteration-limit as fatal', () => {
    expect(isFatal(new ModelError('iteration-limit', ErrorMessages.iterationLimit))).toBe(true);
    expect(isFatal(new ModelError('untrained', ErrorMessages.untrained))).toBe(false);
    expect(isFatal(new Error('plain'))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

describe('environment parsing', () => {
  it('normalises log levels', () => {
    expect(parseLogLevel(' INFO ')).toBe('info');
    expect(parseLogLevel('silent')).toBe('silent');
    expect(() => parseLogLevel('loud')).toThrow(
      'Invalid ARBOR_LOG_LEVEL: loud. Expected one of debug, info, warn, error, silent.',
    );
  });

  it('parses pool sizes', () => {
    expect(parsePoolSize('4')).toBe(4);
    expect(parsePoolSize('')).toBeUndefined();
    expect(parsePoolSize(undefined)).toBeUndefined();
    expect(() => parsePoolSize('0')).toThrow('Invalid ARBOR_POOL_SIZE: 0. Expected a positive integer.');
    expect(() => parsePoolSize('2.5')).toThrow(Error);
  });

  it('leaves at least one slot', () => {
    expect(defaultPoolSize()).toBeGreaterThanOrEqual(1);
  });
});

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

describe('createLogger', () => {
  it('writes one JSON line per event at or above the level', () => {
    const lines: string[] = [];
    const logger = createLogger('test', { level: 'info', sink: { write: (chunk: string) => lines.push(chunk) } });
    logger.debug('hidden');
    logger.info('shown', { rows: 3 });
    logger.error('failed');

    expect(lines).toHaveLength(2);
    expect(lines.every((line) => line.endsWith('\n'))).toBe(true);
    const first: unknown = JSON.parse(lines[0] ?? '');
    expect(first).toMatchObject({ level: 'info', scope: 'test', msg: 'shown', rows: 3 });
    expect(first).toHaveProperty('ts');
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ level: 'error', msg: 'failed' });
  });

  it('writes nothing when silent', () => {
    const lines: string[] = [];
    const logger = createLogger('test', { level: 'silent', sink: { write: (chunk: string) => lines.push(chunk) } });
    logger.error('dropped');
    expect(lines).toEqual([]);
  });
});
