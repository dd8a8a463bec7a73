// ---------------------------------------------------------------------------
// Model configuration schemas
// ---------------------------------------------------------------------------

import { z } from 'zod';
import type { PurityFn } from '@arbor/data-utils';
import { ErrorMessages, ModelError } from './errors.js';
import type { Logger } from './logger.js';

/** Hard cap shared by recursion, split count and traversal steps. */
export const DEFAULT_ITERATION_CAP = 10_000;

const modeSchema = z.enum(['classification', 'regression'], {
  errorMap: () => ({ message: ErrorMessages.invalidMode }),
});

const purityFnSchema = z.custom<PurityFn>(
  (value) => typeof value === 'function',
  'purityFn must be a function',
);

const LOG_METHODS = ['debug', 'info', 'warn', 'error'] as const;

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    LOG_METHODS.every((method) => typeof Reflect.get(value, method) === 'function'),
  'logger must implement debug/info/warn/error',
);

export const treeOptionsSchema = z.object({
  mode: modeSchema,
  purityFn: purityFnSchema,
  maxDepth: z.number().int().min(1).default(15),
  minRowsPerNode: z.number().int().min(1, 'minRowsPerNode must be at least 1').default(3),
  /** <= 0 disables per-split column subsampling. */
  randomFeatures: z.number().int().default(0),
  bootstrap: z.boolean().default(false),
  recordOutOfBag: z.boolean().default(false),
  maxRecursions: z.number().int().min(1).default(DEFAULT_ITERATION_CAP),
  maxSplits: z.number().int().min(1).default(DEFAULT_ITERATION_CAP),
  seed: z.number().int().default(42),
  logger: loggerSchema.optional(),
});

export const forestOptionsSchema = z.object({
  mode: modeSchema,
  purityFn: purityFnSchema,
  treeCount: z.number().int().min(1).default(100),
  maxDepth: z.number().int().min(1).default(1000),
  minRowsPerNode: z.number().int().min(1, 'minRowsPerNode must be at least 1').default(3),
  /** 0 resolves to round(sqrt(columns)) at training time. */
  randomFeatures: z.number().int().min(0, 'randomFeatures cannot be negative').default(0),
  bootstrap: z.boolean().default(true),
  recordOutOfBag: z.boolean().default(false),
  seed: z.number().int().default(42),
  concurrency: z.number().int().min(1).optional(),
  logger: loggerSchema.optional(),
});

export type TreeOptions = z.input<typeof treeOptionsSchema>;
export type TreeConfig = z.output<typeof treeOptionsSchema>;
export type ForestOptions = z.input<typeof forestOptionsSchema>;
export type ForestConfig = z.output<typeof forestOptionsSchema>;

/** Parse options, turning schema failures into `invalid-configuration`. */
function parseOptions<T extends z.ZodTypeAny>(schema: T, options: unknown): z.output<T> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new ModelError('invalid-configuration', issues.join('; '), {
      fields: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}

export function parseTreeOptions(options: TreeOptions): TreeConfig {
  return parseOptions(treeOptionsSchema, options);
}

export function parseForestOptions(options: ForestOptions): ForestConfig {
  return parseOptions(forestOptionsSchema, options);
}
