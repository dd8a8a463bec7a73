// ---------------------------------------------------------------------------
// Feature utilities: resampling, shuffling and train/test partitioning
// ---------------------------------------------------------------------------
// All functions take a feature matrix plus its parallel target vector and
// keep row i of the matrix paired with target[i].
// ---------------------------------------------------------------------------

import type { Matrix } from './matrix.js';
import { splitArray, splitRows } from './matrix.js';
import type { PRNG } from './random.js';
import { rangeWithReplacement, shuffle } from './random.js';

export interface BootstrapSample {
  matrix: Matrix;
  target: number[];
  /** Indices of input rows never drawn; empty unless requested. */
  outOfBag: number[];
}

export interface BootstrapOptions {
  returnOutOfBag?: boolean;
}

export interface LabelProportion {
  label: number;
  count: number;
  proportion: number;
}

function assertPaired(matrix: readonly unknown[], target: readonly unknown[]): void {
  if (matrix.length !== target.length) {
    throw new RangeError('Inputs must be same length');
  }
}

/**
 * Resample rows with replacement to the input's row count.
 * Each output row is a copy of exactly one input row.
 */
export function bootstrap(
  matrix: readonly (readonly number[])[],
  target: readonly number[],
  rng: PRNG,
  options: BootstrapOptions = {},
): BootstrapSample {
  assertPaired(matrix, target);
  const n = matrix.length;
  if (n === 0) {
    return { matrix: [], target: [], outOfBag: [] };
  }

  const drawn = rangeWithReplacement(rng, 0, n, n);
  const sampleMatrix: Matrix = new Array<number[]>(n);
  const sampleTarget = new Array<number>(n);
  for (let i = 0; i < n; i++) {
    const idx = drawn[i]!;
    sampleMatrix[i] = [...matrix[idx]!];
    sampleTarget[i] = target[idx]!;
  }

  const outOfBag: number[] = [];
  if (options.returnOutOfBag) {
    const seen = new Set(drawn);
    for (let i = 0; i < n; i++) {
      if (!seen.has(i)) outOfBag.push(i);
    }
  }

  return { matrix: sampleMatrix, target: sampleTarget, outOfBag };
}

/** Shuffle rows, keeping each row paired with its target value. */
export function shuffleRows(
  matrix: readonly (readonly number[])[],
  target: readonly number[],
  rng: PRNG,
): { matrix: Matrix; target: number[] } {
  assertPaired(matrix, target);
  const order = shuffle(
    Array.from({ length: matrix.length }, (_, i) => i),
    rng,
  );
  return {
    matrix: order.map((i) => [...matrix[i]!]),
    target: order.map((i) => target[i]!),
  };
}

/**
 * Ordered train/test split. Row i goes to train iff `i <= (n - 1) * ratio`,
 * so 0.8 keeps roughly the first 80% for training. Shuffle first if the
 * input is sorted.
 */
export function trainTestSplit(
  matrix: readonly (readonly number[])[],
  target: readonly number[],
  ratio: number,
): {
  train: { matrix: Matrix; target: number[] };
  test: { matrix: Matrix; target: number[] };
} {
  if (!(ratio > 0 && ratio < 1)) {
    throw new RangeError('ratio must be between 0 and 1');
  }
  assertPaired(matrix, target);
  const cutPoint = (matrix.length - 1) * ratio;
  const filter = Array.from({ length: matrix.length }, (_, i) => i <= cutPoint);
  const [trainMatrix, testMatrix] = splitRows(matrix, filter);
  const [trainTarget, testTarget] = splitArray(target, filter);
  return {
    train: { matrix: trainMatrix, target: trainTarget },
    test: { matrix: testMatrix, target: testTarget },
  };
}

/**
 * Yield one boolean filter per fold. `false` marks the rows held out for
 * testing in that fold; rows past `k * floor(size / k)` are never held out.
 */
export function* kFoldFilters(size: number, k: number): Generator<boolean[], void, undefined> {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError('k must be a positive integer');
  }
  const foldSize = Math.floor(size / k);
  for (let fold = 0; fold < k; fold++) {
    const start = fold * foldSize;
    const end = start + foldSize;
    yield Array.from({ length: size }, (_, i) => i < start || i >= end);
  }
}

/** Count occurrences of each value, keyed in first-seen order. */
export function elementCounts(values: readonly number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const v of values) {
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  return counts;
}

/** Label counts and proportions, ordered by label. */
export function classProportions(target: readonly number[]): LabelProportion[] {
  const counts = elementCounts(target);
  const total = target.length;
  return [...counts.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([label, count]) => ({ label, count, proportion: count / total }));
}

/** Distinct values in ascending order. */
export function distinctSorted(values: readonly number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}
