// ---------------------------------------------------------------------------
// Model evaluation metrics
// ---------------------------------------------------------------------------

import { mean } from './purity.js';

export interface PrecisionRecall {
  precision: number;
  recall: number;
}

function assertSameLength(a: readonly unknown[], b: readonly unknown[]): void {
  if (a.length !== b.length) {
    throw new RangeError('Inputs must be same length');
  }
}

/** Fraction of predictions equal to the actual label; 0 for empty input. */
export function classificationAccuracy(
  actuals: readonly number[],
  predictions: readonly number[],
): number {
  assertSameLength(actuals, predictions);
  if (actuals.length === 0) return 0;
  let correct = 0;
  for (let i = 0; i < actuals.length; i++) {
    if (actuals[i] === predictions[i]) correct++;
  }
  return correct / actuals.length;
}

export function classificationError(
  actuals: readonly number[],
  predictions: readonly number[],
): number {
  return 1 - classificationAccuracy(actuals, predictions);
}

/**
 * Per-label precision (share of predictions of the label that were right)
 * and recall (share of actual occurrences that were found).
 */
export function classificationMetrics(
  actuals: readonly number[],
  predictions: readonly number[],
): Map<number, PrecisionRecall> {
  assertSameLength(actuals, predictions);
  // [truePositive, falsePositive, falseNegative]
  const tallies = new Map<number, [number, number, number]>();
  const tally = (label: number): [number, number, number] => {
    let entry = tallies.get(label);
    if (entry === undefined) {
      entry = [0, 0, 0];
      tallies.set(label, entry);
    }
    return entry;
  };

  for (let i = 0; i < actuals.length; i++) {
    const actual = actuals[i]!;
    const predicted = predictions[i]!;
    if (actual === predicted) {
      tally(actual)[0]++;
    } else {
      tally(predicted)[1]++;
      tally(actual)[2]++;
    }
  }

  const result = new Map<number, PrecisionRecall>();
  for (const [label, [tp, fp, fn]] of tallies) {
    result.set(label, {
      precision: tp + fp === 0 ? 0 : tp / (tp + fp),
      recall: tp + fn === 0 ? 0 : tp / (tp + fn),
    });
  }
  return result;
}

/** Sum of squared errors. */
export function sse(actuals: readonly number[], predictions: readonly number[]): number {
  assertSameLength(actuals, predictions);
  let sum = 0;
  for (let i = 0; i < actuals.length; i++) {
    const d = (actuals[i] ?? 0) - (predictions[i] ?? 0);
    sum += d * d;
  }
  return sum;
}

/**
 * Coefficient of determination. When `p` (number of explanatory terms) is
 * given, `adjusted` is also computed; otherwise it is 0. For a constant
 * target the score is 1 on an exact fit and 0 otherwise.
 */
export function rSquared(
  actuals: readonly number[],
  predictions: readonly number[],
  p?: number,
): { rSquared: number; adjusted: number } {
  assertSameLength(actuals, predictions);
  const m = mean(actuals);
  let sst = 0;
  for (const a of actuals) {
    sst += (a - m) * (a - m);
  }
  const residual = sse(actuals, predictions);
  // A constant target has no variance to explain
  const rsq = sst === 0 ? (residual === 0 ? 1 : 0) : 1 - residual / sst;
  if (p === undefined) {
    return { rSquared: rsq, adjusted: 0 };
  }
  const n = actuals.length;
  return { rSquared: rsq, adjusted: 1 - (1 - rsq) * ((n - 1) / (n - p - 1)) };
}
