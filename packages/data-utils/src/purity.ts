// ---------------------------------------------------------------------------
// Purity functions and descriptive statistics
// ---------------------------------------------------------------------------
// A purity function maps a slice of target values to a non-negative
// impurity score where 0 means perfectly homogeneous.
// ---------------------------------------------------------------------------

/** Impurity of a slice of target values. */
export type PurityFn = (values: readonly number[]) => number;

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i] ?? 0;
  }
  return sum / values.length;
}

/** Population variance (mean squared deviation). */
export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  let sumSq = 0;
  for (let i = 0; i < values.length; i++) {
    const diff = (values[i] ?? 0) - m;
    sumSq += diff * diff;
  }
  return sumSq / values.length;
}

/** Population standard deviation. Usable as a regression purity function. */
export function stdevP(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

/**
 * Gini index of a set of discrete labels: `1 - Σ p_k²`.
 * Returns 0 for an empty slice.
 */
export function gini(values: readonly number[]): number {
  const n = values.length;
  if (n === 0) return 0;
  const counts = new Map<number, number>();
  for (const v of values) {
    counts.set(v, (counts.get(v) ?? 0) + 1);
  }
  let result = 1;
  for (const count of counts.values()) {
    const p = count / n;
    result -= p * p;
  }
  return result;
}

/** True when every value equals the first (and for empty input). */
export function allEqual(values: readonly number[]): boolean {
  if (values.length <= 1) return true;
  const first = values[0];
  for (let i = 1; i < values.length; i++) {
    if (values[i] !== first) return false;
  }
  return true;
}
