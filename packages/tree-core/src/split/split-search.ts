// ---------------------------------------------------------------------------
// Split search
// ---------------------------------------------------------------------------

import type { Matrix, PRNG, PurityFn } from '@arbor/data-utils';
import { columnCount, sampleWithoutReplacement } from '@arbor/data-utils';
import type { ColumnSplit, SplitCandidate } from '../types.js';

/**
 * Best threshold on one numeric column for separating `target`.
 *
 * Candidates are midpoints between adjacent distinct sorted values; the
 * gain is `purity(all) - |L|/n * purity(L) - |R|/n * purity(R)`. Only a
 * strictly greater gain replaces the current best, so ties keep the lowest
 * split. When every value is identical no split exists and the result is
 * `min - 1` with zero gain.
 */
export function bestSplit(
  values: readonly number[],
  target: readonly number[],
  purityFn: PurityFn,
): SplitCandidate {
  const n = values.length;
  if (n === 0) return { splitPoint: 0, gain: 0 };

  // Array.prototype.sort is stable, so equal values keep input order
  const order = Array.from({ length: n }, (_, i) => i).sort(
    (a, b) => values[a]! - values[b]!,
  );
  const sortedValues = order.map((i) => values[i]!);
  const sortedTarget = order.map((i) => target[i]!);

  const purityBefore = purityFn(target);
  let bestSplitPoint = 0;
  let bestGain = 0;
  let allSame = true;

  for (let i = 0; i < n - 1; i++) {
    const current = sortedValues[i]!;
    const following = sortedValues[i + 1]!;
    if (current === following) continue;
    allSame = false;

    const left = sortedTarget.slice(0, i + 1);
    const right = sortedTarget.slice(i + 1);
    const gain =
      purityBefore -
      (purityFn(left) * left.length) / n -
      (purityFn(right) * right.length) / n;

    if (gain > bestGain) {
      bestGain = gain;
      bestSplitPoint = (current + following) / 2;
    }
  }

  if (allSame) {
    return { splitPoint: sortedValues[0]! - 1, gain: 0 };
  }
  return { splitPoint: bestSplitPoint, gain: bestGain };
}

/**
 * Scan columns for the best split. With `0 < randomFeatures < columns` only
 * a random subset of that size is scanned (one fresh draw per call). Columns
 * are scanned in ascending order and the first to reach the highest
 * positive gain wins; if none improves purity the result is column 0 with
 * zero gain.
 */
export function bestSplitMatrix(
  matrix: Matrix,
  target: readonly number[],
  purityFn: PurityFn,
  randomFeatures: number,
  rng: PRNG,
): ColumnSplit {
  const columns = columnCount(matrix);
  let columnIndices = Array.from({ length: columns }, (_, i) => i);
  if (randomFeatures > 0 && randomFeatures < columns) {
    columnIndices = sampleWithoutReplacement(columnIndices, randomFeatures, rng).sort(
      (a, b) => a - b,
    );
  }

  let best: ColumnSplit = { columnIndex: 0, splitPoint: 0, gain: 0 };
  for (const columnIndex of columnIndices) {
    const column = matrix.map((row) => row[columnIndex] ?? 0);
    const candidate = bestSplit(column, target, purityFn);
    if (candidate.gain > best.gain) {
      best = { columnIndex, ...candidate };
    }
  }
  return best;
}

export interface Partition {
  yes: { matrix: Matrix; target: number[] };
  no: { matrix: Matrix; target: number[] };
}

/** Rows with `row[columnIndex] > splitPoint` go to `yes`, the rest to `no`. */
export function partitionByColumn(
  matrix: Matrix,
  target: readonly number[],
  columnIndex: number,
  splitPoint: number,
): Partition {
  const yes: Partition['yes'] = { matrix: [], target: [] };
  const no: Partition['no'] = { matrix: [], target: [] };
  for (let i = 0; i < matrix.length; i++) {
    const row = matrix[i]!;
    const side = (row[columnIndex] ?? 0) > splitPoint ? yes : no;
    side.matrix.push(row);
    side.target.push(target[i]!);
  }
  return { yes, no };
}
