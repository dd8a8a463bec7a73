import { describe, it, test, expect } from 'vitest';
import fc from 'fast-check';
import { gini, stdevP } from '@arbor/data-utils';
import { bestSplit, bestSplitMatrix, partitionByColumn } from '../split/split-search.js';

// ---------------------------------------------------------------------------
// bestSplit
// ---------------------------------------------------------------------------

describe('bestSplit', () => {
  it('finds the midpoint that separates two pure halves', () => {
    expect(bestSplit([1, 2, 3, 4], [0, 0, 1, 1], gini)).toEqual({ splitPoint: 2.5, gain: 0.5 });
  });

  it('sorts values before scanning', () => {
    expect(bestSplit([4, 1, 3, 2], [1, 0, 1, 0], gini)).toEqual({ splitPoint: 2.5, gain: 0.5 });
  });

  it('keeps the first split on an exact tie', () => {
    // 1.5 and 2.5 both gain 1/9
    const result = bestSplit([1, 2, 3], [0, 1, 0], gini);
    expect(result.splitPoint).toBe(1.5);
    expect(result.gain).toBeCloseTo(1 / 9, 12);
  });

  it('skips candidates between equal values', () => {
    // Only 1.5 is a candidate; 1|1 is not a boundary
    const result = bestSplit([1, 1, 2], [0, 0, 1], gini);
    expect(result.splitPoint).toBe(1.5);
    expect(result.gain).toBeCloseTo(4 / 9, 12);
  });

  it('returns min - 1 with zero gain when every value is identical', () => {
    expect(bestSplit([5, 5, 5], [0, 1, 0], gini)).toEqual({ splitPoint: 4, gain: 0 });
  });

  it('returns zero gain for empty input', () => {
    expect(bestSplit([], [], gini)).toEqual({ splitPoint: 0, gain: 0 });
  });

  it('works with a regression purity function', () => {
    // stdevP([1,1,1,5,5,5]) = 2; both halves have zero spread
    expect(bestSplit([1, 2, 3, 10, 11, 12], [1, 1, 1, 5, 5, 5], stdevP)).toEqual({
      splitPoint: 6.5,
      gain: 2,
    });
  });

  test('a constant target never yields a positive gain', () => {
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: -20, max: 20 }), { minLength: 1, maxLength: 30 }),
        fc.integer({ min: 0, max: 9 }),
        (values, label) => {
          const target = values.map(() => label);
          return (
            bestSplit(values, target, gini).gain === 0 &&
            bestSplit(values, target, stdevP).gain === 0
          );
        },
      ),
    );
  });

  test('gain is never negative', () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.integer({ min: 0, max: 10 }), fc.integer({ min: 0, max: 3 })), {
          minLength: 1,
          maxLength: 30,
        }),
        (pairs) => {
          const values = pairs.map(([v]) => v);
          const target = pairs.map(([, t]) => t);
          return bestSplit(values, target, gini).gain >= 0;
        },
      ),
    );
  });
});

// ---------------------------------------------------------------------------
// bestSplitMatrix
// ---------------------------------------------------------------------------

describe('bestSplitMatrix', () => {
  // Column 0 is weakly informative, column 1 is constant, column 2 is perfect
  const matrix = [
    [1, 5, 0],
    [3, 5, 0],
    [2, 5, 1],
    [4, 5, 1],
  ];
  const target = [0, 0, 1, 1];

  it('scans every column without subsampling', () => {
    expect(bestSplitMatrix(matrix, target, gini, 0, () => 0)).toEqual({
      columnIndex: 2,
      splitPoint: 0.5,
      gain: 0.5,
    });
  });

  it('treats randomFeatures >= columns as a full scan', () => {
    expect(bestSplitMatrix(matrix, target, gini, 3, () => 0).columnIndex).toBe(2);
  });

  it('scans only the sampled columns', () => {
    // rng 0 keeps column 0 in the first slot
    const first = bestSplitMatrix(matrix, target, gini, 1, () => 0);
    expect(first.columnIndex).toBe(0);
    expect(first.splitPoint).toBe(1.5);
    expect(first.gain).toBeCloseTo(1 / 6, 12);

    // rng 0.99 swaps column 2 into the first slot
    const last = bestSplitMatrix(matrix, target, gini, 1, () => 0.99);
    expect(last).toEqual({ columnIndex: 2, splitPoint: 0.5, gain: 0.5 });
  });

  it('prefers the lower column index when two columns gain equally', () => {
    const duplicated = [
      [1, 1],
      [2, 2],
      [3, 3],
      [4, 4],
    ];
    expect(bestSplitMatrix(duplicated, target, gini, 0, () => 0)).toEqual({
      columnIndex: 0,
      splitPoint: 2.5,
      gain: 0.5,
    });

    // Draws 0.99 then 0 sample columns [2, 1]; the scan runs them in index order
    const draws = [0.99, 0];
    let next = 0;
    const sequence = () => draws[next++] ?? 0;
    const padded = duplicated.map((row) => [5, ...row]);
    expect(bestSplitMatrix(padded, target, gini, 2, sequence)).toEqual({
      columnIndex: 1,
      splitPoint: 2.5,
      gain: 0.5,
    });
  });

  it('falls back to column 0 with zero gain when nothing helps', () => {
    expect(bestSplitMatrix(matrix, [1, 1, 1, 1], gini, 0, () => 0)).toEqual({
      columnIndex: 0,
      splitPoint: 0,
      gain: 0,
    });
  });
});

// ---------------------------------------------------------------------------
// partitionByColumn
// ---------------------------------------------------------------------------

describe('partitionByColumn', () => {
  it('sends rows strictly above the split to yes', () => {
    const { yes, no } = partitionByColumn([[1], [2], [3], [2.5]], [10, 20, 30, 25], 0, 2.5);
    expect(yes).toEqual({ matrix: [[3]], target: [30] });
    expect(no).toEqual({ matrix: [[1], [2], [2.5]], target: [10, 20, 25] });
  });
});
