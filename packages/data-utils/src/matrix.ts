// ---------------------------------------------------------------------------
// Row-major matrix helpers
// ---------------------------------------------------------------------------

/** Dense row-major feature matrix (rows x columns). */
export type Matrix = number[][];

/** Column count of the first row; 0 for an empty matrix. */
export function columnCount(matrix: readonly (readonly number[])[]): number {
  return (matrix[0] ?? []).length;
}

/** True when every row has the same length as the first. */
export function isRectangular(matrix: readonly (readonly number[])[]): boolean {
  const width = columnCount(matrix);
  for (const row of matrix) {
    if (row.length !== width) return false;
  }
  return true;
}

/** Deep copy; rows never alias the input. */
export function cloneMatrix(matrix: readonly (readonly number[])[]): Matrix {
  return matrix.map((row) => [...row]);
}

export function getRow(matrix: readonly (readonly number[])[], index: number): number[] {
  const row = matrix[index];
  if (row === undefined) {
    throw new RangeError(`Row ${index} is out of range`);
  }
  return [...row];
}

export function getColumn(matrix: readonly (readonly number[])[], index: number): number[] {
  if (index < 0 || index >= columnCount(matrix)) {
    throw new RangeError(`Column ${index} is out of range`);
  }
  return matrix.map((row) => row[index] ?? 0);
}

/** Build a row-major matrix from a list of equal-length columns. */
export function fromColumns(columns: readonly (readonly number[])[]): Matrix {
  const rows = (columns[0] ?? []).length;
  const result: Matrix = [];
  for (let r = 0; r < rows; r++) {
    result.push(columns.map((col) => col[r] ?? 0));
  }
  return result;
}

/**
 * Split values by a boolean filter: `true` entries go left, `false` right.
 */
export function splitArray<T>(values: readonly T[], filter: readonly boolean[]): [T[], T[]] {
  if (values.length !== filter.length) {
    throw new RangeError('Inputs must be same length');
  }
  const lhs: T[] = [];
  const rhs: T[] = [];
  for (let i = 0; i < values.length; i++) {
    if (filter[i]) {
      lhs.push(values[i]!);
    } else {
      rhs.push(values[i]!);
    }
  }
  return [lhs, rhs];
}

/** Row-wise variant of {@link splitArray}; rows are copied. */
export function splitRows(
  matrix: readonly (readonly number[])[],
  filter: readonly boolean[],
): [Matrix, Matrix] {
  const [lhs, rhs] = splitArray(matrix, filter);
  return [cloneMatrix(lhs), cloneMatrix(rhs)];
}
