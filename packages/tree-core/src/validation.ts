// ---------------------------------------------------------------------------
// Input checks shared by trees and forests
// ---------------------------------------------------------------------------

import { columnCount, isRectangular } from '@arbor/data-utils';
import { ErrorMessages, ModelError } from './errors.js';

/** Non-empty, rectangular matrix with a target of matching length. */
export function assertTrainingInput(
  matrix: readonly (readonly number[])[],
  target: readonly number[],
): void {
  if (matrix.length === 0 || target.length === 0 || columnCount(matrix) === 0) {
    throw new ModelError('empty-input', ErrorMessages.emptyInput);
  }
  if (matrix.length !== target.length) {
    throw new ModelError('shape-mismatch', ErrorMessages.lengthMismatch, {
      rows: matrix.length,
      targetLength: target.length,
    });
  }
  if (!isRectangular(matrix)) {
    throw new ModelError('shape-mismatch', ErrorMessages.notRectangular);
  }
}

/** Trained model, non-empty rectangular input with the trained column count. */
export function assertInferenceInput(
  matrix: readonly (readonly number[])[],
  trained: boolean,
  minColumns: number,
): void {
  if (!trained) {
    throw new ModelError('untrained', ErrorMessages.untrained);
  }
  if (matrix.length === 0) {
    throw new ModelError('empty-input', ErrorMessages.emptyInput);
  }
  if (!isRectangular(matrix)) {
    throw new ModelError('shape-mismatch', ErrorMessages.notRectangular);
  }
  const columns = columnCount(matrix);
  if (columns !== minColumns) {
    throw new ModelError('shape-mismatch', ErrorMessages.columnMismatch, {
      expected: minColumns,
      actual: columns,
    });
  }
}
