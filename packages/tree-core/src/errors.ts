// ---------------------------------------------------------------------------
// Model errors
// ---------------------------------------------------------------------------

export type ModelErrorKind =
  | 'shape-mismatch'
  | 'empty-input'
  | 'untrained'
  | 'mode-mismatch'
  | 'invalid-configuration'
  | 'iteration-limit';

export const ErrorMessages = {
  emptyInput: 'Input must not be empty',
  lengthMismatch: 'Inputs must be same length',
  untrained: 'Model must be trained first',
  columnMismatch: 'Same number of columns as trained on needed',
  invalidMode: "Mode must be 'classification' or 'regression'",
  classificationOnly: 'Method only valid in classification mode',
  iterationLimit: 'Maximum iterations exceeded',
  notRectangular: 'All matrix rows must have the same number of columns',
} as const;

/** Rejected input or broken internal state, tagged with its kind. */
export class ModelError extends Error {
  constructor(
    public readonly kind: ModelErrorKind,
    message: string,
    public readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = 'ModelError';
  }
}

export function isModelError(value: unknown): value is ModelError {
  return value instanceof ModelError;
}

/**
 * Fatal errors mean a model's arena is inconsistent; retrying with other
 * input will not help.
 */
export function isFatal(error: unknown): boolean {
  return isModelError(error) && error.kind === 'iteration-limit';
}
