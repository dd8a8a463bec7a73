// ---------------------------------------------------------------------------
// Decision trees & forests: Core Types
// ---------------------------------------------------------------------------

export type { Matrix, PurityFn, PRNG } from '@arbor/data-utils';

export type TreeMode = 'classification' | 'regression';

// ---------------------------------------------------------------------------
// Node arena
// ---------------------------------------------------------------------------

/**
 * Internal split. A row goes to `yesIndex` iff
 * `row[columnIndex] > splitPoint`, otherwise to `noIndex`.
 */
export interface DecisionNode {
  kind: 'decision';
  index: number;
  columnIndex: number;
  splitPoint: number;
  yesIndex: number;
  noIndex: number;
  purityGain: number;
  recordCount: number;
}

export interface ClassificationLeaf {
  kind: 'leaf';
  mode: 'classification';
  index: number;
  recordCount: number;
  /** Majority label among the training rows that reached this leaf. */
  predicted: number;
  classCounts: Map<number, number>;
}

export interface RegressionLeaf {
  kind: 'leaf';
  mode: 'regression';
  index: number;
  recordCount: number;
  /** Mean target of the training rows that reached this leaf. */
  predicted: number;
}

export type LeafNode = ClassificationLeaf | RegressionLeaf;

export type TreeNode = DecisionNode | LeafNode;

// ---------------------------------------------------------------------------
// Search & prediction results
// ---------------------------------------------------------------------------

export interface SplitCandidate {
  splitPoint: number;
  gain: number;
}

export interface ColumnSplit extends SplitCandidate {
  columnIndex: number;
}

export interface ClassCountPrediction {
  predicted: number;
  counts: Map<number, number>;
}

export interface ClassProbabilityPrediction {
  predicted: number;
  probabilities: Map<number, number>;
}

/** Training metadata needed to rebuild a tree from a stored arena. */
export interface TreeMetadata {
  minColumns: number;
  inputRecordCount: number;
  classes?: number[];
}
