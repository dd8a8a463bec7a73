// ---------------------------------------------------------------------------
// Binary decision tree for classification and regression
// ---------------------------------------------------------------------------

import {
  bootstrap,
  cloneMatrix,
  columnCount,
  createPRNG,
  distinctSorted,
} from '@arbor/data-utils';
import type { Matrix } from '@arbor/data-utils';
import type { TreeConfig, TreeOptions } from '../config.js';
import { parseTreeOptions } from '../config.js';
import { ErrorMessages, ModelError } from '../errors.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import type {
  ClassCountPrediction,
  ClassificationLeaf,
  ClassProbabilityPrediction,
  LeafNode,
  TreeMetadata,
  TreeMode,
  TreeNode,
} from '../types.js';
import { assertInferenceInput, assertTrainingInput } from '../validation.js';
import { createGrowthContext, growTree } from './induction.js';

/**
 * CART-style binary decision tree.
 *
 * Nodes live in an append-only arena and reference their children by
 * index; node 0 is the root. `train` replaces the arena, after which every
 * prediction method is read-only and can be called any number of times.
 *
 * Classification leaves keep per-label counts, so the tree can report
 * class probabilities as well as the majority label. Regression leaves
 * predict the mean target.
 */
export class BinaryTree {
  readonly config: TreeConfig;
  private readonly logger: Logger;
  private nodes: TreeNode[] = [];

  /** Distinct training labels, ascending (classification only). */
  classes: number[] = [];
  /** Column count of the training matrix. */
  minColumns = 0;
  /** Row count of the training matrix. */
  inputRecordCount = 0;
  /** Deepest level grown during the last `train`; the root is depth 1. */
  depth = 0;
  /** Training rows left out of the bootstrap sample, when recorded. */
  outOfBagIndices: number[] = [];

  constructor(options: TreeOptions) {
    this.config = parseTreeOptions(options);
    this.logger = this.config.logger ?? createLogger('tree');
  }

  get mode(): TreeMode {
    return this.config.mode;
  }

  get isTrained(): boolean {
    return this.nodes.length > 0;
  }

  /** Read-only view of the node arena. */
  getNodes(): readonly TreeNode[] {
    return this.nodes;
  }

  /**
   * Build a tree from an existing arena. The arena is copied and checked:
   * indices must match positions, children must follow their parent and
   * stay in range, and every leaf must match the configured mode.
   */
  static fromNodes(options: TreeOptions, nodes: readonly TreeNode[], meta: TreeMetadata): BinaryTree {
    const tree = new BinaryTree(options);
    validateArena(nodes, tree.mode, meta.minColumns);
    if (!Number.isInteger(meta.inputRecordCount) || meta.inputRecordCount < 1) {
      throw new ModelError('invalid-configuration', 'inputRecordCount must be a positive integer');
    }

    tree.nodes = nodes.map(copyNode);
    tree.minColumns = meta.minColumns;
    tree.inputRecordCount = meta.inputRecordCount;
    tree.classes =
      tree.mode === 'classification'
        ? meta.classes !== undefined
          ? [...meta.classes].sort((a, b) => a - b)
          : labelsInArena(tree.nodes)
        : [];
    tree.depth = arenaDepth(tree.nodes);
    return tree;
  }

  // -----------------------------------------------------------------------
  // Training
  // -----------------------------------------------------------------------

  /**
   * Grow the tree from `matrix` (n x d) and `target` (n). Inputs are copied,
   * never modified. `skipChecks` is for callers that already validated the
   * same input, such as a forest training many trees on it.
   */
  train(matrix: Matrix, target: number[], skipChecks = false): void {
    if (!skipChecks) assertTrainingInput(matrix, target);

    const { config } = this;
    const rng = createPRNG(config.seed);
    this.nodes = [];
    this.minColumns = columnCount(matrix);
    this.inputRecordCount = matrix.length;
    this.classes = config.mode === 'classification' ? distinctSorted(target) : [];

    let workMatrix: Matrix;
    let workTarget: number[];
    if (config.bootstrap) {
      const sample = bootstrap(matrix, target, rng, { returnOutOfBag: config.recordOutOfBag });
      workMatrix = sample.matrix;
      workTarget = sample.target;
      this.outOfBagIndices = sample.outOfBag;
    } else {
      workMatrix = cloneMatrix(matrix);
      workTarget = [...target];
      this.outOfBagIndices = [];
    }

    const ctx = createGrowthContext();
    this.nodes = growTree(
      workMatrix,
      workTarget,
      {
        mode: config.mode,
        purityFn: config.purityFn,
        maxDepth: config.maxDepth,
        minRowsPerNode: config.minRowsPerNode,
        randomFeatures: config.randomFeatures,
        maxRecursions: config.maxRecursions,
        maxSplits: config.maxSplits,
        rng,
      },
      ctx,
    );
    this.depth = ctx.maxDepthReached;

    if (ctx.capped) {
      this.logger.warn('growth cap reached; remaining branches emitted as leaves', {
        recursions: ctx.recursions,
        splits: ctx.splits,
        maxRecursions: config.maxRecursions,
        maxSplits: config.maxSplits,
      });
    }
    this.logger.debug('tree trained', {
      mode: config.mode,
      rows: this.inputRecordCount,
      columns: this.minColumns,
      nodes: this.nodes.length,
      splits: ctx.splits,
      depth: this.depth,
    });
  }

  // -----------------------------------------------------------------------
  // Inference
  // -----------------------------------------------------------------------

  /** Predicted label (classification) or value (regression) per row. */
  predict(matrix: Matrix, skipChecks = false): number[] {
    if (!skipChecks) assertInferenceInput(matrix, this.isTrained, this.minColumns);
    return matrix.map((row) => this.findLeaf(row).predicted);
  }

  /** Majority label plus the raw label counts of the leaf each row reaches. */
  predictWithClassCounts(matrix: Matrix, skipChecks = false): ClassCountPrediction[] {
    this.requireClassification();
    if (!skipChecks) assertInferenceInput(matrix, this.isTrained, this.minColumns);
    return matrix.map((row) => {
      const leaf = this.findClassificationLeaf(row);
      return { predicted: leaf.predicted, counts: new Map(leaf.classCounts) };
    });
  }

  /**
   * Majority label plus per-label probabilities (count / leaf record count)
   * of the leaf each row reaches.
   */
  predictWithProbabilities(matrix: Matrix, skipChecks = false): ClassProbabilityPrediction[] {
    this.requireClassification();
    if (!skipChecks) assertInferenceInput(matrix, this.isTrained, this.minColumns);
    return matrix.map((row) => {
      const leaf = this.findClassificationLeaf(row);
      const probabilities = new Map<number, number>();
      for (const [label, count] of leaf.classCounts) {
        probabilities.set(label, count / leaf.recordCount);
      }
      return { predicted: leaf.predicted, probabilities };
    });
  }

  /**
   * Purity gain per input column, each decision node weighted by the share
   * of training rows that reached it.
   */
  purityGains(): number[] {
    if (!this.isTrained) {
      throw new ModelError('untrained', ErrorMessages.untrained);
    }
    const gains = new Array<number>(this.minColumns).fill(0);
    for (const node of this.nodes) {
      if (node.kind !== 'decision') continue;
      gains[node.columnIndex] =
        (gains[node.columnIndex] ?? 0) +
        (node.purityGain * node.recordCount) / this.inputRecordCount;
    }
    return gains;
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private requireClassification(): void {
    if (this.config.mode !== 'classification') {
      throw new ModelError('mode-mismatch', ErrorMessages.classificationOnly);
    }
  }

  /**
   * Walk from the root to a leaf. The walk is bounded by the same cap as
   * training; exceeding it, or meeting a dangling index, means the arena
   * is corrupt.
   */
  private findLeaf(row: readonly number[]): LeafNode {
    if (this.nodes.length === 0) {
      throw new ModelError('untrained', ErrorMessages.untrained);
    }
    let index = 0;
    for (let step = 0; step < this.config.maxRecursions; step++) {
      const node = this.nodes[index];
      if (node === undefined) {
        throw new ModelError('iteration-limit', `Node index ${index} is outside the arena`, {
          index,
          nodes: this.nodes.length,
        });
      }
      if (node.kind === 'leaf') return node;
      index = (row[node.columnIndex] ?? 0) > node.splitPoint ? node.yesIndex : node.noIndex;
    }
    throw new ModelError('iteration-limit', ErrorMessages.iterationLimit, {
      steps: this.config.maxRecursions,
    });
  }

  private findClassificationLeaf(row: readonly number[]): ClassificationLeaf {
    const leaf = this.findLeaf(row);
    if (leaf.mode !== 'classification') {
      throw new ModelError('mode-mismatch', ErrorMessages.classificationOnly, { index: leaf.index });
    }
    return leaf;
  }
}

// ---------------------------------------------------------------------------
// Arena helpers
// ---------------------------------------------------------------------------

function validateArena(nodes: readonly TreeNode[], mode: TreeMode, minColumns: number): void {
  const fail = (message: string, index?: number): never => {
    throw new ModelError('invalid-configuration', message, index === undefined ? undefined : { index });
  };

  if (nodes.length === 0) fail('Arena must contain at least one node');
  if (!Number.isInteger(minColumns) || minColumns < 1) {
    fail('minColumns must be a positive integer');
  }

  nodes.forEach((node, position) => {
    if (node.index !== position) fail(`Node at position ${position} has index ${node.index}`, position);
    if (node.kind === 'leaf') {
      if (node.mode !== mode) fail(`Leaf ${position} is a ${node.mode} leaf in a ${mode} tree`, position);
      return;
    }
    if (node.columnIndex < 0 || node.columnIndex >= minColumns) {
      fail(`Decision node ${position} splits on column ${node.columnIndex}`, position);
    }
    for (const child of [node.yesIndex, node.noIndex]) {
      if (!Number.isInteger(child) || child <= position || child >= nodes.length) {
        fail(`Decision node ${position} has invalid child index ${child}`, position);
      }
    }
  });
}

function copyNode(node: TreeNode): TreeNode {
  if (node.kind === 'leaf' && node.mode === 'classification') {
    return { ...node, classCounts: new Map(node.classCounts) };
  }
  return { ...node };
}

function labelsInArena(nodes: readonly TreeNode[]): number[] {
  const labels = new Set<number>();
  for (const node of nodes) {
    if (node.kind === 'leaf' && node.mode === 'classification') {
      for (const label of node.classCounts.keys()) labels.add(label);
    }
  }
  return [...labels].sort((a, b) => a - b);
}

/** Depth of the deepest leaf; the root is depth 1. */
function arenaDepth(nodes: readonly TreeNode[]): number {
  const depths = new Array<number>(nodes.length).fill(0);
  depths[0] = 1;
  let deepest = 1;
  for (const node of nodes) {
    if (node.kind !== 'decision') continue;
    const childDepth = (depths[node.index] ?? 0) + 1;
    depths[node.yesIndex] = childDepth;
    depths[node.noIndex] = childDepth;
    if (childDepth > deepest) deepest = childDepth;
  }
  return deepest;
}
