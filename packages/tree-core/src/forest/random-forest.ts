// ---------------------------------------------------------------------------
// Random forest
// ---------------------------------------------------------------------------

import {
  classificationAccuracy,
  columnCount,
  createPRNG,
  deriveSeed,
  distinctSorted,
  elementCounts,
  mean,
  rSquared,
} from '@arbor/data-utils';
import type { Matrix } from '@arbor/data-utils';
import type { ForestConfig, ForestOptions } from '../config.js';
import { parseForestOptions } from '../config.js';
import { distributeChunks, runPooled } from '../concurrency/task-pool.js';
import { env } from '../env.js';
import { ErrorMessages, ModelError } from '../errors.js';
import type { Logger } from '../logger.js';
import { createLogger } from '../logger.js';
import { BinaryTree } from '../tree/binary-tree.js';
import { majorityLabel } from '../tree/nodes.js';
import type { ClassProbabilityPrediction, TreeMode } from '../types.js';
import { assertInferenceInput, assertTrainingInput } from '../validation.js';

/**
 * Random forest of binary decision trees.
 *
 * Each tree is trained on its own bootstrap sample with per-split random
 * feature subsampling, so trees share no mutable state and train
 * concurrently on the task pool. Predictions average tree outputs
 * (regression) or take a majority vote (classification, ties to the lowest
 * label).
 */
export class RandomForest {
  readonly config: ForestConfig;
  private readonly logger: Logger;
  private trees: BinaryTree[] = [];

  /** Column count of the training matrix. */
  minColumns = 0;
  /** Row count of the training matrix. */
  inputRecordCount = 0;
  /** Distinct training labels, ascending (classification only). */
  classes: number[] = [];
  /** Features scanned per split, resolved at training time. */
  randomFeatures: number;
  /**
   * Accuracy (classification) or R² (regression) on out-of-bag rows, when
   * `recordOutOfBag` is set and at least one row was left out of a sample.
   */
  outOfBagScore: number | undefined = undefined;

  constructor(options: ForestOptions) {
    this.config = parseForestOptions(options);
    this.logger = this.config.logger ?? createLogger('forest');
    this.randomFeatures = this.config.randomFeatures;
  }

  get mode(): TreeMode {
    return this.config.mode;
  }

  get isTrained(): boolean {
    return this.trees.length > 0;
  }

  get treeCount(): number {
    return this.trees.length;
  }

  getTrees(): readonly BinaryTree[] {
    return this.trees;
  }

  /** Assemble a forest from already-trained trees with matching shape. */
  static fromTrees(options: ForestOptions, trees: readonly BinaryTree[]): RandomForest {
    const forest = new RandomForest(options);
    const first = trees[0];
    if (first === undefined) {
      throw new ModelError('invalid-configuration', 'A forest needs at least one tree');
    }
    for (const tree of trees) {
      if (!tree.isTrained) {
        throw new ModelError('invalid-configuration', 'Every tree must be trained');
      }
      if (tree.mode !== forest.mode) {
        throw new ModelError('invalid-configuration', `Tree mode ${tree.mode} does not match forest mode ${forest.mode}`);
      }
      if (tree.minColumns !== first.minColumns) {
        throw new ModelError('invalid-configuration', 'Trees were trained on different column counts');
      }
    }
    forest.trees = [...trees];
    forest.minColumns = first.minColumns;
    forest.inputRecordCount = first.inputRecordCount;
    forest.classes = distinctSorted(trees.flatMap((tree) => tree.classes));
    return forest;
  }

  // -----------------------------------------------------------------------
  // Training
  // -----------------------------------------------------------------------

  /**
   * Train `treeCount` fresh trees, discarding any previous ones. The new
   * trees and metadata replace the old ones only once every tree is
   * trained, so predictions already in flight keep using the old forest.
   */
  async train(matrix: Matrix, target: number[]): Promise<void> {
    assertTrainingInput(matrix, target);
    const { config } = this;

    const minColumns = columnCount(matrix);
    const classes = config.mode === 'classification' ? distinctSorted(target) : [];
    const randomFeatures =
      config.randomFeatures === 0
        ? Math.max(1, Math.round(Math.sqrt(minColumns)))
        : config.randomFeatures;

    // One seed per tree keeps results independent of scheduling order
    const seedStream = createPRNG(config.seed);
    const trees: BinaryTree[] = [];
    for (let t = 0; t < config.treeCount; t++) {
      trees.push(
        new BinaryTree({
          mode: config.mode,
          purityFn: config.purityFn,
          maxDepth: config.maxDepth,
          minRowsPerNode: config.minRowsPerNode,
          randomFeatures,
          bootstrap: config.bootstrap,
          recordOutOfBag: config.bootstrap && config.recordOutOfBag,
          seed: deriveSeed(seedStream),
          logger: this.logger,
        }),
      );
    }

    await runPooled(
      trees.map((tree) => () => tree.train(matrix, target, true)),
      this.poolSize(),
    );

    const outOfBagScore =
      config.recordOutOfBag && config.bootstrap
        ? this.scoreOutOfBag(trees, matrix, target)
        : undefined;

    this.trees = trees;
    this.minColumns = minColumns;
    this.inputRecordCount = matrix.length;
    this.classes = classes;
    this.randomFeatures = randomFeatures;
    this.outOfBagScore = outOfBagScore;

    this.logger.info('forest trained', {
      mode: config.mode,
      trees: trees.length,
      rows: this.inputRecordCount,
      columns: minColumns,
      randomFeatures,
      outOfBagScore,
    });
  }

  // -----------------------------------------------------------------------
  // Inference
  // -----------------------------------------------------------------------

  /** Mean prediction (regression) or majority vote (classification) per row. */
  async predict(matrix: Matrix): Promise<number[]> {
    assertInferenceInput(matrix, this.isTrained, this.minColumns);
    const trees = this.trees;
    return this.mapRows(matrix, (row) => {
      const votes = trees.map((tree) => tree.predict([row], true)[0]!);
      return this.config.mode === 'regression' ? mean(votes) : majorityLabel(elementCounts(votes));
    });
  }

  /**
   * Majority vote plus class probabilities: each tree's leaf probabilities
   * are summed per label, then renormalised by the total mass.
   */
  async predictWithProbabilities(matrix: Matrix): Promise<ClassProbabilityPrediction[]> {
    if (this.config.mode !== 'classification') {
      throw new ModelError('mode-mismatch', ErrorMessages.classificationOnly);
    }
    assertInferenceInput(matrix, this.isTrained, this.minColumns);
    const trees = this.trees;
    return this.mapRows(matrix, (row) => {
      const votes = new Map<number, number>();
      const mass = new Map<number, number>();
      let total = 0;
      for (const tree of trees) {
        const { predicted, probabilities } = tree.predictWithProbabilities([row], true)[0]!;
        votes.set(predicted, (votes.get(predicted) ?? 0) + 1);
        for (const [label, p] of probabilities) {
          mass.set(label, (mass.get(label) ?? 0) + p);
          total += p;
        }
      }
      const probabilities = new Map<number, number>();
      for (const [label, p] of mass) {
        probabilities.set(label, total > 0 ? p / total : 0);
      }
      return { predicted: majorityLabel(votes), probabilities };
    });
  }

  /** Element-wise mean of every tree's weighted purity gains. */
  purityGains(): number[] {
    if (!this.isTrained) {
      throw new ModelError('untrained', ErrorMessages.untrained);
    }
    const totals = new Array<number>(this.minColumns).fill(0);
    for (const tree of this.trees) {
      const gains = tree.purityGains();
      for (let c = 0; c < this.minColumns; c++) {
        totals[c] = (totals[c] ?? 0) + (gains[c] ?? 0);
      }
    }
    return totals.map((sum) => sum / this.trees.length);
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private poolSize(): number {
    return this.config.concurrency ?? env.POOL_SIZE;
  }

  /** Apply `fn` to every row, one pool task per contiguous chunk of rows. */
  private async mapRows<T>(matrix: Matrix, fn: (row: number[]) => T): Promise<T[]> {
    const size = this.poolSize();
    const chunks = distributeChunks(matrix.length, size);
    const parts = await runPooled(
      chunks.map(({ offset, length }) => () => matrix.slice(offset, offset + length).map(fn)),
      size,
    );
    return parts.flat();
  }

  /** Score each training row using only the trees that never saw it. */
  private scoreOutOfBag(
    trees: readonly BinaryTree[],
    matrix: Matrix,
    target: readonly number[],
  ): number | undefined {
    const votesByRow = new Map<number, number[]>();
    for (const tree of trees) {
      for (const rowIndex of tree.outOfBagIndices) {
        const prediction = tree.predict([matrix[rowIndex]!], true)[0]!;
        const votes = votesByRow.get(rowIndex);
        if (votes === undefined) {
          votesByRow.set(rowIndex, [prediction]);
        } else {
          votes.push(prediction);
        }
      }
    }
    if (votesByRow.size === 0) return undefined;

    const actuals: number[] = [];
    const predictions: number[] = [];
    for (const [rowIndex, votes] of [...votesByRow].sort((a, b) => a[0] - b[0])) {
      actuals.push(target[rowIndex]!);
      predictions.push(
        this.config.mode === 'regression' ? mean(votes) : majorityLabel(elementCounts(votes)),
      );
    }
    return this.config.mode === 'regression'
      ? rSquared(actuals, predictions).rSquared
      : classificationAccuracy(actuals, predictions);
  }
}
