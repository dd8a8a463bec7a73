// ---------------------------------------------------------------------------
// Recursive tree induction
// ---------------------------------------------------------------------------
// Growth appends nodes depth-first into an arena. A decision node reserves
// its slot before its children are grown, so children always carry higher
// indices than their parent. Counters live in an explicit context that is
// threaded through the recursion rather than on the tree instance.
// ---------------------------------------------------------------------------

import { allEqual } from '@arbor/data-utils';
import type { Matrix, PRNG, PurityFn } from '@arbor/data-utils';
import type { DecisionNode, TreeMode, TreeNode } from '../types.js';
import { bestSplitMatrix, partitionByColumn } from '../split/split-search.js';
import { createLeaf } from './nodes.js';

export interface GrowthSettings {
  mode: TreeMode;
  purityFn: PurityFn;
  maxDepth: number;
  minRowsPerNode: number;
  randomFeatures: number;
  maxRecursions: number;
  maxSplits: number;
  rng: PRNG;
}

export interface GrowthContext {
  recursions: number;
  splits: number;
  /** Deepest level reached; the root is depth 1. */
  maxDepthReached: number;
  /** Set when a hard cap, not a stopping rule, forced a leaf. */
  capped: boolean;
}

/** Rows still owned by an unfinished node; cleared once partitioned. */
interface WorkingSet {
  matrix: Matrix;
  target: number[];
}

export function createGrowthContext(): GrowthContext {
  return { recursions: 0, splits: 0, maxDepthReached: 0, capped: false };
}

/** Grow a full arena from `matrix`/`target`, which the caller hands over. */
export function growTree(
  matrix: Matrix,
  target: number[],
  settings: GrowthSettings,
  ctx: GrowthContext,
): TreeNode[] {
  const nodes: TreeNode[] = [];
  grow(nodes, { matrix, target }, 0, settings, ctx);
  return nodes;
}

function emitLeaf(nodes: TreeNode[], mode: TreeMode, target: readonly number[]): number {
  const index = nodes.length;
  nodes.push(createLeaf(mode, index, target));
  return index;
}

function grow(
  nodes: TreeNode[],
  data: WorkingSet,
  parentDepth: number,
  settings: GrowthSettings,
  ctx: GrowthContext,
): number {
  ctx.recursions += 1;
  const depth = parentDepth + 1;
  if (depth > ctx.maxDepthReached) ctx.maxDepthReached = depth;

  const { matrix, target } = data;
  const recordCount = target.length;

  const capHit = ctx.recursions > settings.maxRecursions || ctx.splits > settings.maxSplits;
  if (capHit) ctx.capped = true;
  if (
    capHit ||
    depth > settings.maxDepth ||
    recordCount < settings.minRowsPerNode ||
    allEqual(target)
  ) {
    return emitLeaf(nodes, settings.mode, target);
  }

  const split = bestSplitMatrix(
    matrix,
    target,
    settings.purityFn,
    settings.randomFeatures,
    settings.rng,
  );
  if (split.gain <= 0) {
    return emitLeaf(nodes, settings.mode, target);
  }

  const { yes, no } = partitionByColumn(matrix, target, split.columnIndex, split.splitPoint);
  const yesCount = yes.target.length;
  const noCount = no.target.length;
  if (
    yesCount === 0 ||
    noCount === 0 ||
    yesCount < settings.minRowsPerNode ||
    noCount < settings.minRowsPerNode
  ) {
    return emitLeaf(nodes, settings.mode, target);
  }

  // The children now hold every row; drop the parent's copy before descending
  data.matrix = [];
  data.target = [];

  const nodeIndex = nodes.length;
  const node: DecisionNode = {
    kind: 'decision',
    index: nodeIndex,
    columnIndex: split.columnIndex,
    splitPoint: split.splitPoint,
    yesIndex: -1,
    noIndex: -1,
    purityGain: split.gain,
    recordCount,
  };
  nodes.push(node);
  ctx.splits += 1;

  node.yesIndex = grow(nodes, yes, depth, settings, ctx);
  node.noIndex = grow(nodes, no, depth, settings, ctx);
  return nodeIndex;
}
