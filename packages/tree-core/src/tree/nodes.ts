// ---------------------------------------------------------------------------
// Node helpers
// ---------------------------------------------------------------------------

import { elementCounts, mean } from '@arbor/data-utils';
import type { DecisionNode, LeafNode, TreeMode, TreeNode } from '../types.js';

/** Type guard: is this node a leaf? */
export function isLeaf(node: TreeNode): node is LeafNode {
  return node.kind === 'leaf';
}

export function isDecision(node: TreeNode): node is DecisionNode {
  return node.kind === 'decision';
}

/**
 * Label with the highest count. Ties go to the lowest numeric label, so
 * the result does not depend on map insertion order.
 */
export function majorityLabel(counts: ReadonlyMap<number, number>): number {
  let bestLabel = Number.NaN;
  let bestCount = -1;
  for (const [label, count] of counts) {
    if (count > bestCount || (count === bestCount && label < bestLabel)) {
      bestLabel = label;
      bestCount = count;
    }
  }
  return bestLabel;
}

/** Leaf summarising the target values that reached it. */
export function createLeaf(mode: TreeMode, index: number, target: readonly number[]): LeafNode {
  if (mode === 'regression') {
    return {
      kind: 'leaf',
      mode,
      index,
      recordCount: target.length,
      predicted: mean(target),
    };
  }
  const classCounts = elementCounts(target);
  return {
    kind: 'leaf',
    mode,
    index,
    recordCount: target.length,
    predicted: majorityLabel(classCounts),
    classCounts,
  };
}
