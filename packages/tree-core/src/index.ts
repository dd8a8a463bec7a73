// ---------------------------------------------------------------------------
// @arbor/tree-core: decision trees and random forests
// ---------------------------------------------------------------------------

// Types
export * from './types.js';

// Errors, configuration, logging
export * from './errors.js';
export * from './config.js';
export { env, parseLogLevel, parsePoolSize, defaultPoolSize } from './env.js';
export type { LogLevel } from './env.js';
export * from './logger.js';

// Split search
export { bestSplit, bestSplitMatrix, partitionByColumn } from './split/split-search.js';
export type { Partition } from './split/split-search.js';

// Trees
export { BinaryTree } from './tree/binary-tree.js';
export { isLeaf, isDecision, majorityLabel, createLeaf } from './tree/nodes.js';
export { createGrowthContext, growTree } from './tree/induction.js';
export type { GrowthContext, GrowthSettings } from './tree/induction.js';

// Forests
export { RandomForest } from './forest/random-forest.js';

// Concurrency
export { distributeChunks, runPooled } from './concurrency/task-pool.js';
