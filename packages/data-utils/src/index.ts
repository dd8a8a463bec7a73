// ---------------------------------------------------------------------------
// @arbor/data-utils: feature utilities, purity functions and metrics
// ---------------------------------------------------------------------------

export * from './random.js';
export * from './purity.js';
export * from './matrix.js';
export * from './features.js';
export * from './metrics.js';
