/**
 * Flow engine - barrel export
 */

export * from './errors.js';
export * from './graph.js';
export * from './residual.js';
export * from './path-finder.js';
export * from './solver.js';
export * from './extractor.js';
export * from './min-cut.js';
export * from './decomposer.js';
