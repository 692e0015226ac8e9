/**
 * Solver module exports
 */

export * from './search-node.js';
export * from './search-result.js';
export * from './heuristics.js';
export * from './random.js';
export * from './best-first.js';
export * from './bfs.js';
export * from './ucs.js';
export * from './astar.js';
export * from './temporal-astar.js';
export * from './hill-climbing.js';
export * from './solver.js';
