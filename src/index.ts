/**
 * Grid Courier
 *
 * A delivery agent that plans over a weighted grid with BFS, UCS, A*,
 * temporal A* or hill climbing, and replans when moving obstacles get in
 * the way.
 */

// Domain exports
export * from './domain/types.js';
export * from './domain/constants.js';

// Environment exports
export * from './environment/grid-environment.js';

// Solver exports
export * from './solver/index.js';

// Agent exports
export * from './agent/delivery-agent.js';

// I/O exports
export * from './io/map-parser.js';
export * from './io/grid-formatter.js';
