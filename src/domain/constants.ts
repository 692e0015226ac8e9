/**
 * Constants for the grid delivery agent
 */

import { AlgorithmLabel, AlgorithmName, SearchOptions } from './types.js';

export const ALGORITHM_NAMES: readonly AlgorithmName[] = [
  'bfs',
  'ucs',
  'astar',
  'temporal_astar',
  'hill_climbing',
];

export const ALGORITHM_LABELS: Record<AlgorithmName, AlgorithmLabel> = {
  bfs: 'BFS',
  ucs: 'UCS',
  astar: 'A*',
  temporal_astar: 'Temporal A*',
  hill_climbing: 'Hill Climbing',
};

// Default search options
export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  heuristic: 'manhattan',
  planningHorizon: 50,
  maxRestarts: 5,
  maxSegmentLength: 3,
};

// Default executor options
export const DEFAULT_AGENT_OPTIONS = {
  maxSteps: 1000,
  checkArrivalTime: false,
};

// Cost of a temporal wait action
export const WAIT_COST = 1;

// Lowest terrain cost a cell may carry; keeps distance heuristics admissible
export const MIN_TERRAIN_COST = 1;

// Step budget used by the dynamic demo
export const DEMO_MAX_STEPS = 200;
