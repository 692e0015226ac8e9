/**
 * Algorithm selection by name
 */

import { AlgorithmName, Environment, PathfindingAlgorithm, SearchOptions } from '../domain/types.js';
import { ALGORITHM_NAMES, DEFAULT_SEARCH_OPTIONS } from '../domain/constants.js';
import { BreadthFirstSearch } from './bfs.js';
import { UniformCostSearch } from './ucs.js';
import { AStarSearch } from './astar.js';
import { TemporalAStarSearch } from './temporal-astar.js';
import { HillClimbingReplanner } from './hill-climbing.js';

export function isAlgorithmName(value: string): value is AlgorithmName {
  return ALGORITHM_NAMES.some(name => name === value);
}

export function assertAlgorithmName(value: string): asserts value is AlgorithmName {
  if (!isAlgorithmName(value)) {
    throw new Error(`Unknown algorithm: ${value} (expected one of ${ALGORITHM_NAMES.join(', ')})`);
  }
}

/**
 * Build the algorithm registered under `name`. Unknown names throw.
 */
export function createAlgorithm(
  name: string,
  environment: Environment,
  options: Partial<SearchOptions> = {}
): PathfindingAlgorithm {
  assertAlgorithmName(name);
  const opts: SearchOptions = { ...DEFAULT_SEARCH_OPTIONS, ...options };

  switch (name) {
    case 'bfs':
      return new BreadthFirstSearch(environment);
    case 'ucs':
      return new UniformCostSearch(environment);
    case 'astar':
      return new AStarSearch(environment, opts.heuristic);
    case 'temporal_astar':
      return new TemporalAStarSearch(environment, opts.planningHorizon);
    case 'hill_climbing':
      return new HillClimbingReplanner(environment, opts);
  }
}
