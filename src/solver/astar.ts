/**
 * A* Search over static terrain
 */

import { Environment, HeuristicName, PathfindingAlgorithm, Position, SearchResult } from '../domain/types.js';
import { DEFAULT_SEARCH_OPTIONS } from '../domain/constants.js';
import { bestFirstSearch } from './best-first.js';
import { getHeuristic } from './heuristics.js';

export class AStarSearch implements PathfindingAlgorithm {
  readonly name = 'A*';

  constructor(
    private readonly environment: Environment,
    readonly heuristic: HeuristicName = DEFAULT_SEARCH_OPTIONS.heuristic
  ) {}

  findPath(start: Position, goal: Position, startTime = 0): SearchResult {
    return bestFirstSearch(
      this.environment,
      start,
      goal,
      getHeuristic(this.heuristic),
      this.name,
      startTime
    );
  }
}
