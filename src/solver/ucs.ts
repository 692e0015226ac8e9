/**
 * Uniform-cost search: least terrain cost, no heuristic
 */

import { Environment, PathfindingAlgorithm, Position, SearchResult } from '../domain/types.js';
import { bestFirstSearch } from './best-first.js';

const zeroHeuristic = (): number => 0;

export class UniformCostSearch implements PathfindingAlgorithm {
  readonly name = 'UCS';

  constructor(private readonly environment: Environment) {}

  findPath(start: Position, goal: Position, startTime = 0): SearchResult {
    return bestFirstSearch(this.environment, start, goal, zeroHeuristic, this.name, startTime);
  }
}
