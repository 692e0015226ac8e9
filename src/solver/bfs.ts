/**
 * Breadth-first search: fewest moves, terrain cost ignored while searching
 */

import { Environment, PathfindingAlgorithm, Position, SearchResult, positionKey, positionsEqual } from '../domain/types.js';
import { SearchNode, createSearchNode } from './search-node.js';
import { failureResult, successResult } from './search-result.js';

export class BreadthFirstSearch implements PathfindingAlgorithm {
  readonly name = 'BFS';

  constructor(private readonly environment: Environment) {}

  findPath(start: Position, goal: Position, startTime = 0): SearchResult {
    const startedAt = Date.now();

    const queue: SearchNode[] = [createSearchNode(start, null, 0, 0, startTime)];
    const visited = new Set<string>([positionKey(start)]);
    let head = 0;
    let nodesExpanded = 0;

    while (head < queue.length) {
      const current = queue[head++];
      nodesExpanded++;

      if (positionsEqual(current.position, goal)) {
        return successResult(this.name, current, nodesExpanded, startedAt);
      }

      for (const neighbor of this.environment.neighbors(current.position)) {
        const key = positionKey(neighbor);
        if (visited.has(key)) continue;
        visited.add(key);

        // g still tracks terrain cost so the reported cost matches the other algorithms
        const g = current.g + this.environment.terrainCost(neighbor);
        queue.push(createSearchNode(neighbor, current, g, 0, startTime));
      }
    }

    return failureResult(this.name, nodesExpanded, startedAt);
  }
}
