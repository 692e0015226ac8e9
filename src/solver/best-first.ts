/**
 * Priority-ordered search over static terrain, shared by UCS and A*
 */

import {
  AlgorithmLabel,
  Environment,
  HeuristicFunction,
  Position,
  SearchResult,
  positionKey,
  positionsEqual,
} from '../domain/types.js';
import { PriorityQueue, SearchNode, createSearchNode } from './search-node.js';
import { failureResult, successResult } from './search-result.js';

/**
 * Expands positions in order of f = g + h. A position may sit in the frontier
 * several times; only its first pop is expanded, later pops are stale.
 */
export function bestFirstSearch(
  environment: Environment,
  start: Position,
  goal: Position,
  heuristic: HeuristicFunction,
  algorithm: AlgorithmLabel,
  startTime: number
): SearchResult {
  const startedAt = Date.now();

  const frontier = new PriorityQueue<SearchNode>();
  const closed = new Set<string>();
  const bestCost = new Map<string, number>([[positionKey(start), 0]]);

  const startNode = createSearchNode(start, null, 0, heuristic(start, goal), startTime);
  frontier.push(startNode, startNode.f);

  let nodesExpanded = 0;

  while (!frontier.isEmpty()) {
    const current = frontier.pop();
    if (current === undefined) break;

    const key = positionKey(current.position);
    if (closed.has(key)) continue;
    closed.add(key);
    nodesExpanded++;

    if (positionsEqual(current.position, goal)) {
      return successResult(algorithm, current, nodesExpanded, startedAt);
    }

    for (const neighbor of environment.neighbors(current.position)) {
      const neighborKey = positionKey(neighbor);
      const g = current.g + environment.terrainCost(neighbor);
      const known = bestCost.get(neighborKey);

      if (known === undefined || g < known) {
        bestCost.set(neighborKey, g);
        const child = createSearchNode(neighbor, current, g, heuristic(neighbor, goal), startTime);
        frontier.push(child, child.f);
      }
    }
  }

  return failureResult(algorithm, nodesExpanded, startedAt);
}
