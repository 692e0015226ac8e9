/**
 * Builders for SearchResult values
 */

import { AlgorithmLabel, SearchResult } from '../domain/types.js';
import { SearchNode, reconstructPath } from './search-node.js';

export function successResult(
  algorithm: AlgorithmLabel,
  goalNode: SearchNode,
  nodesExpanded: number,
  startedAt: number
): SearchResult {
  return {
    path: reconstructPath(goalNode),
    cost: goalNode.g,
    nodesExpanded,
    timeTaken: Date.now() - startedAt,
    success: true,
    algorithm,
  };
}

export function failureResult(
  algorithm: AlgorithmLabel,
  nodesExpanded: number,
  startedAt: number
): SearchResult {
  return {
    path: [],
    cost: Infinity,
    nodesExpanded,
    timeTaken: Date.now() - startedAt,
    success: false,
    algorithm,
  };
}
