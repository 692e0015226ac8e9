/**
 * Distance heuristics for best-first search.
 * Both are admissible on a 4-connected grid whose cells cost at least 1.
 */

import { HeuristicFunction, HeuristicName, Position } from '../domain/types.js';

export function manhattanDistance(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function euclideanDistance(a: Position, b: Position): number {
  return Math.sqrt((a.x - b.x) ** 2 + (a.y - b.y) ** 2);
}

const HEURISTICS: Record<HeuristicName, HeuristicFunction> = {
  manhattan: manhattanDistance,
  euclidean: euclideanDistance,
};

export function getHeuristic(name: HeuristicName): HeuristicFunction {
  return HEURISTICS[name];
}

export function isHeuristicName(value: string): value is HeuristicName {
  return Object.prototype.hasOwnProperty.call(HEURISTICS, value);
}
