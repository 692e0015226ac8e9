/**
 * Hill climbing with random restarts, layered on an A* baseline.
 *
 * Each round perturbs the best path with a short random walk, then climbs by
 * swapping single interior waypoints for grid neighbors, accepting the first
 * strictly cheaper variant until none is left. Rounds never replace the best
 * path with a costlier one, but nothing guarantees an improvement either.
 */

import {
  Environment,
  PathfindingAlgorithm,
  Position,
  RandomSource,
  SearchOptions,
  SearchResult,
  containsPosition,
  positionsEqual,
} from '../domain/types.js';
import { DEFAULT_SEARCH_OPTIONS } from '../domain/constants.js';
import { AStarSearch } from './astar.js';
import { createSeededRandom, randomChoice, randomInt } from './random.js';

interface ClimbResult {
  path: Position[];
  cost: number;
  evaluations: number;
}

export class HillClimbingReplanner implements PathfindingAlgorithm {
  readonly name = 'Hill Climbing';

  private readonly options: SearchOptions;
  private readonly random: RandomSource;
  private readonly basePlanner: AStarSearch;

  constructor(
    private readonly environment: Environment,
    options: Partial<SearchOptions> = {}
  ) {
    this.options = { ...DEFAULT_SEARCH_OPTIONS, ...options };
    this.random = this.options.random ?? createSeededRandom(this.options.seed);
    this.basePlanner = new AStarSearch(environment, this.options.heuristic);
  }

  findPath(start: Position, goal: Position, startTime = 0): SearchResult {
    const startedAt = Date.now();

    const baseline = this.basePlanner.findPath(start, goal, startTime);
    if (!baseline.success) {
      return baseline;
    }

    let bestPath = baseline.path;
    let bestCost = baseline.cost;
    let nodesExpanded = baseline.nodesExpanded;

    for (let restart = 0; restart < this.options.maxRestarts; restart++) {
      const perturbed = this.perturbPath(bestPath);
      const perturbedCost = this.evaluatePath(perturbed, startTime);

      if (perturbedCost === Infinity) continue;

      const climbed = this.climb(perturbed, perturbedCost, startTime);
      nodesExpanded += climbed.evaluations;

      if (climbed.cost < bestCost) {
        bestPath = climbed.path;
        bestCost = climbed.cost;
      }
    }

    return {
      path: bestPath,
      cost: bestCost,
      nodesExpanded,
      timeTaken: Date.now() - startedAt,
      success: true,
      algorithm: this.name,
    };
  }

  /**
   * Replace a short interior segment with a random walk between its fixed
   * boundary cells. The path is returned unchanged when the walk misses.
   */
  perturbPath(path: Position[]): Position[] {
    if (path.length < 3) {
      return path;
    }

    const startIndex = randomInt(this.random, 1, path.length - 2);
    const endIndex = Math.min(
      startIndex + randomInt(this.random, 1, this.options.maxSegmentLength),
      path.length - 1
    );

    const segmentStart = path[startIndex - 1];
    const segmentEnd = path[endIndex];

    let current = segmentStart;
    const walk: Position[] = [current];
    const maxWalk = endIndex - startIndex + 2;

    for (let i = 0; i < maxWalk; i++) {
      const neighbors = this.environment.neighbors(current);
      if (containsPosition(neighbors, segmentEnd)) {
        walk.push(segmentEnd);
        break;
      }
      const next = randomChoice(this.random, neighbors);
      if (next === undefined) break;
      current = next;
      walk.push(current);
    }

    if (!positionsEqual(walk[walk.length - 1], segmentEnd)) {
      return path;
    }

    return [...path.slice(0, startIndex), ...walk.slice(1), ...path.slice(endIndex + 1)];
  }

  /**
   * First-improvement descent over single-waypoint substitutions
   */
  climb(path: Position[], cost: number, startTime: number): ClimbResult {
    let currentPath = path;
    let currentCost = cost;
    let evaluations = 0;
    let improved = true;

    while (improved) {
      improved = false;

      search: for (let i = 1; i < currentPath.length - 1; i++) {
        for (const replacement of this.environment.neighbors(currentPath[i])) {
          const candidate = [...currentPath];
          candidate[i] = replacement;
          if (!this.isValidPath(candidate)) continue;

          const candidateCost = this.evaluatePath(candidate, startTime);
          evaluations++;

          if (candidateCost < currentCost) {
            currentPath = candidate;
            currentCost = candidateCost;
            improved = true;
            break search;
          }
        }
      }
    }

    return { path: currentPath, cost: currentCost, evaluations };
  }

  /**
   * Consecutive positions must be grid neighbors
   */
  isValidPath(path: Position[]): boolean {
    for (let i = 0; i < path.length - 1; i++) {
      if (!containsPosition(this.environment.neighbors(path[i]), path[i + 1])) {
        return false;
      }
    }
    return true;
  }

  /**
   * Terrain cost of every position after the first, or Infinity when the path
   * is broken or runs into an obstacle at its time offset
   */
  evaluatePath(path: Position[], startTime: number): number {
    if (!this.isValidPath(path)) {
      return Infinity;
    }

    let total = 0;
    for (let i = 0; i < path.length; i++) {
      if (!this.environment.isPassable(path[i], startTime + i)) {
        return Infinity;
      }
      if (i > 0) {
        total += this.environment.terrainCost(path[i]);
      }
    }

    return total;
  }
}
