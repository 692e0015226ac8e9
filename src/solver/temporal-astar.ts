/**
 * Space-time A* for environments with moving obstacles.
 *
 * A state is a (position, time) pair. Each expansion offers a wait action
 * (same cell, one tick later) and a move to every neighbor that is free at the
 * next tick. The Manhattan heuristic ignores time and stays admissible since
 * neither action has negative cost.
 */

import { Environment, PathfindingAlgorithm, Position, SearchResult, positionKey, positionsEqual } from '../domain/types.js';
import { DEFAULT_SEARCH_OPTIONS, WAIT_COST } from '../domain/constants.js';
import { PriorityQueue, SearchNode, createSearchNode } from './search-node.js';
import { failureResult, successResult } from './search-result.js';
import { manhattanDistance } from './heuristics.js';

export function spaceTimeKey(position: Position, time: number): string {
  return `${positionKey(position)}@${time}`;
}

export class TemporalAStarSearch implements PathfindingAlgorithm {
  readonly name = 'Temporal A*';

  constructor(
    private readonly environment: Environment,
    readonly planningHorizon: number = DEFAULT_SEARCH_OPTIONS.planningHorizon
  ) {}

  findPath(start: Position, goal: Position, startTime = 0): SearchResult {
    const startedAt = Date.now();

    const frontier = new PriorityQueue<SearchNode>();
    const closed = new Set<string>();
    const bestCost = new Map<string, number>();

    const startNode = createSearchNode(start, null, 0, manhattanDistance(start, goal), startTime);
    frontier.push(startNode, startNode.f);

    let nodesExpanded = 0;

    while (!frontier.isEmpty()) {
      const current = frontier.pop();
      if (current === undefined) break;

      const stateKey = spaceTimeKey(current.position, current.time);
      if (closed.has(stateKey)) continue;
      closed.add(stateKey);
      nodesExpanded++;

      if (positionsEqual(current.position, goal)) {
        return successResult(this.name, current, nodesExpanded, startedAt);
      }

      if (current.time - startTime > this.planningHorizon) continue;

      const nextTime = current.time + 1;

      // Wait in place
      if (this.environment.isPassable(current.position, nextTime)) {
        this.relax(frontier, bestCost, current, current.position, current.g + WAIT_COST, nextTime, goal);
      }

      for (const neighbor of this.environment.neighbors(current.position, nextTime)) {
        const g = current.g + this.environment.terrainCost(neighbor);
        this.relax(frontier, bestCost, current, neighbor, g, nextTime, goal);
      }
    }

    return failureResult(this.name, nodesExpanded, startedAt);
  }

  private relax(
    frontier: PriorityQueue<SearchNode>,
    bestCost: Map<string, number>,
    parent: SearchNode,
    position: Position,
    g: number,
    time: number,
    goal: Position
  ): void {
    const key = spaceTimeKey(position, time);
    const known = bestCost.get(key);
    if (known !== undefined && g >= known) return;

    bestCost.set(key, g);
    const child = createSearchNode(position, parent, g, manhattanDistance(position, goal), time);
    frontier.push(child, child.f);
  }
}
