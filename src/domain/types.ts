/**
 * Core type definitions for the grid delivery agent
 */

// Position on the grid (0-based, x = column, y = row)
export interface Position {
  x: number;
  y: number;
}

// Selectors accepted by the algorithm factory
export type AlgorithmName = 'bfs' | 'ucs' | 'astar' | 'temporal_astar' | 'hill_climbing';

// Display names reported in search results
export type AlgorithmLabel = 'BFS' | 'UCS' | 'A*' | 'Temporal A*' | 'Hill Climbing';

export type HeuristicName = 'manhattan' | 'euclidean';

export type HeuristicFunction = (from: Position, to: Position) => number;

// Pseudo-random source returning values in [0, 1)
export type RandomSource = () => number;

/**
 * Read-only view of the world consumed by the search layer.
 * The only mutation the core ever requests is advanceTime().
 */
export interface Environment {
  readonly currentTime: number;
  neighbors(position: Position, time?: number): Position[];
  isPassable(position: Position, time?: number): boolean;
  terrainCost(position: Position): number;
  advanceTime(): void;
}

// Outcome of a single search
export interface SearchResult {
  path: Position[];
  cost: number;
  nodesExpanded: number;
  timeTaken: number; // milliseconds
  success: boolean;
  algorithm: AlgorithmLabel;
}

export interface PathfindingAlgorithm {
  readonly name: AlgorithmLabel;
  findPath(start: Position, goal: Position, startTime?: number): SearchResult;
}

// Search options shared by the algorithm factory
export interface SearchOptions {
  heuristic: HeuristicName;
  planningHorizon: number;
  maxRestarts: number;
  maxSegmentLength: number;
  seed?: number;
  random?: RandomSource;
}

export type NavigationStatus = 'IDLE' | 'PLANNING' | 'MOVING' | 'REPLANNING' | 'SUCCEEDED' | 'FAILED';

// Executor state, mutated by every step or replan
export interface PlanState {
  status: NavigationStatus;
  position: Position;
  goal: Position | null;
  path: Position[];
  pathIndex: number;
  totalCost: number;
  elapsedTicks: number;
  replanCount: number;
  steps: number;
}

export interface AgentOptions {
  startPosition: Position;
  maxSteps: number;
  search: Partial<SearchOptions>;
  // Test the next waypoint at the tick the agent arrives rather than the current one
  checkArrivalTime: boolean;
  logger?: (message: string) => void;
}

export interface PerformanceStats {
  algorithm: AlgorithmName;
  success: boolean;
  totalCost: number;
  totalTime: number;
  replanningCount: number;
  totalNodesExpanded: number;
  totalSearchTime: number;
  searchResults: SearchResult[];
}

// Validation result
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export function positionKey(p: Position): string {
  return `${p.x},${p.y}`;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function containsPosition(positions: Position[], target: Position): boolean {
  return positions.some(p => positionsEqual(p, target));
}

// 4-connected offsets: up, right, down, left
export const DIRECTIONS: readonly Position[] = [
  { x: 0, y: 1 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
];

export function adjacentPositions(p: Position): Position[] {
  return DIRECTIONS.map(d => ({ x: p.x + d.x, y: p.y + d.y }));
}
