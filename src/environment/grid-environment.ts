/**
 * Grid world: static obstacles, terrain costs, cyclic moving obstacles and a
 * discrete clock. Implements the Environment contract read by the solvers.
 */

import { Environment, Position, adjacentPositions, positionKey, positionsEqual } from '../domain/types.js';
import { MIN_TERRAIN_COST } from '../domain/constants.js';

export type CellType = 'EMPTY' | 'OBSTACLE' | 'START' | 'GOAL';

export interface MovingObstacle {
  id: number;
  positions: Position[]; // visited in order, repeating
}

/**
 * Position of a moving obstacle at a given tick, or null when it has no route
 */
export function obstaclePositionAt(obstacle: MovingObstacle, time: number): Position | null {
  const count = obstacle.positions.length;
  if (count === 0) return null;
  return obstacle.positions[((time % count) + count) % count];
}

export class GridEnvironment implements Environment {
  readonly width: number;
  readonly height: number;
  startPosition: Position | null = null;
  goalPosition: Position | null = null;
  readonly movingObstacles: MovingObstacle[] = [];

  private readonly cells: CellType[][];
  private readonly costs: number[][];
  private time = 0;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new Error(`Invalid grid size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.cells = Array.from({ length: height }, () => Array<CellType>(width).fill('EMPTY'));
    this.costs = Array.from({ length: height }, () => Array<number>(width).fill(MIN_TERRAIN_COST));
  }

  get currentTime(): number {
    return this.time;
  }

  advanceTime(): void {
    this.time++;
  }

  setTime(time: number): void {
    if (!Number.isInteger(time) || time < 0) {
      throw new Error(`Invalid time ${time}`);
    }
    this.time = time;
  }

  isValidPosition(p: Position): boolean {
    return p.x >= 0 && p.x < this.width && p.y >= 0 && p.y < this.height;
  }

  cellAt(p: Position): CellType | null {
    if (!this.isValidPosition(p)) return null;
    return this.cells[p.y][p.x];
  }

  setCell(p: Position, cellType: CellType, cost = MIN_TERRAIN_COST): void {
    this.assertInside(p);
    this.setTerrainCost(p, cost);

    // Only one start and one goal cell
    const previous = cellType === 'START' ? this.startPosition : cellType === 'GOAL' ? this.goalPosition : null;
    if (previous !== null && this.cells[previous.y][previous.x] === cellType) {
      this.cells[previous.y][previous.x] = 'EMPTY';
    }
    this.cells[p.y][p.x] = cellType;

    // Start and goal may share a cell; only EMPTY or OBSTACLE clears an endpoint
    const clearsEndpoint = cellType === 'EMPTY' || cellType === 'OBSTACLE';

    if (cellType === 'START') {
      this.startPosition = { ...p };
    } else if (clearsEndpoint && this.startPosition !== null && positionsEqual(this.startPosition, p)) {
      this.startPosition = null;
    }

    if (cellType === 'GOAL') {
      this.goalPosition = { ...p };
    } else if (clearsEndpoint && this.goalPosition !== null && positionsEqual(this.goalPosition, p)) {
      this.goalPosition = null;
    }
  }

  setTerrainCost(p: Position, cost: number): void {
    this.assertInside(p);
    if (!Number.isFinite(cost) || cost < MIN_TERRAIN_COST) {
      throw new Error(`Terrain cost at (${p.x}, ${p.y}) must be a finite number >= ${MIN_TERRAIN_COST}, got ${cost}`);
    }
    this.costs[p.y][p.x] = cost;
  }

  addMovingObstacle(obstacle: MovingObstacle): void {
    this.movingObstacles.push({ id: obstacle.id, positions: obstacle.positions.map(p => ({ ...p })) });
  }

  /**
   * Static obstacles always block. Moving obstacles only block when a time is given.
   */
  isPassable(p: Position, time?: number): boolean {
    if (!this.isValidPosition(p)) return false;
    if (this.cells[p.y][p.x] === 'OBSTACLE') return false;

    if (time !== undefined) {
      for (const obstacle of this.movingObstacles) {
        const occupied = obstaclePositionAt(obstacle, time);
        if (occupied !== null && occupied.x === p.x && occupied.y === p.y) {
          return false;
        }
      }
    }

    return true;
  }

  terrainCost(p: Position): number {
    if (!this.isValidPosition(p)) return Infinity;
    return this.costs[p.y][p.x];
  }

  neighbors(p: Position, time?: number): Position[] {
    return adjacentPositions(p).filter(n => this.isPassable(n, time));
  }

  movingObstaclePositions(time: number): Set<string> {
    const occupied = new Set<string>();
    for (const obstacle of this.movingObstacles) {
      const p = obstaclePositionAt(obstacle, time);
      if (p !== null) occupied.add(positionKey(p));
    }
    return occupied;
  }

  private assertInside(p: Position): void {
    if (!this.isValidPosition(p)) {
      throw new Error(`Position (${p.x}, ${p.y}) is outside the ${this.width}x${this.height} grid`);
    }
  }
}
