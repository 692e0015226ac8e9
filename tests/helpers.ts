/**
 * Shared fixtures for the test suites
 */

import { Environment, Position, adjacentPositions, positionsEqual } from '../src/domain/types.js';
import { GridEnvironment } from '../src/environment/grid-environment.js';

/**
 * Build a grid from text rows, row y = 0 first.
 * '#' is an obstacle, a digit is a terrain cost, anything else costs 1.
 */
export function gridFromRows(rows: string[]): GridEnvironment {
  const env = new GridEnvironment(rows[0].length, rows.length);

  rows.forEach((row, y) => {
    [...row].forEach((char, x) => {
      if (char === '#') {
        env.setCell({ x, y }, 'OBSTACLE');
      } else if (char >= '1' && char <= '9') {
        env.setTerrainCost({ x, y }, Number(char));
      }
    });
  });

  return env;
}

/**
 * Grid whose gate cell turns into a wall once the clock reaches `closesAt`
 */
export class GateEnvironment implements Environment {
  constructor(
    readonly grid: GridEnvironment,
    private readonly gate: Position,
    private readonly closesAt: number
  ) {}

  get currentTime(): number {
    return this.grid.currentTime;
  }

  advanceTime(): void {
    this.grid.advanceTime();
  }

  terrainCost(position: Position): number {
    return this.grid.terrainCost(position);
  }

  isPassable(position: Position, time?: number): boolean {
    if (positionsEqual(position, this.gate) && this.grid.currentTime >= this.closesAt) {
      return false;
    }
    return this.grid.isPassable(position, time);
  }

  neighbors(position: Position, time?: number): Position[] {
    return adjacentPositions(position).filter(n => this.isPassable(n, time));
  }
}

const DIAGONALS: readonly Position[] = [
  { x: 1, y: 1 },
  { x: 1, y: -1 },
  { x: -1, y: -1 },
  { x: -1, y: 1 },
];

/**
 * 8-connected open grid: orthogonal neighbors first, then diagonals
 */
export class DiagonalGrid implements Environment {
  private time = 0;

  constructor(
    private readonly width: number,
    private readonly height: number,
    private readonly costs: Map<string, number> = new Map()
  ) {}

  get currentTime(): number {
    return this.time;
  }

  advanceTime(): void {
    this.time++;
  }

  terrainCost(position: Position): number {
    return this.costs.get(`${position.x},${position.y}`) ?? 1;
  }

  isPassable(position: Position): boolean {
    return position.x >= 0 && position.x < this.width && position.y >= 0 && position.y < this.height;
  }

  neighbors(position: Position): Position[] {
    const diagonal = DIAGONALS.map(d => ({ x: position.x + d.x, y: position.y + d.y }));
    return [...adjacentPositions(position), ...diagonal].filter(n => this.isPassable(n));
  }
}

/**
 * Every consecutive pair is one orthogonal step or a wait in place
 */
export function isContiguous(path: Position[]): boolean {
  for (let i = 1; i < path.length; i++) {
    const distance = Math.abs(path[i].x - path[i - 1].x) + Math.abs(path[i].y - path[i - 1].y);
    if (distance > 1) return false;
  }
  return true;
}
