/**
 * Read and write grid maps as JSON
 */

import * as fs from 'fs';
import { z } from 'zod';

import { Position, ValidationResult, positionKey, positionsEqual } from '../domain/types.js';
import { MIN_TERRAIN_COST } from '../domain/constants.js';
import { GridEnvironment } from '../environment/grid-environment.js';

export const PositionSchema = z
  .object({
    x: z.number().int().min(0),
    y: z.number().int().min(0),
  })
  .strict();

export const TerrainCellSchema = z
  .object({
    x: z.number().int().min(0),
    y: z.number().int().min(0),
    cost: z.number().finite().min(MIN_TERRAIN_COST),
  })
  .strict();

export const MovingObstacleSchema = z
  .object({
    id: z.number().int(),
    positions: z.array(PositionSchema),
  })
  .strict();

export const MapInputSchema = z
  .object({
    name: z.string().optional(),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    start: PositionSchema,
    goal: PositionSchema,
    obstacles: z.array(PositionSchema).default([]),
    terrain: z.array(TerrainCellSchema).default([]),
    movingObstacles: z.array(MovingObstacleSchema).default([]),
  })
  .strict();

export type MapInput = z.infer<typeof MapInputSchema>;

/**
 * Raised for unreadable or inconsistent map documents
 */
export class MapFormatError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(issues.length > 0 ? `${message}:\n${issues.map(i => `  - ${i}`).join('\n')}` : message);
    this.name = 'MapFormatError';
    this.issues = issues;
  }
}

/**
 * Check a schema-valid map for positions that fall off the grid or collide
 */
export function validateMapInput(input: MapInput): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const inside = (p: Position): boolean => p.x < input.width && p.y < input.height;
  const describe = (p: Position): string => `(${p.x}, ${p.y})`;

  if (!inside(input.start)) {
    errors.push(`Start ${describe(input.start)} is outside the ${input.width}x${input.height} grid`);
  }
  if (!inside(input.goal)) {
    errors.push(`Goal ${describe(input.goal)} is outside the ${input.width}x${input.height} grid`);
  }
  if (positionsEqual(input.start, input.goal)) {
    warnings.push('Start and goal are the same cell');
  }

  const obstacleKeys = new Set<string>();
  for (const obstacle of input.obstacles) {
    if (!inside(obstacle)) {
      errors.push(`Obstacle ${describe(obstacle)} is outside the grid`);
      continue;
    }
    obstacleKeys.add(positionKey(obstacle));
  }

  if (obstacleKeys.has(positionKey(input.start))) {
    errors.push(`Start ${describe(input.start)} is on an obstacle`);
  }
  if (obstacleKeys.has(positionKey(input.goal))) {
    errors.push(`Goal ${describe(input.goal)} is on an obstacle`);
  }

  for (const cell of input.terrain) {
    if (!inside(cell)) {
      errors.push(`Terrain cell ${describe(cell)} is outside the grid`);
    } else if (obstacleKeys.has(positionKey(cell))) {
      warnings.push(`Terrain cost at ${describe(cell)} is set on an obstacle`);
    }
  }

  for (const mover of input.movingObstacles) {
    if (mover.positions.length === 0) {
      warnings.push(`Moving obstacle ${mover.id} has no positions`);
    }
    for (const p of mover.positions) {
      if (!inside(p)) {
        errors.push(`Moving obstacle ${mover.id} leaves the grid at ${describe(p)}`);
      }
    }
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Parse and validate a JSON map document
 */
export function parseMapInput(json: string): MapInput {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new MapFormatError(`Map is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, []);
  }

  const parsed = MapInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MapFormatError('Map does not match the expected format', issues);
  }

  const validation = validateMapInput(parsed.data);
  if (!validation.valid) {
    throw new MapFormatError('Map is inconsistent', validation.errors);
  }

  return parsed.data;
}

/**
 * Build a grid environment from structured input
 */
export function createEnvironmentFromInput(input: MapInput): GridEnvironment {
  const env = new GridEnvironment(input.width, input.height);

  for (const cell of input.terrain) {
    env.setTerrainCost(cell, cell.cost);
  }

  for (const obstacle of input.obstacles) {
    env.setCell(obstacle, 'OBSTACLE', env.terrainCost(obstacle));
  }

  env.setCell(input.start, 'START', env.terrainCost(input.start));
  env.setCell(input.goal, 'GOAL', env.terrainCost(input.goal));

  for (const mover of input.movingObstacles) {
    env.addMovingObstacle(mover);
  }

  return env;
}

export function parseMapFromJSON(json: string): GridEnvironment {
  return createEnvironmentFromInput(parseMapInput(json));
}

export function loadMapFile(filePath: string): GridEnvironment {
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseMapFromJSON(content);
}

/**
 * Serialize an environment into the map format
 */
export function exportEnvironmentToMapInput(env: GridEnvironment, name?: string): MapInput {
  if (env.startPosition === null || env.goalPosition === null) {
    throw new Error('Environment needs both a start and a goal to be exported');
  }

  const obstacles: Position[] = [];
  const terrain: MapInput['terrain'] = [];

  for (let y = 0; y < env.height; y++) {
    for (let x = 0; x < env.width; x++) {
      if (env.cellAt({ x, y }) === 'OBSTACLE') {
        obstacles.push({ x, y });
      }
      const cost = env.terrainCost({ x, y });
      if (cost !== MIN_TERRAIN_COST) {
        terrain.push({ x, y, cost });
      }
    }
  }

  return {
    ...(name !== undefined ? { name } : {}),
    width: env.width,
    height: env.height,
    start: { ...env.startPosition },
    goal: { ...env.goalPosition },
    obstacles,
    terrain,
    movingObstacles: env.movingObstacles.map(m => ({ id: m.id, positions: m.positions.map(p => ({ ...p })) })),
  };
}

export function exportEnvironmentToJSON(env: GridEnvironment, name?: string): string {
  return JSON.stringify(exportEnvironmentToMapInput(env, name), null, 2);
}
