/**
 * Format grids, search results and navigation statistics for console output
 */

import { PerformanceStats, PlanState, Position, SearchResult, positionKey } from '../domain/types.js';
import { GridEnvironment } from '../environment/grid-environment.js';

export interface GridFormatOptions {
  agent?: Position;
  path?: Position[];
  time?: number;
}

export const GRID_LEGEND =
  'Legend: . = empty, # = obstacle, S = start, G = goal, A = agent, M = moving obstacle, * = path, 2-9 = terrain cost';

export function formatPosition(p: Position): string {
  return `(${p.x}, ${p.y})`;
}

export function formatCost(cost: number): string {
  return Number.isFinite(cost) ? `${cost}` : 'unreachable';
}

/**
 * Render the grid one character per cell, row y = 0 first
 */
export function formatGrid(env: GridEnvironment, options: GridFormatOptions = {}): string {
  const time = options.time ?? env.currentTime;
  const moving = env.movingObstaclePositions(time);
  const onPath = new Set((options.path ?? []).map(positionKey));
  const agentKey = options.agent ? positionKey(options.agent) : null;

  const lines: string[] = [];

  for (let y = 0; y < env.height; y++) {
    const row: string[] = [];

    for (let x = 0; x < env.width; x++) {
      const key = positionKey({ x, y });
      const cell = env.cellAt({ x, y });
      const cost = env.terrainCost({ x, y });
      let symbol = '.';

      if (key === agentKey) {
        symbol = 'A';
      } else if (moving.has(key)) {
        symbol = 'M';
      } else if (cell === 'OBSTACLE') {
        symbol = '#';
      } else if (cell === 'START') {
        symbol = 'S';
      } else if (cell === 'GOAL') {
        symbol = 'G';
      } else if (onPath.has(key)) {
        symbol = '*';
      } else if (cost > 1) {
        symbol = cost < 10 ? `${Math.floor(cost)}` : '+';
      }

      row.push(symbol);
    }

    lines.push(row.join(' '));
  }

  return lines.join('\n');
}

/**
 * Grid with a time header and legend
 */
export function formatEnvironment(env: GridEnvironment, options: GridFormatOptions = {}): string {
  const time = options.time ?? env.currentTime;
  return [`Environment at time ${time}:`, GRID_LEGEND, '', formatGrid(env, options)].join('\n');
}

export function formatPath(path: Position[]): string {
  if (path.length === 0) return '(none)';
  return path.map(formatPosition).join(' -> ');
}

export function formatSearchResult(result: SearchResult): string {
  const lines: string[] = [];

  lines.push(`=== SEARCH RESULT (${result.algorithm}) ===`);
  lines.push(`Status: ${result.success ? 'SUCCESS' : 'FAILED'}`);
  lines.push(`Path Length: ${result.path.length}`);
  lines.push(`Path Cost: ${formatCost(result.cost)}`);
  lines.push(`Nodes Expanded: ${result.nodesExpanded.toLocaleString('en-US')}`);
  lines.push(`Time Taken: ${result.timeTaken}ms`);
  lines.push(`Path: ${formatPath(result.path)}`);

  return lines.join('\n');
}

export function formatPerformanceStats(stats: PerformanceStats): string {
  const lines: string[] = [];

  lines.push('=== PERFORMANCE STATISTICS ===');
  lines.push(`Algorithm: ${stats.algorithm}`);
  lines.push(`Success: ${stats.success}`);
  lines.push(`Total Cost: ${stats.totalCost}`);
  lines.push(`Total Time: ${stats.totalTime}`);
  lines.push(`Replanning Events: ${stats.replanningCount}`);
  lines.push(`Total Nodes Expanded: ${stats.totalNodesExpanded}`);
  lines.push(`Total Search Time: ${stats.totalSearchTime}ms`);

  return lines.join('\n');
}

/**
 * Machine-readable navigation report
 */
export function formatNavigationJSON(stats: PerformanceStats, plan: PlanState): string {
  return JSON.stringify(
    {
      algorithm: stats.algorithm,
      success: stats.success,
      status: plan.status,
      finalPosition: plan.position,
      totalCost: stats.totalCost,
      totalTime: stats.totalTime,
      replanningCount: stats.replanningCount,
      totalNodesExpanded: stats.totalNodesExpanded,
      totalSearchTime: stats.totalSearchTime,
      searches: stats.searchResults.map(r => ({
        algorithm: r.algorithm,
        success: r.success,
        pathLength: r.path.length,
        cost: Number.isFinite(r.cost) ? r.cost : null,
        nodesExpanded: r.nodesExpanded,
        timeTaken: r.timeTaken,
      })),
    },
    null,
    2
  );
}
