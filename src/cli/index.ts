#!/usr/bin/env node
/**
 * Grid Courier - CLI Interface
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { HeuristicName, Position, SearchOptions } from '../domain/types.js';
import { DEFAULT_AGENT_OPTIONS, DEFAULT_SEARCH_OPTIONS, DEMO_MAX_STEPS, ALGORITHM_NAMES } from '../domain/constants.js';
import { GridEnvironment } from '../environment/grid-environment.js';
import { DeliveryAgent } from '../agent/delivery-agent.js';
import { createAlgorithm } from '../solver/solver.js';
import { isHeuristicName } from '../solver/heuristics.js';
import { loadMapFile } from '../io/map-parser.js';
import {
  formatEnvironment,
  formatNavigationJSON,
  formatPerformanceStats,
  formatSearchResult,
} from '../io/grid-formatter.js';

// Parse command line arguments
const args = process.argv.slice(2);

interface CLIOptions {
  command: 'deliver' | 'plan' | 'demo-dynamic' | 'help';
  mapFile?: string;
  algorithm: string;
  maxSteps: number;
  outputFormat: 'text' | 'json';
  heuristic: HeuristicName;
  planningHorizon: number;
  checkArrivalTime: boolean;
  seed?: number;
}

function parseInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed)) {
    throw new Error(`${flag} expects an integer, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

function parseArgs(argv: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    algorithm: 'astar',
    maxSteps: DEFAULT_AGENT_OPTIONS.maxSteps,
    outputFormat: 'text',
    heuristic: DEFAULT_SEARCH_OPTIONS.heuristic,
    planningHorizon: DEFAULT_SEARCH_OPTIONS.planningHorizon,
    checkArrivalTime: DEFAULT_AGENT_OPTIONS.checkArrivalTime,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case 'deliver':
      case 'plan':
      case 'demo-dynamic':
        options.command = arg;
        break;

      case '-m':
      case '--map':
        options.mapFile = argv[++i];
        break;

      case '-a':
      case '--algorithm':
        options.algorithm = argv[++i] ?? '';
        break;

      case '--max-steps':
        options.maxSteps = parseInteger(arg, argv[++i]);
        break;

      case '--seed':
        options.seed = parseInteger(arg, argv[++i]);
        break;

      case '--horizon':
        options.planningHorizon = parseInteger(arg, argv[++i]);
        break;

      case '--check-arrival':
        options.checkArrivalTime = true;
        break;

      case '--heuristic': {
        const value = argv[++i] ?? '';
        if (!isHeuristicName(value)) {
          throw new Error(`--heuristic expects manhattan or euclidean, got ${value}`);
        }
        options.heuristic = value;
        break;
      }

      case '-f':
      case '--format': {
        const value = argv[++i];
        if (value !== 'text' && value !== 'json') {
          throw new Error(`--format expects text or json, got ${value}`);
        }
        options.outputFormat = value;
        break;
      }

      case '-h':
      case '--help':
        options.command = 'help';
        break;
    }
  }

  return options;
}

function printHelp(): void {
  console.log(`
Grid Courier
============

Delivery agent simulation on a weighted grid with dynamic replanning.

USAGE:
  grid-courier <command> [options]

COMMANDS:
  deliver       Navigate the agent from start to goal, replanning on obstacles
  plan          Run a single search and print the result
  demo-dynamic  Run temporal A* on the bundled dynamic map
  help          Show this help message

OPTIONS:
  -m, --map <file>          Map file (JSON format)
  -a, --algorithm <name>    ${ALGORITHM_NAMES.join(', ')} (default: astar)
  --max-steps <n>           Step budget for deliver (default: ${DEFAULT_AGENT_OPTIONS.maxSteps})
  --heuristic <name>        manhattan (default) or euclidean
  --horizon <n>             Temporal A* planning horizon (default: ${DEFAULT_SEARCH_OPTIONS.planningHorizon})
  --seed <n>                Seed for hill climbing
  --check-arrival           Check the next waypoint at the tick the agent arrives
  -f, --format <type>       Output format: text (default) or json
  -h, --help                Show help

EXAMPLES:
  grid-courier deliver --map maps/small.json --algorithm ucs
  grid-courier plan --map maps/corridor.json --algorithm temporal_astar
  grid-courier deliver --map maps/dynamic.json --algorithm hill_climbing --seed 7

MAP FILE FORMAT (JSON):
  {
    "width": 10, "height": 10,
    "start": { "x": 1, "y": 1 },
    "goal": { "x": 8, "y": 8 },
    "obstacles": [{ "x": 3, "y": 2 }],
    "terrain": [{ "x": 2, "y": 6, "cost": 3 }],
    "movingObstacles": [{ "id": 1, "positions": [{ "x": 2, "y": 7 }, { "x": 3, "y": 7 }] }]
  }
`);
}

function searchOptions(options: CLIOptions): Partial<SearchOptions> {
  return {
    heuristic: options.heuristic,
    planningHorizon: options.planningHorizon,
    ...(options.seed !== undefined ? { seed: options.seed } : {}),
  };
}

function requireEndpoints(env: GridEnvironment): { start: Position; goal: Position } {
  if (env.startPosition === null || env.goalPosition === null) {
    throw new Error('Map must define both a start and a goal');
  }
  return { start: env.startPosition, goal: env.goalPosition };
}

/**
 * Bundled maps live in maps/ at the package root, two levels above src/cli
 * and three above dist/src/cli.
 */
function resolveBundledMap(name: string): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.resolve(here, '../../maps', name),
    path.resolve(here, '../../../maps', name),
  ];
  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (found === undefined) {
    throw new Error(`Bundled map ${name} not found`);
  }
  return found;
}

function loadMap(options: CLIOptions): GridEnvironment {
  if (!options.mapFile) {
    throw new Error('Must provide a map file with --map');
  }
  if (options.outputFormat === 'text') {
    console.log(`Loading map: ${options.mapFile}`);
  }
  return loadMapFile(options.mapFile);
}

function runDeliver(env: GridEnvironment, options: CLIOptions): boolean {
  const { start, goal } = requireEndpoints(env);
  const json = options.outputFormat === 'json';

  const agent = new DeliveryAgent(env, options.algorithm, {
    startPosition: start,
    maxSteps: options.maxSteps,
    search: searchOptions(options),
    checkArrivalTime: options.checkArrivalTime,
    logger: json ? undefined : message => console.log(message),
  });

  if (!json) {
    console.log(`Using algorithm: ${options.algorithm}`);
    console.log('Initial environment:');
    console.log(formatEnvironment(env));
    console.log('');
  }

  const success = agent.navigateToGoal(goal, options.maxSteps);
  const stats = agent.getPerformanceStats();

  if (json) {
    console.log(formatNavigationJSON(stats, agent.getPlanState()));
  } else {
    console.log('');
    console.log('Final environment:');
    console.log(formatEnvironment(env, { agent: agent.position }));
    console.log('');
    console.log(formatPerformanceStats(stats));
  }

  return success;
}

function runPlan(env: GridEnvironment, options: CLIOptions): boolean {
  const { start, goal } = requireEndpoints(env);
  const algorithm = createAlgorithm(options.algorithm, env, searchOptions(options));
  const result = algorithm.findPath(start, goal, env.currentTime);

  if (options.outputFormat === 'json') {
    console.log(JSON.stringify({ ...result, cost: result.success ? result.cost : null }, null, 2));
  } else {
    console.log(formatSearchResult(result));
    console.log('');
    console.log(formatEnvironment(env, { path: result.path }));
  }

  return result.success;
}

function runDemoDynamic(): boolean {
  console.log('Demonstrating dynamic replanning...');
  const env = loadMapFile(resolveBundledMap('dynamic.json'));

  console.log('Dynamic map with moving obstacles:');
  console.log(formatEnvironment(env));

  console.log('');
  console.log('Starting navigation with Temporal A*...');
  const success = runDeliver(env, {
    command: 'deliver',
    algorithm: 'temporal_astar',
    maxSteps: DEMO_MAX_STEPS,
    outputFormat: 'text',
    heuristic: DEFAULT_SEARCH_OPTIONS.heuristic,
    planningHorizon: DEFAULT_SEARCH_OPTIONS.planningHorizon,
    // temporal plans place each waypoint at the tick it is reached
    checkArrivalTime: true,
  });

  console.log('');
  console.log(`Dynamic planning result: ${success ? 'SUCCESS' : 'FAILED'}`);

  console.log('');
  console.log('Showing environment at different time steps:');
  for (const time of [0, 5, 10, 15]) {
    console.log('');
    console.log(formatEnvironment(env, { time }));
  }

  return success;
}

// Main entry point
function main(): void {
  const options = parseArgs(args);

  switch (options.command) {
    case 'deliver':
      process.exitCode = runDeliver(loadMap(options), options) ? 0 : 2;
      break;

    case 'plan':
      process.exitCode = runPlan(loadMap(options), options) ? 0 : 2;
      break;

    case 'demo-dynamic':
      process.exitCode = runDemoDynamic() ? 0 : 2;
      break;

    case 'help':
    default:
      printHelp();
      break;
  }
}

try {
  main();
} catch (err) {
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
