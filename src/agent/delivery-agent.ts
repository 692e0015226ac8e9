/**
 * Delivery agent: executes a planned path one tick at a time and replans when
 * the next waypoint turns out to be blocked.
 *
 *   PLANNING -> MOVING -> (REPLANNING -> MOVING)* -> SUCCEEDED | FAILED
 */

import {
  AgentOptions,
  AlgorithmName,
  Environment,
  PathfindingAlgorithm,
  PerformanceStats,
  PlanState,
  Position,
  SearchResult,
  positionsEqual,
} from '../domain/types.js';
import { DEFAULT_AGENT_OPTIONS } from '../domain/constants.js';
import { assertAlgorithmName, createAlgorithm } from '../solver/solver.js';
import { formatPosition } from '../io/grid-formatter.js';

const silent = (): void => {};

export class DeliveryAgent {
  readonly algorithmName: AlgorithmName;
  readonly algorithm: PathfindingAlgorithm;

  private readonly maxSteps: number;
  private readonly checkArrivalTime: boolean;
  private readonly log: (message: string) => void;
  private startPosition: Position;
  private state: PlanState;
  private searchResults: SearchResult[] = [];

  constructor(
    private readonly environment: Environment,
    algorithm: string,
    options: Partial<AgentOptions> & Pick<AgentOptions, 'startPosition'>
  ) {
    assertAlgorithmName(algorithm);
    this.algorithm = createAlgorithm(algorithm, environment, options.search ?? {});
    this.algorithmName = algorithm;
    this.maxSteps = options.maxSteps ?? DEFAULT_AGENT_OPTIONS.maxSteps;
    this.checkArrivalTime = options.checkArrivalTime ?? DEFAULT_AGENT_OPTIONS.checkArrivalTime;
    this.log = options.logger ?? silent;
    this.startPosition = { ...options.startPosition };
    this.state = this.initialState();
  }

  get position(): Position {
    return this.state.position;
  }

  get status(): PlanState['status'] {
    return this.state.status;
  }

  get replanningCount(): number {
    return this.state.replanCount;
  }

  /**
   * Snapshot of the executor state
   */
  getPlanState(): PlanState {
    return {
      ...this.state,
      position: { ...this.state.position },
      goal: this.state.goal === null ? null : { ...this.state.goal },
      path: this.state.path.map(p => ({ ...p })),
    };
  }

  getSearchResults(): SearchResult[] {
    return [...this.searchResults];
  }

  /**
   * Plan from the current position. On success the new path is installed with
   * its first waypoint after the current cell.
   */
  planPath(goal: Position, startTime: number = this.environment.currentTime): SearchResult {
    const result = this.algorithm.findPath(this.state.position, goal, startTime);
    this.searchResults.push(result);
    this.state.goal = { ...goal };

    if (result.success) {
      this.state.path = result.path;
      this.state.pathIndex = 1;
      this.log(
        `Planned path with ${result.algorithm}: ${result.path.length} steps, ` +
          `cost: ${result.cost.toFixed(2)}, nodes expanded: ${result.nodesExpanded}`
      );
    } else {
      this.state.path = [];
      this.state.pathIndex = 0;
      this.log(`Failed to find path with ${result.algorithm}`);
    }

    return result;
  }

  /**
   * Take one MOVING or REPLANNING transition. Returns false once navigation
   * has reached a terminal state.
   */
  step(): boolean {
    const { goal } = this.state;
    if (goal === null || this.isTerminal()) {
      return false;
    }

    this.state.steps++;

    // Installed paths end at the goal, so pathIndex never runs past the last waypoint
    const next = this.state.path[this.state.pathIndex];
    const checkTime = this.environment.currentTime + (this.checkArrivalTime ? 1 : 0);

    if (!this.environment.isPassable(next, checkTime)) {
      this.log(`Obstacle detected at ${formatPosition(next)}! Replanning...`);
      this.state.replanCount++;
      return this.replan();
    }

    const cost = this.environment.terrainCost(next);
    this.state.position = { ...next };
    this.state.pathIndex++;
    this.state.totalCost += cost;
    this.environment.advanceTime();
    this.state.elapsedTicks++;

    this.log(`Agent moved to ${formatPosition(next)} (cost: ${cost}, total: ${this.state.totalCost})`);

    if (positionsEqual(next, goal)) {
      this.state.status = 'SUCCEEDED';
      return false;
    }

    this.state.status = 'MOVING';
    return true;
  }

  /**
   * Plan again from the current position and time toward the same goal
   */
  replan(): boolean {
    const { goal } = this.state;
    if (goal === null) {
      return false;
    }

    this.state.status = 'REPLANNING';
    const result = this.planPath(goal, this.environment.currentTime);

    if (!result.success) {
      this.log('Replanning failed!');
      this.state.status = 'FAILED';
      return false;
    }

    this.log(`Replanning successful! New path length: ${result.path.length}`);
    return this.settleAfterPlan(goal);
  }

  /**
   * Plan, then step until the goal is reached, planning fails or the step
   * budget runs out.
   */
  navigateToGoal(goal: Position, maxSteps: number = this.maxSteps): boolean {
    this.log(`Starting navigation from ${formatPosition(this.state.position)} to ${formatPosition(goal)}`);

    this.state.status = 'PLANNING';
    const result = this.planPath(goal);
    if (!result.success) {
      this.state.status = 'FAILED';
      return false;
    }

    this.settleAfterPlan(goal);

    // Status is read through the getter: step() mutates it behind the compiler's back
    while (this.status === 'MOVING' && this.state.steps < maxSteps) {
      this.step();
    }

    if (this.status === 'MOVING' || this.status === 'REPLANNING') {
      this.state.status = 'FAILED';
    }

    const success = this.status === 'SUCCEEDED';
    if (success) {
      this.log(
        `Goal reached! Total cost: ${this.state.totalCost}, ` +
          `time: ${this.state.elapsedTicks}, replanning events: ${this.state.replanCount}`
      );
    } else {
      this.log(`Failed to reach goal (${this.state.steps}/${maxSteps} steps used)`);
    }

    return success;
  }

  getPerformanceStats(): PerformanceStats {
    return {
      algorithm: this.algorithmName,
      success: this.state.status === 'SUCCEEDED',
      totalCost: this.state.totalCost,
      totalTime: this.state.elapsedTicks,
      replanningCount: this.state.replanCount,
      totalNodesExpanded: this.searchResults.reduce((sum, r) => sum + r.nodesExpanded, 0),
      totalSearchTime: this.searchResults.reduce((sum, r) => sum + r.timeTaken, 0),
      searchResults: this.getSearchResults(),
    };
  }

  /**
   * Clear plan state and statistics. The environment clock is left alone.
   */
  reset(startPosition: Position = this.startPosition): void {
    this.startPosition = { ...startPosition };
    this.searchResults = [];
    this.state = this.initialState();
  }

  private settleAfterPlan(goal: Position): boolean {
    if (positionsEqual(this.state.position, goal)) {
      this.state.status = 'SUCCEEDED';
      return false;
    }
    this.state.status = 'MOVING';
    return true;
  }

  private isTerminal(): boolean {
    return this.state.status === 'SUCCEEDED' || this.state.status === 'FAILED';
  }

  private initialState(): PlanState {
    return {
      status: 'IDLE',
      position: { ...this.startPosition },
      goal: null,
      path: [],
      pathIndex: 0,
      totalCost: 0,
      elapsedTicks: 0,
      replanCount: 0,
      steps: 0,
    };
  }
}
