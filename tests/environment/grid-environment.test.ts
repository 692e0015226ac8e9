/**
 * Tests for the grid environment
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { GridEnvironment, obstaclePositionAt } from '../../src/environment/grid-environment.js';

describe('GridEnvironment construction', () => {
  it('should start empty at time 0', () => {
    const env = new GridEnvironment(5, 4);

    assert.strictEqual(env.width, 5);
    assert.strictEqual(env.height, 4);
    assert.strictEqual(env.currentTime, 0);
    assert.strictEqual(env.cellAt({ x: 4, y: 3 }), 'EMPTY');
    assert.strictEqual(env.terrainCost({ x: 0, y: 0 }), 1);
  });

  it('should reject an empty grid', () => {
    assert.throws(() => new GridEnvironment(0, 3), /Invalid grid size 0x3/);
  });
});

describe('GridEnvironment cells', () => {
  it('should treat cells off the grid as impassable and infinitely costly', () => {
    const env = new GridEnvironment(3, 3);

    assert.strictEqual(env.isPassable({ x: 3, y: 0 }), false);
    assert.strictEqual(env.isPassable({ x: 0, y: -1 }), false);
    assert.strictEqual(env.terrainCost({ x: -1, y: 0 }), Infinity);
    assert.strictEqual(env.cellAt({ x: 5, y: 5 }), null);
  });

  it('should block static obstacles at every time', () => {
    const env = new GridEnvironment(3, 3);
    env.setCell({ x: 1, y: 1 }, 'OBSTACLE');

    assert.strictEqual(env.isPassable({ x: 1, y: 1 }), false);
    assert.strictEqual(env.isPassable({ x: 1, y: 1 }, 7), false);
  });

  it('should keep a single start and goal', () => {
    const env = new GridEnvironment(3, 3);
    env.setCell({ x: 0, y: 0 }, 'START');
    env.setCell({ x: 2, y: 2 }, 'START');

    assert.deepStrictEqual(env.startPosition, { x: 2, y: 2 });
    assert.strictEqual(env.cellAt({ x: 0, y: 0 }), 'EMPTY');
  });

  it('should clear the goal when its cell is overwritten', () => {
    const env = new GridEnvironment(3, 3);
    env.setCell({ x: 2, y: 0 }, 'GOAL');
    env.setCell({ x: 2, y: 0 }, 'OBSTACLE');

    assert.strictEqual(env.goalPosition, null);
  });

  it('should keep both endpoints when start and goal share a cell', () => {
    const env = new GridEnvironment(3, 3);
    env.setCell({ x: 1, y: 1 }, 'START');
    env.setCell({ x: 1, y: 1 }, 'GOAL');

    assert.deepStrictEqual(env.startPosition, { x: 1, y: 1 });
    assert.deepStrictEqual(env.goalPosition, { x: 1, y: 1 });
    assert.strictEqual(env.cellAt({ x: 1, y: 1 }), 'GOAL');
  });

  it('should leave a shared goal cell alone when the start moves away', () => {
    const env = new GridEnvironment(3, 3);
    env.setCell({ x: 1, y: 1 }, 'START');
    env.setCell({ x: 1, y: 1 }, 'GOAL');
    env.setCell({ x: 0, y: 0 }, 'START');

    assert.deepStrictEqual(env.startPosition, { x: 0, y: 0 });
    assert.strictEqual(env.cellAt({ x: 1, y: 1 }), 'GOAL');
  });

  it('should store terrain costs', () => {
    const env = new GridEnvironment(3, 3);
    env.setTerrainCost({ x: 1, y: 2 }, 4);

    assert.strictEqual(env.terrainCost({ x: 1, y: 2 }), 4);
  });

  it('should reject terrain costs below 1', () => {
    const env = new GridEnvironment(3, 3);

    assert.throws(() => env.setTerrainCost({ x: 0, y: 0 }, 0), /must be a finite number >= 1/);
    assert.throws(() => env.setTerrainCost({ x: 0, y: 0 }, Infinity), /must be a finite number >= 1/);
  });

  it('should reject writes outside the grid', () => {
    const env = new GridEnvironment(3, 2);

    assert.throws(() => env.setCell({ x: 3, y: 0 }, 'OBSTACLE'), /Position \(3, 0\) is outside the 3x2 grid/);
  });
});

describe('GridEnvironment neighbors', () => {
  it('should return passable neighbors in direction order', () => {
    const env = new GridEnvironment(3, 3);
    env.setCell({ x: 1, y: 2 }, 'OBSTACLE');

    assert.deepStrictEqual(env.neighbors({ x: 1, y: 1 }), [
      { x: 2, y: 1 },
      { x: 1, y: 0 },
      { x: 0, y: 1 },
    ]);
  });

  it('should drop neighbors that are off the grid', () => {
    const env = new GridEnvironment(3, 3);

    assert.deepStrictEqual(env.neighbors({ x: 0, y: 0 }), [
      { x: 0, y: 1 },
      { x: 1, y: 0 },
    ]);
  });
});

describe('Moving obstacles', () => {
  it('should cycle through their positions', () => {
    const obstacle = { id: 1, positions: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }] };

    assert.deepStrictEqual(obstaclePositionAt(obstacle, 1), { x: 1, y: 0 });
    assert.deepStrictEqual(obstaclePositionAt(obstacle, 5), { x: 2, y: 0 });
    assert.strictEqual(obstaclePositionAt({ id: 2, positions: [] }, 3), null);
  });

  it('should only block when a time is given', () => {
    const env = new GridEnvironment(3, 3);
    env.addMovingObstacle({ id: 1, positions: [{ x: 1, y: 1 }, { x: 2, y: 1 }] });

    assert.strictEqual(env.isPassable({ x: 1, y: 1 }), true);
    assert.strictEqual(env.isPassable({ x: 1, y: 1 }, 0), false);
    assert.strictEqual(env.isPassable({ x: 1, y: 1 }, 1), true);
    assert.strictEqual(env.isPassable({ x: 2, y: 1 }, 1), false);
    assert.strictEqual(env.isPassable({ x: 1, y: 1 }, 2), false);
  });

  it('should exclude occupied cells from timed neighbor queries', () => {
    const env = new GridEnvironment(3, 3);
    env.addMovingObstacle({ id: 1, positions: [{ x: 0, y: 1 }] });

    assert.deepStrictEqual(env.neighbors({ x: 0, y: 0 }, 4), [{ x: 1, y: 0 }]);
    assert.strictEqual(env.neighbors({ x: 0, y: 0 }).length, 2);
  });

  it('should report occupied cells by key', () => {
    const env = new GridEnvironment(4, 4);
    env.addMovingObstacle({ id: 1, positions: [{ x: 1, y: 1 }, { x: 2, y: 1 }] });
    env.addMovingObstacle({ id: 2, positions: [{ x: 3, y: 3 }] });

    assert.deepStrictEqual([...env.movingObstaclePositions(1)].sort(), ['2,1', '3,3']);
  });

  it('should copy the route it is given', () => {
    const env = new GridEnvironment(3, 3);
    const positions = [{ x: 1, y: 1 }];
    env.addMovingObstacle({ id: 1, positions });
    positions[0].x = 2;

    assert.deepStrictEqual(env.movingObstacles[0].positions, [{ x: 1, y: 1 }]);
  });
});

describe('Clock', () => {
  it('should advance one tick at a time', () => {
    const env = new GridEnvironment(2, 2);
    env.advanceTime();
    env.advanceTime();

    assert.strictEqual(env.currentTime, 2);
  });

  it('should allow setting the time directly', () => {
    const env = new GridEnvironment(2, 2);
    env.setTime(9);

    assert.strictEqual(env.currentTime, 9);
    assert.throws(() => env.setTime(-1), /Invalid time -1/);
  });
});
