/**
 * Tests for the seeded random source
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createSeededRandom, randomChoice, randomInt } from '../../src/solver/random.js';

function take(random: () => number, count: number): number[] {
  return Array.from({ length: count }, () => random());
}

describe('createSeededRandom', () => {
  it('should repeat the sequence for the same seed', () => {
    assert.deepStrictEqual(take(createSeededRandom(42), 10), take(createSeededRandom(42), 10));
  });

  it('should differ between seeds', () => {
    assert.notDeepStrictEqual(take(createSeededRandom(1), 5), take(createSeededRandom(2), 5));
  });

  it('should stay within [0, 1)', () => {
    for (const value of take(createSeededRandom(7), 1000)) {
      assert.ok(value >= 0 && value < 1, `${value} out of range`);
    }
  });

  it('should fall back to Math.random without a seed', () => {
    assert.strictEqual(createSeededRandom(), Math.random);
  });
});

describe('randomInt', () => {
  it('should include both bounds', () => {
    assert.strictEqual(randomInt(() => 0, 2, 5), 2);
    assert.strictEqual(randomInt(() => 0.999, 2, 5), 5);
  });

  it('should return the bound when min equals max', () => {
    assert.strictEqual(randomInt(() => 0.5, 3, 3), 3);
  });
});

describe('randomChoice', () => {
  it('should pick by scaled index', () => {
    assert.strictEqual(randomChoice(() => 0.5, ['a', 'b', 'c']), 'b');
  });

  it('should return undefined for an empty list', () => {
    assert.strictEqual(randomChoice(() => 0.5, []), undefined);
  });
});
