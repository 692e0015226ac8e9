/**
 * Seedable pseudo-random source for the local-repair search
 */

import { RandomSource } from '../domain/types.js';

/**
 * Linear congruential generator. Without a seed, falls back to Math.random.
 */
export function createSeededRandom(seed?: number): RandomSource {
  if (seed === undefined) return Math.random;
  let state = (seed >>> 0) || 0x6d2b79f5;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/**
 * Uniform integer in [min, max], both inclusive
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomChoice<T>(random: RandomSource, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(random, 0, items.length - 1)];
}
