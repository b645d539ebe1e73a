/**
 * Random sources and shuffling
 */

import type { RandomSource } from './types.js';

/**
 * Unseeded source backed by Math.random
 */
export const defaultRandom: RandomSource = () => Math.random();

/** Seeds are unsigned 32-bit integers */
export const MAX_SEED = 0xffffffff;

/**
 * Deterministic mulberry32 generator. The same seed always yields the same
 * sequence, and every seed in [0, MAX_SEED] yields a different one.
 */
export function createSeededRandom(seed: number): RandomSource {
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new Error(`seed must be an integer from 0 to ${MAX_SEED}, got ${seed}`);
  }
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let value = Math.imul(state ^ (state >>> 15), 1 | state);
    value ^= value + Math.imul(value ^ (value >>> 7), 61 | value);
    return ((value ^ (value >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}
