/**
 * Randomness sources
 *
 * Every random choice in the workspace draws from a RandomSource so that a
 * game can be reproduced from its seed or from a recorded list of draws.
 */

import { SweepError } from './errors.js';

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

/**
 * mulberry32 stream for a seed; falls back to Math.random without one.
 * Seeds in (0, 1) are scaled up so fractional seeds still spread.
 */
export const createRng = (seed?: number): RandomSource => {
  if (seed === undefined) {
    return Math.random;
  }

  let state = seed;
  if (seed > 0 && seed < 1) {
    state = seed * 0xffffffff;
  }

  let t = (state >>> 0) || 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export interface RecordingRng {
  next: RandomSource;
  draws: number[];
}

/** Wraps a source and keeps every value it hands out */
export const recordRng = (source: RandomSource): RecordingRng => {
  const draws: number[] = [];
  return {
    draws,
    next: () => {
      const value = source();
      draws.push(value);
      return value;
    },
  };
};

/** Replays recorded draws in order, then wraps around */
export const replayRng = (draws: readonly number[]): RandomSource => {
  if (draws.length === 0) {
    throw new SweepError('replayRng needs at least one draw', 'INVALID_CONFIG');
  }
  let i = 0;
  return () => {
    const value = draws[i % draws.length];
    i++;
    return value;
  };
};

/** Uniform index into a collection of the given length */
export const randomIndex = (length: number, rng: RandomSource): number =>
  Math.min(length - 1, Math.floor(rng() * length));

/** Uniform pick, or null for an empty list */
export function pickRandom<T>(items: readonly T[], rng: RandomSource): T | null {
  if (items.length === 0) return null;
  return items[randomIndex(items.length, rng)];
}
