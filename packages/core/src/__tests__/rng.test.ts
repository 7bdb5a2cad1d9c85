import { describe, it, expect } from 'vitest';
import { createRng, recordRng, replayRng, randomIndex, pickRandom } from '../rng.js';
import { isSweepError } from '../errors.js';

describe('createRng', () => {
  it('repeats a stream for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 5; i++) {
      expect(a()).toBe(b());
    }
  });

  it('stays within [0, 1)', () => {
    const rng = createRng(7);
    for (let i = 0; i < 100; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('falls back to Math.random without a seed', () => {
    expect(createRng()).toBe(Math.random);
  });
});

describe('recordRng / replayRng', () => {
  it('replays recorded draws exactly', () => {
    const recording = recordRng(createRng(3));
    const original = [recording.next(), recording.next(), recording.next()];
    const replay = replayRng(recording.draws);
    expect([replay(), replay(), replay()]).toEqual(original);
  });

  it('wraps around', () => {
    const replay = replayRng([0.25, 0.75]);
    expect([replay(), replay(), replay()]).toEqual([0.25, 0.75, 0.25]);
  });

  it('rejects an empty recording', () => {
    let caught: unknown;
    try {
      replayRng([]);
    } catch (err) {
      caught = err;
    }
    expect(isSweepError(caught, 'INVALID_CONFIG')).toBe(true);
  });
});

describe('randomIndex / pickRandom', () => {
  it('maps draws onto indices', () => {
    expect(randomIndex(3, () => 0)).toBe(0);
    expect(randomIndex(3, () => 0.5)).toBe(1);
    expect(randomIndex(3, () => 0.999999)).toBe(2);
  });

  it('returns null for an empty list', () => {
    expect(pickRandom([], () => 0.5)).toBeNull();
    expect(pickRandom(['a', 'b'], () => 0.6)).toBe('b');
  });
});
