import { describe, it, expect } from 'vitest';
import { cell, replayRng } from '@sweepmind/core';
import { SweepAgent } from '../agent.js';
import { chooseRandomMove, chooseSafeMove } from '../move-selector.js';
import { KnowledgeBase } from '../knowledge-base.js';

describe('chooseSafeMove', () => {
  it('returns null before anything is proven', () => {
    const kb = new KnowledgeBase({ height: 2, width: 2 });
    expect(chooseSafeMove(kb)).toBeNull();
  });

  it('picks the earliest proven unrevealed cell without changing state', () => {
    const kb = new KnowledgeBase({ height: 2, width: 2 });
    kb.observe(cell(0, 0), 0);
    expect(chooseSafeMove(kb)).toEqual(cell(0, 1));
    expect(chooseSafeMove(kb)).toEqual(cell(0, 1));
    expect(kb.movesMade.size).toBe(1);
  });
});

describe('chooseRandomMove', () => {
  it('draws row-major over the open cells', () => {
    const kb = new KnowledgeBase({ height: 2, width: 2 });
    expect(chooseRandomMove(kb, replayRng([0]))).toEqual(cell(0, 0));
    expect(chooseRandomMove(kb, replayRng([0.99]))).toEqual(cell(1, 1));
  });

  it('skips revealed cells and proven mines', () => {
    const kb = new KnowledgeBase({ height: 1, width: 3 });
    kb.observe(cell(0, 0), 1);
    expect(chooseRandomMove(kb, replayRng([0]))).toEqual(cell(0, 2));
  });
});

describe('SweepAgent', () => {
  it('has no move once every cell is revealed or mined', () => {
    const agent = new SweepAgent({ height: 1, width: 2, rng: replayRng([0.5]) });
    agent.observe(cell(0, 0), 1);
    expect(agent.chooseSafeMove()).toBeNull();
    expect(agent.chooseRandomMove()).toBeNull();
    expect(agent.chooseMove()).toBeNull();
  });

  it('prefers proven-safe moves', () => {
    const agent = new SweepAgent({ height: 2, width: 2, rng: replayRng([0]) });
    expect(agent.chooseMove()).toEqual({ cell: cell(0, 0), kind: 'random' });
    agent.observe(cell(0, 0), 0);
    expect(agent.chooseMove()).toEqual({ cell: cell(0, 1), kind: 'safe' });
  });

  it('repeats its guesses for the same seed', () => {
    const a = new SweepAgent({ height: 4, width: 4, seed: 11 });
    const b = new SweepAgent({ height: 4, width: 4, seed: 11 });
    for (let i = 0; i < 5; i++) {
      expect(a.chooseRandomMove()).toEqual(b.chooseRandomMove());
    }
  });

  it('uses an injected source over a seed', () => {
    const agent = new SweepAgent({ height: 2, width: 2, seed: 5, rng: replayRng([0.99]) });
    expect(agent.chooseRandomMove()).toEqual(cell(1, 1));
  });

  it('exposes the knowledge base through copies', () => {
    const agent = new SweepAgent({ height: 3, width: 3, trace: true });
    agent.observe(cell(1, 1), 1);
    expect(agent.sentences).toHaveLength(1);
    expect(agent.movesMade.has(cell(1, 1))).toBe(true);
    expect(agent.safes.has(cell(1, 1))).toBe(true);
    expect(agent.mines.size).toBe(0);
    expect(agent.observedCount(cell(1, 1))).toBe(1);
    expect(agent.trace.map(e => e.stage)).toEqual(['pass', 'observe']);
    expect(agent.dimensions).toEqual({ height: 3, width: 3 });
  });
});
