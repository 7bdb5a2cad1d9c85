import {
  createRng,
  type Cell,
  type Dimensions,
  type MoveDecision,
  type RandomSource,
  type ReadonlyCellSet,
  type TraceEntry,
} from '@sweepmind/core';
import { KnowledgeBase, type PropagationReport } from './knowledge-base.js';
import { chooseRandomMove, chooseSafeMove } from './move-selector.js';
import type { Sentence } from './sentence.js';

export interface AgentConfig {
  height: number;
  width: number;
  /** Seed for the fallback move stream; ignored when `rng` is given */
  seed?: number;
  rng?: RandomSource;
  trace?: boolean;
  checkInvariants?: boolean;
}

/**
 * Mine-deduction player
 *
 * Reasoning lives in the knowledge base; the agent adds the move policy:
 * a proven-safe cell when one exists, otherwise a uniform guess among the
 * cells not known to be mines.
 */
export class SweepAgent {
  private knowledge: KnowledgeBase;
  private rng: RandomSource;

  constructor(config: AgentConfig) {
    this.knowledge = new KnowledgeBase({
      height: config.height,
      width: config.width,
      trace: config.trace,
      checkInvariants: config.checkInvariants,
    });
    this.rng = config.rng ?? createRng(config.seed);
  }

  get dimensions(): Dimensions {
    return this.knowledge.dimensions;
  }

  get mines(): ReadonlyCellSet {
    return this.knowledge.mines;
  }

  get safes(): ReadonlyCellSet {
    return this.knowledge.safes;
  }

  get movesMade(): ReadonlyCellSet {
    return this.knowledge.movesMade;
  }

  get sentences(): Sentence[] {
    return this.knowledge.sentences;
  }

  get trace(): TraceEntry[] {
    return this.knowledge.trace;
  }

  observedCount(c: Cell): number | undefined {
    return this.knowledge.observedCount(c);
  }

  observe(c: Cell, count: number): PropagationReport {
    return this.knowledge.observe(c, count);
  }

  chooseSafeMove(): Cell | null {
    return chooseSafeMove(this.knowledge);
  }

  chooseRandomMove(): Cell | null {
    return chooseRandomMove(this.knowledge, this.rng);
  }

  chooseMove(): MoveDecision | null {
    const safe = this.chooseSafeMove();
    if (safe) return { cell: safe, kind: 'safe' };
    const guess = this.chooseRandomMove();
    return guess ? { cell: guess, kind: 'random' } : null;
  }
}
