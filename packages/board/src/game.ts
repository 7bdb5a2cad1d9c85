/**
 * Game driver
 *
 * Runs the request/response loop between a SweepAgent and a Minefield:
 * the agent picks a cell, the field reveals it (or ends the game), the
 * agent observes the count and every proven mine gets flagged.
 */

import {
  SweepError,
  addTrace,
  cellToString,
  createRng,
  type Cell,
  type FieldConfig,
  type MoveKind,
  type TraceEntry,
} from '@sweepmind/core';
import { SweepAgent } from '@sweepmind/agent';
import { Minefield } from './minefield.js';

export type GameStatus = 'won' | 'lost' | 'stalled';

export interface MoveRecord {
  cell: Cell;
  kind: MoveKind;
  /** Revealed count, or null when the move hit a mine */
  count: number | null;
}

export interface GameReport {
  status: GameStatus;
  moves: MoveRecord[];
  safeMoves: number;
  randomMoves: number;
  flagged: number;
  trace: TraceEntry[];
}

export interface GameOptions {
  /** Defaults to the number of cells */
  maxMoves?: number;
  trace?: boolean;
}

export function playGame(field: Minefield, agent: SweepAgent, options: GameOptions = {}): GameReport {
  const { height, width } = field.dimensions;
  if (agent.dimensions.height !== height || agent.dimensions.width !== width) {
    throw new SweepError(
      `Agent plays ${agent.dimensions.height}x${agent.dimensions.width}, field is ${height}x${width}`,
      'INVALID_CONFIG'
    );
  }

  const maxMoves = options.maxMoves ?? height * width;
  const safeTotal = height * width - field.mineCount;
  const moves: MoveRecord[] = [];
  let trace: TraceEntry[] = [];
  let revealed = 0;
  let status: GameStatus = 'stalled';

  while (moves.length < maxMoves) {
    const started = performance.now();
    const decision = agent.chooseMove();
    if (!decision) break;

    if (field.isMine(decision.cell)) {
      moves.push({ ...decision, count: null });
      if (options.trace) {
        trace = addTrace(trace, 'move', `${decision.kind} ${cellToString(decision.cell)} -> mine`, performance.now() - started);
      }
      status = 'lost';
      break;
    }

    const count = field.nearbyMines(decision.cell);
    agent.observe(decision.cell, count);
    revealed++;
    for (const mine of agent.mines) field.flag(mine);
    moves.push({ ...decision, count });
    if (options.trace) {
      trace = addTrace(trace, 'move', `${decision.kind} ${cellToString(decision.cell)} -> ${count}`, performance.now() - started);
    }

    if (field.won() || revealed === safeTotal) {
      status = 'won';
      break;
    }
  }

  return {
    status,
    moves,
    safeMoves: moves.filter(m => m.kind === 'safe').length,
    randomMoves: moves.filter(m => m.kind === 'random').length,
    flagged: field.flagged.size,
    trace,
  };
}

export interface SeededGameConfig extends FieldConfig {
  seed: number;
  trace?: boolean;
}

export interface SeededGame {
  field: Minefield;
  agent: SweepAgent;
  report: GameReport;
}

/** Layout and guesses both derive from one seed, so a run is reproducible */
export function playSeededGame(config: SeededGameConfig): SeededGame {
  const { seed, trace, ...fieldConfig } = config;
  const field = new Minefield(fieldConfig, createRng(seed));
  const agent = new SweepAgent({
    height: field.dimensions.height,
    width: field.dimensions.width,
    rng: createRng(seed + 1),
    trace,
  });
  const report = playGame(field, agent, { trace });
  return { field, agent, report };
}
