import { allCells, pickRandom, type Cell, type Dimensions, type RandomSource, type ReadonlyCellSet } from '@sweepmind/core';

/** The parts of a knowledge base a move policy reads */
export interface MoveView {
  readonly dimensions: Dimensions;
  readonly mines: ReadonlyCellSet;
  readonly safes: ReadonlyCellSet;
  readonly movesMade: ReadonlyCellSet;
}

/** A proven-safe cell not yet revealed, earliest proven first */
export function chooseSafeMove(view: MoveView): Cell | null {
  const visited = view.movesMade;
  for (const c of view.safes) {
    if (!visited.has(c)) return c;
  }
  return null;
}

/** Uniform draw over the cells neither revealed nor proven mined */
export function chooseRandomMove(view: MoveView, rng: RandomSource): Cell | null {
  const visited = view.movesMade;
  const mines = view.mines;
  const candidates = allCells(view.dimensions).filter(c => !visited.has(c) && !mines.has(c));
  return pickRandom(candidates, rng);
}
