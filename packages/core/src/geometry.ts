/**
 * Board geometry
 *
 * - Cells: construction, keys, ordering
 * - Bounds: clipping to a board
 * - Neighbourhood: the 8 surrounding cells
 */

import type { Cell, CellKey, Dimensions } from './types.js';

// =============================================================================
// Cell Operations
// =============================================================================

export function cell(row: number, col: number): Cell {
  return { row, col };
}

export function cellKey(c: Cell): CellKey {
  return `${c.row},${c.col}`;
}

/** Row-major ordering */
export function compareCells(a: Cell, b: Cell): number {
  return a.row - b.row || a.col - b.col;
}

export function cellToString(c: Cell): string {
  return `(${c.row},${c.col})`;
}

// =============================================================================
// Bounds and Neighbourhood
// =============================================================================

export function isInBounds(c: Cell, dims: Dimensions): boolean {
  return c.row >= 0 && c.row < dims.height && c.col >= 0 && c.col < dims.width;
}

/**
 * The 8-neighbourhood of a cell clipped to the board, excluding the cell
 * itself, in row-major order.
 */
export function neighbors(c: Cell, dims: Dimensions): Cell[] {
  const out: Cell[] = [];
  for (let row = c.row - 1; row <= c.row + 1; row++) {
    for (let col = c.col - 1; col <= c.col + 1; col++) {
      if (row === c.row && col === c.col) continue;
      const n = { row, col };
      if (isInBounds(n, dims)) out.push(n);
    }
  }
  return out;
}

/** Every cell of the board in row-major order */
export function allCells(dims: Dimensions): Cell[] {
  const out: Cell[] = [];
  for (let row = 0; row < dims.height; row++) {
    for (let col = 0; col < dims.width; col++) {
      out.push({ row, col });
    }
  }
  return out;
}
