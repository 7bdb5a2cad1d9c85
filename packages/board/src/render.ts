/**
 * Text rendering for minefields and agent knowledge
 */

import type { Cell, Dimensions, ReadonlyCellSet } from '@sweepmind/core';
import type { Minefield } from './minefield.js';

function separator(width: number): string {
  return '--'.repeat(width) + '-';
}

/**
 * Mine layout as a framed grid: `|X` marks a mine.
 *
 *   -------
 *   |X| | |
 *   -------
 */
export function renderMinefield(field: Minefield): string {
  const { height, width } = field.dimensions;
  const lines: string[] = [];
  for (let row = 0; row < height; row++) {
    lines.push(separator(width));
    let line = '';
    for (let col = 0; col < width; col++) {
      line += field.isMine({ row, col }) ? '|X' : '| ';
    }
    lines.push(line + '|');
  }
  lines.push(separator(width));
  return lines.join('\n');
}

export interface KnowledgeView {
  readonly mines: ReadonlyCellSet;
  readonly safes: ReadonlyCellSet;
  observedCount(c: Cell): number | undefined;
}

/**
 * What the agent knows, one character per cell: the revealed count, `F` for
 * a proven mine, `.` for proven safe but unrevealed, `#` for unknown.
 */
export function renderAgentView(dims: Dimensions, view: KnowledgeView): string {
  const mines = view.mines;
  const safes = view.safes;
  const rows: string[] = [];
  for (let row = 0; row < dims.height; row++) {
    let line = '';
    for (let col = 0; col < dims.width; col++) {
      const c = { row, col };
      const count = view.observedCount(c);
      if (count !== undefined) line += String(count);
      else if (mines.has(c)) line += 'F';
      else if (safes.has(c)) line += '.';
      else line += '#';
    }
    rows.push(line);
  }
  return rows.join('\n');
}
