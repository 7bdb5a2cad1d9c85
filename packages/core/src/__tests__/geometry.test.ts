import { describe, it, expect } from 'vitest';
import {
  cell, cellKey, compareCells, cellToString,
  isInBounds, neighbors, allCells,
} from '../geometry.js';

const dims = { height: 3, width: 3 };

describe('Cell operations', () => {
  it('keys a cell as "row,col"', () => {
    expect(cellKey(cell(2, 5))).toBe('2,5');
  });

  it('orders row-major', () => {
    const sorted = [cell(1, 0), cell(0, 2), cell(0, 1)].sort(compareCells);
    expect(sorted).toEqual([cell(0, 1), cell(0, 2), cell(1, 0)]);
  });

  it('formats as a pair', () => {
    expect(cellToString(cell(3, 4))).toBe('(3,4)');
  });
});

describe('Neighbourhood', () => {
  it('clips corners to the board', () => {
    expect(neighbors(cell(0, 0), dims)).toEqual([cell(0, 1), cell(1, 0), cell(1, 1)]);
  });

  it('gives eight neighbours in the interior', () => {
    const n = neighbors(cell(1, 1), dims);
    expect(n).toHaveLength(8);
    expect(n).not.toContainEqual(cell(1, 1));
  });

  it('has no neighbours on a 1x1 board', () => {
    expect(neighbors(cell(0, 0), { height: 1, width: 1 })).toEqual([]);
  });

  it('checks bounds', () => {
    expect(isInBounds(cell(2, 2), dims)).toBe(true);
    expect(isInBounds(cell(3, 0), dims)).toBe(false);
    expect(isInBounds(cell(-1, 0), dims)).toBe(false);
  });

  it('lists every cell row-major', () => {
    const cells = allCells({ height: 2, width: 3 });
    expect(cells).toHaveLength(6);
    expect(cells[0]).toEqual(cell(0, 0));
    expect(cells[5]).toEqual(cell(1, 2));
  });
});
