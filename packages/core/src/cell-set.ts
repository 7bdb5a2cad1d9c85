import type { Cell, CellKey } from './types.js';
import { cellKey, compareCells, cellToString } from './geometry.js';

/** Read-only view of a set of cells */
export interface ReadonlyCellSet extends Iterable<Cell> {
  readonly size: number;
  has(c: Cell): boolean;
  values(): IterableIterator<Cell>;
  keys(): IterableIterator<CellKey>;
  toArray(): Cell[];
  sorted(): Cell[];
  equals(other: ReadonlyCellSet): boolean;
  isSubsetOf(other: ReadonlyCellSet): boolean;
  isStrictSubsetOf(other: ReadonlyCellSet): boolean;
}

/**
 * Set of cells with value semantics: two cells with the same row and column
 * are the same member. Iteration follows insertion order.
 */
export class CellSet implements ReadonlyCellSet {
  private members: Map<CellKey, Cell> = new Map();

  constructor(cells: Iterable<Cell> = []) {
    for (const c of cells) this.add(c);
  }

  get size(): number {
    return this.members.size;
  }

  has(c: Cell): boolean {
    return this.members.has(cellKey(c));
  }

  /** Returns true when the cell was not already present */
  add(c: Cell): boolean {
    const key = cellKey(c);
    if (this.members.has(key)) return false;
    this.members.set(key, { row: c.row, col: c.col });
    return true;
  }

  /** Returns true when the cell was present */
  delete(c: Cell): boolean {
    return this.members.delete(cellKey(c));
  }

  values(): IterableIterator<Cell> {
    return this.members.values();
  }

  keys(): IterableIterator<CellKey> {
    return this.members.keys();
  }

  [Symbol.iterator](): IterableIterator<Cell> {
    return this.members.values();
  }

  toArray(): Cell[] {
    return Array.from(this.members.values(), c => ({ row: c.row, col: c.col }));
  }

  /** Members in row-major order */
  sorted(): Cell[] {
    return this.toArray().sort(compareCells);
  }

  equals(other: ReadonlyCellSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  isSubsetOf(other: ReadonlyCellSet): boolean {
    if (this.size > other.size) return false;
    for (const c of this.members.values()) {
      if (!other.has(c)) return false;
    }
    return true;
  }

  isStrictSubsetOf(other: ReadonlyCellSet): boolean {
    return this.size < other.size && this.isSubsetOf(other);
  }

  difference(other: ReadonlyCellSet): CellSet {
    const out = new CellSet();
    for (const c of this.members.values()) {
      if (!other.has(c)) out.add(c);
    }
    return out;
  }

  intersection(other: ReadonlyCellSet): CellSet {
    const out = new CellSet();
    for (const c of this.members.values()) {
      if (other.has(c)) out.add(c);
    }
    return out;
  }

  clone(): CellSet {
    return new CellSet(this.members.values());
  }

  toString(): string {
    return `{${this.sorted().map(cellToString).join(', ')}}`;
  }
}
