import { CellSet, SweepError, type Cell, type ReadonlyCellSet } from '@sweepmind/core';

/**
 * Logical statement about the board: exactly `count` of `cells` are mines.
 *
 * Sentences shrink in place as the knowledge base learns facts about their
 * cells; `count` always stays within [0, |cells|].
 */
export class Sentence {
  private readonly cellSet: CellSet;
  private mineCount: number;

  constructor(cells: Iterable<Cell>, count: number) {
    const cellSet = new CellSet(cells);
    if (!Number.isInteger(count) || count < 0 || count > cellSet.size) {
      throw new SweepError(
        `Sentence count ${count} is outside [0, ${cellSet.size}] for ${cellSet.toString()}`,
        'INVALID_SENTENCE',
        { count, size: cellSet.size }
      );
    }
    this.cellSet = cellSet;
    this.mineCount = count;
  }

  get cells(): ReadonlyCellSet {
    return this.cellSet;
  }

  get count(): number {
    return this.mineCount;
  }

  get size(): number {
    return this.cellSet.size;
  }

  /** Every remaining cell when the count covers all of them */
  knownMines(): CellSet {
    return this.mineCount === this.cellSet.size ? this.cellSet.clone() : new CellSet();
  }

  /** Every remaining cell when the count is zero */
  knownSafes(): CellSet {
    return this.mineCount === 0 ? this.cellSet.clone() : new CellSet();
  }

  /** Drops a cell known to be a mine; returns true if it was present */
  markMine(c: Cell): boolean {
    if (!this.cellSet.delete(c)) return false;
    this.mineCount -= 1;
    return true;
  }

  /** Drops a cell known to be safe; returns true if it was present */
  markSafe(c: Cell): boolean {
    return this.cellSet.delete(c);
  }

  equals(other: Sentence): boolean {
    return this.mineCount === other.mineCount && this.cellSet.equals(other.cellSet);
  }

  hasSize(n: number): boolean {
    return this.cellSet.size === n;
  }

  isEmpty(): boolean {
    return this.hasSize(0);
  }

  isStrictSubsetOf(other: Sentence): boolean {
    return this.cellSet.isStrictSubsetOf(other.cellSet);
  }

  /**
   * Subset resolution: with `subset` a strict subset of this sentence, the
   * cells only this sentence mentions hold the mines `subset` does not.
   */
  subtract(subset: Sentence): Sentence {
    return new Sentence(this.cellSet.difference(subset.cellSet), this.mineCount - subset.mineCount);
  }

  /** Canonical form; equal sentences share a key */
  key(): string {
    return `${Array.from(this.cellSet.keys()).sort().join(';')}=${this.mineCount}`;
  }

  clone(): Sentence {
    return new Sentence(this.cellSet, this.mineCount);
  }

  assertValid(): void {
    if (!Number.isInteger(this.mineCount) || this.mineCount < 0 || this.mineCount > this.cellSet.size) {
      throw new SweepError(`Sentence ${this.toString()} broke 0 <= count <= |cells|`, 'INVARIANT_VIOLATION', {
        count: this.mineCount,
        size: this.cellSet.size,
      });
    }
  }

  toString(): string {
    return `${this.cellSet.toString()} = ${this.mineCount}`;
  }
}
