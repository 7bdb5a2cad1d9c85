import {
  CellSet,
  DimensionsSchema,
  FieldConfigSchema,
  SweepError,
  cellToString,
  createRng,
  isInBounds,
  neighbors,
  parseWith,
  randomIndex,
  type Cell,
  type Dimensions,
  type FieldConfig,
  type RandomSource,
  type ReadonlyCellSet,
} from '@sweepmind/core';

export const DEFAULT_FIELD_CONFIG: FieldConfig = {
  height: 8,
  width: 8,
  mines: 8,
};

/**
 * Hidden board the agent plays against: mine layout plus the flags placed
 * so far.
 */
export class Minefield {
  readonly dimensions: Dimensions;
  private mines: CellSet;
  private flags = new CellSet();

  /** Places `mines` mines uniformly at random */
  constructor(config: Partial<FieldConfig> = {}, rng: RandomSource = createRng()) {
    const { height, width, mines } = parseWith(
      FieldConfigSchema,
      { ...DEFAULT_FIELD_CONFIG, ...config },
      'INVALID_CONFIG'
    );
    this.dimensions = { height, width };
    this.mines = new CellSet();
    while (this.mines.size < mines) {
      this.mines.add({ row: randomIndex(height, rng), col: randomIndex(width, rng) });
    }
  }

  /** Fixed layout */
  static fromMines(dims: Dimensions, mines: Iterable<Cell>): Minefield {
    const checked = parseWith(DimensionsSchema, dims, 'INVALID_CONFIG');
    const layout = new CellSet(mines);
    for (const c of layout) {
      if (!isInBounds(c, checked)) {
        throw new SweepError(`Mine ${cellToString(c)} lies off the board`, 'INVALID_CONFIG', { cell: c });
      }
    }
    const field = new Minefield({ ...checked, mines: 0 });
    field.mines = layout;
    return field;
  }

  get mineCount(): number {
    return this.mines.size;
  }

  get flagged(): ReadonlyCellSet {
    return this.flags.clone();
  }

  mineCells(): Cell[] {
    return this.mines.sorted();
  }

  isMine(c: Cell): boolean {
    return this.mines.has(c);
  }

  /** Mines among the clipped 8-neighbourhood of a safe cell */
  nearbyMines(c: Cell): number {
    if (this.mines.has(c)) {
      throw new SweepError(`${cellToString(c)} is a mine`, 'MINE_REVEALED', { cell: c });
    }
    return neighbors(c, this.dimensions).filter(n => this.mines.has(n)).length;
  }

  flag(c: Cell): void {
    this.flags.add(c);
  }

  /** Every mine flagged and nothing else */
  won(): boolean {
    return this.flags.equals(this.mines);
  }
}
