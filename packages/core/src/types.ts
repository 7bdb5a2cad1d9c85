/**
 * Core types for SweepMind
 */

import { z } from 'zod';

// =============================================================================
// Cells
// =============================================================================

export const CellSchema = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative(),
});

export interface Cell {
  readonly row: number;
  readonly col: number;
}

/** Canonical "row,col" key used wherever a cell must be hashed */
export type CellKey = `${number},${number}`;

// =============================================================================
// Board dimensions and configuration
// =============================================================================

export const DimensionsSchema = z.object({
  height: z.number().int().positive(),
  width: z.number().int().positive(),
});

export type Dimensions = z.infer<typeof DimensionsSchema>;

export const FieldConfigSchema = DimensionsSchema.extend({
  mines: z.number().int().nonnegative(),
}).refine(cfg => cfg.mines <= cfg.height * cfg.width, {
  message: 'mines must not exceed the number of cells',
  path: ['mines'],
});

export type FieldConfig = z.infer<typeof FieldConfigSchema>;

// =============================================================================
// Observations
// =============================================================================

/** At most 8 neighbours can hold a mine */
const MAX_NEIGHBOR_COUNT = 8;

export const ObservationSchema = z.object({
  cell: CellSchema,
  count: z.number().int().min(0).max(MAX_NEIGHBOR_COUNT),
});

/** Builds an observation schema that also checks the cell lies on the board */
export function observationSchemaFor(dims: Dimensions) {
  return ObservationSchema.refine(
    obs => obs.cell.row < dims.height && obs.cell.col < dims.width,
    { message: `cell must lie within a ${dims.height}x${dims.width} board`, path: ['cell'] }
  );
}

// =============================================================================
// Moves
// =============================================================================

export type MoveKind = 'safe' | 'random';

export interface MoveDecision {
  cell: Cell;
  kind: MoveKind;
}
