import { describe, it, expect } from 'vitest';
import { FieldConfigSchema, ObservationSchema, observationSchemaFor } from '../types.js';
import { parseWith } from '../validate.js';
import { SweepError, isSweepError } from '../errors.js';

describe('ObservationSchema', () => {
  it('accepts counts 0 to 8', () => {
    expect(ObservationSchema.safeParse({ cell: { row: 0, col: 0 }, count: 8 }).success).toBe(true);
    expect(ObservationSchema.safeParse({ cell: { row: 0, col: 0 }, count: 9 }).success).toBe(false);
    expect(ObservationSchema.safeParse({ cell: { row: 0, col: 0 }, count: 1.5 }).success).toBe(false);
  });

  it('checks the board bounds when built for dimensions', () => {
    const schema = observationSchemaFor({ height: 2, width: 2 });
    expect(schema.safeParse({ cell: { row: 1, col: 1 }, count: 0 }).success).toBe(true);
    expect(schema.safeParse({ cell: { row: 2, col: 0 }, count: 0 }).success).toBe(false);
  });
});

describe('FieldConfigSchema', () => {
  it('rejects more mines than cells', () => {
    expect(FieldConfigSchema.safeParse({ height: 2, width: 2, mines: 4 }).success).toBe(true);
    expect(FieldConfigSchema.safeParse({ height: 2, width: 2, mines: 5 }).success).toBe(false);
  });
});

describe('parseWith', () => {
  it('returns parsed data', () => {
    const obs = parseWith(ObservationSchema, { cell: { row: 1, col: 2 }, count: 3 }, 'INVALID_OBSERVATION');
    expect(obs).toEqual({ cell: { row: 1, col: 2 }, count: 3 });
  });

  it('throws a SweepError with the requested code', () => {
    let caught: unknown;
    try {
      parseWith(ObservationSchema, { cell: { row: 0, col: 0 }, count: 9 }, 'INVALID_OBSERVATION');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SweepError);
    expect(isSweepError(caught, 'INVALID_OBSERVATION')).toBe(true);
    expect(isSweepError(caught, 'INVALID_CONFIG')).toBe(false);
    if (caught instanceof SweepError) {
      expect(caught.message.startsWith('count:')).toBe(true);
      expect(caught.name).toBe('SweepError');
    }
  });
});
