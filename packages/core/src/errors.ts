// ============================================================================
// Error Types
// ============================================================================

export type SweepErrorCode =
  | 'INVALID_SENTENCE'
  | 'INVALID_OBSERVATION'
  | 'CONFLICTING_OBSERVATION'
  | 'CONTRADICTION'
  | 'INVARIANT_VIOLATION'
  | 'INVALID_CONFIG'
  | 'MINE_REVEALED';

export class SweepError extends Error {
  constructor(
    message: string,
    public readonly code: SweepErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SweepError';
  }
}

/**
 * Check if error is a SweepError, optionally with a given code
 */
export function isSweepError(error: unknown, code?: SweepErrorCode): error is SweepError {
  return error instanceof SweepError && (code === undefined || error.code === code);
}
