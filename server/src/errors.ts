// ============================================
// Invariant Violations
// Internal logic errors that abort the current operation
// ============================================

export type InvariantCode =
  | 'MISSING_NEIGHBORHOOD'
  | 'DUPLICATE_TRAIL'
  | 'EXCESS_OFFSPRING'
  | 'STORAGE_OVERFLOW';

export class InvariantViolation extends Error {
  readonly code: InvariantCode;
  readonly details?: Record<string, unknown>;

  constructor(code: InvariantCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InvariantViolation';
    this.code = code;
    this.details = details;
  }
}

/**
 * Format any thrown value for structured logs
 */
export function describeError(error: unknown): { error: string; stack?: string; code?: string } {
  if (error instanceof InvariantViolation) {
    return { error: error.message, stack: error.stack, code: error.code };
  }
  return {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
