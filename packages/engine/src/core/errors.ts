/**
 * Ledger errors
 *
 * Every engine failure carries a category code. Failures are deterministic
 * (pure computation), so nothing is retried and nothing is handled internally.
 */

export type LedgerErrorCode =
  // Caller-supplied split data is inconsistent
  | 'InvalidSplitSpec'
  | 'SplitMismatch'
  | 'UnassignedParticipant'
  // Relationship graph integrity
  | 'ManagementCycle'
  | 'ConflictingManager'
  // Currency data
  | 'RateUnavailable'
  // Aggregation invariant broken upstream
  | 'UnbalancedLedger'
  // Record failed schema validation
  | 'InvalidInput';

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LedgerErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, LedgerError.prototype);
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  if (!(error instanceof LedgerError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Value-or-error result used where failure is part of normal control flow
 */
export type LedgerResult<T> = { ok: true; value: T } | { ok: false; error: LedgerError };
