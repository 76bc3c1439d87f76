export type LedgerFailureReason =
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_AMOUNT"
  | "UNKNOWN_CODE"
  | "SELF_REFERRAL"
  | "ALREADY_REFERRED"
  | "CIRCULAR_REFERRAL";

/**
 * An expected refusal (missing row, illegal state, not enough balance).
 * Thrown inside a ledger transaction so that it rolls back, then turned into a
 * failed `LedgerResult` for the caller.
 */
export class LedgerError extends Error {
  readonly reason: LedgerFailureReason;

  constructor(reason: LedgerFailureReason, message: string) {
    super(message);
    this.name = "LedgerError";
    this.reason = reason;
  }
}

/** The store failed; nothing of the operation was applied. */
export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export type LedgerResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: LedgerFailureReason; message: string };

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
