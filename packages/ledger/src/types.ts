/**
 * @nestlock/ledger — Internal types for the currency ledger.
 *
 * Rules:
 * - Amounts are bigint
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { CurrencyId, ParticipantId } from "@nestlock/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_PARTICIPANT"
  | "INVALID_CURRENCY"
  | "JOURNAL_MARK_NOT_OPEN";

/**
 * Structured error from the ledger.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * A non-zero entry as stored in a snapshot.
 * Amount is a base-10 integer string so the snapshot survives JSON.
 */
export interface DeltaSnapshotEntry {
  readonly participant: ParticipantId;
  readonly currency: CurrencyId;
  readonly amount: string;
}

/**
 * Serializable view of every outstanding delta.
 * Zero entries are never listed.
 */
export interface DeltaSnapshot {
  readonly version: 1;
  readonly nonZeroCount: number;
  readonly entries: readonly DeltaSnapshotEntry[];
}
