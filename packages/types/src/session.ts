/**
 * Session Types
 *
 * Primitives shared by the ledger and the lock manager.
 *
 * Rules:
 * - Amounts are bigint, never number
 * - Lock records are immutable once created
 * - Positive delta = participant owes the manager
 */

/**
 * Identifier of a participant (a "locker") that opens sessions
 * on the manager and accrues deltas against it.
 */
export type ParticipantId = string;

/**
 * Identifier of a currency tracked by the ledger (e.g., "USDC", "ETH").
 */
export type CurrencyId = string;

/**
 * Position of a record in the append-only lock history.
 * The first record ever opened has index 0.
 */
export type LockIndex = number;

/**
 * Opaque payload passed through `acquire` to a lock callback.
 */
export type Bytes = Uint8Array;

/**
 * An immutable entry in the lock history.
 */
export interface LockRecord {
  /** Participant that opened this lock */
  readonly owner: ParticipantId;

  /**
   * Index of the lock that was active when this one was opened.
   * 0 for an outermost lock.
   */
  readonly parentIndex: LockIndex;

  /** Nesting depth at creation. 1 for an outermost lock. */
  readonly depth: number;
}

/**
 * A single outstanding (participant, currency) balance.
 */
export interface DeltaEntry {
  readonly participant: ParticipantId;
  readonly currency: CurrencyId;
  /** Signed amount. Positive = participant owes the manager. */
  readonly amount: bigint;
}
