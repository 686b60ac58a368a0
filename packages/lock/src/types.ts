/**
 * @nestlock/lock — Types for the lock manager.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint internally, strings in log entries and snapshots
 * - Fail-closed: every violation throws a LockError
 */

import type {
  Bytes,
  CurrencyId,
  DeltaEntry,
  LockIndex,
  LockRecord,
  ParticipantId,
} from "@nestlock/types";
import type { DeltaSnapshot, Journal } from "@nestlock/ledger";

// ─── Callback ────────────────────────────────────────────────────────────

/**
 * Capability a participant hands to `acquire`. Invoked exactly once,
 * synchronously, while the participant's lock is active. May call back
 * into the manager, including `acquire` itself.
 */
export interface LockCallback<TPayload = Bytes, TResult = Bytes> {
  lockAcquired(payload: TPayload, lockIndex: LockIndex): TResult;
}

// ─── Value Transfer ──────────────────────────────────────────────────────

/**
 * External capability that actually moves value between holders.
 * A transfer either completes or throws without partial effect.
 */
export interface ValueTransfer {
  balanceOf(currency: CurrencyId, holder: ParticipantId): bigint;
  transfer(currency: CurrencyId, from: ParticipantId, to: ParticipantId, amount: bigint): void;
}

// ─── State ───────────────────────────────────────────────────────────────

export type LockState =
  | { readonly status: "idle" }
  | {
      readonly status: "locked";
      readonly depth: number;
      readonly index: LockIndex;
      readonly owner: ParticipantId;
    };

// ─── Configuration ───────────────────────────────────────────────────────

export interface LockManagerOptions {
  /** Holder identity of the manager itself in the value-transfer layer. */
  readonly managerId?: ParticipantId | undefined;
  readonly bank: ValueTransfer;
  /**
   * Undo journal for the session context. Pass the same journal to a
   * journaling bank so rolled-back sessions also undo its transfers.
   */
  readonly journal?: Journal | undefined;
  /** Deepest nesting allowed. Unlimited when omitted. */
  readonly maxDepth?: number | undefined;
  readonly log?: ((entry: LockLogEntry) => void) | undefined;
}

// ─── Log Entries ─────────────────────────────────────────────────────────

export type LockLogEntry =
  | {
      readonly event: "lock.acquired";
      readonly index: LockIndex;
      readonly owner: ParticipantId;
      readonly parentIndex: LockIndex;
      readonly depth: number;
    }
  | {
      readonly event: "lock.released";
      readonly index: LockIndex;
      readonly owner: ParticipantId;
      readonly depth: number;
    }
  | {
      readonly event: "lock.rolled_back";
      readonly index: LockIndex;
      readonly owner: ParticipantId;
      readonly depth: number;
      readonly error: string;
    }
  | {
      /** A callback's promise rejected after its lock was rolled back. */
      readonly event: "lock.callback_rejected";
      readonly index: LockIndex;
      readonly owner: ParticipantId;
      readonly error: string;
    }
  | {
      readonly event: "delta.settled";
      readonly owner: ParticipantId;
      readonly currency: CurrencyId;
      readonly paid: string;
      readonly delta: string;
    }
  | {
      readonly event: "delta.taken";
      readonly owner: ParticipantId;
      readonly currency: CurrencyId;
      readonly recipient: ParticipantId;
      readonly amount: string;
      readonly delta: string;
    };

// ─── Snapshot ────────────────────────────────────────────────────────────

export interface ReserveSnapshotEntry {
  readonly currency: CurrencyId;
  readonly amount: string;
}

/**
 * Serializable audit view of a manager.
 */
export interface LockManagerSnapshot {
  readonly version: 1;
  readonly managerId: ParticipantId;
  readonly locks: readonly LockRecord[];
  readonly lockIndex: LockIndex | null;
  readonly depth: number;
  readonly deltas: DeltaSnapshot;
  readonly reserves: readonly ReserveSnapshotEntry[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for lock manager operations. */
export type LockErrorCode =
  | "UNSETTLED_BALANCE"
  | "NO_ACTIVE_LOCK"
  | "INSUFFICIENT_RESERVE"
  | "INVALID_NESTING"
  | "INVALID_AMOUNT"
  | "INVALID_PARTICIPANT"
  | "INVALID_CURRENCY"
  | "LOCK_NOT_FOUND"
  | "DEPTH_LIMIT_EXCEEDED"
  | "ASYNC_CALLBACK";

/**
 * Structured error from the lock manager.
 * `outstanding` lists the unreconciled entries for UNSETTLED_BALANCE.
 */
export class LockError extends Error {
  public readonly code: LockErrorCode;
  public readonly outstanding: readonly DeltaEntry[];

  constructor(
    code: LockErrorCode,
    message: string,
    options?: { readonly outstanding?: readonly DeltaEntry[]; readonly cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LockError";
    this.code = code;
    this.outstanding = options?.outstanding ?? [];
  }
}
