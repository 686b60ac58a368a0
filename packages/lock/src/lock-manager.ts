/**
 * @nestlock/lock — Core LockManager class.
 *
 * Lets participants open nested, re-entrant sessions and accrue
 * provisional per-currency deltas while a session is open. Deltas may
 * stay unreconciled across inner releases; only the release of the
 * outermost lock requires every delta of every participant to be zero.
 *
 * API surface:
 * - acquire() — Open a lock and run the participant's callback
 * - settle() — Credit value paid into the manager to the active owner
 * - take() — Send value out of the manager, debiting the active owner
 * - locksLength() / lockIndex() / locks() — Lock history queries
 * - currencyDelta() / nonzeroDeltaCount() / reservesOf() — Ledger queries
 * - snapshot() — Serializable audit view
 *
 * Any failure inside an acquisition reverts everything that acquisition
 * did (ledger, reserves, lock history and journaled bank transfers)
 * before the error leaves `acquire`.
 */

import type {
  Bytes,
  CurrencyId,
  LockIndex,
  LockRecord,
  ParticipantId,
} from "@nestlock/types";
import { isCurrencyId, isParticipantId } from "@nestlock/types";
import { CurrencyLedger, Journal } from "@nestlock/ledger";
import { LockStack } from "./lock-stack.js";
import type {
  LockCallback,
  LockLogEntry,
  LockManagerOptions,
  LockManagerSnapshot,
  LockState,
  ValueTransfer,
} from "./types.js";
import { LockError } from "./types.js";

const DEFAULT_MANAGER_ID: ParticipantId = "manager";

/**
 * All mutable state of one manager. Nothing here is process-wide, so
 * independent managers never observe each other.
 */
interface SessionContext {
  readonly journal: Journal;
  readonly stack: LockStack;
  readonly ledger: CurrencyLedger;
  readonly reserves: Map<CurrencyId, bigint>;
}

function createSessionContext(journal: Journal): SessionContext {
  return {
    journal,
    stack: new LockStack(journal),
    ledger: new CurrencyLedger(journal),
    reserves: new Map(),
  };
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

function errorLabel(err: unknown): string {
  if (err instanceof LockError) {
    return err.code;
  }
  return err instanceof Error ? err.name : "unknown";
}

export class LockManager {
  readonly managerId: ParticipantId;

  private readonly _ctx: SessionContext;
  private readonly _bank: ValueTransfer;
  private readonly _maxDepth: number;
  private readonly _log: ((entry: LockLogEntry) => void) | undefined;

  constructor(options: LockManagerOptions) {
    const managerId = options.managerId ?? DEFAULT_MANAGER_ID;
    if (!isParticipantId(managerId)) {
      throw new LockError("INVALID_PARTICIPANT", `Invalid manager id: "${String(managerId)}"`);
    }

    const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
    if (!(maxDepth >= 1)) {
      throw new LockError("DEPTH_LIMIT_EXCEEDED", `maxDepth must be at least 1, got ${String(maxDepth)}`);
    }

    this.managerId = managerId;
    this._ctx = createSessionContext(options.journal ?? new Journal());
    this._bank = options.bank;
    this._maxDepth = maxDepth;
    this._log = options.log;
  }

  // ─── Sessions ────────────────────────────────────────────────────────

  /**
   * Open a lock owned by `owner`, invoke `callback.lockAcquired(payload)`
   * and close the lock when it returns.
   *
   * Closing the outermost lock throws UNSETTLED_BALANCE unless every
   * delta is zero. On any error the acquisition's effects are reverted
   * and the error is rethrown unchanged.
   */
  acquire<TPayload = Bytes, TResult = Bytes>(
    owner: ParticipantId,
    callback: LockCallback<TPayload, TResult>,
    payload: TPayload,
  ): TResult {
    if (!isParticipantId(owner)) {
      throw new LockError("INVALID_PARTICIPANT", `Invalid lock owner: "${String(owner)}"`);
    }

    const { stack, journal } = this._ctx;

    if (stack.depth >= this._maxDepth) {
      throw new LockError(
        "DEPTH_LIMIT_EXCEEDED",
        `Cannot open lock for "${owner}": depth limit ${String(this._maxDepth)} reached`,
      );
    }

    const mark = journal.mark();
    const index = stack.push(owner);
    const record = stack.recordAt(index);

    try {
      this._emit({
        event: "lock.acquired",
        index,
        owner,
        parentIndex: record.parentIndex,
        depth: record.depth,
      });

      const result = callback.lockAcquired(payload, index);
      if (isPromiseLike(result)) {
        this._observeRejection(result, index, owner);
        throw new LockError(
          "ASYNC_CALLBACK",
          `Callback for lock ${String(index)} returned a promise; lock callbacks must be synchronous`,
        );
      }
      this._release(index);
      journal.commit(mark);
      return result;
    } catch (err) {
      journal.revertTo(mark);
      this._emitQuietly({
        event: "lock.rolled_back",
        index,
        owner,
        depth: record.depth,
        error: errorLabel(err),
      });
      throw err;
    }
  }

  /**
   * The lock is already rolled back when a returned promise settles, so
   * a late rejection is only reported through the log hook.
   */
  private _observeRejection(result: PromiseLike<unknown>, index: LockIndex, owner: ParticipantId): void {
    void Promise.resolve(result).catch((err: unknown) => {
      this._emitQuietly({ event: "lock.callback_rejected", index, owner, error: errorLabel(err) });
    });
  }

  private _release(index: LockIndex): void {
    const { stack, ledger } = this._ctx;
    const record = stack.pop(index);

    if (stack.depth === 0 && ledger.nonZeroCount() !== 0) {
      const outstanding = ledger.nonZeroEntries();
      const summary = outstanding
        .map((e) => `${e.participant}/${e.currency}=${e.amount.toString()}`)
        .join(", ");
      throw new LockError(
        "UNSETTLED_BALANCE",
        `Cannot release outermost lock ${String(index)}: ${String(outstanding.length)} unsettled delta(s): ${summary}`,
        { outstanding },
      );
    }

    this._emit({ event: "lock.released", index, owner: record.owner, depth: record.depth });
  }

  // ─── Settlement Primitives ───────────────────────────────────────────

  /**
   * Credit the active owner with whatever was paid into the manager in
   * `currency` since reserves were last synced. Returns the amount paid.
   */
  settle(currency: CurrencyId): bigint {
    const owner = this._activeOwnerOrThrow("settle");
    this._assertCurrency(currency);

    const reserves = this.reservesOf(currency);
    const balance = this._bank.balanceOf(currency, this.managerId);
    const paid = balance - reserves;

    if (paid < 0n) {
      throw new LockError(
        "INSUFFICIENT_RESERVE",
        `Manager holds ${balance.toString()} ${currency} but has ${reserves.toString()} in reserves`,
      );
    }

    this._setReserves(currency, balance);
    const delta = this._ctx.ledger.applyDelta(owner, currency, -paid);

    this._emit({
      event: "delta.settled",
      owner,
      currency,
      paid: paid.toString(),
      delta: delta.toString(),
    });

    return paid;
  }

  /**
   * Send `amount` of `currency` from the manager to `recipient` and
   * charge it to the active owner.
   */
  take(currency: CurrencyId, recipient: ParticipantId, amount: bigint): void {
    const owner = this._activeOwnerOrThrow("take");
    this._assertCurrency(currency);

    if (!isParticipantId(recipient)) {
      throw new LockError("INVALID_PARTICIPANT", `Invalid recipient: "${String(recipient)}"`);
    }
    if (typeof amount !== "bigint" || amount <= 0n) {
      throw new LockError("INVALID_AMOUNT", `take amount must be a positive integer, got ${String(amount)}`);
    }

    const reserves = this.reservesOf(currency);
    if (reserves < amount) {
      throw new LockError(
        "INSUFFICIENT_RESERVE",
        `Cannot take ${amount.toString()} ${currency}: reserves are ${reserves.toString()}`,
      );
    }

    try {
      this._bank.transfer(currency, this.managerId, recipient, amount);
    } catch (err) {
      throw new LockError(
        "INSUFFICIENT_RESERVE",
        `Transfer of ${amount.toString()} ${currency} to "${recipient}" failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    this._setReserves(currency, reserves - amount);
    const delta = this._ctx.ledger.applyDelta(owner, currency, amount);

    this._emit({
      event: "delta.taken",
      owner,
      currency,
      recipient,
      amount: amount.toString(),
      delta: delta.toString(),
    });
  }

  private _activeOwnerOrThrow(operation: string): ParticipantId {
    const owner = this.activeOwner();
    if (owner === undefined) {
      throw new LockError("NO_ACTIVE_LOCK", `${operation} requires an active lock`);
    }
    return owner;
  }

  private _assertCurrency(currency: CurrencyId): void {
    if (!isCurrencyId(currency)) {
      throw new LockError("INVALID_CURRENCY", `Invalid currency: "${String(currency)}"`);
    }
  }

  private _setReserves(currency: CurrencyId, value: bigint): void {
    const { reserves, journal } = this._ctx;
    const previous = reserves.get(currency);
    reserves.set(currency, value);
    journal.record(() => {
      if (previous === undefined) {
        reserves.delete(currency);
      } else {
        reserves.set(currency, previous);
      }
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Total number of locks ever opened, including closed ones.
   */
  locksLength(): number {
    return this._ctx.stack.length;
  }

  /**
   * Index of the innermost open lock, or undefined when idle.
   */
  lockIndex(): LockIndex | undefined {
    return this._ctx.stack.current();
  }

  locks(index: LockIndex): LockRecord {
    return this._ctx.stack.recordAt(index);
  }

  currencyDelta(owner: ParticipantId, currency: CurrencyId): bigint {
    return this._ctx.ledger.delta(owner, currency);
  }

  nonzeroDeltaCount(): number {
    return this._ctx.ledger.nonZeroCount();
  }

  reservesOf(currency: CurrencyId): bigint {
    return this._ctx.reserves.get(currency) ?? 0n;
  }

  activeOwner(): ParticipantId | undefined {
    const index = this.lockIndex();
    return index === undefined ? undefined : this.locks(index).owner;
  }

  depth(): number {
    return this._ctx.stack.depth;
  }

  isLocked(): boolean {
    return this._ctx.stack.depth > 0;
  }

  state(): LockState {
    const index = this.lockIndex();
    if (index === undefined) {
      return { status: "idle" };
    }
    return {
      status: "locked",
      depth: this.depth(),
      index,
      owner: this.locks(index).owner,
    };
  }

  snapshot(): LockManagerSnapshot {
    const { stack, ledger, reserves } = this._ctx;
    return {
      version: 1,
      managerId: this.managerId,
      locks: stack.records(),
      lockIndex: stack.current() ?? null,
      depth: stack.depth,
      deltas: ledger.snapshot(),
      reserves: [...reserves].map(([currency, amount]) => ({
        currency,
        amount: amount.toString(),
      })),
    };
  }

  private _emit(entry: LockLogEntry): void {
    this._log?.(entry);
  }

  /** Emit from an error path, where a failing log hook must not replace the error. */
  private _emitQuietly(entry: LockLogEntry): void {
    try {
      this._emit(entry);
    } catch {
      return;
    }
  }
}
