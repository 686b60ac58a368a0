/**
 * @nestlock/ledger — Currency delta ledger.
 *
 * Tracks, per (participant, currency), the signed amount a participant
 * owes the manager, together with the number of entries that are
 * currently non-zero. The manager may only release its outermost lock
 * when that count is zero.
 *
 * Sign convention:
 * - Positive → participant owes the manager
 * - Negative → manager owes the participant
 *
 * Zero entries are not stored; every zero crossing adjusts the
 * non-zero count in the same write that crosses it.
 */

import type { CurrencyId, DeltaEntry, ParticipantId } from "@nestlock/types";
import { isCurrencyId, isParticipantId } from "@nestlock/types";
import { parseInteger } from "./amount-math.js";
import type { Journal } from "./journal.js";
import type { DeltaSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

export class CurrencyLedger {
  private readonly _deltas = new Map<ParticipantId, Map<CurrencyId, bigint>>();
  private _nonZeroCount = 0;

  /**
   * @param journal - When given, every write records its own undo there.
   */
  constructor(private readonly _journal?: Journal) {}

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Current delta for a participant in a currency. Defaults to 0n.
   */
  delta(participant: ParticipantId, currency: CurrencyId): bigint {
    return this._deltas.get(participant)?.get(currency) ?? 0n;
  }

  nonZeroCount(): number {
    return this._nonZeroCount;
  }

  /**
   * Every outstanding entry, ordered by first appearance.
   */
  nonZeroEntries(): readonly DeltaEntry[] {
    const entries: DeltaEntry[] = [];
    for (const [participant, currencies] of this._deltas) {
      for (const [currency, amount] of currencies) {
        entries.push({ participant, currency, amount });
      }
    }
    return entries;
  }

  /**
   * Outstanding entries of one participant.
   */
  entriesFor(participant: ParticipantId): readonly DeltaEntry[] {
    const currencies = this._deltas.get(participant);
    if (currencies === undefined) {
      return [];
    }
    return [...currencies].map(([currency, amount]) => ({ participant, currency, amount }));
  }

  // ─── Mutation ────────────────────────────────────────────────────────

  /**
   * Add `amount` to the (participant, currency) entry and return the
   * new value. A zero amount changes nothing.
   */
  applyDelta(participant: ParticipantId, currency: CurrencyId, amount: bigint): bigint {
    if (!isParticipantId(participant)) {
      throw new LedgerError("INVALID_PARTICIPANT", `Invalid participant: "${String(participant)}"`);
    }
    if (!isCurrencyId(currency)) {
      throw new LedgerError("INVALID_CURRENCY", `Invalid currency: "${String(currency)}"`);
    }
    if (typeof amount !== "bigint") {
      throw new LedgerError("INVALID_AMOUNT", `Delta must be a bigint, got ${typeof amount}`);
    }

    const previous = this.delta(participant, currency);
    if (amount === 0n) {
      return previous;
    }

    const next = previous + amount;
    this._write(participant, currency, previous, next);
    this._journal?.record(() => this._write(participant, currency, next, previous));
    return next;
  }

  private _write(
    participant: ParticipantId,
    currency: CurrencyId,
    previous: bigint,
    next: bigint,
  ): void {
    let currencies = this._deltas.get(participant);
    if (currencies === undefined) {
      currencies = new Map();
      this._deltas.set(participant, currencies);
    }

    if (next === 0n) {
      currencies.delete(currency);
      if (currencies.size === 0) {
        this._deltas.delete(participant);
      }
    } else {
      currencies.set(currency, next);
    }

    if (previous === 0n && next !== 0n) {
      this._nonZeroCount++;
    } else if (previous !== 0n && next === 0n) {
      this._nonZeroCount--;
    }
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): DeltaSnapshot {
    return {
      version: 1,
      nonZeroCount: this._nonZeroCount,
      entries: this.nonZeroEntries().map((e) => ({
        participant: e.participant,
        currency: e.currency,
        amount: e.amount.toString(),
      })),
    };
  }

  /**
   * Rebuild a ledger from a snapshot by replaying each entry.
   * The restored count is derived, not trusted from the snapshot.
   */
  static fromSnapshot(snapshot: DeltaSnapshot, journal?: Journal): CurrencyLedger {
    const ledger = new CurrencyLedger(journal);
    for (const entry of snapshot.entries) {
      ledger.applyDelta(entry.participant, entry.currency, parseInteger(entry.amount));
    }
    return ledger;
  }
}
