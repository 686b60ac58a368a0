/**
 * @nestlock/lock — In-memory value-transfer implementation.
 *
 * Holds per-currency balances in plain maps. Suitable for:
 * - Unit and integration tests
 * - The scenario harness
 *
 * Not a real settlement layer: balances live only in this process.
 * When built with a Journal, every balance change can be rolled back
 * together with the session that caused it.
 */

import type { CurrencyId, ParticipantId } from "@nestlock/types";
import type { Journal } from "@nestlock/ledger";
import type { ValueTransfer } from "./types.js";

/** Error codes for bank operations. */
export type BankErrorCode = "INSUFFICIENT_FUNDS" | "INVALID_AMOUNT";

export class BankError extends Error {
  public readonly code: BankErrorCode;

  constructor(code: BankErrorCode, message: string) {
    super(message);
    this.name = "BankError";
    this.code = code;
  }
}

export interface InMemoryBankOptions {
  readonly journal?: Journal | undefined;
}

export class InMemoryBank implements ValueTransfer {
  private readonly _balances = new Map<CurrencyId, Map<ParticipantId, bigint>>();
  private readonly _journal: Journal | undefined;

  constructor(options?: InMemoryBankOptions) {
    this._journal = options?.journal;
  }

  /**
   * Create `amount` of `currency` out of nothing and credit it to `to`.
   */
  mint(currency: CurrencyId, to: ParticipantId, amount: bigint): void {
    this._assertPositive(amount);
    this._set(currency, to, this.balanceOf(currency, to) + amount);
  }

  balanceOf(currency: CurrencyId, holder: ParticipantId): bigint {
    return this._balances.get(currency)?.get(holder) ?? 0n;
  }

  transfer(currency: CurrencyId, from: ParticipantId, to: ParticipantId, amount: bigint): void {
    this._assertPositive(amount);

    const available = this.balanceOf(currency, from);
    if (available < amount) {
      throw new BankError(
        "INSUFFICIENT_FUNDS",
        `"${from}" holds ${available.toString()} ${currency}, cannot transfer ${amount.toString()}`,
      );
    }

    this._set(currency, from, available - amount);
    this._set(currency, to, this.balanceOf(currency, to) + amount);
  }

  /**
   * Sum of every holder's balance in `currency`.
   */
  totalSupply(currency: CurrencyId): bigint {
    let total = 0n;
    for (const balance of this._balances.get(currency)?.values() ?? []) {
      total += balance;
    }
    return total;
  }

  private _assertPositive(amount: bigint): void {
    if (typeof amount !== "bigint" || amount <= 0n) {
      throw new BankError("INVALID_AMOUNT", `Amount must be a positive integer, got ${String(amount)}`);
    }
  }

  private _holdersOf(currency: CurrencyId): Map<ParticipantId, bigint> {
    let holders = this._balances.get(currency);
    if (holders === undefined) {
      holders = new Map();
      this._balances.set(currency, holders);
    }
    return holders;
  }

  private _set(currency: CurrencyId, holder: ParticipantId, value: bigint): void {
    const holders = this._holdersOf(currency);
    const previous = holders.get(holder);
    holders.set(holder, value);

    this._journal?.record(() => {
      if (previous === undefined) {
        holders.delete(holder);
      } else {
        holders.set(holder, previous);
      }
    });
  }
}
