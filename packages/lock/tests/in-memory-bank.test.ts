/**
 * Tests for the InMemoryBank value-transfer implementation.
 */

import { describe, it, expect } from "vitest";
import { Journal } from "@nestlock/ledger";
import { BankError, InMemoryBank } from "../src/in-memory-bank.js";
import { captureError } from "./helpers.js";

describe("InMemoryBank", () => {
  it("starts every balance at zero", () => {
    const bank = new InMemoryBank();
    expect(bank.balanceOf("USDC", "alice")).toBe(0n);
    expect(bank.totalSupply("USDC")).toBe(0n);
  });

  it("mints and transfers", () => {
    const bank = new InMemoryBank();
    bank.mint("USDC", "alice", 10n);
    bank.transfer("USDC", "alice", "bob", 4n);

    expect(bank.balanceOf("USDC", "alice")).toBe(6n);
    expect(bank.balanceOf("USDC", "bob")).toBe(4n);
    expect(bank.totalSupply("USDC")).toBe(10n);
  });

  it("rejects an overdraft without side effects", () => {
    const bank = new InMemoryBank();
    bank.mint("USDC", "alice", 1n);

    const err = captureError(() => bank.transfer("USDC", "alice", "bob", 2n));

    expect(err).toBeInstanceOf(BankError);
    expect(err).toMatchObject({
      code: "INSUFFICIENT_FUNDS",
      message: '"alice" holds 1 USDC, cannot transfer 2',
    });
    expect(bank.balanceOf("USDC", "alice")).toBe(1n);
    expect(bank.balanceOf("USDC", "bob")).toBe(0n);
  });

  it("rejects non-positive amounts", () => {
    const bank = new InMemoryBank();
    expect(captureError(() => bank.mint("USDC", "alice", 0n))).toMatchObject({
      code: "INVALID_AMOUNT",
    });
    expect(captureError(() => bank.transfer("USDC", "alice", "bob", -1n))).toMatchObject({
      code: "INVALID_AMOUNT",
    });
  });

  it("keeps currencies apart", () => {
    const bank = new InMemoryBank();
    bank.mint("USDC", "alice", 5n);
    bank.mint("ETH", "alice", 1n);
    expect(bank.balanceOf("ETH", "alice")).toBe(1n);
    expect(bank.totalSupply("USDC")).toBe(5n);
  });

  it("reverts journaled changes", () => {
    const journal = new Journal();
    const bank = new InMemoryBank({ journal });
    bank.mint("USDC", "alice", 5n);
    const mark = journal.mark();

    bank.transfer("USDC", "alice", "bob", 3n);
    bank.mint("USDC", "carol", 1n);
    journal.revertTo(mark);

    expect(bank.balanceOf("USDC", "alice")).toBe(5n);
    expect(bank.balanceOf("USDC", "bob")).toBe(0n);
    expect(bank.totalSupply("USDC")).toBe(5n);
  });
});
