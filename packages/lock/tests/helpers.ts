/**
 * Shared fixtures for @nestlock/lock tests.
 */

import { Journal } from "@nestlock/ledger";
import { InMemoryBank } from "../src/in-memory-bank.js";
import { LockManager } from "../src/lock-manager.js";
import type { LockLogEntry } from "../src/types.js";

export const USDC = "USDC";
export const ETH = "ETH";

export interface Fixture {
  readonly journal: Journal;
  readonly bank: InMemoryBank;
  readonly manager: LockManager;
  readonly logs: LockLogEntry[];
}

/**
 * A manager and a journaling bank sharing one journal, with alice and
 * bob each holding 10 USDC and 10 ETH.
 */
export function createFixture(maxDepth?: number): Fixture {
  const journal = new Journal();
  const bank = new InMemoryBank({ journal });
  const logs: LockLogEntry[] = [];
  const manager = new LockManager({
    bank,
    journal,
    maxDepth,
    log: (entry) => logs.push(entry),
  });

  for (const holder of ["alice", "bob"]) {
    bank.mint(USDC, holder, 10n);
    bank.mint(ETH, holder, 10n);
  }

  return { journal, bank, manager, logs };
}

/**
 * Run `fn` and return whatever it threw (undefined if it returned).
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
