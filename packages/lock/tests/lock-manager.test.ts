/**
 * Tests for the LockManager session lifecycle.
 *
 * Covers:
 * - Outermost release enforcement (settled vs unsettled)
 * - Re-entrant nesting and parent indices
 * - Sequential siblings at the same depth
 * - Deltas carried across inner releases
 * - Payload and result pass-through
 * - State, snapshot and log hook
 */

import { describe, it, expect } from "vitest";
import type { Bytes, LockRecord } from "@nestlock/types";
import { LockManager } from "../src/lock-manager.js";
import { InMemoryBank } from "../src/in-memory-bank.js";
import type { LockCallback } from "../src/types.js";
import { LockError } from "../src/types.js";
import { USDC, captureError, createFixture } from "./helpers.js";

/**
 * Re-enters the manager `remaining` more times, returning the depth
 * reached below it.
 */
class ReentrantLocker implements LockCallback<number, number> {
  readonly seen: Array<{ lockIndex: number; cursor: number | undefined; depth: number }> = [];

  constructor(
    private readonly manager: LockManager,
    private readonly id: string,
  ) {}

  lockAcquired(remaining: number, lockIndex: number): number {
    this.seen.push({
      lockIndex,
      cursor: this.manager.lockIndex(),
      depth: this.manager.depth(),
    });
    if (remaining === 0) {
      return 0;
    }
    return this.manager.acquire(this.id, this, remaining - 1) + 1;
  }
}

function parents(manager: LockManager): number[] {
  const out: number[] = [];
  for (let i = 0; i < manager.locksLength(); i++) {
    out.push(manager.locks(i).parentIndex);
  }
  return out;
}

describe("LockManager", () => {
  // ─── Outermost Release ───────────────────────────────────────────────

  describe("outermost release", () => {
    it("fails with UNSETTLED_BALANCE when a settled payment is never reclaimed", () => {
      const { manager, bank } = createFixture();

      const err = captureError(() =>
        manager.acquire(
          "alice",
          {
            lockAcquired: () => {
              bank.transfer(USDC, "alice", manager.managerId, 1n);
              manager.settle(USDC);
            },
          },
          undefined,
        ),
      );

      expect(err).toBeInstanceOf(LockError);
      expect(err).toMatchObject({
        code: "UNSETTLED_BALANCE",
        outstanding: [{ participant: "alice", currency: USDC, amount: -1n }],
      });
    });

    it("discards every effect of the failed session", () => {
      const { manager, bank } = createFixture();

      captureError(() =>
        manager.acquire(
          "alice",
          {
            lockAcquired: () => {
              bank.transfer(USDC, "alice", manager.managerId, 1n);
              manager.settle(USDC);
            },
          },
          undefined,
        ),
      );

      expect(manager.locksLength()).toBe(0);
      expect(manager.lockIndex()).toBeUndefined();
      expect(manager.currencyDelta("alice", USDC)).toBe(0n);
      expect(manager.nonzeroDeltaCount()).toBe(0);
      expect(manager.reservesOf(USDC)).toBe(0n);
      expect(bank.balanceOf(USDC, "alice")).toBe(10n);
      expect(bank.balanceOf(USDC, manager.managerId)).toBe(0n);
    });

    it("succeeds when the payment is taken back", () => {
      const { manager, bank, journal } = createFixture();

      manager.acquire(
        "alice",
        {
          lockAcquired: () => {
            bank.transfer(USDC, "alice", manager.managerId, 1n);
            manager.settle(USDC);
            manager.take(USDC, "alice", 1n);
          },
        },
        undefined,
      );

      expect(manager.locksLength()).toBe(1);
      expect(manager.lockIndex()).toBeUndefined();
      expect(manager.currencyDelta("alice", USDC)).toBe(0n);
      expect(manager.nonzeroDeltaCount()).toBe(0);
      expect(bank.balanceOf(USDC, "alice")).toBe(10n);
      expect(journal.length).toBe(0);
    });

    it("allows an empty session", () => {
      const { manager } = createFixture();
      manager.acquire("alice", { lockAcquired: () => undefined }, undefined);
      expect(manager.locks(0)).toEqual({ owner: "alice", parentIndex: 0, depth: 1 });
    });

    it("lets value move between participants as long as both settle", () => {
      const { manager, bank } = createFixture();

      manager.acquire(
        "alice",
        {
          lockAcquired: () => {
            // alice pays 3 in and routes it out to bob
            bank.transfer(USDC, "alice", manager.managerId, 3n);
            manager.settle(USDC);
            manager.take(USDC, "bob", 3n);
          },
        },
        undefined,
      );

      expect(bank.balanceOf(USDC, "alice")).toBe(7n);
      expect(bank.balanceOf(USDC, "bob")).toBe(13n);
    });
  });

  // ─── Re-entrant Nesting ──────────────────────────────────────────────

  describe("re-entrant nesting", () => {
    it("records a strict chain when one participant re-enters twice", () => {
      const { manager } = createFixture();
      const locker = new ReentrantLocker(manager, "alice");

      const reached = manager.acquire("alice", locker, 2);

      expect(reached).toBe(2);
      expect(manager.locksLength()).toBe(3);
      expect(manager.locks(0)).toEqual({ owner: "alice", parentIndex: 0, depth: 1 });
      expect(manager.locks(1)).toEqual({ owner: "alice", parentIndex: 0, depth: 2 });
      expect(manager.locks(2)).toEqual({ owner: "alice", parentIndex: 1, depth: 3 });
    });

    it("points the cursor at the innermost open lock", () => {
      const { manager } = createFixture();
      const locker = new ReentrantLocker(manager, "alice");

      manager.acquire("alice", locker, 2);

      expect(locker.seen).toEqual([
        { lockIndex: 0, cursor: 0, depth: 1 },
        { lockIndex: 1, cursor: 1, depth: 2 },
        { lockIndex: 2, cursor: 2, depth: 3 },
      ]);
      expect(manager.state()).toEqual({ status: "idle" });
    });

    it("gives sequential siblings the same parent", () => {
      const { manager } = createFixture();
      const cursorsAfterChild: Array<number | undefined> = [];
      const leaf: LockCallback<undefined, void> = { lockAcquired: () => undefined };

      manager.acquire("alice", leaf, undefined);
      manager.acquire(
        "bob",
        {
          lockAcquired: () => {
            manager.acquire("carol", leaf, undefined);
            cursorsAfterChild.push(manager.lockIndex());
            manager.acquire("dave", leaf, undefined);
            cursorsAfterChild.push(manager.lockIndex());
          },
        },
        undefined,
      );
      manager.acquire("erin", leaf, undefined);

      expect(manager.locksLength()).toBe(5);
      expect(parents(manager)).toEqual([0, 0, 1, 1, 0]);
      expect(manager.snapshot().locks.map((r: LockRecord) => r.depth)).toEqual([1, 1, 2, 2, 1]);
      expect(manager.snapshot().locks.map((r: LockRecord) => r.owner)).toEqual([
        "alice",
        "bob",
        "carol",
        "dave",
        "erin",
      ]);
      expect(cursorsAfterChild).toEqual([1, 1]);
    });

    it("lets different participants nest under one another", () => {
      const { manager } = createFixture();
      const owners: Array<string | undefined> = [];

      manager.acquire(
        "router",
        {
          lockAcquired: () => {
            owners.push(manager.activeOwner());
            manager.acquire(
              "hook",
              { lockAcquired: () => owners.push(manager.activeOwner()) },
              undefined,
            );
            owners.push(manager.activeOwner());
          },
        },
        undefined,
      );

      expect(owners).toEqual(["router", "hook", "router"]);
      expect(manager.activeOwner()).toBeUndefined();
    });

    it("tolerates deltas across inner releases and checks only the outermost", () => {
      const { manager, bank } = createFixture();
      let countAfterInner = -1;

      manager.acquire(
        "router",
        {
          lockAcquired: () => {
            // bob borrows 2 in an inner lock that closes unsettled
            bank.mint(USDC, manager.managerId, 2n);
            manager.settle(USDC);
            manager.acquire(
              "bob",
              { lockAcquired: () => manager.take(USDC, "bob", 2n) },
              undefined,
            );
            countAfterInner = manager.nonzeroDeltaCount();

            // bob repays in a second inner lock
            manager.acquire(
              "bob",
              {
                lockAcquired: () => {
                  bank.transfer(USDC, "bob", manager.managerId, 2n);
                  manager.settle(USDC);
                },
              },
              undefined,
            );

            // router reclaims what it was credited
            manager.take(USDC, "router", 2n);
          },
        },
        undefined,
      );

      expect(countAfterInner).toBe(2);
      expect(manager.nonzeroDeltaCount()).toBe(0);
      expect(bank.balanceOf(USDC, "bob")).toBe(10n);
      expect(bank.balanceOf(USDC, "router")).toBe(2n);
    });
  });

  // ─── Payload / Result ────────────────────────────────────────────────

  describe("payload and result", () => {
    it("passes bytes through unchanged", () => {
      const { manager } = createFixture();
      const echo: LockCallback = {
        lockAcquired: (payload: Bytes) => payload.slice().reverse(),
      };

      const result = manager.acquire("alice", echo, new Uint8Array([1, 2, 3]));

      expect(Array.from(result)).toEqual([3, 2, 1]);
    });

    it("invokes the callback exactly once with its lock index", () => {
      const { manager } = createFixture();
      const calls: number[] = [];

      manager.acquire("alice", { lockAcquired: () => undefined }, undefined);
      manager.acquire(
        "alice",
        { lockAcquired: (_payload: undefined, index: number) => calls.push(index) },
        undefined,
      );

      expect(calls).toEqual([1]);
    });
  });

  // ─── Validation ──────────────────────────────────────────────────────

  describe("validation", () => {
    it("rejects an empty owner without opening a lock", () => {
      const { manager } = createFixture();
      const err = captureError(() =>
        manager.acquire("", { lockAcquired: () => undefined }, undefined),
      );
      expect(err).toMatchObject({ code: "INVALID_PARTICIPANT" });
      expect(manager.locksLength()).toBe(0);
    });

    it("rejects an asynchronous callback and rolls back", () => {
      const { manager } = createFixture();
      const err = captureError(() =>
        manager.acquire("alice", { lockAcquired: async () => undefined }, undefined),
      );
      expect(err).toMatchObject({ code: "ASYNC_CALLBACK" });
      expect(manager.locksLength()).toBe(0);
      expect(manager.isLocked()).toBe(false);
    });

    it("handles a late rejection from an asynchronous callback", async () => {
      const { manager, logs } = createFixture();
      const err = captureError(() =>
        manager.acquire(
          "alice",
          {
            lockAcquired: async () => {
              manager.settle(USDC);
              throw new Error("late");
            },
          },
          undefined,
        ),
      );

      expect(err).toMatchObject({ code: "ASYNC_CALLBACK" });
      expect(manager.isLocked()).toBe(false);

      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(logs.at(-1)).toEqual({
        event: "lock.callback_rejected",
        index: 0,
        owner: "alice",
        error: "Error",
      });
    });

    it("enforces maxDepth", () => {
      const { manager } = createFixture(2);
      const locker = new ReentrantLocker(manager, "alice");

      const err = captureError(() => manager.acquire("alice", locker, 2));

      expect(err).toMatchObject({
        code: "DEPTH_LIMIT_EXCEEDED",
        message: 'Cannot open lock for "alice": depth limit 2 reached',
      });
      expect(manager.locksLength()).toBe(0);
    });

    it("rejects a maxDepth below 1", () => {
      expect(() => new LockManager({ bank: new InMemoryBank(), maxDepth: 0 })).toThrow(
        "maxDepth must be at least 1",
      );
    });

    it("uses 'manager' as the default holder id", () => {
      expect(new LockManager({ bank: new InMemoryBank() }).managerId).toBe("manager");
    });
  });

  // ─── State / Snapshot / Log ──────────────────────────────────────────

  describe("state and snapshot", () => {
    it("reports the locked state inside a callback", () => {
      const { manager } = createFixture();
      const states: unknown[] = [];

      manager.acquire(
        "alice",
        {
          lockAcquired: () => {
            states.push(manager.state());
            states.push(manager.snapshot().lockIndex);
          },
        },
        undefined,
      );

      expect(states).toEqual([{ status: "locked", depth: 1, index: 0, owner: "alice" }, 0]);
    });

    it("snapshots history, deltas and reserves", () => {
      const { manager, bank } = createFixture();

      manager.acquire(
        "alice",
        {
          lockAcquired: () => {
            bank.transfer(USDC, "alice", manager.managerId, 4n);
            manager.settle(USDC);
            manager.take(USDC, "alice", 3n);
            manager.acquire(
              "alice",
              { lockAcquired: () => manager.take(USDC, "alice", 1n) },
              undefined,
            );
          },
        },
        undefined,
      );

      expect(manager.snapshot()).toEqual({
        version: 1,
        managerId: "manager",
        locks: [
          { owner: "alice", parentIndex: 0, depth: 1 },
          { owner: "alice", parentIndex: 0, depth: 2 },
        ],
        lockIndex: null,
        depth: 0,
        deltas: { version: 1, nonZeroCount: 0, entries: [] },
        reserves: [{ currency: USDC, amount: "0" }],
      });
    });
  });

  describe("log hook", () => {
    it("emits structured entries for a settled session", () => {
      const { manager, bank, logs } = createFixture();

      manager.acquire(
        "alice",
        {
          lockAcquired: () => {
            bank.transfer(USDC, "alice", manager.managerId, 1n);
            manager.settle(USDC);
            manager.take(USDC, "alice", 1n);
          },
        },
        undefined,
      );

      expect(logs).toEqual([
        { event: "lock.acquired", index: 0, owner: "alice", parentIndex: 0, depth: 1 },
        { event: "delta.settled", owner: "alice", currency: USDC, paid: "1", delta: "-1" },
        {
          event: "delta.taken",
          owner: "alice",
          currency: USDC,
          recipient: "alice",
          amount: "1",
          delta: "0",
        },
        { event: "lock.released", index: 0, owner: "alice", depth: 1 },
      ]);
    });

    it("emits a rollback entry carrying the error code", () => {
      const { manager, bank, logs } = createFixture();

      captureError(() =>
        manager.acquire(
          "alice",
          {
            lockAcquired: () => {
              bank.transfer(USDC, "alice", manager.managerId, 1n);
              manager.settle(USDC);
            },
          },
          undefined,
        ),
      );

      expect(logs.map((l) => l.event)).toEqual([
        "lock.acquired",
        "delta.settled",
        "lock.rolled_back",
      ]);
      expect(logs[2]).toEqual({
        event: "lock.rolled_back",
        index: 0,
        owner: "alice",
        depth: 1,
        error: "UNSETTLED_BALANCE",
      });
    });
  });

  // ─── Isolation ───────────────────────────────────────────────────────

  describe("isolation", () => {
    it("keeps independent managers apart", () => {
      const a = createFixture();
      const b = createFixture();

      a.manager.acquire(
        "alice",
        {
          lockAcquired: () => {
            a.bank.transfer(USDC, "alice", a.manager.managerId, 1n);
            a.manager.settle(USDC);
            expect(b.manager.isLocked()).toBe(false);
            expect(b.manager.currencyDelta("alice", USDC)).toBe(0n);
            a.manager.take(USDC, "alice", 1n);
          },
        },
        undefined,
      );

      expect(b.manager.locksLength()).toBe(0);
    });
  });
});
