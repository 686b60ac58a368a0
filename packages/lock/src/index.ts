/**
 * @nestlock/lock — Nested-lock accounting engine.
 *
 * Participants open re-entrant locks on a LockManager and accrue
 * provisional per-currency deltas through settle() and take(). The
 * outermost release fails unless every delta is back to zero, and a
 * failed acquisition discards everything it did.
 *
 * Design rules:
 * - Synchronous, single-threaded re-entrancy (no promises)
 * - Lock history is append-only; records are immutable
 * - State is scoped to one manager instance, never global
 * - Zero runtime dependencies beyond sibling packages
 */

// Core engine
export { LockManager } from "./lock-manager.js";

// Lock history
export { LockStack } from "./lock-stack.js";

// In-process value transfer
export { InMemoryBank, BankError } from "./in-memory-bank.js";
export type { BankErrorCode, InMemoryBankOptions } from "./in-memory-bank.js";

// Types
export type {
  LockCallback,
  ValueTransfer,
  LockState,
  LockManagerOptions,
  LockLogEntry,
  LockManagerSnapshot,
  ReserveSnapshotEntry,
  LockErrorCode,
} from "./types.js";

export { LockError } from "./types.js";
