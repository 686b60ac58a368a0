/**
 * @nestlock/ledger — Per-participant currency delta ledger.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the delta-accounting invariants:
 * - Every (participant, currency) entry is implicitly zero
 * - The non-zero count always equals the number of non-zero entries
 * - All arithmetic uses bigint (no floating point)
 * - Every write can be undone through a shared Journal
 */

// Core ledger
export { CurrencyLedger } from "./currency-ledger.js";

// Undo journal
export { Journal } from "./journal.js";
export type { UndoFn } from "./journal.js";

// Amount arithmetic
export {
  parseAmount,
  formatAmount,
  parseInteger,
  absAmount,
} from "./amount-math.js";

// Types
export type {
  LedgerErrorCode,
  DeltaSnapshot,
  DeltaSnapshotEntry,
} from "./types.js";

export { LedgerError } from "./types.js";
