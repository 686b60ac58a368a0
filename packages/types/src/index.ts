/**
 * @nestlock/types — Shared domain types for the nestlock stack.
 *
 * Used by every nestlock package:
 * - Participant and currency identifiers
 * - Lock history records
 * - Outstanding delta entries
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

export type {
  ParticipantId,
  CurrencyId,
  LockIndex,
  Bytes,
  LockRecord,
  DeltaEntry,
} from "./session.js";

// Runtime type guards
export {
  isParticipantId,
  isCurrencyId,
  isLockIndex,
  isLockRecord,
} from "./guards.js";
