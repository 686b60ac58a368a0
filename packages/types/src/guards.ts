/**
 * Runtime Type Guards
 *
 * Narrowing functions for session domain types.
 * Used at system boundaries (scenario files, deserialized snapshots).
 */

import type { CurrencyId, LockIndex, LockRecord, ParticipantId } from "./session.js";

// =============================================================================
// Identifier guards
// =============================================================================

export function isParticipantId(value: unknown): value is ParticipantId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isCurrencyId(value: unknown): value is CurrencyId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isLockIndex(value: unknown): value is LockIndex {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Lock guards
// =============================================================================

export function isLockRecord(value: unknown): value is LockRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isParticipantId(v.owner) &&
    isLockIndex(v.parentIndex) &&
    typeof v.depth === "number" &&
    Number.isSafeInteger(v.depth) &&
    v.depth >= 1
  );
}
