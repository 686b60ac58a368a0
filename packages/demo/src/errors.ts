/**
 * @nestlock/demo — Scenario errors.
 */

import { LedgerError } from "@nestlock/ledger";
import { BankError, LockError } from "@nestlock/lock";

export type ScenarioErrorCode =
  | "UNKNOWN_CURRENCY"
  | "EXPECTATION_FAILED"
  | "SCRIPTED_FAILURE";

export class ScenarioError extends Error {
  public readonly code: ScenarioErrorCode;

  constructor(code: ScenarioErrorCode, message: string) {
    super(message);
    this.name = "ScenarioError";
    this.code = code;
  }
}

/**
 * Machine-readable label for anything a session can throw.
 */
export function errorCode(err: unknown): string {
  if (
    err instanceof LockError ||
    err instanceof LedgerError ||
    err instanceof BankError ||
    err instanceof ScenarioError
  ) {
    return err.code;
  }
  return err instanceof Error ? err.name : "UNKNOWN";
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
