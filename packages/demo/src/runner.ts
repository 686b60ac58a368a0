/**
 * @nestlock/demo — Scenario runner.
 *
 * Replays a scenario against a fresh LockManager and InMemoryBank that
 * share one journal, so a failed session leaves the bank untouched.
 * Each step list runs inside the callback of the lock that owns it.
 */

import type { CurrencyId, LockRecord, ParticipantId } from "@nestlock/types";
import { Journal, formatAmount, parseAmount } from "@nestlock/ledger";
import { InMemoryBank, LockManager } from "@nestlock/lock";
import type { LockCallback, LockLogEntry } from "@nestlock/lock";
import type { AppConfig } from "./config.js";
import { ScenarioError, errorCode, errorMessage } from "./errors.js";
import type { Scenario, Step } from "./scenario.js";

// =============================================================================
// Report
// =============================================================================

export interface SessionOutcome {
  readonly owner: ParticipantId;
  readonly status: "committed" | "failed";
  /** Error code when the session failed. */
  readonly errorCode?: string | undefined;
  readonly message?: string | undefined;
  readonly expectedError?: string | undefined;
  /** Whether the outcome matches what the scenario asked for. */
  readonly ok: boolean;
}

export interface BalanceLine {
  readonly holder: ParticipantId;
  readonly currency: CurrencyId;
  readonly amount: string;
}

export interface ScenarioReport {
  readonly name: string;
  readonly description: string;
  readonly managerId: ParticipantId;
  readonly sessions: readonly SessionOutcome[];
  readonly locks: readonly LockRecord[];
  readonly balances: readonly BalanceLine[];
  /** Human-readable mismatches between the run and the scenario's expectations. */
  readonly failures: readonly string[];
  readonly passed: boolean;
}

export interface RunScenarioOptions {
  readonly config: AppConfig;
  readonly log?: ((entry: LockLogEntry) => void) | undefined;
}

// =============================================================================
// Scripted participant
// =============================================================================

interface RunContext {
  readonly manager: LockManager;
  readonly bank: InMemoryBank;
  readonly decimalsOf: (currency: CurrencyId) => number;
}

/**
 * A participant whose callback executes a list of scripted steps.
 */
export class ScriptedParticipant implements LockCallback<readonly Step[], void> {
  constructor(
    private readonly _ctx: RunContext,
    readonly owner: ParticipantId,
  ) {}

  lockAcquired(steps: readonly Step[]): void {
    for (const step of steps) {
      this._run(step);
    }
  }

  private _run(step: Step): void {
    const { manager, bank, decimalsOf } = this._ctx;

    switch (step.op) {
      case "pay":
        bank.transfer(
          step.currency,
          this.owner,
          manager.managerId,
          parseAmount(step.amount, decimalsOf(step.currency)),
        );
        return;

      case "settle":
        decimalsOf(step.currency); // rejects undeclared currencies
        manager.settle(step.currency);
        return;

      case "take":
        manager.take(
          step.currency,
          step.to ?? this.owner,
          parseAmount(step.amount, decimalsOf(step.currency)),
        );
        return;

      case "lock":
        manager.acquire(step.owner, new ScriptedParticipant(this._ctx, step.owner), step.steps);
        return;

      case "expectDelta": {
        const participant = step.participant ?? this.owner;
        const decimals = decimalsOf(step.currency);
        const expected = parseAmount(step.amount, decimals);
        const actual = manager.currencyDelta(participant, step.currency);
        if (actual !== expected) {
          throw new ScenarioError(
            "EXPECTATION_FAILED",
            `Expected delta of "${participant}" in ${step.currency} to be ${formatAmount(expected, decimals)}, got ${formatAmount(actual, decimals)}`,
          );
        }
        return;
      }

      case "fail":
        throw new ScenarioError("SCRIPTED_FAILURE", step.message);
    }
  }
}

// =============================================================================
// Runner
// =============================================================================

export function runScenario(scenario: Scenario, options: RunScenarioOptions): ScenarioReport {
  const { config } = options;

  const decimals = new Map<CurrencyId, number>();
  for (const currency of scenario.currencies) {
    decimals.set(currency.id, currency.decimals ?? config.DEFAULT_DECIMALS);
  }
  const decimalsOf = (currency: CurrencyId): number => {
    const value = decimals.get(currency);
    if (value === undefined) {
      throw new ScenarioError("UNKNOWN_CURRENCY", `Currency "${currency}" is not declared`);
    }
    return value;
  };

  const journal = new Journal();
  const bank = new InMemoryBank({ journal });
  const manager = new LockManager({
    managerId: config.MANAGER_ID,
    bank,
    journal,
    maxDepth: config.MAX_DEPTH,
    log: options.log,
  });

  const holders = new Set<ParticipantId>();
  for (const balance of scenario.balances) {
    bank.mint(balance.currency, balance.holder, parseAmount(balance.amount, decimalsOf(balance.currency)));
    holders.add(balance.holder);
  }

  const ctx: RunContext = { manager, bank, decimalsOf };
  const sessions: SessionOutcome[] = [];
  const failures: string[] = [];

  for (const [i, session] of scenario.sessions.entries()) {
    holders.add(session.owner);
    const outcome = runSession(ctx, session.owner, session.steps, session.expectError);
    sessions.push(outcome);

    if (!outcome.ok) {
      failures.push(
        outcome.expectedError === undefined
          ? `Session ${String(i)} (${session.owner}) failed with ${outcome.errorCode ?? "UNKNOWN"}: ${outcome.message ?? ""}`
          : `Session ${String(i)} (${session.owner}) expected ${outcome.expectedError}, got ${outcome.errorCode ?? "success"}`,
      );
    }
  }

  const locks: LockRecord[] = [];
  for (let i = 0; i < manager.locksLength(); i++) {
    locks.push(manager.locks(i));
  }

  const { expect } = scenario;
  if (expect.locksLength !== undefined && locks.length !== expect.locksLength) {
    failures.push(`Expected ${String(expect.locksLength)} lock record(s), got ${String(locks.length)}`);
  }
  if (expect.parents !== undefined) {
    const parents = locks.map((r) => r.parentIndex);
    if (!sameNumbers(parents, expect.parents)) {
      failures.push(`Expected parents [${expect.parents.join(", ")}], got [${parents.join(", ")}]`);
    }
  }
  if (expect.depths !== undefined) {
    const depths = locks.map((r) => r.depth);
    if (!sameNumbers(depths, expect.depths)) {
      failures.push(`Expected depths [${expect.depths.join(", ")}], got [${depths.join(", ")}]`);
    }
  }

  const balances: BalanceLine[] = [];
  for (const currency of scenario.currencies) {
    for (const holder of [...holders, manager.managerId]) {
      balances.push({
        holder,
        currency: currency.id,
        amount: formatAmount(bank.balanceOf(currency.id, holder), decimalsOf(currency.id)),
      });
    }
  }

  return {
    name: scenario.name,
    description: scenario.description,
    managerId: manager.managerId,
    sessions,
    locks,
    balances,
    failures,
    passed: failures.length === 0,
  };
}

function runSession(
  ctx: RunContext,
  owner: ParticipantId,
  steps: readonly Step[],
  expectedError: string | undefined,
): SessionOutcome {
  try {
    ctx.manager.acquire(owner, new ScriptedParticipant(ctx, owner), steps);
  } catch (err) {
    const code = errorCode(err);
    return {
      owner,
      status: "failed",
      errorCode: code,
      message: errorMessage(err),
      expectedError,
      ok: expectedError === code,
    };
  }
  return { owner, status: "committed", expectedError, ok: expectedError === undefined };
}

function sameNumbers(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}
