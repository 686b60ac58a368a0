/**
 * @nestlock/demo — Terminal report.
 *
 * Renders a ScenarioReport as coloured lines. The chalk instance is a
 * parameter so callers (and tests) can turn colour off.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { ScenarioReport, SessionOutcome } from "./runner.js";

function heading(c: ChalkInstance, title: string): string {
  const line = c.gray("─".repeat(Math.max(0, 50 - title.length)));
  return `\n  ${c.white.bold(title)}  ${line}`;
}

function ok(c: ChalkInstance, msg: string): string {
  return c.green("    ✓ ") + c.white(msg);
}

function bad(c: ChalkInstance, msg: string): string {
  return c.red("    ✗ ") + c.red(msg);
}

function info(c: ChalkInstance, label: string, value: string): string {
  return c.gray("    → ") + c.gray(label.padEnd(16)) + c.white(value);
}

function describeSession(index: number, session: SessionOutcome): string {
  const subject = `session ${String(index)} (${session.owner})`;
  if (session.status === "committed") {
    return `${subject} committed`;
  }
  const suffix = session.ok ? " as expected" : `: ${session.message ?? ""}`;
  return `${subject} failed with ${session.errorCode ?? "UNKNOWN"}${suffix}`;
}

export function renderReport(report: ScenarioReport, c: ChalkInstance = chalk): string[] {
  const lines: string[] = [];

  lines.push(c.cyan.bold(`  ━━ ${report.name} ━━`));
  if (report.description !== "") {
    lines.push(c.gray(`  ${report.description}`));
  }

  lines.push(heading(c, "Sessions"));
  for (const [i, session] of report.sessions.entries()) {
    const msg = describeSession(i, session);
    lines.push(session.ok ? ok(c, msg) : bad(c, msg));
  }

  lines.push(heading(c, "Lock history"));
  if (report.locks.length === 0) {
    lines.push(info(c, "(empty)", ""));
  }
  for (const [i, record] of report.locks.entries()) {
    lines.push(
      info(
        c,
        `#${String(i)}`,
        `owner ${record.owner}  parent ${String(record.parentIndex)}  depth ${String(record.depth)}`,
      ),
    );
  }

  lines.push(heading(c, "Balances"));
  for (const balance of report.balances) {
    lines.push(info(c, balance.holder, `${balance.amount} ${balance.currency}`));
  }

  lines.push("");
  if (report.passed) {
    lines.push(c.green.bold("  PASS"));
  } else {
    lines.push(c.red.bold("  FAIL"));
    for (const failure of report.failures) {
      lines.push(c.yellow("    ! ") + c.yellow(failure));
    }
  }

  return lines;
}
