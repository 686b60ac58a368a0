/**
 * @nestlock/ledger — Integer amount arithmetic.
 *
 * Amounts are bigint in base units. Decimal strings only appear at
 * the edges (scenario files, reports) and are converted here.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "1" with decimals=6 → 1000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid decimals: ${String(decimals)}`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 * 7n with decimals=0 → "7"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const str = absAmount(scaled).toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Parse a base-10 integer string (as written in snapshots).
 */
export function parseInteger(value: string): bigint {
  if (!/^-?\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid integer amount: "${value}"`);
  }
  return BigInt(value);
}

export function absAmount(amount: bigint): bigint {
  return amount < 0n ? -amount : amount;
}
