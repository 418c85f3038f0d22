/**
 * @payledger/ledger — Fixed-point amount arithmetic.
 *
 * Amounts are bigints counting ten-thousandths of a unit.
 * Decimal strings are converted to/from that scale.
 *
 * Rules:
 * - No floating-point operations
 * - Exactly four fractional digits, always
 * - Magnitude bounded by 2^96 - 1 scaled units
 * - Checked arithmetic reports overflow and sub-zero results to the caller
 */

import type { Amount } from "@payledger/types";
import type { AmountResult, ParseAmountOptions } from "./types.js";
import { LedgerError } from "./types.js";

/** Number of fractional digits carried by every Amount. */
export const AMOUNT_SCALE = 4;

const SCALE_FACTOR = 10n ** BigInt(AMOUNT_SCALE);

/** Largest magnitude an Amount may hold, in scaled units. */
export const MAX_AMOUNT: Amount = 2n ** 96n - 1n;

export const ZERO_AMOUNT: Amount = 0n;

// optional sign, then "12", "12.", "12.34" or ".34"
const DECIMAL_PATTERN = /^([+-])?(?:(\d+)(?:\.(\d*))?|\.(\d+))$/;

// ─── Parse / Format ──────────────────────────────────────────────────────

/**
 * Parse a decimal string into a scaled Amount.
 *
 * "1.5" → 15000n
 * "-0.0001" → -1n
 * "2.71828" → 27182n (truncated), or throws under `precision: "reject"`
 */
export function parseAmount(input: string, options?: ParseAmountOptions): Amount {
  const trimmed = input.trim();
  const match = DECIMAL_PATTERN.exec(trimmed);
  if (match === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = match[1] === "-";
  const intPart = match[2] ?? "0";
  const fracPart = match[3] ?? match[4] ?? "";

  if (fracPart.length > AMOUNT_SCALE && options?.precision === "reject") {
    throw new LedgerError(
      "EXCESS_PRECISION",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(AMOUNT_SCALE)} allowed`,
    );
  }

  // Dropping extra digits of the magnitude rounds toward zero for both signs.
  const scaledFrac = fracPart.slice(0, AMOUNT_SCALE).padEnd(AMOUNT_SCALE, "0");
  const magnitude = BigInt(intPart) * SCALE_FACTOR + BigInt(scaledFrac);

  if (magnitude > MAX_AMOUNT) {
    throw new LedgerError("AMOUNT_OUT_OF_RANGE", `Amount "${trimmed}" is out of range`);
  }

  return negative ? -magnitude : magnitude;
}

/**
 * Render an Amount with exactly four fractional digits.
 *
 * 120000n → "12.0000"
 * -5n → "-0.0005"
 */
export function formatAmount(amount: Amount): string {
  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const str = abs.toString().padStart(AMOUNT_SCALE + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_SCALE);
  const fracPart = str.slice(str.length - AMOUNT_SCALE);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

function bounded(value: Amount): AmountResult {
  if (value > MAX_AMOUNT || value < -MAX_AMOUNT) {
    return { ok: false, error: "overflow" };
  }
  return { ok: true, value };
}

/**
 * a + b, or `overflow` when the sum leaves the representable range.
 */
export function checkedAdd(a: Amount, b: Amount): AmountResult {
  return bounded(a + b);
}

/**
 * a - b for balances that may not go below zero.
 * Returns `negative` when b exceeds a.
 */
export function checkedSub(a: Amount, b: Amount): AmountResult {
  const diff = a - b;
  if (diff < 0n) {
    return { ok: false, error: "negative" };
  }
  return bounded(diff);
}

// ─── Comparison ──────────────────────────────────────────────────────────

export function compareAmount(a: Amount, b: Amount): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isZero(amount: Amount): boolean {
  return amount === 0n;
}

export function isNegative(amount: Amount): boolean {
  return amount < 0n;
}
