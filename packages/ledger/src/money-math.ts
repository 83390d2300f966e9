/**
 * @ledger-replay/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * Decimal strings are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts carry exactly AMOUNT_DECIMALS fractional digits once parsed
 * - Extra input digits are rounded half away from zero
 * - Zero runtime dependencies
 */

import { ProcessingError } from "./types.js";

/** Fractional digits kept for every amount. */
export const AMOUNT_DECIMALS = 4;

// Optional sign, then "12", "12.", "12.34" or ".34", then an optional
// exponent ("1.5e2", "25E-1")
const AMOUNT_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** Largest exponent accepted; "1e308" is the biggest power of ten a double holds. */
const MAX_EXPONENT = 308;

interface AmountParts {
  readonly negative: boolean;
  /** Every mantissa digit, integer and fraction together */
  readonly digits: string;
  /** Position of the decimal point within `digits` once the exponent is applied */
  readonly point: number;
}

function splitAmount(amount: string): AmountParts | undefined {
  const match = AMOUNT_PATTERN.exec(amount);
  if (match === null) return undefined;

  const intPart = match[2] ?? "";
  const fracPart = match[3] ?? "";
  if (intPart === "" && fracPart === "") return undefined;

  const exponent = Number(match[4] ?? "0");
  if (exponent > MAX_EXPONENT) return undefined;

  return {
    negative: match[1] === "-",
    digits: intPart + fracPart,
    point: intPart.length + exponent,
  };
}

/**
 * Check whether a string is an amount normalizeAmount() accepts.
 */
export function isValidAmount(amount: string): boolean {
  return splitAmount(amount.trim()) !== undefined;
}

/**
 * Parse a decimal string into a bigint scaled by 10^AMOUNT_DECIMALS,
 * rounding half away from zero at the last kept digit.
 *
 * "1.5"       → 15000n
 * "1.0000001" → 10000n
 * "1.00005"   → 10001n
 * "-1.00005"  → -10001n
 * ".25"       → 2500n
 * "1.5e2"     → 1500000n
 */
export function normalizeAmount(amount: string): bigint {
  const trimmed = amount.trim();
  const parts = splitAmount(trimmed);
  if (parts === undefined) {
    throw new ProcessingError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const { negative, digits, point } = parts;
  // Even the first dropped digit is a leading zero
  if (point < -AMOUNT_DECIMALS) return 0n;

  const shifted = point < 0 ? "0".repeat(-point) + digits : digits.padEnd(point, "0");
  const intPart = shifted.slice(0, Math.max(point, 0));
  const fracPart = shifted.slice(Math.max(point, 0));

  const kept = fracPart.slice(0, AMOUNT_DECIMALS).padEnd(AMOUNT_DECIMALS, "0");
  let value = BigInt((intPart === "" ? "0" : intPart) + kept);

  // The first dropped digit decides the rounding direction
  const firstDropped = fracPart.charAt(AMOUNT_DECIMALS);
  if (firstDropped !== "" && firstDropped >= "5") {
    value += 1n;
  }

  return negative ? -value : value;
}

/**
 * Render a scaled amount with exactly AMOUNT_DECIMALS fractional digits.
 *
 * 15000n  → "1.5000"
 * 0n      → "0.0000"
 * -5000n  → "-0.5000"
 */
export function formatAmount(scaled: bigint): string {
  const digits = (scaled < 0n ? -scaled : scaled)
    .toString()
    .padStart(AMOUNT_DECIMALS + 1, "0");
  const units = digits.slice(0, -AMOUNT_DECIMALS);
  const fraction = digits.slice(-AMOUNT_DECIMALS);

  return `${scaled < 0n ? "-" : ""}${units}.${fraction}`;
}

/**
 * Sum a list of scaled amounts.
 */
export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let sum = 0n;
  for (const amount of amounts) {
    sum += amount;
  }
  return sum;
}
