/* ------------------------------------------------------------------
 * number.ts  •  Canonical number formatting
 * ------------------------------------------------------------------
 *  ▸ formatNumber(v)    – shortest round-trip decimal, value-based
 *  ▸ isIntegral(v)      – integrality predicate used by the formatter
 *
 *  Layout pinned here (every cooperating implementation must agree):
 *  • decimal exponent in [MIN_PLAIN_EXPONENT, MAX_PLAIN_EXPONENT]
 *      → plain notation: 1, 0.95, 100.5, 0.000001
 *  • otherwise → d[.ddd]e±n : 1e-7, 1.5e+21
 *  • -0 → 0, NaN / ±Infinity rejected
 * ------------------------------------------------------------------ */

import { InvalidInputError } from "./errors";

/** Smallest decimal exponent printed without `e` (1e-6 → "0.000001") */
export const MIN_PLAIN_EXPONENT = -6;

/** Largest decimal exponent printed without `e` (1e20 → "100000000000000000000") */
export const MAX_PLAIN_EXPONENT = 20;

/** Integers above this magnitude may have lost precision in a double */
export const MAX_SAFE_INTEGER = Number.MAX_SAFE_INTEGER;

export interface NumberFormatOptions {
  /** Reject integral doubles with magnitude above {@link MAX_SAFE_INTEGER} */
  safeIntegers?: boolean;
}

export function isIntegral(value: number | bigint): boolean {
  return typeof value === "bigint" || Number.isInteger(value);
}

/**
 * Lay out significant digits `d1d2…dk` with value `d1.d2…dk × 10^exponent`.
 * `digits` carries no leading or trailing zeros.
 */
function layout(digits: string, exponent: number): string {
  const k = digits.length;

  if (exponent < MIN_PLAIN_EXPONENT || exponent > MAX_PLAIN_EXPONENT) {
    const mantissa = k === 1 ? digits : `${digits[0]}.${digits.slice(1)}`;
    const sign = exponent < 0 ? "-" : "+";
    return `${mantissa}e${sign}${Math.abs(exponent)}`;
  }

  // integral
  if (exponent >= k - 1) return digits + "0".repeat(exponent - k + 1);

  if (exponent >= 0) {
    return `${digits.slice(0, exponent + 1)}.${digits.slice(exponent + 1)}`;
  }
  return `0.${"0".repeat(-exponent - 1)}${digits}`;
}

function formatDouble(value: number): string {
  // toExponential() without an argument yields the shortest digit string
  // that round-trips, e.g. 100.5 → "1.005e+2"
  const [mantissa, exp] = Math.abs(value).toExponential().split("e");
  const digits = mantissa.replace(".", "");
  return (value < 0 ? "-" : "") + layout(digits, Number(exp));
}

function formatBigInt(value: bigint): string {
  // a bigint that is exactly a double formats like that double, so the
  // output depends on the numeric value and not on how it was parsed
  const asDouble = Number(value);
  if (Number.isFinite(asDouble) && BigInt(asDouble) === value) {
    return formatDouble(asDouble);
  }

  const negative = value < 0n;
  const magnitude = (negative ? -value : value).toString();
  const digits = magnitude.replace(/0+$/, "");
  return (negative ? "-" : "") + layout(digits, magnitude.length - 1);
}

/**
 * Canonical text of a number.
 *
 * @throws {InvalidInputError} `non-finite-number` for NaN/±Infinity,
 *   `unsafe-integer` when `safeIntegers` is set and the value is an
 *   integral double outside ±2^53-1
 *
 * @example
 * ```typescript
 * formatNumber(1.0)         // "1"
 * formatNumber(0.95)        // "0.95"
 * formatNumber(-0)          // "0"
 * formatNumber(1e-7)        // "1e-7"
 * formatNumber(1e21)        // "1e+21"
 * ```
 */
export function formatNumber(
  value: number | bigint,
  path = "$",
  options: NumberFormatOptions = {}
): string {
  if (typeof value === "bigint") {
    return value === 0n ? "0" : formatBigInt(value);
  }

  if (!Number.isFinite(value)) {
    throw new InvalidInputError(
      "non-finite-number",
      path,
      `Non-finite number ${String(value)}`
    );
  }
  if (
    options.safeIntegers &&
    isIntegral(value) &&
    Math.abs(value) > MAX_SAFE_INTEGER
  ) {
    throw new InvalidInputError(
      "unsafe-integer",
      path,
      `Integer ${String(value)} exceeds ${MAX_SAFE_INTEGER}`
    );
  }

  // also covers -0
  if (value === 0) return "0";
  return formatDouble(value);
}
