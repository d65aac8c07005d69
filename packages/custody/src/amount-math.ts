/**
 * Fixed-point amounts as bigint.
 *
 * Every amount is an integer count of base units; the asset's (or the
 * common denomination's) decimals say where the point goes. Conversion
 * multiplies first and divides once, at the end.
 */

import { CustodyError } from "./types.js";

const DECIMAL = /^(-?)(\d+)(?:\.(\d+))?$/;

/**
 * Decimal string to base units: ("100.50", 2) → 10050n, ("-1", 6) → -1000000n.
 * More fractional digits than `decimals` is an error, never a rounding.
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const text = amount.trim();
  const match = DECIMAL.exec(text);
  if (match === null) {
    throw new CustodyError("INVALID_AMOUNT", `Invalid amount format: "${text}"`);
  }
  const [, sign, whole = "0", fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new CustodyError(
      "INVALID_AMOUNT",
      `Amount "${text}" has ${String(fraction.length)} decimal places; only ${String(decimals)} are allowed`,
    );
  }
  const magnitude = BigInt(whole) * pow10(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
  return sign === "-" ? -magnitude : magnitude;
}

/** Base units to a decimal string with exactly `decimals` places. */
export function formatAmount(scaled: bigint, decimals: number): string {
  const sign = scaled < 0n ? "-" : "";
  const magnitude = scaled < 0n ? -scaled : scaled;
  if (decimals === 0) {
    return `${sign}${magnitude.toString()}`;
  }
  const unit = pow10(decimals);
  const fraction = (magnitude % unit).toString().padStart(decimals, "0");
  return `${sign}${(magnitude / unit).toString()}.${fraction}`;
}

/** 10^exponent as bigint. */
export function pow10(exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new CustodyError("INVALID_AMOUNT", `Invalid decimal exponent: ${String(exponent)}`);
  }
  return 10n ** BigInt(exponent);
}

/**
 * Convert `amount` (scaled by assetDecimals) at `price` (scaled by
 * priceDecimals) into a value scaled by commonDecimals.
 *
 *   value = amount × price × 10^commonDecimals / 10^(assetDecimals + priceDecimals)
 *
 * Floor division, performed last.
 */
export function convertValue(
  amount: bigint,
  price: bigint,
  assetDecimals: number,
  priceDecimals: number,
  commonDecimals: number,
): bigint {
  const numerator = amount * price * pow10(commonDecimals);
  return numerator / pow10(assetDecimals + priceDecimals);
}

/**
 * Assert an amount is non-negative.
 * Throws CustodyError("INVALID_AMOUNT") otherwise.
 */
export function assertNonNegative(amount: bigint, label: string): void {
  if (amount < 0n) {
    throw new CustodyError("INVALID_AMOUNT", `${label} must not be negative, got ${amount.toString()}`);
  }
}
