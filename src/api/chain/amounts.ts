/**
 * Fixed-point token amounts
 *
 * Every amount in the engine is a bigint carrying AMOUNT_DECIMALS fractional
 * digits, so sums over transfers of differently-scaled tokens stay exact.
 */

import { formatUnits, parseUnits } from "viem";

import { TraceError } from "./types";

// ============================================================================
// Constants
// ============================================================================

/** Fractional digits of every internal amount */
export const AMOUNT_DECIMALS = 18;

/** One whole token unit */
export const ONE_UNIT = 10n ** BigInt(AMOUNT_DECIMALS);

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

const usdFormatter = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse a human-readable decimal ("50", "0.25", 1000) into a fixed-point amount
 */
export function parseAmount(value: string | number): bigint {
  const text = typeof value === "number" ? numberToDecimalString(value) : value.trim();

  if (!DECIMAL_PATTERN.test(text)) {
    throw new TraceError(`Invalid amount: ${String(value)}`, "INVALID_AMOUNT");
  }

  const [whole = "0", fraction = ""] = text.split(".");
  if (fraction.length > AMOUNT_DECIMALS) {
    throw new TraceError(
      `Amount ${text} has more than ${AMOUNT_DECIMALS} fractional digits`,
      "INVALID_AMOUNT"
    );
  }

  return parseUnits(fraction ? `${whole}.${fraction}` : whole, AMOUNT_DECIMALS);
}

/**
 * Rescale a raw on-chain integer using the token's declared decimals
 */
export function scaleTokenAmount(raw: bigint, tokenDecimals: number): bigint {
  if (!Number.isInteger(tokenDecimals) || tokenDecimals < 0) {
    throw new TraceError(
      `Invalid token decimals: ${tokenDecimals}`,
      "INVALID_AMOUNT"
    );
  }
  if (raw < 0n) {
    throw new TraceError(`Negative token amount: ${raw}`, "INVALID_AMOUNT");
  }

  if (tokenDecimals === AMOUNT_DECIMALS) {
    return raw;
  }
  if (tokenDecimals < AMOUNT_DECIMALS) {
    return raw * 10n ** BigInt(AMOUNT_DECIMALS - tokenDecimals);
  }
  // Tokens finer than the internal scale lose their sub-unit dust
  return raw / 10n ** BigInt(tokenDecimals - AMOUNT_DECIMALS);
}

function numberToDecimalString(value: number): string {
  if (!Number.isFinite(value) || value < 0) {
    throw new TraceError(`Invalid amount: ${value}`, "INVALID_AMOUNT");
  }
  // toFixed keeps plain notation for large values where String() would not
  return value.toFixed(6).replace(/\.?0+$/, "") || "0";
}

// ============================================================================
// Arithmetic
// ============================================================================

/**
 * Sum a list of amounts
 */
export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}

/**
 * Percentage of part in total, with two decimals of precision
 */
export function percentOf(part: bigint, total: bigint): number {
  if (total <= 0n) return 0;
  return Number((part * 10000n) / total) / 100;
}

/**
 * Whole token units, rounded down
 */
export function toWholeUnits(amount: bigint): number {
  return Number(amount / ONE_UNIT);
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Decimal string of an amount, trimmed to at most fractionDigits digits
 */
export function formatAmount(amount: bigint, fractionDigits = 6): string {
  const full = formatUnits(amount, AMOUNT_DECIMALS);
  const [whole, fraction] = full.split(".");
  if (!fraction || fractionDigits === 0) {
    return whole ?? full;
  }
  const trimmed = fraction.slice(0, fractionDigits).replace(/0+$/, "");
  return trimmed ? `${whole}.${trimmed}` : (whole ?? full);
}

/**
 * Dollar figure without cents, e.g. "$50,000".
 * Fixed-point amounts are truncated to whole units; plain numbers are rounded.
 */
export function formatUsd(amount: bigint | number): string {
  return `$${usdFormatter.format(typeof amount === "bigint" ? toWholeUnits(amount) : amount)}`;
}
