import { formatUnits, maxUint256, parseUnits } from "viem";
import { UnsupportedFeedDecimalsError } from "./errors.js";

/** Fixed-point scale of every ledger amount and valuation (18 decimals). */
export const PRECISION = 10n ** 18n;

export const PRECISION_DECIMALS = 18;

/** Health factor reported for an account without debt. */
export const MAX_HEALTH_FACTOR = maxUint256;

/**
 * Factor that lifts a feed answer with `feedDecimals` decimals to the
 * ledger's 18-decimal scale. An 8-decimal feed gives 1e10.
 */
export function feedPrecisionAdjustment(feedDecimals: number): bigint {
  if (!Number.isInteger(feedDecimals) || feedDecimals < 0 || feedDecimals > PRECISION_DECIMALS) {
    throw new UnsupportedFeedDecimalsError(feedDecimals);
  }
  return 10n ** BigInt(PRECISION_DECIMALS - feedDecimals);
}

/**
 * Multiply then divide. Division happens last so intermediate precision is kept.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return (a * b) / denominator;
}

/**
 * Convert a human-readable decimal ("1.5") to 18-decimal fixed point.
 */
export function toWad(value: string | number): bigint {
  return parseUnits(typeof value === "number" ? value.toString() : value, PRECISION_DECIMALS);
}

/**
 * Render an 18-decimal amount as a decimal string, for logs.
 * The zero-debt sentinel renders as "max".
 */
export function formatWad(value: bigint): string {
  if (value === MAX_HEALTH_FACTOR) return "max";
  return formatUnits(value, PRECISION_DECIMALS);
}
