import type { Logger, LogLevel } from "./logging/logger.js";
import { MAX_HEALTH_FACTOR, PRECISION } from "./utils/math.js";

/** Returns the current time in whole seconds. */
export type Clock = () => bigint;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

/**
 * Protocol constants. Fixed for the lifetime of every engine instance.
 */
export const PROTOCOL = {
  /** Fixed-point scale of amounts, prices and health factors. */
  precision: PRECISION,
  /** Rescale factor for the standard 8-decimal USD feed. */
  additionalFeedPrecision: 10n ** 10n,
  /** Maximum age of a price reading, in seconds (3 hours). */
  maxStalenessSeconds: 3n * 60n * 60n,
  /** Collateral value is divided by this before comparing to debt (2 => 200%). */
  overcollateralizationFactor: 2n,
  /** Health factor of exactly 1.0. */
  minHealthFactor: PRECISION,
  /** Liquidation bonus = covered collateral / divisor (10 => 10%). */
  liquidationBonusDivisor: 10n,
  /** Health factor of an account without debt. */
  maxHealthFactor: MAX_HEALTH_FACTOR,
} as const;

export interface EngineConfig {
  /** Log level. Default: "info". Ignored when `logger` is given. */
  logLevel?: LogLevel;

  /** Pretty-print logs. Default: false. */
  prettyLogs?: boolean;

  /** Parent logger; the engine derives child loggers from it. */
  logger?: Logger;

  /**
   * Time source for oracle staleness checks. Default: wall-clock seconds.
   * Tests and simulations inject a controllable clock.
   */
  clock?: Clock;
}
