import type { Clock } from "../config.js";
import { PROTOCOL } from "../config.js";
import type { Logger } from "../logging/logger.js";
import { InvalidPriceError, StaleOracleError } from "../utils/errors.js";
import { feedPrecisionAdjustment } from "../utils/math.js";
import type { PriceFeed, PriceReading, RoundData } from "./types.js";

/**
 * Guards every price read against stale data.
 *
 * Readings are never cached: each valuation goes back to the feed, so a
 * feed that stops updating fails the very next operation that needs it.
 */
export class OracleAdapter {
  private logger: Logger;

  constructor(
    private clock: Clock,
    logger: Logger,
    readonly maxStaleness: bigint = PROTOCOL.maxStalenessSeconds,
  ) {
    this.logger = logger.child({ module: "oracle" });
  }

  latestRoundData(feed: PriceFeed): RoundData {
    const round = feed.latestRoundData();
    const now = this.clock();
    const staleness = now > round.updatedAt ? now - round.updatedAt : 0n;
    if (staleness > this.maxStaleness) {
      this.logger.warn(
        { roundId: round.roundId, updatedAt: round.updatedAt, staleness },
        "Rejecting stale price reading",
      );
      throw new StaleOracleError(staleness);
    }
    return round;
  }

  /** Fresh price, rescaled to 18 decimals. */
  price(feed: PriceFeed): PriceReading {
    const round = this.latestRoundData(feed);
    if (round.answer <= 0n) {
      throw new InvalidPriceError(round.answer);
    }
    return {
      price: round.answer * feedPrecisionAdjustment(feed.decimals()),
      updatedAt: round.updatedAt,
    };
  }
}
