// Shapes the engine consumes from a USD price feed.

export interface RoundData {
  roundId: bigint;
  /** Price in the feed's own decimals. */
  answer: bigint;
  startedAt: bigint;
  /** Seconds since epoch of the last update. */
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface PriceFeed {
  /** Decimals of `answer` (8 for standard USD pairs). */
  decimals(): number;
  latestRoundData(): RoundData;
}

export interface PriceReading {
  /** Price rescaled to 18 decimals. */
  price: bigint;
  updatedAt: bigint;
}
