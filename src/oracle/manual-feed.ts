import type { Clock } from "../config.js";
import { systemClock } from "../config.js";
import type { PriceFeed, RoundData } from "./types.js";

/**
 * Price feed whose answer is pushed by hand. Every update opens a new round
 * stamped with the clock's current time.
 */
export class ManualPriceFeed implements PriceFeed {
  private round: RoundData;

  constructor(
    private readonly feedDecimals: number,
    initialAnswer: bigint,
    private clock: Clock = systemClock,
  ) {
    const now = this.clock();
    this.round = {
      roundId: 1n,
      answer: initialAnswer,
      startedAt: now,
      updatedAt: now,
      answeredInRound: 1n,
    };
  }

  decimals(): number {
    return this.feedDecimals;
  }

  latestRoundData(): RoundData {
    return { ...this.round };
  }

  updateAnswer(answer: bigint): void {
    const now = this.clock();
    const roundId = this.round.roundId + 1n;
    this.round = {
      roundId,
      answer,
      startedAt: now,
      updatedAt: now,
      answeredInRound: roundId,
    };
  }

  /** Overwrite the whole round, e.g. to backdate `updatedAt`. */
  updateRoundData(round: RoundData): void {
    this.round = { ...round };
  }
}
