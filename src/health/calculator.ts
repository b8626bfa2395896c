import { PROTOCOL } from "../config.js";
import type { CollateralLedger } from "../ledger/ledger.js";
import type { OracleAdapter } from "../oracle/adapter.js";
import type { PriceFeed } from "../oracle/types.js";
import type { Address } from "../utils/address.js";
import { TokenNotAllowedError } from "../utils/errors.js";
import { mulDiv } from "../utils/math.js";

/**
 * Valuation and solvency math over the ledger. Read-only; every price goes
 * through the oracle adapter, so a stale feed fails the valuation instead of
 * producing a number.
 */
export class HealthCalculator {
  constructor(
    private feeds: ReadonlyMap<Address, PriceFeed>,
    private ledger: CollateralLedger,
    private oracle: OracleAdapter,
  ) {}

  /** USD price of one whole unit of `asset`, 18 decimals. */
  priceOf(asset: Address): bigint {
    return this.oracle.price(this.feedOf(asset)).price;
  }

  usdValue(asset: Address, amount: bigint): bigint {
    return mulDiv(this.priceOf(asset), amount, PROTOCOL.precision);
  }

  collateralAmountForUSD(asset: Address, usdAmount: bigint): bigint {
    return mulDiv(usdAmount, PROTOCOL.precision, this.priceOf(asset));
  }

  /** Sum over the whole allow-list; every feed is consulted, even for empty deposits. */
  collateralValueUSD(account: Address): bigint {
    let total = 0n;
    for (const asset of this.feeds.keys()) {
      total += this.usdValue(asset, this.ledger.collateralOf(account, asset));
    }
    return total;
  }

  healthFactor(account: Address): bigint {
    const debt = this.ledger.debtOf(account);
    if (debt === 0n) return PROTOCOL.maxHealthFactor;
    return this.calculateHealthFactor(debt, this.collateralValueUSD(account));
  }

  calculateHealthFactor(debt: bigint, collateralValueUSD: bigint): bigint {
    if (debt === 0n) return PROTOCOL.maxHealthFactor;
    const adjusted = collateralValueUSD / PROTOCOL.overcollateralizationFactor;
    return mulDiv(adjusted, PROTOCOL.precision, debt);
  }

  /** USD value of everything the engine holds on behalf of all accounts. */
  totalCollateralValueUSD(): bigint {
    let total = 0n;
    for (const asset of this.feeds.keys()) {
      total += this.usdValue(asset, this.ledger.totalDeposited(asset));
    }
    return total;
  }

  private feedOf(asset: Address): PriceFeed {
    const feed = this.feeds.get(asset);
    if (!feed) throw new TokenNotAllowedError(asset);
    return feed;
  }
}
