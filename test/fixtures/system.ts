import { CollateralEngine } from "../../src/engine/engine.js";
import { createLogger } from "../../src/logging/logger.js";
import { ManualPriceFeed } from "../../src/oracle/manual-feed.js";
import { InMemoryCollateralToken } from "../../src/token/collateral-token.js";
import { DebtToken } from "../../src/token/debt-token.js";
import type { DebtMinter } from "../../src/token/types.js";
import type { Address } from "../../src/utils/address.js";
import { DEBT_TOKEN, DEPLOYER, ENGINE, WBTC, WETH } from "./addresses.js";

export const UNIT = 10n ** 18n;
export const FEED_DECIMALS = 8;
export const ETH_USD = 3000n * 10n ** 8n;
export const BTC_USD = 60000n * 10n ** 8n;
export const START_TIME = 1_700_000_000n;
export const THREE_HOURS = 3n * 60n * 60n;

export const silentLogger = createLogger({ level: "silent" });

export interface TestClock {
  now: () => bigint;
  advance: (seconds: bigint) => void;
}

export function createTestClock(start: bigint = START_TIME): TestClock {
  let current = start;
  return {
    now: () => current,
    advance: (seconds) => {
      current += seconds;
    },
  };
}

export interface TestSystem {
  engine: CollateralEngine;
  weth: InMemoryCollateralToken;
  wbtc: InMemoryCollateralToken;
  debtToken: DebtToken;
  /** The engine's mint rights. */
  debtMinter: DebtMinter;
  ethFeed: ManualPriceFeed;
  btcFeed: ManualPriceFeed;
  clock: TestClock;
}

/**
 * Two collateral assets (WETH at $3000, WBTC at $60000) and a debt token
 * owned by the engine.
 */
export function deploySystem(): TestSystem {
  const clock = createTestClock();
  const ethFeed = new ManualPriceFeed(FEED_DECIMALS, ETH_USD, clock.now);
  const btcFeed = new ManualPriceFeed(FEED_DECIMALS, BTC_USD, clock.now);
  const weth = new InMemoryCollateralToken({ address: WETH, symbol: "WETH" });
  const wbtc = new InMemoryCollateralToken({ address: WBTC, symbol: "WBTC" });
  const { token: debtToken, minter } = DebtToken.deploy({
    address: DEBT_TOKEN,
    symbol: "DEBT",
    owner: DEPLOYER,
  });
  const debtMinter = minter.transferOwnership(ENGINE);

  const engine = new CollateralEngine(
    {
      address: ENGINE,
      collateralAssets: [weth, wbtc],
      priceFeeds: [ethFeed, btcFeed],
      debtToken,
      debtMinter,
    },
    { logger: silentLogger, clock: clock.now },
  );

  return { engine, weth, wbtc, debtToken, debtMinter, ethFeed, btcFeed, clock };
}

/** Give `account` collateral and approve the engine to pull it. */
export function fund(
  token: InMemoryCollateralToken,
  account: Address,
  amount: bigint,
): void {
  token.mint(account, amount);
  token.approve(account, ENGINE, token.allowance(account, ENGINE) + amount);
}

/** Deposit `units` whole WETH for `account`, funding it first. */
export function depositWeth(system: TestSystem, account: Address, units: bigint): void {
  fund(system.weth, account, units * UNIT);
  system.engine.depositCollateral(account, WETH, units * UNIT);
}
