import { describe, it, expect } from "vitest";
import { maxUint256 } from "viem";
import type { Address } from "../../src/utils/address.js";
import { CollateralEngineError } from "../../src/utils/errors.js";
import { ENGINE, LIQUIDATOR, OTHER_USER, USER, WBTC, WETH } from "../fixtures/addresses.js";
import type { TestSystem } from "../fixtures/system.js";
import { BTC_USD, ETH_USD, UNIT, deploySystem } from "../fixtures/system.js";

const ACTORS: Address[] = [USER, OTHER_USER, LIQUIDATOR];
const ASSETS: Address[] = [WETH, WBTC];

/** Deterministic PRNG (mulberry32) so failures reproduce. */
function prng(seed: number): (max: number) => number {
  let state = seed >>> 0;
  return (max) => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (((t ^ (t >>> 14)) >>> 0) % max);
  };
}

function setup(): TestSystem {
  const system = deploySystem();
  for (const actor of ACTORS) {
    system.weth.mint(actor, 1_000n * UNIT);
    system.wbtc.mint(actor, 50n * UNIT);
    system.weth.approve(actor, ENGINE, maxUint256);
    system.wbtc.approve(actor, ENGINE, maxUint256);
    system.debtToken.approve(actor, ENGINE, maxUint256);
  }
  return system;
}

/** Both assets move together, so a crash scales every collateral value alike. */
const PRICES = {
  normal: { eth: ETH_USD, btc: BTC_USD },
  crashed: { eth: (ETH_USD * 2n) / 3n, btc: (BTC_USD * 2n) / 3n },
};

/**
 * Runs one random call. Returns the account whose health factor the call
 * enforced, if it committed.
 */
function step(system: TestSystem, rand: (max: number) => number): Address | null {
  const { engine } = system;
  const actor = ACTORS[rand(ACTORS.length)];
  const asset = ASSETS[rand(ASSETS.length)];
  const collateral = BigInt(rand(5) + 1) * UNIT;
  const debt = BigInt(rand(20_000) + 1) * UNIT;

  switch (rand(8)) {
    case 0:
      engine.depositCollateral(actor, asset, collateral);
      return null;
    case 1:
      engine.mintDebt(actor, debt);
      return actor;
    case 2:
      engine.redeemCollateral(actor, asset, collateral);
      return actor;
    case 3:
      engine.burnDebt(actor, debt / 4n);
      return actor;
    case 4:
      engine.depositCollateralAndMintDebt(actor, asset, collateral, debt);
      return actor;
    case 5:
      engine.redeemCollateralForDebt(actor, asset, collateral, debt / 4n);
      return actor;
    case 6: {
      const prices = rand(2) === 0 ? PRICES.normal : PRICES.crashed;
      system.ethFeed.updateAnswer(prices.eth);
      system.btcFeed.updateAnswer(prices.btc);
      return null;
    }
    default: {
      const debtor = ACTORS[(ACTORS.indexOf(actor) + 1 + rand(ACTORS.length - 1)) % ACTORS.length];
      const result = engine.liquidate(actor, asset, debtor, debt / 10n);
      expect(result.endingHealthFactor).toBeGreaterThan(result.startingHealthFactor);
      return actor;
    }
  }
}

function assertInvariants(system: TestSystem): void {
  const { engine, debtToken, weth, wbtc } = system;
  const supply = debtToken.totalSupply();

  expect(supply).toBeLessThanOrEqual(engine.totalCollateralValueUSD());
  expect(supply).toBe(engine.totalDebt());

  let wethDeposited = 0n;
  let wbtcDeposited = 0n;
  for (const account of engine.accounts()) {
    wethDeposited += engine.collateralBalanceOf(account, WETH);
    wbtcDeposited += engine.collateralBalanceOf(account, WBTC);
    const { debt, collateralValueUSD } = engine.accountInfo(account);
    expect(collateralValueUSD).toBeGreaterThanOrEqual(debt);
  }
  expect(weth.balanceOf(ENGINE)).toBe(wethDeposited);
  expect(wbtc.balanceOf(ENGINE)).toBe(wbtcDeposited);
}

describe("engine invariants", () => {
  it.each([1, 7, 42, 1337])("hold across random calls and price swings (seed %i)", (seed) => {
    const system = setup();
    const rand = prng(seed);
    let committed = 0;

    for (let i = 0; i < 300; i++) {
      try {
        const enforced = step(system, rand);
        committed++;
        if (enforced) {
          expect(system.engine.healthFactor(enforced)).toBeGreaterThanOrEqual(UNIT);
        }
      } catch (error) {
        if (!(error instanceof CollateralEngineError)) throw error;
      }
      assertInvariants(system);
    }

    expect(committed).toBeGreaterThan(0);
  });
});
