import { describe, it, expect } from "vitest";
import { CollateralLedger } from "../../src/ledger/ledger.js";
import { InsufficientBalanceError, InsufficientDebtError } from "../../src/utils/errors.js";
import { OTHER_USER, USER, WBTC, WETH } from "../fixtures/addresses.js";
import { captureError } from "../fixtures/errors.js";

describe("CollateralLedger", () => {
  it("creates accounts implicitly and tracks per-asset deposits", () => {
    const ledger = new CollateralLedger();
    expect(ledger.accounts()).toEqual([]);

    ledger.deposit(USER, WETH, 5n);
    ledger.deposit(USER, WETH, 3n);
    ledger.deposit(USER, WBTC, 1n);
    ledger.deposit(OTHER_USER, WETH, 10n);

    expect(ledger.collateralOf(USER, WETH)).toBe(8n);
    expect(ledger.collateralOf(USER, WBTC)).toBe(1n);
    expect(ledger.totalDeposited(WETH)).toBe(18n);
    expect(ledger.accounts()).toEqual([USER, OTHER_USER]);
  });

  it("withdraws and rejects withdrawals above the deposit", () => {
    const ledger = new CollateralLedger();
    ledger.deposit(USER, WETH, 5n);
    ledger.withdraw(USER, WETH, 2n);
    expect(ledger.collateralOf(USER, WETH)).toBe(3n);
    expect(ledger.totalDeposited(WETH)).toBe(3n);

    const error = captureError(InsufficientBalanceError, () => ledger.withdraw(USER, WETH, 4n));
    expect(error.requested).toBe(4n);
    expect(error.available).toBe(3n);
    expect(ledger.collateralOf(USER, WETH)).toBe(3n);
  });

  it("increases and decreases debt, rejecting underflow", () => {
    const ledger = new CollateralLedger();
    ledger.increaseDebt(USER, 100n);
    ledger.increaseDebt(OTHER_USER, 50n);
    ledger.decreaseDebt(USER, 40n);
    expect(ledger.debtOf(USER)).toBe(60n);
    expect(ledger.totalDebt()).toBe(110n);

    const error = captureError(InsufficientDebtError, () => ledger.decreaseDebt(USER, 61n));
    expect(error.outstanding).toBe(60n);
    expect(ledger.totalDebt()).toBe(110n);
  });

  it("keeps a zeroed account addressable", () => {
    const ledger = new CollateralLedger();
    ledger.deposit(USER, WETH, 5n);
    ledger.increaseDebt(USER, 1n);
    ledger.withdraw(USER, WETH, 5n);
    ledger.decreaseDebt(USER, 1n);

    expect(ledger.accounts()).toEqual([USER]);
    const position = ledger.position(USER);
    expect(position.debt).toBe(0n);
    expect(position.collateral.size).toBe(0);
  });

  it("restores the captured state", () => {
    const ledger = new CollateralLedger();
    ledger.deposit(USER, WETH, 5n);
    ledger.increaseDebt(USER, 2n);
    const restore = ledger.snapshot();

    ledger.deposit(USER, WETH, 10n);
    ledger.deposit(OTHER_USER, WBTC, 1n);
    ledger.increaseDebt(USER, 7n);
    restore();

    expect(ledger.collateralOf(USER, WETH)).toBe(5n);
    expect(ledger.totalDeposited(WETH)).toBe(5n);
    expect(ledger.totalDeposited(WBTC)).toBe(0n);
    expect(ledger.debtOf(USER)).toBe(2n);
    expect(ledger.totalDebt()).toBe(2n);
    expect(ledger.accounts()).toEqual([USER]);
  });
});
