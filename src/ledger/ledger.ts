import type { Revertible } from "../engine/journal.js";
import type { Address } from "../utils/address.js";
import { InsufficientBalanceError, InsufficientDebtError } from "../utils/errors.js";
import type { AccountPosition } from "./types.js";

interface AccountEntry {
  collateral: Map<Address, bigint>;
  debt: bigint;
}

/**
 * Per-account collateral and debt bookkeeping.
 *
 * Pure accounting: the ledger never checks solvency. Callers are expected to
 * run the health factor check around every mutation.
 */
export class CollateralLedger implements Revertible {
  private entries = new Map<Address, AccountEntry>();
  private totals = new Map<Address, bigint>();
  private outstandingDebt = 0n;

  deposit(account: Address, asset: Address, amount: bigint): void {
    const entry = this.entry(account);
    entry.collateral.set(asset, (entry.collateral.get(asset) ?? 0n) + amount);
    this.totals.set(asset, (this.totals.get(asset) ?? 0n) + amount);
  }

  withdraw(account: Address, asset: Address, amount: bigint): void {
    const available = this.collateralOf(account, asset);
    if (amount > available) {
      throw new InsufficientBalanceError(account, asset, amount, available);
    }
    this.entry(account).collateral.set(asset, available - amount);
    this.totals.set(asset, (this.totals.get(asset) ?? 0n) - amount);
  }

  increaseDebt(account: Address, amount: bigint): void {
    const entry = this.entry(account);
    entry.debt += amount;
    this.outstandingDebt += amount;
  }

  decreaseDebt(account: Address, amount: bigint): void {
    const outstanding = this.debtOf(account);
    if (amount > outstanding) {
      throw new InsufficientDebtError(account, amount, outstanding);
    }
    this.entry(account).debt = outstanding - amount;
    this.outstandingDebt -= amount;
  }

  collateralOf(account: Address, asset: Address): bigint {
    return this.entries.get(account)?.collateral.get(asset) ?? 0n;
  }

  debtOf(account: Address): bigint {
    return this.entries.get(account)?.debt ?? 0n;
  }

  totalDeposited(asset: Address): bigint {
    return this.totals.get(asset) ?? 0n;
  }

  totalDebt(): bigint {
    return this.outstandingDebt;
  }

  /** Every account that has ever held collateral or debt, zeroed ones included. */
  accounts(): Address[] {
    return [...this.entries.keys()];
  }

  position(account: Address): AccountPosition {
    const entry = this.entries.get(account);
    const collateral = new Map<Address, bigint>();
    for (const [asset, amount] of entry?.collateral ?? []) {
      if (amount > 0n) collateral.set(asset, amount);
    }
    return { account, collateral, debt: entry?.debt ?? 0n };
  }

  snapshot(): () => void {
    const entries = new Map(
      [...this.entries].map(([account, entry]) => [
        account,
        { collateral: new Map(entry.collateral), debt: entry.debt },
      ]),
    );
    const totals = new Map(this.totals);
    const outstandingDebt = this.outstandingDebt;
    return () => {
      this.entries = entries;
      this.totals = totals;
      this.outstandingDebt = outstandingDebt;
    };
  }

  private entry(account: Address): AccountEntry {
    let entry = this.entries.get(account);
    if (!entry) {
      entry = { collateral: new Map(), debt: 0n };
      this.entries.set(account, entry);
    }
    return entry;
  }
}
