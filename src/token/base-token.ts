import { maxUint256 } from "viem";
import type { Revertible } from "../engine/journal.js";
import type { Address } from "../utils/address.js";
import { toAddress } from "../utils/address.js";
import type { TransferCapability, TransferHook } from "./types.js";

export interface TokenOptions {
  address: string;
  symbol: string;
  /** Called after every successful transfer. */
  onTransfer?: TransferHook;
}

/**
 * In-process balance ledger with allowances. Transfers return `false` on
 * insufficient balance or allowance instead of throwing.
 */
export class BaseToken implements TransferCapability, Revertible {
  readonly address: Address;
  readonly symbol: string;
  private balances = new Map<Address, bigint>();
  private allowances = new Map<Address, Map<Address, bigint>>();
  private supply = 0n;
  private onTransfer: TransferHook | undefined;

  constructor(options: TokenOptions) {
    this.address = toAddress(options.address);
    this.symbol = options.symbol;
    this.onTransfer = options.onTransfer;
  }

  setTransferHook(hook: TransferHook | undefined): void {
    this.onTransfer = hook;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(toAddress(account)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(toAddress(owner))?.get(toAddress(spender)) ?? 0n;
  }

  approve(owner: Address, spender: Address, amount: bigint): boolean {
    const key = toAddress(owner);
    let granted = this.allowances.get(key);
    if (!granted) {
      granted = new Map();
      this.allowances.set(key, granted);
    }
    granted.set(toAddress(spender), amount);
    return true;
  }

  transfer(sender: Address, to: Address, amount: bigint): boolean {
    return this.move(toAddress(sender), toAddress(to), amount);
  }

  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean {
    const owner = toAddress(from);
    const allowed = this.allowance(owner, spender);
    if (allowed < amount) return false;
    if (this.balanceOf(owner) < amount) return false;
    // an unlimited approval is never drawn down
    if (allowed !== maxUint256) {
      this.approve(owner, spender, allowed - amount);
    }
    return this.move(owner, toAddress(to), amount);
  }

  snapshot(): () => void {
    const balances = new Map(this.balances);
    const allowances = new Map(
      [...this.allowances].map(([owner, granted]) => [owner, new Map(granted)]),
    );
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.allowances = allowances;
      this.supply = supply;
    };
  }

  protected credit(to: Address, amount: bigint): void {
    const key = toAddress(to);
    this.balances.set(key, this.balanceOf(key) + amount);
    this.supply += amount;
  }

  protected debit(from: Address, amount: bigint): void {
    const key = toAddress(from);
    this.balances.set(key, this.balanceOf(key) - amount);
    this.supply -= amount;
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    if (amount < 0n) return false;
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) return false;
    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.onTransfer?.({ token: this.address, from, to, amount });
    return true;
  }
}
