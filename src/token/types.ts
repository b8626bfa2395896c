import type { Address } from "../utils/address.js";

/**
 * Asset movement as the engine sees it. Implementations report failure by
 * returning `false`; the engine checks every result.
 *
 * `sender`/`spender` is the account making the call.
 */
export interface TransferCapability {
  transfer(sender: Address, to: Address, amount: bigint): boolean;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): boolean;
  balanceOf(account: Address): bigint;
}

/** Debt token surface. Supply only changes through its `DebtMinter`. */
export interface DebtTokenCapability extends TransferCapability {
  totalSupply(): bigint;
}

/**
 * Mint and burn rights over a debt token, held by its owner. A handle stops
 * working once ownership moves on; the address alone grants nothing.
 */
export interface DebtMinter {
  readonly owner: Address;
  mint(to: Address, amount: bigint): boolean;
  /** Burns from the owner's own balance. */
  burn(amount: bigint): void;
  /** Hands ownership to `newOwner` and returns their handle. This one is revoked. */
  transferOwnership(newOwner: Address): DebtMinter;
}

export interface TransferEvent {
  token: Address;
  from: Address;
  to: Address;
  amount: bigint;
}

/** Invoked after a balance moves, the way token receive callbacks fire. */
export type TransferHook = (event: TransferEvent) => void;
