import type { Address } from "../utils/address.js";

export interface AccountPosition {
  account: Address;
  /** Deposited amount per collateral asset (assets with zero omitted). */
  collateral: Map<Address, bigint>;
  debt: bigint;
}
