import type { Address } from "../utils/address.js";
import { BaseToken } from "./base-token.js";

/** Collateral asset with an open faucet, for simulations and tests. */
export class InMemoryCollateralToken extends BaseToken {
  mint(to: Address, amount: bigint): void {
    this.credit(to, amount);
  }
}
