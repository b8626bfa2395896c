import type { Address } from "../utils/address.js";
import { toAddress } from "../utils/address.js";
import {
  BurnAmountExceedsBalanceError,
  InvalidAddressError,
  UnauthorizedMinterError,
  ZeroAmountError,
} from "../utils/errors.js";
import type { TokenOptions } from "./base-token.js";
import { BaseToken } from "./base-token.js";
import type { DebtMinter, DebtTokenCapability } from "./types.js";

const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

export interface DeployedDebtToken {
  token: DebtToken;
  /** The deploying owner's handle. */
  minter: DebtMinter;
}

/**
 * The issued debt token. Supply changes only through the active
 * `DebtMinter`, which is meant to be the engine's after setup.
 */
export class DebtToken extends BaseToken implements DebtTokenCapability {
  private _owner: Address;
  private activeMinter: DebtMinter | null = null;

  private constructor(options: TokenOptions & { owner: string }) {
    super(options);
    this._owner = toAddress(options.owner);
  }

  static deploy(options: TokenOptions & { owner: string }): DeployedDebtToken {
    const token = new DebtToken(options);
    return { token, minter: token.grant(token._owner) };
  }

  get owner(): Address {
    return this._owner;
  }

  snapshot(): () => void {
    const restoreBalances = super.snapshot();
    const owner = this._owner;
    const minter = this.activeMinter;
    return () => {
      restoreBalances();
      this._owner = owner;
      this.activeMinter = minter;
    };
  }

  private grant(owner: Address): DebtMinter {
    const minter: DebtMinter = {
      owner,
      mint: (to, amount) => {
        this.authorize(minter);
        if (toAddress(to) === ZERO_ADDRESS) throw new InvalidAddressError(to);
        if (amount <= 0n) throw new ZeroAmountError();
        this.credit(to, amount);
        return true;
      },
      burn: (amount) => {
        this.authorize(minter);
        if (amount <= 0n) throw new ZeroAmountError();
        const balance = this.balanceOf(owner);
        if (balance < amount) throw new BurnAmountExceedsBalanceError(amount, balance);
        this.debit(owner, amount);
      },
      transferOwnership: (newOwner) => {
        this.authorize(minter);
        this._owner = toAddress(newOwner);
        return this.grant(this._owner);
      },
    };
    this.activeMinter = minter;
    return minter;
  }

  private authorize(minter: DebtMinter): void {
    if (minter !== this.activeMinter) {
      throw new UnauthorizedMinterError(minter.owner);
    }
  }
}
