import type { PriceFeed } from "../oracle/types.js";
import type { DebtMinter, DebtTokenCapability, TransferCapability } from "../token/types.js";
import type { Address } from "../utils/address.js";

export interface CollateralAssetToken extends TransferCapability {
  readonly address: string;
}

export interface EngineDebtToken extends DebtTokenCapability {
  readonly address: string;
}

export interface EngineParams {
  /** Address the engine holds collateral and debt tokens under. */
  address: string;
  /** Allow-listed collateral. Parallel to `priceFeeds`. */
  collateralAssets: readonly CollateralAssetToken[];
  /** USD feed for each entry of `collateralAssets`, in the same order. */
  priceFeeds: readonly PriceFeed[];
  debtToken: EngineDebtToken;
  /** Mint rights over `debtToken`, owned by `address`. */
  debtMinter: DebtMinter;
}

export interface AccountInfo {
  debt: bigint;
  collateralValueUSD: bigint;
}

export interface LiquidationResult {
  /** Collateral paid to the liquidator, bonus included. */
  collateralSeized: bigint;
  bonus: bigint;
  debtCovered: bigint;
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

export type EngineEvent =
  | { type: "CollateralDeposited"; account: Address; asset: Address; amount: bigint }
  | { type: "CollateralRedeemed"; from: Address; to: Address; asset: Address; amount: bigint }
  | { type: "DebtMinted"; account: Address; amount: bigint }
  | { type: "DebtBurned"; onBehalfOf: Address; from: Address; amount: bigint }
  | ({ type: "Liquidated"; liquidator: Address; debtor: Address; asset: Address } & LiquidationResult);

export type EngineEventListener = (event: EngineEvent) => void;
