export class CollateralEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CollateralEngineError";
  }
}

export class ZeroAmountError extends CollateralEngineError {
  constructor() {
    super("Amount must be greater than zero");
    this.name = "ZeroAmountError";
  }
}

export class TokenNotAllowedError extends CollateralEngineError {
  constructor(public readonly asset: string) {
    super(`Token ${asset} is not an allowed collateral asset`);
    this.name = "TokenNotAllowedError";
  }
}

export class AddressArrayLengthMismatchError extends CollateralEngineError {
  constructor(
    public readonly assetCount: number,
    public readonly feedCount: number,
  ) {
    super(
      `Collateral asset and price feed lists must have the same length (got ${assetCount} assets, ${feedCount} feeds)`,
    );
    this.name = "AddressArrayLengthMismatchError";
  }
}

export class DuplicateCollateralAssetError extends CollateralEngineError {
  constructor(public readonly asset: string) {
    super(`Collateral asset ${asset} is listed more than once`);
    this.name = "DuplicateCollateralAssetError";
  }
}

export class InvalidAddressError extends CollateralEngineError {
  constructor(public readonly value: string) {
    super(`Invalid address "${value}"`);
    this.name = "InvalidAddressError";
  }
}

export class CollateralTransferFailedError extends CollateralEngineError {
  constructor(public readonly asset: string) {
    super(`Collateral transfer of ${asset} failed`);
    this.name = "CollateralTransferFailedError";
  }
}

export class BreaksHealthFactorError extends CollateralEngineError {
  constructor(public readonly healthFactor: bigint) {
    super(`Health factor ${healthFactor} is below the minimum`);
    this.name = "BreaksHealthFactorError";
  }
}

export class DebtMintFailedError extends CollateralEngineError {
  constructor() {
    super("Debt token mint failed");
    this.name = "DebtMintFailedError";
  }
}

export class DebtTransferFailedError extends CollateralEngineError {
  constructor() {
    super("Debt token transfer failed");
    this.name = "DebtTransferFailedError";
  }
}

export class HealthFactorOkError extends CollateralEngineError {
  constructor(public readonly healthFactor: bigint) {
    super(`Health factor ${healthFactor} is not below the minimum; account cannot be liquidated`);
    this.name = "HealthFactorOkError";
  }
}

export class HealthFactorNotImprovedError extends CollateralEngineError {
  constructor(public readonly healthFactor: bigint) {
    super(`Liquidation did not improve the health factor (ended at ${healthFactor})`);
    this.name = "HealthFactorNotImprovedError";
  }
}

export class StaleOracleError extends CollateralEngineError {
  constructor(public readonly staleness: bigint) {
    super(`Price feed reading is stale (${staleness}s old)`);
    this.name = "StaleOracleError";
  }
}

export class InvalidPriceError extends CollateralEngineError {
  constructor(public readonly answer: bigint) {
    super(`Price feed returned a non-positive answer: ${answer}`);
    this.name = "InvalidPriceError";
  }
}

export class InsufficientBalanceError extends CollateralEngineError {
  constructor(
    public readonly account: string,
    public readonly asset: string,
    public readonly requested: bigint,
    public readonly available: bigint,
  ) {
    super(
      `Cannot withdraw ${requested} of ${asset} for ${account}: only ${available} deposited`,
    );
    this.name = "InsufficientBalanceError";
  }
}

export class InsufficientDebtError extends CollateralEngineError {
  constructor(
    public readonly account: string,
    public readonly requested: bigint,
    public readonly outstanding: bigint,
  ) {
    super(
      `Cannot burn ${requested} of debt for ${account}: only ${outstanding} outstanding`,
    );
    this.name = "InsufficientDebtError";
  }
}

export class ReentrancyError extends CollateralEngineError {
  constructor(public readonly operation: string) {
    super(`Reentrant call to ${operation} rejected`);
    this.name = "ReentrancyError";
  }
}

export class UnsupportedFeedDecimalsError extends CollateralEngineError {
  constructor(public readonly decimals: number) {
    super(`Unsupported feed precision: ${decimals} decimals (expected an integer from 0 to 18)`);
    this.name = "UnsupportedFeedDecimalsError";
  }
}

export class UnauthorizedMinterError extends CollateralEngineError {
  constructor(public readonly sender: string) {
    super(`${sender} does not hold the active debt token minter`);
    this.name = "UnauthorizedMinterError";
  }
}

export class BurnAmountExceedsBalanceError extends CollateralEngineError {
  constructor(
    public readonly requested: bigint,
    public readonly balance: bigint,
  ) {
    super(`Burn amount ${requested} exceeds balance ${balance}`);
    this.name = "BurnAmountExceedsBalanceError";
  }
}
