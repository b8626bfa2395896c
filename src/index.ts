export { CollateralEngine } from "./engine/engine.js";
export { ExecutionLock } from "./engine/lock.js";
export { StateJournal, isRevertible } from "./engine/journal.js";
export type { Revertible } from "./engine/journal.js";
export type {
  AccountInfo,
  CollateralAssetToken,
  EngineDebtToken,
  EngineEvent,
  EngineEventListener,
  EngineParams,
  LiquidationResult,
} from "./engine/types.js";
export { CollateralLedger } from "./ledger/ledger.js";
export type { AccountPosition } from "./ledger/types.js";
export { HealthCalculator } from "./health/calculator.js";
export { OracleAdapter } from "./oracle/adapter.js";
export { ManualPriceFeed } from "./oracle/manual-feed.js";
export type { PriceFeed, PriceReading, RoundData } from "./oracle/types.js";
export { BaseToken } from "./token/base-token.js";
export type { TokenOptions } from "./token/base-token.js";
export { InMemoryCollateralToken } from "./token/collateral-token.js";
export { DebtToken } from "./token/debt-token.js";
export type { DeployedDebtToken } from "./token/debt-token.js";
export type {
  DebtMinter,
  DebtTokenCapability,
  TransferCapability,
  TransferEvent,
  TransferHook,
} from "./token/types.js";
export { PROTOCOL, systemClock } from "./config.js";
export type { Clock, EngineConfig } from "./config.js";
export { createLogger } from "./logging/logger.js";
export type { Logger, LogLevel } from "./logging/logger.js";
export { toAddress } from "./utils/address.js";
export type { Address } from "./utils/address.js";
export {
  MAX_HEALTH_FACTOR,
  PRECISION,
  feedPrecisionAdjustment,
  formatWad,
  mulDiv,
  toWad,
} from "./utils/math.js";
export {
  CollateralEngineError,
  ZeroAmountError,
  TokenNotAllowedError,
  AddressArrayLengthMismatchError,
  DuplicateCollateralAssetError,
  InvalidAddressError,
  CollateralTransferFailedError,
  BreaksHealthFactorError,
  DebtMintFailedError,
  DebtTransferFailedError,
  HealthFactorOkError,
  HealthFactorNotImprovedError,
  StaleOracleError,
  InvalidPriceError,
  InsufficientBalanceError,
  InsufficientDebtError,
  ReentrancyError,
  UnsupportedFeedDecimalsError,
  UnauthorizedMinterError,
  BurnAmountExceedsBalanceError,
} from "./utils/errors.js";
