import type { EngineConfig } from "../config.js";
import { PROTOCOL, systemClock } from "../config.js";
import { HealthCalculator } from "../health/calculator.js";
import { CollateralLedger } from "../ledger/ledger.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { OracleAdapter } from "../oracle/adapter.js";
import type { PriceFeed } from "../oracle/types.js";
import type { DebtMinter } from "../token/types.js";
import type { Address } from "../utils/address.js";
import { toAddress } from "../utils/address.js";
import {
  AddressArrayLengthMismatchError,
  BreaksHealthFactorError,
  CollateralTransferFailedError,
  DebtMintFailedError,
  DebtTransferFailedError,
  DuplicateCollateralAssetError,
  HealthFactorNotImprovedError,
  HealthFactorOkError,
  TokenNotAllowedError,
  UnauthorizedMinterError,
  ZeroAmountError,
} from "../utils/errors.js";
import { feedPrecisionAdjustment, formatWad } from "../utils/math.js";
import { ExecutionLock } from "./lock.js";
import { StateJournal, isRevertible } from "./journal.js";
import type {
  AccountInfo,
  CollateralAssetToken,
  EngineDebtToken,
  EngineEvent,
  EngineEventListener,
  EngineParams,
  LiquidationResult,
} from "./types.js";

/**
 * CollateralEngine issues debt against deposited collateral.
 *
 * Every mutating call is one transaction:
 *   1. the execution lock is taken (nested calls are rejected)
 *   2. ledger and token state are snapshotted
 *   3. the operation runs, health factors are checked
 *   4. on any error everything is restored and the error rethrown;
 *      on success the buffered events are published
 *
 * Accounts with debt must keep a health factor of at least 1.0, i.e.
 * collateral worth twice the debt. Anyone may liquidate an account below that
 * and receives the seized collateral plus a 10% bonus.
 */
export class CollateralEngine {
  readonly address: Address;
  private assets = new Map<Address, CollateralAssetToken>();
  private feeds = new Map<Address, PriceFeed>();
  private debt: EngineDebtToken;
  private minter: DebtMinter;
  private debtAddress: Address;
  private ledger = new CollateralLedger();
  private oracle: OracleAdapter;
  private calculator: HealthCalculator;
  private lock = new ExecutionLock();
  private journal = new StateJournal();
  private listeners = new Set<EngineEventListener>();
  private pending: EngineEvent[] | null = null;
  private logger: Logger;

  constructor(params: EngineParams, config: EngineConfig = {}) {
    const rootLogger = config.logger ?? createLogger({
      level: config.logLevel ?? "info",
      pretty: config.prettyLogs ?? false,
    });
    this.logger = rootLogger.child({ module: "engine" });

    if (params.collateralAssets.length !== params.priceFeeds.length) {
      throw new AddressArrayLengthMismatchError(
        params.collateralAssets.length,
        params.priceFeeds.length,
      );
    }

    this.address = toAddress(params.address);
    for (const [i, token] of params.collateralAssets.entries()) {
      const asset = toAddress(token.address);
      if (this.assets.has(asset)) throw new DuplicateCollateralAssetError(asset);
      const feed = params.priceFeeds[i];
      // throws for feeds finer than 18 decimals
      feedPrecisionAdjustment(feed.decimals());
      this.assets.set(asset, token);
      this.feeds.set(asset, feed);
    }
    this.debt = params.debtToken;
    this.debtAddress = toAddress(params.debtToken.address);
    if (toAddress(params.debtMinter.owner) !== this.address) {
      throw new UnauthorizedMinterError(params.debtMinter.owner);
    }
    this.minter = params.debtMinter;

    this.oracle = new OracleAdapter(config.clock ?? systemClock, rootLogger);
    this.calculator = new HealthCalculator(this.feeds, this.ledger, this.oracle);

    this.journal.register(this.ledger);
    for (const token of [...this.assets.values(), this.debt]) {
      if (isRevertible(token)) this.journal.register(token);
    }

    this.logger.info(
      {
        engine: this.address,
        collateral: [...this.assets.keys()],
        debtToken: this.debtAddress,
        revertibleParticipants: this.journal.size,
      },
      "Collateral engine initialized",
    );
  }

  // === Position operations ===

  depositCollateral(caller: string, asset: string, amount: bigint): void {
    const account = toAddress(caller);
    const token = toAddress(asset);
    this.transact("depositCollateral", { account, asset: token, amount }, () => {
      this.requirePositive(amount);
      this.depositInternal(account, token, amount);
    });
  }

  mintDebt(caller: string, amount: bigint): void {
    const account = toAddress(caller);
    this.transact("mintDebt", { account, amount }, () => {
      this.requirePositive(amount);
      this.mintInternal(account, amount);
    });
  }

  depositCollateralAndMintDebt(
    caller: string,
    asset: string,
    collateralAmount: bigint,
    debtAmount: bigint,
  ): void {
    const account = toAddress(caller);
    const token = toAddress(asset);
    this.transact(
      "depositCollateralAndMintDebt",
      { account, asset: token, collateralAmount, debtAmount },
      () => {
        this.requirePositive(collateralAmount);
        this.depositInternal(account, token, collateralAmount);
        this.requirePositive(debtAmount);
        this.mintInternal(account, debtAmount);
      },
    );
  }

  redeemCollateral(caller: string, asset: string, amount: bigint): void {
    const account = toAddress(caller);
    const token = toAddress(asset);
    this.transact("redeemCollateral", { account, asset: token, amount }, () => {
      this.requirePositive(amount);
      this.redeemInternal(token, amount, account, account);
      this.revertIfHealthFactorBroken(account);
    });
  }

  /** Health factor is rechecked even though burning can only raise it. */
  burnDebt(caller: string, amount: bigint): void {
    const account = toAddress(caller);
    this.transact("burnDebt", { account, amount }, () => {
      this.requirePositive(amount);
      this.burnInternal(amount, account, account);
      this.revertIfHealthFactorBroken(account);
    });
  }

  /** Burns `debtAmount` first, then redeems `collateralAmount`. */
  redeemCollateralForDebt(
    caller: string,
    asset: string,
    collateralAmount: bigint,
    debtAmount: bigint,
  ): void {
    const account = toAddress(caller);
    const token = toAddress(asset);
    this.transact(
      "redeemCollateralForDebt",
      { account, asset: token, collateralAmount, debtAmount },
      () => {
        this.requireAllowed(token);
        this.requirePositive(debtAmount);
        this.burnInternal(debtAmount, account, account);
        this.requirePositive(collateralAmount);
        this.redeemInternal(token, collateralAmount, account, account);
        this.revertIfHealthFactorBroken(account);
      },
    );
  }

  /**
   * Cover `debtToCover` of an unhealthy debtor's debt with the caller's own
   * debt tokens, and take the equivalent collateral plus bonus.
   *
   * The seized collateral goes straight to the caller's wallet; it is not
   * credited to the caller's ledger position.
   */
  liquidate(
    caller: string,
    asset: string,
    debtor: string,
    debtToCover: bigint,
  ): LiquidationResult {
    const liquidator = toAddress(caller);
    const token = toAddress(asset);
    const user = toAddress(debtor);

    return this.transact(
      "liquidate",
      { liquidator, debtor: user, asset: token, debtToCover },
      () => {
        this.requirePositive(debtToCover);
        this.requireAllowed(token);

        const startingHealthFactor = this.calculator.healthFactor(user);
        if (startingHealthFactor >= PROTOCOL.minHealthFactor) {
          throw new HealthFactorOkError(startingHealthFactor);
        }

        const covered = this.calculator.collateralAmountForUSD(token, debtToCover);
        const bonus = covered / PROTOCOL.liquidationBonusDivisor;
        const collateralSeized = covered + bonus;

        // A cover worth less than one unit of collateral seizes nothing.
        if (collateralSeized > 0n) {
          this.redeemInternal(token, collateralSeized, user, liquidator);
        }
        this.burnInternal(debtToCover, user, liquidator);

        const endingHealthFactor = this.calculator.healthFactor(user);
        if (endingHealthFactor <= startingHealthFactor) {
          throw new HealthFactorNotImprovedError(endingHealthFactor);
        }
        // Only matters if the liquidator carries a debt position of their own.
        this.revertIfHealthFactorBroken(liquidator);

        const result: LiquidationResult = {
          collateralSeized,
          bonus,
          debtCovered: debtToCover,
          startingHealthFactor,
          endingHealthFactor,
        };
        this.emit({ type: "Liquidated", liquidator, debtor: user, asset: token, ...result });
        this.logger.info(
          {
            liquidator,
            debtor: user,
            asset: token,
            debtCovered: formatWad(debtToCover),
            collateralSeized: formatWad(collateralSeized),
            healthFactor: `${formatWad(startingHealthFactor)} -> ${formatWad(endingHealthFactor)}`,
          },
          "Account liquidated",
        );
        return result;
      },
    );
  }

  // === Events ===

  /** Listen for committed operations. Returns an unsubscribe function. */
  onEvent(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // === Read surface ===

  usdValue(asset: string, amount: bigint): bigint {
    this.lock.assertFree("usdValue");
    return this.calculator.usdValue(toAddress(asset), amount);
  }

  collateralAmountForUSD(asset: string, usdAmount: bigint): bigint {
    this.lock.assertFree("collateralAmountForUSD");
    return this.calculator.collateralAmountForUSD(toAddress(asset), usdAmount);
  }

  collateralValueUSD(account: string): bigint {
    this.lock.assertFree("collateralValueUSD");
    return this.calculator.collateralValueUSD(toAddress(account));
  }

  accountInfo(account: string): AccountInfo {
    this.lock.assertFree("accountInfo");
    const user = toAddress(account);
    return {
      debt: this.ledger.debtOf(user),
      collateralValueUSD: this.calculator.collateralValueUSD(user),
    };
  }

  healthFactor(account: string): bigint {
    this.lock.assertFree("healthFactor");
    return this.calculator.healthFactor(toAddress(account));
  }

  calculateHealthFactor(debt: bigint, collateralValueUSD: bigint): bigint {
    return this.calculator.calculateHealthFactor(debt, collateralValueUSD);
  }

  collateralBalanceOf(account: string, asset: string): bigint {
    this.lock.assertFree("collateralBalanceOf");
    return this.ledger.collateralOf(toAddress(account), toAddress(asset));
  }

  /** Total debt recorded across all accounts. Equals the debt token supply. */
  totalDebt(): bigint {
    this.lock.assertFree("totalDebt");
    return this.ledger.totalDebt();
  }

  /** USD value of all collateral deposited with the engine. */
  totalCollateralValueUSD(): bigint {
    this.lock.assertFree("totalCollateralValueUSD");
    return this.calculator.totalCollateralValueUSD();
  }

  /** Every account the ledger has seen, in first-seen order. */
  accounts(): Address[] {
    this.lock.assertFree("accounts");
    return this.ledger.accounts();
  }

  priceFeedOf(asset: string): PriceFeed {
    const feed = this.feeds.get(toAddress(asset));
    if (!feed) throw new TokenNotAllowedError(asset);
    return feed;
  }

  get collateralAssets(): Address[] {
    return [...this.assets.keys()];
  }

  get debtToken(): Address {
    return this.debtAddress;
  }

  get precision(): bigint {
    return PROTOCOL.precision;
  }

  get additionalFeedPrecision(): bigint {
    return PROTOCOL.additionalFeedPrecision;
  }

  get stalenessWindow(): bigint {
    return this.oracle.maxStaleness;
  }

  get overcollateralizationFactor(): bigint {
    return PROTOCOL.overcollateralizationFactor;
  }

  get minHealthFactor(): bigint {
    return PROTOCOL.minHealthFactor;
  }

  get liquidationBonusDivisor(): bigint {
    return PROTOCOL.liquidationBonusDivisor;
  }

  // === Internals (run inside a transaction) ===

  private depositInternal(account: Address, asset: Address, amount: bigint): void {
    const token = this.requireAllowed(asset);
    this.ledger.deposit(account, asset, amount);
    this.emit({ type: "CollateralDeposited", account, asset, amount });
    if (!token.transferFrom(this.address, account, this.address, amount)) {
      throw new CollateralTransferFailedError(asset);
    }
  }

  private mintInternal(account: Address, amount: bigint): void {
    this.ledger.increaseDebt(account, amount);
    this.revertIfHealthFactorBroken(account);
    if (!this.minter.mint(account, amount)) {
      throw new DebtMintFailedError();
    }
    this.emit({ type: "DebtMinted", account, amount });
  }

  private redeemInternal(asset: Address, amount: bigint, from: Address, to: Address): void {
    const token = this.requireAllowed(asset);
    this.ledger.withdraw(from, asset, amount);
    this.emit({ type: "CollateralRedeemed", from, to, asset, amount });
    if (!token.transfer(this.address, to, amount)) {
      throw new CollateralTransferFailedError(asset);
    }
  }

  private burnInternal(amount: bigint, onBehalfOf: Address, from: Address): void {
    this.ledger.decreaseDebt(onBehalfOf, amount);
    if (!this.debt.transferFrom(this.address, from, this.address, amount)) {
      throw new DebtTransferFailedError();
    }
    this.minter.burn(amount);
    this.emit({ type: "DebtBurned", onBehalfOf, from, amount });
  }

  private revertIfHealthFactorBroken(account: Address): void {
    const healthFactor = this.calculator.healthFactor(account);
    if (healthFactor < PROTOCOL.minHealthFactor) {
      throw new BreaksHealthFactorError(healthFactor);
    }
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) throw new ZeroAmountError();
  }

  private requireAllowed(asset: Address): CollateralAssetToken {
    const token = this.assets.get(asset);
    if (!token) throw new TokenNotAllowedError(asset);
    return token;
  }

  private emit(event: EngineEvent): void {
    this.pending?.push(event);
  }

  private transact<T>(
    operation: string,
    context: Record<string, unknown>,
    work: () => T,
  ): T {
    const events: EngineEvent[] = [];
    let result: T;
    try {
      result = this.lock.run(operation, () => {
        this.pending = events;
        try {
          return this.journal.run(work);
        } finally {
          this.pending = null;
        }
      });
    } catch (error) {
      this.logger.warn(
        { operation, ...context, error: error instanceof Error ? error.name : String(error) },
        "Operation reverted",
      );
      throw error;
    }

    this.logger.debug({ operation, ...context }, "Operation committed");
    for (const event of events) this.publish(event);
    return result;
  }

  private publish(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ error, event: event.type }, "Event listener threw");
      }
    }
  }
}
