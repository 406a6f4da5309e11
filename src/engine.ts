/**
 * Collateral Engine - Accounting Engine
 *
 * Keeps every debtor over-collateralized so the minted debt unit holds its
 * 1:1 peg to USD. Orchestrates deposit / mint / burn / redeem / liquidate
 * against the position ledger, gating each mutation on the health factor.
 *
 * Flow of every mutating operation:
 *   1. Non-reentrant guard: a nested mutating call fails with ReentrantCall
 *   2. Checks: amounts, allowed asset, liquidation eligibility
 *   3. Effects: ledger mutations (journaled)
 *   4. Invariant: health factor of every touched debtor >= MIN_HEALTH_FACTOR
 *   5. Interactions: collateral transfers and debt-token mint/burn
 *   6. Commit and publish events, or roll back ledger + compensate collaborators
 *
 * Numbers: 18-decimal fixed point, integer percentages, floor division.
 */

import { EventEmitter } from "events";
import { ethers } from "ethers";
import {
  ADDITIONAL_FEED_PRECISION,
  EngineConfig,
  LIQUIDATION_PRECISION,
  MIN_HEALTH_FACTOR,
  PRECISION,
  resolveConfig,
} from "./config";
import { calculateHealthFactor, calculateSeizeAmounts, formatHealthFactor } from "./calculator";
import { CollateralRegistry } from "./collateral-registry";
import {
  CollaboratorCode,
  CollaboratorFailure,
  InvariantCode,
  InvariantViolation,
  LiquidationIneffective,
  LiquidationNotEligible,
  ReentrancyViolation,
  ValidationError,
  isEngineError,
} from "./errors";
import { createServiceLogger } from "./logger";
import {
  failuresTotal,
  liquidationsTotal,
  listenerFailuresTotal,
  operationsTotal,
  outstandingDebt,
} from "./metrics";
import { type Clock, PriceOracleAdapter } from "./price-oracle";
import { PositionLedger } from "./position-ledger";
import type {
  AccountId,
  AccountInformation,
  AssetId,
  CollateralTransfer,
  DebtToken,
  EngineEvents,
  LedgerEvent,
  LiquidationQuote,
  PriceFeedId,
  PriceFeedResolver,
} from "./types";
import { UnitOfWork } from "./unit-of-work";

const logger = createServiceLogger("ENGINE");

// ============================================================
//                     TYPES
// ============================================================

export interface EngineOptions {
  /** Approved collateral assets, registration order */
  tokenAddresses: readonly AssetId[];
  /** Price feed per asset, same index as tokenAddresses */
  priceFeedIds: readonly PriceFeedId[];
  resolveFeed: PriceFeedResolver;
  debtToken: DebtToken;
  collateral: CollateralTransfer;
  config?: Partial<EngineConfig>;
  clock?: Clock;
}

export interface LiquidationResult {
  collateralSeized: bigint;
  bonus: bigint;
  debtCovered: bigint;
  healthFactorBefore: bigint;
  healthFactorAfter: bigint;
}

type Operation =
  | "deposit"
  | "depositAndMint"
  | "mint"
  | "burn"
  | "redeem"
  | "redeemForDebtRepayment"
  | "liquidate";

function requireMoreThanZero(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new ValidationError("AmountMustBeMoreThanZero", `${label} must be more than zero, got ${amount}`);
  }
}

// ============================================================
//                     ENGINE
// ============================================================

export class AccountingEngine {
  readonly registry: CollateralRegistry;
  readonly oracle: PriceOracleAdapter;

  private readonly ledger: PositionLedger;

  private readonly config: EngineConfig;
  private readonly debtToken: DebtToken;
  private readonly collateral: CollateralTransfer;
  private readonly events = new EventEmitter();

  /** Operation currently holding the non-reentrant lock */
  private activeOperation: Operation | null = null;

  constructor(options: EngineOptions) {
    this.config = resolveConfig(options.config);
    this.registry = new CollateralRegistry(options.tokenAddresses, options.priceFeedIds);
    this.oracle = new PriceOracleAdapter(this.registry, options.resolveFeed, {
      stalenessSeconds: this.config.oracleStalenessSeconds,
      clock: options.clock,
    });
    this.ledger = new PositionLedger(this.registry);
    this.debtToken = options.debtToken;
    this.collateral = options.collateral;

    logger.info(
      `Engine ready: ${this.registry.enumerate().length} collateral assets, ` +
        `threshold ${this.config.liquidationThresholdPct}%, bonus ${this.config.liquidationBonusPct}%, ` +
        `debt token ${this.debtToken.id}`
    );
  }

  // ============================================================
  //                     EVENTS
  // ============================================================

  on<K extends keyof EngineEvents>(event: K, listener: (...args: EngineEvents[K]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  off<K extends keyof EngineEvents>(event: K, listener: (...args: EngineEvents[K]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  // ============================================================
  //                     MUTATING OPERATIONS
  // ============================================================

  /** Deposit `amount` of `asset` as collateral, pulled from `account`. */
  deposit(account: AccountId, asset: AssetId, amount: bigint): void {
    this.run("deposit", (uow) => {
      this.ledger.depositCollateral(account, asset, amount);
      this.pullCollateral(uow, asset, account, amount);
      logger.info(`deposit: ${account} +${ethers.formatEther(amount)} ${asset}`);
    });
  }

  /** Deposit collateral and mint debt as one unit. */
  depositAndMint(account: AccountId, asset: AssetId, collateralAmount: bigint, debtAmount: bigint): void {
    this.run("depositAndMint", (uow) => {
      requireMoreThanZero(debtAmount, "Debt amount");
      this.ledger.depositCollateral(account, asset, collateralAmount);
      this.ledger.recordMint(account, debtAmount);
      this.revertIfHealthFactorIsBroken(account, "BreaksHealthFactor");

      this.pullCollateral(uow, asset, account, collateralAmount);
      this.mintTo(uow, account, debtAmount);
      logger.info(
        `depositAndMint: ${account} +${ethers.formatEther(collateralAmount)} ${asset}, ` +
          `minted ${ethers.formatEther(debtAmount)}`
      );
    });
  }

  /** Mint `amount` of debt token to `account` against its collateral. */
  mint(account: AccountId, amount: bigint): void {
    this.run("mint", (uow) => {
      requireMoreThanZero(amount, "Mint amount");
      this.ledger.recordMint(account, amount);
      this.revertIfHealthFactorIsBroken(account, "BreaksHealthFactor");

      this.mintTo(uow, account, amount);
      logger.info(`mint: ${account} minted ${ethers.formatEther(amount)}`);
    });
  }

  /** Repay `amount` of the caller's own debt with debt token it holds. */
  burn(account: AccountId, amount: bigint): void {
    this.run("burn", (uow) => {
      requireMoreThanZero(amount, "Burn amount");
      this.ledger.recordBurn(account, amount);
      // Never fails for a fresh price: burning only raises the health factor.
      this.revertIfHealthFactorIsBroken(account, "BreaksHealthFactor");

      this.burnFrom(uow, account, amount);
      logger.info(`burn: ${account} burned ${ethers.formatEther(amount)}`);
    });
  }

  /** Withdraw `amount` of `asset` from `from`'s collateral and send it to `to`. */
  redeem(from: AccountId, to: AccountId, asset: AssetId, amount: bigint): void {
    this.run("redeem", (uow) => {
      requireMoreThanZero(amount, "Redeem amount");
      this.registry.requireAllowed(asset);
      this.ledger.withdrawCollateral(from, to, asset, amount);
      this.revertIfHealthFactorIsBroken(from, "HealthFactorBroken");

      this.sendCollateral(uow, asset, to, amount);
      logger.info(`redeem: ${from} -${ethers.formatEther(amount)} ${asset} to ${to}`);
    });
  }

  /** Burn `debtAmount` and redeem `collateralAmount` of `asset` back to `account`, as one unit. */
  redeemForDebtRepayment(account: AccountId, asset: AssetId, collateralAmount: bigint, debtAmount: bigint): void {
    this.run("redeemForDebtRepayment", (uow) => {
      requireMoreThanZero(debtAmount, "Burn amount");
      requireMoreThanZero(collateralAmount, "Redeem amount");
      this.registry.requireAllowed(asset);
      this.ledger.recordBurn(account, debtAmount);
      this.ledger.withdrawCollateral(account, account, asset, collateralAmount);
      this.revertIfHealthFactorIsBroken(account, "HealthFactorBroken");

      this.burnFrom(uow, account, debtAmount);
      this.sendCollateral(uow, asset, account, collateralAmount);
      logger.info(
        `redeemForDebtRepayment: ${account} burned ${ethers.formatEther(debtAmount)}, ` +
          `redeemed ${ethers.formatEther(collateralAmount)} ${asset}`
      );
    });
  }

  /**
   * Repay `debtToCover` of an undercollateralized `target`'s debt with the
   * liquidator's debt token, seizing the equivalent `asset` collateral plus
   * the liquidation bonus.
   */
  liquidate(liquidator: AccountId, asset: AssetId, target: AccountId, debtToCover: bigint): LiquidationResult {
    return this.run("liquidate", (uow) => {
      requireMoreThanZero(debtToCover, "Debt to cover");
      this.registry.requireAllowed(asset);

      const healthFactorBefore = this.healthFactorOf(target);
      if (healthFactorBefore >= MIN_HEALTH_FACTOR) {
        throw new LiquidationNotEligible(target, healthFactorBefore);
      }

      const seize = this.seizeAmountsFor(asset, debtToCover);
      const available = this.ledger.collateralOf(target, asset);
      if (seize.totalSeized > available) {
        throw new ValidationError(
          "InsufficientCollateral",
          `Cannot seize ${seize.totalSeized} of ${asset} from ${target}: balance is ${available}`,
        );
      }

      if (seize.totalSeized > 0n) {
        this.ledger.withdrawCollateral(target, liquidator, asset, seize.totalSeized);
      }
      this.ledger.recordBurn(target, debtToCover);

      const healthFactorAfter = this.healthFactorOf(target);
      if (healthFactorAfter <= healthFactorBefore) {
        throw new LiquidationIneffective(target, healthFactorBefore, healthFactorAfter);
      }
      this.revertIfHealthFactorIsBroken(liquidator, "BreaksHealthFactor");

      if (seize.totalSeized > 0n) {
        this.sendCollateral(uow, asset, liquidator, seize.totalSeized);
      }
      this.burnFrom(uow, liquidator, debtToCover);

      liquidationsTotal.inc({ asset });
      logger.info(
        `liquidate: ${liquidator} covered ${ethers.formatEther(debtToCover)} of ${target}, ` +
          `seized ${ethers.formatEther(seize.totalSeized)} ${asset}, ` +
          `HF ${formatHealthFactor(healthFactorBefore)} -> ${formatHealthFactor(healthFactorAfter)}`
      );

      return {
        collateralSeized: seize.totalSeized,
        bonus: seize.bonus,
        debtCovered: debtToCover,
        healthFactorBefore,
        healthFactorAfter,
      };
    });
  }

  // ============================================================
  //                     READ-ONLY QUERIES
  // ============================================================

  /**
   * Simulate `liquidate` without touching state, liquidator solvency included.
   * Oracle failures still throw; every other rejection is reported in the quote.
   */
  previewLiquidation(liquidator: AccountId, asset: AssetId, target: AccountId, debtToCover: bigint): LiquidationQuote {
    const healthFactorBefore = this.healthFactorOf(target);
    const empty: LiquidationQuote = {
      collateralEquivalent: 0n,
      bonus: 0n,
      totalSeized: 0n,
      healthFactorBefore,
      healthFactorAfter: healthFactorBefore,
      accepted: false,
    };

    if (debtToCover <= 0n) return { ...empty, rejection: "AmountMustBeMoreThanZero" };
    if (!this.registry.isAllowed(asset)) return { ...empty, rejection: "TokenNotAllowed" };
    if (healthFactorBefore >= MIN_HEALTH_FACTOR) return { ...empty, rejection: "HealthFactorOk" };

    const seize = this.seizeAmountsFor(asset, debtToCover);
    const quote = { ...empty, ...seize };
    const balance = this.ledger.collateralOf(target, asset);
    if (seize.totalSeized > balance) return { ...quote, rejection: "InsufficientCollateral" };
    const debt = this.ledger.debtOf(target);
    if (debtToCover > debt) return { ...quote, rejection: "InsufficientDebt" };

    const collateralAfter = this.collateralValueOf(target, { asset, amount: balance - seize.totalSeized });
    const healthFactorAfter = this.calculateHealthFactor(debt - debtToCover, collateralAfter);
    if (healthFactorAfter <= healthFactorBefore) {
      return { ...quote, healthFactorAfter, rejection: "HealthFactorNotImproved" };
    }

    // The seized collateral leaves the ledger, so only a self-liquidation moves the liquidator's factor
    const liquidatorHealthFactor = liquidator === target ? healthFactorAfter : this.healthFactorOf(liquidator);
    if (liquidatorHealthFactor < MIN_HEALTH_FACTOR) {
      return { ...quote, healthFactorAfter, rejection: "BreaksHealthFactor" };
    }
    return { ...quote, healthFactorAfter, accepted: true };
  }

  getAccountInformation(account: AccountId): AccountInformation {
    return {
      totalDebt: this.ledger.debtOf(account),
      collateralValueInUsd: this.getAccountCollateralValue(account),
    };
  }

  /** USD value of every collateral balance, summed in registry order. Zero for empty accounts. */
  getAccountCollateralValue(account: AccountId): bigint {
    return this.collateralValueOf(account);
  }

  getHealthFactor(account: AccountId): bigint {
    return this.healthFactorOf(account);
  }

  calculateHealthFactor(totalDebt: bigint, collateralValueUsd: bigint): bigint {
    return calculateHealthFactor(totalDebt, collateralValueUsd, this.config.liquidationThresholdPct, PRECISION);
  }

  getUsdValue(asset: AssetId, amount: bigint): bigint {
    return this.oracle.usdValue(asset, amount);
  }

  getTokenAmountFromUsd(asset: AssetId, usdAmount: bigint): bigint {
    return this.oracle.tokenAmountForUsd(asset, usdAmount);
  }

  getPrice(asset: AssetId): bigint {
    return this.oracle.price(asset);
  }

  getCollateralBalanceOfUser(account: AccountId, asset: AssetId): bigint {
    return this.ledger.collateralOf(account, asset);
  }

  /** Non-zero collateral balances of `account`, in registry order. */
  getCollateralHoldings(account: AccountId): Array<[AssetId, bigint]> {
    return this.ledger.holdings(account);
  }

  getAccountDebt(account: AccountId): bigint {
    return this.ledger.debtOf(account);
  }

  /** Accounts that hold a position, in the order they were opened. */
  getAccounts(): AccountId[] {
    return this.ledger.accounts();
  }

  hasPosition(account: AccountId): boolean {
    return this.ledger.hasAccount(account);
  }

  getCollateralTokens(): AssetId[] {
    return [...this.registry.enumerate()];
  }

  getCollateralTokenPriceFeed(asset: AssetId): PriceFeedId | undefined {
    return this.registry.priceFeedOf(asset);
  }

  getTotalDebt(): bigint {
    return this.ledger.totalDebt;
  }

  getDebtToken(): string {
    return this.debtToken.id;
  }

  getPrecision(): bigint {
    return PRECISION;
  }

  getAdditionalFeedPrecision(): bigint {
    return ADDITIONAL_FEED_PRECISION;
  }

  getLiquidationThreshold(): bigint {
    return this.config.liquidationThresholdPct;
  }

  getLiquidationBonus(): bigint {
    return this.config.liquidationBonusPct;
  }

  getLiquidationPrecision(): bigint {
    return LIQUIDATION_PRECISION;
  }

  getMinHealthFactor(): bigint {
    return MIN_HEALTH_FACTOR;
  }

  getOracleStalenessSeconds(): number {
    return this.config.oracleStalenessSeconds;
  }

  // ============================================================
  //                     INTERNALS
  // ============================================================

  /**
   * Run `body` as one atomic operation under the non-reentrant lock.
   * On any throw the ledger is restored and completed collaborator calls compensated.
   */
  private run<T>(operation: Operation, body: (uow: UnitOfWork) => T): T {
    if (this.activeOperation !== null) {
      const err = new ReentrancyViolation(operation, this.activeOperation);
      this.recordFailure(operation, err);
      throw err;
    }

    this.activeOperation = operation;
    const uow = new UnitOfWork(this.ledger, logger);
    let result: T;
    let events: LedgerEvent[];
    try {
      result = body(uow);
      events = uow.commit();
    } catch (err) {
      const compensationFailures = uow.rollback();
      if (isEngineError(err)) {
        err.compensationFailures.push(...compensationFailures);
      }
      this.recordFailure(operation, err);
      throw err;
    } finally {
      this.activeOperation = null;
    }

    operationsTotal.inc({ operation, status: "committed" });
    outstandingDebt.set(Number(ethers.formatEther(this.ledger.totalDebt)));
    this.publish(events);
    return result;
  }

  private recordFailure(operation: Operation, err: unknown): void {
    const code = isEngineError(err) ? err.code : "Unknown";
    operationsTotal.inc({ operation, status: "rejected" });
    failuresTotal.inc({ code });
    logger.warn(`${operation} rejected [${code}]: ${err instanceof Error ? err.message : String(err)}`);
  }

  /** Runs after commit: a failing listener is logged and counted, never surfaced to the caller. */
  private publish(events: LedgerEvent[]): void {
    for (const event of events) {
      try {
        this.events.emit(event.type, event.payload);
      } catch (err) {
        listenerFailuresTotal.inc({ event: event.type });
        logger.error(
          `${event.type} listener failed: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }

  /** Sum of collateral USD values; `override` replaces one asset's balance. */
  private collateralValueOf(account: AccountId, override?: { asset: AssetId; amount: bigint }): bigint {
    let total = 0n;
    for (const asset of this.registry.enumerate()) {
      const amount = override?.asset === asset ? override.amount : this.ledger.collateralOf(account, asset);
      if (amount === 0n) continue;
      total += this.oracle.usdValue(asset, amount);
    }
    return total;
  }

  private healthFactorOf(account: AccountId): bigint {
    const debt = this.ledger.debtOf(account);
    if (debt === 0n) return this.calculateHealthFactor(0n, 0n);
    return this.calculateHealthFactor(debt, this.collateralValueOf(account));
  }

  private revertIfHealthFactorIsBroken(account: AccountId, code: InvariantCode): void {
    const healthFactor = this.healthFactorOf(account);
    if (healthFactor < MIN_HEALTH_FACTOR) {
      throw new InvariantViolation(code, account, healthFactor);
    }
  }

  private seizeAmountsFor(asset: AssetId, debtToCover: bigint) {
    const collateralEquivalent = this.oracle.tokenAmountForUsd(asset, debtToCover);
    return calculateSeizeAmounts(collateralEquivalent, this.config.liquidationBonusPct);
  }

  // ------------------------------------------------------------
  //  Collaborator calls. Each registers its compensation once it succeeded.
  // ------------------------------------------------------------

  private interact(code: CollaboratorCode, label: string, call: () => boolean): void {
    let ok: boolean;
    try {
      ok = call();
    } catch (err) {
      throw new CollaboratorFailure(
        code,
        `${label} threw: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
    if (!ok) {
      throw new CollaboratorFailure(code, `${label} refused`);
    }
  }

  private pullCollateral(uow: UnitOfWork, asset: AssetId, from: AccountId, amount: bigint): void {
    this.interact("TransferFailed", `transferIn ${amount} ${asset} from ${from}`, () =>
      this.collateral.transferIn(asset, from, amount)
    );
    uow.onRollback(`return ${amount} ${asset} to ${from}`, () => this.collateral.transferOut(asset, from, amount));
  }

  private sendCollateral(uow: UnitOfWork, asset: AssetId, to: AccountId, amount: bigint): void {
    this.interact("TransferFailed", `transferOut ${amount} ${asset} to ${to}`, () =>
      this.collateral.transferOut(asset, to, amount)
    );
    uow.onRollback(`reclaim ${amount} ${asset} from ${to}`, () => this.collateral.transferIn(asset, to, amount));
  }

  private mintTo(uow: UnitOfWork, account: AccountId, amount: bigint): void {
    this.interact("MintFailed", `mint ${amount} to ${account}`, () => this.debtToken.mint(account, amount));
    uow.onRollback(`unmint ${amount} from ${account}`, () => {
      if (!this.debtToken.pullForBurn(account, amount)) return false;
      this.debtToken.burn(amount);
      return true;
    });
  }

  private burnFrom(uow: UnitOfWork, payer: AccountId, amount: bigint): void {
    this.interact("BurnFailed", `pullForBurn ${amount} from ${payer}`, () =>
      this.debtToken.pullForBurn(payer, amount)
    );
    let burned = false;
    uow.onRollback(`return ${amount} debt token to ${payer}`, () =>
      burned ? this.debtToken.mint(payer, amount) : this.debtToken.transfer(payer, amount)
    );
    this.interact("BurnFailed", `burn ${amount}`, () => {
      this.debtToken.burn(amount);
      return true;
    });
    burned = true;
  }
}
