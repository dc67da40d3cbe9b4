/**
 * Stable Engine - Engine Façade
 *
 * Entry points for depositing and redeeming collateral, minting and burning
 * debt, and liquidating unhealthy positions. Each entry point is one
 * non-reentrant, all-or-nothing transaction that runs check → effect →
 * external call:
 *
 *   1. Validate arguments
 *   2. Apply ledger effects and queue token movements on an AtomicScope
 *   3. Enforce the health invariant
 *   4. Commit the queued movements
 *
 * Any failure restores both ledgers to their state before the call.
 */

import {
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
  additionalFeedPrecision,
} from "./calculator";
import { AtomicScope, ExclusiveGuard } from "./atomic-scope";
import { CollateralLedger } from "./collateral-ledger";
import { DEFAULT_CONFIG, EngineConfig } from "./config";
import { DebtLedger } from "./debt-ledger";
import { EngineError, InvalidArgumentError } from "./errors";
import { HealthFactor, formatHealthFactor, toFixedPoint } from "./health-factor";
import { LiquidationProtocol, LiquidationResult } from "./liquidation-protocol";
import { Logger, createEngineLogger } from "./logger";
import { EngineMetrics, OperationStatus, createEngineMetrics, recordOperation } from "./metrics";
import { PriceOracleGuard, STALE_TIMEOUT, systemClock } from "./price-oracle-guard";
import { AssetRegistry, requireAddress } from "./registry";
import { RiskEngine } from "./risk-engine";
import { TransferAdapter } from "./transfer-adapter";
import {
  AccountInformation,
  Clock,
  DebtToken,
  EngineOperation,
  FungibleAsset,
  PriceFeed,
} from "./types";

export interface EngineParams {
  /** Collateral assets, paired by index with `priceFeeds` */
  collateralTokens: readonly FungibleAsset[];
  priceFeeds: readonly PriceFeed[];
  /** Token decimals per collateral asset; 18 when omitted */
  tokenDecimals?: readonly number[];
  debtToken: DebtToken;
  /** The engine's own account: receives deposits, holds pulled debt tokens */
  custody: string;
  clock?: Clock;
  config?: EngineConfig;
  logger?: Logger;
  metrics?: EngineMetrics;
}

export class Engine {
  readonly registry: AssetRegistry;
  readonly risk: RiskEngine;
  readonly metrics: EngineMetrics;

  private readonly debtToken: DebtToken;
  private readonly transfers: TransferAdapter;
  private readonly oracle: PriceOracleGuard;
  private readonly collateral: CollateralLedger;
  private readonly debt: DebtLedger;
  private readonly liquidation: LiquidationProtocol;
  private readonly guard = new ExclusiveGuard();
  private readonly logger: Logger;

  constructor(params: EngineParams) {
    const config = params.config ?? DEFAULT_CONFIG;
    this.logger = params.logger ?? createEngineLogger("engine", config);
    this.metrics = params.metrics ?? createEngineMetrics(config);

    const custody = requireAddress(params.custody, "custody");
    requireAddress(params.debtToken.address, "debtToken");

    this.registry = new AssetRegistry(params);
    this.debtToken = params.debtToken;
    this.transfers = new TransferAdapter(custody);
    this.oracle = new PriceOracleGuard(params.clock ?? systemClock, this.logger, this.metrics);
    this.collateral = new CollateralLedger(this.registry, this.transfers);
    this.debt = new DebtLedger(this.debtToken, this.transfers);
    this.risk = new RiskEngine(this.registry, this.collateral, this.debt, this.oracle);
    this.liquidation = new LiquidationProtocol(this.collateral, this.debt, this.risk, this.logger);

    this.logger.info(
      `Engine ready: ${this.registry.addresses.length} collateral asset(s), debt token ${this.debtToken.address}`,
    );
  }

  // ============================================================
  //                     STATE-CHANGING OPERATIONS
  // ============================================================

  depositCollateral(caller: string, asset: string, amount: bigint): void {
    const user = requireAddress(caller, "caller");
    this.execute("depositCollateral", (scope) => {
      this.collateral.deposit(user, asset, amount, scope);
    });
    this.logger.info(`CollateralDeposited user=${user} asset=${asset} amount=${amount}`);
  }

  mintDebt(caller: string, amount: bigint): void {
    const user = requireAddress(caller, "caller");
    this.execute("mintDebt", (scope) => {
      this.debt.mintDebt(user, amount, scope);
      this.risk.assertHealthy(user);
    });
    this.logger.info(`DebtMinted user=${user} amount=${amount}`);
  }

  redeemCollateral(caller: string, asset: string, amount: bigint): void {
    const user = requireAddress(caller, "caller");
    this.execute("redeemCollateral", (scope) => {
      this.redeem(user, asset, amount, scope);
      this.risk.assertHealthy(user);
    });
    this.logger.info(`CollateralRedeemed from=${user} to=${user} asset=${asset} amount=${amount}`);
  }

  burnDebt(caller: string, amount: bigint): void {
    const user = requireAddress(caller, "caller");
    this.execute("burnDebt", (scope) => {
      this.burn(user, amount, scope);
    });
    this.logger.info(`DebtBurned onBehalf=${user} payer=${user} amount=${amount}`);
  }

  depositCollateralAndMintDebt(caller: string, asset: string, collateralAmount: bigint, debtAmount: bigint): void {
    const user = requireAddress(caller, "caller");
    this.execute("depositCollateralAndMintDebt", (scope) => {
      this.collateral.deposit(user, asset, collateralAmount, scope);
      this.debt.mintDebt(user, debtAmount, scope);
      this.risk.assertHealthy(user);
    });
    this.logger.info(
      `CollateralDeposited user=${user} asset=${asset} amount=${collateralAmount}; DebtMinted amount=${debtAmount}`,
    );
  }

  /** Burn first, then redeem, so the freed headroom covers the redemption. */
  redeemCollateralForDebt(caller: string, asset: string, collateralAmount: bigint, debtAmount: bigint): void {
    const user = requireAddress(caller, "caller");
    this.execute("redeemCollateralForDebt", (scope) => {
      this.burn(user, debtAmount, scope);
      this.redeem(user, asset, collateralAmount, scope);
      this.risk.assertHealthy(user);
    });
    this.logger.info(
      `DebtBurned onBehalf=${user} amount=${debtAmount}; CollateralRedeemed from=${user} asset=${asset} amount=${collateralAmount}`,
    );
  }

  /**
   * Pay down `debtToCover` of `target`'s debt with the liquidator's own debt
   * tokens and receive the equivalent collateral plus the liquidation bonus.
   */
  liquidate(liquidatorAddress: string, asset: string, targetAddress: string, debtToCover: bigint): LiquidationResult {
    const liquidator = requireAddress(liquidatorAddress, "liquidator");
    const target = requireAddress(targetAddress, "target");

    const result = this.execute("liquidate", (scope) =>
      this.liquidation.liquidate(
        { asset: this.registry.get(asset).address, target, liquidator, debtToCover },
        scope,
      ),
    );

    this.metrics.liquidationsTotal.inc({ asset: result.asset });
    this.logger.info(
      `Liquidated target=${target} liquidator=${liquidator} asset=${result.asset} ` +
        `debtRepaid=${result.debtRepaid} seized=${result.totalSeized} (bonus ${result.bonusCollateral}) ` +
        `HF ${formatHealthFactor(result.startingHealthFactor)} -> ${formatHealthFactor(result.endingHealthFactor)}`,
    );
    return result;
  }

  // ============================================================
  //                     READ-ONLY ACCESSORS
  // ============================================================

  getAccountInformation(user: string): AccountInformation {
    return this.risk.accountInformation(requireAddress(user, "user"));
  }

  getAccountCollateralValue(user: string): bigint {
    return this.risk.accountValue(requireAddress(user, "user"));
  }

  getCollateralBalance(user: string, asset: string): bigint {
    return this.collateral.balanceOf(requireAddress(user, "user"), asset);
  }

  getDebt(user: string): bigint {
    return this.debt.debtOf(requireAddress(user, "user"));
  }

  getCollateralAssets(): string[] {
    return this.registry.addresses;
  }

  getPriceFeed(asset: string): string {
    return this.registry.get(asset).feed.address;
  }

  getHealthFactor(user: string): HealthFactor {
    return this.risk.healthFactor(requireAddress(user, "user"));
  }

  /** Health factor as a fixed-point number; unconstrained maps to the largest uint256. */
  getHealthFactorValue(user: string): bigint {
    return toFixedPoint(this.getHealthFactor(user));
  }

  calculateHealthFactor(debt: bigint, collateralValueUsd: bigint): HealthFactor {
    return this.risk.calculateHealthFactor(debt, collateralValueUsd);
  }

  getUsdValue(asset: string, amount: bigint): bigint {
    return this.risk.valuationOf(asset, amount);
  }

  getTokenAmountFromUsd(asset: string, usdValue: bigint): bigint {
    return this.risk.tokenAmountForValue(asset, usdValue);
  }

  /** Accounts that ever held collateral or debt */
  getKnownAccounts(): string[] {
    return [...new Set([...this.collateral.holders(), ...this.debt.holders()])];
  }

  getTotalDebt(): bigint {
    return this.debt.total();
  }

  getTotalCollateral(asset: string): bigint {
    return this.collateral.totalOf(asset);
  }

  getDebtToken(): string {
    return this.debtToken.address;
  }

  getCustody(): string {
    return this.transfers.custody;
  }

  getAdditionalFeedPrecision(asset: string): bigint {
    return additionalFeedPrecision(this.registry.get(asset).feedDecimals);
  }

  // ============================================================
  //                     STATIC PARAMETERS
  // ============================================================

  readonly minHealthFactor = MIN_HEALTH_FACTOR;
  readonly liquidationBonus = LIQUIDATION_BONUS;
  readonly liquidationThreshold = LIQUIDATION_THRESHOLD;
  readonly liquidationPrecision = LIQUIDATION_PRECISION;
  readonly precision = PRECISION;
  readonly staleTimeout = STALE_TIMEOUT;

  // ============================================================
  //                     INTERNALS
  // ============================================================

  private redeem(user: string, asset: string, amount: bigint, scope: AtomicScope): void {
    const held = this.collateral.balanceOf(user, asset);
    if (amount > held) {
      throw new InvalidArgumentError("amount", `exceeds collateral balance ${held}`);
    }
    this.collateral.withdraw(user, user, asset, amount, scope);
  }

  private burn(user: string, amount: bigint, scope: AtomicScope): void {
    const owed = this.debt.debtOf(user);
    if (amount > owed) {
      throw new InvalidArgumentError("amount", `exceeds minted debt ${owed}`);
    }
    this.debt.burnDebt(user, user, amount, scope);
  }

  /**
   * Run `fn` as one non-reentrant, all-or-nothing transaction. The ledgers
   * are snapshotted first and restored if anything throws.
   */
  private execute<T>(operation: EngineOperation, fn: (scope: AtomicScope) => T): T {
    const started = process.hrtime.bigint();
    let status: OperationStatus = "failed";

    try {
      return this.guard.run(operation, () => {
        const collateralSnapshot = this.collateral.snapshot();
        const debtSnapshot = this.debt.snapshot();
        const scope = new AtomicScope(this.logger);
        try {
          const result = fn(scope);
          scope.commit();
          status = "success";
          return result;
        } catch (err) {
          this.collateral.restore(collateralSnapshot);
          this.debt.restore(debtSnapshot);
          throw err;
        }
      });
    } catch (err) {
      if (err instanceof EngineError && err.code !== "LEDGER_INVARIANT") {
        status = "rejected";
        this.logger.warn(`${operation} rejected: ${err.message}`);
      } else {
        this.logger.error(`${operation} failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      throw err;
    } finally {
      const seconds = Number(process.hrtime.bigint() - started) / 1e9;
      recordOperation(this.metrics, operation, status, seconds);
    }
  }
}
