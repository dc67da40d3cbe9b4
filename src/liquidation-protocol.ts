/**
 * Stable Engine - Liquidation Protocol
 *
 * Closes part of an unhealthy position in one atomic sequence:
 *
 *   Eligible-check → Seize → Settle-debt → Verify-improved → Verify-liquidator-health
 *
 * The liquidator pays `debtToCover` in debt tokens and receives collateral
 * worth that much plus a 10% bonus. Ledger effects apply step by step; the
 * token movements are queued on the scope and run only after both
 * verifications pass.
 *
 * Not guarded: once system-wide collateralization is at or below 100%, no
 * bonus-bearing liquidation is worth doing. There is no reduced-bonus path.
 */

import { calculateLiquidationBonus } from "./calculator";
import { AtomicScope } from "./atomic-scope";
import { CollateralLedger } from "./collateral-ledger";
import { DebtLedger } from "./debt-ledger";
import {
  HealthFactorNotImprovedError,
  HealthFactorOkError,
  InvalidArgumentError,
} from "./errors";
import { HealthFactor, compareHealthFactors, isHealthy, toFixedPoint } from "./health-factor";
import { Logger } from "./logger";
import { RiskEngine } from "./risk-engine";

export type LiquidationStep =
  | "eligible-check"
  | "seize"
  | "settle-debt"
  | "verify-improved"
  | "verify-liquidator-health";

export interface LiquidationRequest {
  asset: string;
  target: string;
  liquidator: string;
  /** USD-denominated debt the liquidator pays down (18 decimals) */
  debtToCover: bigint;
}

export interface LiquidationResult {
  asset: string;
  target: string;
  liquidator: string;
  debtRepaid: bigint;
  /** Collateral equivalent of the repaid debt */
  collateralForDebt: bigint;
  bonusCollateral: bigint;
  /** collateralForDebt + bonusCollateral */
  totalSeized: bigint;
  startingHealthFactor: HealthFactor;
  endingHealthFactor: HealthFactor;
}

export class LiquidationProtocol {
  constructor(
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
    private readonly risk: RiskEngine,
    private readonly logger: Logger,
  ) {}

  liquidate(request: LiquidationRequest, scope: AtomicScope): LiquidationResult {
    const { asset, target, liquidator, debtToCover } = request;
    if (debtToCover <= 0n) {
      throw new InvalidArgumentError("debtToCover", "must be greater than zero");
    }

    this.step("eligible-check", target);
    const startingHealthFactor = this.risk.healthFactor(target);
    if (isHealthy(startingHealthFactor)) {
      throw new HealthFactorOkError(target, startingHealthFactor);
    }

    const outstanding = this.debt.debtOf(target);
    if (debtToCover > outstanding) {
      throw new InvalidArgumentError("debtToCover", `exceeds outstanding debt ${outstanding} of ${target}`);
    }

    const collateralForDebt = this.risk.tokenAmountForValue(asset, debtToCover);
    const bonusCollateral = calculateLiquidationBonus(collateralForDebt);
    const totalSeized = collateralForDebt + bonusCollateral;

    const available = this.collateral.balanceOf(target, asset);
    if (totalSeized > available) {
      throw new InvalidArgumentError(
        "debtToCover",
        `requires seizing ${totalSeized} but ${target} holds ${available} of ${asset}`,
      );
    }

    this.step("seize", target);
    this.collateral.withdraw(target, liquidator, asset, totalSeized, scope);

    this.step("settle-debt", target);
    this.debt.burnDebt(target, liquidator, debtToCover, scope);

    this.step("verify-improved", target);
    const endingHealthFactor = this.risk.healthFactor(target);
    if (compareHealthFactors(endingHealthFactor, startingHealthFactor) <= 0) {
      throw new HealthFactorNotImprovedError(
        target,
        toFixedPoint(startingHealthFactor),
        toFixedPoint(endingHealthFactor),
      );
    }

    this.step("verify-liquidator-health", liquidator);
    this.risk.assertHealthy(liquidator);

    return {
      asset,
      target,
      liquidator,
      debtRepaid: debtToCover,
      collateralForDebt,
      bonusCollateral,
      totalSeized,
      startingHealthFactor,
      endingHealthFactor,
    };
  }

  private step(step: LiquidationStep, account: string): void {
    this.logger.debug(`liquidation ${step} (${account})`);
  }
}
