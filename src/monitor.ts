/**
 * Stable Engine - Position Monitor
 *
 * View-only scanning of positions; never changes state. Reports health,
 * liquidation candidates and how much headroom a user has left.
 */

import { ethers } from "ethers";
import { LIQUIDATION_PRECISION, LIQUIDATION_THRESHOLD } from "./calculator";
import { Engine } from "./engine";
import { EngineError } from "./errors";
import { HealthFactor, compareHealthFactors, formatHealthFactor, isHealthy } from "./health-factor";

export interface CollateralLine {
  asset: string;
  amount: bigint;
  /** Human-readable amount in token units */
  formattedAmount: string;
  valueUsd: bigint;
}

export interface PositionInfo {
  address: string;
  /** null when the account itself could not be read */
  debt: bigint | null;
  healthFactor: HealthFactor | null;
  /** "∞" for debt-free accounts; "n/a" when the position could not be valued */
  formattedHealthFactor: string;
  isLiquidatable: boolean;
  collateral: CollateralLine[];
  /** Set when the account could not be read or valued */
  error?: string;
}

export class PositionMonitor {
  constructor(private readonly engine: Engine) {}

  /**
   * Report every given account that carries debt, least healthy first.
   * Accounts that cannot be read or valued sort last, with `error` set.
   */
  scan(accounts: readonly string[]): PositionInfo[] {
    const positions: PositionInfo[] = [];

    for (const address of accounts) {
      let debt: bigint | null = null;
      try {
        debt = this.engine.getDebt(address);
        if (debt === 0n) continue;
        positions.push(this.describe(address, debt));
      } catch (err) {
        if (!(err instanceof EngineError)) throw err;
        positions.push({
          address: ethers.isAddress(address) ? ethers.getAddress(address) : address,
          debt,
          healthFactor: null,
          formattedHealthFactor: "n/a",
          isLiquidatable: false,
          collateral: [],
          error: err.message,
        });
      }
    }

    return positions.sort((a, b) => {
      if (!a.healthFactor) return b.healthFactor ? 1 : 0;
      if (!b.healthFactor) return -1;
      return compareHealthFactors(a.healthFactor, b.healthFactor);
    });
  }

  liquidationCandidates(accounts: readonly string[]): PositionInfo[] {
    return this.scan(accounts).filter((p) => p.isLiquidatable);
  }

  /** Additional debt `user` could mint without breaking their health factor. */
  maxSafeMint(user: string): bigint {
    const { debt, collateralValueUsd } = this.engine.getAccountInformation(user);
    const ceiling = (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
    return ceiling > debt ? ceiling - debt : 0n;
  }

  /** Collateral of `asset` that `user` could redeem without breaking their health factor. */
  maxSafeRedeem(user: string, asset: string): bigint {
    const balance = this.engine.getCollateralBalance(user, asset);
    const { debt, collateralValueUsd } = this.engine.getAccountInformation(user);
    if (debt === 0n || balance === 0n) return balance;

    // Collateral value must stay at or above debt × 100 / 50
    const required = (debt * LIQUIDATION_PRECISION) / LIQUIDATION_THRESHOLD;
    if (collateralValueUsd <= required) return 0n;

    const heldValue = this.engine.getUsdValue(asset, balance);
    let candidate = this.engine.getTokenAmountFromUsd(asset, collateralValueUsd - required);
    if (candidate > balance) candidate = balance;

    // Valuing the remainder can round one unit lower than the estimate
    while (candidate > 0n) {
      const remaining = collateralValueUsd - heldValue + this.engine.getUsdValue(asset, balance - candidate);
      if (isHealthy(this.engine.calculateHealthFactor(debt, remaining))) break;
      candidate -= 1n;
    }
    return candidate;
  }

  private describe(address: string, debt: bigint): PositionInfo {
    const collateral: CollateralLine[] = [];
    for (const asset of this.engine.registry.assets) {
      const amount = this.engine.getCollateralBalance(address, asset.address);
      if (amount === 0n) continue;
      collateral.push({
        asset: asset.address,
        amount,
        formattedAmount: ethers.formatUnits(amount, asset.tokenDecimals),
        valueUsd: this.engine.getUsdValue(asset.address, amount),
      });
    }

    const healthFactor = this.engine.getHealthFactor(address);
    return {
      address: ethers.getAddress(address),
      debt,
      healthFactor,
      formattedHealthFactor: formatHealthFactor(healthFactor),
      isLiquidatable: !isHealthy(healthFactor),
      collateral,
    };
  }
}
