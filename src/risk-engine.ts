/**
 * Stable Engine - Risk Engine
 *
 * Turns ledger state and fresh oracle readings into a health factor:
 *   healthFactor = collateralUsd × 50% / debt   (18 decimals, 1e18 = 1.0)
 * A position is healthy while its collateral is worth at least twice its debt.
 */

import {
  MIN_HEALTH_FACTOR,
  calculateHealthRatio,
  calculateTokenAmount,
  calculateUsdValue,
  normalizePrice,
} from "./calculator";
import { CollateralLedger } from "./collateral-ledger";
import { DebtLedger } from "./debt-ledger";
import { HealthFactorBrokenError, StalePriceError } from "./errors";
import { HealthFactor, UNCONSTRAINED, ratio } from "./health-factor";
import { PriceOracleGuard } from "./price-oracle-guard";
import { AssetRegistry } from "./registry";
import { AccountInformation } from "./types";

export class RiskEngine {
  constructor(
    private readonly registry: AssetRegistry,
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
    private readonly oracle: PriceOracleGuard,
  ) {}

  /** Fresh 18-decimal USD price of one whole unit of `asset`. */
  priceOf(asset: string): bigint {
    const { feed } = this.registry.get(asset);
    const quote = this.oracle.latestRoundData(feed);
    const price = normalizePrice(quote.price, quote.decimals);
    if (price <= 0n) {
      // Answer lost below 18-decimal precision
      throw new StalePriceError(feed.address, "non-positive-price");
    }
    return price;
  }

  /** USD value (18 decimals) of `amount` raw units of `asset`. */
  valuationOf(asset: string, amount: bigint): bigint {
    const { tokenDecimals } = this.registry.get(asset);
    return calculateUsdValue(amount, this.priceOf(asset), tokenDecimals);
  }

  /** Raw units of `asset` worth `usdValue` (rounds down). */
  tokenAmountForValue(asset: string, usdValue: bigint): bigint {
    const { tokenDecimals } = this.registry.get(asset);
    return calculateTokenAmount(usdValue, this.priceOf(asset), tokenDecimals);
  }

  /**
   * Total USD value of `user`'s collateral across every registered asset.
   * Every feed is read, held or not, so any stale feed halts the caller.
   */
  accountValue(user: string): bigint {
    let total = 0n;
    for (const { address } of this.registry.assets) {
      total += this.valuationOf(address, this.collateral.balanceOf(user, address));
    }
    return total;
  }

  accountInformation(user: string): AccountInformation {
    return {
      debt: this.debt.debtOf(user),
      collateralValueUsd: this.accountValue(user),
    };
  }

  healthFactor(user: string): HealthFactor {
    // Valued first: the oracle guard runs even for a debt-free account
    const collateralValueUsd = this.accountValue(user);
    const debt = this.debt.debtOf(user);
    if (debt === 0n) return UNCONSTRAINED;
    return this.calculateHealthFactor(debt, collateralValueUsd);
  }

  /** Health factor for arbitrary figures; used for what-if analysis. */
  calculateHealthFactor(debt: bigint, collateralValueUsd: bigint): HealthFactor {
    if (debt === 0n) return UNCONSTRAINED;
    return ratio(calculateHealthRatio(collateralValueUsd, debt));
  }

  /**
   * The single enforcement point: throws HealthFactorBroken if `user` sits
   * below MIN_HEALTH_FACTOR.
   */
  assertHealthy(user: string): void {
    const hf = this.healthFactor(user);
    if (hf.kind === "ratio" && hf.value < MIN_HEALTH_FACTOR) {
      throw new HealthFactorBrokenError(user, hf.value);
    }
  }

  get minHealthFactor(): bigint {
    return MIN_HEALTH_FACTOR;
  }
}
