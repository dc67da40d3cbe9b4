/**
 * Stable Engine - Calculator Utilities
 *
 * Pure fixed-point math for valuation, health factor and liquidation sizing.
 * All USD figures carry 18 decimals. No I/O — shared by the risk engine,
 * the liquidation protocol and the position monitor.
 */

/** 18-decimal fixed-point unit (1.0) */
export const PRECISION = 10n ** 18n;

/** Fixed-point precision every amount and price is normalized to */
export const NORMALIZED_DECIMALS = 18;

/** Share of raw collateral value counted toward the health factor (percent) */
export const LIQUIDATION_THRESHOLD = 50n;

/** Bounty paid to liquidators on top of the covered debt (percent) */
export const LIQUIDATION_BONUS = 10n;

/** Denominator for LIQUIDATION_THRESHOLD and LIQUIDATION_BONUS */
export const LIQUIDATION_PRECISION = 100n;

/** Minimum health factor for a position to be considered safe (1.0) */
export const MIN_HEALTH_FACTOR = PRECISION;

/** Largest uint256; the fixed-point projection of an unconstrained health factor */
export const MAX_UINT256 = 2n ** 256n - 1n;

/**
 * Scale factor that lifts a feed answer of `feedDecimals` to 18 decimals.
 * For the common 8-decimal feed this is 1e10. Feeds above 18 decimals are
 * rejected at registration.
 */
export function additionalFeedPrecision(feedDecimals: number): bigint {
  return PRECISION / 10n ** BigInt(feedDecimals);
}

/**
 * Normalize a raw feed answer to an 18-decimal USD price.
 * @param price         Feed answer
 * @param feedDecimals  Decimals the feed reports
 */
export function normalizePrice(price: bigint, feedDecimals: number): bigint {
  return (price * PRECISION) / 10n ** BigInt(feedDecimals);
}

/** Lift a raw token amount to 18 decimals. */
export function toNormalizedAmount(amount: bigint, tokenDecimals: number): bigint {
  if (tokenDecimals === NORMALIZED_DECIMALS) return amount;
  if (tokenDecimals < NORMALIZED_DECIMALS) {
    return amount * 10n ** BigInt(NORMALIZED_DECIMALS - tokenDecimals);
  }
  return amount / 10n ** BigInt(tokenDecimals - NORMALIZED_DECIMALS);
}

/** Inverse of toNormalizedAmount (rounds down). */
export function fromNormalizedAmount(amount: bigint, tokenDecimals: number): bigint {
  if (tokenDecimals === NORMALIZED_DECIMALS) return amount;
  if (tokenDecimals < NORMALIZED_DECIMALS) {
    return amount / 10n ** BigInt(NORMALIZED_DECIMALS - tokenDecimals);
  }
  return amount * 10n ** BigInt(tokenDecimals - NORMALIZED_DECIMALS);
}

/**
 * USD value of a collateral amount.
 * @param amount          Token amount (raw units)
 * @param normalizedPrice 18-decimal USD price
 * @param tokenDecimals   Decimals of the collateral token
 * @returns USD value (18 decimals)
 */
export function calculateUsdValue(
  amount: bigint,
  normalizedPrice: bigint,
  tokenDecimals: number = NORMALIZED_DECIMALS,
): bigint {
  return (toNormalizedAmount(amount, tokenDecimals) * normalizedPrice) / PRECISION;
}

/**
 * Token amount worth `usdValue` at `normalizedPrice` (rounds down).
 * @returns Token amount (raw units)
 */
export function calculateTokenAmount(
  usdValue: bigint,
  normalizedPrice: bigint,
  tokenDecimals: number = NORMALIZED_DECIMALS,
): bigint {
  return fromNormalizedAmount((usdValue * PRECISION) / normalizedPrice, tokenDecimals);
}

/**
 * Health factor of a position as an 18-decimal ratio.
 * Callers handle the zero-debt case; dividing by zero debt is a bug.
 */
export function calculateHealthRatio(collateralValueUsd: bigint, debt: bigint): bigint {
  if (debt === 0n) {
    throw new RangeError("calculateHealthRatio: debt must be non-zero");
  }
  return (collateralValueUsd * LIQUIDATION_THRESHOLD * PRECISION) / (LIQUIDATION_PRECISION * debt);
}

/** Collateral bonus a liquidator receives on top of `baseAmount`. */
export function calculateLiquidationBonus(baseAmount: bigint): bigint {
  return (baseAmount * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
}
