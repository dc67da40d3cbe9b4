/**
 * Stable Engine - Collaborator Interfaces & Shared Types
 */

/** Raw answer of an aggregator-style price feed */
export interface RoundData {
  roundId: bigint;
  /** Signed answer, asset currency per unit */
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

/** Read-only price feed, queried fresh on every valuation */
export interface PriceFeed {
  readonly address: string;
  latestRoundData(): RoundData;
  decimals(): number;
}

/**
 * Fungible asset. A `false` return is a failed transfer, the same as a throw.
 */
export interface FungibleAsset {
  readonly address: string;
  transferFrom(from: string, to: string, amount: bigint): boolean;
  transfer(to: string, amount: bigint): boolean;
  balanceOf(account: string): bigint;
}

/** Debt token; only the engine's custody account may mint */
export interface DebtToken extends FungibleAsset {
  mint(to: string, amount: bigint): boolean;
  /** Burns from the caller's (custody's) own balance */
  burn(amount: bigint): void;
}

/** Guarded reading of a price feed. Never cached. */
export interface PriceQuote {
  feed: string;
  roundId: bigint;
  price: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
  decimals: number;
}

/** Returns the current time in seconds since the epoch; fractions are truncated */
export type Clock = () => number;

export interface AccountInformation {
  debt: bigint;
  collateralValueUsd: bigint;
}

export type EngineOperation =
  | "depositCollateral"
  | "mintDebt"
  | "redeemCollateral"
  | "burnDebt"
  | "depositCollateralAndMintDebt"
  | "redeemCollateralForDebt"
  | "liquidate";
