/**
 * Stable Engine - Asset Registry
 *
 * Immutable set of supported collateral assets, built once at construction
 * and shared by reference with every component. No runtime registration.
 */

import { ethers } from "ethers";
import { NORMALIZED_DECIMALS } from "./calculator";
import { ConfigurationError, InvalidArgumentError, UnsupportedAssetError } from "./errors";
import { FungibleAsset, PriceFeed } from "./types";

export interface CollateralAsset {
  /** Checksummed asset address */
  readonly address: string;
  readonly token: FungibleAsset;
  readonly feed: PriceFeed;
  /** Feed precision at registration time; valuations use the live value */
  readonly feedDecimals: number;
  readonly tokenDecimals: number;
}

export interface AssetRegistryParams {
  collateralTokens: readonly FungibleAsset[];
  priceFeeds: readonly PriceFeed[];
  /** Token decimals per asset, same order; 18 when omitted */
  tokenDecimals?: readonly number[];
}

/**
 * Validate an address-like identity and return its checksummed form.
 * The zero address is the null identity and is always rejected.
 */
export function requireAddress(value: string, argument: string): string {
  if (!ethers.isAddress(value)) {
    throw new InvalidArgumentError(argument, `"${value}" is not an address`);
  }
  const address = ethers.getAddress(value);
  if (address === ethers.ZeroAddress) {
    throw new InvalidArgumentError(argument, "null address");
  }
  return address;
}

export class AssetRegistry {
  private readonly byAddress: ReadonlyMap<string, CollateralAsset>;
  private readonly ordered: readonly CollateralAsset[];

  constructor(params: AssetRegistryParams) {
    const { collateralTokens, priceFeeds, tokenDecimals } = params;

    if (collateralTokens.length !== priceFeeds.length) {
      throw new ConfigurationError(
        `Collateral tokens and price feeds must have the same length ` +
          `(${collateralTokens.length} != ${priceFeeds.length})`,
      );
    }
    if (tokenDecimals && tokenDecimals.length !== collateralTokens.length) {
      throw new ConfigurationError(
        `Token decimals must match collateral tokens (${tokenDecimals.length} != ${collateralTokens.length})`,
      );
    }

    const byAddress = new Map<string, CollateralAsset>();
    const ordered: CollateralAsset[] = [];

    collateralTokens.forEach((token, i) => {
      const address = requireAddress(token.address, `collateralTokens[${i}]`);
      const feed = priceFeeds[i];
      requireAddress(feed.address, `priceFeeds[${i}]`);
      if (byAddress.has(address)) {
        throw new ConfigurationError(`Duplicate collateral asset ${address}`);
      }

      const decimals = tokenDecimals?.[i] ?? NORMALIZED_DECIMALS;
      if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
        throw new ConfigurationError(`Invalid token decimals ${decimals} for ${address}`);
      }

      const feedDecimals = feed.decimals();
      if (!Number.isInteger(feedDecimals) || feedDecimals < 0 || feedDecimals > NORMALIZED_DECIMALS) {
        throw new ConfigurationError(`Invalid feed decimals ${feedDecimals} for ${address}`);
      }

      const asset: CollateralAsset = Object.freeze({
        address,
        token,
        feed,
        feedDecimals,
        tokenDecimals: decimals,
      });
      byAddress.set(address, asset);
      ordered.push(asset);
    });

    this.byAddress = byAddress;
    this.ordered = Object.freeze(ordered);
  }

  /** Registered asset addresses in construction order */
  get addresses(): string[] {
    return this.ordered.map((a) => a.address);
  }

  get assets(): readonly CollateralAsset[] {
    return this.ordered;
  }

  /** Null, malformed or unregistered identities all fail with UnsupportedAsset. */
  get(asset: string): CollateralAsset {
    const found = ethers.isAddress(asset) ? this.byAddress.get(ethers.getAddress(asset)) : undefined;
    if (!found) {
      throw new UnsupportedAssetError(asset);
    }
    return found;
  }

  has(asset: string): boolean {
    return ethers.isAddress(asset) && this.byAddress.has(ethers.getAddress(asset));
  }
}
