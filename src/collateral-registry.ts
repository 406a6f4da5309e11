/**
 * Collateral Engine - Collateral Registry
 *
 * Approved collateral assets and the price feed bound to each one.
 * Fixed at construction: there is no way to add, remove or reorder assets.
 */

import { ValidationError } from "./errors";
import type { AssetId, PriceFeedId } from "./types";

export class CollateralRegistry {
  private readonly feeds: ReadonlyMap<AssetId, PriceFeedId>;
  private readonly order: readonly AssetId[];

  /**
   * @param assets   Approved assets in registration order
   * @param feedIds  Price feed for each asset, same index
   */
  constructor(assets: readonly AssetId[], feedIds: readonly PriceFeedId[]) {
    if (assets.length !== feedIds.length) {
      throw new ValidationError(
        "LengthMismatch",
        `Token addresses and price feed addresses must be the same length (${assets.length} != ${feedIds.length})`,
      );
    }

    const feeds = new Map<AssetId, PriceFeedId>();
    const order: AssetId[] = [];
    assets.forEach((asset, i) => {
      if (!asset) {
        throw new ValidationError("TokenNotAllowed", `Asset at index ${i} is empty`);
      }
      if (feeds.has(asset)) {
        throw new ValidationError("TokenNotAllowed", `Asset ${asset} is registered twice`);
      }
      feeds.set(asset, feedIds[i]);
      order.push(asset);
    });

    this.feeds = feeds;
    this.order = Object.freeze(order);
  }

  isAllowed(asset: AssetId): boolean {
    return this.feeds.has(asset);
  }

  /** Approved assets in registration order. */
  enumerate(): readonly AssetId[] {
    return this.order;
  }

  /** Feed bound to `asset`, or undefined when it is not approved. */
  priceFeedOf(asset: AssetId): PriceFeedId | undefined {
    return this.feeds.get(asset);
  }

  /** Throws TokenNotAllowed unless `asset` is approved. */
  requireAllowed(asset: AssetId): PriceFeedId {
    const feedId = this.feeds.get(asset);
    if (feedId === undefined) {
      throw new ValidationError("TokenNotAllowed", `Token ${asset} is not allowed as collateral`);
    }
    return feedId;
  }
}
