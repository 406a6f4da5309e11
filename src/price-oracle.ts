/**
 * Collateral Engine - Price Oracle Adapter
 *
 * Reads one external feed per collateral asset and converts between asset
 * amounts and USD value at 18-decimal precision.
 *
 * Safety:
 *   - Readings older than the staleness window are rejected (OracleStale)
 *   - Readings with updatedAt = 0 or answeredInRound < roundId are stale too
 *   - Unreachable feeds and non-positive answers are OracleUnavailable
 *   - No fallback price: a failed read fails the operation that needed it
 */

import { MAX_FEED_DECIMALS, PRECISION } from "./config";
import { CollateralRegistry } from "./collateral-registry";
import { OracleFailure } from "./errors";
import type { AssetId, PriceFeed, PriceFeedResolver, PriceReading } from "./types";

/** Unix seconds */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface PriceOracleOptions {
  /** Max reading age in seconds */
  stalenessSeconds: number;
  clock?: Clock;
}

// ============================================================
//                     PURE HELPERS (exported for testing)
// ============================================================

/**
 * Whether a reading is too old to use.
 * A reading exactly `stalenessSeconds` old is still fresh.
 */
export function isStale(reading: PriceReading, now: number, stalenessSeconds: number): boolean {
  if (reading.updatedAt === 0) return true;
  if (
    reading.roundId !== undefined &&
    reading.answeredInRound !== undefined &&
    reading.answeredInRound < reading.roundId
  ) {
    return true;
  }
  return now - reading.updatedAt > stalenessSeconds;
}

/** Multiplier lifting a feed answer with `decimals` places to 18 decimals (1e10 for 8-decimal feeds). */
export function feedPrecisionMultiplier(decimals: number): bigint {
  return 10n ** BigInt(MAX_FEED_DECIMALS - decimals);
}

// ============================================================
//                     ADAPTER
// ============================================================

export class PriceOracleAdapter {
  private readonly stalenessSeconds: number;
  private readonly clock: Clock;

  constructor(
    private readonly registry: CollateralRegistry,
    private readonly resolveFeed: PriceFeedResolver,
    options: PriceOracleOptions,
  ) {
    this.stalenessSeconds = options.stalenessSeconds;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Current USD price of one whole unit of `asset`, 18 decimals.
   * Throws TokenNotAllowed for unknown assets, OracleFailure for bad readings.
   */
  price(asset: AssetId): bigint {
    const feedId = this.registry.requireAllowed(asset);

    let feed: PriceFeed;
    let reading: PriceReading;
    try {
      feed = this.resolveFeed(feedId);
      reading = feed.latestPrice();
    } catch (err) {
      throw new OracleFailure(
        "OracleUnavailable",
        asset,
        `Price feed ${feedId} for ${asset} unavailable: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }

    if (!Number.isInteger(feed.decimals) || feed.decimals < 0 || feed.decimals > MAX_FEED_DECIMALS) {
      throw new OracleFailure("OracleUnavailable", asset, `Price feed ${feedId} reports unsupported decimals ${feed.decimals}`);
    }
    if (reading.price <= 0n) {
      throw new OracleFailure("OracleUnavailable", asset, `Price feed ${feedId} returned non-positive price ${reading.price}`);
    }

    const now = this.clock();
    if (isStale(reading, now, this.stalenessSeconds)) {
      throw new OracleFailure(
        "OracleStale",
        asset,
        `Price feed ${feedId} for ${asset} is stale (updatedAt=${reading.updatedAt}, now=${now}, window=${this.stalenessSeconds}s)`,
      );
    }

    return reading.price * feedPrecisionMultiplier(feed.decimals);
  }

  /** USD value (18 decimals) of `amount` units of `asset`. Floors. */
  usdValue(asset: AssetId, amount: bigint): bigint {
    return (amount * this.price(asset)) / PRECISION;
  }

  /** Units of `asset` worth `usdAmount` (18 decimals). Floors. */
  tokenAmountForUsd(asset: AssetId, usdAmount: bigint): bigint {
    return (usdAmount * PRECISION) / this.price(asset);
  }
}
