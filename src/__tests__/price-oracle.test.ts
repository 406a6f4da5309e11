/**
 * Price Oracle Adapter Unit Tests
 * Normalization, USD conversions, staleness and availability checks
 */

import { CollateralRegistry } from "../collateral-registry";
import { ADDITIONAL_FEED_PRECISION } from "../config";
import { OracleFailure } from "../errors";
import { ManualPriceFeed } from "../in-memory";
import { PriceOracleAdapter, feedPrecisionMultiplier, isStale } from "../price-oracle";
import type { PriceFeed } from "../types";
import { captureError, e, feedPrice, START_TIME } from "./fixtures";

const WINDOW = 3 * 60 * 60;

function setup(feed: PriceFeed) {
  const clock = { now: START_TIME };
  const registry = new CollateralRegistry(["WETH"], ["ETH/USD"]);
  const oracle = new PriceOracleAdapter(
    registry,
    (feedId) => {
      if (feedId !== "ETH/USD") throw new Error(`unknown feed ${feedId}`);
      return feed;
    },
    { stalenessSeconds: WINDOW, clock: () => clock.now },
  );
  return { oracle, clock };
}

describe("isStale", () => {
  const reading = { price: 1n, updatedAt: 1_000 };

  it("should be fresh exactly at the window", () => {
    expect(isStale(reading, 1_000 + WINDOW, WINDOW)).toBe(false);
  });

  it("should be stale one second past the window", () => {
    expect(isStale(reading, 1_001 + WINDOW, WINDOW)).toBe(true);
  });

  it("should treat updatedAt = 0 as stale", () => {
    expect(isStale({ price: 1n, updatedAt: 0 }, 10, WINDOW)).toBe(true);
  });

  it("should treat an answer from an earlier round as stale", () => {
    expect(isStale({ price: 1n, updatedAt: 1_000, roundId: 5n, answeredInRound: 4n }, 1_000, WINDOW)).toBe(true);
    expect(isStale({ price: 1n, updatedAt: 1_000, roundId: 5n, answeredInRound: 5n }, 1_000, WINDOW)).toBe(false);
  });
});

describe("feedPrecisionMultiplier", () => {
  it("should lift 8-decimal feeds by 1e10", () => {
    expect(feedPrecisionMultiplier(8)).toBe(ADDITIONAL_FEED_PRECISION);
  });

  it("should leave 18-decimal feeds untouched", () => {
    expect(feedPrecisionMultiplier(18)).toBe(1n);
  });
});

describe("PriceOracleAdapter", () => {
  it("should normalize an 8-decimal $2000 answer to 2000e18", () => {
    const { oracle } = setup(new ManualPriceFeed(feedPrice(2000), START_TIME));
    expect(oracle.price("WETH")).toBe(e("2000"));
  });

  it("should value 15 units at $2000 as $30,000", () => {
    const { oracle } = setup(new ManualPriceFeed(feedPrice(2000), START_TIME));
    expect(oracle.usdValue("WETH", e("15"))).toBe(e("30000"));
  });

  it("should convert $100 at $2000 to 0.05 units", () => {
    const { oracle } = setup(new ManualPriceFeed(feedPrice(2000), START_TIME));
    expect(oracle.tokenAmountForUsd("WETH", e("100"))).toBe(e("0.05"));
  });

  it("should floor conversions", () => {
    // 1 wei of USD at $2000 is 0.0005 wei of asset
    const { oracle } = setup(new ManualPriceFeed(feedPrice(2000), START_TIME));
    expect(oracle.tokenAmountForUsd("WETH", 1n)).toBe(0n);
    // $1 at $3 = 0.333... units
    const thirds = setup(new ManualPriceFeed(feedPrice(3), START_TIME)).oracle;
    expect(thirds.tokenAmountForUsd("WETH", e("1"))).toBe(333333333333333333n);
  });

  it("should round-trip amounts within one unit of rounding", () => {
    const { oracle } = setup(new ManualPriceFeed(314_159_265_358n, START_TIME)); // $3141.59265358
    for (const amount of [1n, 7n, e("0.123456789"), e("1"), e("42.5"), e("1000000")]) {
      const back = oracle.tokenAmountForUsd("WETH", oracle.usdValue("WETH", amount));
      expect(back).toBeLessThanOrEqual(amount);
      expect(amount - back).toBeLessThanOrEqual(1n);
    }
  });

  it("should read 18-decimal feeds without scaling", () => {
    const { oracle } = setup(new ManualPriceFeed(e("1.5"), START_TIME, 18));
    expect(oracle.usdValue("WETH", e("2"))).toBe(e("3"));
  });

  it("should reject assets that are not registered", () => {
    const { oracle } = setup(new ManualPriceFeed(feedPrice(2000), START_TIME));
    expect(captureError(() => oracle.price("DOGE"))).toMatchObject({ code: "TokenNotAllowed" });
  });

  describe("staleness", () => {
    it("should accept a reading exactly at the window", () => {
      const { oracle, clock } = setup(new ManualPriceFeed(feedPrice(2000), START_TIME));
      clock.now = START_TIME + WINDOW;
      expect(oracle.price("WETH")).toBe(e("2000"));
    });

    it("should fail with OracleStale past the window", () => {
      const { oracle, clock } = setup(new ManualPriceFeed(feedPrice(2000), START_TIME));
      clock.now = START_TIME + WINDOW + 1;
      const err = captureError(() => oracle.usdValue("WETH", e("1")));
      expect(err).toBeInstanceOf(OracleFailure);
      expect(err).toMatchObject({ category: "OracleFailure", code: "OracleStale", asset: "WETH" });
    });

    it("should recover once the feed updates", () => {
      const feed = new ManualPriceFeed(feedPrice(2000), START_TIME);
      const { oracle, clock } = setup(feed);
      clock.now = START_TIME + WINDOW + 1;
      feed.setPrice(feedPrice(2100), clock.now);
      expect(oracle.price("WETH")).toBe(e("2100"));
    });
  });

  describe("availability", () => {
    it("should wrap a throwing feed as OracleUnavailable and keep the cause", () => {
      const cause = new Error("connection refused");
      const { oracle } = setup({
        decimals: 8,
        latestPrice: () => {
          throw cause;
        },
      });
      const err = captureError(() => oracle.price("WETH"));
      expect(err).toMatchObject({ code: "OracleUnavailable" });
      expect(err).toBeInstanceOf(Error);
      expect(err instanceof Error ? err.cause : undefined).toBe(cause);
    });

    it("should reject a non-positive answer", () => {
      const { oracle } = setup(new ManualPriceFeed(0n, START_TIME));
      expect(captureError(() => oracle.price("WETH"))).toMatchObject({ code: "OracleUnavailable" });
      const negative = setup(new ManualPriceFeed(-1n, START_TIME)).oracle;
      expect(captureError(() => negative.price("WETH"))).toMatchObject({ code: "OracleUnavailable" });
    });

    it("should reject feeds with more than 18 decimals", () => {
      const { oracle } = setup(new ManualPriceFeed(1n, START_TIME, 19));
      expect(captureError(() => oracle.price("WETH"))).toMatchObject({ code: "OracleUnavailable" });
    });
  });
});
