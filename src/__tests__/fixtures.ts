/**
 * Shared engine fixture: two collateral assets on manual 8-decimal feeds,
 * in-memory debt token and collateral vault, and a controllable clock.
 */

import { ethers } from "ethers";
import { AccountingEngine } from "../engine";
import type { EngineConfig } from "../config";
import { InMemoryCollateralVault, InMemoryDebtToken, ManualPriceFeed } from "../in-memory";
import type { CollateralTransfer, DebtToken } from "../types";

export const WETH = "0x00000000000000000000000000000000000000e1";
export const WBTC = "0x00000000000000000000000000000000000000b1";
export const ETH_FEED = "ETH/USD";
export const BTC_FEED = "BTC/USD";

export const ALICE = "alice";
export const BOB = "bob";
export const CAROL = "carol";

export const START_TIME = 1_700_000_000;

/** 8-decimal feed answer for a whole-dollar price */
export function feedPrice(usd: number): bigint {
  return BigInt(usd) * 10n ** 8n;
}

export const e = (value: string): bigint => ethers.parseEther(value);

export interface EngineFixture {
  engine: AccountingEngine;
  debtToken: InMemoryDebtToken;
  vault: InMemoryCollateralVault;
  ethFeed: ManualPriceFeed;
  btcFeed: ManualPriceFeed;
  clock: { now: number };
}

export interface FixtureOptions {
  config?: Partial<EngineConfig>;
  /** Wrap the in-memory debt token, e.g. to make it refuse */
  debtToken?: (inner: InMemoryDebtToken) => DebtToken;
  /** Wrap the in-memory vault */
  collateral?: (inner: InMemoryCollateralVault) => CollateralTransfer;
}

export function setupEngine(options: FixtureOptions = {}): EngineFixture {
  const clock = { now: START_TIME };
  const ethFeed = new ManualPriceFeed(feedPrice(2000), START_TIME);
  const btcFeed = new ManualPriceFeed(feedPrice(30000), START_TIME);
  const feeds = new Map([
    [ETH_FEED, ethFeed],
    [BTC_FEED, btcFeed],
  ]);

  const debtToken = new InMemoryDebtToken("usd-debt");
  const vault = new InMemoryCollateralVault();
  for (const holder of [ALICE, BOB, CAROL]) {
    vault.fund(WETH, holder, e("100"));
    vault.fund(WBTC, holder, e("10"));
  }

  const engine = new AccountingEngine({
    tokenAddresses: [WETH, WBTC],
    priceFeedIds: [ETH_FEED, BTC_FEED],
    resolveFeed: (feedId) => {
      const feed = feeds.get(feedId);
      if (!feed) throw new Error(`unknown feed ${feedId}`);
      return feed;
    },
    debtToken: options.debtToken ? options.debtToken(debtToken) : debtToken,
    collateral: options.collateral ? options.collateral(vault) : vault,
    config: options.config,
    clock: () => clock.now,
  });

  return { engine, debtToken, vault, ethFeed, btcFeed, clock };
}

/** Run `fn` and return what it threw; fails the test when it returns normally. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}
