#!/usr/bin/env node
/**
 * Collateral Engine - Scenario Simulator
 *
 * Replays a JSON scenario against an engine wired to in-memory collaborators,
 * so position changes can be tried out before they are submitted for real.
 *
 * Usage:
 *   npm run simulate -- scenarios/liquidation.json [--metrics]
 *
 * Scenario amounts are decimal strings in whole units ("1.5" = 1.5e18);
 * prices are decimal USD strings scaled to each feed's decimals.
 */

import "dotenv/config";
import * as fs from "fs";
import { ethers } from "ethers";
import { formatHealthFactor } from "./calculator";
import type { EngineConfig } from "./config";
import { AccountingEngine } from "./engine";
import { isEngineError } from "./errors";
import { InMemoryCollateralVault, InMemoryDebtToken, ManualPriceFeed } from "./in-memory";
import { createServiceLogger } from "./logger";
import { renderMetrics } from "./metrics";

const logger = createServiceLogger("SIMULATOR");

// ============================================================
//                     SCENARIO SHAPE
// ============================================================

export interface ScenarioAsset {
  id: string;
  feed: string;
  price: string;
  decimals?: number;
}

export type ScenarioStep =
  | { op: "deposit"; account: string; asset: string; amount: string }
  | { op: "depositAndMint"; account: string; asset: string; collateral: string; debt: string }
  | { op: "mint"; account: string; amount: string }
  | { op: "burn"; account: string; amount: string }
  | { op: "redeem"; account: string; to?: string; asset: string; amount: string }
  | { op: "redeemForDebtRepayment"; account: string; asset: string; collateral: string; debt: string }
  | { op: "liquidate"; liquidator: string; asset: string; target: string; debtToCover: string }
  | { op: "setPrice"; asset: string; price: string }
  | { op: "advanceTime"; seconds: number }
  | { op: "transferDebt"; from: string; to: string; amount: string };

export interface Scenario {
  startTime?: number;
  config?: { liquidationThresholdPct?: number; liquidationBonusPct?: number; oracleStalenessSeconds?: number };
  assets: ScenarioAsset[];
  /** Collateral handed to accounts before the first step */
  funding?: Array<{ asset: string; holder: string; amount: string }>;
  steps: ScenarioStep[];
}

export type StepResult =
  | { index: number; op: string; ok: true }
  | { index: number; op: string; ok: false; code: string; message: string };

export interface AccountSummary {
  account: string;
  debt: string;
  collateral: Record<string, string>;
  collateralValueUsd?: string;
  healthFactor?: string;
  /** Set when valuation failed, e.g. a stale price */
  valuationError?: string;
}

export interface ScenarioReport {
  steps: StepResult[];
  accounts: AccountSummary[];
  totalDebt: string;
}

export class ScenarioError extends Error {
  constructor(
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`Invalid scenario at ${path}: ${reason}`);
    this.name = "ScenarioError";
  }
}

// ============================================================
//                     VALIDATION
// ============================================================

const STEP_FIELDS: Record<ScenarioStep["op"], string[]> = {
  deposit: ["account", "asset", "amount"],
  depositAndMint: ["account", "asset", "collateral", "debt"],
  mint: ["account", "amount"],
  burn: ["account", "amount"],
  redeem: ["account", "asset", "amount"],
  redeemForDebtRepayment: ["account", "asset", "collateral", "debt"],
  liquidate: ["liquidator", "asset", "target", "debtToCover"],
  setPrice: ["asset", "price"],
  advanceTime: [],
  transferDebt: ["from", "to", "amount"],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStepOp(value: unknown): value is ScenarioStep["op"] {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(STEP_FIELDS, value);
}

function assertString(value: unknown, path: string): asserts value is string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ScenarioError(path, `expected non-empty string, got ${JSON.stringify(value)}`);
  }
}

/** Unsigned decimal string with at most `maxDecimals` fraction digits. */
function assertDecimal(value: unknown, path: string, maxDecimals = 18): asserts value is string {
  assertString(value, path);
  const match = /^\d+(?:\.(\d+))?$/.exec(value);
  if (!match) {
    throw new ScenarioError(path, `expected unsigned decimal string, got "${value}"`);
  }
  const fraction = match[1] ?? "";
  if (fraction.length > maxDecimals) {
    throw new ScenarioError(path, `expected at most ${maxDecimals} decimal places, got "${value}"`);
  }
}

function assertInteger(value: unknown, path: string): asserts value is number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ScenarioError(path, `expected non-negative integer, got ${JSON.stringify(value)}`);
  }
}

/** Feed decimals per asset id; prices may not be more precise than their feed. */
type PriceDecimals = ReadonlyMap<string, number>;

function validateStep(input: unknown, path: string, priceDecimals: PriceDecimals): ScenarioStep {
  if (!isRecord(input)) throw new ScenarioError(path, "expected object");
  const raw = input;
  const op = raw.op;
  if (!isStepOp(op)) throw new ScenarioError(`${path}.op`, `unknown op ${JSON.stringify(op)}`);

  for (const field of STEP_FIELDS[op]) {
    const value = raw[field];
    if (field === "price") {
      const asset = raw.asset;
      const decimals = typeof asset === "string" ? priceDecimals.get(asset) : undefined;
      assertDecimal(value, `${path}.${field}`, decimals ?? 18);
    } else if (["amount", "collateral", "debt", "debtToCover"].includes(field)) {
      assertDecimal(value, `${path}.${field}`);
    } else {
      assertString(value, `${path}.${field}`);
    }
  }

  const str = (field: string): string => {
    const value = raw[field];
    assertString(value, `${path}.${field}`);
    return value;
  };

  switch (op) {
    case "deposit":
      return { op, account: str("account"), asset: str("asset"), amount: str("amount") };
    case "depositAndMint":
      return { op, account: str("account"), asset: str("asset"), collateral: str("collateral"), debt: str("debt") };
    case "mint":
      return { op, account: str("account"), amount: str("amount") };
    case "burn":
      return { op, account: str("account"), amount: str("amount") };
    case "redeem":
      return {
        op,
        account: str("account"),
        to: raw.to === undefined ? undefined : str("to"),
        asset: str("asset"),
        amount: str("amount"),
      };
    case "redeemForDebtRepayment":
      return { op, account: str("account"), asset: str("asset"), collateral: str("collateral"), debt: str("debt") };
    case "liquidate":
      return {
        op,
        liquidator: str("liquidator"),
        asset: str("asset"),
        target: str("target"),
        debtToCover: str("debtToCover"),
      };
    case "setPrice":
      return { op, asset: str("asset"), price: str("price") };
    case "advanceTime": {
      const seconds = raw.seconds;
      assertInteger(seconds, `${path}.seconds`);
      return { op, seconds };
    }
    case "transferDebt":
      return { op, from: str("from"), to: str("to"), amount: str("amount") };
  }
}

/** Check an untrusted value (e.g. parsed JSON) and return it as a Scenario. */
export function validateScenario(raw: unknown): Scenario {
  if (!isRecord(raw)) throw new ScenarioError("$", "expected object");

  if (!Array.isArray(raw.assets) || raw.assets.length === 0) {
    throw new ScenarioError("$.assets", "expected non-empty array");
  }
  const assets: ScenarioAsset[] = raw.assets.map((entry: unknown, i: number) => {
    const path = `$.assets[${i}]`;
    if (!isRecord(entry)) throw new ScenarioError(path, "expected object");
    const { id, feed, price, decimals } = entry;
    assertString(id, `${path}.id`);
    assertString(feed, `${path}.feed`);
    let feedDecimals: number | undefined;
    if (decimals !== undefined) {
      assertInteger(decimals, `${path}.decimals`);
      feedDecimals = decimals;
    }
    assertDecimal(price, `${path}.price`, feedDecimals ?? 8);
    return { id, feed, price, decimals: feedDecimals };
  });

  const funding: NonNullable<Scenario["funding"]> = [];
  if (raw.funding !== undefined) {
    if (!Array.isArray(raw.funding)) throw new ScenarioError("$.funding", "expected array");
    raw.funding.forEach((entry: unknown, i: number) => {
      const path = `$.funding[${i}]`;
      if (!isRecord(entry)) throw new ScenarioError(path, "expected object");
      const { asset, holder, amount } = entry;
      assertString(asset, `${path}.asset`);
      assertString(holder, `${path}.holder`);
      assertDecimal(amount, `${path}.amount`);
      funding.push({ asset, holder, amount });
    });
  }

  if (!Array.isArray(raw.steps)) throw new ScenarioError("$.steps", "expected array");
  const priceDecimals = new Map(assets.map((asset) => [asset.id, asset.decimals ?? 8]));
  const steps = raw.steps.map((step: unknown, i: number) => validateStep(step, `$.steps[${i}]`, priceDecimals));

  const scenario: Scenario = { assets, funding, steps };
  const startTime = raw.startTime;
  if (startTime !== undefined) {
    assertInteger(startTime, "$.startTime");
    scenario.startTime = startTime;
  }
  const rawConfig = raw.config;
  if (rawConfig !== undefined) {
    if (!isRecord(rawConfig)) throw new ScenarioError("$.config", "expected object");
    const config: NonNullable<Scenario["config"]> = {};
    for (const key of ["liquidationThresholdPct", "liquidationBonusPct", "oracleStalenessSeconds"] as const) {
      const value = rawConfig[key];
      if (value === undefined) continue;
      assertInteger(value, `$.config.${key}`);
      config[key] = value;
    }
    scenario.config = config;
  }
  return scenario;
}

// ============================================================
//                     RUNNER
// ============================================================

const DEFAULT_START_TIME = 1_700_000_000;

/** Build an engine for `scenario`, run its steps and summarize every account. */
export function runScenario(scenario: Scenario): ScenarioReport {
  let now = scenario.startTime ?? DEFAULT_START_TIME;

  const feeds = new Map<string, ManualPriceFeed>();
  const feedByAsset = new Map<string, ManualPriceFeed>();
  for (const asset of scenario.assets) {
    const decimals = asset.decimals ?? 8;
    const feed = new ManualPriceFeed(ethers.parseUnits(asset.price, decimals), now, decimals);
    feeds.set(asset.feed, feed);
    feedByAsset.set(asset.id, feed);
  }

  const config: Partial<EngineConfig> = {};
  if (scenario.config?.liquidationThresholdPct !== undefined) {
    config.liquidationThresholdPct = BigInt(scenario.config.liquidationThresholdPct);
  }
  if (scenario.config?.liquidationBonusPct !== undefined) {
    config.liquidationBonusPct = BigInt(scenario.config.liquidationBonusPct);
  }
  if (scenario.config?.oracleStalenessSeconds !== undefined) {
    config.oracleStalenessSeconds = scenario.config.oracleStalenessSeconds;
  }

  const debtToken = new InMemoryDebtToken("simulated-usd");
  const vault = new InMemoryCollateralVault();
  const engine = new AccountingEngine({
    tokenAddresses: scenario.assets.map((a) => a.id),
    priceFeedIds: scenario.assets.map((a) => a.feed),
    resolveFeed: (feedId) => {
      const feed = feeds.get(feedId);
      if (!feed) throw new Error(`No feed registered under ${feedId}`);
      return feed;
    },
    debtToken,
    collateral: vault,
    config,
    clock: () => now,
  });

  for (const entry of scenario.funding ?? []) {
    vault.fund(entry.asset, entry.holder, ethers.parseEther(entry.amount));
  }

  const steps = scenario.steps.map((step, index): StepResult => {
    try {
      switch (step.op) {
        case "deposit":
          engine.deposit(step.account, step.asset, ethers.parseEther(step.amount));
          break;
        case "depositAndMint":
          engine.depositAndMint(step.account, step.asset, ethers.parseEther(step.collateral), ethers.parseEther(step.debt));
          break;
        case "mint":
          engine.mint(step.account, ethers.parseEther(step.amount));
          break;
        case "burn":
          engine.burn(step.account, ethers.parseEther(step.amount));
          break;
        case "redeem":
          engine.redeem(step.account, step.to ?? step.account, step.asset, ethers.parseEther(step.amount));
          break;
        case "redeemForDebtRepayment":
          engine.redeemForDebtRepayment(step.account, step.asset, ethers.parseEther(step.collateral), ethers.parseEther(step.debt));
          break;
        case "liquidate":
          engine.liquidate(step.liquidator, step.asset, step.target, ethers.parseEther(step.debtToCover));
          break;
        case "setPrice": {
          const feed = feedByAsset.get(step.asset);
          if (!feed) throw new ScenarioError(`$.steps[${index}].asset`, `unknown asset ${step.asset}`);
          feed.setPrice(ethers.parseUnits(step.price, feed.decimals), now);
          break;
        }
        case "advanceTime":
          now += step.seconds;
          break;
        case "transferDebt":
          if (!debtToken.transferBetween(step.from, step.to, ethers.parseEther(step.amount))) {
            throw new Error(`${step.from} cannot transfer ${step.amount} debt token`);
          }
          break;
      }
      return { index, op: step.op, ok: true };
    } catch (err) {
      if (err instanceof ScenarioError) throw err;
      const code = isEngineError(err) ? err.code : "Error";
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`step ${index} (${step.op}) failed: ${message}`);
      return { index, op: step.op, ok: false, code, message };
    }
  });

  const accounts = engine.getAccounts().map((account): AccountSummary => {
    const collateral: Record<string, string> = {};
    for (const [asset, amount] of engine.getCollateralHoldings(account)) {
      collateral[asset] = ethers.formatEther(amount);
    }
    const summary: AccountSummary = {
      account,
      debt: ethers.formatEther(engine.getAccountDebt(account)),
      collateral,
    };
    try {
      summary.collateralValueUsd = ethers.formatEther(engine.getAccountCollateralValue(account));
      summary.healthFactor = formatHealthFactor(engine.getHealthFactor(account));
    } catch (err) {
      summary.valuationError = err instanceof Error ? err.message : String(err);
    }
    return summary;
  });

  return { steps, accounts, totalDebt: ethers.formatEther(engine.getTotalDebt()) };
}

// ============================================================
//                     CLI
// ============================================================

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const file = args.find((arg) => !arg.startsWith("--"));
  if (!file) {
    logger.error("Usage: simulate <scenario.json> [--metrics]");
    process.exit(1);
  }

  const scenario = validateScenario(JSON.parse(fs.readFileSync(file, "utf-8")));
  logger.info(`Running ${scenario.steps.length} steps from ${file}`);

  const report = runScenario(scenario);
  console.log(JSON.stringify(report, null, 2));

  if (args.includes("--metrics")) {
    console.log(await renderMetrics());
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
}
