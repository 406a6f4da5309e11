/**
 * Scenario Simulator Tests
 */

import * as fs from "fs";
import * as path from "path";
import { ScenarioError, runScenario, validateScenario, type Scenario } from "../simulate";
import { captureError } from "./fixtures";

const ASSETS = [
  { id: "WETH", feed: "ETH/USD", price: "2000" },
  { id: "WBTC", feed: "BTC/USD", price: "30000" },
];

function scenario(steps: unknown[], extra: Record<string, unknown> = {}): Scenario {
  return validateScenario({
    assets: ASSETS,
    funding: [{ asset: "WETH", holder: "alice", amount: "10" }],
    steps,
    ...extra,
  });
}

describe("validateScenario", () => {
  it("should reject a non-object", () => {
    expect(() => validateScenario([])).toThrow("Invalid scenario at $: expected object");
  });

  it("should require at least one asset", () => {
    expect(captureError(() => validateScenario({ assets: [], steps: [] }))).toMatchObject({
      path: "$.assets",
      reason: "expected non-empty array",
    });
  });

  it("should reject unknown ops", () => {
    const err = captureError(() => scenario([{ op: "teleport" }]));
    expect(err).toBeInstanceOf(ScenarioError);
    expect(err).toMatchObject({ path: "$.steps[0].op", reason: 'unknown op "teleport"' });
  });

  it("should reject amounts that are not unsigned decimals", () => {
    expect(captureError(() => scenario([{ op: "mint", account: "alice", amount: "1e18" }]))).toMatchObject({
      path: "$.steps[0].amount",
    });
    expect(captureError(() => scenario([{ op: "burn", account: "alice", amount: "-1" }]))).toMatchObject({
      path: "$.steps[0].amount",
    });
  });

  it("should reject amounts more precise than 18 decimals", () => {
    const err = captureError(() =>
      validateScenario({
        assets: ASSETS,
        funding: [{ asset: "WETH", holder: "alice", amount: "1.0000000000000000001" }],
        steps: [],
      })
    );
    expect(err).toMatchObject({
      path: "$.funding[0].amount",
      reason: 'expected at most 18 decimal places, got "1.0000000000000000001"',
    });
  });

  it("should reject prices more precise than their feed", () => {
    expect(
      captureError(() => validateScenario({ assets: [{ id: "WETH", feed: "ETH/USD", price: "2000.123456789" }], steps: [] }))
    ).toMatchObject({
      path: "$.assets[0].price",
      reason: 'expected at most 8 decimal places, got "2000.123456789"',
    });
    expect(captureError(() => scenario([{ op: "setPrice", asset: "WETH", price: "1.123456789" }]))).toMatchObject({
      path: "$.steps[0].price",
      reason: 'expected at most 8 decimal places, got "1.123456789"',
    });
  });

  it("should allow price precision up to the declared feed decimals", () => {
    const parsed = validateScenario({
      assets: [{ id: "WETH", feed: "ETH/USD", price: "2000.123456789", decimals: 18 }],
      steps: [{ op: "setPrice", asset: "WETH", price: "1.123456789" }],
    });
    expect(parsed.assets[0]).toEqual({ id: "WETH", feed: "ETH/USD", price: "2000.123456789", decimals: 18 });
    expect(parsed.steps).toEqual([{ op: "setPrice", asset: "WETH", price: "1.123456789" }]);
  });

  it("should reject missing fields", () => {
    expect(captureError(() => scenario([{ op: "deposit", account: "alice", amount: "1" }]))).toMatchObject({
      path: "$.steps[0].asset",
      reason: "expected non-empty string, got undefined",
    });
  });

  it("should reject negative time steps", () => {
    expect(captureError(() => scenario([{ op: "advanceTime", seconds: -5 }]))).toMatchObject({
      path: "$.steps[0].seconds",
    });
  });

  it("should reject non-integer config values", () => {
    expect(captureError(() => scenario([], { config: { liquidationBonusPct: "10" } }))).toMatchObject({
      path: "$.config.liquidationBonusPct",
    });
  });

  it("should keep the optional redeem recipient", () => {
    const parsed = scenario([{ op: "redeem", account: "alice", to: "bob", asset: "WETH", amount: "1" }]);
    expect(parsed.steps).toEqual([{ op: "redeem", account: "alice", to: "bob", asset: "WETH", amount: "1" }]);
  });
});

describe("runScenario", () => {
  it("should replay the bundled liquidation scenario", () => {
    const file = path.join(__dirname, "..", "..", "scenarios", "liquidation.json");
    const report = runScenario(validateScenario(JSON.parse(fs.readFileSync(file, "utf-8"))));

    expect(report.steps).toEqual([
      { index: 0, op: "depositAndMint", ok: true },
      { index: 1, op: "depositAndMint", ok: true },
      { index: 2, op: "setPrice", ok: true },
      { index: 3, op: "liquidate", ok: true },
      { index: 4, op: "advanceTime", ok: true },
      { index: 5, op: "redeem", ok: true },
    ]);
    expect(report.accounts).toEqual([
      {
        account: "alice",
        debt: "0.0",
        collateral: { WETH: "2.88888888888888889" },
        collateralValueUsd: "5200.000000000000002",
        healthFactor: "max",
      },
      {
        account: "bob",
        debt: "10000.0",
        collateral: { WETH: "50.0" },
        collateralValueUsd: "90000.0",
        healthFactor: "4.5",
      },
    ]);
    expect(report.totalDebt).toBe("10000.0");
  });

  it("should record rejected steps and keep going", () => {
    const report = runScenario(
      scenario([
        { op: "deposit", account: "alice", asset: "WETH", amount: "10" },
        { op: "mint", account: "alice", amount: "11000" },
        { op: "mint", account: "alice", amount: "1000" },
        { op: "transferDebt", from: "alice", to: "bob", amount: "5000" },
      ])
    );

    expect(report.steps).toEqual([
      { index: 0, op: "deposit", ok: true },
      {
        index: 1,
        op: "mint",
        ok: false,
        code: "BreaksHealthFactor",
        message: "BreaksHealthFactor: health factor of alice is 909090909090909090",
      },
      { index: 2, op: "mint", ok: true },
      { index: 3, op: "transferDebt", ok: false, code: "Error", message: "alice cannot transfer 5000 debt token" },
    ]);
    expect(report.totalDebt).toBe("1000.0");
  });

  it("should report valuation errors once prices go stale", () => {
    const report = runScenario(
      scenario([
        { op: "depositAndMint", account: "alice", asset: "WETH", collateral: "10", debt: "1000" },
        { op: "advanceTime", seconds: 10_801 },
      ])
    );

    expect(report.accounts).toEqual([
      {
        account: "alice",
        debt: "1000.0",
        collateral: { WETH: "10.0" },
        valuationError: "Price feed ETH/USD for WETH is stale (updatedAt=1700000000, now=1700010801, window=10800s)",
      },
    ]);
  });

  it("should apply scenario config", () => {
    const report = runScenario(
      scenario([{ op: "depositAndMint", account: "alice", asset: "WETH", collateral: "10", debt: "16000" }], {
        config: { liquidationThresholdPct: 80 },
      })
    );
    expect(report.steps[0]).toEqual({ index: 0, op: "depositAndMint", ok: true });
    expect(report.accounts[0].healthFactor).toBe("1.0");
  });

  it("should throw on a price update for an unknown asset", () => {
    const err = captureError(() => runScenario(scenario([{ op: "setPrice", asset: "DOGE", price: "1" }])));
    expect(err).toBeInstanceOf(ScenarioError);
    expect(err).toMatchObject({ path: "$.steps[0].asset", reason: "unknown asset DOGE" });
  });
});
