/**
 * Collateral Engine - Calculator Utilities
 *
 * Pure integer math for health factor and liquidation amounts.
 * Every division floors; no floating point anywhere on this path.
 */

import { ethers } from "ethers";
import { LIQUIDATION_PRECISION } from "./config";

/** Health factor of an account without debt (uint256 max) */
export const MAX_HEALTH_FACTOR = ethers.MaxUint256;

/**
 * Calculate the health factor of a position.
 * @param totalDebt           Minted debt (18 decimals)
 * @param collateralValueUsd  Total collateral value in USD (18 decimals)
 * @param thresholdPct        Liquidation threshold in percent (e.g. 50)
 * @param precision           Fixed-point scale of the result (1e18 = 1.0)
 */
export function calculateHealthFactor(
  totalDebt: bigint,
  collateralValueUsd: bigint,
  thresholdPct: bigint,
  precision: bigint,
): bigint {
  if (totalDebt === 0n) return MAX_HEALTH_FACTOR;
  const adjustedCollateral = (collateralValueUsd * thresholdPct) / LIQUIDATION_PRECISION;
  return (adjustedCollateral * precision) / totalDebt;
}

export interface SeizeAmounts {
  /** Collateral worth exactly the repaid debt */
  collateralEquivalent: bigint;
  /** Liquidator's extra on top */
  bonus: bigint;
  totalSeized: bigint;
}

/**
 * Split of collateral a liquidator receives for repaying debt.
 * @param collateralEquivalent  Repaid debt converted to collateral units
 * @param bonusPct              Liquidation bonus in percent
 */
export function calculateSeizeAmounts(collateralEquivalent: bigint, bonusPct: bigint): SeizeAmounts {
  const bonus = (collateralEquivalent * bonusPct) / LIQUIDATION_PRECISION;
  return { collateralEquivalent, bonus, totalSeized: collateralEquivalent + bonus };
}

/** Format an 18-decimal health factor for logs ("max" for debt-free accounts). */
export function formatHealthFactor(healthFactor: bigint): string {
  if (healthFactor === MAX_HEALTH_FACTOR) return "max";
  return ethers.formatUnits(healthFactor, 18);
}
