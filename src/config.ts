/**
 * Collateral Engine - Configuration
 *
 * Tunable engine parameters and the fixed-point constants every valuation uses.
 * Reads from environment variables with sensible defaults.
 */

import { ValidationError } from "./errors";

// ============================================================
//                     FIXED-POINT CONSTANTS
// ============================================================

/** Internal fixed-point scale for debt and USD values (18 decimals) */
export const PRECISION = 10n ** 18n;

/** Multiplier lifting an 8-decimal feed answer to 18 decimals */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Denominator for the integer percentages (threshold, bonus) */
export const LIQUIDATION_PRECISION = 100n;

/** Health factor below which an account may be liquidated (1.0) */
export const MIN_HEALTH_FACTOR = PRECISION;

/** Largest feed precision the adapter normalizes */
export const MAX_FEED_DECIMALS = 18;

// ============================================================
//                     TUNABLE PARAMETERS
// ============================================================

export interface EngineConfig {
  /** Share of raw collateral value counted toward solvency, in percent (50 = 200% over-collateralized) */
  liquidationThresholdPct: bigint;
  /** Extra collateral awarded to a liquidator, in percent of the repaid value */
  liquidationBonusPct: bigint;
  /** Max age in seconds of a price reading before it is rejected */
  oracleStalenessSeconds: number;
  /** Environment: production | staging | development | test */
  environment: string;
  /** winston log level */
  logLevel: string;
}

/** Read an integer env var. Throws InvalidConfig when the value does not parse. */
export function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new ValidationError("InvalidConfig", `${name} must be an integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  liquidationThresholdPct: BigInt(envInt("LIQUIDATION_THRESHOLD_PCT", 50)),
  liquidationBonusPct: BigInt(envInt("LIQUIDATION_BONUS_PCT", 10)),
  oracleStalenessSeconds: envInt("ORACLE_STALENESS_SECONDS", 10_800), // 3h
  environment: process.env.NODE_ENV || "development",
  logLevel: process.env.LOG_LEVEL || "info",
};

/**
 * Merge overrides on top of the defaults and validate the result.
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
  validateConfig(config);
  return config;
}

/**
 * Validate engine parameters.
 * Throws a ValidationError (InvalidConfig) on the first bad value.
 */
export function validateConfig(config: EngineConfig): void {
  if (config.liquidationThresholdPct < 1n || config.liquidationThresholdPct > LIQUIDATION_PRECISION) {
    throw new ValidationError(
      "InvalidConfig",
      `LIQUIDATION_THRESHOLD_PCT must be in 1..100, got ${config.liquidationThresholdPct}`,
    );
  }
  if (config.liquidationBonusPct < 0n || config.liquidationBonusPct >= LIQUIDATION_PRECISION) {
    throw new ValidationError(
      "InvalidConfig",
      `LIQUIDATION_BONUS_PCT must be in 0..99, got ${config.liquidationBonusPct}`,
    );
  }
  if (!Number.isInteger(config.oracleStalenessSeconds) || config.oracleStalenessSeconds <= 0) {
    throw new ValidationError(
      "InvalidConfig",
      `ORACLE_STALENESS_SECONDS must be a positive integer, got ${config.oracleStalenessSeconds}`,
    );
  }
}
