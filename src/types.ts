/**
 * Collateral Engine - Shared Types
 *
 * Identifiers, collaborator capabilities and event payloads.
 * Every amount is an unsigned 18-decimal fixed-point bigint unless noted.
 */

// ============================================================
//                     IDENTIFIERS
// ============================================================

/** Approved collateral type, e.g. a token address */
export type AssetId = string;

/** External price source bound 1:1 to an AssetId */
export type PriceFeedId = string;

/** Caller identity; accounts exist implicitly */
export type AccountId = string;

// ============================================================
//                     COLLABORATORS
// ============================================================

/** One reading from an external price source */
export interface PriceReading {
  /** Price in the feed's native precision */
  price: bigint;
  /** Unix seconds of the last update */
  updatedAt: number;
  roundId?: bigint;
  answeredInRound?: bigint;
}

export interface PriceFeed {
  /** Native precision of `price` (e.g. 8) */
  readonly decimals: number;
  /** Throws when the source cannot be reached */
  latestPrice(): PriceReading;
}

/** Resolves a PriceFeedId to the live feed */
export type PriceFeedResolver = (feedId: PriceFeedId) => PriceFeed;

/**
 * Debt-token service. Supply bookkeeping lives behind this interface.
 * Boolean results report refusal; a throw counts as refusal too.
 */
export interface DebtToken {
  readonly id: string;
  mint(to: AccountId, amount: bigint): boolean;
  /** Move `amount` from `from` into engine custody */
  pullForBurn(from: AccountId, amount: bigint): boolean;
  /** Destroy `amount` held in engine custody */
  burn(amount: bigint): void;
  /** Send `amount` out of engine custody */
  transfer(to: AccountId, amount: bigint): boolean;
}

/** Collateral-asset transfer service */
export interface CollateralTransfer {
  transferIn(asset: AssetId, from: AccountId, amount: bigint): boolean;
  transferOut(asset: AssetId, to: AccountId, amount: bigint): boolean;
}

// ============================================================
//                     EVENTS
// ============================================================

export interface CollateralDepositedEvent {
  account: AccountId;
  asset: AssetId;
  amount: bigint;
}

export interface CollateralRedeemedEvent {
  from: AccountId;
  to: AccountId;
  asset: AssetId;
  amount: bigint;
}

export type LedgerEvent =
  | { type: "CollateralDeposited"; payload: CollateralDepositedEvent }
  | { type: "CollateralRedeemed"; payload: CollateralRedeemedEvent };

export interface EngineEvents {
  CollateralDeposited: [CollateralDepositedEvent];
  CollateralRedeemed: [CollateralRedeemedEvent];
}

// ============================================================
//                     READ MODELS
// ============================================================

export interface AccountInformation {
  totalDebt: bigint;
  collateralValueInUsd: bigint;
}

export interface LiquidationQuote {
  collateralEquivalent: bigint;
  bonus: bigint;
  totalSeized: bigint;
  healthFactorBefore: bigint;
  healthFactorAfter: bigint;
  /** True when `liquidate` with the same inputs would pass every engine check */
  accepted: boolean;
  /** Code of the first check that would reject it */
  rejection?: string;
}
