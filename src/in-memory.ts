/**
 * Collateral Engine - In-Memory Collaborators
 *
 * Process-local implementations of the debt token, the collateral vault and a
 * manually driven price feed. Used by the scenario simulator and the tests.
 */

import type { AccountId, AssetId, CollateralTransfer, DebtToken, PriceFeed, PriceReading } from "./types";

function credit(balances: Map<AccountId, bigint>, holder: AccountId, amount: bigint): void {
  balances.set(holder, (balances.get(holder) ?? 0n) + amount);
}

/** Debits `holder`; false when the balance cannot cover it. */
function debit(balances: Map<AccountId, bigint>, holder: AccountId, amount: bigint): boolean {
  const available = balances.get(holder) ?? 0n;
  if (amount <= 0n || available < amount) return false;
  balances.set(holder, available - amount);
  return true;
}

// ============================================================
//                     DEBT TOKEN
// ============================================================

/** Account balances plus a separate engine custody balance (tokens pulled for burning). */
export class InMemoryDebtToken implements DebtToken {
  private readonly balances = new Map<AccountId, bigint>();
  private custody = 0n;
  private _totalSupply = 0n;

  constructor(readonly id: string = "debt-token") {}

  mint(to: AccountId, amount: bigint): boolean {
    if (!to || amount <= 0n) return false;
    credit(this.balances, to, amount);
    this._totalSupply += amount;
    return true;
  }

  pullForBurn(from: AccountId, amount: bigint): boolean {
    if (!debit(this.balances, from, amount)) return false;
    this.custody += amount;
    return true;
  }

  burn(amount: bigint): void {
    if (amount <= 0n) throw new Error("Burn amount must be more than zero");
    if (amount > this.custody) throw new Error(`Burn amount ${amount} exceeds custody balance ${this.custody}`);
    this.custody -= amount;
    this._totalSupply -= amount;
  }

  transfer(to: AccountId, amount: bigint): boolean {
    if (!to || amount <= 0n || amount > this.custody) return false;
    this.custody -= amount;
    credit(this.balances, to, amount);
    return true;
  }

  /** Plain holder-to-holder transfer, e.g. to fund a liquidator */
  transferBetween(from: AccountId, to: AccountId, amount: bigint): boolean {
    if (!to || !debit(this.balances, from, amount)) return false;
    credit(this.balances, to, amount);
    return true;
  }

  balanceOf(holder: AccountId): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  /** Tokens held by the engine between pullForBurn and burn */
  get custodyBalance(): bigint {
    return this.custody;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }
}

// ============================================================
//                     COLLATERAL VAULT
// ============================================================

export class InMemoryCollateralVault implements CollateralTransfer {
  private readonly ledgers = new Map<AssetId, Map<AccountId, bigint>>();
  private readonly custody = new Map<AssetId, bigint>();

  /** Give `holder` some `asset` to deposit with. */
  fund(asset: AssetId, holder: AccountId, amount: bigint): void {
    credit(this.balancesOf(asset), holder, amount);
  }

  transferIn(asset: AssetId, from: AccountId, amount: bigint): boolean {
    if (!debit(this.balancesOf(asset), from, amount)) return false;
    this.custody.set(asset, this.custodyOf(asset) + amount);
    return true;
  }

  transferOut(asset: AssetId, to: AccountId, amount: bigint): boolean {
    const held = this.custodyOf(asset);
    if (!to || amount <= 0n || amount > held) return false;
    this.custody.set(asset, held - amount);
    credit(this.balancesOf(asset), to, amount);
    return true;
  }

  balanceOf(asset: AssetId, holder: AccountId): bigint {
    return this.ledgers.get(asset)?.get(holder) ?? 0n;
  }

  /** Amount of `asset` held by the engine */
  custodyOf(asset: AssetId): bigint {
    return this.custody.get(asset) ?? 0n;
  }

  private balancesOf(asset: AssetId): Map<AccountId, bigint> {
    let balances = this.ledgers.get(asset);
    if (!balances) {
      balances = new Map();
      this.ledgers.set(asset, balances);
    }
    return balances;
  }
}

// ============================================================
//                     PRICE FEED
// ============================================================

/** Feed whose answer is set by hand; round ids advance on every update. */
export class ManualPriceFeed implements PriceFeed {
  private reading: PriceReading;

  constructor(
    price: bigint,
    updatedAt: number,
    readonly decimals: number = 8,
  ) {
    this.reading = { price, updatedAt, roundId: 1n, answeredInRound: 1n };
  }

  setPrice(price: bigint, updatedAt: number): void {
    const roundId = (this.reading.roundId ?? 0n) + 1n;
    this.reading = { price, updatedAt, roundId, answeredInRound: roundId };
  }

  setReading(reading: PriceReading): void {
    this.reading = { ...reading };
  }

  latestPrice(): PriceReading {
    return { ...this.reading };
  }
}
