/**
 * Collateral Engine - Position Ledger
 *
 * Authoritative per-account state: collateral balance per asset and minted debt.
 *
 * Every mutation is journaled so an operation that fails part-way can be
 * rolled back to its checkpoint. Deposit/redeem events are buffered and only
 * handed out by commit(), so listeners never see a mutation that was undone.
 */

import { CollateralRegistry } from "./collateral-registry";
import { ValidationError } from "./errors";
import type { AccountId, AssetId, LedgerEvent } from "./types";

interface Position {
  collateral: Map<AssetId, bigint>;
  debt: bigint;
}

type JournalEntry =
  | { kind: "opened"; account: AccountId }
  | { kind: "collateral"; account: AccountId; asset: AssetId; previous: bigint }
  | { kind: "debt"; account: AccountId; previous: bigint };

export interface LedgerCheckpoint {
  journalLength: number;
  eventCount: number;
}

function requireMoreThanZero(amount: bigint): void {
  if (amount <= 0n) {
    throw new ValidationError("AmountMustBeMoreThanZero", `Amount must be more than zero, got ${amount}`);
  }
}

export class PositionLedger {
  private readonly positions = new Map<AccountId, Position>();
  private readonly journal: JournalEntry[] = [];
  private readonly pendingEvents: LedgerEvent[] = [];
  private _totalDebt = 0n;

  constructor(private readonly registry: CollateralRegistry) {}

  // ============================================================
  //                     MUTATIONS
  // ============================================================

  depositCollateral(account: AccountId, asset: AssetId, amount: bigint): void {
    requireMoreThanZero(amount);
    this.registry.requireAllowed(asset);

    const position = this.open(account);
    this.setCollateral(account, position, asset, (position.collateral.get(asset) ?? 0n) + amount);
    this.pendingEvents.push({ type: "CollateralDeposited", payload: { account, asset, amount } });
  }

  withdrawCollateral(account: AccountId, recipient: AccountId, asset: AssetId, amount: bigint): void {
    requireMoreThanZero(amount);

    const position = this.positions.get(account);
    const balance = position?.collateral.get(asset) ?? 0n;
    if (position === undefined || amount > balance) {
      throw new ValidationError(
        "InsufficientCollateral",
        `Cannot withdraw ${amount} of ${asset} from ${account}: balance is ${balance}`,
      );
    }

    this.setCollateral(account, position, asset, balance - amount);
    this.pendingEvents.push({ type: "CollateralRedeemed", payload: { from: account, to: recipient, asset, amount } });
  }

  recordMint(account: AccountId, amount: bigint): void {
    requireMoreThanZero(amount);
    const position = this.open(account);
    this.setDebt(account, position, position.debt + amount);
  }

  recordBurn(account: AccountId, amount: bigint): void {
    requireMoreThanZero(amount);

    const position = this.positions.get(account);
    const debt = position?.debt ?? 0n;
    if (position === undefined || amount > debt) {
      throw new ValidationError("InsufficientDebt", `Cannot burn ${amount} from ${account}: debt is ${debt}`);
    }
    this.setDebt(account, position, debt - amount);
  }

  // ============================================================
  //                     QUERIES
  // ============================================================

  collateralOf(account: AccountId, asset: AssetId): bigint {
    return this.positions.get(account)?.collateral.get(asset) ?? 0n;
  }

  debtOf(account: AccountId): bigint {
    return this.positions.get(account)?.debt ?? 0n;
  }

  /** Non-zero collateral balances of `account`, in registry order. */
  holdings(account: AccountId): Array<[AssetId, bigint]> {
    const position = this.positions.get(account);
    if (!position) return [];
    const result: Array<[AssetId, bigint]> = [];
    for (const asset of this.registry.enumerate()) {
      const amount = position.collateral.get(asset) ?? 0n;
      if (amount > 0n) result.push([asset, amount]);
    }
    return result;
  }

  hasAccount(account: AccountId): boolean {
    return this.positions.has(account);
  }

  accounts(): AccountId[] {
    return [...this.positions.keys()];
  }

  get totalDebt(): bigint {
    return this._totalDebt;
  }

  // ============================================================
  //                     JOURNAL
  // ============================================================

  checkpoint(): LedgerCheckpoint {
    return { journalLength: this.journal.length, eventCount: this.pendingEvents.length };
  }

  /** Undo every mutation made since `checkpoint`, newest first. */
  rollback(checkpoint: LedgerCheckpoint): void {
    while (this.journal.length > checkpoint.journalLength) {
      const entry = this.journal.pop();
      if (entry === undefined) break;
      switch (entry.kind) {
        case "opened":
          this.positions.delete(entry.account);
          break;
        case "collateral": {
          const position = this.positions.get(entry.account);
          if (!position) break;
          if (entry.previous === 0n) position.collateral.delete(entry.asset);
          else position.collateral.set(entry.asset, entry.previous);
          break;
        }
        case "debt": {
          const position = this.positions.get(entry.account);
          if (!position) break;
          this._totalDebt += entry.previous - position.debt;
          position.debt = entry.previous;
          break;
        }
      }
    }
    this.pendingEvents.length = checkpoint.eventCount;
  }

  /** Make every journaled mutation permanent and hand out the buffered events. */
  commit(): LedgerEvent[] {
    this.journal.length = 0;
    return this.pendingEvents.splice(0, this.pendingEvents.length);
  }

  // ============================================================
  //                     INTERNALS
  // ============================================================

  private open(account: AccountId): Position {
    let position = this.positions.get(account);
    if (!position) {
      position = { collateral: new Map(), debt: 0n };
      this.positions.set(account, position);
      this.journal.push({ kind: "opened", account });
    }
    return position;
  }

  private setCollateral(account: AccountId, position: Position, asset: AssetId, next: bigint): void {
    this.journal.push({ kind: "collateral", account, asset, previous: position.collateral.get(asset) ?? 0n });
    position.collateral.set(asset, next);
  }

  private setDebt(account: AccountId, position: Position, next: bigint): void {
    this.journal.push({ kind: "debt", account, previous: position.debt });
    this._totalDebt += next - position.debt;
    position.debt = next;
  }
}
