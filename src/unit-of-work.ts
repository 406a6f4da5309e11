/**
 * Collateral Engine - Unit of Work
 *
 * Scope of one mutating operation: a ledger checkpoint plus the compensating
 * actions for every collaborator call that already went through.
 *
 * Usage:
 *   const uow = new UnitOfWork(ledger);
 *   ledger.depositCollateral(...);
 *   if (vault.transferIn(...)) uow.onRollback("return collateral", () => vault.transferOut(...));
 *   ...
 *   const events = uow.commit();          // success
 *   const failures = uow.rollback();      // or failure
 */

import type { Logger } from "winston";
import type { CompensationFailure } from "./errors";
import { compensationFailuresTotal } from "./metrics";
import { type LedgerCheckpoint, PositionLedger } from "./position-ledger";
import type { LedgerEvent } from "./types";

/** Returns false (or throws) when the compensation could not be applied */
export type CompensationFn = () => boolean | void;

export class UnitOfWork {
  private readonly checkpoint: LedgerCheckpoint;
  /** Executed newest-first on rollback */
  private readonly compensations: Array<{ label: string; fn: CompensationFn }> = [];
  private settled = false;

  constructor(
    private readonly ledger: PositionLedger,
    private readonly logger?: Logger,
  ) {
    this.checkpoint = ledger.checkpoint();
  }

  onRollback(label: string, fn: CompensationFn): void {
    this.compensations.push({ label, fn });
  }

  commit(): LedgerEvent[] {
    this.assertOpen();
    this.settled = true;
    return this.ledger.commit();
  }

  /**
   * Undo collaborator calls (newest first), then restore the ledger.
   * Returns the compensations that failed; the ledger is restored regardless.
   */
  rollback(): CompensationFailure[] {
    this.assertOpen();
    this.settled = true;

    const failures: CompensationFailure[] = [];
    for (let i = this.compensations.length - 1; i >= 0; i--) {
      const { label, fn } = this.compensations[i];
      try {
        if (fn() === false) {
          failures.push({ label, error: new Error(`${label} refused`) });
        }
      } catch (err) {
        failures.push({ label, error: err });
      }
    }

    for (const failure of failures) {
      compensationFailuresTotal.inc();
      const reason = failure.error instanceof Error ? failure.error.message : String(failure.error);
      this.logger?.error(`Compensation "${failure.label}" failed: ${reason}`);
    }

    this.ledger.rollback(this.checkpoint);
    return failures;
  }

  private assertOpen(): void {
    if (this.settled) {
      throw new Error("UnitOfWork already committed or rolled back");
    }
  }
}
