/**
 * Collateral Engine - Error Taxonomy
 *
 * Every failure the engine raises is an EngineError with a category (what kind
 * of failure) and a code (which check tripped). Failures are synchronous and
 * the engine never retries; retry policy belongs to the caller.
 */

// ============================================================
//  Categories & Codes
// ============================================================

export type ErrorCategory =
  | "ValidationError"
  | "InvariantViolation"
  | "CollaboratorFailure"
  | "OracleFailure"
  | "LiquidationNotEligible"
  | "LiquidationIneffective"
  | "ReentrancyViolation";

export type ValidationCode =
  | "AmountMustBeMoreThanZero"
  | "TokenNotAllowed"
  | "LengthMismatch"
  | "InsufficientCollateral"
  | "InsufficientDebt"
  | "InvalidConfig";

export type InvariantCode = "BreaksHealthFactor" | "HealthFactorBroken";

export type CollaboratorCode = "TransferFailed" | "MintFailed" | "BurnFailed";

export type OracleCode = "OracleStale" | "OracleUnavailable";

export type EngineErrorCode =
  | ValidationCode
  | InvariantCode
  | CollaboratorCode
  | OracleCode
  | "HealthFactorOk"
  | "HealthFactorNotImproved"
  | "ReentrantCall";

/** A compensating action that could not be completed while unwinding a failed operation */
export interface CompensationFailure {
  label: string;
  error: unknown;
}

// ============================================================
//  Base Error
// ============================================================

export abstract class EngineError extends Error {
  abstract readonly category: ErrorCategory;

  /** Filled in when rolling back collaborator calls also failed */
  compensationFailures: CompensationFailure[] = [];

  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isEngineError(value: unknown): value is EngineError {
  return value instanceof EngineError;
}

// ============================================================
//  Concrete Errors
// ============================================================

/** Zero amounts, disallowed assets, malformed construction, overdrawn balances */
export class ValidationError extends EngineError {
  readonly category = "ValidationError";

  constructor(code: ValidationCode, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

/** The health factor of `account` is below the minimum after (or before) a mutation */
export class InvariantViolation extends EngineError {
  readonly category = "InvariantViolation";

  constructor(
    code: InvariantCode,
    public readonly account: string,
    public readonly healthFactor: bigint,
  ) {
    super(code, `${code}: health factor of ${account} is ${healthFactor}`);
    this.name = "InvariantViolation";
  }
}

/** A transfer, mint or burn collaborator refused or threw */
export class CollaboratorFailure extends EngineError {
  readonly category = "CollaboratorFailure";

  constructor(code: CollaboratorCode, message: string, cause?: unknown) {
    super(code, message, cause === undefined ? undefined : { cause });
    this.name = "CollaboratorFailure";
  }
}

/** The price for `asset` is stale or could not be read */
export class OracleFailure extends EngineError {
  readonly category = "OracleFailure";

  constructor(
    code: OracleCode,
    public readonly asset: string,
    message: string,
    cause?: unknown,
  ) {
    super(code, message, cause === undefined ? undefined : { cause });
    this.name = "OracleFailure";
  }
}

/** Target of a liquidation is still healthy */
export class LiquidationNotEligible extends EngineError {
  readonly category = "LiquidationNotEligible";

  constructor(
    public readonly account: string,
    public readonly healthFactor: bigint,
  ) {
    super("HealthFactorOk", `HealthFactorOk: ${account} has health factor ${healthFactor}`);
    this.name = "LiquidationNotEligible";
  }
}

/** Liquidation would not raise the target's health factor */
export class LiquidationIneffective extends EngineError {
  readonly category = "LiquidationIneffective";

  constructor(
    public readonly account: string,
    public readonly healthFactorBefore: bigint,
    public readonly healthFactorAfter: bigint,
  ) {
    super(
      "HealthFactorNotImproved",
      `HealthFactorNotImproved: ${account} went from ${healthFactorBefore} to ${healthFactorAfter}`,
    );
    this.name = "LiquidationIneffective";
  }
}

/** A mutating call arrived while another one was still in progress */
export class ReentrancyViolation extends EngineError {
  readonly category = "ReentrancyViolation";

  constructor(
    public readonly attempted: string,
    public readonly inProgress: string,
  ) {
    super("ReentrantCall", `ReentrantCall: ${attempted} called while ${inProgress} is in progress`);
    this.name = "ReentrancyViolation";
  }
}
