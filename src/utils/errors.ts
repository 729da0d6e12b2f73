export type ErrorKind =
  | "authorization"
  | "not-found"
  | "state"
  | "validation"
  | "invariant"
  | "external";

export type AuthorizationCode = "NotAuthorized" | "NotVerified";

export type NotFoundCode = "LoanNotFound" | "CollateralNotFound";

export type StateCode =
  | "InvalidStatus"
  | "CollateralLocked"
  | "LoanActive"
  | "VotingClosed"
  | "VotingOpen"
  | "AlreadyVoted"
  | "NotDue"
  | "InsufficientFunds"
  | "PoolPaused"
  | "WithdrawalLocked";

export type ValidationCode =
  | "ZeroAmount"
  | "InvalidAmount"
  | "InvalidDuration"
  | "InvalidCurrency"
  | "InvalidAsset"
  | "UnknownStatus"
  | "InvalidCollateral"
  | "InvalidRatio"
  | "InvalidPenalty"
  | "InvalidInterestRate"
  | "InvalidIdentity"
  | "WithdrawalExceeds";

export type InvariantCode =
  | "RatioBelowThreshold"
  | "MaxCollateralExceeded"
  | "CollateralLimitExceeded"
  | "InsufficientCollateral";

export type ExternalCode =
  | "TransferFailed"
  | "OracleFailed"
  | "InterestQuoteFailed"
  | "PoolFailed"
  | "DisbursementFailed"
  | "RepaymentFailed"
  | "RegistryFailed";

export type ErrorCode =
  | AuthorizationCode
  | NotFoundCode
  | StateCode
  | ValidationCode
  | InvariantCode
  | ExternalCode;

export class LendingProtocolError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "LendingProtocolError";
  }
}

export class AuthorizationError extends LendingProtocolError {
  constructor(
    public readonly code: AuthorizationCode,
    message: string,
  ) {
    super("authorization", code, message);
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends LendingProtocolError {
  constructor(
    public readonly code: NotFoundCode,
    message: string,
  ) {
    super("not-found", code, message);
    this.name = "NotFoundError";
  }
}

/** Wrong status, closed window, lock flag or pool state. */
export class StateError extends LendingProtocolError {
  constructor(
    public readonly code: StateCode,
    message: string,
  ) {
    super("state", code, message);
    this.name = "StateError";
  }
}

export class ValidationError extends LendingProtocolError {
  constructor(
    public readonly code: ValidationCode,
    message: string,
  ) {
    super("validation", code, message);
    this.name = "ValidationError";
  }
}

/** The operation would break a collateral ratio or a per-loan cap. */
export class InvariantViolation extends LendingProtocolError {
  constructor(
    public readonly code: InvariantCode,
    message: string,
  ) {
    super("invariant", code, message);
    this.name = "InvariantViolation";
  }
}

export class ExternalFailure extends LendingProtocolError {
  constructor(
    public readonly code: ExternalCode,
    message: string,
    public readonly raw?: unknown,
  ) {
    super("external", code, message, raw === undefined ? undefined : { cause: raw });
    this.name = "ExternalFailure";
  }
}

export function isLendingError(error: unknown): error is LendingProtocolError {
  return error instanceof LendingProtocolError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
