// Re-export types for consumers
export type { MicroLendConfig } from "./config.js";
export type {
  PriceOracle,
  TokenTransfer,
  FundsPool,
  Registry,
  RepaymentHandler,
  ChainClock,
} from "./external/types.js";
export type {
  CollateralDeposit,
  LoanCollateralSummary,
  LoanStatusRecord,
  VaultParameters,
  CollateralTransfer,
  ReleaseReceipt,
  LiquidationReceipt,
} from "./collateral/types.js";
export type {
  LoanRecord,
  LoanRequest,
  LoanBookParameters,
  FinalizeOutcome,
  RepaymentReceipt,
} from "./loan/types.js";
export type { LoanStatus } from "./loan/status.js";
export type { Identity } from "./utils/identity.js";
export type { Logger, LogLevel } from "./logging/logger.js";
export type { Sandbox, SandboxOptions } from "./sandbox.js";
export type { LendingPoolOptions, PoolParameters, Contribution } from "./external/pool.js";
export type { RepaymentRecord } from "./external/repayment.js";
export { CollateralVault } from "./collateral/vault.js";
export { LoanManager } from "./loan/manager.js";
export { Ledger, Table } from "./ledger/ledger.js";
export { LOAN_STATUSES, isLoanStatus, isTerminal, canTransition } from "./loan/status.js";
export { ManualClock } from "./external/clock.js";
export { StaticPriceOracle } from "./external/oracle.js";
export { InMemoryRegistry } from "./external/registry.js";
export { LedgerTokenBook } from "./external/token.js";
export { LedgerLendingPool } from "./external/pool.js";
export { LedgerRepaymentHandler } from "./external/repayment.js";
export { MicroLendProtocol } from "./protocol.js";
export type { ProtocolCollaborators, ProtocolRuntime, LoanPosition } from "./protocol.js";
export { createSandbox } from "./sandbox.js";
export { createLogger } from "./logging/logger.js";
export { toIdentity, sameIdentity } from "./utils/identity.js";
export { collateralRatio, minimumCollateral } from "./utils/math.js";
export {
  LendingProtocolError,
  AuthorizationError,
  NotFoundError,
  StateError,
  ValidationError,
  InvariantViolation,
  ExternalFailure,
  isLendingError,
} from "./utils/errors.js";
