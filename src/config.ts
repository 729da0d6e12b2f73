import type { LogLevel } from "./logging/logger.js";

/** Deposits a single loan may ever allocate. */
export const MAX_DEPOSITS_PER_LOAN = 100;

/** Vault ratio floor and ceiling accepted by `setMinCollateralRatio`. */
export const VAULT_RATIO_BOUNDS = { min: 100, max: 300 } as const;

/** Largest liquidation penalty, in whole percent. */
export const MAX_LIQUIDATION_PENALTY = 10;

export const DEFAULT_VAULT_PARAMETERS = {
  minCollateralRatio: 150,
  maxCollateralPerLoan: 1_000_000n,
  liquidationPenalty: 5,
} as const;

export const DEFAULT_LOAN_PARAMETERS = {
  maxLoanAmount: 10_000n,
  maxLoanDuration: 90,
  minCollateralRatio: 150,
  votingPeriod: 100,
  approvalThreshold: 75,
} as const;

/** Custody identity the vault holds deposits under. */
export const DEFAULT_VAULT_ADDRESS = "0x0000000000000000000000000000000000001001";

/** Identity of the lending pool; receives liquidations and repayments. */
export const DEFAULT_POOL_ADDRESS = "0x0000000000000000000000000000000000002002";

export const DEFAULT_COLLATERAL_CURRENCY = "USDC";

export interface MicroLendConfig {
  /** Administrative identity for both engines (0x-prefixed address). */
  authority: string;

  /** Vault custody address. Default: DEFAULT_VAULT_ADDRESS. */
  vaultAddress?: string;

  /** Pool address that receives liquidated collateral. Default: DEFAULT_POOL_ADDRESS. */
  poolAddress?: string;

  /** Currency borrowers post collateral in. Default: "USDC". */
  collateralCurrency?: string;

  /**
   * Oracle bindings, currency code → oracle address. A currency without a
   * binding cannot be deposited.
   * Default: the collateral currency bound to the authority.
   */
  oracles?: Record<string, string>;

  /** Vault minimum collateral ratio in percent (100-300). Default: 150. */
  vaultMinCollateralRatio?: number;

  /** Cap on the summed collateral amount per loan. Default: 1,000,000. */
  maxCollateralPerLoan?: bigint;

  /** Liquidation penalty in percent (0-10), reporting only. Default: 5. */
  liquidationPenalty?: number;

  /** Largest principal a borrower may request. Default: 10,000. */
  maxLoanAmount?: bigint;

  /** Longest loan term in blocks. Default: 90. */
  maxLoanDuration?: number;

  /** Collateral a request must offer, in percent of principal (> 100). Default: 150. */
  loanMinCollateralRatio?: number;

  /** Blocks a request stays open for votes. Default: 100. */
  votingPeriod?: number;

  /** Approval share needed to fund a loan, in percent. Default: 75. */
  approvalThreshold?: number;

  /** Log level. Default: "info". */
  logLevel?: LogLevel;

  /** Pretty-print logs. Default: false. */
  prettyLogs?: boolean;
}
