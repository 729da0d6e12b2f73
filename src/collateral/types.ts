import type { Identity } from "../utils/identity.js";
import type { LoanStatus } from "../loan/status.js";

export interface CollateralDeposit {
  loanId: number;
  collateralId: number;       // monotonic per loan, never reused
  amount: bigint;
  currency: string;
  depositedAtHeight: number;
  depositor: Identity;
  locked: boolean;
}

export interface LoanCollateralSummary {
  loanId: number;
  totalAmount: bigint;
  totalValue: bigint;         // sum of values priced at deposit/withdraw time
  depositCount: number;
}

export interface LoanStatusRecord {
  loanId: number;
  status: LoanStatus;
  referenceValue: bigint;     // ratio denominator
  lastUpdatedHeight: number;
}

export interface VaultParameters {
  authority: Identity;
  minCollateralRatio: number; // whole percent
  maxCollateralPerLoan: bigint;
  liquidationPenalty: number; // whole percent of totalValue, reporting only
}

export interface CollateralTransfer {
  to: Identity;
  currency: string;
  amount: bigint;
}

export interface ReleaseReceipt {
  loanId: number;
  totalReleased: bigint;
  transfers: CollateralTransfer[];
}

export interface LiquidationReceipt {
  loanId: number;
  totalLiquidated: bigint;
  totalValue: bigint;
  penaltyValue: bigint;
  recipient: Identity;
  transfers: CollateralTransfer[];
}
