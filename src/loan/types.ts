import type { Identity } from "../utils/identity.js";
import type { LoanStatus } from "./status.js";

export interface LoanRecord {
  loanId: number;
  borrower: Identity;
  principal: bigint;
  interest: bigint;            // quoted by the pool at request time
  collateralAmount: bigint;
  collateralCurrency: string;
  assetId: bigint;
  status: LoanStatus;
  startHeight: number;         // height of the request; maturity counts from here
  duration: number;            // blocks
  votesFor: number;
  votesAgainst: number;
  votingDeadline: number;      // last height at which votes are accepted
}

export interface LoanRequest {
  amount: bigint;
  duration: number;
  assetId: bigint;
  collateralAmount: bigint;
}

export interface LoanBookParameters {
  authority: Identity;
  maxLoanAmount: bigint;
  maxLoanDuration: number;
  minCollateralRatio: number;
}

export interface FinalizeOutcome {
  loanId: number;
  approved: boolean;
  status: LoanStatus;
  votesFor: number;
  votesAgainst: number;
  approvalPct: number;
}

export interface RepaymentReceipt {
  loanId: number;
  amountDue: bigint;
  amountPaid: bigint;
  excess: bigint;              // retained by the repayment handler
  collateralReleased: bigint;
}
