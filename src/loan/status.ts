import { StateError } from "../utils/errors.js";

export const LOAN_STATUSES = ["pending", "active", "rejected", "repaid", "defaulted"] as const;

export type LoanStatus = (typeof LOAN_STATUSES)[number];

const TRANSITIONS: Record<LoanStatus, readonly LoanStatus[]> = {
  pending: ["active", "rejected"],
  active: ["repaid", "defaulted"],
  rejected: [],
  repaid: [],
  defaulted: [],
};

export function isLoanStatus(value: string): value is LoanStatus {
  return LOAN_STATUSES.some((status) => status === value);
}

export function isTerminal(status: LoanStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: LoanStatus, to: LoanStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(loanId: number, from: LoanStatus, to: LoanStatus): void {
  if (!canTransition(from, to)) {
    throw new StateError(
      "InvalidStatus",
      `Loan ${loanId} cannot move from ${from} to ${to}`,
    );
  }
}

/** Throws unless the loan currently sits in `expected`. */
export function requireStatus(loanId: number, actual: LoanStatus, expected: LoanStatus): void {
  if (actual !== expected) {
    throw new StateError(
      "InvalidStatus",
      `Loan ${loanId} is ${actual}, expected ${expected}`,
    );
  }
}
