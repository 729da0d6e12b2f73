import { describe, it, expect } from "vitest";
import {
  LOAN_STATUSES,
  assertTransition,
  canTransition,
  isLoanStatus,
  isTerminal,
  requireStatus,
} from "../../src/loan/status.js";
import { tallyVotes } from "../../src/loan/voting.js";
import { StateError } from "../../src/utils/errors.js";

describe("loan status transitions", () => {
  it("allows only the lifecycle edges", () => {
    const allowed = LOAN_STATUSES.flatMap((from) =>
      LOAN_STATUSES.filter((to) => canTransition(from, to)).map((to) => `${from}->${to}`),
    );
    expect(allowed).toEqual([
      "pending->active",
      "pending->rejected",
      "active->repaid",
      "active->defaulted",
    ]);
  });

  it("treats rejected, repaid and defaulted as terminal", () => {
    expect(LOAN_STATUSES.filter(isTerminal)).toEqual(["rejected", "repaid", "defaulted"]);
  });

  it("recognizes status names", () => {
    expect(isLoanStatus("active")).toBe(true);
    expect(isLoanStatus("closed")).toBe(false);
  });

  it("throws a state error for a disallowed move", () => {
    expect(() => assertTransition(3, "repaid", "active")).toThrow(StateError);
    expect(() => assertTransition(3, "repaid", "active")).toThrow("Loan 3 cannot move from repaid to active");
    expect(() => requireStatus(3, "pending", "active")).toThrow("Loan 3 is pending, expected active");
  });
});

describe("tallyVotes", () => {
  it("rejects when nobody voted", () => {
    expect(tallyVotes(0, 0, 75)).toEqual({ approved: false, approvalPct: 0, totalVotes: 0 });
  });

  it("truncates the approval share before comparing", () => {
    expect(tallyVotes(2, 1, 66)).toEqual({ approved: true, approvalPct: 66, totalVotes: 3 });
    expect(tallyVotes(2, 1, 67)).toEqual({ approved: false, approvalPct: 66, totalVotes: 3 });
  });

  it("approves a unanimous vote", () => {
    expect(tallyVotes(1, 0, 75).approved).toBe(true);
  });
});
