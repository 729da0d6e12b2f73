import type { Logger } from "../logging/logger.js";
import type { Ledger, Table } from "../ledger/ledger.js";
import type { CollateralVault } from "../collateral/vault.js";
import type { LiquidationReceipt } from "../collateral/types.js";
import type {
  ChainClock,
  FundsPool,
  Registry,
  RepaymentHandler,
} from "../external/types.js";
import { sameIdentity, toIdentity, type Identity } from "../utils/identity.js";
import { minimumCollateral } from "../utils/math.js";
import {
  AuthorizationError,
  ExternalFailure,
  LendingProtocolError,
  NotFoundError,
  StateError,
  ValidationError,
  type ExternalCode,
} from "../utils/errors.js";
import { DEFAULT_LOAN_PARAMETERS } from "../config.js";
import { assertTransition, requireStatus } from "./status.js";
import { tallyVotes } from "./voting.js";
import type {
  FinalizeOutcome,
  LoanBookParameters,
  LoanRecord,
  LoanRequest,
  RepaymentReceipt,
} from "./types.js";

export interface LoanCollaborators {
  vault: CollateralVault;
  pool: FundsPool;
  registry: Registry;
  repayments: RepaymentHandler;
  clock: ChainClock;
}

export interface LoanManagerOptions {
  /** Identity presented to the vault for authority-only calls. */
  operator: Identity;
  authority: Identity;
  collateralCurrency: string;
  maxLoanAmount?: bigint;
  maxLoanDuration?: number;
  minCollateralRatio?: number;
  votingPeriod?: number;
  approvalThreshold?: number;
}

const PARAMS_KEY = "current";
const NEXT_ID_KEY = "next";

const loanKey = (loanId: number) => String(loanId);
const voteKey = (loanId: number, voter: Identity) => `${loanId}:${toIdentity(voter, "voter")}`;
const borrowerKey = (borrower: Identity) => toIdentity(borrower, "borrower");

/**
 * LoanManager runs the loan lifecycle:
 *
 *   pending ──vote window──▶ finalize ─┬─▶ active ─┬─▶ repaid
 *                                      │           └─▶ defaulted
 *                                      └─▶ rejected
 *
 * Each operation is one ledger transaction. The vault and pool calls it
 * makes join that transaction, so a status change and its collateral or
 * funds movement commit together or not at all.
 */
export class LoanManager {
  readonly operator: Identity;
  readonly collateralCurrency: string;
  readonly votingPeriod: number;
  readonly approvalThreshold: number;
  private readonly loans: Table<LoanRecord>;
  private readonly votes: Table<boolean>;
  private readonly activeByBorrower: Table<readonly number[]>;
  private readonly counters: Table<number>;
  private readonly params: Table<LoanBookParameters>;
  private readonly logger: Logger;

  constructor(
    private readonly ledger: Ledger,
    private readonly deps: LoanCollaborators,
    options: LoanManagerOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ module: "loans" });
    this.operator = options.operator;
    this.collateralCurrency = options.collateralCurrency;
    this.votingPeriod = options.votingPeriod ?? DEFAULT_LOAN_PARAMETERS.votingPeriod;
    this.approvalThreshold = options.approvalThreshold ?? DEFAULT_LOAN_PARAMETERS.approvalThreshold;

    if (!Number.isInteger(this.votingPeriod) || this.votingPeriod < 1) {
      throw new ValidationError("InvalidDuration", `Voting period ${this.votingPeriod} must be a positive integer`);
    }
    if (!Number.isInteger(this.approvalThreshold) || this.approvalThreshold < 1 || this.approvalThreshold > 100) {
      throw new ValidationError("InvalidRatio", `Approval threshold ${this.approvalThreshold} out of range (1-100)`);
    }

    this.loans = ledger.table("loans.records");
    this.votes = ledger.table("loans.votes");
    this.activeByBorrower = ledger.table("loans.active-by-borrower");
    this.counters = ledger.table("loans.counters");
    this.params = ledger.table("loans.params");

    const initial: LoanBookParameters = {
      authority: options.authority,
      maxLoanAmount: options.maxLoanAmount ?? DEFAULT_LOAN_PARAMETERS.maxLoanAmount,
      maxLoanDuration: options.maxLoanDuration ?? DEFAULT_LOAN_PARAMETERS.maxLoanDuration,
      minCollateralRatio: options.minCollateralRatio ?? DEFAULT_LOAN_PARAMETERS.minCollateralRatio,
    };
    assertMaxAmount(initial.maxLoanAmount);
    assertMaxDuration(initial.maxLoanDuration);
    assertLoanRatio(initial.minCollateralRatio);
    this.params.set(PARAMS_KEY, initial);
  }

  // === Lifecycle ===

  /**
   * Open a pending loan. Registers the loan with the vault and posts the
   * borrower's collateral before the record is written; a failure at any
   * step leaves no loan, no deposit and no consumed id.
   */
  async requestLoan(borrower: Identity, request: LoanRequest): Promise<number> {
    return this.ledger.transaction("requestLoan", async () => {
      const { amount, duration, assetId, collateralAmount } = request;
      const { vault, pool, registry, clock } = this.deps;

      await this.requireVerified(borrower);
      if (this.activeLoansOf(borrower).length > 0) {
        throw new StateError("LoanActive", `${borrower} already has an active loan`);
      }

      const params = this.currentParams();
      if (amount < 1n || amount > params.maxLoanAmount) {
        throw new ValidationError(
          "InvalidAmount",
          `Loan amount ${amount} out of range (1-${params.maxLoanAmount})`,
        );
      }
      if (!Number.isInteger(duration) || duration < 1 || duration > params.maxLoanDuration) {
        throw new ValidationError(
          "InvalidDuration",
          `Loan duration ${duration} out of range (1-${params.maxLoanDuration} blocks)`,
        );
      }

      const owner = await this.external("RegistryFailed", "Asset lookup", () =>
        registry.getAssetOwner(assetId),
      );
      if (!owner) {
        throw new ValidationError("InvalidAsset", `Asset ${assetId} has no owner`);
      }

      const required = minimumCollateral(amount, params.minCollateralRatio);
      if (collateralAmount < required) {
        throw new ValidationError(
          "InvalidCollateral",
          `Collateral ${collateralAmount} is below the required ${required}`,
        );
      }

      const available = await this.external("PoolFailed", "Pool balance lookup", () =>
        pool.getAvailableFunds(),
      );
      if (available < amount) {
        throw new StateError(
          "InsufficientFunds",
          `Pool has ${available} available, ${amount} requested`,
        );
      }

      const interest = await this.external("InterestQuoteFailed", "Interest quote", () =>
        pool.calculateInterest(amount, duration),
      );
      if (interest < 0n) {
        throw new ExternalFailure("InterestQuoteFailed", `Pool quoted negative interest ${interest}`);
      }

      const loanId = this.counters.get(NEXT_ID_KEY) ?? 0;
      const height = clock.currentHeight();

      await vault.updateLoanStatus(this.operator, loanId, "pending", amount);
      await vault.depositCollateral(borrower, loanId, collateralAmount, this.collateralCurrency);

      this.loans.set(loanKey(loanId), {
        loanId,
        borrower,
        principal: amount,
        interest,
        collateralAmount,
        collateralCurrency: this.collateralCurrency,
        assetId,
        status: "pending",
        startHeight: height,
        duration,
        votesFor: 0,
        votesAgainst: 0,
        votingDeadline: height + this.votingPeriod,
      });
      this.counters.set(NEXT_ID_KEY, loanId + 1);

      this.logger.info(
        { loanId, borrower, amount, interest, duration, collateralAmount },
        "Loan requested",
      );
      return loanId;
    });
  }

  async voteOnLoan(voter: Identity, loanId: number, approve: boolean): Promise<true> {
    return this.ledger.transaction<true>("voteOnLoan", async () => {
      const loan = this.requireLoan(loanId);
      await this.requireVerified(voter);
      requireStatus(loanId, loan.status, "pending");
      if (this.deps.clock.currentHeight() > loan.votingDeadline) {
        throw new StateError("VotingClosed", `Voting on loan ${loanId} closed at height ${loan.votingDeadline}`);
      }
      const key = voteKey(loanId, voter);
      if (this.votes.has(key)) {
        throw new StateError("AlreadyVoted", `${voter} has already voted on loan ${loanId}`);
      }

      this.votes.set(key, approve);
      this.loans.set(loanKey(loanId), {
        ...loan,
        votesFor: approve ? loan.votesFor + 1 : loan.votesFor,
        votesAgainst: approve ? loan.votesAgainst : loan.votesAgainst + 1,
      });

      this.logger.debug({ loanId, voter, approve }, "Vote recorded");
      return true;
    });
  }

  /**
   * Close the vote after the deadline. Approval disburses the principal;
   * rejection returns the collateral. Anyone may finalize.
   */
  async finalizeLoan(caller: Identity, loanId: number): Promise<FinalizeOutcome> {
    return this.ledger.transaction("finalizeLoan", async () => {
      const loan = this.requireLoan(loanId);
      const { vault, pool, clock } = this.deps;
      if (clock.currentHeight() <= loan.votingDeadline) {
        throw new StateError(
          "VotingOpen",
          `Voting on loan ${loanId} is open until height ${loan.votingDeadline}`,
        );
      }
      requireStatus(loanId, loan.status, "pending");

      const tally = tallyVotes(loan.votesFor, loan.votesAgainst, this.approvalThreshold);

      if (tally.approved) {
        assertTransition(loanId, loan.status, "active");
        await vault.updateLoanStatus(this.operator, loanId, "active", loan.principal);
        const disbursed = await this.external("DisbursementFailed", "Disbursement", () =>
          pool.disburseFunds(loan.principal, loan.borrower),
        );
        if (!disbursed) {
          throw new ExternalFailure(
            "DisbursementFailed",
            `Pool refused to disburse ${loan.principal} for loan ${loanId}`,
          );
        }
        this.loans.set(loanKey(loanId), { ...loan, status: "active" });
        this.markActive(loan.borrower, loanId);
      } else {
        assertTransition(loanId, loan.status, "rejected");
        await vault.updateLoanStatus(this.operator, loanId, "rejected", loan.principal);
        await vault.releaseCollateral(this.operator, loanId);
        this.loans.set(loanKey(loanId), { ...loan, status: "rejected" });
      }

      const status = tally.approved ? "active" : "rejected";
      this.logger.info(
        {
          loanId,
          caller,
          status,
          votesFor: loan.votesFor,
          votesAgainst: loan.votesAgainst,
          approvalPct: tally.approvalPct,
        },
        "Loan finalized",
      );
      return {
        loanId,
        approved: tally.approved,
        status,
        votesFor: loan.votesFor,
        votesAgainst: loan.votesAgainst,
        approvalPct: tally.approvalPct,
      };
    });
  }

  /** Settle an active loan in full and release its collateral. */
  async repayLoan(caller: Identity, loanId: number, amount: bigint): Promise<RepaymentReceipt> {
    return this.ledger.transaction("repayLoan", async () => {
      const loan = this.requireLoan(loanId);
      const { vault, repayments } = this.deps;
      if (!sameIdentity(caller, loan.borrower)) {
        throw new AuthorizationError("NotAuthorized", `Only the borrower may repay loan ${loanId}`);
      }
      requireStatus(loanId, loan.status, "active");
      const amountDue = loan.principal + loan.interest;
      if (amount < amountDue) {
        throw new ValidationError(
          "InvalidAmount",
          `Repayment of ${amount} is below the ${amountDue} due; partial repayment is not supported`,
        );
      }

      const processed = await this.external("RepaymentFailed", "Repayment", () =>
        repayments.processRepayment(loanId, amount),
      );
      if (!processed) {
        throw new ExternalFailure("RepaymentFailed", `Repayment of loan ${loanId} was refused`);
      }

      assertTransition(loanId, loan.status, "repaid");
      await vault.updateLoanStatus(this.operator, loanId, "repaid", loan.principal);
      const release = await vault.releaseCollateral(this.operator, loanId);
      this.loans.set(loanKey(loanId), { ...loan, status: "repaid" });
      this.clearActive(loan.borrower, loanId);

      const excess = amount - amountDue;
      this.logger.info({ loanId, amountDue, amountPaid: amount, excess }, "Loan repaid");
      return {
        loanId,
        amountDue,
        amountPaid: amount,
        excess,
        collateralReleased: release.totalReleased,
      };
    });
  }

  /** Default an overdue active loan and liquidate its collateral. */
  async markLoanDefault(caller: Identity, loanId: number): Promise<LiquidationReceipt> {
    return this.ledger.transaction("markLoanDefault", async () => {
      const loan = this.requireLoan(loanId);
      const { vault, clock } = this.deps;
      const maturity = loan.startHeight + loan.duration;
      if (clock.currentHeight() <= maturity) {
        throw new StateError("NotDue", `Loan ${loanId} matures at height ${maturity}`);
      }
      requireStatus(loanId, loan.status, "active");

      assertTransition(loanId, loan.status, "defaulted");
      await vault.updateLoanStatus(this.operator, loanId, "defaulted", loan.principal);
      const receipt = await vault.liquidateCollateral(this.operator, loanId);
      this.loans.set(loanKey(loanId), { ...loan, status: "defaulted" });
      this.clearActive(loan.borrower, loanId);

      this.logger.warn(
        { loanId, caller, borrower: loan.borrower, liquidated: receipt.totalLiquidated },
        "Loan defaulted",
      );
      return receipt;
    });
  }

  // === Administration ===

  async setAuthority(caller: Identity, next: Identity): Promise<true> {
    return this.updateParams(caller, "setAuthority", () => ({ authority: next }));
  }

  async setMaxLoanAmount(caller: Identity, amount: bigint): Promise<true> {
    return this.updateParams(caller, "setMaxLoanAmount", () => {
      assertMaxAmount(amount);
      return { maxLoanAmount: amount };
    });
  }

  async setMaxLoanDuration(caller: Identity, duration: number): Promise<true> {
    return this.updateParams(caller, "setMaxLoanDuration", () => {
      assertMaxDuration(duration);
      return { maxLoanDuration: duration };
    });
  }

  async setMinCollateralRatio(caller: Identity, ratio: number): Promise<true> {
    return this.updateParams(caller, "setMinCollateralRatio", () => {
      assertLoanRatio(ratio);
      return { minCollateralRatio: ratio };
    });
  }

  // === Reads ===

  async getLoan(loanId: number): Promise<LoanRecord | null> {
    return this.ledger.read(() => {
      const loan = this.loans.get(loanKey(loanId));
      return loan ? { ...loan } : null;
    });
  }

  async hasActiveLoan(borrower: Identity): Promise<boolean> {
    return this.ledger.read(() => this.activeLoansOf(borrower).length > 0);
  }

  async getVote(loanId: number, voter: Identity): Promise<boolean | null> {
    return this.ledger.read(() => this.votes.get(voteKey(loanId, voter)) ?? null);
  }

  /** All loans, or one borrower's loans. A full scan. */
  async listLoans(borrower?: Identity): Promise<LoanRecord[]> {
    return this.ledger.read(() =>
      this.loans
        .values()
        .filter((loan) => borrower === undefined || sameIdentity(loan.borrower, borrower))
        .map((loan) => ({ ...loan })),
    );
  }

  async getNextLoanId(): Promise<number> {
    return this.ledger.read(() => this.counters.get(NEXT_ID_KEY) ?? 0);
  }

  async getParameters(): Promise<LoanBookParameters> {
    return this.ledger.read(() => ({ ...this.currentParams() }));
  }

  // === Internals ===

  private updateParams(
    caller: Identity,
    label: string,
    patch: () => Partial<LoanBookParameters>,
  ): Promise<true> {
    return this.ledger.transaction<true>(label, async () => {
      const params = this.currentParams();
      if (!sameIdentity(caller, params.authority)) {
        throw new AuthorizationError("NotAuthorized", `${caller} is not the loan book authority`);
      }
      const changes = patch();
      this.params.set(PARAMS_KEY, { ...params, ...changes });
      this.logger.info({ ...changes }, "Loan parameters updated");
      return true;
    });
  }

  private currentParams(): Readonly<LoanBookParameters> {
    const params = this.params.get(PARAMS_KEY);
    if (!params) throw new Error("Loan parameters missing from ledger");
    return params;
  }

  private activeLoansOf(borrower: Identity): readonly number[] {
    return this.activeByBorrower.get(borrowerKey(borrower)) ?? [];
  }

  private markActive(borrower: Identity, loanId: number): void {
    this.activeByBorrower.set(borrowerKey(borrower), [...this.activeLoansOf(borrower), loanId]);
  }

  private clearActive(borrower: Identity, loanId: number): void {
    const remaining = this.activeLoansOf(borrower).filter((id) => id !== loanId);
    if (remaining.length === 0) {
      this.activeByBorrower.delete(borrowerKey(borrower));
    } else {
      this.activeByBorrower.set(borrowerKey(borrower), remaining);
    }
  }

  private requireLoan(loanId: number): Readonly<LoanRecord> {
    const loan = this.loans.get(loanKey(loanId));
    if (!loan) throw new NotFoundError("LoanNotFound", `Loan ${loanId} not found`);
    return loan;
  }

  private async requireVerified(identity: Identity): Promise<void> {
    const verified = await this.external("RegistryFailed", "Identity lookup", () =>
      this.deps.registry.isVerified(identity),
    );
    if (!verified) {
      throw new AuthorizationError("NotVerified", `${identity} is not a verified user`);
    }
  }

  /**
   * Run a collaborator call, turning anything it throws into an
   * ExternalFailure. Protocol errors from joined vault calls pass through.
   */
  private async external<T>(code: ExternalCode, what: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof LendingProtocolError) throw error;
      this.logger.warn({ code, error }, `${what} failed`);
      throw new ExternalFailure(code, `${what} failed`, error);
    }
  }
}

function assertMaxAmount(amount: bigint): void {
  if (amount <= 0n) {
    throw new ValidationError("InvalidAmount", "Max loan amount must be greater than zero");
  }
}

function assertMaxDuration(duration: number): void {
  if (!Number.isInteger(duration) || duration <= 0) {
    throw new ValidationError("InvalidDuration", "Max loan duration must be a positive integer");
  }
}

function assertLoanRatio(ratio: number): void {
  if (!Number.isInteger(ratio) || ratio <= 100) {
    throw new ValidationError("InvalidRatio", `Collateral ratio ${ratio} must be an integer above 100`);
  }
}
