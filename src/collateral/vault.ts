import type { Logger } from "../logging/logger.js";
import type { Ledger, Table } from "../ledger/ledger.js";
import type { ChainClock, PriceOracle, TokenTransfer } from "../external/types.js";
import { isLoanStatus, type LoanStatus } from "../loan/status.js";
import type { Identity } from "../utils/identity.js";
import { sameIdentity } from "../utils/identity.js";
import { collateralRatio, meetsRatio, percentOf, sumAmounts } from "../utils/math.js";
import {
  AuthorizationError,
  ExternalFailure,
  InvariantViolation,
  NotFoundError,
  StateError,
  ValidationError,
} from "../utils/errors.js";
import {
  DEFAULT_VAULT_PARAMETERS,
  MAX_DEPOSITS_PER_LOAN,
  MAX_LIQUIDATION_PENALTY,
  VAULT_RATIO_BOUNDS,
} from "../config.js";
import type {
  CollateralDeposit,
  CollateralTransfer,
  LiquidationReceipt,
  LoanCollateralSummary,
  LoanStatusRecord,
  ReleaseReceipt,
  VaultParameters,
} from "./types.js";

export interface VaultCollaborators {
  oracle: PriceOracle;
  transfers: TokenTransfer;
  clock: ChainClock;
}

export interface CollateralVaultOptions {
  /** Custody identity deposits are transferred to. */
  address: Identity;
  /** Recipient of liquidated collateral. */
  poolRecipient: Identity;
  authority: Identity;
  minCollateralRatio?: number;
  maxCollateralPerLoan?: bigint;
  liquidationPenalty?: number;
  /** Initial oracle bindings, currency → oracle identity. */
  oracles?: Record<string, Identity>;
}

const CURRENCY_PATTERN = /^[A-Za-z0-9]{1,12}$/;
const PARAMS_KEY = "current";

const loanKey = (loanId: number) => String(loanId);
const depositKey = (loanId: number, collateralId: number) => `${loanId}:${collateralId}`;
const depositPrefix = (loanId: number) => `${loanId}:`;

/**
 * CollateralVault owns per-loan collateral: deposits, the aggregate
 * summary, lock flags and the status record the ratio is measured against.
 *
 * Every mutating call runs in one ledger transaction and performs all of
 * its checks before the first transfer, so a failed call leaves no trace:
 *
 *   deposit:   checks → price → ratio → transfer in → rows + summary
 *   withdraw:  checks → price → ratio → rows + summary → transfer out
 *   release:   authority → status → transfers back to depositors → clear
 *   liquidate: authority → status → transfers to pool → clear
 *
 * The ratio is `totalValue * 100 / referenceValue`, truncated.
 */
export class CollateralVault {
  readonly address: Identity;
  readonly poolRecipient: Identity;
  private readonly deposits: Table<CollateralDeposit>;
  private readonly summaries: Table<LoanCollateralSummary>;
  private readonly statuses: Table<LoanStatusRecord>;
  private readonly oracleBindings: Table<Identity>;
  private readonly nextIds: Table<number>;
  private readonly params: Table<VaultParameters>;
  private readonly logger: Logger;

  constructor(
    private readonly ledger: Ledger,
    private readonly deps: VaultCollaborators,
    options: CollateralVaultOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ module: "collateral" });
    this.address = options.address;
    this.poolRecipient = options.poolRecipient;

    this.deposits = ledger.table("vault.deposits");
    this.summaries = ledger.table("vault.summaries");
    this.statuses = ledger.table("vault.statuses");
    this.oracleBindings = ledger.table("vault.oracles");
    this.nextIds = ledger.table("vault.next-ids");
    this.params = ledger.table("vault.params");

    const initial: VaultParameters = {
      authority: options.authority,
      minCollateralRatio: options.minCollateralRatio ?? DEFAULT_VAULT_PARAMETERS.minCollateralRatio,
      maxCollateralPerLoan: options.maxCollateralPerLoan ?? DEFAULT_VAULT_PARAMETERS.maxCollateralPerLoan,
      liquidationPenalty: options.liquidationPenalty ?? DEFAULT_VAULT_PARAMETERS.liquidationPenalty,
    };
    assertVaultRatio(initial.minCollateralRatio);
    assertMaxPerLoan(initial.maxCollateralPerLoan);
    assertPenalty(initial.liquidationPenalty);
    this.params.set(PARAMS_KEY, initial);

    for (const [currency, oracle] of Object.entries(options.oracles ?? {})) {
      assertCurrencyCode(currency);
      this.oracleBindings.set(currency, oracle);
    }
  }

  // === Collateral movements ===

  /** Deposit `amount` of `currency` against a registered loan. Returns the new collateral id. */
  async depositCollateral(
    caller: Identity,
    loanId: number,
    amount: bigint,
    currency: string,
  ): Promise<number> {
    return this.ledger.transaction("depositCollateral", async () => {
      if (amount <= 0n) {
        throw new ValidationError("ZeroAmount", "Collateral amount must be greater than zero");
      }
      if (!this.oracleBindings.has(currency)) {
        throw new ValidationError("InvalidCurrency", `Currency ${currency} is not supported`);
      }
      const status = this.requireStatusRecord(loanId);

      const collateralId = this.nextIds.get(loanKey(loanId)) ?? 0;
      if (collateralId >= MAX_DEPOSITS_PER_LOAN) {
        throw new InvariantViolation(
          "MaxCollateralExceeded",
          `Loan ${loanId} already holds the maximum of ${MAX_DEPOSITS_PER_LOAN} deposits`,
        );
      }

      const params = this.currentParams();
      const price = await this.priceOf(currency, amount);
      const current = this.summaryOf(loanId);
      const totalValue = current.totalValue + amount * price;
      const totalAmount = current.totalAmount + amount;

      this.assertRatio(loanId, totalValue, status.referenceValue, params.minCollateralRatio);
      if (totalAmount > params.maxCollateralPerLoan) {
        throw new InvariantViolation(
          "CollateralLimitExceeded",
          `Loan ${loanId} collateral would reach ${totalAmount}, above the ${params.maxCollateralPerLoan} limit`,
        );
      }

      await this.move(amount, caller, this.address, currency);

      this.deposits.set(depositKey(loanId, collateralId), {
        loanId,
        collateralId,
        amount,
        currency,
        depositedAtHeight: this.deps.clock.currentHeight(),
        depositor: caller,
        locked: false,
      });
      this.nextIds.set(loanKey(loanId), collateralId + 1);
      this.summaries.set(loanKey(loanId), {
        loanId,
        totalAmount,
        totalValue,
        depositCount: current.depositCount + 1,
      });

      this.logger.info(
        { loanId, collateralId, amount, currency, depositor: caller },
        "Collateral deposited",
      );
      return collateralId;
    });
  }

  /** Withdraw part or all of one deposit while the loan is active. */
  async withdrawCollateral(
    caller: Identity,
    loanId: number,
    collateralId: number,
    amount: bigint,
  ): Promise<true> {
    return this.ledger.transaction<true>("withdrawCollateral", async () => {
      const deposit = this.requireDeposit(loanId, collateralId);
      if (!sameIdentity(caller, deposit.depositor)) {
        throw new AuthorizationError(
          "NotAuthorized",
          `Only the depositor may withdraw collateral ${loanId}/${collateralId}`,
        );
      }
      if (deposit.locked) {
        throw new StateError("CollateralLocked", `Collateral ${loanId}/${collateralId} is locked`);
      }
      const status = this.statuses.get(loanKey(loanId));
      if (!status || status.status !== "active") {
        throw new StateError(
          "InvalidStatus",
          `Collateral can only be withdrawn from an active loan (loan ${loanId} is ${status?.status ?? "unregistered"})`,
        );
      }
      if (amount <= 0n) {
        throw new ValidationError("ZeroAmount", "Withdrawal amount must be greater than zero");
      }
      if (amount > deposit.amount) {
        throw new ValidationError(
          "WithdrawalExceeds",
          `Withdrawal of ${amount} exceeds deposit balance ${deposit.amount}`,
        );
      }

      const params = this.currentParams();
      const price = await this.priceOf(deposit.currency, amount);
      const withdrawnValue = amount * price;
      const current = this.summaryOf(loanId);
      if (withdrawnValue > current.totalValue) {
        throw new InvariantViolation(
          "RatioBelowThreshold",
          `Withdrawal value ${withdrawnValue} exceeds the value held for loan ${loanId}`,
        );
      }
      const totalValue = current.totalValue - withdrawnValue;
      this.assertRatio(loanId, totalValue, status.referenceValue, params.minCollateralRatio);

      const remaining = deposit.amount - amount;
      if (remaining === 0n) {
        this.deposits.delete(depositKey(loanId, collateralId));
      } else {
        this.deposits.set(depositKey(loanId, collateralId), { ...deposit, amount: remaining });
      }
      this.summaries.set(loanKey(loanId), {
        loanId,
        totalAmount: current.totalAmount - amount,
        totalValue,
        depositCount: remaining === 0n ? current.depositCount - 1 : current.depositCount,
      });

      await this.move(amount, this.address, deposit.depositor, deposit.currency);

      this.logger.info(
        { loanId, collateralId, amount, remaining, depositor: deposit.depositor },
        "Collateral withdrawn",
      );
      return true;
    });
  }

  /**
   * Return every live deposit of a rejected or repaid loan to its
   * depositor, locked ones included, then clear the loan's records.
   */
  async releaseCollateral(caller: Identity, loanId: number): Promise<ReleaseReceipt> {
    return this.ledger.transaction("releaseCollateral", async () => {
      this.requireAuthority(caller);
      const status = this.requireStatusRecord(loanId);
      if (status.status !== "rejected" && status.status !== "repaid") {
        throw new StateError(
          "InvalidStatus",
          `Collateral for loan ${loanId} can only be released once it is rejected or repaid (is ${status.status})`,
        );
      }

      const grouped = new Map<string, CollateralTransfer>();
      for (const [, deposit] of this.deposits.scan(depositPrefix(loanId))) {
        const key = `${deposit.depositor}|${deposit.currency}`;
        const entry = grouped.get(key);
        if (entry) {
          entry.amount += deposit.amount;
        } else {
          grouped.set(key, { to: deposit.depositor, currency: deposit.currency, amount: deposit.amount });
        }
      }

      const transfers = [...grouped.values()];
      for (const t of transfers) {
        await this.move(t.amount, this.address, t.to, t.currency);
      }
      const totalReleased = sumAmounts(transfers.map((t) => t.amount));
      this.clearLoan(loanId);

      this.logger.info(
        { loanId, totalReleased, transfers: transfers.length },
        "Collateral released",
      );
      return { loanId, totalReleased, transfers };
    });
  }

  /**
   * Move a defaulted loan's entire collateral to the pool recipient.
   * Terminal: the status record is deleted, so a second call fails.
   */
  async liquidateCollateral(caller: Identity, loanId: number): Promise<LiquidationReceipt> {
    return this.ledger.transaction("liquidateCollateral", async () => {
      this.requireAuthority(caller);
      const status = this.requireStatusRecord(loanId);
      if (status.status !== "defaulted") {
        throw new StateError(
          "InvalidStatus",
          `Loan ${loanId} must be defaulted before liquidation (is ${status.status})`,
        );
      }
      const summary = this.summaries.get(loanKey(loanId));
      if (!summary || summary.totalAmount === 0n) {
        throw new InvariantViolation("InsufficientCollateral", `Loan ${loanId} holds no collateral`);
      }

      const byCurrency = new Map<string, bigint>();
      for (const [, deposit] of this.deposits.scan(depositPrefix(loanId))) {
        byCurrency.set(deposit.currency, (byCurrency.get(deposit.currency) ?? 0n) + deposit.amount);
      }
      const transfers: CollateralTransfer[] = [...byCurrency.entries()].map(
        ([currency, amount]) => ({ to: this.poolRecipient, currency, amount }),
      );
      for (const t of transfers) {
        await this.move(t.amount, this.address, t.to, t.currency);
      }

      const { liquidationPenalty } = this.currentParams();
      const penaltyValue = percentOf(summary.totalValue, liquidationPenalty);
      this.clearLoan(loanId);

      this.logger.info(
        {
          loanId,
          totalLiquidated: summary.totalAmount,
          totalValue: summary.totalValue,
          penaltyValue,
          recipient: this.poolRecipient,
        },
        "Collateral liquidated",
      );
      return {
        loanId,
        totalLiquidated: summary.totalAmount,
        totalValue: summary.totalValue,
        penaltyValue,
        recipient: this.poolRecipient,
        transfers,
      };
    });
  }

  // === Authority operations ===

  async lockCollateral(caller: Identity, loanId: number, collateralId: number): Promise<true> {
    return this.setLocked(caller, loanId, collateralId, true);
  }

  async unlockCollateral(caller: Identity, loanId: number, collateralId: number): Promise<true> {
    return this.setLocked(caller, loanId, collateralId, false);
  }

  async updateLoanStatus(
    caller: Identity,
    loanId: number,
    status: LoanStatus,
    referenceValue: bigint,
  ): Promise<true> {
    return this.ledger.transaction<true>("updateLoanStatus", async () => {
      this.requireAuthority(caller);
      if (!isLoanStatus(status)) {
        throw new ValidationError("UnknownStatus", `Unknown loan status "${String(status)}"`);
      }
      if (referenceValue <= 0n) {
        throw new ValidationError("InvalidAmount", "Reference value must be greater than zero");
      }
      this.statuses.set(loanKey(loanId), {
        loanId,
        status,
        referenceValue,
        lastUpdatedHeight: this.deps.clock.currentHeight(),
      });
      this.logger.debug({ loanId, status, referenceValue }, "Loan status recorded");
      return true;
    });
  }

  async setAuthority(caller: Identity, next: Identity): Promise<true> {
    return this.updateParams(caller, "setAuthority", () => ({ authority: next }));
  }

  async setMinCollateralRatio(caller: Identity, ratio: number): Promise<true> {
    return this.updateParams(caller, "setMinCollateralRatio", () => {
      assertVaultRatio(ratio);
      return { minCollateralRatio: ratio };
    });
  }

  async setMaxCollateralPerLoan(caller: Identity, max: bigint): Promise<true> {
    return this.updateParams(caller, "setMaxCollateralPerLoan", () => {
      assertMaxPerLoan(max);
      return { maxCollateralPerLoan: max };
    });
  }

  async setLiquidationPenalty(caller: Identity, penalty: number): Promise<true> {
    return this.updateParams(caller, "setLiquidationPenalty", () => {
      assertPenalty(penalty);
      return { liquidationPenalty: penalty };
    });
  }

  async setCurrencyOracle(caller: Identity, currency: string, oracle: Identity): Promise<true> {
    return this.ledger.transaction<true>("setCurrencyOracle", async () => {
      this.requireAuthority(caller);
      assertCurrencyCode(currency);
      this.oracleBindings.set(currency, oracle);
      this.logger.info({ currency, oracle }, "Oracle bound");
      return true;
    });
  }

  /** Unbind a currency. Existing deposits in it are then priced at zero. */
  async removeCurrencyOracle(caller: Identity, currency: string): Promise<boolean> {
    return this.ledger.transaction("removeCurrencyOracle", async () => {
      this.requireAuthority(caller);
      const removed = this.oracleBindings.delete(currency);
      if (removed) this.logger.info({ currency }, "Oracle unbound");
      return removed;
    });
  }

  // === Reads ===

  async getCollateral(loanId: number, collateralId: number): Promise<CollateralDeposit | null> {
    return this.ledger.read(() => {
      const deposit = this.deposits.get(depositKey(loanId, collateralId));
      return deposit ? { ...deposit } : null;
    });
  }

  async listCollateral(loanId: number): Promise<CollateralDeposit[]> {
    return this.ledger.read(() =>
      this.deposits.scan(depositPrefix(loanId)).map(([, deposit]) => ({ ...deposit })),
    );
  }

  async getLoanCollateralSum(loanId: number): Promise<LoanCollateralSummary | null> {
    return this.ledger.read(() => {
      const summary = this.summaries.get(loanKey(loanId));
      return summary ? { ...summary } : null;
    });
  }

  async getLoanStatus(loanId: number): Promise<LoanStatusRecord | null> {
    return this.ledger.read(() => {
      const status = this.statuses.get(loanKey(loanId));
      return status ? { ...status } : null;
    });
  }

  async getCurrencyOracle(currency: string): Promise<Identity | null> {
    return this.ledger.read(() => this.oracleBindings.get(currency) ?? null);
  }

  async getParameters(): Promise<VaultParameters> {
    return this.ledger.read(() => ({ ...this.currentParams() }));
  }

  /** False when the loan has no summary or no status record. */
  async isOverCollateralized(loanId: number): Promise<boolean> {
    return this.ledger.read(() => {
      const summary = this.summaries.get(loanKey(loanId));
      const status = this.statuses.get(loanKey(loanId));
      if (!summary || !status) return false;
      return meetsRatio(summary.totalValue, status.referenceValue, this.currentParams().minCollateralRatio);
    });
  }

  // === Internals ===

  private setLocked(
    caller: Identity,
    loanId: number,
    collateralId: number,
    locked: boolean,
  ): Promise<true> {
    return this.ledger.transaction<true>(locked ? "lockCollateral" : "unlockCollateral", async () => {
      this.requireAuthority(caller);
      const deposit = this.requireDeposit(loanId, collateralId);
      this.deposits.set(depositKey(loanId, collateralId), { ...deposit, locked });
      this.logger.info({ loanId, collateralId, locked }, locked ? "Collateral locked" : "Collateral unlocked");
      return true;
    });
  }

  private updateParams(
    caller: Identity,
    label: string,
    patch: () => Partial<VaultParameters>,
  ): Promise<true> {
    return this.ledger.transaction<true>(label, async () => {
      this.requireAuthority(caller);
      const changes = patch();
      this.params.set(PARAMS_KEY, { ...this.currentParams(), ...changes });
      this.logger.info({ ...changes }, "Vault parameters updated");
      return true;
    });
  }

  private currentParams(): Readonly<VaultParameters> {
    const params = this.params.get(PARAMS_KEY);
    if (!params) throw new Error("Vault parameters missing from ledger");
    return params;
  }

  private requireAuthority(caller: Identity): void {
    if (!sameIdentity(caller, this.currentParams().authority)) {
      throw new AuthorizationError("NotAuthorized", `${caller} is not the vault authority`);
    }
  }

  private requireStatusRecord(loanId: number): Readonly<LoanStatusRecord> {
    const status = this.statuses.get(loanKey(loanId));
    if (!status) {
      throw new NotFoundError("LoanNotFound", `Loan ${loanId} is not registered with the vault`);
    }
    return status;
  }

  private requireDeposit(loanId: number, collateralId: number): Readonly<CollateralDeposit> {
    const deposit = this.deposits.get(depositKey(loanId, collateralId));
    if (!deposit) {
      throw new NotFoundError("CollateralNotFound", `Collateral ${loanId}/${collateralId} not found`);
    }
    return deposit;
  }

  private summaryOf(loanId: number): LoanCollateralSummary {
    const summary = this.summaries.get(loanKey(loanId));
    return summary
      ? { ...summary }
      : { loanId, totalAmount: 0n, totalValue: 0n, depositCount: 0 };
  }

  private assertRatio(
    loanId: number,
    totalValue: bigint,
    referenceValue: bigint,
    minRatio: number,
  ): void {
    const ratio = collateralRatio(totalValue, referenceValue);
    if (ratio < BigInt(minRatio)) {
      throw new InvariantViolation(
        "RatioBelowThreshold",
        `Collateral ratio for loan ${loanId} would be ${ratio}%, below the ${minRatio}% minimum`,
      );
    }
  }

  /** Unit price of a currency; unbound currencies are worth zero. */
  private async priceOf(currency: string, amount: bigint): Promise<bigint> {
    if (!this.oracleBindings.has(currency)) return 0n;
    let price: bigint;
    try {
      price = await this.deps.oracle.getPrice(currency, amount);
    } catch (error) {
      this.logger.warn({ currency, error }, "Price lookup failed");
      throw new ExternalFailure("OracleFailed", `Price lookup for ${currency} failed`, error);
    }
    if (price < 0n) {
      throw new ExternalFailure("OracleFailed", `Oracle returned a negative price for ${currency}`);
    }
    return price;
  }

  private async move(amount: bigint, from: Identity, to: Identity, currency: string): Promise<void> {
    let ok: boolean;
    try {
      ok = await this.deps.transfers.transfer(amount, from, to, currency);
    } catch (error) {
      this.logger.warn({ amount, from, to, currency, error }, "Transfer threw");
      throw new ExternalFailure("TransferFailed", `Transfer of ${amount} ${currency} failed`, error);
    }
    if (!ok) {
      throw new ExternalFailure(
        "TransferFailed",
        `Transfer of ${amount} ${currency} from ${from} to ${to} was refused`,
      );
    }
  }

  private clearLoan(loanId: number): void {
    for (const [key] of this.deposits.scan(depositPrefix(loanId))) {
      this.deposits.delete(key);
    }
    this.summaries.set(loanKey(loanId), { loanId, totalAmount: 0n, totalValue: 0n, depositCount: 0 });
    this.statuses.delete(loanKey(loanId));
  }
}

function assertVaultRatio(ratio: number): void {
  if (!Number.isInteger(ratio) || ratio < VAULT_RATIO_BOUNDS.min || ratio > VAULT_RATIO_BOUNDS.max) {
    throw new ValidationError(
      "InvalidRatio",
      `Collateral ratio ${ratio} out of range (${VAULT_RATIO_BOUNDS.min}-${VAULT_RATIO_BOUNDS.max})`,
    );
  }
}

function assertMaxPerLoan(max: bigint): void {
  if (max <= 0n) {
    throw new ValidationError("InvalidAmount", "Max collateral per loan must be greater than zero");
  }
}

function assertPenalty(penalty: number): void {
  if (!Number.isInteger(penalty) || penalty < 0 || penalty > MAX_LIQUIDATION_PENALTY) {
    throw new ValidationError(
      "InvalidPenalty",
      `Liquidation penalty ${penalty} out of range (0-${MAX_LIQUIDATION_PENALTY})`,
    );
  }
}

function assertCurrencyCode(currency: string): void {
  if (!CURRENCY_PATTERN.test(currency)) {
    throw new ValidationError("InvalidCurrency", `Invalid currency code "${currency}"`);
  }
}
