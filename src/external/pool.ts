import type { Logger } from "../logging/logger.js";
import type { Ledger, Table } from "../ledger/ledger.js";
import type { Identity } from "../utils/identity.js";
import { sameIdentity } from "../utils/identity.js";
import {
  AuthorizationError,
  ExternalFailure,
  StateError,
  ValidationError,
} from "../utils/errors.js";
import type { ChainClock, FundsPool } from "./types.js";
import type { LedgerTokenBook } from "./token.js";

export const DEFAULT_POOL_PARAMETERS = {
  minContribution: 1_000n,
  maxContribution: 100_000n,
  withdrawalLockPeriod: 144,
  baseInterestRate: 2,
  blocksPerDay: 144,
} as const;

export interface LendingPoolOptions {
  /** Identity the pooled funds are held under. */
  address: Identity;
  admin: Identity;
  currency: string;
  minContribution?: bigint;
  maxContribution?: bigint;
  /** Blocks a contribution stays locked. */
  withdrawalLockPeriod?: number;
  /** Percent of principal charged per day of duration (1-10). */
  baseInterestRate?: number;
  blocksPerDay?: number;
}

export interface PoolParameters {
  admin: Identity;
  paused: boolean;
  minContribution: bigint;
  maxContribution: bigint;
  withdrawalLockPeriod: number;
  baseInterestRate: number;
}

export interface Contribution {
  amount: bigint;
  lastContributionHeight: number;
  lockedUntil: number;
}

const PARAMS_KEY = "current";

/**
 * Liquidity pool backed by the ledger token book. Lenders contribute and
 * withdraw after a lock period; the loan book draws disbursements from it
 * and liquidations and repayments flow back to its address.
 */
export class LedgerLendingPool implements FundsPool {
  readonly address: Identity;
  readonly currency: string;
  readonly blocksPerDay: number;
  private readonly params: Table<PoolParameters>;
  private readonly contributions: Table<Contribution>;
  private readonly logger: Logger;

  constructor(
    private readonly ledger: Ledger,
    private readonly deps: { tokens: LedgerTokenBook; clock: ChainClock },
    options: LendingPoolOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ module: "pool" });
    this.address = options.address;
    this.currency = options.currency;
    this.blocksPerDay = options.blocksPerDay ?? DEFAULT_POOL_PARAMETERS.blocksPerDay;
    if (!Number.isInteger(this.blocksPerDay) || this.blocksPerDay <= 0) {
      throw new ValidationError("InvalidDuration", "Blocks per day must be a positive integer");
    }
    this.params = ledger.table("pool.params");
    this.contributions = ledger.table("pool.contributions");

    const rate = options.baseInterestRate ?? DEFAULT_POOL_PARAMETERS.baseInterestRate;
    assertInterestRate(rate);
    this.params.set(PARAMS_KEY, {
      admin: options.admin,
      paused: false,
      minContribution: options.minContribution ?? DEFAULT_POOL_PARAMETERS.minContribution,
      maxContribution: options.maxContribution ?? DEFAULT_POOL_PARAMETERS.maxContribution,
      withdrawalLockPeriod: options.withdrawalLockPeriod ?? DEFAULT_POOL_PARAMETERS.withdrawalLockPeriod,
      baseInterestRate: rate,
    });
  }

  // === FundsPool ===

  async getAvailableFunds(): Promise<bigint> {
    return this.deps.tokens.balanceOf(this.address, this.currency);
  }

  /** `principal * rate * whole days / 100`, where a day is `blocksPerDay` blocks. */
  async calculateInterest(principal: bigint, durationBlocks: number): Promise<bigint> {
    return this.ledger.read(() => {
      const days = BigInt(Math.trunc(durationBlocks / this.blocksPerDay));
      return (principal * BigInt(this.current().baseInterestRate) * days) / 100n;
    });
  }

  async disburseFunds(amount: bigint, recipient: Identity): Promise<boolean> {
    return this.ledger.transaction("disburseFunds", async () => {
      if (this.current().paused) {
        this.logger.warn({ amount, recipient }, "Disbursement refused: pool paused");
        return false;
      }
      const ok = await this.deps.tokens.transfer(amount, this.address, recipient, this.currency);
      if (ok) this.logger.info({ amount, recipient }, "Funds disbursed");
      return ok;
    });
  }

  // === Lenders ===

  /** Returns the lender's new contribution total. */
  async contribute(caller: Identity, amount: bigint): Promise<bigint> {
    return this.ledger.transaction("contribute", async () => {
      const params = this.current();
      if (params.paused) throw new StateError("PoolPaused", "Pool is paused");
      if (amount <= 0n) {
        throw new ValidationError("ZeroAmount", "Contribution must be greater than zero");
      }
      if (amount < params.minContribution || amount > params.maxContribution) {
        throw new ValidationError(
          "InvalidAmount",
          `Contribution ${amount} out of range (${params.minContribution}-${params.maxContribution})`,
        );
      }
      const ok = await this.deps.tokens.transfer(amount, caller, this.address, this.currency);
      if (!ok) {
        throw new ExternalFailure("TransferFailed", `Transfer of ${amount} ${this.currency} into the pool was refused`);
      }

      const height = this.deps.clock.currentHeight();
      const total = (this.contributions.get(caller)?.amount ?? 0n) + amount;
      this.contributions.set(caller, {
        amount: total,
        lastContributionHeight: height,
        lockedUntil: height + params.withdrawalLockPeriod,
      });
      this.logger.info({ lender: caller, amount, total }, "Contribution received");
      return total;
    });
  }

  /** Returns the lender's remaining contribution. */
  async withdraw(caller: Identity, amount: bigint): Promise<bigint> {
    return this.ledger.transaction("withdraw", async () => {
      const contribution = this.contributions.get(caller);
      if (!contribution) {
        throw new ValidationError("WithdrawalExceeds", `${caller} has no contribution`);
      }
      if (this.current().paused) throw new StateError("PoolPaused", "Pool is paused");
      if (amount <= 0n) {
        throw new ValidationError("ZeroAmount", "Withdrawal must be greater than zero");
      }
      if (amount > contribution.amount) {
        throw new ValidationError(
          "WithdrawalExceeds",
          `Withdrawal of ${amount} exceeds contribution ${contribution.amount}`,
        );
      }
      const height = this.deps.clock.currentHeight();
      if (height < contribution.lockedUntil) {
        throw new StateError("WithdrawalLocked", `Contribution is locked until height ${contribution.lockedUntil}`);
      }

      const remaining = contribution.amount - amount;
      if (remaining > 0n) {
        this.contributions.set(caller, { ...contribution, amount: remaining });
      } else {
        this.contributions.delete(caller);
      }
      const ok = await this.deps.tokens.transfer(amount, this.address, caller, this.currency);
      if (!ok) {
        throw new ExternalFailure("TransferFailed", `Pool cannot pay out ${amount}; funds are lent out`);
      }
      this.logger.info({ lender: caller, amount, remaining }, "Contribution withdrawn");
      return remaining;
    });
  }

  async getContribution(lender: Identity): Promise<Contribution | null> {
    return this.ledger.read(() => {
      const contribution = this.contributions.get(lender);
      return contribution ? { ...contribution } : null;
    });
  }

  // === Administration ===

  async pause(caller: Identity): Promise<true> {
    return this.update(caller, "pause", () => ({ paused: true }));
  }

  async unpause(caller: Identity): Promise<true> {
    return this.update(caller, "unpause", () => ({ paused: false }));
  }

  async setBaseInterestRate(caller: Identity, rate: number): Promise<true> {
    return this.update(caller, "setBaseInterestRate", () => {
      assertInterestRate(rate);
      return { baseInterestRate: rate };
    });
  }

  async getParameters(): Promise<PoolParameters> {
    return this.ledger.read(() => ({ ...this.current() }));
  }

  private update(
    caller: Identity,
    label: string,
    patch: () => Partial<PoolParameters>,
  ): Promise<true> {
    return this.ledger.transaction<true>(label, async () => {
      const params = this.current();
      if (!sameIdentity(caller, params.admin)) {
        throw new AuthorizationError("NotAuthorized", `${caller} is not the pool admin`);
      }
      const changes = patch();
      this.params.set(PARAMS_KEY, { ...params, ...changes });
      this.logger.info({ ...changes }, "Pool parameters updated");
      return true;
    });
  }

  private current(): Readonly<PoolParameters> {
    const params = this.params.get(PARAMS_KEY);
    if (!params) throw new Error("Pool parameters missing from ledger");
    return params;
  }
}

function assertInterestRate(rate: number): void {
  if (!Number.isInteger(rate) || rate < 1 || rate > 10) {
    throw new ValidationError("InvalidInterestRate", `Interest rate ${rate} out of range (1-10)`);
  }
}
