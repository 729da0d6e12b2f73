import type { Logger } from "../logging/logger.js";
import type { Ledger, Table } from "../ledger/ledger.js";
import type { Identity } from "../utils/identity.js";
import type { ChainClock, RepaymentHandler } from "./types.js";
import type { LedgerTokenBook } from "./token.js";

export interface RepaymentRecord {
  loanId: number;
  payer: Identity;
  amount: bigint;
  height: number;
}

export interface RepaymentHandlerOptions {
  tokens: LedgerTokenBook;
  clock: ChainClock;
  /** Receives repayments, excess included. */
  payee: Identity;
  currency: string;
  /** Who pays for a loan; null when the loan is unknown. */
  payerOf: (loanId: number) => Promise<Identity | null>;
}

/** Collects repayments from the borrower into the pool. */
export class LedgerRepaymentHandler implements RepaymentHandler {
  private readonly repayments: Table<RepaymentRecord>;
  private readonly logger: Logger;

  constructor(
    private readonly ledger: Ledger,
    private readonly options: RepaymentHandlerOptions,
    logger: Logger,
  ) {
    this.repayments = ledger.table("repayments.records");
    this.logger = logger.child({ module: "repayments" });
  }

  async processRepayment(loanId: number, amount: bigint): Promise<boolean> {
    return this.ledger.transaction("processRepayment", async () => {
      const { tokens, clock, payee, currency, payerOf } = this.options;
      const payer = await payerOf(loanId);
      if (!payer) return false;
      const ok = await tokens.transfer(amount, payer, payee, currency);
      if (!ok) {
        this.logger.warn({ loanId, payer, amount }, "Repayment transfer refused");
        return false;
      }
      this.repayments.set(String(loanId), { loanId, payer, amount, height: clock.currentHeight() });
      this.logger.info({ loanId, payer, amount }, "Repayment collected");
      return true;
    });
  }

  async getRepayment(loanId: number): Promise<RepaymentRecord | null> {
    return this.ledger.read(() => {
      const record = this.repayments.get(String(loanId));
      return record ? { ...record } : null;
    });
  }
}
