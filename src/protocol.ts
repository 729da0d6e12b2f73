import type { MicroLendConfig } from "./config.js";
import {
  DEFAULT_COLLATERAL_CURRENCY,
  DEFAULT_POOL_ADDRESS,
  DEFAULT_VAULT_ADDRESS,
} from "./config.js";
import type {
  ChainClock,
  FundsPool,
  PriceOracle,
  Registry,
  RepaymentHandler,
  TokenTransfer,
} from "./external/types.js";
import { CollateralVault } from "./collateral/vault.js";
import { LoanManager } from "./loan/manager.js";
import { Ledger } from "./ledger/ledger.js";
import { createLogger } from "./logging/logger.js";
import { toIdentity, type Identity } from "./utils/identity.js";
import type { Logger } from "./logging/logger.js";
import type {
  CollateralDeposit,
  LiquidationReceipt,
  LoanCollateralSummary,
  VaultParameters,
} from "./collateral/types.js";
import type {
  FinalizeOutcome,
  LoanBookParameters,
  LoanRecord,
  LoanRequest,
  RepaymentReceipt,
} from "./loan/types.js";

export interface ProtocolCollaborators {
  oracle: PriceOracle;
  transfers: TokenTransfer;
  pool: FundsPool;
  registry: Registry;
  repayments: RepaymentHandler;
  clock: ChainClock;
}

export interface ProtocolRuntime {
  /** Share a ledger with collaborators that keep their own tables. */
  ledger?: Ledger;
  logger?: Logger;
}

export interface LoanPosition {
  loan: LoanRecord;
  collateral: LoanCollateralSummary | null;
  deposits: CollateralDeposit[];
}

export class MicroLendProtocol {
  readonly authority: Identity;
  private _vault: CollateralVault;
  private _loans: LoanManager;
  private _ledger: Ledger;
  private logger: Logger;

  constructor(
    config: MicroLendConfig,
    collaborators: ProtocolCollaborators,
    runtime: ProtocolRuntime = {},
  ) {
    this.logger = runtime.logger ?? createLogger({
      level: config.logLevel ?? "info",
      pretty: config.prettyLogs ?? false,
    });
    this._ledger = runtime.ledger ?? new Ledger(this.logger);

    this.authority = toIdentity(config.authority, "authority");
    const currency = config.collateralCurrency ?? DEFAULT_COLLATERAL_CURRENCY;

    // Unset: the collateral currency, bound to the authority
    const oracles: Record<string, Identity> = {};
    for (const [code, oracle] of Object.entries(config.oracles ?? { [currency]: this.authority })) {
      oracles[code] = toIdentity(oracle, `oracle for ${code}`);
    }

    this._vault = new CollateralVault(
      this._ledger,
      {
        oracle: collaborators.oracle,
        transfers: collaborators.transfers,
        clock: collaborators.clock,
      },
      {
        address: toIdentity(config.vaultAddress ?? DEFAULT_VAULT_ADDRESS, "vault address"),
        poolRecipient: toIdentity(config.poolAddress ?? DEFAULT_POOL_ADDRESS, "pool address"),
        authority: this.authority,
        minCollateralRatio: config.vaultMinCollateralRatio,
        maxCollateralPerLoan: config.maxCollateralPerLoan,
        liquidationPenalty: config.liquidationPenalty,
        oracles,
      },
      this.logger,
    );

    // The loan book acts on the vault as its authority.
    this._loans = new LoanManager(
      this._ledger,
      {
        vault: this._vault,
        pool: collaborators.pool,
        registry: collaborators.registry,
        repayments: collaborators.repayments,
        clock: collaborators.clock,
      },
      {
        operator: this.authority,
        authority: this.authority,
        collateralCurrency: currency,
        maxLoanAmount: config.maxLoanAmount,
        maxLoanDuration: config.maxLoanDuration,
        minCollateralRatio: config.loanMinCollateralRatio,
        votingPeriod: config.votingPeriod,
        approvalThreshold: config.approvalThreshold,
      },
      this.logger,
    );

    this.logger.info({ authority: this.authority, currency }, "Micro-lending protocol ready");
  }

  // === Loans ===

  async requestLoan(borrower: string, request: LoanRequest): Promise<number> {
    return this._loans.requestLoan(toIdentity(borrower, "borrower"), request);
  }

  async voteOnLoan(voter: string, loanId: number, approve: boolean): Promise<true> {
    return this._loans.voteOnLoan(toIdentity(voter, "voter"), loanId, approve);
  }

  async finalizeLoan(caller: string, loanId: number): Promise<FinalizeOutcome> {
    return this._loans.finalizeLoan(toIdentity(caller, "caller"), loanId);
  }

  async repayLoan(borrower: string, loanId: number, amount: bigint): Promise<RepaymentReceipt> {
    return this._loans.repayLoan(toIdentity(borrower, "borrower"), loanId, amount);
  }

  async markLoanDefault(caller: string, loanId: number): Promise<LiquidationReceipt> {
    return this._loans.markLoanDefault(toIdentity(caller, "caller"), loanId);
  }

  // === Collateral ===

  async depositCollateral(
    depositor: string,
    loanId: number,
    amount: bigint,
    currency: string,
  ): Promise<number> {
    return this._vault.depositCollateral(toIdentity(depositor, "depositor"), loanId, amount, currency);
  }

  async withdrawCollateral(
    depositor: string,
    loanId: number,
    collateralId: number,
    amount: bigint,
  ): Promise<true> {
    return this._vault.withdrawCollateral(toIdentity(depositor, "depositor"), loanId, collateralId, amount);
  }

  // === Reads ===

  /** A loan with its collateral, or null for an unknown id. */
  async getPosition(loanId: number): Promise<LoanPosition | null> {
    const loan = await this._loans.getLoan(loanId);
    if (!loan) return null;
    return {
      loan,
      collateral: await this._vault.getLoanCollateralSum(loanId),
      deposits: await this._vault.listCollateral(loanId),
    };
  }

  async getParameters(): Promise<{ vault: VaultParameters; loans: LoanBookParameters }> {
    return {
      vault: await this._vault.getParameters(),
      loans: await this._loans.getParameters(),
    };
  }

  // === Escape Hatches ===

  get vault(): CollateralVault {
    return this._vault;
  }

  get loans(): LoanManager {
    return this._loans;
  }

  get ledger(): Ledger {
    return this._ledger;
  }
}
