import type { MicroLendConfig } from "./config.js";
import { DEFAULT_COLLATERAL_CURRENCY, DEFAULT_POOL_ADDRESS } from "./config.js";
import { MicroLendProtocol } from "./protocol.js";
import { Ledger } from "./ledger/ledger.js";
import { createLogger, type Logger } from "./logging/logger.js";
import { ManualClock } from "./external/clock.js";
import { StaticPriceOracle } from "./external/oracle.js";
import { InMemoryRegistry } from "./external/registry.js";
import { LedgerTokenBook } from "./external/token.js";
import { LedgerLendingPool, type LendingPoolOptions } from "./external/pool.js";
import { LedgerRepaymentHandler } from "./external/repayment.js";
import { toIdentity } from "./utils/identity.js";

export interface SandboxOptions {
  logger?: Logger;
  /** Starting block height. Default: 0. */
  height?: number;
  /** Unit prices per currency. Default: the collateral currency at 1. */
  prices?: Record<string, bigint>;
  pool?: Omit<LendingPoolOptions, "address" | "admin" | "currency">;
}

export interface Sandbox {
  protocol: MicroLendProtocol;
  ledger: Ledger;
  tokens: LedgerTokenBook;
  pool: LedgerLendingPool;
  oracle: StaticPriceOracle;
  registry: InMemoryRegistry;
  repayments: LedgerRepaymentHandler;
  clock: ManualClock;
  logger: Logger;
}

/**
 * A protocol wired to in-process collaborators that share its ledger, so
 * token movements roll back with the operation that made them. The
 * authority also administers the pool.
 */
export function createSandbox(config: MicroLendConfig, options: SandboxOptions = {}): Sandbox {
  const logger = options.logger ?? createLogger({
    level: config.logLevel ?? "info",
    pretty: config.prettyLogs ?? false,
  });
  const ledger = new Ledger(logger);
  const clock = new ManualClock(options.height ?? 0);
  const currency = config.collateralCurrency ?? DEFAULT_COLLATERAL_CURRENCY;
  const oracle = new StaticPriceOracle(options.prices ?? { [currency]: 1n });
  const registry = new InMemoryRegistry();
  const tokens = new LedgerTokenBook(ledger, logger);

  const pool = new LedgerLendingPool(
    ledger,
    { tokens, clock },
    {
      ...options.pool,
      address: toIdentity(config.poolAddress ?? DEFAULT_POOL_ADDRESS, "pool address"),
      admin: toIdentity(config.authority, "authority"),
      currency,
    },
    logger,
  );

  let protocol: MicroLendProtocol | undefined;
  const repayments = new LedgerRepaymentHandler(
    ledger,
    {
      tokens,
      clock,
      payee: pool.address,
      currency,
      payerOf: async (loanId) => {
        const loan = await protocol?.loans.getLoan(loanId);
        return loan?.borrower ?? null;
      },
    },
    logger,
  );

  protocol = new MicroLendProtocol(
    config,
    { oracle, transfers: tokens, pool, registry, repayments, clock },
    { ledger, logger },
  );

  return { protocol, ledger, tokens, pool, oracle, registry, repayments, clock, logger };
}
