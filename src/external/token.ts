import type { Logger } from "../logging/logger.js";
import type { Ledger, Table } from "../ledger/ledger.js";
import type { Identity } from "../utils/identity.js";
import { ValidationError } from "../utils/errors.js";
import type { TokenTransfer } from "./types.js";

const balanceKey = (owner: Identity, currency: string) => `${currency}:${owner}`;

/**
 * Multi-currency balances kept in a ledger table. Transfers made inside a
 * protocol operation are undone with it when the operation fails.
 */
export class LedgerTokenBook implements TokenTransfer {
  private readonly balances: Table<bigint>;
  private readonly logger: Logger;

  constructor(
    private readonly ledger: Ledger,
    logger: Logger,
  ) {
    this.balances = ledger.table("tokens.balances");
    this.logger = logger.child({ module: "tokens" });
  }

  async mint(to: Identity, currency: string, amount: bigint): Promise<bigint> {
    return this.ledger.transaction("mint", async () => {
      if (amount <= 0n) {
        throw new ValidationError("ZeroAmount", "Minted amount must be greater than zero");
      }
      const next = this.current(to, currency) + amount;
      this.balances.set(balanceKey(to, currency), next);
      this.logger.debug({ to, currency, amount }, "Minted");
      return next;
    });
  }

  async balanceOf(owner: Identity, currency: string): Promise<bigint> {
    return this.ledger.read(() => this.current(owner, currency));
  }

  async transfer(amount: bigint, from: Identity, to: Identity, currency: string): Promise<boolean> {
    return this.ledger.transaction("transfer", async () => {
      if (amount <= 0n) return false;
      const available = this.current(from, currency);
      if (available < amount) {
        this.logger.debug({ from, currency, amount, available }, "Transfer refused: short balance");
        return false;
      }
      this.balances.set(balanceKey(from, currency), available - amount);
      this.balances.set(balanceKey(to, currency), this.current(to, currency) + amount);
      this.logger.debug({ from, to, currency, amount }, "Transferred");
      return true;
    });
  }

  private current(owner: Identity, currency: string): bigint {
    return this.balances.get(balanceKey(owner, currency)) ?? 0n;
  }
}
