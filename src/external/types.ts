import type { Identity } from "../utils/identity.js";

/**
 * Capabilities the engines consume. Production deployments supply their
 * own adapters; the implementations in this directory keep everything in
 * process memory.
 */

export interface PriceOracle {
  /** Unit price of `currency` for a quote of `amount` units. */
  getPrice(currency: string, amount: bigint): Promise<bigint>;
}

export interface TokenTransfer {
  /** Resolves false when the transfer was refused (e.g. short balance). */
  transfer(amount: bigint, from: Identity, to: Identity, currency: string): Promise<boolean>;
}

export interface FundsPool {
  getAvailableFunds(): Promise<bigint>;
  calculateInterest(principal: bigint, durationBlocks: number): Promise<bigint>;
  disburseFunds(amount: bigint, recipient: Identity): Promise<boolean>;
}

export interface Registry {
  isVerified(identity: Identity): Promise<boolean>;
  getAssetOwner(assetId: bigint): Promise<Identity | null>;
}

export interface RepaymentHandler {
  processRepayment(loanId: number, amount: bigint): Promise<boolean>;
}

export interface ChainClock {
  currentHeight(): number;
}
