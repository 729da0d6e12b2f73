import type { PriceOracle } from "./types.js";

/**
 * Fixed unit prices per currency. A currency without a price throws, which
 * the vault reports as an oracle failure.
 */
export class StaticPriceOracle implements PriceOracle {
  private prices: Map<string, bigint>;

  constructor(prices: Record<string, bigint> = {}) {
    this.prices = new Map(Object.entries(prices));
  }

  setPrice(currency: string, price: bigint): void {
    if (price < 0n) throw new RangeError(`Price for ${currency} cannot be negative`);
    this.prices.set(currency, price);
  }

  async getPrice(currency: string, _amount: bigint): Promise<bigint> {
    const price = this.prices.get(currency);
    if (price === undefined) {
      throw new Error(`No price feed for ${currency}`);
    }
    return price;
  }
}
