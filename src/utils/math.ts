/**
 * Integer helpers. Every division truncates toward zero, matching the
 * fixed-point arithmetic the ratio checks depend on.
 */

/**
 * Collateral ratio in whole percent: `totalValue * 100 / referenceValue`.
 * A non-positive reference value yields 0.
 */
export function collateralRatio(totalValue: bigint, referenceValue: bigint): bigint {
  if (referenceValue <= 0n) return 0n;
  return (totalValue * 100n) / referenceValue;
}

/**
 * Whether a ratio meets a minimum expressed in whole percent.
 */
export function meetsRatio(
  totalValue: bigint,
  referenceValue: bigint,
  minRatioPct: number,
): boolean {
  return collateralRatio(totalValue, referenceValue) >= BigInt(minRatioPct);
}

/**
 * `value * pct / 100`, truncated.
 */
export function percentOf(value: bigint, pct: number): bigint {
  return (value * BigInt(pct)) / 100n;
}

/**
 * Smallest collateral amount a principal needs at a given ratio.
 */
export function minimumCollateral(principal: bigint, minRatioPct: number): bigint {
  return percentOf(principal, minRatioPct);
}

/**
 * Approval share of a tally in whole percent; 0 when nobody voted.
 */
export function approvalPct(votesFor: number, votesAgainst: number): number {
  const total = votesFor + votesAgainst;
  if (total === 0) return 0;
  return Math.trunc((votesFor * 100) / total);
}

/**
 * Sum a list of bigint amounts.
 */
export function sumAmounts(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) total += value;
  return total;
}
