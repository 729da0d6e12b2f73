import { describe, it, expect } from "vitest";
import {
  approvalPct,
  collateralRatio,
  meetsRatio,
  minimumCollateral,
  percentOf,
  sumAmounts,
} from "../../src/utils/math.js";
import { sameIdentity, toIdentity } from "../../src/utils/identity.js";
import { ValidationError } from "../../src/utils/errors.js";

describe("collateral math", () => {
  it("computes the ratio in whole percent, truncated", () => {
    expect(collateralRatio(2000n, 1000n)).toBe(200n);
    expect(collateralRatio(1499n, 1000n)).toBe(149n);
    expect(collateralRatio(500n, 0n)).toBe(0n);
  });

  it("checks a ratio against a minimum", () => {
    expect(meetsRatio(1500n, 1000n, 150)).toBe(true);
    expect(meetsRatio(1499n, 1000n, 150)).toBe(false);
  });

  it("takes truncated percentages", () => {
    expect(percentOf(1999n, 5)).toBe(99n);
    expect(minimumCollateral(1000n, 150)).toBe(1500n);
    expect(minimumCollateral(333n, 150)).toBe(499n);
  });

  it("computes approval share and sums", () => {
    expect(approvalPct(1, 2)).toBe(33);
    expect(approvalPct(0, 0)).toBe(0);
    expect(sumAmounts([1n, 2n, 3n])).toBe(6n);
  });
});

describe("identities", () => {
  it("checksums addresses and compares them case-insensitively", () => {
    const lower = "0x52908400098527886e0f7030069857d2e4169ee7";
    const id = toIdentity(`  ${lower} `);
    expect(id).toBe("0x52908400098527886E0F7030069857D2E4169EE7");
    expect(sameIdentity(id, lower)).toBe(true);
  });

  it("rejects malformed addresses", () => {
    expect(() => toIdentity("0x1234", "borrower")).toThrow(ValidationError);
    expect(() => toIdentity("0x1234", "borrower")).toThrow(
      'Invalid borrower "0x1234". Expected a 0x-prefixed 40-hex address.',
    );
  });
});
