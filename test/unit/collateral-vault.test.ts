import { describe, it, expect } from "vitest";
import { makeVault, expectCode } from "../fixtures/harness.js";
import { AUTHORITY, BORROWER, BORROWER_2, ORACLE, POOL, STRANGER, VAULT } from "../fixtures/identities.js";

describe("CollateralVault deposits", () => {
  it("records a deposit priced against the loan's reference value", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);

    const id = await vault.depositCollateral(BORROWER, 0, 2000n, "A");

    expect(id).toBe(0);
    expect(await vault.getLoanCollateralSum(0)).toEqual({
      loanId: 0,
      totalAmount: 2000n,
      totalValue: 2000n,
      depositCount: 1,
    });
    expect(await vault.getCollateral(0, 0)).toEqual({
      loanId: 0,
      collateralId: 0,
      amount: 2000n,
      currency: "A",
      depositedAtHeight: 10,
      depositor: BORROWER,
      locked: false,
    });
    expect(transfers.transfer).toHaveBeenCalledWith(2000n, BORROWER, VAULT, "A");
  });

  it("values deposits at amount times the oracle price", async () => {
    const { vault, oracle } = makeVault({ prices: { B: 3n } });
    await vault.updateLoanStatus(AUTHORITY, 4, "active", 1000n);
    await vault.depositCollateral(BORROWER, 4, 500n, "B");

    expect(oracle.getPrice).toHaveBeenCalledWith("B", 500n);
    expect((await vault.getLoanCollateralSum(4))?.totalValue).toBe(1500n);
  });

  it("rejects a deposit that leaves the ratio below the minimum without consuming an id", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);

    await expectCode(vault.depositCollateral(BORROWER, 0, 1000n, "A"), "RatioBelowThreshold");
    expect(transfers.transfer).not.toHaveBeenCalled();
    expect(await vault.getLoanCollateralSum(0)).toBeNull();

    expect(await vault.depositCollateral(BORROWER, 0, 1500n, "A")).toBe(0);
  });

  it("validates amount, currency and loan before pricing", async () => {
    const { vault, oracle } = makeVault();
    await expectCode(vault.depositCollateral(BORROWER, 0, 0n, "A"), "ZeroAmount");
    await expectCode(vault.depositCollateral(BORROWER, 0, 100n, "ZZZ"), "InvalidCurrency");
    await expectCode(vault.depositCollateral(BORROWER, 0, 100n, "A"), "LoanNotFound");
    expect(oracle.getPrice).not.toHaveBeenCalled();
  });

  it("enforces the per-loan collateral limit", async () => {
    const { vault } = makeVault();
    await vault.setMaxCollateralPerLoan(AUTHORITY, 3000n);
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");

    await expectCode(vault.depositCollateral(BORROWER, 0, 1500n, "A"), "CollateralLimitExceeded");
    expect((await vault.getLoanCollateralSum(0))?.totalAmount).toBe(2000n);
  });

  it("caps a loan at 100 deposits", async () => {
    const { vault } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1n);
    for (let i = 0; i < 100; i++) {
      await vault.depositCollateral(BORROWER, 0, 2n, "A");
    }

    await expectCode(vault.depositCollateral(BORROWER, 0, 2n, "A"), "MaxCollateralExceeded");
    expect(await vault.getLoanCollateralSum(0)).toEqual({
      loanId: 0,
      totalAmount: 200n,
      totalValue: 200n,
      depositCount: 100,
    });
  });

  it("leaves no deposit when the transfer in is refused", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    transfers.transfer.mockResolvedValueOnce(false);

    await expectCode(vault.depositCollateral(BORROWER, 0, 2000n, "A"), "TransferFailed");
    expect(await vault.listCollateral(0)).toEqual([]);
    expect(await vault.getLoanCollateralSum(0)).toBeNull();
  });

  it("reports a throwing oracle as an external failure", async () => {
    const { vault, oracle } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    oracle.getPrice.mockRejectedValueOnce(new Error("feed down"));

    await expectCode(vault.depositCollateral(BORROWER, 0, 2000n, "A"), "OracleFailed");
  });
});

describe("CollateralVault withdrawals", () => {
  it("rejects a withdrawal larger than the deposit and changes nothing", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");

    await expectCode(vault.withdrawCollateral(BORROWER, 0, 0, 2500n), "WithdrawalExceeds");
    expect((await vault.getCollateral(0, 0))?.amount).toBe(2000n);
    expect(await vault.getLoanCollateralSum(0)).toEqual({
      loanId: 0,
      totalAmount: 2000n,
      totalValue: 2000n,
      depositCount: 1,
    });
    expect(transfers.transfer).toHaveBeenCalledTimes(1);
  });

  it("pays out a partial withdrawal that keeps the ratio", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 3000n, "A");

    await expect(vault.withdrawCollateral(BORROWER, 0, 0, 1000n)).resolves.toBe(true);
    expect(transfers.transfer).toHaveBeenLastCalledWith(1000n, VAULT, BORROWER, "A");
    expect((await vault.getCollateral(0, 0))?.amount).toBe(2000n);
    expect((await vault.getLoanCollateralSum(0))?.totalValue).toBe(2000n);

    await expectCode(vault.withdrawCollateral(BORROWER, 0, 0, 600n), "RatioBelowThreshold");
  });

  it("removes a fully withdrawn deposit", async () => {
    const { vault } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");
    await vault.depositCollateral(BORROWER, 0, 1000n, "A");

    await vault.withdrawCollateral(BORROWER, 0, 1, 1000n);

    expect(await vault.getCollateral(0, 1)).toBeNull();
    expect(await vault.getLoanCollateralSum(0)).toEqual({
      loanId: 0,
      totalAmount: 2000n,
      totalValue: 2000n,
      depositCount: 1,
    });
    // ids are never reused
    expect(await vault.depositCollateral(BORROWER, 0, 10n, "A")).toBe(2);
  });

  it("only lets the depositor withdraw an unlocked deposit of an active loan", async () => {
    const { vault } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 3000n, "A");

    await expectCode(vault.withdrawCollateral(STRANGER, 0, 0, 100n), "NotAuthorized");
    await expectCode(vault.withdrawCollateral(BORROWER, 0, 7, 100n), "CollateralNotFound");

    await expectCode(vault.lockCollateral(STRANGER, 0, 0), "NotAuthorized");
    await vault.lockCollateral(AUTHORITY, 0, 0);
    await expectCode(vault.withdrawCollateral(BORROWER, 0, 0, 100n), "CollateralLocked");
    await vault.unlockCollateral(AUTHORITY, 0, 0);

    await vault.updateLoanStatus(AUTHORITY, 0, "pending", 1000n);
    await expectCode(vault.withdrawCollateral(BORROWER, 0, 0, 100n), "InvalidStatus");
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await expectCode(vault.withdrawCollateral(BORROWER, 0, 0, 0n), "ZeroAmount");
    await expect(vault.withdrawCollateral(BORROWER, 0, 0, 100n)).resolves.toBe(true);
  });
});

describe("CollateralVault release", () => {
  it("returns every deposit to its depositor, one transfer per depositor and currency", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");
    await vault.depositCollateral(BORROWER_2, 0, 1000n, "A");
    await vault.depositCollateral(BORROWER, 0, 500n, "B");
    await vault.depositCollateral(BORROWER, 0, 100n, "A");
    await vault.lockCollateral(AUTHORITY, 0, 1);

    await expectCode(vault.releaseCollateral(AUTHORITY, 0), "InvalidStatus");
    await vault.updateLoanStatus(AUTHORITY, 0, "repaid", 1000n);
    await expectCode(vault.releaseCollateral(STRANGER, 0), "NotAuthorized");

    const receipt = await vault.releaseCollateral(AUTHORITY, 0);

    expect(receipt).toEqual({
      loanId: 0,
      totalReleased: 3600n,
      transfers: [
        { to: BORROWER, currency: "A", amount: 2100n },
        { to: BORROWER_2, currency: "A", amount: 1000n },
        { to: BORROWER, currency: "B", amount: 500n },
      ],
    });
    expect(transfers.transfer).toHaveBeenCalledTimes(7);
    expect(await vault.listCollateral(0)).toEqual([]);
    expect(await vault.getLoanCollateralSum(0)).toEqual({
      loanId: 0,
      totalAmount: 0n,
      totalValue: 0n,
      depositCount: 0,
    });
    expect(await vault.getLoanStatus(0)).toBeNull();
  });
});

describe("CollateralVault liquidation", () => {
  it("moves the whole collateral to the pool once and clears the loan", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");
    await vault.updateLoanStatus(AUTHORITY, 0, "defaulted", 1000n);

    const receipt = await vault.liquidateCollateral(AUTHORITY, 0);

    expect(receipt).toEqual({
      loanId: 0,
      totalLiquidated: 2000n,
      totalValue: 2000n,
      penaltyValue: 100n,
      recipient: POOL,
      transfers: [{ to: POOL, currency: "A", amount: 2000n }],
    });
    const toPool = transfers.transfer.mock.calls.filter(([, , to]) => to === POOL);
    expect(toPool).toEqual([[2000n, VAULT, POOL, "A"]]);
    expect(await vault.listCollateral(0)).toEqual([]);

    await expectCode(vault.liquidateCollateral(AUTHORITY, 0), "LoanNotFound");
  });

  it("requires the authority, a defaulted loan and some collateral", async () => {
    const { vault } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");

    await expectCode(vault.liquidateCollateral(STRANGER, 0), "NotAuthorized");
    await expectCode(vault.liquidateCollateral(AUTHORITY, 0), "InvalidStatus");

    await vault.updateLoanStatus(AUTHORITY, 1, "defaulted", 1000n);
    await expectCode(vault.liquidateCollateral(AUTHORITY, 1), "InsufficientCollateral");
  });

  it("keeps the collateral when the transfer to the pool is refused", async () => {
    const { vault, transfers } = makeVault();
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");
    await vault.updateLoanStatus(AUTHORITY, 0, "defaulted", 1000n);
    transfers.transfer.mockResolvedValueOnce(false);

    await expectCode(vault.liquidateCollateral(AUTHORITY, 0), "TransferFailed");
    expect(await vault.listCollateral(0)).toHaveLength(1);
    expect((await vault.getLoanStatus(0))?.status).toBe("defaulted");
  });
});

describe("CollateralVault administration", () => {
  it("bounds the minimum ratio, the limit and the penalty", async () => {
    const { vault } = makeVault();
    await expectCode(vault.setMinCollateralRatio(AUTHORITY, 99), "InvalidRatio");
    await expectCode(vault.setMinCollateralRatio(AUTHORITY, 301), "InvalidRatio");
    await expectCode(vault.setMinCollateralRatio(STRANGER, 200), "NotAuthorized");
    await expectCode(vault.setMaxCollateralPerLoan(AUTHORITY, 0n), "InvalidAmount");
    await expectCode(vault.setLiquidationPenalty(AUTHORITY, 11), "InvalidPenalty");

    await vault.setMinCollateralRatio(AUTHORITY, 200);
    await vault.setLiquidationPenalty(AUTHORITY, 0);
    expect(await vault.getParameters()).toEqual({
      authority: AUTHORITY,
      minCollateralRatio: 200,
      maxCollateralPerLoan: 1_000_000n,
      liquidationPenalty: 0,
    });
  });

  it("hands authority over", async () => {
    const { vault } = makeVault();
    await vault.setAuthority(AUTHORITY, STRANGER);
    await expectCode(vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n), "NotAuthorized");
    await expect(vault.updateLoanStatus(STRANGER, 0, "active", 1000n)).resolves.toBe(true);
  });

  it("binds and unbinds currency oracles", async () => {
    const { vault } = makeVault();
    await expectCode(vault.setCurrencyOracle(AUTHORITY, "A-B", ORACLE), "InvalidCurrency");
    await vault.setCurrencyOracle(AUTHORITY, "C", ORACLE);
    expect(await vault.getCurrencyOracle("C")).toBe(ORACLE);

    expect(await vault.removeCurrencyOracle(AUTHORITY, "C")).toBe(true);
    expect(await vault.removeCurrencyOracle(AUTHORITY, "C")).toBe(false);
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await expectCode(vault.depositCollateral(BORROWER, 0, 2000n, "C"), "InvalidCurrency");
  });

  it("rejects a non-positive reference value", async () => {
    const { vault } = makeVault();
    await expectCode(vault.updateLoanStatus(AUTHORITY, 0, "active", 0n), "InvalidAmount");
  });

  it("reports whether a loan meets the minimum ratio", async () => {
    const { vault } = makeVault();
    expect(await vault.isOverCollateralized(0)).toBe(false);
    await vault.updateLoanStatus(AUTHORITY, 0, "active", 1000n);
    await vault.depositCollateral(BORROWER, 0, 2000n, "A");
    expect(await vault.isOverCollateralized(0)).toBe(true);

    await vault.setMinCollateralRatio(AUTHORITY, 250);
    expect(await vault.isOverCollateralized(0)).toBe(false);
  });
});
