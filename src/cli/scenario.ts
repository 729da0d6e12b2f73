import { z } from "zod";
import { createSandbox, type Sandbox } from "../sandbox.js";
import type { Logger } from "../logging/logger.js";
import type { LoanRecord } from "../loan/types.js";
import { toIdentity, type Identity } from "../utils/identity.js";
import { describeError, isLendingError } from "../utils/errors.js";

/**
 * Scenario files drive a sandbox through a list of steps, e.g.
 *
 *   {
 *     "config": { "authority": "0x...", "votingPeriod": 10 },
 *     "steps": [
 *       { "op": "mint", "to": "0x...", "amount": "5000" },
 *       { "op": "request", "caller": "0x...", "amount": "1000", "duration": 30,
 *         "assetId": "1", "collateral": "1500" },
 *       { "op": "finalize", "loanId": 0, "expectError": "VotingOpen" }
 *     ]
 *   }
 *
 * Amounts and asset ids may be JSON integers or decimal strings.
 */

const amount = z
  .union([z.number().int(), z.string().regex(/^-?\d+$/, "must be an integer or a decimal string")])
  .transform((value) => BigInt(value));
const count = z.number().int().nonnegative();
const text = z.string().min(1);
const caller = text.optional();
const expectError = text.optional();

const StepSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("mint"), to: text, amount, currency: text.optional(), expectError }),
  z.object({ op: z.literal("verify"), identities: z.array(text), expectError }),
  z.object({ op: z.literal("setAssetOwner"), assetId: amount, owner: text, expectError }),
  z.object({ op: z.literal("setPrice"), currency: text, price: amount, expectError }),
  z.object({ op: z.literal("advance"), blocks: count, expectError }),
  z.object({ op: z.literal("contribute"), caller, amount, expectError }),
  z.object({
    op: z.literal("request"),
    caller,
    amount,
    duration: count,
    assetId: amount,
    collateral: amount,
    expectError,
  }),
  z.object({ op: z.literal("vote"), caller, loanId: count, approve: z.boolean(), expectError }),
  z.object({ op: z.literal("finalize"), caller, loanId: count, expectError }),
  z.object({ op: z.literal("repay"), caller, loanId: count, amount, expectError }),
  z.object({ op: z.literal("default"), caller, loanId: count, expectError }),
  z.object({ op: z.literal("deposit"), caller, loanId: count, amount, currency: text.optional(), expectError }),
  z.object({ op: z.literal("withdraw"), caller, loanId: count, collateralId: count, amount, expectError }),
]);

const ConfigSchema = z.object({
  authority: text.optional(),
  vaultAddress: text.optional(),
  poolAddress: text.optional(),
  collateralCurrency: text.optional(),
  oracles: z.record(text).optional(),
  vaultMinCollateralRatio: count.optional(),
  maxCollateralPerLoan: amount.optional(),
  liquidationPenalty: count.optional(),
  maxLoanAmount: amount.optional(),
  maxLoanDuration: count.optional(),
  loanMinCollateralRatio: count.optional(),
  votingPeriod: count.optional(),
  approvalThreshold: count.optional(),
});

const ScenarioSchema = z.object({
  config: ConfigSchema.default({}),
  prices: z.record(amount).optional(),
  height: count.optional(),
  steps: z.array(StepSchema),
});

export type ScenarioStep = z.infer<typeof StepSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;

export interface StepOutcome {
  index: number;
  op: ScenarioStep["op"];
  ok: boolean;
  /** Whether the outcome matched `expectError` (or success when unset). */
  expected: boolean;
  result?: unknown;
  error?: { code: string; message: string };
}

export interface ScenarioReport {
  passed: boolean;
  height: number;
  poolBalance: bigint;
  steps: StepOutcome[];
  loans: LoanRecord[];
}

// === Parsing ===

function formatPath(path: (string | number)[]): string {
  if (path.length === 0) return "scenario";
  return path
    .map((part, i) => (typeof part === "number" ? `[${part}]` : i === 0 ? part : `.${part}`))
    .join("");
}

export function parseScenario(raw: unknown): Scenario {
  const parsed = ScenarioSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`);
    throw new Error(`Invalid scenario: ${issues.join("; ")}`);
  }
  return parsed.data;
}

// === Running ===

export interface RunOptions {
  /** Caller for steps that name none. */
  defaultCaller?: Identity;
  logger?: Logger;
}

/**
 * Run every step against a fresh sandbox. A failing step is recorded and
 * the run continues; each step is atomic, so it leaves no partial state.
 */
export async function runScenario(scenario: Scenario, options: RunOptions = {}): Promise<ScenarioReport> {
  const authority = scenario.config.authority ?? options.defaultCaller;
  if (!authority) {
    throw new Error("Scenario config needs an authority (or run with a key)");
  }
  const sandbox = createSandbox(
    { ...scenario.config, authority },
    { logger: options.logger, height: scenario.height, prices: scenario.prices },
  );

  const steps: StepOutcome[] = [];
  for (const [index, step] of scenario.steps.entries()) {
    let outcome: StepOutcome;
    try {
      const result = await runStep(sandbox, step, index, options.defaultCaller);
      outcome = { index, op: step.op, ok: true, expected: step.expectError === undefined, result };
    } catch (error) {
      const code = isLendingError(error) ? error.code : error instanceof Error ? error.name : "Error";
      outcome = {
        index,
        op: step.op,
        ok: false,
        expected: step.expectError === code,
        error: { code, message: describeError(error) },
      };
    }
    steps.push(outcome);
  }

  const { protocol, pool, clock } = sandbox;
  return {
    passed: steps.every((s) => s.expected),
    height: clock.currentHeight(),
    poolBalance: await pool.getAvailableFunds(),
    steps,
    loans: await protocol.loans.listLoans(),
  };
}

async function runStep(
  sandbox: Sandbox,
  step: ScenarioStep,
  index: number,
  defaultCaller: Identity | undefined,
): Promise<unknown> {
  const { protocol, tokens, registry, oracle, pool, clock } = sandbox;
  const currency = protocol.loans.collateralCurrency;
  const callerOf = (raw: string | undefined): Identity => {
    if (raw !== undefined) return toIdentity(raw, "caller");
    if (defaultCaller) return defaultCaller;
    throw new Error(`steps[${index}] (${step.op}) names no caller and no key was given`);
  };

  switch (step.op) {
    case "mint":
      return tokens.mint(toIdentity(step.to, "recipient"), step.currency ?? currency, step.amount);
    case "verify":
      registry.verify(...step.identities.map((id) => toIdentity(id)));
      return step.identities.length;
    case "setAssetOwner":
      registry.setAssetOwner(step.assetId, toIdentity(step.owner, "owner"));
      return true;
    case "setPrice":
      oracle.setPrice(step.currency, step.price);
      return true;
    case "advance":
      return clock.advance(step.blocks);
    case "contribute":
      return pool.contribute(callerOf(step.caller), step.amount);
    case "request":
      return protocol.requestLoan(callerOf(step.caller), {
        amount: step.amount,
        duration: step.duration,
        assetId: step.assetId,
        collateralAmount: step.collateral,
      });
    case "vote":
      return protocol.voteOnLoan(callerOf(step.caller), step.loanId, step.approve);
    case "finalize":
      return protocol.finalizeLoan(callerOf(step.caller), step.loanId);
    case "repay":
      return protocol.repayLoan(callerOf(step.caller), step.loanId, step.amount);
    case "default":
      return protocol.markLoanDefault(callerOf(step.caller), step.loanId);
    case "deposit":
      return protocol.depositCollateral(callerOf(step.caller), step.loanId, step.amount, step.currency ?? currency);
    case "withdraw":
      return protocol.withdrawCollateral(callerOf(step.caller), step.loanId, step.collateralId, step.amount);
  }
}
