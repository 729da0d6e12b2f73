import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { createContext } from "./context.js";
import { output, formatTable, type Cell } from "./output.js";
import { parseScenario, runScenario } from "./scenario.js";
import {
  DEFAULT_LOAN_PARAMETERS,
  DEFAULT_VAULT_PARAMETERS,
  MAX_DEPOSITS_PER_LOAN,
  MAX_LIQUIDATION_PENALTY,
  VAULT_RATIO_BOUNDS,
} from "../config.js";
import { DEFAULT_POOL_PARAMETERS } from "../external/pool.js";
import { minimumCollateral } from "../utils/math.js";

interface ProgramOptions {
  key?: string;
  keyEnv?: string;
  logLevel?: string;
  json?: boolean;
}

export function parseAmount(raw: string, label: string): bigint {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`Invalid ${label} "${raw}". Expected a non-negative integer.`);
  }
  return BigInt(raw.trim());
}

export function parsePositiveInt(raw: string, label: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${label} "${raw}". Expected a positive integer.`);
  }
  return value;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name("microlend")
    .description("Collateralized micro-lending: parameters, collateral math and scenario runs")
    .version("0.1.0")
    .option("--key <hex>", "Private key (hex) whose address is the default caller")
    .option(
      "--key-env <name>",
      "Environment variable for private key (recommended)",
      "MICROLEND_PRIVATE_KEY",
    )
    .option("--log-level <level>", "Log level", "warn")
    .option("--json", "Output as JSON", false);

  program
    .command("params")
    .description("Show default protocol parameters and bounds")
    .action(() => {
      const opts = program.opts<ProgramOptions>();
      const params = {
        vault: {
          ...DEFAULT_VAULT_PARAMETERS,
          ratioBounds: VAULT_RATIO_BOUNDS,
          maxLiquidationPenalty: MAX_LIQUIDATION_PENALTY,
          maxDepositsPerLoan: MAX_DEPOSITS_PER_LOAN,
        },
        loans: DEFAULT_LOAN_PARAMETERS,
        pool: DEFAULT_POOL_PARAMETERS,
      };
      if (opts.json) {
        output(params, true);
        return;
      }
      const rows: Cell[][] = [];
      for (const [section, values] of Object.entries(params)) {
        for (const [name, value] of Object.entries(values)) {
          rows.push([section, name, typeof value === "object" ? `${value.min}-${value.max}` : value]);
        }
      }
      console.log(formatTable(["Engine", "Parameter", "Value"], rows));
    });

  program
    .command("min-collateral")
    .description("Smallest collateral a principal needs at a ratio")
    .argument("<principal>", "Loan principal")
    .option("-r, --ratio <pct>", "Collateral ratio in percent", String(DEFAULT_LOAN_PARAMETERS.minCollateralRatio))
    .action((principalRaw: string, cmdOpts: { ratio: string }) => {
      const opts = program.opts<ProgramOptions>();
      const principal = parseAmount(principalRaw, "principal");
      const ratio = parsePositiveInt(cmdOpts.ratio, "ratio");
      const required = minimumCollateral(principal, ratio);
      if (opts.json) {
        output({ principal, ratio, minimumCollateral: required }, true);
        return;
      }
      console.log(`Principal ${principal} at ${ratio}% needs collateral of at least ${required}`);
    });

  program
    .command("simulate")
    .description("Run a scenario file against an in-memory sandbox")
    .argument("<scenario>", "Path to a scenario JSON file")
    .action(async (file: string) => {
      const opts = program.opts<ProgramOptions>();
      const ctx = createContext(opts);
      const scenario = parseScenario(JSON.parse(await readFile(file, "utf8")));
      const report = await runScenario(scenario, { defaultCaller: ctx.caller, logger: ctx.logger });
      if (!report.passed) process.exitCode = 1;

      if (opts.json) {
        output(report, true);
        return;
      }

      console.log(formatTable(
        ["#", "Op", "Result", "Detail"],
        report.steps.map((s) => [
          s.index,
          s.op,
          s.ok ? "ok" : s.error?.code ?? "error",
          s.expected ? "" : s.ok ? "expected an error" : s.error?.message ?? "",
        ]),
      ));

      console.log(`\nLoans at height ${report.height} (pool balance ${report.poolBalance}):`);
      if (report.loans.length === 0) {
        console.log("  none");
      }
      for (const loan of report.loans) {
        console.log(
          `  #${loan.loanId} ${loan.status.toUpperCase()} ${loan.principal} + ${loan.interest} interest | collateral ${loan.collateralAmount} ${loan.collateralCurrency} | votes ${loan.votesFor}/${loan.votesAgainst} | borrower ${loan.borrower}`,
        );
      }
      console.log(report.passed ? "\nScenario passed" : "\nScenario FAILED");
    });

  return program;
}
