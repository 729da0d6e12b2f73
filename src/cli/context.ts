import { privateKeyToAccount } from "viem/accounts";
import type { LogLevel } from "../logging/logger.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { Identity } from "../utils/identity.js";

export interface CliContext {
  logger: Logger;
  /** Address of the configured key; the default caller for scenario steps. */
  caller: Identity | undefined;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function isPrivateKey(value: string): value is `0x${string}` {
  return /^0x[0-9a-fA-F]{64}$/.test(value);
}

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((l) => l === raw);
  if (raw !== undefined && !level) {
    throw new Error(`Invalid log level "${raw}". Expected one of: ${LOG_LEVELS.join(", ")}`);
  }
  return level ?? "warn";
}

/**
 * Resolve the CLI caller and logger from options.
 */
export function createContext(opts: {
  key?: string;
  keyEnv?: string;
  logLevel?: string;
}): CliContext {
  const keyEnv = opts.keyEnv ?? "MICROLEND_PRIVATE_KEY";
  const keyFromCli = opts.key?.trim();
  const keyFromEnv = process.env[keyEnv]?.trim();
  const resolvedKey = keyFromCli || keyFromEnv;

  if (keyFromCli) {
    console.error(
      "Warning: --key exposes secrets in shell history/process listings. Prefer environment variables.",
    );
  }

  let caller: Identity | undefined;
  if (resolvedKey) {
    if (!isPrivateKey(resolvedKey)) {
      throw new Error(
        `Invalid private key format. Expected a 0x-prefixed 64-hex string (source: ${keyFromCli ? "--key" : keyEnv})`,
      );
    }
    caller = privateKeyToAccount(resolvedKey).address;
  }

  const level = parseLogLevel(opts.logLevel);
  return {
    logger: createLogger({ level, pretty: level !== "silent" }),
    caller,
  };
}
