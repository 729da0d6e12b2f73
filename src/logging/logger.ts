import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

function hasPinoPretty(): boolean {
  try {
    import.meta.resolve("pino-pretty");
    return true;
  } catch {
    return false;
  }
}

export function createLogger(opts: { level?: LogLevel; pretty?: boolean; name?: string } = {}): Logger {
  return pino({
    name: opts.name ?? "microlend",
    level: opts.level ?? "info",
    // amounts are bigint; log them as decimal strings
    formatters: {
      log: (object) => stringifyBigInts(object),
    },
    transport: opts.pretty && hasPinoPretty()
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  });
}

function stringifyBigInts(object: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(object)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

export type Logger = pino.Logger;
