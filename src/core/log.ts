import { pino, destination, type Logger } from "pino";

export type { Logger };
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly string[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

function moduleName(module: string | ImportMeta): string {
  const url = typeof module === "string" ? module : module.url;
  const base = url.slice(url.lastIndexOf("/") + 1);
  const dot = base.indexOf(".");
  return dot > 0 ? base.slice(0, dot) : base;
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let rootLogger: Logger | undefined;

// stdout belongs to the MCP stdio transport, so everything goes to stderr.
function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: levelFromEnv(), base: { service: "sgecompat-gateway" } }, destination(2));
  }
  return rootLogger;
}

/**
 * Logger for one module; call `getLog(import.meta)` near the top of the file.
 */
export function getLog(module: string | ImportMeta): Logger {
  return getRootLogger().child({ module: moduleName(module) });
}
