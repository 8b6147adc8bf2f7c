/**
 * Logging
 *
 * tslog-based logger factory shared by the sandbox, tools and CLI.
 */

import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export type LogLevelName = "silly" | "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogOutputType = "pretty" | "json" | "hidden";

/**
 * Parse a level given by name ("debug") or number ("2").
 * Returns undefined for empty or unknown values.
 */
export function parseLogLevel(value?: string): number | undefined {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

export interface LoggerOptions {
  /**
   * 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /** @default "pretty" */
  type?: LogOutputType;

  /** @default "sandbox-fs" */
  name?: string;
}

/**
 * Create a logger. Level priority: options, then SANDBOX_FS_LOG_LEVEL, then warn.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "sandbox-fs:cli", minLevel: 2 });
 * const silent = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.SANDBOX_FS_LOG_LEVEL);
  const type = options.type ?? "pretty";

  return new Logger<ILogObj>({
    name: options.name ?? "sandbox-fs",
    minLevel: options.minLevel ?? envMinLevel ?? 4,
    type,
    hideLogPositionForProduction: type !== "pretty",
    prettyLogTemplate:
      type === "pretty"
        ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}} {{logLevelName}} [{{name}}] "
        : undefined,
  });
}

/**
 * Default logger instance. Pass your own to override.
 */
export const defaultLogger = createLogger();
