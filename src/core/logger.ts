/* eslint-disable no-console */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevelName(v: string): v is LogLevel | "silent" {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, v);
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLevelName(raw) ? LEVEL_WEIGHT[raw] : LEVEL_WEIGHT.info;
}

function ts(): string {
  return new Date().toISOString();
}

export type Logger = {
  debug: (msg: string, meta?: unknown) => void;
  info: (msg: string, meta?: unknown) => void;
  warn: (msg: string, meta?: unknown) => void;
  error: (msg: string, meta?: unknown) => void;
  child: (scope: string) => Logger;
};

function createLogger(scope?: string): Logger {
  const prefix = scope ? ` [${scope}]` : "";
  const write = (level: LogLevel, sink: (...args: unknown[]) => void) => (msg: string, meta?: unknown) => {
    if (LEVEL_WEIGHT[level] < threshold()) return;
    sink(`[${ts()}] [${level.toUpperCase()}]${prefix} ${msg}`, meta ?? "");
  };
  return {
    debug: write("debug", console.debug),
    info: write("info", console.info),
    warn: write("warn", console.warn),
    error: write("error", console.error),
    child: (childScope: string) => createLogger(scope ? `${scope}:${childScope}` : childScope)
  };
}

export const logger = createLogger();
