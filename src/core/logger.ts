/* eslint-disable no-console */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(v: string): v is LogLevel {
  return Object.hasOwn(LEVELS, v);
}

function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase().trim();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
}

function ts(): string {
  return new Date().toISOString();
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold();
}

export const logger = {
  debug: (msg: string, meta?: unknown) => {
    if (enabled("debug")) console.debug(`[${ts()}] [DEBUG] ${msg}`, meta ?? "");
  },
  info: (msg: string, meta?: unknown) => {
    if (enabled("info")) console.info(`[${ts()}] [INFO] ${msg}`, meta ?? "");
  },
  warn: (msg: string, meta?: unknown) => {
    if (enabled("warn")) console.warn(`[${ts()}] [WARN] ${msg}`, meta ?? "");
  },
  error: (msg: string, meta?: unknown) => {
    if (enabled("error")) console.error(`[${ts()}] [ERROR] ${msg}`, meta ?? "");
  }
};
