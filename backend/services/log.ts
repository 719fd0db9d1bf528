// backend/services/log.ts
import type { LogLevel } from "./config";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(ORDER, value);
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

export interface Log {
  debug(msg: string, ...details: unknown[]): void;
  info(msg: string, ...details: unknown[]): void;
  warn(msg: string, ...details: unknown[]): void;
  error(msg: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel) {
  return ORDER[level] >= ORDER[threshold];
}

export function createLog(scope: string): Log {
  const prefix = `[${scope}]`;
  return {
    debug: (msg, ...details) => { if (enabled("debug")) console.debug(`${prefix} ${msg}`, ...details); },
    info: (msg, ...details) => { if (enabled("info")) console.log(`${prefix} ${msg}`, ...details); },
    warn: (msg, ...details) => { if (enabled("warn")) console.warn(`${prefix} ${msg}`, ...details); },
    error: (msg, ...details) => { if (enabled("error")) console.error(`${prefix} ${msg}`, ...details); },
  };
}

export function log(msg: string) {
  createLog("services").info(msg);
}
