import { LOG_LEVEL_WEIGHT, type LogLevel } from "./types.js";

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  fatal: "fatal",
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_WEIGHT, value);
}

/** 解析级别字符串；无法识别时回退到 info，从不抛错 */
export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return "info";
  const key = value.trim().toLowerCase();
  return Object.hasOwn(LEVEL_ALIASES, key) ? LEVEL_ALIASES[key] : "info";
}

export function meetsThreshold(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVEL_WEIGHT[level] >= LOG_LEVEL_WEIGHT[threshold];
}
