import type { LogContext, LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: number = LEVEL_ORDER.warn;

/**
 * Set the lowest level that is written. `"silent"` drops everything.
 */
export function setLogLevel(level: LogLevel | "silent"): void {
  threshold = level === "silent" ? Number.POSITIVE_INFINITY : LEVEL_ORDER[level];
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold;
}

/**
 * Leveled logging helper.
 * Includes context like teamName, problemId and error code when relevant.
 * Every level goes to stderr; stdout carries scoreboard output only.
 */
export function log(
  level: LogLevel,
  message: string,
  context?: LogContext,
  scope = "scoreboard",
): void {
  if (!isLevelEnabled(level)) return;

  const timestamp = new Date().toISOString();
  const contextStr = context ? ` ${JSON.stringify(context)}` : "";
  console.error(`[${timestamp}] [${scope}] ${message}${contextStr}`);
}
