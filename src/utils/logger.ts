// src/utils/logger.ts
import { config, type LogLevel } from "../config/env";

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return rank[level] >= rank[config.logLevel];
}

// accepts both logger.info("msg", extra) and logger.info({ fields }, "msg")
export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled("debug")) console.debug("[DEBUG]", ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) console.log("[INFO]", ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) console.warn("[WARN]", ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled("error")) console.error("[ERROR]", ...args);
  },
};
