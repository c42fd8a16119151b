/**
 * Logger constants
 */

import type { LogLevel } from "@/types";

/** Priority per level; a message is printed when its level >= the active one */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Used when LOG_LEVEL is unset or not one of LOG_LEVELS */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
