/**
 * Logging helper functions
 */

import type { LogLevel, LogLevelName, LogLevels } from './types';

/**
 * Format a duration in minutes for log output
 * @param value - Duration in minutes
 * @returns e.g. "49.3 min"
 */
export function fmtMinutes(value: number): string {
  return value.toFixed(1) + " min";
}

/**
 * Format an environmental reading with its unit
 * @param value - Reading value
 * @param unit - Unit suffix, e.g. "%" or "C"
 * @returns e.g. "25.0%"
 */
export function fmtReading(value: number, unit: string): string {
  return value.toFixed(1) + unit;
}

/**
 * Format log message with level tag
 *
 * Adds a prefix tag to the message based on log level:
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = "[DEBUG]    ";
  if (level === logLevels.INFO) tag = "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) tag = "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) tag = "🚨 [CRITICAL] ";

  return tag + msg;
}

/**
 * Check if message meets the current level threshold
 * @param level - Level of the message
 * @param currentLevel - Minimum level currently logged
 */
export function shouldLog(level: LogLevel, currentLevel: LogLevel): boolean {
  return level >= currentLevel;
}

/**
 * Resolve a level name (case-insensitive) to its numeric level
 * @param name - Level name such as "debug" or "WARNING"
 * @param logLevels - Log level constants object
 * @returns Numeric level, or null for an unknown name
 */
export function parseLogLevel(name: string, logLevels: LogLevels): LogLevel | null {
  const key = name.trim().toUpperCase();
  if (!isLogLevelName(key, logLevels)) {
    return null;
  }
  return logLevels[key];
}

function isLogLevelName(key: string, logLevels: LogLevels): key is LogLevelName {
  return Object.prototype.hasOwnProperty.call(logLevels, key);
}
