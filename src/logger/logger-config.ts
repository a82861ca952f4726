/**
 * Logger configuration types and default values
 */

import type { LogLevel, LoggerConfig, Transport } from './types.js';

/**
 * Default log level for new loggers
 */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Log level hierarchy for comparison
 * Higher numbers indicate higher priority
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  critical: 5,
  none: 6
};

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: Readonly<Required<Omit<LoggerConfig, 'transports'>> & { transports: Transport[] }> = {
  level: DEFAULT_LOG_LEVEL,
  categoryLevels: {},
  transports: []
};

/**
 * Type guard for log level strings
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Merges user configuration with defaults
 *
 * @param userConfig - User-provided configuration
 * @returns Complete configuration with defaults applied
 */
export function mergeConfig(userConfig: LoggerConfig = {}): Required<LoggerConfig> {
  return {
    ...DEFAULT_LOGGER_CONFIG,
    ...userConfig,
    categoryLevels: {
      ...DEFAULT_LOGGER_CONFIG.categoryLevels,
      ...userConfig.categoryLevels
    },
    transports: userConfig.transports || [...DEFAULT_LOGGER_CONFIG.transports]
  };
}

/**
 * Checks if a log level should be processed based on current minimum level.
 * `none` on either side means nothing is processed.
 *
 * @param level - Log level to check
 * @param minLevel - Minimum log level configured
 * @returns True if log should be processed
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  if (level === 'none' || minLevel === 'none') {
    return false;
  }
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}
