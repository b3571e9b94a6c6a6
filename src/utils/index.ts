/**
 * Utility functions for the coach overlap cross-reference
 */

export { logger, createLogger, configureLogger, getLogLevel, isLogLevel } from './logger.js';
export type { Logger, LogLevel, LogStream } from './logger.js';

/**
 * Uppercase and collapse whitespace runs.
 * "  oregon   state " -> "OREGON STATE"
 */
export function cleanSchoolName(name: string): string {
  if (!name) return '';
  return name.toUpperCase().replace(/\s+/g, ' ').trim();
}

/**
 * Format decimal as percentage
 */
export function formatPercentage(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Describe an unknown thrown value for log output
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
