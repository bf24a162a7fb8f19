/**
 * Log level resolution helpers
 */

import { parseLogLevel, type LogLevel } from '@qprof/cli-core';

/**
 * Resolve log level from string input
 * Returns 'silent' for invalid or missing values
 */
export function resolveLogLevel(level: unknown): LogLevel {
  return parseLogLevel(level) ?? 'silent';
}
