/**
 * Shared error handling for CLI commands
 */

import type { DebugLogger } from "../utils/debug-logger.js";
import { formatErrorLine } from "../utils/error.js";

/**
 * Print a command failure and exit with status 1.
 * With a debug logger, the full error and stack go to the log file.
 */
export const exitWithError = (
  error: unknown,
  logger?: DebugLogger,
  context?: string
): never => {
  if (logger) {
    logger.logError(error, context);
    logger.close();
  }
  console.error(`Error: ${formatErrorLine(error)}`);
  if (logger) {
    console.error(`Debug log: ${logger.path}`);
  }
  process.exit(1);
};
