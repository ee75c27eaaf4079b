/**
 * Formats an unknown error into a string message.
 * Handles Error instances and falls back to String().
 *
 * @param error - The error to format
 * @returns Formatted error message
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

const ERROR_PREFIX_REGEX = /^Error:\s*/i;

/**
 * Formats an error for a one-line terminal message:
 * strips a leading "Error:" and keeps the first line only.
 */
export const formatErrorLine = (error: unknown): string => {
  const message = formatError(error).replace(ERROR_PREFIX_REGEX, "");
  const firstLine = message.split("\n")[0] ?? "";
  return firstLine.trim();
};
