/**
 * Shared text helpers.
 */

// ============================================================================
// ANSI Escape Code Handling
// ============================================================================

/**
 * Pattern matching ANSI escape sequences for terminal output.
 * Covers CSI sequences (ESC[31m, ESC[2J), OSC sequences terminated by BEL or
 * ESC\ (window titles, hyperlinks), charset selection and single-char escapes.
 */
// biome-ignore lint/suspicious/noControlCharactersInRegex: intentional ANSI escape sequence matching
const ansiEscapePattern =
  /\x1b\[[0-9;:?]*[A-Za-z]|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)?|\x1b[()][AB012]|\x1b[@-_]/g;

/**
 * Remove ANSI escape sequences from a string.
 * Test runners and installers in CI often print colored output.
 */
export const stripAnsi = (s: string): string =>
  s.replace(ansiEscapePattern, "");

// ============================================================================
// Truncation
// ============================================================================

/**
 * Truncate to maxLength characters, marking the cut with "...".
 */
export const truncate = (s: string, maxLength: number): string =>
  s.length > maxLength ? `${s.slice(0, Math.max(0, maxLength - 3))}...` : s;
