/**
 * Line-level error extractor.
 *
 * Runs on the lines of a flagged segment and keeps the ones that look like
 * real failures. Stricter than the engine's keyword hint: benign phrases
 * ("0 errors", "no failures found", error_handler identifiers,
 * --ignore-errors flags, check-marked results) are removed from the line
 * first, and the line is kept only if a keyword remains.
 */

import {
  DEFAULT_ERROR_KEYWORDS,
  hasErrorKeyword,
  normalizeKeywords,
} from "./hinting.js";
import { stripAnsi, truncate } from "./utils.js";

// ============================================================================
// Constants
// ============================================================================

/** Maximum error lines returned per call */
export const DEFAULT_MAX_ERRORS = 50;

/** Longer lines are truncated (minified bundles, JSON dumps) */
export const DEFAULT_MAX_ERROR_LINE_LENGTH = 2000;

/**
 * Phrases that contain an error keyword but report success or name an error
 * variable rather than an actual failure. Global: every occurrence is removed.
 */
const benignPhrases: readonly RegExp[] = [
  // Zero counts
  /\b0\s+(?:errors?|failures?|failed|exceptions?)\b/gi,
  /\b(?:errors?|failures?|failed|exceptions?)\s*[:=]\s*0\b/gi,
  /\bno\s+(?:errors?|failures?|exceptions?)\b/gi,
  /\bwithout\s+(?:errors?|failures?)\b/gi,
  // Identifiers, not events
  /\berror_?(?:handler|code|type|msg|message|class|kind|count)\b/gi,
  /\bon_?error\b/gi,
  // Command-line flags
  /--(?:ignore|allow|continue-on|max)-(?:errors?|failures?)\b/gi,
  /\bfail[-_]?fast\b/gi,
  // Success check marks, up to a failure mark
  /[✓✔✅][^✗✘❌]*/g,
];

/**
 * Remove benign phrases from a line, leaving the text that could still
 * report a failure.
 */
const stripBenignPhrases = (line: string): string =>
  benignPhrases.reduce((rest, phrase) => rest.replace(phrase, " "), line);

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractOptions {
  /** Keywords a line must contain (default: DEFAULT_ERROR_KEYWORDS) */
  readonly keywords?: Iterable<string>;
  /** Stop after this many error lines (default: 50) */
  readonly maxErrors?: number;
  /** Truncate longer lines (default: 2000) */
  readonly maxLineLength?: number;
}

/**
 * Check if a line contains an error keyword outside its benign phrases.
 * Keywords are expected in normalized (lowercase) form.
 */
export const isErrorLine = (
  line: string,
  keywords: readonly string[]
): boolean =>
  hasErrorKeyword(line, keywords) &&
  hasErrorKeyword(stripBenignPhrases(line), keywords);

/**
 * Collect suspect lines, trimmed and ANSI-stripped, in original order.
 * Repeated lines are reported once.
 */
export const searchErrorsInLog = (
  lines: Iterable<string>,
  options: ExtractOptions = {}
): string[] => {
  const keywords = normalizeKeywords(
    options.keywords ?? DEFAULT_ERROR_KEYWORDS
  );
  const maxErrors = options.maxErrors ?? DEFAULT_MAX_ERRORS;
  const maxLineLength =
    options.maxLineLength ?? DEFAULT_MAX_ERROR_LINE_LENGTH;

  const errors: string[] = [];
  const seen = new Set<string>();

  for (const raw of lines) {
    if (errors.length >= maxErrors) {
      break;
    }

    const line = stripAnsi(raw).trim();
    if (line === "" || !isErrorLine(line, keywords)) {
      continue;
    }

    const clipped = truncate(line, maxLineLength);
    if (seen.has(clipped)) {
      continue;
    }
    seen.add(clipped);
    errors.push(clipped);
  }

  return errors;
};
