/**
 * Coarse error hinting.
 *
 * A triage signal, not a classifier: any case-insensitive substring hit marks
 * the line as suspect. Flagged segments are re-scanned downstream with the
 * finer line-level extractor (see extract.ts).
 */

/**
 * Keywords used when the caller does not supply a set.
 */
export const DEFAULT_ERROR_KEYWORDS: readonly string[] = Object.freeze([
  "error",
  "failure",
  "exception",
  "fatal",
  "panic",
  "failed",
]);

/**
 * Lowercase and de-duplicate a keyword list, dropping empty entries.
 * Keywords are literal substrings, so surrounding whitespace is kept.
 * An empty keyword would match every line.
 */
export const normalizeKeywords = (
  keywords: Iterable<string>
): readonly string[] => {
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const normalized = keyword.toLowerCase();
    if (normalized !== "") {
      seen.add(normalized);
    }
  }
  return [...seen];
};

/**
 * Check whether a line contains any keyword (case-insensitive substring,
 * not whole-word: "errors" and "ERROR:" both hit "error").
 */
export const hasErrorKeyword = (
  line: string,
  keywords: readonly string[]
): boolean => {
  const lower = line.toLowerCase();
  for (const keyword of keywords) {
    if (keyword !== "" && lower.includes(keyword.toLowerCase())) {
      return true;
    }
  }
  return false;
};
