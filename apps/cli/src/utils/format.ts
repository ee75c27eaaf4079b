import {
  type BoundaryRegistry,
  type ChatMessage,
  formatErrorPreview,
  formatSegmentsCompact,
  type Segment,
  serializeSegments,
  serializeSegmentsNDJSON,
  type TriageReport,
} from "@phaselog/segmenter";

// ============================================================================
// Argument Parsing
// ============================================================================

export const SEGMENT_FORMATS = ["text", "json", "ndjson"] as const;
export type SegmentFormat = (typeof SEGMENT_FORMATS)[number];

export const TRIAGE_FORMATS = ["text", "json"] as const;
export type TriageFormat = (typeof TRIAGE_FORMATS)[number];

/**
 * Validates a flag value against a fixed set of choices.
 *
 * @param value - Raw flag value
 * @param choices - Accepted values
 * @param name - Flag name, without dashes, for the error message
 */
export const parseChoice = <T extends string>(
  value: unknown,
  choices: readonly T[],
  name: string
): T => {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new Error(`--${name} must be one of: ${choices.join(", ")}`);
  }
  return match;
};

/**
 * Parses a flag value as a positive integer.
 */
export const parsePositiveInt = (value: unknown, name: string): number => {
  const parsed = typeof value === "number" ? value : Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--${name} must be a positive integer`);
  }
  return parsed;
};

// ============================================================================
// Segments
// ============================================================================

/**
 * Renders segments for the segment command.
 */
export const formatSegments = (
  segments: readonly Segment[],
  format: SegmentFormat
): string => {
  switch (format) {
    case "json":
      return serializeSegments(segments, { pretty: true });
    case "ndjson":
      return serializeSegmentsNDJSON(segments);
    case "text":
      return formatSegmentsCompact(segments);
  }
};

// ============================================================================
// Triage
// ============================================================================

/**
 * One-line summary of a triage report.
 *
 * Example: "1 of 4 segments flagged, 7 lines read"
 */
export const formatTriageSummary = (report: TriageReport): string =>
  `${report.flaggedCount} of ${report.segments.length} segments flagged, ${report.lineCount} lines read`;

/**
 * Error previews for each flagged segment, followed by the summary.
 */
export const formatTriageText = (
  report: TriageReport,
  maxLines: number
): string =>
  [
    ...report.contexts.map((context) =>
      formatErrorPreview(context, { maxLines })
    ),
    formatTriageSummary(report),
  ].join("\n\n");

export const formatTriageJson = (report: TriageReport): string =>
  JSON.stringify(
    {
      segmentCount: report.segments.length,
      lineCount: report.lineCount,
      flaggedCount: report.flaggedCount,
      contexts: report.contexts,
    },
    null,
    2
  );

/**
 * Renders chat messages as "[role]" blocks.
 */
export const formatPromptMessages = (messages: readonly ChatMessage[]): string =>
  messages.map((m) => `[${m.role}]\n${m.content}`).join("\n\n");

// ============================================================================
// Rules
// ============================================================================

/**
 * Lists the effective rules in matching order.
 */
export const formatRules = (
  registry: BoundaryRegistry,
  initialPhase: string,
  path: string | null
): string =>
  [
    `Rules: ${path ?? "built-in default preset"}`,
    `Initial phase: ${initialPhase}`,
    ...registry
      .rules()
      .map(
        (rule, i) =>
          `  ${i + 1}. ${rule.label} /${rule.pattern.source}/${rule.pattern.flags}`
      ),
  ].join("\n");
