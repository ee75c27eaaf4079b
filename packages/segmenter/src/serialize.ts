/**
 * Serialization helpers for segmentation output.
 * JSON output strips ANSI codes by default; segments keep their field order.
 */

import type { Segment } from "./types.js";
import { stripAnsi } from "./utils.js";

// ============================================================================
// ANSI Stripping
// ============================================================================

/**
 * Strip ANSI codes from the text fields of a segment.
 */
export const stripAnsiFromSegment = (segment: Segment): Segment => ({
  ...segment,
  stepName: segment.stepName === null ? null : stripAnsi(segment.stepName),
  body: stripAnsi(segment.body),
});

// ============================================================================
// JSON Serialization
// ============================================================================

export interface SerializeOptions {
  /** Strip ANSI codes from strings (default: true) */
  readonly stripAnsi?: boolean;
  /** Pretty print with indentation (default: false) */
  readonly pretty?: boolean;
  /** Indentation for pretty printing (default: 2) */
  readonly indent?: number;
}

const prepare = (segment: Segment, doStripAnsi: boolean): Segment =>
  doStripAnsi ? stripAnsiFromSegment(segment) : segment;

/**
 * Serialize a single segment to JSON.
 */
export const serializeSegment = (
  segment: Segment,
  opts: SerializeOptions = {}
): string => {
  const { stripAnsi: doStripAnsi = true, pretty = false, indent = 2 } = opts;
  const result = prepare(segment, doStripAnsi);
  return pretty ? JSON.stringify(result, null, indent) : JSON.stringify(result);
};

/**
 * Serialize segments to a JSON array.
 */
export const serializeSegments = (
  segments: readonly Segment[],
  opts: SerializeOptions = {}
): string => {
  const { stripAnsi: doStripAnsi = true, pretty = false, indent = 2 } = opts;
  const result = segments.map((s) => prepare(s, doStripAnsi));
  return pretty ? JSON.stringify(result, null, indent) : JSON.stringify(result);
};

/**
 * Serialize segments to line-delimited JSON (NDJSON), one segment per line.
 */
export const serializeSegmentsNDJSON = (
  segments: readonly Segment[],
  opts: SerializeOptions = {}
): string => {
  const { stripAnsi: doStripAnsi = true } = opts;
  return segments
    .map((s) => JSON.stringify(prepare(s, doStripAnsi)))
    .join("\n");
};

// ============================================================================
// Compact Output
// ============================================================================

/**
 * Format a segment as one summary line.
 * Format: [!] LABEL step @startLine (n lines), with [ ] for clean segments
 * and "-" for the unnamed initial step.
 */
export const formatSegmentCompact = (segment: Segment): string => {
  const flag = segment.flagged ? "[!]" : "[ ]";
  const step = segment.stepName === null ? "-" : stripAnsi(segment.stepName);
  const noun = segment.lineCount === 1 ? "line" : "lines";
  return `${flag} ${segment.phaseLabel} ${step} @${segment.startLine} (${segment.lineCount} ${noun})`;
};

/**
 * Format all segments as compact summary lines.
 */
export const formatSegmentsCompact = (segments: readonly Segment[]): string =>
  segments.map(formatSegmentCompact).join("\n");
