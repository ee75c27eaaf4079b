/**
 * Core segment types.
 */

/**
 * A contiguous run of log lines belonging to one pipeline phase.
 * Sealed (frozen) once the next boundary is found or input ends.
 */
export interface Segment {
  /** Label of the rule that opened the segment, or the initial phase */
  readonly phaseLabel: string;
  /** Captured step name; null only for the implicit initial segment */
  readonly stepName: string | null;
  /** 0-based index of the line that opened the segment */
  readonly startLine: number;
  /** Trimmed lines joined with "\n", boundary line first */
  readonly body: string;
  /** True if any non-boundary line contained an error keyword */
  readonly flagged: boolean;
  /**
   * Number of lines in the body. Distinguishes an empty segment (0) from a
   * segment holding one blank line (1), which share the body "".
   */
  readonly lineCount: number;
}

/**
 * Anything that yields log lines in order: an array, a generator, a
 * readline interface.
 */
export type LineSource = Iterable<string> | AsyncIterable<string>;

/**
 * Split a segment body back into its lines.
 */
export const segmentLines = (segment: Segment): string[] =>
  segment.lineCount === 0 ? [] : segment.body.split("\n");
