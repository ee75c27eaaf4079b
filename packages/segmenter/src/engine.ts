/**
 * Segmentation engine.
 *
 * Streams log lines one at a time and partitions them into phase segments:
 * - a boundary rule hit seals the segment in progress (even an empty one)
 *   and opens a new segment starting with the boundary line
 * - any other line is keyword-scanned (sticky flag) and appended
 * - end of input seals the last segment
 *
 * The engine performs no I/O. Async sources are only awaited, never opened.
 */

import {
  DEFAULT_ERROR_KEYWORDS,
  hasErrorKeyword,
  normalizeKeywords,
} from "./hinting.js";
import type { BoundaryRegistry } from "./registry.js";
import type { LineSource, Segment } from "./types.js";

// ============================================================================
// Options
// ============================================================================

/** Phase label of the implicit segment before the first boundary */
export const DEFAULT_INITIAL_PHASE = "CONFIG";

export interface EngineOptions {
  /** Label of the implicit initial segment (default: "CONFIG") */
  readonly initialPhase?: string;
  /** Error keywords for hinting (default: DEFAULT_ERROR_KEYWORDS) */
  readonly keywords?: Iterable<string>;
  /** Called with each segment as it is sealed, before it is yielded */
  readonly onSegment?: (segment: Segment) => void;
}

// ============================================================================
// Run State
// ============================================================================

/**
 * Per-run state: the segment being accumulated.
 * A fresh instance is created for every run so nothing leaks between runs.
 */
class SegmentAccumulator {
  private label: string;
  private stepName: string | null = null;
  private startLine = 0;
  private buffer: string[] = [];
  private flagged = false;
  private readonly registry: BoundaryRegistry;
  private readonly keywords: readonly string[];

  constructor(
    initialPhase: string,
    registry: BoundaryRegistry,
    keywords: readonly string[]
  ) {
    this.label = initialPhase;
    this.registry = registry;
    this.keywords = keywords;
  }

  /**
   * Feed one trimmed line. Returns the sealed segment when the line is a
   * boundary, undefined otherwise.
   */
  accept(line: string, index: number): Segment | undefined {
    const hit = this.registry.match(line);
    if (hit) {
      const sealed = this.finalize();
      this.label = hit.label;
      this.stepName = hit.stepName;
      this.startLine = index;
      this.buffer = [line];
      return sealed;
    }

    // Sticky: once flagged, later clean lines cannot clear it
    if (!this.flagged && hasErrorKeyword(line, this.keywords)) {
      this.flagged = true;
    }
    this.buffer.push(line);
    return undefined;
  }

  /**
   * Seal the current segment and reset the buffer and flag.
   * Label, step name and start line persist until the next boundary.
   */
  finalize(): Segment {
    const segment: Segment = Object.freeze({
      phaseLabel: this.label,
      stepName: this.stepName,
      startLine: this.startLine,
      body: this.buffer.join("\n"),
      flagged: this.flagged,
      lineCount: this.buffer.length,
    });
    this.buffer = [];
    this.flagged = false;
    return segment;
  }
}

// ============================================================================
// Engine
// ============================================================================

export class SegmentationEngine {
  private readonly registry: BoundaryRegistry;
  private readonly initialPhase: string;
  private readonly keywords: readonly string[];
  private readonly onSegment: ((segment: Segment) => void) | undefined;
  private lastLine: string | undefined;
  private processed = 0;

  constructor(registry: BoundaryRegistry, options: EngineOptions = {}) {
    this.registry = registry;
    this.initialPhase = options.initialPhase ?? DEFAULT_INITIAL_PHASE;
    this.keywords = normalizeKeywords(
      options.keywords ?? DEFAULT_ERROR_KEYWORDS
    );
    this.onSegment = options.onSegment;
  }

  /**
   * Segment a finite line sequence and return all segments in order.
   */
  run(lines: Iterable<string>): Segment[] {
    return [...this.segments(lines)];
  }

  /**
   * Segment an async (or sync) line source, e.g. a file read line by line.
   * Errors thrown by the source propagate unchanged.
   */
  async runAsync(lines: LineSource): Promise<Segment[]> {
    const result: Segment[] = [];
    for await (const segment of this.segmentsAsync(lines)) {
      result.push(segment);
    }
    return result;
  }

  /**
   * Yield each segment as soon as it is sealed.
   * Only the segment in progress is held in memory.
   */
  *segments(lines: Iterable<string>): Generator<Segment, void, undefined> {
    const acc = this.begin();
    let index = 0;
    for (const raw of lines) {
      const sealed = this.feed(acc, raw, index);
      index++;
      if (sealed) {
        yield sealed;
      }
    }
    yield this.emit(acc.finalize());
  }

  /**
   * Async counterpart of segments().
   */
  async *segmentsAsync(
    lines: LineSource
  ): AsyncGenerator<Segment, void, undefined> {
    const acc = this.begin();
    let index = 0;
    for await (const raw of lines) {
      const sealed = this.feed(acc, raw, index);
      index++;
      if (sealed) {
        yield sealed;
      }
    }
    yield this.emit(acc.finalize());
  }

  /**
   * Raw (untrimmed) last line read by the most recent run.
   * Useful to report where a failing source stopped.
   */
  get lastSeenLine(): string | undefined {
    return this.lastLine;
  }

  /**
   * Number of lines consumed by the most recent run.
   */
  get linesProcessed(): number {
    return this.processed;
  }

  private begin(): SegmentAccumulator {
    this.lastLine = undefined;
    this.processed = 0;
    return new SegmentAccumulator(
      this.initialPhase,
      this.registry,
      this.keywords
    );
  }

  private feed(
    acc: SegmentAccumulator,
    raw: string,
    index: number
  ): Segment | undefined {
    this.lastLine = raw;
    this.processed = index + 1;
    const sealed = acc.accept(raw.trim(), index);
    return sealed ? this.emit(sealed) : undefined;
  }

  private emit(segment: Segment): Segment {
    this.onSegment?.(segment);
    return segment;
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create an engine over a registry.
 */
export const createEngine = (
  registry: BoundaryRegistry,
  options: EngineOptions = {}
): SegmentationEngine => new SegmentationEngine(registry, options);

/**
 * One-shot segmentation of an in-memory line sequence.
 */
export const segmentLog = (
  registry: BoundaryRegistry,
  lines: Iterable<string>,
  options: EngineOptions = {}
): Segment[] => createEngine(registry, options).run(lines);
