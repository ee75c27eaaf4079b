/**
 * Triage pipeline: segment a build log, then run the phase handler of every
 * flagged segment. Clean segments are kept in reports but never handled.
 */

import type { ResultCache } from "./cache.js";
import { createEngine, type SegmentationEngine } from "./engine.js";
import {
  createDefaultHandlers,
  type ErrorContext,
  type HandlerRegistry,
} from "./handlers.js";
import { DEFAULT_ERROR_KEYWORDS, normalizeKeywords } from "./hinting.js";
import type { BoundaryRegistry } from "./registry.js";
import type { LineSource, Segment } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface TriageOptions {
  readonly registry: BoundaryRegistry;
  /** Handlers for flagged segments (default: createDefaultHandlers) */
  readonly handlers?: HandlerRegistry;
  /** Label of the implicit initial segment */
  readonly initialPhase?: string;
  /** Keywords for both the engine hint and the default handlers */
  readonly keywords?: Iterable<string>;
  /** Report cache keyed by log ID; without one nothing is cached */
  readonly cache?: ResultCache<TriageReport>;
}

export interface TriageReport {
  /** All segments, in order */
  readonly segments: readonly Segment[];
  /** One context per flagged segment, in segment order */
  readonly contexts: readonly ErrorContext[];
  readonly flaggedCount: number;
  /** Number of log lines read */
  readonly lineCount: number;
}

// ============================================================================
// Streaming
// ============================================================================

/**
 * Read the keyword iterable exactly once; the engine and the handlers both
 * need it, and a generator can only be consumed by one of them.
 */
const resolveKeywords = (options: TriageOptions): readonly string[] =>
  normalizeKeywords(options.keywords ?? DEFAULT_ERROR_KEYWORDS);

const buildEngine = (
  options: TriageOptions,
  keywords: readonly string[]
): SegmentationEngine =>
  createEngine(options.registry, {
    initialPhase: options.initialPhase,
    keywords,
  });

const buildHandlers = (
  options: TriageOptions,
  keywords: readonly string[]
): HandlerRegistry => options.handlers ?? createDefaultHandlers({ keywords });

/**
 * Yield an error context for each flagged segment as soon as it is sealed.
 */
export async function* processBuildLog(
  source: LineSource,
  options: TriageOptions
): AsyncGenerator<ErrorContext, void, undefined> {
  const keywords = resolveKeywords(options);
  const engine = buildEngine(options, keywords);
  const handlers = buildHandlers(options, keywords);

  for await (const segment of engine.segmentsAsync(source)) {
    if (segment.flagged) {
      yield handlers.handle(segment);
    }
  }
}

// ============================================================================
// Cached Reports
// ============================================================================

export class Triage {
  private readonly options: TriageOptions;
  private readonly keywords: readonly string[];
  private readonly handlers: HandlerRegistry;
  private readonly cache: ResultCache<TriageReport> | undefined;

  constructor(options: TriageOptions) {
    this.options = options;
    this.keywords = resolveKeywords(options);
    this.handlers = buildHandlers(options, this.keywords);
    this.cache = options.cache;
  }

  /**
   * Segment and triage a log. A cached report for the same ID is returned
   * without reading the source.
   */
  async analyze(id: string, source: LineSource): Promise<TriageReport> {
    const cached = this.cache?.get(id);
    if (cached) {
      return cached;
    }

    const engine = buildEngine(this.options, this.keywords);
    const segments = await engine.runAsync(source);
    const contexts = segments
      .filter((segment) => segment.flagged)
      .map((segment) => this.handlers.handle(segment));

    const report: TriageReport = {
      segments,
      contexts,
      flaggedCount: contexts.length,
      lineCount: engine.linesProcessed,
    };
    this.cache?.set(id, report);
    return report;
  }

  /**
   * Drop every cached report.
   */
  clearCache(): void {
    this.cache?.clear();
  }
}

export const createTriage = (options: TriageOptions): Triage =>
  new Triage(options);
