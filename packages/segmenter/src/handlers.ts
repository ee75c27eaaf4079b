/**
 * Phase handler dispatch.
 *
 * Each phase label maps to a PhaseHandler that turns a flagged segment into
 * an ErrorContext for downstream summarization. Unknown labels fall back to
 * the default handler, so a new rule never needs a handler to be usable.
 */

import { type ExtractOptions, searchErrorsInLog } from "./extract.js";
import { segmentLines, type Segment } from "./types.js";

// ============================================================================
// Phase Kinds
// ============================================================================

/**
 * Phases with a built-in handler.
 */
export type PhaseKind = "CONFIG" | "INSTALL" | "WORKLOAD" | "ORION";

export const PhaseKinds = {
  Config: "CONFIG" as const,
  Install: "INSTALL" as const,
  Workload: "WORKLOAD" as const,
  /** Post-processing: performance regression checks */
  Orion: "ORION" as const,
};

/** ID reported by the fallback handler */
export const DEFAULT_HANDLER_ID = "DEFAULT";

// ============================================================================
// Types
// ============================================================================

/**
 * What a handler hands to summarization / notification collaborators.
 */
export interface ErrorContext {
  /** Suspect lines found in the segment */
  readonly errors: readonly string[];
  readonly phaseLabel: string;
  readonly stepName: string | null;
  readonly startLine: number;
  /** Number of lines in the segment */
  readonly lineCount: number;
  /** ID of the handler that produced this context */
  readonly handler: string;
  /** WORKLOAD only: the step is one of the configured workload names */
  readonly knownWorkload?: boolean;
}

export interface PhaseHandler {
  readonly id: string;
  handle(segment: Segment): ErrorContext;
}

export interface HandlerOptions extends ExtractOptions {
  /** Step names treated as known workloads (WORKLOAD handler) */
  readonly workloads?: Iterable<string>;
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Handler that runs the line-level extractor over the segment body.
 */
export class ExtractingHandler implements PhaseHandler {
  readonly id: string;
  protected readonly extractOptions: ExtractOptions;

  constructor(id: string, extractOptions: ExtractOptions = {}) {
    this.id = id;
    this.extractOptions = extractOptions;
  }

  handle(segment: Segment): ErrorContext {
    return {
      errors: searchErrorsInLog(segmentLines(segment), this.extractOptions),
      phaseLabel: segment.phaseLabel,
      stepName: segment.stepName,
      startLine: segment.startLine,
      lineCount: segment.lineCount,
      handler: this.id,
    };
  }
}

/**
 * WORKLOAD handler: also reports whether the step is a known workload.
 */
export class WorkloadHandler extends ExtractingHandler {
  private readonly workloads: ReadonlySet<string>;

  constructor(workloads: Iterable<string>, extractOptions: ExtractOptions = {}) {
    super(PhaseKinds.Workload, extractOptions);
    this.workloads = new Set(workloads);
  }

  override handle(segment: Segment): ErrorContext {
    return {
      ...super.handle(segment),
      knownWorkload: isWorkload(segment.stepName, this.workloads),
    };
  }
}

/**
 * Check if a step name is one of the known workloads.
 */
export const isWorkload = (
  stepName: string | null,
  workloads: ReadonlySet<string>
): boolean => stepName !== null && workloads.has(stepName);

// ============================================================================
// Registry
// ============================================================================

const normalizeLabel = (label: string): string => label.trim().toUpperCase();

export class HandlerRegistry {
  private readonly byLabel = new Map<string, PhaseHandler>();
  private readonly fallback: PhaseHandler;

  constructor(fallback: PhaseHandler) {
    this.fallback = fallback;
  }

  /**
   * Register a handler for a phase label (case-insensitive).
   * Re-registering a label replaces the previous handler.
   */
  register(label: string, handler: PhaseHandler): void {
    this.byLabel.set(normalizeLabel(label), handler);
  }

  /**
   * Handler for a label, or the default handler if none is registered.
   */
  get(label: string): PhaseHandler {
    return this.byLabel.get(normalizeLabel(label)) ?? this.fallback;
  }

  has(label: string): boolean {
    return this.byLabel.has(normalizeLabel(label));
  }

  /**
   * Dispatch a segment to the handler for its phase.
   */
  handle(segment: Segment): ErrorContext {
    return this.get(segment.phaseLabel).handle(segment);
  }

  /**
   * Registered labels, sorted.
   */
  labels(): string[] {
    return [...this.byLabel.keys()].sort();
  }
}

/**
 * Create a handler registry with handlers for every PhaseKind.
 */
export const createDefaultHandlers = (
  options: HandlerOptions = {}
): HandlerRegistry => {
  const { workloads = [], ...extractOptions } = options;
  const registry = new HandlerRegistry(
    new ExtractingHandler(DEFAULT_HANDLER_ID, extractOptions)
  );

  registry.register(
    PhaseKinds.Config,
    new ExtractingHandler(PhaseKinds.Config, extractOptions)
  );
  registry.register(
    PhaseKinds.Install,
    new ExtractingHandler(PhaseKinds.Install, extractOptions)
  );
  registry.register(
    PhaseKinds.Workload,
    new WorkloadHandler(workloads, extractOptions)
  );
  registry.register(
    PhaseKinds.Orion,
    new ExtractingHandler(PhaseKinds.Orion, extractOptions)
  );

  return registry;
};
