/**
 * @phaselog/segmenter - split CI build logs into labeled pipeline phases
 *
 * Architecture:
 * - registry : ordered boundary rules (label + one capturing group)
 * - engine   : line-by-line segmentation with sticky error hinting
 * - handlers : per-phase dispatch of flagged segments to the line extractor
 * - triage   : segment + handle pipeline, with an explicit report cache
 */

// ============================================================================
// Core Types
// ============================================================================

export type { LineSource, Segment } from "./types.js";
export { segmentLines } from "./types.js";

export { ConfigurationError, PhaselogError } from "./errors.js";

// ============================================================================
// Boundary Rules
// ============================================================================

export type {
  BoundaryMatch,
  BoundaryRule,
  BoundaryRuleInput,
  RegistryOptions,
} from "./registry.js";
export { BoundaryRegistry, createRegistry } from "./registry.js";

export type { CaptureGroupInfo, CompiledPattern } from "./patterns.js";
export {
  analyzeCaptureGroups,
  compileBoundaryPattern,
  statelessFlags,
} from "./patterns.js";

// ============================================================================
// Segmentation
// ============================================================================

export type { EngineOptions } from "./engine.js";
export {
  createEngine,
  DEFAULT_INITIAL_PHASE,
  SegmentationEngine,
  segmentLog,
} from "./engine.js";

export {
  DEFAULT_ERROR_KEYWORDS,
  hasErrorKeyword,
  normalizeKeywords,
} from "./hinting.js";

export { linesFromText, readLogLines, readStreamLines } from "./sources.js";

// ============================================================================
// Downstream Handling
// ============================================================================

export type { ExtractOptions } from "./extract.js";
export {
  DEFAULT_MAX_ERROR_LINE_LENGTH,
  DEFAULT_MAX_ERRORS,
  isErrorLine,
  searchErrorsInLog,
} from "./extract.js";

export type {
  ErrorContext,
  HandlerOptions,
  PhaseHandler,
  PhaseKind,
} from "./handlers.js";
export {
  createDefaultHandlers,
  DEFAULT_HANDLER_ID,
  ExtractingHandler,
  HandlerRegistry,
  isWorkload,
  PhaseKinds,
  WorkloadHandler,
} from "./handlers.js";

export type { TriageOptions, TriageReport } from "./triage.js";
export { createTriage, processBuildLog, Triage } from "./triage.js";

export { DEFAULT_CACHE_TTL_MS, ResultCache } from "./cache.js";

export type {
  ChatMessage,
  ChatRole,
  PreviewOptions,
  SummaryPromptOptions,
} from "./prompt.js";
export {
  buildSummaryPrompt,
  DEFAULT_MAX_CONTEXT_SIZE,
  DEFAULT_PREVIEW_LINES,
  describeContext,
  formatErrorPreview,
} from "./prompt.js";

// ============================================================================
// Output
// ============================================================================

export type { SerializeOptions } from "./serialize.js";
export {
  formatSegmentCompact,
  formatSegmentsCompact,
  serializeSegment,
  serializeSegments,
  serializeSegmentsNDJSON,
  stripAnsiFromSegment,
} from "./serialize.js";

export { stripAnsi, truncate } from "./utils.js";

// ============================================================================
// Presets
// ============================================================================

export type { SegmenterPreset } from "./presets.js";
export {
  createDefaultRegistry,
  defaultPreset,
  registryFromPreset,
} from "./presets.js";
