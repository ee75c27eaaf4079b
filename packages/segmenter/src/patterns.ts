/**
 * Capture-group analysis for boundary rule patterns.
 *
 * A boundary rule names its step through a single capturing group. Rules like
 * `running step (.*\b(install|deploy)\w*)` nest an alternation group inside
 * the step-name group, so the check counts OUTERMOST capturing groups only:
 * - a capturing group nested in another capturing group does not count
 * - a capturing group inside a lookaround does not count
 * - named groups `(?<name>...)` count
 * - non-capturing groups `(?:...)` are transparent
 */

import { ConfigurationError } from "./errors.js";

// ============================================================================
// Group Scanning
// ============================================================================

type GroupKind = "capturing" | "non-capturing" | "lookaround";

/**
 * Classify the group opened by the "(" at openIndex.
 */
const classifyGroup = (source: string, openIndex: number): GroupKind => {
  if (source[openIndex + 1] !== "?") {
    return "capturing";
  }

  const marker = source[openIndex + 2];
  if (marker === "=" || marker === "!") {
    return "lookaround";
  }
  if (marker === "<") {
    const next = source[openIndex + 3];
    if (next === "=" || next === "!") {
      return "lookaround";
    }
    return "capturing";
  }
  return "non-capturing";
};

/**
 * Result of scanning a pattern source for capturing groups.
 */
export interface CaptureGroupInfo {
  /** Total number of capturing groups (what RegExp numbering sees) */
  readonly total: number;
  /** 1-based RegExp group numbers of the outermost capturing groups */
  readonly outermost: readonly number[];
}

/**
 * Scan a regex source and report its capturing groups.
 * Escapes and character classes are skipped so `\(` and `[(]` are not groups.
 */
export const analyzeCaptureGroups = (source: string): CaptureGroupInfo => {
  const stack: GroupKind[] = [];
  const outermost: number[] = [];
  let total = 0;
  let inClass = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];

    if (ch === "\\") {
      i++;
      continue;
    }
    if (inClass) {
      if (ch === "]") {
        inClass = false;
      }
      continue;
    }
    if (ch === "[") {
      inClass = true;
      continue;
    }

    if (ch === "(") {
      const kind = classifyGroup(source, i);
      if (kind === "capturing") {
        total++;
        if (stack.every((k) => k === "non-capturing")) {
          outermost.push(total);
        }
      }
      stack.push(kind);
    } else if (ch === ")") {
      stack.pop();
    }
  }

  return { total, outermost };
};

// ============================================================================
// Compilation
// ============================================================================

/** Flags that would make RegExp.test/exec stateful between lines */
const statefulFlags = /[gy]/g;

/**
 * Drop the global and sticky flags so a shared pattern never carries lastIndex
 * from one line to the next.
 */
export const statelessFlags = (flags: string): string =>
  flags.replace(statefulFlags, "");

/**
 * A compiled boundary pattern and the group that holds the step name.
 */
export interface CompiledPattern {
  readonly regex: RegExp;
  readonly stepGroup: number;
}

/**
 * Compile a boundary pattern, enforcing exactly one outermost capturing group.
 * Throws ConfigurationError for invalid sources, invalid flags, or a wrong
 * group count.
 */
export const compileBoundaryPattern = (
  label: string,
  pattern: string | RegExp,
  flags: string
): CompiledPattern => {
  const source = typeof pattern === "string" ? pattern : pattern.source;

  let regex: RegExp;
  try {
    regex = new RegExp(source, statelessFlags(flags));
  } catch (err) {
    throw new ConfigurationError(
      `Boundary rule "${label}" has an invalid pattern: ${err instanceof Error ? err.message : String(err)}`,
      { label, pattern: source },
      { cause: err }
    );
  }

  const { outermost } = analyzeCaptureGroups(source);
  const [stepGroup] = outermost;
  if (outermost.length !== 1 || stepGroup === undefined) {
    throw new ConfigurationError(
      `Boundary rule "${label}" must have exactly one capturing group for the step name, found ${outermost.length}: /${source}/`,
      { label, pattern: source }
    );
  }

  return { regex, stepGroup };
};
