/**
 * Boundary matcher registry.
 *
 * Holds the ordered (label, pattern) rules that mark the start of a pipeline
 * phase. Rules are tested in registration order and the first hit wins. The
 * registry does no conflict detection: callers order specific rules before
 * catch-all rules (e.g. a WORKLOAD rule that excludes install/deploy names
 * with a negative lookahead).
 */

import { ConfigurationError } from "./errors.js";
import { compileBoundaryPattern } from "./patterns.js";

// ============================================================================
// Types
// ============================================================================

/**
 * A registered boundary rule.
 */
export interface BoundaryRule {
  /** Phase label assigned to segments this rule opens */
  readonly label: string;
  /** Compiled pattern (never global or sticky) */
  readonly pattern: RegExp;
  /** RegExp group number holding the step name */
  readonly stepGroup: number;
}

/**
 * Rule definition accepted by createRegistry and loaded from rules files.
 */
export interface BoundaryRuleInput {
  readonly label: string;
  readonly pattern: string | RegExp;
  /** Overrides the registry's default flags for this rule */
  readonly flags?: string;
}

/**
 * Result of a successful match.
 */
export interface BoundaryMatch {
  readonly label: string;
  readonly stepName: string;
}

export interface RegistryOptions {
  /**
   * Flags used for rules given as source strings (default: "i").
   * CI logs mix "Running step" and "running step", so matching is
   * case-insensitive unless a rule says otherwise.
   */
  readonly defaultFlags?: string;
}

const DEFAULT_FLAGS = "i";

// ============================================================================
// Registry
// ============================================================================

export class BoundaryRegistry {
  private readonly entries: BoundaryRule[] = [];
  private readonly defaultFlags: string;

  constructor(options: RegistryOptions = {}) {
    this.defaultFlags = options.defaultFlags ?? DEFAULT_FLAGS;
  }

  /**
   * Build a registry from rule definitions, preserving their order.
   */
  static from(
    rules: readonly BoundaryRuleInput[],
    options: RegistryOptions = {}
  ): BoundaryRegistry {
    const registry = new BoundaryRegistry(options);
    for (const rule of rules) {
      registry.register(rule.label, rule.pattern, rule.flags);
    }
    return registry;
  }

  /**
   * Append a rule. Order is significant and never re-sorted.
   *
   * A string pattern is compiled with `flags`, or the registry default. A
   * RegExp keeps its own flags unless `flags` is given.
   *
   * @throws ConfigurationError if the label is empty or the pattern does not
   * have exactly one outermost capturing group
   */
  register(
    label: string,
    pattern: string | RegExp,
    flags?: string
  ): BoundaryRule {
    const trimmedLabel = label.trim();
    if (trimmedLabel === "") {
      throw new ConfigurationError("Boundary rule label must not be empty", {
        pattern: typeof pattern === "string" ? pattern : pattern.source,
      });
    }

    const effectiveFlags =
      flags ?? (typeof pattern === "string" ? this.defaultFlags : pattern.flags);
    const { regex, stepGroup } = compileBoundaryPattern(
      trimmedLabel,
      pattern,
      effectiveFlags
    );

    const rule: BoundaryRule = Object.freeze({
      label: trimmedLabel,
      pattern: regex,
      stepGroup,
    });
    this.entries.push(rule);
    return rule;
  }

  /**
   * Find the first rule matching the line, in registration order.
   *
   * @throws ConfigurationError if the matching rule's step group did not
   * participate in the match (e.g. `(name)?`), since no step name exists
   */
  match(line: string): BoundaryMatch | undefined {
    for (const rule of this.entries) {
      const m = rule.pattern.exec(line);
      if (!m) {
        continue;
      }

      const stepName = m[rule.stepGroup];
      if (stepName === undefined) {
        throw new ConfigurationError(
          `Boundary rule "${rule.label}" matched without capturing a step name: /${rule.pattern.source}/`,
          { label: rule.label, pattern: rule.pattern.source }
        );
      }
      return { label: rule.label, stepName };
    }
    return undefined;
  }

  /**
   * Registered rules in matching order.
   */
  rules(): readonly BoundaryRule[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a registry, optionally pre-populated with rules in the given order.
 */
export const createRegistry = (
  rules: readonly BoundaryRuleInput[] = [],
  options: RegistryOptions = {}
): BoundaryRegistry => BoundaryRegistry.from(rules, options);
