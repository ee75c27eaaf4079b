/**
 * Built-in rule preset for build logs whose steps are announced as
 * "Running step <name>" (installation, workloads, then regression checks).
 */

import { DEFAULT_INITIAL_PHASE } from "./engine.js";
import { DEFAULT_ERROR_KEYWORDS } from "./hinting.js";
import {
  BoundaryRegistry,
  type BoundaryRuleInput,
  type RegistryOptions,
} from "./registry.js";

/**
 * Everything needed to segment and triage one family of logs.
 */
export interface SegmenterPreset {
  /** Label of the implicit segment before the first boundary */
  readonly initialPhase: string;
  /** Boundary rules, most specific first */
  readonly rules: readonly BoundaryRuleInput[];
  readonly keywords: readonly string[];
  /** Step names the WORKLOAD handler reports as known workloads */
  readonly workloads: readonly string[];
  /** Default flags for string patterns (registry default when omitted) */
  readonly flags?: string;
}

/**
 * INSTALL and ORION are specific; WORKLOAD is the catch-all and excludes
 * their names with a negative lookahead, but still goes last.
 */
export const defaultPreset: SegmenterPreset = {
  initialPhase: DEFAULT_INITIAL_PHASE,
  rules: [
    {
      label: "INSTALL",
      pattern: String.raw`running step (.*\b(?:install|deploy)[\w-]*)`,
    },
    {
      label: "ORION",
      pattern: String.raw`running step (.*\borion[\w-]*)`,
    },
    {
      label: "WORKLOAD",
      pattern: String.raw`running step ((?!.*\b(?:install|deploy|orion))[\w-]+)`,
    },
  ],
  keywords: DEFAULT_ERROR_KEYWORDS,
  workloads: [],
};

/**
 * Build the registry for a preset.
 */
export const registryFromPreset = (preset: SegmenterPreset): BoundaryRegistry => {
  const options: RegistryOptions =
    preset.flags === undefined ? {} : { defaultFlags: preset.flags };
  return BoundaryRegistry.from(preset.rules, options);
};

/**
 * Registry with the default preset's rules.
 */
export const createDefaultRegistry = (): BoundaryRegistry =>
  registryFromPreset(defaultPreset);
