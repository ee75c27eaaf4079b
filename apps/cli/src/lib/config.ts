/**
 * Rules config for the phaselog CLI
 *
 * Lookup order:
 * - --config <path>
 * - PHASELOG_CONFIG environment variable
 * - .phaselog/rules.yaml, rules.yml or rules.json in the working directory
 * - the built-in default preset
 *
 * YAML and JSON are both read with js-yaml (JSON is valid YAML).
 */

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import {
  type BoundaryRuleInput,
  ConfigurationError,
  DEFAULT_ERROR_KEYWORDS,
  DEFAULT_INITIAL_PHASE,
  defaultPreset,
  type SegmenterPreset,
} from "@phaselog/segmenter";
import { load } from "js-yaml";

// ============================================================================
// Types
// ============================================================================

export interface ConfigLookup {
  /** Value of the --config flag */
  flag?: string;
  /** Directory searched for .phaselog/rules.* (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  preset: SegmenterPreset;
  /** File the preset came from, null for the built-in preset */
  path: string | null;
}

// ============================================================================
// Constants
// ============================================================================

const PHASELOG_DIR_NAME = ".phaselog";
const CONFIG_FILE_NAMES = ["rules.yaml", "rules.yml", "rules.json"] as const;

/**
 * Maximum allowed size for a rules file (1MB).
 */
export const MAX_CONFIG_SIZE_BYTES = 1 * 1024 * 1024;

const WINDOWS_DRIVE_PATTERN = /^[A-Za-z]:\\/;

// ============================================================================
// Path Helpers
// ============================================================================

const validateOverridePath = (path: string): string | null => {
  if (path.includes("..")) {
    return null;
  }
  if (!(path.startsWith("/") || WINDOWS_DRIVE_PATTERN.test(path))) {
    return null;
  }
  return path;
};

/**
 * Gets the phaselog home directory (~/.phaselog), used for debug logs.
 * PHASELOG_HOME overrides it when set to an absolute path.
 */
export const getPhaselogHome = (
  env: NodeJS.ProcessEnv = process.env
): string => {
  const override = env.PHASELOG_HOME;
  if (override) {
    const validated = validateOverridePath(override);
    if (validated) {
      return validated;
    }
  }
  return join(homedir(), PHASELOG_DIR_NAME);
};

/**
 * Find the rules file to load, or undefined to use the built-in preset.
 */
export const resolveConfigPath = (
  lookup: ConfigLookup = {}
): string | undefined => {
  const cwd = lookup.cwd ?? process.cwd();
  const env = lookup.env ?? process.env;

  if (lookup.flag) {
    return resolve(cwd, lookup.flag);
  }
  if (env.PHASELOG_CONFIG) {
    return resolve(cwd, env.PHASELOG_CONFIG);
  }

  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, PHASELOG_DIR_NAME, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
};

// ============================================================================
// Validation
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Rejects content that cannot be a rules file.
 */
const validateConfigContent = (data: string, path: string): void => {
  if (Buffer.byteLength(data, "utf-8") > MAX_CONFIG_SIZE_BYTES) {
    throw new ConfigurationError(
      `${path}: rules file exceeds maximum size of ${MAX_CONFIG_SIZE_BYTES} bytes`
    );
  }

  if (data.includes("\0")) {
    throw new ConfigurationError(
      `${path}: rules file contains null bytes (binary content not allowed)`
    );
  }
};

const optionalString = (
  record: Record<string, unknown>,
  field: string,
  path: string
): string | undefined => {
  const value = record[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigurationError(`${path}: '${field}' must be a string`);
  }
  return value;
};

const optionalStringList = (
  record: Record<string, unknown>,
  field: string,
  path: string
): string[] | undefined => {
  const value = record[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (
    !(Array.isArray(value) && value.every((item) => typeof item === "string"))
  ) {
    throw new ConfigurationError(`${path}: '${field}' must be a list of strings`);
  }
  return value.filter((item): item is string => typeof item === "string");
};

const parseRule = (
  value: unknown,
  index: number,
  path: string
): BoundaryRuleInput => {
  const where = `${path}: rules[${index}]`;
  if (!isRecord(value)) {
    throw new ConfigurationError(`${where} must be an object`);
  }

  const label = value.label;
  if (typeof label !== "string" || label.trim() === "") {
    throw new ConfigurationError(`${where}.label must be a non-empty string`);
  }

  const pattern = value.pattern;
  if (typeof pattern !== "string" || pattern === "") {
    throw new ConfigurationError(
      `${where}.pattern must be a non-empty string`,
      { label }
    );
  }

  const flags = optionalString(value, "flags", where);
  return flags === undefined ? { label, pattern } : { label, pattern, flags };
};

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse and validate rules file content.
 * Patterns are compiled later, when the registry is built.
 *
 * @param content - Raw YAML or JSON content
 * @param path - File name used in error messages
 */
export const parseRulesConfig = (
  content: string,
  path: string
): SegmenterPreset => {
  validateConfigContent(content, path);

  let parsed: unknown;
  try {
    parsed = load(content);
  } catch (error) {
    throw new ConfigurationError(
      `${path}: invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
      {},
      { cause: error }
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${path}: rules file must be an object`);
  }

  const rules = parsed.rules;
  if (!Array.isArray(rules) || rules.length === 0) {
    throw new ConfigurationError(`${path}: 'rules' must be a non-empty list`);
  }

  const initialPhase = optionalString(parsed, "initialPhase", path);
  if (initialPhase !== undefined && initialPhase.trim() === "") {
    throw new ConfigurationError(`${path}: 'initialPhase' must not be empty`);
  }

  const flags = optionalString(parsed, "flags", path);
  const preset: SegmenterPreset = {
    initialPhase: initialPhase ?? DEFAULT_INITIAL_PHASE,
    rules: rules.map((rule: unknown, index) => parseRule(rule, index, path)),
    keywords:
      optionalStringList(parsed, "keywords", path) ?? DEFAULT_ERROR_KEYWORDS,
    workloads: optionalStringList(parsed, "workloads", path) ?? [],
  };
  return flags === undefined ? preset : { ...preset, flags };
};

/**
 * Read a rules file.
 */
export const readRulesConfig = (path: string): SegmenterPreset => {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      throw new ConfigurationError(`Rules file not found: ${path}`, {}, {
        cause: error,
      });
    }
    if (isErrnoException(error) && error.code === "EISDIR") {
      throw new ConfigurationError(`Rules path is a directory: ${path}`, {}, {
        cause: error,
      });
    }
    throw error;
  }
  return parseRulesConfig(content, path);
};

/**
 * Load the effective rules, falling back to the default preset.
 */
export const loadRulesConfig = (lookup: ConfigLookup = {}): LoadedConfig => {
  const path = resolveConfigPath(lookup);
  if (path === undefined) {
    return { preset: defaultPreset, path: null };
  }
  return { preset: readRulesConfig(path), path };
};
