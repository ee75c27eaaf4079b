import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  ConfigurationError,
  DEFAULT_ERROR_KEYWORDS,
  defaultPreset,
  registryFromPreset,
} from "@phaselog/segmenter";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  getPhaselogHome,
  loadRulesConfig,
  MAX_CONFIG_SIZE_BYTES,
  parseRulesConfig,
  readRulesConfig,
  resolveConfigPath,
} from "./config.js";

// Mock node:fs
vi.mock("node:fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

const fullConfig = [
  "initialPhase: SETUP",
  'flags: ""',
  "keywords: [Error, timeout]",
  "workloads: [node-density]",
  "rules:",
  "  - label: INSTALL",
  String.raw`    pattern: 'running step (.*\b(install|deploy)[\w-]+)'`,
  "  - label: WORKLOAD",
  String.raw`    pattern: 'running step ([\w-]+)'`,
  "    flags: i",
].join("\n");

const minimalConfig = [
  "rules:",
  "  - label: STEP",
  String.raw`    pattern: '^step (\w+)$'`,
].join("\n");

const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe("rules config", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ==========================================================================
  // Parsing
  // ==========================================================================

  describe("parseRulesConfig", () => {
    it("parses every field", () => {
      expect(parseRulesConfig(fullConfig, "rules.yaml")).toEqual({
        initialPhase: "SETUP",
        flags: "",
        keywords: ["Error", "timeout"],
        workloads: ["node-density"],
        rules: [
          {
            label: "INSTALL",
            pattern: String.raw`running step (.*\b(install|deploy)[\w-]+)`,
          },
          {
            label: "WORKLOAD",
            pattern: String.raw`running step ([\w-]+)`,
            flags: "i",
          },
        ],
      });
    });

    it("fills in defaults for optional fields", () => {
      const preset = parseRulesConfig(minimalConfig, "rules.yaml");

      expect(preset.initialPhase).toBe("CONFIG");
      expect(preset.keywords).toEqual(DEFAULT_ERROR_KEYWORDS);
      expect(preset.workloads).toEqual([]);
      expect("flags" in preset).toBe(false);
    });

    it("reads JSON", () => {
      const preset = parseRulesConfig(
        '{"rules": [{"label": "STEP", "pattern": "^step (\\\\w+)$"}]}',
        "rules.json"
      );

      expect(preset.rules).toEqual([{ label: "STEP", pattern: "^step (\\w+)$" }]);
    });

    it("produces presets the registry accepts", () => {
      const registry = registryFromPreset(
        parseRulesConfig(fullConfig, "rules.yaml")
      );

      expect(registry.match("running step ocp-deploy-cluster")).toEqual({
        label: "INSTALL",
        stepName: "ocp-deploy-cluster",
      });
      expect(registry.match("Running step ocp-deploy-cluster")).toEqual({
        label: "WORKLOAD",
        stepName: "ocp-deploy-cluster",
      });
    });

    it("leaves pattern checks to the registry", () => {
      const preset = parseRulesConfig(
        ["rules:", "  - label: BAD", "    pattern: '(a)(b)'"].join("\n"),
        "rules.yaml"
      );

      const error = captureError(() => registryFromPreset(preset));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ label: "BAD" });
    });
  });

  describe("parseRulesConfig validation", () => {
    it.each([
      ["- a\n- b", "rules.yaml: rules file must be an object"],
      ["rules: []", "rules.yaml: 'rules' must be a non-empty list"],
      ["initialPhase: x", "rules.yaml: 'rules' must be a non-empty list"],
      [
        "rules: [{pattern: 'a (b)'}]",
        "rules.yaml: rules[0].label must be a non-empty string",
      ],
      [
        "rules: [{label: A}]",
        "rules.yaml: rules[0].pattern must be a non-empty string",
      ],
      [
        "rules: [{label: A, pattern: '(a)', flags: 1}]",
        "rules.yaml: rules[0]: 'flags' must be a string",
      ],
      [
        "keywords: [1]\nrules: [{label: A, pattern: '(a)'}]",
        "rules.yaml: 'keywords' must be a list of strings",
      ],
      [
        "initialPhase: ' '\nrules: [{label: A, pattern: '(a)'}]",
        "rules.yaml: 'initialPhase' must not be empty",
      ],
    ])("rejects %j", (content, message) => {
      const error = captureError(() => parseRulesConfig(content, "rules.yaml"));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({ message });
    });

    it("rejects invalid YAML", () => {
      const error = captureError(() =>
        parseRulesConfig("rules: [unclosed", "rules.yaml")
      );

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof Error && error.message).toMatch(
        /^rules\.yaml: invalid YAML: /
      );
    });

    it("rejects null bytes", () => {
      expect(() => parseRulesConfig("rules:\0", "rules.yaml")).toThrow(
        "rules.yaml: rules file contains null bytes (binary content not allowed)"
      );
    });

    it("rejects oversized files", () => {
      expect(() =>
        parseRulesConfig("#".repeat(MAX_CONFIG_SIZE_BYTES + 1), "rules.yaml")
      ).toThrow(
        `rules.yaml: rules file exceeds maximum size of ${MAX_CONFIG_SIZE_BYTES} bytes`
      );
    });
  });

  // ==========================================================================
  // Lookup
  // ==========================================================================

  describe("resolveConfigPath", () => {
    it("prefers the --config flag", () => {
      const path = resolveConfigPath({
        flag: "custom.yaml",
        cwd: "/repo",
        env: { PHASELOG_CONFIG: "/etc/phaselog.yaml" },
      });

      expect(path).toBe("/repo/custom.yaml");
      expect(existsSync).not.toHaveBeenCalled();
    });

    it("uses PHASELOG_CONFIG next", () => {
      expect(
        resolveConfigPath({
          cwd: "/repo",
          env: { PHASELOG_CONFIG: "/etc/phaselog.yaml" },
        })
      ).toBe("/etc/phaselog.yaml");
    });

    it("finds the first rules file in .phaselog", () => {
      vi.mocked(existsSync).mockImplementation(
        (path) =>
          path === "/repo/.phaselog/rules.yml" ||
          path === "/repo/.phaselog/rules.json"
      );

      expect(resolveConfigPath({ cwd: "/repo", env: {} })).toBe(
        "/repo/.phaselog/rules.yml"
      );
    });

    it("returns undefined when nothing is configured", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(resolveConfigPath({ cwd: "/repo", env: {} })).toBeUndefined();
    });
  });

  describe("loadRulesConfig", () => {
    it("falls back to the default preset", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadRulesConfig({ cwd: "/repo", env: {} })).toEqual({
        preset: defaultPreset,
        path: null,
      });
    });

    it("loads the resolved file", () => {
      vi.mocked(readFileSync).mockReturnValue(minimalConfig);

      const loaded = loadRulesConfig({
        flag: "rules.yaml",
        cwd: "/repo",
        env: {},
      });

      expect(loaded.path).toBe("/repo/rules.yaml");
      expect(loaded.preset.rules).toEqual([
        { label: "STEP", pattern: String.raw`^step (\w+)$` },
      ]);
      expect(readFileSync).toHaveBeenCalledWith("/repo/rules.yaml", "utf-8");
    });
  });

  describe("readRulesConfig", () => {
    it("reports a missing file", () => {
      vi.mocked(readFileSync).mockImplementation(() => {
        throw Object.assign(new Error("ENOENT: no such file"), {
          code: "ENOENT",
        });
      });

      expect(() => readRulesConfig("/repo/missing.yaml")).toThrow(
        "Rules file not found: /repo/missing.yaml"
      );
    });

    it("rethrows other read errors unchanged", () => {
      const failure = Object.assign(new Error("EACCES: permission denied"), {
        code: "EACCES",
      });
      vi.mocked(readFileSync).mockImplementation(() => {
        throw failure;
      });

      expect(captureError(() => readRulesConfig("/repo/rules.yaml"))).toBe(
        failure
      );
    });
  });

  describe("getPhaselogHome", () => {
    it("uses an absolute PHASELOG_HOME", () => {
      expect(getPhaselogHome({ PHASELOG_HOME: "/tmp/phaselog" })).toBe(
        "/tmp/phaselog"
      );
    });

    it("ignores relative overrides", () => {
      expect(getPhaselogHome({ PHASELOG_HOME: "relative/dir" })).toBe(
        join(homedir(), ".phaselog")
      );
    });
  });
});
