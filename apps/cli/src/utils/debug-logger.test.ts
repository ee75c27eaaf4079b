import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readdirSync,
  readFileSync,
  rmSync,
  utimesSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createRunId, DebugLogger, MAX_LOG_FILES } from "./debug-logger.js";

const RUN_ID_PATTERN = /^\d{8}T\d{6}Z-[0-9a-f]{8}$/;
const TIMESTAMPED_LINE = /^\d{4}-\d{2}-\d{2}T[\d:.]+[+-]\d{2}:\d{2} /;

describe("createRunId", () => {
  it("combines a compact UTC timestamp and a random suffix", () => {
    const id = createRunId(new Date("2026-03-04T05:06:07.089Z"));

    expect(id).toMatch(RUN_ID_PATTERN);
    expect(id.startsWith("20260304T050607Z-")).toBe(true);
  });
});

describe("DebugLogger", () => {
  let home: string;

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), "phaselog-debug-"));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  it("writes a header and timestamped entries to <home>/debug/<run-id>.log", () => {
    const logger = new DebugLogger("run-1", home);
    logger.logPhase("segment", "7 lines read");
    logger.close();

    expect(logger.path).toBe(join(home, "debug", "run-1.log"));
    expect(logger.id).toBe("run-1");

    const content = readFileSync(logger.path, "utf-8");
    const header = `${"=".repeat(80)}\nphaselog Debug Log\nRun ID: run-1\n`;
    expect(content.startsWith(header)).toBe(true);

    const entries = content
      .split("\n")
      .filter((line) => TIMESTAMPED_LINE.test(line))
      .map((line) => line.replace(TIMESTAMPED_LINE, ""));
    expect(entries).toEqual([
      "DebugLogger initialized",
      "[segment] 7 lines read",
      "DebugLogger closed",
    ]);
  });

  it("ignores entries after close", () => {
    const logger = new DebugLogger("run-2", home);
    logger.close();
    const before = readFileSync(logger.path, "utf-8");

    logger.log("late");

    expect(readFileSync(logger.path, "utf-8")).toBe(before);
  });

  it("logs errors with their stack", () => {
    const logger = new DebugLogger("run-3", home);
    logger.logError(new Error("boom"), "triage");
    logger.logError("plain");

    const content = readFileSync(logger.path, "utf-8");
    expect(content).toContain(" [triage] Error: boom\n");
    expect(content).toContain(" Stack trace:\nError: boom");
    expect(content).toContain(" Error: plain\n");
  });

  it("keeps only the most recent logs", () => {
    const debugDir = join(home, "debug");
    mkdirSync(debugDir, { recursive: true });
    for (let i = 0; i < MAX_LOG_FILES + 2; i++) {
      const path = join(debugDir, `old-${i}.log`);
      writeFileSync(path, "");
      utimesSync(path, 1_000_000 + i, 1_000_000 + i);
    }

    const logger = new DebugLogger("new", home);

    const remaining = readdirSync(debugDir).sort();
    expect(remaining).toHaveLength(MAX_LOG_FILES);
    expect(existsSync(logger.path)).toBe(true);
    expect(existsSync(join(debugDir, "old-0.log"))).toBe(false);
    expect(existsSync(join(debugDir, "old-2.log"))).toBe(false);
    expect(existsSync(join(debugDir, "old-3.log"))).toBe(true);
  });
});
