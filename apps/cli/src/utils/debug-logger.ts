/**
 * Debug logger for per-run troubleshooting.
 * Stores debug logs in ~/.phaselog/debug/<run-id>.log
 *
 * Features:
 * - Per-run log files (no overwriting)
 * - Timestamped entries
 * - Phase timing
 * - Automatic log rotation (keeps last 10 logs)
 */

import { randomUUID } from "node:crypto";
import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  rmSync,
  statSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import { getPhaselogHome } from "../lib/config.js";

const DEBUG_DIR_NAME = "debug";
export const MAX_LOG_FILES = 10;

/**
 * Run ID for a log file name: sortable timestamp plus a random suffix.
 */
export const createRunId = (now: Date = new Date()): string => {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\.\d+Z$/, "Z");
  return `${stamp}-${randomUUID().slice(0, 8)}`;
};

/**
 * Formats a timestamp in ISO 8601 format with local timezone offset.
 */
const formatTimestamp = (now: Date = new Date()): string => {
  const offset = -now.getTimezoneOffset();
  const offsetHours = String(Math.floor(Math.abs(offset) / 60)).padStart(
    2,
    "0"
  );
  const offsetMinutes = String(Math.abs(offset) % 60).padStart(2, "0");
  const offsetSign = offset >= 0 ? "+" : "-";

  const iso = now.toISOString().slice(0, -1);
  return `${iso}${offsetSign}${offsetHours}:${offsetMinutes}`;
};

/**
 * Per-run debug logger that writes to <home>/debug/<run-id>.log
 */
export class DebugLogger {
  private readonly logPath: string;
  private readonly runID: string;
  private closed = false;
  private readonly phaseStartTimes = new Map<string, number>();

  constructor(runID: string, homeDir: string = getPhaselogHome()) {
    this.runID = runID;
    this.logPath = this.initializeLogFile(runID, join(homeDir, DEBUG_DIR_NAME));
    this.log("DebugLogger initialized");
  }

  /**
   * Creates the debug directory and the log file, after rotating old logs.
   */
  private initializeLogFile(runID: string, debugDir: string): string {
    if (!existsSync(debugDir)) {
      mkdirSync(debugDir, { recursive: true, mode: 0o700 });
    }

    this.rotateLogs(debugDir);

    const logPath = join(debugDir, `${runID}.log`);
    const header = `${"=".repeat(80)}\nphaselog Debug Log\nRun ID: ${runID}\nStarted: ${formatTimestamp()}\n${"=".repeat(80)}\n\n`;
    writeFileSync(logPath, header, { mode: 0o600 });

    return logPath;
  }

  /**
   * Deletes the oldest logs so that, with the new one, at most
   * MAX_LOG_FILES remain.
   */
  private rotateLogs(debugDir: string): void {
    const logFiles = readdirSync(debugDir)
      .filter((file) => file.endsWith(".log"))
      .map((file) => {
        const filePath = join(debugDir, file);
        return { path: filePath, mtime: statSync(filePath).mtimeMs };
      })
      .sort((a, b) => b.mtime - a.mtime);

    for (const log of logFiles.slice(MAX_LOG_FILES - 1)) {
      rmSync(log.path, { force: true });
    }
  }

  /**
   * Logs a message with timestamp.
   * A failed write disables the logger; logging never fails a command.
   */
  log(message: string): void {
    if (this.closed) {
      return;
    }

    try {
      appendFileSync(this.logPath, `${formatTimestamp()} ${message}\n`);
    } catch {
      this.closed = true;
    }
  }

  /**
   * Logs a phase message (e.g., "[segment] Starting").
   */
  logPhase(phase: string, message: string): void {
    this.log(`[${phase}] ${message}`);
  }

  /**
   * Logs an error with stack trace.
   */
  logError(error: unknown, context?: string): void {
    const prefix = context ? `[${context}] ` : "";

    if (error instanceof Error) {
      this.log(`${prefix}Error: ${error.message}`);
      if (error.stack) {
        this.log(`Stack trace:\n${error.stack}`);
      }
    } else {
      this.log(`${prefix}Error: ${String(error)}`);
    }
  }

  /**
   * Logs a section separator with title.
   */
  logSection(title: string): void {
    this.log("=".repeat(80));
    this.log(title);
    this.log("=".repeat(80));
  }

  /**
   * Starts timing a phase.
   */
  startPhase(phase: string): void {
    this.phaseStartTimes.set(phase, Date.now());
    this.logPhase(phase, "Starting");
  }

  /**
   * Ends timing a phase and logs the duration.
   */
  endPhase(phase: string): void {
    const start = this.phaseStartTimes.get(phase);
    if (start !== undefined) {
      this.logPhase(phase, `Completed in ${Date.now() - start}ms`);
      this.phaseStartTimes.delete(phase);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.log("DebugLogger closed");
    this.closed = true;
  }

  /**
   * Gets the absolute path to the log file.
   */
  get path(): string {
    return this.logPath;
  }

  get id(): string {
    return this.runID;
  }
}

/**
 * Open a debug log for a command run when --debug is set.
 */
export const startDebugLog = (
  enabled: boolean,
  command: string
): DebugLogger | undefined => {
  if (!enabled) {
    return undefined;
  }
  const logger = new DebugLogger(createRunId());
  logger.logSection(`phaselog ${command}`);
  logger.log(`Node: ${process.version} (${process.platform} ${process.arch})`);
  logger.log(`Working directory: ${process.cwd()}`);
  return logger;
};
