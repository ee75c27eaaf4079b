/**
 * Log input for commands: a file path, or "-" for stdin.
 */

import { resolve } from "node:path";
import {
  type LineSource,
  readLogLines,
  readStreamLines,
} from "@phaselog/segmenter";

export const STDIN_ARG = "-";

/**
 * Line source for a file argument. Files are opened lazily, on first read.
 */
export const openLogSource = (file: string): LineSource =>
  file === STDIN_ARG ? readStreamLines(process.stdin) : readLogLines(resolve(file));

/**
 * Stable name for a file argument, used as the triage report ID.
 */
export const describeLogSource = (file: string): string =>
  file === STDIN_ARG ? "stdin" : resolve(file);
