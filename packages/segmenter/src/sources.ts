/**
 * Line sources.
 * The engine only needs "lines, in order, finite"; these helpers produce them
 * from in-memory text, files and streams. Read failures are not caught here.
 */

import { open } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";

/** Line break, with or without a carriage return */
const lineBreakPattern = /\r?\n/;

/**
 * Split text into lines. A single trailing newline does not add an empty
 * last line, matching how a file is read line by line.
 */
export const linesFromText = (text: string): string[] => {
  if (text === "") {
    return [];
  }
  const lines = text.split(lineBreakPattern);
  if (lines.at(-1) === "") {
    lines.pop();
  }
  return lines;
};

/**
 * Read lines from a stream (e.g. process.stdin).
 */
export const readStreamLines = (input: Readable): AsyncIterable<string> =>
  createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });

/**
 * Read a log file line by line without loading it whole.
 * A missing or unreadable file rejects on the first read.
 */
export async function* readLogLines(
  path: string
): AsyncGenerator<string, void, undefined> {
  const handle = await open(path, "r");
  const input = handle.createReadStream({ encoding: "utf8" });
  const rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
  try {
    for await (const line of rl) {
      yield line;
    }
  } finally {
    rl.close();
    input.destroy();
  }
}
