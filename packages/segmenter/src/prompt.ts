/**
 * Builders for the inputs of external collaborators: the chat messages sent
 * to a summarization model and the preview text posted to a chat channel.
 * Nothing here performs a network call.
 */

import type { ErrorContext } from "./handlers.js";
import { truncate } from "./utils.js";

// ============================================================================
// Summary Prompt
// ============================================================================

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/** Character budget for the error list inside the prompt */
export const DEFAULT_MAX_CONTEXT_SIZE = 8000;

const SUMMARY_SYSTEM =
  "You are an assistant that analyzes CI build logs to detect failures.";

const SUMMARY_ASSISTANT = "Here are the most relevant errors:";

export interface SummaryPromptOptions {
  /** Maximum characters of error text (default: 8000) */
  readonly maxContextSize?: number;
}

/**
 * Escape text interpolated into a prompt: backticks become quotes and runs of
 * blank lines collapse, so log content cannot fake message structure.
 */
const escapePromptText = (s: string): string => {
  let result = s.replaceAll("`", "'").replaceAll("\r", "");
  while (result.includes("\n\n\n")) {
    result = result.replaceAll("\n\n\n", "\n\n");
  }
  return result;
};

/**
 * Build the system/user/assistant messages asking a model to pick out the
 * most critical errors from a list of suspect lines.
 */
export const buildSummaryPrompt = (
  errors: readonly string[],
  options: SummaryPromptOptions = {}
): ChatMessage[] => {
  const maxContextSize = options.maxContextSize ?? DEFAULT_MAX_CONTEXT_SIZE;
  const errorList = truncate(escapePromptText(errors.join("\n")), maxContextSize);

  return [
    { role: "system", content: SUMMARY_SYSTEM },
    {
      role: "user",
      content: `I scanned a build log and found these potential errors:\n\n${errorList}\n\nReturn the most critical errors or failures and explain them in plain text.`,
    },
    { role: "assistant", content: SUMMARY_ASSISTANT },
  ];
};

// ============================================================================
// Chat Preview
// ============================================================================

/** Error lines shown in a chat preview */
export const DEFAULT_PREVIEW_LINES = 5;

export interface PreviewOptions {
  /** Maximum error lines shown (default: 5) */
  readonly maxLines?: number;
}

const FENCE = "```";

/**
 * Header naming the phase, step and (1-based) line of a context.
 */
export const describeContext = (context: ErrorContext): string => {
  const step = context.stepName === null ? "" : ` step "${context.stepName}"`;
  return `${context.phaseLabel}${step} at line ${context.startLine + 1}`;
};

/**
 * Format a chat-ready preview of a context's first error lines.
 */
export const formatErrorPreview = (
  context: ErrorContext,
  options: PreviewOptions = {}
): string => {
  const maxLines = options.maxLines ?? DEFAULT_PREVIEW_LINES;
  const header = `*Potential errors* in ${describeContext(context)}`;

  if (context.errors.length === 0) {
    return `${header}\nNo error lines extracted.`;
  }

  const shown = context.errors
    .slice(0, maxLines)
    .map((line) => line.replaceAll(FENCE, "'''"));
  const lines = [header, FENCE, ...shown, FENCE];

  const hidden = context.errors.length - shown.length;
  if (hidden > 0) {
    lines.push(`... and ${hidden} more`);
  }

  return lines.join("\n");
};
