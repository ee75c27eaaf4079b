import {
  buildSummaryPrompt,
  createDefaultHandlers,
  createTriage,
  registryFromPreset,
} from "@phaselog/segmenter";
import { defineCommand } from "citty";
import { loadRulesConfig } from "../lib/config.js";
import { exitWithError } from "../lib/errors.js";
import { describeLogSource, openLogSource } from "../lib/input.js";
import { startDebugLog } from "../utils/debug-logger.js";
import {
  formatPromptMessages,
  formatTriageJson,
  formatTriageText,
  parseChoice,
  parsePositiveInt,
  TRIAGE_FORMATS,
} from "../utils/format.js";

/** Exit status when --fail-on-error is set and suspect segments were found */
const EXIT_SUSPECT_SEGMENTS = 2;

export const triageCommand = defineCommand({
  meta: {
    name: "triage",
    description: "Find suspect phases in a build log and preview their errors",
  },
  args: {
    file: {
      type: "positional",
      description: "Build log to read (- for stdin)",
      required: true,
    },
    config: {
      type: "string",
      description: "Rules file (YAML or JSON)",
      alias: "c",
    },
    format: {
      type: "string",
      description: `Output format (${TRIAGE_FORMATS.join(", ")})`,
      default: "text",
    },
    "max-lines": {
      type: "string",
      description: "Error lines shown per segment",
      default: "5",
    },
    prompt: {
      type: "boolean",
      description: "Also print the summary prompt for the extracted errors",
      default: false,
    },
    "fail-on-error": {
      type: "boolean",
      description: `Exit with status ${EXIT_SUSPECT_SEGMENTS} when suspect segments are found`,
      default: false,
    },
    debug: {
      type: "boolean",
      description: "Write a debug log to ~/.phaselog/debug",
      default: false,
    },
  },
  run: async ({ args }) => {
    const logger = startDebugLog(args.debug === true, "triage");

    try {
      const format = parseChoice(args.format, TRIAGE_FORMATS, "format");
      const maxLines = parsePositiveInt(args["max-lines"], "max-lines");
      const { preset, path } = loadRulesConfig({
        flag: typeof args.config === "string" ? args.config : undefined,
      });
      logger?.log(`Rules: ${path ?? "built-in default preset"}`);

      const triage = createTriage({
        registry: registryFromPreset(preset),
        handlers: createDefaultHandlers({
          keywords: preset.keywords,
          workloads: preset.workloads,
        }),
        initialPhase: preset.initialPhase,
        keywords: preset.keywords,
      });

      const id = describeLogSource(args.file);
      logger?.log(`Input: ${id}`);
      logger?.startPhase("triage");
      const report = await triage.analyze(id, openLogSource(args.file));
      logger?.endPhase("triage");
      logger?.log(
        `${report.flaggedCount} of ${report.segments.length} segments flagged, ${report.lineCount} lines read`
      );
      logger?.close();

      if (format === "json") {
        console.log(formatTriageJson(report));
      } else {
        console.log(formatTriageText(report, maxLines));
      }

      const errors = report.contexts.flatMap((context) => context.errors);
      if (args.prompt && errors.length > 0) {
        console.log();
        console.log(formatPromptMessages(buildSummaryPrompt(errors)));
      }

      if (args["fail-on-error"] && report.flaggedCount > 0) {
        process.exit(EXIT_SUSPECT_SEGMENTS);
      }
    } catch (error) {
      exitWithError(error, logger, "triage");
    }
  },
});
