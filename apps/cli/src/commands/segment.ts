import {
  createEngine,
  registryFromPreset,
  type SegmentationEngine,
} from "@phaselog/segmenter";
import { defineCommand } from "citty";
import { loadRulesConfig } from "../lib/config.js";
import { exitWithError } from "../lib/errors.js";
import { describeLogSource, openLogSource } from "../lib/input.js";
import { startDebugLog } from "../utils/debug-logger.js";
import {
  formatSegments,
  parseChoice,
  SEGMENT_FORMATS,
} from "../utils/format.js";

export const segmentCommand = defineCommand({
  meta: {
    name: "segment",
    description: "Split a build log into phase segments",
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
      description: `Output format (${SEGMENT_FORMATS.join(", ")})`,
      default: "text",
    },
    debug: {
      type: "boolean",
      description: "Write a debug log to ~/.phaselog/debug",
      default: false,
    },
  },
  run: async ({ args }) => {
    const logger = startDebugLog(args.debug === true, "segment");
    let engine: SegmentationEngine | undefined;

    try {
      const format = parseChoice(args.format, SEGMENT_FORMATS, "format");
      const { preset, path } = loadRulesConfig({
        flag: typeof args.config === "string" ? args.config : undefined,
      });
      logger?.log(`Rules: ${path ?? "built-in default preset"}`);
      logger?.log(`Input: ${describeLogSource(args.file)}`);

      engine = createEngine(registryFromPreset(preset), {
        initialPhase: preset.initialPhase,
        keywords: preset.keywords,
        onSegment: (segment) =>
          logger?.logPhase(
            "segment",
            `${segment.phaseLabel} @${segment.startLine} (${segment.lineCount} lines${segment.flagged ? ", flagged" : ""})`
          ),
      });

      logger?.startPhase("segment");
      const segments = await engine.runAsync(openLogSource(args.file));
      logger?.endPhase("segment");
      logger?.log(`${engine.linesProcessed} lines read`);
      logger?.close();

      console.log(formatSegments(segments, format));
    } catch (error) {
      if (engine?.lastSeenLine !== undefined) {
        logger?.log(`Last line read: ${engine.lastSeenLine}`);
      }
      exitWithError(error, logger, "segment");
    }
  },
});
