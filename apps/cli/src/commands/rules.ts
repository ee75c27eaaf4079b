import { registryFromPreset } from "@phaselog/segmenter";
import { defineCommand } from "citty";
import { loadRulesConfig } from "../lib/config.js";
import { exitWithError } from "../lib/errors.js";
import { formatRules } from "../utils/format.js";

export const rulesCommand = defineCommand({
  meta: {
    name: "rules",
    description: "Show the effective boundary rules",
  },
  args: {
    config: {
      type: "string",
      description: "Rules file (YAML or JSON)",
      alias: "c",
    },
  },
  run: ({ args }) => {
    try {
      const { preset, path } = loadRulesConfig({
        flag: typeof args.config === "string" ? args.config : undefined,
      });
      console.log(
        formatRules(registryFromPreset(preset), preset.initialPhase, path)
      );
    } catch (error) {
      exitWithError(error, undefined, "rules");
    }
  },
});
