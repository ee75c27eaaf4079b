import { defineCommand } from "citty";
import { getVersion } from "../utils/version.js";

export const main = defineCommand({
  meta: {
    name: "phaselog",
    version: getVersion(),
    description: "Split CI build logs into pipeline phases and triage failures",
  },
  subCommands: {
    segment: () => import("./segment.js").then((m) => m.segmentCommand),
    triage: () => import("./triage.js").then((m) => m.triageCommand),
    rules: () => import("./rules.js").then((m) => m.rulesCommand),
    version: () => import("./version.js").then((m) => m.versionCommand),
  },
});
