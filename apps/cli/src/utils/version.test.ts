import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { getVersion } from "./version.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const SEMVER_PATTERN = /^\d+\.\d+\.\d+/;

describe("getVersion", () => {
  it("returns valid semver format", () => {
    expect(getVersion()).toMatch(SEMVER_PATTERN);
  });

  it("returns the package.json version", () => {
    const pkgPath = join(__dirname, "..", "..", "package.json");
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));

    expect(pkg).toMatchObject({ version: getVersion() });
  });
});
