import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const FALLBACK_VERSION = "0.0.0";

const readPackageVersion = (pkgPath: string): string | undefined => {
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  if (
    typeof pkg === "object" &&
    pkg !== null &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  return undefined;
};

export const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, "..", "..", "package.json");
    return readPackageVersion(pkgPath) ?? FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
};
