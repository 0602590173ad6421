import fs from "node:fs";

// Source layout first, then the compiled layout under dist/.
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"];

function readVersionFromPackageJson(): string | null {
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    const url = new URL(candidate, import.meta.url);
    if (!fs.existsSync(url)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(url, "utf-8"));
    if (pkg !== null && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return null;
}

// Single source of truth for the current stackplan version.
// - Bundled builds: env var.
// - Dev/npm builds: package.json.
export const VERSION = process.env.STACKPLAN_BUNDLED_VERSION || readVersionFromPackageJson() || "0.0.0";
