/**
 * Version management for the CLI
 *
 * Reads the version from package.json at runtime for consistency.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Get the package version from package.json
 *
 * Both src/cli/ and dist/cli/ sit two levels below the package root.
 */
export function getPackageVersion(moduleUrl: string = import.meta.url): string {
  try {
    const moduleDir = dirname(fileURLToPath(moduleUrl));
    const packagePath = join(moduleDir, "../../package.json");
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
    if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson) {
      const { version } = packageJson;
      if (typeof version === "string" && version) {
        return version;
      }
    }
    return "0.0.0";
  } catch {
    // Fallback if package.json is not where we expect (e.g. bundled copy)
    return "0.0.0";
  }
}

export const VERSION = getPackageVersion();
