import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageJson = z.object({ version: z.string() });

/**
 * Read the version from a package.json relative to this file, if there is one.
 */
function readVersion(relativePath: string): string | undefined {
  try {
    const pkgPath = new URL(relativePath, import.meta.url);
    const parsed = PackageJson.safeParse(JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8")));
    return parsed.success ? parsed.data.version : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Library version (single source of truth)
 *
 * Resolves package.json from src/ (tests, tsx) and from dist/src/ (build).
 */
export const VERSION: string =
  readVersion("../package.json") ?? readVersion("../../package.json") ?? "0.0.0";
