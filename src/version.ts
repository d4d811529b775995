import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

/**
 * Package version (single source of truth)
 *
 * Reads from package.json, with optional env override. Resolved relative to
 * this file so it works from src/ (vitest) and from dist/src/ (built CLI).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    for (const candidate of ["../package.json", "../../package.json"]) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(fileURLToPath(new URL(candidate, import.meta.url)), "utf-8"));
        if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
          return pkg.version;
        }
      } catch {
        // try the next level up
      }
    }
    return "0.0.0";
  })();
