/**
 * Version information for the Switchyard CLI
 */

import { statSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";

// Kept in sync with package.json by hand
export const VERSION = "0.3.0";

/**
 * mtime of the compiled cli.js next to this file; null when running from sources
 */
export function getBuildTime(): Date | null {
  const cliPath = join(dirname(fileURLToPath(import.meta.url)), "cli.js");
  try {
    return statSync(cliPath).mtime;
  } catch {
    return null;
  }
}

export function getVersionString(): string {
  const buildTime = getBuildTime();
  // "2026-02-07 08:15:32"
  const built = buildTime ? buildTime.toISOString().replace("T", " ").slice(0, 19) : "from source";
  return `v${VERSION} (${built})`;
}
