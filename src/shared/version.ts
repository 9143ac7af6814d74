import * as fs from "node:fs";

const FALLBACK_VERSION = "0.0.0";

let cachedVersion: string | undefined;

/**
 * Read the package version from package.json (two levels up from both
 * src/shared and dist/shared).
 */
export function getTrafficLensVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  try {
    const raw = fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
    const parsed: unknown = JSON.parse(raw);
    cachedVersion =
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
        ? parsed.version
        : FALLBACK_VERSION;
  } catch {
    cachedVersion = FALLBACK_VERSION;
  }

  return cachedVersion;
}
