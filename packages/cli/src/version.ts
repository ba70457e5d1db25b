import { readFileSync } from "node:fs";

const MANIFEST_URL = new URL("../package.json", import.meta.url);

export function readVersion(manifestUrl: URL = MANIFEST_URL): string {
  const manifest: unknown = JSON.parse(readFileSync(manifestUrl, "utf8"));
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  throw new Error(`No version field in ${manifestUrl.pathname}`);
}
