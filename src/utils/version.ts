import { readFileSync } from "node:fs";

import { z } from "zod";

import { getCliAssetPath } from "./cli-root.js";
import { toErrorMessage } from "./errors.js";

const packageManifestSchema = z.object({
  version: z.string().trim().min(1).optional(),
});

let cachedVersion: string | undefined;

export function getHelpgridVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  let manifest: unknown;
  try {
    manifest = JSON.parse(readFileSync(getCliAssetPath("package.json"), "utf8"));
  } catch (error) {
    console.warn(
      `[helpgrid] Failed to read package version: ${toErrorMessage(error)}`,
    );
    manifest = {};
  }

  const parsed = packageManifestSchema.safeParse(manifest);
  cachedVersion =
    parsed.success && parsed.data.version ? parsed.data.version : "unknown";
  return cachedVersion;
}
