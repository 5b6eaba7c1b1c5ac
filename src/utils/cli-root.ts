import { existsSync } from "node:fs";
import { dirname, resolve as resolveNative } from "node:path";

const PACKAGE_JSON_FILENAME = "package.json" as const;

let cachedCliRoot: string | undefined;

/**
 * Nearest directory above this module that holds a package.json; the same
 * lookup works from `src/` under the test runner and from `dist/`.
 */
export function resolveCliAssetRoot(): string {
  if (cachedCliRoot) {
    return cachedCliRoot;
  }

  let current = __dirname;
  while (!existsSync(resolveNative(current, PACKAGE_JSON_FILENAME))) {
    const parent = dirname(current);
    if (parent === current) {
      throw new Error(
        `Unable to locate the helpgrid package root starting from "${__dirname}".`,
      );
    }
    current = parent;
  }

  cachedCliRoot = current;
  return cachedCliRoot;
}

export function getCliAssetPath(...segments: string[]): string {
  return resolveNative(resolveCliAssetRoot(), ...segments);
}
