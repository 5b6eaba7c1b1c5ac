import { describe, expect, test } from "@jest/globals";

import { createConfigLoader } from "../../../src/configs/shared/loader-factory.js";

interface TestLoaderOptions {
  root?: string;
  filePath?: string;
  readFile?: (path: string) => string;
}

const TEST_ROOT = "/repo";

const baseLoader = createConfigLoader<string, TestLoaderOptions>({
  defaultFileName: "config.yaml",
  handleMissing: ({ displayPath }) => `missing ${displayPath}`,
  parse: (content, { displayPath }) => `${displayPath}: ${content}`,
});

describe("createConfigLoader", () => {
  test("returns the fallback result when ENOENT occurs", () => {
    const error = new Error("missing") as NodeJS.ErrnoException;
    error.code = "ENOENT";

    const result = baseLoader({
      root: TEST_ROOT,
      readFile: () => {
        throw error;
      },
    });

    expect(result).toBe("missing config.yaml");
  });

  test("rethrows other read errors", () => {
    const error = new Error("denied") as NodeJS.ErrnoException;
    error.code = "EACCES";

    expect(() =>
      baseLoader({
        root: TEST_ROOT,
        readFile: () => {
          throw error;
        },
      }),
    ).toThrow("denied");
  });

  test("resolves the file path against the root", () => {
    const readFile = jest.fn((path: string) => `contents of ${path}`);

    const result = baseLoader({
      root: TEST_ROOT,
      filePath: "nested/custom.yaml",
      readFile,
    });

    expect(readFile).toHaveBeenCalledWith("/repo/nested/custom.yaml");
    expect(result).toBe(
      "nested/custom.yaml: contents of /repo/nested/custom.yaml",
    );
  });

  test("keeps absolute file paths", () => {
    const result = baseLoader({
      root: TEST_ROOT,
      filePath: "/elsewhere/config.yaml",
      readFile: () => "data",
    });

    expect(result).toBe("../elsewhere/config.yaml: data");
  });
});
