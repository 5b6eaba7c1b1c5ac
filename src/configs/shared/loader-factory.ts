import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import process from "node:process";

import { isMissing } from "../../utils/fs.js";
import { relativeToRoot } from "../../utils/path.js";

export type ReadFileFn = (path: string) => string;

export interface BaseConfigLoaderOptions {
  root?: string;
  filePath?: string;
  readFile?: ReadFileFn;
}

export interface ConfigLoaderContext<TOptions extends BaseConfigLoaderOptions> {
  root: string;
  /** Absolute path of the file being loaded. */
  filePath: string;
  /** `filePath` relative to `root`, for messages. */
  displayPath: string;
  options: Readonly<TOptions>;
}

export interface ConfigLoaderFactorySpec<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
> {
  defaultFileName: string;
  handleMissing: (context: ConfigLoaderContext<TOptions>) => TResult;
  parse: (content: string, context: ConfigLoaderContext<TOptions>) => TResult;
}

export type ConfigLoader<TOptions extends BaseConfigLoaderOptions, TResult> = (
  options: Readonly<TOptions>,
) => TResult;

export function createConfigLoader<
  TResult,
  TOptions extends BaseConfigLoaderOptions,
>(
  spec: ConfigLoaderFactorySpec<TResult, TOptions>,
): ConfigLoader<TOptions, TResult> {
  return (options) => {
    const root = options.root ?? process.cwd();
    const filePath = resolve(root, options.filePath ?? spec.defaultFileName);
    const context: ConfigLoaderContext<TOptions> = {
      root,
      filePath,
      displayPath: relativeToRoot(root, filePath),
      options,
    };

    const readFile = options.readFile ?? defaultReadFile;

    let content: string;
    try {
      content = readFile(filePath);
    } catch (error) {
      if (isMissing(error)) {
        return spec.handleMissing(context);
      }
      throw error;
    }

    return spec.parse(content, context);
  };
}

function defaultReadFile(path: string): string {
  return readFileSync(path, "utf8");
}
