import { load } from "js-yaml";

import { toErrorMessage } from "./errors.js";
import { isYamlException } from "./yaml.js";

export interface YamlParseErrorDetail {
  reason?: string;
  message?: string;
  /** 1-based. */
  line?: number;
  /** 1-based. */
  column?: number;
  error: unknown;
}

export interface ParseYamlDocumentOptions<TError extends Error> {
  emptyValue?: unknown;
  formatError: (detail: YamlParseErrorDetail) => TError;
}

const DEFAULT_EMPTY_VALUE = {};

export function parseYamlDocument<TError extends Error>(
  content: string,
  options: ParseYamlDocumentOptions<TError>,
): unknown {
  const { emptyValue = DEFAULT_EMPTY_VALUE, formatError } = options;

  if (content.trim().length === 0) {
    return emptyValue;
  }

  try {
    return load(content) ?? emptyValue;
  } catch (error) {
    throw formatError(buildYamlParseErrorDetail(error));
  }
}

function buildYamlParseErrorDetail(error: unknown): YamlParseErrorDetail {
  if (!isYamlException(error)) {
    return { message: toErrorMessage(error), error };
  }

  const { reason, message, mark } = error;
  return {
    reason: reason || undefined,
    message: message || undefined,
    line: toOneBased(mark?.line),
    column: toOneBased(mark?.column),
    error,
  };
}

function toOneBased(value: number | undefined): number | undefined {
  return typeof value === "number" && Number.isFinite(value)
    ? value + 1
    : undefined;
}
