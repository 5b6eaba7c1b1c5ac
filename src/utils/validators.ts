import { ValidationError } from "./errors.js";

const POSITIVE_INTEGER_PATTERN = /^\d+$/u;

export function parsePositiveInteger(
  value: unknown,
  invalidMessage: string,
): number {
  const trimmed = typeof value === "string" ? value.trim() : "";
  const parsed = POSITIVE_INTEGER_PATTERN.test(trimmed)
    ? Number.parseInt(trimmed, 10)
    : Number.NaN;

  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${invalidMessage} (received "${String(value)}").`);
  }

  return parsed;
}
