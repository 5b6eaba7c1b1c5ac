import type { ZodIssue } from "zod";

export function formatSchemaIssueMessage(
  context: string,
  issues: readonly ZodIssue[],
): string {
  const issue = selectMostActionableIssue(issues);
  if (!issue) {
    return `${context}: invalid value.`;
  }

  const path = formatIssuePath(issue.path);

  if (issue.code === "unrecognized_keys") {
    const keys = issue.keys
      .slice()
      .sort()
      .map((key) => `"${key}"`)
      .join(", ");
    const noun = issue.keys.length > 1 ? "keys" : "key";
    return `${context}: ${path}: unknown ${noun} ${keys}.`;
  }

  return `${context}: ${path}: ${normalizeMessage(issue.message)}.`;
}

function selectMostActionableIssue(
  issues: readonly ZodIssue[],
): ZodIssue | undefined {
  const unrecognizedKeyIssue = issues.find(
    (issue) => issue.code === "unrecognized_keys",
  );
  return unrecognizedKeyIssue ?? issues[0];
}

export function formatIssuePath(path: readonly PropertyKey[]): string {
  if (path.length === 0) {
    return "<root>";
  }

  let formatted = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      formatted += `[${segment}]`;
      continue;
    }

    if (typeof segment === "symbol") {
      const symbolLabel = segment.description ?? segment.toString();
      formatted =
        formatted.length === 0 ? symbolLabel : `${formatted}.${symbolLabel}`;
      continue;
    }

    formatted = formatted.length === 0 ? segment : `${formatted}.${segment}`;
  }

  return formatted;
}

export function normalizeMessage(message: string): string {
  const compact = message.replace(/\s+/gu, " ").trim();
  return compact.replace(/[.]$/u, "");
}
