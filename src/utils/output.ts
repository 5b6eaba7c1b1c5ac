import { colorize, type TerminalColor } from "./colors.js";

export type LabeledSeverity = "warn" | "error";

const SEVERITY_LABELS = {
  warn: { label: "Warning", color: "yellow" },
  error: { label: "Error", color: "red" },
} as const satisfies Record<
  LabeledSeverity,
  { label: string; color: TerminalColor }
>;

export function formatCliOutput(value: string): string {
  const trimmedEnd = value.trimEnd();
  return `\n${trimmedEnd}\n\n`;
}

export function formatAlertMessage(
  severity: LabeledSeverity,
  message: string,
): string {
  const { label, color } = SEVERITY_LABELS[severity];
  return `${colorize(`${label}:`, color)} ${message}`;
}

export function formatErrorMessage(message: string): string {
  return formatAlertMessage("error", message);
}
