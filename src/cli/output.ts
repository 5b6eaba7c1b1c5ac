import { formatAlertMessage, formatCliOutput } from "../utils/output.js";

export type AlertSeverity = "info" | "warn" | "error";

export interface Alert {
  readonly severity: AlertSeverity;
  readonly message: string;
}

export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly alerts?: readonly Alert[];
  /** Written to stderr with the same framing as `body`. */
  readonly stderr?: string;
  readonly exitCode?: number;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  const alerts = payload.alerts ?? [];
  if (alerts.length > 0) {
    process.stdout.write("\n");
  }

  for (const alert of alerts) {
    const formattedAlert = `${formatAlert(alert)}\n`;
    if (alert.severity === "info") {
      process.stdout.write(formattedAlert);
    } else {
      process.stderr.write(formattedAlert);
    }
  }

  if (payload.stderr !== undefined && payload.stderr.trim().length > 0) {
    process.stderr.write(formatCliOutput(payload.stderr));
  }

  const body = payload.body;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(formatCliOutput(normalizedBody));
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

function formatAlert(alert: Alert): string {
  switch (alert.severity) {
    case "error":
    case "warn":
      return formatAlertMessage(alert.severity, alert.message);
    case "info":
      return alert.message;
  }
}
