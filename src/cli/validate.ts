import process from "node:process";

import { Command } from "commander";

import { executeValidateCommand } from "../commands/validate/command.js";
import { renderValidateTranscript } from "../render/transcripts/validate.js";
import { type Alert, writeCommandOutput } from "./output.js";

export interface ValidateCommandOptions {
  definition: string;
  settings?: string;
}

export interface ValidateCommandResult {
  alerts: Alert[];
  body: string;
}

export function runValidateCommand(
  options: ValidateCommandOptions,
): ValidateCommandResult {
  const result = executeValidateCommand({
    root: process.cwd(),
    definitionPath: options.definition,
    settingsPath: options.settings,
  });

  const alerts: Alert[] = result.hiddenOptions.map((entry) => ({
    severity: "warn",
    message: `Option \`${entry.optionName}\` of \`${entry.commandPath}\` will not appear in help.`,
  }));

  return {
    alerts,
    body: renderValidateTranscript(options.definition, result),
  };
}

export function createValidateCommand(): Command {
  return new Command("validate")
    .description("Check that a command definition loads and renders")
    .argument("<definition>", "Path to the command definition YAML file")
    .option("--settings <path>", "Layout settings file")
    .allowExcessArguments(false)
    .action((definition: string, options: { settings?: string }) => {
      const result = runValidateCommand({ definition, ...options });
      writeCommandOutput({ body: result.body, alerts: result.alerts });
    });
}
