import process from "node:process";

import { Command } from "commander";

import { executeRenderCommand } from "../commands/render/command.js";
import { createStreamSink, type HelpSink } from "../help/sink.js";
import { parsePositiveInteger } from "../utils/validators.js";

export interface RenderCommandOptions {
  definition: string;
  command?: readonly string[];
  stdout?: boolean;
  settings?: string;
  signatureWidth?: number;
  descriptionWidth?: number;
  sink?: HelpSink;
}

export function runRenderCommand(options: RenderCommandOptions): void {
  const sink =
    options.sink ??
    createStreamSink(options.stdout ? process.stdout : process.stderr);

  executeRenderCommand({
    root: process.cwd(),
    definitionPath: options.definition,
    commandPath: options.command,
    settingsPath: options.settings,
    layout: {
      signatureWidth: options.signatureWidth,
      descriptionWidth: options.descriptionWidth,
    },
    sink,
  });
}

interface RenderCommandActionOptions {
  command?: string[];
  stdout?: boolean;
  settings?: string;
  signatureWidth?: number;
  descriptionWidth?: number;
}

function parseSignatureWidthOption(value: string): number {
  return parsePositiveInteger(
    value,
    "Expected positive integer after --signature-width",
  );
}

function parseDescriptionWidthOption(value: string): number {
  return parsePositiveInteger(
    value,
    "Expected positive integer after --description-width",
  );
}

export function createRenderCommand(): Command {
  return new Command("render")
    .description("Render the help text of a command definition")
    .argument("<definition>", "Path to the command definition YAML file")
    .option(
      "--command <names...>",
      "Subcommand path to render instead of the root command",
    )
    .option("--stdout", "Write help to stdout instead of stderr")
    .option(
      "--settings <path>",
      "Layout settings file (defaults to helpgrid.yaml when present)",
    )
    .option(
      "--signature-width <columns>",
      "Width of the signature column",
      parseSignatureWidthOption,
    )
    .option(
      "--description-width <columns>",
      "Width of the description column",
      parseDescriptionWidthOption,
    )
    .allowExcessArguments(false)
    .action((definition: string, options: RenderCommandActionOptions) => {
      runRenderCommand({ definition, ...options });
    });
}
