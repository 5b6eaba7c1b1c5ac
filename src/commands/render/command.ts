import { loadCommandDefinition } from "../../configs/definition/loader.js";
import { loadLayoutSettings } from "../../configs/layout/loader.js";
import { type HelpLayout, resolveHelpLayout } from "../../help/layout.js";
import type { HelpSink } from "../../help/sink.js";
import { HelpMessageWriter } from "../../help/writer.js";
import { findSubcommand } from "../../model/command.js";
import type { CommandSpec } from "../../model/types.js";

export interface RenderCommandInput {
  root: string;
  definitionPath: string;
  /** Subcommand names leading from the root command to the one to render. */
  commandPath?: readonly string[];
  settingsPath?: string;
  layout?: Partial<HelpLayout>;
  sink: HelpSink;
}

export interface RenderCommandResult {
  command: CommandSpec;
  layout: HelpLayout;
}

export function executeRenderCommand(
  input: RenderCommandInput,
): RenderCommandResult {
  const { root, definitionPath, commandPath = [], settingsPath, sink } = input;

  const definition = loadCommandDefinition({ root, filePath: definitionPath });
  const command = findSubcommand(definition, commandPath);

  const settings = loadLayoutSettings({
    root,
    filePath: settingsPath,
    required: settingsPath !== undefined,
  });
  const layout = resolveHelpLayout({
    signatureWidth: input.layout?.signatureWidth ?? settings.signatureWidth,
    descriptionWidth:
      input.layout?.descriptionWidth ?? settings.descriptionWidth,
  });

  new HelpMessageWriter(command, { sink, layout }).write();

  return { command, layout };
}
