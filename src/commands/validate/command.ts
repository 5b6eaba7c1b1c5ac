import { loadCommandDefinition } from "../../configs/definition/loader.js";
import { loadLayoutSettings } from "../../configs/layout/loader.js";
import { producesHelpRow } from "../../help/policy.js";
import { renderHelp } from "../../help/writer.js";
import { countCommands } from "../../model/command.js";
import type { CommandSpec } from "../../model/types.js";
import { toErrorMessage } from "../../utils/errors.js";
import { ValidateCommandError } from "./errors.js";

export interface ValidateCommandInput {
  root: string;
  definitionPath: string;
  settingsPath?: string;
}

export interface HiddenOptionEntry {
  /** Space-separated command path, root command first. */
  commandPath: string;
  optionName: string;
}

export interface ValidateCommandResult {
  rootName: string;
  commandCount: number;
  optionCount: number;
  hiddenOptions: HiddenOptionEntry[];
}

export function executeValidateCommand(
  input: ValidateCommandInput,
): ValidateCommandResult {
  const { root, definitionPath, settingsPath } = input;

  const definition = loadCommandDefinition({ root, filePath: definitionPath });
  const layout = loadLayoutSettings({
    root,
    filePath: settingsPath,
    required: settingsPath !== undefined,
  });

  const hiddenOptions: HiddenOptionEntry[] = [];
  const failures: string[] = [];
  let optionCount = 0;

  visitCommands(definition, [], (command, path) => {
    const commandPath = path.join(" ");
    optionCount += command.options.length;

    for (const option of command.options) {
      if (!producesHelpRow(option)) {
        hiddenOptions.push({ commandPath, optionName: option.name });
      }
    }

    try {
      renderHelp(command, layout);
    } catch (error) {
      failures.push(`${commandPath}: ${toErrorMessage(error)}`);
    }
  });

  if (failures.length > 0) {
    throw new ValidateCommandError(failures);
  }

  return {
    rootName: definition.name,
    commandCount: countCommands(definition),
    optionCount,
    hiddenOptions,
  };
}

function visitCommands(
  command: CommandSpec,
  parentPath: readonly string[],
  visit: (command: CommandSpec, path: readonly string[]) => void,
): void {
  const path = [...parentPath, command.name];
  visit(command, path);
  for (const subcommand of command.subcommands) {
    visitCommands(subcommand, path, visit);
  }
}
