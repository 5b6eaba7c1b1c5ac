import { defineOption, positionalArg } from "../../model/arg.js";
import { defineCommand } from "../../model/command.js";
import { CommandModelError } from "../../model/errors.js";
import type { ArgSpec, CommandSpec } from "../../model/types.js";
import {
  parseYamlDocument,
  type YamlParseErrorDetail,
} from "../../utils/yaml-reader.js";
import { createConfigLoader } from "../shared/loader-factory.js";
import {
  formatIssuePath,
  formatSchemaIssueMessage,
  normalizeMessage,
} from "../shared/schema-issues.js";
import { formatYamlErrorMessage } from "../shared/yaml-error-formatter.js";
import {
  CommandDefinitionSchemaError,
  CommandDefinitionYamlParseError,
  DEFAULT_DEFINITION_ERROR_CONTEXT,
  MissingCommandDefinitionError,
} from "./errors.js";
import {
  type CommandDefinition,
  commandDefinitionSchema,
  type OptionDefinition,
} from "./types.js";

export const DEFAULT_DEFINITION_FILENAME = "helpgrid.command.yaml" as const;

export interface LoadCommandDefinitionOptions {
  root?: string;
  filePath?: string;
  readFile?: (path: string) => string;
}

const loadCommandDefinitionInternal = createConfigLoader<
  CommandSpec,
  LoadCommandDefinitionOptions
>({
  defaultFileName: DEFAULT_DEFINITION_FILENAME,
  handleMissing: ({ displayPath }) => {
    throw new MissingCommandDefinitionError(displayPath);
  },
  parse: (content, { displayPath }) =>
    readCommandDefinition(content, displayPath),
});

export function loadCommandDefinition(
  options: LoadCommandDefinitionOptions = {},
): CommandSpec {
  return loadCommandDefinitionInternal(options);
}

export function readCommandDefinition(
  content: string,
  displayPath?: string,
): CommandSpec {
  const parsed = parseYamlDocument(content, {
    formatError: (detail) => formatDefinitionYamlError(detail, displayPath),
  });

  const result = commandDefinitionSchema.safeParse(parsed);
  if (!result.success) {
    throw new CommandDefinitionSchemaError(
      formatSchemaIssueMessage(
        withDisplayPath(displayPath),
        result.error.issues,
      ),
    );
  }

  return buildCommand(result.data, [], displayPath);
}

function buildCommand(
  definition: CommandDefinition,
  path: readonly PropertyKey[],
  displayPath: string | undefined,
): CommandSpec {
  const args = (definition.args ?? []).map((arg, index) =>
    withModelContext([...path, "args", index], displayPath, () =>
      positionalArg(arg.name, {
        description: arg.description,
        multiple: arg.multiple,
        required: arg.required,
      }),
    ),
  );

  const options = (definition.options ?? []).map((option, index) =>
    withModelContext([...path, "options", index], displayPath, () =>
      buildOption(option),
    ),
  );

  const subcommands = (definition.subcommands ?? []).map((subcommand, index) =>
    buildCommand(subcommand, [...path, "subcommands", index], displayPath),
  );

  return withModelContext(path, displayPath, () =>
    defineCommand(definition.name, {
      description: definition.description,
      args,
      options,
      subcommands,
      positionalArgRequired: definition.positionalArgRequired,
      subcommandRequired: definition.subcommandRequired,
    }),
  );
}

function buildOption(option: OptionDefinition): ArgSpec {
  return defineOption(
    option.name,
    {
      short: option.short,
      long: option.long,
      description: option.description,
      placeholder: option.placeholder,
      required: option.required,
    },
    {
      takesValue: Boolean(option.takesValue),
      takesMultipleValues: Boolean(option.multiple),
      validValues: option.values,
    },
  );
}

function withModelContext<T>(
  path: readonly PropertyKey[],
  displayPath: string | undefined,
  build: () => T,
): T {
  try {
    return build();
  } catch (error) {
    if (error instanceof CommandModelError) {
      throw new CommandDefinitionSchemaError(
        `${withDisplayPath(displayPath)}: ${formatIssuePath(path)}: ${normalizeMessage(error.headline)}.`,
      );
    }
    throw error;
  }
}

function withDisplayPath(displayPath: string | undefined): string {
  return displayPath
    ? `${DEFAULT_DEFINITION_ERROR_CONTEXT} (${displayPath})`
    : DEFAULT_DEFINITION_ERROR_CONTEXT;
}

function formatDefinitionYamlError(
  detail: YamlParseErrorDetail,
  displayPath: string | undefined,
): CommandDefinitionYamlParseError {
  return new CommandDefinitionYamlParseError(
    formatYamlErrorMessage(detail, {
      context: DEFAULT_DEFINITION_ERROR_CONTEXT,
      displayPath,
      fallbackReason: "file contains invalid YAML",
    }),
  );
}
