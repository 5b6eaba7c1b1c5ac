import { HintedError } from "../../utils/errors.js";

export const DEFAULT_DEFINITION_ERROR_CONTEXT =
  "Invalid command definition" as const;

const DEFINITION_HINT = [
  "Run `helpgrid validate <definition>` after fixing the file.",
] as const satisfies readonly string[];

export class CommandDefinitionError extends HintedError {
  constructor(message: string, hintLines: readonly string[] = DEFINITION_HINT) {
    super(message, { hintLines });
    this.name = "CommandDefinitionError";
  }
}

export class MissingCommandDefinitionError extends CommandDefinitionError {
  constructor(public readonly filePath: string) {
    super(`Missing command definition file at ${filePath}.`, [
      "Check the path passed on the command line.",
    ]);
    this.name = "MissingCommandDefinitionError";
  }
}

export class CommandDefinitionYamlParseError extends CommandDefinitionError {
  constructor(message: string) {
    super(message);
    this.name = "CommandDefinitionYamlParseError";
  }
}

export class CommandDefinitionSchemaError extends CommandDefinitionError {
  constructor(message: string) {
    super(message);
    this.name = "CommandDefinitionSchemaError";
  }
}
