import { HintedError } from "../utils/errors.js";

export class CommandModelError extends HintedError {
  constructor(
    message: string,
    detailLines: readonly string[] = [],
    hintLines: readonly string[] = [],
  ) {
    super(message, { detailLines, hintLines });
    this.name = "CommandModelError";
  }
}

export class InvalidArgError extends CommandModelError {
  constructor(
    public readonly argName: string,
    reason: string,
  ) {
    super(`Invalid argument \`${argName}\`: ${reason}`);
    this.name = "InvalidArgError";
  }
}

export class DuplicateArgError extends CommandModelError {
  constructor(
    public readonly commandName: string,
    public readonly argName: string,
  ) {
    super(`Command \`${commandName}\` declares \`${argName}\` more than once.`);
    this.name = "DuplicateArgError";
  }
}

export class SubcommandNotFoundError extends CommandModelError {
  constructor(
    public readonly path: readonly string[],
    public readonly available: readonly string[],
  ) {
    super(
      `Subcommand not found: ${path.join(" ")}`,
      available.length > 0
        ? [`Available commands: ${available.join(", ")}`]
        : ["This command has no subcommands."],
    );
    this.name = "SubcommandNotFoundError";
  }
}
