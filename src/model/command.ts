import { DuplicateArgError, InvalidArgError, SubcommandNotFoundError } from "./errors.js";
import type { ArgSpec, CommandSpec } from "./types.js";

export interface CommandInit {
  description?: string;
  args?: readonly ArgSpec[];
  options?: readonly ArgSpec[];
  subcommands?: readonly CommandSpec[];
  /** Defaults to whether any positional arg is marked required. */
  positionalArgRequired?: boolean;
  subcommandRequired?: boolean;
}

export function defineCommand(
  name: string,
  init: CommandInit = {},
): CommandSpec {
  if (name.trim().length === 0) {
    throw new InvalidArgError(name, "command name must not be empty");
  }

  const positionalArgs = [...(init.args ?? [])];
  const options = [...(init.options ?? [])];
  const subcommands = [...(init.subcommands ?? [])];

  assertUnique(
    name,
    [...positionalArgs, ...options].map((arg) => arg.name),
  );
  assertUnique(
    name,
    subcommands.map((subcommand) => subcommand.name),
  );
  assertUnique(
    name,
    options.flatMap((option) =>
      option.shortName !== undefined ? [`-${option.shortName}`] : [],
    ),
  );
  assertUnique(
    name,
    options.flatMap((option) =>
      option.longName !== undefined ? [`--${option.longName}`] : [],
    ),
  );

  return {
    name,
    description: init.description,
    positionalArgs,
    subcommands,
    options,
    positionalArgRequired:
      init.positionalArgRequired ?? positionalArgs.some((arg) => arg.required),
    subcommandRequired: Boolean(init.subcommandRequired),
  };
}

/**
 * Walks `path` down the subcommand tree; an empty path yields `root`.
 */
export function findSubcommand(
  root: CommandSpec,
  path: readonly string[],
): CommandSpec {
  let current = root;
  for (const [index, segment] of path.entries()) {
    const next = current.subcommands.find(
      (subcommand) => subcommand.name === segment,
    );
    if (!next) {
      throw new SubcommandNotFoundError(
        path.slice(0, index + 1),
        current.subcommands.map((subcommand) => subcommand.name),
      );
    }
    current = next;
  }
  return current;
}

export function countCommands(root: CommandSpec): number {
  return root.subcommands.reduce(
    (total, subcommand) => total + countCommands(subcommand),
    1,
  );
}

function assertUnique(commandName: string, names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new DuplicateArgError(commandName, name);
    }
    seen.add(name);
  }
}
