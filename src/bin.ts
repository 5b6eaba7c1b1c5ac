#!/usr/bin/env node

import process from "node:process";

import { Command, CommanderError } from "commander";

import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, toCliError } from "./cli/errors.js";
import { writeCommandOutput } from "./cli/output.js";
import { createRenderCommand } from "./cli/render.js";
import { createValidateCommand } from "./cli/validate.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { getHelpgridVersion } from "./utils/version.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("helpgrid")
    .description("Render column-aligned CLI help text from command definitions")
    .version(getHelpgridVersion(), "-v, --version", "print the helpgrid version")
    .exitOverride()
    .showHelpAfterError()
    .helpCommand(false);

  for (const command of [createRenderCommand(), createValidateCommand()]) {
    // Subcommands added with addCommand do not inherit exitOverride.
    program.addCommand(command.exitOverride());
  }

  return program;
}

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = createProgram();

  if (argv.length <= 2) {
    writeCommandOutput({ body: program.helpInformation() });
    return;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode;
        return;
      }

      writeCommandOutput({
        stderr: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode,
      });
      return;
    }

    writeCommandOutput({
      stderr: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

function shouldAutorun(): boolean {
  if (process.env.HELPGRID_CLI_SKIP_AUTORUN === "1") {
    return false;
  }
  return require.main === module;
}

if (shouldAutorun()) {
  runCli().catch((error: unknown) => {
    console.error(`[helpgrid] Unexpected failure: ${toErrorMessage(error)}`);
    process.exitCode = 1;
  });
}
