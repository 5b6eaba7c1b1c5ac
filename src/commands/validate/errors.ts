import { CliError } from "../../cli/errors.js";

export class ValidateCommandError extends CliError {
  constructor(public readonly failures: readonly string[]) {
    super(
      failures.length === 1
        ? "Help for 1 command cannot be rendered."
        : `Help for ${failures.length} commands cannot be rendered.`,
      failures.map((failure) => `  - ${failure}`),
      ["Shorten the affected entries or widen the layout in `helpgrid.yaml`."],
    );
    this.name = "ValidateCommandError";
  }
}
