import type { ArgSpec, CommandSpec } from "../model/types.js";
import { HelpOutputError } from "./errors.js";
import {
  DEFAULT_HELP_LAYOUT,
  type HelpLayout,
  SIGNATURE_LEFT_PADDING,
  VALID_VALUES_PADDING,
} from "./layout.js";
import { Line } from "./line.js";
import {
  formatBracketed,
  formatOptionName,
  formatValidValues,
  formatValueName,
  getLongNameIndent,
  HELP_OPTION,
  MULTIPLE_VALUES_SUFFIX,
} from "./policy.js";
import { createStreamSink, type HelpSink } from "./sink.js";

export interface HelpMessageWriterOptions {
  /** Where the rendered help goes; defaults to stderr. */
  sink?: HelpSink;
  layout?: HelpLayout;
}

/**
 * Renders the help message of a single command.
 *
 * Sections are written in a fixed order (description, usage, args,
 * commands, options, footer) into an internal buffer that is flushed to the
 * sink once, after the whole message rendered.
 */
export class HelpMessageWriter {
  private readonly sink: HelpSink;
  private readonly layout: HelpLayout;
  private buffer = "";

  constructor(
    private readonly command: CommandSpec,
    options: HelpMessageWriterOptions = {},
  ) {
    this.sink = options.sink ?? createStreamSink();
    this.layout = options.layout ?? DEFAULT_HELP_LAYOUT;
  }

  render(): string {
    this.buffer = "";

    this.writeDescription();
    this.writeHeader();
    this.writePositionalArgs();
    this.writeSubcommands();
    this.writeOptions();
    this.writeFooter();

    const rendered = this.buffer;
    this.buffer = "";
    return rendered;
  }

  write(): void {
    const rendered = this.render();
    try {
      this.sink.write(rendered);
    } catch (error) {
      throw new HelpOutputError(error);
    }
  }

  private newLine(): Line {
    return new Line(this.layout);
  }

  private writeDescription(): void {
    const { description } = this.command;
    if (description !== undefined) {
      this.buffer += `${description}\n\n`;
    }
  }

  private writeHeader(): void {
    const command = this.command;
    let header = `Usage: ${command.name}`;

    if (command.positionalArgs.length >= 1) {
      header += ` ${formatBracketed("ARGS", command.positionalArgRequired)}`;
    }

    if (command.options.length >= 1) {
      header += " [OPTIONS]";
    }

    if (command.subcommands.length >= 1) {
      header += ` ${formatBracketed("COMMAND", command.subcommandRequired)}`;
    }

    this.buffer += `${header}\n`;
  }

  private writePositionalArgs(): void {
    if (this.command.positionalArgs.length === 0) {
      return;
    }

    this.buffer += "\nArgs:\n";

    for (const arg of this.command.positionalArgs) {
      const line = this.newLine();
      line.signature.appendPadding(SIGNATURE_LEFT_PADDING);
      line.signature.append(arg.name);

      if (arg.takesMultipleValues) {
        line.signature.append(MULTIPLE_VALUES_SUFFIX);
      }

      if (arg.description !== undefined) {
        line.description.append(arg.description);
      }

      this.buffer += line.format();
    }
  }

  private writeSubcommands(): void {
    if (this.command.subcommands.length === 0) {
      return;
    }

    this.buffer += "\nCommands:\n";

    for (const subcommand of this.command.subcommands) {
      const line = this.newLine();
      line.signature.appendPadding(SIGNATURE_LEFT_PADDING);
      line.signature.append(subcommand.name);

      if (subcommand.description !== undefined) {
        line.description.append(subcommand.description);
      }

      this.buffer += line.format();
    }
  }

  private writeOptions(): void {
    if (this.command.options.length === 0) {
      return;
    }

    this.buffer += "\nOptions:\n";

    for (const option of this.command.options) {
      this.writeOption(option);
    }

    this.writeOption(HELP_OPTION);
  }

  private writeOption(option: ArgSpec): void {
    const line = this.newLine();
    line.signature.appendPadding(SIGNATURE_LEFT_PADDING);
    line.signature.appendPadding(getLongNameIndent(option));
    line.signature.append(formatOptionName(option));
    line.signature.append(formatValueName(option));

    if (option.description !== undefined) {
      line.description.append(option.description);
      this.buffer += line.format();
    }

    if (option.validValues === undefined) {
      return;
    }

    const values = formatValidValues(option.validValues);

    // Without a description the values share the option's own row.
    if (option.description === undefined) {
      line.description.append(values);
      this.buffer += line.format();
      return;
    }

    const valuesLine = this.newLine();
    valuesLine.description.appendPadding(VALID_VALUES_PADDING);
    valuesLine.description.append(values);
    this.buffer += valuesLine.format();
  }

  private writeFooter(): void {
    if (this.command.subcommands.length >= 1) {
      this.buffer += `\nRun '${this.command.name} <command>' with '-h/--help' flag to get help of any command.\n`;
    }
  }
}

export function renderHelp(
  command: CommandSpec,
  layout: HelpLayout = DEFAULT_HELP_LAYOUT,
): string {
  return new HelpMessageWriter(command, { layout }).render();
}

export function writeHelp(
  command: CommandSpec,
  options: HelpMessageWriterOptions = {},
): void {
  new HelpMessageWriter(command, options).write();
}
