export interface ArgSpec {
  readonly name: string;
  readonly shortName?: string;
  readonly longName?: string;
  readonly description?: string;
  readonly valuePlaceholder?: string;
  readonly validValues?: readonly string[];
  readonly takesValue: boolean;
  readonly takesMultipleValues: boolean;
  readonly required: boolean;
}

export interface CommandSpec {
  readonly name: string;
  readonly description?: string;
  readonly positionalArgs: readonly ArgSpec[];
  readonly subcommands: readonly CommandSpec[];
  readonly options: readonly ArgSpec[];
  readonly positionalArgRequired: boolean;
  readonly subcommandRequired: boolean;
}
