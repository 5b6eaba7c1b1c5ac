import { booleanOption } from "../model/arg.js";
import type { ArgSpec } from "../model/types.js";
import { SIGNATURE_LEFT_PADDING } from "./layout.js";

export type Braces = readonly [open: string, close: string];

const REQUIRED_BRACES: Braces = ["<", ">"];
const OPTIONAL_BRACES: Braces = ["[", "]"];

export const MULTIPLE_VALUES_SUFFIX = "...";

export const HELP_OPTION: ArgSpec = booleanOption("help", {
  short: "h",
  long: "help",
  description: "Print this help and exit",
});

export function getBraces(required: boolean): Braces {
  return required ? REQUIRED_BRACES : OPTIONAL_BRACES;
}

export function formatBracketed(label: string, required: boolean): string {
  const [open, close] = getBraces(required);
  return `${open}${label}${close}`;
}

/**
 * Extra indent for options without a short name, so every long name starts
 * in the same column:
 *
 *     -t, --time
 *         --max-time
 */
export function getLongNameIndent(option: ArgSpec): number {
  return option.shortName === undefined && option.longName !== undefined
    ? SIGNATURE_LEFT_PADDING
    : 0;
}

export function formatOptionName(option: ArgSpec): string {
  const { shortName, longName } = option;
  if (shortName !== undefined && longName !== undefined) {
    return `-${shortName}, --${longName}`;
  }
  if (shortName !== undefined) {
    return `-${shortName}`;
  }
  if (longName !== undefined) {
    return `--${longName}`;
  }
  return "";
}

export function formatValueName(option: ArgSpec): string {
  if (!option.takesValue) {
    return "";
  }
  const valueName = option.valuePlaceholder ?? option.name;
  const suffix = option.takesMultipleValues ? MULTIPLE_VALUES_SUFFIX : "";
  return `=<${valueName}>${suffix}`;
}

export function formatValidValues(values: readonly string[]): string {
  return `values: ${values.join(", ")}`;
}

/** Options with neither a description nor valid values get no help row. */
export function producesHelpRow(option: ArgSpec): boolean {
  return option.description !== undefined || option.validValues !== undefined;
}
