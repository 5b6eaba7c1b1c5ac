import { describe, expect, it } from "@jest/globals";

import {
  formatBracketed,
  formatOptionName,
  formatValidValues,
  formatValueName,
  getBraces,
  getLongNameIndent,
  HELP_OPTION,
  producesHelpRow,
} from "../../src/help/policy.js";
import {
  booleanOption,
  multiValuesOption,
  singleValueOption,
  singleValueOptionWithValidValues,
} from "../../src/model/arg.js";

describe("help policy", () => {
  it("picks braces from the required flag", () => {
    expect(getBraces(true)).toEqual(["<", ">"]);
    expect(getBraces(false)).toEqual(["[", "]"]);
    expect(formatBracketed("COMMAND", true)).toBe("<COMMAND>");
    expect(formatBracketed("ARGS", false)).toBe("[ARGS]");
  });

  it("indents only options that have a long name but no short name", () => {
    expect(getLongNameIndent(booleanOption("max-time"))).toBe(4);
    expect(getLongNameIndent(booleanOption("time", { short: "t", long: "time" }))).toBe(0);
    expect(getLongNameIndent(booleanOption("verbose", { short: "v" }))).toBe(0);
  });

  it("formats option names", () => {
    expect(formatOptionName(booleanOption("time", { short: "t", long: "time" }))).toBe(
      "-t, --time",
    );
    expect(formatOptionName(booleanOption("verbose", { short: "v" }))).toBe("-v");
    expect(formatOptionName(booleanOption("max-time"))).toBe("--max-time");
  });

  it("formats value names from the placeholder or the arg name", () => {
    expect(formatValueName(booleanOption("quiet"))).toBe("");
    expect(formatValueName(singleValueOption("time", { placeholder: "SECS" }))).toBe(
      "=<SECS>",
    );
    expect(formatValueName(singleValueOption("output"))).toBe("=<output>");
    expect(formatValueName(multiValuesOption("include", { placeholder: "DIR" }))).toBe(
      "=<DIR>...",
    );
  });

  it("lists valid values", () => {
    expect(formatValidValues(["auto", "always", "never"])).toBe(
      "values: auto, always, never",
    );
  });

  it("reports which options produce a help row", () => {
    expect(producesHelpRow(booleanOption("quiet"))).toBe(false);
    expect(producesHelpRow(booleanOption("quiet", { description: "Less" }))).toBe(true);
    expect(producesHelpRow(singleValueOptionWithValidValues("mode", ["a"]))).toBe(true);
  });

  it("defines the built-in help option", () => {
    expect(formatOptionName(HELP_OPTION)).toBe("-h, --help");
    expect(HELP_OPTION.description).toBe("Print this help and exit");
    expect(HELP_OPTION.takesValue).toBe(false);
  });
});
