import { describe, expect, it } from "@jest/globals";

import {
  booleanOption,
  defineOption,
  multiValuesOption,
  positionalArg,
  singleValueOption,
  singleValueOptionWithValidValues,
} from "../../src/model/arg.js";
import { InvalidArgError } from "../../src/model/errors.js";

describe("arg builders", () => {
  it("uses the name as long name when no short name is given", () => {
    const option = booleanOption("dry-run", { description: "Print only" });
    expect(option).toEqual({
      name: "dry-run",
      shortName: undefined,
      longName: "dry-run",
      description: "Print only",
      valuePlaceholder: undefined,
      validValues: undefined,
      takesValue: false,
      takesMultipleValues: false,
      required: false,
    });
  });

  it("omits the long name for a short-only option", () => {
    const option = booleanOption("verbose", { short: "v" });
    expect(option.shortName).toBe("v");
    expect(option.longName).toBeUndefined();
  });

  it("keeps both names when both are given", () => {
    const option = singleValueOption("time", {
      short: "t",
      long: "time",
      placeholder: "SECS",
    });
    expect(option.shortName).toBe("t");
    expect(option.longName).toBe("time");
    expect(option.valuePlaceholder).toBe("SECS");
    expect(option.takesValue).toBe(true);
  });

  it("marks multi-value and enumerated options as taking values", () => {
    expect(multiValuesOption("include").takesMultipleValues).toBe(true);
    expect(multiValuesOption("include").takesValue).toBe(true);

    const mode = singleValueOptionWithValidValues("mode", ["fast", "slow"]);
    expect(mode.validValues).toEqual(["fast", "slow"]);
    expect(mode.takesValue).toBe(true);

    const implied = defineOption("level", {}, {
      takesValue: false,
      takesMultipleValues: false,
      validValues: ["1", "2"],
    });
    expect(implied.takesValue).toBe(true);
  });

  it("builds positional args", () => {
    expect(positionalArg("FILE", { multiple: true, required: true })).toEqual({
      name: "FILE",
      description: undefined,
      takesValue: true,
      takesMultipleValues: true,
      required: true,
    });
  });

  it("rejects invalid names", () => {
    expect(() => booleanOption("time", { short: "ti" })).toThrow(
      "Invalid argument `time`: short name must be a single character",
    );
    expect(() => booleanOption("time", { long: "--time" })).toThrow(
      InvalidArgError,
    );
    expect(() => positionalArg(" ")).toThrow(InvalidArgError);
    expect(() => singleValueOptionWithValidValues("mode", [])).toThrow(
      "Invalid argument `mode`: valid values must not be empty",
    );
  });
});
