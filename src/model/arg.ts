import { InvalidArgError } from "./errors.js";
import type { ArgSpec } from "./types.js";

export interface OptionInit {
  /** Single-character name used as `-x`. */
  short?: string;
  /** Name used as `--name`; defaults to the arg name when `short` is absent. */
  long?: string;
  description?: string;
  placeholder?: string;
  required?: boolean;
}

export interface PositionalInit {
  description?: string;
  multiple?: boolean;
  required?: boolean;
}

export interface ValueShape {
  takesValue: boolean;
  takesMultipleValues: boolean;
  validValues?: readonly string[];
}

export function booleanOption(name: string, init: OptionInit = {}): ArgSpec {
  return defineOption(name, init, {
    takesValue: false,
    takesMultipleValues: false,
  });
}

export function singleValueOption(
  name: string,
  init: OptionInit = {},
): ArgSpec {
  return defineOption(name, init, {
    takesValue: true,
    takesMultipleValues: false,
  });
}

export function singleValueOptionWithValidValues(
  name: string,
  validValues: readonly string[],
  init: OptionInit = {},
): ArgSpec {
  return defineOption(name, init, {
    takesValue: true,
    takesMultipleValues: false,
    validValues,
  });
}

export function multiValuesOption(
  name: string,
  init: OptionInit = {},
): ArgSpec {
  return defineOption(name, init, {
    takesValue: true,
    takesMultipleValues: true,
  });
}

export function positionalArg(
  name: string,
  init: PositionalInit = {},
): ArgSpec {
  assertName(name);
  return {
    name,
    description: init.description,
    takesValue: true,
    takesMultipleValues: Boolean(init.multiple),
    required: Boolean(init.required),
  };
}

/**
 * General option constructor behind the `*Option` helpers. Valid values and
 * multiple values both imply that the option takes a value.
 */
export function defineOption(
  name: string,
  init: OptionInit,
  shape: ValueShape,
): ArgSpec {
  assertName(name);

  const shortName = init.short;
  if (shortName !== undefined && Array.from(shortName).length !== 1) {
    throw new InvalidArgError(name, "short name must be a single character");
  }

  const longName = init.long ?? (shortName === undefined ? name : undefined);
  if (
    longName !== undefined &&
    (longName.length === 0 || longName.startsWith("-"))
  ) {
    throw new InvalidArgError(
      name,
      "long name must be non-empty and must not start with `-`",
    );
  }

  if (shape.validValues !== undefined && shape.validValues.length === 0) {
    throw new InvalidArgError(name, "valid values must not be empty");
  }

  return {
    name,
    shortName,
    longName,
    description: init.description,
    valuePlaceholder: init.placeholder,
    validValues: shape.validValues ? [...shape.validValues] : undefined,
    takesValue:
      shape.takesValue ||
      shape.takesMultipleValues ||
      shape.validValues !== undefined,
    takesMultipleValues: shape.takesMultipleValues,
    required: Boolean(init.required),
  };
}

function assertName(name: string): void {
  if (name.trim().length === 0) {
    throw new InvalidArgError(name, "name must not be empty");
  }
}
