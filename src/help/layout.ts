import { ValidationError } from "../utils/errors.js";

/** Bytes before any signature text. */
export const SIGNATURE_LEFT_PADDING = 4;

/** Bytes before the `values:` row printed under an option description. */
export const VALID_VALUES_PADDING = 2;

export interface HelpLayout {
  readonly signatureWidth: number;
  readonly descriptionWidth: number;
}

export const DEFAULT_HELP_LAYOUT: HelpLayout = {
  signatureWidth: 50,
  descriptionWidth: 500,
};

/** Longest UTF-8 encoding of a single code point. */
export const MAX_CODE_POINT_BYTES = 4;

// Every continuation row must take at least one code point, and continuation
// signatures re-apply the left padding first.
export const MIN_SIGNATURE_WIDTH =
  SIGNATURE_LEFT_PADDING + MAX_CODE_POINT_BYTES;
export const MIN_DESCRIPTION_WIDTH = MAX_CODE_POINT_BYTES;

export function resolveHelpLayout(
  overrides: Partial<HelpLayout> = {},
): HelpLayout {
  const signatureWidth =
    overrides.signatureWidth ?? DEFAULT_HELP_LAYOUT.signatureWidth;
  const descriptionWidth =
    overrides.descriptionWidth ?? DEFAULT_HELP_LAYOUT.descriptionWidth;

  if (
    !Number.isInteger(signatureWidth) ||
    signatureWidth < MIN_SIGNATURE_WIDTH
  ) {
    throw new ValidationError(
      `Signature width must be an integer of at least ${MIN_SIGNATURE_WIDTH} (received ${signatureWidth}).`,
    );
  }

  if (
    !Number.isInteger(descriptionWidth) ||
    descriptionWidth < MIN_DESCRIPTION_WIDTH
  ) {
    throw new ValidationError(
      `Description width must be an integer of at least ${MIN_DESCRIPTION_WIDTH} (received ${descriptionWidth}).`,
    );
  }

  return { signatureWidth, descriptionWidth };
}
