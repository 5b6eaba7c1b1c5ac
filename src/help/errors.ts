import { HintedError, toErrorMessage } from "../utils/errors.js";

export class HelpRenderError extends HintedError {
  constructor(
    headline: string,
    options: {
      detailLines?: readonly string[];
      hintLines?: readonly string[];
      cause?: unknown;
    } = {},
  ) {
    super(headline, options);
    this.name = "HelpRenderError";
  }
}

/**
 * Raised when a single write does not fit into a block's visible area plus
 * its one overflow level.
 */
export class CapacityViolationError extends HelpRenderError {
  constructor(
    public readonly capacity: number,
    public readonly attemptedOverflow: number,
  ) {
    super(`Help text exceeds block capacity of ${capacity} columns.`, {
      detailLines: [
        `Overflow of ${attemptedOverflow} columns does not fit one continuation row.`,
      ],
      hintLines: ["Shorten the description or split it across entries."],
    });
    this.name = "CapacityViolationError";
  }
}

export class HelpOutputError extends HelpRenderError {
  constructor(cause: unknown) {
    super(`Failed to write help output: ${toErrorMessage(cause)}`, { cause });
    this.name = "HelpOutputError";
  }
}
