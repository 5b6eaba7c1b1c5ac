import { ContentBlock } from "./content-block.js";
import {
  DEFAULT_HELP_LAYOUT,
  type HelpLayout,
  SIGNATURE_LEFT_PADDING,
} from "./layout.js";

/**
 * One terminal row made of two blocks: a padded `signature` column and a
 * ragged `description` column.
 *
 * For e.g. `-t, --time=<SECS>` is the signature and `Time limit` the
 * description.
 */
export class Line {
  readonly signature: ContentBlock;
  readonly description: ContentBlock;

  constructor(private readonly layout: HelpLayout = DEFAULT_HELP_LAYOUT) {
    this.signature = new ContentBlock(layout.signatureWidth, true);
    this.description = new ContentBlock(layout.descriptionWidth, false);
  }

  /**
   * Renders this row followed by any continuation rows needed to drain the
   * overflow of either block.
   */
  format(): string {
    const row = `${this.signature.format()}${this.description.format()}\n`;
    const continuation = this.continuation();
    return continuation ? row + continuation.format() : row;
  }

  /** The row carrying this line's overflow, if any block overflowed. */
  continuation(): Line | undefined {
    const overflowSignature = this.signature.overflow();
    const overflowDescription = this.description.overflow();

    if (overflowSignature === undefined && overflowDescription === undefined) {
      return undefined;
    }

    const next = new Line(this.layout);
    next.signature.appendPadding(SIGNATURE_LEFT_PADDING);

    if (overflowSignature !== undefined) {
      next.signature.append(overflowSignature);
    }

    if (overflowDescription !== undefined) {
      next.description.append(overflowDescription);
    }

    return next;
  }
}
