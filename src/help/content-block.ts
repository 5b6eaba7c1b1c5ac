import { ValidationError } from "../utils/errors.js";
import { CapacityViolationError } from "./errors.js";

const WHITE_SPACE = " ";

function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

/**
 * Splits `text` after the longest prefix of whole code points that fits in
 * `limit` UTF-8 bytes.
 */
function splitAtByteLimit(
  text: string,
  limit: number,
): [head: string, headBytes: number, tail: string] {
  let head = "";
  let headBytes = 0;
  for (const codePoint of text) {
    const size = byteLength(codePoint);
    if (headBytes + size > limit) {
      break;
    }
    head += codePoint;
    headBytes += size;
  }
  return [head, headBytes, text.slice(head.length)];
}

/**
 * A fixed-width cell within a help line.
 *
 * Widths are counted in UTF-8 bytes. Text that does not fit the visible area
 * is kept as overflow, at most one block width of it, so the owning line can
 * carry it to a continuation row. A code point is never split: one that
 * would straddle the boundary moves to the overflow whole, leaving the
 * visible part up to three bytes short of the width.
 */
export class ContentBlock {
  private visibleContent = "";
  private visibleLength = 0;
  private overflowContent = "";
  private overflowLength = 0;

  constructor(
    public readonly width: number,
    public readonly fill: boolean,
  ) {
    if (!Number.isInteger(width) || width <= 0) {
      throw new ValidationError(
        `Block width must be a positive integer (received ${width}).`,
      );
    }
  }

  get visible(): string {
    return this.visibleContent;
  }

  /** Bytes the visible area still accepts; zero once anything overflowed. */
  get remaining(): number {
    return this.overflowLength > 0 ? 0 : this.width - this.visibleLength;
  }

  /** Appends up to `n` spaces, stopping at the block's capacity. */
  appendPadding(n: number): void {
    const count = Math.min(Math.max(n, 0), this.remaining);
    if (count === 0) {
      return;
    }
    this.visibleContent += WHITE_SPACE.repeat(count);
    this.visibleLength += count;
  }

  append(text: string): void {
    if (text.length === 0) {
      return;
    }

    const length = byteLength(text);
    const remaining = this.remaining;

    if (length <= remaining) {
      this.visibleContent += text;
      this.visibleLength += length;
      return;
    }

    const [head, headBytes, tail] = splitAtByteLimit(text, remaining);
    const nextOverflowLength = this.overflowLength + (length - headBytes);
    if (nextOverflowLength > this.width) {
      throw new CapacityViolationError(this.width, nextOverflowLength);
    }

    this.visibleContent += head;
    this.visibleLength += headBytes;
    this.overflowContent += tail;
    this.overflowLength = nextOverflowLength;
  }

  format(): string {
    const padding = this.width - this.visibleLength;
    if (this.fill && padding > 0) {
      return this.visibleContent + WHITE_SPACE.repeat(padding);
    }
    return this.visibleContent;
  }

  overflow(): string | undefined {
    return this.overflowLength > 0 ? this.overflowContent : undefined;
  }
}
