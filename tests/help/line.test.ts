import { describe, expect, it } from "@jest/globals";

import { DEFAULT_HELP_LAYOUT, type HelpLayout } from "../../src/help/layout.js";
import { Line } from "../../src/help/line.js";

const NARROW_LAYOUT: HelpLayout = { signatureWidth: 10, descriptionWidth: 12 };

describe("Line", () => {
  it("writes the padded signature, the description and a newline", () => {
    const line = new Line();
    line.signature.appendPadding(4);
    line.signature.append("-t");
    line.description.append("Time");

    expect(line.format()).toBe(`    -t${" ".repeat(44)}Time\n`);
  });

  it("pads an empty signature to keep the description column", () => {
    const line = new Line(NARROW_LAYOUT);
    line.description.append("text");

    expect(line.format()).toBe(`${" ".repeat(10)}text\n`);
  });

  it("has no continuation without overflow", () => {
    const line = new Line(NARROW_LAYOUT);
    line.signature.append("name");
    line.description.append("short");

    expect(line.continuation()).toBeUndefined();
  });

  it("carries description overflow to one continuation row", () => {
    const line = new Line(NARROW_LAYOUT);
    line.description.append("abcdefghijklmnop");

    const continuation = line.continuation();
    expect(continuation?.signature.visible).toBe("    ");
    expect(continuation?.description.visible).toBe("mnop");
    expect(continuation?.continuation()).toBeUndefined();

    expect(line.format()).toBe(
      `${" ".repeat(10)}abcdefghijkl\n${" ".repeat(10)}mnop\n`,
    );
  });

  it("re-applies the left padding to signature overflow", () => {
    const line = new Line(NARROW_LAYOUT);
    line.signature.appendPadding(4);
    line.signature.append("--max-timeout");

    expect(line.format()).toBe(
      ["    --max-", "    timeou", "    t     ", ""].join("\n"),
    );
  });

  it("drains both columns in the same continuation row", () => {
    const line = new Line(NARROW_LAYOUT);
    line.signature.appendPadding(4);
    line.signature.append("abcdefgh");
    line.description.append("0123456789abXY");

    expect(line.format()).toBe(
      ["    abcdef0123456789ab", "    gh    XY", ""].join("\n"),
    );
  });

  it("emits one continuation for a description ten columns too long", () => {
    const line = new Line(DEFAULT_HELP_LAYOUT);
    line.signature.appendPadding(4);
    line.signature.append("--verbose");
    line.description.append(`${"d".repeat(500)}0123456789`);

    const continuation = line.continuation();
    expect(continuation?.signature.visible).toBe("    ");
    expect(continuation?.description.visible).toBe("0123456789");

    const rows = line.format().split("\n");
    expect(rows).toHaveLength(3);
    expect(rows[1]).toBe(`${" ".repeat(50)}0123456789`);
    expect(rows[2]).toBe("");
  });

  it("keeps multi-byte signatures aligned at the narrowest layout", () => {
    const line = new Line({ signatureWidth: 8, descriptionWidth: 4 });
    line.signature.appendPadding(4);
    line.signature.append("ñññ");

    expect(line.format()).toBe("    ññ\n    ñ  \n");
  });
});
