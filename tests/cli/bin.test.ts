import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { beforeAll, describe, expect, it } from "@jest/globals";

import { FETCH_ROOT_HELP } from "../support/help-rows.js";
import { captureProcessOutput } from "../support/output.js";

const FETCH_DEFINITION = resolve(__dirname, "../fixtures/definitions/fetch.yaml");

describe("CLI entrypoint", () => {
  let runCli!: (argv?: readonly string[]) => Promise<void>;

  beforeAll(async () => {
    ({ runCli } = await import("../../src/bin.js"));
  });

  it("renders help to stderr by default", async () => {
    const output = captureProcessOutput();

    await runCli(["node", "helpgrid", "render", FETCH_DEFINITION]);

    expect(output.stdout).toEqual([]);
    expect(output.stderr.join("")).toBe(FETCH_ROOT_HELP);
  });

  it("renders help to stdout with --stdout", async () => {
    const output = captureProcessOutput();

    await runCli(["node", "helpgrid", "render", FETCH_DEFINITION, "--stdout"]);

    expect(output.stdout.join("")).toBe(FETCH_ROOT_HELP);
    expect(output.stderr).toEqual([]);
  });

  it("reports an unknown subcommand path", async () => {
    const output = captureProcessOutput();

    await runCli([
      "node",
      "helpgrid",
      "render",
      FETCH_DEFINITION,
      "--command",
      "nope",
    ]);

    expect(output.stderr.join("")).toBe(
      "\n\u001B[31mError:\u001B[39m Subcommand not found: nope\n\nAvailable commands: config\n\n",
    );
    expect(process.exitCode).toBe(1);
  });

  it("rejects a non-positive column width", async () => {
    const output = captureProcessOutput();

    await runCli([
      "node",
      "helpgrid",
      "render",
      FETCH_DEFINITION,
      "--signature-width",
      "0",
    ]);

    expect(output.stderr.join("")).toBe(
      '\n\u001B[31mError:\u001B[39m Expected positive integer after --signature-width (received "0").\n\n',
    );
    expect(process.exitCode).toBe(1);
  });

  it("prints the validate summary and hidden option warnings", async () => {
    const output = captureProcessOutput();

    await runCli(["node", "helpgrid", "validate", FETCH_DEFINITION]);

    expect(output.stderr.join("")).toBe(
      "\u001B[33mWarning:\u001B[39m Option `quiet` of `fetch` will not appear in help.\n",
    );
    expect(output.stdout.join("")).toBe(
      [
        "\n",
        "\n",
        `Definition: ${FETCH_DEFINITION}\n`,
        "Command: fetch\n",
        "Commands: 4\n",
        "Options: 4\n",
        "Options without a help row: 1\n",
        "\n",
        `To preview: helpgrid render ${FETCH_DEFINITION}\n`,
        "\n",
      ].join(""),
    );
  });

  it("does not duplicate Commander usage errors", async () => {
    const output = captureProcessOutput();

    await runCli(["node", "helpgrid", "draw"]);

    expect(output.stdout).toHaveLength(0);
    const occurrences =
      output.stderr.join("").match(/error: unknown command 'draw'/gu) ?? [];
    expect(occurrences).toHaveLength(1);
    expect(process.exitCode).toBe(1);
  });

  it("prints the CLI version for -v/--version", async () => {
    const output = captureProcessOutput();

    await runCli(["node", "helpgrid", "--version"]);

    const packageJsonRaw = readFileSync(
      resolve(__dirname, "../../package.json"),
      "utf-8",
    );
    const { version } = JSON.parse(packageJsonRaw) as { version: string };

    expect(output.stdout.join("").trim()).toBe(version);
    expect(output.stderr.join("")).toHaveLength(0);
    expect(process.exitCode).toBe(0);
  });
});
