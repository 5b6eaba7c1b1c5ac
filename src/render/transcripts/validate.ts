import type { ValidateCommandResult } from "../../commands/validate/command.js";
import { renderTranscript } from "../utils/transcript.js";

export function renderValidateTranscript(
  definitionPath: string,
  result: ValidateCommandResult,
): string {
  return renderTranscript({
    metadata: [
      { label: "Definition", value: definitionPath },
      { label: "Command", value: result.rootName },
      { label: "Commands", value: String(result.commandCount) },
      { label: "Options", value: String(result.optionCount) },
      {
        label: "Options without a help row",
        value:
          result.hiddenOptions.length > 0
            ? String(result.hiddenOptions.length)
            : null,
      },
    ],
    hint: `To preview: helpgrid render ${definitionPath}`,
  });
}
