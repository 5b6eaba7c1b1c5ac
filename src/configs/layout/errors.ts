import { HintedError } from "../../utils/errors.js";

export const DEFAULT_LAYOUT_ERROR_CONTEXT = "Invalid layout settings" as const;

export class LayoutSettingsError extends HintedError {
  constructor(message: string) {
    super(message, {
      hintLines: ["Fix `helpgrid.yaml` or pass --settings <path>."],
    });
    this.name = "LayoutSettingsError";
  }
}
