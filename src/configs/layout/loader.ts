import { DEFAULT_HELP_LAYOUT, type HelpLayout } from "../../help/layout.js";
import { parseYamlDocument } from "../../utils/yaml-reader.js";
import { createConfigLoader } from "../shared/loader-factory.js";
import { formatSchemaIssueMessage } from "../shared/schema-issues.js";
import { formatYamlErrorMessage } from "../shared/yaml-error-formatter.js";
import { DEFAULT_LAYOUT_ERROR_CONTEXT, LayoutSettingsError } from "./errors.js";
import { type LayoutSettingsDocument, layoutSettingsSchema } from "./types.js";

export const LAYOUT_SETTINGS_FILENAME = "helpgrid.yaml" as const;

export interface LoadLayoutSettingsOptions {
  root?: string;
  filePath?: string;
  /** Throw instead of falling back to defaults when the file is missing. */
  required?: boolean;
  readFile?: (path: string) => string;
}

const layoutSettingsLoader = createConfigLoader<
  HelpLayout,
  LoadLayoutSettingsOptions
>({
  defaultFileName: LAYOUT_SETTINGS_FILENAME,
  handleMissing: ({ displayPath, options }) => {
    if (options.required) {
      throw new LayoutSettingsError(
        `Missing layout settings file at ${displayPath}.`,
      );
    }
    return { ...DEFAULT_HELP_LAYOUT };
  },
  parse: (content, { displayPath }) => {
    const { layout } = parseLayoutSettingsYaml(content, displayPath);
    return {
      signatureWidth:
        layout?.signatureWidth ?? DEFAULT_HELP_LAYOUT.signatureWidth,
      descriptionWidth:
        layout?.descriptionWidth ?? DEFAULT_HELP_LAYOUT.descriptionWidth,
    };
  },
});

export function loadLayoutSettings(
  options: LoadLayoutSettingsOptions = {},
): HelpLayout {
  return layoutSettingsLoader(options);
}

function parseLayoutSettingsYaml(
  content: string,
  displayPath: string,
): LayoutSettingsDocument {
  const context = `${DEFAULT_LAYOUT_ERROR_CONTEXT} (${displayPath})`;
  const document = parseYamlDocument(content, {
    formatError: (detail) =>
      new LayoutSettingsError(
        formatYamlErrorMessage(detail, {
          context: DEFAULT_LAYOUT_ERROR_CONTEXT,
          displayPath,
          fallbackReason: "file contains invalid YAML",
        }),
      ),
    emptyValue: {},
  });

  const result = layoutSettingsSchema.safeParse(document);
  if (!result.success) {
    throw new LayoutSettingsError(
      formatSchemaIssueMessage(context, result.error.issues),
    );
  }
  return result.data;
}
