import { z } from "zod";

import {
  MIN_DESCRIPTION_WIDTH,
  MIN_SIGNATURE_WIDTH,
} from "../../help/layout.js";

export const layoutSettingsSchema = z
  .object({
    layout: z
      .object({
        signatureWidth: z
          .number()
          .int()
          .min(
            MIN_SIGNATURE_WIDTH,
            `must be at least ${MIN_SIGNATURE_WIDTH} columns`,
          )
          .optional(),
        descriptionWidth: z
          .number()
          .int()
          .min(
            MIN_DESCRIPTION_WIDTH,
            `must be at least ${MIN_DESCRIPTION_WIDTH} columns`,
          )
          .optional(),
      })
      .strict()
      .optional(),
  })
  .passthrough();

export type LayoutSettingsDocument = z.infer<typeof layoutSettingsSchema>;
