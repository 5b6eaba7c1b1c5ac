import { z } from "zod";

export const DEFINITION_NAME_PATTERN = /^[^\s-][^\s]*$/u;

const definitionNameSchema = z
  .string()
  .regex(DEFINITION_NAME_PATTERN, "must be non-empty, without spaces, and must not start with `-`");

export const positionalDefinitionSchema = z
  .object({
    name: definitionNameSchema,
    description: z.string().optional(),
    multiple: z.boolean().optional(),
    required: z.boolean().optional(),
  })
  .strict();

export type PositionalDefinition = z.infer<typeof positionalDefinitionSchema>;

export const optionDefinitionSchema = z
  .object({
    name: definitionNameSchema,
    short: z
      .string()
      .regex(/^[^\s-]$/u, "must be a single character")
      .optional(),
    long: definitionNameSchema.optional(),
    description: z.string().optional(),
    takesValue: z.boolean().optional(),
    placeholder: z.string().min(1).optional(),
    multiple: z.boolean().optional(),
    required: z.boolean().optional(),
    values: z.array(z.string().min(1)).min(1).optional(),
  })
  .strict();

export type OptionDefinition = z.infer<typeof optionDefinitionSchema>;

export interface CommandDefinition {
  name: string;
  description?: string;
  positionalArgRequired?: boolean;
  subcommandRequired?: boolean;
  args?: PositionalDefinition[];
  options?: OptionDefinition[];
  subcommands?: CommandDefinition[];
}

export const commandDefinitionSchema: z.ZodType<CommandDefinition> = z.lazy(
  () =>
    z
      .object({
        name: definitionNameSchema,
        description: z.string().optional(),
        positionalArgRequired: z.boolean().optional(),
        subcommandRequired: z.boolean().optional(),
        args: z.array(positionalDefinitionSchema).optional(),
        options: z.array(optionDefinitionSchema).optional(),
        subcommands: z.array(commandDefinitionSchema).optional(),
      })
      .strict(),
);
