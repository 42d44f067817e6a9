/**
 * Zod schemas for command declarations and the manifest that carries them.
 *
 * These check structure only. Semantic rules (name pattern, duplicate
 * arguments, defaults matching types) belong to the schema parser in core.
 */

import { z } from "zod";

const ScalarValueSchema = z.union([z.string(), z.boolean(), z.number()]);

const ArgumentDeclarationSchema = z
  .object({
    name: z.string().min(1, "Argument name must not be empty"),
    type: z.enum(["string", "boolean", "integer", "choice"]),
    required: z.boolean().optional(),
    default: ScalarValueSchema.optional(),
    choices: z.array(z.string()).optional(),
    kind: z.enum(["positional", "option"]).optional(),
    description: z.string().optional(),
    variadic: z.boolean().optional(),
  })
  .strict();

export const CommandDeclarationSchema = z
  .object({
    name: z.string(),
    description: z.string().optional(),
    arguments: z.array(ArgumentDeclarationSchema).default([]),
    agents: z.array(z.string().min(1, "Agent name must not be empty")).optional(),
  })
  .strict();

/**
 * Commands stay unchecked here so that one malformed declaration is reported
 * against its own command instead of rejecting the whole manifest.
 */
export const ManifestSchema = z.object({
  agents: z.array(z.string().min(1, "Agent name must not be empty")).default([]),
  commands: z.array(z.unknown()),
});

export type ValidatedManifest = z.infer<typeof ManifestSchema>;
