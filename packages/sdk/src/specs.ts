/**
 * Schemas for command specs supplied as JSON (CLI arguments, MCP tool input)
 */

import { z } from "zod";

export const SubdocFlagsSchema = z
  .object({
    mkdirP: z.boolean().optional(),
  })
  .strict();

export const LookupOpcodeSchema = z.enum(["get", "exists"]);

export const MutationOpcodeSchema = z.enum([
  "dict_add",
  "dict_upsert",
  "delete",
  "replace",
  "array_push_last",
  "array_push_first",
  "array_insert",
  "array_add_unique",
  "counter",
]);

export const LookupSpecSchema = z
  .object({
    opcode: LookupOpcodeSchema,
    path: z.string(),
    flags: SubdocFlagsSchema.optional(),
  })
  .strict();

export const MutationSpecSchema = z
  .object({
    opcode: MutationOpcodeSchema,
    path: z.string(),
    /** JSON fragment text; omitted for delete */
    value: z.string().optional(),
    flags: SubdocFlagsSchema.optional(),
  })
  .strict();

export const LookupSpecListSchema = z.array(LookupSpecSchema);
export const MutationSpecListSchema = z.array(MutationSpecSchema);

/**
 * Accept "dict-add" and "DICT_ADD" as well as "dict_add"
 */
export function normalizeOpcode(name: string): string {
  return name.trim().toLowerCase().replace(/-/g, "_");
}
