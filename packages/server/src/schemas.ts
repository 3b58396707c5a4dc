/**
 * Zod schemas for validating tool inputs
 * Provides runtime type safety and detailed validation errors
 */

import { z } from "zod";
import {
  InvalidKeyError,
  LookupSpecListSchema,
  MutationOpcodeSchema,
  MutationSpecListSchema,
  normalizeOpcode,
  validateKey,
} from "@subdoc/sdk";

const MAX_CAS = 2n ** 64n;

// Keys double as file names, so the store's own key rules apply
export const KeySchema = z.string().superRefine((val, ctx) => {
  try {
    validateKey(val);
  } catch (err) {
    if (!(err instanceof InvalidKeyError)) throw err;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
  }
});

// Path syntax is checked by the engine, which answers with a status
export const PathSchema = z.string();

// CAS values are unsigned 64-bit, carried as decimal strings
export const CasSchema = z
  .string()
  .regex(/^[0-9]+$/, "cas must be a decimal string")
  .transform((val) => BigInt(val))
  .refine((cas) => cas < MAX_CAS, "cas must fit in 64 bits");

export const ExpirySchema = z.number().int().min(0).max(0xffffffff);

export const FlagsSchema = z.number().int().min(0).max(0xffffffff);

// Accepts "dict-add" and "DICT_ADD" as well as "dict_add"
export const OpcodeSchema = z.preprocess(
  (val) => (typeof val === "string" ? normalizeOpcode(val) : val),
  MutationOpcodeSchema
);

// Tool input schemas

export const SubdocGetInputSchema = z.object({
  key: KeySchema,
  path: PathSchema,
});

export const SubdocExistsInputSchema = SubdocGetInputSchema;

export const SubdocMutateInputSchema = z.object({
  key: KeySchema,
  opcode: OpcodeSchema,
  path: PathSchema,
  value: z.string().optional(),
  mkdirP: z.boolean().optional(),
  cas: CasSchema.optional(),
  expiry: ExpirySchema.optional(),
});

export const SubdocMultiLookupInputSchema = z.object({
  key: KeySchema,
  specs: LookupSpecListSchema,
});

export const SubdocMultiMutationInputSchema = z.object({
  key: KeySchema,
  specs: MutationSpecListSchema,
  cas: CasSchema.optional(),
  expiry: ExpirySchema.optional(),
});

export const DocGetInputSchema = z.object({
  key: KeySchema,
});

export const DocPutInputSchema = z.object({
  key: KeySchema,
  /** Document text; base64 when raw */
  value: z.string(),
  raw: z.boolean().optional(),
  flags: FlagsSchema.optional(),
  expiry: ExpirySchema.optional(),
});

// Export types
export type SubdocGetInput = z.infer<typeof SubdocGetInputSchema>;
export type SubdocMutateInput = z.infer<typeof SubdocMutateInputSchema>;
export type SubdocMultiLookupInput = z.infer<typeof SubdocMultiLookupInputSchema>;
export type SubdocMultiMutationInput = z.infer<typeof SubdocMultiMutationInputSchema>;
export type DocGetInput = z.infer<typeof DocGetInputSchema>;
export type DocPutInput = z.infer<typeof DocPutInputSchema>;
