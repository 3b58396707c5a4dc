/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { z } from "zod";
import { MutationOpcodeSchema, normalizeOpcode, type MutationOpcode } from "@subdoc/sdk";

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = 0xffffffff): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse a CAS value; CAS values are unsigned 64-bit and exceed Number's range
 */
export function parseCas(value: string): bigint {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("--cas must be an unsigned integer");
  }
  const cas = BigInt(trimmed);
  if (cas >= 2n ** 64n) {
    throw new InvalidArgumentError("--cas must fit in 64 bits");
  }
  return cas;
}

/**
 * Map a user-supplied operation name onto a mutation opcode
 */
export function parseMutationOpcode(value: string): MutationOpcode {
  const result = MutationOpcodeSchema.safeParse(normalizeOpcode(value));
  if (!result.success) {
    throw new InvalidArgumentError(
      `Unknown operation "${value}". Expected one of: ${MutationOpcodeSchema.options.join(", ")}`
    );
  }
  return result.data;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse and validate a JSON spec list
 */
export function parseSpecs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: string, source: string): T {
  const result = schema.safeParse(parseJson(value, source));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "specs"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid specs in ${source}: ${details}`);
  }
  return result.data;
}
