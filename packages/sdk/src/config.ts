/**
 * Engine configuration
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_MAX_ATTEMPTS, MAX_DOCUMENT_DEPTH, MAX_MULTI_PATHS } from "./protocol.js";
import type { Logger } from "./observability/logs.js";
import type { StatsSink } from "./stats.js";

export const EngineLimitsSchema = z
  .object({
    /** Fetch/compute/store cycles before giving up with TemporaryFailure */
    maxAttempts: z.number().int().min(1).max(1000).default(DEFAULT_MAX_ATTEMPTS),
    /** Specs accepted by one multi-path command */
    maxMultiPaths: z.number().int().min(1).max(255).default(MAX_MULTI_PATHS),
    maxDepth: z.number().int().min(2).max(MAX_DOCUMENT_DEPTH).default(MAX_DOCUMENT_DEPTH),
  })
  .strict();

export type EngineLimits = z.infer<typeof EngineLimitsSchema>;

export interface EngineOptions extends Partial<EngineLimits> {
  stats?: StatsSink;
  logger?: Logger;
}

/**
 * Validate and default the numeric limits
 * @throws ConfigError listing every offending option
 */
export function resolveLimits(options: Partial<EngineLimits> = {}): EngineLimits {
  const result = EngineLimitsSchema.safeParse(options);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid engine options: ${details}`, { cause: result.error });
  }
  return result.data;
}
