/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { InvalidArgumentError } from "commander";

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" references are left untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the store root directory
 * Priority: CLI option > SUBDOC_ROOT env var > default "./data"
 */
export function resolveRoot(cliRoot?: string): string {
  const root = cliRoot ?? process.env.SUBDOC_ROOT ?? "./data";
  return path.resolve(expandTilde(root));
}

/**
 * Resolve the CAS retry bound
 * Priority: CLI option > SUBDOC_MAX_ATTEMPTS env var > engine default
 */
export function resolveMaxAttempts(cliValue?: number): number | undefined {
  if (cliValue !== undefined) return cliValue;

  const raw = process.env.SUBDOC_MAX_ATTEMPTS;
  if (raw === undefined || raw.trim() === "") return undefined;
  if (!/^\d+$/.test(raw.trim())) {
    throw new InvalidArgumentError("SUBDOC_MAX_ATTEMPTS must be a positive integer");
  }
  return Number.parseInt(raw, 10);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.SUBDOC_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
