/**
 * CLI error handling and exit code mapping
 */

import { Status, SubdocStatusError, statusName, type StatusCode } from "@subdoc/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? 1;
  }
}

/**
 * Exit code for a failed subdoc status
 */
export function exitCodeForStatus(status: StatusCode): number {
  return status === Status.KeyNotFound ? 2 : 3;
}

/**
 * Raise a CliError for any non-success response status
 */
export function assertSuccess(response: { status: StatusCode; message?: string }): void {
  if (response.status === Status.Success) return;
  const name = statusName(response.status) ?? `0x${response.status.toString(16)}`;
  throw new CliError(response.message ? `${name}: ${response.message}` : name, {
    exitCode: exitCodeForStatus(response.status),
  });
}

/**
 * Map errors to CLI exit codes
 * - 0: success
 * - 1: usage/validation/IO/unknown error
 * - 2: document not found
 * - 3: subdoc status failure
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof SubdocStatusError) {
    return exitCodeForStatus(error.status);
  }

  // Usage errors, invalid keys, store I/O failures and anything unexpected
  return 1;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
