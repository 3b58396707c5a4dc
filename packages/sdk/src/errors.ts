/**
 * Error types for subdoc operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - Protocol outcomes travel as statuses; only SubdocStatusError carries one
 */

import { Status, statusName, type StatusCode } from "./protocol.js";

/**
 * Base class for all subdoc errors
 */
export abstract class SubdocError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Raised inside the parse/navigate/operate pipeline. The controller turns it
 * into a response status; it never escapes the engine.
 */
export class SubdocStatusError extends SubdocError {
  readonly code: string;

  constructor(
    public readonly status: StatusCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.code = statusName(status) ?? `0x${status.toString(16)}`;
  }
}

export function pathInvalid(path: string, reason: string): SubdocStatusError {
  return new SubdocStatusError(Status.PathInvalid, `Invalid path "${path}": ${reason}`);
}

/**
 * Thrown when a document text is not well-formed JSON
 */
export class JsonSyntaxError extends SubdocError {
  readonly code = "JSON_SYNTAX";

  constructor(
    public readonly offset: number,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid JSON at offset ${offset}: ${reason}`, options);
  }
}

/**
 * Thrown when a wire body is truncated or malformed
 */
export class CodecError extends SubdocError {
  readonly code = "CODEC_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a document key does not satisfy the naming rules
 */
export class InvalidKeyError extends SubdocError {
  readonly code = "INVALID_KEY";

  constructor(
    public readonly key: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid key "${key}": ${reason}`, options);
  }
}

/**
 * Thrown when engine options fail validation
 */
export class ConfigError extends SubdocError {
  readonly code = "CONFIG_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when a command is submitted to a closed session
 */
export class SessionClosedError extends SubdocError {
  readonly code = "SESSION_CLOSED";

  constructor(options?: ErrorOptions) {
    super("Session is closed", options);
  }
}

/**
 * Thrown when a key lock cannot be acquired in time
 */
export class LockTimeoutError extends SubdocError {
  readonly code = "LOCK_TIMEOUT";

  constructor(
    public readonly lockPath: string,
    timeoutMs: number,
    options?: ErrorOptions
  ) {
    super(
      `Failed to acquire lock after ${timeoutMs}ms. Lock file: ${lockPath}. ` +
        `This may indicate a stale lock from a crashed process - ` +
        `manually delete the lock file if safe.`,
      options
    );
  }
}

/**
 * Thrown when a document read operation fails
 */
export class DocumentReadError extends SubdocError {
  readonly code = "READ_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to read document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document write operation fails
 */
export class DocumentWriteError extends SubdocError {
  readonly code = "WRITE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to write document: ${filePath}`, options);
  }
}

/**
 * Thrown when a document removal operation fails
 */
export class DocumentRemoveError extends SubdocError {
  readonly code = "REMOVE_ERROR";

  constructor(filePath: string, options?: ErrorOptions) {
    super(`Failed to remove document: ${filePath}`, options);
  }
}

/**
 * Thrown when a directory operation fails
 */
export class DirectoryError extends SubdocError {
  readonly code = "DIRECTORY_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Directory operation failed: ${dirPath}`, options);
  }
}

/**
 * Thrown when listing files in a directory fails
 */
export class ListFilesError extends SubdocError {
  readonly code = "LIST_ERROR";

  constructor(dirPath: string, options?: ErrorOptions) {
    super(`Failed to list files in directory: ${dirPath}`, options);
  }
}

/**
 * errno-style code of a Node.js system error, if any
 */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
