/**
 * Validation of commands before they reach the retry controller, and of
 * document keys used by the file-backed store
 */

import { InvalidKeyError, SubdocStatusError } from "./errors.js";
import {
  MAX_MULTI_PATHS,
  MAX_PATH_LENGTH,
  Status,
  isLookupOpcode,
  isMutationOpcode,
} from "./protocol.js";
import type {
  LookupSpec,
  MultiLookupCommand,
  MultiMutationCommand,
  MutationSpec,
  SubdocCommand,
} from "./types.js";

/**
 * Valid characters for keys: alphanumeric, underscore, dash, dot
 */
const VALID_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Windows reserved device names (case-insensitive)
 */
const WINDOWS_RESERVED_NAMES = new Set([
  "con", "prn", "aux", "nul",
  "com1", "com2", "com3", "com4", "com5", "com6", "com7", "com8", "com9",
  "lpt1", "lpt2", "lpt3", "lpt4", "lpt5", "lpt6", "lpt7", "lpt8", "lpt9",
]);

/**
 * Validate a document key for use as a file name
 * @throws InvalidKeyError if invalid
 */
export function validateKey(key: string): void {
  if (!key) {
    throw new InvalidKeyError(key, "key must be a non-empty string");
  }

  if (!VALID_NAME_PATTERN.test(key)) {
    throw new InvalidKeyError(
      key,
      "only alphanumeric, underscore, dash, and dot are allowed"
    );
  }

  if (key.startsWith(".") || key.startsWith("-")) {
    throw new InvalidKeyError(key, 'cannot start with "." or "-"');
  }

  if (key.includes("..")) {
    throw new InvalidKeyError(key, 'cannot contain ".."');
  }

  // Windows: reject trailing dots
  if (key.endsWith(".")) {
    throw new InvalidKeyError(key, 'cannot end with "."');
  }

  const baseName = key.split(".")[0]?.toLowerCase() ?? "";
  if (WINDOWS_RESERVED_NAMES.has(baseName)) {
    throw new InvalidKeyError(key, "cannot be a Windows reserved name");
  }
}

function invalid(message: string): SubdocStatusError {
  return new SubdocStatusError(Status.Invalid, message);
}

function checkPathLength(path: string): void {
  if (Buffer.byteLength(path, "utf8") > MAX_PATH_LENGTH) {
    throw invalid(`Path exceeds ${MAX_PATH_LENGTH} bytes`);
  }
}

function checkLookupSpec(spec: LookupSpec): void {
  checkPathLength(spec.path);
  if (spec.flags?.mkdirP) {
    throw invalid(`${spec.opcode} does not accept the mkdir_p flag`);
  }
}

function checkMutationSpec(spec: MutationSpec): void {
  checkPathLength(spec.path);
  const value = spec.value ?? "";
  if (spec.opcode === "delete") {
    if (value.length > 0) throw invalid("delete does not take a value");
  } else if (value.length === 0) {
    throw invalid(`${spec.opcode} requires a value`);
  }
  if (spec.opcode === "array_insert" && spec.flags?.mkdirP) {
    throw invalid("array_insert does not accept the mkdir_p flag");
  }
}

function checkSpecCount(count: number, maxPaths: number): void {
  if (count === 0 || count > maxPaths) {
    throw new SubdocStatusError(
      Status.InvalidCombo,
      `Multi-path commands take between 1 and ${maxPaths} paths, got ${count}`
    );
  }
}

function checkMultiLookup(command: MultiLookupCommand, maxPaths: number): void {
  checkSpecCount(command.specs.length, maxPaths);
  for (const spec of command.specs) {
    if (!isLookupOpcode(spec.opcode)) {
      throw new SubdocStatusError(
        Status.InvalidCombo,
        `${String(spec.opcode)} is not allowed in a multi-lookup`
      );
    }
    checkLookupSpec(spec);
  }
}

function checkMultiMutation(command: MultiMutationCommand, maxPaths: number): void {
  checkSpecCount(command.specs.length, maxPaths);
  for (const spec of command.specs) {
    if (!isMutationOpcode(spec.opcode)) {
      throw new SubdocStatusError(
        Status.InvalidCombo,
        `${String(spec.opcode)} is not allowed in a multi-mutation`
      );
    }
    checkMutationSpec(spec);
  }
}

/**
 * Reject malformed commands
 * @throws SubdocStatusError with Invalid or InvalidCombo
 */
export function validateCommand(command: SubdocCommand, maxPaths: number = MAX_MULTI_PATHS): void {
  switch (command.kind) {
    case "lookup":
      checkLookupSpec(command);
      if (command.expiry !== undefined) {
        throw invalid(`${command.opcode} does not accept an expiry`);
      }
      if (command.value !== undefined && command.value.length > 0) {
        throw invalid(`${command.opcode} does not take a value`);
      }
      return;
    case "mutation":
      checkMutationSpec(command);
      return;
    case "multi_lookup":
      checkMultiLookup(command, maxPaths);
      return;
    case "multi_mutation":
      checkMultiMutation(command, maxPaths);
      return;
  }
}
