/**
 * Status codes, opcodes and limits shared by the engine and the wire codec
 *
 * Numeric values are the binary-protocol encodings; the engine itself only
 * ever compares against the named constants.
 */

export const Status = {
  Success: 0x00,
  KeyNotFound: 0x01,
  KeyExists: 0x02,
  Invalid: 0x04,
  NotMyVbucket: 0x07,
  TemporaryFailure: 0x86,
  PathNotFound: 0xc0,
  PathMismatch: 0xc1,
  PathInvalid: 0xc2,
  PathTooBig: 0xc3,
  DocTooDeep: 0xc4,
  ValueCantInsert: 0xc5,
  DocNotJson: 0xc6,
  NumRange: 0xc7,
  DeltaInvalid: 0xc8,
  PathExists: 0xc9,
  ValueTooDeep: 0xca,
  InvalidCombo: 0xcb,
  MultiPathFailure: 0xcc,
} as const;

export type StatusName = keyof typeof Status;
export type StatusCode = (typeof Status)[StatusName];

function isStatusName(name: string): name is StatusName {
  return Object.hasOwn(Status, name);
}

const STATUS_NAMES = new Map<number, StatusName>();
for (const name of Object.keys(Status)) {
  if (isStatusName(name)) STATUS_NAMES.set(Status[name], name);
}

/**
 * Name of a status code, or undefined for codes this engine never produces
 */
export function statusName(code: number): StatusName | undefined {
  return STATUS_NAMES.get(code);
}

export function isStatusCode(code: number): code is StatusCode {
  return STATUS_NAMES.has(code);
}

export type LookupOpcode = "get" | "exists";

export type MutationOpcode =
  | "dict_add"
  | "dict_upsert"
  | "delete"
  | "replace"
  | "array_push_last"
  | "array_push_first"
  | "array_insert"
  | "array_add_unique"
  | "counter";

export type SubdocOpcode = LookupOpcode | MutationOpcode;

export const LOOKUP_OPCODES: readonly LookupOpcode[] = ["get", "exists"];

export const MUTATION_OPCODES: readonly MutationOpcode[] = [
  "dict_add",
  "dict_upsert",
  "delete",
  "replace",
  "array_push_last",
  "array_push_first",
  "array_insert",
  "array_add_unique",
  "counter",
];

export function isLookupOpcode(value: string): value is LookupOpcode {
  return LOOKUP_OPCODES.some((op) => op === value);
}

export function isMutationOpcode(value: string): value is MutationOpcode {
  return MUTATION_OPCODES.some((op) => op === value);
}

/**
 * Wire opcodes, including the two multi-path command opcodes
 */
export const OPCODE_BYTES = {
  get: 0xc5,
  exists: 0xc6,
  dict_add: 0xc7,
  dict_upsert: 0xc8,
  delete: 0xc9,
  replace: 0xca,
  array_push_last: 0xcb,
  array_push_first: 0xcc,
  array_insert: 0xcd,
  array_add_unique: 0xce,
  counter: 0xcf,
  multi_lookup: 0xd0,
  multi_mutation: 0xd1,
} as const;

export type WireOpcodeName = keyof typeof OPCODE_BYTES;

function isWireOpcodeName(name: string): name is WireOpcodeName {
  return Object.hasOwn(OPCODE_BYTES, name);
}

const OPCODE_BY_BYTE = new Map<number, WireOpcodeName>();
for (const name of Object.keys(OPCODE_BYTES)) {
  if (isWireOpcodeName(name)) OPCODE_BY_BYTE.set(OPCODE_BYTES[name], name);
}

export function opcodeFromByte(byte: number): WireOpcodeName | undefined {
  return OPCODE_BY_BYTE.get(byte);
}

/** Flag bit requesting creation of missing object ancestors */
export const FLAG_MKDIR_P = 0x01;
export const KNOWN_FLAG_BITS = FLAG_MKDIR_P;

export const MAX_PATH_LENGTH = 1024;
/** Path components including the implicit document root */
export const MAX_PATH_COMPONENTS = 32;
/** Levels from the root to the deepest leaf, scalars included */
export const MAX_DOCUMENT_DEPTH = 32;
export const MAX_MULTI_PATHS = 16;
export const DEFAULT_MAX_ATTEMPTS = 100;

/** Relative expiries above this many seconds are absolute epoch times */
export const RELATIVE_EXPIRY_LIMIT = 60 * 60 * 24 * 30;

/**
 * Convert a protocol expiry (0, relative seconds, or epoch seconds) into
 * absolute epoch seconds, 0 meaning "never"
 */
export function absoluteExpiry(expiry: number, nowMs: number): number {
  if (expiry <= 0) return 0;
  if (expiry > RELATIVE_EXPIRY_LIMIT) return expiry;
  return Math.floor(nowMs / 1000) + expiry;
}
