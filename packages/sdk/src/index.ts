/**
 * Subdoc SDK
 *
 * Path-addressed lookups and mutations on JSON documents held in a
 * key-value store, with optimistic concurrency control
 */

// Re-export types
export type {
  Datatype,
  StoredDocument,
  MutationToken,
  FetchOutcome,
  CasStoreOptions,
  StoreOutcome,
  KvStore,
  SubdocFlags,
  LookupCommand,
  MutationCommand,
  LookupSpec,
  MutationSpec,
  MultiLookupCommand,
  MultiMutationCommand,
  SubdocCommand,
  OperationResult,
  LookupResponse,
  MutationResponse,
  MultiLookupResponse,
  MultiMutationResponse,
  SubdocResponse,
} from "./types.js";

export {
  Status,
  statusName,
  isStatusCode,
  isLookupOpcode,
  isMutationOpcode,
  LOOKUP_OPCODES,
  MUTATION_OPCODES,
  OPCODE_BYTES,
  FLAG_MKDIR_P,
  MAX_PATH_LENGTH,
  MAX_PATH_COMPONENTS,
  MAX_DOCUMENT_DEPTH,
  MAX_MULTI_PATHS,
  DEFAULT_MAX_ATTEMPTS,
  absoluteExpiry,
} from "./protocol.js";
export type {
  StatusCode,
  StatusName,
  LookupOpcode,
  MutationOpcode,
  SubdocOpcode,
  WireOpcodeName,
} from "./protocol.js";

// Engine
export { SubdocEngine } from "./engine.js";
export { SubdocSession } from "./session.js";
export type { SessionFeatures } from "./session.js";
export { resolveLimits, EngineLimitsSchema } from "./config.js";
export type { EngineLimits, EngineOptions } from "./config.js";
export { SubdocStats, STAT_NAMES } from "./stats.js";
export type { StatsSink, StatName, StatsSnapshot } from "./stats.js";

// Building blocks
export { parsePath, formatPath } from "./path.js";
export type { PathComponent, ParsedPath } from "./path.js";
export { navigate } from "./navigator.js";
export type { Location, NavigateOptions } from "./navigator.js";
export { executeLookup, executeMutation, parseDocument, parseDelta } from "./operators.js";
export { runMultiLookup, runMultiMutation } from "./batch.js";
export { validateCommand, validateKey } from "./validation.js";
export {
  SubdocFlagsSchema,
  LookupOpcodeSchema,
  MutationOpcodeSchema,
  LookupSpecSchema,
  MutationSpecSchema,
  LookupSpecListSchema,
  MutationSpecListSchema,
  normalizeOpcode,
} from "./specs.js";
export { parseJson, parseJsonList } from "./json/parse.js";
export { serializeJson } from "./json/serialize.js";
export { measureDepth } from "./json/depth.js";
export type { JsonNode } from "./json/tree.js";

// Wire codec
export {
  encodeCommand,
  decodeCommand,
  encodeResponse,
  decodeResponse,
  ByteReader,
  ByteWriter,
  MUTATION_EXTRAS_LENGTH,
} from "./codec.js";
export type { RequestFrame, ResponseFrame, ResponseContext } from "./codec.js";

// Stores
export { MemoryKvStore } from "./store/memory.js";
export type { MemoryKvStoreOptions, SetOptions } from "./store/memory.js";
export { FileKvStore } from "./store/file.js";
export type { FileKvStoreOptions, FileStoreStats } from "./store/file.js";

// Errors
export {
  SubdocError,
  SubdocStatusError,
  JsonSyntaxError,
  CodecError,
  InvalidKeyError,
  ConfigError,
  SessionClosedError,
  LockTimeoutError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

// Observability
export { logger, Logger } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogSink, LoggerOptions } from "./observability/logs.js";
