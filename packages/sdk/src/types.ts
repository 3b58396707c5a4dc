/**
 * Core types for the subdoc engine
 */

import type { LookupOpcode, MutationOpcode, StatusCode } from "./protocol.js";

/**
 * Stored value encoding. Subdocument commands only operate on "json".
 */
export type Datatype = "json" | "raw";

/**
 * A document as held by the key-value store
 */
export interface StoredDocument {
  key: string;
  /** Document bytes exactly as stored */
  value: Buffer;
  /** Version token; changes on every successful store */
  cas: bigint;
  /** Opaque client flags, preserved by every mutation */
  flags: number;
  /** Absolute expiry in seconds since the epoch, 0 for none */
  expiry: number;
  datatype: Datatype;
}

/**
 * Identifies the store state produced by a mutation
 */
export interface MutationToken {
  vbucketUuid: bigint;
  seqno: bigint;
}

export type FetchOutcome =
  | { status: "found"; document: StoredDocument }
  | { status: "not-found" }
  | { status: "not-owner" };

export interface CasStoreOptions {
  flags: number;
  expiry: number;
  datatype: Datatype;
}

export type StoreOutcome =
  | { status: "stored"; cas: bigint; token: MutationToken }
  | { status: "conflict" }
  | { status: "not-found" }
  | { status: "not-owner" };

/**
 * Key-value primitives consumed by the engine
 */
export interface KvStore {
  /**
   * Fetch the current document. Expired documents are reported as not found.
   */
  get(key: string): Promise<FetchOutcome>;

  /**
   * Replace the document only if its CAS still equals `expectedCas`
   */
  casStore(
    key: string,
    value: Buffer,
    expectedCas: bigint,
    options: CasStoreOptions
  ): Promise<StoreOutcome>;
}

export interface SubdocFlags {
  /** Create missing object ancestors (and missing target arrays) */
  mkdirP?: boolean;
}

/**
 * Single-path lookup (GET / EXISTS)
 */
export interface LookupCommand {
  kind: "lookup";
  opcode: LookupOpcode;
  key: string;
  path: string;
  flags?: SubdocFlags;
  /** Must be absent; accepted here so that invalid commands can be represented */
  expiry?: number;
  /** Must be empty */
  value?: string;
}

/**
 * Single-path mutation
 */
export interface MutationCommand {
  kind: "mutation";
  opcode: MutationOpcode;
  key: string;
  path: string;
  /** Value fragment; empty for DELETE */
  value?: string;
  flags?: SubdocFlags;
  /** Explicit CAS; 0 or absent means "any" */
  cas?: bigint;
  /** New expiry; absent keeps the current one */
  expiry?: number;
}

export interface LookupSpec {
  opcode: LookupOpcode;
  path: string;
  flags?: SubdocFlags;
}

export interface MutationSpec {
  opcode: MutationOpcode;
  path: string;
  value?: string;
  flags?: SubdocFlags;
}

export interface MultiLookupCommand {
  kind: "multi_lookup";
  key: string;
  specs: LookupSpec[];
}

export interface MultiMutationCommand {
  kind: "multi_mutation";
  key: string;
  specs: MutationSpec[];
  cas?: bigint;
  expiry?: number;
}

export type SubdocCommand =
  | LookupCommand
  | MutationCommand
  | MultiLookupCommand
  | MultiMutationCommand;

/**
 * Outcome of one path within a command
 */
export interface OperationResult {
  status: StatusCode;
  fragment?: string;
}

export interface LookupResponse {
  kind: "lookup";
  status: StatusCode;
  fragment?: string;
  cas?: bigint;
  /** Human-readable reason on failure */
  message?: string;
}

export interface MutationResponse {
  kind: "mutation";
  status: StatusCode;
  /** COUNTER only: the new value */
  fragment?: string;
  cas?: bigint;
  token?: MutationToken;
  message?: string;
}

export interface MultiLookupResponse {
  kind: "multi_lookup";
  status: StatusCode;
  /** One entry per spec, in input order; empty on document-level failure */
  results: OperationResult[];
  cas?: bigint;
  message?: string;
}

export interface MultiMutationResponse {
  kind: "multi_mutation";
  status: StatusCode;
  /** Specs that produced a fragment, with their index */
  results: Array<{ index: number; status: StatusCode; fragment: string }>;
  /** Present when a spec aborted the batch */
  failure?: { index: number; status: StatusCode };
  cas?: bigint;
  token?: MutationToken;
  message?: string;
}

export type SubdocResponse =
  | LookupResponse
  | MutationResponse
  | MultiLookupResponse
  | MultiMutationResponse;

