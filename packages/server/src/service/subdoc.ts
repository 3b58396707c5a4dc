/**
 * Subdoc service adapter
 * Wraps the @subdoc/sdk engine and file store with safety limits
 */

import {
  FileKvStore,
  SubdocEngine,
  SubdocStats,
  parseJson,
  type LookupResponse,
  type MultiLookupCommand,
  type MultiLookupResponse,
  type MultiMutationCommand,
  type MultiMutationResponse,
  type MutationCommand,
  type MutationResponse,
  type LookupCommand,
  type StatsSnapshot,
  type StoredDocument,
} from "@subdoc/sdk";
import { logger } from "../observability/logger.js";

// Largest document accepted by doc_put (20MB)
export const MAX_DOCUMENT_SIZE = 20 * 1024 * 1024;

export interface PutDocumentOptions {
  raw?: boolean;
  flags?: number;
  expiry?: number;
}

export class DocumentTooLargeError extends Error {
  readonly code = "DOC_TOO_LARGE";

  constructor(size: number) {
    super(`Document too large: ${size} bytes exceeds limit of ${MAX_DOCUMENT_SIZE} bytes`);
    this.name = "DocumentTooLargeError";
  }
}

export class SubdocService {
  #store: FileKvStore;
  #engine: SubdocEngine;
  #stats = new SubdocStats();

  constructor(dataRoot: string, options: { maxAttempts?: number } = {}) {
    this.#store = new FileKvStore({ root: dataRoot });
    this.#engine = new SubdocEngine(this.#store, {
      stats: this.#stats,
      maxAttempts: options.maxAttempts,
    });
    logger.info("service.init", { data_root: dataRoot });
  }

  async lookup(command: LookupCommand): Promise<LookupResponse> {
    return this.#engine.lookup(command);
  }

  async mutate(command: MutationCommand): Promise<MutationResponse> {
    return this.#engine.mutate(command);
  }

  async multiLookup(command: MultiLookupCommand): Promise<MultiLookupResponse> {
    return this.#engine.multiLookup(command);
  }

  async multiMutation(command: MultiMutationCommand): Promise<MultiMutationResponse> {
    return this.#engine.multiMutation(command);
  }

  /**
   * Get a whole document
   * Returns null if not found (not an error)
   */
  async getDocument(key: string): Promise<StoredDocument | null> {
    const fetched = await this.#store.get(key);
    return fetched.status === "found" ? fetched.document : null;
  }

  /**
   * Store a whole document unconditionally
   * Validates document size, and JSON syntax unless raw, before writing
   * @returns the new CAS
   * @throws JsonSyntaxError when a JSON document does not parse
   */
  async putDocument(key: string, value: string, options: PutDocumentOptions = {}): Promise<bigint> {
    const bytes = options.raw ? Buffer.from(value, "base64") : Buffer.from(value, "utf8");
    if (bytes.length > MAX_DOCUMENT_SIZE) {
      throw new DocumentTooLargeError(bytes.length);
    }
    if (!options.raw) parseJson(value);

    return this.#store.set(key, bytes, {
      datatype: options.raw ? "raw" : "json",
      flags: options.flags,
      expiry: options.expiry,
    });
  }

  /**
   * Engine counters since the service started
   */
  stats(): StatsSnapshot {
    return this.#stats.snapshot();
  }
}
