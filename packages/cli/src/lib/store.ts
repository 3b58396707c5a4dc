/**
 * Store adapter for CLI
 * Pairs a file-backed store with an engine running against it
 */

import {
  FileKvStore,
  JsonSyntaxError,
  SubdocEngine,
  SubdocStats,
  parseJson,
  type Datatype,
  type FileStoreStats,
  type StatsSnapshot,
  type StoredDocument,
} from "@subdoc/sdk";
import { CliError } from "./errors.js";

export interface PutOptions {
  datatype?: Datatype;
  flags?: number;
  expiry?: number;
}

/**
 * CLI Store interface
 */
export interface CliStore {
  readonly root: string;
  readonly engine: SubdocEngine;

  /**
   * Store a whole document unconditionally
   * @returns the new CAS
   */
  put(key: string, text: string, options?: PutOptions): Promise<bigint>;

  /**
   * Retrieve a whole document
   */
  get(key: string): Promise<StoredDocument | undefined>;

  /**
   * @returns false when the key did not exist
   */
  remove(key: string): Promise<boolean>;

  list(): Promise<string[]>;

  stats(): Promise<FileStoreStats>;

  /**
   * Engine counters accumulated by this process
   */
  counters(): StatsSnapshot;
}

/**
 * Open a CLI store backed by the SDK
 */
export function openCliStore(root: string, options: { maxAttempts?: number } = {}): CliStore {
  const store = new FileKvStore({ root });
  const stats = new SubdocStats();
  const engine = new SubdocEngine(store, { stats, maxAttempts: options.maxAttempts });

  return {
    root,
    engine,

    async put(key, text, putOptions = {}): Promise<bigint> {
      const datatype = putOptions.datatype ?? "json";
      if (datatype === "json") {
        try {
          parseJson(text);
        } catch (err) {
          if (err instanceof JsonSyntaxError) {
            throw new CliError(`Document is not valid JSON: ${err.message}`, { cause: err });
          }
          throw err;
        }
      }
      return store.set(key, text, { ...putOptions, datatype });
    },

    async get(key): Promise<StoredDocument | undefined> {
      const fetched = await store.get(key);
      return fetched.status === "found" ? fetched.document : undefined;
    },

    async remove(key): Promise<boolean> {
      return store.remove(key);
    },

    async list(): Promise<string[]> {
      return store.keys();
    },

    async stats(): Promise<FileStoreStats> {
      return store.stats();
    },

    counters(): StatsSnapshot {
      return stats.snapshot();
    },
  };
}
