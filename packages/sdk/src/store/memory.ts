/**
 * In-process KvStore
 *
 * CAS values increase monotonically per store. Expiry is evaluated against
 * the injected clock on every access, so an expired document behaves as
 * absent without a background sweeper.
 */

import { randomBytes } from "node:crypto";
import { absoluteExpiry } from "../protocol.js";
import type {
  CasStoreOptions,
  Datatype,
  FetchOutcome,
  KvStore,
  StoreOutcome,
  StoredDocument,
} from "../types.js";

export interface MemoryKvStoreOptions {
  /** Milliseconds since the epoch */
  now?: () => number;
  /** Keys for which this returns false are reported as owned elsewhere */
  owns?: (key: string) => boolean;
}

export interface SetOptions {
  flags?: number;
  /** Protocol expiry: 0, relative seconds or epoch seconds */
  expiry?: number;
  datatype?: Datatype;
}

export class MemoryKvStore implements KvStore {
  #documents = new Map<string, StoredDocument>();
  #lastCas = 0n;
  #seqno = 0n;
  readonly #now: () => number;
  readonly #owns: (key: string) => boolean;
  readonly vbucketUuid: bigint;

  constructor(options: MemoryKvStoreOptions = {}) {
    this.#now = options.now ?? Date.now;
    this.#owns = options.owns ?? (() => true);
    this.vbucketUuid = randomBytes(8).readBigUInt64BE();
  }

  async get(key: string): Promise<FetchOutcome> {
    if (!this.#owns(key)) return { status: "not-owner" };
    const document = this.#live(key);
    return document ? { status: "found", document: { ...document } } : { status: "not-found" };
  }

  async casStore(
    key: string,
    value: Buffer,
    expectedCas: bigint,
    options: CasStoreOptions
  ): Promise<StoreOutcome> {
    if (!this.#owns(key)) return { status: "not-owner" };
    const current = this.#live(key);
    if (!current) return { status: "not-found" };
    if (current.cas !== expectedCas) return { status: "conflict" };

    const document = this.#write(key, value, options);
    return {
      status: "stored",
      cas: document.cas,
      token: { vbucketUuid: this.vbucketUuid, seqno: this.#seqno },
    };
  }

  /**
   * Unconditionally store a document, as a plain SET would
   * @returns the new CAS
   */
  set(key: string, value: string | Buffer, options: SetOptions = {}): bigint {
    const bytes = typeof value === "string" ? Buffer.from(value, "utf8") : value;
    return this.#write(key, bytes, {
      flags: options.flags ?? 0,
      expiry: absoluteExpiry(options.expiry ?? 0, this.#now()),
      datatype: options.datatype ?? "json",
    }).cas;
  }

  delete(key: string): boolean {
    return this.#documents.delete(key);
  }

  /**
   * Current document bytes as text, for assertions
   */
  read(key: string): string | undefined {
    return this.#live(key)?.value.toString("utf8");
  }

  peek(key: string): StoredDocument | undefined {
    const document = this.#live(key);
    return document ? { ...document } : undefined;
  }

  get size(): number {
    return this.#documents.size;
  }

  #live(key: string): StoredDocument | undefined {
    const document = this.#documents.get(key);
    if (!document) return undefined;
    if (document.expiry !== 0 && document.expiry * 1000 <= this.#now()) {
      this.#documents.delete(key);
      return undefined;
    }
    return document;
  }

  #write(key: string, value: Buffer, options: CasStoreOptions): StoredDocument {
    this.#lastCas++;
    this.#seqno++;
    const document: StoredDocument = {
      key,
      value: Buffer.from(value),
      cas: this.#lastCas,
      flags: options.flags,
      expiry: options.expiry,
      datatype: options.datatype,
    };
    this.#documents.set(key, document);
    return document;
  }
}
