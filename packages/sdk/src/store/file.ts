/**
 * KvStore backed by a directory of JSON envelopes
 *
 * Layout:
 *   <root>/docs/<key>.json       one envelope per document
 *   <root>/_meta/vbucket.json    vbucket UUID and last sequence number
 *   <root>/_meta/locks/*.lock    exclusive locks held during a write
 *
 * Each write holds the key's lock for the whole compare-and-swap, so
 * concurrent processes see conflicts exactly as an in-memory store would.
 */

import { randomBytes } from "node:crypto";
import { join } from "node:path";
import { z } from "zod";
import { DocumentReadError } from "../errors.js";
import { logger } from "../observability/logs.js";
import { absoluteExpiry } from "../protocol.js";
import type {
  CasStoreOptions,
  FetchOutcome,
  KvStore,
  MutationToken,
  StoreOutcome,
  StoredDocument,
} from "../types.js";
import { validateKey } from "../validation.js";
import { atomicWrite, listFiles, readTextFile, removeFile } from "./io.js";
import { FileLock } from "./lock.js";
import type { SetOptions } from "./memory.js";

const EnvelopeSchema = z.object({
  cas: z.string().regex(/^[0-9]+$/),
  flags: z.number().int().nonnegative(),
  expiry: z.number().int().nonnegative(),
  datatype: z.enum(["json", "raw"]),
  /** utf8 text for json documents, base64 for raw ones */
  value: z.string(),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

const VbucketSchema = z.object({
  uuid: z.string().regex(/^[0-9]+$/),
  seqno: z.string().regex(/^[0-9]+$/),
});

export interface FileKvStoreOptions {
  root: string;
  /** Milliseconds since the epoch */
  now?: () => number;
}

export interface FileStoreStats {
  count: number;
  bytes: number;
}

export class FileKvStore implements KvStore {
  readonly root: string;
  readonly #now: () => number;

  constructor(options: FileKvStoreOptions) {
    this.root = options.root;
    this.#now = options.now ?? Date.now;
  }

  async get(key: string): Promise<FetchOutcome> {
    validateKey(key);
    const document = await this.#read(key);
    return document ? { status: "found", document } : { status: "not-found" };
  }

  async casStore(
    key: string,
    value: Buffer,
    expectedCas: bigint,
    options: CasStoreOptions
  ): Promise<StoreOutcome> {
    validateKey(key);
    return this.#lock(key).withLock(async (): Promise<StoreOutcome> => {
      const current = await this.#read(key);
      if (!current) return { status: "not-found" };
      if (current.cas !== expectedCas) return { status: "conflict" };

      const { cas, token } = await this.#write(key, value, current.cas, options);
      return { status: "stored", cas, token };
    });
  }

  /**
   * Unconditionally store a document
   * @returns the new CAS
   */
  async set(key: string, value: string | Buffer, options: SetOptions = {}): Promise<bigint> {
    validateKey(key);
    const bytes = typeof value === "string" ? Buffer.from(value, "utf8") : value;
    return this.#lock(key).withLock(async () => {
      const current = await this.#read(key);
      const { cas } = await this.#write(key, bytes, current?.cas ?? 0n, {
        flags: options.flags ?? 0,
        expiry: absoluteExpiry(options.expiry ?? 0, this.#now()),
        datatype: options.datatype ?? "json",
      });
      return cas;
    });
  }

  /**
   * @returns false when the key did not exist
   */
  async remove(key: string): Promise<boolean> {
    validateKey(key);
    return this.#lock(key).withLock(() => removeFile(this.#docPath(key)));
  }

  async keys(): Promise<string[]> {
    const files = await listFiles(this.#docsDir, ".json");
    return files.map((name) => name.slice(0, -".json".length));
  }

  /**
   * Number of live documents and the total size of their values
   */
  async stats(): Promise<FileStoreStats> {
    let count = 0;
    let bytes = 0;
    for (const key of await this.keys()) {
      const document = await this.#read(key);
      if (!document) continue;
      count++;
      bytes += document.value.length;
    }
    return { count, bytes };
  }

  get #docsDir(): string {
    return join(this.root, "docs");
  }

  #docPath(key: string): string {
    return join(this.#docsDir, `${key}.json`);
  }

  #lock(key: string): FileLock {
    return new FileLock(this.root, `${key}.lock`);
  }

  async #read(key: string): Promise<StoredDocument | undefined> {
    const filePath = this.#docPath(key);
    const text = await readTextFile(filePath);
    if (text === undefined) return undefined;

    let envelope: Envelope;
    try {
      envelope = EnvelopeSchema.parse(JSON.parse(text));
    } catch (err) {
      throw new DocumentReadError(filePath, { cause: err });
    }

    if (envelope.expiry !== 0 && envelope.expiry * 1000 <= this.#now()) {
      return undefined;
    }

    return {
      key,
      value:
        envelope.datatype === "json"
          ? Buffer.from(envelope.value, "utf8")
          : Buffer.from(envelope.value, "base64"),
      cas: BigInt(envelope.cas),
      flags: envelope.flags,
      expiry: envelope.expiry,
      datatype: envelope.datatype,
    };
  }

  async #write(
    key: string,
    value: Buffer,
    previousCas: bigint,
    options: CasStoreOptions
  ): Promise<{ cas: bigint; token: MutationToken }> {
    const token = await this.#nextSeqno();
    // Time-based so a deleted and recreated key never reuses a CAS
    const timeCas = BigInt(this.#now()) * 1000n;
    const cas = timeCas > previousCas ? timeCas : previousCas + 1n;

    const envelope: Envelope = {
      cas: cas.toString(),
      flags: options.flags,
      expiry: options.expiry,
      datatype: options.datatype,
      value: options.datatype === "json" ? value.toString("utf8") : value.toString("base64"),
    };
    await atomicWrite(this.#docPath(key), JSON.stringify(envelope, null, 2) + "\n");
    logger.debug("store.write", { key, details: { cas, seqno: token.seqno } });
    return { cas, token };
  }

  async #nextSeqno(): Promise<MutationToken> {
    const metaPath = join(this.root, "_meta", "vbucket.json");
    // Keys cannot start with ".", so this never collides with a key lock
    return new FileLock(this.root, ".vbucket.lock").withLock(async () => {
      const text = await readTextFile(metaPath);
      let uuid: bigint;
      let seqno: bigint;
      if (text === undefined) {
        uuid = randomBytes(8).readBigUInt64BE();
        seqno = 0n;
      } else {
        let meta: z.infer<typeof VbucketSchema>;
        try {
          meta = VbucketSchema.parse(JSON.parse(text));
        } catch (err) {
          throw new DocumentReadError(metaPath, { cause: err });
        }
        uuid = BigInt(meta.uuid);
        seqno = BigInt(meta.seqno);
      }
      seqno++;
      await atomicWrite(
        metaPath,
        JSON.stringify({ uuid: uuid.toString(), seqno: seqno.toString() }, null, 2) + "\n"
      );
      return { vbucketUuid: uuid, seqno };
    });
  }
}
