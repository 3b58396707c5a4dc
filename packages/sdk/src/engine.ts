/**
 * Subdocument command engine
 *
 * Every command is validated, then runs a fetch → compute → conditional
 * store cycle against the KvStore. A store conflict without a caller CAS
 * restarts the cycle from a fresh fetch, up to `maxAttempts` times. Lookups
 * stop after the fetch.
 *
 * Expected outcomes, including every failure status, come back as response
 * objects. Only store I/O faults and bugs are thrown.
 */

import {
  asStatusError,
  runMultiLookup,
  runMultiMutation,
  type BatchFailure,
  type BatchSuccess,
} from "./batch.js";
import { resolveLimits, type EngineLimits, type EngineOptions } from "./config.js";
import { serializeJson } from "./json/serialize.js";
import { logger as defaultLogger, type Logger } from "./observability/logs.js";
import { executeLookup, executeMutation, parseDocument } from "./operators.js";
import { Status, absoluteExpiry, type StatusCode } from "./protocol.js";
import { SubdocStats, type StatsSink } from "./stats.js";
import type {
  KvStore,
  LookupCommand,
  LookupResponse,
  MultiLookupCommand,
  MultiLookupResponse,
  MultiMutationCommand,
  MultiMutationResponse,
  MutationCommand,
  MutationResponse,
  MutationToken,
  StoredDocument,
  SubdocCommand,
  SubdocResponse,
} from "./types.js";
import { validateCommand } from "./validation.js";

type Computed<T, F> =
  | { ok: true; value: Buffer; insertedBytes: number; result: T }
  | { ok: false; failure: F };

type CycleOutcome<T, F> =
  | { kind: "stored"; cas: bigint; token: MutationToken; result: T }
  | { kind: "rejected"; failure: F }
  | { kind: "status"; status: StatusCode; message: string };

type FetchResult =
  | { ok: true; document: StoredDocument }
  | { ok: false; status: StatusCode; message: string };

export class SubdocEngine {
  readonly #store: KvStore;
  readonly #limits: EngineLimits;
  readonly #stats: StatsSink;
  readonly #logger: Logger;
  readonly #now: () => number;

  constructor(store: KvStore, options: EngineOptions & { now?: () => number } = {}) {
    this.#store = store;
    this.#limits = resolveLimits({
      maxAttempts: options.maxAttempts,
      maxMultiPaths: options.maxMultiPaths,
      maxDepth: options.maxDepth,
    });
    this.#stats = options.stats ?? new SubdocStats();
    this.#logger = options.logger ?? defaultLogger;
    this.#now = options.now ?? Date.now;
  }

  get limits(): Readonly<EngineLimits> {
    return this.#limits;
  }

  get stats(): StatsSink {
    return this.#stats;
  }

  /**
   * Run any command, dispatching on its kind
   */
  async execute(command: SubdocCommand): Promise<SubdocResponse> {
    switch (command.kind) {
      case "lookup":
        return this.lookup(command);
      case "mutation":
        return this.mutate(command);
      case "multi_lookup":
        return this.multiLookup(command);
      case "multi_mutation":
        return this.multiMutation(command);
    }
  }

  async lookup(command: LookupCommand): Promise<LookupResponse> {
    const rejected = this.#validate(command);
    if (rejected) return { kind: "lookup", ...rejected };

    const fetched = await this.#fetch(command.key);
    if (!fetched.ok) return { kind: "lookup", status: fetched.status, message: fetched.message };
    const { document } = fetched;

    let fragment: string | undefined;
    try {
      fragment = executeLookup(parseDocument(document.value, document.datatype), command);
    } catch (err) {
      const { status, message } = asStatusError(err);
      return { kind: "lookup", status, message };
    }

    this.#stats.recordLookup(
      document.value.length,
      fragment === undefined ? 0 : Buffer.byteLength(fragment, "utf8")
    );
    return fragment === undefined
      ? { kind: "lookup", status: Status.Success, cas: document.cas }
      : { kind: "lookup", status: Status.Success, fragment, cas: document.cas };
  }

  async mutate(command: MutationCommand): Promise<MutationResponse> {
    const rejected = this.#validate(command);
    if (rejected) return { kind: "mutation", ...rejected };

    const outcome = await this.#casCycle(
      command.key,
      command.cas,
      command.expiry,
      (document): Computed<string | undefined, { status: StatusCode; message: string }> => {
        try {
          const root = parseDocument(document.value, document.datatype);
          const fragment = executeMutation(root, command, this.#limits);
          return {
            ok: true,
            value: Buffer.from(serializeJson(root), "utf8"),
            insertedBytes: Buffer.byteLength(command.value ?? "", "utf8"),
            result: fragment,
          };
        } catch (err) {
          const { status, message } = asStatusError(err);
          return { ok: false, failure: { status, message } };
        }
      }
    );

    switch (outcome.kind) {
      case "stored":
        return {
          kind: "mutation",
          status: Status.Success,
          cas: outcome.cas,
          token: outcome.token,
          ...(outcome.result === undefined ? {} : { fragment: outcome.result }),
        };
      case "rejected":
        return { kind: "mutation", ...outcome.failure };
      case "status":
        return { kind: "mutation", status: outcome.status, message: outcome.message };
    }
  }

  async multiLookup(command: MultiLookupCommand): Promise<MultiLookupResponse> {
    const rejected = this.#validate(command);
    if (rejected) return { kind: "multi_lookup", results: [], ...rejected };

    const fetched = await this.#fetch(command.key);
    if (!fetched.ok) {
      return { kind: "multi_lookup", status: fetched.status, results: [], message: fetched.message };
    }
    const { document } = fetched;

    const results = runMultiLookup(document, command.specs);
    const extracted = results.reduce(
      (sum, result) => sum + (result.fragment ? Buffer.byteLength(result.fragment, "utf8") : 0),
      0
    );
    // A batch in which no spec succeeded is not counted
    if (results.some((result) => result.status === Status.Success)) {
      this.#stats.recordLookup(document.value.length, extracted);
    }

    const allSucceeded = results.every((result) => result.status === Status.Success);
    return {
      kind: "multi_lookup",
      status: allSucceeded ? Status.Success : Status.MultiPathFailure,
      results,
      cas: document.cas,
    };
  }

  async multiMutation(command: MultiMutationCommand): Promise<MultiMutationResponse> {
    const rejected = this.#validate(command);
    if (rejected) return { kind: "multi_mutation", results: [], ...rejected };

    const outcome = await this.#casCycle(
      command.key,
      command.cas,
      command.expiry,
      (document): Computed<BatchSuccess["results"], BatchFailure> => {
        const batch = runMultiMutation(document, command.specs, this.#limits);
        return batch.ok
          ? { ok: true, value: batch.value, insertedBytes: batch.insertedBytes, result: batch.results }
          : { ok: false, failure: batch };
      }
    );

    switch (outcome.kind) {
      case "stored":
        return {
          kind: "multi_mutation",
          status: Status.Success,
          results: outcome.result,
          cas: outcome.cas,
          token: outcome.token,
        };
      case "rejected":
        return {
          kind: "multi_mutation",
          status: Status.MultiPathFailure,
          results: [],
          failure: { index: outcome.failure.index, status: outcome.failure.status },
          message: `Spec ${outcome.failure.index} failed: ${outcome.failure.message}`,
        };
      case "status":
        return {
          kind: "multi_mutation",
          status: outcome.status,
          results: [],
          message: outcome.message,
        };
    }
  }

  #validate(command: SubdocCommand): { status: StatusCode; message: string } | undefined {
    try {
      validateCommand(command, this.#limits.maxMultiPaths);
      return undefined;
    } catch (err) {
      const { status, message } = asStatusError(err);
      return { status, message };
    }
  }

  async #fetch(key: string): Promise<FetchResult> {
    const fetched = await this.#store.get(key);
    switch (fetched.status) {
      case "found":
        return { ok: true, document: fetched.document };
      case "not-found":
        return { ok: false, status: Status.KeyNotFound, message: `Document not found: ${key}` };
      case "not-owner":
        return { ok: false, ...this.#notOwner(key) };
    }
  }

  #notOwner(key: string): { status: StatusCode; message: string } {
    this.#logger.info("subdoc.not_owner", { key });
    return { status: Status.NotMyVbucket, message: `Key ${key} is not owned by this node` };
  }

  /**
   * The bounded optimistic-concurrency loop shared by all mutations
   */
  async #casCycle<T, F>(
    key: string,
    callerCas: bigint | undefined,
    expiry: number | undefined,
    compute: (document: StoredDocument) => Computed<T, F>
  ): Promise<CycleOutcome<T, F>> {
    const explicitCas = callerCas === undefined || callerCas === 0n ? undefined : callerCas;
    const { maxAttempts } = this.#limits;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const fetched = await this.#fetch(key);
      if (!fetched.ok) return { kind: "status", status: fetched.status, message: fetched.message };
      const { document } = fetched;

      if (explicitCas !== undefined && explicitCas !== document.cas) {
        return { kind: "status", status: Status.KeyExists, message: "CAS mismatch" };
      }

      const computed = compute(document);
      if (!computed.ok) return { kind: "rejected", failure: computed.failure };

      const stored = await this.#store.casStore(key, computed.value, document.cas, {
        flags: document.flags,
        expiry: expiry === undefined ? document.expiry : absoluteExpiry(expiry, this.#now()),
        datatype: "json",
      });

      switch (stored.status) {
        case "stored":
          this.#stats.recordMutation(computed.value.length, computed.insertedBytes);
          return { kind: "stored", cas: stored.cas, token: stored.token, result: computed.result };
        case "not-found":
          return { kind: "status", status: Status.KeyNotFound, message: `Document not found: ${key}` };
        case "not-owner":
          return { kind: "status", ...this.#notOwner(key) };
        case "conflict":
          if (explicitCas !== undefined) {
            return { kind: "status", status: Status.KeyExists, message: "CAS mismatch" };
          }
          this.#stats.recordRetry();
          this.#logger.debug("subdoc.cas.retry", { key, details: { attempt } });
          break;
      }
    }

    this.#stats.recordTemporaryFailure();
    this.#logger.warn("subdoc.cas.exhausted", {
      key,
      message: `Gave up after ${maxAttempts} conflicting attempts`,
    });
    return {
      kind: "status",
      status: Status.TemporaryFailure,
      message: `Too many concurrent writers on ${key}; retry later`,
    };
  }
}
