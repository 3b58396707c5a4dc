import { describe, it, expect, beforeEach, vi } from "vitest";
import { FaultInjectingStore } from "@subdoc/testkit";
import { SubdocEngine } from "./engine.js";
import { MemoryKvStore } from "./store/memory.js";
import { Logger } from "./observability/logs.js";
import { SubdocStats } from "./stats.js";
import { ConfigError } from "./errors.js";
import { Status } from "./protocol.js";

const NOW = 1_700_000_000_000;

describe("SubdocEngine", () => {
  let memory: MemoryKvStore;
  let store: FaultInjectingStore;
  let stats: SubdocStats;
  let log: Logger;
  let engine: SubdocEngine;

  beforeEach(() => {
    memory = new MemoryKvStore({ now: () => NOW });
    store = new FaultInjectingStore(memory);
    stats = new SubdocStats();
    log = new Logger();
    vi.spyOn(log, "info").mockImplementation(() => undefined);
    vi.spyOn(log, "warn").mockImplementation(() => undefined);
    engine = new SubdocEngine(store, { stats, logger: log, now: () => NOW });
  });

  describe("lookup()", () => {
    it("should return the fragment and the document CAS", async () => {
      const cas = memory.set("doc", '{"a":{"b":[1,2]}}');

      const response = await engine.lookup({ kind: "lookup", opcode: "get", key: "doc", path: "a.b" });

      expect(response).toEqual({ kind: "lookup", status: Status.Success, fragment: "[1,2]", cas });
    });

    it("should count bytes looked up and extracted", async () => {
      memory.set("doc", '{"a":42,"pad":"xxxxxxxxxxxxx"}');

      await engine.lookup({ kind: "lookup", opcode: "get", key: "doc", path: "a" });

      expect(stats.get("cmd_subdoc_lookup")).toBe(1);
      expect(stats.get("bytes_subdoc_lookup_total")).toBe(30);
      expect(stats.get("bytes_subdoc_lookup_extracted")).toBe(2);
    });

    it("should report a missing document", async () => {
      const response = await engine.lookup({ kind: "lookup", opcode: "exists", key: "nope", path: "a" });
      expect(response.status).toBe(Status.KeyNotFound);
      expect(stats.get("cmd_subdoc_lookup")).toBe(0);
    });

    it("should report path failures without counting a lookup", async () => {
      memory.set("doc", "[1,2,3]");
      const response = await engine.lookup({ kind: "lookup", opcode: "get", key: "doc", path: "[-2]" });
      expect(response.status).toBe(Status.PathInvalid);
      expect(response.message).toContain("[-2]");
      expect(stats.get("cmd_subdoc_lookup")).toBe(0);
    });

    it("should refuse raw documents", async () => {
      memory.set("doc", "plain", { datatype: "raw" });
      const response = await engine.lookup({ kind: "lookup", opcode: "get", key: "doc", path: "a" });
      expect(response.status).toBe(Status.DocNotJson);
    });

    it("should reject invalid commands before fetching", async () => {
      const response = await engine.lookup({
        kind: "lookup",
        opcode: "get",
        key: "doc",
        path: "a",
        flags: { mkdirP: true },
      });
      expect(response.status).toBe(Status.Invalid);
      expect(store.calls).toHaveLength(0);
    });

    it("should report keys owned elsewhere", async () => {
      memory.set("doc", "{}");
      store.failFetches("not-owner");

      const response = await engine.lookup({ kind: "lookup", opcode: "get", key: "doc", path: "a" });

      expect(response.status).toBe(Status.NotMyVbucket);
      expect(log.info).toHaveBeenCalledWith("subdoc.not_owner", { key: "doc" });
    });
  });

  describe("mutate()", () => {
    it("should create a counter and store the document", async () => {
      memory.set("doc", "{}");

      const response = await engine.mutate({
        kind: "mutation",
        opcode: "counter",
        key: "doc",
        path: "key",
        value: "1",
      });

      expect(response.status).toBe(Status.Success);
      expect(response.fragment).toBe("1");
      expect(memory.read("doc")).toBe('{"key":1}');
      expect(response.cas).toBe(memory.peek("doc")?.cas);
      expect(response.token).toEqual({ vbucketUuid: memory.vbucketUuid, seqno: 2n });
    });

    it("should return no fragment for other operators", async () => {
      memory.set("doc", "{}");
      const response = await engine.mutate({
        kind: "mutation",
        opcode: "dict_add",
        key: "doc",
        path: "a",
        value: "1",
      });
      expect(response.status).toBe(Status.Success);
      expect(response).not.toHaveProperty("fragment");
    });

    it("should change the CAS on every upsert even when the content stays the same", async () => {
      const initial = memory.set("doc", "{}");
      const upsert = () =>
        engine.mutate({ kind: "mutation", opcode: "dict_upsert", key: "doc", path: "a", value: "1" });

      const first = await upsert();
      const afterFirst = memory.read("doc");
      const second = await upsert();

      expect(first.status).toBe(Status.Success);
      expect(second.status).toBe(Status.Success);
      expect(afterFirst).toBe('{"a":1}');
      expect(memory.read("doc")).toBe(afterFirst);
      expect(first.cas).not.toBe(initial);
      expect(second.cas).not.toBe(first.cas);
    });

    it("should count mutated and inserted bytes", async () => {
      memory.set("doc", "{}");

      await engine.mutate({ kind: "mutation", opcode: "dict_add", key: "doc", path: "a", value: '"xyz"' });

      // {"a":"xyz"}
      expect(stats.get("cmd_subdoc_mutation")).toBe(1);
      expect(stats.get("bytes_subdoc_mutation_total")).toBe(11);
      expect(stats.get("bytes_subdoc_mutation_inserted")).toBe(5);
    });

    it("should leave the document alone when the operator fails", async () => {
      const cas = memory.set("doc", '{"key1":1}');

      const response = await engine.mutate({
        kind: "mutation",
        opcode: "dict_add",
        key: "doc",
        path: "key1",
        value: "5",
      });

      expect(response.status).toBe(Status.PathExists);
      expect(memory.peek("doc")?.cas).toBe(cas);
      expect(store.count("casStore")).toBe(0);
      expect(stats.get("cmd_subdoc_mutation")).toBe(0);
    });

    it("should preserve flags and expiry", async () => {
      memory.set("doc", "{}", { flags: 0xcafe, expiry: 3600 });
      const before = memory.peek("doc");

      await engine.mutate({ kind: "mutation", opcode: "dict_add", key: "doc", path: "a", value: "1" });

      const after = memory.peek("doc");
      expect(after?.flags).toBe(0xcafe);
      expect(after?.expiry).toBe(before?.expiry);
      expect(after?.expiry).toBe(Math.floor(NOW / 1000) + 3600);
    });

    it("should apply a new expiry", async () => {
      memory.set("doc", "{}");

      await engine.mutate({
        kind: "mutation",
        opcode: "dict_add",
        key: "doc",
        path: "a",
        value: "1",
        expiry: 60,
      });

      expect(memory.peek("doc")?.expiry).toBe(Math.floor(NOW / 1000) + 60);
    });

    it("should report a missing document", async () => {
      const response = await engine.mutate({
        kind: "mutation",
        opcode: "dict_upsert",
        key: "nope",
        path: "a",
        value: "1",
      });
      expect(response.status).toBe(Status.KeyNotFound);
    });
  });

  describe("CAS handling", () => {
    const upsert = {
      kind: "mutation",
      opcode: "dict_upsert",
      key: "doc",
      path: "n",
      value: "1",
    } as const;

    it("should retry through 99 conflicts", async () => {
      memory.set("doc", "{}");
      store.failStores("conflict", 99);

      const response = await engine.mutate(upsert);

      expect(response.status).toBe(Status.Success);
      expect(store.count("casStore")).toBe(100);
      expect(store.count("get")).toBe(100);
      expect(stats.get("subdoc_cas_retries")).toBe(99);
      expect(memory.read("doc")).toBe('{"n":1}');
    });

    it("should give up after 100 conflicts", async () => {
      const cas = memory.set("doc", "{}");
      store.failStores("conflict", 100);

      const response = await engine.mutate(upsert);

      expect(response.status).toBe(Status.TemporaryFailure);
      expect(store.count("casStore")).toBe(100);
      expect(stats.get("subdoc_tmpfail")).toBe(1);
      expect(memory.peek("doc")?.cas).toBe(cas);
      expect(log.warn).toHaveBeenCalledTimes(1);
    });

    it("should honour a configured attempt limit", async () => {
      engine = new SubdocEngine(store, { stats, logger: log, maxAttempts: 3 });
      memory.set("doc", "{}");
      store.failStores("conflict", 3);

      const response = await engine.mutate(upsert);

      expect(response.status).toBe(Status.TemporaryFailure);
      expect(store.count("casStore")).toBe(3);
    });

    it("should succeed with a matching explicit CAS", async () => {
      const cas = memory.set("doc", "{}");
      const response = await engine.mutate({ ...upsert, cas });
      expect(response.status).toBe(Status.Success);
    });

    it("should fail a stale explicit CAS without storing", async () => {
      const cas = memory.set("doc", "{}");
      const response = await engine.mutate({ ...upsert, cas: cas + 1n });
      expect(response.status).toBe(Status.KeyExists);
      expect(store.count("casStore")).toBe(0);
    });

    it("should not retry a conflict under an explicit CAS", async () => {
      const cas = memory.set("doc", "{}");
      store.failStores("conflict");

      const response = await engine.mutate({ ...upsert, cas });

      expect(response.status).toBe(Status.KeyExists);
      expect(store.count("casStore")).toBe(1);
      expect(stats.get("subdoc_cas_retries")).toBe(0);
    });

    it("should treat a zero CAS as absent", async () => {
      memory.set("doc", "{}");
      store.failStores("conflict");

      const response = await engine.mutate({ ...upsert, cas: 0n });

      expect(response.status).toBe(Status.Success);
      expect(store.count("casStore")).toBe(2);
    });

    it("should stop when the store loses ownership", async () => {
      memory.set("doc", "{}");
      store.failStores("not-owner");

      const response = await engine.mutate(upsert);

      expect(response.status).toBe(Status.NotMyVbucket);
      expect(store.count("casStore")).toBe(1);
    });

    it("should report a document deleted mid-cycle", async () => {
      memory.set("doc", "{}");
      store.failStores("not-found");

      const response = await engine.mutate(upsert);

      expect(response.status).toBe(Status.KeyNotFound);
    });
  });

  describe("multiLookup()", () => {
    it("should answer every spec", async () => {
      memory.set("doc", '{"a":1}');

      const response = await engine.multiLookup({
        kind: "multi_lookup",
        key: "doc",
        specs: [
          { opcode: "get", path: "a" },
          { opcode: "exists", path: "b" },
        ],
      });

      expect(response.status).toBe(Status.MultiPathFailure);
      expect(response.results).toEqual([
        { status: Status.Success, fragment: "1" },
        { status: Status.PathNotFound },
      ]);
    });

    it("should not count a batch in which every spec failed", async () => {
      memory.set("doc", '{"a":1}');

      const response = await engine.multiLookup({
        kind: "multi_lookup",
        key: "doc",
        specs: [
          { opcode: "get", path: "x" },
          { opcode: "exists", path: "a.b" },
        ],
      });

      expect(response.status).toBe(Status.MultiPathFailure);
      expect(stats.get("cmd_subdoc_lookup")).toBe(0);
      expect(stats.get("bytes_subdoc_lookup_total")).toBe(0);
    });

    it("should count a partly failed batch", async () => {
      memory.set("doc", '{"a":1}');

      await engine.multiLookup({
        kind: "multi_lookup",
        key: "doc",
        specs: [
          { opcode: "get", path: "a" },
          { opcode: "get", path: "x" },
        ],
      });

      expect(stats.get("cmd_subdoc_lookup")).toBe(1);
      expect(stats.get("bytes_subdoc_lookup_total")).toBe(7);
      expect(stats.get("bytes_subdoc_lookup_extracted")).toBe(1);
    });

    it("should succeed when every spec does", async () => {
      memory.set("doc", '{"a":1,"b":"x"}');

      const response = await engine.multiLookup({
        kind: "multi_lookup",
        key: "doc",
        specs: [
          { opcode: "get", path: "a" },
          { opcode: "get", path: "b" },
        ],
      });

      expect(response.status).toBe(Status.Success);
      expect(stats.get("cmd_subdoc_lookup")).toBe(1);
      // "1" + "\"x\""
      expect(stats.get("bytes_subdoc_lookup_extracted")).toBe(4);
    });

    it("should reject more than 16 specs", async () => {
      memory.set("doc", "{}");
      const response = await engine.multiLookup({
        kind: "multi_lookup",
        key: "doc",
        specs: Array.from({ length: 17 }, () => ({ opcode: "exists" as const, path: "a" })),
      });
      expect(response.status).toBe(Status.InvalidCombo);
      expect(response.results).toEqual([]);
    });

    it("should report a missing document as the overall status", async () => {
      const response = await engine.multiLookup({
        kind: "multi_lookup",
        key: "nope",
        specs: [{ opcode: "get", path: "a" }],
      });
      expect(response.status).toBe(Status.KeyNotFound);
      expect(response.results).toEqual([]);
    });
  });

  describe("multiMutation()", () => {
    it("should abort on the first failing spec and store nothing", async () => {
      const cas = memory.set("doc", '{"bogus":"string"}');

      const response = await engine.multiMutation({
        kind: "multi_mutation",
        key: "doc",
        specs: [
          { opcode: "dict_upsert", path: "a", value: "1" },
          { opcode: "array_insert", path: "bogus[0]", value: "2" },
        ],
      });

      expect(response.status).toBe(Status.MultiPathFailure);
      expect(response.failure).toEqual({ index: 1, status: Status.PathMismatch });
      expect(memory.read("doc")).toBe('{"bogus":"string"}');
      expect(memory.peek("doc")?.cas).toBe(cas);
    });

    it("should store every spec with one write", async () => {
      memory.set("doc", '{"n":1}');

      const response = await engine.multiMutation({
        kind: "multi_mutation",
        key: "doc",
        specs: [
          { opcode: "dict_upsert", path: "a", value: "true" },
          { opcode: "counter", path: "n", value: "2" },
        ],
      });

      expect(response.status).toBe(Status.Success);
      expect(response.results).toEqual([{ index: 1, status: Status.Success, fragment: "3" }]);
      expect(memory.read("doc")).toBe('{"n":3,"a":true}');
      expect(store.count("casStore")).toBe(1);
      expect(stats.get("cmd_subdoc_mutation")).toBe(1);
    });

    it("should retry the whole batch on conflict", async () => {
      memory.set("doc", '{"n":1}');
      store.failStores("conflict", 2);

      const response = await engine.multiMutation({
        kind: "multi_mutation",
        key: "doc",
        specs: [{ opcode: "counter", path: "n", value: "1" }],
      });

      expect(response.results).toEqual([{ index: 0, status: Status.Success, fragment: "2" }]);
      expect(memory.read("doc")).toBe('{"n":2}');
    });

    it("should fail a non-JSON document at the first spec", async () => {
      memory.set("doc", "plain", { datatype: "raw" });

      const response = await engine.multiMutation({
        kind: "multi_mutation",
        key: "doc",
        specs: [{ opcode: "dict_upsert", path: "a", value: "1" }],
      });

      expect(response.failure).toEqual({ index: 0, status: Status.DocNotJson });
    });

    it("should report an explicit CAS mismatch as the overall status", async () => {
      const cas = memory.set("doc", "{}");

      const response = await engine.multiMutation({
        kind: "multi_mutation",
        key: "doc",
        cas: cas + 5n,
        specs: [{ opcode: "dict_upsert", path: "a", value: "1" }],
      });

      expect(response.status).toBe(Status.KeyExists);
      expect(response.failure).toBeUndefined();
    });
  });

  describe("execute()", () => {
    it("should dispatch on the command kind", async () => {
      memory.set("doc", "{}");

      const mutation = await engine.execute({
        kind: "mutation",
        opcode: "array_push_last",
        key: "doc",
        path: "list",
        value: "1",
        flags: { mkdirP: true },
      });
      const lookup = await engine.execute({ kind: "lookup", opcode: "get", key: "doc", path: "list" });

      expect(mutation.kind).toBe("mutation");
      expect(lookup).toMatchObject({ kind: "lookup", status: Status.Success, fragment: "[1]" });
    });
  });

  describe("configuration", () => {
    it("should expose resolved limits", () => {
      expect(engine.limits).toEqual({ maxAttempts: 100, maxMultiPaths: 16, maxDepth: 32 });
    });

    it("should reject out-of-range limits", () => {
      expect(() => new SubdocEngine(memory, { maxAttempts: 0 })).toThrow(ConfigError);
      expect(() => new SubdocEngine(memory, { maxDepth: 33 })).toThrow(ConfigError);
    });
  });
});
