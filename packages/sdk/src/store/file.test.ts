import { describe, it, expect } from "vitest";
import { readFile, writeFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { withTempStore } from "@subdoc/testkit";
import { FileKvStore } from "./file.js";
import { SubdocEngine } from "../engine.js";
import { DocumentReadError, InvalidKeyError } from "../errors.js";
import { Status } from "../protocol.js";

const JSON_OPTIONS = { flags: 0, expiry: 0, datatype: "json" } as const;

describe("FileKvStore", () => {
  it("should persist documents as envelopes", async () => {
    await withTempStore(async (store, root) => {
      const cas = await store.set("doc", '{"a":1}', { flags: 3 });

      const envelope: unknown = JSON.parse(await readFile(join(root, "docs", "doc.json"), "utf8"));
      expect(envelope).toEqual({
        cas: cas.toString(),
        flags: 3,
        expiry: 0,
        datatype: "json",
        value: '{"a":1}',
      });
    });
  });

  it("should read back what it stored", async () => {
    await withTempStore(async (store) => {
      const cas = await store.set("doc", "[1,2]");

      const fetched = await store.get("doc");

      expect(fetched.status).toBe("found");
      if (fetched.status !== "found") return;
      expect(fetched.document.value.toString()).toBe("[1,2]");
      expect(fetched.document.cas).toBe(cas);
    });
  });

  it("should keep raw values byte for byte", async () => {
    await withTempStore(async (store) => {
      const bytes = Buffer.from([0, 255, 10, 13]);
      await store.set("blob", bytes, { datatype: "raw" });

      const fetched = await store.get("blob");
      expect(fetched.status === "found" && [...fetched.document.value]).toEqual([0, 255, 10, 13]);
    });
  });

  it("should detect compare-and-swap conflicts", async () => {
    await withTempStore(async (store) => {
      const cas = await store.set("doc", "{}");

      expect(await store.casStore("doc", Buffer.from("[]"), cas + 1n, JSON_OPTIONS)).toEqual({
        status: "conflict",
      });
      const stored = await store.casStore("doc", Buffer.from("[]"), cas, JSON_OPTIONS);
      expect(stored.status).toBe("stored");
      expect(stored.status === "stored" && stored.cas > cas).toBe(true);
    });
  });

  it("should number writes in sequence", async () => {
    await withTempStore(async (store) => {
      const cas = await store.set("doc", "{}");
      const first = await store.casStore("doc", Buffer.from("[1]"), cas, JSON_OPTIONS);
      if (first.status !== "stored") throw new Error("expected store");
      const second = await store.casStore("doc", Buffer.from("[2]"), first.cas, JSON_OPTIONS);
      if (second.status !== "stored") throw new Error("expected store");

      expect(first.token.seqno).toBe(2n);
      expect(second.token.seqno).toBe(3n);
      expect(second.token.vbucketUuid).toBe(first.token.vbucketUuid);
    });
  });

  it("should never reuse a CAS when the clock stands still", async () => {
    await withTempStore(
      async (store) => {
        const first = await store.set("doc", "{}");
        const second = await store.set("doc", "[]");
        expect(second).toBe(first + 1n);
      },
      { now: () => 1_000 }
    );
  });

  it("should treat expired documents as missing", async () => {
    let now = 5_000_000;
    await withTempStore(
      async (store) => {
        await store.set("doc", "{}", { expiry: 1 });
        now += 1_000;
        expect(await store.get("doc")).toEqual({ status: "not-found" });
        expect(await store.stats()).toEqual({ count: 0, bytes: 0 });
      },
      { now: () => now }
    );
  });

  it("should list and remove keys", async () => {
    await withTempStore(async (store) => {
      await store.set("b", "{}");
      await store.set("a", "[1]");

      expect(await store.keys()).toEqual(["a", "b"]);
      expect(await store.stats()).toEqual({ count: 2, bytes: 5 });
      expect(await store.remove("a")).toBe(true);
      expect(await store.remove("a")).toBe(false);
      expect(await store.keys()).toEqual(["b"]);
    });
  });

  it("should reject keys that are not safe file names", async () => {
    await withTempStore(async (store) => {
      await expect(store.get("../escape")).rejects.toThrow(InvalidKeyError);
    });
  });

  it("should report a corrupt envelope", async () => {
    await withTempStore(async (store, root) => {
      await store.set("doc", "{}");
      await writeFile(join(root, "docs", "doc.json"), '{"cas":"x"}');

      await expect(store.get("doc")).rejects.toThrow(DocumentReadError);
    });
  });

  it("should release its locks", async () => {
    await withTempStore(async (store, root) => {
      await store.set("doc", "{}");
      expect(await readdir(join(root, "_meta", "locks"))).toEqual([]);
    });
  });

  it("should serialize concurrent engine mutations", async () => {
    await withTempStore(async (store, root) => {
      await store.set("doc", '{"n":0}');
      // Two stores over one directory behave like two processes
      const engines = [new SubdocEngine(store), new SubdocEngine(new FileKvStore({ root }))];

      const responses = await Promise.all(
        Array.from({ length: 10 }, (_, i) =>
          engines[i % 2]?.mutate({ kind: "mutation", opcode: "counter", key: "doc", path: "n", value: "1" })
        )
      );

      expect(responses.every((response) => response?.status === Status.Success)).toBe(true);
      const fetched = await store.get("doc");
      expect(fetched.status === "found" && fetched.document.value.toString()).toBe('{"n":10}');
    });
  });
});
