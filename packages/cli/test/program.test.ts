/**
 * CLI command tests
 * Runs the commander program in-process against a temp store root
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTempStoreRoot, removeDir } from "@subdoc/testkit";
import { createProgram } from "../src/program.js";

describe("subdoc CLI", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempStoreRoot("subdoc-cli-test-");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(root);
  });

  /** Lines printed by the most recent command, kept when it throws */
  let printed: string[] = [];

  /**
   * Run one command and collect what it printed with console.log
   */
  async function run(...args: string[]): Promise<string[]> {
    const lines: string[] = [];
    printed = lines;
    vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
      lines.push(parts.map(String).join(" "));
    });
    try {
      const program = createProgram({ writeErr: () => {}, writeOut: () => {} });
      await program.parseAsync(["node", "subdoc", "--root", root, ...args]);
    } finally {
      vi.mocked(console.log).mockRestore();
    }
    return lines;
  }

  async function runJson(...args: string[]): Promise<unknown> {
    const lines = await run(...args);
    expect(lines).toHaveLength(1);
    return JSON.parse(lines[0] ?? "");
  }

  describe("put and get", () => {
    it("should store a document and read fragments back", async () => {
      const stored = await run("put", "doc1", "--data", '{"a":{"b":[1,2]}}');
      expect(stored[0]).toMatch(/^Stored doc1 \(cas \d+\)$/);

      expect(await run("get", "doc1", "a.b")).toEqual(["[1,2]"]);
      expect(await run("get", "doc1", "a.b[-1]")).toEqual(["2"]);
    });

    it("should print the whole document when the path is omitted", async () => {
      await run("put", "doc1", "--data", '{ "a" : 1 }');
      expect(await run("get", "doc1")).toEqual(['{"a":1}']);
    });

    it("should suppress confirmation output with --quiet", async () => {
      expect(await run("--quiet", "put", "doc1", "--data", "{}")).toEqual([]);
    });

    it("should reject a document that is not JSON", async () => {
      await expect(run("put", "doc1", "--data", "{oops")).rejects.toThrow(
        /^Document is not valid JSON: Invalid JSON at offset 1/
      );
    });

    it("should store raw documents that subdoc commands then refuse", async () => {
      await run("put", "blob", "--raw", "--data", "not json");
      await expect(run("get", "blob", "a")).rejects.toMatchObject({ exitCode: 3 });
      await expect(run("get", "blob", "a")).rejects.toThrow(/^DocNotJson/);
    });

    it("should exit with code 2 for a missing document", async () => {
      await expect(run("get", "missing", "a")).rejects.toMatchObject({ exitCode: 2 });
    });
  });

  describe("exists", () => {
    it("should print true for a present path", async () => {
      await run("put", "doc1", "--data", '{"a":null}');
      expect(await run("exists", "doc1", "a")).toEqual(["true"]);
    });

    it("should fail with PathNotFound for an absent path", async () => {
      await run("put", "doc1", "--data", '{"a":null}');
      await expect(run("exists", "doc1", "b")).rejects.toMatchObject({
        exitCode: 3,
        message: "PathNotFound: Path not found",
      });
    });
  });

  describe("mutate", () => {
    it("should apply a counter and report the new value", async () => {
      await run("put", "doc1", "--data", '{"n":1}');
      const summary = await runJson("mutate", "counter", "doc1", "n", "4");
      expect(summary).toMatchObject({ status: "Success", fragment: "5" });
      expect(summary).toHaveProperty("cas", expect.stringMatching(/^\d+$/));

      expect(await run("get", "doc1", "n")).toEqual(["5"]);
    });

    it("should accept dashed operation names and --mkdir-p", async () => {
      await run("put", "doc1", "--data", "{}");
      const summary = await runJson("mutate", "dict-upsert", "doc1", "x.y", '"v"', "--mkdir-p");
      expect(summary).not.toHaveProperty("fragment");

      expect(await run("get", "doc1")).toEqual(['{"x":{"y":"v"}}']);
    });

    it("should delete without a value", async () => {
      await run("put", "doc1", "--data", '{"a":1,"b":2}');
      await run("mutate", "delete", "doc1", "a");
      expect(await run("get", "doc1")).toEqual(['{"b":2}']);
    });

    it("should refuse a stale --cas", async () => {
      await run("put", "doc1", "--data", '{"n":1}');
      await expect(run("mutate", "counter", "doc1", "n", "1", "--cas", "1")).rejects.toMatchObject({
        exitCode: 3,
      });
      await expect(run("mutate", "counter", "doc1", "n", "1", "--cas", "1")).rejects.toThrow(/^KeyExists/);
      expect(await run("get", "doc1", "n")).toEqual(["1"]);
    });

    it("should apply when --cas matches the stored CAS", async () => {
      await run("put", "doc1", "--data", '{"n":1}');
      const meta = await runJson("cat", "doc1", "--meta");
      expect(meta).toHaveProperty("cas", expect.stringMatching(/^\d+$/));
      const cas = typeof meta === "object" && meta !== null && "cas" in meta ? String(meta.cas) : "";

      const summary = await runJson("mutate", "counter", "doc1", "n", "1", "--cas", cas);
      expect(summary).toMatchObject({ status: "Success", fragment: "2" });
    });

    it("should reject an unknown operation", async () => {
      await run("put", "doc1", "--data", "{}");
      await expect(run("mutate", "append", "doc1", "a", "1")).rejects.toThrow('Unknown operation "append"');
    });
  });

  describe("multi-lookup", () => {
    it("should report per-spec results and fail when any spec fails", async () => {
      await run("put", "doc1", "--data", '{"a":[1,2]}');

      const spec = '[{"opcode":"get","path":"a[0]"},{"opcode":"exists","path":"zz"}]';
      await expect(run("multi-lookup", "doc1", "--spec", spec)).rejects.toMatchObject({
        exitCode: 3,
        message: "One or more lookups failed",
      });

      expect(printed).toHaveLength(1);
      expect(JSON.parse(printed[0] ?? "")).toMatchObject({
        status: "MultiPathFailure",
        results: [{ status: "Success", fragment: "1" }, { status: "PathNotFound" }],
      });
    });

    it("should print every fragment on success", async () => {
      await run("put", "doc1", "--data", '{"a":[1,2],"b":"x"}');
      const summary = await runJson(
        "multi-lookup",
        "doc1",
        "--spec",
        '[{"opcode":"get","path":"b"},{"opcode":"exists","path":"a[1]"}]'
      );
      expect(summary).toMatchObject({
        status: "Success",
        results: [{ status: "Success", fragment: '"x"' }, { status: "Success" }],
      });
    });

    it("should reject a mutation opcode in a lookup list", async () => {
      await run("put", "doc1", "--data", "{}");
      await expect(
        run("multi-lookup", "doc1", "--spec", '[{"opcode":"counter","path":"n"}]')
      ).rejects.toThrow(/^Invalid specs in --spec: 0\.opcode/);
    });
  });

  describe("multi-mutate", () => {
    it("should apply every spec atomically", async () => {
      await run("put", "doc1", "--data", "{}");
      const summary = await runJson(
        "multi-mutate",
        "doc1",
        "--spec",
        '[{"opcode":"counter","path":"n","value":"2"},{"opcode":"dict_add","path":"m","value":"true"}]'
      );
      expect(summary).toMatchObject({
        status: "Success",
        results: [{ index: 0, status: "Success", fragment: "2" }],
      });
      expect(await run("get", "doc1")).toEqual(['{"n":2,"m":true}']);
    });

    it("should leave the document untouched when a spec fails", async () => {
      await run("put", "doc1", "--data", '{"bogus":"string"}');
      await expect(
        run(
          "multi-mutate",
          "doc1",
          "--spec",
          '[{"opcode":"dict_upsert","path":"a","value":"1"},{"opcode":"array_push_last","path":"bogus","value":"1"}]'
        )
      ).rejects.toThrow(/^PathMismatch: Spec 1 failed/);
      expect(await run("get", "doc1")).toEqual(['{"bogus":"string"}']);
    });
  });

  describe("document management", () => {
    it("should list keys in order", async () => {
      await run("put", "b", "--data", "{}");
      await run("put", "a", "--data", "{}");
      expect(await run("ls")).toEqual(["a", "b"]);
      expect(await runJson("ls", "--json")).toEqual(["a", "b"]);
    });

    it("should report document count and size", async () => {
      await run("put", "a", "--data", '{"k":1}');
      await run("put", "b", "--data", "[]");
      expect(await runJson("stats", "--json")).toEqual({ count: 2, bytes: 9 });
      expect(await run("stats")).toEqual(["Documents: 2", "Total size: 9.00 B"]);
    });

    it("should show metadata with cat --meta", async () => {
      await run("put", "doc1", "--data", "[1]", "--flags", "7");
      expect(await runJson("cat", "doc1", "--meta")).toMatchObject({
        key: "doc1",
        flags: 7,
        expiry: 0,
        datatype: "json",
        bytes: 3,
      });
    });

    it("should write the stored bytes with cat", async () => {
      await run("put", "doc1", "--data", '{ "a": 1 }');
      const chunks: string[] = [];
      vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
        chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
        return true;
      });
      await run("cat", "doc1");
      vi.mocked(process.stdout.write).mockRestore();
      expect(chunks.join("")).toBe('{ "a": 1 }\n');
    });

    it("should remove a document with --force", async () => {
      await run("put", "doc1", "--data", "{}");
      expect(await run("rm", "doc1", "--force")).toEqual(["Removed doc1"]);
      await expect(run("cat", "doc1")).rejects.toMatchObject({ exitCode: 2 });
      await expect(run("rm", "doc1", "--force")).rejects.toMatchObject({ exitCode: 2 });
    });
  });

  describe("global options", () => {
    it("should reject a retry bound outside 1-1000", async () => {
      await expect(run("--max-attempts", "0", "ls")).rejects.toMatchObject({
        code: "commander.invalidArgument",
      });
      await expect(run("--max-attempts", "5000", "ls")).rejects.toMatchObject({
        code: "commander.invalidArgument",
      });
    });
  });
});
