import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, ensureDirectory, listFiles, readTextFile, removeFile } from "./io.js";
import { DirectoryError, DocumentReadError, DocumentWriteError } from "../errors.js";

describe("store io", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "subdoc-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read a file", async () => {
      const filePath = join(testDir, "doc.json");
      await atomicWrite(filePath, '{"a":1}');
      expect(await readTextFile(filePath)).toBe('{"a":1}');
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "docs", "nested", "doc.json");
      await atomicWrite(filePath, "x");
      expect(await readTextFile(filePath)).toBe("x");
    });

    it("should not leave temp files behind", async () => {
      const filePath = join(testDir, "doc.json");
      await Promise.all(Array.from({ length: 20 }, (_, i) => atomicWrite(filePath, `write-${i}`)));

      const files = await readdir(testDir);
      expect(files).toEqual(["doc.json"]);
      expect(await readTextFile(filePath)).toMatch(/^write-\d+$/);
    });

    it("should wrap failures in DocumentWriteError", async () => {
      // The target is a directory, so the rename cannot replace it
      const target = join(testDir, "occupied");
      await mkdir(join(target, "child"), { recursive: true });

      await expect(atomicWrite(target, "x")).rejects.toThrow(DocumentWriteError);
      const files = await readdir(testDir);
      expect(files.filter((name) => name.endsWith(".tmp"))).toHaveLength(0);
    });

    it("should return undefined for a missing file", async () => {
      expect(await readTextFile(join(testDir, "missing.json"))).toBeUndefined();
    });

    it("should wrap other read failures in DocumentReadError", async () => {
      await expect(readTextFile(testDir)).rejects.toThrow(DocumentReadError);
    });
  });

  describe("removeFile", () => {
    it("should report whether a file was removed", async () => {
      const filePath = join(testDir, "doc.json");
      await writeFile(filePath, "x");

      expect(await removeFile(filePath)).toBe(true);
      expect(await removeFile(filePath)).toBe(false);
    });
  });

  describe("listFiles", () => {
    it("should list matching files in sorted order", async () => {
      await writeFile(join(testDir, "b.json"), "");
      await writeFile(join(testDir, "a.json"), "");
      await writeFile(join(testDir, "notes.txt"), "");
      await mkdir(join(testDir, "dir.json"));

      expect(await listFiles(testDir, ".json")).toEqual(["a.json", "b.json"]);
    });

    it("should return an empty list for a missing directory", async () => {
      expect(await listFiles(join(testDir, "missing"), ".json")).toEqual([]);
    });
  });

  describe("ensureDirectory", () => {
    it("should be idempotent", async () => {
      const dir = join(testDir, "a", "b");
      await ensureDirectory(dir);
      await ensureDirectory(dir);
      expect(await readdir(join(testDir, "a"))).toEqual(["b"]);
    });

    it("should fail when a file is in the way", async () => {
      await writeFile(join(testDir, "file"), "");
      await expect(ensureDirectory(join(testDir, "file", "sub"))).rejects.toThrow(DirectoryError);
    });
  });
});
