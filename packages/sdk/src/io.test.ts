import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, mkdir, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, readTextFile, ensureDirectory, listDirectories, errorCode } from "./io.js";
import { DirectoryError, ListDatabasesError, SnapshotReadError, SnapshotWriteError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "recordbox-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "store.json");
      const content = '{"test": "data"}';

      await atomicWrite(filePath, content);
      const result = await readTextFile(filePath);

      expect(result).toBe(content);
    });

    it("should not leave temp files after successful write", async () => {
      const filePath = join(testDir, "store.json");

      await atomicWrite(filePath, "{}");

      const files = await readdir(testDir);
      expect(files).toEqual(["store.json"]);
    });

    it("should overwrite existing file", async () => {
      const filePath = join(testDir, "store.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should handle concurrent writes (last-writer-wins)", async () => {
      const filePath = join(testDir, "concurrent.json");
      const writes = 20;

      await Promise.all(Array.from({ length: writes }, (_, i) => atomicWrite(filePath, `write-${i}`)));

      // One complete write wins; nothing partial, no temp files left
      const result = await readTextFile(filePath);
      expect(result).toMatch(/^write-\d+$/);
      expect(await readdir(testDir)).toEqual(["concurrent.json"]);
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "db", "nested", "store.json");

      await atomicWrite(filePath, "content");

      expect(await readFile(filePath, "utf-8")).toBe("content");
    });

    it("should handle unicode content", async () => {
      const filePath = join(testDir, "store.json");
      await atomicWrite(filePath, '{"name":"Zoë 😀"}');
      expect(await readTextFile(filePath)).toBe('{"name":"Zoë 😀"}');
    });

    it("should throw SnapshotWriteError when the parent is a file", async () => {
      const blocker = join(testDir, "blocker");
      await writeFile(blocker, "not a directory");

      const target = join(blocker, "store.json");
      await expect(atomicWrite(target, "x")).rejects.toThrow(SnapshotWriteError);
      await expect(atomicWrite(target, "x")).rejects.toThrow(`Failed to write snapshot: ${target}`);
    });

    it("should leave the previous file intact when the rename fails", async () => {
      // A directory at the target path makes rename fail after the temp file is written
      const target = join(testDir, "store.json");
      await mkdir(target);

      await expect(atomicWrite(target, "new")).rejects.toThrow(SnapshotWriteError);
      expect(await readdir(testDir)).toEqual(["store.json"]);
    });
  });

  describe("readTextFile", () => {
    it("should return null for a missing file", async () => {
      expect(await readTextFile(join(testDir, "missing.json"))).toBeNull();
    });

    it("should throw SnapshotReadError for other failures", async () => {
      const dirPath = join(testDir, "a-directory");
      await mkdir(dirPath);

      const error = await readTextFile(dirPath).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(SnapshotReadError);
      expect(error).toHaveProperty("message", `Failed to read snapshot: ${dirPath}`);
      expect(error).toHaveProperty("code", "READ_ERROR");
      expect(error).toHaveProperty("kind", "IOError");
    });
  });

  describe("ensureDirectory", () => {
    it("should create nested directories", async () => {
      const dirPath = join(testDir, "a", "b", "c");
      await ensureDirectory(dirPath);
      expect(await readdir(join(testDir, "a", "b"))).toEqual(["c"]);
    });

    it("should not error if directory already exists", async () => {
      await ensureDirectory(testDir);
      await expect(ensureDirectory(testDir)).resolves.toBeUndefined();
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(DirectoryError);
    });

    it("should throw DirectoryError when path is a regular file", async () => {
      const filePath = join(testDir, "file.txt");
      await writeFile(filePath, "content");

      await expect(ensureDirectory(filePath)).rejects.toThrow(DirectoryError);
    });
  });

  describe("listDirectories", () => {
    it("should list sub-directories in sorted order", async () => {
      await mkdir(join(testDir, "zeta"));
      await mkdir(join(testDir, "alpha"));
      await mkdir(join(testDir, "Beta"));

      expect(await listDirectories(testDir)).toEqual(["Beta", "alpha", "zeta"]);
    });

    it("should skip plain files", async () => {
      await mkdir(join(testDir, "db"));
      await writeFile(join(testDir, ".current"), "db");

      expect(await listDirectories(testDir)).toEqual(["db"]);
    });

    it("should return an empty list for a missing directory", async () => {
      expect(await listDirectories(join(testDir, "missing"))).toEqual([]);
    });

    it("should throw ListDatabasesError for a non-directory path", async () => {
      const filePath = join(testDir, "file.txt");
      await writeFile(filePath, "content");

      await expect(listDirectories(filePath)).rejects.toThrow(ListDatabasesError);
      await expect(listDirectories(filePath)).rejects.toThrow(
        `Failed to list databases in directory: ${filePath}`
      );
    });
  });

  describe("errorCode", () => {
    it("should read string codes only", () => {
      expect(errorCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
      expect(errorCode({ code: 1 })).toBeUndefined();
      expect(errorCode("ENOENT")).toBeUndefined();
    });
  });
});
