import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, stat, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, ensureDirectory, readTextFile, readTextFileIfExists } from "./io.js";
import { FileNotFoundError, ValidationError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "yami-io-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readTextFile", () => {
    it("should write and read file successfully", async () => {
      const filePath = join(testDir, "profiles.json");
      const content = '{"version": 1}';

      await atomicWrite(filePath, content);
      const result = await readTextFile(filePath);

      expect(result).toBe(content);
    });

    it("should not leave temp files after successful write", async () => {
      const filePath = join(testDir, "profiles.json");

      await atomicWrite(filePath, "{}");

      const files = await readdir(testDir);
      expect(files).toEqual(["profiles.json"]);
    });

    it("should overwrite existing file atomically", async () => {
      const filePath = join(testDir, "profiles.json");

      await atomicWrite(filePath, "first");
      await atomicWrite(filePath, "second");

      expect(await readTextFile(filePath)).toBe("second");
    });

    it("should handle concurrent writes (last-writer-wins)", async () => {
      const filePath = join(testDir, "concurrent.json");

      await Promise.all(Array.from({ length: 20 }, (_, i) => atomicWrite(filePath, `write-${i}`)));

      const result = await readTextFile(filePath);
      expect(result).toMatch(/^write-\d+$/);
      const files = await readdir(testDir);
      expect(files).toEqual(["concurrent.json"]);
    });

    it("should create missing parent directories", async () => {
      const filePath = join(testDir, "nested", "deeper", "profiles.json");

      await atomicWrite(filePath, "{}");

      expect(await readTextFile(filePath)).toBe("{}");
    });

    it("should write files readable only by the owner", async () => {
      if (process.platform === "win32") return;
      const filePath = join(testDir, "profiles.json");

      await atomicWrite(filePath, "{}");

      const info = await stat(filePath);
      expect(info.mode & 0o777).toBe(0o600);
    });

    it("should wrap failures in ValidationError and clean up the temp file", async () => {
      // Renaming a file over a directory fails
      const target = join(testDir, "occupied");
      await mkdir(target);
      await writeFile(join(target, "keep"), "x");

      await expect(atomicWrite(target, "data")).rejects.toThrow(ValidationError);

      const files = await readdir(testDir);
      expect(files).toEqual(["occupied"]);
    });
  });

  describe("readTextFile", () => {
    it("should throw FileNotFoundError for a missing file", async () => {
      const filePath = join(testDir, "missing.json");

      await expect(readTextFile(filePath)).rejects.toThrow(FileNotFoundError);
      await expect(readTextFile(filePath)).rejects.toThrow(`File not found: ${filePath}`);
    });
  });

  describe("readTextFileIfExists", () => {
    it("should return null for a missing file", async () => {
      expect(await readTextFileIfExists(join(testDir, "missing.json"))).toBeNull();
    });

    it("should return content for an existing file", async () => {
      const filePath = join(testDir, "present.json");
      await writeFile(filePath, "hello", "utf-8");

      expect(await readTextFileIfExists(filePath)).toBe("hello");
    });
  });

  describe("ensureDirectory", () => {
    it("should create directories recursively", async () => {
      const dirPath = join(testDir, "a", "b", "c");

      await ensureDirectory(dirPath);

      const info = await stat(dirPath);
      expect(info.isDirectory()).toBe(true);
    });

    it("should be idempotent", async () => {
      const dirPath = join(testDir, "again");

      await ensureDirectory(dirPath);
      await ensureDirectory(dirPath);

      expect((await stat(dirPath)).isDirectory()).toBe(true);
    });

    it("should reject an empty path", async () => {
      await expect(ensureDirectory("")).rejects.toThrow(ValidationError);
    });
  });
});
