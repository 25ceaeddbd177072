import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadRowsFile, parseJsonLines, parseRows, rowFileFormat, writeRowsFile } from "./rows.js";
import { FileNotFoundError, InvalidFormatError, ValidationError } from "./errors.js";

describe("parseRows", () => {
  it("should accept a single object", () => {
    expect(parseRows('{"id": 1, "vector": [0.1, 0.2]}')).toEqual([{ id: 1, vector: [0.1, 0.2] }]);
  });

  it("should accept an array of objects", () => {
    expect(parseRows('[{"id": 1}, {"id": 2}]')).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it("should reject invalid JSON with INVALID_FORMAT", () => {
    expect(() => parseRows("[{id: 1}]")).toThrow(InvalidFormatError);
    expect(() => parseRows("[{id: 1}]")).toThrow(/^Invalid JSON in --data: /);
  });

  it("should reject an empty array", () => {
    expect(() => parseRows("[]")).toThrow(new ValidationError("No rows in --data"));
  });

  it("should keep integers beyond 2^53 as exact decimal strings", () => {
    expect(parseRows('[{"id": 449123456789012345, "score": 0.5, "rank": 3}]')).toEqual([
      { id: "449123456789012345", score: 0.5, rank: 3 },
    ]);
    expect(parseRows('{"id": -9007199254740993}')).toEqual([{ id: "-9007199254740993" }]);
  });

  it("should strip a leading byte order mark", () => {
    expect(parseRows('\uFEFF{"id": 1}')).toEqual([{ id: 1 }]);
  });

  it("should name the offending row", () => {
    expect(() => parseRows('[{"id": 1}, 7]')).toThrow("Row 2 in --data must be a JSON object, got number");
    expect(() => parseRows("[null]")).toThrow("Row 1 in --data must be a JSON object, got null");
    expect(() => parseRows("[[1]]")).toThrow("Row 1 in --data must be a JSON object, got array");
  });
});

describe("parseJsonLines", () => {
  it("should read one object per line and skip blank lines", () => {
    const text = '{"id": 1}\n\n{"id": 2}\r\n';
    expect(parseJsonLines(text, "rows.jsonl")).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it("should keep large int64 keys exact on every line", () => {
    const text = '{"id": 449123456789012345}\n{"id": 9007199254740992}\n';
    expect(parseJsonLines(text, "rows.jsonl")).toEqual([{ id: "449123456789012345" }, { id: 9007199254740992 }]);
  });

  it("should report the failing line number", () => {
    expect(() => parseJsonLines('{"id": 1}\n{oops}\n', "rows.jsonl")).toThrow(
      /^Invalid JSON on line 2 of rows\.jsonl: /
    );
  });
});

describe("loadRowsFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "yami-rows-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should load .json files", async () => {
    const file = join(dir, "rows.json");
    await writeFile(file, '[{"id": 1}, {"id": 2}]', "utf-8");

    expect(await loadRowsFile(file)).toEqual([{ id: 1 }, { id: 2 }]);
  });

  it("should load .jsonl and .ndjson files line by line", async () => {
    const jsonl = join(dir, "rows.jsonl");
    const ndjson = join(dir, "rows.NDJSON");
    await writeFile(jsonl, '{"id": 1}\n{"id": 2}\n', "utf-8");
    await writeFile(ndjson, '{"id": 3}\n', "utf-8");

    expect(await loadRowsFile(jsonl)).toEqual([{ id: 1 }, { id: 2 }]);
    expect(await loadRowsFile(ndjson)).toEqual([{ id: 3 }]);
  });

  it("should keep large int64 keys exact when loading files", async () => {
    const file = join(dir, "keys.jsonl");
    await writeFile(file, '{"id": 449123456789012345, "vector": [0.1, 0.2]}\n', "utf-8");

    expect(await loadRowsFile(file)).toEqual([{ id: "449123456789012345", vector: [0.1, 0.2] }]);
  });

  it("should raise FILE_NOT_FOUND for missing files", async () => {
    await expect(loadRowsFile(join(dir, "missing.json"))).rejects.toThrow(FileNotFoundError);
  });

  it("should raise INVALID_FORMAT for malformed files", async () => {
    const file = join(dir, "bad.json");
    await writeFile(file, "{", "utf-8");

    await expect(loadRowsFile(file)).rejects.toThrow(InvalidFormatError);
  });
});

describe("rowFileFormat", () => {
  it.each([
    ["rows.json", "json"],
    ["rows.JSONL", "jsonl"],
    ["rows.ndjson", "jsonl"],
    ["/tmp/export.parquet", "parquet"],
  ])("should map %s to %s", (file, format) => {
    expect(rowFileFormat(file)).toBe(format);
  });

  it("should reject other extensions", () => {
    expect(() => rowFileFormat("rows.csv")).toThrow(
      new ValidationError("Unsupported file type '.csv': use .json, .jsonl, .ndjson, .parquet")
    );
  });
});

describe("writeRowsFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "yami-rows-out-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should write one sorted object per line for .jsonl", async () => {
    const file = join(dir, "out.jsonl");
    await writeRowsFile(file, [{ title: "first", id: 1 }, { id: "449123456789012345" }]);

    expect(await readFile(file, "utf-8")).toBe('{"id":1,"title":"first"}\n{"id":"449123456789012345"}\n');
  });

  it("should write an indented array for .json that loads back", async () => {
    const file = join(dir, "out.json");
    await writeRowsFile(file, [{ id: 1, vector: [0.5] }]);

    expect(await readFile(file, "utf-8")).toBe('[\n  {\n    "id": 1,\n    "vector": [\n      0.5\n    ]\n  }\n]\n');
    expect(await loadRowsFile(file)).toEqual([{ id: 1, vector: [0.5] }]);
  });

  it("should load .parquet files through the Parquet reader", async () => {
    const file = join(dir, "out.parquet");
    await writeRowsFile(file, [{ id: 7, title: "seven" }]);

    expect(await loadRowsFile(file)).toEqual([{ id: 7, title: "seven" }]);
  });
});
