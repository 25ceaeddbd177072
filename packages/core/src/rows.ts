/**
 * Loading rows for insert and upsert
 *
 * Accepted sources:
 * - .json: one object, or an array of objects
 * - .jsonl / .ndjson: one object per non-blank line
 * - .parquet: one row per record
 * - inline JSON text (--data), same rules as .json
 *
 * Integers beyond 2^53 are kept as their decimal text so int64 keys are
 * written exactly as given.
 */

import { extname } from "node:path";
import { isInteger, isSafeNumber, parse } from "lossless-json";
import { InvalidFormatError, ValidationError } from "./errors.js";
import { canonicalize } from "./format.js";
import { atomicWrite, readTextFile } from "./io.js";
import { readParquetFile, writeParquetFile } from "./parquet.js";
import type { Row } from "./types.js";

export type RowFileFormat = "json" | "jsonl" | "parquet";

/**
 * Recognised row file extensions
 */
export const ROW_FILE_FORMATS: Readonly<Record<string, RowFileFormat>> = {
  ".json": "json",
  ".jsonl": "jsonl",
  ".ndjson": "jsonl",
  ".parquet": "parquet",
};

function parseRowNumber(value: string): number | string {
  return isInteger(value) && !isSafeNumber(value) ? value : Number(value);
}

/**
 * Parse row JSON without rounding large integers
 */
function safeParseRowJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    const cleaned = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    return { success: true, data: parse(cleaned, null, parseRowNumber) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize a parsed JSON value into a non-empty list of rows
 * @param source - Where the value came from, for messages
 */
export function toRows(value: unknown, source: string): Row[] {
  const candidates = Array.isArray(value) ? value : [value];
  if (candidates.length === 0) {
    throw new ValidationError(`No rows in ${source}`);
  }

  const rows: Row[] = [];
  candidates.forEach((candidate, index) => {
    if (!isRow(candidate)) {
      throw new ValidationError(
        `Row ${index + 1} in ${source} must be a JSON object, got ${candidate === null ? "null" : Array.isArray(candidate) ? "array" : typeof candidate}`
      );
    }
    rows.push(candidate);
  });
  return rows;
}

/**
 * Parse inline JSON rows (the --data option)
 */
export function parseRows(text: string, source = "--data"): Row[] {
  const parsed = safeParseRowJson(text);
  if (!parsed.success) {
    throw new InvalidFormatError(`Invalid JSON in ${source}: ${parsed.error}`);
  }
  return toRows(parsed.data, source);
}

/**
 * Parse line-delimited JSON; blank lines are skipped
 */
export function parseJsonLines(text: string, source: string): Row[] {
  const values: unknown[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === "") {
      return;
    }
    const parsed = safeParseRowJson(line);
    if (!parsed.success) {
      throw new InvalidFormatError(`Invalid JSON on line ${index + 1} of ${source}: ${parsed.error}`);
    }
    values.push(parsed.data);
  });

  return toRows(values, source);
}

/**
 * Load rows from a file, choosing the parser by extension
 * @throws FileNotFoundError if the file does not exist
 * @throws InvalidFormatError if the content is not valid JSON
 * @throws ValidationError if the content holds no rows or non-object rows
 */
export async function loadRowsFile(filePath: string): Promise<Row[]> {
  const format = ROW_FILE_FORMATS[extname(filePath).toLowerCase()];
  if (format === "parquet") {
    return toRows(await readParquetFile(filePath), filePath);
  }
  const text = await readTextFile(filePath);
  return format === "jsonl" ? parseJsonLines(text, filePath) : parseRows(text, filePath);
}

/**
 * Output format for a file path
 * @throws ValidationError for an extension with no row format
 */
export function rowFileFormat(filePath: string): RowFileFormat {
  const extension = extname(filePath).toLowerCase();
  const format = ROW_FILE_FORMATS[extension];
  if (format === undefined) {
    throw new ValidationError(
      `Unsupported file type '${extension || filePath}': use ${Object.keys(ROW_FILE_FORMATS).join(", ")}`
    );
  }
  return format;
}

/**
 * Write rows in the format the extension names. Keys are written in code
 * point order; JSON files are written atomically.
 */
export async function writeRowsFile(filePath: string, rows: readonly Row[]): Promise<void> {
  switch (rowFileFormat(filePath)) {
    case "parquet":
      await writeParquetFile(filePath, rows);
      return;
    case "jsonl":
      await atomicWrite(filePath, rows.map((row) => JSON.stringify(canonicalize(row, [])) + "\n").join(""));
      return;
    case "json":
      await atomicWrite(filePath, JSON.stringify(canonicalize(rows, []), null, 2) + "\n");
      return;
  }
}
