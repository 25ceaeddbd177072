/**
 * Parquet row files
 *
 * Columns are inferred from the rows being written:
 * - booleans → BOOLEAN, integers → INT64, other numbers → DOUBLE
 * - strings → UTF8
 * - arrays of numbers or of strings → repeated DOUBLE or UTF8 (vectors, tags)
 * - objects and columns mixing kinds → JSON
 *
 * Scalar columns are optional, so rows may leave them out or hold null.
 * INT64 values read back as numbers when that is lossless, as strings otherwise.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { ParquetReader, ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import { FileNotFoundError, InvalidFormatError, ValidationError } from "./errors.js";
import { ensureDirectory, errnoCode } from "./io.js";
import { logger } from "./observability/logs.js";
import type { Row } from "./types.js";

export type ParquetColumnType = "BOOLEAN" | "INT64" | "DOUBLE" | "UTF8" | "JSON";

export interface ParquetColumn {
  name: string;
  type: ParquetColumnType;
  repeated: boolean;
}

type ValueKind = "BOOLEAN" | "INT64" | "DOUBLE" | "UTF8" | "JSON" | "DOUBLE_LIST" | "UTF8_LIST" | "EMPTY_LIST";

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function kindOf(value: unknown): ValueKind {
  switch (typeof value) {
    case "boolean":
      return "BOOLEAN";
    case "bigint":
      return "INT64";
    case "number":
      return Number.isSafeInteger(value) ? "INT64" : "DOUBLE";
    case "string":
      return "UTF8";
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "EMPTY_LIST";
    if (value.every((item) => typeof item === "number")) return "DOUBLE_LIST";
    if (value.every((item) => typeof item === "string")) return "UTF8_LIST";
  }
  return "JSON";
}

function mergeKinds(a: ValueKind, b: ValueKind): ValueKind {
  if (a === b) return a;
  const pair = new Set([a, b]);
  if (pair.has("INT64") && pair.has("DOUBLE")) return "DOUBLE";
  if (pair.has("EMPTY_LIST")) {
    if (pair.has("DOUBLE_LIST")) return "DOUBLE_LIST";
    if (pair.has("UTF8_LIST")) return "UTF8_LIST";
  }
  return "JSON";
}

function columnOf(name: string, kind: ValueKind | undefined): ParquetColumn {
  switch (kind) {
    case "DOUBLE_LIST":
    case "EMPTY_LIST":
      return { name, type: "DOUBLE", repeated: true };
    case "UTF8_LIST":
      return { name, type: "UTF8", repeated: true };
    case undefined:
      return { name, type: "UTF8", repeated: false };
    default:
      return { name, type: kind, repeated: false };
  }
}

/**
 * Columns for a set of rows, in first-seen key order
 */
export function inferParquetColumns(rows: readonly Row[]): ParquetColumn[] {
  const kinds = new Map<string, ValueKind | undefined>();
  for (const row of rows) {
    for (const [key, value] of Object.entries(row)) {
      const current = kinds.get(key);
      if (value === null || value === undefined) {
        if (!kinds.has(key)) kinds.set(key, undefined);
        continue;
      }
      const kind = kindOf(value);
      kinds.set(key, current === undefined ? kind : mergeKinds(current, kind));
    }
  }
  return [...kinds].map(([name, kind]) => columnOf(name, kind));
}

function toParquetRow(row: Row, columns: readonly ParquetColumn[]): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const column of columns) {
    const value = row[column.name];
    if (value !== null && value !== undefined) {
      out[column.name] = value;
    }
  }
  return out;
}

/**
 * Values as JSON-ready data: bigints become numbers where lossless
 */
function fromParquetValue(value: unknown): unknown {
  if (typeof value === "bigint") {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(fromParquetValue);
  }
  if (isRecord(value) && !(value instanceof Date)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, fromParquetValue(item)]));
  }
  return value;
}

/**
 * Write rows to a Parquet file through a temp file in the same directory
 * @throws ValidationError if there are no rows or the file cannot be written
 */
export async function writeParquetFile(filePath: string, rows: readonly Row[]): Promise<void> {
  if (rows.length === 0) {
    throw new ValidationError(`No rows to write to ${filePath}`);
  }

  const columns = inferParquetColumns(rows);
  const schema = new ParquetSchema(
    Object.fromEntries(
      columns.map((column) => [
        column.name,
        column.repeated ? { type: column.type, repeated: true } : { type: column.type, optional: true },
      ])
    )
  );

  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);
  await ensureDirectory(dir);

  try {
    const writer = await ParquetWriter.openFile(schema, tmp);
    try {
      for (const row of rows) {
        await writer.appendRow(toParquetRow(row, columns));
      }
    } finally {
      await writer.close();
    }
    await fs.rename(tmp, filePath);
  } catch (err) {
    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.debug("parquet.cleanup_failed", { path: tmp, err_message: describe(unlinkErr) });
      }
    });
    throw new ValidationError(`Cannot write ${filePath}: ${describe(err)}`, { cause: err });
  }
}

/**
 * Read every row of a Parquet file
 * @throws FileNotFoundError if the file does not exist
 * @throws InvalidFormatError if the file is not Parquet
 */
export async function readParquetFile(filePath: string): Promise<Row[]> {
  let reader: ParquetReader;
  try {
    reader = await ParquetReader.openFile(filePath);
  } catch (err) {
    const code = errnoCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new FileNotFoundError(filePath, { cause: err });
    }
    throw new InvalidFormatError(`Invalid Parquet file ${filePath}: ${describe(err)}`, { cause: err });
  }

  try {
    const cursor = reader.getCursor();
    const rows: Row[] = [];
    let record: unknown = await cursor.next();
    while (record !== null && record !== undefined) {
      const row = fromParquetValue(record);
      if (isRecord(row)) {
        rows.push(row);
      }
      record = await cursor.next();
    }
    return rows;
  } finally {
    await reader.close();
  }
}
