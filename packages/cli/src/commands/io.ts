/**
 * Bulk data movement between collections and row files
 *
 * The file format follows the extension: .parquet, .json, or .jsonl/.ndjson.
 * Export pages through the collection with a query iterator; import loads the
 * whole file before connecting, then inserts it in batches.
 */

import { resolve } from "node:path";
import {
  NotFoundError,
  loadRowsFile,
  rowFileFormat,
  writeRowsFile,
  type Row,
  type ScanRequest,
  type VectorBackend,
} from "@yami/core";
import type { CommandSpec, OptionSpec } from "../registry/types.js";
import { mutation } from "./shared.js";

const COLLECTION_ARG = { name: "collection", description: "Collection name" };

const BATCH_SIZE_OPTION: OptionSpec = {
  flags: "-b, --batch-size <n>",
  type: "int",
  min: 1,
  default: "1000",
  description: "Rows per request",
};

async function requireCollection(backend: VectorBackend, collection: string): Promise<void> {
  if (!(await backend.hasCollection(collection))) {
    throw new NotFoundError(`Collection '${collection}' not found`);
  }
}

export const ioCommands: CommandSpec[] = [
  {
    group: "io",
    action: "export",
    description: "Export a collection's rows to a .parquet, .json or .jsonl file",
    args: [COLLECTION_ARG, { name: "output", description: "Output file; its extension picks the format" }],
    options: [
      { flags: "-f, --filter <expr>", type: "string", description: "Only export rows matching this expression" },
      { flags: "--fields <fields>", type: "list", description: "Comma-separated fields to export (default: all)" },
      { flags: "-p, --partition <names>", type: "list", description: "Comma-separated partitions to export" },
      BATCH_SIZE_OPTION,
      { flags: "-l, --limit <n>", type: "int", min: 1, description: "Maximum number of rows" },
    ],
    examples: [
      ["io", "export", "demo", "demo.parquet"],
      ["io", "export", "demo", "demo.jsonl", "--filter", "id > 0", "--fields", "id,title"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const output = resolve(input.arg("output"));
        rowFileFormat(output);

        const request: ScanRequest = { collection, batchSize: input.requireNumber("batchSize") };
        const filter = input.string("filter");
        if (filter !== undefined) request.filter = filter;
        const fields = input.list("fields");
        if (fields !== undefined) request.outputFields = fields;
        const partitions = input.list("partition");
        if (partitions !== undefined) request.partitions = partitions;
        const limit = input.number("limit");
        if (limit !== undefined) request.limit = limit;

        return async (backend) => {
          await requireCollection(backend, collection);
          const rows: Row[] = [];
          for await (const batch of backend.scan(request)) {
            rows.push(...batch);
          }
          if (rows.length === 0) {
            return mutation("No data to export", { export_count: 0 });
          }
          await writeRowsFile(output, rows);
          return mutation(`Exported ${rows.length} rows to ${output}`, { export_count: rows.length, file: output });
        };
      },
    },
  },
  {
    group: "io",
    action: "import",
    description: "Insert every row of a .parquet, .json or .jsonl file",
    args: [COLLECTION_ARG, { name: "file", description: "Input file; its extension picks the format" }],
    options: [
      BATCH_SIZE_OPTION,
      { flags: "-p, --partition <name>", type: "string", description: "Target partition" },
    ],
    examples: [["io", "import", "demo", "rows.jsonl", "--batch-size", "500"]],
    handler: {
      scope: "backend",
      plan: async (input) => {
        const collection = input.arg("collection");
        const batchSize = input.requireNumber("batchSize");
        const partition = input.string("partition");
        const rows = await loadRowsFile(input.arg("file"));

        return async (backend) => {
          await requireCollection(backend, collection);
          let imported = 0;
          let batches = 0;
          for (let start = 0; start < rows.length; start += batchSize) {
            const result = await backend.insert({ collection, rows: rows.slice(start, start + batchSize), partition });
            imported += result.count;
            batches++;
          }
          return mutation(`Imported ${imported} rows into '${collection}'`, { import_count: imported, batches });
        };
      },
    },
  },
];
