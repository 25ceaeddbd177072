/**
 * Data commands: insert, upsert, delete
 *
 * Rows come from a file (--file: .json, .jsonl/.ndjson or .parquet) or inline JSON
 * (--data). Either way they are loaded and validated before connecting, then
 * written in one bulk call.
 */

import { loadRowsFile, parseRows, type DeleteRequest, type Row } from "@yami/core";
import { exactlyOne, type CommandInput } from "../registry/input.js";
import type { CommandSpec, OptionSpec } from "../registry/types.js";
import { mutation } from "./shared.js";

const COLLECTION_ARG = { name: "collection", description: "Collection name" };

function rowOptions(verb: string): OptionSpec[] {
  return [
    { flags: "-f, --file <path>", type: "string", description: `JSON, JSON Lines or Parquet file with rows to ${verb}` },
    { flags: "--data <json>", type: "string", description: `Inline JSON object or array of objects to ${verb}` },
    { flags: "-p, --partition <name>", type: "string", description: "Target partition" },
  ];
}

async function loadRows(input: CommandInput): Promise<Row[]> {
  if (exactlyOne(input, "file", "data") === "file") {
    return loadRowsFile(input.requireString("file"));
  }
  return parseRows(input.requireString("data"), input.nameOf("data"));
}

function deleteRequest(input: CommandInput): DeleteRequest {
  const collection = input.arg("collection");
  const partition = input.string("partition");
  const base = partition === undefined ? { collection } : { collection, partition };

  if (exactlyOne(input, "ids", "filter") === "ids") {
    return { ...base, ids: input.ids("ids") ?? [] };
  }
  return { ...base, filter: input.requireString("filter") };
}

function deletePrompt(input: CommandInput): string {
  const collection = input.arg("collection");
  const ids = input.ids("ids");
  if (ids !== undefined) {
    return `Delete entities with ids ${ids.join(", ")} from '${collection}'?`;
  }
  return `Delete entities matching '${input.string("filter") ?? ""}' from '${collection}'?`;
}

export const dataCommands: CommandSpec[] = [
  {
    group: "data",
    action: "insert",
    description: "Insert rows into a collection",
    args: [COLLECTION_ARG],
    options: rowOptions("insert"),
    examples: [
      ["data", "insert", "demo", "--data", '[{"id":1,"vector":[0.1,0.2,0.3,0.4]}]'],
      ["data", "insert", "demo", "--data", '{"id":2,"vector":[0.4,0.3,0.2,0.1]}', "--partition", "recent"],
    ],
    handler: {
      scope: "backend",
      plan: async (input) => {
        const collection = input.arg("collection");
        const partition = input.string("partition");
        const rows = await loadRows(input);
        return async (backend) => {
          const result = await backend.insert({ collection, rows, partition });
          return mutation(`Inserted ${result.count} entities into '${collection}'`, {
            insert_count: result.count,
            ids: result.ids,
          });
        };
      },
    },
  },
  {
    group: "data",
    action: "upsert",
    description: "Insert rows or replace rows with the same primary key",
    args: [COLLECTION_ARG],
    options: rowOptions("upsert"),
    examples: [["data", "upsert", "demo", "--data", '[{"id":1,"vector":[0.5,0.5,0.5,0.5]}]']],
    handler: {
      scope: "backend",
      plan: async (input) => {
        const collection = input.arg("collection");
        const partition = input.string("partition");
        const rows = await loadRows(input);
        return async (backend) => {
          const result = await backend.upsert({ collection, rows, partition });
          return mutation(`Upserted ${result.count} entities into '${collection}'`, {
            upsert_count: result.count,
            ids: result.ids,
          });
        };
      },
    },
  },
  {
    group: "data",
    action: "delete",
    description: "Delete entities by id or by filter expression",
    args: [COLLECTION_ARG],
    options: [
      { flags: "-i, --ids <ids>", type: "ids", description: "Comma-separated ids to delete" },
      { flags: "-f, --filter <expr>", type: "string", description: "Filter expression, e.g. 'age > 20'" },
      { flags: "-p, --partition <name>", type: "string", description: "Partition to delete from" },
    ],
    destructive: deletePrompt,
    examples: [
      ["data", "delete", "demo", "--ids", "1,2,3", "--force"],
      ["data", "delete", "demo", "--filter", "id > 100", "--force"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const request = deleteRequest(input);
        return async (backend) => {
          const result = await backend.delete(request);
          return mutation(`Deleted ${result.count} entities from '${request.collection}'`, {
            delete_count: result.count,
          });
        };
      },
    },
  },
];
