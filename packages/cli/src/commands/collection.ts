/**
 * Collection commands
 */

import {
  FIELD_DSL_HELP,
  METRIC_TYPES,
  parseFields,
  type CreateCollectionRequest,
  type MetricType,
} from "@yami/core";
import { exactlyOne, type CommandInput } from "../registry/input.js";
import type { CommandSpec } from "../registry/types.js";
import { data, mutation } from "./shared.js";

const NAME_ARG = { name: "name", description: "Collection name" };

function isMetricType(value: string): value is MetricType {
  return METRIC_TYPES.some((metric) => metric === value);
}

/**
 * Metric option value; the option declares METRIC_TYPES as its choices
 */
export function metricOf(input: CommandInput, key = "metric"): MetricType | undefined {
  const value = input.string(key);
  return value !== undefined && isMetricType(value) ? value : undefined;
}

function createRequest(input: CommandInput): CreateCollectionRequest {
  const name = input.arg("name");
  const mode = exactlyOne(input, "dim", "fields");

  if (mode === "fields") {
    return { mode: "schema", name, fields: parseFields(input.list("fields") ?? []) };
  }

  return {
    mode: "quick",
    name,
    dimension: input.requireNumber("dim"),
    metric: metricOf(input) ?? "COSINE",
    autoId: input.flag("autoId"),
    primaryField: input.requireString("primaryField"),
    vectorField: input.requireString("vectorField"),
  };
}

export const collectionCommands: CommandSpec[] = [
  {
    group: "collection",
    action: "list",
    description: "List collections in the current database",
    args: [],
    options: [],
    examples: [["collection", "list"]],
    handler: {
      scope: "backend",
      plan: () => async (backend) => data(await backend.listCollections()),
    },
  },
  {
    group: "collection",
    action: "describe",
    description: "Show a collection's schema and properties",
    args: [NAME_ARG],
    options: [],
    examples: [["collection", "describe", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => data(await backend.describeCollection(name));
      },
    },
  },
  {
    group: "collection",
    action: "create",
    description: `Create a collection, either quickly from a dimension (--dim) or from field definitions (--fields)\n\n${FIELD_DSL_HELP}`,
    args: [NAME_ARG],
    options: [
      { flags: "--dim <n>", type: "int", min: 1, description: "Vector dimension (quick create)" },
      {
        flags: "--fields <defs>",
        type: "list",
        description: "Comma-separated field definitions, e.g. id:int64:pk,vec:float_vector:768",
      },
      {
        flags: "-m, --metric <type>",
        type: "string",
        choices: METRIC_TYPES,
        description: "Metric type for quick create",
        default: "COSINE",
      },
      { flags: "--auto-id", type: "boolean", description: "Generate primary keys (quick create)" },
      { flags: "--primary-field <name>", type: "string", description: "Primary field name", default: "id" },
      { flags: "--vector-field <name>", type: "string", description: "Vector field name", default: "vector" },
    ],
    examples: [
      ["collection", "create", "movies", "--dim", "768"],
      ["collection", "create", "docs", "--dim", "384", "--metric", "L2", "--auto-id"],
      ["collection", "create", "articles", "--fields", "id:int64:pk:auto,title:varchar:512,embedding:float_vector:768:COSINE"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const request = createRequest(input);
        return async (backend) => {
          await backend.createCollection(request);
          return mutation(`Collection '${request.name}' created`);
        };
      },
    },
  },
  {
    group: "collection",
    action: "drop",
    description: "Drop a collection and all of its data",
    args: [NAME_ARG],
    options: [],
    destructive: (input) => `Drop collection '${input.arg("name")}' and all of its data?`,
    examples: [["collection", "drop", "demo", "--force"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => {
          await backend.dropCollection(name);
          return mutation(`Collection '${name}' dropped`);
        };
      },
    },
  },
  {
    group: "collection",
    action: "has",
    description: "Check whether a collection exists",
    args: [NAME_ARG],
    options: [],
    examples: [["collection", "has", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => data({ collection: name, exists: await backend.hasCollection(name) });
      },
    },
  },
  {
    group: "collection",
    action: "rename",
    description: "Rename a collection, optionally moving it to another database",
    args: [
      { name: "old", description: "Current collection name" },
      { name: "new", description: "New collection name" },
    ],
    options: [{ flags: "--target-db <name>", type: "string", description: "Database to move the collection into" }],
    examples: [
      ["collection", "rename", "demo", "demo_v2"],
      ["collection", "rename", "demo", "demo", "--target-db", "analytics"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const oldName = input.arg("old");
        const newName = input.arg("new");
        const targetDb = input.string("targetDb");
        return async (backend) => {
          await backend.renameCollection(oldName, newName, targetDb);
          const where = targetDb === undefined ? "" : ` in database '${targetDb}'`;
          return mutation(`Collection '${oldName}' renamed to '${newName}'${where}`);
        };
      },
    },
  },
  {
    group: "collection",
    action: "stats",
    description: "Show collection statistics such as row count",
    args: [NAME_ARG],
    options: [],
    examples: [["collection", "stats", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const name = input.arg("name");
        return async (backend) => data(await backend.getCollectionStats(name));
      },
    },
  },
];
