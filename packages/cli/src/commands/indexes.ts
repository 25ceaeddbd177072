/**
 * Index commands
 */

import { z } from "zod";
import { METRIC_TYPES, ValidationError, type CreateIndexRequest } from "@yami/core";
import type { CommandInput } from "../registry/input.js";
import type { CommandSpec } from "../registry/types.js";
import { metricOf } from "./collection.js";
import { data, mutation } from "./shared.js";

const COLLECTION_ARG = { name: "collection", description: "Collection name" };

const IndexParamsSchema = z.record(z.unknown());

function indexParams(input: CommandInput): Record<string, unknown> | undefined {
  const raw = input.json("params");
  if (raw === undefined) {
    return undefined;
  }
  const parsed = IndexParamsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`${input.nameOf("params")} must be a JSON object, e.g. '{"M": 16}'`);
  }
  return parsed.data;
}

function createRequest(input: CommandInput): CreateIndexRequest {
  const request: CreateIndexRequest = {
    collection: input.arg("collection"),
    field: input.arg("field"),
    indexType: input.requireString("indexType").toUpperCase(),
  };
  const metric = metricOf(input);
  if (metric !== undefined) request.metric = metric;
  const indexName = input.string("indexName");
  if (indexName !== undefined) request.indexName = indexName;
  const params = indexParams(input);
  if (params !== undefined) request.params = params;
  return request;
}

export const indexCommands: CommandSpec[] = [
  {
    group: "index",
    action: "list",
    description: "List index names on a collection",
    args: [COLLECTION_ARG],
    options: [],
    examples: [["index", "list", "demo"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        return async (backend) => data(await backend.listIndexes(collection));
      },
    },
  },
  {
    group: "index",
    action: "describe",
    description: "Show index type, metric, parameters and build progress",
    args: [COLLECTION_ARG],
    options: [{ flags: "--index-name <name>", type: "string", description: "Describe only this index" }],
    examples: [
      ["index", "describe", "demo"],
      ["index", "describe", "demo", "--index-name", "vector"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const indexName = input.string("indexName");
        return async (backend) => data(await backend.describeIndex(collection, indexName));
      },
    },
  },
  {
    group: "index",
    action: "create",
    description: "Build an index on a field",
    args: [COLLECTION_ARG, { name: "field", description: "Field to index" }],
    options: [
      { flags: "--index-type <type>", type: "string", description: "Index type, e.g. HNSW or IVF_FLAT", default: "AUTOINDEX" },
      { flags: "--metric <type>", type: "string", choices: METRIC_TYPES, description: "Metric type for vector indexes" },
      { flags: "--index-name <name>", type: "string", description: "Index name (default: field name)" },
      { flags: "--params <json>", type: "json", description: "Index build parameters as a JSON object" },
    ],
    examples: [
      ["index", "create", "demo", "vector"],
      ["index", "create", "demo", "vector", "--index-type", "HNSW", "--metric", "COSINE", "--params", '{"M":16,"efConstruction":200}'],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const request = createRequest(input);
        return async (backend) => {
          await backend.createIndex(request);
          return mutation(`Index on '${request.collection}.${request.field}' created`, {
            index_type: request.indexType,
          });
        };
      },
    },
  },
  {
    group: "index",
    action: "drop",
    description: "Drop an index",
    args: [COLLECTION_ARG, { name: "index", description: "Index name" }],
    options: [],
    examples: [["index", "drop", "demo", "vector"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const indexName = input.arg("index");
        return async (backend) => {
          await backend.dropIndex(collection, indexName);
          return mutation(`Index '${indexName}' dropped from '${collection}'`);
        };
      },
    },
  },
];
