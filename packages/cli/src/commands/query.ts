/**
 * Read commands: vector search, hybrid search, filter query and get by id
 */

import { z } from "zod";
import {
  METRIC_TYPES,
  ValidationError,
  readTextFile,
  type AnnRequest,
  type HybridSearchRequest,
  type QueryRequest,
  type Ranker,
  type SearchRequest,
} from "@yami/core";
import { parseFloatValue, parseIds, parseJson, parseVector } from "../lib/arg.js";
import { exactlyOne, type CommandInput } from "../registry/input.js";
import type { CommandSpec } from "../registry/types.js";
import { metricOf } from "./collection.js";
import { OUTPUT_FIELDS_OPTION, PARTITIONS_OPTION, data } from "./shared.js";

const COLLECTION_ARG = { name: "collection", description: "Collection name" };

function searchRequest(input: CommandInput): SearchRequest {
  const request: SearchRequest = {
    collection: input.arg("collection"),
    vector: parseVector(input.requireString("vector"), input.nameOf("vector")),
    limit: input.requireNumber("limit"),
  };

  const filter = input.string("filter");
  if (filter !== undefined) request.filter = filter;
  const outputFields = input.list("outputFields");
  if (outputFields !== undefined) request.outputFields = outputFields;
  const annsField = input.string("annsField");
  if (annsField !== undefined) request.annsField = annsField;
  const partitions = input.list("partition");
  if (partitions !== undefined) request.partitions = partitions;
  const metric = metricOf(input);
  if (metric !== undefined) request.metric = metric;

  const params: Record<string, number> = {};
  const nprobe = input.number("nprobe");
  if (nprobe !== undefined) params.nprobe = nprobe;
  const ef = input.number("ef");
  if (ef !== undefined) params.ef = ef;
  if (Object.keys(params).length > 0) request.params = params;

  return request;
}

const AnnRequestSchema = z
  .object({
    field: z.string().min(1),
    vector: z.union([z.array(z.number()).nonempty(), z.record(z.string(), z.number())]),
    limit: z.number().int().min(1).default(10),
    filter: z.string().optional(),
    params: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

const AnnRequestsSchema = z.array(AnnRequestSchema).min(1, "at least one request is required");

/**
 * Per-field requests from --requests or --file, validated
 * @throws ValidationError naming the first bad entry
 */
async function annRequests(input: CommandInput): Promise<AnnRequest[]> {
  let raw: unknown;
  let source: string;
  if (exactlyOne(input, "requests", "file") === "requests") {
    source = input.nameOf("requests");
    raw = input.json("requests");
  } else {
    const file = input.requireString("file");
    source = file;
    raw = parseJson(await readTextFile(file), file);
  }

  const result = AnnRequestsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue === undefined || issue.path.length === 0 ? "" : ` at ${issue.path.join(".")}`;
    throw new ValidationError(`Invalid search requests in ${source}${where}: ${issue?.message ?? "invalid value"}`);
  }
  return result.data;
}

function rankerOf(input: CommandInput, legs: number): Ranker {
  const weights = input.list("weights");
  if (input.requireString("ranker") === "rrf") {
    if (weights !== undefined) {
      throw new ValidationError(`${input.nameOf("weights")} only applies to --ranker weighted`);
    }
    return { kind: "rrf", k: input.requireNumber("rrfK") };
  }

  if (weights === undefined) {
    return { kind: "weighted", weights: Array.from({ length: legs }, () => Number((1 / legs).toFixed(6))) };
  }
  if (weights.length !== legs) {
    throw new ValidationError(
      `${input.nameOf("weights")} has ${weights.length} values but there are ${legs} search requests`
    );
  }
  return { kind: "weighted", weights: weights.map((weight) => parseFloatValue(weight, input.nameOf("weights"), 0)) };
}

async function hybridSearchRequest(input: CommandInput): Promise<HybridSearchRequest> {
  const requests = await annRequests(input);
  const request: HybridSearchRequest = {
    collection: input.arg("collection"),
    requests,
    ranker: rankerOf(input, requests.length),
    limit: input.requireNumber("limit"),
  };
  const outputFields = input.list("outputFields");
  if (outputFields !== undefined) request.outputFields = outputFields;
  const partitions = input.list("partition");
  if (partitions !== undefined) request.partitions = partitions;
  return request;
}

function queryRequest(input: CommandInput): QueryRequest {
  const collection = input.arg("collection");
  const common = {
    collection,
    outputFields: input.list("outputFields"),
    limit: input.number("limit"),
    partitions: input.list("partition"),
  };

  if (exactlyOne(input, "filter", "ids") === "filter") {
    return { ...common, filter: input.requireString("filter") };
  }
  return { ...common, ids: input.ids("ids") ?? [] };
}

export const queryCommands: CommandSpec[] = [
  {
    group: "query",
    action: "search",
    description: "Vector similarity search",
    args: [COLLECTION_ARG],
    options: [
      { flags: "-v, --vector <json>", type: "string", required: true, description: "Query vector as a JSON array, e.g. '[0.1, 0.2]'" },
      { flags: "-l, --limit <n>", type: "int", min: 1, default: "10", description: "Maximum number of hits" },
      { flags: "-f, --filter <expr>", type: "string", description: "Filter expression, e.g. 'age > 20'" },
      OUTPUT_FIELDS_OPTION,
      { flags: "--anns-field <name>", type: "string", description: "Vector field to search" },
      { flags: "-m, --metric <type>", type: "string", choices: METRIC_TYPES, description: "Metric type override" },
      { flags: "--nprobe <n>", type: "int", min: 1, description: "Units to probe (IVF indexes)" },
      { flags: "--ef <n>", type: "int", min: 1, description: "Search breadth (HNSW indexes)" },
      PARTITIONS_OPTION,
    ],
    examples: [
      ["query", "search", "demo", "--vector", "[0.1,0.2,0.3,0.4]", "--limit", "5"],
      ["query", "search", "demo", "--vector", "[0.1,0.2,0.3,0.4]", "--filter", "id > 0", "--output-fields", "id,title", "--ef", "64"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const request = searchRequest(input);
        return async (backend) => data(await backend.search(request));
      },
    },
  },
  {
    group: "query",
    action: "hybrid-search",
    description:
      "Search several vector fields at once and fuse the rankings\n\n" +
      "Each request is {\"field\", \"vector\", \"limit\"?, \"filter\"?, \"params\"?}; sparse vectors are\n" +
      "objects mapping dimension to weight, e.g. {\"17\": 0.4}.",
    args: [COLLECTION_ARG],
    options: [
      { flags: "-r, --requests <json>", type: "json", description: "JSON array of per-field search requests" },
      { flags: "--file <path>", type: "string", description: "JSON file holding the request array" },
      { flags: "-l, --limit <n>", type: "int", min: 1, default: "10", description: "Maximum number of fused hits" },
      { flags: "--ranker <name>", type: "string", choices: ["rrf", "weighted"], default: "rrf", description: "How rankings are fused" },
      { flags: "--rrf-k <n>", type: "int", min: 1, default: "60", description: "Smoothing constant for rrf" },
      { flags: "-w, --weights <list>", type: "list", description: "Comma-separated weights, one per request (weighted ranker; default: equal)" },
      OUTPUT_FIELDS_OPTION,
      PARTITIONS_OPTION,
    ],
    examples: [
      ["query", "hybrid-search", "demo", "--requests", '[{"field":"vector","vector":[0.1,0.2,0.3,0.4],"limit":5}]', "--limit", "3"],
      [
        "query",
        "hybrid-search",
        "demo",
        "--requests",
        '[{"field":"vector","vector":[0.1,0.2,0.3,0.4]},{"field":"vector","vector":[0.4,0.3,0.2,0.1]}]',
        "--ranker",
        "weighted",
        "--weights",
        "0.7,0.3",
      ],
    ],
    handler: {
      scope: "backend",
      plan: async (input) => {
        const request = await hybridSearchRequest(input);
        return async (backend) => data(await backend.hybridSearch(request));
      },
    },
  },
  {
    group: "query",
    action: "query",
    description: "Fetch entities by filter expression or ids",
    args: [COLLECTION_ARG],
    options: [
      { flags: "-f, --filter <expr>", type: "string", description: "Filter expression, e.g. 'id in [1, 2]'" },
      { flags: "-i, --ids <ids>", type: "ids", description: "Comma-separated ids" },
      OUTPUT_FIELDS_OPTION,
      { flags: "-l, --limit <n>", type: "int", min: 1, description: "Maximum number of entities" },
      PARTITIONS_OPTION,
    ],
    examples: [
      ["query", "query", "demo", "--filter", "id > 0", "--limit", "10"],
      ["query", "query", "demo", "--ids", "1,2", "--output-fields", "id,title"],
    ],
    handler: {
      scope: "backend",
      plan: (input) => {
        const request = queryRequest(input);
        return async (backend) => data(await backend.query(request));
      },
    },
  },
  {
    group: "query",
    action: "get",
    description: "Fetch entities by primary key",
    args: [COLLECTION_ARG, { name: "ids", description: "Comma-separated ids" }],
    options: [OUTPUT_FIELDS_OPTION, PARTITIONS_OPTION],
    examples: [["query", "get", "demo", "1,2,3"]],
    handler: {
      scope: "backend",
      plan: (input) => {
        const collection = input.arg("collection");
        const ids = parseIds(input.arg("ids"), "ids");
        const outputFields = input.list("outputFields");
        const partitions = input.list("partition");
        return async (backend) => data(await backend.get({ collection, ids, outputFields, partitions }));
      },
    },
  },
];
