/**
 * VectorBackend over @zilliz/milvus2-sdk-node
 *
 * Responses are never trusted: every one is checked for a success status and
 * parsed with zod before anything is read from it. Non-success statuses become
 * BackendFault(<error_code>, <reason>).
 */

import { MilvusClient } from "@zilliz/milvus2-sdk-node";
import { z } from "zod";
import { BackendFault, ConnectionError, ValidationError } from "../errors.js";
import { safeParseJson } from "../format.js";
import { vectorIndexTargets, type FieldSpec, type FieldType } from "../schema-dsl.js";
import type { ConnectionConfig, Row } from "../types.js";
import type {
  CompactionKind,
  CompactionPlan,
  CompactionProgress,
  CreateCollectionRequest,
  CreateIndexRequest,
  DeleteRequest,
  EntityId,
  GetRequest,
  HybridSearchRequest,
  MutationSummary,
  QueryRequest,
  Ranker,
  ScanRequest,
  SearchHit,
  SearchRequest,
  VectorBackend,
  WriteRowsRequest,
} from "./types.js";

/**
 * The slice of MilvusClient this adapter calls. Parameters are declared as
 * supertypes of the SDK's request types; results are parsed, so they stay unknown.
 */
export interface MilvusPort {
  showCollections(): Promise<unknown>;
  describeCollection(req: { collection_name: string }): Promise<unknown>;
  createCollection(req: {
    collection_name: string;
    dimension?: unknown;
    metric_type?: unknown;
    auto_id?: unknown;
    primary_field_name?: unknown;
    vector_field_name?: unknown;
    fields?: unknown;
    enable_dynamic_field?: unknown;
  }): Promise<unknown>;
  dropCollection(req: { collection_name: string }): Promise<unknown>;
  hasCollection(req: { collection_name: string }): Promise<unknown>;
  renameCollection(req: {
    collection_name: string;
    new_collection_name: string;
    new_db_name?: unknown;
  }): Promise<unknown>;
  getCollectionStatistics(req: { collection_name: string }): Promise<unknown>;
  describeIndex(req: { collection_name: string; index_name?: unknown }): Promise<unknown>;
  createIndex(req: {
    collection_name: string;
    field_name: string;
    index_type: string;
    metric_type?: string;
    index_name?: string;
    params?: Record<string, string | number>;
  }): Promise<unknown>;
  dropIndex(req: { collection_name: string; index_name?: unknown }): Promise<unknown>;
  showPartitions(req: { collection_name: string }): Promise<unknown>;
  createPartition(req: { collection_name: string; partition_name: string }): Promise<unknown>;
  dropPartition(req: { collection_name: string; partition_name: string }): Promise<unknown>;
  hasPartition(req: { collection_name: string; partition_name: string }): Promise<unknown>;
  listDatabases(): Promise<unknown>;
  createDatabase(req: { db_name: string }): Promise<unknown>;
  dropDatabase(req: { db_name: string }): Promise<unknown>;
  insert(req: { collection_name: string; data?: unknown; partition_name?: unknown }): Promise<unknown>;
  upsert(req: { collection_name: string; data?: unknown; partition_name?: unknown }): Promise<unknown>;
  delete(req: {
    collection_name: string;
    ids?: unknown;
    filter?: unknown;
    partition_name?: unknown;
  }): Promise<unknown>;
  search(req: {
    collection_name: string;
    data?: unknown;
    limit?: unknown;
    output_fields?: unknown;
    filter?: unknown;
    anns_field?: unknown;
    metric_type?: unknown;
    params?: unknown;
    partition_names?: unknown;
  }): Promise<unknown>;
  query(req: {
    collection_name: string;
    filter?: unknown;
    output_fields?: unknown;
    limit?: unknown;
    partition_names?: unknown;
  }): Promise<unknown>;
  get(req: {
    collection_name: string;
    ids?: unknown;
    output_fields?: unknown;
    partition_names?: unknown;
  }): Promise<unknown>;
  hybridSearch(req: {
    collection_name: string;
    data?: unknown;
    rerank?: unknown;
    limit?: unknown;
    output_fields?: unknown;
    partition_names?: unknown;
  }): Promise<unknown>;
  queryIterator(req: {
    collection_name: string;
    batchSize: number;
    filter?: unknown;
    output_fields?: unknown;
    limit?: unknown;
    partition_names?: unknown;
  }): Promise<unknown>;
  compact(req: { collection_name: string; is_clustering?: unknown; is_l0?: unknown }): Promise<unknown>;
  getCompactionState(req: { compactionID: string }): Promise<unknown>;
  getCompactionStateWithPlans(req: { compactionID: string }): Promise<unknown>;
  loadCollection(req: { collection_name: string }): Promise<unknown>;
  releaseCollection(req: { collection_name: string }): Promise<unknown>;
  getLoadState(req: { collection_name: string }): Promise<unknown>;
  listAliases(req: { collection_name: string }): Promise<unknown>;
  createAlias(req: { collection_name: string; alias: string }): Promise<unknown>;
  dropAlias(req: { alias: string }): Promise<unknown>;
  listUsers(): Promise<unknown>;
  createUser(req: { username: string; password: string }): Promise<unknown>;
  deleteUser(req: { username: string }): Promise<unknown>;
  listRoles(): Promise<unknown>;
  createRole(req: { roleName: string }): Promise<unknown>;
  dropRole(req: { roleName: string }): Promise<unknown>;
  addUserToRole(req: { username: string; roleName: string }): Promise<unknown>;
  removeUserFromRole(req: { username: string; roleName: string }): Promise<unknown>;
  getVersion(): Promise<unknown>;
  closeConnection(): unknown;
}

// --- Response validation ---

const StatusSchema = z
  .object({
    error_code: z.union([z.string(), z.number()]).optional(),
    code: z.number().optional(),
    reason: z.string().optional(),
  })
  .passthrough();

const EnvelopeSchema = z.object({ status: StatusSchema.optional() }).passthrough();

const KeyValueSchema = z.object({ key: z.string(), value: z.string() });

const IdsSchema = z
  .object({
    int_id: z.object({ data: z.array(z.union([z.number(), z.string()])) }).optional(),
    str_id: z.object({ data: z.array(z.string()) }).optional(),
  })
  .passthrough();

const MutationResultSchema = z
  .object({
    IDs: IdsSchema.optional(),
    insert_cnt: z.union([z.string(), z.number()]).optional(),
    upsert_cnt: z.union([z.string(), z.number()]).optional(),
    delete_cnt: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

const RowSchema = z.record(z.string(), z.unknown());

const FieldSchema = z
  .object({
    name: z.string(),
    data_type: z.union([z.string(), z.number()]).optional(),
    is_primary_key: z.boolean().optional(),
    autoID: z.boolean().optional(),
    nullable: z.boolean().optional(),
    element_type: z.union([z.string(), z.number()]).optional(),
    type_params: z.array(KeyValueSchema).optional(),
    description: z.string().optional(),
  })
  .passthrough();

const DescribeCollectionSchema = z
  .object({
    collection_name: z.string().optional(),
    collectionID: z.union([z.string(), z.number()]).optional(),
    schema: z
      .object({
        description: z.string().optional(),
        enable_dynamic_field: z.boolean().optional(),
        fields: z.array(FieldSchema).default([]),
      })
      .passthrough()
      .optional(),
    aliases: z.array(z.string()).optional(),
    consistency_level: z.union([z.string(), z.number()]).optional(),
    num_partitions: z.union([z.string(), z.number()]).optional(),
    shards_num: z.number().optional(),
  })
  .passthrough();

const IndexDescriptionSchema = z
  .object({
    index_name: z.string(),
    field_name: z.string().optional(),
    params: z.array(KeyValueSchema).default([]),
    state: z.union([z.string(), z.number()]).optional(),
    indexed_rows: z.union([z.string(), z.number()]).optional(),
    total_rows: z.union([z.string(), z.number()]).optional(),
    pending_index_rows: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

const SearchResultsSchema = z
  .object({
    results: z.union([z.array(RowSchema), z.array(z.array(RowSchema))]).default([]),
  })
  .passthrough();

const CountSchema = z.union([z.string(), z.number()]).optional();

const IdValueSchema = z.union([z.string(), z.number()]);

function isSuccess(status: z.infer<typeof StatusSchema>): boolean {
  const { error_code: errorCode, code } = status;
  if (errorCode === undefined) {
    return code === undefined || code === 0;
  }
  return errorCode === "Success" || errorCode === 0;
}

/**
 * Throw a BackendFault unless the response (or its `status` member) reports success
 */
export function ensureSuccess(response: unknown, operation: string): Record<string, unknown> {
  const parsed = EnvelopeSchema.safeParse(response);
  if (!parsed.success) {
    // Some calls resolve to a bare boolean or nothing at all
    return {};
  }

  const body = parsed.data;
  const bare = StatusSchema.safeParse(body);
  const bareStatus =
    bare.success && (bare.data.error_code !== undefined || bare.data.code !== undefined) ? bare.data : undefined;
  const status = body.status ?? bareStatus;

  if (status && !isSuccess(status)) {
    const category = status.error_code === undefined ? String(status.code) : String(status.error_code);
    throw new BackendFault(category, status.reason || `${operation} failed`);
  }
  return body;
}

/**
 * Check the status, then parse the response body
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  response: unknown,
  operation: string
): z.infer<T> {
  const body = ensureSuccess(response, operation);
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new BackendFault(
      "UnexpectedResponse",
      `Unexpected response from Milvus for ${operation}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim()
    );
  }
  return result.data;
}

// --- Value helpers ---

function toCount(value: string | number | undefined): number {
  if (value === undefined) return 0;
  const n = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isFinite(n) ? n : 0;
}

/**
 * "123" → 123 where that is lossless; other values unchanged
 */
function numericOrRaw(value: string): string | number {
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const n = Number(value);
    if (Number.isSafeInteger(n) || !Number.isInteger(n)) {
      return n;
    }
  }
  return value;
}

function idValue(value: string | number): EntityId {
  return typeof value === "number" ? value : numericOrRaw(value);
}

function keyValuesToRecord(pairs: ReadonlyArray<{ key: string; value: string }>): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const { key, value } of pairs) {
    out[key] = numericOrRaw(value);
  }
  return out;
}

function idsOf(ids: z.infer<typeof IdsSchema> | undefined): EntityId[] {
  if (!ids) return [];
  return ids.int_id?.data ?? ids.str_id?.data ?? [];
}

/**
 * Index params as the SDK forwards them: scalars, everything else JSON-encoded
 */
function flattenParams(params: Record<string, unknown>): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(params)) {
    out[key] = typeof value === "number" || typeof value === "string" ? value : JSON.stringify(value);
  }
  return out;
}

/**
 * Field types as the SDK's DataType key names
 */
const DATA_TYPE_NAMES: Readonly<Record<FieldType, string>> = {
  bool: "Bool",
  int8: "Int8",
  int16: "Int16",
  int32: "Int32",
  int64: "Int64",
  float: "Float",
  double: "Double",
  varchar: "VarChar",
  json: "JSON",
  array: "Array",
  float_vector: "FloatVector",
  binary_vector: "BinaryVector",
  float16_vector: "Float16Vector",
  bfloat16_vector: "BFloat16Vector",
  sparse_vector: "SparseFloatVector",
};

export function toFieldSchema(spec: FieldSpec): Record<string, unknown> {
  const field: Record<string, unknown> = {
    name: spec.name,
    data_type: DATA_TYPE_NAMES[spec.type],
    is_primary_key: spec.isPrimary,
  };
  if (spec.autoId) field.autoID = true;
  if (spec.nullable) field.nullable = true;
  if (spec.maxLength !== undefined) field.max_length = spec.maxLength;
  if (spec.dim !== undefined) field.dim = spec.dim;
  if (spec.elementType !== undefined) field.element_type = DATA_TYPE_NAMES[spec.elementType];
  if (spec.maxCapacity !== undefined) field.max_capacity = spec.maxCapacity;
  return field;
}

function flattenHit(hit: Record<string, unknown>): SearchHit {
  const { id, score, distance, entity, ...rest } = hit;
  const entityFields = RowSchema.safeParse(entity);
  return {
    ...rest,
    ...(entityFields.success ? entityFields.data : {}),
    id: typeof id === "number" || typeof id === "string" ? id : String(id),
    distance: typeof score === "number" ? score : typeof distance === "number" ? distance : Number.NaN,
  };
}

/**
 * Hits for the first query vector: results come back flat, or nested once per vector
 */
function hitsOf(res: z.infer<typeof SearchResultsSchema>): SearchHit[] {
  const results: unknown[] = res.results;
  const first = results[0];
  const hits: unknown[] = Array.isArray(first) ? first : results;
  return hits.flatMap((hit) => {
    const row = RowSchema.safeParse(hit);
    return row.success ? [flattenHit(row.data)] : [];
  });
}

/**
 * Ranker in the SDK's rerank shape
 */
function toRerank(ranker: Ranker): { strategy: string; params: Record<string, unknown> } {
  return ranker.kind === "rrf"
    ? { strategy: "rrf", params: { k: ranker.k } }
    : { strategy: "weighted", params: { weights: ranker.weights } };
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.asyncIterator in value &&
    typeof value[Symbol.asyncIterator] === "function"
  );
}

// --- Adapter ---

export class MilvusBackend implements VectorBackend {
  constructor(private readonly client: MilvusPort) {}

  async listCollections(): Promise<string[]> {
    const res = parseResponse(
      z
        .object({
          collection_names: z.array(z.string()).optional(),
          data: z.array(z.object({ name: z.string() }).passthrough()).optional(),
        })
        .passthrough(),
      await this.client.showCollections(),
      "list collections"
    );
    return res.collection_names ?? res.data?.map((entry) => entry.name) ?? [];
  }

  async describeCollection(name: string): Promise<Record<string, unknown>> {
    const res = parseResponse(
      DescribeCollectionSchema,
      await this.client.describeCollection({ collection_name: name }),
      `describe collection '${name}'`
    );

    const fields = (res.schema?.fields ?? []).map((field) => {
      const out: Record<string, unknown> = {
        name: field.name,
        type: field.data_type,
        primary: field.is_primary_key ?? false,
      };
      if (field.autoID) out.auto_id = true;
      if (field.nullable) out.nullable = true;
      if (field.element_type !== undefined && field.element_type !== "None" && field.element_type !== 0) {
        out.element_type = field.element_type;
      }
      if (field.type_params && field.type_params.length > 0) {
        out.params = keyValuesToRecord(field.type_params);
      }
      return out;
    });

    return {
      name: res.collection_name ?? name,
      id: res.collectionID,
      description: res.schema?.description ?? "",
      dynamic_field: res.schema?.enable_dynamic_field ?? false,
      fields,
      aliases: res.aliases ?? [],
      consistency_level: res.consistency_level,
      num_partitions: res.num_partitions === undefined ? undefined : toCount(res.num_partitions),
      shards_num: res.shards_num,
    };
  }

  async createCollection(request: CreateCollectionRequest): Promise<void> {
    if (request.mode === "quick") {
      ensureSuccess(
        await this.client.createCollection({
          collection_name: request.name,
          dimension: request.dimension,
          metric_type: request.metric,
          auto_id: request.autoId,
          primary_field_name: request.primaryField,
          vector_field_name: request.vectorField,
        }),
        `create collection '${request.name}'`
      );
      return;
    }

    ensureSuccess(
      await this.client.createCollection({
        collection_name: request.name,
        fields: request.fields.map(toFieldSchema),
        enable_dynamic_field: true,
      }),
      `create collection '${request.name}'`
    );

    for (const target of vectorIndexTargets(request.fields)) {
      ensureSuccess(
        await this.client.createIndex({
          collection_name: request.name,
          field_name: target.field,
          index_type: "AUTOINDEX",
          metric_type: target.metric,
        }),
        `create index on '${request.name}.${target.field}'`
      );
    }
  }

  async dropCollection(name: string): Promise<void> {
    ensureSuccess(await this.client.dropCollection({ collection_name: name }), `drop collection '${name}'`);
  }

  async hasCollection(name: string): Promise<boolean> {
    const res = parseResponse(
      z.object({ value: z.boolean() }).passthrough(),
      await this.client.hasCollection({ collection_name: name }),
      `has collection '${name}'`
    );
    return res.value;
  }

  async renameCollection(oldName: string, newName: string, targetDb?: string): Promise<void> {
    const request = {
      collection_name: oldName,
      new_collection_name: newName,
      ...(targetDb ? { new_db_name: targetDb } : {}),
    };
    ensureSuccess(await this.client.renameCollection(request), `rename collection '${oldName}'`);
  }

  async getCollectionStats(name: string): Promise<Record<string, unknown>> {
    const res = parseResponse(
      z.object({ stats: z.array(KeyValueSchema).default([]) }).passthrough(),
      await this.client.getCollectionStatistics({ collection_name: name }),
      `collection stats '${name}'`
    );
    return keyValuesToRecord(res.stats);
  }

  async listIndexes(collection: string): Promise<string[]> {
    try {
      const descriptions = await this.describeIndex(collection);
      return descriptions.flatMap((description) =>
        typeof description.index_name === "string" ? [description.index_name] : []
      );
    } catch (err) {
      // A collection without indexes reports IndexNotExist
      if (err instanceof BackendFault && err.category === "IndexNotExist") {
        return [];
      }
      throw err;
    }
  }

  async describeIndex(collection: string, indexName?: string): Promise<Array<Record<string, unknown>>> {
    const res = parseResponse(
      z.object({ index_descriptions: z.array(IndexDescriptionSchema).default([]) }).passthrough(),
      await this.client.describeIndex(
        indexName === undefined
          ? { collection_name: collection }
          : { collection_name: collection, index_name: indexName }
      ),
      `describe index on '${collection}'`
    );

    return res.index_descriptions.map((description) => {
      const { index_type: indexType, metric_type: metricType, params, ...rest } = keyValuesToRecord(
        description.params
      );
      const extra = typeof params === "string" ? safeJsonObject(params) : undefined;
      return {
        index_name: description.index_name,
        field_name: description.field_name,
        index_type: indexType,
        metric_type: metricType,
        state: description.state,
        indexed_rows: toCount(description.indexed_rows),
        total_rows: toCount(description.total_rows),
        pending_index_rows: toCount(description.pending_index_rows),
        params: { ...rest, ...extra },
      };
    });
  }

  async createIndex(request: CreateIndexRequest): Promise<void> {
    ensureSuccess(
      await this.client.createIndex({
        collection_name: request.collection,
        field_name: request.field,
        index_type: request.indexType,
        ...(request.metric ? { metric_type: request.metric } : {}),
        ...(request.indexName ? { index_name: request.indexName } : {}),
        ...(request.params ? { params: flattenParams(request.params) } : {}),
      }),
      `create index on '${request.collection}.${request.field}'`
    );
  }

  async dropIndex(collection: string, indexName: string): Promise<void> {
    ensureSuccess(
      await this.client.dropIndex({ collection_name: collection, index_name: indexName }),
      `drop index '${indexName}'`
    );
  }

  async listPartitions(collection: string): Promise<string[]> {
    const res = parseResponse(
      z.object({ partition_names: z.array(z.string()).default([]) }).passthrough(),
      await this.client.showPartitions({ collection_name: collection }),
      `list partitions of '${collection}'`
    );
    return res.partition_names;
  }

  async createPartition(collection: string, partition: string): Promise<void> {
    ensureSuccess(
      await this.client.createPartition({ collection_name: collection, partition_name: partition }),
      `create partition '${partition}'`
    );
  }

  async dropPartition(collection: string, partition: string): Promise<void> {
    ensureSuccess(
      await this.client.dropPartition({ collection_name: collection, partition_name: partition }),
      `drop partition '${partition}'`
    );
  }

  async hasPartition(collection: string, partition: string): Promise<boolean> {
    const res = parseResponse(
      z.object({ value: z.boolean() }).passthrough(),
      await this.client.hasPartition({ collection_name: collection, partition_name: partition }),
      `has partition '${partition}'`
    );
    return res.value;
  }

  async listDatabases(): Promise<string[]> {
    const res = parseResponse(
      z.object({ db_names: z.array(z.string()).default([]) }).passthrough(),
      await this.client.listDatabases(),
      "list databases"
    );
    return res.db_names;
  }

  async createDatabase(name: string): Promise<void> {
    ensureSuccess(await this.client.createDatabase({ db_name: name }), `create database '${name}'`);
  }

  async dropDatabase(name: string): Promise<void> {
    ensureSuccess(await this.client.dropDatabase({ db_name: name }), `drop database '${name}'`);
  }

  async insert(request: WriteRowsRequest): Promise<MutationSummary> {
    const res = parseResponse(
      MutationResultSchema,
      await this.client.insert({
        collection_name: request.collection,
        data: request.rows,
        ...(request.partition ? { partition_name: request.partition } : {}),
      }),
      `insert into '${request.collection}'`
    );
    return { count: toCount(res.insert_cnt), ids: idsOf(res.IDs) };
  }

  async upsert(request: WriteRowsRequest): Promise<MutationSummary> {
    const res = parseResponse(
      MutationResultSchema,
      await this.client.upsert({
        collection_name: request.collection,
        data: request.rows,
        ...(request.partition ? { partition_name: request.partition } : {}),
      }),
      `upsert into '${request.collection}'`
    );
    return { count: toCount(res.upsert_cnt), ids: idsOf(res.IDs) };
  }

  async delete(request: DeleteRequest): Promise<{ count: number }> {
    const target =
      "ids" in request ? { ids: request.ids } : { filter: request.filter };
    const res = parseResponse(
      MutationResultSchema,
      await this.client.delete({
        collection_name: request.collection,
        ...target,
        ...(request.partition ? { partition_name: request.partition } : {}),
      }),
      `delete from '${request.collection}'`
    );
    return { count: toCount(res.delete_cnt) };
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    const res = parseResponse(
      SearchResultsSchema,
      await this.client.search({
        collection_name: request.collection,
        data: [request.vector],
        limit: request.limit,
        output_fields: request.outputFields ?? ["*"],
        ...(request.filter ? { filter: request.filter } : {}),
        ...(request.annsField ? { anns_field: request.annsField } : {}),
        ...(request.metric ? { metric_type: request.metric } : {}),
        ...(request.params ? { params: request.params } : {}),
        ...(request.partitions ? { partition_names: request.partitions } : {}),
      }),
      `search '${request.collection}'`
    );
    return hitsOf(res);
  }

  async hybridSearch(request: HybridSearchRequest): Promise<SearchHit[]> {
    const res = parseResponse(
      SearchResultsSchema,
      await this.client.hybridSearch({
        collection_name: request.collection,
        data: request.requests.map((leg) => ({
          data: leg.vector,
          anns_field: leg.field,
          limit: leg.limit,
          ...(leg.filter ? { expr: leg.filter } : {}),
          ...(leg.params ? { params: leg.params } : {}),
        })),
        rerank: toRerank(request.ranker),
        limit: request.limit,
        output_fields: request.outputFields ?? ["*"],
        ...(request.partitions ? { partition_names: request.partitions } : {}),
      }),
      `hybrid search '${request.collection}'`
    );
    return hitsOf(res);
  }

  async *scan(request: ScanRequest): AsyncIterable<Row[]> {
    const operation = `scan '${request.collection}'`;
    const iterator = await this.client.queryIterator({
      collection_name: request.collection,
      batchSize: request.batchSize,
      output_fields: request.outputFields ?? ["*"],
      ...(request.filter ? { filter: request.filter } : {}),
      ...(request.limit !== undefined ? { limit: request.limit } : {}),
      ...(request.partitions ? { partition_names: request.partitions } : {}),
    });
    if (!isAsyncIterable(iterator)) {
      throw new BackendFault("UnexpectedResponse", `Unexpected response from Milvus for ${operation}: not an iterator`);
    }

    for await (const batch of iterator) {
      const rows = z.array(RowSchema).safeParse(batch);
      if (!rows.success) {
        throw new BackendFault("UnexpectedResponse", `Unexpected response from Milvus for ${operation}: batch is not a row list`);
      }
      if (rows.data.length > 0) {
        yield rows.data;
      }
    }
  }

  async compact(collection: string, kind: CompactionKind): Promise<string> {
    const res = parseResponse(
      z.object({ compactionID: IdValueSchema }).passthrough(),
      await this.client.compact({
        collection_name: collection,
        ...(kind === "clustering" ? { is_clustering: true } : {}),
        ...(kind === "l0" ? { is_l0: true } : {}),
      }),
      `compact '${collection}'`
    );
    return String(res.compactionID);
  }

  async getCompactionState(jobId: string): Promise<CompactionProgress> {
    const res = parseResponse(
      z
        .object({
          state: z.union([z.string(), z.number()]),
          executingPlanNo: CountSchema,
          completedPlanNo: CountSchema,
          failedPlanNo: CountSchema,
          timeoutPlanNo: CountSchema,
        })
        .passthrough(),
      await this.client.getCompactionState({ compactionID: jobId }),
      `compaction state of job ${jobId}`
    );
    return {
      state: String(res.state),
      executingPlans: toCount(res.executingPlanNo),
      completedPlans: toCount(res.completedPlanNo),
      failedPlans: toCount(res.failedPlanNo),
      timeoutPlans: toCount(res.timeoutPlanNo),
    };
  }

  async getCompactionPlans(jobId: string): Promise<{ state: string; plans: CompactionPlan[] }> {
    const res = parseResponse(
      z
        .object({
          state: z.union([z.string(), z.number()]),
          mergeInfos: z
            .array(z.object({ sources: z.array(IdValueSchema).default([]), target: IdValueSchema }).passthrough())
            .default([]),
        })
        .passthrough(),
      await this.client.getCompactionStateWithPlans({ compactionID: jobId }),
      `compaction plans of job ${jobId}`
    );
    return {
      state: String(res.state),
      plans: res.mergeInfos.map((info) => ({ sources: info.sources.map(idValue), target: idValue(info.target) })),
    };
  }

  async query(request: QueryRequest): Promise<Row[]> {
    // The SDK's get() turns ids into a primary-key filter
    const rows =
      "ids" in request
        ? await this.get(request)
        : parseResponse(
            z.object({ data: z.array(RowSchema).default([]) }).passthrough(),
            await this.client.query({
              collection_name: request.collection,
              filter: request.filter,
              output_fields: request.outputFields ?? ["*"],
              ...(request.limit !== undefined ? { limit: request.limit } : {}),
              ...(request.partitions ? { partition_names: request.partitions } : {}),
            }),
            `query '${request.collection}'`
          ).data;
    return request.limit === undefined ? rows : rows.slice(0, request.limit);
  }

  async get(request: GetRequest): Promise<Row[]> {
    const res = parseResponse(
      z.object({ data: z.array(RowSchema).default([]) }).passthrough(),
      await this.client.get({
        collection_name: request.collection,
        ids: request.ids,
        output_fields: request.outputFields ?? ["*"],
        ...(request.partitions ? { partition_names: request.partitions } : {}),
      }),
      `get from '${request.collection}'`
    );
    return res.data;
  }

  async loadCollection(name: string): Promise<void> {
    ensureSuccess(await this.client.loadCollection({ collection_name: name }), `load collection '${name}'`);
  }

  async releaseCollection(name: string): Promise<void> {
    ensureSuccess(
      await this.client.releaseCollection({ collection_name: name }),
      `release collection '${name}'`
    );
  }

  async getLoadState(name: string): Promise<string> {
    const res = parseResponse(
      z.object({ state: z.union([z.string(), z.number()]) }).passthrough(),
      await this.client.getLoadState({ collection_name: name }),
      `load state of '${name}'`
    );
    return String(res.state);
  }

  async listAliases(collection: string): Promise<string[]> {
    const res = parseResponse(
      z.object({ aliases: z.array(z.string()).default([]) }).passthrough(),
      await this.client.listAliases({ collection_name: collection }),
      `list aliases of '${collection}'`
    );
    return res.aliases;
  }

  async createAlias(collection: string, alias: string): Promise<void> {
    ensureSuccess(
      await this.client.createAlias({ collection_name: collection, alias }),
      `create alias '${alias}'`
    );
  }

  async dropAlias(alias: string): Promise<void> {
    ensureSuccess(await this.client.dropAlias({ alias }), `drop alias '${alias}'`);
  }

  async listUsers(): Promise<string[]> {
    const res = parseResponse(
      z.object({ usernames: z.array(z.string()).default([]) }).passthrough(),
      await this.client.listUsers(),
      "list users"
    );
    return res.usernames;
  }

  async createUser(username: string, password: string): Promise<void> {
    ensureSuccess(await this.client.createUser({ username, password }), `create user '${username}'`);
  }

  async dropUser(username: string): Promise<void> {
    ensureSuccess(await this.client.deleteUser({ username }), `drop user '${username}'`);
  }

  async listRoles(): Promise<string[]> {
    const res = parseResponse(
      z
        .object({
          results: z.array(z.object({ role: z.object({ name: z.string() }).passthrough() }).passthrough()).default([]),
        })
        .passthrough(),
      await this.client.listRoles(),
      "list roles"
    );
    return res.results.map((result) => result.role.name);
  }

  async createRole(name: string): Promise<void> {
    ensureSuccess(await this.client.createRole({ roleName: name }), `create role '${name}'`);
  }

  async dropRole(name: string): Promise<void> {
    ensureSuccess(await this.client.dropRole({ roleName: name }), `drop role '${name}'`);
  }

  async grantRole(role: string, username: string): Promise<void> {
    ensureSuccess(
      await this.client.addUserToRole({ username, roleName: role }),
      `grant role '${role}' to '${username}'`
    );
  }

  async revokeRole(role: string, username: string): Promise<void> {
    ensureSuccess(
      await this.client.removeUserFromRole({ username, roleName: role }),
      `revoke role '${role}' from '${username}'`
    );
  }

  async serverVersion(): Promise<string> {
    const res = parseResponse(
      z.object({ version: z.string() }).passthrough(),
      await this.client.getVersion(),
      "server version"
    );
    return res.version;
  }

  async close(): Promise<void> {
    await this.client.closeConnection();
  }
}

function safeJsonObject(text: string): Record<string, unknown> | undefined {
  const parsed = safeParseJson(text);
  if (!parsed.success) {
    return undefined;
  }
  const record = RowSchema.safeParse(parsed.data);
  return record.success ? record.data : undefined;
}

/**
 * Open a client for one invocation
 * @throws ValidationError for a malformed uri, ConnectionError if the client cannot be created
 */
export async function connectMilvus(config: ConnectionConfig): Promise<VectorBackend> {
  let address: URL;
  try {
    address = new URL(config.uri.includes("://") ? config.uri : `http://${config.uri}`);
  } catch (err) {
    throw new ValidationError(`Invalid Milvus URI '${config.uri}'`, { cause: err });
  }

  try {
    const client: MilvusPort = new MilvusClient({
      address: address.href.replace(/\/$/, ""),
      ...(config.token ? { token: config.token } : {}),
      ...(config.database ? { database: config.database } : {}),
    });
    return new MilvusBackend(client);
  } catch (err) {
    throw new ConnectionError(
      `Cannot connect to ${config.uri}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}
