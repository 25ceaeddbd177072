/**
 * Narrow client contract the CLI dispatches against
 *
 * Implementations raise BackendFault (or any Error) on failure; the dispatcher
 * translates faults through classifyFault. Results are plain JSON-ready values.
 */

import type { FieldSpec, MetricType } from "../schema-dsl.js";
import type { ConnectionConfig, Row } from "../types.js";

export type EntityId = string | number;

/**
 * Collection creation: either a quick id + vector layout, or a full field list
 */
export type CreateCollectionRequest =
  | {
      mode: "quick";
      name: string;
      dimension: number;
      metric: MetricType;
      autoId: boolean;
      primaryField: string;
      vectorField: string;
    }
  | {
      mode: "schema";
      name: string;
      fields: FieldSpec[];
    };

export interface CreateIndexRequest {
  collection: string;
  field: string;
  indexType: string;
  metric?: MetricType;
  indexName?: string;
  params?: Record<string, unknown>;
}

export interface WriteRowsRequest {
  collection: string;
  rows: Row[];
  partition?: string;
}

/**
 * Rows affected by an insert or upsert
 */
export interface MutationSummary {
  count: number;
  ids: EntityId[];
}

export type DeleteRequest =
  | { collection: string; ids: EntityId[]; partition?: string }
  | { collection: string; filter: string; partition?: string };

export interface SearchRequest {
  collection: string;
  vector: number[];
  limit: number;
  filter?: string;
  outputFields?: string[];
  annsField?: string;
  partitions?: string[];
  metric?: MetricType;
  /** Index-specific search params such as nprobe or ef */
  params?: Record<string, number>;
}

/**
 * One search hit, entity fields flattened beside id and distance
 */
export type SearchHit = Row & { id: EntityId; distance: number };

export type QueryRequest =
  | { collection: string; filter: string; outputFields?: string[]; limit?: number; partitions?: string[] }
  | { collection: string; ids: EntityId[]; outputFields?: string[]; limit?: number; partitions?: string[] };

/**
 * A dense vector, or a sparse one as {index: value}
 */
export type SearchVector = number[] | Record<string, number>;

/**
 * One leg of a hybrid search
 */
export interface AnnRequest {
  field: string;
  vector: SearchVector;
  limit: number;
  filter?: string;
  params?: Record<string, unknown>;
}

export type Ranker = { kind: "rrf"; k: number } | { kind: "weighted"; weights: number[] };

export interface HybridSearchRequest {
  collection: string;
  requests: AnnRequest[];
  ranker: Ranker;
  limit: number;
  outputFields?: string[];
  partitions?: string[];
}

/**
 * Batched read of a whole collection, or the part a filter selects
 */
export interface ScanRequest {
  collection: string;
  batchSize: number;
  filter?: string;
  outputFields?: string[];
  partitions?: string[];
  /** Stop after this many rows */
  limit?: number;
}

export type CompactionKind = "default" | "clustering" | "l0";

export interface CompactionProgress {
  /** "Executing", "Completed" or "UndefiedState", as the server spells them */
  state: string;
  executingPlans: number;
  completedPlans: number;
  failedPlans: number;
  timeoutPlans: number;
}

export interface CompactionPlan {
  sources: EntityId[];
  target: EntityId;
}

export interface GetRequest {
  collection: string;
  ids: EntityId[];
  outputFields?: string[];
  partitions?: string[];
}

export interface VectorBackend {
  // Collections
  listCollections(): Promise<string[]>;
  describeCollection(name: string): Promise<Record<string, unknown>>;
  createCollection(request: CreateCollectionRequest): Promise<void>;
  dropCollection(name: string): Promise<void>;
  hasCollection(name: string): Promise<boolean>;
  renameCollection(oldName: string, newName: string, targetDb?: string): Promise<void>;
  getCollectionStats(name: string): Promise<Record<string, unknown>>;

  // Indexes
  listIndexes(collection: string): Promise<string[]>;
  describeIndex(collection: string, indexName?: string): Promise<Array<Record<string, unknown>>>;
  createIndex(request: CreateIndexRequest): Promise<void>;
  dropIndex(collection: string, indexName: string): Promise<void>;

  // Partitions
  listPartitions(collection: string): Promise<string[]>;
  createPartition(collection: string, partition: string): Promise<void>;
  dropPartition(collection: string, partition: string): Promise<void>;
  hasPartition(collection: string, partition: string): Promise<boolean>;

  // Databases
  listDatabases(): Promise<string[]>;
  createDatabase(name: string): Promise<void>;
  dropDatabase(name: string): Promise<void>;

  // Data
  insert(request: WriteRowsRequest): Promise<MutationSummary>;
  upsert(request: WriteRowsRequest): Promise<MutationSummary>;
  delete(request: DeleteRequest): Promise<{ count: number }>;
  search(request: SearchRequest): Promise<SearchHit[]>;
  query(request: QueryRequest): Promise<Row[]>;
  get(request: GetRequest): Promise<Row[]>;
  hybridSearch(request: HybridSearchRequest): Promise<SearchHit[]>;
  scan(request: ScanRequest): AsyncIterable<Row[]>;

  // Compaction
  /** Starts a job and returns its id */
  compact(collection: string, kind: CompactionKind): Promise<string>;
  getCompactionState(jobId: string): Promise<CompactionProgress>;
  getCompactionPlans(jobId: string): Promise<{ state: string; plans: CompactionPlan[] }>;

  // Load state
  loadCollection(name: string): Promise<void>;
  releaseCollection(name: string): Promise<void>;
  getLoadState(name: string): Promise<string>;

  // Aliases
  listAliases(collection: string): Promise<string[]>;
  createAlias(collection: string, alias: string): Promise<void>;
  dropAlias(alias: string): Promise<void>;

  // Users and roles
  listUsers(): Promise<string[]>;
  createUser(username: string, password: string): Promise<void>;
  dropUser(username: string): Promise<void>;
  listRoles(): Promise<string[]>;
  createRole(name: string): Promise<void>;
  dropRole(name: string): Promise<void>;
  grantRole(role: string, username: string): Promise<void>;
  revokeRole(role: string, username: string): Promise<void>;

  // Server
  serverVersion(): Promise<string>;

  close(): Promise<void>;
}

/**
 * Opens one client handle per invocation
 */
export type BackendFactory = (connection: ConnectionConfig) => Promise<VectorBackend>;
