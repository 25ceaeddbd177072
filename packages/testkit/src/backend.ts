/**
 * In-process stand-in for a Milvus deployment
 *
 * Keeps collections, partitions, indexes, aliases, databases, users and roles
 * in memory and records every call. Faults are raised the way the Milvus
 * adapter raises them (BackendFault with a Milvus status name), so they go
 * through the same translation table as real ones.
 *
 * Filter expressions are recorded but not evaluated: they match every row.
 * Compaction jobs report "Executing" for `compactionSteps` polls, then
 * "Completed".
 */

import {
  BackendFault,
  vectorIndexTargets,
  type AnnRequest,
  type BackendFactory,
  type CompactionKind,
  type CompactionPlan,
  type CompactionProgress,
  type ConnectionConfig,
  type CreateCollectionRequest,
  type CreateIndexRequest,
  type DeleteRequest,
  type EntityId,
  type GetRequest,
  type HybridSearchRequest,
  type MutationSummary,
  type QueryRequest,
  type Row,
  type ScanRequest,
  type SearchHit,
  type SearchRequest,
  type VectorBackend,
  type WriteRowsRequest,
} from "@yami/core";

export type BackendMethod = Exclude<keyof VectorBackend, "close">;

export interface FakeCall {
  method: keyof VectorBackend;
  args: unknown[];
}

export interface FakeIndex {
  name: string;
  field: string;
  indexType: string;
  metric?: string;
  params: Record<string, unknown>;
}

export interface FakeField {
  name: string;
  type: string;
  isPrimary: boolean;
  autoId: boolean;
  dim?: number;
}

export interface FakeCollection {
  name: string;
  fields: FakeField[];
  rows: Row[];
  partitions: Set<string>;
  indexes: Map<string, FakeIndex>;
  loaded: boolean;
}

export interface FakeCompaction {
  collection: string;
  kind: CompactionKind;
  polls: number;
}

const DEFAULT_PARTITION = "_default";

function isEntityId(value: unknown): value is EntityId {
  return typeof value === "number" || typeof value === "string";
}

function numericVector(value: unknown): number[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const out: number[] = [];
  for (const item of value) {
    if (typeof item !== "number") return undefined;
    out.push(item);
  }
  return out;
}

function squaredDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    sum += d * d;
  }
  return Number(sum.toFixed(6));
}

export class FakeBackend implements VectorBackend {
  readonly calls: FakeCall[] = [];
  readonly collections = new Map<string, FakeCollection>();
  readonly databases = new Set<string>(["default"]);
  readonly users = new Set<string>(["root"]);
  readonly roles = new Map<string, Set<string>>([
    ["admin", new Set(["root"])],
    ["public", new Set<string>()],
  ]);
  readonly aliases = new Map<string, string>();
  readonly compactions = new Map<string, FakeCompaction>();
  version = "v2.5.4";
  closeCount = 0;
  compactionSteps = 0;

  #failures = new Map<BackendMethod, Error>();
  #nextId = 1000;
  #nextJobId = 5000;

  /**
   * Make every later call of `method` throw `error`
   */
  failOn(method: BackendMethod, error: Error): this {
    this.#failures.set(method, error);
    return this;
  }

  /**
   * Names of the methods called so far, in order
   */
  calledMethods(): string[] {
    return this.calls.map((call) => call.method);
  }

  /**
   * Add a collection directly, bypassing call recording
   */
  seedCollection(name: string, options: { dim?: number; rows?: Row[]; partitions?: string[] } = {}): FakeCollection {
    const dim = options.dim ?? 4;
    const collection: FakeCollection = {
      name,
      fields: [
        { name: "id", type: "Int64", isPrimary: true, autoId: false },
        { name: "vector", type: "FloatVector", isPrimary: false, autoId: false, dim },
      ],
      rows: [...(options.rows ?? [])],
      partitions: new Set([DEFAULT_PARTITION, ...(options.partitions ?? [])]),
      indexes: new Map([
        ["vector", { name: "vector", field: "vector", indexType: "AUTOINDEX", metric: "COSINE", params: {} }],
      ]),
      loaded: true,
    };
    this.collections.set(name, collection);
    return collection;
  }

  #record(method: keyof VectorBackend, args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = method === "close" ? undefined : this.#failures.get(method);
    if (failure) {
      throw failure;
    }
  }

  #collection(name: string): FakeCollection {
    const target = this.aliases.get(name) ?? name;
    const collection = this.collections.get(target);
    if (!collection) {
      throw new BackendFault("CollectionNotExists", `collection not found[collection=${name}]`);
    }
    return collection;
  }

  #primaryField(collection: FakeCollection): FakeField | undefined {
    return collection.fields.find((field) => field.isPrimary);
  }

  #vectorField(collection: FakeCollection, name?: string): string | undefined {
    if (name !== undefined) return name;
    return collection.fields.find((field) => field.type.endsWith("Vector"))?.name;
  }

  #idOf(collection: FakeCollection, row: Row): EntityId | undefined {
    const pk = this.#primaryField(collection);
    const value = pk ? row[pk.name] : undefined;
    return isEntityId(value) ? value : undefined;
  }

  #project(collection: FakeCollection, row: Row, outputFields?: string[]): Row {
    if (outputFields === undefined || outputFields.includes("*")) {
      return { ...row };
    }
    const pk = this.#primaryField(collection);
    const keep = new Set(pk ? [pk.name, ...outputFields] : outputFields);
    return Object.fromEntries(Object.entries(row).filter(([key]) => keep.has(key)));
  }

  #withIds(collection: FakeCollection, ids: readonly EntityId[]): Row[] {
    const wanted = new Set(ids.map(String));
    return collection.rows.filter((row) => {
      const id = this.#idOf(collection, row);
      return id !== undefined && wanted.has(String(id));
    });
  }

  // Collections

  async listCollections(): Promise<string[]> {
    this.#record("listCollections", []);
    return [...this.collections.keys()];
  }

  async describeCollection(name: string): Promise<Record<string, unknown>> {
    this.#record("describeCollection", [name]);
    const collection = this.#collection(name);
    return {
      collection_name: collection.name,
      fields: collection.fields.map((field) => ({ ...field })),
      partitions: [...collection.partitions],
      aliases: [...this.aliases].filter(([, target]) => target === collection.name).map(([alias]) => alias),
    };
  }

  async createCollection(request: CreateCollectionRequest): Promise<void> {
    this.#record("createCollection", [request]);
    if (this.collections.has(request.name)) {
      throw new BackendFault("UnexpectedError", `collection already exists: ${request.name}`);
    }

    const collection: FakeCollection = {
      name: request.name,
      fields: [],
      rows: [],
      partitions: new Set([DEFAULT_PARTITION]),
      indexes: new Map(),
      loaded: false,
    };

    if (request.mode === "quick") {
      collection.fields.push(
        { name: request.primaryField, type: "Int64", isPrimary: true, autoId: request.autoId },
        { name: request.vectorField, type: "FloatVector", isPrimary: false, autoId: false, dim: request.dimension }
      );
      collection.indexes.set(request.vectorField, {
        name: request.vectorField,
        field: request.vectorField,
        indexType: "AUTOINDEX",
        metric: request.metric,
        params: {},
      });
      collection.loaded = true;
    } else {
      for (const spec of request.fields) {
        const field: FakeField = { name: spec.name, type: spec.type, isPrimary: spec.isPrimary, autoId: spec.autoId };
        if (spec.dim !== undefined) field.dim = spec.dim;
        collection.fields.push(field);
      }
      for (const target of vectorIndexTargets(request.fields)) {
        collection.indexes.set(target.field, {
          name: target.field,
          field: target.field,
          indexType: "AUTOINDEX",
          metric: target.metric,
          params: {},
        });
      }
    }

    this.collections.set(request.name, collection);
  }

  async dropCollection(name: string): Promise<void> {
    this.#record("dropCollection", [name]);
    this.#collection(name);
    this.collections.delete(name);
  }

  async hasCollection(name: string): Promise<boolean> {
    this.#record("hasCollection", [name]);
    return this.collections.has(name);
  }

  async renameCollection(oldName: string, newName: string, targetDb?: string): Promise<void> {
    this.#record("renameCollection", [oldName, newName, targetDb]);
    const collection = this.#collection(oldName);
    if (targetDb !== undefined && !this.databases.has(targetDb)) {
      throw new BackendFault("UnexpectedError", `database not found[database=${targetDb}]`);
    }
    if (oldName !== newName && this.collections.has(newName)) {
      throw new BackendFault("UnexpectedError", `collection already exists: ${newName}`);
    }
    this.collections.delete(oldName);
    collection.name = newName;
    this.collections.set(newName, collection);
  }

  async getCollectionStats(name: string): Promise<Record<string, unknown>> {
    this.#record("getCollectionStats", [name]);
    return { row_count: this.#collection(name).rows.length };
  }

  // Indexes

  async listIndexes(collection: string): Promise<string[]> {
    this.#record("listIndexes", [collection]);
    return [...this.#collection(collection).indexes.keys()];
  }

  async describeIndex(collection: string, indexName?: string): Promise<Array<Record<string, unknown>>> {
    this.#record("describeIndex", [collection, indexName]);
    const target = this.#collection(collection);
    const indexes = [...target.indexes.values()].filter(
      (index) => indexName === undefined || index.name === indexName
    );
    if (indexName !== undefined && indexes.length === 0) {
      throw new BackendFault("IndexNotExist", `index not found[indexName=${indexName}]`);
    }
    return indexes.map((index) => ({
      index_name: index.name,
      field_name: index.field,
      index_type: index.indexType,
      metric_type: index.metric,
      state: "Finished",
      indexed_rows: target.rows.length,
      total_rows: target.rows.length,
      pending_index_rows: 0,
      params: { ...index.params },
    }));
  }

  async createIndex(request: CreateIndexRequest): Promise<void> {
    this.#record("createIndex", [request]);
    const collection = this.#collection(request.collection);
    if (!collection.fields.some((field) => field.name === request.field)) {
      throw new BackendFault("IllegalArgument", `field not found[field=${request.field}]`);
    }
    const name = request.indexName ?? request.field;
    if (collection.indexes.has(name)) {
      throw new BackendFault("UnexpectedError", `index already exists: ${name}`);
    }
    const index: FakeIndex = { name, field: request.field, indexType: request.indexType, params: { ...request.params } };
    if (request.metric !== undefined) index.metric = request.metric;
    collection.indexes.set(name, index);
  }

  async dropIndex(collection: string, indexName: string): Promise<void> {
    this.#record("dropIndex", [collection, indexName]);
    const target = this.#collection(collection);
    if (!target.indexes.delete(indexName)) {
      throw new BackendFault("IndexNotExist", `index not found[indexName=${indexName}]`);
    }
  }

  // Partitions

  async listPartitions(collection: string): Promise<string[]> {
    this.#record("listPartitions", [collection]);
    return [...this.#collection(collection).partitions];
  }

  async createPartition(collection: string, partition: string): Promise<void> {
    this.#record("createPartition", [collection, partition]);
    const target = this.#collection(collection);
    if (target.partitions.has(partition)) {
      throw new BackendFault("UnexpectedError", `partition already exists: ${partition}`);
    }
    target.partitions.add(partition);
  }

  async dropPartition(collection: string, partition: string): Promise<void> {
    this.#record("dropPartition", [collection, partition]);
    const target = this.#collection(collection);
    if (partition === DEFAULT_PARTITION) {
      throw new BackendFault("IllegalArgument", "default partition cannot be deleted");
    }
    if (!target.partitions.delete(partition)) {
      throw new BackendFault("UnexpectedError", `partition not found[partition=${partition}]`);
    }
  }

  async hasPartition(collection: string, partition: string): Promise<boolean> {
    this.#record("hasPartition", [collection, partition]);
    return this.#collection(collection).partitions.has(partition);
  }

  // Databases

  async listDatabases(): Promise<string[]> {
    this.#record("listDatabases", []);
    return [...this.databases];
  }

  async createDatabase(name: string): Promise<void> {
    this.#record("createDatabase", [name]);
    if (this.databases.has(name)) {
      throw new BackendFault("UnexpectedError", `database already exists: ${name}`);
    }
    this.databases.add(name);
  }

  async dropDatabase(name: string): Promise<void> {
    this.#record("dropDatabase", [name]);
    if (!this.databases.delete(name)) {
      throw new BackendFault("UnexpectedError", `database not found[database=${name}]`);
    }
  }

  // Data

  #write(collection: FakeCollection, rows: Row[], replace: boolean): MutationSummary {
    const ids: EntityId[] = [];
    for (const row of rows) {
      let id = this.#idOf(collection, row);
      const pk = this.#primaryField(collection);
      const stored: Row = { ...row };
      if (id === undefined) {
        id = this.#nextId++;
        if (pk) stored[pk.name] = id;
      } else if (replace) {
        const key = String(id);
        collection.rows = collection.rows.filter((existing) => String(this.#idOf(collection, existing)) !== key);
      }
      collection.rows.push(stored);
      ids.push(id);
    }
    return { count: rows.length, ids };
  }

  async insert(request: WriteRowsRequest): Promise<MutationSummary> {
    this.#record("insert", [request]);
    return this.#write(this.#collection(request.collection), request.rows, false);
  }

  async upsert(request: WriteRowsRequest): Promise<MutationSummary> {
    this.#record("upsert", [request]);
    return this.#write(this.#collection(request.collection), request.rows, true);
  }

  async delete(request: DeleteRequest): Promise<{ count: number }> {
    this.#record("delete", [request]);
    const collection = this.#collection(request.collection);
    const doomed = new Set("ids" in request ? this.#withIds(collection, request.ids) : collection.rows);
    collection.rows = collection.rows.filter((row) => !doomed.has(row));
    return { count: doomed.size };
  }

  async search(request: SearchRequest): Promise<SearchHit[]> {
    this.#record("search", [request]);
    const collection = this.#collection(request.collection);
    const field = this.#vectorField(collection, request.annsField);

    const hits: SearchHit[] = [];
    for (const row of collection.rows) {
      const id = this.#idOf(collection, row);
      const vector = field === undefined ? undefined : numericVector(row[field]);
      if (id === undefined || vector === undefined) continue;
      hits.push({ ...this.#project(collection, row, request.outputFields), id, distance: squaredDistance(request.vector, vector) });
    }

    return hits.sort((a, b) => a.distance - b.distance).slice(0, request.limit);
  }

  #ranked(collection: FakeCollection, leg: AnnRequest): EntityId[] {
    const field = this.#vectorField(collection, leg.field);
    const query = numericVector(leg.vector);
    const hits: Array<{ id: EntityId; distance: number }> = [];
    for (const row of collection.rows) {
      const id = this.#idOf(collection, row);
      const vector = field === undefined ? undefined : numericVector(row[field]);
      if (id === undefined || vector === undefined || query === undefined) continue;
      hits.push({ id, distance: squaredDistance(query, vector) });
    }
    return hits
      .sort((a, b) => a.distance - b.distance)
      .slice(0, leg.limit)
      .map((hit) => hit.id);
  }

  /**
   * Fuses per-request rankings: RRF adds 1 / (k + rank), weighted adds
   * weight / rank. `distance` holds the fused score, highest first.
   */
  async hybridSearch(request: HybridSearchRequest): Promise<SearchHit[]> {
    this.#record("hybridSearch", [request]);
    const collection = this.#collection(request.collection);
    const { ranker } = request;

    const scores = new Map<string, { id: EntityId; score: number }>();
    request.requests.forEach((leg, legIndex) => {
      this.#ranked(collection, leg).forEach((id, position) => {
        const rank = position + 1;
        const gain = ranker.kind === "rrf" ? 1 / (ranker.k + rank) : (ranker.weights[legIndex] ?? 0) / rank;
        const entry = scores.get(String(id)) ?? { id, score: 0 };
        entry.score += gain;
        scores.set(String(id), entry);
      });
    });

    const hits: SearchHit[] = [];
    for (const { id, score } of scores.values()) {
      const row = this.#withIds(collection, [id])[0];
      if (row === undefined) continue;
      hits.push({ ...this.#project(collection, row, request.outputFields), id, distance: Number(score.toFixed(6)) });
    }
    return hits.sort((a, b) => b.distance - a.distance).slice(0, request.limit);
  }

  async *scan(request: ScanRequest): AsyncIterable<Row[]> {
    this.#record("scan", [request]);
    const collection = this.#collection(request.collection);
    const rows = request.limit === undefined ? collection.rows : collection.rows.slice(0, request.limit);
    for (let start = 0; start < rows.length; start += request.batchSize) {
      yield rows.slice(start, start + request.batchSize).map((row) => this.#project(collection, row, request.outputFields));
    }
  }

  async query(request: QueryRequest): Promise<Row[]> {
    this.#record("query", [request]);
    const collection = this.#collection(request.collection);
    const rows = "ids" in request ? this.#withIds(collection, request.ids) : collection.rows;
    const limited = request.limit === undefined ? rows : rows.slice(0, request.limit);
    return limited.map((row) => this.#project(collection, row, request.outputFields));
  }

  async get(request: GetRequest): Promise<Row[]> {
    this.#record("get", [request]);
    const collection = this.#collection(request.collection);
    return this.#withIds(collection, request.ids).map((row) => this.#project(collection, row, request.outputFields));
  }

  // Load state

  async loadCollection(name: string): Promise<void> {
    this.#record("loadCollection", [name]);
    this.#collection(name).loaded = true;
  }

  async releaseCollection(name: string): Promise<void> {
    this.#record("releaseCollection", [name]);
    this.#collection(name).loaded = false;
  }

  async getLoadState(name: string): Promise<string> {
    this.#record("getLoadState", [name]);
    return this.#collection(name).loaded ? "LoadStateLoaded" : "LoadStateNotLoad";
  }

  // Compaction

  #job(jobId: string): FakeCompaction {
    const job = this.compactions.get(jobId);
    if (!job) {
      throw new BackendFault("UnexpectedError", `compaction job not found[compactionID=${jobId}]`);
    }
    return job;
  }

  async compact(collection: string, kind: CompactionKind): Promise<string> {
    this.#record("compact", [collection, kind]);
    const target = this.#collection(collection);
    const jobId = String(this.#nextJobId++);
    this.compactions.set(jobId, { collection: target.name, kind, polls: 0 });
    return jobId;
  }

  async getCompactionState(jobId: string): Promise<CompactionProgress> {
    this.#record("getCompactionState", [jobId]);
    const job = this.#job(jobId);
    job.polls++;
    const done = job.polls > this.compactionSteps;
    return {
      state: done ? "Completed" : "Executing",
      executingPlans: done ? 0 : 1,
      completedPlans: done ? 1 : 0,
      failedPlans: 0,
      timeoutPlans: 0,
    };
  }

  async getCompactionPlans(jobId: string): Promise<{ state: string; plans: CompactionPlan[] }> {
    this.#record("getCompactionPlans", [jobId]);
    const job = this.#job(jobId);
    return {
      state: job.polls > this.compactionSteps ? "Completed" : "Executing",
      plans: [{ sources: [101, 102], target: 103 }],
    };
  }

  // Aliases

  async listAliases(collection: string): Promise<string[]> {
    this.#record("listAliases", [collection]);
    const target = this.#collection(collection);
    return [...this.aliases].filter(([, name]) => name === target.name).map(([alias]) => alias);
  }

  async createAlias(collection: string, alias: string): Promise<void> {
    this.#record("createAlias", [collection, alias]);
    const target = this.#collection(collection);
    if (this.aliases.has(alias)) {
      throw new BackendFault("UnexpectedError", `alias already exists: ${alias}`);
    }
    this.aliases.set(alias, target.name);
  }

  async dropAlias(alias: string): Promise<void> {
    this.#record("dropAlias", [alias]);
    if (!this.aliases.delete(alias)) {
      throw new BackendFault("UnexpectedError", `alias not found[alias=${alias}]`);
    }
  }

  // Users and roles

  async listUsers(): Promise<string[]> {
    this.#record("listUsers", []);
    return [...this.users];
  }

  async createUser(username: string, password: string): Promise<void> {
    this.#record("createUser", [username, password]);
    if (this.users.has(username)) {
      throw new BackendFault("CreateCredentialFailure", `user already exists: ${username}`);
    }
    this.users.add(username);
  }

  async dropUser(username: string): Promise<void> {
    this.#record("dropUser", [username]);
    if (!this.users.delete(username)) {
      throw new BackendFault("UnexpectedError", `user not found[user=${username}]`);
    }
  }

  async listRoles(): Promise<string[]> {
    this.#record("listRoles", []);
    return [...this.roles.keys()];
  }

  async createRole(name: string): Promise<void> {
    this.#record("createRole", [name]);
    if (this.roles.has(name)) {
      throw new BackendFault("UnexpectedError", `role already exists: ${name}`);
    }
    this.roles.set(name, new Set());
  }

  async dropRole(name: string): Promise<void> {
    this.#record("dropRole", [name]);
    if (!this.roles.delete(name)) {
      throw new BackendFault("UnexpectedError", `role not found[role=${name}]`);
    }
  }

  #roleMembers(role: string, username: string): Set<string> {
    const members = this.roles.get(role);
    if (!members) {
      throw new BackendFault("UnexpectedError", `role not found[role=${role}]`);
    }
    if (!this.users.has(username)) {
      throw new BackendFault("UnexpectedError", `user not found[user=${username}]`);
    }
    return members;
  }

  async grantRole(role: string, username: string): Promise<void> {
    this.#record("grantRole", [role, username]);
    this.#roleMembers(role, username).add(username);
  }

  async revokeRole(role: string, username: string): Promise<void> {
    this.#record("revokeRole", [role, username]);
    this.#roleMembers(role, username).delete(username);
  }

  // Server

  async serverVersion(): Promise<string> {
    this.#record("serverVersion", []);
    return this.version;
  }

  async close(): Promise<void> {
    this.#record("close", []);
    this.closeCount++;
  }
}

/**
 * A deployment with one collection "demo" (id + 4-dim vector, two rows,
 * partition "recent", alias "demo_alias"), database "analytics", user
 * "alice" holding role "reader"
 */
export function createDemoBackend(): FakeBackend {
  const backend = new FakeBackend();
  backend.seedCollection("demo", {
    dim: 4,
    partitions: ["recent"],
    rows: [
      { id: 1, vector: [0.1, 0.2, 0.3, 0.4], title: "first" },
      { id: 2, vector: [0.4, 0.3, 0.2, 0.1], title: "second" },
    ],
  });
  backend.aliases.set("demo_alias", "demo");
  backend.databases.add("analytics");
  backend.users.add("alice");
  backend.roles.set("reader", new Set(["alice"]));
  return backend;
}

export interface FakeConnector {
  connect: BackendFactory;
  /** Connections requested, in order */
  connections: ConnectionConfig[];
  backend: FakeBackend;
}

/**
 * Backend factory handing out one shared fake and recording each connect
 */
export function fakeConnector(backend: FakeBackend = new FakeBackend()): FakeConnector {
  const connections: ConnectionConfig[] = [];
  return {
    backend,
    connections,
    connect: async (connection) => {
      connections.push(connection);
      return backend;
    },
  };
}
