/**
 * yami core
 *
 * Error taxonomy, profiles, connection resolution, envelopes and the backend
 * contract shared by the CLI. The Milvus adapter lives at "@yami/core/milvus"
 * so that loading this entry never pulls in the gRPC client.
 */

export type {
  ConnectionConfig,
  ConnectionFields,
  Profile,
  ProfileEntry,
  ErrorDescriptor,
  OperationOutcome,
  EnvelopeShape,
  EnvelopeMeta,
  StructuredPayload,
  StructuredEnvelope,
  PlainEnvelope,
  Envelope,
  Row,
} from "./types.js";

export {
  ERROR_CODES,
  ERROR_HINTS,
  hintFor,
  YamiError,
  ConnectionError,
  NotFoundError,
  ValidationError,
  AlreadyExistsError,
  AuthenticationError,
  FileNotFoundError,
  InvalidFormatError,
  MissingArgumentError,
  OperationAbortedError,
  BackendFault,
} from "./errors.js";
export type { ErrorCode, AbortReason } from "./errors.js";

export { classifyFault, FAULT_CATEGORY_TABLE, FAULT_MESSAGE_PATTERNS } from "./faults.js";

export { ENVELOPE_KEY_ORDER, canonicalize, stableStringify, safeParseJson } from "./format.js";
export { buildEnvelope, countOf, outcomeData } from "./envelope.js";

export { atomicWrite, ensureDirectory, readTextFile, readTextFileIfExists } from "./io.js";

export {
  PROFILE_FILE,
  ProfileStore,
  emptyProfileDocument,
  validateProfileName,
  findProfile,
  defaultProfile,
  maskToken,
} from "./profiles.js";
export type { ProfileDocument, AddProfileOptions } from "./profiles.js";

export { resolveConnection, connectionFromEnv, mergeConnectionLayers, ENV_URI, ENV_TOKEN } from "./resolve.js";
export type { ConnectionFlags, ConnectionLayer, Environment } from "./resolve.js";

export {
  ROW_FILE_FORMATS,
  loadRowsFile,
  parseRows,
  parseJsonLines,
  rowFileFormat,
  toRows,
  writeRowsFile,
} from "./rows.js";
export type { RowFileFormat } from "./rows.js";
export { inferParquetColumns, readParquetFile, writeParquetFile } from "./parquet.js";
export type { ParquetColumn, ParquetColumnType } from "./parquet.js";

export {
  FIELD_TYPES,
  METRIC_TYPES,
  FIELD_DSL_HELP,
  parseField,
  parseFields,
  isVectorType,
  vectorIndexTargets,
} from "./schema-dsl.js";
export type { FieldSpec, FieldType, MetricType } from "./schema-dsl.js";

export type {
  BackendFactory,
  VectorBackend,
  EntityId,
  CreateCollectionRequest,
  CreateIndexRequest,
  WriteRowsRequest,
  MutationSummary,
  DeleteRequest,
  SearchRequest,
  SearchHit,
  QueryRequest,
  GetRequest,
  SearchVector,
  AnnRequest,
  Ranker,
  HybridSearchRequest,
  ScanRequest,
  CompactionKind,
  CompactionProgress,
  CompactionPlan,
} from "./backend/types.js";

export { Logger, logger, isLogLevel } from "./observability/logs.js";
export type { LogLevel, LogEvent, LogSink } from "./observability/logs.js";
