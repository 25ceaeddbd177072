/**
 * Translation of thrown faults into the error taxonomy
 *
 * Lookup order:
 * 1. yami errors carry their own code and hint
 * 2. backend faults by category (Milvus status names, gRPC status numbers)
 * 3. message patterns, for faults whose category is generic
 * 4. Node.js system errors and JSON syntax errors
 * 5. anything else is a CONNECTION_ERROR with the original message and no hint
 */

import { BackendFault, YamiError, hintFor, type ErrorCode } from "./errors.js";
import type { ErrorDescriptor } from "./types.js";

/**
 * Milvus status names and gRPC status codes (as "grpc:<n>") mapped to taxonomy codes.
 * Categories absent here fall through to message patterns.
 */
export const FAULT_CATEGORY_TABLE: Readonly<Record<string, ErrorCode>> = {
  // Milvus common.ErrorCode names
  ConnectFailed: "CONNECTION_ERROR",
  NotReadyServe: "CONNECTION_ERROR",
  NotReadyCoordActivating: "CONNECTION_ERROR",
  DataCoordNA: "CONNECTION_ERROR",
  NoReplicaAvailable: "CONNECTION_ERROR",
  NotShardLeader: "CONNECTION_ERROR",
  RateLimit: "CONNECTION_ERROR",
  ForceDeny: "CONNECTION_ERROR",
  TimeTickLongDelay: "CONNECTION_ERROR",
  PermissionDenied: "AUTHENTICATION_ERROR",
  CollectionNotExists: "NOT_FOUND",
  CollectionNameNotFound: "NOT_FOUND",
  IndexNotExist: "NOT_FOUND",
  SegmentNotFound: "NOT_FOUND",
  EmptyCollection: "NOT_FOUND",
  FileNotFound: "FILE_NOT_FOUND",
  IllegalArgument: "VALIDATION_ERROR",
  IllegalDimension: "VALIDATION_ERROR",
  IllegalIndexType: "VALIDATION_ERROR",
  IllegalCollectionName: "VALIDATION_ERROR",
  IllegalTOPK: "VALIDATION_ERROR",
  IllegalRowRecord: "VALIDATION_ERROR",
  IllegalVectorID: "VALIDATION_ERROR",
  IllegalNLIST: "VALIDATION_ERROR",
  IllegalMetricType: "VALIDATION_ERROR",
  UpsertAutoIDTrue: "VALIDATION_ERROR",
  CreateCredentialFailure: "VALIDATION_ERROR",
  CreateRoleFailure: "VALIDATION_ERROR",
  OperateUserRoleFailure: "VALIDATION_ERROR",
  // gRPC status codes
  "grpc:3": "VALIDATION_ERROR",
  "grpc:4": "CONNECTION_ERROR",
  "grpc:5": "NOT_FOUND",
  "grpc:6": "ALREADY_EXISTS",
  "grpc:7": "AUTHENTICATION_ERROR",
  "grpc:11": "VALIDATION_ERROR",
  "grpc:14": "CONNECTION_ERROR",
  "grpc:16": "AUTHENTICATION_ERROR",
};

/**
 * Message patterns, checked in order, for faults without a specific category
 */
export const FAULT_MESSAGE_PATTERNS: ReadonlyArray<readonly [RegExp, ErrorCode]> = [
  [/unauthenticated|unauthorized|authentication|invalid token|incorrect password/i, "AUTHENTICATION_ERROR"],
  [/already exist/i, "ALREADY_EXISTS"],
  [/not found|does not exist|doesn't exist|not exist|can't find|cannot find/i, "NOT_FOUND"],
  [/econnrefused|enotfound|unavailable|failed to connect|connection/i, "CONNECTION_ERROR"],
  [/invalid|illegal|must be|should be|out of range|mismatch/i, "VALIDATION_ERROR"],
];

/**
 * Node.js system error codes with a taxonomy meaning of their own
 */
const SYSTEM_ERROR_TABLE: Readonly<Record<string, ErrorCode>> = {
  ENOENT: "FILE_NOT_FOUND",
  ECONNREFUSED: "CONNECTION_ERROR",
  ECONNRESET: "CONNECTION_ERROR",
  ETIMEDOUT: "CONNECTION_ERROR",
  ENOTFOUND: "CONNECTION_ERROR",
  EAI_AGAIN: "CONNECTION_ERROR",
};

function descriptor(code: ErrorCode, message: string, hint = hintFor(code)): ErrorDescriptor {
  return hint === undefined ? { code, message } : { code, message, hint };
}

function matchMessage(message: string): ErrorCode | undefined {
  for (const [pattern, code] of FAULT_MESSAGE_PATTERNS) {
    if (pattern.test(message)) {
      return code;
    }
  }
  return undefined;
}

/**
 * Category key for an error thrown by the gRPC layer ({ code: number })
 */
function grpcCategory(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "number") {
    return `grpc:${err.code}`;
  }
  return undefined;
}

function systemCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Map any thrown value to exactly one error descriptor. Never throws.
 */
export function classifyFault(err: unknown): ErrorDescriptor {
  if (err instanceof YamiError) {
    return descriptor(err.code, err.message, err.hint);
  }

  if (!(err instanceof Error)) {
    return { code: "CONNECTION_ERROR", message: String(err) };
  }

  const category = err instanceof BackendFault ? err.category : grpcCategory(err);
  if (category !== undefined) {
    const mapped = FAULT_CATEGORY_TABLE[category];
    if (mapped !== undefined) {
      return descriptor(mapped, err.message);
    }
  }

  const byMessage = matchMessage(err.message);
  if (byMessage !== undefined) {
    return descriptor(byMessage, err.message);
  }

  const sysCode = systemCode(err);
  if (sysCode !== undefined) {
    const mapped = SYSTEM_ERROR_TABLE[sysCode];
    if (mapped !== undefined) {
      return descriptor(mapped, err.message);
    }
  }

  if (err instanceof SyntaxError) {
    return descriptor("INVALID_FORMAT", err.message);
  }

  // Unmapped: preserve the backend's message verbatim, no hint
  return { code: "CONNECTION_ERROR", message: err.message };
}
