/**
 * Core types for yami
 */

import type { ErrorCode } from "./errors.js";

/**
 * Effective connection to a Milvus deployment
 */
export interface ConnectionConfig {
  /** Server URI, e.g. "http://localhost:19530" */
  uri: string;
  /** Authentication token ("user:password" or an API key) */
  token?: string;
  /** Database name; the server default is used when absent */
  database?: string;
}

/**
 * Partial connection as contributed by one configuration source
 */
export type ConnectionFields = Partial<ConnectionConfig>;

/**
 * Named, persisted connection configuration
 */
export interface Profile extends ConnectionConfig {
  name: string;
}

/**
 * Profile as reported by `profile list` / `profile show`
 */
export interface ProfileEntry {
  name: string;
  uri: string;
  token?: string;
  database?: string;
  default: boolean;
}

/**
 * Structured error information carried by error envelopes
 */
export interface ErrorDescriptor {
  code: ErrorCode;
  message: string;
  hint?: string;
}

/**
 * Outcome of a single operation: read data, a mutation summary, or an error
 */
export type OperationOutcome =
  | { kind: "data"; data: unknown }
  | { kind: "mutation"; message: string; details?: Record<string, unknown> }
  | { kind: "error"; error: ErrorDescriptor };

/**
 * Envelope shape: structured for agents, plain for humans and legacy consumers
 */
export type EnvelopeShape = "structured" | "plain";

export interface EnvelopeMeta {
  command: string;
  duration_ms: number;
  count?: number;
}

export type StructuredPayload =
  | { ok: true; data: unknown; meta: EnvelopeMeta }
  | { ok: false; error: ErrorDescriptor; meta: EnvelopeMeta };

export interface StructuredEnvelope {
  shape: "structured";
  ok: boolean;
  payload: StructuredPayload;
}

export interface PlainEnvelope {
  shape: "plain";
  ok: boolean;
  /** Which outcome produced the payload; renderers use it to pick a projection */
  outcome: OperationOutcome["kind"];
  payload: unknown;
}

export type Envelope = StructuredEnvelope | PlainEnvelope;

/**
 * One record as inserted into or returned from a collection
 */
export type Row = Record<string, unknown>;
