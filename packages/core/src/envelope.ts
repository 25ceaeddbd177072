/**
 * Response envelope construction
 *
 * The content of data and error is built once, independent of shape;
 * only the wrapping differs between structured and plain envelopes.
 */

import type {
  EnvelopeMeta,
  EnvelopeShape,
  Envelope,
  OperationOutcome,
  StructuredEnvelope,
  PlainEnvelope,
} from "./types.js";

/**
 * Data as reported for an outcome, before wrapping
 */
export function outcomeData(outcome: OperationOutcome): unknown {
  switch (outcome.kind) {
    case "data":
      return outcome.data;
    case "mutation":
      return { ...outcome.details, message: outcome.message };
    case "error":
      return undefined;
  }
}

/**
 * Number of items in data when data is a sequence, otherwise undefined
 */
export function countOf(data: unknown): number | undefined {
  return Array.isArray(data) ? data.length : undefined;
}

function buildMeta(command: string, durationMs: number, data: unknown): EnvelopeMeta {
  const meta: EnvelopeMeta = { command, duration_ms: Math.max(0, Math.round(durationMs)) };
  const count = countOf(data);
  if (count !== undefined) {
    meta.count = count;
  }
  return meta;
}

function structured(
  outcome: OperationOutcome,
  command: string,
  durationMs: number
): StructuredEnvelope {
  if (outcome.kind === "error") {
    return {
      shape: "structured",
      ok: false,
      payload: { ok: false, error: outcome.error, meta: buildMeta(command, durationMs, undefined) },
    };
  }

  const data = outcomeData(outcome);
  return {
    shape: "structured",
    ok: true,
    payload: { ok: true, data, meta: buildMeta(command, durationMs, data) },
  };
}

function plain(outcome: OperationOutcome): PlainEnvelope {
  switch (outcome.kind) {
    case "data":
      return { shape: "plain", ok: true, outcome: "data", payload: outcome.data };
    case "mutation":
      return {
        shape: "plain",
        ok: true,
        outcome: "mutation",
        payload: { ...outcome.details, status: "success", message: outcome.message },
      };
    case "error":
      return { shape: "plain", ok: false, outcome: "error", payload: { error: outcome.error } };
  }
}

/**
 * Wrap an operation outcome. Pure: identical inputs give identical envelopes.
 */
export function buildEnvelope(
  outcome: OperationOutcome,
  command: string,
  durationMs: number,
  shape: EnvelopeShape
): Envelope {
  return shape === "structured" ? structured(outcome, command, durationMs) : plain(outcome);
}
