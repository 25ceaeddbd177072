/**
 * Outcome builders and option specs shared by command tables
 */

import type { OperationOutcome } from "@yami/core";
import type { OptionSpec } from "../registry/types.js";

export function data(value: unknown): OperationOutcome {
  return { kind: "data", data: value };
}

export function mutation(message: string, details?: Record<string, unknown>): OperationOutcome {
  return details === undefined ? { kind: "mutation", message } : { kind: "mutation", message, details };
}

export const OUTPUT_FIELDS_OPTION: OptionSpec = {
  flags: "--output-fields <fields>",
  type: "list",
  description: "Comma-separated fields to return (default: all)",
};

export const PARTITIONS_OPTION: OptionSpec = {
  flags: "-p, --partition <names>",
  type: "list",
  description: "Comma-separated partitions to read from",
};
