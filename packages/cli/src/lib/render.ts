/**
 * Output rendering helpers
 *
 * Rendering never mutates the envelope: canonicalize copies before ordering.
 */

import yaml from "js-yaml";
import { z } from "zod";
import { canonicalize, stableStringify, type Envelope, type PlainEnvelope } from "@yami/core";
import type { OutputFormat } from "./env.js";
import { formatCliError } from "./errors.js";
import { columnsOf, formatTable } from "./table.js";

type Color = "red" | "green" | "yellow";

export interface Rendered {
  text: string;
  stream: "stdout" | "stderr";
}

export interface RenderOptions {
  /** Suppress mutation confirmations (table output only) */
  quiet?: boolean;
  /** Colorize table output; set when writing to a terminal */
  color?: boolean;
}

const ErrorPayloadSchema = z.object({
  error: z.object({ message: z.string(), hint: z.string().optional() }),
});

const MutationPayloadSchema = z.object({ message: z.string() });

const COLOR_CODES: Record<Color, string> = {
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
};

function paint(text: string, color: Color): string {
  return `${COLOR_CODES[color]}${text}\x1b[0m`;
}

/**
 * Canonical YAML: same key order as JSON output
 */
export function toYaml(value: unknown): string {
  return yaml.dump(canonicalize(value), { noRefs: true, lineWidth: -1, sortKeys: false });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Table projection of read data
 */
export function formatData(data: unknown): string {
  if (Array.isArray(data)) {
    const rows = data.map((item: unknown) => (isRecord(item) ? item : { value: item }));
    return formatTable(columnsOf(rows), rows);
  }

  if (isRecord(data)) {
    const rows = Object.entries(data).map(([key, value]) => ({ key, value }));
    return formatTable(["key", "value"], rows);
  }

  return data === undefined ? "" : String(data);
}

function renderTable(envelope: PlainEnvelope, options: RenderOptions): Rendered {
  const tint = (text: string, color: Color): string => (options.color ? paint(text, color) : text);

  switch (envelope.outcome) {
    case "error": {
      const parsed = ErrorPayloadSchema.safeParse(envelope.payload);
      const error = parsed.success ? parsed.data.error : { message: "Unknown error" };
      return { text: tint(formatCliError(error), "red") + "\n", stream: "stderr" };
    }
    case "mutation": {
      if (options.quiet) {
        return { text: "", stream: "stdout" };
      }
      const parsed = MutationPayloadSchema.safeParse(envelope.payload);
      const message = parsed.success ? parsed.data.message : "Done";
      return { text: tint(message, "green") + "\n", stream: "stdout" };
    }
    case "data": {
      const text = formatData(envelope.payload);
      return { text: text === "" ? "" : text + "\n", stream: "stdout" };
    }
  }
}

/**
 * Render an envelope in the requested format
 *
 * json and yaml always go to stdout, errors included, so that consumers read
 * one document from one stream. Tables apply to plain envelopes only; a
 * structured envelope asked for as a table falls back to JSON.
 */
export function render(envelope: Envelope, format: OutputFormat, options: RenderOptions = {}): Rendered {
  if (format === "table" && envelope.shape === "plain") {
    return renderTable(envelope, options);
  }

  if (format === "yaml") {
    return { text: toYaml(envelope.payload), stream: "stdout" };
  }

  return { text: stableStringify(envelope.payload), stream: "stdout" };
}
