/**
 * Field DSL for collection schemas
 *
 * Syntax: name:type[:param][:modifier...]
 *
 *   id:int64:pk:auto
 *   title:varchar:512
 *   tags:array:varchar:100
 *   embedding:float_vector:768:COSINE
 *   content:varchar:65535:nullable
 *
 * Parsing is backend-neutral; the Milvus adapter maps field types to its own enum.
 */

import { ValidationError } from "./errors.js";

export const FIELD_TYPES = [
  "bool",
  "int8",
  "int16",
  "int32",
  "int64",
  "float",
  "double",
  "varchar",
  "json",
  "array",
  "float_vector",
  "binary_vector",
  "float16_vector",
  "bfloat16_vector",
  "sparse_vector",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * Accepted spellings, including aliases
 */
const TYPE_NAMES: Readonly<Record<string, FieldType>> = {
  bool: "bool",
  int8: "int8",
  int16: "int16",
  int32: "int32",
  int64: "int64",
  float: "float",
  double: "double",
  varchar: "varchar",
  string: "varchar",
  json: "json",
  array: "array",
  float_vector: "float_vector",
  binary_vector: "binary_vector",
  float16_vector: "float16_vector",
  bfloat16_vector: "bfloat16_vector",
  sparse_vector: "sparse_vector",
  sparse_float_vector: "sparse_vector",
};

export const METRIC_TYPES = ["COSINE", "L2", "IP", "HAMMING", "JACCARD"] as const;
export type MetricType = (typeof METRIC_TYPES)[number];

export const DEFAULT_VARCHAR_LENGTH = 65535;
export const DEFAULT_ARRAY_CAPACITY = 4096;

const DENSE_VECTOR_TYPES: ReadonlySet<FieldType> = new Set([
  "float_vector",
  "binary_vector",
  "float16_vector",
  "bfloat16_vector",
]);

export interface FieldSpec {
  name: string;
  type: FieldType;
  isPrimary: boolean;
  autoId: boolean;
  nullable: boolean;
  /** varchar only */
  maxLength?: number;
  /** dense vectors only */
  dim?: number;
  /** vectors only; defaulted during parsing */
  metric?: MetricType;
  /** array only */
  elementType?: FieldType;
  /** array only */
  maxCapacity?: number;
}

export function isVectorType(type: FieldType): boolean {
  return DENSE_VECTOR_TYPES.has(type) || type === "sparse_vector";
}

function isMetricType(value: string): value is MetricType {
  return METRIC_TYPES.some((metric) => metric === value);
}

function lookupType(name: string): FieldType | undefined {
  return Object.hasOwn(TYPE_NAMES, name) ? TYPE_NAMES[name] : undefined;
}

const digits = /^\d+$/;

/**
 * Take a leading integer parameter, if the next part is one
 * @throws ValidationError when the integer is zero
 */
function takeNumber(parts: string[], field: string, what: string): number | undefined {
  const next = parts[0];
  if (next === undefined || !digits.test(next)) {
    return undefined;
  }
  parts.shift();
  const value = Number.parseInt(next, 10);
  if (value < 1) {
    throw new ValidationError(`Field '${field}': ${what} must be a positive integer, got '${next}'`);
  }
  return value;
}

/**
 * Parse one field definition
 * @throws ValidationError describing the first problem found
 */
export function parseField(definition: string): FieldSpec {
  const parts = definition.split(":").map((part) => part.trim());
  if (parts.length < 2) {
    throw new ValidationError(
      `Invalid field format: '${definition}'. Expected 'name:type[:params...]'`
    );
  }

  const [name = "", rawType = ""] = parts;
  if (!name) {
    throw new ValidationError("Field name cannot be empty");
  }

  const type = lookupType(rawType.toLowerCase());
  if (type === undefined) {
    throw new ValidationError(
      `Unknown type '${rawType}'. Valid types: ${Object.keys(TYPE_NAMES).sort().join(", ")}`
    );
  }

  const spec: FieldSpec = { name, type, isPrimary: false, autoId: false, nullable: false };
  const rest = parts.slice(2);

  if (type === "varchar") {
    spec.maxLength = takeNumber(rest, name, "max length") ?? DEFAULT_VARCHAR_LENGTH;
  } else if (DENSE_VECTOR_TYPES.has(type)) {
    const dim = takeNumber(rest, name, "dimension");
    if (dim === undefined) {
      throw new ValidationError(
        `Vector field '${name}' requires dimension, e.g., '${name}:${rawType}:768'`
      );
    }
    spec.dim = dim;
  } else if (type === "array") {
    const rawElement = rest.shift();
    if (rawElement === undefined) {
      throw new ValidationError(
        `Array field '${name}' requires element type, e.g., '${name}:array:int64:100'`
      );
    }
    const elementType = lookupType(rawElement.toLowerCase());
    if (elementType === undefined) {
      throw new ValidationError(`Unknown array element type '${rawElement}'`);
    }
    spec.elementType = elementType;
    spec.maxCapacity = takeNumber(rest, name, "max capacity") ?? DEFAULT_ARRAY_CAPACITY;
  }

  for (const part of rest) {
    const lower = part.toLowerCase();
    const upper = part.toUpperCase();
    if (lower === "pk") {
      spec.isPrimary = true;
    } else if (lower === "auto") {
      spec.autoId = true;
    } else if (lower === "nullable") {
      spec.nullable = true;
    } else if (isMetricType(upper)) {
      if (!isVectorType(type)) {
        throw new ValidationError(`Metric type '${part}' can only be used with vector fields`);
      }
      spec.metric = upper;
    } else {
      throw new ValidationError(
        `Unknown modifier '${part}'. Valid modifiers: pk, auto, nullable, or metric types: ${METRIC_TYPES.join(", ")}`
      );
    }
  }

  if (spec.autoId && !spec.isPrimary) {
    throw new ValidationError(`Field '${name}': 'auto' modifier requires 'pk' modifier`);
  }

  if (isVectorType(type) && spec.metric === undefined) {
    spec.metric = type === "sparse_vector" ? "IP" : "COSINE";
  }

  return spec;
}

/**
 * Parse a full schema; exactly one field must be the primary key
 */
export function parseFields(definitions: readonly string[]): FieldSpec[] {
  const specs = definitions.map(parseField);
  const primaryCount = specs.filter((spec) => spec.isPrimary).length;

  if (primaryCount === 0) {
    throw new ValidationError("At least one field must be marked as primary key (pk)");
  }
  if (primaryCount > 1) {
    throw new ValidationError("Only one field can be marked as primary key");
  }

  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.name)) {
      throw new ValidationError(`Duplicate field name '${spec.name}'`);
    }
    seen.add(spec.name);
  }

  return specs;
}

/**
 * Vector fields that receive an AUTOINDEX index on creation
 */
export function vectorIndexTargets(specs: readonly FieldSpec[]): Array<{ field: string; metric: MetricType }> {
  return specs
    .filter((spec) => isVectorType(spec.type))
    .map((spec) => ({ field: spec.name, metric: spec.metric ?? "COSINE" }));
}

export const FIELD_DSL_HELP = `Field DSL: name:type[:param][:modifier...]

Types:
  Scalar:  int8, int16, int32, int64, float, double, bool
  String:  varchar[:max_len] (default ${DEFAULT_VARCHAR_LENGTH})
  JSON:    json
  Array:   array:elem_type[:max_cap] (default ${DEFAULT_ARRAY_CAPACITY})
  Vector:  float_vector:dim, binary_vector:dim, float16_vector:dim,
           bfloat16_vector:dim, sparse_vector

Modifiers:
  pk        primary key
  auto      auto-generated id (requires pk)
  nullable  allow null values
  COSINE | L2 | IP | HAMMING | JACCARD   metric for vector fields`;
