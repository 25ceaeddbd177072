/**
 * Argument parsing and validation helpers
 *
 * Every failure is a ValidationError that names the offending option.
 */

import { ValidationError, safeParseJson, type EntityId } from "@yami/core";

const INTEGER = /^[-+]?\d+$/;

/**
 * Parse an integer option
 */
export function parseInteger(value: string, name: string, min?: number): number {
  const trimmed = value.trim();

  if (!INTEGER.test(trimmed)) {
    throw new ValidationError(`${name} must be an integer (got "${value}")`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (!Number.isSafeInteger(parsed)) {
    throw new ValidationError(`${name} is out of range (got "${value}")`);
  }
  if (min !== undefined && parsed < min) {
    throw new ValidationError(`${name} must be >= ${min} (got ${parsed})`);
  }

  return parsed;
}

/**
 * Parse a floating point option
 */
export function parseFloatValue(value: string, name: string, min?: number): number {
  const trimmed = value.trim();
  const parsed = trimmed === "" ? Number.NaN : Number(trimmed);

  if (!Number.isFinite(parsed)) {
    throw new ValidationError(`${name} must be a number (got "${value}")`);
  }
  if (min !== undefined && parsed < min) {
    throw new ValidationError(`${name} must be >= ${min} (got ${parsed})`);
  }

  return parsed;
}

/**
 * Split a comma-separated list, dropping blank entries
 */
export function parseList(value: string, name: string): string[] {
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw new ValidationError(`${name} must list at least one value`);
  }

  return items;
}

/**
 * Parse a comma-separated id list. When every id is an integer that fits a
 * JavaScript number the list becomes numeric; otherwise all ids stay strings.
 */
export function parseIds(value: string, name: string): EntityId[] {
  const items = parseList(value, name);
  const numeric = items.every(
    (item) => INTEGER.test(item) && Number.isSafeInteger(Number.parseInt(item, 10))
  );
  return numeric ? items.map((item) => Number.parseInt(item, 10)) : items;
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, name: string): unknown {
  const parsed = safeParseJson(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid JSON in ${name}: ${parsed.error}`);
  }
  return parsed.data;
}

/**
 * Match a value against allowed choices, case-insensitively.
 * Returns the canonical spelling of the matching choice.
 */
export function parseChoice(value: string, name: string, choices: readonly string[]): string {
  const wanted = value.trim().toLowerCase();
  const match = choices.find((choice) => choice.toLowerCase() === wanted);
  if (match === undefined) {
    throw new ValidationError(`${name} must be one of: ${choices.join(", ")} (got "${value}")`);
  }
  return match;
}

/**
 * Parse a search vector: a non-empty JSON array of finite numbers
 */
export function parseVector(value: string, name: string): number[] {
  const parsed = parseJson(value, name);
  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new ValidationError(`${name} must be a non-empty JSON array of numbers`);
  }

  const vector: number[] = [];
  for (const [i, item] of parsed.entries()) {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      throw new ValidationError(`${name} element ${i} must be a number`);
    }
    vector.push(item);
  }
  return vector;
}
