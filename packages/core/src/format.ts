/**
 * Canonical JSON formatting utilities
 *
 * Provides deterministic output with:
 * - Envelope keys first, in a fixed order
 * - Remaining keys in Unicode code point order
 * - Undefined members dropped, bigint and Date values stringified
 *
 * Invariants:
 * - Pure function: same input always produces same output
 * - No mutation of input objects
 * - Cycle detection prevents infinite loops
 */

/**
 * Keys that lead every object, in this order
 */
export const ENVELOPE_KEY_ORDER: readonly string[] = [
  "ok",
  "status",
  "code",
  "message",
  "hint",
  "data",
  "error",
  "meta",
  "command",
  "duration_ms",
  "count",
];

/**
 * Deterministic comparison for object keys using Unicode code point order
 */
function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function sortKeys(keys: string[], order: readonly string[]): string[] {
  return keys.slice().sort((a, b) => {
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    if (aIndex !== -1) return -1;
    if (bIndex !== -1) return 1;
    return compareKeys(a, b);
  });
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Return a copy of `input` whose object keys are in canonical order
 * @throws Error if circular references detected
 */
export function canonicalize(input: unknown, order: readonly string[] = ENVELOPE_KEY_ORDER): unknown {
  const seen = new WeakSet<object>();

  const normalize = (value: unknown): unknown => {
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (value === null || typeof value !== "object") {
      return value;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }

    if (seen.has(value)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(value);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(value)) {
        return value.map((item) => (item === undefined ? null : normalize(item)));
      }

      const source: Record<string, unknown> = isPlainRecord(value)
        ? value
        : Object.fromEntries(Object.entries(value));
      const out: Record<string, unknown> = {};
      for (const key of sortKeys(Object.keys(source), order)) {
        const member = source[key];
        if (member === undefined) continue;
        out[key] = normalize(member);
      }
      return out;
    } finally {
      seen.delete(value);
    }
  };

  return normalize(input);
}

/**
 * Canonical JSON text with a single trailing newline
 */
export function stableStringify(input: unknown, indent = 2): string {
  const normalized = canonicalize(input);
  return JSON.stringify(normalized === undefined ? null : normalized, null, indent) + "\n";
}

/**
 * Safe JSON parsing with structured error information
 * @param raw - Raw string to parse
 * @returns Parsed value or error details
 */
export function safeParseJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    // Strip BOM if present
    const cleaned = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
    const data: unknown = JSON.parse(cleaned);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}
