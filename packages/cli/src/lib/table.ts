/**
 * Minimal table formatter for human output
 */

const MAX_WIDTH = 60;

/**
 * Column names for a list of records: union of keys in first-seen order
 */
export function columnsOf(rows: readonly Record<string, unknown>[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

/**
 * Print a simple ASCII table with column headers and rows
 */
export function formatTable(columns: readonly string[], rows: readonly Record<string, unknown>[]): string {
  if (rows.length === 0) return "(0 rows)";
  if (columns.length === 0) return "(no columns)";

  const widths = columns.map((col) => Math.min(col.length, MAX_WIDTH));
  for (const row of rows) {
    columns.forEach((col, i) => {
      widths[i] = Math.min(Math.max(widths[i] ?? 0, formatCell(row[col]).length), MAX_WIDTH);
    });
  }

  const pad = (text: string, i: number): string => {
    const width = widths[i] ?? 0;
    return text.length > width ? text.slice(0, width - 1) + "…" : text.padEnd(width);
  };

  const lines: string[] = [];
  lines.push(columns.map((col, i) => pad(col, i)).join(" | ").trimEnd());
  lines.push(widths.map((w) => "-".repeat(w)).join("-+-"));
  for (const row of rows) {
    lines.push(columns.map((col, i) => pad(formatCell(row[col]), i)).join(" | ").trimEnd());
  }

  return lines.join("\n");
}

export function formatCell(value: unknown): string {
  if (value === undefined) return "";
  if (value === null) return "null";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}
