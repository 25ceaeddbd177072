/**
 * Telemetry and observability helpers
 */

export interface MetricsOptions {
  /** Metrics are written only when enabled (YAMI_CLI_DEBUG=1) */
  enabled: boolean;
  write: (line: string) => void;
}

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric line if metrics are enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>, options: MetricsOptions): void {
  if (!options.enabled) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  options.write(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  options: MetricsOptions
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(label, { duration_ms: duration, success }, options);
  }
}
