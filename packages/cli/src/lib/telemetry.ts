/**
 * Telemetry and observability helpers
 */

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format a metric line
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ") + "\n";
}

/**
 * Wrap a function with timing metrics, written through `emit` when it is given
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  emit?: (line: string) => void
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    if (emit) {
      emit(formatMetric(label, { duration_ms: Date.now() - start, success }));
    }
  }
}
