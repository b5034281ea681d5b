/**
 * Metric name sanitization for Prometheus output.
 */

const INVALID_NAME_CHARS = /[^a-zA-Z0-9:_]/g;

/**
 * Replaces every character outside `[a-zA-Z0-9:_]` with an underscore.
 *
 * The replacement is one-for-one on UTF-16 code units: runs of invalid
 * characters are not collapsed and nothing is trimmed or prefixed, so the
 * result always has the same length as the input.
 *
 * @example
 * ```typescript
 * sanitizeMetricName('my.gauge!')          // 'my_gauge_'
 * sanitizeMetricName('http--requests')     // 'http__requests'
 * sanitizeMetricName('jvm:heap_used')      // 'jvm:heap_used'
 * ```
 */
export function sanitizeMetricName(name: string): string {
  return name.replace(INVALID_NAME_CHARS, '_');
}

/**
 * Joins a registry prefix and a metric name the way registry names are
 * composed (dot-separated), skipping empty parts. The result is not
 * sanitized.
 *
 * @example
 * ```typescript
 * joinMetricName('app', 'db.pool.size')   // 'app.db.pool.size'
 * joinMetricName('', 'requests')          // 'requests'
 * ```
 */
export function joinMetricName(prefix: string, name: string): string {
  return [prefix, name].filter((part) => part.length > 0).join('.');
}
