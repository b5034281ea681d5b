/**
 * Name utilities for Prometheus metrics.
 */

export { sanitizeMetricName, joinMetricName } from './sanitization.js';
