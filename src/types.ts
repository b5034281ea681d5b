/**
 * Core type definitions for the registry-to-Prometheus exporter.
 *
 * Defines the Prometheus metric types and the fixed label sets used by the
 * summary and rate encodings.
 */

/**
 * Label types - key-value pairs for metric dimensions
 */
export type Labels = Record<string, string>;

/**
 * Prometheus metric types emitted by the exporter
 */
export enum MetricType {
  Gauge = 'gauge',
  Counter = 'counter',
  Summary = 'summary',
}

/**
 * Quantiles exported for every summary, in emission order.
 */
export const SUMMARY_QUANTILES = ['0.5', '0.75', '0.95', '0.98', '0.99', '0.999'] as const;

export type SummaryQuantile = (typeof SUMMARY_QUANTILES)[number];

/**
 * Summary attributes exported next to the quantiles, in emission order.
 */
export const SUMMARY_ATTRIBUTES = ['min', 'max', 'median', 'mean', 'stddev'] as const;

export type SummaryAttribute = (typeof SUMMARY_ATTRIBUTES)[number];

/**
 * Moving-average rate windows exported for timers, in emission order.
 */
export const RATE_WINDOWS = ['m1', 'm5', 'm15', 'mean'] as const;

export type RateWindow = (typeof RATE_WINDOWS)[number];

/** Suffix appended to meter names. */
export const METER_SUFFIX = '_total';

/** Suffix of the total-count sample that closes every summary. */
export const COUNT_SUFFIX = '_count';

/** Converts nanosecond timer digests to seconds. */
export const NANOSECONDS_TO_SECONDS = 1 / 1e9;
