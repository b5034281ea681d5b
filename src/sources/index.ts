/**
 * Read-only capabilities the exporter consumes from an instrumentation
 * registry. The registry owns and updates these objects; the exporter only
 * reads a point-in-time view of them during a write call.
 */

/**
 * Metric exposing an instantaneous current value.
 *
 * The value may be of any type; only numbers, bigints and booleans can be
 * exported.
 */
export interface Gauge<T = unknown> {
  getValue(): T;
}

/**
 * Metric exposing a monotonically non-decreasing total count.
 */
export interface Counting {
  getCount(): number;
}

/**
 * Immutable statistical digest of sampled values.
 */
export interface Snapshot {
  median(): number;
  p75(): number;
  p95(): number;
  p98(): number;
  p99(): number;
  p999(): number;
  min(): number;
  max(): number;
  mean(): number;
  stdDev(): number;
}

/**
 * Metric exposing a digest of its recorded values.
 */
export interface Sampling {
  getSnapshot(): Snapshot;
}

/**
 * Moving-average event rates, already expressed in events per second.
 */
export interface Metered extends Counting {
  getOneMinuteRate(): number;
  getFiveMinuteRate(): number;
  getFifteenMinuteRate(): number;
  getMeanRate(): number;
}

export type Counter = Counting;

export interface Histogram extends Counting, Sampling {}

export type Meter = Metered;

/**
 * Timer digests are recorded in nanoseconds.
 */
export interface Timer extends Metered, Sampling {}

/**
 * Closed set of metric kinds known to the exporter.
 */
export type MetricKind = 'gauge' | 'counter' | 'histogram' | 'meter' | 'timer';

/**
 * Tagged union over every exportable metric kind.
 */
export type MetricSource =
  | { kind: 'gauge'; metric: Gauge }
  | { kind: 'counter'; metric: Counter }
  | { kind: 'histogram'; metric: Histogram }
  | { kind: 'meter'; metric: Meter }
  | { kind: 'timer'; metric: Timer };

export const gaugeSource = (metric: Gauge): MetricSource => ({ kind: 'gauge', metric });
export const counterSource = (metric: Counter): MetricSource => ({ kind: 'counter', metric });
export const histogramSource = (metric: Histogram): MetricSource => ({ kind: 'histogram', metric });
export const meterSource = (metric: Meter): MetricSource => ({ kind: 'meter', metric });
export const timerSource = (metric: Timer): MetricSource => ({ kind: 'timer', metric });
