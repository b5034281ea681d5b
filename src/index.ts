/**
 * Registry metrics to Prometheus text exposition format.
 *
 * Renders gauges, counters, histograms, meters and timers read from an
 * instrumentation registry as Prometheus metric families.
 */

// Re-export types
export * from './types.js';
export type {
  Gauge,
  Counting,
  Counter,
  Snapshot,
  Sampling,
  Metered,
  Histogram,
  Meter,
  Timer,
  MetricKind,
  MetricSource,
} from './sources/index.js';
export {
  gaugeSource,
  counterSource,
  histogramSource,
  meterSource,
  timerSource,
} from './sources/index.js';

// Re-export export components
export {
  Exporter,
  readGaugeValue,
  buildHelp,
  encodeSnapshot,
  encodeRates,
  SNAPSHOT_SAMPLE_COUNT,
  RATE_SAMPLE_COUNT,
  type ExporterOptions,
  type WriteOutcome,
} from './export/index.js';

// Re-export serialization components
export {
  PrometheusTextWriter,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatValue,
  type TextSink,
  type LineWriter,
} from './serialization/index.js';

// Re-export reporter
export {
  MetricsReporter,
  type MetricSet,
  type NamedMetrics,
  type ReportSummary,
  type ReporterOptions,
} from './reporter/index.js';

// Re-export configuration
export { ExporterConfig, ExporterConfigBuilder, type ExporterConfigOptions } from './config/index.js';

// Re-export logging
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  createLogger,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogContext,
} from './observability/index.js';

// Re-export error types
export {
  MetricsError,
  ConfigurationError,
  OutputError,
  isRetryableError,
  isMetricsError,
  getErrorCategory,
  formatError,
  type ErrorCategory,
} from './errors/index.js';

// Re-export name utilities
export { sanitizeMetricName, joinMetricName } from './labels/index.js';

// Re-export testing utilities
export {
  RecordingSink,
  FailingSink,
  staticGauge,
  fixedCounter,
  fixedSnapshot,
  fixedHistogram,
  fixedMeter,
  fixedTimer,
  type RecordedCall,
  type RecordedSample,
  type SnapshotValues,
  type RateValues,
} from './testing/index.js';
