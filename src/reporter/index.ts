/**
 * Whole-registry rendering.
 *
 * A reporter walks a read-only view of a registry and writes every metric
 * through an `Exporter`, one family at a time.
 */

import type { ExporterConfig } from '../config/index.js';
import { Exporter, type WriteOutcome } from '../export/index.js';
import { joinMetricName } from '../labels/index.js';
import { NoopLogger, createLogger, type Logger } from '../observability/index.js';
import { PrometheusTextWriter, type TextSink } from '../serialization/index.js';
import {
  counterSource,
  gaugeSource,
  histogramSource,
  meterSource,
  timerSource,
  type Counter,
  type Gauge,
  type Histogram,
  type Meter,
  type MetricSource,
  type Timer,
} from '../sources/index.js';

/**
 * Named metrics of one kind, as a `Map` or a plain record.
 */
export type NamedMetrics<T> = ReadonlyMap<string, T> | Readonly<Record<string, T>>;

/**
 * Read-only view of a registry's metrics, grouped by kind.
 */
export interface MetricSet {
  gauges?: NamedMetrics<Gauge>;
  counters?: NamedMetrics<Counter>;
  histograms?: NamedMetrics<Histogram>;
  meters?: NamedMetrics<Meter>;
  timers?: NamedMetrics<Timer>;
}

export interface ReportSummary {
  /** Families written */
  written: number;
  /** Gauges skipped for unsupported values */
  skipped: number;
  /** Per-metric outcomes in write order */
  outcomes: WriteOutcome[];
}

export interface ReporterOptions {
  /** Dot-separated namespace prepended to every name */
  prefix?: string;
  /** Write each kind in name order (default: true) */
  sortNames?: boolean;
  logger?: Logger;
}

function isMap<T>(metrics: NamedMetrics<T>): metrics is ReadonlyMap<string, T> {
  return metrics instanceof Map;
}

function entriesOf<T>(metrics: NamedMetrics<T> | undefined): Array<[string, T]> {
  if (metrics === undefined) {
    return [];
  }
  if (isMap(metrics)) {
    return [...metrics.entries()];
  }
  return Object.entries(metrics);
}

/**
 * Renders a `MetricSet` kind by kind: gauges, counters, histograms, meters,
 * then timers.
 */
export class MetricsReporter {
  private readonly prefix: string;
  private readonly sortNames: boolean;
  private readonly logger: Logger;

  constructor(options: ReporterOptions = {}) {
    this.prefix = options.prefix ?? '';
    this.sortNames = options.sortNames ?? true;
    this.logger = options.logger ?? new NoopLogger();
  }

  static fromConfig(config: ExporterConfig, logger?: Logger): MetricsReporter {
    return new MetricsReporter({
      prefix: config.prefix,
      sortNames: config.sortNames,
      logger: logger ?? createLogger(config.logLevel, { component: 'metrics-reporter' }),
    });
  }

  /**
   * Write every metric in `set` to `sink`.
   * Sink errors propagate and abort the report.
   */
  report(set: MetricSet, sink: TextSink): ReportSummary {
    const exporter = new Exporter(sink, { logger: this.logger });
    const sources: Array<[string, MetricSource]> = [
      ...this.named(set.gauges, gaugeSource),
      ...this.named(set.counters, counterSource),
      ...this.named(set.histograms, histogramSource),
      ...this.named(set.meters, meterSource),
      ...this.named(set.timers, timerSource),
    ];

    const outcomes = sources.map(([name, source]) => exporter.write(name, source));
    const skipped = outcomes.filter((o) => o.status === 'skipped').length;

    this.logger.debug('Metrics reported', {
      written: outcomes.length - skipped,
      skipped,
    });

    return { written: outcomes.length - skipped, skipped, outcomes };
  }

  /**
   * Render `set` as Prometheus text.
   */
  render(set: MetricSet): string {
    const writer = new PrometheusTextWriter();
    this.report(set, writer);
    return writer.toString();
  }

  private named<T>(
    metrics: NamedMetrics<T> | undefined,
    wrap: (metric: T) => MetricSource
  ): Array<[string, MetricSource]> {
    const entries = entriesOf(metrics);
    if (this.sortNames) {
      entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    }
    return entries.map(([name, metric]) => [joinMetricName(this.prefix, name), wrap(metric)]);
  }
}
