import { sanitizeMetricName } from '../labels/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { TextSink } from '../serialization/index.js';
import type { Counter, Gauge, Histogram, Meter, MetricSource, Timer } from '../sources/index.js';
import { METER_SUFFIX, MetricType, NANOSECONDS_TO_SECONDS } from '../types.js';
import { buildHelp } from './help.js';
import { encodeRates } from './rate-encoder.js';
import { encodeSnapshot } from './snapshot-encoder.js';

/**
 * Result of writing one metric.
 */
export type WriteOutcome =
  | {
      status: 'written';
      /** Emitted family name */
      name: string;
      type: MetricType;
      /** Number of sample lines written */
      samples: number;
    }
  | {
      status: 'skipped';
      /** Emitted family name had the metric been written */
      name: string;
      reason: string;
    };

export interface ExporterOptions {
  /** Receives a warning for every skipped gauge (default: NoopLogger) */
  logger?: Logger;
}

type GaugeReading = { ok: true; value: number } | { ok: false; valueType: string };

/**
 * Converts a gauge value to a sample value.
 * Numbers and bigints are numeric; booleans map to 1 and 0.
 */
export function readGaugeValue(value: unknown): GaugeReading {
  switch (typeof value) {
    case 'number':
      return { ok: true, value };
    case 'bigint':
      return { ok: true, value: Number(value) };
    case 'boolean':
      return { ok: true, value: value ? 1 : 0 };
    case 'object':
      if (value === null) {
        return { ok: false, valueType: 'null' };
      }
      return { ok: false, valueType: value.constructor?.name ?? 'object' };
    default:
      return { ok: false, valueType: typeof value };
  }
}

/**
 * Writes registry metrics to a text sink as Prometheus metric families.
 *
 * | Registry kind | Prometheus family                                   |
 * |---------------|-----------------------------------------------------|
 * | gauge         | `gauge`, one sample                                 |
 * | counter       | `gauge`, one sample holding the running total       |
 * | meter         | `counter` named `<name>_total`                      |
 * | histogram     | `summary` + `_count`                                |
 * | timer         | `summary` (quantiles in seconds) + `_count` + rates |
 *
 * Errors thrown by the sink propagate unchanged; the rest of that metric is
 * not written.
 */
export class Exporter {
  private readonly logger: Logger;

  constructor(
    private readonly sink: TextSink,
    options: ExporterOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Write any metric kind.
   */
  write(name: string, source: MetricSource): WriteOutcome {
    switch (source.kind) {
      case 'gauge':
        return this.writeGauge(name, source.metric);
      case 'counter':
        return this.writeCounter(name, source.metric);
      case 'histogram':
        return this.writeHistogram(name, source.metric);
      case 'meter':
        return this.writeMeter(name, source.metric);
      case 'timer':
        return this.writeTimer(name, source.metric);
      default: {
        const unknownKind: never = source;
        throw new TypeError(`Unknown metric source: ${JSON.stringify(unknownKind)}`);
      }
    }
  }

  /**
   * Write a gauge. Values other than numbers, bigints and booleans are
   * skipped: nothing is written and a warning is logged.
   */
  writeGauge(name: string, gauge: Gauge): WriteOutcome {
    const sanitized = sanitizeMetricName(name);
    const reading = readGaugeValue(gauge.getValue());

    if (!reading.ok) {
      this.logger.warn('Invalid type for gauge', { metric: name, valueType: reading.valueType });
      return {
        status: 'skipped',
        name: sanitized,
        reason: `unsupported gauge value type: ${reading.valueType}`,
      };
    }

    this.sink.writeHelp(sanitized, buildHelp(name, 'gauge'));
    this.sink.writeType(sanitized, MetricType.Gauge);
    this.sink.writeSample(sanitized, {}, reading.value);
    return { status: 'written', name: sanitized, type: MetricType.Gauge, samples: 1 };
  }

  /**
   * Export counter as a Prometheus gauge: the running total is reported as
   * an instantaneous value.
   */
  writeCounter(name: string, counter: Counter): WriteOutcome {
    const sanitized = sanitizeMetricName(name);
    this.sink.writeHelp(sanitized, buildHelp(name, 'counter'));
    this.sink.writeType(sanitized, MetricType.Gauge);
    this.sink.writeSample(sanitized, {}, counter.getCount());
    return { status: 'written', name: sanitized, type: MetricType.Gauge, samples: 1 };
  }

  /**
   * Export a histogram snapshot as a Prometheus summary.
   */
  writeHistogram(name: string, histogram: Histogram): WriteOutcome {
    const sanitized = sanitizeMetricName(name);
    const samples = encodeSnapshot(
      this.sink,
      sanitized,
      histogram.getSnapshot(),
      histogram.getCount(),
      1.0,
      MetricType.Summary,
      buildHelp(name, 'histogram')
    );
    return { status: 'written', name: sanitized, type: MetricType.Summary, samples };
  }

  /**
   * Export a meter as a Prometheus counter named `<name>_total`.
   * Rates are not exported.
   */
  writeMeter(name: string, meter: Meter): WriteOutcome {
    const sanitized = sanitizeMetricName(name) + METER_SUFFIX;
    this.sink.writeHelp(sanitized, buildHelp(name, 'meter'));
    this.sink.writeType(sanitized, MetricType.Counter);
    this.sink.writeSample(sanitized, {}, meter.getCount());
    return { status: 'written', name: sanitized, type: MetricType.Counter, samples: 1 };
  }

  /**
   * Export a timer as a Prometheus summary followed by its rates.
   * Quantiles are converted from nanoseconds to seconds.
   */
  writeTimer(name: string, timer: Timer): WriteOutcome {
    const sanitized = sanitizeMetricName(name);
    let samples = encodeSnapshot(
      this.sink,
      sanitized,
      timer.getSnapshot(),
      timer.getCount(),
      NANOSECONDS_TO_SECONDS,
      MetricType.Summary,
      buildHelp(name, 'timer')
    );
    samples += encodeRates(this.sink, sanitized, timer);
    return { status: 'written', name: sanitized, type: MetricType.Summary, samples };
  }
}
