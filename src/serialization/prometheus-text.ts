import { OutputError } from '../errors/index.js';
import type { Labels, MetricType } from '../types.js';

/**
 * Emission capability the exporter writes through.
 *
 * Implementations may throw (for example on I/O failure); the exporter does
 * not catch these.
 */
export interface TextSink {
  writeHelp(name: string, help: string): void;
  writeType(name: string, type: MetricType): void;
  writeSample(name: string, labels: Labels, value: number): void;
}

/**
 * Receives one newline-terminated line at a time.
 */
export type LineWriter = (line: string) => void;

/**
 * Writes Prometheus text exposition format v0.0.4.
 * See: https://prometheus.io/docs/instrumenting/exposition_formats/
 *
 * Without a line writer, lines are buffered and read back with `toString()`.
 */
export class PrometheusTextWriter implements TextSink {
  private readonly lines: string[] = [];
  private readonly output: LineWriter;

  constructor(output?: LineWriter) {
    this.output = output ?? ((line) => this.lines.push(line));
  }

  writeHelp(name: string, help: string): void {
    this.emit(name, `# HELP ${name} ${escapeHelpText(help)}\n`);
  }

  writeType(name: string, type: MetricType): void {
    this.emit(name, `# TYPE ${name} ${type}\n`);
  }

  writeSample(name: string, labels: Labels, value: number): void {
    this.emit(name, `${name}${formatLabels(labels)} ${formatValue(value)}\n`);
  }

  /**
   * Buffered output; empty when a line writer was supplied.
   */
  toString(): string {
    return this.lines.join('');
  }

  private emit(name: string, line: string): void {
    try {
      this.output(line);
    } catch (error) {
      throw new OutputError(`Failed to write metric line for ${name}`, {
        metricName: name,
        cause: error,
      });
    }
  }
}

/**
 * Escape help text according to Prometheus format.
 * Backslashes and newlines must be escaped.
 */
export function escapeHelpText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

/**
 * Escape label value according to Prometheus format.
 * Backslashes, quotes, and newlines must be escaped.
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Format labels as Prometheus label string.
 * Returns empty string if no labels, otherwise returns {label1="value1",label2="value2"}
 */
export function formatLabels(labels: Labels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return '';
  }

  // Sort labels for consistent output
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const labelPairs = entries.map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return `{${labelPairs.join(',')}}`;
}

/**
 * Format a numeric value according to Prometheus format.
 * Handles NaN, +Inf, -Inf, and regular numbers.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }

  if (!Number.isFinite(value)) {
    return value > 0 ? '+Inf' : '-Inf';
  }

  return Object.is(value, -0) ? '0' : value.toString();
}
