import type { TextSink } from '../serialization/index.js';
import type { Snapshot } from '../sources/index.js';
import {
  COUNT_SUFFIX,
  SUMMARY_ATTRIBUTES,
  SUMMARY_QUANTILES,
  type MetricType,
  type SummaryAttribute,
  type SummaryQuantile,
} from '../types.js';

const QUANTILE_READERS: Record<SummaryQuantile, (s: Snapshot) => number> = {
  '0.5': (s) => s.median(),
  '0.75': (s) => s.p75(),
  '0.95': (s) => s.p95(),
  '0.98': (s) => s.p98(),
  '0.99': (s) => s.p99(),
  '0.999': (s) => s.p999(),
};

const ATTRIBUTE_READERS: Record<SummaryAttribute, (s: Snapshot) => number> = {
  min: (s) => s.min(),
  max: (s) => s.max(),
  median: (s) => s.median(),
  mean: (s) => s.mean(),
  stddev: (s) => s.stdDev(),
};

/** Sample lines written per snapshot: quantiles, attributes and `_count`. */
export const SNAPSHOT_SAMPLE_COUNT = SUMMARY_QUANTILES.length + SUMMARY_ATTRIBUTES.length + 1;

/**
 * Writes a snapshot as a summary family followed by its total count.
 *
 * `factor` scales the quantile samples only. The min/max/median/mean/stddev
 * attributes and the count are written as the snapshot reports them.
 *
 * @param name - already sanitized family name
 * @returns number of sample lines written
 */
export function encodeSnapshot(
  sink: TextSink,
  name: string,
  snapshot: Snapshot,
  count: number,
  factor: number,
  type: MetricType,
  help: string
): number {
  sink.writeHelp(name, help);
  sink.writeType(name, type);

  for (const quantile of SUMMARY_QUANTILES) {
    sink.writeSample(name, { quantile }, QUANTILE_READERS[quantile](snapshot) * factor);
  }

  // unscaled, unlike the quantiles above
  for (const attr of SUMMARY_ATTRIBUTES) {
    sink.writeSample(name, { attr }, ATTRIBUTE_READERS[attr](snapshot));
  }

  sink.writeSample(name + COUNT_SUFFIX, {}, count);
  return SNAPSHOT_SAMPLE_COUNT;
}
