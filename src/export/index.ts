/**
 * Registry metric export to Prometheus families.
 */

export { Exporter, readGaugeValue, type ExporterOptions, type WriteOutcome } from './exporter.js';
export { buildHelp } from './help.js';
export { encodeSnapshot, SNAPSHOT_SAMPLE_COUNT } from './snapshot-encoder.js';
export { encodeRates, RATE_SAMPLE_COUNT } from './rate-encoder.js';
