/**
 * Prometheus text format output.
 */

export {
  PrometheusTextWriter,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatValue,
  type TextSink,
  type LineWriter,
} from './prometheus-text.js';
