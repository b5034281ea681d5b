/**
 * Testing utilities for the exporter.
 * Provides recording sinks and fixed-value metric sources.
 */

export {
  RecordingSink,
  FailingSink,
  type RecordedCall,
  type RecordedSample,
} from './recording-sink.js';

export {
  staticGauge,
  fixedCounter,
  fixedSnapshot,
  fixedHistogram,
  fixedMeter,
  fixedTimer,
  type SnapshotValues,
  type RateValues,
} from './fixtures.js';
