/**
 * Fixed-value metric sources for tests.
 */

import type { Counter, Gauge, Histogram, Meter, Snapshot, Timer } from '../sources/index.js';

export interface SnapshotValues {
  median: number;
  p75: number;
  p95: number;
  p98: number;
  p99: number;
  p999: number;
  min: number;
  max: number;
  mean: number;
  stdDev: number;
}

export interface RateValues {
  m1: number;
  m5: number;
  m15: number;
  mean: number;
}

const ZERO_SNAPSHOT: SnapshotValues = {
  median: 0,
  p75: 0,
  p95: 0,
  p98: 0,
  p99: 0,
  p999: 0,
  min: 0,
  max: 0,
  mean: 0,
  stdDev: 0,
};

const ZERO_RATES: RateValues = { m1: 0, m5: 0, m15: 0, mean: 0 };

export function staticGauge<T>(value: T): Gauge<T> {
  return { getValue: () => value };
}

export function fixedCounter(count: number): Counter {
  return { getCount: () => count };
}

export function fixedSnapshot(values: Partial<SnapshotValues> = {}): Snapshot {
  const v = { ...ZERO_SNAPSHOT, ...values };
  return {
    median: () => v.median,
    p75: () => v.p75,
    p95: () => v.p95,
    p98: () => v.p98,
    p99: () => v.p99,
    p999: () => v.p999,
    min: () => v.min,
    max: () => v.max,
    mean: () => v.mean,
    stdDev: () => v.stdDev,
  };
}

export function fixedHistogram(count: number, values: Partial<SnapshotValues> = {}): Histogram {
  const snapshot = fixedSnapshot(values);
  return { getCount: () => count, getSnapshot: () => snapshot };
}

export function fixedMeter(count: number, rates: Partial<RateValues> = {}): Meter {
  const r = { ...ZERO_RATES, ...rates };
  return {
    getCount: () => count,
    getOneMinuteRate: () => r.m1,
    getFiveMinuteRate: () => r.m5,
    getFifteenMinuteRate: () => r.m15,
    getMeanRate: () => r.mean,
  };
}

export function fixedTimer(
  count: number,
  values: Partial<SnapshotValues> = {},
  rates: Partial<RateValues> = {}
): Timer {
  const snapshot = fixedSnapshot(values);
  return { ...fixedMeter(count, rates), getSnapshot: () => snapshot };
}
