import type { TextSink } from '../serialization/index.js';
import type { Metered } from '../sources/index.js';
import { RATE_WINDOWS, type RateWindow } from '../types.js';

const RATE_READERS: Record<RateWindow, (m: Metered) => number> = {
  m1: (m) => m.getOneMinuteRate(),
  m5: (m) => m.getFiveMinuteRate(),
  m15: (m) => m.getFifteenMinuteRate(),
  mean: (m) => m.getMeanRate(),
};

export const RATE_SAMPLE_COUNT = RATE_WINDOWS.length;

/**
 * Appends the moving-average rates of `metered` to the family `name`.
 * Writes no HELP or TYPE line; the caller has already opened the family.
 *
 * @returns number of sample lines written
 */
export function encodeRates(sink: TextSink, name: string, metered: Metered): number {
  for (const rate of RATE_WINDOWS) {
    sink.writeSample(name, { rate }, RATE_READERS[rate](metered));
  }
  return RATE_SAMPLE_COUNT;
}
