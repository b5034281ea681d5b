import type { MetricKind } from '../sources/index.js';

/**
 * HELP text for an imported registry metric. Uses the original, unsanitized
 * name so the registry metric can be traced from the scrape output.
 */
export function buildHelp(originalName: string, kind: MetricKind): string {
  return `Generated from registry metric import (metric=${originalName}, type=${kind})`;
}
