/**
 * Signpost counts
 *
 * The OS reports app-defined signposts per window. Counters the app emits
 * under its metrics category are named after the Metric they count.
 */

import { isMetric } from './metric.js';
import type { RecordedMetrics, SystemPayload } from './types.js';

export const DEFAULT_SIGNPOST_CATEGORY = 'Metrics';

/**
 * Total count per signpost name within one category.
 * Repeated names are summed.
 */
export function collectSignpostCounts(
  payload: Pick<SystemPayload, 'signpostMetrics'>,
  category: string = DEFAULT_SIGNPOST_CATEGORY
): Map<string, number> {
  const counts = new Map<string, number>();

  for (const signpost of payload.signpostMetrics ?? []) {
    if (signpost.signpostCategory !== category) continue;
    counts.set(signpost.signpostName, (counts.get(signpost.signpostName) ?? 0) + signpost.totalCount);
  }

  return counts;
}

/**
 * Recorded metrics derived from signposts; unknown names are ignored
 */
export function recordedMetricsFromSignposts(
  payload: Pick<SystemPayload, 'signpostMetrics'>,
  category: string = DEFAULT_SIGNPOST_CATEGORY
): RecordedMetrics {
  const recorded: RecordedMetrics = {};

  for (const [name, count] of collectSignpostCounts(payload, category)) {
    if (isMetric(name)) {
      recorded[name] = count;
    }
  }

  return recorded;
}
