import type { Delta, MetricSample } from "lib/benchmark/types.js";

const ABSENT: Delta = { absoluteDelta: null, percentDelta: null };

/**
 * Absolute and percentage change from baseline to candidate.
 *
 * A zero baseline yields 0 when the candidate is also zero, otherwise a signed
 * infinity: a metric appearing from nothing is an unbounded change.
 */
export function computeDelta(baseline: MetricSample, candidate: MetricSample): Delta {
  if (baseline === null || baseline === undefined || candidate === null || candidate === undefined) {
    return ABSENT;
  }

  const absoluteDelta = candidate - baseline;

  let percentDelta: number;
  if (baseline !== 0) {
    percentDelta = (absoluteDelta / baseline) * 100;
  } else if (candidate === 0) {
    percentDelta = 0;
  } else {
    percentDelta = candidate > 0 ? Number.POSITIVE_INFINITY : Number.NEGATIVE_INFINITY;
  }

  return { absoluteDelta, percentDelta };
}
