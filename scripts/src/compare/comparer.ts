import type { MetricMap, MetricName, Violation } from "lib/benchmark/types.js";

import { classifyMetric } from "./classifier.js";
import type { ThresholdRegistry } from "./registry.js";

export interface CompareMetricsOptions {
  /** Restrict evaluation to these names; defaults to the union of both maps' keys. */
  metricNames?: Iterable<MetricName>;
  ignoreImprovements?: boolean;
}

/** Violations for one set of metrics, ordered by metric name. */
export function compareMetrics(
  registry: ThresholdRegistry,
  baselineMetrics: MetricMap,
  candidateMetrics: MetricMap,
  options: CompareMetricsOptions = {}
): Violation[] {
  const ignoreImprovements = options.ignoreImprovements ?? false;
  const names = options.metricNames
    ? new Set(options.metricNames)
    : new Set([...Object.keys(baselineMetrics), ...Object.keys(candidateMetrics)]);

  const violations: Violation[] = [];
  for (const name of [...names].sort(compareNames)) {
    const violation = classifyMetric(
      registry,
      name,
      lookup(baselineMetrics, name),
      lookup(candidateMetrics, name),
      ignoreImprovements
    );
    if (violation) {
      violations.push(violation);
    }
  }
  return violations;
}

export function compareNames(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function lookup(metrics: MetricMap, name: MetricName): number | null {
  return Object.prototype.hasOwnProperty.call(metrics, name) ? metrics[name] ?? null : null;
}
