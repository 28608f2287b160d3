import type { MetricName, MetricRule, ThresholdConfigEntry } from "lib/benchmark/types.js";

/**
 * Immutable lookup of per-metric threshold rules. Names match exactly; no
 * case folding or trimming is applied.
 */
export class ThresholdRegistry {
  private readonly rules: ReadonlyMap<MetricName, MetricRule>;

  constructor(rules: Iterable<readonly [MetricName, MetricRule]> = []) {
    this.rules = new Map(rules);
  }

  static empty(): ThresholdRegistry {
    return new ThresholdRegistry();
  }

  static fromConfig(entries: Record<MetricName, ThresholdConfigEntry>): ThresholdRegistry {
    return new ThresholdRegistry(
      Object.entries(entries).map(([name, entry]) => [name, toMetricRule(entry)] as const)
    );
  }

  getRule(metricName: MetricName): MetricRule | null {
    return this.rules.get(metricName) ?? null;
  }

  hasRule(metricName: MetricName): boolean {
    return this.rules.has(metricName);
  }

  allMetricNames(): ReadonlySet<MetricName> {
    return new Set(this.rules.keys());
  }

  get size(): number {
    return this.rules.size;
  }
}

export function toMetricRule(entry: ThresholdConfigEntry): MetricRule {
  return {
    ...(entry.max_increase_percent !== undefined ? { percentCap: entry.max_increase_percent } : {}),
    ...(entry.max_increase_absolute !== undefined ? { absoluteCap: entry.max_increase_absolute } : {}),
    severityHint: entry.severity ?? "medium"
  };
}
