import { describe, expect, it, vi } from "vitest";

import { Severity } from "lib/benchmark/types.js";
import type { RunSnapshot } from "lib/benchmark/types.js";

import { classifyMetric, classifySeverity, excessRatio } from "../src/compare/classifier.js";
import { compareMetrics } from "../src/compare/comparer.js";
import * as compareApi from "../src/compare/index.js";
import { computeDelta } from "../src/compare/delta.js";
import { buildModelComparison, comparePipeline, generateSummary, toRunSnapshot } from "../src/compare/pipeline.js";
import { ThresholdRegistry, toMetricRule } from "../src/compare/registry.js";
import { MalformedSnapshotError } from "../src/errors.js";
import { toJsonReport } from "../src/report/comparison.js";

const registry = ThresholdRegistry.fromConfig({
  bytes_scanned: { max_increase_percent: 20, severity: "medium" },
  execution_time_ms: { max_increase_percent: 10, severity: "high" },
  spilling_to_remote_storage_bytes: { max_increase_absolute: 0, severity: "high" },
  join_count: { max_increase_absolute: 10, severity: "high" },
  rows_scanned: { max_increase_percent: 20, max_increase_absolute: 100, severity: "low" },
  total_warehouse_credits: { max_increase_percent: 15, severity: "critical" }
});

function snapshot(
  perModel: RunSnapshot["perModel"],
  pipelineAggregations: RunSnapshot["pipelineAggregations"] = {},
  capturedAt = "20240101_000000"
): RunSnapshot {
  return { pipeline: "A", capturedAt, perModel, pipelineAggregations };
}

describe("ThresholdRegistry", () => {
  it("maps config entries to rules and defaults the severity to medium", () => {
    const custom = ThresholdRegistry.fromConfig({
      bytes_scanned: { max_increase_percent: 20 },
      join_count: { max_increase_absolute: 2, severity: "low" }
    });

    expect(custom.getRule("bytes_scanned")).toEqual({ percentCap: 20, severityHint: "medium" });
    expect(custom.getRule("join_count")).toEqual({ absoluteCap: 2, severityHint: "low" });
    expect(custom.size).toBe(2);
  });

  it("matches metric names exactly", () => {
    expect(registry.hasRule("bytes_scanned")).toBe(true);
    expect(registry.hasRule("BYTES_SCANNED")).toBe(false);
    expect(registry.getRule(" bytes_scanned")).toBeNull();
  });

  it("lists every configured metric name", () => {
    expect(registry.allMetricNames()).toEqual(
      new Set([
        "bytes_scanned",
        "execution_time_ms",
        "spilling_to_remote_storage_bytes",
        "join_count",
        "rows_scanned",
        "total_warehouse_credits"
      ])
    );
    expect(ThresholdRegistry.empty().allMetricNames().size).toBe(0);
  });

  it("keeps both caps when both are configured", () => {
    expect(toMetricRule({ max_increase_percent: 5, max_increase_absolute: 50, severity: "high" })).toEqual({
      percentCap: 5,
      absoluteCap: 50,
      severityHint: "high"
    });
  });
});

describe("computeDelta", () => {
  it("returns absolute and percent change", () => {
    expect(computeDelta(100, 150)).toEqual({ absoluteDelta: 50, percentDelta: 50 });
    expect(computeDelta(200, 100)).toEqual({ absoluteDelta: -100, percentDelta: -50 });
  });

  it("treats a zero baseline as zero or unbounded change", () => {
    expect(computeDelta(0, 0)).toEqual({ absoluteDelta: 0, percentDelta: 0 });
    expect(computeDelta(0, 5)).toEqual({ absoluteDelta: 5, percentDelta: Number.POSITIVE_INFINITY });
    expect(computeDelta(0, -5)).toEqual({ absoluteDelta: -5, percentDelta: Number.NEGATIVE_INFINITY });
  });

  it("yields no delta when either side is missing", () => {
    expect(computeDelta(null, 5)).toEqual({ absoluteDelta: null, percentDelta: null });
    expect(computeDelta(5, undefined)).toEqual({ absoluteDelta: null, percentDelta: null });
  });
});

describe("classifySeverity", () => {
  it("maps hints to severities", () => {
    expect(classifySeverity("low", 30, 20)).toBe(Severity.WARNING);
    expect(classifySeverity("medium", 300, 20)).toBe(Severity.WARNING);
    expect(classifySeverity("critical", 21, 20)).toBe(Severity.ERROR);
  });

  it("escalates high only when the excess is more than half the threshold", () => {
    expect(excessRatio(15, 10)).toBe(0.5);
    expect(classifySeverity("high", 15, 10)).toBe(Severity.WARNING);
    expect(classifySeverity("high", 16, 10)).toBe(Severity.ERROR);
    expect(excessRatio(1, 0)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("classifyMetric", () => {
  it("ignores metrics without a rule", () => {
    expect(classifyMetric(registry, "unknown_metric", 1, 1000, false)).toBeNull();
  });

  it("flags a percent regression above the cap", () => {
    expect(classifyMetric(registry, "bytes_scanned", 1000, 1250, false)).toEqual({
      metricName: "bytes_scanned",
      baselineValue: 1000,
      candidateValue: 1250,
      absoluteDelta: 250,
      percentDelta: 25,
      thresholdValue: 20,
      thresholdKind: "percent",
      severity: Severity.WARNING,
      isImprovement: false
    });
  });

  it("does not flag a change equal to the cap", () => {
    expect(classifyMetric(registry, "bytes_scanned", 1000, 1200, false)).toBeNull();
  });

  it("flags any amount past the cap", () => {
    expect(classifyMetric(registry, "execution_time_ms", 100, 110, false)).toBeNull();
    const violation = classifyMetric(registry, "execution_time_ms", 100, 110.0001, false);
    expect(violation?.thresholdKind).toBe("percent");
    expect(violation?.severity).toBe(Severity.WARNING);
  });

  it("uses the absolute cap when the percent cap does not fire", () => {
    const violation = classifyMetric(registry, "rows_scanned", 1000, 1150, false);
    expect(violation?.thresholdKind).toBe("absolute");
    expect(violation?.thresholdValue).toBe(100);
    expect(violation?.absoluteDelta).toBe(150);
  });

  it("reports only the percent violation when both caps are exceeded", () => {
    const violation = classifyMetric(registry, "rows_scanned", 1000, 1500, false);
    expect(violation?.thresholdKind).toBe("percent");
    expect(violation?.thresholdValue).toBe(20);
  });

  it("classifies high regressions by how far they overshoot", () => {
    expect(classifyMetric(registry, "join_count", 0, 15, false)?.severity).toBe(Severity.WARNING);
    expect(classifyMetric(registry, "join_count", 0, 16, false)?.severity).toBe(Severity.ERROR);
    expect(classifyMetric(registry, "spilling_to_remote_storage_bytes", 0, 1, false)?.severity).toBe(Severity.ERROR);
  });

  it("escalates a high percent regression that doubles its cap", () => {
    expect(classifyMetric(registry, "execution_time_ms", 100, 112, false)?.severity).toBe(Severity.WARNING);
    expect(classifyMetric(registry, "execution_time_ms", 100, 120, false)?.severity).toBe(Severity.ERROR);
  });

  it("treats growth from a zero baseline as an unbounded percent change", () => {
    const violation = classifyMetric(registry, "bytes_scanned", 0, 5, false);
    expect(violation?.percentDelta).toBe(Number.POSITIVE_INFINITY);
    expect(violation?.severity).toBe(Severity.WARNING);
  });

  it("reports large improvements as INFO unless they are ignored", () => {
    const violation = classifyMetric(registry, "bytes_scanned", 1000, 700, false);
    expect(violation?.isImprovement).toBe(true);
    expect(violation?.severity).toBe(Severity.INFO);
    expect(violation?.percentDelta).toBeCloseTo(-30);

    expect(classifyMetric(registry, "bytes_scanned", 1000, 700, true)).toBeNull();
    expect(classifyMetric(registry, "bytes_scanned", 1000, 900, false)).toBeNull();
  });

  it("skips missing values", () => {
    expect(classifyMetric(registry, "bytes_scanned", 1000, null, false)).toBeNull();
    expect(classifyMetric(registry, "bytes_scanned", undefined, 1000, false)).toBeNull();
  });
});

describe("compareMetrics", () => {
  it("orders violations by metric name", () => {
    const violations = compareMetrics(
      registry,
      { execution_time_ms: 100, bytes_scanned: 1000 },
      { execution_time_ms: 200, bytes_scanned: 2000 }
    );
    expect(violations.map((violation) => violation.metricName)).toEqual(["bytes_scanned", "execution_time_ms"]);
  });

  it("restricts evaluation to the requested names", () => {
    const violations = compareMetrics(
      registry,
      { execution_time_ms: 100, bytes_scanned: 1000 },
      { execution_time_ms: 200, bytes_scanned: 2000 },
      { metricNames: ["execution_time_ms"] }
    );
    expect(violations).toHaveLength(1);
    expect(violations[0]?.metricName).toBe("execution_time_ms");
  });
});

describe("comparePipeline", () => {
  const baseline = snapshot(
    {
      model_a: { bytes_scanned: 1000, execution_time_ms: 500 },
      model_b: { execution_time_ms: 100, legacy_metric: 3 }
    },
    { total_warehouse_credits: 1 }
  );
  const candidate = snapshot(
    {
      model_a: { bytes_scanned: 1250, execution_time_ms: 500 },
      model_b: { execution_time_ms: 100, new_metric: 4 },
      model_c: { execution_time_ms: 10 }
    },
    { total_warehouse_credits: 1 },
    "20240102_000000"
  );

  it("reports a single warning for one regressed model", () => {
    const comparison = comparePipeline(registry, baseline, candidate);

    expect([...comparison.modelComparisons.keys()]).toEqual(["model_a", "model_b", "model_c"]);
    expect(comparison.allViolations()).toHaveLength(1);
    expect(comparison.modelComparisons.get("model_a")?.maxSeverity).toBe(Severity.WARNING);
    expect(comparison.countsBySeverity()).toEqual({ INFO: 0, WARNING: 1, ERROR: 0 });
    expect(generateSummary(comparison)).toEqual({ status: "WARNING", exitCode: 1 });
    expect(comparison.pipelineName).toBe("A");
    expect(comparison.baselineTimestamp).toBe("20240101_000000");
    expect(comparison.candidateTimestamp).toBe("20240102_000000");
  });

  it("warns once when only one of two high rules is crossed", () => {
    const highRules = ThresholdRegistry.fromConfig({
      execution_time_ms: { max_increase_percent: 10, severity: "high" },
      bytes_scanned: { max_increase_percent: 20, severity: "high" }
    });
    const comparison = comparePipeline(
      highRules,
      snapshot({ model_a: { execution_time_ms: 100, bytes_scanned: 1000 } }),
      snapshot({ model_a: { execution_time_ms: 108, bytes_scanned: 1250 } })
    );

    expect(comparison.allViolations().map((violation) => [violation.metricName, violation.severity])).toEqual([
      ["bytes_scanned", Severity.WARNING]
    ]);
    expect(generateSummary(comparison)).toEqual({ status: "WARNING", exitCode: 1 });
  });

  it("keeps its own copy of the compared metrics", () => {
    const baselineMetrics = { bytes_scanned: 1000 };
    const candidateMetrics = { bytes_scanned: 1250 };
    const comparison = buildModelComparison(registry, "model_a", baselineMetrics, candidateMetrics);

    baselineMetrics.bytes_scanned = 1;
    candidateMetrics.bytes_scanned = 2;

    expect(comparison.baselineMetrics).toEqual({ bytes_scanned: 1000 });
    expect(comparison.candidateMetrics).toEqual({ bytes_scanned: 1250 });
    expect(comparison.violations).toHaveLength(1);
  });

  it("records one-sided metrics without classifying them", () => {
    const comparison = comparePipeline(registry, baseline, candidate);
    const modelB = comparison.modelComparisons.get("model_b");
    const modelC = comparison.modelComparisons.get("model_c");

    expect([...(modelB?.metricsOnlyInBaseline ?? [])]).toEqual(["legacy_metric"]);
    expect([...(modelB?.metricsOnlyInCandidate ?? [])]).toEqual(["new_metric"]);
    expect(modelC?.violations).toEqual([]);
    expect([...(modelC?.metricsOnlyInCandidate ?? [])]).toEqual(["execution_time_ms"]);
  });

  it("exits with 2 when a critical pipeline metric regresses", () => {
    const regressed = snapshot(candidate.perModel, { total_warehouse_credits: 2 });
    const comparison = comparePipeline(registry, baseline, regressed);

    expect(comparison.pipelineLevelViolations).toHaveLength(1);
    expect(comparison.pipelineLevelViolations[0]?.severity).toBe(Severity.ERROR);
    expect(generateSummary(comparison)).toEqual({ status: "ERROR", exitCode: 2 });
  });

  it("passes when nothing changed", () => {
    const comparison = comparePipeline(registry, baseline, baseline);
    expect(comparison.allViolations()).toEqual([]);
    expect(generateSummary(comparison)).toEqual({ status: "PASS", exitCode: 0 });
  });

  it("produces identical output for identical input", () => {
    const first = toJsonReport(comparePipeline(registry, baseline, candidate));
    const second = toJsonReport(comparePipeline(registry, baseline, candidate));
    expect(second).toEqual(first);
  });

  it("drops improvements when asked to", () => {
    const improved = snapshot({ model_a: { bytes_scanned: 700, execution_time_ms: 500 } });
    const withImprovements = comparePipeline(registry, baseline, improved);
    const without = comparePipeline(registry, baseline, improved, { ignoreImprovements: true });

    expect(withImprovements.countsBySeverity()).toEqual({ INFO: 1, WARNING: 0, ERROR: 0 });
    expect(generateSummary(withImprovements)).toEqual({ status: "PASS", exitCode: 0 });
    expect(without.allViolations()).toEqual([]);
  });

  it("notifies the observer of every model and violation", () => {
    const onModelCompared = vi.fn();
    const onViolation = vi.fn();
    comparePipeline(registry, baseline, candidate, { observer: { onModelCompared, onViolation } });

    expect(onModelCompared).toHaveBeenCalledTimes(3);
    expect(onViolation).toHaveBeenCalledTimes(1);
    expect(onViolation.mock.calls[0]?.[1]).toBe("model_a");
  });

  it("compares missing snapshots as empty runs", () => {
    const comparison = comparePipeline(registry, toRunSnapshot(null), toRunSnapshot(undefined));
    expect(comparison.pipelineName).toBe("unknown");
    expect(comparison.baselineTimestamp).toBe("unknown");
    expect(comparison.modelComparisons.size).toBe(0);
    expect(generateSummary(comparison).exitCode).toBe(0);
  });
});

describe("toRunSnapshot", () => {
  it("reads the comparable fields of a stored document", () => {
    const run = toRunSnapshot({
      pipeline: "B",
      captured_at: "20240301_120000",
      per_model: { m: { execution_time_ms: 10, bytes_scanned: null } },
      pipeline_aggregations: { model_count: 1 },
      summary: { status: "SUCCESS", errors: [] }
    });
    expect(run).toEqual({
      pipeline: "B",
      capturedAt: "20240301_120000",
      perModel: { m: { execution_time_ms: 10, bytes_scanned: null } },
      pipelineAggregations: { model_count: 1 }
    });
  });

  it("rejects a metric value that is not a number", () => {
    const read = () => toRunSnapshot({ per_model: { m: { execution_time_ms: "fast" } } });
    expect(read).toThrow(MalformedSnapshotError);
    expect(read).toThrow("Malformed snapshot at snapshot.per_model.m.execution_time_ms: expected number, received string");
  });

  it("rejects a metric container that is not an object", () => {
    expect(() => toRunSnapshot({ per_model: [] }, "baseline")).toThrow(
      "Malformed snapshot at baseline.per_model: expected object, received array"
    );
  });
});

describe("compare entry point", () => {
  it("exposes the comparison operations and keeps severity helpers internal", () => {
    expect(Object.keys(compareApi).sort()).toEqual([
      "HIGH_SEVERITY_EXCESS_RATIO",
      "ThresholdRegistry",
      "UNKNOWN",
      "buildModelComparison",
      "classifyMetric",
      "classifySeverity",
      "compareMetrics",
      "comparePipeline",
      "computeDelta",
      "excessRatio",
      "generateSummary",
      "severityName",
      "toMetricRule",
      "toRunSnapshot"
    ]);
  });
});
