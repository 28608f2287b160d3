import { Severity, SEVERITY_NAMES } from "lib/benchmark/types.js";
import type {
  ComparisonStatus,
  ComparisonSummary,
  MetricMap,
  MetricName,
  ModelComparison,
  PipelineComparison,
  RunSnapshot,
  SeverityCounts,
  SeverityName,
  UnitName,
  Violation
} from "lib/benchmark/types.js";

import { MalformedSnapshotError } from "../errors.js";
import { compareMetrics, compareNames } from "./comparer.js";
import type { ThresholdRegistry } from "./registry.js";

export const UNKNOWN = "unknown";

export interface ComparisonObserver {
  onModelCompared?(comparison: ModelComparison): void;
  onViolation?(violation: Violation, scope: UnitName | null): void;
}

export interface ComparePipelineOptions {
  ignoreImprovements?: boolean;
  observer?: ComparisonObserver;
}

const STATUS_BY_SEVERITY: Record<Severity, ComparisonSummary> = {
  [Severity.INFO]: { status: "PASS", exitCode: 0 },
  [Severity.WARNING]: { status: "WARNING", exitCode: 1 },
  [Severity.ERROR]: { status: "ERROR", exitCode: 2 }
};

/**
 * Compare two run snapshots unit by unit and at the pipeline level.
 *
 * Only metrics present on both sides of a unit are classified; metrics that
 * appear on one side only are recorded but never become violations. Units are
 * ordered by name so repeated runs over identical input produce identical
 * output.
 */
export function comparePipeline(
  registry: ThresholdRegistry,
  baseline: RunSnapshot,
  candidate: RunSnapshot,
  options: ComparePipelineOptions = {}
): PipelineComparison {
  const ignoreImprovements = options.ignoreImprovements ?? false;
  const observer = options.observer;

  const unitNames = new Set([...Object.keys(baseline.perModel), ...Object.keys(candidate.perModel)]);
  const modelComparisons = new Map<UnitName, ModelComparison>();

  for (const unitName of [...unitNames].sort(compareNames)) {
    const comparison = buildModelComparison(
      registry,
      unitName,
      baseline.perModel[unitName] ?? {},
      candidate.perModel[unitName] ?? {},
      ignoreImprovements
    );
    modelComparisons.set(unitName, comparison);
    observer?.onModelCompared?.(comparison);
    comparison.violations.forEach((violation) => observer?.onViolation?.(violation, unitName));
  }

  const pipelineLevelViolations = compareMetrics(
    registry,
    baseline.pipelineAggregations,
    candidate.pipelineAggregations,
    { ignoreImprovements }
  );
  pipelineLevelViolations.forEach((violation) => observer?.onViolation?.(violation, null));

  return buildPipelineComparison({
    pipelineName: baseline.pipeline || candidate.pipeline || UNKNOWN,
    baselineTimestamp: baseline.capturedAt || UNKNOWN,
    candidateTimestamp: candidate.capturedAt || UNKNOWN,
    modelComparisons,
    pipelineLevelViolations
  });
}

export function buildModelComparison(
  registry: ThresholdRegistry,
  unitName: UnitName,
  baselineMetrics: MetricMap,
  candidateMetrics: MetricMap,
  ignoreImprovements = false
): ModelComparison {
  const baselineKeys = new Set(Object.keys(baselineMetrics));
  const candidateKeys = new Set(Object.keys(candidateMetrics));
  const shared = [...baselineKeys].filter((name) => candidateKeys.has(name));

  const violations = compareMetrics(registry, baselineMetrics, candidateMetrics, {
    metricNames: shared,
    ignoreImprovements
  });

  return {
    unitName,
    baselineMetrics: { ...baselineMetrics },
    candidateMetrics: { ...candidateMetrics },
    violations,
    metricsOnlyInBaseline: sortedDifference(baselineKeys, candidateKeys),
    metricsOnlyInCandidate: sortedDifference(candidateKeys, baselineKeys),
    maxSeverity: maxSeverityOf(violations)
  };
}

interface PipelineComparisonFields {
  pipelineName: string;
  baselineTimestamp: string;
  candidateTimestamp: string;
  modelComparisons: ReadonlyMap<UnitName, ModelComparison>;
  pipelineLevelViolations: readonly Violation[];
}

export function buildPipelineComparison(fields: PipelineComparisonFields): PipelineComparison {
  const all: readonly Violation[] = [
    ...fields.pipelineLevelViolations,
    ...[...fields.modelComparisons.values()].flatMap((model) => model.violations)
  ];
  const counts = countSeverities(all);
  const max = maxSeverityOf(all);

  return {
    ...fields,
    allViolations: () => [...all],
    maxSeverity: () => max,
    countsBySeverity: () => ({ ...counts })
  };
}

export function generateSummary(comparison: PipelineComparison): ComparisonSummary {
  return STATUS_BY_SEVERITY[comparison.maxSeverity()];
}

export function statusForSeverity(severity: Severity): ComparisonStatus {
  return STATUS_BY_SEVERITY[severity].status;
}

export function severityName(severity: Severity): SeverityName {
  return SEVERITY_NAMES[severity];
}

export function maxSeverityOf(violations: readonly Violation[]): Severity {
  return violations.reduce<Severity>(
    (max, violation) => (violation.severity > max ? violation.severity : max),
    Severity.INFO
  );
}

function countSeverities(violations: readonly Violation[]): SeverityCounts {
  const counts: Record<SeverityName, number> = { INFO: 0, WARNING: 0, ERROR: 0 };
  for (const violation of violations) {
    counts[severityName(violation.severity)] += 1;
  }
  return counts;
}

function sortedDifference(left: ReadonlySet<MetricName>, right: ReadonlySet<MetricName>): ReadonlySet<MetricName> {
  return new Set([...left].filter((name) => !right.has(name)).sort(compareNames));
}

/**
 * Narrow a parsed snapshot document to the fields the comparison reads.
 *
 * Missing sections become empty maps and missing identifiers become empty
 * strings. A metric value that is neither a number nor null, or a
 * metric container that is not a plain object, throws MalformedSnapshotError.
 */
export function toRunSnapshot(raw: unknown, label = "snapshot"): RunSnapshot {
  if (raw === null || raw === undefined) {
    return { pipeline: "", capturedAt: "", perModel: {}, pipelineAggregations: {} };
  }
  const document = expectObject(raw, label);

  const perModelRaw = document["per_model"];
  const perModel: Record<UnitName, MetricMap> = {};
  if (perModelRaw !== undefined && perModelRaw !== null) {
    const units = expectObject(perModelRaw, `${label}.per_model`);
    for (const [unitName, unitRaw] of Object.entries(units)) {
      perModel[unitName] = toMetricMap(unitRaw, `${label}.per_model.${unitName}`);
    }
  }

  const aggregationsRaw = document["pipeline_aggregations"];
  const pipelineAggregations =
    aggregationsRaw === undefined || aggregationsRaw === null
      ? {}
      : toMetricMap(aggregationsRaw, `${label}.pipeline_aggregations`);

  return {
    pipeline: optionalString(document["pipeline"]),
    capturedAt: optionalString(document["captured_at"]),
    perModel,
    pipelineAggregations
  };
}

function toMetricMap(raw: unknown, path: string): MetricMap {
  const entries = expectObject(raw, path);
  const metrics: Record<MetricName, number | null> = {};
  for (const [name, value] of Object.entries(entries)) {
    if (value === null) {
      metrics[name] = null;
    } else if (typeof value === "number" && !Number.isNaN(value)) {
      metrics[name] = value;
    } else {
      throw new MalformedSnapshotError(`${path}.${name}`, "number", value);
    }
  }
  return metrics;
}

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new MalformedSnapshotError(path, "object", value);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string {
  return typeof value === "string" ? value : "";
}
