import { Severity } from "lib/benchmark/types.js";
import type { PipelineComparison, SeverityName, UnitName, Violation } from "lib/benchmark/types.js";

import { generateSummary, severityName } from "../compare/pipeline.js";
import { formatPercentage } from "./formatters.js";

/** JSON cannot carry infinities; they are written as strings. */
export type JsonNumber = number | "Infinity" | "-Infinity";

export interface ViolationJson {
  metric: string;
  baseline: number;
  candidate: number;
  delta: number;
  delta_percent: JsonNumber | null;
  threshold: number;
  threshold_kind: Violation["thresholdKind"];
  severity: SeverityName;
  is_improvement: boolean;
  message: string;
}

export interface ComparisonJsonReport {
  pipeline: string;
  baseline_timestamp: string;
  candidate_timestamp: string;
  status: ReturnType<typeof generateSummary>["status"];
  exit_code: ReturnType<typeof generateSummary>["exitCode"];
  summary: {
    total_violations: number;
    info: number;
    warning: number;
    error: number;
  };
  violations: Record<SeverityName, ViolationJson[]>;
  pipeline_violations: ViolationJson[];
  models: Record<
    UnitName,
    {
      status: "PASS" | SeverityName;
      violations: ViolationJson[];
      missing_in_baseline: string[];
      missing_in_candidate: string[];
    }
  >;
}

const RULE = "=".repeat(80);
const SUBRULE = "-".repeat(80);

const SEVERITY_MARKERS: Record<Severity, string> = {
  [Severity.INFO]: "ℹ",
  [Severity.WARNING]: "⚠",
  [Severity.ERROR]: "✗"
};

export function jsonNumber(value: number): JsonNumber {
  if (value === Infinity) return "Infinity";
  if (value === -Infinity) return "-Infinity";
  return value;
}

export function violationMessage(violation: Violation): string {
  const delta = violation.absoluteDelta.toFixed(2);
  const percent = violation.percentDelta === null ? "" : ` (${formatPercentage(violation.percentDelta)})`;
  const threshold =
    violation.thresholdKind === "percent" ? `${violation.thresholdValue}%` : String(violation.thresholdValue);
  const suffix = violation.isImprovement ? " (IMPROVEMENT)" : "";
  return (
    `${violation.metricName}: baseline=${violation.baselineValue}, candidate=${violation.candidateValue}, ` +
    `delta=${delta}${percent}, threshold=${threshold}${suffix}`
  );
}

export function violationToJson(violation: Violation): ViolationJson {
  return {
    metric: violation.metricName,
    baseline: violation.baselineValue,
    candidate: violation.candidateValue,
    delta: violation.absoluteDelta,
    delta_percent: violation.percentDelta === null ? null : jsonNumber(violation.percentDelta),
    threshold: violation.thresholdValue,
    threshold_kind: violation.thresholdKind,
    severity: severityName(violation.severity),
    is_improvement: violation.isImprovement,
    message: violationMessage(violation)
  };
}

export function formatTextReport(comparison: PipelineComparison): string {
  const counts = comparison.countsBySeverity();
  const { status, exitCode } = generateSummary(comparison);

  const lines = [
    RULE,
    "BENCHMARK COMPARISON REPORT",
    RULE,
    `Pipeline: ${comparison.pipelineName}`,
    `Baseline: ${comparison.baselineTimestamp}`,
    `Candidate: ${comparison.candidateTimestamp}`,
    "",
    "VIOLATION SUMMARY",
    SUBRULE,
    `  INFO:    ${String(counts.INFO).padStart(3)} violations (improvements/neutral)`,
    `  WARNING: ${String(counts.WARNING).padStart(3)} violations (minor regressions)`,
    `  ERROR:   ${String(counts.ERROR).padStart(3)} violations (major regressions)`,
    "",
    "OVERALL STATUS",
    SUBRULE,
    `  Status: ${status} (exit code: ${exitCode})`,
    ""
  ];

  if (comparison.modelComparisons.size > 0) {
    lines.push("MODEL-LEVEL RESULTS", SUBRULE);
    for (const [unitName, model] of comparison.modelComparisons) {
      lines.push(`  ${unitName}: ${model.violations.length === 0 ? "PASS" : severityName(model.maxSeverity)}`);
      for (const violation of model.violations) {
        lines.push(`    ${SEVERITY_MARKERS[violation.severity]} ${violationMessage(violation)}`);
      }
      if (model.metricsOnlyInCandidate.size > 0) {
        lines.push(`    ⚠ New metrics in candidate: ${[...model.metricsOnlyInCandidate].join(", ")}`);
      }
      if (model.metricsOnlyInBaseline.size > 0) {
        lines.push(`    ℹ Removed metrics: ${[...model.metricsOnlyInBaseline].join(", ")}`);
      }
    }
    lines.push("");
  }

  if (comparison.pipelineLevelViolations.length > 0) {
    lines.push("PIPELINE-LEVEL VIOLATIONS", SUBRULE);
    for (const violation of comparison.pipelineLevelViolations) {
      lines.push(`  ${SEVERITY_MARKERS[violation.severity]} ${violationMessage(violation)}`);
    }
    lines.push("");
  }

  lines.push(RULE);
  return lines.join("\n");
}

export function toJsonReport(comparison: PipelineComparison): ComparisonJsonReport {
  const counts = comparison.countsBySeverity();
  const { status, exitCode } = generateSummary(comparison);

  const violations: Record<SeverityName, ViolationJson[]> = { INFO: [], WARNING: [], ERROR: [] };
  for (const violation of comparison.allViolations()) {
    violations[severityName(violation.severity)].push(violationToJson(violation));
  }

  const models: ComparisonJsonReport["models"] = {};
  for (const [unitName, model] of comparison.modelComparisons) {
    models[unitName] = {
      status: model.violations.length === 0 ? "PASS" : severityName(model.maxSeverity),
      violations: model.violations.map(violationToJson),
      missing_in_baseline: [...model.metricsOnlyInCandidate],
      missing_in_candidate: [...model.metricsOnlyInBaseline]
    };
  }

  return {
    pipeline: comparison.pipelineName,
    baseline_timestamp: comparison.baselineTimestamp,
    candidate_timestamp: comparison.candidateTimestamp,
    status,
    exit_code: exitCode,
    summary: {
      total_violations: counts.INFO + counts.WARNING + counts.ERROR,
      info: counts.INFO,
      warning: counts.WARNING,
      error: counts.ERROR
    },
    violations,
    pipeline_violations: comparison.pipelineLevelViolations.map(violationToJson),
    models
  };
}
