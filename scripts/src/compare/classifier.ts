import { Severity } from "lib/benchmark/types.js";
import type {
  MetricName,
  MetricRule,
  MetricSample,
  SeverityHint,
  ThresholdKind,
  Violation
} from "lib/benchmark/types.js";

import { computeDelta } from "./delta.js";
import type { ThresholdRegistry } from "./registry.js";

/** `high` escalates to ERROR once the delta exceeds its cap by more than half the cap. */
export const HIGH_SEVERITY_EXCESS_RATIO = 0.5;

interface Evaluation {
  metricName: MetricName;
  baselineValue: number;
  candidateValue: number;
  absoluteDelta: number;
  percentDelta: number | null;
  isImprovement: boolean;
  ignoreImprovements: boolean;
  rule: MetricRule;
}

/**
 * Decide whether one metric crossed its configured threshold.
 *
 * The percent cap is evaluated before the absolute cap; when it produces a
 * violation the absolute cap is not consulted, so a metric yields at most one
 * violation per call.
 */
export function classifyMetric(
  registry: ThresholdRegistry,
  metricName: MetricName,
  baseline: MetricSample,
  candidate: MetricSample,
  ignoreImprovements: boolean
): Violation | null {
  const rule = registry.getRule(metricName);
  if (!rule) {
    return null;
  }

  const { absoluteDelta, percentDelta } = computeDelta(baseline, candidate);
  if (absoluteDelta === null || baseline === null || baseline === undefined || candidate === null || candidate === undefined) {
    return null;
  }

  const isImprovement = absoluteDelta < 0;
  if (isImprovement && ignoreImprovements) {
    return null;
  }

  const evaluation: Evaluation = {
    metricName,
    baselineValue: baseline,
    candidateValue: candidate,
    absoluteDelta,
    percentDelta,
    isImprovement,
    ignoreImprovements,
    rule
  };

  if (rule.percentCap !== undefined) {
    const violation = evaluateBranch(evaluation, "percent", percentDelta, rule.percentCap);
    if (violation) {
      return violation;
    }
  }

  if (rule.absoluteCap !== undefined) {
    return evaluateBranch(evaluation, "absolute", absoluteDelta, rule.absoluteCap);
  }

  return null;
}

function evaluateBranch(
  evaluation: Evaluation,
  kind: ThresholdKind,
  delta: number | null,
  cap: number
): Violation | null {
  if (delta === null) {
    return null;
  }

  if (evaluation.isImprovement) {
    if (evaluation.ignoreImprovements || !(delta < -Math.abs(cap))) {
      return null;
    }
    return buildViolation(evaluation, kind, cap, Severity.INFO);
  }

  if (delta > cap) {
    return buildViolation(evaluation, kind, cap, classifySeverity(evaluation.rule.severityHint, delta, cap));
  }
  return null;
}

/** Severity of a regression; improvements never reach this and are always INFO. */
export function classifySeverity(hint: SeverityHint, delta: number, threshold: number): Severity {
  switch (hint) {
    case "critical":
      return Severity.ERROR;
    case "high":
      return excessRatio(delta, threshold) > HIGH_SEVERITY_EXCESS_RATIO ? Severity.ERROR : Severity.WARNING;
    case "medium":
    case "low":
      return Severity.WARNING;
    default:
      return assertNever(hint);
  }
}

/** How far `|delta|` overshoots `|threshold|`, relative to the threshold. A zero threshold is infinite. */
export function excessRatio(delta: number, threshold: number): number {
  const cap = Math.abs(threshold);
  if (cap === 0) {
    return Number.POSITIVE_INFINITY;
  }
  return (Math.abs(delta) - cap) / cap;
}

function buildViolation(
  evaluation: Evaluation,
  thresholdKind: ThresholdKind,
  thresholdValue: number,
  severity: Severity
): Violation {
  return {
    metricName: evaluation.metricName,
    baselineValue: evaluation.baselineValue,
    candidateValue: evaluation.candidateValue,
    absoluteDelta: evaluation.absoluteDelta,
    percentDelta: evaluation.percentDelta,
    thresholdValue,
    thresholdKind,
    severity,
    isImprovement: evaluation.isImprovement
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled severity hint: ${String(value)}`);
}
