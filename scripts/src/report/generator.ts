import { join } from "node:path";

import type { MetricMap, PipelineComparison, SeverityCounts, UnitName } from "lib/benchmark/types.js";

import { formatTimestamp } from "../baselines/naming.js";
import { generateSummary, severityName } from "../compare/pipeline.js";
import { DEFAULT_TOP_LIMIT, REPORT_PREFIX, REPORT_SCHEMA_VERSION } from "../constants.js";
import type { ValidationReport } from "../validation/output.js";
import { writeJsonFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { jsonNumber, violationToJson } from "./comparison.js";
import type { JsonNumber, ViolationJson } from "./comparison.js";
import { formatMetric } from "./formatters.js";

export type ReportStatus = "pass" | "warning" | "error";

export interface ReportMetadataInput {
  executionStart?: Date | null;
  executionEnd?: Date | null;
  gitCommit?: string | null;
  gitBranch?: string | null;
  dbtVersion?: string | null;
  warehouseName?: string | null;
  databaseName?: string | null;
  schemaName?: string | null;
  environment?: string;
  tags?: Record<string, string>;
}

export interface ReportMetadata {
  pipeline_id: string;
  pipeline_name: string;
  timestamp: string;
  execution_start: string | null;
  execution_end: string | null;
  execution_duration_ms: number;
  git_commit: string | null;
  git_branch: string | null;
  dbt_version: string | null;
  warehouse: { name: string | null };
  database: { name: string | null; schema: string | null };
  environment: string;
  tags: Record<string, string>;
}

export interface MetricSection {
  raw: Record<string, number | null>;
  formatted: Record<string, string | null>;
}

export interface ValidationSection {
  status: "pass" | "fail";
  timestamp: string;
  per_model: Record<UnitName, { status: "pass" | "fail"; row_count: number | null; hash: string | null; message: string | null }>;
  summary: { total_models: number; models_passed: number; models_failed: number; issues: string[] };
}

export interface ComparisonSection {
  status: ReportStatus;
  baseline_timestamp: string;
  baseline_git_commit: string | null;
  candidate_timestamp: string;
  per_model: Record<
    UnitName,
    { violations: ViolationJson[]; missing_in_baseline: string[]; missing_in_candidate: string[] }
  >;
  aggregated: { violations: ViolationJson[] };
  violation_summary: { total_violations: number; by_severity: SeverityCounts };
}

export interface RankedChange {
  model: UnitName | null;
  metric: string;
  delta_percent: JsonNumber;
  severity: string;
}

export interface SummarySection {
  overall_status: ReportStatus;
  performance_overview: Record<string, { value: number; formatted: string | null }>;
  top_regressions: RankedChange[];
  top_improvements: RankedChange[];
  notes: string[];
}

export interface BenchmarkReport {
  schema_version: string;
  metadata: ReportMetadata | null;
  metrics: {
    per_model: Record<UnitName, MetricSection & { model_name: UnitName }>;
    aggregated: MetricSection;
  };
  validation?: ValidationSection;
  comparison?: ComparisonSection;
  summary?: SummarySection;
}

export interface MergedReport {
  schema_version: string;
  merge_timestamp: string;
  pipeline_reports: BenchmarkReport[];
  cross_pipeline_summary: {
    total_pipelines: number;
    overall_status: ReportStatus;
    aggregated_violations: { total: number; by_severity: SeverityCounts };
  };
}

const OVERVIEW_METRICS = ["total_execution_time_ms", "total_bytes_scanned", "total_warehouse_credits", "model_count"];

function formatSection(metrics: MetricMap): MetricSection {
  const raw: Record<string, number | null> = {};
  const formatted: Record<string, string | null> = {};
  for (const [name, value] of Object.entries(metrics)) {
    raw[name] = value;
    formatted[name] = formatMetric(value, name).formatted;
  }
  return { raw, formatted };
}

/**
 * Builds a benchmark report section by section. The summary is derived from
 * whichever sections were added before `generateSummary` is called.
 */
export class BenchmarkReportBuilder {
  private readonly report: BenchmarkReport = {
    schema_version: REPORT_SCHEMA_VERSION,
    metadata: null,
    metrics: { per_model: {}, aggregated: { raw: {}, formatted: {} } }
  };
  private regressions: RankedChange[] = [];
  private improvements: RankedChange[] = [];

  constructor(
    readonly pipelineId: string,
    private readonly options: { pipelineName?: string; topLimit?: number; now?: () => Date } = {}
  ) {}

  private now(): Date {
    return this.options.now ? this.options.now() : new Date();
  }

  addMetadata(input: ReportMetadataInput = {}): this {
    const start = input.executionStart ?? null;
    const end = input.executionEnd ?? null;
    this.report.metadata = {
      pipeline_id: this.pipelineId,
      pipeline_name: this.options.pipelineName ?? this.pipelineId,
      timestamp: this.now().toISOString(),
      execution_start: start ? start.toISOString() : null,
      execution_end: end ? end.toISOString() : null,
      execution_duration_ms: start && end ? end.getTime() - start.getTime() : 0,
      git_commit: input.gitCommit ?? null,
      git_branch: input.gitBranch ?? null,
      dbt_version: input.dbtVersion ?? null,
      warehouse: { name: input.warehouseName ?? null },
      database: { name: input.databaseName ?? null, schema: input.schemaName ?? null },
      environment: input.environment ?? "dev",
      tags: { ...input.tags }
    };
    return this;
  }

  addMetrics(perModel: Readonly<Record<UnitName, MetricMap>>, aggregated: MetricMap = {}): this {
    for (const [modelName, metrics] of Object.entries(perModel)) {
      this.report.metrics.per_model[modelName] = { model_name: modelName, ...formatSection(metrics) };
    }
    this.report.metrics.aggregated = formatSection(aggregated);
    logger.debug("Added metrics to report", {
      models: Object.keys(perModel).length,
      aggregated: Object.keys(aggregated).length
    });
    return this;
  }

  addValidation(validation: ValidationReport): this {
    const perModel: ValidationSection["per_model"] = {};
    for (const result of validation.results) {
      perModel[result.model] = {
        status: result.status === "PASS" ? "pass" : "fail",
        row_count: result.rowCountCandidate,
        hash: result.hashCandidate,
        message: result.error
      };
    }
    const failed = validation.results.filter((result) => result.status !== "PASS");
    this.report.validation = {
      status: validation.overallStatus === "PASS" ? "pass" : "fail",
      timestamp: validation.validatedAt,
      per_model: perModel,
      summary: {
        total_models: validation.results.length,
        models_passed: validation.results.length - failed.length,
        models_failed: failed.length,
        issues: failed.flatMap((result) => (result.error ? [`${result.model}: ${result.error}`] : []))
      }
    };
    return this;
  }

  addComparison(comparison: PipelineComparison, baselineGitCommit: string | null = null): this {
    const counts = comparison.countsBySeverity();
    const perModel: ComparisonSection["per_model"] = {};
    for (const [unitName, model] of comparison.modelComparisons) {
      perModel[unitName] = {
        violations: model.violations.map(violationToJson),
        missing_in_baseline: [...model.metricsOnlyInCandidate],
        missing_in_candidate: [...model.metricsOnlyInBaseline]
      };
    }

    this.report.comparison = {
      status: toReportStatus(generateSummary(comparison).status),
      baseline_timestamp: comparison.baselineTimestamp,
      baseline_git_commit: baselineGitCommit,
      candidate_timestamp: comparison.candidateTimestamp,
      per_model: perModel,
      aggregated: { violations: comparison.pipelineLevelViolations.map(violationToJson) },
      violation_summary: {
        total_violations: counts.INFO + counts.WARNING + counts.ERROR,
        by_severity: counts
      }
    };
    this.rankChanges(comparison);
    return this;
  }

  private rankChanges(comparison: PipelineComparison): void {
    const scoped = [
      ...comparison.pipelineLevelViolations.map((violation) => ({ model: null, violation })),
      ...[...comparison.modelComparisons].flatMap(([unitName, model]) =>
        model.violations.map((violation) => ({ model: unitName, violation }))
      )
    ];
    const limit = this.options.topLimit ?? DEFAULT_TOP_LIMIT;
    const ranked = (improvement: boolean) =>
      scoped
        .filter(({ violation }) => violation.isImprovement === improvement && violation.percentDelta !== null)
        .map(({ model, violation }) => ({
          model,
          metric: violation.metricName,
          magnitude: Math.abs(violation.percentDelta ?? 0),
          severity: severityName(violation.severity)
        }))
        .sort((a, b) => b.magnitude - a.magnitude)
        .slice(0, limit)
        .map(({ magnitude, ...rest }) => ({ ...rest, delta_percent: jsonNumber(improvement ? -magnitude : magnitude) }));

    this.regressions = ranked(false);
    this.improvements = ranked(true);
  }

  generateSummary(): this {
    const aggregated = this.report.metrics.aggregated;
    const overview: SummarySection["performance_overview"] = {};
    for (const metric of OVERVIEW_METRICS) {
      const value = aggregated.raw[metric];
      if (value !== undefined && value !== null) {
        overview[metric] = { value, formatted: aggregated.formatted[metric] ?? null };
      }
    }

    this.report.summary = {
      overall_status: this.overallStatus(),
      performance_overview: overview,
      top_regressions: this.regressions,
      top_improvements: this.improvements,
      notes: this.notes()
    };
    return this;
  }

  private overallStatus(): ReportStatus {
    const comparison = this.report.comparison?.status ?? "pass";
    if (comparison === "error" || this.report.validation?.status === "fail") {
      return "error";
    }
    return comparison;
  }

  private notes(): string[] {
    const notes: string[] = [];
    const { comparison, validation } = this.report;
    if (!comparison) notes.push("No baseline comparison available");
    if (!validation) {
      notes.push("Output validation not performed");
    } else {
      if (validation.summary.models_failed > 0) {
        notes.push(`WARNING: ${validation.summary.models_failed} model(s) failed validation`);
      }
      notes.push(...validation.summary.issues);
    }
    const errors = comparison?.violation_summary.by_severity.ERROR ?? 0;
    if (errors > 0) {
      notes.push(`WARNING: ${errors} error-level violation(s) detected`);
    }
    return notes;
  }

  build(): BenchmarkReport {
    return structuredClone(this.report);
  }

  /** Write `report_<pipeline>_<timestamp>.json` under the directory and return its path. */
  async save(outputDir: string, filename?: string): Promise<string> {
    const path = join(outputDir, filename ?? `${REPORT_PREFIX}${this.pipelineId}_${formatTimestamp(this.now())}.json`);
    await writeJsonFile(path, this.build());
    logger.info(`Report written to ${path}`);
    return path;
  }
}

export function toReportStatus(status: "PASS" | "WARNING" | "ERROR"): ReportStatus {
  return status === "PASS" ? "pass" : status === "WARNING" ? "warning" : "error";
}

/** Cross-pipeline roll-up: worst status wins and violation counts are summed. */
export function mergeReports(reports: readonly BenchmarkReport[], now: Date = new Date()): MergedReport {
  const statuses = reports.map((report) => report.summary?.overall_status ?? "pass");
  const bySeverity = { INFO: 0, WARNING: 0, ERROR: 0 };
  let total = 0;
  for (const report of reports) {
    const summary = report.comparison?.violation_summary;
    if (!summary) continue;
    total += summary.total_violations;
    bySeverity.INFO += summary.by_severity.INFO;
    bySeverity.WARNING += summary.by_severity.WARNING;
    bySeverity.ERROR += summary.by_severity.ERROR;
  }

  return {
    schema_version: REPORT_SCHEMA_VERSION,
    merge_timestamp: now.toISOString(),
    pipeline_reports: [...reports],
    cross_pipeline_summary: {
      total_pipelines: reports.length,
      overall_status: statuses.includes("error") ? "error" : statuses.includes("warning") ? "warning" : "pass",
      aggregated_violations: { total, by_severity: bySeverity }
    }
  };
}
