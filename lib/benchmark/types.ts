export type MetricName = string;
export type UnitName = string;

export type SeverityHint = "low" | "medium" | "high" | "critical";

export enum Severity {
  INFO = 0,
  WARNING = 1,
  ERROR = 2
}

export const SEVERITY_NAMES = ["INFO", "WARNING", "ERROR"] as const;
export type SeverityName = (typeof SEVERITY_NAMES)[number];

export type ComparisonStatus = "PASS" | "WARNING" | "ERROR";

export type ThresholdKind = "percent" | "absolute";

export interface MetricRule {
  readonly percentCap?: number;
  readonly absoluteCap?: number;
  readonly severityHint: SeverityHint;
}

/** Raw `thresholds.yaml` entry, keyed by metric name. */
export interface ThresholdConfigEntry {
  max_increase_percent?: number;
  max_increase_absolute?: number;
  severity?: SeverityHint;
  description?: string;
}

export interface ThresholdConfigFile {
  thresholds: Record<MetricName, ThresholdConfigEntry>;
}

export type MetricSample = number | null | undefined;

export type MetricMap = Readonly<Record<MetricName, number | null>>;

export interface Delta {
  readonly absoluteDelta: number | null;
  readonly percentDelta: number | null;
}

export interface Violation {
  readonly metricName: MetricName;
  readonly baselineValue: number;
  readonly candidateValue: number;
  readonly absoluteDelta: number;
  readonly percentDelta: number | null;
  readonly thresholdValue: number;
  readonly thresholdKind: ThresholdKind;
  readonly severity: Severity;
  readonly isImprovement: boolean;
}

export interface ModelComparison {
  readonly unitName: UnitName;
  readonly baselineMetrics: MetricMap;
  readonly candidateMetrics: MetricMap;
  readonly violations: readonly Violation[];
  readonly metricsOnlyInBaseline: ReadonlySet<MetricName>;
  readonly metricsOnlyInCandidate: ReadonlySet<MetricName>;
  readonly maxSeverity: Severity;
}

export type SeverityCounts = Readonly<Record<SeverityName, number>>;

export interface PipelineComparison {
  readonly pipelineName: string;
  readonly baselineTimestamp: string;
  readonly candidateTimestamp: string;
  readonly modelComparisons: ReadonlyMap<UnitName, ModelComparison>;
  readonly pipelineLevelViolations: readonly Violation[];
  allViolations(): readonly Violation[];
  maxSeverity(): Severity;
  countsBySeverity(): SeverityCounts;
}

export interface ComparisonSummary {
  readonly status: ComparisonStatus;
  readonly exitCode: 0 | 1 | 2;
}

/** The part of a snapshot the comparison core reads, after shape checks. */
export interface RunSnapshot {
  readonly pipeline: string;
  readonly capturedAt: string;
  readonly perModel: Readonly<Record<UnitName, MetricMap>>;
  readonly pipelineAggregations: MetricMap;
}

export type RunStatus = "SUCCESS" | "FAILED";

export interface ExecutionContext {
  start_time: string | null;
  end_time: string | null;
  duration_seconds: number | null;
  dbt_version: string | null;
  git_commit: string | null;
  project_root: string;
  dependencies_executed?: string[];
  models_executed?: string[];
}

export interface ModelValidationRecord {
  model: string;
  schema: string;
  row_count: number | null;
  aggregate_hash: string | null;
}

export interface SnapshotValidation {
  validation_enabled: boolean;
  schema?: string;
  models?: Record<UnitName, ModelValidationRecord>;
}

/** Baseline/candidate document as stored on disk. */
export interface SnapshotDocument {
  pipeline: string;
  captured_at: string;
  execution_context: ExecutionContext;
  pipeline_metadata: Partial<PipelineDefinition>;
  per_model: Record<UnitName, Record<MetricName, number | null>>;
  pipeline_aggregations: Record<MetricName, number | null>;
  metrics_collection_enabled: boolean;
  validation: SnapshotValidation;
  summary: {
    status: RunStatus;
    errors: string[];
  };
}

export interface PipelineDefinition {
  name: string;
  schema: string;
  models: string;
  dependencies: string[];
  description?: string;
}

export interface PipelinesConfigFile {
  pipelines: Record<string, PipelineDefinition>;
}

export interface RetentionPolicy {
  max_age_days: number;
  max_count: number;
}

export interface BenchmarkConfigFile {
  baseline?: {
    retention?: Partial<RetentionPolicy>;
  };
  report?: {
    environment?: string;
    top_limit?: number;
  };
}

export interface BaselineSummary {
  filename: string;
  pipeline: string;
  timestamp: string;
  capturedAt: string | null;
  status: RunStatus | "UNKNOWN";
  executionTimeSeconds: number | null;
  dbtVersion: string | null;
  gitCommit: string | null;
  modelsExecuted: number;
}

/** `warehouse.yaml`; values may be `{{ env_var('NAME') }}` placeholders. */
export interface WarehouseConfigFile {
  connection: {
    account: string;
    user: string;
    password: string;
    database: string;
    warehouse: string;
    role?: string;
  };
}

export const MODEL_METRIC_NAMES = [
  "execution_time_ms",
  "compilation_time_ms",
  "bytes_scanned",
  "rows_scanned",
  "warehouse_credits",
  "spilling_to_local_storage_bytes",
  "spilling_to_remote_storage_bytes",
  "partitions_scanned",
  "partitions_total",
  "partition_pruning_ratio",
  "join_count",
  "subquery_depth",
  "window_function_count"
] as const;

export type ModelMetricName = (typeof MODEL_METRIC_NAMES)[number];

export type ModelMetrics = Record<ModelMetricName, number | null>;

export type PipelineAggregations = {
  total_execution_time_ms: number;
  total_compilation_time_ms: number;
  total_bytes_scanned: number;
  total_rows_scanned: number;
  total_warehouse_credits: number;
  total_spilling_bytes: number;
  model_count: number;
  avg_execution_time_ms: number;
  avg_join_count: number;
  avg_subquery_depth: number;
  avg_window_function_count: number;
};

export interface CollectedMetrics {
  pipeline: string | null;
  collectedAt: string;
  perModel: Record<UnitName, ModelMetrics>;
  queryIds: Record<UnitName, string>;
  pipelineAggregations: PipelineAggregations | Record<string, never>;
}
