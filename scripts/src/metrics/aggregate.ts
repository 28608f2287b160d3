import type { ModelMetrics, PipelineAggregations } from "lib/benchmark/types.js";

/**
 * Roll per-model metrics up to pipeline totals and averages. Missing values
 * are skipped in totals; spilling treats a missing side as zero. Returns an
 * empty object when there are no models.
 */
export function aggregatePipelineMetrics(
  perModel: Readonly<Record<string, ModelMetrics>>
): PipelineAggregations | Record<string, never> {
  const models = Object.values(perModel);
  if (models.length === 0) {
    return {};
  }

  const totalExecution = sum(models, "execution_time_ms");

  return {
    total_execution_time_ms: totalExecution,
    total_compilation_time_ms: sum(models, "compilation_time_ms"),
    total_bytes_scanned: sum(models, "bytes_scanned"),
    total_rows_scanned: sum(models, "rows_scanned"),
    total_warehouse_credits: sum(models, "warehouse_credits"),
    total_spilling_bytes: models.reduce(
      (acc, m) => acc + (m.spilling_to_local_storage_bytes ?? 0) + (m.spilling_to_remote_storage_bytes ?? 0),
      0
    ),
    model_count: models.length,
    avg_execution_time_ms: totalExecution / models.length,
    avg_join_count: avg(models, "join_count"),
    avg_subquery_depth: avg(models, "subquery_depth"),
    avg_window_function_count: avg(models, "window_function_count")
  };
}

function present(models: ModelMetrics[], key: keyof ModelMetrics): number[] {
  return models.flatMap((m) => {
    const value = m[key];
    return value === null ? [] : [value];
  });
}

function sum(models: ModelMetrics[], key: keyof ModelMetrics): number {
  return present(models, key).reduce((acc, value) => acc + value, 0);
}

function avg(models: ModelMetrics[], key: keyof ModelMetrics): number {
  const values = present(models, key);
  if (values.length === 0) return 0;
  return values.reduce((acc, value) => acc + value, 0) / values.length;
}
