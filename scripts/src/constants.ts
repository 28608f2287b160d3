import { join } from "node:path";

// Defaults; BENCHMARK_CONFIG_DIR, BENCHMARK_BASELINE_DIR and BENCHMARK_RESULTS_DIR override them.
export const CONFIG_DIR = "benchmark/config";
export const BASELINE_DIR = "benchmark/baselines";
export const RESULTS_DIR = "benchmark/results";

export const THRESHOLDS_FILE = "thresholds.yaml";
export const PIPELINES_FILE = "pipelines.yaml";
export const CONFIG_FILE = "config.yaml";
export const WAREHOUSE_FILE = "warehouse.yaml";

export const THRESHOLDS_SCHEMA = "thresholds.schema.json";
export const PIPELINES_SCHEMA = "pipelines.schema.json";
export const CONFIG_SCHEMA = "config.schema.json";
export const WAREHOUSE_SCHEMA = "warehouse.schema.json";
export const SNAPSHOT_SCHEMA = "snapshot.schema.json";
export const REPORT_SCHEMA = "report.schema.json";

export const REPORT_SCHEMA_VERSION = "1.0.0";

export const BASELINE_PREFIX = "baseline_";
export const REPORT_PREFIX = "report_";
export const TIMESTAMP_PATTERN = /^\d{8}_\d{6}$/;

export const DEFAULT_RETENTION = {
  max_age_days: 90,
  max_count: 10
} as const;

export const DEFAULT_TOP_LIMIT = 10;

export const DBT_RUN_TIMEOUT_MS = 10 * 60 * 1000;
export const DBT_VERSION_TIMEOUT_MS = 10 * 1000;
export const GIT_TIMEOUT_MS = 5 * 1000;

// ACCOUNT_USAGE views lag behind query execution by up to 45 minutes.
export const CREDIT_QUERY_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 120 * 1000
} as const;

export function configPath(file: string, configDir: string = CONFIG_DIR): string {
  return join(configDir, file);
}
