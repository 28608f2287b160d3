import { BASELINE_DIR, CONFIG_DIR, RESULTS_DIR } from "../constants.js";
import type { LogLevel } from "../utils/logger.js";

export interface BenchmarkRuntimeConfig {
  configDir: string;
  baselineDir: string;
  resultsDir: string;
  projectRoot: string;
  environment: string;
  useColor: boolean;
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  return value === "1" || value.toLowerCase() === "true";
}

function parseLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value?.toLowerCase());
  return match ?? "info";
}

export function resolveRuntimeConfig(env: NodeJS.ProcessEnv = process.env): BenchmarkRuntimeConfig {
  return {
    configDir: env["BENCHMARK_CONFIG_DIR"] ?? CONFIG_DIR,
    baselineDir: env["BENCHMARK_BASELINE_DIR"] ?? BASELINE_DIR,
    resultsDir: env["BENCHMARK_RESULTS_DIR"] ?? RESULTS_DIR,
    projectRoot: env["BENCHMARK_PROJECT_ROOT"] ?? ".",
    environment: env["BENCHMARK_ENVIRONMENT"] ?? "dev",
    useColor: !parseBoolean(env["NO_COLOR"], false),
    logLevel: parseLogLevel(env["LOG_LEVEL"])
  };
}
