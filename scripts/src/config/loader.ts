import yaml from "js-yaml";

import type {
  BenchmarkConfigFile,
  PipelineDefinition,
  RetentionPolicy,
  WarehouseConfigFile
} from "lib/benchmark/types.js";

import { DEFAULT_RETENTION, DEFAULT_TOP_LIMIT } from "../constants.js";
import { ThresholdRegistry } from "../compare/registry.js";
import {
  validateBenchmarkConfig,
  validatePipelines,
  validateThresholds,
  validateWarehouseConfig
} from "../contracts/validators.js";
import { ConfigError } from "../errors.js";
import { readTextFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";

export interface RegistryLoadResult {
  registry: ThresholdRegistry;
  errors: string[];
}

export interface BenchmarkSettings {
  retention: RetentionPolicy;
  environment: string;
  topLimit: number;
}

export type PipelineCatalog = Readonly<Record<string, PipelineDefinition>>;

export type WarehouseConnection = WarehouseConfigFile["connection"];

const ENV_VAR_PATTERN = /^\{\{\s*env_var\(['"](\w+)['"]\)\s*\}\}$/;

/**
 * Read and parse a YAML file. Returns null when the file does not exist;
 * a syntax error is thrown as ConfigError.
 */
export async function readYamlFile(path: string): Promise<unknown> {
  const raw = await readTextFile(path);
  if (raw === null) {
    return null;
  }
  try {
    return yaml.load(raw) ?? null;
  } catch (error) {
    throw new ConfigError(`Unable to parse ${path}`, [String(error)], { cause: error });
  }
}

/**
 * Load `thresholds.yaml` into a registry. Any failure yields an empty
 * registry together with the reasons, so a broken file disables checks
 * instead of aborting the run.
 */
export async function loadThresholdRegistry(path: string): Promise<RegistryLoadResult> {
  let document: unknown;
  try {
    document = await readYamlFile(path);
  } catch (error) {
    const errors = error instanceof ConfigError ? error.errors : [String(error)];
    logger.warn("Threshold configuration is unreadable; no thresholds applied", { path, errors });
    return { registry: ThresholdRegistry.empty(), errors };
  }

  if (document === null) {
    const errors = [`Threshold configuration not found: ${path}`];
    logger.warn("Threshold configuration missing; no thresholds applied", { path });
    return { registry: ThresholdRegistry.empty(), errors };
  }

  const result = await validateThresholds(document);
  if (!result.valid) {
    logger.warn("Threshold configuration is invalid; no thresholds applied", { path, errors: result.errors });
    return { registry: ThresholdRegistry.empty(), errors: result.errors };
  }

  const registry = ThresholdRegistry.fromConfig(result.value.thresholds);
  logger.debug("Loaded thresholds", { path, count: registry.size });
  return { registry, errors: [] };
}

export async function loadPipelineCatalog(path: string): Promise<PipelineCatalog> {
  const document = await readYamlFile(path);
  if (document === null) {
    throw new ConfigError(`Pipeline configuration not found: ${path}`);
  }
  const result = await validatePipelines(document);
  if (!result.valid) {
    throw new ConfigError(`Invalid pipeline configuration: ${path}`, result.errors);
  }

  const pipelines = result.value.pipelines;
  const missing = Object.entries(pipelines).flatMap(([id, definition]) =>
    definition.dependencies
      .filter((dependency) => !(dependency in pipelines))
      .map((dependency) => `Dependency pipeline ${dependency} of ${id} not found in configuration`)
  );
  if (missing.length > 0) {
    throw new ConfigError(`Invalid pipeline configuration: ${path}`, missing);
  }
  return pipelines;
}

export async function loadBenchmarkSettings(path: string, environment = "dev"): Promise<BenchmarkSettings> {
  const document = await readYamlFile(path);
  let config: BenchmarkConfigFile = {};
  if (document !== null) {
    const result = await validateBenchmarkConfig(document);
    if (!result.valid) {
      throw new ConfigError(`Invalid benchmark configuration: ${path}`, result.errors);
    }
    config = result.value;
  }

  return {
    retention: {
      max_age_days: config.baseline?.retention?.max_age_days ?? DEFAULT_RETENTION.max_age_days,
      max_count: config.baseline?.retention?.max_count ?? DEFAULT_RETENTION.max_count
    },
    environment: config.report?.environment ?? environment,
    topLimit: config.report?.top_limit ?? DEFAULT_TOP_LIMIT
  };
}

export async function loadWarehouseConnection(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<WarehouseConnection> {
  const document = await readYamlFile(path);
  if (document === null) {
    throw new ConfigError(`Warehouse configuration not found: ${path}`);
  }
  const result = await validateWarehouseConfig(document);
  if (!result.valid) {
    throw new ConfigError(`Invalid warehouse configuration: ${path}`, result.errors);
  }

  const connection = result.value.connection;
  return {
    account: resolveEnvVar(connection.account, env),
    user: resolveEnvVar(connection.user, env),
    password: resolveEnvVar(connection.password, env),
    database: resolveEnvVar(connection.database, env),
    warehouse: resolveEnvVar(connection.warehouse, env),
    ...(connection.role !== undefined ? { role: resolveEnvVar(connection.role, env) } : {})
  };
}

/** Expand a `{{ env_var('NAME') }}` placeholder; other values pass through. */
export function resolveEnvVar(value: string, env: NodeJS.ProcessEnv = process.env): string {
  const match = ENV_VAR_PATTERN.exec(value.trim());
  if (!match) {
    return value;
  }
  const name = match[1] ?? "";
  const resolved = env[name];
  if (!resolved) {
    throw new ConfigError(`Environment variable ${name} not set`);
  }
  return resolved;
}
