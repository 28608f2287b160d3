import { promises as fs } from "node:fs";
import { fileURLToPath } from "node:url";

import Ajv, { type ValidateFunction, type ErrorObject } from "ajv";
import addFormats from "ajv-formats";

import type {
  BenchmarkConfigFile,
  PipelinesConfigFile,
  SnapshotDocument,
  ThresholdConfigFile,
  WarehouseConfigFile
} from "lib/benchmark/types.js";

import {
  CONFIG_SCHEMA,
  PIPELINES_SCHEMA,
  REPORT_SCHEMA,
  SNAPSHOT_SCHEMA,
  THRESHOLDS_SCHEMA,
  WAREHOUSE_SCHEMA
} from "../constants.js";
import type { BenchmarkReport } from "../report/generator.js";

const SCHEMA_DIR = new URL("../../../lib/", import.meta.url);

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
addFormats(ajv);

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; errors: string[] };

const validators = new Map<string, Promise<ValidateFunction>>();

function compiled(schemaFile: string): Promise<ValidateFunction> {
  let validator = validators.get(schemaFile);
  if (!validator) {
    validator = loadSchema(schemaFile).then((schema) => ajv.compile(schema));
    validators.set(schemaFile, validator);
  }
  return validator;
}

function isType<T>(validator: ValidateFunction, data: unknown): data is T {
  return validator(data);
}

async function validateAgainst<T>(schemaFile: string, data: unknown): Promise<ValidationResult<T>> {
  const validator = await compiled(schemaFile);
  if (isType<T>(validator, data)) {
    return { valid: true, value: data };
  }
  return { valid: false, errors: formatErrors(validator.errors) };
}

export function validateThresholds(data: unknown): Promise<ValidationResult<ThresholdConfigFile>> {
  return validateAgainst<ThresholdConfigFile>(THRESHOLDS_SCHEMA, data);
}

export function validatePipelines(data: unknown): Promise<ValidationResult<PipelinesConfigFile>> {
  return validateAgainst<PipelinesConfigFile>(PIPELINES_SCHEMA, data);
}

export function validateBenchmarkConfig(data: unknown): Promise<ValidationResult<BenchmarkConfigFile>> {
  return validateAgainst<BenchmarkConfigFile>(CONFIG_SCHEMA, data);
}

export function validateWarehouseConfig(data: unknown): Promise<ValidationResult<WarehouseConfigFile>> {
  return validateAgainst<WarehouseConfigFile>(WAREHOUSE_SCHEMA, data);
}

export function validateSnapshot(data: unknown): Promise<ValidationResult<SnapshotDocument>> {
  return validateAgainst<SnapshotDocument>(SNAPSHOT_SCHEMA, data);
}

export function validateReport(data: unknown): Promise<ValidationResult<BenchmarkReport>> {
  return validateAgainst<BenchmarkReport>(REPORT_SCHEMA, data);
}

async function loadSchema(file: string): Promise<Record<string, unknown>> {
  const raw = await fs.readFile(fileURLToPath(new URL(file, SCHEMA_DIR)), "utf8");
  const schema: Record<string, unknown> = JSON.parse(raw);
  return schema;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return ["Unknown validation error"];
  }
  return errors.map((error) => `${error.instancePath || "/"} ${error.message ?? "invalid"}`);
}
