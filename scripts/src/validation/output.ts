import { createHash } from "node:crypto";

import type { ModelValidationRecord, UnitName } from "lib/benchmark/types.js";

import { logger } from "../utils/logger.js";
import { numberColumn, stringColumn } from "../metrics/warehouse.js";
import type { WarehouseClient } from "../metrics/warehouse.js";

export type ModelValidationStatus = "PASS" | "FAIL";

export interface ModelValidationResult {
  model: UnitName;
  schema: string;
  rowCountBaseline: number | null;
  rowCountCandidate: number | null;
  rowCountMatch: boolean;
  hashBaseline: string | null;
  hashCandidate: string | null;
  hashMatch: boolean;
  status: ModelValidationStatus;
  error: string | null;
}

export interface ValidationReport {
  validatedAt: string;
  modelsValidated: number;
  overallStatus: ModelValidationStatus;
  results: ModelValidationResult[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/** SHA-256 over the concatenation of the already sorted row hashes. */
export function aggregateHash(sortedRowHashes: readonly string[]): string {
  return createHash("sha256").update(sortedRowHashes.join(""), "utf8").digest("hex");
}

function qualifiedName(schema: string, table: string): string {
  if (!IDENTIFIER.test(schema) || !IDENTIFIER.test(table)) {
    throw new Error(`Invalid identifier: ${schema}.${table}`);
  }
  return `${schema}.${table}`;
}

/**
 * Reads row counts and an order-independent hash of every row, to detect
 * output drift between runs.
 */
export class OutputValidator {
  constructor(private readonly client: WarehouseClient) {}

  async rowCount(schema: string, table: string): Promise<number | null> {
    const rows = await this.client.query(`SELECT COUNT(*) AS ROW_COUNT FROM ${qualifiedName(schema, table)}`);
    return rows[0] ? numberColumn(rows[0], "ROW_COUNT") : null;
  }

  async rowHashes(schema: string, table: string): Promise<string[]> {
    const rows = await this.client.query(
      `SELECT TO_VARCHAR(HASH(*)) AS ROW_HASH FROM ${qualifiedName(schema, table)} ORDER BY HASH(*)`
    );
    return rows.flatMap((row) => {
      const hash = stringColumn(row, "ROW_HASH");
      return hash === null ? [] : [hash];
    });
  }

  async captureModel(schema: string, model: UnitName): Promise<ModelValidationRecord> {
    const rowCount = await this.rowCount(schema, model);
    const hash = aggregateHash(await this.rowHashes(schema, model));
    return { model, schema, row_count: rowCount, aggregate_hash: hash };
  }

  /** Records for every model that could be read; failures are logged and skipped. */
  async capture(schema: string, models: readonly UnitName[]): Promise<Record<UnitName, ModelValidationRecord>> {
    const records: Record<UnitName, ModelValidationRecord> = {};
    for (const model of models) {
      try {
        records[model] = await this.captureModel(schema, model);
      } catch (error) {
        logger.error(`Error capturing validation data for ${model}`, { error: String(error) });
      }
    }
    logger.info("Captured validation data", { schema, models: Object.keys(records).length });
    return records;
  }
}

/**
 * Compare validation records of two runs model by model. Models present only
 * in the candidate fail with a missing-baseline reason.
 */
export function compareValidationRecords(
  baseline: Readonly<Record<UnitName, ModelValidationRecord>>,
  candidate: Readonly<Record<UnitName, ModelValidationRecord>>,
  validatedAt: Date = new Date()
): ValidationReport {
  const results = Object.keys(candidate)
    .sort()
    .flatMap((model) => {
      const current = candidate[model];
      return current ? [compareRecord(model, baseline[model], current)] : [];
    });

  for (const result of results) {
    if (result.status !== "PASS") {
      logger.warn(`Validation FAILED for ${result.model}`, { error: result.error });
    }
  }

  return {
    validatedAt: validatedAt.toISOString(),
    modelsValidated: results.length,
    overallStatus: results.every((result) => result.status === "PASS") ? "PASS" : "FAIL",
    results
  };
}

function compareRecord(
  model: UnitName,
  baseline: ModelValidationRecord | undefined,
  candidate: ModelValidationRecord
): ModelValidationResult {
  const result: ModelValidationResult = {
    model,
    schema: candidate.schema,
    rowCountBaseline: baseline?.row_count ?? null,
    rowCountCandidate: candidate.row_count,
    rowCountMatch: false,
    hashBaseline: baseline?.aggregate_hash ?? null,
    hashCandidate: candidate.aggregate_hash,
    hashMatch: false,
    status: "FAIL",
    error: null
  };

  if (!baseline) {
    result.error = `No baseline found for ${model}`;
    return result;
  }
  if (candidate.row_count !== baseline.row_count) {
    result.error = `Row count mismatch: baseline ${String(baseline.row_count)}, candidate ${String(candidate.row_count)}`;
    return result;
  }
  result.rowCountMatch = true;

  if (candidate.aggregate_hash !== null && candidate.aggregate_hash === baseline.aggregate_hash) {
    result.hashMatch = true;
    result.status = "PASS";
  } else {
    result.error = `Hash mismatch: baseline ${String(baseline.aggregate_hash)}, candidate ${String(candidate.aggregate_hash)}`;
  }
  return result;
}
