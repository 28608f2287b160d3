import type { CollectedMetrics, ModelMetrics, UnitName } from "lib/benchmark/types.js";

import { CREDIT_QUERY_RETRY } from "../constants.js";
import { logger } from "../utils/logger.js";
import { aggregatePipelineMetrics } from "./aggregate.js";
import { numberColumn, placeholders, stringColumn } from "./warehouse.js";
import type { WarehouseClient, WarehouseRow } from "./warehouse.js";

interface BasicMetrics {
  execution_time_ms: number | null;
  compilation_time_ms: number | null;
  bytes_scanned: number | null;
  rows_scanned: number | null;
  partitions_scanned: number | null;
  partitions_total: number | null;
  query_text: string;
}

interface CreditMetrics {
  warehouse_credits: number | null;
  spilling_to_local_storage_bytes: number | null;
  spilling_to_remote_storage_bytes: number | null;
}

export interface ProfileMetrics {
  join_count: number;
  subquery_depth: number;
  window_function_count: number;
}

export interface MetricsCollectorOptions {
  maxCreditAttempts?: number;
  baseRetryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const EMPTY_PROFILE: ProfileMetrics = { join_count: 0, subquery_depth: 0, window_function_count: 0 };

const NODE_ID_COMMENT = /\/\*\s*(\{[^}]*"node_id"[^}]*\})\s*\*\//;

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Pulls per-query performance metrics for dbt-issued queries and maps them
 * back to models through the JSON comment dbt prepends to each statement.
 */
export class MetricsCollector {
  private readonly maxCreditAttempts: number;
  private readonly baseRetryDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly client: WarehouseClient,
    options: MetricsCollectorOptions = {}
  ) {
    this.maxCreditAttempts = options.maxCreditAttempts ?? CREDIT_QUERY_RETRY.maxAttempts;
    this.baseRetryDelayMs = options.baseRetryDelayMs ?? CREDIT_QUERY_RETRY.baseDelayMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  /** Ids of successful dbt queries that finished inside the window. */
  async discoverQueryIds(start: Date, end: Date): Promise<string[]> {
    const rows = await this.client.query(
      `SELECT QUERY_ID
       FROM TABLE(INFORMATION_SCHEMA.QUERY_HISTORY(
         END_TIME_RANGE_START => TO_TIMESTAMP_LTZ(?),
         END_TIME_RANGE_END => TO_TIMESTAMP_LTZ(?),
         RESULT_LIMIT => 10000))
       WHERE EXECUTION_STATUS = 'SUCCESS'
         AND QUERY_TEXT LIKE '%"node_id"%'
       ORDER BY START_TIME`,
      [start.toISOString(), end.toISOString()]
    );
    const ids = rows.flatMap((row) => {
      const id = stringColumn(row, "QUERY_ID");
      return id ? [id] : [];
    });
    logger.info("Discovered dbt queries", { count: ids.length });
    return ids;
  }

  async collectMetrics(queryIds: readonly string[], pipeline: string | null = null): Promise<CollectedMetrics> {
    logger.info("Collecting metrics", { queries: queryIds.length, pipeline });
    const collectedAt = this.now().toISOString();

    if (queryIds.length === 0) {
      logger.warn("No query ids provided");
      return { pipeline, collectedAt, perModel: {}, queryIds: {}, pipelineAggregations: {} };
    }

    const basic = await this.basicMetrics(queryIds);
    const credits = await this.creditMetrics(queryIds);

    const perModel: Record<UnitName, ModelMetrics> = {};
    const modelQueryIds: Record<UnitName, string> = {};

    for (const [queryId, metrics] of basic) {
      const modelName = extractDbtModelId(metrics.query_text) ?? `unknown_${queryId.slice(0, 8)}`;
      const profile = await this.queryProfile(queryId);
      const credit = credits.get(queryId);

      perModel[modelName] = {
        execution_time_ms: metrics.execution_time_ms,
        compilation_time_ms: metrics.compilation_time_ms,
        bytes_scanned: metrics.bytes_scanned,
        rows_scanned: metrics.rows_scanned,
        warehouse_credits: credit?.warehouse_credits ?? null,
        spilling_to_local_storage_bytes: credit?.spilling_to_local_storage_bytes ?? null,
        spilling_to_remote_storage_bytes: credit?.spilling_to_remote_storage_bytes ?? null,
        partitions_scanned: metrics.partitions_scanned,
        partitions_total: metrics.partitions_total,
        partition_pruning_ratio: partitionPruningRatio(metrics.partitions_scanned, metrics.partitions_total),
        ...(profile ? parseQueryProfile(profile) : EMPTY_PROFILE)
      };
      modelQueryIds[modelName] = queryId;
    }

    return {
      pipeline,
      collectedAt,
      perModel,
      queryIds: modelQueryIds,
      pipelineAggregations: aggregatePipelineMetrics(perModel)
    };
  }

  private async basicMetrics(queryIds: readonly string[]): Promise<Map<string, BasicMetrics>> {
    const rows = await this.client.query(
      `SELECT
         QUERY_ID,
         TOTAL_ELAPSED_TIME AS EXECUTION_TIME_MS,
         COMPILATION_TIME AS COMPILATION_TIME_MS,
         BYTES_SCANNED,
         ROWS_PRODUCED AS ROWS_SCANNED,
         PARTITIONS_SCANNED,
         PARTITIONS_TOTAL,
         QUERY_TEXT
       FROM TABLE(INFORMATION_SCHEMA.QUERY_HISTORY())
       WHERE QUERY_ID IN (${placeholders(queryIds.length)})
       ORDER BY START_TIME DESC`,
      queryIds
    );

    const metrics = new Map<string, BasicMetrics>();
    for (const row of rows) {
      const queryId = stringColumn(row, "QUERY_ID");
      if (!queryId) continue;
      metrics.set(queryId, {
        execution_time_ms: numberColumn(row, "EXECUTION_TIME_MS"),
        compilation_time_ms: numberColumn(row, "COMPILATION_TIME_MS"),
        bytes_scanned: numberColumn(row, "BYTES_SCANNED"),
        rows_scanned: numberColumn(row, "ROWS_SCANNED"),
        partitions_scanned: numberColumn(row, "PARTITIONS_SCANNED"),
        partitions_total: numberColumn(row, "PARTITIONS_TOTAL"),
        query_text: stringColumn(row, "QUERY_TEXT") ?? ""
      });
    }
    logger.info("Extracted basic metrics", { queries: metrics.size });
    return metrics;
  }

  /**
   * ACCOUNT_USAGE lags behind execution, so failures are retried with
   * exponential backoff. After the last attempt the run continues without
   * credit data.
   */
  private async creditMetrics(queryIds: readonly string[]): Promise<Map<string, CreditMetrics>> {
    const sql = `SELECT
         QUERY_ID,
         CREDITS_USED_CLOUD_SERVICES AS WAREHOUSE_CREDITS,
         BYTES_SPILLED_TO_LOCAL_STORAGE AS SPILLING_TO_LOCAL_STORAGE_BYTES,
         BYTES_SPILLED_TO_REMOTE_STORAGE AS SPILLING_TO_REMOTE_STORAGE_BYTES
       FROM SNOWFLAKE.ACCOUNT_USAGE.QUERY_HISTORY
       WHERE QUERY_ID IN (${placeholders(queryIds.length)})
       ORDER BY START_TIME DESC`;

    let attempt = 0;
    while (attempt < this.maxCreditAttempts) {
      let rows: WarehouseRow[];
      try {
        rows = await this.client.query(sql, queryIds);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (attempt >= this.maxCreditAttempts - 1) {
          logger.warn("Credit metrics unavailable; continuing without credit data", {
            attempts: this.maxCreditAttempts,
            error: message
          });
          break;
        }
        const delay = Math.pow(2, attempt) * this.baseRetryDelayMs;
        attempt++;
        logger.warn(`Credit metrics query failed. Retrying in ${delay}ms...`, { attempt, error: message });
        await this.sleep(delay);
        continue;
      }

      const metrics = new Map<string, CreditMetrics>();
      for (const row of rows) {
        const queryId = stringColumn(row, "QUERY_ID");
        if (!queryId) continue;
        metrics.set(queryId, {
          warehouse_credits: numberColumn(row, "WAREHOUSE_CREDITS"),
          spilling_to_local_storage_bytes: numberColumn(row, "SPILLING_TO_LOCAL_STORAGE_BYTES"),
          spilling_to_remote_storage_bytes: numberColumn(row, "SPILLING_TO_REMOTE_STORAGE_BYTES")
        });
      }
      logger.info("Extracted credit metrics", { queries: metrics.size });
      return metrics;
    }
    return new Map();
  }

  private async queryProfile(queryId: string): Promise<unknown> {
    try {
      const rows = await this.client.query("SELECT SYSTEM$GET_QUERY_PROFILE(?) AS PROFILE", [queryId]);
      const raw = rows[0] ? stringColumn(rows[0], "PROFILE") : null;
      return raw ? JSON.parse(raw) : null;
    } catch (error) {
      logger.warn("Query profile unavailable", { queryId, error: String(error) });
      return null;
    }
  }
}

// node_id "model.project.orders" in the leading dbt comment yields "project.orders".
export function extractDbtModelId(queryText: string): string | null {
  const match = NODE_ID_COMMENT.exec(queryText);
  if (!match?.[1]) {
    return null;
  }
  let comment: unknown;
  try {
    comment = JSON.parse(match[1]);
  } catch {
    return null;
  }
  if (!isRecord(comment) || typeof comment["node_id"] !== "string" || comment["node_id"] === "") {
    return null;
  }
  const nodeId = comment["node_id"];
  const parts = nodeId.split(".");
  return parts.length >= 3 ? parts.slice(-2).join(".") : nodeId;
}

export function partitionPruningRatio(scanned: number | null, total: number | null): number | null {
  if (scanned === null || total === null || total === 0) {
    return null;
  }
  return Math.max(0, Math.min(1, 1 - scanned / total));
}

export function parseQueryProfile(profile: unknown): ProfileMetrics {
  const metrics = { ...EMPTY_PROFILE };
  if (!isRecord(profile) || !isRecord(profile["data"])) {
    return metrics;
  }
  const data = profile["data"];
  const plan = data["plan"];
  if (!isRecord(plan) || !Array.isArray(plan["operators"])) {
    return metrics;
  }

  for (const operator of plan["operators"]) {
    const type = isRecord(operator) && typeof operator["type"] === "string" ? operator["type"] : "";
    if (type.includes("Join")) {
      metrics.join_count += 1;
    } else if (type.includes("WindowFunction")) {
      metrics.window_function_count += 1;
    }
  }

  const subqueries = data["subqueries"];
  if (Array.isArray(subqueries)) {
    metrics.subquery_depth = subqueries.length;
  }
  return metrics;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
