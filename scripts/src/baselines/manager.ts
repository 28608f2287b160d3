import fg from "fast-glob";
import { get } from "lodash-es";

import type {
  BaselineSummary,
  ModelValidationRecord,
  RetentionPolicy,
  RunStatus,
  SnapshotDocument,
  UnitName
} from "lib/benchmark/types.js";

import { BASELINE_PREFIX, DEFAULT_RETENTION } from "../constants.js";
import type { PipelineCatalog } from "../config/loader.js";
import { validateSnapshot } from "../contracts/validators.js";
import { MetricsCollector } from "../metrics/collector.js";
import type { MetricsCollectorOptions } from "../metrics/collector.js";
import type { WarehouseClient } from "../metrics/warehouse.js";
import { PipelineRunner, normalizePipelineId } from "../runner/pipeline.js";
import type { PipelineRunResult } from "../runner/pipeline.js";
import { OutputValidator } from "../validation/output.js";
import type { CommandExecutor } from "../utils/exec.js";
import { currentCommit } from "../utils/git.js";
import { logger } from "../utils/logger.js";
import { baselineFilename, formatTimestamp, parseBaselineFilename, parseTimestamp } from "./naming.js";
import type { BaselineName } from "./naming.js";
import type { BaselineStorage } from "./storage.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface BaselineManagerOptions {
  storage: BaselineStorage;
  catalog?: PipelineCatalog;
  runner?: PipelineRunner;
  connectWarehouse?: () => Promise<WarehouseClient>;
  collectorOptions?: MetricsCollectorOptions;
  retention?: RetentionPolicy;
  projectRoot?: string;
  exec?: CommandExecutor;
  now?: () => Date;
}

export interface CaptureOptions {
  metricsEnabled?: boolean;
  validationEnabled?: boolean;
}

export type SaveResult = { saved: true; filename: string } | { saved: false; error: string };

export type DeleteResult = { deleted: true; message: string } | { deleted: false; error: string };

export interface CleanupOptions {
  pipelineId?: string;
  maxAgeDays?: number;
  maxCount?: number;
  dryRun?: boolean;
}

export interface CleanupResult {
  deletedCount: number;
  files: string[];
  dryRun: boolean;
}

/**
 * Captures snapshots of a pipeline run and keeps them as timestamped
 * baseline files under the storage directory.
 */
export class BaselineManager {
  private readonly storage: BaselineStorage;
  private readonly catalog: PipelineCatalog;
  private readonly runner: PipelineRunner;
  private readonly connectWarehouse: (() => Promise<WarehouseClient>) | null;
  private readonly collectorOptions: MetricsCollectorOptions;
  private readonly retention: RetentionPolicy;
  private readonly projectRoot: string;
  private readonly exec: CommandExecutor | undefined;
  private readonly now: () => Date;

  constructor(options: BaselineManagerOptions) {
    this.storage = options.storage;
    this.catalog = options.catalog ?? {};
    this.projectRoot = options.projectRoot ?? ".";
    this.exec = options.exec;
    this.now = options.now ?? (() => new Date());
    this.runner =
      options.runner ??
      new PipelineRunner(this.catalog, { projectRoot: this.projectRoot, exec: options.exec, now: this.now });
    this.connectWarehouse = options.connectWarehouse ?? null;
    this.collectorOptions = options.collectorOptions ?? {};
    this.retention = options.retention ?? { ...DEFAULT_RETENTION };
  }

  /**
   * Run the pipeline with its dependencies and record execution context,
   * warehouse metrics and output validation data. Failures are recorded in
   * `summary.errors` rather than thrown.
   */
  async captureSnapshot(pipelineId: string, options: CaptureOptions = {}): Promise<SnapshotDocument> {
    const metricsEnabled = options.metricsEnabled ?? true;
    const validationEnabled = options.validationEnabled ?? true;
    const pipeline = normalizePipelineId(pipelineId);
    const errors: string[] = [];

    const document: SnapshotDocument = {
      pipeline,
      captured_at: formatTimestamp(this.now()),
      execution_context: {
        start_time: null,
        end_time: null,
        duration_seconds: null,
        dbt_version: null,
        git_commit: await currentCommit(this.exec),
        project_root: this.projectRoot
      },
      pipeline_metadata: this.catalog[pipeline] ?? {},
      per_model: {},
      pipeline_aggregations: {},
      metrics_collection_enabled: false,
      validation: { validation_enabled: false },
      summary: { status: "FAILED", errors }
    };

    logger.info(`Starting snapshot capture for pipeline ${pipeline}`);
    const run = await this.runner.run(pipeline);
    document.execution_context = {
      ...document.execution_context,
      start_time: formatTimestamp(run.executionStart),
      end_time: formatTimestamp(run.executionEnd),
      duration_seconds: (run.executionEnd.getTime() - run.executionStart.getTime()) / 1000,
      dbt_version: run.dbtVersion,
      dependencies_executed: run.dependenciesExecuted,
      models_executed: run.modelsExecuted
    };
    if (!run.success) {
      errors.push(...run.errors);
      return document;
    }

    if (metricsEnabled || validationEnabled) {
      await this.collectFromWarehouse(document, run, { metricsEnabled, validationEnabled });
    }

    document.summary.status = statusOf(errors);
    logger.info(`Snapshot capture completed for pipeline ${pipeline}`, { status: document.summary.status });
    return document;
  }

  private async collectFromWarehouse(
    document: SnapshotDocument,
    run: PipelineRunResult,
    options: Required<CaptureOptions>
  ): Promise<void> {
    const errors = document.summary.errors;
    if (!this.connectWarehouse) {
      logger.warn("No warehouse connection configured; skipping metrics and validation");
      return;
    }

    let client: WarehouseClient;
    try {
      client = await this.connectWarehouse();
    } catch (error) {
      errors.push(`Warehouse connection failed: ${errorMessage(error)}`);
      return;
    }

    try {
      if (options.metricsEnabled) {
        try {
          const collector = new MetricsCollector(client, this.collectorOptions);
          const queryIds = await collector.discoverQueryIds(run.executionStart, run.executionEnd);
          const metrics = await collector.collectMetrics(queryIds, document.pipeline);
          document.per_model = metrics.perModel;
          document.pipeline_aggregations = { ...metrics.pipelineAggregations };
          document.metrics_collection_enabled = true;
        } catch (error) {
          logger.warn("Metrics collection failed", { error: errorMessage(error) });
          errors.push(`Metrics collection failed: ${errorMessage(error)}`);
        }
      }

      if (options.validationEnabled) {
        const schema = run.targetSchema;
        if (!schema) {
          logger.warn(`No schema configured for pipeline ${document.pipeline}`);
        } else {
          try {
            const models = await new OutputValidator(client).capture(schema, run.modelsExecuted);
            document.validation = { validation_enabled: true, schema, models };
          } catch (error) {
            errors.push(`Output validation failed: ${errorMessage(error)}`);
          }
        }
      }
    } finally {
      await client.close();
    }
  }

  async saveBaseline(document: SnapshotDocument, force = false): Promise<SaveResult> {
    const pipeline = normalizePipelineId(document.pipeline || "UNKNOWN");
    const timestamp = document.captured_at || formatTimestamp(this.now());
    const filename = baselineFilename(pipeline, timestamp);

    const validation = await validateSnapshot(document);
    if (!validation.valid) {
      const error = `Snapshot does not match schema: ${validation.errors.join("; ")}`;
      logger.error(error);
      return { saved: false, error };
    }

    if (!force && (await this.storage.exists(filename))) {
      const error = `Baseline already exists: ${filename}. Use --force to overwrite.`;
      logger.warn(error);
      return { saved: false, error };
    }

    await this.storage.save(filename, document);
    logger.info(`Baseline saved: ${filename}`);
    return { saved: true, filename };
  }

  /** Raw baseline document; the latest one unless a timestamp is given. */
  async loadBaseline(pipelineId: string, timestamp?: string): Promise<unknown> {
    const pipeline = normalizePipelineId(pipelineId);
    if (timestamp) {
      const document = await this.storage.load(baselineFilename(pipeline, timestamp));
      if (document === null) {
        logger.warn(`Baseline not found: ${baselineFilename(pipeline, timestamp)}`);
      }
      return document;
    }

    const names = await this.baselineNames(pipeline);
    const latest = names[0];
    if (!latest) {
      logger.info(`No baselines found for pipeline ${pipeline}`);
      return null;
    }
    return this.storage.load(latest.filename);
  }

  /** Summaries ordered newest first. Unreadable files are skipped. */
  async listBaselines(pipelineId?: string): Promise<BaselineSummary[]> {
    const names = await this.baselineNames(pipelineId ? normalizePipelineId(pipelineId) : undefined);
    const summaries: BaselineSummary[] = [];

    for (const { filename, pipeline, timestamp } of names) {
      let document: unknown;
      try {
        document = await this.storage.load(filename);
      } catch (error) {
        logger.warn(`Error processing baseline ${filename}`, { error: errorMessage(error) });
        continue;
      }
      summaries.push(summarize(filename, pipeline, timestamp, document));
    }
    return summaries;
  }

  async deleteBaseline(pipelineId: string, timestamp: string | undefined, confirm: boolean): Promise<DeleteResult> {
    if (!confirm) {
      const error = "Deletion requires confirmation to prevent accidental data loss";
      logger.warn(error);
      return { deleted: false, error };
    }
    if (!timestamp) {
      const error = "Timestamp is required to delete a specific baseline";
      logger.warn(error);
      return { deleted: false, error };
    }

    const filename = baselineFilename(normalizePipelineId(pipelineId), timestamp);
    if (!(await this.storage.exists(filename))) {
      const error = `Baseline not found: ${filename}`;
      logger.warn(error);
      return { deleted: false, error };
    }

    await this.storage.delete(filename);
    const message = `Baseline deleted: ${filename}`;
    logger.info(message);
    return { deleted: true, message };
  }

  /**
   * Apply the retention policy per pipeline: delete baselines older than
   * `maxAgeDays` and all but the newest `maxCount`. Zero disables a limit.
   */
  async cleanupBaselines(options: CleanupOptions = {}): Promise<CleanupResult> {
    const maxAgeDays = options.maxAgeDays ?? this.retention.max_age_days;
    const maxCount = options.maxCount ?? this.retention.max_count;
    const dryRun = options.dryRun ?? false;
    const cutoff = this.now().getTime() - maxAgeDays * DAY_MS;

    const names = await this.baselineNames(options.pipelineId ? normalizePipelineId(options.pipelineId) : undefined);
    const seenPerPipeline = new Map<string, number>();
    const expired = names.filter((name) => {
      const rank = seenPerPipeline.get(name.pipeline) ?? 0;
      seenPerPipeline.set(name.pipeline, rank + 1);
      const capturedAt = parseTimestamp(name.timestamp);
      const tooOld = maxAgeDays > 0 && capturedAt !== null && capturedAt.getTime() < cutoff;
      const overCount = maxCount > 0 && rank >= maxCount;
      return tooOld || overCount;
    });

    const files: string[] = [];
    for (const name of expired) {
      if (dryRun) {
        logger.info(`[DRY RUN] Would delete: ${name.filename}`);
        files.push(name.filename);
        continue;
      }
      const result = await this.deleteBaseline(name.pipeline, name.timestamp, true);
      if (result.deleted) {
        files.push(name.filename);
      }
    }

    const deletedCount = dryRun ? 0 : files.length;
    logger.info(`${dryRun ? "[DRY RUN] " : ""}Cleanup complete: ${files.length} baselines selected`, {
      deletedCount
    });
    return { deletedCount, files, dryRun };
  }

  /** Parsed baseline file names, newest first. */
  private async baselineNames(pipeline?: string): Promise<Array<BaselineName & { filename: string }>> {
    const pattern = pipeline ? `${BASELINE_PREFIX}${fg.escapePath(pipeline)}_*.json` : `${BASELINE_PREFIX}*.json`;
    const files = await this.storage.list(pattern);
    return files
      .flatMap((filename) => {
        const parsed = parseBaselineFilename(filename);
        if (!parsed) {
          logger.debug(`Could not parse baseline name ${filename}`);
          return [];
        }
        return pipeline && parsed.pipeline !== pipeline ? [] : [{ filename, ...parsed }];
      })
      .sort((a, b) => b.timestamp.localeCompare(a.timestamp) || a.filename.localeCompare(b.filename));
  }
}

export function validationRecords(document: unknown): Record<UnitName, ModelValidationRecord> {
  if (!isRecord(document) || !isRecord(document["validation"])) {
    return {};
  }
  const models = document["validation"]["models"];
  if (!isRecord(models)) {
    return {};
  }
  const records: Record<UnitName, ModelValidationRecord> = {};
  for (const [name, raw] of Object.entries(models)) {
    if (isRecord(raw)) {
      records[name] = {
        model: typeof raw["model"] === "string" ? raw["model"] : name,
        schema: typeof raw["schema"] === "string" ? raw["schema"] : "",
        row_count: typeof raw["row_count"] === "number" ? raw["row_count"] : null,
        aggregate_hash: typeof raw["aggregate_hash"] === "string" ? raw["aggregate_hash"] : null
      };
    }
  }
  return records;
}

function summarize(filename: string, pipeline: string, timestamp: string, document: unknown): BaselineSummary {
  const field = (path: string): unknown => get(document, path);
  const text = (path: string) => {
    const value = field(path);
    return typeof value === "string" ? value : null;
  };
  const status = field("summary.status");
  const duration = field("execution_context.duration_seconds");
  const models = field("execution_context.models_executed");

  return {
    filename,
    pipeline,
    timestamp,
    capturedAt: text("captured_at"),
    status: isRunStatus(status) ? status : "UNKNOWN",
    executionTimeSeconds: typeof duration === "number" ? duration : null,
    dbtVersion: text("execution_context.dbt_version"),
    gitCommit: text("execution_context.git_commit"),
    modelsExecuted: Array.isArray(models) ? models.length : 0
  };
}

function statusOf(errors: readonly string[]): RunStatus {
  return errors.length === 0 ? "SUCCESS" : "FAILED";
}

function isRunStatus(value: unknown): value is RunStatus {
  return value === "SUCCESS" || value === "FAILED";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
