import { join } from "node:path";
import { parseArgs } from "node:util";

import { get } from "lodash-es";

import type { SnapshotDocument } from "lib/benchmark/types.js";

import { BaselineManager, validationRecords } from "./baselines/manager.js";
import { formatTimestamp, parseTimestamp } from "./baselines/naming.js";
import { BaselineStorage } from "./baselines/storage.js";
import { comparePipeline, generateSummary, toRunSnapshot } from "./compare/index.js";
import type { ThresholdRegistry } from "./compare/index.js";
import {
  loadBenchmarkSettings,
  loadPipelineCatalog,
  loadThresholdRegistry,
  loadWarehouseConnection
} from "./config/loader.js";
import type { BenchmarkSettings, WarehouseConnection } from "./config/loader.js";
import { resolveRuntimeConfig } from "./config/env.js";
import { validateReport } from "./contracts/validators.js";
import { CONFIG_FILE, PIPELINES_FILE, THRESHOLDS_FILE, WAREHOUSE_FILE, configPath } from "./constants.js";
import { BenchmarkError, ConfigError } from "./errors.js";
import { connectSnowflake } from "./metrics/snowflake.js";
import type { WarehouseClient } from "./metrics/warehouse.js";
import { formatTextReport, toJsonReport } from "./report/comparison.js";
import { BenchmarkReportBuilder, mergeReports } from "./report/generator.js";
import type { BenchmarkReport } from "./report/generator.js";
import { normalizePipelineId } from "./runner/pipeline.js";
import { compareValidationRecords } from "./validation/output.js";
import type { ValidationReport } from "./validation/output.js";
import type { CommandExecutor } from "./utils/exec.js";
import { readTextFile, writeJsonFile, writeTextFileAtomic } from "./utils/fs.js";
import { currentBranch } from "./utils/git.js";
import { logger, setLogLevel } from "./utils/logger.js";

// ── Types ───────────────────────────────────────────────────────────

export const COMMANDS = [
  "capture-baseline",
  "run-benchmark",
  "list-baselines",
  "delete-baseline",
  "compare",
  "cleanup-baselines",
  "merge-reports"
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  exec?: CommandExecutor;
  now?: () => Date;
  connectWarehouse?: (connection: WarehouseConnection) => Promise<WarehouseClient>;
  write?: (text: string) => void;
}

interface CliContext {
  command: CommandName;
  values: CliValues;
  positionals: string[];
  configDir: string;
  baselineDir: string;
  outputDir: string;
  projectRoot: string;
  environment: string;
  color: boolean;
  deps: Required<Omit<CliDependencies, "exec">> & Pick<CliDependencies, "exec">;
}

class UsageError extends Error {}

const OPTIONS = {
  help: { type: "boolean", short: "h" },
  verbose: { type: "boolean", short: "v" },
  "no-color": { type: "boolean" },
  json: { type: "boolean" },
  "output-dir": { type: "string" },
  "config-dir": { type: "string" },
  "baseline-dir": { type: "string" },
  "ignore-improvements": { type: "boolean" },
  "strict-thresholds": { type: "boolean" },
  pipeline: { type: "string", short: "p" },
  timestamp: { type: "string", short: "t" },
  force: { type: "boolean" },
  yes: { type: "boolean", short: "y" },
  "dry-run": { type: "boolean" },
  "max-age-days": { type: "string" },
  "max-count": { type: "string" },
  "no-metrics": { type: "boolean" },
  "no-validation": { type: "boolean" },
  baseline: { type: "string" },
  candidate: { type: "string" },
  output: { type: "string", short: "o" }
} as const;

function parseCommandLine(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
}

type CliValues = ReturnType<typeof parseCommandLine>["values"];

const USAGE = `Usage: benchmark <command> [options]

Commands:
  capture-baseline   --pipeline <id> [--force] [--no-metrics] [--no-validation]
  run-benchmark      --pipeline <id> [--timestamp <baseline>] [--no-metrics] [--no-validation]
  list-baselines     [--pipeline <id>]
  delete-baseline    --pipeline <id> --timestamp <YYYYMMDD_HHMMSS> --yes
  compare            --baseline <file> --candidate <file> [--output <file>]
  cleanup-baselines  [--pipeline <id>] [--max-age-days <n>] [--max-count <n>] [--dry-run]
  merge-reports      <report.json>... --output <file>

Options:
  --verbose, -v            Debug logging
  --no-color               Plain output
  --json                   Print JSON instead of text
  --output-dir <dir>       Where reports are written
  --config-dir <dir>       Where thresholds.yaml, pipelines.yaml and config.yaml live
  --baseline-dir <dir>     Where baselines are stored
  --ignore-improvements    Do not report improvements
  --strict-thresholds      Fail when thresholds.yaml cannot be loaded
`;

// ── Output ──────────────────────────────────────────────────────────

const ANSI = {
  red: "\u001b[31m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  cyan: "\u001b[36m",
  reset: "\u001b[0m"
} as const;

function paint(line: string, color: boolean): string {
  if (!color) return line;
  const tint = line.includes("✗") || /Status: ERROR/.test(line)
    ? ANSI.red
    : line.includes("⚠") || /Status: WARNING/.test(line)
      ? ANSI.yellow
      : /Status: PASS/.test(line)
        ? ANSI.green
        : line.includes("ℹ")
          ? ANSI.cyan
          : null;
  return tint ? `${tint}${line}${ANSI.reset}` : line;
}

function print(context: CliContext, text: string): void {
  context.deps.write(text.split("\n").map((line) => paint(line, context.color)).join("\n"));
}

function printJson(context: CliContext, data: unknown): void {
  context.deps.write(JSON.stringify(data, null, 2));
}

// ── Entry ───────────────────────────────────────────────────────────

/** Parse argv (without the node and script entries) and run a command; resolves to the exit code. */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    (deps.write ?? writeStdout)(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  const [commandName, ...rest] = positionals;
  if (values.help || commandName === undefined) {
    (deps.write ?? writeStdout)(USAGE);
    return values.help ? 0 : 1;
  }
  const command = COMMANDS.find((name) => name === commandName);
  if (!command) {
    logger.error(`Unknown command: ${commandName}`);
    (deps.write ?? writeStdout)(USAGE);
    return 1;
  }
  const env = deps.env ?? process.env;
  const runtime = resolveRuntimeConfig(env);
  setLogLevel(values.verbose ? "debug" : runtime.logLevel);
  const context: CliContext = {
    command,
    values,
    positionals: rest,
    configDir: values["config-dir"] ?? runtime.configDir,
    baselineDir: values["baseline-dir"] ?? runtime.baselineDir,
    outputDir: values["output-dir"] ?? runtime.resultsDir,
    projectRoot: runtime.projectRoot,
    environment: runtime.environment,
    color: runtime.useColor && !values["no-color"],
    deps: {
      env,
      exec: deps.exec,
      now: deps.now ?? (() => new Date()),
      connectWarehouse: deps.connectWarehouse ?? connectSnowflake,
      write: deps.write ?? writeStdout
    }
  };

  try {
    return await dispatch(context);
  } catch (error) {
    if (error instanceof UsageError) {
      logger.error(error.message);
      return 1;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${command} failed: ${message}`, {
      code: error instanceof BenchmarkError ? error.code : "UNEXPECTED"
    });
    return command === "compare" || command === "run-benchmark" ? 2 : 1;
  }
}

function writeStdout(text: string): void {
  process.stdout.write(`${text}\n`);
}

function dispatch(context: CliContext): Promise<number> {
  switch (context.command) {
    case "capture-baseline":
      return captureBaseline(context);
    case "run-benchmark":
      return runBenchmark(context);
    case "list-baselines":
      return listBaselines(context);
    case "delete-baseline":
      return deleteBaseline(context);
    case "compare":
      return compareFiles(context);
    case "cleanup-baselines":
      return cleanupBaselines(context);
    case "merge-reports":
      return mergeReportFiles(context);
  }
}

// ── Shared setup ────────────────────────────────────────────────────

function requirePipeline(context: CliContext): string {
  const pipeline = context.values.pipeline;
  if (!pipeline) {
    throw new UsageError(`${context.command} requires --pipeline`);
  }
  return normalizePipelineId(pipeline);
}

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new UsageError(`${flag} must be a non-negative integer, got ${value}`);
  }
  return parsed;
}

async function loadSettings(context: CliContext): Promise<BenchmarkSettings> {
  return loadBenchmarkSettings(configPath(CONFIG_FILE, context.configDir), context.environment);
}

async function loadRegistry(context: CliContext): Promise<ThresholdRegistry> {
  const { registry, errors } = await loadThresholdRegistry(configPath(THRESHOLDS_FILE, context.configDir));
  if (errors.length > 0 && context.values["strict-thresholds"]) {
    throw new ConfigError("Threshold configuration could not be loaded", errors);
  }
  return registry;
}

async function createManager(
  context: CliContext,
  withPipelines: boolean,
  settings?: BenchmarkSettings
): Promise<BaselineManager> {
  const retention = (settings ?? (await loadSettings(context))).retention;
  const catalog = withPipelines ? await loadPipelineCatalog(configPath(PIPELINES_FILE, context.configDir)) : {};
  const warehousePath = configPath(WAREHOUSE_FILE, context.configDir);
  return new BaselineManager({
    storage: new BaselineStorage(context.baselineDir),
    catalog,
    retention,
    projectRoot: context.projectRoot,
    exec: context.deps.exec,
    now: context.deps.now,
    connectWarehouse: async () =>
      context.deps.connectWarehouse(await loadWarehouseConnection(warehousePath, context.deps.env))
  });
}

function captureOptions(context: CliContext): { metricsEnabled: boolean; validationEnabled: boolean } {
  return {
    metricsEnabled: !context.values["no-metrics"],
    validationEnabled: !context.values["no-validation"]
  };
}

function reportFailures(document: SnapshotDocument): void {
  for (const error of document.summary.errors) {
    logger.error(error);
  }
}

// ── Commands ────────────────────────────────────────────────────────

async function captureBaseline(context: CliContext): Promise<number> {
  const pipeline = requirePipeline(context);
  const manager = await createManager(context, true);
  const document = await manager.captureSnapshot(pipeline, captureOptions(context));
  if (document.summary.status === "FAILED") {
    reportFailures(document);
    logger.error(`Baseline capture failed for pipeline ${pipeline}`);
    return 1;
  }

  const result = await manager.saveBaseline(document, context.values.force ?? false);
  if (!result.saved) {
    logger.error(result.error);
    return 1;
  }
  if (context.values.json) {
    printJson(context, { pipeline, filename: result.filename, captured_at: document.captured_at });
  } else {
    print(context, `Baseline saved: ${join(context.baselineDir, result.filename)}`);
  }
  return 0;
}

async function runBenchmark(context: CliContext): Promise<number> {
  const pipeline = requirePipeline(context);
  const registry = await loadRegistry(context);
  const settings = await loadSettings(context);
  const manager = await createManager(context, true, settings);

  const baseline = await manager.loadBaseline(pipeline, context.values.timestamp);
  if (baseline === null) {
    logger.error(`No baseline found for pipeline ${pipeline}. Run capture-baseline first.`);
    return 1;
  }

  const candidate = await manager.captureSnapshot(pipeline, captureOptions(context));
  const stamp = candidate.captured_at;
  await writeJsonFile(join(context.outputDir, `candidate_${pipeline}_${stamp}.json`), candidate);
  if (candidate.summary.status === "FAILED") {
    reportFailures(candidate);
    logger.error(`Candidate run failed for pipeline ${pipeline}`);
    return 2;
  }

  const comparison = comparePipeline(registry, toRunSnapshot(baseline, "baseline"), toRunSnapshot(candidate, "candidate"), {
    ignoreImprovements: context.values["ignore-improvements"] ?? false
  });

  // Both runs must carry validation records; a baseline captured without them has nothing to compare.
  const validation: ValidationReport | null =
    candidate.validation.validation_enabled && get(baseline, ["validation", "validation_enabled"]) === true
      ? compareValidationRecords(validationRecords(baseline), candidate.validation.models ?? {}, context.deps.now())
      : null;

  const builder = new BenchmarkReportBuilder(pipeline, {
    pipelineName: candidate.pipeline_metadata.name,
    topLimit: settings.topLimit,
    now: context.deps.now
  })
    .addMetadata({
      executionStart: parseRunTimestamp(candidate.execution_context.start_time),
      executionEnd: parseRunTimestamp(candidate.execution_context.end_time),
      gitCommit: candidate.execution_context.git_commit,
      gitBranch: await currentBranch(context.deps.exec),
      dbtVersion: candidate.execution_context.dbt_version,
      schemaName: candidate.pipeline_metadata.schema ?? null,
      environment: settings.environment
    })
    .addMetrics(candidate.per_model, candidate.pipeline_aggregations)
    .addComparison(comparison, gitCommitOf(baseline));
  if (validation) {
    builder.addValidation(validation);
  }
  const reportPath = await builder.generateSummary().save(context.outputDir);

  const jsonReport = toJsonReport(comparison);
  await writeJsonFile(join(context.outputDir, `comparison_${pipeline}_${stamp}.json`), jsonReport);
  await writeTextFileAtomic(join(context.outputDir, `comparison_${pipeline}_${stamp}.txt`), formatTextReport(comparison));

  if (context.values.json) {
    printJson(context, jsonReport);
  } else {
    print(context, formatTextReport(comparison));
    print(context, `Report: ${reportPath}`);
  }

  const exitCode = generateSummary(comparison).exitCode;
  return validation?.overallStatus === "FAIL" ? 2 : exitCode;
}

async function listBaselines(context: CliContext): Promise<number> {
  const manager = await createManager(context, false);
  const summaries = await manager.listBaselines(context.values.pipeline);
  if (context.values.json) {
    printJson(context, summaries);
    return 0;
  }
  if (summaries.length === 0) {
    print(context, "No baselines found");
    return 0;
  }
  const lines = summaries.map((summary) =>
    [
      summary.pipeline.padEnd(16),
      summary.timestamp.padEnd(16),
      summary.status.padEnd(8),
      `${summary.modelsExecuted} models`.padEnd(12),
      summary.gitCommit ? summary.gitCommit.slice(0, 8) : "-"
    ].join(" ")
  );
  print(context, [`${"PIPELINE".padEnd(16)} ${"TIMESTAMP".padEnd(16)} ${"STATUS".padEnd(8)} ${"MODELS".padEnd(12)} COMMIT`, ...lines].join("\n"));
  return 0;
}

async function deleteBaseline(context: CliContext): Promise<number> {
  const pipeline = requirePipeline(context);
  const manager = await createManager(context, false);
  const result = await manager.deleteBaseline(pipeline, context.values.timestamp, context.values.yes ?? false);
  if (!result.deleted) {
    logger.error(result.error);
    return 1;
  }
  print(context, result.message);
  return 0;
}

async function compareFiles(context: CliContext): Promise<number> {
  const { baseline: baselinePath, candidate: candidatePath } = context.values;
  if (!baselinePath || !candidatePath) {
    throw new UsageError("compare requires --baseline and --candidate");
  }
  const baseline = await readRequiredJson(baselinePath);
  const candidate = await readRequiredJson(candidatePath);
  const registry = await loadRegistry(context);

  const comparison = comparePipeline(registry, toRunSnapshot(baseline, "baseline"), toRunSnapshot(candidate, "candidate"), {
    ignoreImprovements: context.values["ignore-improvements"] ?? false
  });
  const jsonReport = toJsonReport(comparison);
  if (context.values.output) {
    await writeJsonFile(context.values.output, jsonReport);
    logger.info(`Comparison written to ${context.values.output}`);
  }
  if (context.values.json) {
    printJson(context, jsonReport);
  } else {
    print(context, formatTextReport(comparison));
  }
  return generateSummary(comparison).exitCode;
}

async function cleanupBaselines(context: CliContext): Promise<number> {
  const manager = await createManager(context, false);
  const result = await manager.cleanupBaselines({
    pipelineId: context.values.pipeline,
    maxAgeDays: parseCount(context.values["max-age-days"], "--max-age-days"),
    maxCount: parseCount(context.values["max-count"], "--max-count"),
    dryRun: context.values["dry-run"] ?? false
  });
  if (context.values.json) {
    printJson(context, result);
    return 0;
  }
  const verb = result.dryRun ? "Would delete" : "Deleted";
  print(context, [`${verb} ${result.files.length} baseline(s)`, ...result.files.map((file) => `  ${file}`)].join("\n"));
  return 0;
}

async function mergeReportFiles(context: CliContext): Promise<number> {
  if (context.positionals.length === 0) {
    throw new UsageError("merge-reports requires at least one report file");
  }
  const reports: BenchmarkReport[] = [];
  for (const path of context.positionals) {
    const result = await validateReport(await readRequiredJson(path));
    if (!result.valid) {
      throw new UsageError(`Not a benchmark report: ${path} (${result.errors.join("; ")})`);
    }
    reports.push(result.value);
  }
  const merged = mergeReports(reports, context.deps.now());
  const output =
    context.values.output ?? join(context.outputDir, `merged_report_${formatTimestamp(context.deps.now())}.json`);
  await writeJsonFile(output, merged);
  if (context.values.json) {
    printJson(context, merged.cross_pipeline_summary);
  } else {
    const summary = merged.cross_pipeline_summary;
    print(context, `Merged ${summary.total_pipelines} report(s): ${summary.overall_status.toUpperCase()} (${output})`);
  }
  return 0;
}

// ── Helpers ─────────────────────────────────────────────────────────

async function readRequiredJson(path: string): Promise<unknown> {
  const raw = await readTextFile(path);
  if (raw === null) {
    throw new UsageError(`File not found: ${path}`);
  }
  const data: unknown = JSON.parse(raw);
  return data;
}

function parseRunTimestamp(value: string | null): Date | null {
  return value ? parseTimestamp(value) : null;
}

function gitCommitOf(document: unknown): string | null {
  const commit: unknown = get(document, ["execution_context", "git_commit"]);
  return typeof commit === "string" ? commit : null;
}
