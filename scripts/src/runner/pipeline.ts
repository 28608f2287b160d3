import { DBT_RUN_TIMEOUT_MS, DBT_VERSION_TIMEOUT_MS } from "../constants.js";
import type { PipelineCatalog } from "../config/loader.js";
import { exec as defaultExec } from "../utils/exec.js";
import type { CommandExecutor } from "../utils/exec.js";
import { logger } from "../utils/logger.js";

export interface PipelineRunResult {
  pipeline: string;
  targetSchema: string | null;
  dependenciesExecuted: string[];
  modelsExecuted: string[];
  executionStart: Date;
  executionEnd: Date;
  dbtVersion: string | null;
  success: boolean;
  errors: string[];
}

export interface DbtStepResult {
  success: boolean;
  models: string[];
  stderr: string[];
}

export interface PipelineRunnerOptions {
  projectRoot?: string;
  exec?: CommandExecutor;
  now?: () => Date;
}

const MODEL_LINE = /\bsql (?:\w+ )?model\b/;
const VERSION_LINES = [/dbt version:?\s+(\S+)/i, /installed(?: version)?:\s*(\S+)/i];

export function normalizePipelineId(id: string): string {
  return id.trim().toUpperCase();
}

/**
 * Runs the dbt models of a pipeline after the pipelines it depends on.
 * Each pipeline in the chain is executed once, dependencies first.
 */
export class PipelineRunner {
  private readonly projectRoot: string;
  private readonly exec: CommandExecutor;
  private readonly now: () => Date;

  constructor(
    private readonly catalog: PipelineCatalog,
    options: PipelineRunnerOptions = {}
  ) {
    this.projectRoot = options.projectRoot ?? ".";
    this.exec = options.exec ?? defaultExec;
    this.now = options.now ?? (() => new Date());
  }

  resolveDependencies(pipelineId: string): string[] {
    const order: string[] = [];
    const visited = new Set<string>();

    const visit = (id: string): void => {
      if (visited.has(id)) return;
      visited.add(id);
      const definition = this.catalog[id];
      if (!definition) {
        logger.warn(`Pipeline ${id} not found in configuration`);
        return;
      }
      definition.dependencies.forEach(visit);
      order.push(id);
    };

    visit(normalizePipelineId(pipelineId));
    logger.debug("Execution order determined", { order });
    return order;
  }

  async dbtVersion(): Promise<string | null> {
    try {
      const { stdout } = await this.exec("dbt", ["--version"], {
        cwd: this.projectRoot,
        timeoutMs: DBT_VERSION_TIMEOUT_MS
      });
      return parseDbtVersion(stdout);
    } catch (error) {
      logger.warn("Unable to retrieve dbt version", { error: String(error) });
      return null;
    }
  }

  async executeDbt(pipelineId: string, captureModels = false): Promise<DbtStepResult> {
    const definition = this.catalog[pipelineId];
    if (!definition) {
      return { success: false, models: [], stderr: [`Pipeline ${pipelineId} not found in configuration`] };
    }
    const args = ["run", "--select", definition.models];
    logger.info(`Executing pipeline ${pipelineId}: dbt ${args.join(" ")}`, { schema: definition.schema });

    try {
      const result = await this.exec("dbt", args, {
        cwd: this.projectRoot,
        timeoutMs: DBT_RUN_TIMEOUT_MS,
        allowFailure: true
      });
      const stderr = result.stderr ? result.stderr.split("\n").filter((line) => line.trim() !== "") : [];
      const models = captureModels ? parseDbtOutput(result.stdout) : [];

      if (result.timedOut) {
        logger.error(`dbt execution for pipeline ${pipelineId} timed out`);
        return { success: false, models: [], stderr: [`dbt execution for pipeline ${pipelineId} timed out`] };
      }
      if (result.exitCode !== 0) {
        logger.error(`dbt run failed for pipeline ${pipelineId}`, { exitCode: result.exitCode });
        return { success: false, models, stderr };
      }
      logger.info(`Pipeline ${pipelineId} executed successfully`);
      return { success: true, models, stderr };
    } catch (error) {
      const message = `Error executing dbt for pipeline ${pipelineId}: ${String(error)}`;
      logger.error(message);
      return { success: false, models: [], stderr: [message] };
    }
  }

  async run(pipelineId: string): Promise<PipelineRunResult> {
    const id = normalizePipelineId(pipelineId);
    const result: PipelineRunResult = {
      pipeline: id,
      targetSchema: null,
      dependenciesExecuted: [],
      modelsExecuted: [],
      executionStart: this.now(),
      executionEnd: this.now(),
      dbtVersion: null,
      success: false,
      errors: []
    };

    const definition = this.catalog[id];
    if (!definition) {
      result.errors.push(`Pipeline ${id} not found in configuration`);
      result.executionEnd = this.now();
      return result;
    }
    result.targetSchema = definition.schema;
    result.dbtVersion = await this.dbtVersion();

    const order = this.resolveDependencies(id);
    result.dependenciesExecuted = order.slice(0, -1);

    for (const step of order) {
      const isTarget = step === id;
      const outcome = await this.executeDbt(step, isTarget);
      if (isTarget) {
        result.modelsExecuted = outcome.models;
      }
      if (!outcome.success) {
        result.errors.push(`Execution failed for pipeline ${step}`, ...outcome.stderr);
        result.executionEnd = this.now();
        return result;
      }
    }

    result.success = true;
    result.executionEnd = this.now();
    logger.info(`Pipeline ${id} execution completed`, {
      pipelines: order.length,
      models: result.modelsExecuted.length
    });
    return result;
  }
}

/** Model names from dbt progress lines such as `1 of 5 OK created sql table model analytics.orders`. */
export function parseDbtOutput(output: string): string[] {
  const models: string[] = [];
  for (const line of output.split("\n")) {
    if (!MODEL_LINE.test(line)) continue;
    const qualified = line.split(/\s+/).find((token) => token.includes(".") && !token.startsWith("("));
    const name = qualified?.split(".").pop();
    if (name && !models.includes(name)) {
      models.push(name);
    }
  }
  if (models.length > 0) {
    logger.debug("Extracted model names from dbt output", { count: models.length });
  }
  return models;
}

export function parseDbtVersion(output: string): string | null {
  for (const line of output.split("\n")) {
    for (const pattern of VERSION_LINES) {
      const match = pattern.exec(line);
      if (match?.[1]) {
        return match[1];
      }
    }
  }
  return null;
}
