import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  loadBenchmarkSettings,
  loadPipelineCatalog,
  loadThresholdRegistry,
  loadWarehouseConnection,
  readYamlFile,
  resolveEnvVar
} from "../src/config/loader.js";
import { resolveRuntimeConfig } from "../src/config/env.js";
import { validateSnapshot } from "../src/contracts/validators.js";
import { ConfigError } from "../src/errors.js";

const SAMPLE_CONFIG_DIR = fileURLToPath(new URL("../../benchmark/config/", import.meta.url));

const WAREHOUSE_ENV = {
  SNOWFLAKE_ACCOUNT: "test-account",
  SNOWFLAKE_USER: "test-user",
  SNOWFLAKE_PASSWORD: "test-secret",
  SNOWFLAKE_DATABASE: "TEST_DB",
  SNOWFLAKE_WAREHOUSE: "TEST_WH",
  SNOWFLAKE_ROLE: "TEST_ROLE"
};

describe("configuration loading", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "benchmark-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, content, "utf8");
    return path;
  }

  describe("readYamlFile", () => {
    it("returns null for a missing file", async () => {
      expect(await readYamlFile(join(dir, "missing.yaml"))).toBeNull();
    });

    it("raises a ConfigError for invalid YAML", async () => {
      const path = await write("broken.yaml", "thresholds: [unclosed\n");
      await expect(readYamlFile(path)).rejects.toThrow(ConfigError);
    });
  });

  describe("loadThresholdRegistry", () => {
    it("loads the sample thresholds", async () => {
      const { registry, errors } = await loadThresholdRegistry(join(SAMPLE_CONFIG_DIR, "thresholds.yaml"));

      expect(errors).toEqual([]);
      expect(registry.getRule("bytes_scanned")).toEqual({ percentCap: 20, severityHint: "medium" });
      expect(registry.getRule("spilling_to_remote_storage_bytes")).toEqual({ absoluteCap: 0, severityHint: "high" });
    });

    it("falls back to an empty registry when the file is missing", async () => {
      const path = join(dir, "thresholds.yaml");
      const { registry, errors } = await loadThresholdRegistry(path);

      expect(registry.size).toBe(0);
      expect(errors).toEqual([`Threshold configuration not found: ${path}`]);
    });

    it("falls back to an empty registry when an entry is invalid", async () => {
      const path = await write(
        "thresholds.yaml",
        ["thresholds:", "  bytes_scanned:", "    max_increase_percent: 20", "    severity: extreme"].join("\n")
      );
      const { registry, errors } = await loadThresholdRegistry(path);

      expect(registry.size).toBe(0);
      expect(errors).toEqual(["/thresholds/bytes_scanned/severity must be equal to one of the allowed values"]);
    });

    it("falls back to an empty registry when the YAML cannot be parsed", async () => {
      const path = await write("thresholds.yaml", "thresholds: [unclosed\n");
      const { registry, errors } = await loadThresholdRegistry(path);

      expect(registry.size).toBe(0);
      expect(errors).toHaveLength(1);
    });
  });

  describe("loadPipelineCatalog", () => {
    it("loads the sample pipelines", async () => {
      const catalog = await loadPipelineCatalog(join(SAMPLE_CONFIG_DIR, "pipelines.yaml"));

      expect(Object.keys(catalog)).toEqual(["A", "B", "C"]);
      expect(catalog["C"]?.dependencies).toEqual(["B"]);
      expect(catalog["A"]?.schema).toBe("PIPELINE_A");
    });

    it("rejects a pipeline without a schema", async () => {
      const path = await write(
        "pipelines.yaml",
        ["pipelines:", "  A:", "    name: Staging", "    models: path:models/a", "    dependencies: []"].join("\n")
      );
      await expect(loadPipelineCatalog(path)).rejects.toThrow("/pipelines/A must have required property 'schema'");
    });

    it("rejects a dependency on an unknown pipeline", async () => {
      const path = await write(
        "pipelines.yaml",
        [
          "pipelines:",
          "  B:",
          "    name: Marts",
          "    schema: PIPELINE_B",
          "    models: path:models/b",
          "    dependencies: [A]"
        ].join("\n")
      );
      await expect(loadPipelineCatalog(path)).rejects.toThrow("Dependency pipeline A of B not found in configuration");
    });

    it("requires the file to exist", async () => {
      await expect(loadPipelineCatalog(join(dir, "pipelines.yaml"))).rejects.toThrow(ConfigError);
    });
  });

  describe("loadBenchmarkSettings", () => {
    it("uses defaults when the file is missing", async () => {
      expect(await loadBenchmarkSettings(join(dir, "config.yaml"), "ci")).toEqual({
        retention: { max_age_days: 90, max_count: 10 },
        environment: "ci",
        topLimit: 10
      });
    });

    it("merges partial settings over the defaults", async () => {
      const path = await write(
        "config.yaml",
        ["baseline:", "  retention:", "    max_count: 3", "report:", "  top_limit: 5"].join("\n")
      );
      expect(await loadBenchmarkSettings(path)).toEqual({
        retention: { max_age_days: 90, max_count: 3 },
        environment: "dev",
        topLimit: 5
      });
    });

    it("rejects a negative retention count", async () => {
      const path = await write("config.yaml", ["baseline:", "  retention:", "    max_count: -1"].join("\n"));
      await expect(loadBenchmarkSettings(path)).rejects.toThrow(ConfigError);
    });
  });

  describe("loadWarehouseConnection", () => {
    it("resolves environment placeholders in the sample file", async () => {
      const connection = await loadWarehouseConnection(join(SAMPLE_CONFIG_DIR, "warehouse.yaml"), WAREHOUSE_ENV);
      expect(connection).toEqual({
        account: "test-account",
        user: "test-user",
        password: "test-secret",
        database: "TEST_DB",
        warehouse: "TEST_WH",
        role: "TEST_ROLE"
      });
    });

    it("fails when a referenced variable is not set", async () => {
      const { SNOWFLAKE_PASSWORD: _unused, ...env } = WAREHOUSE_ENV;
      await expect(loadWarehouseConnection(join(SAMPLE_CONFIG_DIR, "warehouse.yaml"), env)).rejects.toThrow(
        "Environment variable SNOWFLAKE_PASSWORD not set"
      );
    });
  });
});

describe("resolveEnvVar", () => {
  it("passes plain values through", () => {
    expect(resolveEnvVar("literal", {})).toBe("literal");
  });

  it("accepts either quote style", () => {
    expect(resolveEnvVar(`{{ env_var("NAME") }}`, { NAME: "value" })).toBe("value");
    expect(resolveEnvVar("{{env_var('NAME')}}", { NAME: "value" })).toBe("value");
  });
});

describe("resolveRuntimeConfig", () => {
  it("uses defaults without overrides", () => {
    expect(resolveRuntimeConfig({})).toEqual({
      configDir: "benchmark/config",
      baselineDir: "benchmark/baselines",
      resultsDir: "benchmark/results",
      projectRoot: ".",
      environment: "dev",
      useColor: true,
      logLevel: "info"
    });
  });

  it("reads overrides from the environment", () => {
    const config = resolveRuntimeConfig({ BENCHMARK_BASELINE_DIR: "/tmp/baselines", NO_COLOR: "1", LOG_LEVEL: "DEBUG" });
    expect(config.baselineDir).toBe("/tmp/baselines");
    expect(config.useColor).toBe(false);
    expect(config.logLevel).toBe("debug");
  });
});

describe("validateSnapshot", () => {
  it("rejects a malformed capture timestamp", async () => {
    const result = await validateSnapshot({
      pipeline: "A",
      captured_at: "2024-03-01",
      per_model: {},
      pipeline_aggregations: {},
      summary: { status: "SUCCESS", errors: [] }
    });
    expect(result.valid).toBe(false);
  });
});
