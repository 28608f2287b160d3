#!/usr/bin/env node
import { runCli } from "./cli.js";
import { logger } from "./utils/logger.js";

void runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    logger.error("Benchmark failed", { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 2;
  });
