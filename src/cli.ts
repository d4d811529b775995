#!/usr/bin/env node
/**
 * Workflow CLI
 *
 *   orm-sql-refinery run --input data/orm_sql.json
 *   orm-sql-refinery run --input data/raw/
 *   orm-sql-refinery resume --from redundant_sql_validation --run workflow_output/workflow_20250101_093000
 */

import { config } from "./config/index.js";
import { loadWorkflowSettings } from "./config/workflow.js";
import { parseCliArgs, USAGE, type CliCommand } from "./cli-args.js";
import { FatalError, describeError } from "./utils/errors.js";
import { flushMetrics, log } from "./utils/telemetry.js";
import { SERVICE_VERSION } from "./version.js";
import { resumeWorkflow, runWorkflow, type WorkflowResult } from "./workflow/index.js";

async function execute(command: Exclude<CliCommand, { command: "help" | "version" }>): Promise<WorkflowResult> {
  const settings = loadWorkflowSettings(command.configPath);
  if (command.command === "run") {
    return runWorkflow({ ...command, settings });
  }
  return resumeWorkflow({ ...command, settings });
}

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error(`[orm-sql-refinery] ${describeError(error)}\n\n${USAGE}`);
    return 2;
  }

  if (command.command === "help") {
    // eslint-disable-next-line no-console
    console.log(USAGE);
    return 0;
  }
  if (command.command === "version") {
    // eslint-disable-next-line no-console
    console.log(SERVICE_VERSION);
    return 0;
  }

  try {
    // Parsing here surfaces environment errors before any stage runs
    log.level = config.runtime.logLevel;
    log.info({ command: command.command, env: config.runtime.nodeEnv, version: SERVICE_VERSION }, "Workflow starting");
    const result = await execute(command);
    log.info(
      { run_dir: result.runDir, final_dataset: result.finalPath, final_records: result.records.length, version: SERVICE_VERSION },
      "Workflow finished"
    );
    return 0;
  } catch (error) {
    log.error(
      { error: describeError(error), fatal: error instanceof FatalError },
      "Workflow aborted"
    );
    return 1;
  } finally {
    await flushMetrics();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("[orm-sql-refinery] Unexpected failure:", describeError(error));
    process.exitCode = 1;
  }
);
