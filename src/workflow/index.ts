/**
 * Entry points for running and resuming a workflow from files on disk
 */

import { createGenerator } from "../adapters/llm/router.js";
import type { TextGenerator } from "../adapters/llm/types.js";
import { config } from "../config/index.js";
import { loadWorkflowSettings, type WorkflowSettings } from "../config/workflow.js";
import { InputError } from "../utils/errors.js";
import { WorkflowOrchestrator, type WorkflowResult } from "./orchestrator/orchestrator.js";
import { loadDataset, WorkflowStore } from "./orchestrator/workflow-store.js";
import { createDefaultStages, createStages } from "./stages/index.js";

interface CommonOptions {
  /** Base directory holding run directories */
  outputDir?: string;
  /** Stage names in run order; defaults to every built-in stage */
  stageNames?: readonly string[];
  settings?: WorkflowSettings;
  generator?: TextGenerator;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface RunWorkflowOptions extends CommonOptions {
  inputPath: string;
}

export interface ResumeWorkflowOptions extends CommonOptions {
  /** Run directory to resume; the latest run under outputDir when omitted */
  runDir?: string;
  fromStage: string;
}

function buildOrchestrator(store: WorkflowStore, options: CommonOptions): WorkflowOrchestrator {
  return new WorkflowOrchestrator({
    stages: options.stageNames ? createStages(options.stageNames) : createDefaultStages(),
    store,
    settings: options.settings ?? loadWorkflowSettings(),
    generator: options.generator ?? createGenerator(),
    clock: options.clock,
    sleep: options.sleep,
  });
}

export async function runWorkflow(options: RunWorkflowOptions): Promise<WorkflowResult> {
  const records = await loadDataset(options.inputPath);
  const clock = options.clock ?? (() => new Date());
  const store = await WorkflowStore.create(options.outputDir ?? config.workflow.outputDir, clock());
  return buildOrchestrator(store, { ...options, clock }).run(records);
}

export async function resumeWorkflow(options: ResumeWorkflowOptions): Promise<WorkflowResult> {
  const baseDir = options.outputDir ?? config.workflow.outputDir;
  const runDir = options.runDir ?? (await WorkflowStore.findLatestRun(baseDir));
  if (!runDir) {
    throw new InputError(`No workflow run found under ${baseDir}`);
  }
  const store = await WorkflowStore.open(runDir);
  return buildOrchestrator(store, options).resume({ fromStage: options.fromStage });
}

export { WorkflowOrchestrator, type WorkflowResult } from "./orchestrator/orchestrator.js";
export { WorkflowStore } from "./orchestrator/workflow-store.js";
