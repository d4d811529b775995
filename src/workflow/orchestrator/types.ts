import type { Logger } from "pino";
import type { TextGenerator } from "../../adapters/llm/types.js";
import type { StageSettings, WorkflowSettings } from "../../config/workflow.js";
import type { WorkflowRecord } from "../../schemas/record.js";

export type StageKind = "ingest" | "cleaning" | "tagging" | "validation" | "fix";

/**
 * Everything a stage may use; stages never read ambient configuration
 */
export interface StageContext {
  readonly stageName: string;
  readonly settings: WorkflowSettings;
  /** Limits resolved for this stage */
  readonly stageSettings: StageSettings;
  readonly generator: TextGenerator;
  readonly logger: Logger;
  /** Delay used between retries (overridable in tests) */
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface StageOutcome {
  records: WorkflowRecord[];
  /** Records whose value or tags changed and were kept */
  modifiedCount: number;
  deletedCount: number;
  /** Stage-specific statistics merged into statistics.json */
  details: Record<string, unknown>;
}

export interface Stage {
  readonly name: string;
  readonly kind: StageKind;
  run(records: WorkflowRecord[], ctx: StageContext): Promise<StageOutcome>;
}

/**
 * One entry of workflow_log.json
 */
export interface StageRecord {
  name: string;
  kind: StageKind;
  index: number;
  started_at: string;
  completed_at: string;
  input_count: number;
  output_count: number;
  modified_count: number;
  deleted_count: number;
  /** Snapshot path relative to the run directory */
  persisted_path: string;
  statistics_path: string;
}

export type WorkflowStatus = "not_started" | "running" | "completed" | "failed";

export interface WorkflowState {
  status: WorkflowStatus;
  /** Index into the stage list of the stage running or last completed; -1 before the first */
  currentStageIndex: number;
  workingSetSize: number;
}
