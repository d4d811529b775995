/**
 * Workflow orchestrator
 *
 * Runs named stages strictly in order over the working set. After each
 * stage the working set and its statistics are persisted, a StageRecord is
 * appended to the workflow log, and only then does the next stage start.
 * The next stage consumes the persisted snapshot, so a resumed run sees
 * exactly the bytes an uninterrupted run saw.
 */

import type { Logger } from "pino";
import type { TextGenerator } from "../../adapters/llm/types.js";
import { resolveStageSettings, type WorkflowSettings } from "../../config/workflow.js";
import { decodeDataset, type WorkflowRecord } from "../../schemas/record.js";
import { ConfigError, InputError, StageFailedError, describeError } from "../../utils/errors.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { Stage, StageContext, StageOutcome, StageRecord, WorkflowState } from "./types.js";
import { INPUT_STAGE_NAME, type WorkflowStore } from "./workflow-store.js";

export interface OrchestratorOptions {
  stages: readonly Stage[];
  store: WorkflowStore;
  settings: WorkflowSettings;
  generator: TextGenerator;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface WorkflowResult {
  records: WorkflowRecord[];
  /** Entries appended by this invocation */
  stageRecords: StageRecord[];
  runDir: string;
  finalPath: string;
}

export interface ResumeOptions {
  /** Stage to re-run first; every later stage runs too */
  fromStage: string;
}

export class WorkflowOrchestrator {
  private readonly stages: readonly Stage[];
  private readonly store: WorkflowStore;
  private readonly settings: WorkflowSettings;
  private readonly generator: TextGenerator;
  private readonly clock: () => Date;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private currentState: WorkflowState = { status: "not_started", currentStageIndex: -1, workingSetSize: 0 };

  constructor(options: OrchestratorOptions) {
    const names = new Set<string>();
    for (const stage of options.stages) {
      if (stage.name === INPUT_STAGE_NAME) {
        throw new ConfigError(`Stage name "${INPUT_STAGE_NAME}" is reserved`);
      }
      if (names.has(stage.name)) {
        throw new ConfigError(`Duplicate stage name "${stage.name}"`);
      }
      names.add(stage.name);
    }

    this.stages = options.stages;
    this.store = options.store;
    this.settings = options.settings;
    this.generator = options.generator;
    this.clock = options.clock ?? (() => new Date());
    this.sleep = options.sleep;
    this.logger = options.logger ?? log;
  }

  get state(): WorkflowState {
    return { ...this.currentState };
  }

  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /**
   * Persist the input as the "input" snapshot and run every stage
   */
  async run(records: readonly WorkflowRecord[]): Promise<WorkflowResult> {
    const startedAt = this.clock();
    emit(TelemetryEvents.WorkflowStarted, {
      run_dir: this.store.runDir,
      input_records: records.length,
      stages: this.stageNames,
    });

    const persisted = await this.store.saveStage(0, INPUT_STAGE_NAME, records, {
      stage: INPUT_STAGE_NAME,
      kind: "ingest",
      input_records: records.length,
      output_records: records.length,
      modified_records: 0,
      deleted_records: 0,
    });
    const inputRecord: StageRecord = {
      name: INPUT_STAGE_NAME,
      kind: "ingest",
      index: 0,
      started_at: startedAt.toISOString(),
      completed_at: this.clock().toISOString(),
      input_count: records.length,
      output_count: records.length,
      modified_count: 0,
      deleted_count: 0,
      persisted_path: persisted.persistedPath,
      statistics_path: persisted.statisticsPath,
    };
    await this.store.appendLog(inputRecord);

    const working = decodeDataset(JSON.parse(persisted.serialized));
    return this.runFrom(0, working, startedAt, undefined, [inputRecord]);
  }

  /**
   * Re-run `fromStage` and every later stage on the most recent persisted
   * output of the stage before it
   */
  async resume(options: ResumeOptions): Promise<WorkflowResult> {
    const startIndex = this.stages.findIndex((stage) => stage.name === options.fromStage);
    if (startIndex === -1) {
      throw new ConfigError(
        `Unknown stage "${options.fromStage}"; expected one of: ${this.stageNames.join(", ")}`
      );
    }

    const predecessor = startIndex === 0 ? INPUT_STAGE_NAME : this.stages[startIndex - 1].name;
    const logEntries = await this.store.readLog();
    const source = logEntries.filter((entry) => entry.name === predecessor).at(-1);
    if (!source) {
      throw new InputError(
        `Cannot resume from "${options.fromStage}": no persisted output for "${predecessor}" in ${this.store.runDir}`
      );
    }

    const records = await this.store.loadSnapshot(source.persisted_path);
    this.logger.info(
      { from_stage: options.fromStage, source_stage: predecessor, source_path: source.persisted_path, records: records.length },
      "Resuming workflow"
    );
    emit(TelemetryEvents.WorkflowResumed, {
      run_dir: this.store.runDir,
      from_stage: options.fromStage,
      source_stage: predecessor,
      records: records.length,
    });

    return this.runFrom(startIndex, records, this.clock(), options.fromStage, []);
  }

  private async runFrom(
    startIndex: number,
    initial: WorkflowRecord[],
    startedAt: Date,
    resumedFrom: string | undefined,
    stageRecords: StageRecord[]
  ): Promise<WorkflowResult> {
    let working = initial;
    const inputCount = initial.length;
    this.currentState = { status: "running", currentStageIndex: startIndex, workingSetSize: working.length };

    for (let i = startIndex; i < this.stages.length; i++) {
      const stage = this.stages[i];
      const entry = await this.runStage(stage, i, working);
      stageRecords.push(entry.record);
      working = entry.records;
    }

    const finalPath = await this.store.writeFinal(working);
    await this.store.writeSummary({
      run_dir: this.store.runDir,
      started_at: startedAt.toISOString(),
      completed_at: this.clock().toISOString(),
      resumed_from: resumedFrom ?? null,
      stages: this.stageNames,
      input_records: inputCount,
      final_records: working.length,
    });

    this.currentState = {
      status: "completed",
      currentStageIndex: this.stages.length - 1,
      workingSetSize: working.length,
    };
    emit(TelemetryEvents.WorkflowCompleted, {
      run_dir: this.store.runDir,
      input_records: inputCount,
      final_records: working.length,
      resumed_from: resumedFrom,
    });

    return { records: working, stageRecords, runDir: this.store.runDir, finalPath };
  }

  private async runStage(
    stage: Stage,
    index: number,
    records: WorkflowRecord[]
  ): Promise<{ record: StageRecord; records: WorkflowRecord[] }> {
    const stageNumber = index + 1;
    const startedAt = this.clock();
    const stageLogger = this.logger.child({ stage: stage.name });
    this.currentState = { status: "running", currentStageIndex: index, workingSetSize: records.length };

    const ctx: StageContext = {
      stageName: stage.name,
      settings: this.settings,
      stageSettings: resolveStageSettings(this.settings, stage.name),
      generator: this.generator,
      logger: stageLogger,
      sleep: this.sleep,
    };

    emit(TelemetryEvents.StageStarted, { stage: stage.name, kind: stage.kind, input_records: records.length });

    let outcome: StageOutcome;
    try {
      outcome = await stage.run(records, ctx);
    } catch (error) {
      this.currentState = { status: "failed", currentStageIndex: index, workingSetSize: records.length };
      stageLogger.error({ error: describeError(error) }, "Stage failed; workflow aborted");
      emit(TelemetryEvents.StageFailed, { stage: stage.name, kind: stage.kind, error: describeError(error) });
      throw new StageFailedError(stage.name, index, error);
    }

    const completedAt = this.clock();
    const statistics: Record<string, unknown> = {
      stage: stage.name,
      kind: stage.kind,
      input_records: records.length,
      output_records: outcome.records.length,
      modified_records: outcome.modifiedCount,
      deleted_records: outcome.deletedCount,
      started_at: startedAt.toISOString(),
      completed_at: completedAt.toISOString(),
      ...outcome.details,
    };

    const persisted = await this.store.saveStage(stageNumber, stage.name, outcome.records, statistics);
    const stageRecord: StageRecord = {
      name: stage.name,
      kind: stage.kind,
      index: stageNumber,
      started_at: startedAt.toISOString(),
      completed_at: completedAt.toISOString(),
      input_count: records.length,
      output_count: outcome.records.length,
      modified_count: outcome.modifiedCount,
      deleted_count: outcome.deletedCount,
      persisted_path: persisted.persistedPath,
      statistics_path: persisted.statisticsPath,
    };
    await this.store.appendLog(stageRecord);

    emit(TelemetryEvents.StageCompleted, {
      stage: stage.name,
      kind: stage.kind,
      input_records: records.length,
      output_records: outcome.records.length,
      modified_records: outcome.modifiedCount,
      deleted_records: outcome.deletedCount,
      duration_ms: completedAt.getTime() - startedAt.getTime(),
    });

    return { record: stageRecord, records: decodeDataset(JSON.parse(persisted.serialized)) };
  }
}
