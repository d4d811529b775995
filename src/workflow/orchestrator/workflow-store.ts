/**
 * Durable storage for one workflow run
 *
 * Layout under the run directory:
 *   workflow_log.json                   ordered StageRecord entries
 *   stages/NN_<stage>/records.json      working set after the stage
 *   stages/NN_<stage>/statistics.json   stage statistics
 *   final_dataset.json                  output of the last stage
 *   workflow_summary.json               run summary
 *
 * Every file is written atomically (temp file, then rename).
 */

import { access, mkdir, readFile, readdir, rename, stat, writeFile } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { decodeDataset, encodeDataset, withMetadataDefault, type WorkflowRecord } from "../../schemas/record.js";
import { InputError, describeError, formatZodIssues } from "../../utils/errors.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { StageRecord } from "./types.js";

export const WORKFLOW_LOG_FILE = "workflow_log.json";
export const FINAL_DATASET_FILE = "final_dataset.json";
export const SUMMARY_FILE = "workflow_summary.json";
export const INPUT_STAGE_NAME = "input";

const RUN_DIR_PATTERN = /^workflow_\d{8}_\d{6}(?:_\d+)?$/;

const StageRecordSchema = z.object({
  name: z.string().min(1),
  kind: z.enum(["ingest", "cleaning", "tagging", "validation", "fix"]),
  index: z.number().int().nonnegative(),
  started_at: z.string(),
  completed_at: z.string(),
  input_count: z.number().int().nonnegative(),
  output_count: z.number().int().nonnegative(),
  modified_count: z.number().int().nonnegative(),
  deleted_count: z.number().int().nonnegative(),
  persisted_path: z.string().min(1),
  statistics_path: z.string().min(1),
});

const WorkflowLogSchema = z.array(StageRecordSchema);

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Run directory name for a start time, e.g. workflow_20250101_093000
 */
export function runDirectoryName(startedAt: Date): string {
  return (
    `workflow_${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}` +
    `_${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`
  );
}

export function serializeJson(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, serializeJson(data), "utf-8");
  await rename(tempPath, path);
}

async function readText(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new InputError(`Cannot read ${what} at ${path}: ${describeError(error)}`, { cause: error });
  }
}

function parseJson(content: string, path: string, what: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new InputError(`${what} at ${path} is not valid JSON: ${describeError(error)}`, { cause: error });
  }
}

async function readJson(path: string, what: string): Promise<unknown> {
  return parseJson(await readText(path, what), path, what);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    throw new InputError(`Cannot read dataset at ${path}: ${describeError(error)}`, { cause: error });
  }
}

/**
 * Raw dataset files of a directory, in name order
 */
export async function listDatasetFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(dir, name));
}

/**
 * Read and decode a dataset
 *
 * `path` is either one dataset file or a directory of raw `*.json` files.
 * Records from a directory carry the file they came from as `source_file`
 * unless they already name one.
 *
 * @throws InputError when a file is unreadable or not a dataset, or the
 * directory holds no `*.json` files
 */
export async function loadDataset(path: string): Promise<WorkflowRecord[]> {
  const fromDirectory = await isDirectory(path);
  const files = fromDirectory ? await listDatasetFiles(path) : [path];
  if (files.length === 0) {
    throw new InputError(`No *.json dataset files in ${path}`);
  }

  const records: WorkflowRecord[] = [];
  let sizeBytes = 0;
  for (const file of files) {
    const content = await readText(file, "dataset");
    sizeBytes += Buffer.byteLength(content, "utf-8");
    let decoded: WorkflowRecord[];
    try {
      decoded = decodeDataset(parseJson(content, file, "dataset"));
    } catch (error) {
      if (!fromDirectory || !(error instanceof InputError)) throw error;
      throw new InputError(`${file}: ${error.message}`, { cause: error });
    }
    log.debug({ file, records: decoded.length }, "Read dataset file");
    for (const record of decoded) {
      records.push(fromDirectory ? withMetadataDefault(record, "source_file", file) : record);
    }
  }

  emit(TelemetryEvents.DatasetLoaded, {
    input_source: path,
    files: files.length,
    total_records: records.length,
    size_bytes: sizeBytes,
  });
  return records;
}

export interface PersistedStage {
  /** Paths relative to the run directory */
  persistedPath: string;
  statisticsPath: string;
  /** Exact bytes written for the working set */
  serialized: string;
}

export class WorkflowStore {
  private writeInProgress = false;

  private constructor(readonly runDir: string) {}

  /**
   * Create a fresh run directory under baseDir
   */
  static async create(baseDir: string, startedAt: Date = new Date()): Promise<WorkflowStore> {
    const name = runDirectoryName(startedAt);
    let runDir = resolve(baseDir, name);
    for (let suffix = 1; await exists(runDir); suffix++) {
      runDir = resolve(baseDir, `${name}_${suffix}`);
    }
    await mkdir(join(runDir, "stages"), { recursive: true });
    await writeJsonAtomic(join(runDir, WORKFLOW_LOG_FILE), []);
    log.info({ run_dir: runDir }, "Created workflow run directory");
    return new WorkflowStore(runDir);
  }

  /**
   * Reopen a prior run
   */
  static async open(runDir: string): Promise<WorkflowStore> {
    const absolute = resolve(runDir);
    if (!(await exists(join(absolute, WORKFLOW_LOG_FILE)))) {
      throw new InputError(`No ${WORKFLOW_LOG_FILE} in ${absolute}; not a workflow run directory`);
    }
    return new WorkflowStore(absolute);
  }

  /**
   * Most recent run directory under baseDir (by name), if any
   */
  static async findLatestRun(baseDir: string): Promise<string | undefined> {
    if (!(await exists(baseDir))) return undefined;
    const entries = await readdir(baseDir, { withFileTypes: true });
    const runs = entries
      .filter((entry) => entry.isDirectory() && RUN_DIR_PATTERN.test(entry.name))
      .map((entry) => entry.name)
      .sort();
    const latest = runs.at(-1);
    return latest === undefined ? undefined : resolve(baseDir, latest);
  }

  stageDirectory(index: number, name: string): string {
    return join("stages", `${pad(index)}_${name}`);
  }

  resolvePath(relativePath: string): string {
    return join(this.runDir, relativePath);
  }

  /**
   * Persist a stage's working set and statistics
   */
  async saveStage(
    index: number,
    name: string,
    records: readonly WorkflowRecord[],
    statistics: Record<string, unknown>
  ): Promise<PersistedStage> {
    const dir = this.stageDirectory(index, name);
    const persistedPath = join(dir, "records.json");
    const statisticsPath = join(dir, "statistics.json");
    const wire = encodeDataset(records);

    await writeJsonAtomic(this.resolvePath(persistedPath), wire);
    await writeJsonAtomic(this.resolvePath(statisticsPath), statistics);

    return { persistedPath, statisticsPath, serialized: serializeJson(wire) };
  }

  async loadSnapshot(relativePath: string): Promise<WorkflowRecord[]> {
    return decodeDataset(await readJson(this.resolvePath(relativePath), "stage snapshot"));
  }

  async readLog(): Promise<StageRecord[]> {
    const path = this.resolvePath(WORKFLOW_LOG_FILE);
    const parsed = WorkflowLogSchema.safeParse(await readJson(path, "workflow log"));
    if (!parsed.success) {
      throw new InputError(`Invalid workflow log at ${path}: ${formatZodIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  async appendLog(entry: StageRecord): Promise<void> {
    if (this.writeInProgress) {
      throw new Error("Workflow log write already in progress");
    }
    this.writeInProgress = true;
    try {
      const entries = await this.readLog();
      entries.push(entry);
      await writeJsonAtomic(this.resolvePath(WORKFLOW_LOG_FILE), entries);
    } finally {
      this.writeInProgress = false;
    }
  }

  async writeFinal(records: readonly WorkflowRecord[]): Promise<string> {
    const path = this.resolvePath(FINAL_DATASET_FILE);
    await writeJsonAtomic(path, encodeDataset(records));
    return path;
  }

  async writeSummary(summary: Record<string, unknown>): Promise<string> {
    const path = this.resolvePath(SUMMARY_FILE);
    await writeJsonAtomic(path, summary);
    return path;
  }
}
