/**
 * Concurrency-bounded task runner
 *
 * Schedules every item at once behind a p-limit admission gate, so at most
 * `concurrency` operations are in flight. A failing task becomes an error
 * entry at its own index; results come back dense and in input order
 * whatever the completion order.
 */

import pLimit from "p-limit";
import { ConfigError } from "../../utils/errors.js";
import type { Result } from "../../utils/result.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";

export interface TaskContext {
  readonly index: number;
  /** Count one attempt against this task (called by the backoff controller) */
  recordAttempt(): void;
}

export type TaskResult<T> = { index: number; attempts: number } & Result<T, Error>;

export interface TaskProgress {
  completed: number;
  total: number;
  index: number;
  ok: boolean;
}

export interface RunBoundedOptions {
  concurrency: number;
  /** Name used in logs and telemetry */
  label?: string;
  /** Called once per completed task, in completion order */
  onProgress?: (progress: TaskProgress) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runBounded<I, O>(
  items: readonly I[],
  op: (item: I, ctx: TaskContext) => Promise<O>,
  options: RunBoundedOptions
): Promise<TaskResult<O>[]> {
  const { concurrency, label = "tasks", onProgress } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Concurrency for ${label} must be a positive integer, got ${concurrency}`);
  }

  const total = items.length;
  const results = new Array<TaskResult<O>>(total);
  const limit = pLimit(concurrency);
  const logEvery = Math.max(1, Math.ceil(total / 10));
  const startTime = Date.now();
  let completed = 0;
  let failed = 0;

  const runOne = async (item: I, index: number): Promise<void> => {
    let attempts = 0;
    const ctx: TaskContext = {
      index,
      recordAttempt: () => {
        attempts++;
      },
    };

    let result: TaskResult<O>;
    try {
      const value = await op(item, ctx);
      result = { index, attempts: Math.max(attempts, 1), ok: true, value };
    } catch (error) {
      failed++;
      result = { index, attempts: Math.max(attempts, 1), ok: false, error: toError(error) };
    }
    results[index] = result;
    completed++;

    if (completed % logEvery === 0 || completed === total) {
      log.debug({ label, completed, total, failed }, "Task progress");
    }
    onProgress?.({ completed, total, index, ok: result.ok });
  };

  await Promise.all(items.map((item, index) => limit(() => runOne(item, index))));

  emit(TelemetryEvents.TaskBatchCompleted, {
    label,
    total,
    failed,
    concurrency,
    duration_ms: Date.now() - startTime,
  });

  return results;
}
