/**
 * Plumbing shared by the generator-backed stages
 */

import type { GenerateOptions } from "../../adapters/llm/types.js";
import { toErrorAnnotation, type ErrorAnnotation } from "../../utils/errors.js";
import { isStageFatal, runWithBackoff, type BackoffOptions } from "../../utils/retry.js";
import {
  extractAndValidate,
  type ValidatedResponse,
  type Validator,
} from "../extraction/response-validator.js";
import type { StageContext } from "../orchestrator/types.js";
import type { TaskContext, TaskResult } from "../runner/bounded-runner.js";
import type { WorkflowRecord } from "../../schemas/record.js";

export function generateOptions(ctx: StageContext): GenerateOptions {
  return {
    maxTokens: ctx.settings.llm.max_tokens,
    temperature: ctx.settings.llm.temperature,
    timeoutMs: ctx.settings.llm.timeout_ms,
    operation: ctx.stageName,
  };
}

export function backoffOptions(ctx: StageContext, operation: string = ctx.stageName): BackoffOptions {
  return {
    maxAttempts: ctx.stageSettings.maxAttempts,
    baseDelayMs: ctx.stageSettings.baseDelayMs,
    maxDelayMs: ctx.stageSettings.maxDelayMs,
    jitterMs: ctx.stageSettings.jitterMs,
    operation,
    sleep: ctx.sleep,
  };
}

/**
 * Ask the generator for a structured answer
 *
 * The call and the first extraction run under the backoff controller, so a
 * malformed or empty response is retried like a timeout. Contract failures
 * go through the reformat loop, whose generator calls have their own backoff.
 */
export async function requestStructured<T>(
  ctx: StageContext,
  prompt: string,
  validator: Validator<T>,
  task?: TaskContext,
  operation: string = ctx.stageName
): Promise<ValidatedResponse<T>> {
  const callOptions = generateOptions(ctx);
  const backoff = backoffOptions(ctx, operation);

  return runWithBackoff(
    async () => {
      const text = await ctx.generator.generate(prompt, callOptions);
      return extractAndValidate(text, {
        validator,
        maxReformatAttempts: ctx.stageSettings.maxReformatAttempts,
        prompt,
        regenerate: (reformatPrompt) =>
          runWithBackoff(() => ctx.generator.generate(reformatPrompt, callOptions), backoff),
        task: operation,
        model: ctx.generator.model,
      });
    },
    { ...backoff, onAttempt: () => task?.recordAttempt() }
  );
}

/**
 * Fatal task errors abort the stage; anything else degrades per record
 */
export function rethrowFatal<T>(results: readonly TaskResult<T>[]): void {
  for (const result of results) {
    if (!result.ok && isStageFatal(result.error)) {
      throw result.error;
    }
  }
}

/**
 * Per-record error annotation stored in stage statistics
 */
export interface RecordError extends ErrorAnnotation {
  orm_code: string;
  caller: string;
}

export function recordError(record: WorkflowRecord, error: unknown, fallback: ErrorAnnotation["code"] = "INTERNAL"): RecordError {
  return {
    orm_code: record.key.ormCode,
    caller: record.key.caller,
    ...toErrorAnnotation(error, fallback),
  };
}

/**
 * Add a tag; reports whether the record changed
 */
export function addTag(record: WorkflowRecord, tag: string): boolean {
  if (record.tags.has(tag)) return false;
  record.tags.add(tag);
  return true;
}
