/**
 * Response validation with a reformat loop
 *
 * Extraction failures of the first response are transient and propagate to
 * the backoff controller. Once a value parses, contract failures are handled
 * here: the generator is asked again with the original request, the invalid
 * response and the error, up to `maxReformatAttempts` times. On exhaustion
 * the last parsed value is returned with a `validation_failed` status. The
 * same happens when a reformat call spends its own retries.
 */

import type { z } from "zod";
import { EmptyResponseError, MalformedOutputError } from "../../adapters/llm/errors.js";
import { buildReformatPrompt } from "../../prompts/templates.js";
import { formatZodIssues } from "../../utils/errors.js";
import {
  extractStructured,
  type ExtractionStrategyName,
  type JsonExtractionResult,
} from "../../utils/json-extractor.js";
import { RetriesExhaustedError } from "../../utils/retry.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";

export type ValidationOutcome<T> = { valid: true; value: T } | { valid: false; error: string };

export type Validator<T> = (value: unknown) => ValidationOutcome<T>;

export type ValidatedResponse<T> =
  | {
      status: "valid";
      value: T;
      strategy: ExtractionStrategyName;
      reformatAttempts: number;
    }
  | {
      status: "validation_failed";
      /** Last parsed (invalid) value */
      value: unknown;
      error: string;
      reformatAttempts: number;
    };

export interface ExtractAndValidateOptions<T> {
  validator: Validator<T>;
  maxReformatAttempts: number;
  /** The original request, echoed in reformat prompts */
  prompt: string;
  regenerate: (prompt: string) => Promise<string>;
  task?: string;
  model?: string;
}

/**
 * Adapt a zod schema into a validator
 */
export function zodContract<S extends z.ZodTypeAny>(schema: S): Validator<z.output<S>> {
  return (value) => {
    const result = schema.safeParse(value);
    return result.success
      ? { valid: true, value: result.data }
      : { valid: false, error: formatZodIssues(result.error) };
  };
}

export async function extractAndValidate<T>(
  rawText: string,
  options: ExtractAndValidateOptions<T>
): Promise<ValidatedResponse<T>> {
  const { validator, maxReformatAttempts, prompt, regenerate, task, model } = options;

  const first = extractStructured(rawText, { task, model });
  const firstOutcome = validator(first.value);
  if (firstOutcome.valid) {
    return { status: "valid", value: firstOutcome.value, strategy: first.strategy, reformatAttempts: 0 };
  }

  let lastValue: unknown = first.value;
  let lastText = rawText;
  let lastError = firstOutcome.error;
  let attemptsMade = 0;

  for (let attempt = 1; attempt <= maxReformatAttempts; attempt++) {
    emit(TelemetryEvents.ValidationReformat, { task, model, attempt, error: lastError });
    attemptsMade = attempt;

    try {
      lastText = await regenerate(buildReformatPrompt(prompt, lastText, lastError));
    } catch (error) {
      if (error instanceof RetriesExhaustedError) {
        lastError = `${lastError} (reformat request failed: ${error.message})`;
        break;
      }
      throw error;
    }

    let extracted: JsonExtractionResult;
    try {
      extracted = extractStructured(lastText, { task, model, logWarnings: false });
    } catch (error) {
      if (error instanceof MalformedOutputError || error instanceof EmptyResponseError) {
        lastError = `response contained no parseable JSON (${error.message})`;
        continue;
      }
      throw error;
    }

    lastValue = extracted.value;
    const outcome = validator(extracted.value);
    if (outcome.valid) {
      return { status: "valid", value: outcome.value, strategy: extracted.strategy, reformatAttempts: attempt };
    }
    lastError = outcome.error;
  }

  log.warn({ task, model, reformat_attempts: attemptsMade, error: lastError }, "Response failed validation after reformat attempts");
  emit(TelemetryEvents.ValidationFailed, { task, model, reformat_attempts: attemptsMade, error: lastError });

  return { status: "validation_failed", value: lastValue, error: lastError, reformatAttempts: attemptsMade };
}
