/**
 * Generator-backed pass/fail checks over whole records
 *
 * Completeness and correctness share this shape: one request per record
 * holding SQL, a boolean verdict, and tags for everything that is not a
 * pass. A check that cannot be answered falls back to the configured
 * policy (assume valid by default) and is tagged unverified.
 */

import { z } from "zod";
import { isSentinel } from "../../schemas/sql-value.js";
import type { WorkflowRecord } from "../../schemas/record.js";
import { zodContract, type ValidatedResponse, type Validator } from "../extraction/response-validator.js";
import type { Stage, StageContext, StageOutcome } from "../orchestrator/types.js";
import { runBounded } from "../runner/bounded-runner.js";
import { addTag, recordError, requestStructured, rethrowFatal, type RecordError } from "./shared.js";

export interface Verdict {
  passed: boolean;
  reason?: string;
}

export interface ClassificationStageDefinition {
  name: string;
  /** Tag namespace, e.g. "completeness" */
  tagPrefix: string;
  /** Tag suffix for a failed check, e.g. "incomplete" */
  failureTag: string;
  validator: Validator<Verdict>;
  buildPrompt: (record: WorkflowRecord) => string;
}

/**
 * Contract `{ <field>: boolean, reason?: string }` mapped onto a Verdict
 */
export function verdictContract(field: string): Validator<Verdict> {
  const schema = z
    .object({ reason: z.string().nullish() })
    .catchall(z.unknown())
    .superRefine((value, ctx) => {
      if (typeof value[field] !== "boolean") {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: `Expected boolean "${field}"` });
      }
    })
    .transform((value): Verdict => ({ passed: value[field] === true, reason: value.reason ?? undefined }));
  return zodContract(schema);
}

interface Failure {
  orm_code: string;
  caller: string;
  reason: string | null;
}

export function createClassificationStage(definition: ClassificationStageDefinition): Stage {
  const tag = (suffix: string) => `${definition.tagPrefix}:${suffix}`;

  return {
    name: definition.name,
    kind: "validation",
    async run(records: WorkflowRecord[], ctx: StageContext): Promise<StageOutcome> {
      const eligible = records.filter((record) => !isSentinel(record.sqlValue));
      const assumeValid = ctx.settings.policy.assume_valid_on_failure;

      const results = await runBounded(
        eligible,
        (record, task): Promise<ValidatedResponse<Verdict>> =>
          requestStructured(ctx, definition.buildPrompt(record), definition.validator, task),
        { concurrency: ctx.stageSettings.concurrency, label: definition.name }
      );
      rethrowFatal(results);

      const changed = new Set<WorkflowRecord>();
      const failures: Failure[] = [];
      const errors: RecordError[] = [];
      let passed = 0;
      let failed = 0;
      let validationFailed = 0;
      let unverified = 0;
      let attempts = 0;

      results.forEach((result, i) => {
        const record = eligible[i];
        attempts += result.attempts;

        if (!result.ok) {
          unverified++;
          errors.push(recordError(record, result.error, "RETRIES_EXHAUSTED"));
          if (addTag(record, tag("unverified"))) changed.add(record);
          if (!assumeValid && addTag(record, tag(definition.failureTag))) changed.add(record);
          return;
        }

        const response = result.value;
        if (response.status === "validation_failed") {
          validationFailed++;
          errors.push({
            orm_code: record.key.ormCode,
            caller: record.key.caller,
            code: "VALIDATION_FAILED",
            message: response.error,
          });
          if (addTag(record, tag("validation_failed"))) changed.add(record);
          return;
        }

        if (response.value.passed) {
          passed++;
          return;
        }

        failed++;
        failures.push({
          orm_code: record.key.ormCode,
          caller: record.key.caller,
          reason: response.value.reason ?? null,
        });
        if (addTag(record, tag(definition.failureTag))) changed.add(record);
      });

      ctx.logger.info(
        { checked: eligible.length, passed, failed, validation_failed: validationFailed, unverified },
        "Classification finished"
      );

      return {
        records,
        modifiedCount: changed.size,
        deletedCount: 0,
        details: {
          checked: eligible.length,
          skipped_sentinel: records.length - eligible.length,
          passed,
          failed,
          validation_failed: validationFailed,
          unverified,
          assume_valid_on_failure: assumeValid,
          generator_attempts: attempts,
          failures,
          errors,
        },
      };
    },
  };
}
