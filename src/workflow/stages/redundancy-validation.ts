/**
 * Redundant SQL validation stage
 *
 * The extraction step appends ` <REDUNDANT SQL>` to statements it suspects
 * do not belong to a call site. Each marked statement is put to the
 * generator: confirmed ones are removed through the fix plan, disputed ones
 * lose the marker in place, and unanswered ones keep it and tag the record.
 */

import { z } from "zod";
import { buildRedundancyPrompt } from "../../prompts/templates.js";
import { entityKeyId, type WorkflowRecord } from "../../schemas/record.js";
import {
  collectSqlTexts,
  hasRedundancyMarker,
  mapSqlTexts,
  normalizeSqlText,
  stripRedundancyMarker,
} from "../../schemas/sql-value.js";
import { zodContract } from "../extraction/response-validator.js";
import type { Stage, StageContext, StageOutcome } from "../orchestrator/types.js";
import { applyFixPlan } from "../reconciliation/apply-fix-plan.js";
import { buildFixPlan, countDecisions, removeLiteral, type FixDecision } from "../reconciliation/fix-plan.js";
import { createLlmFixReviewer, reviewFixPlan, type FixReviewStats } from "../reconciliation/fix-review.js";
import { runBounded } from "../runner/bounded-runner.js";
import { unwrap } from "../../utils/result.js";
import { addTag, recordError, requestStructured, rethrowFatal, type RecordError } from "./shared.js";

export const REDUNDANCY_STAGE = "redundant_sql_validation";

export const REDUNDANCY_UNVERIFIED_TAG = "redundancy:unverified";

const RedundancyVerdictSchema = z.object({
  confirmed: z.boolean(),
  reason: z.string().nullish(),
});

interface FlaggedStatement {
  record: WorkflowRecord;
  text: string;
}

/**
 * Marked statements of a record, one per distinct stripped text
 */
export function flaggedStatements(record: WorkflowRecord): string[] {
  const seen = new Set<string>();
  const flagged: string[] = [];
  for (const text of collectSqlTexts(record.sqlValue)) {
    if (!hasRedundancyMarker(text)) continue;
    const normalized = normalizeSqlText(text);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    flagged.push(text);
  }
  return flagged;
}

function unmark(record: WorkflowRecord, disputed: ReadonlySet<string>): void {
  record.sqlValue = mapSqlTexts(record.sqlValue, (text) =>
    hasRedundancyMarker(text) && disputed.has(normalizeSqlText(text)) ? stripRedundancyMarker(text) : text
  );
}

export function createRedundancyValidationStage(): Stage {
  return {
    name: REDUNDANCY_STAGE,
    kind: "fix",
    async run(records: WorkflowRecord[], ctx: StageContext): Promise<StageOutcome> {
      const validator = zodContract(RedundancyVerdictSchema);
      const tasks: FlaggedStatement[] = records.flatMap((record) =>
        flaggedStatements(record).map((text) => ({ record, text }))
      );

      const results = await runBounded(
        tasks,
        ({ record, text }, task) =>
          requestStructured(ctx, buildRedundancyPrompt(record, stripRedundancyMarker(text)), validator, task),
        { concurrency: ctx.stageSettings.concurrency, label: REDUNDANCY_STAGE }
      );
      rethrowFatal(results);

      const decisions: FixDecision[] = [];
      const disputed = new Map<WorkflowRecord, Set<string>>();
      const changedIds = new Set<string>();
      const errors: RecordError[] = [];
      let confirmed = 0;
      let disputedCount = 0;
      let unverified = 0;

      results.forEach((result, i) => {
        const { record, text } = tasks[i];

        if (result.ok && result.value.status === "valid") {
          if (result.value.value.confirmed) {
            confirmed++;
            decisions.push(removeLiteral(record.key, text, REDUNDANCY_STAGE));
          } else {
            disputedCount++;
            const texts = disputed.get(record) ?? new Set<string>();
            texts.add(normalizeSqlText(text));
            disputed.set(record, texts);
          }
          return;
        }

        unverified++;
        errors.push(
          result.ok
            ? {
                orm_code: record.key.ormCode,
                caller: record.key.caller,
                code: "VALIDATION_FAILED",
                message: result.value.error,
              }
            : recordError(record, result.error, "RETRIES_EXHAUSTED")
        );
        if (addTag(record, REDUNDANCY_UNVERIFIED_TAG)) changedIds.add(entityKeyId(record.key));
      });

      for (const [record, texts] of disputed) {
        unmark(record, texts);
        changedIds.add(entityKeyId(record.key));
      }

      let plan = unwrap(buildFixPlan(decisions));

      let review: FixReviewStats | null = null;
      if (ctx.settings.fix_review.enabled && countDecisions(plan) > 0) {
        const reviewed = await reviewFixPlan(records, plan, createLlmFixReviewer(ctx), {
          concurrency: ctx.stageSettings.concurrency,
          label: `${REDUNDANCY_STAGE}.fix_review`,
        });
        plan = reviewed.plan;
        review = reviewed.stats;
      }

      const inputRecords = new Set(records);
      const applied = applyFixPlan(records, plan);
      const survivingIds = new Set<string>();
      for (const record of applied.records) {
        const id = entityKeyId(record.key);
        survivingIds.add(id);
        if (!inputRecords.has(record)) changedIds.add(id);
      }
      const modifiedCount = [...changedIds].filter((id) => survivingIds.has(id)).length;

      ctx.logger.info(
        { flagged: tasks.length, confirmed, disputed: disputedCount, unverified, deleted: applied.stats.records_deleted },
        "Redundancy validation finished"
      );

      return {
        records: applied.records,
        modifiedCount,
        deletedCount: applied.stats.records_deleted,
        details: {
          flagged_statements: tasks.length,
          confirmed,
          disputed: disputedCount,
          unverified,
          fix: applied.stats,
          fix_review: review,
          errors,
        },
      };
    },
  };
}
