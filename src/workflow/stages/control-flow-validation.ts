/**
 * Control-flow validation stage
 *
 * Records whose ORM code branches (switch / if / case ...) are checked for
 * SQL that covers every branch. When the check says the SQL is wrong, the
 * generator is asked for a replacement list and the fix plan swaps the
 * record's statements for it.
 */

import { z } from "zod";
import {
  buildControlFlowCheckPrompt,
  buildControlFlowRegenerationPrompt,
} from "../../prompts/templates.js";
import { entityKeyId, type EntityKey, type WorkflowRecord } from "../../schemas/record.js";
import {
  collectSqlTexts,
  fromWire,
  isSentinel,
  sqlValuesEqual,
  type SqlValue,
} from "../../schemas/sql-value.js";
import { InputError } from "../../utils/errors.js";
import { unwrap } from "../../utils/result.js";
import { zodContract, type ValidationOutcome } from "../extraction/response-validator.js";
import type { Stage, StageContext, StageOutcome } from "../orchestrator/types.js";
import { applyFixPlan } from "../reconciliation/apply-fix-plan.js";
import {
  addLiteral,
  addVariantGroup,
  buildFixPlan,
  removeLiteral,
  type FixDecision,
} from "../reconciliation/fix-plan.js";
import { runBounded, type TaskContext } from "../runner/bounded-runner.js";
import { addTag, recordError, requestStructured, rethrowFatal, type RecordError } from "./shared.js";

export const CONTROL_FLOW_STAGE = "control_flow_validation";

export const DEFAULT_CONTROL_FLOW_KEYWORDS: readonly string[] = ["switch", "if", "else", "case", "default"];

export const CONTROL_FLOW_TAGS = {
  unverified: "control_flow:unverified",
  regenerationFailed: "control_flow:regeneration_failed",
  regenerationEmpty: "control_flow:regeneration_empty",
} as const;

const CheckVerdictSchema = z.object({
  correct: z.boolean(),
  reason: z.string().nullish(),
});

type ControlFlowOutcome =
  | { kind: "correct" }
  | { kind: "check_failed"; error: string }
  | { kind: "regenerated"; value: SqlValue }
  | { kind: "regeneration_failed"; error: string };

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word, case-insensitive matcher for the given keywords
 */
export function controlFlowPattern(keywords: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${keywords.map(escapeRegExp).join("|")})\\b`, "i");
}

export function hasControlFlow(record: WorkflowRecord, pattern: RegExp): boolean {
  return !isSentinel(record.sqlValue) && pattern.test(record.key.ormCode);
}

/**
 * Accepts `{ "sql_statement_list": <value> }` or a bare wire value
 */
export function regeneratedValueValidator(value: unknown): ValidationOutcome<SqlValue> {
  const raw =
    typeof value === "object" && value !== null && !Array.isArray(value) && "sql_statement_list" in value
      ? value.sql_statement_list
      : value;
  try {
    return { valid: true, value: fromWire(raw) };
  } catch (error) {
    if (error instanceof InputError) return { valid: false, error: error.message };
    throw error;
  }
}

/**
 * Decisions that add every statement of a regenerated value
 */
export function additionsFor(key: EntityKey, value: SqlValue, source?: string): FixDecision[] {
  switch (value.kind) {
    case "literal":
      return [addLiteral(key, value.text, source)];
    case "variant_group":
      return [addVariantGroup(key, value.variants, source)];
    case "sequence":
      return value.items.flatMap((item) => additionsFor(key, item, source));
    case "sentinel":
      return [];
  }
}

async function validateRecord(
  record: WorkflowRecord,
  ctx: StageContext,
  task: TaskContext
): Promise<ControlFlowOutcome> {
  const check = await requestStructured(
    ctx,
    buildControlFlowCheckPrompt(record),
    zodContract(CheckVerdictSchema),
    task
  );
  if (check.status === "validation_failed") return { kind: "check_failed", error: check.error };
  if (check.value.correct) return { kind: "correct" };

  const regenerated = await requestStructured(
    ctx,
    buildControlFlowRegenerationPrompt(record, check.value.reason ?? undefined),
    regeneratedValueValidator,
    task,
    `${CONTROL_FLOW_STAGE}.regenerate`
  );
  if (regenerated.status === "validation_failed") {
    return { kind: "regeneration_failed", error: regenerated.error };
  }
  return { kind: "regenerated", value: regenerated.value };
}

export function createControlFlowValidationStage(): Stage {
  return {
    name: CONTROL_FLOW_STAGE,
    kind: "fix",
    async run(records: WorkflowRecord[], ctx: StageContext): Promise<StageOutcome> {
      const pattern = controlFlowPattern(ctx.settings.control_flow_keywords ?? DEFAULT_CONTROL_FLOW_KEYWORDS);
      const eligible = records.filter((record) => hasControlFlow(record, pattern));

      const results = await runBounded(eligible, (record, task) => validateRecord(record, ctx, task), {
        concurrency: ctx.stageSettings.concurrency,
        label: CONTROL_FLOW_STAGE,
      });
      rethrowFatal(results);

      const decisions: FixDecision[] = [];
      const changedIds = new Set<string>();
      const errors: RecordError[] = [];
      const counts = {
        correct: 0,
        regenerated: 0,
        regenerated_unchanged: 0,
        regeneration_failed: 0,
        regeneration_empty: 0,
        unverified: 0,
      };

      const tag = (record: WorkflowRecord, value: string) => {
        if (addTag(record, value)) changedIds.add(entityKeyId(record.key));
      };

      results.forEach((result, i) => {
        const record = eligible[i];

        if (!result.ok) {
          counts.unverified++;
          errors.push(recordError(record, result.error, "RETRIES_EXHAUSTED"));
          tag(record, CONTROL_FLOW_TAGS.unverified);
          return;
        }

        const outcome = result.value;
        switch (outcome.kind) {
          case "correct":
            counts.correct++;
            break;
          case "check_failed":
            counts.unverified++;
            errors.push({ orm_code: record.key.ormCode, caller: record.key.caller, code: "VALIDATION_FAILED", message: outcome.error });
            tag(record, CONTROL_FLOW_TAGS.unverified);
            break;
          case "regeneration_failed":
            counts.regeneration_failed++;
            errors.push({ orm_code: record.key.ormCode, caller: record.key.caller, code: "VALIDATION_FAILED", message: outcome.error });
            tag(record, CONTROL_FLOW_TAGS.regenerationFailed);
            break;
          case "regenerated": {
            if (collectSqlTexts(outcome.value).length === 0) {
              counts.regeneration_empty++;
              tag(record, CONTROL_FLOW_TAGS.regenerationEmpty);
              break;
            }
            if (sqlValuesEqual(outcome.value, record.sqlValue)) {
              counts.regenerated_unchanged++;
              break;
            }
            counts.regenerated++;
            for (const text of collectSqlTexts(record.sqlValue)) {
              decisions.push(removeLiteral(record.key, text, CONTROL_FLOW_STAGE));
            }
            decisions.push(...additionsFor(record.key, outcome.value, CONTROL_FLOW_STAGE));
            break;
          }
        }
      });

      const inputRecords = new Set(records);
      const applied = applyFixPlan(records, unwrap(buildFixPlan(decisions)));
      const survivingIds = new Set<string>();
      for (const record of applied.records) {
        const id = entityKeyId(record.key);
        survivingIds.add(id);
        if (!inputRecords.has(record)) changedIds.add(id);
      }
      const modifiedCount = [...changedIds].filter((id) => survivingIds.has(id)).length;

      ctx.logger.info({ eligible: eligible.length, ...counts }, "Control-flow validation finished");

      return {
        records: applied.records,
        modifiedCount,
        deletedCount: applied.stats.records_deleted,
        details: {
          eligible: eligible.length,
          skipped: records.length - eligible.length,
          ...counts,
          fix: applied.stats,
          errors,
        },
      };
    },
  };
}
