/**
 * Secondary review of a fix plan
 *
 * Each decision is shown to a reviewer before reconciliation. Rejections
 * may carry a replacement statement; a reviewer that cannot answer leaves
 * the decision in place.
 */

import { z } from "zod";
import { buildFixReviewPrompt } from "../../prompts/templates.js";
import { entityKeyId, type WorkflowRecord } from "../../schemas/record.js";
import { isStageFatal } from "../../utils/retry.js";
import { unwrap } from "../../utils/result.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import { zodContract } from "../extraction/response-validator.js";
import type { StageContext } from "../orchestrator/types.js";
import { runBounded, type TaskContext } from "../runner/bounded-runner.js";
import { requestStructured } from "../stages/shared.js";
import { addLiteral, buildFixPlan, planDecisions, type FixDecision, type FixPlan } from "./fix-plan.js";

export interface ReviewVerdict {
  accepted: boolean;
  replacement?: string;
}

export type FixReviewer = (
  record: WorkflowRecord,
  decision: FixDecision,
  task: TaskContext
) => Promise<ReviewVerdict>;

export interface FixReviewStats {
  reviewed: number;
  accepted: number;
  replaced: number;
  dropped: number;
  kept_on_error: number;
}

export interface FixReviewResult {
  plan: FixPlan;
  stats: FixReviewStats;
}

export interface ReviewFixPlanOptions {
  concurrency: number;
  label?: string;
}

/**
 * Statement text a decision acts on, as shown to the reviewer
 */
export function decisionStatement(decision: FixDecision): string {
  return decision.action === "add_variant_group"
    ? decision.payload.map((v) => `[${v.scenario}] ${v.sql}`).join("\n")
    : decision.payload;
}

function usableReplacement(verdict: ReviewVerdict): string | undefined {
  const replacement = verdict.replacement?.trim();
  return replacement ? replacement : undefined;
}

export async function reviewFixPlan(
  records: readonly WorkflowRecord[],
  plan: FixPlan,
  reviewer: FixReviewer,
  options: ReviewFixPlanOptions
): Promise<FixReviewResult> {
  const byId = new Map(records.map((record) => [entityKeyId(record.key), record]));
  const decisions = planDecisions(plan);
  const stats: FixReviewStats = { reviewed: 0, accepted: 0, replaced: 0, dropped: 0, kept_on_error: 0 };

  // Decisions for keys with no record are left for the reconciler to count
  const reviewable: Array<{ record: WorkflowRecord; decision: FixDecision }> = [];
  const passthrough: FixDecision[] = [];
  for (const decision of decisions) {
    const record = byId.get(entityKeyId(decision.key));
    if (record) {
      reviewable.push({ record, decision });
    } else {
      passthrough.push(decision);
    }
  }

  const results = await runBounded(
    reviewable,
    ({ record, decision }, task) => reviewer(record, decision, task),
    { concurrency: options.concurrency, label: options.label ?? "fix_review" }
  );

  const reviewed: FixDecision[] = [...passthrough];
  results.forEach((result, i) => {
    const { decision } = reviewable[i];
    stats.reviewed++;

    if (!result.ok) {
      if (isStageFatal(result.error)) throw result.error;
      stats.kept_on_error++;
      log.warn({ key: entityKeyId(decision.key), action: decision.action, error: result.error.message }, "Fix review failed, keeping decision");
      reviewed.push(decision);
      return;
    }

    const verdict = result.value;
    if (verdict.accepted) {
      stats.accepted++;
      reviewed.push(decision);
      return;
    }

    const replacement = usableReplacement(verdict);
    if (!replacement) {
      stats.dropped++;
      return;
    }

    stats.replaced++;
    if (decision.action === "remove_literal") reviewed.push(decision);
    reviewed.push(addLiteral(decision.key, replacement, "fix_review"));
  });

  emit(TelemetryEvents.FixReviewed, { ...stats });
  return { plan: unwrap(buildFixPlan(reviewed)), stats };
}

const ReviewVerdictSchema = z.object({
  accepted: z.boolean(),
  replacement: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
});

/**
 * Reviewer backed by the stage's generator
 *
 * A response that never satisfies the contract counts as an acceptance.
 */
export function createLlmFixReviewer(ctx: StageContext): FixReviewer {
  const validator = zodContract(ReviewVerdictSchema);
  return async (record, decision, task) => {
    const prompt = buildFixReviewPrompt(record, decision.action, decisionStatement(decision));
    const response = await requestStructured(ctx, prompt, validator, task, `${ctx.stageName}.fix_review`);
    if (response.status === "validation_failed") {
      return { accepted: true };
    }
    return response.value;
  };
}
