/**
 * Fix decisions and plans
 *
 * Validation stages emit decisions against an entity key; the plan groups
 * them by the key's canonical id with duplicates collapsed.
 */

import { entityKeyId, type EntityKey } from "../../schemas/record.js";
import { normalizeSqlText, type Variant } from "../../schemas/sql-value.js";
import { InputError } from "../../utils/errors.js";
import { err, ok, type Result } from "../../utils/result.js";

export type FixAction = "remove_literal" | "add_literal" | "add_variant_group";

interface DecisionBase {
  readonly key: EntityKey;
  /** Stage or review step that produced the decision */
  readonly source?: string;
}

export interface RemoveLiteralDecision extends DecisionBase {
  readonly action: "remove_literal";
  readonly payload: string;
}

export interface AddLiteralDecision extends DecisionBase {
  readonly action: "add_literal";
  readonly payload: string;
}

export interface AddVariantGroupDecision extends DecisionBase {
  readonly action: "add_variant_group";
  readonly payload: readonly Variant[];
}

export type FixDecision = RemoveLiteralDecision | AddLiteralDecision | AddVariantGroupDecision;

export type FixPlan = ReadonlyMap<string, readonly FixDecision[]>;

export function removeLiteral(key: EntityKey, text: string, source?: string): RemoveLiteralDecision {
  return { key, action: "remove_literal", payload: text, source };
}

export function addLiteral(key: EntityKey, text: string, source?: string): AddLiteralDecision {
  return { key, action: "add_literal", payload: text, source };
}

export function addVariantGroup(key: EntityKey, variants: readonly Variant[], source?: string): AddVariantGroupDecision {
  return { key, action: "add_variant_group", payload: [...variants], source };
}

function decisionFingerprint(decision: FixDecision): string {
  switch (decision.action) {
    case "remove_literal":
    case "add_literal":
      return JSON.stringify([decision.action, normalizeSqlText(decision.payload)]);
    case "add_variant_group":
      return JSON.stringify([
        decision.action,
        decision.payload.map((v) => [v.scenario, normalizeSqlText(v.sql)]),
      ]);
  }
}

function checkDecision(decision: FixDecision): string | undefined {
  switch (decision.action) {
    case "remove_literal":
    case "add_literal":
      return normalizeSqlText(decision.payload).length === 0
        ? `${decision.action} with an empty statement`
        : undefined;
    case "add_variant_group":
      return decision.payload.some((v) => normalizeSqlText(v.sql).length === 0)
        ? "add_variant_group with an empty variant statement"
        : undefined;
  }
}

/**
 * Group decisions by entity key, dropping duplicates
 *
 * Fails when a decision carries an empty statement.
 */
export function buildFixPlan(decisions: Iterable<FixDecision>): Result<FixPlan, InputError> {
  const plan = new Map<string, FixDecision[]>();
  const seen = new Map<string, Set<string>>();

  for (const decision of decisions) {
    const problem = checkDecision(decision);
    if (problem) {
      return err(new InputError(`Invalid fix decision for ${entityKeyId(decision.key)}: ${problem}`));
    }

    const id = entityKeyId(decision.key);
    const fingerprints = seen.get(id) ?? new Set<string>();
    const fingerprint = decisionFingerprint(decision);
    if (fingerprints.has(fingerprint)) continue;
    fingerprints.add(fingerprint);
    seen.set(id, fingerprints);

    const bucket = plan.get(id) ?? [];
    bucket.push(decision);
    plan.set(id, bucket);
  }

  return ok(plan);
}

export function countDecisions(plan: FixPlan): number {
  let total = 0;
  for (const decisions of plan.values()) total += decisions.length;
  return total;
}

export function planDecisions(plan: FixPlan): FixDecision[] {
  return [...plan.values()].flat();
}
