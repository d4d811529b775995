/**
 * Fix reconciliation engine
 *
 * Rewrites each planned record's SQL value by dispatching on its shape, and
 * drops records whose value ends up with nothing in it. Statement matching
 * compares marker-stripped, trimmed text. Additions already present are
 * skipped, so applying the same plan twice leaves the records unchanged.
 */

import { entityKeyId, type WorkflowRecord } from "../../schemas/record.js";
import {
  collectSqlTexts,
  defaultScenarioLabel,
  literal,
  normalizeSqlText,
  sequence,
  variantGroup,
  type SequenceItem,
  type SqlValue,
  type Variant,
} from "../../schemas/sql-value.js";
import { emit, TelemetryEvents } from "../../utils/telemetry.js";
import type { FixDecision, FixPlan } from "./fix-plan.js";

export interface FixStats {
  literals_removed: number;
  literals_added: number;
  variants_added: number;
  records_modified: number;
  records_deleted: number;
  /** Plan keys that matched no record */
  records_unmatched: number;
}

export type ReconcileOutcome =
  | { kind: "unchanged" }
  | { kind: "modified"; value: SqlValue }
  | { kind: "deleted" };

export interface FixApplication {
  records: WorkflowRecord[];
  stats: FixStats;
}

export interface ReconcileCounters {
  removed: number;
  literalsAdded: number;
  variantsAdded: number;
}

type Addition = { kind: "literal"; text: string } | { kind: "variants"; variants: readonly Variant[] };

interface SplitDecisions {
  removals: ReadonlySet<string>;
  additions: readonly Addition[];
}

export function emptyFixStats(): FixStats {
  return {
    literals_removed: 0,
    literals_added: 0,
    variants_added: 0,
    records_modified: 0,
    records_deleted: 0,
    records_unmatched: 0,
  };
}

function splitDecisions(decisions: readonly FixDecision[]): SplitDecisions {
  const removals = new Set<string>();
  const additions: Addition[] = [];
  for (const decision of decisions) {
    switch (decision.action) {
      case "remove_literal":
        removals.add(normalizeSqlText(decision.payload));
        break;
      case "add_literal":
        additions.push({ kind: "literal", text: decision.payload });
        break;
      case "add_variant_group":
        additions.push({ kind: "variants", variants: decision.payload });
        break;
    }
  }
  return { removals, additions };
}

function presentTexts(items: readonly SqlValue[]): Set<string> {
  return new Set(items.flatMap((item) => collectSqlTexts(item)).map(normalizeSqlText));
}

/**
 * Drop removal targets, recursing into nested sequences and variant groups.
 * Nested collections left empty are dropped too.
 */
function pruneItems(
  items: readonly SequenceItem[],
  removals: ReadonlySet<string>,
  counters: ReconcileCounters
): { items: SequenceItem[]; changed: boolean } {
  const kept: SequenceItem[] = [];
  let changed = false;

  for (const item of items) {
    switch (item.kind) {
      case "literal":
        if (removals.has(normalizeSqlText(item.text))) {
          counters.removed++;
          changed = true;
        } else {
          kept.push(item);
        }
        break;
      case "variant_group": {
        const variants = item.variants.filter((v) => !removals.has(normalizeSqlText(v.sql)));
        const removed = item.variants.length - variants.length;
        counters.removed += removed;
        if (variants.length === 0) {
          changed = true;
        } else if (removed > 0) {
          kept.push(variantGroup(variants));
          changed = true;
        } else {
          kept.push(item);
        }
        break;
      }
      case "sequence": {
        const nested = pruneItems(item.items, removals, counters);
        if (nested.items.length === 0) {
          changed = true;
        } else if (nested.changed) {
          kept.push(sequence(nested.items));
          changed = true;
        } else {
          kept.push(item);
        }
        break;
      }
    }
  }

  return { items: kept, changed };
}

/**
 * Append additions not already present; returns how many items were added
 */
function appendAdditions(
  items: SequenceItem[],
  additions: readonly Addition[],
  present: Set<string>,
  counters: ReconcileCounters
): number {
  let added = 0;
  for (const addition of additions) {
    if (addition.kind === "literal") {
      const normalized = normalizeSqlText(addition.text);
      if (present.has(normalized)) continue;
      present.add(normalized);
      items.push(literal(addition.text));
      counters.literalsAdded++;
      added++;
      continue;
    }

    const fresh = addition.variants.filter((v) => {
      const normalized = normalizeSqlText(v.sql);
      if (present.has(normalized)) return false;
      present.add(normalized);
      return true;
    });
    if (fresh.length === 0) continue;
    items.push(variantGroup(fresh));
    counters.variantsAdded += fresh.length;
    added++;
  }
  return added;
}

function collapse(items: readonly SequenceItem[]): SqlValue {
  return items.length === 1 ? items[0] : sequence(items);
}

/**
 * Reconcile one value against the decisions for its key
 */
export function reconcileValue(
  value: SqlValue,
  decisions: readonly FixDecision[],
  counters: ReconcileCounters = { removed: 0, literalsAdded: 0, variantsAdded: 0 }
): ReconcileOutcome {
  const { removals, additions } = splitDecisions(decisions);

  switch (value.kind) {
    case "literal": {
      const removed = removals.has(normalizeSqlText(value.text));
      const items: SequenceItem[] = [];
      if (removed) {
        counters.removed++;
      } else {
        items.push(value);
      }
      const added = appendAdditions(items, additions, presentTexts(items), counters);
      if (!removed && added === 0) return { kind: "unchanged" };
      if (items.length === 0) return { kind: "deleted" };
      return { kind: "modified", value: collapse(items) };
    }

    case "sequence": {
      const pruned = pruneItems(value.items, removals, counters);
      const items = pruned.items;
      const added = appendAdditions(items, additions, presentTexts(items), counters);
      if (!pruned.changed && added === 0) return { kind: "unchanged" };
      if (items.length === 0) return { kind: "deleted" };
      return { kind: "modified", value: sequence(items) };
    }

    case "variant_group": {
      const variants = value.variants.filter((v) => !removals.has(normalizeSqlText(v.sql)));
      const removed = value.variants.length - variants.length;
      counters.removed += removed;

      const present = new Set(variants.map((v) => normalizeSqlText(v.sql)));
      let added = 0;
      for (const addition of additions) {
        const incoming: Variant[] =
          addition.kind === "literal"
            ? [{ scenario: "", sql: addition.text }]
            : [...addition.variants];
        for (const variant of incoming) {
          const normalized = normalizeSqlText(variant.sql);
          if (present.has(normalized)) continue;
          present.add(normalized);
          if (addition.kind === "literal") {
            variants.push({ scenario: defaultScenarioLabel(variants.length + 1), sql: variant.sql });
            counters.literalsAdded++;
          } else {
            variants.push(variant);
            counters.variantsAdded++;
          }
          added++;
        }
      }

      if (variants.length === 0) return { kind: "deleted" };
      if (removed === 0 && added === 0) return { kind: "unchanged" };
      return { kind: "modified", value: variantGroup(variants) };
    }

    case "sentinel": {
      const items: SequenceItem[] = [];
      const added = appendAdditions(items, additions, new Set<string>(), counters);
      if (added === 0) return { kind: "unchanged" };
      return { kind: "modified", value: collapse(items) };
    }
  }
}

/**
 * Apply a fix plan to a working set
 *
 * Records whose key is not in the plan pass through as the same objects;
 * modified records are returned as new objects and the input is not mutated.
 * `records.length + stats.records_deleted` always equals the input length.
 */
export function applyFixPlan(records: readonly WorkflowRecord[], plan: FixPlan): FixApplication {
  const stats = emptyFixStats();
  const counters: ReconcileCounters = { removed: 0, literalsAdded: 0, variantsAdded: 0 };
  const matched = new Set<string>();
  const output: WorkflowRecord[] = [];

  for (const record of records) {
    const id = entityKeyId(record.key);
    const decisions = plan.get(id);
    if (!decisions || decisions.length === 0) {
      output.push(record);
      continue;
    }
    matched.add(id);

    const outcome = reconcileValue(record.sqlValue, decisions, counters);
    switch (outcome.kind) {
      case "unchanged":
        output.push(record);
        break;
      case "modified":
        output.push({ ...record, sqlValue: outcome.value });
        stats.records_modified++;
        break;
      case "deleted":
        stats.records_deleted++;
        break;
    }
  }

  stats.literals_removed = counters.removed;
  stats.literals_added = counters.literalsAdded;
  stats.variants_added = counters.variantsAdded;
  for (const id of plan.keys()) {
    if (!matched.has(id)) stats.records_unmatched++;
  }

  emit(TelemetryEvents.FixApplied, { ...stats });
  return { records: output, stats };
}
