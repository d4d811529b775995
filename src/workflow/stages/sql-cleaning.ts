/**
 * SQL cleaning stage
 *
 * Drops extracted statements that are not SQL (prose, oversized blobs,
 * empty strings). Parameter-dependent groups are kept whole. A value left
 * with nothing becomes the NoSqlGenerated sentinel; records are never
 * deleted here.
 */

import {
  normalizeSqlText,
  sentinel,
  sequence,
  type SequenceItem,
  type SqlValue,
} from "../../schemas/sql-value.js";
import type { WorkflowRecord } from "../../schemas/record.js";
import type { Stage, StageContext, StageOutcome } from "../orchestrator/types.js";

export const SQL_CLEANING_STAGE = "sql_cleaning";

export const MAX_SQL_LENGTH = 2000;

const SQL_KEYWORDS = [
  "SELECT",
  "INSERT",
  "UPDATE",
  "DELETE",
  "CREATE",
  "DROP",
  "ALTER",
  "TRUNCATE",
  "REPLACE",
  "SHOW",
  "DESCRIBE",
  "EXPLAIN",
  "WITH",
  "UNION",
  "HAVING",
  "GROUP BY",
  "ORDER BY",
  "LIMIT",
];

const SQL_PATTERNS: RegExp[] = [
  /^\s*(SELECT|INSERT|UPDATE|DELETE|CREATE|DROP|ALTER|TRUNCATE|REPLACE|SHOW|DESCRIBE|EXPLAIN|WITH)\s+/i,
  /\s+(FROM|INTO|SET|WHERE|VALUES|TABLE|DATABASE|INDEX)\s+/i,
  /;\s*$/,
];

const CJK_PATTERN = /[\u3400-\u9fff\uf900-\ufaff]/;

function containsSqlKeyword(text: string): boolean {
  const upper = text.toUpperCase();
  return SQL_KEYWORDS.some((keyword) => upper.includes(keyword));
}

/**
 * Heuristic check that a statement is SQL rather than prose
 */
export function isValidSql(text: string): boolean {
  const sql = normalizeSqlText(text);
  if (sql.length === 0 || sql.length > MAX_SQL_LENGTH) return false;

  // Natural-language explanations without any SQL in them
  if (CJK_PATTERN.test(sql) && !containsSqlKeyword(sql)) return false;

  if (SQL_PATTERNS.some((pattern) => pattern.test(sql))) return true;
  return containsSqlKeyword(sql);
}

export interface CleaningCounts {
  removed: number;
  retained: number;
  groupsRetained: number;
}

function cleanItems(items: readonly SequenceItem[], counts: CleaningCounts): SequenceItem[] {
  const kept: SequenceItem[] = [];
  for (const item of items) {
    switch (item.kind) {
      case "literal":
        if (isValidSql(item.text)) {
          counts.retained++;
          kept.push(item);
        } else {
          counts.removed++;
        }
        break;
      case "variant_group":
        counts.groupsRetained++;
        kept.push(item);
        break;
      case "sequence": {
        const nested = cleanItems(item.items, counts);
        if (nested.length > 0) kept.push(nested.length === item.items.length ? item : sequence(nested));
        break;
      }
    }
  }
  return kept;
}

/**
 * Clean one value; returns the same object when nothing was removed
 */
export function cleanSqlValue(value: SqlValue, counts: CleaningCounts): SqlValue {
  switch (value.kind) {
    case "sentinel":
      return value;
    case "variant_group":
      counts.groupsRetained++;
      return value;
    case "literal":
      if (isValidSql(value.text)) {
        counts.retained++;
        return value;
      }
      counts.removed++;
      return sentinel("no_sql_generated");
    case "sequence": {
      const before = counts.removed;
      const kept = cleanItems(value.items, counts);
      if (counts.removed === before) return value;
      return kept.length > 0 ? sequence(kept) : sentinel("no_sql_generated");
    }
  }
}

export function createSqlCleaningStage(): Stage {
  return {
    name: SQL_CLEANING_STAGE,
    kind: "cleaning",
    async run(records: WorkflowRecord[], ctx: StageContext): Promise<StageOutcome> {
      const counts: CleaningCounts = { removed: 0, retained: 0, groupsRetained: 0 };
      let modified = 0;
      let emptied = 0;

      for (const record of records) {
        const cleaned = cleanSqlValue(record.sqlValue, counts);
        if (cleaned === record.sqlValue) continue;
        modified++;
        if (cleaned.kind === "sentinel") emptied++;
        record.sqlValue = cleaned;
      }

      ctx.logger.info(
        { removed: counts.removed, retained: counts.retained, records_modified: modified },
        "SQL cleaning finished"
      );

      return {
        records,
        modifiedCount: modified,
        deletedCount: 0,
        details: {
          invalid_sql_removed: counts.removed,
          valid_sql_retained: counts.retained,
          param_dependent_retained: counts.groupsRetained,
          records_emptied: emptied,
        },
      };
    },
  };
}
