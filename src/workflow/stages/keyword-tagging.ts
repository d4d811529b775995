/**
 * Keyword tagging stage
 *
 * Tags records whose ORM code (or related code context) uses an ORM feature
 * that changes the SQL issued, so later review can single them out.
 * Matching is a case-sensitive substring test.
 */

import type { WorkflowRecord } from "../../schemas/record.js";
import type { Stage, StageContext, StageOutcome } from "../orchestrator/types.js";
import { addTag } from "./shared.js";

export const KEYWORD_TAGGING_STAGE = "keyword_tagging";

export const KEYWORD_TAG_PREFIX = "keyword:";

/** GORM features whose SQL depends on more than the call itself */
export const DEFAULT_ORM_KEYWORDS: readonly string[] = [
  "Preload",
  "Transaction",
  "Scopes",
  "FindInBatches",
  "FirstOrInit",
  "Association",
  "Locking",
  "Pluck",
  "Callbacks",
  "AutoMigrate",
  "ForeignKey",
  "References",
  "NamedQuery",
  "Hooks",
  "NamedParameters",
  "save",
  "createorupdate",
];

/**
 * Code snippets associated with a record: its ORM code plus every
 * `code_meta_data[].code_value`
 */
export function codeSnippets(record: WorkflowRecord): string[] {
  const snippets = [record.key.ormCode];
  const meta = record.metadata.code_meta_data;
  if (Array.isArray(meta)) {
    for (const item of meta) {
      if (typeof item === "object" && item !== null && "code_value" in item && typeof item.code_value === "string") {
        snippets.push(item.code_value);
      }
    }
  }
  return snippets;
}

export function matchKeywords(record: WorkflowRecord, keywords: readonly string[]): string[] {
  const snippets = codeSnippets(record);
  return keywords.filter((keyword) => snippets.some((snippet) => snippet.includes(keyword)));
}

export function createKeywordTaggingStage(): Stage {
  return {
    name: KEYWORD_TAGGING_STAGE,
    kind: "tagging",
    async run(records: WorkflowRecord[], ctx: StageContext): Promise<StageOutcome> {
      const keywords = ctx.settings.keywords ?? DEFAULT_ORM_KEYWORDS;
      const perKeyword: Record<string, number> = {};
      let tagged = 0;

      for (const record of records) {
        let changed = false;
        for (const keyword of matchKeywords(record, keywords)) {
          perKeyword[keyword] = (perKeyword[keyword] ?? 0) + 1;
          changed = addTag(record, `${KEYWORD_TAG_PREFIX}${keyword}`) || changed;
        }
        if (changed) tagged++;
      }

      ctx.logger.info({ records_tagged: tagged, keywords: keywords.length }, "Keyword tagging finished");

      return {
        records,
        modifiedCount: tagged,
        deletedCount: 0,
        details: {
          records_tagged: tagged,
          keyword_counts: perKeyword,
        },
      };
    },
  };
}
