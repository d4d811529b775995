/**
 * Prompt templates for the generator-backed stages.
 *
 * Each builder renders one record (or one statement of it) into a request
 * that ends with the JSON contract the matching stage validates.
 */

import type { WorkflowRecord } from "../schemas/record.js";
import { toWire } from "../schemas/sql-value.js";

// ============================================================================
// Record rendering
// ============================================================================

function renderCodeMetaData(record: WorkflowRecord): string {
  const meta = record.metadata.code_meta_data;
  if (!Array.isArray(meta) || meta.length === 0) return "";
  return `\n## Related Code Context\n${JSON.stringify(meta, null, 2)}\n`;
}

export function renderRecord(record: WorkflowRecord): string {
  const functionName = record.metadata.function_name;
  return `## ORM Code
${record.key.ormCode}

## Caller
${record.key.caller || "(unknown)"}
${typeof functionName === "string" ? `\n## Function\n${functionName}\n` : ""}${renderCodeMetaData(record)}
## Extracted SQL
${JSON.stringify(toWire(record.sqlValue), null, 2)}`;
}

// ============================================================================
// Stage prompts
// ============================================================================

export function buildCompletenessPrompt(record: WorkflowRecord): string {
  return `You review SQL statements extracted from ORM code.

${renderRecord(record)}

## Your Task
Decide whether the extracted SQL covers every statement the ORM code can issue,
including every branch and parameter-dependent variant.

## Output Format (JSON)
Return ONLY a JSON object: {"complete": true|false, "reason": "<one sentence>"}`;
}

export function buildCorrectnessPrompt(record: WorkflowRecord): string {
  return `You review SQL statements extracted from ORM code.

${renderRecord(record)}

## Your Task
Decide whether every extracted statement is what the ORM code actually issues
(table names, columns, conditions, ordering and limits).

## Output Format (JSON)
Return ONLY a JSON object: {"correct": true|false, "reason": "<one sentence>"}`;
}

export function buildRedundancyPrompt(record: WorkflowRecord, statement: string): string {
  return `You review SQL statements extracted from ORM code. One statement was flagged
as possibly redundant (not issued by this call site, or duplicating another statement).

${renderRecord(record)}

## Flagged Statement
${statement}

## Your Task
Confirm whether the flagged statement is redundant and should be removed.

## Output Format (JSON)
Return ONLY a JSON object: {"confirmed": true|false, "reason": "<one sentence>"}`;
}

export function buildControlFlowCheckPrompt(record: WorkflowRecord): string {
  return `You review SQL statements extracted from ORM code that contains conditional logic.

${renderRecord(record)}

## Your Task
Decide whether the extracted SQL reflects the control flow of the code: every
branch that issues a query has a statement, and branch-specific statements are
grouped as parameter-dependent variants.

## Output Format (JSON)
Return ONLY a JSON object: {"correct": true|false, "reason": "<one sentence>"}`;
}

export function buildControlFlowRegenerationPrompt(record: WorkflowRecord, reason: string | undefined): string {
  return `You extract SQL statements from ORM code that contains conditional logic.
A reviewer found the current extraction does not match the control flow${reason ? `: ${reason}` : "."}

${renderRecord(record)}

## Your Task
Produce the corrected list of SQL statements. Statements that only run under a
specific condition go in a parameter-dependent group.

## Output Format (JSON)
Return ONLY a JSON object:
{"sql_statement_list": [
  "<statement issued unconditionally>",
  {"type": "param_dependent", "variants": [{"scenario": "<condition>", "sql": "<statement>"}]}
]}
Use "<NO SQL GENERATE>" as the list when the code issues no SQL.`;
}

export function buildFixReviewPrompt(record: WorkflowRecord, action: string, statement: string): string {
  return `You double-check a proposed change to SQL extracted from ORM code.

${renderRecord(record)}

## Proposed Change
${action}: ${statement}

## Your Task
Accept the change if it is right. If it is wrong but a different statement
should take its place, reject it and give the replacement.

## Output Format (JSON)
Return ONLY a JSON object: {"accepted": true|false, "replacement": "<statement, optional>"}`;
}

// ============================================================================
// Reformat prompt
// ============================================================================

/**
 * Follow-up request sent when a response parsed but broke its contract
 */
export function buildReformatPrompt(originalPrompt: string, invalidResponse: string, error: string): string {
  return `${originalPrompt}

## Previous Response
${invalidResponse}

## Problem
The previous response did not match the required format: ${error}

Answer the original request again. Return ONLY JSON in the required format.`;
}
