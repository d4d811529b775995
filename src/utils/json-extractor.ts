/**
 * JSON Extractor Utility
 *
 * Pulls a JSON value out of generated text that may wrap it in
 * conversational preamble, suffix text, or markdown code blocks.
 *
 * Strategies run in a fixed order and the first success wins:
 * 1. whole_text   - the trimmed text is JSON
 * 2. code_block   - the first fenced block (```json or bare ```) holding JSON
 * 3. bracket_span - the first balanced `{...}` or `[...]` span holding JSON
 */

import { log, emit, TelemetryEvents } from "./telemetry.js";
import { type Result, ok, err } from "./result.js";
import { EmptyResponseError, MalformedOutputError } from "../adapters/llm/errors.js";

export type ExtractionStrategyName = "whole_text" | "code_block" | "bracket_span";

export interface ExtractedSpan {
  value: unknown;
  /** Offset of the parsed span within the trimmed text */
  start: number;
  /** Length of the parsed span */
  length: number;
  candidatesTried: number;
}

export type ExtractionStrategy = (text: string) => Result<ExtractedSpan, string>;

/**
 * Result of JSON extraction
 */
export interface JsonExtractionResult {
  value: unknown;
  strategy: ExtractionStrategyName;
  preambleLength: number;
  suffixLength: number;
}

/**
 * Options for JSON extraction
 */
export interface JsonExtractionOptions {
  /** Task name for telemetry (e.g., "sql_completeness_check") */
  task?: string;
  /** Model name for telemetry */
  model?: string;
  /** Whether to log warnings when extraction is needed */
  logWarnings?: boolean;
}

function tryParse(text: string): Result<unknown, string> {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Strategy 1: parse the whole trimmed text
 */
export const wholeTextStrategy: ExtractionStrategy = (text) => {
  const parsed = tryParse(text);
  if (!parsed.ok) return err(`whole text is not JSON: ${parsed.error}`);
  return ok({ value: parsed.value, start: 0, length: text.length, candidatesTried: 1 });
};

/**
 * Strategy 2: scan every fenced code block, return the first holding JSON
 */
export const codeBlockStrategy: ExtractionStrategy = (text) => {
  const codeBlockRegex = /```(?:json|JSON)?\s*([\s\S]*?)```/g;
  let candidatesTried = 0;
  let match: RegExpExecArray | null;
  while ((match = codeBlockRegex.exec(text)) !== null) {
    candidatesTried++;
    const blockContent = (match[1] ?? "").trim();
    const parsed = tryParse(blockContent);
    if (parsed.ok) {
      return ok({ value: parsed.value, start: match.index, length: match[0].length, candidatesTried });
    }
  }
  return err(
    candidatesTried === 0
      ? "no fenced code block"
      : `none of ${candidatesTried} code block(s) held valid JSON`
  );
};

/**
 * Find the end of the balanced structure opening at startIndex, honouring
 * strings and escape sequences. Returns -1 when unbalanced.
 */
export function findBalancedEnd(content: string, startIndex: number): number {
  const open = content[startIndex];
  if (open !== "{" && open !== "[") return -1;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = inString;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) return i;
  }

  return -1;
}

/**
 * Strategy 3: try each `{` / `[` position in order until a balanced span parses
 */
export const bracketSpanStrategy: ExtractionStrategy = (text) => {
  let candidatesTried = 0;
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char !== "{" && char !== "[") continue;
    candidatesTried++;
    const end = findBalancedEnd(text, i);
    if (end === -1) continue;
    const parsed = tryParse(text.slice(i, end + 1));
    if (parsed.ok) {
      return ok({ value: parsed.value, start: i, length: end + 1 - i, candidatesTried });
    }
  }
  return err(
    candidatesTried === 0
      ? "missing opening delimiter"
      : `tried ${candidatesTried} candidate position(s)`
  );
};

export const EXTRACTION_STRATEGIES: ReadonlyArray<readonly [ExtractionStrategyName, ExtractionStrategy]> = [
  ["whole_text", wholeTextStrategy],
  ["code_block", codeBlockStrategy],
  ["bracket_span", bracketSpanStrategy],
];

/**
 * Extract a JSON value from generated text.
 *
 * @throws EmptyResponseError when the text is blank
 * @throws MalformedOutputError when every strategy fails
 */
export function extractStructured(
  content: string,
  options: JsonExtractionOptions = {}
): JsonExtractionResult {
  const { task, model, logWarnings = true } = options;
  const trimmed = content.trim();
  if (trimmed.length === 0) {
    throw new EmptyResponseError("Generated text is empty", model ?? "unknown");
  }

  const failures: string[] = [];

  for (const [name, strategy] of EXTRACTION_STRATEGIES) {
    const attempt = strategy(trimmed);
    if (!attempt.ok) {
      failures.push(`${name}: ${attempt.error}`);
      continue;
    }

    const span = attempt.value;
    const preambleLength = span.start;
    const suffixLength = trimmed.length - (span.start + span.length);

    if (name !== "whole_text") {
      if (logWarnings) {
        log.warn(
          {
            task,
            model,
            extraction_method: name,
            preamble_length: preambleLength,
            suffix_length: suffixLength,
          },
          "JSON extraction required - response wrapped structured output in text"
        );
      }
      emit(TelemetryEvents.JsonExtractionRequired, {
        task,
        model,
        strategy: name,
        preamble_length: preambleLength,
        suffix_length: suffixLength,
      });
    }

    return { value: span.value, strategy: name, preambleLength, suffixLength };
  }

  throw new MalformedOutputError(
    `Failed to extract valid JSON from response (${failures.join("; ")})`,
    failures.length,
    trimmed.slice(0, 80)
  );
}

/**
 * Convenience function that returns just the parsed JSON.
 */
export function extractJson(content: string, options?: JsonExtractionOptions): unknown {
  return extractStructured(content, options).value;
}
