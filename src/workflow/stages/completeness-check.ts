import { buildCompletenessPrompt } from "../../prompts/templates.js";
import type { Stage } from "../orchestrator/types.js";
import { createClassificationStage, verdictContract } from "./classification.js";

export const COMPLETENESS_STAGE = "sql_completeness_check";

/**
 * Tags records whose SQL misses statements the ORM code can issue
 */
export function createCompletenessStage(): Stage {
  return createClassificationStage({
    name: COMPLETENESS_STAGE,
    tagPrefix: "completeness",
    failureTag: "incomplete",
    validator: verdictContract("complete"),
    buildPrompt: buildCompletenessPrompt,
  });
}
