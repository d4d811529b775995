import { buildCorrectnessPrompt } from "../../prompts/templates.js";
import type { Stage } from "../orchestrator/types.js";
import { createClassificationStage, verdictContract } from "./classification.js";

export const CORRECTNESS_STAGE = "sql_correctness_check";

/**
 * Tags records whose SQL does not match what the ORM code issues
 */
export function createCorrectnessStage(): Stage {
  return createClassificationStage({
    name: CORRECTNESS_STAGE,
    tagPrefix: "correctness",
    failureTag: "incorrect",
    validator: verdictContract("correct"),
    buildPrompt: buildCorrectnessPrompt,
  });
}
