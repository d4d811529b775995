import { ConfigError } from "../../utils/errors.js";
import type { Stage } from "../orchestrator/types.js";
import { createCompletenessStage, COMPLETENESS_STAGE } from "./completeness-check.js";
import { createControlFlowValidationStage, CONTROL_FLOW_STAGE } from "./control-flow-validation.js";
import { createCorrectnessStage, CORRECTNESS_STAGE } from "./correctness-check.js";
import { createKeywordTaggingStage, KEYWORD_TAGGING_STAGE } from "./keyword-tagging.js";
import { createRedundancyValidationStage, REDUNDANCY_STAGE } from "./redundancy-validation.js";
import { createSqlCleaningStage, SQL_CLEANING_STAGE } from "./sql-cleaning.js";

/**
 * Stage factories by name, in default run order
 */
export const STAGE_REGISTRY: ReadonlyMap<string, () => Stage> = new Map([
  [SQL_CLEANING_STAGE, createSqlCleaningStage],
  [KEYWORD_TAGGING_STAGE, createKeywordTaggingStage],
  [COMPLETENESS_STAGE, createCompletenessStage],
  [CORRECTNESS_STAGE, createCorrectnessStage],
  [REDUNDANCY_STAGE, createRedundancyValidationStage],
  [CONTROL_FLOW_STAGE, createControlFlowValidationStage],
]);

export const DEFAULT_STAGE_ORDER: readonly string[] = [...STAGE_REGISTRY.keys()];

export function createDefaultStages(): Stage[] {
  return createStages(DEFAULT_STAGE_ORDER);
}

/**
 * Build stages by name, in the order given
 *
 * @throws ConfigError for an unknown name
 */
export function createStages(names: readonly string[]): Stage[] {
  return names.map((name) => {
    const factory = STAGE_REGISTRY.get(name);
    if (!factory) {
      throw new ConfigError(`Unknown stage "${name}" (known: ${DEFAULT_STAGE_ORDER.join(", ")})`);
    }
    return factory();
  });
}

export { COMPLETENESS_STAGE, CONTROL_FLOW_STAGE, CORRECTNESS_STAGE, KEYWORD_TAGGING_STAGE, REDUNDANCY_STAGE, SQL_CLEANING_STAGE };
