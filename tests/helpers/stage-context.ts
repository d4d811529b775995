import type { TextGenerator } from "../../src/adapters/llm/types.js";
import {
  parseWorkflowSettings,
  resolveStageSettings,
  type WorkflowSettings,
} from "../../src/config/workflow.js";
import { log } from "../../src/utils/telemetry.js";
import type { StageContext } from "../../src/workflow/orchestrator/types.js";

/**
 * Settings with delays zeroed so retries run instantly
 */
export function fastSettings(overrides: Record<string, unknown> = {}): WorkflowSettings {
  const defaults = typeof overrides.defaults === "object" && overrides.defaults !== null ? overrides.defaults : {};
  return parseWorkflowSettings({
    ...overrides,
    defaults: { base_delay_ms: 0, max_delay_ms: 0, jitter_ms: 0, ...defaults },
  });
}

export const noSleep = async (_ms: number): Promise<void> => {};

export function stageContext(
  stageName: string,
  generator: TextGenerator,
  settings: WorkflowSettings = fastSettings()
): StageContext {
  return {
    stageName,
    settings,
    stageSettings: resolveStageSettings(settings, stageName),
    generator,
    logger: log,
    sleep: noSleep,
  };
}
