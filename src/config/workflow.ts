/**
 * Workflow settings file
 *
 * Declarative mapping of stage name to concurrency, retry and reformat
 * limits plus the generator call parameters and stage policies. Loaded
 * once per run and passed explicitly to the orchestrator; stages never
 * read it from ambient state.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { config } from "./index.js";
import { DEFAULT_LLM_TIMEOUT_MS } from "./timeouts.js";
import { ConfigError, describeError, formatZodIssues } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";

const StageOverridesSchema = z
  .object({
    concurrency: z.number().int().positive().optional(),
    max_attempts: z.number().int().positive().optional(),
    base_delay_ms: z.number().nonnegative().optional(),
    max_delay_ms: z.number().nonnegative().optional(),
    jitter_ms: z.number().nonnegative().optional(),
    max_reformat_attempts: z.number().int().nonnegative().optional(),
  })
  .strict();

const DefaultsSchema = z
  .object({
    concurrency: z.number().int().positive().default(50),
    max_attempts: z.number().int().positive().default(3),
    base_delay_ms: z.number().nonnegative().default(1000),
    max_delay_ms: z.number().nonnegative().default(30_000),
    jitter_ms: z.number().nonnegative().default(1000),
    max_reformat_attempts: z.number().int().nonnegative().default(3),
  })
  .strict();

const LlmSettingsSchema = z
  .object({
    max_tokens: z.number().int().positive().default(2048),
    temperature: z.number().min(0).max(2).default(0),
    timeout_ms: z.number().int().positive().default(DEFAULT_LLM_TIMEOUT_MS),
  })
  .strict();

const PolicySchema = z
  .object({
    /** Classification failures count as "valid" (complete, correct, keep) */
    assume_valid_on_failure: z.boolean().default(true),
  })
  .strict();

const FixReviewSchema = z
  .object({
    enabled: z.boolean().default(false),
  })
  .strict();

export const WorkflowSettingsSchema = z
  .object({
    defaults: DefaultsSchema.default({}),
    stages: z.record(z.string(), StageOverridesSchema).default({}),
    llm: LlmSettingsSchema.default({}),
    policy: PolicySchema.default({}),
    fix_review: FixReviewSchema.default({}),
    keywords: z.array(z.string().min(1)).optional(),
    control_flow_keywords: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type WorkflowSettings = z.infer<typeof WorkflowSettingsSchema>;
export type StageOverrides = z.infer<typeof StageOverridesSchema>;

/**
 * Overrides applied before the file's own stage entries
 */
export const BUILTIN_STAGE_OVERRIDES: Readonly<Record<string, StageOverrides>> = {
  control_flow_validation: { concurrency: 20 },
};

/**
 * Effective limits for one stage
 */
export interface StageSettings {
  concurrency: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  maxReformatAttempts: number;
}

export function defaultWorkflowSettings(): WorkflowSettings {
  return WorkflowSettingsSchema.parse({});
}

/**
 * Parse an in-memory settings object
 *
 * @throws ConfigError when the object does not match the schema
 */
export function parseWorkflowSettings(raw: unknown, source = "settings"): WorkflowSettings {
  const result = WorkflowSettingsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid workflow settings in ${source}: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load workflow settings from a JSON file
 *
 * A missing file falls back to built-in defaults; an unreadable or invalid
 * file is a configuration error.
 */
export function loadWorkflowSettings(path: string = config.workflow.configPath): WorkflowSettings {
  if (!existsSync(path)) {
    log.info({ path }, "Workflow settings file not found, using built-in defaults");
    return defaultWorkflowSettings();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Unreadable workflow settings file ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const settings = parseWorkflowSettings(raw, path);
  log.info({ path, stages: Object.keys(settings.stages) }, "Loaded workflow settings");
  return settings;
}

/**
 * Merge defaults, built-in overrides and file overrides for a stage
 */
export function resolveStageSettings(settings: WorkflowSettings, stageName: string): StageSettings {
  const merged = {
    ...settings.defaults,
    ...BUILTIN_STAGE_OVERRIDES[stageName],
    ...settings.stages[stageName],
  };
  return {
    concurrency: merged.concurrency,
    maxAttempts: merged.max_attempts,
    baseDelayMs: merged.base_delay_ms,
    maxDelayMs: merged.max_delay_ms,
    jitterMs: merged.jitter_ms,
    maxReformatAttempts: merged.max_reformat_attempts,
  };
}
