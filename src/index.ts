/**
 * Public API
 */

export { createGenerator } from "./adapters/llm/router.js";
export { OpenAIGenerator } from "./adapters/llm/openai.js";
export { FixturesGenerator } from "./adapters/llm/fixtures.js";
export type { GenerateOptions, TextGenerator } from "./adapters/llm/types.js";
export {
  EmptyResponseError,
  MalformedOutputError,
  UpstreamConnectionError,
  UpstreamHTTPError,
  UpstreamTimeoutError,
} from "./adapters/llm/errors.js";

export { config, getConfig, type Config } from "./config/index.js";
export {
  defaultWorkflowSettings,
  loadWorkflowSettings,
  parseWorkflowSettings,
  resolveStageSettings,
  type StageSettings,
  type WorkflowSettings,
} from "./config/workflow.js";

export * from "./schemas/sql-value.js";
export * from "./schemas/record.js";

export {
  ConfigError,
  FatalError,
  InputError,
  StageFailedError,
  toErrorAnnotation,
  type ErrorAnnotation,
  type ErrorCode,
} from "./utils/errors.js";
export { ok, err, unwrap, type Result } from "./utils/result.js";
export {
  calculateBackoffDelay,
  classifyError,
  DEFAULT_BACKOFF_POLICY,
  RetriesExhaustedError,
  runWithBackoff,
  type BackoffOptions,
  type BackoffPolicy,
} from "./utils/retry.js";
export { extractJson, extractStructured, type JsonExtractionResult } from "./utils/json-extractor.js";
export { emit, flushMetrics, log, TelemetryEvents } from "./utils/telemetry.js";

export {
  extractAndValidate,
  zodContract,
  type ValidatedResponse,
  type Validator,
} from "./workflow/extraction/response-validator.js";
export { runBounded, type TaskContext, type TaskResult } from "./workflow/runner/bounded-runner.js";
export * from "./workflow/reconciliation/fix-plan.js";
export { applyFixPlan, reconcileValue, type FixApplication, type FixStats } from "./workflow/reconciliation/apply-fix-plan.js";
export { reviewFixPlan, createLlmFixReviewer, type FixReviewer, type ReviewVerdict } from "./workflow/reconciliation/fix-review.js";
export type { Stage, StageContext, StageOutcome, StageRecord, WorkflowState } from "./workflow/orchestrator/types.js";
export { createDefaultStages, createStages, DEFAULT_STAGE_ORDER, STAGE_REGISTRY } from "./workflow/stages/index.js";
export { resumeWorkflow, runWorkflow, WorkflowOrchestrator, WorkflowStore, type WorkflowResult } from "./workflow/index.js";
export { SERVICE_VERSION } from "./version.js";
