import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null;
export type TelemetryValue = TelemetryLeaf | TelemetryShape | TelemetryValue[];
export interface TelemetryShape {
  [key: string]: TelemetryValue;
}
export type Event = Record<string, unknown>;

export type TestSink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 * Only usable when NODE_ENV=test or under vitest
 */
let testSink: TestSink | null = null;

export function setTestSink(sink: TestSink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * Dashboards key on these strings; rename only together with them.
 */
export const TelemetryEvents = {
  WorkflowStarted: "workflow.run.started",
  WorkflowCompleted: "workflow.run.completed",
  WorkflowResumed: "workflow.run.resumed",
  DatasetLoaded: "workflow.dataset.loaded",

  StageStarted: "workflow.stage.started",
  StageCompleted: "workflow.stage.completed",
  StageFailed: "workflow.stage.failed",

  LlmRetry: "workflow.llm.retry",
  LlmRetrySuccess: "workflow.llm.retry_success",
  LlmRetryExhausted: "workflow.llm.retry_exhausted",

  JsonExtractionRequired: "workflow.extraction.required",
  ValidationReformat: "workflow.validation.reformat",
  ValidationFailed: "workflow.validation.failed",

  TaskBatchCompleted: "workflow.tasks.batch_completed",
  FixApplied: "workflow.fix.applied",
  FixReviewed: "workflow.fix.reviewed",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "orm_sql_refinery.",
    globalTags: {
      service: env.DD_SERVICE || "orm-sql-refinery",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

function sanitizeTelemetryValue(value: unknown): TelemetryValue | undefined {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (value instanceof Error) {
    return value.message;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: TelemetryValue[] = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    const sanitizedObj: TelemetryShape = {};
    for (const [key, v] of Object.entries(value)) {
      const sanitizedChild = sanitizeTelemetryValue(v);
      if (sanitizedChild !== undefined) {
        sanitizedObj[key] = sanitizedChild;
      }
    }
    return sanitizedObj;
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryValue | undefined, fallback = "unknown"): string {
  return typeof value === "string" || typeof value === "number" ? String(value) : fallback;
}

/**
 * Emit telemetry event (logs + Datadog metrics)
 *
 * @param event Event name (use TelemetryEvents)
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  if (!datadogClient) return;

  try {
    switch (event) {
      case TelemetryEvents.StageCompleted: {
        const stage = tag(eventData.stage);
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("stage.duration_ms", eventData.duration_ms, { stage });
        }
        if (typeof eventData.output_records === "number") {
          datadogClient.gauge("stage.output_records", eventData.output_records, { stage });
        }
        datadogClient.increment("stage.completed", 1, { stage });
        break;
      }
      case TelemetryEvents.StageFailed:
        datadogClient.increment("stage.failed", 1, { stage: tag(eventData.stage) });
        break;
      case TelemetryEvents.LlmRetry:
        datadogClient.increment("llm.retry", 1, { operation: tag(eventData.operation) });
        break;
      case TelemetryEvents.LlmRetryExhausted:
        datadogClient.increment("llm.retry_exhausted", 1, { operation: tag(eventData.operation) });
        break;
      case TelemetryEvents.JsonExtractionRequired:
        datadogClient.increment("extraction.required", 1, { strategy: tag(eventData.strategy) });
        break;
      case TelemetryEvents.ValidationFailed:
        datadogClient.increment("validation.failed", 1, { task: tag(eventData.task) });
        break;
      case TelemetryEvents.FixApplied:
        if (typeof eventData.records_deleted === "number") {
          datadogClient.gauge("fix.records_deleted", eventData.records_deleted);
        }
        if (typeof eventData.records_modified === "number") {
          datadogClient.gauge("fix.records_modified", eventData.records_modified);
        }
        break;
      default:
        // Lifecycle events stay log-only
        break;
    }
  } catch (error) {
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}

/**
 * Flush Datadog metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = datadogClient;
  if (!client) return;
  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing Datadog metrics");
        reject(error);
      } else {
        log.info("Datadog metrics flushed");
        resolve();
      }
    });
  });
}
