import { emit, TelemetryEvents } from "./telemetry.js";
import { FatalError, describeError, type ErrorCode } from "./errors.js";
import {
  EmptyResponseError,
  MalformedOutputError,
  UpstreamConnectionError,
  UpstreamHTTPError,
  UpstreamTimeoutError,
} from "../adapters/llm/errors.js";

/**
 * Backoff policy for one stage
 */
export interface BackoffPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of the uniform jitter added to each delay */
  jitterMs: number;
}

/**
 * Default policy
 * - 3 attempts total
 * - Exponential backoff from 1s, capped at 30s
 * - Up to 1s of uniform jitter
 */
export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterMs: 1000,
};

export interface BackoffOptions extends Partial<BackoffPolicy> {
  /** Operation name for telemetry (e.g. "sql_completeness_check") */
  operation?: string;
  /** Called before every attempt with its 1-based number */
  onAttempt?: (attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Raised when every attempt failed with a transient error
 */
export class RetriesExhaustedError extends Error {
  readonly name = "RetriesExhaustedError";
  readonly errorCode: ErrorCode = "RETRIES_EXHAUSTED";

  constructor(
    public readonly lastError: unknown,
    public readonly attempts: number,
    operation?: string
  ) {
    super(
      `${operation ?? "operation"} failed after ${attempts} attempt(s): ${describeError(lastError)}`
    );
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetriesExhaustedError);
    }
  }
}

export type ErrorClass = "transient" | "fatal";

/**
 * Error messages that indicate a transient network condition
 */
const RETRYABLE_ERROR_PATTERNS = [
  // Network/timeout errors
  /timeout/i,
  /timed out/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /EAI_AGAIN/i,
  /socket hang up/i,

  // Rate limit errors
  /rate.?limit/i,
  /too many requests/i,

  // Server overload errors
  /overloaded/i,
  /service unavailable/i,
  /temporarily unavailable/i,
];

/**
 * HTTP status codes that should trigger retries
 */
const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

/**
 * Classify a failure as transient (retry) or fatal (propagate immediately)
 *
 * Fatal covers missing configuration, unreadable input, non-retryable HTTP
 * statuses and programmer errors.
 */
export function classifyError(error: unknown): ErrorClass {
  if (error instanceof FatalError) return "fatal";
  // An inner call already spent its attempts
  if (error instanceof RetriesExhaustedError) return "fatal";

  if (
    error instanceof UpstreamTimeoutError ||
    error instanceof UpstreamConnectionError ||
    error instanceof EmptyResponseError ||
    error instanceof MalformedOutputError
  ) {
    return "transient";
  }

  if (error instanceof UpstreamHTTPError) {
    return RETRYABLE_STATUS_CODES.has(error.status) ? "transient" : "fatal";
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS_CODES.has(status) ? "transient" : "fatal";
  }

  if (error instanceof TypeError || error instanceof RangeError || error instanceof SyntaxError) {
    return "fatal";
  }

  const message = error instanceof Error ? error.message : String(error);
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(message)) ? "transient" : "fatal";
}

/**
 * Whether a failure should abort the whole stage instead of degrading one record
 *
 * Covers configuration errors, non-retryable HTTP statuses (a rejected key
 * fails every record the same way) and programmer errors. Exhausted retries
 * and unrecognised failures stay per record.
 */
export function isStageFatal(error: unknown): boolean {
  if (error instanceof FatalError) return true;
  if (error instanceof UpstreamHTTPError) return !RETRYABLE_STATUS_CODES.has(error.status);
  return error instanceof TypeError || error instanceof RangeError || error instanceof ReferenceError;
}

/**
 * Delay before attempt k+1 after failed attempt k:
 * min(base * 2^(k-1) + uniform(0, jitter), max)
 */
export function calculateBackoffDelay(
  attempt: number,
  policy: BackoffPolicy = DEFAULT_BACKOFF_POLICY,
  random: () => number = Math.random
): number {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = random() * policy.jitterMs;
  return Math.max(0, Math.min(exponentialDelay + jitter, policy.maxDelayMs));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Turn a fallible async operation into a bounded-retry operation
 *
 * Transient failures are retried with exponential backoff; fatal failures
 * propagate after the attempt that raised them. Results that parse but fail
 * a contract are never seen here: the reformat loop in the response
 * validator owns those.
 *
 * @throws RetriesExhaustedError after maxAttempts transient failures
 */
export async function runWithBackoff<T>(
  op: (attempt: number) => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const policy: BackoffPolicy = {
    maxAttempts: options.maxAttempts ?? DEFAULT_BACKOFF_POLICY.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_BACKOFF_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF_POLICY.maxDelayMs,
    jitterMs: options.jitterMs ?? DEFAULT_BACKOFF_POLICY.jitterMs,
  };
  const operation = options.operation ?? "generate";
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    options.onAttempt?.(attempt);
    try {
      const result = await op(attempt);

      if (attempt > 1) {
        emit(TelemetryEvents.LlmRetrySuccess, { operation, attempt });
      }

      return result;
    } catch (error) {
      lastError = error;

      if (classifyError(error) === "fatal") {
        throw error;
      }

      if (attempt >= maxAttempts) {
        break;
      }

      const delay = calculateBackoffDelay(attempt, policy, random);
      emit(TelemetryEvents.LlmRetry, {
        operation,
        attempt,
        max_attempts: maxAttempts,
        delay_ms: Math.round(delay),
        reason: describeError(error).substring(0, 100),
      });

      await wait(delay);
    }
  }

  emit(TelemetryEvents.LlmRetryExhausted, {
    operation,
    total_attempts: maxAttempts,
    error_message: describeError(lastError),
  });
  throw new RetriesExhaustedError(lastError, maxAttempts, operation);
}
