/**
 * Shared error types for text-generator failures
 *
 * Every error here is transient from the workflow's point of view: the
 * backoff controller retries it, and a stage that still sees it after the
 * last attempt degrades to its conservative default.
 */

import type { ErrorCode } from "../../utils/errors.js";

/**
 * Upstream timeout error - thrown when a generator call exceeds its deadline
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";
  readonly errorCode: ErrorCode = "UPSTREAM_TIMEOUT";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly timeoutPhase: "connect" | "headers" | "body",
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream HTTP error - the provider answered with a non-2xx status
 *
 * Captures the HTTP status code, provider-specific error code, and request ID
 * for cross-referencing with provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";
  readonly errorCode: ErrorCode = "UPSTREAM_HTTP";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}

/**
 * Connection could not be established or was reset mid-request
 */
export class UpstreamConnectionError extends Error {
  readonly name = "UpstreamConnectionError";
  readonly errorCode: ErrorCode = "UPSTREAM_CONNECTION";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamConnectionError);
    }
  }
}

/**
 * The provider returned no text
 */
export class EmptyResponseError extends Error {
  readonly name = "EmptyResponseError";
  readonly errorCode: ErrorCode = "EMPTY_RESPONSE";

  constructor(message: string, public readonly provider: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmptyResponseError);
    }
  }
}

/**
 * No extraction strategy could find a structured value in the response
 */
export class MalformedOutputError extends Error {
  readonly name = "MalformedOutputError";
  readonly errorCode: ErrorCode = "MALFORMED_OUTPUT";

  constructor(
    message: string,
    public readonly strategiesTried: number,
    public readonly preview?: string
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MalformedOutputError);
    }
  }
}
