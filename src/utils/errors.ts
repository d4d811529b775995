import type { ZodError } from "zod";

/**
 * Error codes carried by fatal errors and by per-record error annotations
 */
export type ErrorCode =
  | "CONFIG"
  | "BAD_INPUT"
  | "STAGE_FAILED"
  | "UPSTREAM_TIMEOUT"
  | "UPSTREAM_CONNECTION"
  | "UPSTREAM_HTTP"
  | "EMPTY_RESPONSE"
  | "MALFORMED_OUTPUT"
  | "RETRIES_EXHAUSTED"
  | "VALIDATION_FAILED"
  | "INTERNAL";

/**
 * Base class for conditions that abort the current stage.
 *
 * Fatal errors are never retried by the backoff controller and are
 * rethrown by stages instead of degrading to a conservative default.
 */
export class FatalError extends Error {
  readonly name: string = "FatalError";

  constructor(
    message: string,
    public readonly code: ErrorCode = "INTERNAL",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Missing or invalid configuration (environment or workflow settings file)
 */
export class ConfigError extends FatalError {
  readonly name: string = "ConfigError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONFIG", options);
  }
}

/**
 * Unreadable dataset, snapshot or workflow log
 */
export class InputError extends FatalError {
  readonly name: string = "InputError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "BAD_INPUT", options);
  }
}

/**
 * A stage raised a fatal error; the workflow stops without advancing.
 */
export class StageFailedError extends FatalError {
  readonly name: string = "StageFailedError";

  constructor(
    public readonly stage: string,
    public readonly stageIndex: number,
    cause: unknown
  ) {
    super(`Stage "${stage}" failed: ${describeError(cause)}`, "STAGE_FAILED", { cause });
  }
}

/**
 * Error annotation attached to records and statistics
 */
export interface ErrorAnnotation {
  code: ErrorCode;
  message: string;
}

const SECRET_PATTERNS: RegExp[] = [
  /sk-[A-Za-z0-9_-]{8,}/g,
  /Bearer\s+[A-Za-z0-9._-]+/gi,
];

const MAX_MESSAGE_LENGTH = 500;

/**
 * Render any thrown value as a single-line message with secrets scrubbed
 */
export function describeError(error: unknown): string {
  const raw = error instanceof Error ? error.message : String(error);
  let message = raw.replace(/\s+/g, " ").trim();
  for (const pattern of SECRET_PATTERNS) {
    message = message.replace(pattern, "[REDACTED]");
  }
  return message.length > MAX_MESSAGE_LENGTH
    ? `${message.slice(0, MAX_MESSAGE_LENGTH)}...`
    : message;
}

function hasErrorCode(error: unknown): error is { code: ErrorCode } {
  return error instanceof FatalError;
}

/**
 * Convert any error into the annotation form stored alongside records
 */
export function toErrorAnnotation(error: unknown, fallback: ErrorCode = "INTERNAL"): ErrorAnnotation {
  if (hasErrorCode(error)) {
    return { code: error.code, message: describeError(error) };
  }
  const code = error instanceof Error && "errorCode" in error && typeof error.errorCode === "string"
    ? codeOrFallback(error.errorCode, fallback)
    : fallback;
  return { code, message: describeError(error) };
}

const KNOWN_CODES: ReadonlySet<string> = new Set<ErrorCode>([
  "CONFIG",
  "BAD_INPUT",
  "STAGE_FAILED",
  "UPSTREAM_TIMEOUT",
  "UPSTREAM_CONNECTION",
  "UPSTREAM_HTTP",
  "EMPTY_RESPONSE",
  "MALFORMED_OUTPUT",
  "RETRIES_EXHAUSTED",
  "VALIDATION_FAILED",
  "INTERNAL",
]);

function isErrorCode(value: string): value is ErrorCode {
  return KNOWN_CODES.has(value);
}

function codeOrFallback(value: string, fallback: ErrorCode): ErrorCode {
  return isErrorCode(value) ? value : fallback;
}

/**
 * Flatten zod issues into "path: message" pairs
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}
