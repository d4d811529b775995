/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 *
 * SECURITY: Provider credentials travel through the generator adapters;
 * every field that could hold one must be listed here.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  "apiKey",
  "api_key",
  "*.apiKey",
  "*.api_key",
  "*.openaiApiKey",
  "*.authorization",
  "*.token",
  "*.secret",
  "*.password",
  "*.headers.authorization",
  "*.headers.Authorization",
] as const;

/**
 * Redaction censor string
 */
export const REDACT_CENSOR = "[REDACTED]";

/**
 * Create a Pino-compatible redact configuration
 */
export function createRedactConfig(): { paths: string[]; censor: string } {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): {
  level: string;
  base: { service: string };
  redact: { paths: string[]; censor: string };
} {
  return {
    level,
    base: { service: "orm-sql-refinery" },
    redact: createRedactConfig(),
  };
}
