/**
 * Provider-agnostic text generator interface.
 *
 * The workflow treats generation as an opaque `generate(prompt) -> text`
 * that fails with the transient errors in ./errors.ts (timeout, connection,
 * empty response) or, for missing credentials, a ConfigError.
 */

/**
 * Per-call generation parameters
 */
export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
  /** Deadline for this call in milliseconds */
  timeoutMs: number;
  /** Operation name for logs (usually the stage name) */
  operation?: string;
}

export interface TextGenerator {
  /** Provider name (e.g. "openai", "fixtures") */
  readonly name: string;
  readonly model: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}
