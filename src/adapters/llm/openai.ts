import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import { Agent, setGlobalDispatcher } from "undici";
import { HTTP_CLIENT_TIMEOUT_MS, HTTP_CONNECT_TIMEOUT_MS } from "../../config/timeouts.js";
import { ConfigError, FatalError } from "../../utils/errors.js";
import { log } from "../../utils/telemetry.js";
import type { GenerateOptions, TextGenerator } from "./types.js";
import {
  EmptyResponseError,
  UpstreamConnectionError,
  UpstreamHTTPError,
  UpstreamTimeoutError,
} from "./errors.js";

export interface OpenAIGeneratorOptions {
  apiKey?: string;
  baseUrl?: string;
  /** Ask for a JSON object response (prompts must mention JSON) */
  jsonMode?: boolean;
}

// Undici dispatcher shared by every concurrent call (the single network session)
// - connectTimeout: fail fast on connection issues
// - headers/body timeout: above the per-call deadline, which the AbortController enforces
// Note: OpenAI SDK v6 uses the fetch API, so we set the global undici dispatcher
let dispatcherInstalled = false;

function ensureDispatcher(): void {
  if (dispatcherInstalled) return;
  setGlobalDispatcher(
    new Agent({
      connect: {
        timeout: HTTP_CONNECT_TIMEOUT_MS,
      },
      headersTimeout: HTTP_CLIENT_TIMEOUT_MS,
      bodyTimeout: HTTP_CLIENT_TIMEOUT_MS,
    })
  );
  dispatcherInstalled = true;
}

/**
 * Chat-completions generator
 *
 * SDK-level retries are disabled: the backoff controller owns retrying.
 */
export class OpenAIGenerator implements TextGenerator {
  readonly name = "openai";
  private client: OpenAI | null = null;

  constructor(
    readonly model: string,
    private readonly options: OpenAIGeneratorOptions = {}
  ) {}

  // Lazy initialization to allow constructing without an API key
  private getClient(): OpenAI {
    if (!this.options.apiKey) {
      throw new ConfigError("OPENAI_API_KEY environment variable is required but not set");
    }
    if (!this.client) {
      ensureDispatcher();
      this.client = new OpenAI({
        apiKey: this.options.apiKey,
        baseURL: this.options.baseUrl,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async generate(prompt: string, opts: GenerateOptions): Promise<string> {
    const apiClient = this.getClient();
    const operation = opts.operation ?? "generate";
    const startTime = Date.now();
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), opts.timeoutMs);

    try {
      const response = await apiClient.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: opts.temperature,
          max_tokens: opts.maxTokens,
          ...(this.options.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
        },
        {
          signal: abortController.signal,
          timeout: opts.timeoutMs,
        }
      );

      const content = response.choices[0]?.message?.content;
      if (!content || content.trim().length === 0) {
        log.warn({ operation, model: this.model }, "OpenAI returned empty content");
        throw new EmptyResponseError(`OpenAI ${operation} returned empty content`, this.name);
      }
      return content;
    } catch (error) {
      throw this.mapError(error, operation, Date.now() - startTime, abortController.signal.aborted, opts.timeoutMs);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private mapError(
    error: unknown,
    operation: string,
    elapsedMs: number,
    aborted: boolean,
    timeoutMs: number
  ): unknown {
    if (error instanceof EmptyResponseError || error instanceof FatalError) {
      return error;
    }

    if (
      aborted ||
      error instanceof APIConnectionTimeoutError ||
      error instanceof APIUserAbortError ||
      (error instanceof Error && error.name === "AbortError")
    ) {
      log.error({ operation, timeout_ms: timeoutMs, elapsed_ms: elapsedMs }, "OpenAI call timed out");
      return new UpstreamTimeoutError(
        `OpenAI ${operation} timed out after ${elapsedMs}ms`,
        this.name,
        operation,
        "body",
        elapsedMs,
        error
      );
    }

    if (error instanceof APIConnectionError) {
      log.error({ operation, elapsed_ms: elapsedMs }, "OpenAI connection failed");
      return new UpstreamConnectionError(
        `OpenAI ${operation} connection failed: ${error.message}`,
        this.name,
        elapsedMs,
        error
      );
    }

    if (error instanceof APIError && typeof error.status === "number") {
      const requestId = error.requestID ?? undefined;
      log.error(
        { operation, status: error.status, request_id: requestId, elapsed_ms: elapsedMs },
        "OpenAI API returned non-2xx status"
      );
      return new UpstreamHTTPError(
        `OpenAI ${operation} failed with status ${error.status}: ${error.message}`,
        this.name,
        error.status,
        error.code ?? undefined,
        requestId,
        elapsedMs,
        error
      );
    }

    return error;
  }
}
