/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to the environment variables the workflow
 * reads. Workflow tuning (per-stage concurrency, retries, policies) lives in
 * the settings file handled by ./workflow.ts; this module only covers the
 * process environment.
 */

import { z } from "zod";
import { ConfigError, formatZodIssues } from "../utils/errors.js";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Optional string that treats empty values as unset
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

/**
 * Optional URL string that treats empty/undefined as undefined
 */
const optionalUrl = optionalString.superRefine((val, ctx) => {
  if (val === undefined) return;
  try {
    new URL(val);
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Invalid url",
    });
  }
});

const Environment = z.enum(["development", "test", "production"]);

const LLMProvider = z.enum(["openai", "fixtures"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const ConfigSchema = z.object({
  runtime: z.object({
    nodeEnv: Environment.default("development"),
    logLevel: LogLevel.default("info"),
  }),
  llm: z.object({
    provider: LLMProvider.default("openai"),
    model: optionalString.transform((val) => val ?? "gpt-4o-mini"),
    baseUrl: optionalUrl,
    openaiApiKey: optionalString,
    jsonMode: booleanString.default(false),
  }),
  workflow: z.object({
    configPath: optionalString.transform((val) => val ?? "config/workflow.json"),
    outputDir: optionalString.transform((val) => val ?? "workflow_output"),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment
 *
 * @throws ConfigError listing every invalid variable
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    runtime: {
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
    },
    llm: {
      provider: env.LLM_PROVIDER,
      model: env.LLM_MODEL,
      baseUrl: env.LLM_BASE_URL,
      openaiApiKey: env.OPENAI_API_KEY,
      jsonMode: env.LLM_JSON_MODE,
    },
    workflow: {
      configPath: env.WORKFLOW_CONFIG_PATH,
      outputDir: env.WORKFLOW_OUTPUT_DIR,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration. Please check environment variables: ${formatZodIssues(result.error)}`
    );
  }
  return result.data;
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access so tests can stub the
 * environment before the config is read. Parsed once and cached.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config = new Proxy({} as Config, {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  // Support Object.keys(), Object.entries(), spread operator
  ownKeys(_target) {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return config;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
