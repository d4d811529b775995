/**
 * Generator selection
 *
 * Picks the text generator named by LLM_PROVIDER. The fixtures provider
 * runs the workflow end to end without network access.
 */

import { config as defaultConfig, type Config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { FixturesGenerator } from "./fixtures.js";
import { OpenAIGenerator } from "./openai.js";
import type { TextGenerator } from "./types.js";

export function createGenerator(cfg: Config = defaultConfig): TextGenerator {
  const { provider, model, baseUrl, openaiApiKey, jsonMode } = cfg.llm;

  switch (provider) {
    case "fixtures":
      log.info({ provider }, "Using fixtures generator");
      return new FixturesGenerator();
    case "openai":
      log.info({ provider, model, base_url: baseUrl ?? "default" }, "Using OpenAI generator");
      return new OpenAIGenerator(model, { apiKey: openaiApiKey, baseUrl, jsonMode });
  }
}
