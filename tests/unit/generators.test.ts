/**
 * Text generator adapters: OpenAI error mapping, fixtures, provider selection
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { APIConnectionError, APIError } from "openai";
import { OpenAIGenerator } from "../../src/adapters/llm/openai.js";
import { FixturesGenerator } from "../../src/adapters/llm/fixtures.js";
import { createGenerator } from "../../src/adapters/llm/router.js";
import {
  EmptyResponseError,
  UpstreamConnectionError,
  UpstreamHTTPError,
  UpstreamTimeoutError,
} from "../../src/adapters/llm/errors.js";
import type { Config } from "../../src/config/index.js";
import { ConfigError } from "../../src/utils/errors.js";
import { classifyError } from "../../src/utils/retry.js";

const mocks = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("openai", async (importOriginal) => {
  const actual = await importOriginal<typeof import("openai")>();
  class MockOpenAI {
    chat = {
      completions: {
        create: (...args: unknown[]) => mocks.create(...args),
      },
    };
  }
  return { ...actual, default: MockOpenAI };
});

class FakeAbortError extends Error {
  constructor() {
    super("The operation was aborted.");
    this.name = "AbortError";
  }
}

const OPTIONS = { maxTokens: 256, temperature: 0, timeoutMs: 5000, operation: "sql_correctness_check" };

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe("OpenAIGenerator", () => {
  beforeEach(() => {
    mocks.create.mockReset();
  });

  it("requires an API key before the first call", async () => {
    const generator = new OpenAIGenerator("gpt-test");

    await expect(generator.generate("prompt", OPTIONS)).rejects.toThrow(ConfigError);
    expect(mocks.create).not.toHaveBeenCalled();
  });

  it("returns the completion text and sends the call parameters", async () => {
    mocks.create.mockResolvedValue(completion('{"correct": true}'));
    const generator = new OpenAIGenerator("gpt-test", { apiKey: "test-secret", jsonMode: true });

    await expect(generator.generate("Check this", OPTIONS)).resolves.toBe('{"correct": true}');
    expect(mocks.create).toHaveBeenCalledWith(
      {
        model: "gpt-test",
        messages: [{ role: "user", content: "Check this" }],
        temperature: 0,
        max_tokens: 256,
        response_format: { type: "json_object" },
      },
      expect.objectContaining({ timeout: 5000 })
    );
  });

  it("maps blank content to EmptyResponseError", async () => {
    mocks.create.mockResolvedValue(completion("   "));
    const generator = new OpenAIGenerator("gpt-test", { apiKey: "test-secret" });

    await expect(generator.generate("prompt", OPTIONS)).rejects.toThrow(EmptyResponseError);
  });

  it("maps aborts to a transient timeout", async () => {
    mocks.create.mockRejectedValue(new FakeAbortError());
    const generator = new OpenAIGenerator("gpt-test", { apiKey: "test-secret" });

    const error = await generator.generate("prompt", OPTIONS).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamTimeoutError);
    expect(classifyError(error)).toBe("transient");
  });

  it("maps connection failures to UpstreamConnectionError", async () => {
    mocks.create.mockRejectedValue(new APIConnectionError({ message: "socket reset" }));
    const generator = new OpenAIGenerator("gpt-test", { apiKey: "test-secret" });

    await expect(generator.generate("prompt", OPTIONS)).rejects.toThrow(UpstreamConnectionError);
  });

  it("maps HTTP statuses and keeps them for classification", async () => {
    mocks.create.mockRejectedValueOnce(new APIError(503, undefined, "unavailable", undefined));
    mocks.create.mockRejectedValueOnce(new APIError(400, undefined, "bad request", undefined));
    const generator = new OpenAIGenerator("gpt-test", { apiKey: "test-secret" });

    const unavailable = await generator.generate("prompt", OPTIONS).catch((e: unknown) => e);
    const badRequest = await generator.generate("prompt", OPTIONS).catch((e: unknown) => e);

    expect(unavailable).toBeInstanceOf(UpstreamHTTPError);
    expect(classifyError(unavailable)).toBe("transient");
    expect(badRequest).toBeInstanceOf(UpstreamHTTPError);
    expect(classifyError(badRequest)).toBe("fatal");
  });
});

describe("FixturesGenerator", () => {
  it("answers every contract affirmatively without confirming redundancy", async () => {
    const reply = JSON.parse(await new FixturesGenerator().generate("anything", OPTIONS));

    expect(reply).toMatchObject({ complete: true, correct: true, confirmed: false, accepted: true });
  });
});

describe("createGenerator", () => {
  function configWith(provider: "openai" | "fixtures"): Config {
    return {
      runtime: { nodeEnv: "test", logLevel: "silent" },
      llm: { provider, model: "gpt-test", baseUrl: undefined, openaiApiKey: "test-secret", jsonMode: false },
      workflow: { configPath: "config/workflow.json", outputDir: "workflow_output" },
    };
  }

  it("selects the provider named in config", () => {
    expect(createGenerator(configWith("fixtures"))).toBeInstanceOf(FixturesGenerator);

    const openai = createGenerator(configWith("openai"));
    expect(openai).toBeInstanceOf(OpenAIGenerator);
    expect(openai.model).toBe("gpt-test");
  });
});
