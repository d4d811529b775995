import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  defaultWorkflowSettings,
  loadWorkflowSettings,
  parseWorkflowSettings,
  resolveStageSettings,
} from "../../src/config/workflow.js";
import { ConfigError } from "../../src/utils/errors.js";

describe("workflow settings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "workflow-settings-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("fills every default", () => {
    const settings = defaultWorkflowSettings();

    expect(settings.defaults).toEqual({
      concurrency: 50,
      max_attempts: 3,
      base_delay_ms: 1000,
      max_delay_ms: 30_000,
      jitter_ms: 1000,
      max_reformat_attempts: 3,
    });
    expect(settings.policy.assume_valid_on_failure).toBe(true);
    expect(settings.fix_review.enabled).toBe(false);
    expect(settings.stages).toEqual({});
  });

  it("merges defaults, built-in overrides and file overrides", () => {
    const settings = parseWorkflowSettings({
      defaults: { concurrency: 10 },
      stages: { sql_correctness_check: { max_attempts: 7 } },
    });

    expect(resolveStageSettings(settings, "control_flow_validation").concurrency).toBe(20);
    expect(resolveStageSettings(settings, "sql_correctness_check")).toEqual({
      concurrency: 10,
      maxAttempts: 7,
      baseDelayMs: 1000,
      maxDelayMs: 30_000,
      jitterMs: 1000,
      maxReformatAttempts: 3,
    });

    const overridden = parseWorkflowSettings({ stages: { control_flow_validation: { concurrency: 4 } } });
    expect(resolveStageSettings(overridden, "control_flow_validation").concurrency).toBe(4);
  });

  it("rejects invalid values and unknown keys", () => {
    expect(() => parseWorkflowSettings({ defaults: { concurrency: 0 } })).toThrow(ConfigError);
    expect(() => parseWorkflowSettings({ retries: 3 })).toThrow(ConfigError);
    expect(() => parseWorkflowSettings({ stages: { sql_cleaning: { timeout: 1 } } })).toThrow(ConfigError);
  });

  it("falls back to defaults when the file is missing", () => {
    expect(loadWorkflowSettings(join(dir, "absent.json"))).toEqual(defaultWorkflowSettings());
  });

  it("throws ConfigError for an unreadable file", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json", "utf-8");

    expect(() => loadWorkflowSettings(path)).toThrow(ConfigError);
  });

  it("loads the shipped settings file", () => {
    const settings = loadWorkflowSettings("config/workflow.json");

    expect(resolveStageSettings(settings, "sql_completeness_check").concurrency).toBe(100);
    expect(resolveStageSettings(settings, "redundant_sql_validation").maxAttempts).toBe(5);
    expect(resolveStageSettings(settings, "control_flow_validation")).toMatchObject({
      concurrency: 20,
      maxAttempts: 5,
      baseDelayMs: 2000,
    });
  });
});
