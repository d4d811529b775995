/**
 * End-to-end workflow runs over files on disk: full run, resume, and the
 * offline fixtures provider.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { _resetConfigCache } from "../../src/config/index.js";
import { resumeWorkflow, runWorkflow } from "../../src/workflow/index.js";
import { WorkflowStore } from "../../src/workflow/orchestrator/workflow-store.js";
import { ScriptedGenerator, json } from "../helpers/scripted-generator.js";
import { fastSettings, noSleep } from "../helpers/stage-context.js";

const clock = () => new Date(2025, 0, 2, 3, 4, 5);

const ADMIN_VARIANTS = [
  { scenario: "admin", sql: "SELECT * FROM admins;" },
  { scenario: "otherwise", sql: "SELECT * FROM users WHERE role = 'member';" },
];

const INPUT = [
  {
    orm_code: 'db.Preload("Orders").Find(&users)',
    caller: "Users.List",
    sql_statement_list: [
      "SELECT * FROM users;",
      "SELECT * FROM orders WHERE user_id IN (?); <REDUNDANT SQL>",
      "this is not sql",
    ],
    function_name: "List",
  },
  {
    orm_code: "if admin { db.Find(&admins) }",
    caller: "Admin.List",
    sql_statement_list: "SELECT * FROM admins;",
  },
  {
    orm_code: 'db.Exec("VACUUM")',
    caller: "",
    sql_statement_list: "<NO SQL GENERATE>",
  },
];

function reviewer(): ScriptedGenerator {
  return new ScriptedGenerator((prompt) => {
    if (prompt.includes("Produce the corrected list")) {
      return json({ sql_statement_list: [{ type: "param_dependent", variants: ADMIN_VARIANTS }] });
    }
    if (prompt.includes("## Flagged Statement")) return json({ confirmed: true });
    if (prompt.includes("## ORM Code\nif admin")) return json({ complete: true, correct: false, reason: "role filter" });
    return json({ complete: true, correct: true });
  });
}

describe("workflow run and resume", () => {
  let dir: string;
  let inputPath: string;
  let outputDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "workflow-e2e-"));
    inputPath = join(dir, "dataset.json");
    outputDir = join(dir, "runs");
    await writeFile(inputPath, JSON.stringify(INPUT, null, 2), "utf-8");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    vi.unstubAllEnvs();
    _resetConfigCache();
  });

  it("runs every stage and writes the reconciled dataset", async () => {
    const result = await runWorkflow({
      inputPath,
      outputDir,
      settings: fastSettings(),
      generator: reviewer(),
      clock,
      sleep: noSleep,
    });

    expect(result.stageRecords.map((entry) => entry.name)).toEqual([
      "input",
      "sql_cleaning",
      "keyword_tagging",
      "sql_completeness_check",
      "sql_correctness_check",
      "redundant_sql_validation",
      "control_flow_validation",
    ]);

    const final = JSON.parse(await readFile(result.finalPath, "utf-8"));
    expect(final).toEqual([
      {
        orm_code: 'db.Preload("Orders").Find(&users)',
        caller: "Users.List",
        sql_statement_list: ["SELECT * FROM users;"],
        function_name: "List",
        tags: ["keyword:Preload"],
      },
      {
        orm_code: "if admin { db.Find(&admins) }",
        caller: "Admin.List",
        sql_statement_list: { type: "param_dependent", variants: ADMIN_VARIANTS },
        tags: ["correctness:incorrect"],
      },
      {
        orm_code: 'db.Exec("VACUUM")',
        caller: "",
        sql_statement_list: "<NO SQL GENERATE>",
        tags: [],
      },
    ]);
    expect(Object.keys(final[0])).toEqual(["orm_code", "caller", "sql_statement_list", "function_name", "tags"]);
  });

  it("resuming from a middle stage reproduces the final dataset byte for byte", async () => {
    const first = await runWorkflow({
      inputPath,
      outputDir,
      settings: fastSettings(),
      generator: reviewer(),
      clock,
      sleep: noSleep,
    });
    const before = await readFile(first.finalPath, "utf-8");

    const generator = reviewer();
    const resumed = await resumeWorkflow({
      runDir: first.runDir,
      fromStage: "sql_correctness_check",
      settings: fastSettings(),
      generator,
      clock,
      sleep: noSleep,
    });

    expect(resumed.runDir).toBe(first.runDir);
    expect(resumed.stageRecords.map((entry) => entry.name)).toEqual([
      "sql_correctness_check",
      "redundant_sql_validation",
      "control_flow_validation",
    ]);
    expect(await readFile(resumed.finalPath, "utf-8")).toBe(before);
    expect(generator.prompts.some((prompt) => prompt.includes('"complete": true|false'))).toBe(false);

    const log = await (await WorkflowStore.open(first.runDir)).readLog();
    expect(log).toHaveLength(10);
  });

  it("resumes the latest run when no run directory is given", async () => {
    const first = await runWorkflow({
      inputPath,
      outputDir,
      settings: fastSettings(),
      generator: reviewer(),
      clock,
      sleep: noSleep,
    });

    const resumed = await resumeWorkflow({
      outputDir,
      fromStage: "control_flow_validation",
      settings: fastSettings(),
      generator: reviewer(),
      clock,
      sleep: noSleep,
    });

    expect(resumed.runDir).toBe(first.runDir);
  });

  it("fails to resume when there is no run", async () => {
    await expect(
      resumeWorkflow({ outputDir, fromStage: "sql_cleaning", settings: fastSettings(), generator: reviewer() })
    ).rejects.toThrow(`No workflow run found under ${outputDir}`);
  });

  it("runs offline with the fixtures provider and the shipped settings", async () => {
    vi.stubEnv("LLM_PROVIDER", "fixtures");
    _resetConfigCache();

    const result = await runWorkflow({ inputPath, outputDir, stageNames: ["sql_cleaning", "sql_completeness_check"] });

    const final = JSON.parse(await readFile(result.finalPath, "utf-8"));
    expect(final.map((record: { sql_statement_list: unknown }) => record.sql_statement_list)).toEqual([
      ["SELECT * FROM users;", "SELECT * FROM orders WHERE user_id IN (?); <REDUNDANT SQL>"],
      "SELECT * FROM admins;",
      "<NO SQL GENERATE>",
    ]);
    expect(final.every((record: { tags: string[] }) => record.tags.length === 0)).toBe(true);
  });
});
