/**
 * Secondary Fix Review Unit Tests
 */

import { describe, it, expect } from "vitest";
import {
  createLlmFixReviewer,
  reviewFixPlan,
  type FixReviewer,
} from "../../src/workflow/reconciliation/fix-review.js";
import {
  addLiteral,
  buildFixPlan,
  planDecisions,
  removeLiteral,
  type FixDecision,
  type FixPlan,
} from "../../src/workflow/reconciliation/fix-plan.js";
import { createRecord, type WorkflowRecord } from "../../src/schemas/record.js";
import { literal, sequence } from "../../src/schemas/sql-value.js";
import { UpstreamHTTPError } from "../../src/adapters/llm/errors.js";
import { ConfigError } from "../../src/utils/errors.js";
import { unwrap } from "../../src/utils/result.js";
import { ScriptedGenerator, json } from "../helpers/scripted-generator.js";
import { stageContext } from "../helpers/stage-context.js";

const KEY = { ormCode: "db.Find(&users)", caller: "Users.List" };

function planOf(...decisions: FixDecision[]): FixPlan {
  return unwrap(buildFixPlan(decisions));
}

function records(): WorkflowRecord[] {
  return [createRecord(KEY, sequence([literal("SELECT * FROM users;"), literal("SELECT 1;")]))];
}

function describeDecisions(plan: FixPlan): string[] {
  return planDecisions(plan).map((d) => `${d.action}:${typeof d.payload === "string" ? d.payload : "group"}`);
}

describe("reviewFixPlan", () => {
  it("keeps accepted decisions", async () => {
    const reviewer: FixReviewer = async () => ({ accepted: true });
    const result = await reviewFixPlan(records(), planOf(removeLiteral(KEY, "SELECT 1;")), reviewer, { concurrency: 2 });

    expect(describeDecisions(result.plan)).toEqual(["remove_literal:SELECT 1;"]);
    expect(result.stats).toEqual({ reviewed: 1, accepted: 1, replaced: 0, dropped: 0, kept_on_error: 0 });
  });

  it("turns a rejected removal with a replacement into remove plus add", async () => {
    const reviewer: FixReviewer = async () => ({ accepted: false, replacement: "SELECT COUNT(*) FROM users;" });
    const result = await reviewFixPlan(records(), planOf(removeLiteral(KEY, "SELECT 1;")), reviewer, { concurrency: 1 });

    expect(describeDecisions(result.plan)).toEqual([
      "remove_literal:SELECT 1;",
      "add_literal:SELECT COUNT(*) FROM users;",
    ]);
  });

  it("swaps a rejected addition for its replacement", async () => {
    const reviewer: FixReviewer = async () => ({ accepted: false, replacement: "SELECT 2;" });
    const result = await reviewFixPlan(records(), planOf(addLiteral(KEY, "SELECT 3;")), reviewer, { concurrency: 1 });

    expect(describeDecisions(result.plan)).toEqual(["add_literal:SELECT 2;"]);
  });

  it("drops rejected decisions without a usable replacement", async () => {
    const reviewer: FixReviewer = async () => ({ accepted: false, replacement: "  " });
    const result = await reviewFixPlan(records(), planOf(removeLiteral(KEY, "SELECT 1;")), reviewer, { concurrency: 1 });

    expect(result.plan.size).toBe(0);
    expect(result.stats.dropped).toBe(1);
  });

  it("keeps the decision when the reviewer fails", async () => {
    const reviewer: FixReviewer = async () => {
      throw new Error("reviewer unavailable");
    };
    const result = await reviewFixPlan(records(), planOf(removeLiteral(KEY, "SELECT 1;")), reviewer, { concurrency: 1 });

    expect(describeDecisions(result.plan)).toEqual(["remove_literal:SELECT 1;"]);
    expect(result.stats.kept_on_error).toBe(1);
  });

  it("rethrows fatal reviewer errors", async () => {
    const reviewer: FixReviewer = async () => {
      throw new ConfigError("OPENAI_API_KEY is not set");
    };

    await expect(
      reviewFixPlan(records(), planOf(removeLiteral(KEY, "SELECT 1;")), reviewer, { concurrency: 1 })
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it("rethrows non-retryable upstream rejections", async () => {
    const reviewer: FixReviewer = async () => {
      throw new UpstreamHTTPError("forbidden", "scripted", 403, undefined, undefined, 5);
    };

    await expect(
      reviewFixPlan(records(), planOf(removeLiteral(KEY, "SELECT 1;")), reviewer, { concurrency: 1 })
    ).rejects.toBeInstanceOf(UpstreamHTTPError);
  });

  it("passes decisions for unknown keys through unreviewed", async () => {
    let calls = 0;
    const reviewer: FixReviewer = async () => {
      calls++;
      return { accepted: false };
    };
    const unknown = { ormCode: "db.Gone()", caller: "" };
    const result = await reviewFixPlan(records(), planOf(removeLiteral(unknown, "SELECT 9;")), reviewer, { concurrency: 1 });

    expect(calls).toBe(0);
    expect(describeDecisions(result.plan)).toEqual(["remove_literal:SELECT 9;"]);
  });
});

describe("createLlmFixReviewer", () => {
  it("reads the verdict and replacement from the generator", async () => {
    const generator = ScriptedGenerator.constant(json({ accepted: false, replacement: "SELECT 2;" }));
    const reviewer = createLlmFixReviewer(stageContext("redundant_sql_validation", generator));

    const [record] = records();
    const verdict = await reviewer(record, removeLiteral(KEY, "SELECT 1;"), { index: 0, recordAttempt: () => {} });

    expect(verdict).toEqual({ accepted: false, replacement: "SELECT 2;" });
    expect(generator.prompts[0]).toContain("remove_literal: SELECT 1;");
  });

  it("accepts when the reply never satisfies the contract", async () => {
    const generator = ScriptedGenerator.constant(json({ verdict: "maybe" }));
    const reviewer = createLlmFixReviewer(stageContext("redundant_sql_validation", generator));

    const [record] = records();
    const verdict = await reviewer(record, removeLiteral(KEY, "SELECT 1;"), { index: 0, recordAttempt: () => {} });

    expect(verdict).toEqual({ accepted: true });
    // first reply plus three reformat attempts
    expect(generator.calls).toBe(4);
  });
});
