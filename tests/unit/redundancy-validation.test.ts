/**
 * Redundant SQL Validation Stage Unit Tests
 */

import { describe, it, expect } from "vitest";
import { createRedundancyValidationStage, flaggedStatements } from "../../src/workflow/stages/redundancy-validation.js";
import { createRecord, type WorkflowRecord } from "../../src/schemas/record.js";
import { literal, sequence, variantGroup } from "../../src/schemas/sql-value.js";
import { ScriptedGenerator, json } from "../helpers/scripted-generator.js";
import { fastSettings, stageContext } from "../helpers/stage-context.js";

function fixture(): WorkflowRecord[] {
  return [
    createRecord(
      { ormCode: "db.Find(&users)", caller: "Users.List" },
      sequence([literal("SELECT * FROM users;"), literal("SELECT 1; <REDUNDANT SQL>")])
    ),
    createRecord({ ormCode: "db.Find(&logs)", caller: "Logs.List" }, literal("SELECT * FROM logs; <REDUNDANT SQL>")),
    createRecord({ ormCode: "db.Exec(noop)", caller: "Noop.Run" }, literal("SELECT 2; <REDUNDANT SQL>")),
    createRecord({ ormCode: "db.Find(&jobs)", caller: "Jobs.List" }, literal("SELECT 3; <REDUNDANT SQL>")),
    createRecord({ ormCode: "db.Find(&tags)", caller: "Tags.List" }, literal("SELECT 4;")),
  ];
}

function flagged(prompt: string, statement: string): boolean {
  return prompt.includes(`## Flagged Statement\n${statement}\n`);
}

function redundancyGenerator(): ScriptedGenerator {
  return new ScriptedGenerator((prompt) => {
    if (flagged(prompt, "SELECT * FROM logs;")) return json({ confirmed: false, reason: "the list view reads logs" });
    if (flagged(prompt, "SELECT 3;")) return "upstream busy";
    return json({ confirmed: true });
  });
}

describe("flaggedStatements", () => {
  it("lists each marked statement once, including variants", () => {
    const record = createRecord(
      { ormCode: "x", caller: "" },
      sequence([
        literal("A; <REDUNDANT SQL>"),
        literal("A;  <REDUNDANT SQL>"),
        variantGroup([{ scenario: "s", sql: "B; <REDUNDANT SQL>" }]),
        literal("C;"),
      ])
    );

    expect(flaggedStatements(record)).toEqual(["A; <REDUNDANT SQL>", "B; <REDUNDANT SQL>"]);
  });
});

describe("redundant_sql_validation stage", () => {
  it("removes confirmed statements, unmarks disputed ones and keeps unanswered ones", async () => {
    const generator = redundancyGenerator();
    const stage = createRedundancyValidationStage();

    const outcome = await stage.run(fixture(), stageContext(stage.name, generator));

    expect(outcome.records.map((r) => r.key.ormCode)).toEqual([
      "db.Find(&users)",
      "db.Find(&logs)",
      "db.Find(&jobs)",
      "db.Find(&tags)",
    ]);
    expect(outcome.records[0].sqlValue).toEqual(sequence([literal("SELECT * FROM users;")]));
    expect(outcome.records[1].sqlValue).toEqual(literal("SELECT * FROM logs;"));
    expect(outcome.records[2].sqlValue).toEqual(literal("SELECT 3; <REDUNDANT SQL>"));
    expect([...outcome.records[2].tags]).toEqual(["redundancy:unverified"]);
    expect(outcome.records[3].tags.size).toBe(0);

    expect(outcome.deletedCount).toBe(1);
    expect(outcome.modifiedCount).toBe(3);
    expect(outcome.details).toMatchObject({
      flagged_statements: 4,
      confirmed: 2,
      disputed: 1,
      unverified: 1,
      fix: { literals_removed: 2, records_modified: 1, records_deleted: 1, records_unmatched: 0 },
      fix_review: null,
    });
    expect(generator.calls).toBe(6);
  });

  it("sends confirmed removals through the fix review when enabled", async () => {
    const generator = new ScriptedGenerator((prompt) => {
      if (prompt.includes("## Proposed Change")) {
        return json({ accepted: false, replacement: "SELECT COUNT(*) FROM users;" });
      }
      return json({ confirmed: true });
    });
    const stage = createRedundancyValidationStage();
    const settings = fastSettings({ fix_review: { enabled: true } });

    const outcome = await stage.run(fixture().slice(0, 1), stageContext(stage.name, generator, settings));

    expect(outcome.records[0].sqlValue).toEqual(
      sequence([literal("SELECT * FROM users;"), literal("SELECT COUNT(*) FROM users;")])
    );
    expect(outcome.details.fix_review).toEqual({ reviewed: 1, accepted: 0, replaced: 1, dropped: 0, kept_on_error: 0 });
  });

  it("makes no generator calls when nothing is marked", async () => {
    const generator = redundancyGenerator();
    const stage = createRedundancyValidationStage();

    const outcome = await stage.run(fixture().slice(4), stageContext(stage.name, generator));

    expect(generator.calls).toBe(0);
    expect(outcome.modifiedCount).toBe(0);
  });
});
