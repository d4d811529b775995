import { describe, it, expect } from "vitest";
import {
  addLiteral,
  addVariantGroup,
  buildFixPlan,
  countDecisions,
  planDecisions,
  removeLiteral,
} from "../../src/workflow/reconciliation/fix-plan.js";
import { entityKeyId } from "../../src/schemas/record.js";
import { InputError } from "../../src/utils/errors.js";

const A = { ormCode: "db.A()", caller: "a" };
const B = { ormCode: "db.B()", caller: "b" };

describe("buildFixPlan", () => {
  it("groups decisions by entity key in arrival order", () => {
    const result = buildFixPlan([removeLiteral(A, "X;"), addLiteral(B, "Y;"), addLiteral(A, "Z;")]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.value.keys()]).toEqual([entityKeyId(A), entityKeyId(B)]);
    expect(result.value.get(entityKeyId(A))?.map((d) => d.payload)).toEqual(["X;", "Z;"]);
    expect(countDecisions(result.value)).toBe(3);
  });

  it("collapses duplicates, ignoring the redundancy marker", () => {
    const result = buildFixPlan([
      removeLiteral(A, "X;"),
      removeLiteral(A, "X; <REDUNDANT SQL>"),
      addVariantGroup(A, [{ scenario: "s", sql: "V;" }]),
      addVariantGroup(A, [{ scenario: "s", sql: "V; " }]),
    ]);

    expect(result.ok).toBe(true);
    if (result.ok) expect(planDecisions(result.value)).toHaveLength(2);
  });

  it("keeps a removal and an addition of the same statement apart", () => {
    const result = buildFixPlan([removeLiteral(A, "X;"), addLiteral(A, "X;")]);
    expect(result.ok && countDecisions(result.value)).toBe(2);
  });

  it("rejects decisions with empty statements", () => {
    const result = buildFixPlan([addLiteral(A, "   ")]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InputError);
      expect(result.error.message).toBe('Invalid fix decision for ["db.A()","a"]: add_literal with an empty statement');
    }
  });

  it("rejects variant groups with an empty variant", () => {
    const result = buildFixPlan([addVariantGroup(A, [{ scenario: "s", sql: "<REDUNDANT SQL>" }])]);
    expect(result.ok).toBe(false);
  });
});
