/**
 * Workflow Record Unit Tests
 */

import { describe, it, expect } from "vitest";
import {
  createRecord,
  decodeDataset,
  encodeDataset,
  entityKeyId,
  recordFromWire,
  recordToWire,
  withMetadataDefault,
} from "../../src/schemas/record.js";
import { literal } from "../../src/schemas/sql-value.js";
import { InputError } from "../../src/utils/errors.js";

describe("recordFromWire / recordToWire", () => {
  it("keeps metadata and the original key order, appending tags", () => {
    const raw = {
      function_name: "GetUser",
      orm_code: 'db.Where("id = ?", id).First(&user)',
      caller: "UserService.Get",
      sql_statement_list: "SELECT * FROM users WHERE id = ? LIMIT 1;",
      code_meta_data: [{ code_key: "user", code_value: "type User struct{}" }],
    };

    const wire = recordToWire(recordFromWire(raw));

    expect(Object.keys(wire)).toEqual([
      "function_name",
      "orm_code",
      "caller",
      "sql_statement_list",
      "code_meta_data",
      "tags",
    ]);
    expect(wire).toEqual({ ...raw, tags: [] });
  });

  it("defaults a missing caller to the empty string", () => {
    const record = recordFromWire({ orm_code: "db.Find(&rows)", sql_statement_list: "SELECT * FROM rows;" });
    expect(record.key).toEqual({ ormCode: "db.Find(&rows)", caller: "" });
  });

  it("names the offending record in errors", () => {
    expect(() => recordFromWire({ caller: "x", sql_statement_list: "SELECT 1;" }, 3)).toThrow(/^Record 3: orm_code/);
    expect(() => recordFromWire({ orm_code: "x", sql_statement_list: 7 }, 1)).toThrow(InputError);
  });

  it("reads and writes tags in insertion order", () => {
    const record = recordFromWire({ orm_code: "x", sql_statement_list: "SELECT 1;", tags: ["b", "a"] });
    record.tags.add("c");
    expect(recordToWire(record).tags).toEqual(["b", "a", "c"]);
  });
});

describe("datasets", () => {
  it("round-trips a serialized dataset byte for byte", () => {
    const raw = [
      {
        orm_code: "db.Create(&order)",
        caller: "OrderService.Place",
        sql_statement_list: ["INSERT INTO orders (id) VALUES (?);", { type: "param_dependent", variants: [{ scenario: "with items", sql: "INSERT INTO items (order_id) VALUES (?);" }] }],
        tags: ["keyword:save"],
      },
      { extra: { nested: true }, orm_code: "db.Delete(&o)", caller: "", sql_statement_list: "<NO SQL GENERATE>", tags: [] },
    ];
    const text = JSON.stringify(raw, null, 2);

    expect(JSON.stringify(encodeDataset(decodeDataset(JSON.parse(text))), null, 2)).toBe(text);
  });

  it("rejects a top-level value that is not an array", () => {
    expect(() => decodeDataset({ records: [] })).toThrow("Dataset must be a JSON array of records");
  });
});

describe("record helpers", () => {
  it("builds a canonical key id", () => {
    expect(entityKeyId({ ormCode: "db.Find()", caller: "svc" })).toBe('["db.Find()","svc"]');
  });

  it("appends a missing opaque field after the existing ones", () => {
    const original = createRecord({ ormCode: "o", caller: "c" }, literal("SELECT 1;"), { note: "n" }, ["t1"]);
    const tagged = withMetadataDefault(original, "source_file", "raw/a.json");

    expect(recordToWire(tagged)).toEqual({
      note: "n",
      orm_code: "o",
      caller: "c",
      sql_statement_list: "SELECT 1;",
      tags: ["t1"],
      source_file: "raw/a.json",
    });
    expect(Object.keys(recordToWire(tagged))).toEqual([
      "note",
      "orm_code",
      "caller",
      "sql_statement_list",
      "tags",
      "source_file",
    ]);
    expect(original.metadata).toEqual({ note: "n" });
  });

  it("leaves a field the record already has, and core fields, alone", () => {
    const original = createRecord({ ormCode: "o", caller: "c" }, literal("SELECT 1;"), { source_file: "kept.json" });

    expect(withMetadataDefault(original, "source_file", "raw/a.json")).toBe(original);
    expect(withMetadataDefault(original, "caller", "x")).toBe(original);
  });

  it("orders created records metadata first", () => {
    const record = createRecord({ ormCode: "o", caller: "c" }, literal("SELECT 1;"), { note: "n" });
    expect(Object.keys(recordToWire(record))).toEqual(["note", "orm_code", "caller", "sql_statement_list", "tags"]);
  });
});
