/**
 * Workflow record schema
 *
 * A record ties one ORM call site (orm_code + caller) to the SQL extracted
 * for it. Fields the workflow does not interpret are kept as opaque
 * metadata and re-emitted in their original key order.
 */

import { z } from "zod";
import { InputError, formatZodIssues } from "../utils/errors.js";
import { fromWire, toWire, type SqlValue } from "./sql-value.js";

export interface EntityKey {
  readonly ormCode: string;
  readonly caller: string;
}

export interface WorkflowRecord {
  readonly key: EntityKey;
  sqlValue: SqlValue;
  tags: Set<string>;
  metadata: Record<string, unknown>;
  /** Wire key order captured at ingestion */
  readonly fieldOrder: readonly string[];
}

export type WireRecord = Record<string, unknown>;

const CORE_FIELDS = ["orm_code", "caller", "sql_statement_list", "tags"] as const;
const CORE_FIELD_SET: ReadonlySet<string> = new Set(CORE_FIELDS);

export const WireRecordSchema = z
  .object({
    orm_code: z.string(),
    caller: z.string().default(""),
    sql_statement_list: z.unknown(),
    tags: z.array(z.string()).optional(),
  })
  .passthrough();

/**
 * Canonical string form of an entity key, used as the fix plan key
 */
export function entityKeyId(key: EntityKey): string {
  return JSON.stringify([key.ormCode, key.caller]);
}

export function createRecord(
  key: EntityKey,
  sqlValue: SqlValue,
  metadata: Record<string, unknown> = {},
  tags: Iterable<string> = []
): WorkflowRecord {
  return {
    key,
    sqlValue,
    tags: new Set(tags),
    metadata: { ...metadata },
    fieldOrder: [...Object.keys(metadata), ...CORE_FIELDS],
  };
}

/**
 * Decode one wire record
 *
 * @throws InputError when required fields are missing or the SQL is unreadable
 */
export function recordFromWire(raw: unknown, index = 0): WorkflowRecord {
  const parsed = WireRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`Record ${index}: ${formatZodIssues(parsed.error)}`);
  }

  const { orm_code, caller, sql_statement_list, tags, ...rest } = parsed.data;

  let sqlValue: SqlValue;
  try {
    sqlValue = fromWire(sql_statement_list);
  } catch (error) {
    throw new InputError(`Record ${index}: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }

  const fieldOrder = typeof raw === "object" && raw !== null ? Object.keys(raw) : [];
  for (const field of CORE_FIELDS) {
    if (!fieldOrder.includes(field)) fieldOrder.push(field);
  }

  return {
    key: { ormCode: orm_code, caller },
    sqlValue,
    tags: new Set(tags ?? []),
    metadata: rest,
    fieldOrder,
  };
}

/**
 * Encode one record; `tags` is always written, empty or not
 */
export function recordToWire(record: WorkflowRecord): WireRecord {
  const wire: WireRecord = {};
  for (const field of record.fieldOrder) {
    switch (field) {
      case "orm_code":
        wire.orm_code = record.key.ormCode;
        break;
      case "caller":
        wire.caller = record.key.caller;
        break;
      case "sql_statement_list":
        wire.sql_statement_list = toWire(record.sqlValue);
        break;
      case "tags":
        wire.tags = [...record.tags];
        break;
      default:
        if (!CORE_FIELD_SET.has(field) && field in record.metadata) {
          wire[field] = record.metadata[field];
        }
    }
  }
  for (const [field, value] of Object.entries(record.metadata)) {
    if (!(field in wire)) wire[field] = value;
  }
  return wire;
}

/**
 * Decode a dataset file's top-level array
 *
 * @throws InputError when the value is not an array of records
 */
export function decodeDataset(raw: unknown): WorkflowRecord[] {
  if (!Array.isArray(raw)) {
    throw new InputError("Dataset must be a JSON array of records");
  }
  return raw.map((item, index) => recordFromWire(item, index));
}

export function encodeDataset(records: readonly WorkflowRecord[]): WireRecord[] {
  return records.map(recordToWire);
}

/**
 * Copy of a record with an opaque field set, unless the record already has it
 */
export function withMetadataDefault(record: WorkflowRecord, field: string, value: unknown): WorkflowRecord {
  if (CORE_FIELD_SET.has(field) || field in record.metadata) return record;
  return {
    ...record,
    metadata: { ...record.metadata, [field]: value },
    fieldOrder: [...record.fieldOrder, field],
  };
}
