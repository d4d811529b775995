/**
 * SQL value schemas
 *
 * The SQL attached to a record takes one of four shapes. In memory it is a
 * tagged union dispatched on `kind`; on the wire it keeps the dataset file's
 * loose encoding (string, array, or param_dependent object).
 *
 * Key invariant: a Sequence or VariantGroup is never persisted empty; on
 * serialization emptiness collapses to the NoSqlGenerated sentinel.
 */

import { z } from "zod";
import { InputError, formatZodIssues } from "../utils/errors.js";

// ============================================================================
// Reserved literals
// ============================================================================

export const NO_SQL_GENERATED = "<NO SQL GENERATE>";
export const LACK_INFORMATION = "<LACK INFORMATION>";

/** Appended by the extraction step to statements it suspects are redundant */
export const REDUNDANCY_MARKER = " <REDUNDANT SQL>";

const REDUNDANCY_MARKER_PATTERN = /\s*<REDUNDANT SQL>/g;

// ============================================================================
// In-memory shapes
// ============================================================================

export type SentinelKind = "no_sql_generated" | "lack_information";

export interface Variant {
  readonly scenario: string;
  readonly sql: string;
}

export interface Literal {
  readonly kind: "literal";
  readonly text: string;
}

export interface VariantGroup {
  readonly kind: "variant_group";
  readonly variants: readonly Variant[];
}

export interface Sequence {
  readonly kind: "sequence";
  readonly items: readonly SequenceItem[];
}

export interface Sentinel {
  readonly kind: "sentinel";
  readonly sentinel: SentinelKind;
}

export type SequenceItem = Literal | VariantGroup | Sequence;
export type SqlValue = Literal | Sequence | VariantGroup | Sentinel;

export function literal(text: string): Literal {
  return { kind: "literal", text };
}

export function variantGroup(variants: readonly Variant[]): VariantGroup {
  return { kind: "variant_group", variants: [...variants] };
}

export function sequence(items: readonly SequenceItem[]): Sequence {
  return { kind: "sequence", items: [...items] };
}

export function sentinel(kind: SentinelKind): Sentinel {
  return { kind: "sentinel", sentinel: kind };
}

export function defaultScenarioLabel(position: number): string {
  return `variant_${position}`;
}

// ============================================================================
// Wire shapes
// ============================================================================

export interface WireVariant {
  scenario: string;
  sql: string;
}

export interface WireVariantGroup {
  type: "param_dependent";
  variants: WireVariant[];
}

export type WireSqlItem = string | WireVariantGroup | WireSqlItem[];

const WireVariantSchema = z.object({
  scenario: z.string().optional(),
  sql: z.string(),
});

const WireVariantGroupSchema = z.object({
  type: z.literal("param_dependent"),
  variants: z.array(WireVariantSchema),
});

const WireSentinelObjectSchema = z.object({
  type: z.enum(["NO_SQL_GENERATE", "LACK_INFORMATION"]),
});

export type ParsedWireItem =
  | string
  | z.infer<typeof WireVariantGroupSchema>
  | z.infer<typeof WireSentinelObjectSchema>
  | ParsedWireItem[];

export const WireSqlValueSchema: z.ZodType<ParsedWireItem> = z.lazy(() =>
  z.union([
    z.string(),
    WireVariantGroupSchema,
    WireSentinelObjectSchema,
    z.array(WireSqlValueSchema),
  ])
);

function sentinelOfText(text: string): SentinelKind | undefined {
  const trimmed = text.trim();
  if (trimmed === NO_SQL_GENERATED) return "no_sql_generated";
  if (trimmed === LACK_INFORMATION) return "lack_information";
  return undefined;
}

function sentinelText(kind: SentinelKind): string {
  return kind === "lack_information" ? LACK_INFORMATION : NO_SQL_GENERATED;
}

function decodeVariants(group: z.infer<typeof WireVariantGroupSchema>): Variant[] {
  return group.variants.map((variant, i) => ({
    scenario: variant.scenario ?? defaultScenarioLabel(i + 1),
    sql: variant.sql,
  }));
}

function firstSentinel(items: readonly ParsedWireItem[]): SentinelKind | undefined {
  for (const item of items) {
    if (typeof item === "string") {
      const kind = sentinelOfText(item);
      if (kind) return kind;
    } else if (!Array.isArray(item) && item.type !== "param_dependent") {
      return item.type === "LACK_INFORMATION" ? "lack_information" : "no_sql_generated";
    }
  }
  return undefined;
}

function decodeItems(items: readonly ParsedWireItem[]): SequenceItem[] {
  const decoded: SequenceItem[] = [];
  for (const item of items) {
    if (typeof item === "string") {
      if (!sentinelOfText(item)) decoded.push(literal(item));
    } else if (Array.isArray(item)) {
      const nested = decodeItems(item);
      if (nested.length > 0) decoded.push(sequence(nested));
    } else if (item.type === "param_dependent") {
      const variants = decodeVariants(item);
      if (variants.length > 0) decoded.push(variantGroup(variants));
    }
  }
  return decoded;
}

function decodeParsed(item: ParsedWireItem): SqlValue {
  if (typeof item === "string") {
    const kind = sentinelOfText(item);
    return kind ? sentinel(kind) : literal(item);
  }
  if (Array.isArray(item)) {
    const items = decodeItems(item);
    if (items.length === 0) return sentinel(firstSentinel(item) ?? "no_sql_generated");
    return sequence(items);
  }
  if (item.type === "param_dependent") {
    const variants = decodeVariants(item);
    return variants.length > 0 ? variantGroup(variants) : sentinel("no_sql_generated");
  }
  return sentinel(item.type === "LACK_INFORMATION" ? "lack_information" : "no_sql_generated");
}

/**
 * Decode a wire `sql_statement_list` value
 *
 * @throws InputError when the value has none of the known shapes
 */
export function fromWire(raw: unknown): SqlValue {
  const parsed = WireSqlValueSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(`Unreadable sql_statement_list: ${formatZodIssues(parsed.error)}`);
  }
  return decodeParsed(parsed.data);
}

function encodeItems(items: readonly SequenceItem[]): WireSqlItem[] {
  const encoded: WireSqlItem[] = [];
  for (const item of items) {
    switch (item.kind) {
      case "literal":
        encoded.push(item.text);
        break;
      case "variant_group":
        if (item.variants.length > 0) {
          encoded.push({ type: "param_dependent", variants: item.variants.map((v) => ({ ...v })) });
        }
        break;
      case "sequence": {
        const nested = encodeItems(item.items);
        if (nested.length > 0) encoded.push(nested);
        break;
      }
    }
  }
  return encoded;
}

/**
 * Encode a value for the dataset file, collapsing empty collections
 */
export function toWire(value: SqlValue): WireSqlItem {
  switch (value.kind) {
    case "literal":
      return value.text;
    case "sentinel":
      return sentinelText(value.sentinel);
    case "variant_group":
      return value.variants.length > 0
        ? { type: "param_dependent", variants: value.variants.map((v) => ({ ...v })) }
        : NO_SQL_GENERATED;
    case "sequence": {
      const items = encodeItems(value.items);
      return items.length > 0 ? items : NO_SQL_GENERATED;
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isSentinel(value: SqlValue): value is Sentinel {
  return value.kind === "sentinel";
}

export function hasRedundancyMarker(text: string): boolean {
  return text.includes(REDUNDANCY_MARKER.trim());
}

export function stripRedundancyMarker(text: string): string {
  return text.replace(REDUNDANCY_MARKER_PATTERN, "");
}

/**
 * Comparison form of a statement: marker stripped and trimmed
 */
export function normalizeSqlText(text: string): string {
  return stripRedundancyMarker(text).trim();
}

/**
 * Every literal text and variant sql in document order
 */
export function collectSqlTexts(value: SqlValue): string[] {
  switch (value.kind) {
    case "literal":
      return [value.text];
    case "sentinel":
      return [];
    case "variant_group":
      return value.variants.map((v) => v.sql);
    case "sequence":
      return value.items.flatMap((item) => collectSqlTexts(item));
  }
}

/**
 * Rewrite every literal text and variant sql, keeping the shape
 */
export function mapSqlTexts<V extends SqlValue>(value: V, fn: (text: string) => string): V;
export function mapSqlTexts(value: SqlValue, fn: (text: string) => string): SqlValue {
  switch (value.kind) {
    case "literal":
      return literal(fn(value.text));
    case "sentinel":
      return value;
    case "variant_group":
      return variantGroup(value.variants.map((v) => ({ scenario: v.scenario, sql: fn(v.sql) })));
    case "sequence":
      return sequence(value.items.map((item) => mapSqlTexts(item, fn)));
  }
}

/**
 * Structural equality through the wire encoding
 */
export function sqlValuesEqual(a: SqlValue, b: SqlValue): boolean {
  return JSON.stringify(toWire(a)) === JSON.stringify(toWire(b));
}
