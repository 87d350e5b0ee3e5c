/**
 * Raw schema node classification
 *
 * A decoded document is untyped, so every raw node is classified exactly
 * once into a closed union that the schema parser matches exhaustively.
 */

import { normalizeType } from "./type-field";

import type { IRSchema, JsonValue } from "@/ir/types";
import type { ParsingContext } from "./context";

/** A decoded JSON/YAML object of unknown shape */
export type RawSchema = { readonly [key: string]: unknown };

export type SchemaNode =
  | { kind: "empty" }
  | { kind: "ref"; ref: string; raw: RawSchema }
  | { kind: "allOf"; raw: RawSchema }
  | { kind: "anyOf"; raw: RawSchema }
  | { kind: "oneOf"; raw: RawSchema }
  | { kind: "enum"; values: JsonValue[]; raw: RawSchema }
  | { kind: "array"; raw: RawSchema }
  | { kind: "object"; raw: RawSchema }
  | { kind: "scalar"; raw: RawSchema };

export type SchemaNodeKind = SchemaNode["kind"];

/**
 * What a node is parsed as: `name` is its arena name (registered and
 * cycle-checked), `hint` a contextual name used only to derive names of
 * nested schemas
 */
export interface ParseTarget {
  name?: string;
  hint?: string;
}

export type ParseNodeFn = (
  node: unknown,
  context: ParsingContext,
  target: ParseTarget,
) => IRSchema;

// ============================================================================
// Guards
// ============================================================================

export function isRawSchema(value: unknown): value is RawSchema {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Read a string-valued field, ignoring any other shape
 */
export function stringField(raw: RawSchema, key: string): string | undefined {
  const value = raw[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Read a list of strings, dropping entries of any other shape
 */
export function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}

/**
 * Read an own entry of a record (never one inherited from Object.prototype)
 */
export function ownEntry<T>(
  record: Readonly<Record<string, T>>,
  key: string,
): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify a raw node. `$ref` wins over everything else, then the
 * composition keywords, then `enum`, then the declared (or implied)
 * structural type.
 */
export function classifyNode(node: unknown): SchemaNode {
  if (!isRawSchema(node)) return { kind: "empty" };

  const ref = node.$ref;
  if (typeof ref === "string") return { kind: "ref", ref, raw: node };

  if (Array.isArray(node.allOf)) return { kind: "allOf", raw: node };
  if (Array.isArray(node.anyOf)) return { kind: "anyOf", raw: node };
  if (Array.isArray(node.oneOf)) return { kind: "oneOf", raw: node };

  if (Array.isArray(node.enum)) {
    return { kind: "enum", values: node.enum.filter(isJsonValue), raw: node };
  }

  const [type] = normalizeType(node.type);
  if (type === "array" || (type === null && "items" in node)) {
    return { kind: "array", raw: node };
  }
  if (type === "object" || (type === null && isRawSchema(node.properties))) {
    return { kind: "object", raw: node };
  }

  return { kind: "scalar", raw: node };
}
