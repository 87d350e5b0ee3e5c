/**
 * Schema Resolver
 *
 * Recursive descent from one raw schema node to one IRSchema:
 * guard -> classify -> build (recursing into children) -> promote inline
 * objects -> register named results -> exit.
 */

import { createSchema, isPlaceholder, toSortedNames } from "@/ir/schema";
import { sanitizeClassName } from "@/utils/naming";

import { mergeAllOf } from "./all-of";
import { parseUnionMembers } from "./composition";
import { createCyclePlaceholder, createDepthPlaceholder } from "./guard";
import {
  classifyNode,
  isJsonValue,
  isRawSchema,
  stringField,
  stringList,
} from "./node";
import { promoteInlineObject } from "./promotion";
import { resolveSchemaRef } from "./ref-resolver";
import { normalizeType } from "./type-field";

import type { IRDiscriminator, IRSchema, JsonValue } from "@/ir/types";
import type { ParsingContext } from "./context";
import type { ParseTarget, RawSchema, SchemaNode } from "./node";

/**
 * Parse a raw schema node. A defined `name` makes the result a named
 * arena schema; undefined parses an anonymous node.
 */
export function parseSchema(
  name: string | undefined,
  node: unknown,
  context: ParsingContext,
): IRSchema {
  return parseNode(node, context, { name });
}

/**
 * Parse a node under an explicit target. Used for children, whose
 * contextual `hint` names nested promotions without registering the node.
 */
export function parseNode(
  node: unknown,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  const guard = context.enterSchema(target.name);

  try {
    switch (guard.kind) {
      case "depth-exceeded":
        return createDepthPlaceholder(target.name, context);
      case "cycle":
        return createCyclePlaceholder(guard.name, guard.path, context);
      case "enter":
        break;
    }

    const schema = buildSchema(classifyNode(node), context, target);

    if (target.name !== undefined && !isPlaceholder(schema)) {
      context.register(target.name, schema);
    }
    return schema;
  } finally {
    context.exitSchema(target.name);
  }
}

// ============================================================================
// Dispatch
// ============================================================================

function buildSchema(
  node: SchemaNode,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  switch (node.kind) {
    case "empty":
      return createSchema({ name: target.name });
    case "ref":
      return buildReference(node.ref, node.raw, context, target);
    case "allOf":
    case "anyOf":
    case "oneOf":
      return buildComposite(node.raw, context, target);
    case "enum":
      return buildEnum(node.values, node.raw, context, target);
    case "array":
      return buildArray(node.raw, context, target);
    case "object":
      return buildObject(node.raw, context, target);
    case "scalar":
      return buildScalar(node.raw, context, target);
  }
}

/**
 * Anonymous references resolve to the shared target instance. A named
 * node that is only a reference (a component alias) becomes a named
 * schema referring to its target.
 */
function buildReference(
  ref: string,
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  const resolved = resolveSchemaRef(ref, context, parseNode);
  if (target.name === undefined || resolved.name === target.name) {
    return resolved;
  }

  return createSchema({
    ...commonFields(raw, context),
    name: target.name,
    type: resolved.name,
    isNullable: raw.nullable === true,
    fromUnresolvedRef: resolved.fromUnresolvedRef,
    refersToSchema: resolved,
  });
}

function buildScalar(
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  const [type, isNullable] = declaredType(raw, context, target);
  return createSchema({
    ...commonFields(raw, context),
    name: target.name,
    type,
    isNullable,
  });
}

function buildEnum(
  values: JsonValue[],
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  const [declared, isNullable] = declaredType(raw, context, target);
  const nonNull = values.filter((value) => value !== null);

  return createSchema({
    ...commonFields(raw, context),
    name: target.name,
    type: declared ?? inferEnumType(nonNull),
    enum: nonNull,
    isNullable: isNullable || nonNull.length !== values.length,
  });
}

function buildArray(
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  const [, isNullable] = declaredType(raw, context, target);
  const label = labelOf(target);

  return createSchema({
    ...commonFields(raw, context),
    name: target.name,
    type: "array",
    isNullable,
    items:
      raw.items === undefined
        ? undefined
        : parseNode(raw.items, context, {
            hint: label ? `${label}Item` : undefined,
          }),
  });
}

function buildObject(
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  const [, isNullable] = declaredType(raw, context, target);
  const properties = parseProperties(raw, context, target);

  return createSchema({
    ...commonFields(raw, context),
    ...objectFields(properties, new Set(stringList(raw.required))),
    name: target.name,
    type: "object",
    isNullable,
    additionalProperties: parseAdditionalProperties(raw, context, target),
  });
}

/**
 * allOf, anyOf and oneOf may appear together; each list present is parsed
 */
function buildComposite(
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): IRSchema {
  const label = labelOf(target);
  const siblingProperties = parseProperties(raw, context, target);
  let isNullable = raw.nullable === true;

  let anyOf: IRSchema[] | undefined;
  if (Array.isArray(raw.anyOf)) {
    const union = parseUnionMembers(raw.anyOf, context, parseNode, label);
    anyOf = union.members;
    isNullable ||= union.isNullable;
  }

  let oneOf: IRSchema[] | undefined;
  if (Array.isArray(raw.oneOf)) {
    const union = parseUnionMembers(raw.oneOf, context, parseNode, label);
    oneOf = union.members;
    isNullable ||= union.isNullable;
  }

  let allOf: IRSchema[] | undefined;
  let properties = siblingProperties;
  let required = new Set(stringList(raw.required));
  if (Array.isArray(raw.allOf)) {
    const merged = mergeAllOf(
      raw,
      siblingProperties,
      context,
      parseNode,
      label,
    );
    allOf = merged.members;
    properties = merged.properties;
    required = merged.required;
  }

  const [declared, typeNullable] = declaredType(raw, context, target);
  const hasProperties = Object.keys(properties).length > 0;
  let type: string | undefined;
  if (hasProperties) {
    type = "object";
  } else if (!anyOf && !oneOf) {
    type = declared;
  }

  return createSchema({
    ...commonFields(raw, context),
    ...objectFields(properties, required),
    name: target.name,
    type,
    isNullable: isNullable || typeNullable,
    anyOf,
    oneOf,
    allOf,
    additionalProperties: parseAdditionalProperties(raw, context, target),
  });
}

// ============================================================================
// Shared field readers
// ============================================================================

function labelOf(target: ParseTarget): string | undefined {
  return target.name ?? target.hint;
}

/**
 * Normalized `type` plus OpenAPI 3.0 `nullable`, recording type warnings
 */
function declaredType(
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): [string | undefined, boolean] {
  const [type, isNullable, warnings] = normalizeType(
    raw.type,
    labelOf(target),
  );
  for (const warning of warnings) context.warn("ambiguous-type", warning);
  return [type ?? undefined, isNullable || raw.nullable === true];
}

function inferEnumType(values: JsonValue[]): string | undefined {
  const [first] = values;
  if (typeof first === "string") return "string";
  if (typeof first === "boolean") return "boolean";
  if (typeof first === "number") {
    return Number.isInteger(first) ? "integer" : "number";
  }
  return undefined;
}

function commonFields(
  raw: RawSchema,
  context: ParsingContext,
): Partial<IRSchema> {
  return {
    format: stringField(raw, "format"),
    description: stringField(raw, "description"),
    title: stringField(raw, "title"),
    default: isJsonValue(raw.default) ? raw.default : undefined,
    example: isJsonValue(raw.example) ? raw.example : undefined,
    discriminator: parseDiscriminator(raw.discriminator, context),
  };
}

function parseDiscriminator(
  value: unknown,
  context: ParsingContext,
): IRDiscriminator | undefined {
  if (!isRawSchema(value)) return undefined;

  const propertyName = stringField(value, "propertyName");
  if (!propertyName) {
    context.warn(
      "validation",
      "Ignoring discriminator without a propertyName",
    );
    return undefined;
  }

  const mapping: Record<string, string> = {};
  if (isRawSchema(value.mapping)) {
    for (const [key, ref] of Object.entries(value.mapping)) {
      if (typeof ref === "string") mapping[key] = ref;
    }
  }

  return Object.keys(mapping).length > 0
    ? { propertyName, mapping }
    : { propertyName };
}

/**
 * Parse `properties`, promoting inline objects to named schemas
 */
function parseProperties(
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): Record<string, IRSchema> {
  const properties: Record<string, IRSchema> = {};
  if (!isRawSchema(raw.properties)) return properties;

  const parent = labelOf(target);
  for (const [key, rawProperty] of Object.entries(raw.properties)) {
    const property = parseNode(rawProperty, context, {
      hint: `${parent ?? ""}${sanitizeClassName(key)}`,
    });
    properties[key] =
      promoteInlineObject(parent, key, property, context) ?? property;
  }
  return properties;
}

function parseAdditionalProperties(
  raw: RawSchema,
  context: ParsingContext,
  target: ParseTarget,
): boolean | IRSchema | undefined {
  const value = raw.additionalProperties;
  if (typeof value === "boolean") return value;
  if (!isRawSchema(value)) return undefined;

  const label = labelOf(target);
  return parseNode(value, context, {
    hint: label ? `${label}Value` : undefined,
  });
}

/**
 * Property-map derived fields: sorted `required` restricted to declared
 * properties, and the data-wrapper flag
 */
function objectFields(
  properties: Record<string, IRSchema>,
  required: Set<string>,
): Pick<IRSchema, "properties" | "required" | "isDataWrapper"> {
  const keys = Object.keys(properties);
  const sorted = toSortedNames(
    [...required].filter((name) => Object.hasOwn(properties, name)),
  );

  return {
    properties,
    required: sorted,
    isDataWrapper:
      keys.length === 1 && keys[0] === "data" && sorted.includes("data"),
  };
}
