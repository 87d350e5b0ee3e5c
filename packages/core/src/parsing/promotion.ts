/**
 * Inline promotion
 *
 * Hoists anonymous inline objects and enums found in property positions to
 * named arena schemas, leaving a slim property schema that refers to them.
 */

import { createSchema, isPlaceholder } from "@/ir/schema";
import { sanitizeClassName, singularize } from "@/utils/naming";

import { ownEntry } from "./node";

import type { IRSchema } from "@/ir/types";
import type { ParsingContext } from "./context";

/** Name endings that already read as an entity */
const ENTITY_SUFFIXES = ["Item", "Data", "Info", "Object", "Record", "Entry"];

/**
 * Whether `name` can be given to `schema`: it is unused, or already
 * belongs to this very instance
 */
function isNameAvailable(
  name: string,
  schema: IRSchema,
  context: ParsingContext,
): boolean {
  const existing = context.lookup(name);
  if (existing) return existing === schema;
  return ownEntry(context.rawSchemas, name) === undefined;
}

/**
 * Whether the schema is the canonical arena instance for its name
 */
function isArenaInstance(schema: IRSchema, context: ParsingContext): boolean {
  return schema.name !== undefined && context.lookup(schema.name) === schema;
}

function hasIdProperty(schema: IRSchema): boolean {
  return Object.keys(schema.properties).some(
    (key) => key === "id" || key.endsWith("Id"),
  );
}

/**
 * Preferred global name for an object found under property `key`
 * e.g., "details" -> "DetailData", "owner" (with an id) -> "Owner"
 */
export function inlineObjectName(key: string, schema: IRSchema): string {
  const base = singularize(sanitizeClassName(key));
  if (ENTITY_SUFFIXES.some((suffix) => base.endsWith(suffix))) return base;
  return hasIdProperty(schema) ? base : `${base}Data`;
}

/**
 * Promote an inline object property. Returns the slim property schema that
 * replaces it, or undefined when the schema is not a promotable object.
 */
export function promoteInlineObject(
  parent: string | undefined,
  key: string,
  schema: IRSchema,
  context: ParsingContext,
): IRSchema | undefined {
  if (
    schema.type !== "object" ||
    schema.enum !== undefined ||
    isPlaceholder(schema) ||
    Object.keys(schema.properties).length === 0 ||
    isArenaInstance(schema, context)
  ) {
    return undefined;
  }

  const preferred = inlineObjectName(key, schema);
  const qualified = parent
    ? sanitizeClassName(`${parent}${preferred}`)
    : preferred;

  let chosen: string;
  if (isNameAvailable(preferred, schema, context)) {
    chosen = preferred;
  } else if (isNameAvailable(qualified, schema, context)) {
    chosen = qualified;
  } else {
    let counter = 1;
    while (!isNameAvailable(`${qualified}${counter}`, schema, context)) {
      counter += 1;
    }
    chosen = `${qualified}${counter}`;
  }

  schema.name = chosen;
  context.register(chosen, schema);
  context.logger.debug(
    `Promoted inline object ${parent ?? "<anonymous>"}.${key} to ${chosen}`,
  );

  return referTo(key, schema, schema);
}

/**
 * Hoist an inline enum property to `{Parent}{Property}Enum` (with a counter
 * suffix on collision). Discriminator properties are left inline for the
 * discriminator enum collector.
 */
export function promoteInlineEnum(
  parent: string,
  key: string,
  schema: IRSchema,
  context: ParsingContext,
): IRSchema | undefined {
  if (!schema.enum?.length || isArenaInstance(schema, context)) {
    return undefined;
  }
  if (context.discriminatorProperties.has(`${parent}.${key}`)) {
    return undefined;
  }

  const base = `${sanitizeClassName(parent)}${sanitizeClassName(key)}Enum`;
  let name = base;
  let counter = 1;
  while (context.lookup(name) || ownEntry(context.rawSchemas, name)) {
    name = `${base}${counter}`;
    counter += 1;
  }

  const enumSchema = createSchema({
    name,
    type: schema.type,
    format: schema.format,
    enum: [...schema.enum],
    description: schema.description ?? `Enum for ${parent}.${key}`,
  });
  context.register(name, enumSchema);

  return referTo(key, enumSchema, schema);
}

/**
 * Slim property schema standing for `target`, keeping the property's own
 * description, nullability and default
 */
export function referTo(
  key: string,
  target: IRSchema,
  property: IRSchema,
): IRSchema {
  return createSchema({
    name: key,
    type: target.name,
    description: property.description,
    default: property.default,
    isNullable: property.isNullable,
    refersToSchema: target,
  });
}
