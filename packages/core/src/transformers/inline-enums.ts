/**
 * Post-parse extraction of inline array items and inline enums
 *
 * Runs over the arena once every component schema is parsed and the
 * discriminator properties are known.
 */

import { isPlaceholder } from "@/ir/schema";
import { ownEntry } from "@/parsing/node";
import { promoteInlineEnum, referTo } from "@/parsing/promotion";
import { sanitizeClassName } from "@/utils/naming";

import type { IRSchema } from "@/ir/types";
import type { ParsingContext } from "@/parsing/context";

function isComplexAnonymous(schema: IRSchema): boolean {
  if (schema.name !== undefined || isPlaceholder(schema)) return false;
  return (
    (schema.type === "object" && Object.keys(schema.properties).length > 0) ||
    Boolean(schema.anyOf?.length) ||
    Boolean(schema.oneOf?.length) ||
    Boolean(schema.allOf?.length)
  );
}

function uniqueName(base: string, context: ParsingContext): string {
  let name = base;
  let counter = 1;
  while (context.lookup(name) || ownEntry(context.rawSchemas, name)) {
    name = `${base}${counter}`;
    counter += 1;
  }
  return name;
}

function nameItems(
  items: IRSchema,
  base: string,
  context: ParsingContext,
): string {
  const name = uniqueName(base, context);
  items.name = name;
  context.register(name, items);
  return name;
}

/**
 * Name complex anonymous array items: `{Schema}Item` for array schemas,
 * `{Schema}{Property}Item` for array properties
 *
 * @returns names of the schemas added to the arena
 */
export function extractInlineArrayItems(context: ParsingContext): string[] {
  const added: string[] = [];

  for (const [schemaName, schema] of [...context.schemas]) {
    if (isPlaceholder(schema)) continue;
    const owner = sanitizeClassName(schemaName);

    if (schema.items && isComplexAnonymous(schema.items)) {
      added.push(nameItems(schema.items, `${owner}Item`, context));
    }

    for (const [key, property] of Object.entries(schema.properties)) {
      if (property.type !== "array" || !property.items) continue;
      if (!isComplexAnonymous(property.items)) continue;
      added.push(
        nameItems(
          property.items,
          `${owner}${sanitizeClassName(key)}Item`,
          context,
        ),
      );
    }
  }

  return added;
}

/**
 * Hoist every remaining inline property enum to a named enum schema.
 * A property instance shared by several schemas (through allOf) is hoisted
 * once and referenced from each.
 *
 * @returns names of the schemas added to the arena
 */
export function extractInlineEnums(context: ParsingContext): string[] {
  const added: string[] = [];
  const hoisted = new Map<IRSchema, IRSchema>();

  for (const [schemaName, schema] of [...context.schemas]) {
    if (isPlaceholder(schema)) continue;

    for (const [key, property] of Object.entries(schema.properties)) {
      // Discriminator slots are left for the unified enum
      if (context.discriminatorProperties.has(`${schemaName}.${key}`)) {
        continue;
      }

      const existing = hoisted.get(property);
      if (existing) {
        schema.properties[key] = referTo(key, existing, property);
        continue;
      }

      const slim = promoteInlineEnum(schemaName, key, property, context);
      if (!slim?.refersToSchema?.name) continue;

      hoisted.set(property, slim.refersToSchema);
      schema.properties[key] = slim;
      added.push(slim.refersToSchema.name);
    }
  }

  if (added.length > 0) {
    context.logger.debug(`Extracted ${added.length} inline enums`);
  }
  return added;
}
