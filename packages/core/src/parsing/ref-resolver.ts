/**
 * `$ref` resolution against the arena
 */

import { createSchema, isPlaceholder } from "@/ir/schema";

import { createCyclePlaceholder } from "./guard";
import { ownEntry } from "./node";

import type { IRSchema } from "@/ir/types";
import type { ParsingContext } from "./context";
import type { ParseNodeFn } from "./node";

export const SCHEMA_REF_PREFIX = "#/components/schemas/";

/** Suffixes tried, in order, when a referenced name does not exist */
const STRIPPABLE_SUFFIXES = [
  "Response",
  "Create",
  "Update",
  "Request",
  "Input",
  "Output",
  "Data",
];

const LIST_RESPONSE_SUFFIX = "ListResponse";

/**
 * Schema name of a local component reference, undefined for any other
 * reference shape
 * e.g., "#/components/schemas/Pet" -> "Pet", "#/components/schemas/a~1b" -> "a/b"
 */
export function schemaRefName(ref: string): string | undefined {
  if (!ref.startsWith(SCHEMA_REF_PREFIX)) return undefined;
  const pointer = ref.slice(SCHEMA_REF_PREFIX.length);
  if (pointer === "" || pointer.includes("/")) return undefined;
  return pointer.replace(/~1/g, "/").replace(/~0/g, "~");
}

/**
 * Resolve a `$ref` value. Never throws: unsupported shapes and missing
 * targets come back as unresolved placeholders plus a warning.
 */
export function resolveSchemaRef(
  ref: string,
  context: ParsingContext,
  parse: ParseNodeFn,
): IRSchema {
  const name = schemaRefName(ref);
  if (name === undefined) {
    context.warn(
      "unresolvable-reference",
      `Unsupported or invalid $ref format: ${ref}`,
    );
    return createSchema({ fromUnresolvedRef: true });
  }

  if (context.isParsing(name)) {
    const path = context.cyclePath(name);
    context.noteCycle(path);
    return createCyclePlaceholder(name, path, context);
  }

  return resolveNamedSchema(name, context, parse, ref);
}

/**
 * Return the canonical instance for a component schema name, parsing it on
 * first use. A stub is registered before parsing so the name is known to
 * the arena while its own children resolve.
 */
export function resolveNamedSchema(
  name: string,
  context: ParsingContext,
  parse: ParseNodeFn,
  ref = `${SCHEMA_REF_PREFIX}${name}`,
): IRSchema {
  const cached = context.lookup(name);
  if (cached) return cached;

  const raw = ownEntry(context.rawSchemas, name);
  if (raw === undefined) return resolveMissing(name, ref, context, parse);

  const stub = createSchema({ name });
  context.register(name, stub);

  const schema = parse(raw, context, { name });
  context.register(name, schema);
  return schema;
}

// ============================================================================
// Fallbacks
// ============================================================================

function resolveMissing(
  name: string,
  ref: string,
  context: ParsingContext,
  parse: ParseNodeFn,
): IRSchema {
  if (name.endsWith(LIST_RESPONSE_SUFFIX)) {
    const base = name.slice(0, -LIST_RESPONSE_SUFFIX.length);
    if (ownEntry(context.rawSchemas, base) !== undefined) {
      context.warn(
        "unresolvable-reference",
        `Resolved $ref: ${ref} by falling back to LIST of base name '${base}'.`,
      );
      const items = resolveNamedSchema(base, context, parse);
      if (!items.fromUnresolvedRef) {
        const list = createSchema({ name, type: "array", items });
        context.register(name, list);
        return list;
      }
    }
  }

  const suffix = STRIPPABLE_SUFFIXES.find((s) => name.endsWith(s));
  const stripped = suffix ? name.slice(0, -suffix.length) : undefined;
  if (stripped && ownEntry(context.rawSchemas, stripped) !== undefined) {
    context.warn(
      "unresolvable-reference",
      `Resolved $ref: ${ref} by falling back to stripped name '${stripped}'.`,
    );
    const base = resolveNamedSchema(stripped, context, parse);
    const copy = isPlaceholder(base)
      ? createSchema({ name, fromUnresolvedRef: true })
      : createSchema({
          ...base,
          name,
          properties: { ...base.properties },
          required: [...base.required],
        });
    context.register(name, copy);
    return copy;
  }

  context.warn("unresolvable-reference", `Could not resolve $ref: ${ref}`);
  return createSchema({ name, fromUnresolvedRef: true });
}
