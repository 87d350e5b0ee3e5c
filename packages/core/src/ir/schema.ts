/**
 * IRSchema builders and predicates
 */

import { PRIMITIVE_TYPES } from "./types";

import type { IRSchema, PrimitiveType, StructuralType } from "./types";

/**
 * Create an IRSchema with every collection and flag defaulted
 */
export function createSchema(init: Partial<IRSchema> = {}): IRSchema {
  return {
    properties: {},
    required: [],
    isNullable: false,
    isDataWrapper: false,
    fromUnresolvedRef: false,
    isCircularRef: false,
    ...init,
  };
}

export function isPrimitiveType(
  type: string | undefined,
): type is PrimitiveType {
  return PRIMITIVE_TYPES.some((primitive) => primitive === type);
}

export function isStructuralType(
  type: string | undefined,
): type is StructuralType {
  return type === "object" || type === "array" || isPrimitiveType(type);
}

/**
 * A slim schema whose `type` names another schema rather than a structural
 * type (the shape promoted properties and hoisted enums take)
 */
export function isNamedTypeReference(schema: IRSchema): boolean {
  return schema.type !== undefined && !isStructuralType(schema.type);
}

/**
 * Placeholder produced by the cycle/depth guard or an unresolvable `$ref`
 */
export function isPlaceholder(schema: IRSchema): boolean {
  return schema.isCircularRef || schema.fromUnresolvedRef;
}

/**
 * A schema with nothing to say: no type, structure or composition
 */
export function isEmptySchema(schema: IRSchema): boolean {
  return (
    schema.type === undefined &&
    Object.keys(schema.properties).length === 0 &&
    schema.items === undefined &&
    (schema.enum === undefined || schema.enum.length === 0) &&
    !schema.anyOf?.length &&
    !schema.oneOf?.length &&
    !schema.allOf?.length
  );
}

/**
 * Sorted, duplicate-free list of names
 */
export function toSortedNames(names: Iterable<string>): string[] {
  return [...new Set(names)].sort();
}

/**
 * Give a schema its emitted identity. Setting the same name again is a
 * no-op; a different name throws.
 */
export function assignGenerationName(
  schema: IRSchema,
  generationName: string,
  finalModuleStem: string,
): void {
  if (
    schema.generationName !== undefined &&
    schema.generationName !== generationName
  ) {
    throw new Error(
      `Schema '${schema.name ?? "anonymous"}' is already named '${schema.generationName}', cannot rename it to '${generationName}'`,
    );
  }
  schema.generationName = generationName;
  schema.finalModuleStem = finalModuleStem;
}
