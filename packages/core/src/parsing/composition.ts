/**
 * anyOf / oneOf parsing
 */

import { isEmptySchema, isPlaceholder } from "@/ir/schema";

import { isRawSchema } from "./node";
import { normalizeType } from "./type-field";

import type { IRSchema } from "@/ir/types";
import type { ParsingContext } from "./context";
import type { ParseNodeFn } from "./node";

export interface UnionMembers {
  /** Remaining members, undefined when nothing but null was listed */
  members: IRSchema[] | undefined;
  /** An explicit null member was removed */
  isNullable: boolean;
}

const STRUCTURE_KEYS = [
  "$ref",
  "properties",
  "items",
  "enum",
  "allOf",
  "anyOf",
  "oneOf",
];

/**
 * `{ type: "null" }` (or `type: ["null"]`) with nothing else that gives it
 * structure
 */
export function isNullMember(node: unknown): boolean {
  if (!isRawSchema(node)) return false;
  if (STRUCTURE_KEYS.some((key) => key in node)) return false;
  const [type, isNullable] = normalizeType(node.type);
  return type === null && isNullable;
}

/**
 * Parse the members of an anyOf/oneOf list independently. Null members
 * become nullability, and when one was found anonymous empty members are
 * dropped too; a single remaining member is still returned as a
 * one-element list.
 */
export function parseUnionMembers(
  rawMembers: readonly unknown[],
  context: ParsingContext,
  parse: ParseNodeFn,
  hint?: string,
): UnionMembers {
  let isNullable = false;
  const members: IRSchema[] = [];

  rawMembers.forEach((rawMember, index) => {
    if (isNullMember(rawMember)) {
      isNullable = true;
      return;
    }

    members.push(
      parse(rawMember, context, {
        hint: hint ? `${hint}Option${index}` : undefined,
      }),
    );
  });

  // Empty anonymous members are dropped only next to a null member
  const remaining = isNullable
    ? members.filter(
        (member) =>
          member.name !== undefined ||
          isPlaceholder(member) ||
          member.isNullable ||
          !isEmptySchema(member),
      )
    : members;

  return {
    members: remaining.length > 0 ? remaining : undefined,
    isNullable,
  };
}
