/**
 * allOf merging
 */

import { isRawSchema, stringList } from "./node";

import type { IRSchema } from "@/ir/types";
import type { ParsingContext } from "./context";
import type { ParseNodeFn, RawSchema } from "./node";

export interface AllOfResult {
  /** Merged property map */
  properties: Record<string, IRSchema>;
  /** Union of every member's and the node's own required names */
  required: Set<string>;
  /** Members as parsed, in declaration order */
  members: IRSchema[];
}

/**
 * Merge the members of an allOf node.
 *
 * Properties are taken first-wins in member order (the merged entry is the
 * member's own instance, conflicting definitions are not compared);
 * `required` is a union; properties declared beside allOf override the
 * merged ones.
 */
export function mergeAllOf(
  raw: RawSchema,
  siblingProperties: Record<string, IRSchema>,
  context: ParsingContext,
  parse: ParseNodeFn,
  hint?: string,
): AllOfResult {
  const rawMembers: unknown[] = Array.isArray(raw.allOf) ? raw.allOf : [];
  const properties: Record<string, IRSchema> = {};
  const required = new Set(stringList(raw.required));
  const members: IRSchema[] = [];

  rawMembers.forEach((rawMember, index) => {
    const member = parse(rawMember, context, {
      hint: hint ? `${hint}AllOf${index}` : undefined,
    });
    members.push(member);

    for (const [key, property] of Object.entries(member.properties)) {
      if (!Object.hasOwn(properties, key)) properties[key] = property;
    }
    for (const name of member.required) required.add(name);
    // A member's own required names may point at properties of another
    if (isRawSchema(rawMember)) {
      for (const name of stringList(rawMember.required)) required.add(name);
    }
  });

  Object.assign(properties, siblingProperties);
  return { properties, required, members };
}
