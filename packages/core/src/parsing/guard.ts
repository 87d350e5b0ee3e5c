/**
 * Cycle and depth placeholders
 *
 * When the recursion guard refuses to descend, the parser returns one of
 * these stand-ins instead of a resolved schema.
 */

import { createSchema } from "@/ir/schema";

import type { IRSchema } from "@/ir/types";
import type { ParsingContext } from "./context";

/** circularRefPath marker of depth placeholders */
export const MAX_DEPTH_MARKER = "MAX_DEPTH_EXCEEDED";

/**
 * Placeholder for a reference back into a schema still being parsed.
 * Registered under `name` so every later reference during the same parse
 * shares it.
 */
export function createCyclePlaceholder(
  name: string,
  path: string,
  context: ParsingContext,
): IRSchema {
  const message = `Circular reference detected: ${path}`;
  if (context.cycleLimitReached()) {
    context.record("cycle-detected", message);
  } else {
    context.warn("cycle-detected", message);
  }

  const existing = context.lookup(name);
  if (existing?.isCircularRef) {
    return existing;
  }

  const placeholder = createSchema({
    name,
    type: "object",
    description: `[${message}]`,
    isCircularRef: true,
    circularRefPath: path,
  });
  context.register(name, placeholder);
  return placeholder;
}

/**
 * Placeholder for a node nested deeper than the context's maxDepth
 */
export function createDepthPlaceholder(
  name: string | undefined,
  context: ParsingContext,
): IRSchema {
  const description = `[Maximum recursion depth (${context.maxDepth}) exceeded for '${name ?? "anonymous"}']`;
  context.warn(
    "max-depth-exceeded",
    `Maximum recursion depth (${context.maxDepth}) exceeded while parsing '${name ?? "anonymous"}'`,
  );

  const placeholder = createSchema({
    name,
    type: "object",
    description,
    isCircularRef: true,
    circularRefPath: `${name ?? "<anonymous>"} -> ${MAX_DEPTH_MARKER}`,
  });
  if (name !== undefined && context.lookup(name) === undefined) {
    context.register(name, placeholder);
  }
  return placeholder;
}
