/**
 * IR utilities for schema graphs
 *
 * Contains dependency extraction and topological sorting over the arena.
 */

import { isNamedTypeReference } from "./schema";

import type { IRSchema } from "./types";

// ============================================================================
// Dependency Extraction
// ============================================================================

/**
 * Name of the arena schema `child` stands for, if it stands for one
 */
function referencedName(
  child: IRSchema,
  schemas: Record<string, IRSchema>,
): string | undefined {
  if (child.refersToSchema?.name) return child.refersToSchema.name;

  const { name, type } = child;
  if (name !== undefined && Object.hasOwn(schemas, name)) {
    // Canonical instance, or a cycle placeholder standing in for it
    if (schemas[name] === child || child.isCircularRef) return name;
  }
  if (
    type !== undefined &&
    isNamedTypeReference(child) &&
    Object.hasOwn(schemas, type)
  ) {
    return type;
  }
  return undefined;
}

/**
 * Extract the names of the arena schemas a schema references.
 * Stops at every named reference instead of descending into it, so cyclic
 * graphs terminate.
 */
export function extractDependencies(
  schema: IRSchema,
  schemas: Record<string, IRSchema>,
): Set<string> {
  const deps = new Set<string>();
  const seen = new Set<IRSchema>();

  function visitChild(child: IRSchema): void {
    const name = referencedName(child, schemas);
    if (name) {
      deps.add(name);
      return;
    }
    visit(child);
  }

  function visit(s: IRSchema): void {
    if (seen.has(s)) return;
    seen.add(s);

    for (const prop of Object.values(s.properties)) {
      visitChild(prop);
    }
    if (s.items) visitChild(s.items);
    if (s.additionalProperties && typeof s.additionalProperties === "object") {
      visitChild(s.additionalProperties);
    }
    for (const member of [
      ...(s.anyOf ?? []),
      ...(s.oneOf ?? []),
      ...(s.allOf ?? []),
    ]) {
      visitChild(member);
    }
  }

  visit(schema);
  if (schema.name) deps.delete(schema.name);
  return deps;
}

/**
 * Dependency map for every schema in the arena
 */
export function buildDependencyGraph(
  schemas: Record<string, IRSchema>,
): Map<string, Set<string>> {
  const graph = new Map<string, Set<string>>();
  for (const [name, schema] of Object.entries(schemas)) {
    graph.set(name, extractDependencies(schema, schemas));
  }
  return graph;
}

// ============================================================================
// Topological Sort
// ============================================================================

/**
 * Topologically sort schema names so dependencies come before dependents.
 * Members of a cycle keep their arena order relative to each other.
 */
export function topologicalSortSchemas(
  schemas: Record<string, IRSchema>,
): string[] {
  const graph = buildDependencyGraph(schemas);
  const result: string[] = [];
  const visited = new Set<string>();
  const visiting = new Set<string>(); // For cycle detection

  function visit(name: string): void {
    if (visited.has(name)) return;
    if (visiting.has(name)) {
      // Cycle detected - the schema will be emitted where it is
      return;
    }

    const deps = graph.get(name);
    if (!deps) return;

    visiting.add(name);

    for (const dep of deps) {
      visit(dep);
    }

    visiting.delete(name);
    visited.add(name);
    result.push(name);
  }

  for (const name of Object.keys(schemas)) {
    visit(name);
  }

  return result;
}
