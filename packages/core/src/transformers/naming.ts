/**
 * Generation naming pass
 *
 * Gives every arena schema its emitted type name (PascalCase) and module
 * stem (kebab-case), both unique across the arena. Names assigned earlier
 * (unified discriminator enums) are kept and reserved.
 */

import { assignGenerationName } from "@/ir/schema";
import { sanitizeClassName, sanitizeModuleName } from "@/utils/naming";

import type { IRSchema } from "@/ir/types";

function claim(base: string, used: Set<string>, separator = ""): string {
  let candidate = base;
  let counter = 1;
  while (used.has(candidate)) {
    candidate = `${base}${separator}${counter}`;
    counter += 1;
  }
  used.add(candidate);
  return candidate;
}

export function assignGenerationNames(schemas: Map<string, IRSchema>): void {
  const names = new Set<string>();
  const stems = new Set<string>();

  for (const schema of schemas.values()) {
    if (schema.generationName) names.add(schema.generationName);
    if (schema.finalModuleStem) stems.add(schema.finalModuleStem);
  }

  const named = new Set<IRSchema>();
  for (const [key, schema] of schemas) {
    if (schema.generationName || named.has(schema)) continue;
    named.add(schema);

    const name = claim(sanitizeClassName(key) || "Schema", names);
    const stem = claim(sanitizeModuleName(name), stems, "-");
    assignGenerationName(schema, name, stem);
  }
}
