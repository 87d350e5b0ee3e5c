/**
 * Module context
 *
 * The Type Resolver's only view of the generated file layout: it records
 * imports and asks whether importing a module would close an import cycle.
 */

import { posix } from "node:path";

import { buildDependencyGraph } from "@/ir/utils";

import type { IRSchema } from "@/ir/types";

export interface ModuleContext {
  /** Stem of the module being generated */
  readonly currentModule?: string;
  addImport(module: string, name: string): void;
  /** Record a scalar type from the shared typing module */
  addTypingImport(name: string): void;
  /**
   * Relative import path to `targetModule`, and whether the reference must
   * stay a forward reference instead of an import
   */
  resolveRelativeOrForward(targetModule: string): {
    path: string;
    isForwardRef: boolean;
  };
}

/**
 * Calculate a relative import path between two module ids (paths without
 * extension, relative to the same root)
 *
 * @example
 * getRelativeImportPath("models/pet", "models/owner") // "./owner"
 * getRelativeImportPath("models/pet", "types") // "../types"
 */
export function getRelativeImportPath(
  fromModule: string,
  toModule: string,
): string {
  const rel = posix.relative(posix.dirname(fromModule), toModule);
  // Only prepend ./ if it doesn't already start with a dot
  return rel.startsWith(".") ? rel : `./${rel}`;
}

// ============================================================================
// Module graph
// ============================================================================

/**
 * Module-level dependency graph: module stem -> stems it imports
 */
export class ModuleGraph {
  private readonly edges: Map<string, Set<string>>;

  constructor(edges: Map<string, Set<string>> = new Map()) {
    this.edges = edges;
  }

  /**
   * Build the graph from named arena schemas. Each schema lives in the
   * module named by its finalModuleStem.
   */
  static fromSchemas(schemas: Record<string, IRSchema>): ModuleGraph {
    const edges = new Map<string, Set<string>>();

    for (const [name, deps] of buildDependencyGraph(schemas)) {
      const from = schemas[name]?.finalModuleStem;
      if (!from) continue;

      const targets = edges.get(from) ?? new Set<string>();
      for (const dep of deps) {
        const to = schemas[dep]?.finalModuleStem;
        if (to && to !== from) targets.add(to);
      }
      edges.set(from, targets);
    }

    return new ModuleGraph(edges);
  }

  dependenciesOf(module: string): ReadonlySet<string> {
    return this.edges.get(module) ?? new Set();
  }

  /**
   * Whether `from` reaches `to` through one or more imports
   */
  reaches(from: string, to: string): boolean {
    const seen = new Set<string>();
    const queue = [...this.dependenciesOf(from)];

    while (queue.length > 0) {
      const module = queue.shift();
      if (module === undefined || seen.has(module)) continue;
      if (module === to) return true;
      seen.add(module);
      queue.push(...this.dependenciesOf(module));
    }
    return false;
  }
}

// ============================================================================
// Render context
// ============================================================================

export interface RenderModuleContextOptions {
  /** Module id of the file being generated, e.g. "models/pet" */
  currentModule: string;
  graph: ModuleGraph;
  /** Directory prefix shared by schema modules (default "models") */
  modelsDir?: string;
  /** Module id of the shared scalar typing module (default "types") */
  typingModule?: string;
}

/**
 * Module context for one generated schema module. Collects the imports the
 * resolver asks for and renders them as `import type` statements.
 */
export class RenderModuleContext implements ModuleContext {
  readonly currentModule: string;
  private readonly graph: ModuleGraph;
  private readonly modelsDir: string;
  private readonly typingModule: string;
  private readonly imports = new Map<string, Set<string>>();
  private readonly typingImports = new Set<string>();

  constructor(options: RenderModuleContextOptions) {
    this.currentModule = options.currentModule;
    this.graph = options.graph;
    this.modelsDir = options.modelsDir ?? "models";
    this.typingModule = options.typingModule ?? "types";
  }

  addImport(module: string, name: string): void {
    const names = this.imports.get(module) ?? new Set<string>();
    names.add(name);
    this.imports.set(module, names);
  }

  addTypingImport(name: string): void {
    this.typingImports.add(name);
  }

  resolveRelativeOrForward(targetModule: string): {
    path: string;
    isForwardRef: boolean;
  } {
    const path = getRelativeImportPath(
      this.moduleId(this.currentModule),
      this.moduleId(targetModule),
    );
    const isForwardRef =
      targetModule === this.currentModule ||
      this.graph.reaches(targetModule, this.currentModule);
    return { path, isForwardRef };
  }

  /** Collected imports, modules and names sorted */
  getImports(): [module: string, names: string[]][] {
    return [...this.imports.entries()]
      .map(([module, names]): [string, string[]] => [module, [...names].sort()])
      .sort(([a], [b]) => a.localeCompare(b));
  }

  getTypingImports(): string[] {
    return [...this.typingImports].sort();
  }

  /**
   * Import statements for everything collected so far
   */
  renderImports(): string[] {
    const lines = this.getImports().map(
      ([module, names]) => `import type { ${names.join(", ")} } from "${module}";`,
    );

    const typing = this.getTypingImports();
    if (typing.length > 0) {
      const path = getRelativeImportPath(
        this.moduleId(this.currentModule),
        this.typingModule,
      );
      lines.push(`import type { ${typing.join(", ")} } from "${path}";`);
    }
    return lines;
  }

  private moduleId(stem: string): string {
    return this.modelsDir ? `${this.modelsDir}/${stem}` : stem;
  }
}
