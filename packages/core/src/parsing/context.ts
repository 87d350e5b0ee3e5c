/**
 * Parsing Context
 *
 * All mutable state of one IR build: raw component maps, the schema arena,
 * the recursion stack and depth counters, warnings, and the discriminator
 * properties the enum hoisting must leave alone. One instance per run,
 * passed explicitly to every parsing function.
 */

import { formatWarning } from "@/core/errors";
import { createSilentLogger } from "@/utils/logger";

import type { ParseWarning, ParseWarningCode } from "@/core/errors";
import type { IRSchema } from "@/ir/types";
import type { IrkitLogger } from "@/utils/logger";
import type { RawSchema } from "./node";

export const DEFAULT_MAX_DEPTH = 100;

/**
 * Outcome of entering a schema
 */
export type GuardResult =
  | { kind: "enter" }
  | { kind: "cycle"; name: string; path: string }
  | { kind: "depth-exceeded"; depth: number };

/**
 * Raw `components` sections the parser looks references up in
 */
export interface RawComponents {
  schemas?: Record<string, RawSchema>;
  parameters?: Record<string, RawSchema>;
  requestBodies?: Record<string, RawSchema>;
  responses?: Record<string, RawSchema>;
}

export interface ParsingContextOptions {
  components?: RawComponents;
  /** Depth at which recursion stops with a placeholder (default 100) */
  maxDepth?: number;
  /** Stop logging cycles after this many; parsing is unaffected (0 = no limit) */
  maxCycles?: number;
  /** Log every cycle as it is found */
  debugCycles?: boolean;
  logger?: IrkitLogger;
}

export class ParsingContext {
  readonly components: RawComponents;
  readonly rawSchemas: Record<string, RawSchema>;
  readonly maxDepth: number;
  readonly maxCycles: number;
  readonly debugCycles: boolean;
  readonly logger: IrkitLogger;

  /** The arena: global name -> canonical schema instance */
  readonly schemas = new Map<string, IRSchema>();
  /** `"Variant.property"` keys excluded from enum hoisting */
  readonly discriminatorProperties = new Set<string>();

  cycleDetected = false;
  depth = 0;
  maxDepthReached = 0;
  cycleCount = 0;

  private stack: string[] = [];
  private collected: ParseWarning[] = [];

  constructor(options: ParsingContextOptions = {}) {
    this.components = options.components ?? {};
    this.rawSchemas = this.components.schemas ?? {};
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.maxCycles = options.maxCycles ?? 0;
    this.debugCycles = options.debugCycles ?? false;
    this.logger = options.logger ?? createSilentLogger();
  }

  // ==========================================================================
  // Recursion guard
  // ==========================================================================

  /**
   * Enter a schema. Depth is counted for every entry; only named entries
   * take part in cycle detection. Every call must be paired with
   * exitSchema, whatever the outcome.
   */
  enterSchema(name: string | undefined): GuardResult {
    this.depth += 1;
    this.maxDepthReached = Math.max(this.maxDepthReached, this.depth);

    const onStack = name !== undefined && this.stack.includes(name);
    const path = name !== undefined ? this.cyclePath(name) : "";
    if (name !== undefined) this.stack.push(name);

    if (this.depth > this.maxDepth) {
      return { kind: "depth-exceeded", depth: this.depth };
    }

    if (name !== undefined && onStack) {
      this.noteCycle(path);
      return { kind: "cycle", name, path };
    }

    return { kind: "enter" };
  }

  /**
   * Leave a schema entered with enterSchema. Pops the most recent entry of
   * `name`; a name that is not on the stack only decrements the depth.
   */
  exitSchema(name: string | undefined): void {
    this.depth = Math.max(0, this.depth - 1);
    if (name === undefined) return;

    const index = this.stack.lastIndexOf(name);
    if (index !== -1) this.stack.splice(index, 1);
  }

  isParsing(name: string): boolean {
    return this.stack.includes(name);
  }

  /**
   * Arrow-joined path from the outermost schema being parsed to `name`,
   * e.g. "A -> B -> A"
   */
  cyclePath(name: string): string {
    return [...this.stack, name].join(" -> ");
  }

  /**
   * Count a detected cycle and log it as the debugging knobs ask
   */
  noteCycle(path: string): void {
    this.cycleDetected = true;
    this.cycleCount += 1;

    if (this.maxCycles > 0 && this.cycleCount === this.maxCycles + 1) {
      this.logger.info(
        `Cycle limit of ${this.maxCycles} reached, further cycles are not logged`,
      );
    } else if (this.debugCycles && !this.cycleLimitReached()) {
      this.logger.debug(`Cycle ${this.cycleCount}: ${path}`);
    }
  }

  /**
   * True once more than maxCycles cycles were seen. Later cycles are still
   * recorded as warnings but no longer logged.
   */
  cycleLimitReached(): boolean {
    return this.maxCycles > 0 && this.cycleCount > this.maxCycles;
  }

  /** Names currently being parsed, outermost first */
  get recursionStack(): readonly string[] {
    return this.stack;
  }

  // ==========================================================================
  // Arena
  // ==========================================================================

  register(name: string, schema: IRSchema): void {
    this.schemas.set(name, schema);
  }

  lookup(name: string): IRSchema | undefined {
    return this.schemas.get(name);
  }

  // ==========================================================================
  // Warnings
  // ==========================================================================

  warn(code: ParseWarningCode, message: string): void {
    this.record(code, message);
    this.logger.warn(message);
  }

  /** Collect a warning without logging it */
  record(code: ParseWarningCode, message: string): void {
    this.collected.push({ code, message });
  }

  get warnings(): readonly ParseWarning[] {
    return this.collected;
  }

  /** Warnings as the strings surfaced to callers */
  warningMessages(): string[] {
    return this.collected.map(formatWarning);
  }

  /**
   * Clear all run state so the context can serve another run
   */
  reset(): void {
    this.schemas.clear();
    this.discriminatorProperties.clear();
    this.stack = [];
    this.collected = [];
    this.cycleDetected = false;
    this.depth = 0;
    this.maxDepthReached = 0;
    this.cycleCount = 0;
  }
}
