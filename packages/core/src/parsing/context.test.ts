import { describe, expect, it } from "vitest";

import { createSchema } from "@/ir/schema";
import { createMemoryLogger } from "@/utils/logger";

import { DEFAULT_MAX_DEPTH, ParsingContext } from "./context";

describe("ParsingContext", () => {
  it("defaults to a depth limit of 100 and no cycle limit", () => {
    const context = new ParsingContext();

    expect(context.maxDepth).toBe(DEFAULT_MAX_DEPTH);
    expect(context.maxDepth).toBe(100);
    expect(context.maxCycles).toBe(0);
    expect(context.rawSchemas).toEqual({});
  });

  describe("recursion guard", () => {
    it("enters and exits named schemas", () => {
      const context = new ParsingContext();

      expect(context.enterSchema("A")).toEqual({ kind: "enter" });
      expect(context.recursionStack).toEqual(["A"]);
      expect(context.isParsing("A")).toBe(true);
      expect(context.depth).toBe(1);

      context.exitSchema("A");
      expect(context.recursionStack).toEqual([]);
      expect(context.isParsing("A")).toBe(false);
      expect(context.depth).toBe(0);
    });

    it("reports a cycle with the full path", () => {
      const context = new ParsingContext();
      context.enterSchema("A");
      context.enterSchema("B");

      expect(context.enterSchema("A")).toEqual({
        kind: "cycle",
        name: "A",
        path: "A -> B -> A",
      });
      expect(context.cycleDetected).toBe(true);
      expect(context.cycleCount).toBe(1);
    });

    it("pops the most recent entry of a name on exit", () => {
      const context = new ParsingContext();
      context.enterSchema("A");
      context.enterSchema("B");
      context.enterSchema("A");

      context.exitSchema("A");
      expect(context.recursionStack).toEqual(["A", "B"]);
      context.exitSchema("B");
      context.exitSchema("A");
      expect(context.recursionStack).toEqual([]);
      expect(context.depth).toBe(0);
    });

    it("counts anonymous entries toward depth only", () => {
      const context = new ParsingContext({ maxDepth: 2 });

      expect(context.enterSchema(undefined)).toEqual({ kind: "enter" });
      expect(context.enterSchema(undefined)).toEqual({ kind: "enter" });
      expect(context.enterSchema(undefined)).toEqual({
        kind: "depth-exceeded",
        depth: 3,
      });
      expect(context.recursionStack).toEqual([]);
      expect(context.maxDepthReached).toBe(3);
    });

    it("checks depth before cycles", () => {
      const context = new ParsingContext({ maxDepth: 1 });
      context.enterSchema("A");

      expect(context.enterSchema("A")).toEqual({
        kind: "depth-exceeded",
        depth: 2,
      });
      expect(context.cycleDetected).toBe(false);
    });
  });

  describe("cycle logging", () => {
    it("logs cycles until the limit, then says so once", () => {
      const logger = createMemoryLogger();
      const context = new ParsingContext({
        maxCycles: 1,
        debugCycles: true,
        logger,
      });

      context.noteCycle("A -> A");
      expect(context.cycleLimitReached()).toBe(false);
      context.noteCycle("B -> B");
      context.noteCycle("C -> C");

      expect(context.cycleCount).toBe(3);
      expect(context.cycleLimitReached()).toBe(true);
      expect(logger.entries).toEqual([
        { level: "debug", message: "Cycle 1: A -> A" },
        {
          level: "info",
          message: "Cycle limit of 1 reached, further cycles are not logged",
        },
      ]);
    });

    it("stays quiet without debugCycles", () => {
      const logger = createMemoryLogger();
      const context = new ParsingContext({ logger });

      context.noteCycle("A -> A");

      expect(logger.entries).toEqual([]);
      expect(context.cycleLimitReached()).toBe(false);
    });
  });

  describe("warnings", () => {
    it("records and logs warnings", () => {
      const logger = createMemoryLogger();
      const context = new ParsingContext({ logger });

      context.warn("validation", "first");
      context.record("ambiguous-type", "second");

      expect(context.warnings).toEqual([
        { code: "validation", message: "first" },
        { code: "ambiguous-type", message: "second" },
      ]);
      expect(context.warningMessages()).toEqual([
        "[validation] first",
        "[ambiguous-type] second",
      ]);
      expect(logger.entries).toEqual([{ level: "warn", message: "first" }]);
    });
  });

  it("reset clears all run state", () => {
    const context = new ParsingContext();
    context.register("Pet", createSchema({ name: "Pet" }));
    context.discriminatorProperties.add("Cat.type");
    context.enterSchema("A");
    context.noteCycle("A -> A");
    context.warn("validation", "x");

    context.reset();

    expect(context.schemas.size).toBe(0);
    expect(context.discriminatorProperties.size).toBe(0);
    expect(context.recursionStack).toEqual([]);
    expect(context.warnings).toEqual([]);
    expect(context.depth).toBe(0);
    expect(context.maxDepthReached).toBe(0);
    expect(context.cycleCount).toBe(0);
    expect(context.cycleDetected).toBe(false);
  });

  it("registers and looks up arena schemas", () => {
    const context = new ParsingContext();
    const pet = createSchema({ name: "Pet" });

    context.register("Pet", pet);

    expect(context.lookup("Pet")).toBe(pet);
    expect(context.lookup("Owner")).toBeUndefined();
  });
});
